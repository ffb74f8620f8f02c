import type { Logger } from 'pino';
import type { MergeReceipt, MergeTableRow, MicroBatch } from '../domain/index.js';
import { ConcurrentMergeError } from '../domain/index.js';
import type { MergeStore } from './ports.js';
import type { RetryPolicy } from './retry.js';
import { withRetry } from './retry.js';

export interface MergeSinkOptions {
  timeoutMs: number;
  retry: RetryPolicy;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

/** Row written for an event; `merge_version` is the committing batch's id. */
export function toMergeRow(batch: MicroBatch, index: number): MergeTableRow {
  const event = batch.events[index];
  if (event === undefined) {
    throw new RangeError(`Batch ${batch.batch_id} has no event at index ${index}`);
  }
  return {
    dedup_key: event.dedup_key,
    principal_id: event.principal_id,
    event_type: event.event_type,
    event_timestamp: event.event_timestamp,
    payload: event.payload,
    merge_version: batch.batch_id,
  };
}

/**
 * Single-writer front of the transactional store.
 *
 * Each batch is applied in one transaction by the store. Conflicts and
 * timeouts are retried with backoff; exhaustion surfaces as
 * RetryExhaustedError. StorageUnavailableError is never retried here.
 *
 * Re-applying a batch with the same `batch_id` leaves the table as it was:
 * existing keys receive the same payload and the same merge_version.
 */
export class MergeSink {
  private inFlight: number | null = null;
  private readonly now: () => number;

  constructor(
    private readonly store: MergeStore,
    private readonly log: Logger,
    private readonly options: MergeSinkOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  /** Batch id of the merge currently in flight, if any. */
  inFlightBatch(): number | null {
    return this.inFlight;
  }

  async merge(batch: MicroBatch): Promise<MergeReceipt> {
    if (batch.events.length === 0) {
      this.log.debug({ batch_id: batch.batch_id }, 'Empty batch, no merge transaction opened');
      return {
        batch_id: batch.batch_id,
        merge_version: batch.batch_id,
        rows_inserted: 0,
        rows_updated: 0,
        rows_unchanged: 0,
        attempts: 0,
        committed: false,
        committed_at: new Date(this.now()),
      };
    }

    if (this.inFlight !== null) {
      throw new ConcurrentMergeError(batch.batch_id);
    }

    this.inFlight = batch.batch_id;
    try {
      const rows = batch.events.map((_, index) => toMergeRow(batch, index));
      let attempts = 0;

      const counts = await withRetry(
        () => this.store.mergeRows(rows, { timeoutMs: this.options.timeoutMs }),
        {
          ...this.options.retry,
          ...(this.options.sleep ? { sleep: this.options.sleep } : {}),
          onAttempt: (attempt) => { attempts = attempt; },
        },
        this.log,
        { operation: 'merge', batch_id: batch.batch_id },
      );

      this.log.debug(
        { batch_id: batch.batch_id, attempts, ...counts },
        'Merge transaction committed',
      );

      return {
        ...counts,
        batch_id: batch.batch_id,
        merge_version: batch.batch_id,
        attempts,
        committed: true,
        committed_at: new Date(this.now()),
      };
    } finally {
      this.inFlight = null;
    }
  }
}
