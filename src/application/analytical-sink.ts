import type { Logger } from 'pino';
import type { AnalyticalRow, MicroBatch } from '../domain/index.js';
import { AnalyticalSinkError, RetryExhaustedError } from '../domain/index.js';
import type { AlertDispatcher } from './alerts.js';
import type { AnalyticalStore } from './ports.js';
import type { RetryPolicy } from './retry.js';
import { withRetry } from './retry.js';
import { VersionClock } from './version-clock.js';

export interface AnalyticalSinkOptions {
  pipelineId: string;
  retry: RetryPolicy;
  sleep?: (ms: number) => Promise<void>;
  clock?: VersionClock;
}

export interface AnalyticalAck {
  readonly batch_id: number;
  readonly version: number;
  readonly rows: number;
  readonly attempts: number;
}

export function toAnalyticalRows(batch: MicroBatch, version: number): AnalyticalRow[] {
  return batch.events.map((event) => ({
    dedup_key: event.dedup_key,
    principal_id: event.principal_id,
    event_type: event.event_type,
    event_timestamp: event.event_timestamp,
    payload: event.payload,
    version,
  }));
}

/**
 * Best-effort secondary writer.
 *
 * Appends are chained in commit order on a private queue so the main loop
 * never waits on them. Every row of a batch carries the version drawn when
 * the batch was enqueued, i.e. right after its merge committed.
 */
export class AnalyticalSink {
  private queue: Promise<void> = Promise.resolve();
  private pending = 0;
  private failures = 0;
  private readonly clock: VersionClock;

  constructor(
    private readonly store: AnalyticalStore,
    private readonly alert: AlertDispatcher,
    private readonly log: Logger,
    private readonly options: AnalyticalSinkOptions,
  ) {
    this.clock = options.clock ?? new VersionClock();
  }

  /** Number of batches waiting to be appended. */
  backlog(): number {
    return this.pending;
  }

  /** Batches given up on since start. */
  failedBatches(): number {
    return this.failures;
  }

  /** Queues a batch behind earlier ones. Returns immediately. */
  enqueue(batch: MicroBatch): void {
    if (batch.events.length === 0) return;

    const version = this.clock.next();
    this.pending++;
    this.queue = this.queue
      .then(async () => {
        await this.append(batch, version);
      })
      .catch((err: unknown) => {
        this.log.error({ err, batch_id: batch.batch_id }, 'Analytical append abandoned');
      })
      .finally(() => {
        this.pending--;
      });
  }

  /**
   * Appends one batch with bounded retries. On exhaustion raises an
   * operator alert and throws AnalyticalSinkError.
   */
  async append(batch: MicroBatch, version: number): Promise<AnalyticalAck> {
    const rows = toAnalyticalRows(batch, version);
    let attempts = 0;

    try {
      await withRetry(
        () => this.store.appendRows(rows),
        {
          ...this.options.retry,
          ...(this.options.sleep ? { sleep: this.options.sleep } : {}),
          retryable: () => true,
          onAttempt: (attempt) => { attempts = attempt; },
        },
        this.log,
        { operation: 'analytical-append', batch_id: batch.batch_id },
      );
    } catch (err: unknown) {
      const cause = err instanceof RetryExhaustedError ? err.cause : err;
      this.failures++;
      this.alert({
        kind: 'analytical_sink_exhausted',
        severity: 'warning',
        pipeline_id: this.options.pipelineId,
        batch_id: batch.batch_id,
        message: `Analytical append gave up after ${attempts} attempts`,
        raised_at: new Date().toISOString(),
        details: { rows: rows.length, version },
      });
      throw new AnalyticalSinkError(batch.batch_id, attempts, { cause });
    }

    this.log.debug({ batch_id: batch.batch_id, version, rows: rows.length, attempts }, 'Analytical rows appended');
    return { batch_id: batch.batch_id, version, rows: rows.length, attempts };
  }

  /** Resolves once every queued append has finished or been abandoned. */
  async flush(): Promise<void> {
    while (this.pending > 0) {
      await this.queue;
    }
  }
}
