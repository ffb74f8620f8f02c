import type { Logger } from 'pino';
import type { Checkpoint, MergeReceipt, Offsets } from '../domain/index.js';
import {
  CheckpointCommitError,
  CheckpointOrderError,
  INITIAL_CHECKPOINT,
  mergeOffsets,
} from '../domain/index.js';
import type { CheckpointStore } from './ports.js';
import type { RetryPolicy } from './retry.js';
import { withRetry } from './retry.js';

export interface CheckpointManagerOptions {
  pipelineId: string;
  retry: RetryPolicy;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

/**
 * Owns the durable progress of one pipeline.
 *
 * `commit` takes the merge receipt of the batch being checkpointed, so a
 * checkpoint can only be written for a batch whose merge has committed,
 * and only for the batch directly after the last committed one.
 */
export class CheckpointManager {
  private committed: Checkpoint = INITIAL_CHECKPOINT;
  private readonly now: () => number;

  constructor(
    private readonly store: CheckpointStore,
    private readonly log: Logger,
    private readonly options: CheckpointManagerOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  /** Loads the last committed checkpoint, or the initial one on first start. */
  async recover(): Promise<Checkpoint> {
    const stored = await this.store.load(this.options.pipelineId);
    this.committed = stored ?? INITIAL_CHECKPOINT;
    this.log.info(
      { pipeline_id: this.options.pipelineId, batch_id: this.committed.batch_id, offsets: this.committed.offsets },
      stored ? 'Checkpoint recovered' : 'No checkpoint found, starting from the beginning',
    );
    return this.committed;
  }

  current(): Checkpoint {
    return this.committed;
  }

  nextBatchId(): number {
    return this.committed.batch_id + 1;
  }

  /**
   * Durably advances progress to `offsets` for the batch in `receipt`.
   *
   * Offsets only move forward per partition. On persistent failure the
   * cached state stays at the previous checkpoint and CheckpointCommitError
   * is thrown; replaying the batch is then a no-op on the merge table.
   */
  async commit(receipt: MergeReceipt, offsets: Offsets): Promise<Checkpoint> {
    const expected = this.nextBatchId();
    if (receipt.batch_id !== expected) {
      throw new CheckpointOrderError(expected, receipt.batch_id);
    }

    const next: Checkpoint = {
      offsets: mergeOffsets(this.committed.offsets, offsets),
      batch_id: receipt.batch_id,
      committed_at: new Date(this.now()),
    };

    let applied: boolean;
    try {
      applied = await withRetry(
        () => this.store.save(this.options.pipelineId, next),
        {
          ...this.options.retry,
          ...(this.options.sleep ? { sleep: this.options.sleep } : {}),
          retryable: () => true,
        },
        this.log,
        { operation: 'checkpoint-commit', batch_id: receipt.batch_id },
      );
    } catch (err: unknown) {
      throw new CheckpointCommitError(receipt.batch_id, { cause: err });
    }

    if (!applied) {
      // Another writer already stored this batch id or a later one.
      this.log.warn(
        { pipeline_id: this.options.pipelineId, batch_id: receipt.batch_id },
        'Stored checkpoint is already at or past this batch',
      );
    }

    this.committed = next;
    this.log.debug({ batch_id: next.batch_id, offsets: next.offsets }, 'Checkpoint committed');
    return next;
  }
}
