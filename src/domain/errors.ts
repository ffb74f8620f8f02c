/**
 * Error taxonomy of the pipeline.
 *
 * Every error carries a stable `code` for logs and alerts and a
 * `retryable` flag the retry helper consults.
 */
export abstract class PipelineError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** An event is missing an identity field or fails boundary validation. */
export class MissingFieldError extends PipelineError {
  readonly code = 'MISSING_FIELD';
  readonly retryable = false;

  constructor(
    readonly field: string,
    readonly reason: string,
  ) {
    super(`Invalid or missing field "${field}": ${reason}`);
  }
}

/** A batch exceeds the configured memory bound; the caller must split it. */
export class BatchTooLargeError extends PipelineError {
  readonly code = 'BATCH_TOO_LARGE';
  readonly retryable = false;

  constructor(
    readonly records: number,
    readonly estimatedBytes: number,
  ) {
    super(`Batch of ${records} records (~${estimatedBytes} bytes) exceeds the configured bound`);
  }
}

/** Serialization failure, deadlock or key conflict inside a merge transaction. */
export class TransactionConflictError extends PipelineError {
  readonly code = 'TRANSACTION_CONFLICT';
  readonly retryable = true;
}

/** The merge transaction hit its statement or lock timeout. */
export class TransactionTimeoutError extends PipelineError {
  readonly code = 'TRANSACTION_TIMEOUT';
  readonly retryable = true;
}

/** The transactional store cannot be reached; fatal for the batch. */
export class StorageUnavailableError extends PipelineError {
  readonly code = 'STORAGE_UNAVAILABLE';
  readonly retryable = false;
}

/** Reading from the source log failed; the read resumes from the last checkpoint. */
export class SourceReadError extends PipelineError {
  readonly code = 'SOURCE_READ';
  readonly retryable = false;
}

/** An append to the analytical store failed after all attempts. */
export class AnalyticalSinkError extends PipelineError {
  readonly code = 'ANALYTICAL_SINK';
  readonly retryable = false;

  constructor(
    readonly batchId: number,
    readonly attempts: number,
    options?: { cause?: unknown },
  ) {
    super(`Analytical append for batch ${batchId} failed after ${attempts} attempts`, options);
  }
}

/** Persisting a checkpoint failed after all attempts. */
export class CheckpointCommitError extends PipelineError {
  readonly code = 'CHECKPOINT_COMMIT';
  readonly retryable = false;

  constructor(
    readonly batchId: number,
    options?: { cause?: unknown },
  ) {
    super(`Checkpoint commit for batch ${batchId} failed`, options);
  }
}

/** A checkpoint was requested for a batch that is not the next one to commit. */
export class CheckpointOrderError extends PipelineError {
  readonly code = 'CHECKPOINT_ORDER';
  readonly retryable = false;

  constructor(
    readonly expected: number,
    readonly received: number,
  ) {
    super(`Checkpoint expected merge receipt for batch ${expected}, got ${received}`);
  }
}

/** A second merge was started while one is still in flight. */
export class ConcurrentMergeError extends PipelineError {
  readonly code = 'CONCURRENT_MERGE';
  readonly retryable = false;

  constructor(readonly batchId: number) {
    super(`Merge for batch ${batchId} started while another merge is in flight`);
  }
}

/** A retryable operation ran out of attempts. `cause` is the last failure. */
export class RetryExhaustedError extends PipelineError {
  readonly code = 'RETRY_EXHAUSTED';
  readonly retryable = false;

  constructor(
    readonly operation: string,
    readonly attempts: number,
    options: { cause: unknown },
  ) {
    super(`${operation} failed after ${attempts} attempts`, options);
  }
}

export function isRetryable(err: unknown): boolean {
  return err instanceof PipelineError && err.retryable;
}

/** The pipeline stopped itself and needs an operator before it can resume. */
export class PipelineHaltedError extends PipelineError {
  readonly code = 'PIPELINE_HALTED';
  readonly retryable = false;

  constructor(
    readonly batchId: number,
    readonly reason: string,
    options?: { cause?: unknown },
  ) {
    super(`Pipeline halted at batch ${batchId}: ${reason}`, options);
  }
}
