export type {
  Event,
  EventPayload,
  Offsets,
  FingerprintedEvent,
  MicroBatch,
  MergeTableRow,
  AnalyticalRow,
  Checkpoint,
  MergeCounts,
  MergeReceipt,
  BatchReport,
} from './event.js';
export { INITIAL_CHECKPOINT } from './event.js';
export {
  PipelineError,
  MissingFieldError,
  BatchTooLargeError,
  TransactionConflictError,
  TransactionTimeoutError,
  StorageUnavailableError,
  SourceReadError,
  AnalyticalSinkError,
  CheckpointCommitError,
  CheckpointOrderError,
  ConcurrentMergeError,
  RetryExhaustedError,
  PipelineHaltedError,
  isRetryable,
} from './errors.js';
export { compareOffsets, mergeOffsets } from './offsets.js';
export { canonicalJson, samePayload } from './canonical-json.js';
