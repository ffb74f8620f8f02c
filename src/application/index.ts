export { eventSchema, eventTimestampSchema, IDENTITY_DELIMITER } from './event-schema.js';
export { validateEvent, deriveKey, derive, fingerprint, fingerprintAll } from './key-deriver.js';
export type { RejectedRecord, FingerprintResult } from './key-deriver.js';
export { dedupe, dedupePartitions, dedupeBatch, groupByPartition, assertWithinLimits } from './batch-deduplicator.js';
export type { BatchLimits, DedupeResult } from './batch-deduplicator.js';
export { MergeSink, toMergeRow } from './merge-sink.js';
export type { MergeSinkOptions } from './merge-sink.js';
export { AnalyticalSink, toAnalyticalRows } from './analytical-sink.js';
export type { AnalyticalSinkOptions, AnalyticalAck } from './analytical-sink.js';
export { CheckpointManager } from './checkpoint-manager.js';
export type { CheckpointManagerOptions } from './checkpoint-manager.js';
export { TriggerScheduler } from './trigger-scheduler.js';
export type { TriggerState, TriggerSource, DispatchHandler, TriggerOutcome, TriggerSchedulerOptions } from './trigger-scheduler.js';
export { Pipeline, offsetsOf } from './pipeline.js';
export type { PipelineStatus, PipelineSource, PipelineContext, PipelineSettings, PipelineView } from './pipeline.js';
export { BatchReportLog } from './batch-report-log.js';
export { VersionClock } from './version-clock.js';
export { withRetry, sleep, sleepUntilAborted, DEFAULT_RETRY_POLICY } from './retry.js';
export type { RetryPolicy, RetryOptions } from './retry.js';
export type { AlertKind, AlertSeverity, OperatorAlert, AlertDispatcher } from './alerts.js';
export type {
  SourceRecord,
  MergeStore,
  AnalyticalStore,
  CheckpointStore,
  ParkedBatch,
  ParkedBatchStore,
} from './ports.js';
