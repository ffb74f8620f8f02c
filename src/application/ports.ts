import type {
  AnalyticalRow,
  Checkpoint,
  FingerprintedEvent,
  MergeCounts,
  MergeTableRow,
  Offsets,
} from '../domain/index.js';

/** One entry read from the partitioned log, before validation. */
export interface SourceRecord {
  readonly partition: string;
  readonly offset: string;
  readonly fields: Record<string, unknown>;
}

/**
 * Transactional store behind the Merge Sink.
 *
 * `mergeRows` must apply every row or none: on any thrown error the
 * store is left as it was before the call.
 */
export interface MergeStore {
  mergeRows(
    rows: readonly MergeTableRow[],
    options: { timeoutMs: number },
  ): Promise<MergeCounts>;
}

/** Append-only secondary store; compaction is the store's own concern. */
export interface AnalyticalStore {
  appendRows(rows: readonly AnalyticalRow[]): Promise<void>;
}

export interface CheckpointStore {
  load(pipelineId: string): Promise<Checkpoint | null>;
  /** Returns false when the stored checkpoint is already at or past `checkpoint.batch_id`. */
  save(pipelineId: string, checkpoint: Checkpoint): Promise<boolean>;
}

export interface ParkedBatch {
  readonly pipeline_id: string;
  readonly batch_id: number;
  readonly reason: string;
  readonly error: string;
  readonly attempts: number;
  readonly offsets: Offsets;
  readonly events: readonly FingerprintedEvent[];
}

/** Holds batches an operator has to look at before the pipeline resumes. */
export interface ParkedBatchStore {
  park(batch: ParkedBatch): Promise<void>;
}
