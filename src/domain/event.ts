/**
 * Core domain types for the ingestion model.
 *
 * These types describe an event from the moment it is read off the log
 * until its effects land in the merge table, the analytical table and
 * the checkpoint. They carry no framework dependencies.
 */

/** Free-form key/value payload attached to every event. */
export type EventPayload = Record<string, unknown>;

/** Partition id → last processed offset (a stream entry ID). */
export type Offsets = Record<string, string>;

/**
 * Canonical Event entity after boundary validation.
 *
 * `event_timestamp` is already normalized to integer epoch milliseconds.
 * `sequence` is producer-assigned and only consulted when two events in
 * one batch share a fingerprint.
 */
export interface Event {
  readonly principal_id: string;
  readonly event_type: string;
  readonly event_timestamp: number;
  readonly payload: EventPayload;
  readonly sequence?: number | undefined;
}

/** Event plus its derived fingerprint and position in the source log. */
export interface FingerprintedEvent extends Event {
  readonly dedup_key: string;
  readonly partition: string;
  readonly offset: string;
}

/** A bounded, deduplicated set of events processed as one atomic unit. */
export interface MicroBatch {
  readonly batch_id: number;
  readonly cut_at: Date;
  readonly events: readonly FingerprintedEvent[];
}

/** Row shape of the transactional merge table. */
export interface MergeTableRow {
  readonly dedup_key: string;
  readonly principal_id: string;
  readonly event_type: string;
  readonly event_timestamp: number;
  readonly payload: EventPayload;
  readonly merge_version: number;
}

/** Row shape of the append-only analytical table. */
export interface AnalyticalRow {
  readonly dedup_key: string;
  readonly principal_id: string;
  readonly event_type: string;
  readonly event_timestamp: number;
  readonly payload: EventPayload;
  readonly version: number;
}

/** Durable progress marker. `batch_id` 0 means nothing committed yet. */
export interface Checkpoint {
  readonly offsets: Offsets;
  readonly batch_id: number;
  readonly committed_at: Date | null;
}

/** Insert/update tallies of one merge transaction. */
export interface MergeCounts {
  readonly rows_inserted: number;
  readonly rows_updated: number;
  readonly rows_unchanged: number;
}

/**
 * Proof that the merge for `batch_id` has committed.
 *
 * The checkpoint manager only accepts a receipt for the batch it expects
 * next, which is how "checkpoint after merge" is enforced.
 * `committed` is false for an empty batch (no transaction was opened).
 */
export interface MergeReceipt extends MergeCounts {
  readonly batch_id: number;
  readonly merge_version: number;
  readonly attempts: number;
  readonly committed: boolean;
  readonly committed_at: Date;
}

/** Per-batch observability record. */
export interface BatchReport {
  readonly batch_id: number;
  readonly record_count: number;
  readonly invalid_count: number;
  readonly duplicate_count: number;
  readonly unique_count: number;
  readonly rows_inserted: number;
  readonly rows_updated: number;
  readonly rows_unchanged: number;
  readonly merge_attempts: number;
  readonly latency_ms: number;
  readonly committed_at: string;
}

export const INITIAL_CHECKPOINT: Checkpoint = {
  offsets: {},
  batch_id: 0,
  committed_at: null,
};
