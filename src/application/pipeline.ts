import type { Logger } from 'pino';
import type { BatchReport, Checkpoint, MergeReceipt, MicroBatch, Offsets } from '../domain/index.js';
import {
  BatchTooLargeError,
  CheckpointCommitError,
  PipelineHaltedError,
  RetryExhaustedError,
  SourceReadError,
  StorageUnavailableError,
  compareOffsets,
} from '../domain/index.js';
import type { AlertDispatcher, OperatorAlert } from './alerts.js';
import { AnalyticalSink } from './analytical-sink.js';
import type { BatchLimits, DedupeResult } from './batch-deduplicator.js';
import { dedupeBatch } from './batch-deduplicator.js';
import { BatchReportLog } from './batch-report-log.js';
import { CheckpointManager } from './checkpoint-manager.js';
import { fingerprintAll } from './key-deriver.js';
import { MergeSink } from './merge-sink.js';
import type {
  AnalyticalStore,
  CheckpointStore,
  MergeStore,
  ParkedBatchStore,
  SourceRecord,
} from './ports.js';
import type { RetryPolicy } from './retry.js';
import { sleepUntilAborted } from './retry.js';
import type { TriggerSource, TriggerState } from './trigger-scheduler.js';
import { TriggerScheduler } from './trigger-scheduler.js';
import { VersionClock } from './version-clock.js';

export type PipelineStatus = 'created' | 'running' | 'paused' | 'halted' | 'stopped' | 'failed';

type PauseKind = 'storage_unavailable' | 'checkpoint_commit_failed' | 'source_unavailable';

/** Log source the pipeline reads from; `seek` repositions its read cursor. */
export interface PipelineSource<W> extends TriggerSource<W, SourceRecord> {
  seek(offsets: Offsets): void;
}

/**
 * Everything a pipeline run needs, passed in explicitly.
 * `close` releases the underlying connections.
 */
export interface PipelineContext<W> {
  pipelineId: string;
  source: PipelineSource<W>;
  mergeStore: MergeStore;
  analyticalStore: AnalyticalStore;
  checkpointStore: CheckpointStore;
  parkedStore: ParkedBatchStore;
  alert: AlertDispatcher;
  log: Logger;
  close?: () => Promise<void>;
}

export interface PipelineSettings {
  triggerIntervalMs: number;
  maxRecordsPerTrigger: number;
  batchLimits: BatchLimits;
  mergeTimeoutMs: number;
  mergeRetry: RetryPolicy;
  analyticalRetry: RetryPolicy;
  checkpointRetry: RetryPolicy;
  storagePauseMs: number;
  reportCapacity?: number;
  now?: () => number;
  /** Backoff sleep for retries; tests pass a no-op. */
  retrySleep?: (ms: number) => Promise<void>;
  /** Sleep between triggers and during storage pauses. */
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

/** Read-only view used by the ops HTTP routes. */
export interface PipelineView {
  getStatus(): PipelineStatus;
  triggerState(): TriggerState;
  checkpoint(): Checkpoint;
  recentReports(limit: number): BatchReport[];
  analyticalBacklog(): number;
}

/** Highest offset per partition across `records`. */
export function offsetsOf(records: readonly SourceRecord[]): Offsets {
  const offsets: Offsets = {};
  for (const record of records) {
    const current = offsets[record.partition];
    if (current === undefined || compareOffsets(record.offset, current) > 0) {
      offsets[record.partition] = record.offset;
    }
  }
  return offsets;
}

/**
 * The single-writer ingestion loop.
 *
 * Per dispatched slice: fingerprint → dedupe → merge (one transaction) →
 * queue the analytical append → checkpoint. The checkpoint only moves
 * after the merge receipt for the same batch exists; a failure anywhere
 * before that leaves the slice to be replayed from the last checkpoint.
 */
export class Pipeline<W> implements PipelineView {
  readonly mergeSink: MergeSink;
  readonly analyticalSink: AnalyticalSink;
  readonly checkpoints: CheckpointManager;
  readonly scheduler: TriggerScheduler<W, SourceRecord>;
  readonly reports: BatchReportLog;

  private status: PipelineStatus = 'created';
  private running: Promise<PipelineStatus> | null = null;
  private pausedBy: PauseKind | null = null;
  private readonly abort = new AbortController();
  private readonly log: Logger;
  private readonly now: () => number;
  private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;

  constructor(
    private readonly ctx: PipelineContext<W>,
    private readonly settings: PipelineSettings,
  ) {
    this.log = ctx.log.child({ pipeline_id: ctx.pipelineId });
    this.now = settings.now ?? Date.now;
    this.sleep = settings.sleep ?? sleepUntilAborted;
    const retrySleep = settings.retrySleep ? { sleep: settings.retrySleep } : {};

    this.mergeSink = new MergeSink(ctx.mergeStore, this.log, {
      timeoutMs: settings.mergeTimeoutMs,
      retry: settings.mergeRetry,
      now: this.now,
      ...retrySleep,
    });
    this.analyticalSink = new AnalyticalSink(ctx.analyticalStore, ctx.alert, this.log, {
      pipelineId: ctx.pipelineId,
      retry: settings.analyticalRetry,
      clock: new VersionClock(this.now),
      ...retrySleep,
    });
    this.checkpoints = new CheckpointManager(ctx.checkpointStore, this.log, {
      pipelineId: ctx.pipelineId,
      retry: settings.checkpointRetry,
      now: this.now,
      ...retrySleep,
    });
    this.scheduler = new TriggerScheduler<W, SourceRecord>(
      {
        closeWindow: async () => {
          const window = await ctx.source.closeWindow();
          if (this.pausedBy === 'source_unavailable') this.resume();
          return window;
        },
        nextSlice: (window, limit) => ctx.source.nextSlice(window, limit),
      },
      async (slice) => {
        await this.processSlice(slice);
      },
      this.log,
      {
        intervalMs: settings.triggerIntervalMs,
        maxRecordsPerTrigger: settings.maxRecordsPerTrigger,
        now: this.now,
        sleep: this.sleep,
      },
    );
    this.reports = new BatchReportLog(settings.reportCapacity);
  }

  // --------------------------------------------------
  // Lifecycle
  // --------------------------------------------------

  /** Recovers the checkpoint and positions the source right after it. */
  async open(): Promise<Checkpoint> {
    const checkpoint = await this.checkpoints.recover();
    this.ctx.source.seek(checkpoint.offsets);
    return checkpoint;
  }

  /** Starts the trigger loop; resolves with the final status. */
  run(): Promise<PipelineStatus> {
    this.running ??= this.loop();
    return this.running;
  }

  /**
   * Graceful stop: no new trigger starts, the slice in flight finishes
   * (its merge commits or rolls back), then queued analytical appends drain.
   */
  async stop(): Promise<PipelineStatus> {
    this.abort.abort();
    if (this.running) {
      await this.running;
    } else if (this.status !== 'halted') {
      this.status = 'stopped';
    }
    await this.flush();
    return this.status;
  }

  async flush(): Promise<void> {
    await this.analyticalSink.flush();
  }

  async close(): Promise<void> {
    await this.flush();
    await this.ctx.close?.();
  }

  private async loop(): Promise<PipelineStatus> {
    this.status = 'running';
    this.log.info(
      { intervalMs: this.settings.triggerIntervalMs, maxRecordsPerTrigger: this.settings.maxRecordsPerTrigger },
      'Pipeline started',
    );

    try {
      while (!this.abort.signal.aborted) {
        try {
          await this.scheduler.run(this.abort.signal);
        } catch (err: unknown) {
          if (!(err instanceof SourceReadError)) throw err;
          this.pause('source_unavailable', err);
          // A failed read may have moved the cursor past records it never returned.
          this.ctx.source.seek(this.checkpoints.current().offsets);
          await this.sleep(this.settings.storagePauseMs, this.abort.signal);
        }
      }
      this.status = 'stopped';
      this.log.info('Pipeline stopped');
    } catch (err: unknown) {
      if (!(err instanceof PipelineHaltedError)) {
        this.status = 'failed';
        this.log.fatal({ err }, 'Pipeline loop failed');
        throw err;
      }
      this.status = 'halted';
      this.log.fatal({ err, batch_id: err.batchId }, 'Pipeline halted, operator intervention required');
    }

    return this.status;
  }

  // --------------------------------------------------
  // Batch processing
  // --------------------------------------------------

  /**
   * Dispatch handler for one slice of a window. Resolves true once every
   * record of the slice is merged and checkpointed.
   *
   * Storage outages and checkpoint failures pause the loop and the slice
   * is retried without advancing the checkpoint. Exhausted merge retries
   * park the batch and halt the pipeline.
   */
  async processSlice(records: readonly SourceRecord[]): Promise<boolean> {
    for (;;) {
      try {
        const committed = await this.processBatch(records);
        if (committed) this.resume();
        return committed;
      } catch (err: unknown) {
        if (err instanceof StorageUnavailableError) {
          this.pause('storage_unavailable', err);
          await this.sleep(this.settings.storagePauseMs, this.abort.signal);
          if (this.abort.signal.aborted) return false;
          continue;
        }

        if (err instanceof CheckpointCommitError) {
          this.pause('checkpoint_commit_failed', err);
          // Replay from the last durable position; the merge is idempotent.
          this.ctx.source.seek(this.checkpoints.current().offsets);
          await this.sleep(this.settings.storagePauseMs, this.abort.signal);
          return false;
        }

        throw err;
      }
    }
  }

  private async processBatch(records: readonly SourceRecord[]): Promise<boolean> {
    const started = this.now();
    const { events, rejected } = fingerprintAll(records);

    let deduped: DedupeResult;
    try {
      deduped = dedupeBatch(events, this.settings.batchLimits);
    } catch (err: unknown) {
      if (err instanceof BatchTooLargeError && records.length > 1) {
        const half = Math.ceil(records.length / 2);
        this.log.warn(
          { records: err.records, estimatedBytes: err.estimatedBytes, split: [half, records.length - half] },
          'Batch too large, splitting window',
        );
        // The checkpoint covers a prefix of the log, so the second half waits on the first.
        const first = await this.processSlice(records.slice(0, half));
        if (!first || this.abort.signal.aborted) return false;
        return this.processSlice(records.slice(half));
      }
      if (err instanceof BatchTooLargeError) {
        const batchId = this.checkpoints.nextBatchId();
        await this.park(batchId, records, events, 'record exceeds batch bound', err, 0);
        this.raise({
          kind: 'record_too_large',
          severity: 'critical',
          batch_id: batchId,
          message: `Record at ${records[0]?.partition ?? '?'}/${records[0]?.offset ?? '?'} exceeds the batch bound; batch parked`,
          details: { estimatedBytes: err.estimatedBytes },
        });
        throw new PipelineHaltedError(batchId, 'single record exceeds the batch bound', { cause: err });
      }
      throw err;
    }

    const batch: MicroBatch = {
      batch_id: this.checkpoints.nextBatchId(),
      cut_at: new Date(started),
      events: deduped.events,
    };

    let receipt: MergeReceipt;
    try {
      receipt = await this.mergeSink.merge(batch);
    } catch (err: unknown) {
      if (err instanceof RetryExhaustedError) {
        await this.park(batch.batch_id, records, batch.events, 'merge retries exhausted', err, err.attempts);
        this.raise({
          kind: 'merge_retries_exhausted',
          severity: 'critical',
          batch_id: batch.batch_id,
          message: `Merge for batch ${batch.batch_id} failed after ${err.attempts} attempts; batch parked`,
          details: { attempts: err.attempts, error: describeError(err.cause) },
        });
        throw new PipelineHaltedError(batch.batch_id, 'merge retries exhausted', { cause: err });
      }
      throw err;
    }

    this.analyticalSink.enqueue(batch);
    const checkpoint = await this.checkpoints.commit(receipt, offsetsOf(records));

    if (rejected.length > 0) {
      this.log.warn(
        {
          batch_id: batch.batch_id,
          invalid: rejected.length,
          samples: rejected.slice(0, 5).map((r) => ({
            partition: r.record.partition,
            offset: r.record.offset,
            field: r.error.field,
            reason: r.error.reason,
          })),
        },
        'Dropped invalid events',
      );
      this.raise({
        kind: 'invalid_events',
        severity: 'warning',
        batch_id: batch.batch_id,
        message: `${rejected.length} invalid events dropped from batch ${batch.batch_id}`,
        details: { invalid: rejected.length },
      });
    }

    const report: BatchReport = {
      batch_id: batch.batch_id,
      record_count: records.length,
      invalid_count: rejected.length,
      duplicate_count: deduped.duplicates,
      unique_count: batch.events.length,
      rows_inserted: receipt.rows_inserted,
      rows_updated: receipt.rows_updated,
      rows_unchanged: receipt.rows_unchanged,
      merge_attempts: receipt.attempts,
      latency_ms: this.now() - started,
      committed_at: (checkpoint.committed_at ?? receipt.committed_at).toISOString(),
    };
    this.reports.add(report);
    this.log.info(report, 'Batch committed');
    return true;
  }

  private async park(
    batchId: number,
    records: readonly SourceRecord[],
    events: MicroBatch['events'],
    reason: string,
    err: unknown,
    attempts: number,
  ): Promise<void> {
    try {
      await this.ctx.parkedStore.park({
        pipeline_id: this.ctx.pipelineId,
        batch_id: batchId,
        reason,
        error: describeError(err instanceof RetryExhaustedError ? err.cause : err),
        attempts,
        offsets: offsetsOf(records),
        events,
      });
      this.log.error({ batch_id: batchId, reason, records: records.length }, 'Batch parked');
    } catch (parkErr: unknown) {
      this.log.error({ err: parkErr, batch_id: batchId }, 'Failed to park batch; it will be replayed from the checkpoint');
    }
  }

  private pause(kind: PauseKind, err: Error): void {
    const batchId = this.checkpoints.nextBatchId();
    this.log.error({ err, batch_id: batchId, pauseMs: this.settings.storagePauseMs }, 'Pipeline paused');
    if (this.status === 'running') this.status = 'paused';
    if (this.pausedBy !== null) return;
    this.pausedBy = kind;
    this.raise({
      kind,
      severity: 'critical',
      batch_id: batchId,
      message: `Pipeline paused at batch ${batchId}: ${err.message}`,
    });
  }

  private resume(): void {
    if (this.status === 'paused') {
      this.status = 'running';
      this.log.info('Pipeline resumed');
    }
    this.pausedBy = null;
  }

  private raise(alert: Omit<OperatorAlert, 'pipeline_id' | 'raised_at'>): void {
    this.ctx.alert({
      ...alert,
      pipeline_id: this.ctx.pipelineId,
      raised_at: new Date(this.now()).toISOString(),
    });
  }

  // --------------------------------------------------
  // PipelineView
  // --------------------------------------------------

  getStatus(): PipelineStatus {
    return this.status;
  }

  triggerState(): TriggerState {
    return this.scheduler.getState();
  }

  checkpoint(): Checkpoint {
    return this.checkpoints.current();
  }

  recentReports(limit: number): BatchReport[] {
    return this.reports.recent(limit);
  }

  analyticalBacklog(): number {
    return this.analyticalSink.backlog();
  }
}

function describeError(err: unknown): string {
  return err instanceof Error ? `${err.name}: ${err.message}` : String(err);
}
