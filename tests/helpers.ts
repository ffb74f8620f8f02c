import { vi } from 'vitest';
import { pino } from 'pino';
import type { Logger } from 'pino';
import type { FingerprintedEvent, Offsets } from '../src/domain/index.js';
import { deriveKey } from '../src/application/key-deriver.js';
import { Pipeline } from '../src/application/pipeline.js';
import type { PipelineSettings } from '../src/application/pipeline.js';
import type { OperatorAlert } from '../src/application/alerts.js';
import type { RetryPolicy } from '../src/application/retry.js';
import {
  InMemoryAnalyticalStore,
  InMemoryCheckpointStore,
  InMemoryEventLog,
  InMemoryMergeStore,
  InMemoryParkedBatchStore,
} from '../src/infrastructure/memory/index.js';

/** Fixed "now" for deterministic timestamps. */
export const FIXED_NOW = new Date('2026-02-18T12:00:00Z').getTime();

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

/** Logger whose methods are spies, for asserting log calls. */
export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
  } as unknown as Logger;
}

export const noSleep = (): Promise<void> => Promise.resolve();

export const FAST_RETRY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1,
  maxDelayMs: 4,
  backoffMultiplier: 2,
};

/** Raw stream fields for one event, all values as strings like Redis delivers them. */
export function makeFields(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    principal_id: 'user-1',
    event_type: 'page_view',
    event_timestamp: String(FIXED_NOW),
    payload: { url: '/home' },
    ...overrides,
  };
}

/** A fingerprinted event with a real dedup_key. */
export function makeEvent(overrides: Partial<FingerprintedEvent> = {}): FingerprintedEvent {
  const identity = {
    principal_id: overrides.principal_id ?? 'user-1',
    event_type: overrides.event_type ?? 'page_view',
    event_timestamp: overrides.event_timestamp ?? FIXED_NOW,
  };
  return {
    ...identity,
    payload: overrides.payload ?? { url: '/home' },
    sequence: overrides.sequence,
    dedup_key: overrides.dedup_key ?? deriveKey(identity),
    partition: overrides.partition ?? 'events:0',
    offset: overrides.offset ?? '1-0',
  };
}

export function testSettings(overrides: Partial<PipelineSettings> = {}): PipelineSettings {
  return {
    triggerIntervalMs: 1000,
    maxRecordsPerTrigger: 5000,
    batchLimits: { maxRecords: 20_000, maxBytes: 64 * 1024 * 1024 },
    mergeTimeoutMs: 1000,
    mergeRetry: FAST_RETRY,
    analyticalRetry: FAST_RETRY,
    checkpointRetry: FAST_RETRY,
    storagePauseMs: 10,
    now: () => FIXED_NOW,
    retrySleep: noSleep,
    sleep: noSleep,
    ...overrides,
  };
}

export const PARTITIONS = ['events:0', 'events:1'];

/**
 * Memory-backed stores shared across "process restarts": build a new
 * pipeline over the same stores to simulate a restart.
 */
export function createStores() {
  return {
    log: new InMemoryEventLog(PARTITIONS),
    mergeStore: new InMemoryMergeStore(),
    analyticalStore: new InMemoryAnalyticalStore(),
    checkpointStore: new InMemoryCheckpointStore(),
    parkedStore: new InMemoryParkedBatchStore(),
    alerts: [] as OperatorAlert[],
  };
}

export type Stores = ReturnType<typeof createStores>;

export function createPipeline(
  stores: Stores,
  settings: Partial<PipelineSettings> = {},
): Pipeline<Offsets> {
  return new Pipeline(
    {
      pipelineId: 'test-pipeline',
      source: stores.log,
      mergeStore: stores.mergeStore,
      analyticalStore: stores.analyticalStore,
      checkpointStore: stores.checkpointStore,
      parkedStore: stores.parkedStore,
      alert: (alert) => { stores.alerts.push(alert); },
      log: silentLogger(),
    },
    testSettings(settings),
  );
}

/**
 * Appends `unique` distinct events plus `duplicates` exact re-deliveries
 * of the first events, spread over both partitions by principal.
 */
export function seedDataset(log: InMemoryEventLog, unique: number, duplicates: number): void {
  const fieldsFor = (i: number) => makeFields({
    principal_id: `user-${i % 500}`,
    event_type: i % 2 === 0 ? 'click' : 'page_view',
    event_timestamp: String(FIXED_NOW + i),
    payload: { n: i },
  });
  const partitionFor = (i: number) => PARTITIONS[(i % 500) % PARTITIONS.length] ?? 'events:0';

  for (let i = 0; i < unique; i++) {
    log.append(partitionFor(i), fieldsFor(i));
  }
  for (let i = 0; i < duplicates; i++) {
    log.append(partitionFor(i), fieldsFor(i));
  }
}
