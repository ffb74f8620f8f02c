import type { FingerprintedEvent } from '../domain/index.js';
import { BatchTooLargeError } from '../domain/index.js';

export interface BatchLimits {
  /** Maximum number of events accepted in one batch. */
  maxRecords: number;
  /** Maximum estimated payload bytes held for one batch. */
  maxBytes: number;
}

export interface DedupeResult {
  readonly events: FingerprintedEvent[];
  readonly duplicates: number;
}

function estimateBytes(events: readonly FingerprintedEvent[]): number {
  let total = 0;
  for (const event of events) {
    total += event.dedup_key.length + event.principal_id.length + event.event_type.length;
    total += Buffer.byteLength(JSON.stringify(event.payload), 'utf8');
  }
  return total;
}

/** Throws BatchTooLargeError when `events` exceed either bound. */
export function assertWithinLimits(events: readonly FingerprintedEvent[], limits: BatchLimits): void {
  if (events.length > limits.maxRecords) {
    throw new BatchTooLargeError(events.length, estimateBytes(events));
  }
  const bytes = estimateBytes(events);
  if (bytes > limits.maxBytes) {
    throw new BatchTooLargeError(events.length, bytes);
  }
}

/**
 * Keeps one event per dedup_key.
 *
 * The first arrival holds the key's position. A later duplicate replaces
 * it only when both carry a `sequence` and the later one is strictly
 * greater; in every other case the first arrival wins.
 */
export function dedupe(events: readonly FingerprintedEvent[]): DedupeResult {
  const slots = new Map<string, number>();
  const kept: FingerprintedEvent[] = [];

  for (const event of events) {
    const slot = slots.get(event.dedup_key);
    if (slot === undefined) {
      slots.set(event.dedup_key, kept.length);
      kept.push(event);
      continue;
    }

    const current = kept[slot];
    if (
      current?.sequence !== undefined
      && event.sequence !== undefined
      && event.sequence > current.sequence
    ) {
      kept[slot] = event;
    }
  }

  return { events: kept, duplicates: events.length - kept.length };
}

/**
 * Dedupes each partition on its own, then concatenates the results in
 * partition-id order and dedupes again. The outcome depends only on the
 * input, never on the order in which partitions finished.
 */
export function dedupePartitions(partitions: ReadonlyMap<string, readonly FingerprintedEvent[]>): DedupeResult {
  const ordered = [...partitions.keys()].sort();
  const concatenated: FingerprintedEvent[] = [];
  let duplicates = 0;

  for (const partition of ordered) {
    const result = dedupe(partitions.get(partition) ?? []);
    duplicates += result.duplicates;
    concatenated.push(...result.events);
  }

  const merged = dedupe(concatenated);
  return { events: merged.events, duplicates: duplicates + merged.duplicates };
}

export function groupByPartition(events: readonly FingerprintedEvent[]): Map<string, FingerprintedEvent[]> {
  const groups = new Map<string, FingerprintedEvent[]>();
  for (const event of events) {
    const group = groups.get(event.partition);
    if (group) {
      group.push(event);
    } else {
      groups.set(event.partition, [event]);
    }
  }
  return groups;
}

/**
 * Bounds-checks a fingerprinted slice, then dedupes it partition by partition.
 * This is the step that runs before any store write.
 */
export function dedupeBatch(events: readonly FingerprintedEvent[], limits: BatchLimits): DedupeResult {
  assertWithinLimits(events, limits);
  return dedupePartitions(groupByPartition(events));
}
