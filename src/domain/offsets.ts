import type { Offsets } from './event.js';

function parseOffset(offset: string): [number, number] {
  const [ms = '0', seq = '0'] = offset.split('-');
  return [Number(ms), Number(seq)];
}

/**
 * Orders two stream entry IDs (`<ms>-<seq>`).
 * Returns a negative number, zero or a positive number like a sort comparator.
 */
export function compareOffsets(a: string, b: string): number {
  const [aMs, aSeq] = parseOffset(a);
  const [bMs, bSeq] = parseOffset(b);
  return aMs !== bMs ? aMs - bMs : aSeq - bSeq;
}

/**
 * Folds `next` into `current`, keeping the greater offset per partition.
 * Partitions absent from `next` keep their committed offset.
 */
export function mergeOffsets(current: Offsets, next: Offsets): Offsets {
  const merged: Offsets = { ...current };
  for (const [partition, offset] of Object.entries(next)) {
    const existing = merged[partition];
    if (existing === undefined || compareOffsets(offset, existing) > 0) {
      merged[partition] = offset;
    }
  }
  return merged;
}
