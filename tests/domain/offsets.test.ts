import { describe, it, expect } from 'vitest';
import { compareOffsets, mergeOffsets } from '../../src/domain/index.js';

describe('compareOffsets', () => {
  it('orders by milliseconds numerically, not lexically', () => {
    expect(compareOffsets('9-0', '10-0')).toBeLessThan(0);
    expect(compareOffsets('10-0', '9-0')).toBeGreaterThan(0);
  });

  it('falls back to the sequence part when milliseconds match', () => {
    expect(compareOffsets('5-2', '5-10')).toBeLessThan(0);
    expect(compareOffsets('5-3', '5-3')).toBe(0);
  });

  it('treats a missing sequence as 0', () => {
    expect(compareOffsets('7', '7-0')).toBe(0);
  });
});

describe('mergeOffsets', () => {
  it('keeps the greater offset per partition', () => {
    const merged = mergeOffsets(
      { 'events:0': '10-0', 'events:1': '3-0' },
      { 'events:0': '9-0', 'events:1': '4-0' },
    );
    expect(merged).toEqual({ 'events:0': '10-0', 'events:1': '4-0' });
  });

  it('keeps partitions absent from the update and adds new ones', () => {
    const merged = mergeOffsets({ 'events:0': '2-0' }, { 'events:2': '1-0' });
    expect(merged).toEqual({ 'events:0': '2-0', 'events:2': '1-0' });
  });

  it('does not mutate its inputs', () => {
    const current = { 'events:0': '1-0' };
    mergeOffsets(current, { 'events:0': '2-0' });
    expect(current).toEqual({ 'events:0': '1-0' });
  });
});
