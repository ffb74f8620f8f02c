import { describe, it, expect } from 'vitest';
import type { BatchReport } from '../../src/domain/index.js';
import { BatchReportLog } from '../../src/application/index.js';

function report(batch_id: number): BatchReport {
  return {
    batch_id,
    record_count: 10,
    invalid_count: 0,
    duplicate_count: 2,
    unique_count: 8,
    rows_inserted: 8,
    rows_updated: 0,
    rows_unchanged: 0,
    merge_attempts: 1,
    latency_ms: 4,
    committed_at: '2026-02-18T12:00:00.000Z',
  };
}

describe('BatchReportLog', () => {
  it('returns the most recent reports newest first', () => {
    const log = new BatchReportLog();
    for (let id = 1; id <= 5; id++) log.add(report(id));

    expect(log.recent(3).map((r) => r.batch_id)).toEqual([5, 4, 3]);
  });

  it('drops the oldest reports beyond capacity', () => {
    const log = new BatchReportLog(3);
    for (let id = 1; id <= 5; id++) log.add(report(id));

    expect(log.size()).toBe(3);
    expect(log.recent(10).map((r) => r.batch_id)).toEqual([5, 4, 3]);
  });

  it('returns a copy that later additions do not change', () => {
    const log = new BatchReportLog();
    log.add(report(1));
    const snapshot = log.recent(10);
    log.add(report(2));

    expect(snapshot.map((r) => r.batch_id)).toEqual([1]);
  });
});
