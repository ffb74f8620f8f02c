import type { BatchReport } from '../domain/index.js';

/**
 * Bounded in-memory history of batch reports, newest last.
 *
 * The pipeline loop appends; the ops routes read. Both run on the same
 * event loop and `recent()` returns a copy, so readers never observe a
 * half-written history.
 */
export class BatchReportLog {
  private readonly reports: BatchReport[] = [];

  constructor(private readonly capacity = 100) {}

  add(report: BatchReport): void {
    this.reports.push(report);
    if (this.reports.length > this.capacity) {
      this.reports.splice(0, this.reports.length - this.capacity);
    }
  }

  /** Up to `limit` most recent reports, newest first. */
  recent(limit: number): BatchReport[] {
    return this.reports.slice(-limit).reverse();
  }

  size(): number {
    return this.reports.length;
  }
}
