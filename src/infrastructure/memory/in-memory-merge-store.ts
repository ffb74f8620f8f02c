import type { MergeCounts, MergeTableRow } from '../../domain/index.js';
import { samePayload } from '../../domain/index.js';
import type { MergeStore } from '../../application/ports.js';

/**
 * In-process merge table.
 *
 * Applies a batch to a copy of the table and swaps it in only when every
 * row succeeded, which gives the same all-or-nothing behavior as a
 * database transaction. Failures can be scripted with `failNext`.
 */
export class InMemoryMergeStore implements MergeStore {
  private rows = new Map<string, MergeTableRow>();
  private readonly scripted: Error[] = [];
  private active = 0;
  private peakConcurrency = 0;
  private commits = 0;
  private attempts = 0;

  /** Queues errors thrown by the next merge calls, one per call. */
  failNext(...errors: Error[]): void {
    this.scripted.push(...errors);
  }

  async mergeRows(rows: readonly MergeTableRow[]): Promise<MergeCounts> {
    this.attempts++;
    this.active++;
    this.peakConcurrency = Math.max(this.peakConcurrency, this.active);
    try {
      // Yield so overlapping callers would actually interleave.
      await Promise.resolve();

      const failure = this.scripted.shift();
      if (failure) throw failure;

      const next = new Map(this.rows);
      let rows_inserted = 0;
      let rows_updated = 0;
      let rows_unchanged = 0;

      for (const row of rows) {
        const existing = next.get(row.dedup_key);
        if (existing === undefined) {
          rows_inserted++;
        } else if (samePayload(existing.payload, row.payload)) {
          rows_unchanged++;
        } else {
          rows_updated++;
        }
        next.set(row.dedup_key, { ...row });
      }

      this.rows = next;
      this.commits++;
      return { rows_inserted, rows_updated, rows_unchanged };
    } finally {
      this.active--;
    }
  }

  get(dedupKey: string): MergeTableRow | undefined {
    return this.rows.get(dedupKey);
  }

  /** Rows ordered by dedup_key, for state comparisons. */
  snapshot(): MergeTableRow[] {
    return [...this.rows.values()].sort((a, b) => (a.dedup_key < b.dedup_key ? -1 : 1));
  }

  size(): number {
    return this.rows.size;
  }

  /** Committed transactions. */
  commitCount(): number {
    return this.commits;
  }

  /** Every call, including failed ones. */
  attemptCount(): number {
    return this.attempts;
  }

  /** Highest number of merges observed in flight at once. */
  maxConcurrency(): number {
    return this.peakConcurrency;
  }
}
