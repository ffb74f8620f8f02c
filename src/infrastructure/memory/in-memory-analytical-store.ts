import type { AnalyticalRow } from '../../domain/index.js';
import type { AnalyticalStore } from '../../application/ports.js';

/** Append-only analytical table with a last-write-wins read view. */
export class InMemoryAnalyticalStore implements AnalyticalStore {
  private readonly rows: AnalyticalRow[] = [];
  private readonly scripted: Error[] = [];

  failNext(...errors: Error[]): void {
    this.scripted.push(...errors);
  }

  async appendRows(rows: readonly AnalyticalRow[]): Promise<void> {
    await Promise.resolve();
    const failure = this.scripted.shift();
    if (failure) throw failure;
    this.rows.push(...rows);
  }

  all(): readonly AnalyticalRow[] {
    return this.rows;
  }

  /** Newest version per dedup_key, i.e. the state after compaction. */
  latest(): Map<string, AnalyticalRow> {
    const view = new Map<string, AnalyticalRow>();
    for (const row of this.rows) {
      const current = view.get(row.dedup_key);
      if (current === undefined || row.version > current.version) {
        view.set(row.dedup_key, row);
      }
    }
    return view;
  }
}
