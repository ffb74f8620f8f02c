import type { AnalyticalRow } from '../../domain/index.js';
import type { AnalyticalStore } from '../../application/ports.js';
import type { Database } from './client.js';
import { analyticalEvents } from './schema.js';

const CHUNK_SIZE = 2000;

/**
 * Appends rows to `analytical_events`. No uniqueness is enforced here;
 * the `analytical_events_latest` view keeps the highest version per key.
 */
export async function appendAnalyticalRows(
  db: Database,
  rows: readonly AnalyticalRow[],
): Promise<void> {
  for (let i = 0; i < rows.length; i += CHUNK_SIZE) {
    const part = rows.slice(i, i + CHUNK_SIZE);
    await db.insert(analyticalEvents).values(part.map((row) => ({
      dedup_key: row.dedup_key,
      principal_id: row.principal_id,
      event_type: row.event_type,
      event_timestamp: new Date(row.event_timestamp),
      payload: row.payload,
      version: row.version,
    })));
  }
}

export function createPostgresAnalyticalStore(db: Database): AnalyticalStore {
  return {
    appendRows: (rows) => appendAnalyticalRows(db, rows),
  };
}
