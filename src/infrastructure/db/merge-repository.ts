import { inArray, sql } from 'drizzle-orm';
import type { MergeCounts, MergeTableRow } from '../../domain/index.js';
import { samePayload } from '../../domain/index.js';
import type { MergeStore } from '../../application/ports.js';
import type { Database } from './client.js';
import { mergedEvents } from './schema.js';
import { classifyStorageError } from './storage-errors.js';

/** Advisory lock key held for the duration of every merge transaction. */
const MERGE_LOCK_KEY = 7_301_937_223;

// 6 bound parameters per row; stays well under the 65535 parameter limit.
const CHUNK_SIZE = 2000;

function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * Merges a deduplicated batch into `merged_events` inside one transaction.
 *
 * 1. SET LOCAL statement_timeout bounds every statement of the transaction.
 * 2. pg_advisory_xact_lock serializes merges across processes.
 * 3. SELECT … FOR UPDATE classifies each row as insert, update or unchanged.
 * 4. INSERT … ON CONFLICT (dedup_key) DO UPDATE writes payload and merge_version.
 *
 * Any error rolls the whole batch back and is mapped onto the pipeline's
 * error taxonomy by classifyStorageError.
 */
export async function mergeEventRows(
  db: Database,
  rows: readonly MergeTableRow[],
  timeoutMs: number,
): Promise<MergeCounts> {
  try {
    return await db.transaction(async (tx) => {
      await tx.execute(sql.raw(`SET LOCAL statement_timeout = ${Math.max(1, Math.floor(timeoutMs))}`));
      await tx.execute(sql.raw(`SELECT pg_advisory_xact_lock(${MERGE_LOCK_KEY})`));

      let rows_inserted = 0;
      let rows_updated = 0;
      let rows_unchanged = 0;

      for (const part of chunk(rows, CHUNK_SIZE)) {
        const existing = await tx
          .select({ dedup_key: mergedEvents.dedup_key, payload: mergedEvents.payload })
          .from(mergedEvents)
          .where(inArray(mergedEvents.dedup_key, part.map((row) => row.dedup_key)))
          .for('update');

        const prior = new Map(existing.map((row) => [row.dedup_key, row.payload]));
        for (const row of part) {
          const payload = prior.get(row.dedup_key);
          if (payload === undefined) rows_inserted++;
          else if (samePayload(payload, row.payload)) rows_unchanged++;
          else rows_updated++;
        }

        await tx
          .insert(mergedEvents)
          .values(part.map((row) => ({
            dedup_key: row.dedup_key,
            principal_id: row.principal_id,
            event_type: row.event_type,
            event_timestamp: new Date(row.event_timestamp),
            payload: row.payload,
            merge_version: row.merge_version,
          })))
          .onConflictDoUpdate({
            target: mergedEvents.dedup_key,
            set: {
              payload: sql`excluded.payload`,
              merge_version: sql`excluded.merge_version`,
              updated_at: sql`now()`,
            },
          });
      }

      return { rows_inserted, rows_updated, rows_unchanged };
    });
  } catch (err: unknown) {
    throw classifyStorageError(err);
  }
}

export function createPostgresMergeStore(db: Database): MergeStore {
  return {
    mergeRows: (rows, options) => mergeEventRows(db, rows, options.timeoutMs),
  };
}
