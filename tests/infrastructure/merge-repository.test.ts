import { describe, it, expect } from 'vitest';
import type { SQL } from 'drizzle-orm';
import { PgDialect } from 'drizzle-orm/pg-core';
import type { EventPayload, MergeTableRow } from '../../src/domain/index.js';
import { StorageUnavailableError, TransactionConflictError } from '../../src/domain/index.js';
import type { Database } from '../../src/infrastructure/db/index.js';
import { createPostgresMergeStore, mergeEventRows, mergedEvents } from '../../src/infrastructure/db/index.js';

const dialect = new PgDialect();
const render = (query: SQL): string => dialect.sqlToQuery(query).sql;

interface Upsert {
  rows: Record<string, unknown>[];
  config: { target: unknown; set: Record<string, SQL> };
}

/**
 * Stand-in for the drizzle client. Statements are recorded in order;
 * `stored` plays the rows SELECT … FOR UPDATE finds, `failure` is thrown
 * by the first raw statement.
 */
function fakeDb(stored = new Map<string, EventPayload>(), failure?: unknown) {
  const statements: string[] = [];
  const upserts: Upsert[] = [];

  const tx = {
    execute: async (query: SQL) => {
      statements.push(render(query));
      if (failure !== undefined) throw failure;
      return [];
    },
    select: () => ({
      from: () => ({
        where: () => ({
          for: async (strength: string) => {
            statements.push(`select for ${strength}`);
            return [...stored].map(([dedup_key, payload]) => ({ dedup_key, payload }));
          },
        }),
      }),
    }),
    insert: () => ({
      values: (rows: Record<string, unknown>[]) => ({
        onConflictDoUpdate: async (config: Upsert['config']) => {
          statements.push(`insert ${rows.length}`);
          upserts.push({ rows, config });
        },
      }),
    }),
  };

  const db = {
    transaction: async <T>(fn: (t: typeof tx) => Promise<T>): Promise<T> => fn(tx),
  } as unknown as Database;

  return { db, statements, upserts };
}

function makeRows(count: number): MergeTableRow[] {
  return Array.from({ length: count }, (_, i) => ({
    dedup_key: `key-${i}`,
    principal_id: `user-${i}`,
    event_type: 'click',
    event_timestamp: 1_700_000_000_000 + i,
    payload: { n: i },
    merge_version: 4,
  }));
}

describe('mergeEventRows', () => {
  it('sets the statement timeout before taking the advisory lock', async () => {
    const { db, statements } = fakeDb();

    await mergeEventRows(db, makeRows(1), 1500.9);

    expect(statements).toEqual([
      'SET LOCAL statement_timeout = 1500',
      'SELECT pg_advisory_xact_lock(7301937223)',
      'select for update',
      'insert 1',
    ]);
  });

  it('never sets a statement timeout below 1 ms', async () => {
    const { db, statements } = fakeDb();

    await mergeEventRows(db, makeRows(1), 0.4);

    expect(statements[0]).toBe('SET LOCAL statement_timeout = 1');
  });

  it('merges in chunks of 2000 rows and counts across chunks', async () => {
    const stored = new Map<string, EventPayload>([
      ['key-0', { n: 0 }],
      ['key-2500', { n: -1 }],
    ]);
    const { db, statements } = fakeDb(stored);

    const counts = await mergeEventRows(db, makeRows(4500), 1000);

    expect(counts).toEqual({ rows_inserted: 4498, rows_updated: 1, rows_unchanged: 1 });
    expect(statements.slice(2)).toEqual([
      'select for update',
      'insert 2000',
      'select for update',
      'insert 2000',
      'select for update',
      'insert 500',
    ]);
  });

  it('upserts on dedup_key, taking payload and merge_version from the incoming row', async () => {
    const { db, upserts } = fakeDb();

    await mergeEventRows(db, makeRows(1), 1000);

    expect(upserts).toHaveLength(1);
    const [upsert] = upserts;
    expect(upsert?.rows).toEqual([{
      dedup_key: 'key-0',
      principal_id: 'user-0',
      event_type: 'click',
      event_timestamp: new Date(1_700_000_000_000),
      payload: { n: 0 },
      merge_version: 4,
    }]);
    expect(upsert?.config.target).toBe(mergedEvents.dedup_key);
    expect(Object.fromEntries(
      Object.entries(upsert?.config.set ?? {}).map(([column, value]) => [column, render(value)]),
    )).toEqual({
      payload: 'excluded.payload',
      merge_version: 'excluded.merge_version',
      updated_at: 'now()',
    });
  });

  it('maps a serialization failure to a retryable TransactionConflictError', async () => {
    const failure = Object.assign(new Error('could not serialize access'), { code: '40001' });
    const { db, statements } = fakeDb(new Map(), failure);

    const error = await mergeEventRows(db, makeRows(3), 1000).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TransactionConflictError);
    expect((error as TransactionConflictError).cause).toBe(failure);
    expect(statements).toHaveLength(1);
  });

  it('maps a refused connection to StorageUnavailableError', async () => {
    const failure = Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' });
    const { db } = fakeDb(new Map(), failure);

    await expect(mergeEventRows(db, makeRows(1), 1000)).rejects.toBeInstanceOf(StorageUnavailableError);
  });
});

describe('createPostgresMergeStore', () => {
  it('passes the merge timeout through to the transaction', async () => {
    const { db, statements } = fakeDb();
    const store = createPostgresMergeStore(db);

    await store.mergeRows(makeRows(2), { timeoutMs: 250 });

    expect(statements[0]).toBe('SET LOCAL statement_timeout = 250');
  });
});
