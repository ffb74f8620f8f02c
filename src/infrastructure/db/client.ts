import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import type { Logger } from 'pino';
import * as schema from './schema.js';

/**
 * Creates a Drizzle client backed by postgres.js.
 *
 * Returns both the raw `sql` connection (for lifecycle management and
 * the schema bootstrap) and the typed `db` instance (for queries).
 */
export function createDbClient(databaseUrl: string, log?: Logger) {
  const sql = postgres(databaseUrl, {
    // Single writer: a handful of connections covers merge, analytical and checkpoint writes.
    max: 5,
    idle_timeout: 20,
    connect_timeout: 10,
    onnotice: (notice) => log?.debug({ notice }, 'Postgres notice'),
  });

  const db = drizzle(sql, { schema });

  return { sql, db };
}

export type Database = ReturnType<typeof createDbClient>['db'];
export type SqlClient = ReturnType<typeof createDbClient>['sql'];
