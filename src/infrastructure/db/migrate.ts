import type { Logger } from 'pino';
import type { SqlClient } from './client.js';

/**
 * Ensures tables, indexes and the analytical last-write-wins view exist.
 *
 * Mirrors schema.ts. In production `drizzle-kit migrate` owns the schema;
 * this keeps a fresh local database usable on first run.
 */
export async function ensureSchema(sql: SqlClient, log: Logger): Promise<void> {
  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS merged_events (
      dedup_key        VARCHAR(64)  PRIMARY KEY,
      principal_id     VARCHAR(255) NOT NULL,
      event_type       VARCHAR(255) NOT NULL,
      event_timestamp  TIMESTAMPTZ(3) NOT NULL,
      payload          JSONB        NOT NULL DEFAULT '{}',
      merge_version    BIGINT       NOT NULL,
      created_at       TIMESTAMPTZ  NOT NULL DEFAULT NOW(),
      updated_at       TIMESTAMPTZ  NOT NULL DEFAULT NOW()
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS analytical_events (
      id               BIGSERIAL    PRIMARY KEY,
      dedup_key        VARCHAR(64)  NOT NULL,
      principal_id     VARCHAR(255) NOT NULL,
      event_type       VARCHAR(255) NOT NULL,
      event_timestamp  TIMESTAMPTZ(3) NOT NULL,
      payload          JSONB        NOT NULL DEFAULT '{}',
      version          BIGINT       NOT NULL,
      appended_at      TIMESTAMPTZ  NOT NULL DEFAULT NOW()
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS pipeline_checkpoints (
      pipeline_id   VARCHAR(255) PRIMARY KEY,
      offsets       JSONB        NOT NULL DEFAULT '{}',
      batch_id      BIGINT       NOT NULL,
      committed_at  TIMESTAMPTZ  NOT NULL
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS parked_batches (
      parked_id    UUID          PRIMARY KEY,
      pipeline_id  VARCHAR(255)  NOT NULL,
      batch_id     BIGINT        NOT NULL,
      reason       VARCHAR(255)  NOT NULL,
      error        VARCHAR(4096) NOT NULL,
      attempts     BIGINT        NOT NULL,
      offsets      JSONB         NOT NULL DEFAULT '{}',
      events       JSONB         NOT NULL,
      parked_at    TIMESTAMPTZ   NOT NULL DEFAULT NOW()
    )
  `);

  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_merged_events_principal_id ON merged_events (principal_id)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_merged_events_event_timestamp ON merged_events (event_timestamp)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_analytical_events_key_version ON analytical_events (dedup_key, version)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_parked_batches_pipeline_id ON parked_batches (pipeline_id)`);

  await sql.unsafe(`
    CREATE OR REPLACE VIEW analytical_events_latest AS
    SELECT DISTINCT ON (dedup_key)
      dedup_key, principal_id, event_type, event_timestamp, payload, version, appended_at
    FROM analytical_events
    ORDER BY dedup_key, version DESC
  `);

  log.info('Database ready (merged_events + analytical_events + pipeline_checkpoints + parked_batches)');
}
