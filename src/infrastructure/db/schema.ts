import { pgTable, uuid, varchar, timestamp, jsonb, bigint, bigserial, index } from 'drizzle-orm/pg-core';
import type { EventPayload, FingerprintedEvent, Offsets } from '../../domain/index.js';

/**
 * Drizzle schema for the transactional `merged_events` table.
 *
 * `dedup_key` is the primary key, so a second writer that slips past the
 * advisory lock still cannot create a duplicate row: its insert turns
 * into an update through ON CONFLICT.
 */
export const mergedEvents = pgTable('merged_events', {
  dedup_key: varchar('dedup_key', { length: 64 }).primaryKey(),
  principal_id: varchar('principal_id', { length: 255 }).notNull(),
  event_type: varchar('event_type', { length: 255 }).notNull(),
  event_timestamp: timestamp('event_timestamp', { withTimezone: true, precision: 3 }).notNull(),
  payload: jsonb('payload').$type<EventPayload>().notNull().default({}),
  merge_version: bigint('merge_version', { mode: 'number' }).notNull(),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updated_at: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_merged_events_principal_id').on(table.principal_id),
  index('idx_merged_events_event_timestamp').on(table.event_timestamp),
]);

/**
 * Append-only analytical table. Several rows per `dedup_key` may exist;
 * `analytical_events_latest` (created by the schema bootstrap) exposes the
 * highest `version` per key.
 */
export const analyticalEvents = pgTable('analytical_events', {
  id: bigserial('id', { mode: 'number' }).primaryKey(),
  dedup_key: varchar('dedup_key', { length: 64 }).notNull(),
  principal_id: varchar('principal_id', { length: 255 }).notNull(),
  event_type: varchar('event_type', { length: 255 }).notNull(),
  event_timestamp: timestamp('event_timestamp', { withTimezone: true, precision: 3 }).notNull(),
  payload: jsonb('payload').$type<EventPayload>().notNull().default({}),
  version: bigint('version', { mode: 'number' }).notNull(),
  appended_at: timestamp('appended_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_analytical_events_key_version').on(table.dedup_key, table.version),
]);

/** One durable checkpoint row per pipeline. */
export const pipelineCheckpoints = pgTable('pipeline_checkpoints', {
  pipeline_id: varchar('pipeline_id', { length: 255 }).primaryKey(),
  offsets: jsonb('offsets').$type<Offsets>().notNull().default({}),
  batch_id: bigint('batch_id', { mode: 'number' }).notNull(),
  committed_at: timestamp('committed_at', { withTimezone: true }).notNull(),
});

/** Batches set aside after their merge retries ran out. */
export const parkedBatches = pgTable('parked_batches', {
  parked_id: uuid('parked_id').primaryKey(),
  pipeline_id: varchar('pipeline_id', { length: 255 }).notNull(),
  batch_id: bigint('batch_id', { mode: 'number' }).notNull(),
  reason: varchar('reason', { length: 255 }).notNull(),
  error: varchar('error', { length: 4096 }).notNull(),
  attempts: bigint('attempts', { mode: 'number' }).notNull(),
  offsets: jsonb('offsets').$type<Offsets>().notNull().default({}),
  events: jsonb('events').$type<FingerprintedEvent[]>().notNull(),
  parked_at: timestamp('parked_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_parked_batches_pipeline_id').on(table.pipeline_id),
]);
