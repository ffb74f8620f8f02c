import { createHash } from 'node:crypto';
import type { Event, FingerprintedEvent } from '../domain/index.js';
import { MissingFieldError } from '../domain/index.js';
import { eventSchema, IDENTITY_DELIMITER } from './event-schema.js';
import type { SourceRecord } from './ports.js';

type IdentityFields = Pick<Event, 'principal_id' | 'event_type' | 'event_timestamp'>;

/**
 * Validates a raw record against the event schema.
 * The first failing field is reported as a MissingFieldError.
 */
export function validateEvent(raw: unknown): Event {
  const parsed = eventSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.join('.') : '(record)';
    throw new MissingFieldError(field, issue?.message ?? 'Invalid event');
  }
  return parsed.data;
}

/**
 * SHA-256 over the canonical identity fields joined by U+001F.
 * `event_timestamp` is already epoch milliseconds, so the decimal form is canonical.
 */
export function deriveKey(identity: IdentityFields): string {
  const canonical = [
    identity.principal_id,
    identity.event_type,
    String(identity.event_timestamp),
  ].join(IDENTITY_DELIMITER);

  return createHash('sha256').update(canonical, 'utf8').digest('hex');
}

/** Validates then fingerprints a raw event. Throws MissingFieldError. */
export function derive(raw: unknown): string {
  return deriveKey(validateEvent(raw));
}

export function fingerprint(record: SourceRecord): FingerprintedEvent {
  const event = validateEvent(record.fields);
  return {
    ...event,
    dedup_key: deriveKey(event),
    partition: record.partition,
    offset: record.offset,
  };
}

export interface RejectedRecord {
  readonly record: SourceRecord;
  readonly error: MissingFieldError;
}

export interface FingerprintResult {
  readonly events: FingerprintedEvent[];
  readonly rejected: RejectedRecord[];
}

/**
 * Fingerprints every record of a slice. Invalid records are collected,
 * never thrown, so one bad event cannot fail the batch.
 */
export function fingerprintAll(records: readonly SourceRecord[]): FingerprintResult {
  const events: FingerprintedEvent[] = [];
  const rejected: RejectedRecord[] = [];

  for (const record of records) {
    try {
      events.push(fingerprint(record));
    } catch (err: unknown) {
      if (err instanceof MissingFieldError) {
        rejected.push({ record, error: err });
        continue;
      }
      throw err;
    }
  }

  return { events, rejected };
}
