import { z } from 'zod';

/** Separator between canonical identity fields in the fingerprint input. */
export const IDENTITY_DELIMITER = '\u001f';

const identityField = z
  .string()
  .min(1)
  .max(255)
  .refine((value) => !value.includes(IDENTITY_DELIMITER), {
    message: 'Must not contain the U+001F delimiter',
  });

const integerString = z.string().regex(/^-?\d+$/, 'Must be an integer');

/**
 * Accepts epoch milliseconds (number or integer string) or an ISO-8601
 * datetime with an explicit offset, and normalizes to epoch milliseconds.
 * The result is independent of the host timezone and locale.
 */
export const eventTimestampSchema = z
  .union([
    z.number().int(),
    integerString.transform(Number),
    z.string().datetime({ offset: true, message: 'Must be epoch millis or ISO-8601 with offset' })
      .transform((iso) => Date.parse(iso)),
  ])
  .refine((ms) => Number.isSafeInteger(ms), { message: 'Timestamp out of range' });

/**
 * Zod schema for one inbound event.
 *
 * - Identity fields are required; everything the fingerprint depends on is
 *   checked here so `deriveKey` never sees a malformed value.
 * - `payload` is open-ended to support heterogeneous event types.
 * - `sequence` is optional and only used as an intra-batch tie-break.
 */
export const eventSchema = z.object({
  principal_id: identityField,
  event_type: identityField,
  event_timestamp: eventTimestampSchema,
  payload: z.record(z.string(), z.unknown()).default({}),
  sequence: z
    .union([z.number().int().nonnegative(), z.string().regex(/^\d+$/, 'Must be a non-negative integer').transform(Number)])
    .optional(),
});
