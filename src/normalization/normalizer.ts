/**
 * Record normalizer: raw source rows to canonical IOC records.
 *
 * Rows are first checked for the identity fields (event_id, attribute_id,
 * attribute_type, attribute_value), then coerced by a zod schema into
 * typed fields, then frozen into an IocRecord stamped with the
 * time of normalization.
 */

import { z } from 'zod';

import type { DroppedRow, IocRecord, RawAttributeRow } from '../types/ioc.js';
import { MalformedRowError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { formatDate, formatDateTime, fromEpochSeconds } from '../utils/time.js';

const log = createLogger('normalizer');

export const IDENTITY_FIELDS = ['event_id', 'attribute_id', 'attribute_type', 'attribute_value'] as const;

// ---------------------------------------------------------------------------
// Field coercion
// ---------------------------------------------------------------------------

const TRUE_VALUES = new Set<unknown>([1, '1', true, 'true', 1n]);
const FALSE_VALUES = new Set<unknown>([0, '0', false, 'false', 0n, null, undefined]);

/**
 * Coerce MISP's to_ids column into a strict boolean.
 * 1/"1"/true are true; 0/"0"/false/null are false. Anything else is
 * logged and treated as false.
 */
export function coerceToIds(value: unknown): boolean {
  const key = typeof value === 'string' ? value.trim().toLowerCase() : value;
  if (TRUE_VALUES.has(key)) return true;
  if (!FALSE_VALUES.has(key)) {
    log.debug(`Unrecognised to_ids value ${JSON.stringify(String(value))}, treating as false`);
  }
  return false;
}

function isBlank(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

const UNSAFE_ID = 'Id exceeds the safe integer range';

// Ids past 2^53 would collide once converted to number, so they are rejected.
const integerId = z.union([
  z.number().int().nonnegative().refine(Number.isSafeInteger, UNSAFE_ID),
  z.bigint().nonnegative().refine((v) => v <= BigInt(Number.MAX_SAFE_INTEGER), UNSAFE_ID).transform(Number),
  z
    .string()
    .trim()
    .regex(/^\d+$/, 'Expected an integer id')
    .transform(Number)
    .refine(Number.isSafeInteger, UNSAFE_ID),
]);

const identityText = z.union([z.string(), z.number()]).transform(String);

function toText(value: unknown): string {
  if (value === null || value === undefined) return '';
  return typeof value === 'string' ? value : String(value);
}

const optionalText = z.unknown().transform(toText);

/** Epoch seconds (number or numeric string) or Date; other values pass through as text. */
const timestampText = z.unknown().transform((v) => {
  if (v instanceof Date) return formatDateTime(v);
  if (typeof v === 'number' || typeof v === 'bigint') return formatDateTime(fromEpochSeconds(Number(v)));
  const text = toText(v).trim();
  return /^\d+$/.test(text) ? formatDateTime(fromEpochSeconds(Number(text))) : text;
});

const dateText = z.unknown().transform((v) => {
  if (v instanceof Date) return formatDate(v);
  return toText(v).trim().substring(0, 10);
});

export const SourceRowSchema = z.object({
  event_id: integerId,
  event_uuid: optionalText,
  event_info: optionalText,
  event_date: dateText,
  event_timestamp: timestampText,
  attribute_id: integerId,
  attribute_type: identityText,
  attribute_category: optionalText,
  attribute_value: identityText,
  attribute_timestamp: timestampText,
  attribute_comment: optionalText,
  attribute_to_ids: z.unknown().transform(coerceToIds),
});

export type SourceRow = z.output<typeof SourceRowSchema>;

// ---------------------------------------------------------------------------
// Normalization
// ---------------------------------------------------------------------------

/**
 * Map one raw row to an IocRecord.
 *
 * @throws MalformedRowError when an identity field is absent or unusable.
 */
export function normalizeRow(row: RawAttributeRow, importTime: Date = new Date()): IocRecord {
  const missing = IDENTITY_FIELDS.filter((field) => isBlank(row[field]));
  if (missing.length > 0) {
    throw new MalformedRowError(`Row is missing required field(s): ${missing.join(', ')}`, missing);
  }

  const parsed = SourceRowSchema.safeParse(row);
  if (!parsed.success) {
    const fields = [...new Set(parsed.error.issues.map((i) => String(i.path[0] ?? '(row)')))];
    throw new MalformedRowError(`Row has invalid field(s): ${fields.join(', ')}`, fields);
  }

  return Object.freeze({
    ...parsed.data,
    import_time: formatDateTime(importTime),
  });
}

export interface NormalizeOptions {
  /** Wall clock used for import_time. Default: () => new Date() */
  clock?: () => Date;
}

export interface NormalizeResult {
  records: IocRecord[];
  dropped: DroppedRow[];
}

/**
 * Normalize a batch. Malformed rows are dropped with a warning;
 * any other error propagates.
 */
export function normalizeRows(
  rows: readonly RawAttributeRow[],
  options: NormalizeOptions = {},
): NormalizeResult {
  const clock = options.clock ?? (() => new Date());
  const records: IocRecord[] = [];
  const dropped: DroppedRow[] = [];

  rows.forEach((row, index) => {
    try {
      records.push(normalizeRow(row, clock()));
    } catch (err) {
      if (!(err instanceof MalformedRowError)) throw err;
      const parsedId = integerId.safeParse(row.attribute_id);
      const attributeId = parsedId.success ? parsedId.data : null;
      dropped.push({ index, attributeId, reason: err.message });
      log.warn(`Dropping row ${index} (attribute_id=${attributeId ?? 'unknown'}): ${err.message}`);
    }
  });

  log.info(`Normalized ${records.length} records, dropped ${dropped.length}`);
  return { records, dropped };
}
