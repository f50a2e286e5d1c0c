/**
 * Types for extracted MISP indicators and run results.
 */

// --- Source rows ---

/**
 * A joined (event, attribute) row as returned by the source driver.
 *
 * Every column may be missing or null. Ids and timestamps may arrive as
 * numbers or numeric strings depending on the driver, and `event_date`
 * may be a `Date` when the driver does not return date strings.
 */
export interface RawAttributeRow {
  event_id?: unknown;
  event_uuid?: unknown;
  event_info?: unknown;
  event_date?: unknown;
  event_timestamp?: unknown;
  attribute_id?: unknown;
  attribute_type?: unknown;
  attribute_category?: unknown;
  attribute_value?: unknown;
  attribute_timestamp?: unknown;
  attribute_comment?: unknown;
  attribute_to_ids?: unknown;
}

// --- Canonical record ---

/**
 * The canonical IOC record written to both sinks.
 * Field names are the serialized names and must not change.
 */
export interface IocRecord {
  readonly event_id: number;
  readonly event_uuid: string;
  readonly event_info: string;
  readonly event_date: string;           // YYYY-MM-DD
  readonly event_timestamp: string;      // YYYY-MM-DD HH:MM:SS (UTC)
  readonly attribute_id: number;
  readonly attribute_type: string;
  readonly attribute_category: string;
  readonly attribute_value: string;
  readonly attribute_timestamp: string;  // YYYY-MM-DD HH:MM:SS (UTC)
  readonly attribute_comment: string;
  readonly attribute_to_ids: boolean;
  readonly import_time: string;          // YYYY-MM-DD HH:MM:SS (UTC)
}

// --- Run lifecycle ---

export type RunState = 'idle' | 'reading' | 'normalizing' | 'writing' | 'done' | 'failed';

export type RunStatus = 'succeeded' | 'degraded' | 'failed' | 'rejected';

export interface RunSummary {
  status: RunStatus;
  rows_read: number;
  records_normalized: number;
  records_dropped: number;
  cache_writes: number;
  snapshot_written: boolean;
  error?: string;
  started_at: string;
  finished_at: string;
  duration_ms: number;
}

export interface DroppedRow {
  index: number;
  attributeId: number | null;
  reason: string;
}
