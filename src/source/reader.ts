/**
 * Source reader: the single windowed query against MISP.
 *
 * Joins events and attributes, keeps attributes whose last-change
 * timestamp lies in [now - lookback, now] and whose type is allowlisted,
 * and returns them ordered by attribute id. The SQL sticks to syntax that
 * MySQL, MariaDB and SQLite all accept.
 */

import type { RawAttributeRow } from '../types/ioc.js';
import { QueryError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { formatDateTime, formatDuration, toEpochSeconds } from '../utils/time.js';
import type { QueryParam, SourceConnection } from './connection.js';

const log = createLogger('reader');

export interface WindowQueryOptions {
  lookbackMs: number;
  iocTypes: readonly string[];
  /** Upper bound of the window. Default: current time */
  now?: Date;
  timeoutMs?: number;
}

export interface WindowQuery {
  sql: string;
  params: QueryParam[];
  /** Inclusive window bounds in epoch seconds. */
  from: number;
  to: number;
}

/**
 * Build the parameterized windowed query. MISP stores timestamps as
 * epoch seconds, so both bounds are truncated to whole seconds.
 */
export function buildWindowQuery(options: WindowQueryOptions): WindowQuery {
  const { lookbackMs, iocTypes } = options;
  const now = options.now ?? new Date();

  if (iocTypes.length === 0) {
    throw new QueryError('Attribute type allowlist is empty');
  }
  if (iocTypes.some((t) => typeof t !== 'string' || t.trim() === '')) {
    throw new QueryError('Attribute type allowlist contains an empty type');
  }
  if (!Number.isFinite(lookbackMs) || lookbackMs <= 0) {
    throw new QueryError(`Invalid lookback window: ${lookbackMs}ms`);
  }

  const to = toEpochSeconds(now);
  const from = toEpochSeconds(new Date(now.getTime() - lookbackMs));
  const placeholders = iocTypes.map(() => '?').join(', ');

  const sql = `
    SELECT
      e.id AS event_id,
      e.uuid AS event_uuid,
      e.info AS event_info,
      e.date AS event_date,
      e.timestamp AS event_timestamp,
      a.id AS attribute_id,
      a.type AS attribute_type,
      a.category AS attribute_category,
      a.value1 AS attribute_value,
      a.timestamp AS attribute_timestamp,
      a.comment AS attribute_comment,
      a.to_ids AS attribute_to_ids
    FROM events e
    JOIN attributes a ON e.id = a.event_id
    WHERE a.type IN (${placeholders})
      AND a.timestamp >= ?
      AND a.timestamp <= ?
    ORDER BY a.id ASC`;

  return { sql, params: [...iocTypes, from, to], from, to };
}

/**
 * Fetch every allowlisted attribute changed within the lookback window.
 * Fails with QueryError (or the ConnectionError raised by the connection);
 * no partial result is returned.
 */
export async function fetchRecentAttributes(
  connection: SourceConnection,
  options: WindowQueryOptions,
): Promise<RawAttributeRow[]> {
  const query = buildWindowQuery(options);

  log.info(
    `Querying attributes changed in the last ${formatDuration(options.lookbackMs)} ` +
    `(${formatDateTime(new Date(query.from * 1000))} .. ${formatDateTime(new Date(query.to * 1000))} UTC), ` +
    `${options.iocTypes.length} types`,
  );

  const startTime = Date.now();
  const rows = await connection.query(query.sql, query.params, { timeoutMs: options.timeoutMs });

  log.info(`Retrieved ${rows.length} rows in ${Date.now() - startTime}ms`);
  return rows;
}
