/**
 * Cache sink: cumulative SQLite store of every IOC ever extracted.
 *
 * One row per attribute_id. Writes are upserts, so resubmitting a record
 * (in the same run or a later one) leaves a single row holding the
 * latest fields while the surrogate id stays put.
 */

import { mkdirSync, rmSync } from 'node:fs';
import { dirname } from 'node:path';
import sqlite from 'node-sqlite3-wasm';
import type { Database } from 'node-sqlite3-wasm';
import { z } from 'zod';

import type { IocRecord } from '../types/ioc.js';
import { StorageError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('cache');

export const CACHE_TABLE = 'misp_iocs';

export const CACHE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS ${CACHE_TABLE} (
  id                  INTEGER PRIMARY KEY AUTOINCREMENT,
  event_id            INTEGER,
  event_uuid          TEXT,
  event_info          TEXT,
  event_date          TEXT,
  event_timestamp     TEXT,
  attribute_id        INTEGER NOT NULL UNIQUE,
  attribute_type      TEXT,
  attribute_category  TEXT,
  attribute_value     TEXT,
  attribute_timestamp TEXT,
  attribute_comment   TEXT,
  attribute_to_ids    INTEGER,
  import_time         TEXT
);

-- Tables created without the UNIQUE column constraint still get one here
CREATE UNIQUE INDEX IF NOT EXISTS idx_attribute_id ON ${CACHE_TABLE} (attribute_id);
CREATE INDEX IF NOT EXISTS idx_attribute_type ON ${CACHE_TABLE} (attribute_type);
CREATE INDEX IF NOT EXISTS idx_attribute_value ON ${CACHE_TABLE} (attribute_value);
CREATE INDEX IF NOT EXISTS idx_event_id ON ${CACHE_TABLE} (event_id);
`;

const RECORD_COLUMNS = [
  'event_id',
  'event_uuid',
  'event_info',
  'event_date',
  'event_timestamp',
  'attribute_id',
  'attribute_type',
  'attribute_category',
  'attribute_value',
  'attribute_timestamp',
  'attribute_comment',
  'attribute_to_ids',
  'import_time',
] as const satisfies ReadonlyArray<keyof IocRecord>;

const UPSERT_SQL = `
INSERT INTO ${CACHE_TABLE} (${RECORD_COLUMNS.join(', ')})
VALUES (${RECORD_COLUMNS.map(() => '?').join(', ')})
ON CONFLICT (attribute_id) DO UPDATE SET
  ${RECORD_COLUMNS.filter((c) => c !== 'attribute_id').map((c) => `${c} = excluded.${c}`).join(',\n  ')}`;

const SELECT_COLUMNS = `id, ${RECORD_COLUMNS.join(', ')}`;

const text = z
  .string()
  .nullable()
  .transform((v) => v ?? '');

/** A row as stored: booleans are 0/1 and the surrogate id is added. */
export const CacheRowSchema = z.object({
  id: z.number().int(),
  event_id: z.number().int(),
  event_uuid: text,
  event_info: text,
  event_date: text,
  event_timestamp: text,
  attribute_id: z.number().int(),
  attribute_type: text,
  attribute_category: text,
  attribute_value: text,
  attribute_timestamp: text,
  attribute_comment: text,
  attribute_to_ids: z.number().int(),
  import_time: text,
});

export type CacheRow = z.output<typeof CacheRowSchema>;

const CountSchema = z.object({ total: z.number().int() });
const TypeCountSchema = z.array(z.object({ attribute_type: text, count: z.number().int() }));
const RowIdSchema = z.object({ id: z.number().int() });

export interface CacheSinkOptions {
  /** Rows per transaction in writeAll. Default: 500 */
  batchSize?: number;
  readonly?: boolean;
}

/** Bind values for UPSERT_SQL, in RECORD_COLUMNS order. */
export function toCacheParams(record: IocRecord): Array<string | number> {
  return RECORD_COLUMNS.map((column) => {
    const value = record[column];
    return typeof value === 'boolean' ? (value ? 1 : 0) : value;
  });
}

export function fromCacheRow(row: CacheRow): IocRecord {
  const { id: _id, ...fields } = row;
  return { ...fields, attribute_to_ids: row.attribute_to_ids === 1 };
}

function parseCacheRow(row: unknown): IocRecord {
  return fromCacheRow(CacheRowSchema.parse(row));
}

type UpsertStatement = ReturnType<Database['prepare']>;

export class CacheSink {
  private readonly db: Database;
  private readonly batchSize: number;
  private readonly upsert: UpsertStatement;

  private constructor(db: Database, readonly path: string, options: CacheSinkOptions) {
    this.db = db;
    this.batchSize = Math.max(1, options.batchSize ?? 500);
    this.upsert = db.prepare(UPSERT_SQL);
  }

  /**
   * Open (creating if needed) the cache file and ensure the schema exists.
   * Existing rows are never dropped.
   *
   * @throws StorageError when the file cannot be opened or is not a valid cache.
   */
  static open(path: string, options: CacheSinkOptions = {}): CacheSink {
    let db: Database | undefined;
    try {
      if (!options.readonly) {
        mkdirSync(dirname(path), { recursive: true });
      }
      db = new sqlite.Database(path, {
        readOnly: options.readonly ?? false,
        fileMustExist: options.readonly ?? false,
      });
      if (!options.readonly) {
        db.exec(CACHE_SCHEMA_SQL);
      }
      const sink = new CacheSink(db, path, options);
      log.debug(`Opened cache ${path}`);
      return sink;
    } catch (err) {
      if (db?.isOpen) db.close();
      throw new StorageError(`Cannot open IOC cache ${path}: ${errorMessage(err)}`, 0, { cause: err });
    }
  }

  /**
   * Insert or replace the row for record.attribute_id.
   */
  write(record: IocRecord): void {
    try {
      this.upsert.run(toCacheParams(record));
    } catch (err) {
      throw new StorageError(
        `Cannot write attribute ${record.attribute_id} to IOC cache: ${errorMessage(err)}`,
        0,
        { cause: err },
      );
    }
  }

  /**
   * Upsert records in batched transactions and return the number written.
   * On failure, batches already committed stay committed and the thrown
   * StorageError reports their row count in `written`.
   */
  writeAll(records: readonly IocRecord[]): number {
    let written = 0;
    for (let start = 0; start < records.length; start += this.batchSize) {
      const batch = records.slice(start, start + this.batchSize);
      try {
        this.db.exec('BEGIN');
        for (const record of batch) {
          this.write(record);
        }
        this.db.exec('COMMIT');
      } catch (err) {
        if (this.db.inTransaction) this.db.exec('ROLLBACK');
        throw new StorageError(errorMessage(err), written, { cause: err });
      }
      written += batch.length;
    }

    log.info(`Upserted ${written} records into ${this.path}`);
    return written;
  }

  /**
   * Copy the current cache to `destination` (replaced if present) with
   * `VACUUM INTO`.
   */
  backup(destination: string): void {
    try {
      mkdirSync(dirname(destination), { recursive: true });
      rmSync(destination, { force: true });
      this.db.run('VACUUM INTO ?', [destination]);
      log.info(`Backed up IOC cache to ${destination}`);
    } catch (err) {
      throw new StorageError(`Cannot back up IOC cache to ${destination}: ${errorMessage(err)}`, 0, { cause: err });
    }
  }

  count(): number {
    return CountSchema.parse(this.db.get(`SELECT COUNT(*) AS total FROM ${CACHE_TABLE}`)).total;
  }

  get(attributeId: number): IocRecord | undefined {
    const row = this.db.get(`SELECT ${SELECT_COLUMNS} FROM ${CACHE_TABLE} WHERE attribute_id = ?`, [attributeId]);
    return row ? parseCacheRow(row) : undefined;
  }

  /**
   * Surrogate id of the row holding `attributeId`.
   */
  rowId(attributeId: number): number | undefined {
    const row = this.db.get(`SELECT id FROM ${CACHE_TABLE} WHERE attribute_id = ?`, [attributeId]);
    return row ? RowIdSchema.parse(row).id : undefined;
  }

  /**
   * Exact-value lookup, newest attribute first.
   */
  findByValue(value: string, limit = 100): IocRecord[] {
    return this.db
      .all(
        `SELECT ${SELECT_COLUMNS} FROM ${CACHE_TABLE}
         WHERE attribute_value = ?
         ORDER BY attribute_timestamp DESC, attribute_id DESC
         LIMIT ?`,
        [value, limit],
      )
      .map(parseCacheRow);
  }

  countByType(): Array<{ attribute_type: string; count: number }> {
    return TypeCountSchema.parse(
      this.db.all(
        `SELECT attribute_type, COUNT(*) AS count FROM ${CACHE_TABLE}
         GROUP BY attribute_type
         ORDER BY count DESC, attribute_type ASC`,
      ),
    );
  }

  close(): void {
    if (this.db.isOpen) {
      this.upsert.finalize();
      this.db.close();
      log.debug(`Closed cache ${this.path}`);
    }
  }
}
