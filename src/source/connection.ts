/**
 * Source database connections.
 *
 * The reader depends only on the SourceConnection interface; the MySQL
 * connector below is the production implementation for a MISP database.
 * Connections are acquired per run and always released.
 */

import mysql from 'mysql2/promise';
import type { ConnectionOptions } from 'mysql2/promise';

import type { DatabaseConfig } from '../types/config.js';
import type { RawAttributeRow } from '../types/ioc.js';
import { ConnectionError, ExtractorError, QueryError, errorCode, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';

const log = createLogger('source');

export type QueryParam = string | number;

export interface QueryOptions {
  /** Abort the query with a QueryError after this many milliseconds. */
  timeoutMs?: number;
}

export interface SourceConnection {
  query(sql: string, params: readonly QueryParam[], options?: QueryOptions): Promise<RawAttributeRow[]>;
  close(): Promise<void>;
}

export type SourceConnector = () => Promise<SourceConnection>;

// ---------------------------------------------------------------------------
// Scoped acquisition
// ---------------------------------------------------------------------------

/**
 * Acquire a connection, run `fn`, and release the connection on every
 * exit path. Acquisition failures surface as ConnectionError.
 */
export async function withSourceConnection<T>(
  connector: SourceConnector,
  fn: (connection: SourceConnection) => Promise<T>,
): Promise<T> {
  let connection: SourceConnection;
  try {
    connection = await connector();
  } catch (err) {
    if (err instanceof ExtractorError) throw err;
    throw new ConnectionError(`Cannot connect to source database: ${errorMessage(err)}`, errorCode(err), { cause: err });
  }

  try {
    return await fn(connection);
  } finally {
    try {
      await connection.close();
      log.debug('Source connection released');
    } catch (err) {
      log.warn(`Error while closing source connection: ${errorMessage(err)}`);
    }
  }
}

// ---------------------------------------------------------------------------
// MySQL / MariaDB
// ---------------------------------------------------------------------------

const CONNECTION_LOST_CODES = new Set(['PROTOCOL_CONNECTION_LOST', 'ECONNRESET', 'EPIPE']);

/**
 * Map a mysql2 query failure onto the extractor taxonomy.
 */
export function classifyQueryError(err: unknown, timeoutMs?: number): ExtractorError {
  const code = errorCode(err);
  if (code === 'PROTOCOL_SEQUENCE_TIMEOUT') {
    return new QueryError(`Source query exceeded ${timeoutMs ?? '?'}ms timeout`, code, { cause: err });
  }
  if (code && CONNECTION_LOST_CODES.has(code)) {
    return new ConnectionError(`Source connection lost during query: ${errorMessage(err)}`, code, { cause: err });
  }
  return new QueryError(`Source query failed: ${errorMessage(err)}`, code, { cause: err });
}

/**
 * The slice of a mysql2 connection the connector uses. `query` resolves to
 * the driver's first result element (rows for SELECT, a header otherwise).
 */
export interface MysqlClient {
  readonly threadId: number | null;
  query(sql: string, params: readonly QueryParam[], timeoutMs?: number): Promise<unknown>;
  end(): Promise<void>;
  destroy(): void;
}

export type MysqlConnect = (options: ConnectionOptions) => Promise<MysqlClient>;

/**
 * Open a mysql2 connection behind the MysqlClient interface.
 */
export const openMysqlClient: MysqlConnect = async (options) => {
  const connection = await mysql.createConnection(options);
  return {
    get threadId() {
      return connection.threadId;
    },
    async query(sql, params, timeoutMs) {
      const [result] = await connection.query({ sql, timeout: timeoutMs }, [...params]);
      return result;
    },
    end: () => connection.end(),
    destroy: () => connection.destroy(),
  };
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toRows(result: unknown): RawAttributeRow[] {
  if (!Array.isArray(result)) return [];
  return result.filter(isRecord).map((row): RawAttributeRow => ({ ...row }));
}

/**
 * Build a connector for a MISP MySQL/MariaDB database.
 * Transient network failures are retried `connectRetries` times.
 *
 * A query that times out keeps running on the server and holds the
 * connection, so such a connection is destroyed instead of ended, and
 * the server-side query is killed over a second, short-lived connection.
 */
export function createMysqlConnector(config: DatabaseConfig, connect: MysqlConnect = openMysqlClient): SourceConnector {
  const options: ConnectionOptions = {
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    database: config.database,
    connectTimeout: config.connectTimeoutMs,
    dateStrings: true,
    supportBigNumbers: true,
  };

  return async () => {
    let client: MysqlClient;
    try {
      client = await withRetry(() => connect(options), {
        maxRetries: config.connectRetries,
        onRetry: (error, attempt) => {
          log.warn(`Connection attempt ${attempt} failed (${errorMessage(error)}), retrying`);
        },
      });
    } catch (err) {
      throw new ConnectionError(
        `Cannot connect to MISP database at ${config.host}:${config.port}: ${errorMessage(err)}`,
        errorCode(err),
        { cause: err },
      );
    }

    log.info(`Connected to MISP database ${config.database}@${config.host}:${config.port}`);

    let abandoned = false;

    return {
      async query(sql, params, queryOptions = {}) {
        try {
          return toRows(await client.query(sql, params, queryOptions.timeoutMs));
        } catch (err) {
          const classified = classifyQueryError(err, queryOptions.timeoutMs);
          if (classified instanceof ConnectionError || errorCode(err) === 'PROTOCOL_SEQUENCE_TIMEOUT') {
            abandoned = true;
          }
          throw classified;
        }
      },
      async close() {
        if (!abandoned) {
          await client.end();
          return;
        }
        const { threadId } = client;
        client.destroy();
        log.warn('Source connection destroyed after an abandoned query');
        if (threadId !== null) {
          await killQuery(connect, options, threadId);
        }
      },
    };
  };
}

/**
 * Ask the server to stop the statement running on `threadId`.
 * Failures are logged; the caller has already given up on the query.
 */
async function killQuery(connect: MysqlConnect, options: ConnectionOptions, threadId: number): Promise<void> {
  let killer: MysqlClient | undefined;
  try {
    killer = await connect(options);
    await killer.query('KILL QUERY ?', [threadId]);
    log.info(`Killed server-side query on thread ${threadId}`);
  } catch (err) {
    log.warn(`Cannot kill server-side query on thread ${threadId}: ${errorMessage(err)}`);
  } finally {
    if (killer) {
      await killer.end().catch((err: unknown) => {
        log.warn(`Error while closing kill connection: ${errorMessage(err)}`);
      });
    }
  }
}
