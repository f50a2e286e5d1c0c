/**
 * Unit tests for scoped source connections and error classification.
 */

import { describe, it, expect, vi } from 'vitest';

import {
  withSourceConnection,
  classifyQueryError,
  createMysqlConnector,
  type MysqlClient,
  type MysqlConnect,
  type SourceConnection,
} from '@/source/connection.js';
import type { DatabaseConfig } from '@/types/config.js';
import { ConnectionError, QueryError } from '@/utils/errors.js';

function fakeConnection(overrides: Partial<SourceConnection> = {}): SourceConnection & { close: ReturnType<typeof vi.fn> } {
  const close = vi.fn().mockResolvedValue(undefined);
  return {
    query: vi.fn().mockResolvedValue([]),
    ...overrides,
    close,
  };
}

function codedError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('withSourceConnection', () => {
  it('returns the callback result and releases the connection', async () => {
    const connection = fakeConnection();

    const result = await withSourceConnection(async () => connection, async () => 42);

    expect(result).toBe(42);
    expect(connection.close).toHaveBeenCalledTimes(1);
  });

  it('releases the connection when the callback throws', async () => {
    const connection = fakeConnection();

    await expect(
      withSourceConnection(async () => connection, async () => {
        throw new QueryError('bad filter');
      }),
    ).rejects.toThrow('bad filter');
    expect(connection.close).toHaveBeenCalledTimes(1);
  });

  it('wraps unclassified connector failures in ConnectionError', async () => {
    const failure = withSourceConnection(
      () => Promise.reject(codedError('connect ECONNREFUSED 127.0.0.1:3306', 'ECONNREFUSED')),
      async () => 'unreachable',
    );

    await expect(failure).rejects.toBeInstanceOf(ConnectionError);
    await expect(failure).rejects.toMatchObject({
      code: 'ECONNREFUSED',
      message: 'Cannot connect to source database: connect ECONNREFUSED 127.0.0.1:3306',
    });
  });

  it('passes classified connector failures through', async () => {
    const original = new ConnectionError('Access denied', 'ER_ACCESS_DENIED_ERROR');

    await expect(
      withSourceConnection(() => Promise.reject(original), async () => 'unreachable'),
    ).rejects.toBe(original);
  });

  it('keeps the callback result when closing fails', async () => {
    const connection = fakeConnection();
    connection.close.mockRejectedValueOnce(new Error('already closed'));

    await expect(withSourceConnection(async () => connection, async () => 'rows')).resolves.toBe('rows');
  });
});

describe('classifyQueryError', () => {
  it('maps query timeouts to QueryError', () => {
    const error = classifyQueryError(codedError('Query inactivity timeout', 'PROTOCOL_SEQUENCE_TIMEOUT'), 5000);

    expect(error).toBeInstanceOf(QueryError);
    expect(error.message).toBe('Source query exceeded 5000ms timeout');
  });

  it('maps lost connections to ConnectionError', () => {
    const error = classifyQueryError(codedError('Connection lost: The server closed the connection.', 'PROTOCOL_CONNECTION_LOST'));

    expect(error).toBeInstanceOf(ConnectionError);
  });

  it('maps SQL errors to QueryError with the driver code', () => {
    const error = classifyQueryError(codedError("Unknown column 'a.value1' in 'field list'", 'ER_BAD_FIELD_ERROR'));

    expect(error).toBeInstanceOf(QueryError);
    expect(error).toMatchObject({
      code: 'ER_BAD_FIELD_ERROR',
      message: "Source query failed: Unknown column 'a.value1' in 'field list'",
    });
  });
});

// ---------------------------------------------------------------------------
// MySQL connector
// ---------------------------------------------------------------------------

const DATABASE: DatabaseConfig = {
  host: 'misp-db.test',
  port: 3306,
  user: 'misp',
  password: 'test-secret',
  database: 'misp',
  connectTimeoutMs: 1000,
  connectRetries: 0,
};

interface FakeClient extends MysqlClient {
  statements: Array<{ sql: string; params: readonly unknown[] }>;
  ended: number;
  destroyed: number;
}

function fakeClient(threadId: number, respond: (sql: string) => Promise<unknown>): FakeClient {
  const client: FakeClient = {
    threadId,
    statements: [],
    ended: 0,
    destroyed: 0,
    query: (sql, params) => {
      client.statements.push({ sql, params });
      return respond(sql);
    },
    end: () => {
      client.ended++;
      return Promise.resolve();
    },
    destroy: () => {
      client.destroyed++;
    },
  };
  return client;
}

/** A client whose end() waits for a query the server never finishes. */
function stuckClient(threadId: number): FakeClient {
  const client = fakeClient(threadId, () =>
    Promise.reject(codedError('Query inactivity timeout', 'PROTOCOL_SEQUENCE_TIMEOUT')),
  );
  client.end = () => {
    client.ended++;
    return new Promise<void>(() => undefined);
  };
  return client;
}

function connectSequence(...clients: MysqlClient[]): { connect: MysqlConnect; state: { calls: number } } {
  const state = { calls: 0 };
  const connect: MysqlConnect = async () => {
    const next = clients[state.calls++];
    if (!next) throw codedError('connect ECONNREFUSED', 'ECONNREFUSED');
    return next;
  };
  return { connect, state };
}

describe('createMysqlConnector', () => {
  it('returns driver rows and ends the connection normally', async () => {
    const client = fakeClient(7, async () => [{ attribute_id: 1, attribute_type: 'md5' }]);
    const connector = createMysqlConnector(DATABASE, connectSequence(client).connect);

    const rows = await withSourceConnection(connector, (connection) =>
      connection.query('SELECT 1', ['md5', 10], { timeoutMs: 500 }),
    );

    expect(rows).toEqual([{ attribute_id: 1, attribute_type: 'md5' }]);
    expect(client.statements).toEqual([{ sql: 'SELECT 1', params: ['md5', 10] }]);
    expect(client.ended).toBe(1);
    expect(client.destroyed).toBe(0);
  });

  it('destroys a connection whose query timed out and kills the server-side query', async () => {
    const stuck = stuckClient(77);
    const killer = fakeClient(78, async () => ({ affectedRows: 0 }));
    const { connect, state } = connectSequence(stuck, killer);
    const connector = createMysqlConnector(DATABASE, connect);

    await expect(
      withSourceConnection(connector, (connection) => connection.query('SELECT SLEEP(600)', [], { timeoutMs: 50 })),
    ).rejects.toThrow('Source query exceeded 50ms timeout');

    expect(stuck.destroyed).toBe(1);
    expect(stuck.ended).toBe(0);
    expect(state.calls).toBe(2);
    expect(killer.statements).toEqual([{ sql: 'KILL QUERY ?', params: [77] }]);
    expect(killer.ended).toBe(1);
  });

  it('still releases the run when the kill connection cannot be opened', async () => {
    const stuck = stuckClient(77);
    const connector = createMysqlConnector(DATABASE, connectSequence(stuck).connect);

    const failure = withSourceConnection(connector, (connection) =>
      connection.query('SELECT SLEEP(600)', [], { timeoutMs: 50 }),
    );

    await expect(failure).rejects.toBeInstanceOf(QueryError);
    expect(stuck.destroyed).toBe(1);
  });

  it('destroys a connection lost mid-query', async () => {
    const client = fakeClient(5, () => Promise.reject(codedError('Connection lost', 'PROTOCOL_CONNECTION_LOST')));
    const killer = fakeClient(6, async () => ({ affectedRows: 0 }));
    const connector = createMysqlConnector(DATABASE, connectSequence(client, killer).connect);

    await expect(
      withSourceConnection(connector, (connection) => connection.query('SELECT 1', [])),
    ).rejects.toBeInstanceOf(ConnectionError);

    expect(client.destroyed).toBe(1);
    expect(client.ended).toBe(0);
  });

  it('ends the connection after an ordinary SQL error', async () => {
    const client = fakeClient(5, () => Promise.reject(codedError("Table 'misp.attributes' doesn't exist", 'ER_NO_SUCH_TABLE')));
    const connector = createMysqlConnector(DATABASE, connectSequence(client).connect);

    await expect(
      withSourceConnection(connector, (connection) => connection.query('SELECT 1', [])),
    ).rejects.toThrow("Source query failed: Table 'misp.attributes' doesn't exist");

    expect(client.ended).toBe(1);
    expect(client.destroyed).toBe(0);
  });

  it('reports an unreachable server as ConnectionError', async () => {
    const connector = createMysqlConnector(DATABASE, connectSequence().connect);

    await expect(connector()).rejects.toThrow(
      'Cannot connect to MISP database at misp-db.test:3306: connect ECONNREFUSED',
    );
  });
});
