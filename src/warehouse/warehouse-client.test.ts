import { describe, it, expect, vi, beforeEach } from 'vitest';
import { WarehouseClient, describeStatement, type WarehouseClientOptions } from './warehouse-client.js';
import {
  QueryExecutionError,
  QueryPermissionError,
  QuerySyntaxError,
  QueryTimeoutError,
} from '../errors.js';

const mockFetch = vi.fn<typeof fetch>();
vi.stubGlobal('fetch', mockFetch);

const BASE_URL = 'https://test-account.snowflakecomputing.com/api/v2';

function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function resultSet(
  rowType: Array<{ name: string; type: string; scale?: number }>,
  data: Array<Array<string | null>>,
  extra: Record<string, unknown> = {}
): Record<string, unknown> {
  return {
    statementHandle: 'handle-1',
    resultSetMetaData: { numRows: data.length, rowType },
    data,
    ...extra,
  };
}

function makeClient(overrides: Partial<WarehouseClientOptions> = {}): WarehouseClient {
  return new WarehouseClient({
    snowflake: {
      baseUrl: BASE_URL,
      token: 'test-secret',
      database: 'JIRA_DB',
      schema: 'JIRA_SCHEMA',
      warehouse: 'DEFAULT',
    },
    limits: {
      maxConnections: 4,
      timeoutMs: 5000,
      requestsPerSecond: 100,
      rateLimitMaxWaitMs: 1000,
    },
    cache: { enabled: true, ttlMs: 60_000, maxEntries: 100 },
    pollIntervalMs: 1,
    ...overrides,
  });
}

function requestBody(callIndex: number): unknown {
  const init = mockFetch.mock.calls[callIndex]?.[1];
  return typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
}

function requestHeaders(callIndex: number): Headers {
  return new Headers(mockFetch.mock.calls[callIndex]?.[1]?.headers);
}

const ID_AND_KEY = [
  { name: 'ID', type: 'fixed', scale: 0 },
  { name: 'ISSUE_KEY', type: 'text' },
];

describe('WarehouseClient', () => {
  let client: WarehouseClient;

  beforeEach(() => {
    mockFetch.mockReset();
    client = makeClient();
  });

  describe('execute', () => {
    it('submits the statement with typed bindings and decodes rows', async () => {
      mockFetch.mockResolvedValue(jsonResponse(resultSet(ID_AND_KEY, [['7', 'SMQE-7']])));

      const result = await client.execute({
        text: 'SELECT ID, ISSUE_KEY FROM T WHERE PROJECT = ? LIMIT ?',
        params: ['SMQE', 10],
      });

      expect(result).toEqual({ columns: ['ID', 'ISSUE_KEY'], rows: [[7, 'SMQE-7']] });
      expect(mockFetch.mock.calls[0]?.[0]).toBe(`${BASE_URL}/statements`);
      expect(requestBody(0)).toEqual({
        statement: 'SELECT ID, ISSUE_KEY FROM T WHERE PROJECT = ? LIMIT ?',
        timeout: 5,
        database: 'JIRA_DB',
        schema: 'JIRA_SCHEMA',
        warehouse: 'DEFAULT',
        bindings: {
          '1': { type: 'TEXT', value: 'SMQE' },
          '2': { type: 'FIXED', value: '10' },
        },
      });
    });

    it('sends bearer auth and the token type header when configured', async () => {
      client = makeClient({
        snowflake: {
          baseUrl: BASE_URL,
          token: 'test-secret',
          tokenType: 'PROGRAMMATIC_ACCESS_TOKEN',
          database: 'JIRA_DB',
          schema: 'JIRA_SCHEMA',
          warehouse: 'DEFAULT',
          role: 'ANALYST',
        },
      });
      mockFetch.mockResolvedValue(jsonResponse(resultSet(ID_AND_KEY, [])));

      await client.execute({ text: 'SELECT 1', params: [] });

      expect(requestHeaders(0).get('Authorization')).toBe('Bearer test-secret');
      expect(requestHeaders(0).get('X-Snowflake-Authorization-Token-Type')).toBe(
        'PROGRAMMATIC_ACCESS_TOKEN'
      );
      expect(requestBody(0)).toMatchObject({ role: 'ANALYST' });
      expect(requestBody(0)).not.toHaveProperty('bindings');
    });

    it('polls a running statement until it completes', async () => {
      mockFetch
        .mockResolvedValueOnce(jsonResponse({ code: '333334', statementHandle: 'h-42' }, 202))
        .mockResolvedValueOnce(jsonResponse({ code: '333334', statementHandle: 'h-42' }, 202))
        .mockResolvedValueOnce(jsonResponse(resultSet(ID_AND_KEY, [['1', 'A-1']])));

      const result = await client.execute({ text: 'SELECT 1', params: [] });

      expect(result.rows).toEqual([[1, 'A-1']]);
      expect(mockFetch).toHaveBeenCalledTimes(3);
      expect(mockFetch.mock.calls[1]?.[0]).toBe(`${BASE_URL}/statements/h-42`);
    });

    it('concatenates extra partitions in order', async () => {
      mockFetch
        .mockResolvedValueOnce(
          jsonResponse(
            resultSet(ID_AND_KEY, [['1', 'A-1']], {
              resultSetMetaData: {
                rowType: ID_AND_KEY,
                partitionInfo: [{ rowCount: 1 }, { rowCount: 1 }, { rowCount: 1 }],
              },
            })
          )
        )
        .mockResolvedValueOnce(jsonResponse({ data: [['2', 'A-2']] }))
        .mockResolvedValueOnce(jsonResponse({ data: [['3', 'A-3']] }));
      vi.spyOn(console, 'error').mockImplementation(() => undefined);

      const result = await client.execute({ text: 'SELECT 1', params: [] });

      expect(result.rows).toEqual([
        [1, 'A-1'],
        [2, 'A-2'],
        [3, 'A-3'],
      ]);
      expect(mockFetch.mock.calls[1]?.[0]).toBe(`${BASE_URL}/statements/handle-1?partition=1`);
      expect(mockFetch.mock.calls[2]?.[0]).toBe(`${BASE_URL}/statements/handle-1?partition=2`);
    });
  });

  describe('caching', () => {
    it('serves identical statements from the cache', async () => {
      mockFetch.mockImplementation(() =>
        Promise.resolve(jsonResponse(resultSet(ID_AND_KEY, [['1', 'A-1']])))
      );
      const statement = { text: 'SELECT ?', params: ['x'] };

      await client.execute(statement);
      await client.execute(statement);

      expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it('bypasses the cache when asked to', async () => {
      mockFetch.mockImplementation(() =>
        Promise.resolve(jsonResponse(resultSet(ID_AND_KEY, [])))
      );
      const statement = { text: 'SELECT ?', params: ['x'] };

      await client.execute(statement);
      await client.execute(statement, { useCache: false });

      expect(mockFetch).toHaveBeenCalledTimes(2);
    });

    it('queries again after clearCache', async () => {
      mockFetch.mockImplementation(() =>
        Promise.resolve(jsonResponse(resultSet(ID_AND_KEY, [])))
      );
      const statement = { text: 'SELECT ?', params: ['x'] };

      await client.execute(statement);
      client.clearCache();
      await client.execute(statement);

      expect(mockFetch).toHaveBeenCalledTimes(2);
    });

    it('never caches when caching is disabled', async () => {
      client = makeClient({ cache: { enabled: false, ttlMs: 60_000, maxEntries: 100 } });
      mockFetch.mockImplementation(() =>
        Promise.resolve(jsonResponse(resultSet(ID_AND_KEY, [])))
      );
      const statement = { text: 'SELECT ?', params: ['x'] };

      await client.execute(statement);
      await client.execute(statement);

      expect(mockFetch).toHaveBeenCalledTimes(2);
    });
  });

  describe('error mapping', () => {
    const statement = { text: 'SELECT 1', params: [] };

    it('maps 401 to a permission error', async () => {
      mockFetch.mockResolvedValue(
        jsonResponse({ code: '390303', message: 'Invalid OAuth access token.' }, 401)
      );

      const error = await client.execute(statement).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(QueryPermissionError);
      expect(error).toMatchObject({
        message: 'Invalid OAuth access token.',
        code: '390303',
        retryable: false,
      });
    });

    it('maps 422 to a syntax error keeping the remote code and state', async () => {
      mockFetch.mockResolvedValue(
        jsonResponse(
          { code: '002003', sqlState: '42S02', message: "Object 'X' does not exist." },
          422
        )
      );

      const error = await client.execute(statement).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(QuerySyntaxError);
      expect(error).toMatchObject({ code: '002003', sqlState: '42S02', retryable: false });
    });

    it('maps 5xx and 429 to retryable execution errors', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ message: 'unavailable' }, 503));
      await expect(client.execute(statement)).rejects.toMatchObject({
        kind: 'QueryExecutionError',
        statusCode: 503,
        retryable: true,
      });

      mockFetch.mockResolvedValueOnce(jsonResponse({}, 429));
      await expect(client.execute(statement)).rejects.toMatchObject({
        statusCode: 429,
        retryable: true,
      });
    });

    it('maps network failures to retryable execution errors', async () => {
      mockFetch.mockRejectedValue(new TypeError('fetch failed'));

      const error = await client.execute(statement).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(QueryExecutionError);
      expect(error).toMatchObject({
        message: 'Snowflake SQL API request failed: fetch failed',
        retryable: true,
      });
    });

    it('rejects a body that does not match the result schema', async () => {
      mockFetch.mockResolvedValue(jsonResponse({ unexpected: true }));

      await expect(client.execute(statement)).rejects.toMatchObject({
        kind: 'QueryExecutionError',
        retryable: false,
      });
    });

    it('rejects a date cell that is not an epoch number', async () => {
      mockFetch.mockResolvedValue(
        jsonResponse(resultSet([{ name: 'DUEDATE', type: 'date' }], [['2025-01-01']]))
      );

      await expect(client.execute(statement)).rejects.toMatchObject({
        kind: 'QueryExecutionError',
        statusCode: 200,
        retryable: false,
      });
    });

    it('raises a timeout when the deadline passes', async () => {
      client = makeClient({
        limits: { maxConnections: 1, timeoutMs: 20, requestsPerSecond: 100, rateLimitMaxWaitMs: 0 },
      });
      mockFetch.mockImplementation(
        (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
          })
      );

      const error = await client.execute(statement).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(QueryTimeoutError);
      expect(error).toMatchObject({ kind: 'QueryTimeout', retryable: true });
    });
  });

  describe('close', () => {
    it('rejects calls made after close', async () => {
      client.close();

      await expect(client.execute({ text: 'SELECT 1', params: [] })).rejects.toThrow(
        'Warehouse client is closed'
      );
    });
  });
});

describe('describeStatement', () => {
  it('flattens whitespace and truncates to 100 characters', () => {
    const long = `SELECT\n  ${'A, '.repeat(60)}B FROM T`;
    const described = describeStatement(long);

    expect(described.startsWith('SELECT A, A, ')).toBe(true);
    expect(described).toHaveLength(103);
  });
});
