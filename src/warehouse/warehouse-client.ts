/**
 * Snowflake SQL API Client
 *
 * Uses native fetch with bearer-token auth against the /statements
 * endpoint. Every call goes through the connection pool, the rate
 * limiter and (optionally) the response cache. A single instance is
 * shared by all tool handlers.
 */

import { ConnectionPool } from './connection-pool.js';
import { RateLimiter } from './rate-limiter.js';
import { ResponseCache, fingerprint } from './response-cache.js';
import { decodeRows, encodeBindings } from './row-codec.js';
import {
  ApiErrorSchema,
  PartitionSchema,
  PendingStatementSchema,
  ResultSetSchema,
  type ExecuteOptions,
  type QueryResult,
  type StatementRequest,
} from './types.js';
import {
  JiraSnowflakeError,
  QueryExecutionError,
  QueryPermissionError,
  QuerySyntaxError,
  QueryTimeoutError,
} from '../errors.js';
import type { CacheSettings, ClientLimits, SnowflakeConnection } from '../config/types.js';
import type { SqlStatement } from '../sql/sql-builder.js';

const DEFAULT_POLL_INTERVAL_MS = 500;
const USER_AGENT = 'jira-snowflake-mcp/0.1.0';

export interface WarehouseClientOptions {
  snowflake: SnowflakeConnection;
  limits: ClientLimits;
  cache: CacheSettings;
  /** Delay between status polls while a statement is still running. */
  pollIntervalMs?: number;
}

/** The part of the client tool handlers depend on. */
export interface QueryExecutor {
  execute(statement: SqlStatement, options?: ExecuteOptions): Promise<QueryResult>;
}

interface ApiResponse {
  status: number;
  payload: unknown;
}

export class WarehouseClient implements QueryExecutor {
  private readonly connection: SnowflakeConnection;
  private readonly timeoutMs: number;
  private readonly pollIntervalMs: number;
  private readonly pool: ConnectionPool;
  private readonly limiter: RateLimiter;
  private readonly cache: ResponseCache<QueryResult> | null;

  constructor(options: WarehouseClientOptions) {
    this.connection = options.snowflake;
    this.timeoutMs = options.limits.timeoutMs;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.pool = new ConnectionPool(options.limits.maxConnections);
    this.limiter = new RateLimiter({
      maxRequests: options.limits.requestsPerSecond,
      maxWaitMs: options.limits.rateLimitMaxWaitMs,
    });
    this.cache = options.cache.enabled
      ? new ResponseCache<QueryResult>(options.cache.ttlMs, options.cache.maxEntries)
      : null;
  }

  // ─── Public API ──────────────────────────────────────────

  /**
   * Run a parameterized statement and return its decoded rows.
   * Safe to call concurrently; excess calls queue for a pool slot.
   */
  async execute(statement: SqlStatement, options: ExecuteOptions = {}): Promise<QueryResult> {
    const cache = options.useCache === false ? null : this.cache;
    const key = cache ? fingerprint(statement) : '';

    const cached = cache?.get(key);
    if (cached) return cached;

    const result = await this.pool.run(() => this.runStatement(statement));
    cache?.set(key, result);
    return result;
  }

  clearCache(): void {
    this.cache?.clear();
  }

  /** Reject queued calls and drop cached results. */
  close(): void {
    this.pool.close();
    this.cache?.clear();
  }

  // ─── Statement Lifecycle ─────────────────────────────────

  private async runStatement(statement: SqlStatement): Promise<QueryResult> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const body: StatementRequest = {
        statement: statement.text,
        timeout: Math.ceil(this.timeoutMs / 1000),
        database: this.connection.database,
        schema: this.connection.schema,
        warehouse: this.connection.warehouse,
      };
      if (this.connection.role) body.role = this.connection.role;
      const bindings = encodeBindings(statement.params);
      if (bindings) body.bindings = bindings;

      let response = await this.request('POST', '/statements', controller.signal, body);
      while (response.status === 202) {
        const pending = PendingStatementSchema.safeParse(response.payload);
        if (!pending.success) {
          throw unexpectedBody('pending statement', pending.error.message);
        }
        await delay(this.pollIntervalMs, controller.signal);
        response = await this.request(
          'GET',
          `/statements/${encodeURIComponent(pending.data.statementHandle)}`,
          controller.signal
        );
      }

      return await this.readResult(response.payload, statement, controller.signal);
    } catch (error) {
      if (controller.signal.aborted) {
        throw new QueryTimeoutError(this.timeoutMs);
      }
      throw error;
    } finally {
      clearTimeout(timeout);
    }
  }

  private async readResult(
    payload: unknown,
    statement: SqlStatement,
    signal: AbortSignal
  ): Promise<QueryResult> {
    const parsed = ResultSetSchema.safeParse(payload);
    if (!parsed.success) {
      throw unexpectedBody('result set', parsed.error.message);
    }

    const { resultSetMetaData, statementHandle } = parsed.data;
    const data = [...parsed.data.data];
    const partitions = resultSetMetaData.partitionInfo?.length ?? 1;

    if (partitions > 1) {
      if (!statementHandle) {
        throw unexpectedBody('result set', 'multi-partition result without a statement handle');
      }
      console.error(
        `[jira-snowflake] Fetching ${partitions - 1} more result partition(s) for: ${describeStatement(statement.text)}`
      );
      // Partitions are concatenated in order
      for (let partition = 1; partition < partitions; partition++) {
        const response = await this.request(
          'GET',
          `/statements/${encodeURIComponent(statementHandle)}?partition=${partition}`,
          signal
        );
        const chunk = PartitionSchema.safeParse(response.payload);
        if (!chunk.success) {
          throw unexpectedBody(`partition ${partition}`, chunk.error.message);
        }
        data.push(...chunk.data.data);
      }
    }

    return {
      columns: resultSetMetaData.rowType.map((column) => column.name),
      rows: decodeRows(resultSetMetaData.rowType, data),
    };
  }

  // ─── HTTP Layer ──────────────────────────────────────────

  private async request(
    method: 'GET' | 'POST',
    path: string,
    signal: AbortSignal,
    body?: StatementRequest
  ): Promise<ApiResponse> {
    await this.limiter.acquire();

    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.connection.token}`,
      Accept: 'application/json',
      'User-Agent': USER_AGENT,
    };
    if (this.connection.tokenType) {
      headers['X-Snowflake-Authorization-Token-Type'] = this.connection.tokenType;
    }

    const init: RequestInit = { method, headers, signal };
    if (body) {
      headers['Content-Type'] = 'application/json';
      init.body = JSON.stringify(body);
    }

    let response: Response;
    try {
      response = await fetch(`${this.connection.baseUrl}${path}`, init);
    } catch (error) {
      if (signal.aborted || error instanceof JiraSnowflakeError) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      throw new QueryExecutionError(`Snowflake SQL API request failed: ${reason}`, null, true);
    }

    const payload = await readJson(response);
    if (response.status === 200 || response.status === 202) {
      return { status: response.status, payload };
    }
    throw mapErrorResponse(response, payload);
  }
}

// ─── Error Mapping ─────────────────────────────────────────

export function mapErrorResponse(response: Response, payload: unknown): JiraSnowflakeError {
  const status = response.status;
  const parsed = ApiErrorSchema.safeParse(payload);
  const details = parsed.success ? parsed.data : {};
  const message =
    details.message ?? `Snowflake SQL API error: ${status} ${response.statusText}`.trim();
  const code = details.code ?? null;

  if (status === 401 || status === 403) {
    return new QueryPermissionError(message, code);
  }
  if (status === 400 || status === 422) {
    return new QuerySyntaxError(message, code, details.sqlState ?? null);
  }
  const retryable = status === 429 || status >= 500;
  return new QueryExecutionError(message, status, retryable);
}

function unexpectedBody(what: string, reason: string): QueryExecutionError {
  return new QueryExecutionError(
    `Unexpected ${what} from Snowflake SQL API: ${reason}`,
    200,
    false
  );
}

// ─── Helpers ───────────────────────────────────────────────

/** Non-JSON bodies read as null; the schema check then rejects them. */
async function readJson(response: Response): Promise<unknown> {
  try {
    const payload: unknown = await response.json();
    return payload;
  } catch {
    return null;
  }
}

function delay(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(new Error('aborted'));
      return;
    }
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new Error('aborted'));
    };
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/** Statement text for logs: single line, at most 100 characters. */
export function describeStatement(text: string): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > 100 ? `${flat.slice(0, 100)}...` : flat;
}
