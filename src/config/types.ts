/**
 * Configuration Types
 *
 * The canonical shape of the server settings. The Zod schema in
 * settings.ts validates environment variables into these types.
 */

/** Where and how to reach the Snowflake SQL API. */
export interface SnowflakeConnection {
  /** Base URL up to and including the API version, e.g. https://acct.snowflakecomputing.com/api/v2 */
  baseUrl: string;
  token: string;
  /** Sent as X-Snowflake-Authorization-Token-Type when set. */
  tokenType?: string;
  database: string;
  schema: string;
  warehouse: string;
  role?: string;
}

/** Limits applied by the warehouse client to every call. */
export interface ClientLimits {
  maxConnections: number;
  timeoutMs: number;
  requestsPerSecond: number;
  rateLimitMaxWaitMs: number;
}

export interface CacheSettings {
  enabled: boolean;
  ttlMs: number;
  maxEntries: number;
}

/** Fan-out settings for batched detail lookups. */
export interface BatchSettings {
  batchSize: number;
  concurrency: number;
  retries: number;
  /** First retry backoff; the batch runner's default when unset. */
  minTimeoutMs?: number;
}

export interface ServerSettings {
  snowflake: SnowflakeConnection;
  limits: ClientLimits;
  cache: CacheSettings;
  batch: BatchSettings;
  /** Custom field whose values hold the sprint ids an issue belongs to. */
  sprintCustomFieldId: string;
}
