/**
 * Settings Resolver
 *
 * Reads server settings from environment variables and validates them.
 * Numeric and boolean variables arrive as strings and are coerced.
 * Any invalid value fails startup with the offending variable named.
 */

import { z } from 'zod';
import type { ServerSettings } from './types.js';

// ─── Zod Schema ──────────────────────────────────────────────

const booleanFlag = z
  .string()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const EnvSchema = z.object({
  SNOWFLAKE_BASE_URL: z.string().url(),
  SNOWFLAKE_TOKEN: z.string().min(1),
  SNOWFLAKE_TOKEN_TYPE: optionalString,
  SNOWFLAKE_DATABASE: z.string().min(1),
  SNOWFLAKE_SCHEMA: z.string().min(1),
  SNOWFLAKE_WAREHOUSE: z.string().min(1).default('DEFAULT'),
  SNOWFLAKE_ROLE: optionalString,
  MAX_HTTP_CONNECTIONS: z.coerce.number().int().min(1).max(100).default(20),
  HTTP_TIMEOUT_SECONDS: z.coerce.number().int().min(1).default(60),
  RATE_LIMIT_PER_SECOND: z.coerce.number().int().min(1).default(50),
  RATE_LIMIT_MAX_WAIT_MS: z.coerce.number().int().min(0).default(5000),
  ENABLE_CACHING: booleanFlag.default('true'),
  CACHE_TTL_SECONDS: z.coerce.number().int().min(1).default(300),
  CACHE_MAX_SIZE: z.coerce.number().int().min(1).default(1000),
  DETAIL_BATCH_SIZE: z.coerce.number().int().min(1).max(200).default(25),
  CONCURRENT_QUERY_BATCH_SIZE: z.coerce.number().int().min(1).max(20).default(5),
  BATCH_RETRIES: z.coerce.number().int().min(0).max(5).default(2),
  SPRINT_CUSTOM_FIELD_ID: z
    .string()
    .regex(/^\d+$/, 'must be a numeric custom field id')
    .default('12310940'),
});

type EnvKey = keyof typeof EnvSchema.shape;

const ENV_KEYS = EnvSchema.keyof().options;

// ─── Resolve ─────────────────────────────────────────────────

/**
 * Resolve settings from the given environment (defaults to process.env).
 * Empty strings count as unset so defaults apply.
 */
export function resolveSettings(env: NodeJS.ProcessEnv = process.env): ServerSettings {
  const raw: Partial<Record<EnvKey, string>> = {};
  for (const key of ENV_KEYS) {
    const value = env[key];
    if (value !== undefined && value !== '') {
      raw[key] = value;
    }
  }

  const result = EnvSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new Error(`Invalid configuration:\n  ${problems.join('\n  ')}`);
  }

  const parsed = result.data;
  return {
    snowflake: {
      baseUrl: parsed.SNOWFLAKE_BASE_URL.replace(/\/+$/, ''),
      token: parsed.SNOWFLAKE_TOKEN,
      tokenType: parsed.SNOWFLAKE_TOKEN_TYPE,
      database: parsed.SNOWFLAKE_DATABASE,
      schema: parsed.SNOWFLAKE_SCHEMA,
      warehouse: parsed.SNOWFLAKE_WAREHOUSE,
      role: parsed.SNOWFLAKE_ROLE,
    },
    limits: {
      maxConnections: parsed.MAX_HTTP_CONNECTIONS,
      timeoutMs: parsed.HTTP_TIMEOUT_SECONDS * 1000,
      requestsPerSecond: parsed.RATE_LIMIT_PER_SECOND,
      rateLimitMaxWaitMs: parsed.RATE_LIMIT_MAX_WAIT_MS,
    },
    cache: {
      enabled: parsed.ENABLE_CACHING,
      ttlMs: parsed.CACHE_TTL_SECONDS * 1000,
      maxEntries: parsed.CACHE_MAX_SIZE,
    },
    batch: {
      batchSize: parsed.DETAIL_BATCH_SIZE,
      concurrency: parsed.CONCURRENT_QUERY_BATCH_SIZE,
      retries: parsed.BATCH_RETRIES,
    },
    sprintCustomFieldId: parsed.SPRINT_CUSTOM_FIELD_ID,
  };
}
