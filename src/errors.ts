/**
 * Error Taxonomy
 *
 * Every failure a tool can report is one of these classes. The `kind` is
 * what callers see in the structured error payload; `retryable` tells the
 * batch runner (and the caller) whether trying again can help.
 */

export type ErrorKind =
  | 'ValidationError'
  | 'QueryTimeout'
  | 'RateLimitExceeded'
  | 'QueryExecutionError'
  | 'QuerySyntaxError'
  | 'QueryPermissionError'
  | 'IssueNotFound'
  | 'InternalError';

export class JiraSnowflakeError extends Error {
  constructor(
    message: string,
    public readonly kind: ErrorKind,
    public readonly retryable: boolean
  ) {
    super(message);
    this.name = 'JiraSnowflakeError';
  }
}

/** Malformed or out-of-range caller input. Raised before any network call. */
export class ValidationError extends JiraSnowflakeError {
  constructor(message: string) {
    super(message, 'ValidationError', false);
    this.name = 'ValidationError';
  }
}

export class QueryTimeoutError extends JiraSnowflakeError {
  constructor(public readonly timeoutMs: number) {
    super(`Warehouse query exceeded its ${timeoutMs}ms deadline`, 'QueryTimeout', true);
    this.name = 'QueryTimeoutError';
  }
}

/** The local rate limiter stayed saturated for longer than the allowed wait. */
export class RateLimitExceededError extends JiraSnowflakeError {
  constructor(public readonly waitedMs: number) {
    super(
      `Local rate limit saturated after waiting ${waitedMs}ms; retry after a short backoff`,
      'RateLimitExceeded',
      true
    );
    this.name = 'RateLimitExceededError';
  }
}

/** Transport-level failure: connection error, 5xx, 429 or an unreadable body. */
export class QueryExecutionError extends JiraSnowflakeError {
  constructor(
    message: string,
    public readonly statusCode: number | null,
    retryable: boolean
  ) {
    super(message, 'QueryExecutionError', retryable);
    this.name = 'QueryExecutionError';
  }
}

/** Remote-reported SQL error. The remote code is kept verbatim. */
export class QuerySyntaxError extends JiraSnowflakeError {
  constructor(
    message: string,
    public readonly code: string | null,
    public readonly sqlState: string | null
  ) {
    super(message, 'QuerySyntaxError', false);
    this.name = 'QuerySyntaxError';
  }
}

export class QueryPermissionError extends JiraSnowflakeError {
  constructor(
    message: string,
    public readonly code: string | null
  ) {
    super(message, 'QueryPermissionError', false);
    this.name = 'QueryPermissionError';
  }
}

export class IssueNotFoundError extends JiraSnowflakeError {
  constructor(public readonly issueKey: string) {
    super(`Issue with key '${issueKey}' not found`, 'IssueNotFound', false);
    this.name = 'IssueNotFoundError';
  }
}

// ─── Payload ─────────────────────────────────────────────────

export interface ErrorPayload {
  error: {
    kind: ErrorKind;
    message: string;
    retryable: boolean;
    code?: string;
    sql_state?: string;
  };
}

/**
 * Convert anything thrown by a handler into the structured error payload.
 */
export function toErrorPayload(error: unknown): ErrorPayload {
  if (error instanceof JiraSnowflakeError) {
    const payload: ErrorPayload = {
      error: { kind: error.kind, message: error.message, retryable: error.retryable },
    };
    if (error instanceof QuerySyntaxError) {
      if (error.code) payload.error.code = error.code;
      if (error.sqlState) payload.error.sql_state = error.sqlState;
    } else if (error instanceof QueryPermissionError && error.code) {
      payload.error.code = error.code;
    }
    return payload;
  }

  const message = error instanceof Error ? error.message : 'Unknown error';
  return { error: { kind: 'InternalError', message, retryable: false } };
}
