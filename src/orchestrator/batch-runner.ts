/**
 * Batch Runner
 *
 * Splits work into fixed-size batches and runs them with bounded
 * concurrency. Each batch is retried on retryable errors; a batch that
 * still fails is reported, not thrown, so the other batches' results
 * survive.
 */

import pRetry, { AbortError } from 'p-retry';
import { JiraSnowflakeError } from '../errors.js';

export interface BatchOptions {
  batchSize: number;
  /** Batches in flight at once. */
  concurrency: number;
  /** Extra attempts per batch after the first failure. */
  retries: number;
  /** First backoff delay; doubles per retry. */
  minTimeoutMs?: number;
}

export interface BatchSuccess<I, R> {
  index: number;
  items: I[];
  value: R;
}

export interface BatchFailure<I> {
  index: number;
  items: I[];
  error: unknown;
}

export interface BatchOutcome<I, R> {
  succeeded: BatchSuccess<I, R>[];
  failed: BatchFailure<I>[];
}

const DEFAULT_MIN_TIMEOUT_MS = 250;
const MAX_TIMEOUT_MS = 5000;

export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Batch size must be a positive integer, got ${size}`);
  }
  const batches: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    batches.push(items.slice(start, start + size));
  }
  return batches;
}

export function isRetryable(error: unknown): boolean {
  return error instanceof JiraSnowflakeError && error.retryable;
}

/**
 * Run `worker` over every batch of `items`. Results come back in batch
 * order regardless of completion order.
 */
export async function runBatches<I, R>(
  items: readonly I[],
  worker: (batch: I[], index: number) => Promise<R>,
  options: BatchOptions
): Promise<BatchOutcome<I, R>> {
  const batches = chunk(items, options.batchSize);
  const succeeded: Array<BatchSuccess<I, R> | undefined> = [];
  const failed: Array<BatchFailure<I> | undefined> = [];
  let cursor = 0;

  const runNext = async (): Promise<void> => {
    while (cursor < batches.length) {
      const index = cursor++;
      const batch = batches[index] ?? [];
      try {
        const value = await runWithRetry(() => worker(batch, index), index, options);
        succeeded[index] = { index, items: batch, value };
      } catch (error) {
        console.error(
          `[jira-snowflake] Batch ${index + 1}/${batches.length} failed (${batch.length} item(s)):`,
          error instanceof Error ? error.message : error
        );
        failed[index] = { index, items: batch, error };
      }
    }
  };

  const workers = Math.max(1, Math.min(options.concurrency, batches.length));
  await Promise.all(Array.from({ length: workers }, () => runNext()));

  return {
    succeeded: succeeded.filter((entry): entry is BatchSuccess<I, R> => entry !== undefined),
    failed: failed.filter((entry): entry is BatchFailure<I> => entry !== undefined),
  };
}

function runWithRetry<R>(
  task: () => Promise<R>,
  index: number,
  options: BatchOptions
): Promise<R> {
  return pRetry(
    async () => {
      try {
        return await task();
      } catch (error) {
        if (!isRetryable(error)) {
          throw new AbortError(error instanceof Error ? error : String(error));
        }
        throw error;
      }
    },
    {
      retries: options.retries,
      minTimeout: options.minTimeoutMs ?? DEFAULT_MIN_TIMEOUT_MS,
      maxTimeout: MAX_TIMEOUT_MS,
      onFailedAttempt: (error) => {
        if (error.retriesLeft > 0) {
          console.error(
            `[jira-snowflake] Batch ${index + 1} attempt ${error.attemptNumber} failed, retrying (${error.retriesLeft} left): ${error.message}`
          );
        }
      },
    }
  );
}
