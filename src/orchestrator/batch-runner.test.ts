import { describe, it, expect, vi, beforeEach } from 'vitest';
import { chunk, isRetryable, runBatches } from './batch-runner.js';
import { QueryExecutionError, QueryTimeoutError, ValidationError } from '../errors.js';

const FAST = { batchSize: 2, concurrency: 2, retries: 2, minTimeoutMs: 0 };

beforeEach(() => {
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

describe('chunk', () => {
  it('splits into fixed-size batches with a short tail', () => {
    expect(chunk(['a', 'b', 'c', 'd', 'e'], 2)).toEqual([['a', 'b'], ['c', 'd'], ['e']]);
  });

  it('returns no batches for no items', () => {
    expect(chunk([], 3)).toEqual([]);
  });

  it('rejects a non-positive size', () => {
    expect(() => chunk(['a'], 0)).toThrow(RangeError);
  });
});

describe('isRetryable', () => {
  it('follows the error flag', () => {
    expect(isRetryable(new QueryTimeoutError(100))).toBe(true);
    expect(isRetryable(new QueryExecutionError('down', 503, true))).toBe(true);
    expect(isRetryable(new ValidationError('bad'))).toBe(false);
    expect(isRetryable(new Error('plain'))).toBe(false);
  });
});

describe('runBatches', () => {
  it('returns results in batch order', async () => {
    const outcome = await runBatches(
      [1, 2, 3, 4, 5],
      async (batch, index) => {
        // later batches finish first
        await new Promise((resolve) => setTimeout(resolve, (3 - index) * 5));
        return batch.reduce((sum, n) => sum + n, 0);
      },
      FAST
    );

    expect(outcome.succeeded.map((s) => s.value)).toEqual([3, 7, 5]);
    expect(outcome.failed).toEqual([]);
  });

  it('never runs more batches than the concurrency limit', async () => {
    let running = 0;
    let peak = 0;

    await runBatches(
      Array.from({ length: 10 }, (_, i) => i),
      async () => {
        running++;
        peak = Math.max(peak, running);
        await new Promise((resolve) => setTimeout(resolve, 5));
        running--;
      },
      { ...FAST, batchSize: 1, concurrency: 3 }
    );

    expect(peak).toBe(3);
  });

  it('retries a batch that fails with a retryable error', async () => {
    const worker = vi
      .fn<(batch: string[], index: number) => Promise<string>>()
      .mockRejectedValueOnce(new QueryTimeoutError(50))
      .mockResolvedValueOnce('ok');

    const outcome = await runBatches(['A-1'], worker, FAST);

    expect(worker).toHaveBeenCalledTimes(2);
    expect(outcome.succeeded).toEqual([{ index: 0, items: ['A-1'], value: 'ok' }]);
  });

  it('does not retry non-retryable errors', async () => {
    const error = new ValidationError('bad key');
    const worker = vi
      .fn<(batch: string[], index: number) => Promise<string>>()
      .mockRejectedValue(error);

    const outcome = await runBatches(['A-1'], worker, FAST);

    expect(worker).toHaveBeenCalledTimes(1);
    expect(outcome.failed).toEqual([{ index: 0, items: ['A-1'], error }]);
  });

  it('reports a batch that exhausts its retries and keeps the others', async () => {
    const worker = vi.fn((batch: string[]) =>
      batch.includes('B-1')
        ? Promise.reject(new QueryExecutionError('unavailable', 503, true))
        : Promise.resolve(batch.length)
    );

    const outcome = await runBatches(['A-1', 'A-2', 'B-1'], worker, FAST);

    // 1 call for the good batch, 1 + 2 retries for the bad one
    expect(worker).toHaveBeenCalledTimes(4);
    expect(outcome.succeeded.map((s) => s.items)).toEqual([['A-1', 'A-2']]);
    expect(outcome.failed.map((f) => f.items)).toEqual([['B-1']]);
    expect(outcome.failed[0]?.error).toBeInstanceOf(QueryExecutionError);
  });
});
