/**
 * Counting semaphore bounding concurrent warehouse requests.
 * Callers beyond the limit queue in FIFO order rather than fail.
 */

import { QueryExecutionError } from '../errors.js';

interface Waiter {
  resolve: () => void;
  reject: (error: Error) => void;
}

export class ConnectionPool {
  private active = 0;
  private closed = false;
  private readonly waiters: Waiter[] = [];

  constructor(private readonly size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Connection pool size must be a positive integer, got ${size}`);
    }
  }

  get inUse(): number {
    return this.active;
  }

  get queued(): number {
    return this.waiters.length;
  }

  acquire(): Promise<void> {
    if (this.closed) {
      return Promise.reject(closedError());
    }
    if (this.active < this.size) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  /** Hand the slot to the next waiter, or free it. */
  release(): void {
    const next = this.waiters.shift();
    if (next) {
      next.resolve();
    } else if (this.active > 0) {
      this.active--;
    }
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  /** Reject every queued caller. Slots already held finish normally. */
  close(): void {
    this.closed = true;
    const pending = this.waiters.splice(0);
    for (const waiter of pending) {
      waiter.reject(closedError());
    }
  }
}

function closedError(): QueryExecutionError {
  return new QueryExecutionError('Warehouse client is closed', null, false);
}
