/**
 * Process-wide rate limiter: fixed one-second window.
 *
 * Callers over the budget wait for the next window, up to `maxWaitMs`
 * in total, before failing with RateLimitExceededError.
 */

import { RateLimitExceededError } from '../errors.js';

export interface RateLimiterConfig {
  /** Requests allowed per window. */
  maxRequests: number;
  /** Longest a caller may wait for a free slot. */
  maxWaitMs: number;
  windowMs?: number;
}

const DEFAULT_WINDOW_MS = 1000;

export class RateLimiter {
  private readonly maxRequests: number;
  private readonly maxWaitMs: number;
  private readonly windowMs: number;
  private count = 0;
  private windowStart = 0;

  constructor(config: RateLimiterConfig) {
    this.maxRequests = config.maxRequests;
    this.maxWaitMs = config.maxWaitMs;
    this.windowMs = config.windowMs ?? DEFAULT_WINDOW_MS;
  }

  /**
   * Consume one request slot if the current window has room.
   */
  tryConsume(): boolean {
    const now = Date.now();
    if (now - this.windowStart >= this.windowMs) {
      this.windowStart = now;
      this.count = 1;
      return true;
    }
    if (this.count >= this.maxRequests) {
      return false;
    }
    this.count++;
    return true;
  }

  msUntilReset(): number {
    return Math.max(0, this.windowMs - (Date.now() - this.windowStart));
  }

  /**
   * Wait for a request slot.
   * @throws RateLimitExceededError when no slot frees up within maxWaitMs
   */
  async acquire(): Promise<void> {
    const started = Date.now();
    while (!this.tryConsume()) {
      const waited = Date.now() - started;
      const delay = Math.max(1, this.msUntilReset());
      if (waited + delay > this.maxWaitMs) {
        throw new RateLimitExceededError(waited);
      }
      await new Promise<void>((resolve) => setTimeout(resolve, delay));
    }
  }
}
