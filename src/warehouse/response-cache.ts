/**
 * In-memory response cache: TTL expiry plus least-recently-used eviction.
 *
 * Keys are fingerprints of (statement text, bound params). The cache is
 * best-effort; two concurrent identical queries may both miss.
 */

import stableStringify from 'fast-json-stable-stringify';
import type { SqlStatement } from '../sql/sql-builder.js';

interface Entry<T> {
  value: T;
  expiresAt: number;
}

export function fingerprint(statement: SqlStatement): string {
  return stableStringify({ text: statement.text, params: statement.params });
}

export class ResponseCache<T> {
  // Map iteration order doubles as recency order: oldest first
  private readonly entries = new Map<string, Entry<T>>();

  constructor(
    private readonly ttlMs: number,
    private readonly maxEntries: number
  ) {}

  get size(): number {
    return this.entries.size;
  }

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (Date.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }

    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.value;
  }

  set(key: string, value: T): void {
    this.entries.delete(key);
    this.entries.set(key, { value, expiresAt: Date.now() + this.ttlMs });

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  clear(): void {
    this.entries.clear();
  }
}
