/**
 * Bounded, expiring response cache for memoized provider calls
 */

import crypto from 'node:crypto';

interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

/** Unit separator; not expected inside prompts, model ids or schemas */
const KEY_SEPARATOR = '\x1f';

/** Stable fingerprint of a call's semantic inputs */
export function hashCacheKey(...parts: Array<string | null | undefined>): string {
  const joined = parts.map((part) => part ?? '').join(KEY_SEPARATOR);
  return crypto.createHash('sha256').update(joined, 'utf8').digest('hex');
}

/**
 * Key → value cache with per-entry TTL and LRU-bounded capacity.
 *
 * A non-positive TTL or capacity disables the cache: `get` always misses and
 * `set`/`delete` do nothing. Map insertion order doubles as recency order
 * (least recent first). Every operation is synchronous, so no caller can
 * observe the map mid-mutation.
 */
export class ResponseCache<T> {
  private entries = new Map<string, CacheEntry<T>>();
  private ttlMs: number;
  private maxItems: number;
  private enabled: boolean;

  constructor(ttlMs: number, maxItems: number) {
    this.ttlMs = ttlMs;
    this.maxItems = maxItems;
    this.enabled = ttlMs > 0 && maxItems > 0;
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  /** Entries held, including expired ones not yet pruned */
  get size(): number {
    return this.entries.size;
  }

  get(key: string): T | undefined {
    if (!this.enabled) return undefined;

    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (Date.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }

    // Recency bump: re-insert at the tail
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.value;
  }

  set(key: string, value: T, ttlMs: number = this.ttlMs): void {
    if (!this.enabled || ttlMs <= 0) return;

    const now = Date.now();
    this.entries.delete(key);
    this.entries.set(key, { value, expiresAt: now + ttlMs });
    this.prune(now);
  }

  delete(key: string): void {
    if (!this.enabled) return;
    this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  /** Drop expired entries, then evict least recent until within capacity */
  private prune(now: number): void {
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
      }
    }

    for (const key of this.entries.keys()) {
      if (this.entries.size <= this.maxItems) break;
      this.entries.delete(key);
    }
  }
}
