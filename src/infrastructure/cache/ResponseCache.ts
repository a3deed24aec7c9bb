import { createHash } from 'crypto';
import { Clock, systemClock } from '../../utils/clock.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('Cache');

export interface ResponseCacheOptions {
  defaultTtlMs: number;
  maxEntries: number;
  clock?: Clock;
}

interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  sets: number;
  evictions: number;
  size: number;
  maxEntries: number;
  hitRate: number;
}

export type CacheParams = Record<string, string | number | boolean | undefined>;

/**
 * Stable key for one request: keys sorted, strings trimmed, undefined dropped.
 */
export function buildCacheKey(prefix: string, params: CacheParams): string {
  const canonical = Object.keys(params)
    .sort()
    .flatMap((key) => {
      const value = params[key];
      if (value === undefined) return [];
      return [[key, typeof value === 'string' ? value.trim() : value]];
    });
  const digest = createHash('sha256').update(JSON.stringify(canonical)).digest('hex').slice(0, 16);
  return `${prefix}:${digest}`;
}

/**
 * TTL + LRU memo for idempotent fetches.
 *
 * Map insertion order doubles as recency order: a hit re-inserts the entry.
 * Concurrent misses on the same key share one in-flight promise, and a failed
 * fetch leaves nothing behind. One instance holds one kind of value; the HTTP
 * helper shares a `ResponseCache<string>` of response bodies.
 */
export class ResponseCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly inFlight = new Map<string, Promise<V>>();
  private readonly defaultTtlMs: number;
  private readonly maxEntries: number;
  private readonly clock: Clock;
  private hits = 0;
  private misses = 0;
  private sets = 0;
  private evictions = 0;

  constructor(options: ResponseCacheOptions) {
    this.defaultTtlMs = options.defaultTtlMs;
    this.maxEntries = Math.max(1, options.maxEntries);
    this.clock = options.clock ?? systemClock;
  }

  async getOrFetch(key: string, fetchFn: () => Promise<V>, ttlMs?: number): Promise<V> {
    const cached = this.lookup(key);
    if (cached.found) {
      this.hits++;
      return cached.value;
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      this.hits++;
      return pending;
    }

    this.misses++;
    const promise = fetchFn().then((value) => {
      this.set(key, value, ttlMs);
      return value;
    });
    this.inFlight.set(key, promise);

    try {
      return await promise;
    } finally {
      this.inFlight.delete(key);
    }
  }

  has(key: string): boolean {
    return this.lookup(key).found;
  }

  set(key: string, value: V, ttlMs?: number): void {
    this.entries.delete(key);
    this.entries.set(key, { value, expiresAt: this.clock.now() + (ttlMs ?? this.defaultTtlMs) });
    this.sets++;

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.evictions++;
      log.debug(`Evicted ${oldest.value}`);
    }
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  getStats(): CacheStats {
    const lookups = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      sets: this.sets,
      evictions: this.evictions,
      size: this.entries.size,
      maxEntries: this.maxEntries,
      hitRate: lookups === 0 ? 0 : Math.round((this.hits / lookups) * 1000) / 1000,
    };
  }

  private lookup(key: string): { found: true; value: V } | { found: false } {
    const entry = this.entries.get(key);
    if (!entry) return { found: false };

    if (entry.expiresAt <= this.clock.now()) {
      this.entries.delete(key);
      return { found: false };
    }

    this.entries.delete(key);
    this.entries.set(key, entry);
    return { found: true, value: entry.value };
  }
}
