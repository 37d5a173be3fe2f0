import { LRUCache } from 'lru-cache';

import { UpstreamError } from '../errors.js';
import { withTimeout } from '../http/timeout.js';

export type CacheFetcher<V> = (key: string, signal: AbortSignal) => Promise<V>;

export type CachedValue<V> = {
  value: V;
  createdAt: number;
  expiresAt: number;
};

export type UpstreamCacheOptions<V> = {
  /** Default fetcher; `get` may pass its own for keys that need extra context. */
  fetch?: CacheFetcher<V>;
  maxEntries: number;
  ttlMs: number;
  /** Upper bound for a single fetch; exceeding it counts as a fetch failure. */
  timeoutMs: number;
  now?: () => number;
};

export type UpstreamCacheStats = {
  hits: number;
  misses: number;
  joined: number;
  failures: number;
  evictions: number;
};

/**
 * Bounded TTL cache in front of a slow or rate-limited upstream.
 *
 * - single-flight: while a key is being fetched, further callers await the same promise
 * - failures (including timeouts) are never stored; the next call fetches again
 * - when full, expired entries are dropped first, then the least recently used one
 *
 * The directory is only touched synchronously, so a slow fetch never delays lookups
 * of other keys.
 */
export class UpstreamCache<V extends {}> {
  private readonly entries: LRUCache<string, CachedValue<V>>;
  private readonly inFlight = new Map<string, Promise<CachedValue<V>>>();
  private readonly fetcher: CacheFetcher<V> | undefined;
  private readonly ttlMs: number;
  private readonly timeoutMs: number;
  private readonly now: () => number;

  readonly stats: UpstreamCacheStats = { hits: 0, misses: 0, joined: 0, failures: 0, evictions: 0 };

  constructor(opts: UpstreamCacheOptions<V>) {
    if (!Number.isInteger(opts.maxEntries) || opts.maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${opts.maxEntries}`);
    }
    this.fetcher = opts.fetch;
    this.ttlMs = opts.ttlMs;
    this.timeoutMs = opts.timeoutMs;
    this.now = opts.now ?? Date.now;
    this.entries = new LRUCache<string, CachedValue<V>>({
      max: opts.maxEntries,
      dispose: (_value, _key, reason) => {
        if (reason === 'evict') this.stats.evictions += 1;
      }
    });
  }

  get size(): number {
    return this.entries.size;
  }

  get pending(): number {
    return this.inFlight.size;
  }

  /** Looks at an entry without touching recency or triggering a fetch. */
  peek(key: string): CachedValue<V> | undefined {
    const entry = this.entries.peek(key);
    return entry && entry.expiresAt > this.now() ? entry : undefined;
  }

  /**
   * Cached value for `key`, fetching it on a miss. Concurrent misses for one key share
   * the first caller's fetch and its outcome.
   */
  async get(key: string, fetcher?: CacheFetcher<V>): Promise<CachedValue<V>> {
    const entry = this.entries.get(key);
    if (entry) {
      if (entry.expiresAt > this.now()) {
        this.stats.hits += 1;
        return entry;
      }
      this.entries.delete(key);
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      this.stats.joined += 1;
      return await pending;
    }

    const fetch = fetcher ?? this.fetcher;
    if (!fetch) throw new TypeError(`no fetcher for cache key "${key}"`);

    this.stats.misses += 1;
    const load = this.load(key, fetch).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, load);
    return await load;
  }

  /** Whole seconds left before the entry expires; never below 1. */
  remainingTtlSeconds(entry: CachedValue<V>): number {
    return Math.max(1, Math.ceil((entry.expiresAt - this.now()) / 1000));
  }

  clear(): void {
    this.entries.clear();
  }

  private async load(key: string, fetcher: CacheFetcher<V>): Promise<CachedValue<V>> {
    try {
      const value = await withTimeout((signal) => fetcher(key, signal), this.timeoutMs);
      const createdAt = this.now();
      const entry: CachedValue<V> = { value, createdAt, expiresAt: createdAt + this.ttlMs };
      this.insert(key, entry);
      return entry;
    } catch (err) {
      this.stats.failures += 1;
      if (err instanceof UpstreamError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      throw new UpstreamError(`upstream fetch failed: ${message}`, { cause: err });
    }
  }

  private insert(key: string, entry: CachedValue<V>): void {
    if (!this.entries.has(key) && this.entries.size >= this.entries.max) {
      this.purgeExpired();
    }
    this.entries.set(key, entry);
  }

  private purgeExpired(): void {
    const now = this.now();
    const expired: string[] = [];
    for (const [key, entry] of this.entries.entries()) {
      if (entry.expiresAt <= now) expired.push(key);
    }
    for (const key of expired) this.entries.delete(key);
  }
}
