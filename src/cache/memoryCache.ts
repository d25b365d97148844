import {
  assertTtl,
  systemClock,
  type CacheConfig,
  type CacheEntry,
  type CacheHit,
  type CachePutOptions,
  type Clock,
  type ResponseCache,
} from './cache.js';

interface StoredEntry extends CacheEntry {
  sequence: number;
}

export interface MemoryCacheOptions {
  maxSize: number;
  defaultTtlMs: number;
  clock?: Clock | undefined;
}

/**
 * Bounded LRU cache with per-entry expiry.
 *
 * The backing map is kept in recency order: every put and every hit re-inserts its key at
 * the end. An entry is expired
 * once `now >= expiresAt`; expired entries are dropped lazily on `get`, in bulk on
 * `prune`, and before an eviction is forced.
 *
 * Invalidation bumps `epoch`. A put carrying an older epoch belongs to a read that started
 * before the invalidation and is dropped.
 */
export class MemoryCache implements ResponseCache {
  readonly enabled = true;
  private readonly store = new Map<string, StoredEntry>();
  private readonly maxSize: number;
  private readonly defaultTtlMs: number;
  private readonly clock: Clock;
  private sequence = 0;
  private generation = 0;
  private closed = false;

  constructor(options: MemoryCacheOptions) {
    this.maxSize = options.maxSize;
    this.defaultTtlMs = options.defaultTtlMs;
    this.clock = options.clock ?? systemClock;
  }

  get size(): number {
    return this.store.size;
  }

  get epoch(): number {
    return this.generation;
  }

  get<TValue>(key: string): CacheHit<TValue> | null {
    if (this.closed) {
      return null;
    }
    const entry = this.store.get(key);
    if (!entry) {
      return null;
    }

    const now = this.clock();
    if (now >= entry.expiresAt) {
      this.store.delete(key);
      return null;
    }

    entry.lastUsedAt = now;
    this.store.delete(key);
    this.store.set(key, entry);
    return { value: structuredClone(entry.value) as TValue, validator: entry.validator };
  }

  put<TValue>(key: string, value: TValue, options: CachePutOptions = {}): void {
    const ttlMs = options.ttlMs ?? this.defaultTtlMs;
    assertTtl(ttlMs, 'ttlMs');
    if (this.closed || (options.epoch !== undefined && options.epoch !== this.generation)) {
      return;
    }

    const now = this.clock();
    const entry: StoredEntry = {
      key,
      value: structuredClone(value),
      validator: options.validator,
      expiresAt: now + ttlMs,
      insertedAt: now,
      lastUsedAt: now,
      sequence: this.sequence++,
    };

    if (this.store.delete(key)) {
      this.store.set(key, entry);
      return;
    }

    if (this.store.size >= this.maxSize) {
      this.prune();
    }
    if (this.store.size >= this.maxSize) {
      this.evictLeastRecentlyUsed();
    }
    this.store.set(key, entry);
  }

  invalidate(key: string): boolean {
    this.generation += 1;
    return this.store.delete(key);
  }

  invalidateMatching(pattern: RegExp): number {
    this.generation += 1;
    let removed = 0;
    for (const key of [...this.store.keys()]) {
      pattern.lastIndex = 0;
      if (pattern.test(key)) {
        this.store.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  prune(): number {
    const now = this.clock();
    let removed = 0;
    for (const [key, entry] of [...this.store.entries()]) {
      if (now >= entry.expiresAt) {
        this.store.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  clear(): void {
    this.generation += 1;
    this.store.clear();
  }

  close(): void {
    this.closed = true;
    this.clear();
  }

  /**
   * Oldest `lastUsedAt` wins, then oldest `insertedAt`, then the lower sequence number.
   * Scans every entry: the clock may step backwards, so map order alone is not enough.
   */
  private evictLeastRecentlyUsed(): void {
    let victim: StoredEntry | undefined;
    for (const entry of this.store.values()) {
      if (
        !victim ||
        entry.lastUsedAt < victim.lastUsedAt ||
        (entry.lastUsedAt === victim.lastUsedAt && ranksOlder(entry, victim))
      ) {
        victim = entry;
      }
    }

    if (victim) {
      this.store.delete(victim.key);
    }
  }
}

function ranksOlder(candidate: StoredEntry, current: StoredEntry): boolean {
  if (candidate.insertedAt !== current.insertedAt) {
    return candidate.insertedAt < current.insertedAt;
  }
  return candidate.sequence < current.sequence;
}

/**
 * Stand-in used when caching is turned off: nothing is stored, every lookup misses.
 */
export class DisabledCache implements ResponseCache {
  readonly enabled = false;
  readonly size = 0;
  readonly epoch = 0;

  get<TValue>(): CacheHit<TValue> | null {
    return null;
  }

  put(): void {}

  invalidate(): boolean {
    return false;
  }

  invalidateMatching(): number {
    return 0;
  }

  prune(): number {
    return 0;
  }

  clear(): void {}

  close(): void {}
}

export function createResponseCache(config: CacheConfig, clock: Clock = systemClock): ResponseCache {
  if (config.kind === 'disabled') {
    return new DisabledCache();
  }
  return new MemoryCache({ maxSize: config.maxSize, defaultTtlMs: config.defaultTtlMs, clock });
}
