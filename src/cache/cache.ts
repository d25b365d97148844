import { DEFAULT_CACHE_MAX_SIZE, DEFAULT_CACHE_TTL_MS } from '../constants.js';
import { ConfigurationError } from '../errors.js';

/** Current time in epoch milliseconds. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export interface CacheEntry<TValue = unknown> {
  key: string;
  value: TValue;
  validator: string | undefined;
  expiresAt: number;
  insertedAt: number;
  lastUsedAt: number;
}

export interface CacheHit<TValue> {
  value: TValue;
  validator: string | undefined;
}

export interface CachePutOptions {
  /** Opaque token (usually an ETag) for a later conditional request. */
  validator?: string | undefined;
  /** Overrides the default time-to-live for this entry. */
  ttlMs?: number | undefined;
  /** Skip the put when the cache has been invalidated since this `epoch` was read. */
  epoch?: number | undefined;
}

/**
 * In-process response cache owned by one client. Every operation is synchronous, so no
 * caller ever observes a half-applied put or eviction.
 */
export interface ResponseCache {
  readonly enabled: boolean;
  readonly size: number;
  /** Bumped by every invalidation, `clear` and `close`. */
  readonly epoch: number;
  get<TValue>(key: string): CacheHit<TValue> | null;
  put<TValue>(key: string, value: TValue, options?: CachePutOptions): void;
  invalidate(key: string): boolean;
  invalidateMatching(pattern: RegExp): number;
  prune(): number;
  clear(): void;
  /** Empties the cache for good: later puts are dropped and every lookup misses. */
  close(): void;
}

export interface CacheOptions {
  maxSize?: number | undefined;
  defaultTtlMs?: number | undefined;
}

export type CacheConfig =
  | { kind: 'disabled' }
  | { kind: 'enabled'; maxSize: number; defaultTtlMs: number };

/**
 * Turns the user-facing `cache` option into a config variant. `false` and `maxSize: 0`
 * both disable caching; anything negative or fractional is rejected here, before any
 * request is made.
 */
export function resolveCacheConfig(options: CacheOptions | false | undefined): CacheConfig {
  if (options === false) {
    return { kind: 'disabled' };
  }

  const maxSize = options?.maxSize ?? DEFAULT_CACHE_MAX_SIZE;
  const defaultTtlMs = options?.defaultTtlMs ?? DEFAULT_CACHE_TTL_MS;

  if (!Number.isInteger(maxSize) || maxSize < 0) {
    throw new ConfigurationError(`cache.maxSize must be a non-negative integer (received ${maxSize})`);
  }
  assertTtl(defaultTtlMs, 'cache.defaultTtlMs');

  if (maxSize === 0) {
    return { kind: 'disabled' };
  }

  return { kind: 'enabled', maxSize, defaultTtlMs };
}

export function assertTtl(ttlMs: number, label: string): void {
  if (!Number.isFinite(ttlMs) || ttlMs < 0) {
    throw new ConfigurationError(`${label} must be a non-negative number of milliseconds (received ${ttlMs})`);
  }
}
