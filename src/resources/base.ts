import type { CachePutOptions, ResponseCache } from '../cache/cache.js';
import { SDKError } from '../errors.js';
import type { HttpClient } from '../http/httpClient.js';
import type { JotSchema } from '../jot.js';
import type { CachedReadOptions } from '../types/index.js';
import { escapeRegExp } from '../utils/text.js';

export interface ResourceContext {
  http: HttpClient;
  cache: ResponseCache;
  logger?: ((message: string) => void) | undefined;
}

export abstract class BaseResource {
  protected readonly http: HttpClient;
  protected readonly cache: ResponseCache;
  private readonly logger: ((message: string) => void) | undefined;

  constructor(context: ResourceContext) {
    this.http = context.http;
    this.cache = context.cache;
    this.logger = context.logger;
  }

  /**
   * Looks `key` up in the cache, otherwise runs `load` and stores its result. The result is
   * dropped instead of stored when an invalidation landed while `load` was pending.
   */
  protected async cached<T>(key: string, options: CachedReadOptions, load: () => Promise<T>): Promise<T> {
    if (!options.forceRefresh) {
      const hit = this.cache.get<T>(key);
      if (hit) {
        this.logger?.(`Cache hit for ${key}`);
        return hit.value;
      }
    }

    const epoch = this.cache.epoch;
    const value = await load();
    this.store(key, value, { ttlMs: options.cacheTtlMs, epoch });
    return value;
  }

  protected store<T>(key: string, value: T, options: CachePutOptions): void {
    this.cache.put(key, value, options);
  }

  /**
   * Drops every cached request whose fingerprint starts with `<method> <path>` followed by
   * a path, query or body separator, so `/projects/p1` never clears `/projects/p10`.
   */
  protected invalidatePath(method: string, path: string): number {
    const pattern = new RegExp(`^${escapeRegExp(`${method} ${path}`)}(?:[/?#]|$)`);
    return this.cache.invalidateMatching(pattern);
  }

  protected parse<T>(schema: JotSchema<T>, value: unknown, label: string): T {
    try {
      return schema.parse(value, label);
    } catch (error: unknown) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new SDKError(`Unexpected response shape: ${reason}`, { code: 'invalid_response', cause: error });
    }
  }
}

