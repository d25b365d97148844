import { resolveCacheConfig, systemClock, type CacheOptions, type Clock, type ResponseCache } from './cache/cache.js';
import { createResponseCache } from './cache/memoryCache.js';
import { DEFAULT_BASE_URL } from './constants.js';
import { ConfigurationError } from './errors.js';
import { HttpClient, type FetchLike } from './http/httpClient.js';
import { GraphQL } from './resources/graphql.js';
import { Projects } from './resources/projects.js';
import { Sessions } from './resources/sessions.js';

export interface ClientOptions {
  /** Falls back to `SPECSTORY_API_KEY`. */
  apiKey?: string | undefined;
  /** Falls back to `SPECSTORY_BASE_URL`, then the hosted service. */
  baseUrl?: string | undefined;
  timeoutMs?: number | undefined;
  maxRetries?: number | undefined;
  /** `false` turns response caching off. */
  cache?: CacheOptions | false | undefined;
  logger?: ((message: string) => void) | undefined;
  fetchImpl?: FetchLike | undefined;
  clock?: Clock | undefined;
}

export class Client {
  readonly projects: Projects;
  readonly sessions: Sessions;
  readonly graphql: GraphQL;
  private readonly http: HttpClient;
  private readonly cache: ResponseCache;

  constructor(options: ClientOptions = {}) {
    const apiKey = options.apiKey ?? process.env.SPECSTORY_API_KEY;
    if (!apiKey) {
      throw new ConfigurationError(
        'API key is required. Pass apiKey or set the SPECSTORY_API_KEY environment variable.',
      );
    }

    this.cache = createResponseCache(resolveCacheConfig(options.cache), options.clock ?? systemClock);
    this.http = new HttpClient({
      apiKey,
      baseUrl: options.baseUrl ?? process.env.SPECSTORY_BASE_URL ?? DEFAULT_BASE_URL,
      timeoutMs: options.timeoutMs,
      maxRetries: options.maxRetries,
      fetchImpl: options.fetchImpl,
      logger: options.logger,
    });

    const context = { http: this.http, cache: this.cache, logger: options.logger };
    this.projects = new Projects(context);
    this.sessions = new Sessions(context);
    this.graphql = new GraphQL(context);
  }

  get baseUrl(): string {
    return this.http.baseUrl;
  }

  get cacheEnabled(): boolean {
    return this.cache.enabled;
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  /**
   * Drops cached responses whose key matches `pattern`, or every response when no pattern
   * is given. Keys look like `GET /api/v1/projects` or `POST /api/v1/graphql#<checksum>`.
   */
  invalidateCache(pattern?: RegExp | string): number {
    if (pattern === undefined) {
      const size = this.cache.size;
      this.cache.clear();
      return size;
    }
    const matcher = typeof pattern === 'string' ? new RegExp(pattern) : pattern;
    return this.cache.invalidateMatching(matcher);
  }

  clearCache(): void {
    this.cache.clear();
  }

  close(): void {
    this.cache.close();
    this.http.close();
  }
}
