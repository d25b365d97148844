export { Client, type ClientOptions } from './client.js';
export { loadConfig, type Environment } from './config.js';
export {
  resolveCacheConfig,
  systemClock,
  type CacheConfig,
  type CacheHit,
  type CacheOptions,
  type CachePutOptions,
  type Clock,
  type ResponseCache,
} from './cache/cache.js';
export { DisabledCache, MemoryCache, createResponseCache } from './cache/memoryCache.js';
export * from './errors.js';
export { HttpClient, type ApiResponse, type FetchLike, type HttpMethod, type RequestOptions } from './http/httpClient.js';
export { Projects } from './resources/projects.js';
export {
  DEFAULT_RECENT_LIMIT,
  Sessions,
  type ListSessionsOptions,
  type ReadSessionOptions,
  type RecentSessionsOptions,
} from './resources/sessions.js';
export { DEFAULT_SEARCH_LIMIT, GraphQL, type SearchOptions } from './resources/graphql.js';
export { exportProjectSessions, type ExportOptions } from './export/sessionExporter.js';
export { jot, type InferJot, type JotSchema } from './jot.js';
export { SDK_VERSION } from './constants.js';
export type * from './types/index.js';
