export const SDK_VERSION = '0.1.0';
export const SDK_LANGUAGE = 'typescript';

export const DEFAULT_BASE_URL = 'https://cloud.specstory.com';
export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_RETRY_BASE_DELAY_MS = 200;
export const DEFAULT_RETRY_JITTER_MS = 100;

export const DEFAULT_CACHE_MAX_SIZE = 100;
export const DEFAULT_CACHE_TTL_MS = 60_000;

export const IDEMPOTENT_METHODS: ReadonlySet<string> = new Set(['GET', 'PUT', 'DELETE', 'HEAD']);

export const RETRY_STATUS_CODES: ReadonlySet<number> = new Set([
  408, // request timeout
  429, // too many requests
  500,
  502,
  503,
  504,
]);

export const API_PREFIX = '/api/v1';
