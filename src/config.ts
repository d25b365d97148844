import type { ClientOptions } from './client.js';
import { ConfigurationError } from './errors.js';

export type Environment = Record<string, string | undefined>;

/**
 * Reads client options from `SPECSTORY_*` variables. Unset variables are left out so the
 * client's own defaults apply.
 */
export function loadConfig(env: Environment = process.env): ClientOptions {
  const config: ClientOptions = {};

  const apiKey = env.SPECSTORY_API_KEY?.trim();
  if (apiKey) {
    config.apiKey = apiKey;
  }
  const baseUrl = env.SPECSTORY_BASE_URL?.trim();
  if (baseUrl) {
    config.baseUrl = baseUrl;
  }

  const timeoutMs = readInteger(env, 'SPECSTORY_TIMEOUT_MS', 1);
  if (timeoutMs !== undefined) {
    config.timeoutMs = timeoutMs;
  }
  const maxRetries = readInteger(env, 'SPECSTORY_MAX_RETRIES', 0);
  if (maxRetries !== undefined) {
    config.maxRetries = maxRetries;
  }

  const maxSize = readInteger(env, 'SPECSTORY_CACHE_MAX_SIZE', 0);
  const defaultTtlMs = readInteger(env, 'SPECSTORY_CACHE_TTL_MS', 0);
  if (maxSize !== undefined || defaultTtlMs !== undefined) {
    config.cache = { maxSize, defaultTtlMs };
  }

  return config;
}

function readInteger(env: Environment, name: string, min: number): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) {
    return undefined;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new ConfigurationError(`${name} must be an integer >= ${min} (received "${raw}")`);
  }
  return parsed;
}
