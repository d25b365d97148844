import { describe, expect, it } from 'vitest';
import { loadConfig } from '../src/config.js';
import { ConfigurationError } from '../src/errors.js';

describe('loadConfig', () => {
  it('returns an empty config for an empty environment', () => {
    expect(loadConfig({})).toEqual({});
  });

  it('reads every SPECSTORY_ variable', () => {
    expect(
      loadConfig({
        SPECSTORY_API_KEY: ' test-api-key ',
        SPECSTORY_BASE_URL: 'https://api.test',
        SPECSTORY_TIMEOUT_MS: '5000',
        SPECSTORY_MAX_RETRIES: '0',
        SPECSTORY_CACHE_MAX_SIZE: '25',
        SPECSTORY_CACHE_TTL_MS: '1000',
      }),
    ).toEqual({
      apiKey: 'test-api-key',
      baseUrl: 'https://api.test',
      timeoutMs: 5000,
      maxRetries: 0,
      cache: { maxSize: 25, defaultTtlMs: 1000 },
    });
  });

  it('leaves the other cache setting to its default', () => {
    expect(loadConfig({ SPECSTORY_CACHE_MAX_SIZE: '0' }).cache).toEqual({ maxSize: 0, defaultTtlMs: undefined });
  });

  it('rejects malformed numbers', () => {
    expect(() => loadConfig({ SPECSTORY_TIMEOUT_MS: 'soon' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ SPECSTORY_TIMEOUT_MS: '0' })).toThrow(
      'SPECSTORY_TIMEOUT_MS must be an integer >= 1 (received "0")',
    );
    expect(() => loadConfig({ SPECSTORY_CACHE_TTL_MS: '-1' })).toThrow(ConfigurationError);
  });
});
