/**
 * Tests for context cache configuration loading
 */

import { DEFAULT_CONTEXT_CACHE_CONFIG, loadContextCacheConfig } from '../../src/config/context-cache-config';

describe('loadContextCacheConfig', () => {
  it('should return the defaults for an empty environment', () => {
    expect(loadContextCacheConfig({})).toEqual({
      enabled: true,
      defaultTtl: '3600s',
      safetyBufferSeconds: 5,
      requestTimeoutMs: 30000,
      deduplicateCreation: true,
      cleanupIntervalMs: 0,
    });
    expect(DEFAULT_CONTEXT_CACHE_CONFIG.defaultTtl).toBe('3600s');
  });

  it('should read every variable', () => {
    const config = loadContextCacheConfig({
      CONTEXT_CACHE_ENABLED: 'false',
      CONTEXT_CACHE_DEFAULT_TTL: '600s',
      CONTEXT_CACHE_SAFETY_BUFFER_SECONDS: '10',
      CONTEXT_CACHE_REQUEST_TIMEOUT_MS: '5000',
      CONTEXT_CACHE_DEDUPLICATE_CREATION: '0',
      CONTEXT_CACHE_CLEANUP_INTERVAL_MS: '60000',
      CONTEXT_CACHE_API_BASE: ' http://localhost:8080 ',
    });

    expect(config).toEqual({
      enabled: false,
      defaultTtl: '600s',
      safetyBufferSeconds: 10,
      requestTimeoutMs: 5000,
      deduplicateCreation: false,
      cleanupIntervalMs: 60000,
      apiBase: 'http://localhost:8080',
    });
  });

  it('should fall back to defaults for malformed values', () => {
    const config = loadContextCacheConfig({
      CONTEXT_CACHE_ENABLED: 'sometimes',
      CONTEXT_CACHE_DEFAULT_TTL: '1h',
      CONTEXT_CACHE_SAFETY_BUFFER_SECONDS: '-1',
      CONTEXT_CACHE_REQUEST_TIMEOUT_MS: '0',
      CONTEXT_CACHE_CLEANUP_INTERVAL_MS: 'often',
    });

    expect(config).toEqual(DEFAULT_CONTEXT_CACHE_CONFIG);
  });

  it('should ignore blank values', () => {
    expect(loadContextCacheConfig({ CONTEXT_CACHE_REQUEST_TIMEOUT_MS: '  ', CONTEXT_CACHE_API_BASE: '' })).toEqual(
      DEFAULT_CONTEXT_CACHE_CONFIG
    );
  });

  it('should let overrides win over the environment', () => {
    const config = loadContextCacheConfig({ CONTEXT_CACHE_DEFAULT_TTL: '600s' }, { defaultTtl: '120s', enabled: false });

    expect(config.defaultTtl).toBe('120s');
    expect(config.enabled).toBe(false);
  });
});
