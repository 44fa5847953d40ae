/**
 * Context Cache Configuration
 *
 * Resolution order, lowest to highest: built-in defaults, environment
 * variables, explicit overrides. Malformed environment values fall back to
 * the default for that field.
 */

import { DEFAULT_TTL, isValidTtl } from '../context-caching/ttl.js';
import { DEFAULT_SAFETY_BUFFER_SECONDS } from '../context-caching/local-cache-store.js';

export interface ContextCacheConfig {
  enabled: boolean;
  /** TTL requested for new entries when messages carry none */
  defaultTtl: string;
  safetyBufferSeconds: number;
  requestTimeoutMs: number;
  deduplicateCreation: boolean;
  /** 0 disables background pruning */
  cleanupIntervalMs: number;
  apiBase?: string;
}

export const DEFAULT_CONTEXT_CACHE_CONFIG: ContextCacheConfig = {
  enabled: true,
  defaultTtl: DEFAULT_TTL,
  safetyBufferSeconds: DEFAULT_SAFETY_BUFFER_SECONDS,
  requestTimeoutMs: 30000,
  deduplicateCreation: true,
  cleanupIntervalMs: 0,
};

function readBoolean(raw: string | undefined, fallback: boolean): boolean {
  switch (raw?.trim().toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      return fallback;
  }
}

function readNumber(raw: string | undefined, fallback: number, min: number = 0): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  return Number.isFinite(value) && value >= min ? value : fallback;
}

export function loadContextCacheConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: Partial<ContextCacheConfig> = {}
): ContextCacheConfig {
  const defaults = DEFAULT_CONTEXT_CACHE_CONFIG;
  const ttl = env.CONTEXT_CACHE_DEFAULT_TTL?.trim();
  const apiBase = env.CONTEXT_CACHE_API_BASE?.trim();

  const fromEnv: ContextCacheConfig = {
    enabled: readBoolean(env.CONTEXT_CACHE_ENABLED, defaults.enabled),
    defaultTtl: isValidTtl(ttl) ? ttl : defaults.defaultTtl,
    safetyBufferSeconds: readNumber(env.CONTEXT_CACHE_SAFETY_BUFFER_SECONDS, defaults.safetyBufferSeconds),
    requestTimeoutMs: readNumber(env.CONTEXT_CACHE_REQUEST_TIMEOUT_MS, defaults.requestTimeoutMs, 1),
    deduplicateCreation: readBoolean(env.CONTEXT_CACHE_DEDUPLICATE_CREATION, defaults.deduplicateCreation),
    cleanupIntervalMs: readNumber(env.CONTEXT_CACHE_CLEANUP_INTERVAL_MS, defaults.cleanupIntervalMs),
  };

  if (apiBase) {
    fromEnv.apiBase = apiBase;
  }

  return { ...fromEnv, ...overrides };
}
