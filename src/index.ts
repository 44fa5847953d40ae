export * from './context-caching/index.js';

export { ContextCacheError } from './errors/base-error.js';
export type { ContextCacheErrorCode, ContextCacheErrorOptions } from './errors/base-error.js';
export {
  RemoteCacheError,
  RemoteCachePermissionError,
  RemoteCacheTimeoutError,
  isPermissionError,
} from './errors/remote-cache-error.js';

export {
  loadContextCacheConfig,
  DEFAULT_CONTEXT_CACHE_CONFIG,
} from './config/context-cache-config.js';
export type { ContextCacheConfig } from './config/context-cache-config.js';
export { ENV_SCHEMA, getEnvDef, validateEnv, maskValue, getEnvSummary } from './config/env-schema.js';
export type { EnvVarDef, EnvCategory, ValidationResult } from './config/env-schema.js';

export { logger, createLogger, Logger } from './utils/logger.js';
export type { LogLevel, LogContext } from './utils/logger.js';
