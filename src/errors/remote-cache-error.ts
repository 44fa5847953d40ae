import { ContextCacheError, type ContextCacheErrorOptions } from './base-error.js';

/**
 * Call to the remote cached-content service failed
 */
export class RemoteCacheError extends ContextCacheError {
  constructor(message: string, options: ContextCacheErrorOptions = {}) {
    super('REMOTE_CACHE_ERROR', message, options);
    this.name = 'RemoteCacheError';
  }
}

/**
 * Remote service refused access to the cache namespace.
 * Lookups treat this as "not found".
 */
export class RemoteCachePermissionError extends RemoteCacheError {
  constructor(message: string = 'Permission denied by remote cache service', endpoint?: string) {
    super(message, { statusCode: 403, endpoint });
    this.name = 'RemoteCachePermissionError';
    Object.defineProperty(this, 'code', { value: 'REMOTE_CACHE_PERMISSION_DENIED', writable: false });
  }
}

/**
 * Remote call exceeded its timeout
 */
export class RemoteCacheTimeoutError extends RemoteCacheError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number, endpoint?: string) {
    super(`Remote cache request timed out after ${timeoutMs}ms`, { statusCode: 408, endpoint });
    this.name = 'RemoteCacheTimeoutError';
    Object.defineProperty(this, 'code', { value: 'REMOTE_CACHE_TIMEOUT', writable: false });
    this.timeoutMs = timeoutMs;
  }
}

export function isPermissionError(error: unknown): error is RemoteCacheError {
  return (
    error instanceof RemoteCachePermissionError ||
    (error instanceof RemoteCacheError && error.statusCode === 403)
  );
}
