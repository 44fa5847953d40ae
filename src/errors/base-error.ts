/**
 * Context cache errors
 *
 * Every failure the caching layer surfaces carries the HTTP status and the
 * endpoint of the remote call it came from, when there was one. Partitioning,
 * key derivation and TTL parsing never throw, so all codes are remote ones.
 */

export type ContextCacheErrorCode =
  | 'REMOTE_CACHE_ERROR'
  | 'REMOTE_CACHE_PERMISSION_DENIED'
  | 'REMOTE_CACHE_TIMEOUT';

export interface ContextCacheErrorOptions {
  cause?: unknown;
  /** HTTP status of the failed call; 500 for transport failures */
  statusCode?: number;
  /** URL of the failed call */
  endpoint?: string;
  context?: Record<string, unknown>;
}

// Statuses for which repeating the same call can succeed
const RETRYABLE_STATUS = new Set([408, 429, 500, 502, 503, 504]);

export class ContextCacheError extends Error {
  public readonly code: ContextCacheErrorCode;
  public readonly statusCode?: number;
  public readonly endpoint?: string;
  public readonly context?: Record<string, unknown>;

  constructor(code: ContextCacheErrorCode, message: string, options: ContextCacheErrorOptions = {}) {
    super(message);
    this.name = 'ContextCacheError';
    this.code = code;
    this.statusCode = options.statusCode;
    this.endpoint = options.endpoint;
    this.context = options.context;

    if (options.cause !== undefined) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Whether the same remote call may succeed if repeated
   */
  get retryable(): boolean {
    return this.statusCode !== undefined && RETRYABLE_STATUS.has(this.statusCode);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      endpoint: this.endpoint,
      retryable: this.retryable,
      context: this.context,
    };
  }
}
