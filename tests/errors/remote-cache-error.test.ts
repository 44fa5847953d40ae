/**
 * Tests for the context cache error hierarchy
 */

import { ContextCacheError } from '../../src/errors/base-error';
import {
  RemoteCacheError,
  RemoteCachePermissionError,
  RemoteCacheTimeoutError,
  isPermissionError,
} from '../../src/errors/remote-cache-error';

describe('ContextCacheError', () => {
  it('should carry code, status, endpoint, context and cause', () => {
    const cause = new Error('root');
    const error = new ContextCacheError('REMOTE_CACHE_ERROR', 'something failed', {
      cause,
      statusCode: 503,
      endpoint: 'https://example.test/x',
      context: { provider: 'gemini' },
    });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ContextCacheError');
    expect(error.code).toBe('REMOTE_CACHE_ERROR');
    expect(error.statusCode).toBe(503);
    expect(error.endpoint).toBe('https://example.test/x');
    expect(error.context).toEqual({ provider: 'gemini' });
    expect(error.cause).toBe(cause);
  });

  it('should flag retryable statuses', () => {
    expect(new ContextCacheError('REMOTE_CACHE_ERROR', 'busy', { statusCode: 429 }).retryable).toBe(true);
    expect(new ContextCacheError('REMOTE_CACHE_ERROR', 'down', { statusCode: 503 }).retryable).toBe(true);
    expect(new ContextCacheError('REMOTE_CACHE_ERROR', 'bad request', { statusCode: 400 }).retryable).toBe(false);
    expect(new ContextCacheError('REMOTE_CACHE_ERROR', 'cancelled').retryable).toBe(false);
  });

  it('should serialize to JSON', () => {
    const error = new ContextCacheError('REMOTE_CACHE_ERROR', 'something failed', { statusCode: 500 });

    expect(error.toJSON()).toEqual({
      name: 'ContextCacheError',
      code: 'REMOTE_CACHE_ERROR',
      message: 'something failed',
      statusCode: 500,
      endpoint: undefined,
      retryable: true,
      context: undefined,
    });
  });
});

describe('RemoteCacheError', () => {
  it('should record status and endpoint', () => {
    const error = new RemoteCacheError('bad gateway', { statusCode: 502, endpoint: 'https://example.test/x' });

    expect(error).toBeInstanceOf(ContextCacheError);
    expect(error.code).toBe('REMOTE_CACHE_ERROR');
    expect(error.statusCode).toBe(502);
    expect(error.endpoint).toBe('https://example.test/x');
  });
});

describe('RemoteCachePermissionError', () => {
  it('should be a 403 with its own code', () => {
    const error = new RemoteCachePermissionError();

    expect(error).toBeInstanceOf(RemoteCacheError);
    expect(error.name).toBe('RemoteCachePermissionError');
    expect(error.code).toBe('REMOTE_CACHE_PERMISSION_DENIED');
    expect(error.statusCode).toBe(403);
    expect(error.message).toBe('Permission denied by remote cache service');
    expect(error.retryable).toBe(false);
  });
});

describe('RemoteCacheTimeoutError', () => {
  it('should be a 408 with the timeout', () => {
    const error = new RemoteCacheTimeoutError(250, 'https://example.test/x');

    expect(error.code).toBe('REMOTE_CACHE_TIMEOUT');
    expect(error.statusCode).toBe(408);
    expect(error.timeoutMs).toBe(250);
    expect(error.retryable).toBe(true);
    expect(error.message).toBe('Remote cache request timed out after 250ms');
  });
});

describe('isPermissionError', () => {
  it('should match permission errors and 403 responses', () => {
    expect(isPermissionError(new RemoteCachePermissionError())).toBe(true);
    expect(isPermissionError(new RemoteCacheError('forbidden', { statusCode: 403 }))).toBe(true);
  });

  it('should not match anything else', () => {
    expect(isPermissionError(new RemoteCacheError('boom', { statusCode: 500 }))).toBe(false);
    expect(isPermissionError(new RemoteCacheTimeoutError(10))).toBe(false);
    expect(isPermissionError(new Error('forbidden'))).toBe(false);
    expect(isPermissionError(null)).toBe(false);
  });
});
