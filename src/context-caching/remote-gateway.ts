/**
 * Remote Cache Gateway
 *
 * Contract for the authoritative cached-content service. The orchestrator
 * only ever talks to the remote store through this interface.
 *
 * Failure contract:
 * - RemoteCachePermissionError: the namespace is not readable. Lookups treat
 *   this as a miss.
 * - RemoteCacheTimeoutError / RemoteCacheError: transport or service failure,
 *   propagated to the caller.
 */

import type { RemoteScope } from './scope-key.js';
import type { CachedContentPayload } from './cached-content-payload.js';

export interface RemoteCallOptions {
  /** Per-call timeout in milliseconds */
  timeoutMs?: number;
  /** Caller cancellation */
  signal?: AbortSignal;
}

export interface RemoteCacheEntry {
  /** Resource name of the cached content */
  remoteHandle: string;
  /** ISO-8601 expiry reported by the service */
  expireTime?: string;
}

export interface RemoteCacheGateway {
  /**
   * Find an existing entry in the scope whose display name equals the content key
   */
  lookupByName(scope: RemoteScope, contentKey: string, options?: RemoteCallOptions): Promise<RemoteCacheEntry | null>;

  /**
   * Register new cached content
   */
  create(scope: RemoteScope, payload: CachedContentPayload, options?: RemoteCallOptions): Promise<RemoteCacheEntry>;
}
