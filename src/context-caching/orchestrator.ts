/**
 * Context Cache Orchestrator
 *
 * Cache-aside resolution of a request's cacheable prefix, called once per
 * request before the body is transformed for the provider:
 *
 *   explicit handle → partition → key → local store → remote lookup → remote create
 *
 * The result is the messages still to send, the params without the tool
 * declarations that went into the cache, and the remote handle (if any) to
 * attach to the outbound request.
 *
 * Store writes only happen after a remote call has resolved, so a failed or
 * cancelled call leaves the store as it was.
 */

import { EventEmitter } from 'events';
import { logger } from '../utils/logger.js';
import { isPermissionError, RemoteCacheError, RemoteCacheTimeoutError } from '../errors/remote-cache-error.js';
import {
  DEFAULT_CONTEXT_CACHE_CONFIG,
  loadContextCacheConfig,
  type ContextCacheConfig,
} from '../config/context-cache-config.js';
import type { ChatMessage, RequestParams, ToolDefinition } from './types.js';
import { partitionMessages } from './message-partitioner.js';
import {
  buildContentKey,
  buildScopeKey,
  remoteScopeOf,
  serializeScopeKey,
  type ScopeDimensions,
  type ScopeKey,
} from './scope-key.js';
import { LocalCacheStore, type LocalCacheStats } from './local-cache-store.js';
import type { RemoteCacheEntry, RemoteCacheGateway, RemoteCallOptions } from './remote-gateway.js';
import { HttpRemoteCacheGateway } from './http-remote-gateway.js';
import { buildCachedContentPayload } from './cached-content-payload.js';
import { parseTtlToSeconds, resolveRemoteExpiry } from './ttl.js';

// ============================================================================
// Types
// ============================================================================

export interface ContextCacheRequest extends ScopeDimensions {
  messages: ChatMessage[];
  params?: RequestParams;
  /** Model the cached content is created for */
  model: string;
  /** Pre-resolved remote handle; bypasses all caching work */
  explicitHandle?: string | null;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export type CacheOutcome = 'explicit' | 'disabled' | 'not-cacheable' | 'local-hit' | 'remote-hit' | 'created';

export interface CacheResolution {
  /** Messages to send as fresh content */
  messages: ChatMessage[];
  params: RequestParams;
  /** Remote handle to attach to the provider request */
  cacheHandle: string | null;
  outcome: CacheOutcome;
}

export interface ContextCacheOrchestratorOptions {
  store: LocalCacheStore;
  gateway: RemoteCacheGateway;
  config?: Partial<ContextCacheConfig>;
  /** Clock in epoch milliseconds, used to read remote expiry times */
  now?: () => number;
}

interface RemoteResolution {
  remoteHandle: string;
  outcome: 'remote-hit' | 'created';
}

interface PreparedRequest {
  cacheable: ChatMessage[];
  remainder: ChatMessage[];
  params: RequestParams;
  tools?: ToolDefinition[];
  scopeKey: ScopeKey;
}

// ============================================================================
// Orchestrator
// ============================================================================

export class ContextCacheOrchestrator extends EventEmitter {
  private readonly store: LocalCacheStore;
  private readonly gateway: RemoteCacheGateway;
  private readonly config: ContextCacheConfig;
  private readonly now: () => number;

  // In-flight remote resolutions, keyed by serialized scope key
  private readonly pending: Map<string, Promise<RemoteResolution>> = new Map();

  constructor(options: ContextCacheOrchestratorOptions) {
    super();
    this.store = options.store;
    this.gateway = options.gateway;
    this.config = { ...DEFAULT_CONTEXT_CACHE_CONFIG, ...options.config };
    this.now = options.now ?? Date.now;
  }

  async resolve(request: ContextCacheRequest): Promise<CacheResolution> {
    const params = request.params ?? {};

    if (request.explicitHandle !== undefined && request.explicitHandle !== null) {
      return { messages: request.messages, params, cacheHandle: request.explicitHandle, outcome: 'explicit' };
    }

    if (!this.config.enabled) {
      return { messages: request.messages, params, cacheHandle: null, outcome: 'disabled' };
    }

    const prepared = this.prepare(request);
    if (!prepared) {
      return { messages: request.messages, params, cacheHandle: null, outcome: 'not-cacheable' };
    }

    const { scopeKey, remainder } = prepared;

    const localHandle = this.store.get(scopeKey);
    if (localHandle) {
      logger.debug('Context cache local hit', { provider: scopeKey.provider, remoteHandle: localHandle });
      this.emit('cache:hit', { tier: 'local', key: scopeKey, remoteHandle: localHandle });
      return { messages: remainder, params: prepared.params, cacheHandle: localHandle, outcome: 'local-hit' };
    }

    this.emit('cache:miss', { tier: 'local', key: scopeKey });

    const resolved = await this.resolveRemote(prepared, request);
    return {
      messages: remainder,
      params: prepared.params,
      cacheHandle: resolved.remoteHandle,
      outcome: resolved.outcome,
    };
  }

  /**
   * Scope key the request would be cached under, or null when nothing in it is cacheable
   */
  scopeKeyFor(request: Pick<ContextCacheRequest, 'messages' | 'params' | 'provider' | 'tenant' | 'region'>): ScopeKey | null {
    return this.prepare(request)?.scopeKey ?? null;
  }

  // ===========================================================================
  // Introspection
  // ===========================================================================

  stats(): LocalCacheStats {
    return this.store.stats();
  }

  invalidate(key: ScopeKey): boolean {
    return this.store.invalidate(key);
  }

  clearAll(): void {
    this.store.clearAll();
  }

  cleanupExpired(): number {
    return this.store.cleanupExpired();
  }

  getConfig(): ContextCacheConfig {
    return { ...this.config };
  }

  dispose(): void {
    this.store.dispose();
    this.pending.clear();
    this.removeAllListeners();
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private prepare(
    request: Pick<ContextCacheRequest, 'messages' | 'params' | 'provider' | 'tenant' | 'region'>
  ): PreparedRequest | null {
    const { cacheable, remainder } = partitionMessages(request.messages);
    if (cacheable.length === 0) {
      return null;
    }

    // Tools are part of the cached content and must not be sent twice
    const { tools, ...params } = request.params ?? {};
    const contentKey = buildContentKey(cacheable, tools);
    const scopeKey = buildScopeKey(contentKey, request);

    return { cacheable, remainder, params, tools, scopeKey };
  }

  private resolveRemote(prepared: PreparedRequest, request: ContextCacheRequest): Promise<RemoteResolution> {
    if (!this.config.deduplicateCreation) {
      return this.lookupOrCreate(prepared, request.model, {
        timeoutMs: request.timeoutMs ?? this.config.requestTimeoutMs,
        signal: request.signal,
      });
    }

    const id = serializeScopeKey(prepared.scopeKey);
    let shared = this.pending.get(id);
    if (shared) {
      this.emit('cache:deduplicated', { key: prepared.scopeKey });
    } else {
      // Shared by every waiter, so no single caller's signal or timeout applies to it
      shared = this.lookupOrCreate(prepared, request.model, { timeoutMs: this.config.requestTimeoutMs }).finally(
        () => {
          this.pending.delete(id);
        }
      );
      this.pending.set(id, shared);
    }

    return waitForCaller(shared, request.signal, request.timeoutMs);
  }

  private async lookupOrCreate(
    prepared: PreparedRequest,
    model: string,
    callOptions: RemoteCallOptions
  ): Promise<RemoteResolution> {
    const { scopeKey } = prepared;
    const scope = remoteScopeOf(scopeKey);

    const existing = await this.lookupRemote(scopeKey, callOptions);
    if (existing) {
      const expiry = resolveRemoteExpiry(existing.expireTime, this.now());

      if (expiry.kind === 'expired') {
        logger.warn('Remote context cache entry already expired, creating a new one', {
          remoteHandle: existing.remoteHandle,
          expireTime: existing.expireTime,
        });
      } else {
        const ttlSeconds =
          expiry.kind === 'remaining' ? expiry.seconds : parseTtlToSeconds(this.config.defaultTtl);
        this.store.set(scopeKey, existing.remoteHandle, ttlSeconds);
        logger.debug('Context cache remote hit', { remoteHandle: existing.remoteHandle, ttlSeconds });
        this.emit('cache:hit', { tier: 'remote', key: scopeKey, remoteHandle: existing.remoteHandle });
        return { remoteHandle: existing.remoteHandle, outcome: 'remote-hit' };
      }
    }

    const payload = buildCachedContentPayload({
      model,
      cacheable: prepared.cacheable,
      contentKey: scopeKey.contentKey,
      scope,
      tools: prepared.tools,
      defaultTtl: this.config.defaultTtl,
    });

    let created: RemoteCacheEntry;
    try {
      created = await this.gateway.create(scope, payload, callOptions);
    } catch (error) {
      logger.error('Failed to create remote context cache', {
        provider: scope.provider,
        contentKey: scopeKey.contentKey,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }

    const expiry = resolveRemoteExpiry(created.expireTime, this.now());
    const ttlSeconds =
      expiry.kind === 'remaining' ? expiry.seconds : parseTtlToSeconds(payload.ttl ?? this.config.defaultTtl);

    this.store.set(scopeKey, created.remoteHandle, ttlSeconds);
    logger.debug('Context cache created', { remoteHandle: created.remoteHandle, ttlSeconds });
    this.emit('cache:created', { key: scopeKey, remoteHandle: created.remoteHandle, ttlSeconds });

    return { remoteHandle: created.remoteHandle, outcome: 'created' };
  }

  private async lookupRemote(scopeKey: ScopeKey, options: RemoteCallOptions): Promise<RemoteCacheEntry | null> {
    try {
      return await this.gateway.lookupByName(remoteScopeOf(scopeKey), scopeKey.contentKey, options);
    } catch (error) {
      if (isPermissionError(error)) {
        logger.warn('Remote context cache lookup denied, treating as a miss', {
          provider: scopeKey.provider,
          tenant: scopeKey.tenant,
        });
        return null;
      }
      throw error;
    }
  }
}

// ============================================================================
// Caller wait
// ============================================================================

/**
 * Wait on a shared remote resolution under one caller's cancellation and
 * timeout. Giving up rejects only this caller; the shared work carries on
 * for the other waiters and still fills the store.
 */
function waitForCaller<T>(shared: Promise<T>, signal?: AbortSignal, timeoutMs?: number): Promise<T> {
  if (!signal && timeoutMs === undefined) {
    return shared;
  }

  return new Promise<T>((resolve, reject) => {
    let timer: ReturnType<typeof setTimeout> | undefined;

    const settle = (): void => {
      if (timer) clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    };

    const onAbort = (): void => {
      settle();
      reject(new RemoteCacheError('Remote cache request was cancelled', { cause: signal?.reason }));
    };

    shared.then(
      value => {
        settle();
        resolve(value);
      },
      (error: unknown) => {
        settle();
        reject(error);
      }
    );

    if (signal?.aborted) {
      onAbort();
      return;
    }
    signal?.addEventListener('abort', onAbort, { once: true });

    if (timeoutMs !== undefined) {
      timer = setTimeout(() => {
        settle();
        reject(new RemoteCacheTimeoutError(timeoutMs));
      }, timeoutMs);
    }
  });
}

// ============================================================================
// Factory
// ============================================================================

export interface CreateContextCacheOptions {
  /** Remote service client; defaults to the HTTP gateway configured from the environment */
  gateway?: RemoteCacheGateway;
  config?: Partial<ContextCacheConfig>;
  env?: Record<string, string | undefined>;
  now?: () => number;
}

/**
 * Build an orchestrator with its own store, configured from the environment.
 * Without a gateway, AI Studio is reached with `GEMINI_API_KEY` at
 * `CONTEXT_CACHE_API_BASE` (when set). Call dispose() on shutdown to stop
 * background pruning.
 */
export function createContextCacheOrchestrator(options: CreateContextCacheOptions = {}): ContextCacheOrchestrator {
  const env = options.env ?? process.env;
  const config = loadContextCacheConfig(env, options.config);
  const store = new LocalCacheStore({
    safetyBufferSeconds: config.safetyBufferSeconds,
    cleanupIntervalMs: config.cleanupIntervalMs,
    now: options.now,
  });
  store.startCleanup();

  const gateway =
    options.gateway ??
    new HttpRemoteCacheGateway({
      apiKey: env.GEMINI_API_KEY,
      apiBase: config.apiBase,
      defaultTimeoutMs: config.requestTimeoutMs,
    });

  return new ContextCacheOrchestrator({ store, gateway, config, now: options.now });
}
