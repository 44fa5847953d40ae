/**
 * Context Caching Module
 *
 * Reuses provider-side cached content for the annotated prefix of a chat
 * request:
 * - Partitioning of the first contiguous run of `cache_control` messages
 * - Content-hash keys scoped by provider, project/account and region
 * - Process-local handle store with buffered TTL expiry
 * - Remote lookup/create over the `cachedContents` REST resource
 * - Single-flight creation for concurrent misses
 *
 * Usage:
 * ```typescript
 * import { createContextCacheOrchestrator } from './context-caching';
 *
 * // HTTP gateway from GEMINI_API_KEY and CONTEXT_CACHE_API_BASE
 * const cache = createContextCacheOrchestrator();
 *
 * const { messages, params, cacheHandle } = await cache.resolve({
 *   messages: request.messages,
 *   params: request.params,
 *   provider: 'gemini',
 *   tenant: accountId,
 *   model: 'gemini-1.5-pro-002',
 * });
 *
 * // Shutdown
 * cache.dispose();
 * ```
 */

// Types
export type {
  MessageRole,
  CacheControl,
  TextPart,
  ImagePart,
  ContentPart,
  ChatMessage,
  ToolDefinition,
  RequestParams,
} from './types.js';

// TTL
export { DEFAULT_TTL, DEFAULT_TTL_SECONDS, isValidTtl, parseTtlToSeconds, formatTtl, resolveRemoteExpiry } from './ttl.js';
export type { RemoteExpiry } from './ttl.js';

// Partitioning
export { isCacheableMessage, partitionMessages, extractTtlFromCachedMessages } from './message-partitioner.js';
export type { MessagePartition } from './message-partitioner.js';

// Keys
export { buildContentKey, buildScopeKey, serializeScopeKey, remoteScopeOf } from './scope-key.js';
export type { ScopeDimensions, ScopeKey, RemoteScope } from './scope-key.js';

// Local store
export { LocalCacheStore, DEFAULT_SAFETY_BUFFER_SECONDS } from './local-cache-store.js';
export type { CacheEntry, LocalCacheStats, LocalCacheStoreOptions } from './local-cache-store.js';

// Remote
export { buildCachedContentPayload, resolveModelPath } from './cached-content-payload.js';
export type { CachedContentPayload, GeminiContent, GeminiPart, BuildPayloadInput } from './cached-content-payload.js';
export type { RemoteCacheGateway, RemoteCacheEntry, RemoteCallOptions } from './remote-gateway.js';
export { HttpRemoteCacheGateway, isGoogleCacheProvider } from './http-remote-gateway.js';
export type { HttpRemoteCacheGatewayOptions, GoogleCacheProvider } from './http-remote-gateway.js';

// Orchestrator
export { ContextCacheOrchestrator, createContextCacheOrchestrator } from './orchestrator.js';
export type {
  ContextCacheRequest,
  CacheResolution,
  CacheOutcome,
  ContextCacheOrchestratorOptions,
  CreateContextCacheOptions,
} from './orchestrator.js';
