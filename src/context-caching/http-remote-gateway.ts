/**
 * HTTP Remote Cache Gateway
 *
 * RemoteCacheGateway over the Google `cachedContents` REST resource, for both
 * AI Studio (`gemini`) and Vertex AI (`vertex_ai`, `vertex_ai_beta`).
 * Credentials are supplied by the caller: an API key for AI Studio, an
 * access-token callback for Vertex AI.
 */

import type { RemoteScope } from './scope-key.js';
import type { CachedContentPayload } from './cached-content-payload.js';
import type { RemoteCacheEntry, RemoteCacheGateway, RemoteCallOptions } from './remote-gateway.js';
import {
  RemoteCacheError,
  RemoteCachePermissionError,
  RemoteCacheTimeoutError,
} from '../errors/remote-cache-error.js';
import { logger } from '../utils/logger.js';

// ============================================================================
// Types
// ============================================================================

export type GoogleCacheProvider = 'gemini' | 'vertex_ai' | 'vertex_ai_beta';

export interface HttpRemoteCacheGatewayOptions {
  /** AI Studio API key */
  apiKey?: string;
  /** Vertex AI OAuth access token source */
  getAccessToken?: () => Promise<string>;
  /** Replaces the service host, e.g. a proxy in front of the API */
  apiBase?: string;
  /** Timeout applied when the call does not specify one (default: 30000) */
  defaultTimeoutMs?: number;
  extraHeaders?: Record<string, string>;
}

interface CachedContentResource {
  name?: string;
  displayName?: string;
  expireTime?: string;
}

interface CachedContentList {
  cachedContents: CachedContentResource[];
  nextPageToken?: string;
}

const GEMINI_BASE_URL = 'https://generativelanguage.googleapis.com';
const VERTEX_GLOBAL_BASE_URL = 'https://aiplatform.googleapis.com';
const DEFAULT_TIMEOUT_MS = 30000;

export function isGoogleCacheProvider(provider: string): provider is GoogleCacheProvider {
  return provider === 'gemini' || provider === 'vertex_ai' || provider === 'vertex_ai_beta';
}

// ============================================================================
// Response parsing
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function readCachedContent(value: unknown): CachedContentResource {
  if (!isRecord(value)) return {};
  return {
    name: optionalString(value.name),
    displayName: optionalString(value.displayName),
    expireTime: optionalString(value.expireTime),
  };
}

function readCachedContentList(value: unknown): CachedContentList {
  if (!isRecord(value) || !Array.isArray(value.cachedContents)) {
    return { cachedContents: [], nextPageToken: isRecord(value) ? optionalString(value.nextPageToken) : undefined };
  }
  return {
    cachedContents: value.cachedContents.map(readCachedContent),
    nextPageToken: optionalString(value.nextPageToken) || undefined,
  };
}

// ============================================================================
// Request signal
// ============================================================================

interface RequestSignal {
  signal: AbortSignal;
  timedOut: () => boolean;
  dispose: () => void;
}

/**
 * Abort signal that fires on timeout or when the caller's signal fires
 */
function createRequestSignal(timeoutMs: number, external?: AbortSignal): RequestSignal {
  const controller = new AbortController();
  let didTimeOut = false;

  const timer = setTimeout(() => {
    didTimeOut = true;
    controller.abort();
  }, timeoutMs);

  const onAbort = (): void => controller.abort();
  if (external) {
    if (external.aborted) {
      controller.abort();
    } else {
      external.addEventListener('abort', onAbort, { once: true });
    }
  }

  return {
    signal: controller.signal,
    timedOut: () => didTimeOut,
    dispose: () => {
      clearTimeout(timer);
      external?.removeEventListener('abort', onAbort);
    },
  };
}

// ============================================================================
// Gateway
// ============================================================================

export class HttpRemoteCacheGateway implements RemoteCacheGateway {
  private readonly defaultTimeoutMs: number;

  constructor(private readonly options: HttpRemoteCacheGatewayOptions = {}) {
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * Collection URL for the scope's cached contents
   */
  resolveEndpoint(scope: RemoteScope): string {
    const provider = scope.provider;
    if (!isGoogleCacheProvider(provider)) {
      throw new RemoteCacheError(`Unsupported context caching provider: ${provider}`);
    }

    if (provider === 'gemini') {
      const base = this.options.apiBase ?? GEMINI_BASE_URL;
      return `${trimSlash(base)}/v1beta/cachedContents`;
    }

    if (!scope.tenant || !scope.region) {
      throw new RemoteCacheError('Vertex AI context caching requires a project and a location', {
        context: { provider },
      });
    }

    const version = provider === 'vertex_ai_beta' ? 'v1beta1' : 'v1';
    const host =
      scope.region === 'global' ? VERTEX_GLOBAL_BASE_URL : `https://${scope.region}-aiplatform.googleapis.com`;
    const base = this.options.apiBase ?? host;
    return `${trimSlash(base)}/${version}/projects/${scope.tenant}/locations/${scope.region}/cachedContents`;
  }

  async lookupByName(
    scope: RemoteScope,
    contentKey: string,
    options: RemoteCallOptions = {}
  ): Promise<RemoteCacheEntry | null> {
    const endpoint = this.resolveEndpoint(scope);
    const headers = await this.buildHeaders(scope);
    let pageToken: string | undefined;

    do {
      const url = pageToken ? `${endpoint}?pageToken=${encodeURIComponent(pageToken)}` : endpoint;
      const list = readCachedContentList(await this.send('GET', url, headers, undefined, options));

      for (const item of list.cachedContents) {
        if (item.displayName === contentKey && item.name) {
          return { remoteHandle: item.name, expireTime: item.expireTime };
        }
      }

      pageToken = list.nextPageToken;
    } while (pageToken);

    return null;
  }

  async create(
    scope: RemoteScope,
    payload: CachedContentPayload,
    options: RemoteCallOptions = {}
  ): Promise<RemoteCacheEntry> {
    const endpoint = this.resolveEndpoint(scope);
    const headers = await this.buildHeaders(scope);
    const created = readCachedContent(await this.send('POST', endpoint, headers, JSON.stringify(payload), options));

    if (!created.name) {
      throw new RemoteCacheError('Remote cache service returned no cached content name', {
        statusCode: 502,
        endpoint,
      });
    }

    logger.debug('Created remote cached content', { remoteHandle: created.name, expireTime: created.expireTime });
    return { remoteHandle: created.name, expireTime: created.expireTime };
  }

  private async buildHeaders(scope: RemoteScope): Promise<Record<string, string>> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      ...this.options.extraHeaders,
    };

    if (scope.provider === 'gemini') {
      if (!this.options.apiKey) {
        throw new RemoteCacheError('An API key is required for AI Studio context caching');
      }
      headers['x-goog-api-key'] = this.options.apiKey;
    } else if (this.options.getAccessToken) {
      headers['Authorization'] = `Bearer ${await this.options.getAccessToken()}`;
    }

    return headers;
  }

  private async send(
    method: 'GET' | 'POST',
    url: string,
    headers: Record<string, string>,
    body: string | undefined,
    options: RemoteCallOptions
  ): Promise<unknown> {
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const request = createRequestSignal(timeoutMs, options.signal);

    try {
      let response: Response;
      try {
        response = await fetch(url, { method, headers, body, signal: request.signal });
      } catch (error) {
        throw this.toTransportError(error, request, timeoutMs, url, options.signal);
      }

      if (!response.ok) {
        const text = await response.text();
        if (response.status === 403) {
          throw new RemoteCachePermissionError(text || 'Permission denied by remote cache service', url);
        }
        throw new RemoteCacheError(text || `Remote cache request failed with status ${response.status}`, {
          statusCode: response.status,
          endpoint: url,
        });
      }

      try {
        return await response.json();
      } catch (error) {
        throw this.toTransportError(error, request, timeoutMs, url, options.signal);
      }
    } finally {
      request.dispose();
    }
  }

  private toTransportError(
    error: unknown,
    request: RequestSignal,
    timeoutMs: number,
    url: string,
    external?: AbortSignal
  ): RemoteCacheError {
    if (request.timedOut()) {
      return new RemoteCacheTimeoutError(timeoutMs, url);
    }
    if (external?.aborted) {
      return new RemoteCacheError('Remote cache request was cancelled', { cause: error, endpoint: url });
    }
    const message = error instanceof Error ? error.message : String(error);
    return new RemoteCacheError(`Remote cache request failed: ${message}`, {
      statusCode: 500,
      cause: error,
      endpoint: url,
    });
  }
}

function trimSlash(url: string): string {
  return url.endsWith('/') ? url.slice(0, -1) : url;
}
