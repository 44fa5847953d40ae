/**
 * Scope Key Builder
 *
 * A cache entry is addressed by the hash of its content plus the tenant
 * dimensions it lives under (provider, account/project, region). The same
 * prompt prefix cached for two projects must resolve to two entries, since a
 * remote handle is only valid inside the namespace that created it.
 */

import { createHash } from 'crypto';
import type { ChatMessage, ToolDefinition } from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface ScopeDimensions {
  provider: string;
  /** Account or project that owns the remote cache */
  tenant?: string | null;
  /** Region / location of the remote cache */
  region?: string | null;
}

/**
 * Fully resolved cache address. Dimensions that do not apply to the
 * provider are null.
 */
export interface ScopeKey {
  readonly provider: string;
  readonly tenant: string | null;
  readonly region: string | null;
  readonly contentKey: string;
}

export type RemoteScope = Omit<ScopeKey, 'contentKey'>;

interface ScopePolicy {
  tenant: boolean;
  region: boolean;
}

const SCOPE_KEY_VERSION = 'v1';

/**
 * Which dimensions each provider's cache namespace depends on.
 * AI Studio serves every region from one global endpoint.
 */
const SCOPE_POLICIES: Partial<Record<string, ScopePolicy>> = {
  gemini: { tenant: true, region: false },
  vertex_ai: { tenant: true, region: true },
  vertex_ai_beta: { tenant: true, region: true },
};

const DEFAULT_SCOPE_POLICY: ScopePolicy = { tenant: true, region: true };

// ============================================================================
// Content key
// ============================================================================

/**
 * JSON with object keys sorted recursively; array order is kept, so
 * reordering messages or tools yields a different string.
 */
function canonicalJson(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }

  if (Array.isArray(value)) {
    return `[${value.map(item => (item === undefined ? 'null' : canonicalJson(item))).join(',')}]`;
  }

  const entries = Object.entries(value)
    .filter(([, item]) => item !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

  return `{${entries.map(([key, item]) => `${JSON.stringify(key)}:${canonicalJson(item)}`).join(',')}}`;
}

/**
 * SHA-256 over the cacheable block and the tool declarations sent with it
 */
export function buildContentKey(
  cacheable: readonly ChatMessage[],
  tools?: readonly ToolDefinition[] | null
): string {
  const payload = canonicalJson({ messages: cacheable, tools: tools ?? null });
  return createHash('sha256').update(payload).digest('hex');
}

// ============================================================================
// Scope key
// ============================================================================

// Values are kept verbatim: ' acme ' and 'acme' are different namespaces
function dimensionOf(value: string | null | undefined): string | null {
  return value ?? null;
}

export function buildScopeKey(contentKey: string, dimensions: ScopeDimensions): ScopeKey {
  const policy = SCOPE_POLICIES[dimensions.provider] ?? DEFAULT_SCOPE_POLICY;

  return Object.freeze({
    provider: dimensions.provider,
    tenant: policy.tenant ? dimensionOf(dimensions.tenant) : null,
    region: policy.region ? dimensionOf(dimensions.region) : null,
    contentKey,
  });
}

/**
 * Fixed-shape string form used as the local store's map key
 */
export function serializeScopeKey(key: ScopeKey): string {
  return JSON.stringify([SCOPE_KEY_VERSION, key.provider, key.tenant, key.region, key.contentKey]);
}

export function remoteScopeOf(key: ScopeKey): RemoteScope {
  return { provider: key.provider, tenant: key.tenant, region: key.region };
}
