/**
 * Cached-content payload
 *
 * Converts the cacheable block into the body of a `cachedContents` create
 * call: system messages become the system instruction, the rest become
 * contents. The content key doubles as the display name, which is what a
 * later lookup matches on.
 */

import type { ChatMessage, ContentPart, ToolDefinition } from './types.js';
import type { RemoteScope } from './scope-key.js';
import { extractTtlFromCachedMessages } from './message-partitioner.js';

// ============================================================================
// Types
// ============================================================================

export type GeminiPart =
  | { text: string }
  | { inlineData: { mimeType: string; data: string } }
  | { fileData: { mimeType: string; fileUri: string } }
  | { functionResponse: { name: string; response: { content: string } } };

export interface GeminiContent {
  role: 'user' | 'model';
  parts: GeminiPart[];
}

export interface CachedContentPayload {
  model: string;
  displayName: string;
  contents: GeminiContent[];
  systemInstruction?: { parts: GeminiPart[] };
  tools?: ToolDefinition[];
  ttl?: string;
}

export interface BuildPayloadInput {
  model: string;
  cacheable: readonly ChatMessage[];
  contentKey: string;
  scope: RemoteScope;
  tools?: readonly ToolDefinition[];
  /** Used when no message carries a TTL annotation */
  defaultTtl?: string;
}

// ============================================================================
// Parts
// ============================================================================

const DATA_URL = /^data:([^;,]+);base64,(.*)$/s;

const MIME_BY_EXTENSION: Record<string, string> = {
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  gif: 'image/gif',
  webp: 'image/webp',
  pdf: 'application/pdf',
};

function guessMimeType(uri: string): string {
  const path = uri.split(/[?#]/)[0];
  const extension = path.slice(path.lastIndexOf('.') + 1).toLowerCase();
  return MIME_BY_EXTENSION[extension] ?? 'application/octet-stream';
}

function toGeminiPart(part: ContentPart): GeminiPart {
  if (part.type === 'text') {
    return { text: part.text };
  }

  const url = part.image_url.url;
  const inline = DATA_URL.exec(url);
  if (inline) {
    return { inlineData: { mimeType: inline[1], data: inline[2] } };
  }
  return { fileData: { mimeType: guessMimeType(url), fileUri: url } };
}

function toGeminiParts(content: ChatMessage['content']): GeminiPart[] {
  if (typeof content === 'string') {
    return [{ text: content }];
  }
  return content.map(toGeminiPart);
}

function textOf(content: ChatMessage['content']): string {
  if (typeof content === 'string') return content;
  return content
    .filter((part): part is Extract<ContentPart, { type: 'text' }> => part.type === 'text')
    .map(part => part.text)
    .join('\n');
}

// ============================================================================
// Model path
// ============================================================================

/**
 * Fully qualified model resource name for the scope's provider
 */
export function resolveModelPath(model: string, scope: RemoteScope): string {
  if (model.startsWith('projects/') || model.startsWith('models/')) {
    return model;
  }

  const isVertex = scope.provider === 'vertex_ai' || scope.provider === 'vertex_ai_beta';
  if (isVertex && scope.tenant && scope.region) {
    return `projects/${scope.tenant}/locations/${scope.region}/publishers/google/models/${model}`;
  }
  return `models/${model}`;
}

// ============================================================================
// Payload
// ============================================================================

export function buildCachedContentPayload(input: BuildPayloadInput): CachedContentPayload {
  const systemParts: GeminiPart[] = [];
  const contents: GeminiContent[] = [];

  for (const message of input.cacheable) {
    switch (message.role) {
      case 'system':
        systemParts.push(...toGeminiParts(message.content));
        break;
      case 'user':
        contents.push({ role: 'user', parts: toGeminiParts(message.content) });
        break;
      case 'assistant':
        contents.push({ role: 'model', parts: toGeminiParts(message.content) });
        break;
      case 'tool':
        contents.push({
          role: 'user',
          parts: [
            {
              functionResponse: {
                name: message.name ?? message.tool_call_id ?? 'tool',
                response: { content: textOf(message.content) },
              },
            },
          ],
        });
        break;
    }
  }

  const payload: CachedContentPayload = {
    model: resolveModelPath(input.model, input.scope),
    displayName: input.contentKey,
    contents,
  };

  if (systemParts.length > 0) {
    payload.systemInstruction = { parts: systemParts };
  }

  if (input.tools && input.tools.length > 0) {
    payload.tools = [...input.tools];
  }

  const ttl = extractTtlFromCachedMessages(input.cacheable) ?? input.defaultTtl;
  if (ttl) {
    payload.ttl = ttl;
  }

  return payload;
}
