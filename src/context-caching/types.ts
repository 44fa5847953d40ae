/**
 * Context Caching Types
 *
 * Message shapes accepted by the caching layer. Messages follow the
 * chat-completions layout; a content part opts into caching through its
 * `cache_control` annotation.
 */

// ============================================================================
// Messages
// ============================================================================

export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

/**
 * Cache annotation carried by a content part
 */
export interface CacheControl {
  type: 'ephemeral';
  /** Requested lifetime, e.g. "3600s" */
  ttl?: string;
}

export interface TextPart {
  type: 'text';
  text: string;
  cache_control?: CacheControl;
}

export interface ImagePart {
  type: 'image_url';
  image_url: { url: string; detail?: 'auto' | 'low' | 'high' };
  cache_control?: CacheControl;
}

export type ContentPart = TextPart | ImagePart;

export interface ChatMessage {
  role: MessageRole;
  content: string | ContentPart[];
  name?: string;
  tool_call_id?: string;
}

// ============================================================================
// Request parameters
// ============================================================================

/**
 * Tool declaration, already in the target provider's wire format
 */
export type ToolDefinition = Record<string, unknown>;

/**
 * Optional provider parameters travelling with a request
 */
export type RequestParams = {
  tools?: ToolDefinition[];
} & Record<string, unknown>;
