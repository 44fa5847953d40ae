/**
 * Message Partitioner
 *
 * Splits a request's messages into the cacheable block and the rest.
 * Only the first contiguous run of annotated messages is cached; annotated
 * messages after a gap are sent as ordinary content.
 */

import type { ChatMessage } from './types.js';
import { isValidTtl } from './ttl.js';

export interface MessagePartition {
  /** First contiguous run of annotated messages */
  cacheable: ChatMessage[];
  /** Everything else, in original order */
  remainder: ChatMessage[];
}

/**
 * True when any content part of the message carries an ephemeral cache annotation
 */
export function isCacheableMessage(message: ChatMessage): boolean {
  if (typeof message.content === 'string') {
    return false;
  }
  return message.content.some(part => part.cache_control?.type === 'ephemeral');
}

export function partitionMessages(messages: readonly ChatMessage[]): MessagePartition {
  const flagged: number[] = [];
  messages.forEach((message, index) => {
    if (isCacheableMessage(message)) {
      flagged.push(index);
    }
  });

  if (flagged.length === 0) {
    return { cacheable: [], remainder: [...messages] };
  }

  const start = flagged[0];
  let end = start;
  for (let i = 1; i < flagged.length; i++) {
    if (flagged[i] !== end + 1) break;
    end = flagged[i];
  }

  return {
    cacheable: messages.slice(start, end + 1),
    remainder: [...messages.slice(0, start), ...messages.slice(end + 1)],
  };
}

/**
 * First well-formed TTL annotation in the cacheable block, if any
 */
export function extractTtlFromCachedMessages(cacheable: readonly ChatMessage[]): string | undefined {
  for (const message of cacheable) {
    if (typeof message.content === 'string') continue;

    for (const part of message.content) {
      const ttl = part.cache_control?.ttl;
      if (isValidTtl(ttl)) {
        return ttl;
      }
    }
  }
  return undefined;
}
