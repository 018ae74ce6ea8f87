/**
 * Decoded-message cache keyed by (marked chat id, message id).
 *
 * In-memory and bounded: once `capacity` is reached the least recently used
 * entry is evicted. A Map keeps insertion order, so re-inserting on access is
 * enough to track recency.
 */

import { config } from '../utils/config.js';
import type { Message } from './message.js';

export interface MessageCache {
  get(chatId: number, messageId: number): Message | undefined;
  put(chatId: number, messageId: number, message: Message): void;
}

export interface LruMessageCache extends MessageCache {
  readonly size: number;
  clear(): void;
}

function cacheKey(chatId: number, messageId: number): string {
  return `${chatId}:${messageId}`;
}

export function createMessageCache(capacity: number = config.MESSAGE_CACHE_SIZE): LruMessageCache {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new RangeError(`Message cache capacity must be a positive integer, got ${capacity}`);
  }

  const entries = new Map<string, Message>();

  return {
    get size() {
      return entries.size;
    },

    get(chatId, messageId) {
      const key = cacheKey(chatId, messageId);
      const message = entries.get(key);
      if (message === undefined) return undefined;
      entries.delete(key);
      entries.set(key, message);
      return message;
    },

    put(chatId, messageId, message) {
      const key = cacheKey(chatId, messageId);
      entries.delete(key);
      if (entries.size >= capacity) {
        const oldest = entries.keys().next();
        if (!oldest.done) entries.delete(oldest.value);
      }
      entries.set(key, message);
    },

    clear() {
      entries.clear();
    },
  };
}
