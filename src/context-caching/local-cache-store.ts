/**
 * Local Cache Store
 *
 * Process-local map from scope key to remote cache handle, with TTL expiry.
 * Avoids a list call to the remote service on every request once a handle
 * is known.
 *
 * Every operation is synchronous: on the Node event loop each call runs to
 * completion before another request can touch the map, so no caller sees a
 * half-written entry. Entries are replaced whole, never patched.
 *
 * Lifecycle: create one store at service startup, share it across requests,
 * call dispose() at shutdown. Contents do not survive a restart.
 */

import { EventEmitter } from 'events';
import { logger } from '../utils/logger.js';
import { serializeScopeKey, type ScopeKey } from './scope-key.js';

// ============================================================================
// Types
// ============================================================================

export interface CacheEntry {
  readonly remoteHandle: string;
  /** Epoch milliseconds */
  readonly createdAt: number;
  /** Lifetime after the safety buffer was applied */
  readonly ttlSeconds: number;
  /** Epoch milliseconds */
  readonly expiresAt: number;
}

export interface LocalCacheStats {
  totalEntries: number;
  validEntries: number;
  expiredEntries: number;
  keys: string[];
}

export interface LocalCacheStoreOptions {
  /** Seconds shaved off every TTL so the local view never outlives the remote entry (default: 5) */
  safetyBufferSeconds?: number;
  /** Interval for background pruning of expired entries; 0 disables it (default: 0) */
  cleanupIntervalMs?: number;
  /** Clock in epoch milliseconds */
  now?: () => number;
}

export const DEFAULT_SAFETY_BUFFER_SECONDS = 5;

// ============================================================================
// Store
// ============================================================================

export class LocalCacheStore extends EventEmitter {
  private readonly entries: Map<string, CacheEntry> = new Map();
  private readonly safetyBufferSeconds: number;
  private readonly cleanupIntervalMs: number;
  private readonly now: () => number;
  private cleanupTimer: ReturnType<typeof setInterval> | null = null;

  constructor(options: LocalCacheStoreOptions = {}) {
    super();
    this.safetyBufferSeconds = Math.max(0, options.safetyBufferSeconds ?? DEFAULT_SAFETY_BUFFER_SECONDS);
    this.cleanupIntervalMs = Math.max(0, options.cleanupIntervalMs ?? 0);
    this.now = options.now ?? Date.now;
  }

  /**
   * Handle for the key if present and unexpired. A stale entry is removed.
   */
  get(key: ScopeKey): string | null {
    const id = serializeScopeKey(key);
    const entry = this.entries.get(id);

    if (!entry) {
      return null;
    }

    if (this.now() >= entry.expiresAt) {
      this.entries.delete(id);
      this.emit('entry:expired', { key: id, remoteHandle: entry.remoteHandle });
      return null;
    }

    return entry.remoteHandle;
  }

  has(key: ScopeKey): boolean {
    return this.get(key) !== null;
  }

  /**
   * Store or replace the handle for a key
   */
  set(key: ScopeKey, remoteHandle: string, ttlSeconds: number): CacheEntry {
    const id = serializeScopeKey(key);
    const requested = Number.isFinite(ttlSeconds) ? ttlSeconds : 0;
    const adjustedTtl = Math.max(0, requested - this.safetyBufferSeconds);
    const createdAt = this.now();

    const entry: CacheEntry = Object.freeze({
      remoteHandle,
      createdAt,
      ttlSeconds: adjustedTtl,
      expiresAt: createdAt + adjustedTtl * 1000,
    });

    this.entries.set(id, entry);
    this.emit('entry:set', { key: id, remoteHandle, ttlSeconds: adjustedTtl });
    return entry;
  }

  /**
   * Remove one entry. Returns whether anything was removed.
   */
  invalidate(key: ScopeKey): boolean {
    const id = serializeScopeKey(key);
    const removed = this.entries.delete(id);
    if (removed) {
      this.emit('entry:invalidated', { key: id });
    }
    return removed;
  }

  clearAll(): void {
    const count = this.entries.size;
    this.entries.clear();
    this.emit('cleared', { count });
  }

  /**
   * Remove every expired entry
   * @returns number of entries removed
   */
  cleanupExpired(): number {
    const now = this.now();
    let removed = 0;

    for (const [id, entry] of this.entries) {
      if (now >= entry.expiresAt) {
        this.entries.delete(id);
        this.emit('entry:expired', { key: id, remoteHandle: entry.remoteHandle });
        removed++;
      }
    }

    return removed;
  }

  /**
   * Read-only snapshot; does not prune
   */
  stats(): LocalCacheStats {
    const now = this.now();
    let expired = 0;
    for (const entry of this.entries.values()) {
      if (now >= entry.expiresAt) expired++;
    }

    return {
      totalEntries: this.entries.size,
      validEntries: this.entries.size - expired,
      expiredEntries: expired,
      keys: [...this.entries.keys()],
    };
  }

  /**
   * Raw entry lookup without expiry handling
   */
  peek(key: ScopeKey): CacheEntry | undefined {
    return this.entries.get(serializeScopeKey(key));
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Start background pruning if an interval is configured
   */
  startCleanup(): void {
    if (this.cleanupTimer || this.cleanupIntervalMs === 0) return;

    this.cleanupTimer = setInterval(() => {
      const removed = this.cleanupExpired();
      if (removed > 0) {
        logger.debug('Pruned expired context cache entries', { removed });
      }
    }, this.cleanupIntervalMs);
    this.cleanupTimer.unref();
  }

  stopCleanup(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
  }

  dispose(): void {
    this.stopCleanup();
    this.entries.clear();
    this.removeAllListeners();
  }
}
