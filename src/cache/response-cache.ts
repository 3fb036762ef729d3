/**
 * Response caching
 *
 * TTL + LRU cache for inference responses, keyed by a SHA-256 digest of the
 * request content.
 *
 * @module cache/response-cache
 */

import { createHash } from 'crypto';
import { cacheConfigSchema, parseConfig, type CacheConfigInput } from '../config/schema.js';
import { NoopLogger, type Logger } from '../observability/index.js';

/**
 * Cached value with bookkeeping. Never handed out by reference.
 */
interface CacheEntry<T> {
  value: T;
  createdAt: number;
  hitCount: number;
}

export interface CacheStats {
  readonly hits: number;
  readonly misses: number;
  readonly evictions: number;
  readonly size: number;
  readonly maxEntries: number;
  readonly ttlMs: number;
  /** hits as a percentage of lookups */
  readonly hitRate: number;
}

/**
 * Digest used as the storage key for a piece of content
 */
export function cacheKey(content: string): string {
  return createHash('sha256').update(content).digest('hex');
}

function copyOf<T>(value: T): T {
  return typeof value === 'object' && value !== null ? structuredClone(value) : value;
}

/**
 * Bounded, time-expiring cache with least-recently-used eviction
 *
 * The Map's iteration order is the recency order: the first key is the
 * least recently used, the last key the most recently used.
 */
export class ResponseCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly maxEntries: number;
  private readonly ttlMs: number;
  private isEnabled: boolean;
  private readonly logger: Logger;

  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(config: CacheConfigInput = {}, logger: Logger = new NoopLogger()) {
    const parsed = parseConfig(cacheConfigSchema, config, 'cache');
    this.maxEntries = parsed.maxEntries;
    this.ttlMs = parsed.ttlMs;
    this.isEnabled = parsed.enabled;
    this.logger = logger;

    this.logger.info('cache_initialized', {
      maxEntries: this.maxEntries,
      ttlMs: this.ttlMs,
      enabled: this.isEnabled,
    });
  }

  get enabled(): boolean {
    return this.isEnabled;
  }

  set enabled(value: boolean) {
    this.isEnabled = value;
    this.logger.info('cache_enabled_changed', { enabled: value });
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Look up the cached value for some content
   * @returns A copy of the value, or undefined when disabled, unknown or expired
   */
  get(content: string): T | undefined {
    if (!this.isEnabled) {
      return undefined;
    }

    const key = cacheKey(content);
    const entry = this.entries.get(key);

    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (this.isExpired(entry)) {
      this.entries.delete(key);
      this.misses++;
      this.logger.debug('cache_expired', { key: key.slice(0, 16) });
      return undefined;
    }

    this.hits++;
    entry.hitCount++;
    this.entries.delete(key);
    this.entries.set(key, entry);

    this.logger.debug('cache_hit', { key: key.slice(0, 16), entryHits: entry.hitCount });
    return copyOf(entry.value);
  }

  /**
   * Store a value for some content, evicting the least recently used entry when full
   */
  set(content: string, value: T): void {
    if (!this.isEnabled) {
      return;
    }

    const key = cacheKey(content);
    const entry: CacheEntry<T> = { value: copyOf(value), createdAt: Date.now(), hitCount: 0 };

    if (this.entries.has(key)) {
      this.entries.delete(key);
      this.entries.set(key, entry);
      return;
    }

    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.evictions++;
      this.logger.debug('cache_eviction', { evictedKey: oldest.value.slice(0, 16) });
    }

    this.entries.set(key, entry);
    this.logger.debug('cache_set', { key: key.slice(0, 16), size: this.entries.size });
  }

  /**
   * Whether an unexpired entry exists. Does not touch stats or recency.
   */
  has(content: string): boolean {
    const entry = this.entries.get(cacheKey(content));
    return entry !== undefined && !this.isExpired(entry);
  }

  /**
   * Remove one entry
   * @returns true if an entry was removed
   */
  invalidate(content: string): boolean {
    const key = cacheKey(content);
    const removed = this.entries.delete(key);
    if (removed) {
      this.logger.debug('cache_invalidated', { key: key.slice(0, 16) });
    }
    return removed;
  }

  /**
   * Remove every entry
   * @returns The number of entries removed
   */
  clear(): number {
    const count = this.entries.size;
    this.entries.clear();
    this.logger.info('cache_cleared', { entriesCleared: count });
    return count;
  }

  /**
   * Remove every expired entry
   * @returns The number of entries removed
   */
  cleanupExpired(): number {
    if (this.ttlMs === 0) {
      return 0;
    }

    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry)) {
        this.entries.delete(key);
        removed++;
      }
    }

    if (removed > 0) {
      this.logger.info('cache_cleanup', { entriesRemoved: removed });
    }
    return removed;
  }

  getStats(): CacheStats {
    const lookups = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      size: this.entries.size,
      maxEntries: this.maxEntries,
      ttlMs: this.ttlMs,
      hitRate: lookups > 0 ? (this.hits / lookups) * 100 : 0,
    };
  }

  /**
   * Reset hit, miss and eviction counters
   */
  resetStats(): void {
    this.hits = 0;
    this.misses = 0;
    this.evictions = 0;
    this.logger.info('cache_stats_reset');
  }

  private isExpired(entry: CacheEntry<T>): boolean {
    if (this.ttlMs === 0) {
      return false;
    }
    return Date.now() - entry.createdAt > this.ttlMs;
  }
}
