/**
 * In-process result cache with TTL expiry and LRU eviction.
 * Default backend when no REDIS_URL is configured.
 */

import type { CacheStats } from '../../types/models.js';
import type { Row } from '../../types/utils.js';
import { logger } from '../../utils/logger.js';
import type { ResultCache, ResultCacheOptions } from './types.js';

interface Entry {
  rows: Row[];
  createdAt: number;
}

export class MemoryResultCache implements ResultCache {
  private entries = new Map<string, Entry>();
  private accessOrder = new Map<string, number>();
  private accessCounter = 0;
  private hits = 0;
  private misses = 0;
  private readonly ttlMs: number;
  private readonly capacity: number;
  private readonly now: () => number;

  constructor(options: ResultCacheOptions & { now?: () => number }) {
    this.ttlMs = options.ttlMs;
    this.capacity = options.capacity;
    this.now = options.now ?? Date.now;
  }

  getType(): 'memory' {
    return 'memory';
  }

  async get(fingerprint: string): Promise<Row[] | undefined> {
    const entry = this.live(fingerprint);
    if (!entry) {
      this.misses++;
      return undefined;
    }
    this.accessOrder.set(fingerprint, ++this.accessCounter);
    this.hits++;
    // Callers may not mutate shared rows.
    return structuredClone(entry.rows);
  }

  async setIfAbsent(fingerprint: string, rows: Row[]): Promise<boolean> {
    if (this.live(fingerprint)) return false;

    if (this.entries.size >= this.capacity) {
      this.purgeExpired();
    }
    if (this.entries.size >= this.capacity) {
      this.evictLRU();
    }

    this.entries.set(fingerprint, { rows: structuredClone(rows), createdAt: this.now() });
    this.accessOrder.set(fingerprint, ++this.accessCounter);
    return true;
  }

  async flush(): Promise<number> {
    const removed = this.entries.size;
    this.entries.clear();
    this.accessOrder.clear();
    this.accessCounter = 0;
    logger.debug(`[Memory] Flushed ${removed} cached results`);
    return removed;
  }

  async getStats(): Promise<CacheStats> {
    this.purgeExpired();
    const lookups = this.hits + this.misses;
    return {
      backend: 'memory',
      size: this.entries.size,
      capacity: this.capacity,
      hits: this.hits,
      misses: this.misses,
      hitRate: lookups > 0 ? this.hits / lookups : 0,
      ttlMs: this.ttlMs,
    };
  }

  async close(): Promise<void> {
    this.entries.clear();
    this.accessOrder.clear();
  }

  private live(fingerprint: string): Entry | undefined {
    const entry = this.entries.get(fingerprint);
    if (!entry) return undefined;
    if (this.now() - entry.createdAt > this.ttlMs) {
      this.entries.delete(fingerprint);
      this.accessOrder.delete(fingerprint);
      return undefined;
    }
    return entry;
  }

  private purgeExpired(): void {
    for (const key of [...this.entries.keys()]) {
      this.live(key);
    }
  }

  /**
   * Evict least recently used entry
   */
  private evictLRU(): void {
    let oldestKey: string | null = null;
    let oldestAccess = Infinity;

    for (const [key, accessTime] of this.accessOrder.entries()) {
      if (accessTime < oldestAccess) {
        oldestAccess = accessTime;
        oldestKey = key;
      }
    }

    if (oldestKey) {
      this.entries.delete(oldestKey);
      this.accessOrder.delete(oldestKey);
      logger.debug(`[Memory] Evicted cached result: ${oldestKey.slice(0, 12)}`);
    }
  }
}
