/**
 * Redis-backed result cache, shared by every process pointed at the same
 * server. Expiry is Redis's own (PX); first-writer-wins is SET NX.
 * Recency lives in a sorted set scored by last access; writes past
 * capacity evict its lowest members.
 */

import { Redis } from 'ioredis';
import { z } from 'zod';
import type { CacheStats } from '../../types/models.js';
import type { Row } from '../../types/utils.js';
import { logger } from '../../utils/logger.js';
import type { ResultCache, ResultCacheOptions } from './types.js';

/**
 * The handful of Redis commands the cache issues.
 */
export interface RedisClient {
  get(key: string): Promise<string | null>;
  /** SET key value PX ttlMs NX; resolves true when the key was written. */
  setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean>;
  keys(pattern: string): Promise<string[]>;
  del(keys: string[]): Promise<number>;
  zadd(key: string, score: number, member: string): Promise<void>;
  zcard(key: string): Promise<number>;
  /** Remove and return the `count` lowest-scored members. */
  zpopmin(key: string, count: number): Promise<string[]>;
  zrem(key: string, members: string[]): Promise<void>;
  quit(): Promise<void>;
}

const RowsSchema = z.array(
  z.record(z.union([z.string(), z.number(), z.boolean(), z.null()]))
);

/**
 * Connect to Redis with the same retry behaviour as the rest of the service.
 */
export function connectRedis(connectionString: string): RedisClient {
  // Lazy connect is handled by ioredis, but we set retry strategy
  const redis = new Redis(connectionString, {
    maxRetriesPerRequest: 3,
    retryStrategy(times: number) {
      if (times > 5) {
        logger.warn('Redis connection unstable. Retrying...');
        return 5000;
      }
      return Math.min(times * 50, 2000);
    },
  });

  redis.on('error', (err: Error) => {
    logger.error(`Redis Error: ${err.message}`);
  });

  redis.on('connect', () => {
    logger.info('Redis connected');
  });

  return {
    get: (key) => redis.get(key),
    setIfAbsent: async (key, value, ttlMs) => (await redis.set(key, value, 'PX', ttlMs, 'NX')) === 'OK',
    keys: (pattern) => redis.keys(pattern),
    del: (keys) => (keys.length > 0 ? redis.del(...keys) : Promise.resolve(0)),
    zadd: async (key, score, member) => {
      await redis.zadd(key, score, member);
    },
    zcard: (key) => redis.zcard(key),
    // ZPOPMIN replies member, score, member, score...
    zpopmin: async (key, count) => (await redis.zpopmin(key, count)).filter((_, i) => i % 2 === 0),
    zrem: async (key, members) => {
      if (members.length > 0) await redis.zrem(key, ...members);
    },
    quit: async () => {
      await redis.quit();
    },
  };
}

export class RedisResultCache implements ResultCache {
  private readonly PREFIX = 'verisql:result:';
  private readonly INDEX = 'verisql:lru';
  private hits = 0;
  private misses = 0;
  private readonly now: () => number;

  constructor(
    private readonly redis: RedisClient,
    private readonly options: ResultCacheOptions & { now?: () => number }
  ) {
    this.now = options.now ?? Date.now;
  }

  getType(): 'redis' {
    return 'redis';
  }

  private key(fingerprint: string): string {
    return `${this.PREFIX}${fingerprint}`;
  }

  async get(fingerprint: string): Promise<Row[] | undefined> {
    const data = await this.redis.get(this.key(fingerprint));
    if (data === null) {
      await this.redis.zrem(this.INDEX, [fingerprint]);
      this.misses++;
      return undefined;
    }

    let payload: unknown;
    try {
      payload = JSON.parse(data);
    } catch {
      payload = undefined;
    }

    const parsed = RowsSchema.safeParse(payload);
    if (!parsed.success) {
      logger.warn(`Discarding malformed cached result ${fingerprint.slice(0, 12)}`);
      await this.redis.del([this.key(fingerprint)]);
      await this.redis.zrem(this.INDEX, [fingerprint]);
      this.misses++;
      return undefined;
    }

    await this.redis.zadd(this.INDEX, this.now(), fingerprint);
    this.hits++;
    return parsed.data;
  }

  async setIfAbsent(fingerprint: string, rows: Row[]): Promise<boolean> {
    const written = await this.redis.setIfAbsent(this.key(fingerprint), JSON.stringify(rows), this.options.ttlMs);
    if (written) {
      await this.redis.zadd(this.INDEX, this.now(), fingerprint);
      await this.evictOverflow();
    }
    return written;
  }

  private async evictOverflow(): Promise<void> {
    const overflow = (await this.redis.zcard(this.INDEX)) - this.options.capacity;
    if (overflow <= 0) return;
    const victims = await this.redis.zpopmin(this.INDEX, overflow);
    await this.redis.del(victims.map((fingerprint) => this.key(fingerprint)));
    logger.debug(`Evicted ${victims.length} least recently used cached results`);
  }

  async flush(): Promise<number> {
    const keys = await this.redis.keys(`${this.PREFIX}*`);
    const flushed = await this.redis.del(keys);
    await this.redis.del([this.INDEX]);
    return flushed;
  }

  async getStats(): Promise<CacheStats> {
    const keys = await this.redis.keys(`${this.PREFIX}*`);
    const lookups = this.hits + this.misses;
    return {
      backend: 'redis',
      size: keys.length,
      capacity: this.options.capacity,
      hits: this.hits,
      misses: this.misses,
      hitRate: lookups > 0 ? this.hits / lookups : 0,
      ttlMs: this.options.ttlMs,
    };
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}
