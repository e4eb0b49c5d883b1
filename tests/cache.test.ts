import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryResultCache, RedisResultCache, type RedisClient } from '../src/services/cache/index.js';

describe('MemoryResultCache', () => {
  let clock: number;
  let cache: MemoryResultCache;

  beforeEach(() => {
    clock = 1_000;
    cache = new MemoryResultCache({ ttlMs: 100, capacity: 2, now: () => clock });
  });

  it('keeps the first rows written under a fingerprint', async () => {
    expect(await cache.setIfAbsent('a', [{ n: 1 }])).toBe(true);
    expect(await cache.setIfAbsent('a', [{ n: 2 }])).toBe(false);
    expect(await cache.get('a')).toEqual([{ n: 1 }]);
  });

  it('expires entries after the TTL', async () => {
    await cache.setIfAbsent('a', [{ n: 1 }]);
    clock += 101;
    expect(await cache.get('a')).toBeUndefined();
    expect(await cache.setIfAbsent('a', [{ n: 2 }])).toBe(true);
  });

  it('evicts the least recently used entry at capacity', async () => {
    await cache.setIfAbsent('a', [{ n: 1 }]);
    await cache.setIfAbsent('b', [{ n: 2 }]);
    await cache.get('a');
    await cache.setIfAbsent('c', [{ n: 3 }]);

    expect(await cache.get('b')).toBeUndefined();
    expect(await cache.get('a')).toEqual([{ n: 1 }]);
    expect(await cache.get('c')).toEqual([{ n: 3 }]);
  });

  it('hands out copies of the stored rows', async () => {
    await cache.setIfAbsent('a', [{ n: 1 }]);
    const rows = await cache.get('a');
    if (rows) rows[0].n = 99;
    expect(await cache.get('a')).toEqual([{ n: 1 }]);
  });

  it('counts hits and misses and flushes everything', async () => {
    await cache.setIfAbsent('a', [{ n: 1 }]);
    await cache.get('a');
    await cache.get('missing');

    expect(await cache.getStats()).toEqual({
      backend: 'memory',
      size: 1,
      capacity: 2,
      hits: 1,
      misses: 1,
      hitRate: 0.5,
      ttlMs: 100,
    });
    expect(await cache.flush()).toBe(1);
    expect(await cache.get('a')).toBeUndefined();
  });
});

/**
 * In-process stand-in for the handful of Redis commands the cache uses.
 */
class FakeRedis implements RedisClient {
  readonly store = new Map<string, string>();
  readonly ttls = new Map<string, number>();
  readonly sorted = new Map<string, Map<string, number>>();
  quitCalled = false;

  async get(key: string): Promise<string | null> {
    return this.store.get(key) ?? null;
  }

  async setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean> {
    if (this.store.has(key)) return false;
    this.store.set(key, value);
    this.ttls.set(key, ttlMs);
    return true;
  }

  async keys(pattern: string): Promise<string[]> {
    const prefix = pattern.replace(/\*$/, '');
    return [...this.store.keys()].filter((k) => k.startsWith(prefix));
  }

  async del(keys: string[]): Promise<number> {
    let removed = 0;
    for (const key of keys) {
      if (this.store.delete(key) || this.sorted.delete(key)) removed++;
    }
    return removed;
  }

  private zset(key: string): Map<string, number> {
    let members = this.sorted.get(key);
    if (!members) {
      members = new Map();
      this.sorted.set(key, members);
    }
    return members;
  }

  async zadd(key: string, score: number, member: string): Promise<void> {
    this.zset(key).set(member, score);
  }

  async zcard(key: string): Promise<number> {
    return this.sorted.get(key)?.size ?? 0;
  }

  async zpopmin(key: string, count: number): Promise<string[]> {
    const members = this.zset(key);
    const lowest = [...members.entries()]
      .sort((a, b) => a[1] - b[1] || a[0].localeCompare(b[0]))
      .slice(0, count)
      .map(([member]) => member);
    for (const member of lowest) members.delete(member);
    return lowest;
  }

  async zrem(key: string, members: string[]): Promise<void> {
    for (const member of members) this.sorted.get(key)?.delete(member);
  }

  async quit(): Promise<void> {
    this.quitCalled = true;
  }
}

describe('RedisResultCache', () => {
  let clock: number;
  let redis: FakeRedis;
  let cache: RedisResultCache;

  beforeEach(() => {
    clock = 1_000;
    redis = new FakeRedis();
    cache = new RedisResultCache(redis, { ttlMs: 60_000, capacity: 500, now: () => clock++ });
  });

  it('stores rows under a prefixed key with the TTL', async () => {
    expect(await cache.setIfAbsent('abc', [{ total: 3 }])).toBe(true);
    expect(redis.store.get('verisql:result:abc')).toBe('[{"total":3}]');
    expect(redis.ttls.get('verisql:result:abc')).toBe(60_000);
    expect(await cache.setIfAbsent('abc', [{ total: 4 }])).toBe(false);
    expect(await cache.get('abc')).toEqual([{ total: 3 }]);
  });

  it('evicts the least recently used entry past capacity', async () => {
    const small = new RedisResultCache(redis, { ttlMs: 60_000, capacity: 2, now: () => clock++ });
    await small.setIfAbsent('a', [{ n: 1 }]);
    await small.setIfAbsent('b', [{ n: 2 }]);
    await small.get('a');
    await small.setIfAbsent('c', [{ n: 3 }]);

    expect(redis.store.has('verisql:result:b')).toBe(false);
    expect([...redis.store.keys()].sort()).toEqual(['verisql:result:a', 'verisql:result:c']);
    expect(await redis.zcard('verisql:lru')).toBe(2);
    expect(await small.get('a')).toEqual([{ n: 1 }]);
  });

  it('drops malformed entries', async () => {
    redis.store.set('verisql:result:bad', '{"not":"rows"}');

    expect(await cache.get('bad')).toBeUndefined();
    expect(redis.store.has('verisql:result:bad')).toBe(false);
  });

  it('flushes only its own keys', async () => {
    redis.store.set('other:key', 'x');
    await cache.setIfAbsent('a', []);
    await cache.setIfAbsent('b', []);

    expect(await cache.flush()).toBe(2);
    expect([...redis.store.keys()]).toEqual(['other:key']);
    expect(redis.sorted.has('verisql:lru')).toBe(false);
  });

  it('reports stats and closes the client', async () => {
    await cache.setIfAbsent('a', [{ n: 1 }]);
    await cache.get('a');
    await cache.get('b');

    expect(await cache.getStats()).toEqual({
      backend: 'redis',
      size: 1,
      capacity: 500,
      hits: 1,
      misses: 1,
      hitRate: 0.5,
      ttlMs: 60_000,
    });
    await cache.close();
    expect(redis.quitCalled).toBe(true);
  });
});
