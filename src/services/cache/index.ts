/**
 * Result cache factory.
 *
 * Uses Redis when a connection string is configured, otherwise an
 * in-process cache.
 */

import { logger } from '../../utils/logger.js';
import type { ResultCache, ResultCacheOptions } from './types.js';
import { MemoryResultCache } from './memory.js';
import { RedisResultCache, connectRedis } from './redis.js';

export function createResultCache(
  options: ResultCacheOptions & { redisUrl?: string }
): ResultCache {
  if (options.redisUrl) {
    logger.info('REDIS_URL detected. Using the shared Redis result cache.');
    return new RedisResultCache(connectRedis(options.redisUrl), options);
  }

  logger.info('No REDIS_URL found. Using the in-memory result cache.');
  return new MemoryResultCache(options);
}

export type { ResultCache, ResultCacheOptions } from './types.js';
export { MemoryResultCache } from './memory.js';
export { RedisResultCache } from './redis.js';
export type { RedisClient } from './redis.js';
