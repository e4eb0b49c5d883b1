/**
 * Utility endpoints (cache control, stats, health).
 */

import type { FastifyPluginAsync } from 'fastify';
import { describeError } from '../types/errors.js';
import type { RouteOptions } from './query.js';

export const utilityRoutes: FastifyPluginAsync<RouteOptions> = async (fastify, { runtime }) => {
  // GET /cache/stats - Result cache statistics
  fastify.get('/cache/stats', async () => {
    return runtime.cache.getStats();
  });

  // DELETE /cache - Drop every cached result
  fastify.delete('/cache', async () => {
    const flushed = await runtime.cache.flush();
    return { flushed };
  });

  // GET /stats - Request outcomes, cache and pool (for CLI)
  fastify.get<{ Querystring: { recent?: number } }>(
    '/stats',
    {
      schema: {
        querystring: {
          type: 'object',
          properties: { recent: { type: 'integer', minimum: 0, maximum: 100, default: 10 } },
        },
      },
    },
    async (request) => {
      return {
        requests: runtime.monitor.stats(),
        recent: runtime.monitor.recent(request.query.recent ?? 10),
        cache: await runtime.cache.getStats(),
        pool: runtime.executor.poolStats(),
      };
    }
  );

  // GET /health - Health check
  fastify.get('/health', async (_request, reply) => {
    let database: { dialect: string; ok: boolean; error?: string };
    try {
      await runtime.dataSource.ping();
      database = { dialect: runtime.dataSource.dialect, ok: true };
    } catch (error) {
      database = { dialect: runtime.dataSource.dialect, ok: false, error: describeError(error) };
    }

    const body = {
      status: database.ok ? 'ok' : 'degraded',
      database,
      cache: runtime.cache.getType(),
    };
    return database.ok ? body : reply.status(503).send(body);
  });

  // GET / - Root endpoint
  fastify.get('/', async () => {
    return {
      name: 'verisql API',
      version: '0.1.0',
      description: 'Natural-language questions over SQL, verified and self-correcting',
      docs: '/docs',
    };
  });
};
