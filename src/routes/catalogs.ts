/**
 * Catalog endpoints: list, inspect, refresh and publish.
 */

import type { FastifyPluginAsync } from 'fastify';
import { CatalogError } from '../types/errors.js';
import { isRecord } from '../types/utils.js';
import { CatalogSchema } from '../services/catalog/validation.js';
import type { RouteOptions } from './query.js';

export const catalogRoutes: FastifyPluginAsync<RouteOptions> = async (fastify, { runtime }) => {
  const { catalogs } = runtime;

  // GET /catalogs - Summaries of every known catalog
  fastify.get('/catalogs', async () => {
    const summaries = await catalogs.list();
    return { catalogs: summaries, total: summaries.length };
  });

  // GET /catalogs/:id - Full catalog
  fastify.get<{ Params: { id: string } }>('/catalogs/:id', async (request, reply) => {
    const catalog = await catalogs.get(request.params.id);
    if (!catalog) {
      return reply.status(404).send({
        error: 'NotFound',
        message: `Catalog "${request.params.id}" not found`,
      });
    }
    return catalog;
  });

  // PUT /catalogs/:id - Publish a hand-written catalog
  fastify.put<{ Params: { id: string }; Body: unknown }>('/catalogs/:id', async (request) => {
    const body = isRecord(request.body) ? { ...request.body, id: request.params.id } : request.body;
    const parsed = CatalogSchema.safeParse(body);
    if (!parsed.success) {
      throw new CatalogError(
        'Catalog body is invalid',
        parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      );
    }
    const outcome = await catalogs.publish(parsed.data);
    return { id: outcome.catalog.id, warnings: outcome.warnings, flushed: outcome.flushed };
  });

  // POST /catalogs/:id/refresh - Rediscover from the database
  fastify.post<{ Params: { id: string } }>('/catalogs/:id/refresh', async (request) => {
    const outcome = await catalogs.refresh(request.params.id);
    return {
      id: outcome.catalog.id,
      tables: outcome.catalog.tables.length,
      relationships: outcome.catalog.relationships.length,
      refreshedAt: outcome.catalog.refreshedAt ?? null,
      warnings: outcome.warnings,
      flushed: outcome.flushed,
    };
  });
};
