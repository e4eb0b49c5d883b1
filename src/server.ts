/**
 * HTTP server: Fastify with CORS, OpenAPI docs and the query, catalog and
 * utility routes.
 */

import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import type { Runtime } from './runtime.js';
import { CatalogError, PipelineError } from './types/errors.js';
import { loggerConfig } from './utils/logger.js';
import { queryRoutes } from './routes/query.js';
import { catalogRoutes } from './routes/catalogs.js';
import { utilityRoutes } from './routes/utility.js';

export interface ServerOptions {
  /** Serve /docs (off in tests). */
  docs?: boolean;
  /** Pass false to silence request logging. */
  logger?: boolean;
}

/**
 * Create and configure the Fastify server. Does not listen.
 */
export async function buildServer(runtime: Runtime, options: ServerOptions = {}): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: options.logger === false ? false : loggerConfig,
  });

  await fastify.register(cors, {
    origin: '*',
  });

  if (options.docs !== false) {
    await fastify.register(swagger, {
      openapi: {
        info: {
          title: 'verisql API',
          description: 'Ask questions of a SQL database in plain language',
          version: '0.1.0',
        },
      },
    });

    await fastify.register(swaggerUi, {
      routePrefix: '/docs',
    });
  }

  /**
   * Map domain errors to status codes. Registered before the routes so
   * every route context inherits it.
   */
  fastify.setErrorHandler((error, _request, reply) => {
    if (error instanceof CatalogError) {
      reply.status(400).send({
        error: 'CatalogError',
        message: error.message,
        issues: error.issues,
      });
    } else if (error instanceof PipelineError) {
      reply.status(error.recoverable ? 502 : 400).send({
        error: error.code,
        message: error.detail,
        suggestions: error.suggestions,
      });
    } else if (error.validation) {
      reply.status(400).send({
        error: 'ValidationError',
        message: error.message,
      });
    } else {
      const status = error.statusCode && error.statusCode >= 400 ? error.statusCode : 500;
      if (status >= 500) fastify.log.error(error);
      reply.status(status).send({
        error: status >= 500 ? 'InternalServerError' : 'RequestError',
        message: error.message || 'An unexpected error occurred',
      });
    }
  });

  await fastify.register(queryRoutes, { runtime });
  await fastify.register(catalogRoutes, { runtime });
  await fastify.register(utilityRoutes, { runtime });

  fastify.addHook('onClose', async () => {
    fastify.log.info('Shutting down verisql API server...');
    await runtime.close();
  });

  return fastify;
}
