/**
 * Query endpoints for natural language questions.
 */

import type { FastifyPluginAsync, FastifyReply } from 'fastify';
import type { Runtime } from '../runtime.js';

export interface RouteOptions {
  runtime: Runtime;
}

interface QueryBody {
  question: string;
  catalog?: string;
  attempts?: number;
}

/**
 * Abort the pipeline when the client goes away before the reply is sent.
 */
function disconnectSignal(reply: FastifyReply): AbortSignal {
  const controller = new AbortController();
  reply.raw.on('close', () => {
    if (!reply.raw.writableFinished) controller.abort();
  });
  return controller.signal;
}

export const queryRoutes: FastifyPluginAsync<RouteOptions> = async (fastify, { runtime }) => {
  const maxLength = runtime.settings.MAX_QUESTION_LENGTH;

  // POST /query - Main query endpoint
  fastify.post<{ Body: QueryBody }>(
    '/query',
    {
      schema: {
        description: 'Answer a natural language question',
        body: {
          type: 'object',
          properties: {
            question: { type: 'string', minLength: 1, maxLength, pattern: '\\S' },
            catalog: { type: 'string', minLength: 1 },
            attempts: { type: 'integer', minimum: 1, maximum: 10 },
          },
          required: ['question'],
        },
      },
    },
    async (request, reply) => {
      return runtime.query.process({
        question: request.body.question,
        catalogId: request.body.catalog,
        attemptBudget: request.body.attempts,
        signal: disconnectSignal(reply),
      });
    }
  );

  // GET /query - Convenience endpoint
  fastify.get<{ Querystring: { q: string; catalog?: string } }>(
    '/query',
    {
      schema: {
        description: 'Answer a natural language question (GET)',
        querystring: {
          type: 'object',
          properties: {
            q: { type: 'string', minLength: 1, maxLength, pattern: '\\S' },
            catalog: { type: 'string', minLength: 1 },
          },
          required: ['q'],
        },
      },
    },
    async (request, reply) => {
      return runtime.query.process({
        question: request.query.q,
        catalogId: request.query.catalog,
        signal: disconnectSignal(reply),
      });
    }
  );
};
