/**
 * verisql API server - main entry point
 */

import { config } from './config.js';
import { createRuntime } from './runtime.js';
import { buildServer } from './server.js';
import { describeError } from './types/errors.js';
import { logger } from './utils/logger.js';

/**
 * Start the server.
 */
const start = async () => {
  logger.info('Starting verisql API server...');
  const runtime = await createRuntime(config);

  // First run: discover the default catalog when none is stored yet.
  const catalogId = config.DEFAULT_CATALOG_ID;
  try {
    if (!(await runtime.catalogs.get(catalogId))) {
      const outcome = await runtime.catalogs.refresh(catalogId);
      logger.info(`Discovered catalog "${catalogId}" with ${outcome.catalog.tables.length} tables`);
    }
  } catch (error) {
    logger.warn(`Catalog "${catalogId}" is not ready: ${describeError(error)}`);
  }

  const fastify = await buildServer(runtime);

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      fastify.close().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error({ err: error }, 'Shutdown failed');
          process.exit(1);
        }
      );
    });
  }

  try {
    await fastify.listen({ port: config.PORT, host: config.HOST });
    logger.info(`Server running at http://localhost:${config.PORT}`);
    logger.info(`API docs at http://localhost:${config.PORT}/docs`);
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
};

start().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Failed to start');
  process.exit(1);
});
