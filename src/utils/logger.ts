/**
 * Logging configuration using Pino.
 */

import pino from 'pino';
import type { LoggerOptions } from 'pino';
import { config } from '../config.js';

const usePretty =
  process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

/**
 * Shared options so Fastify's request logger matches the application logger.
 */
export const loggerConfig: LoggerOptions = {
  level: config.LOG_LEVEL.toLowerCase(),
  transport: usePretty
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
};

/**
 * Global logger instance configured with environment settings.
 */
export const logger = pino(loggerConfig);

export type Logger = typeof logger;
