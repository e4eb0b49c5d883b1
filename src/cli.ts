#!/usr/bin/env node
/**
 * verisql CLI
 * Ask questions, refresh catalogs and run the API server from the terminal.
 */

import { cac } from 'cac';
import * as logger from './cli/logger.js';
import type { ProcessResponse } from './types/models.js';
import type { Runtime } from './runtime.js';
import { describeError } from './types/errors.js';

const cli = cac('verisql');

cli.version('0.1.0');

cli.help();

/**
 * Keep pipeline logs out of interactive output unless asked for.
 */
function quietLogs(): void {
  process.env.LOG_LEVEL ??= 'WARN';
}

async function loadRuntime(): Promise<Runtime> {
  const { config } = await import('./config.js');
  const { createRuntime } = await import('./runtime.js');
  return createRuntime(config);
}

function printResponse(response: ProcessResponse): void {
  if (response.status === 'succeeded') {
    logger.section('Answer');
    logger.box(response.narrative);
    logger.section('SQL');
    logger.code(response.query, 'sql');
    logger.section(`Results (${response.rowCount} rows)`);
    console.log(logger.formatRows(response.results));
    logger.newline();
    console.log(
      logger.formatPairs([
        ['Confidence', response.confidence.toFixed(2)],
        ['Attempts', String(response.attempts)],
        ['Tier', response.tier],
        ['Cache hit', response.cacheHit ? 'yes' : 'no'],
        ['Duration', `${response.durationMs}ms`],
      ])
    );
    for (const suggestion of response.suggestions) logger.warn(suggestion);
    return;
  }

  logger.errorBox(`${response.code} after ${response.attempts} attempt(s)`, 'No answer');
  for (const error of response.errors) logger.error(error);
  if (response.lastQuery) {
    logger.section('Last query');
    logger.code(response.lastQuery, 'sql');
  }
}

/**
 * verisql serve
 * Start the API server in this process
 */
cli
  .command('serve', 'Start the API server')
  .option('-p, --port <port>', 'Server port')
  .option('--host <host>', 'Bind address')
  .action(async (options: { port?: number; host?: string }) => {
    logger.printBanner();
    logger.newline();
    logger.info('Starting server...');
    logger.newline();

    if (options.port !== undefined) process.env.PORT = String(options.port);
    if (options.host !== undefined) process.env.HOST = options.host;
    await import('./index.js');
  });

/**
 * verisql ask <question>
 * Answer a question without a server
 */
cli
  .command('ask <question>', 'Answer a natural language question')
  .option('-c, --catalog <id>', 'Catalog to query')
  .option('-f, --format <format>', 'Output format: table or json', { default: 'table' })
  .option('-b, --budget <attempts>', 'Maximum generate/fix rounds')
  .action(async (question: string, options: { catalog?: string; format: string; budget?: number | string }) => {
    quietLogs();
    const budget = options.budget === undefined ? undefined : Number(options.budget);
    if (budget !== undefined && !(Number.isInteger(budget) && budget >= 1)) {
      logger.error(`Invalid --budget: ${options.budget}`, 'Pass a whole number of attempts, 1 or more');
      process.exitCode = 1;
      return;
    }
    const json = options.format === 'json';
    if (!json) {
      logger.printBanner();
      logger.info(`Question: "${question}"`);
    }

    const spinner = json ? null : logger.spinner('Thinking...');
    let runtime: Runtime | undefined;
    try {
      runtime = await loadRuntime();
      const response = await runtime.query.process({
        question,
        catalogId: options.catalog,
        attemptBudget: budget,
      });
      spinner?.stop();

      if (json) {
        console.log(JSON.stringify(response, null, 2));
      } else {
        printResponse(response);
      }
      process.exitCode = response.status === 'succeeded' ? 0 : 1;
    } catch (error) {
      spinner?.fail('Query failed');
      logger.error(describeError(error), 'Run: verisql doctor');
      process.exitCode = 1;
    } finally {
      await runtime?.close();
    }
  });

/**
 * verisql refresh <catalogId>
 * Rediscover a catalog from the database
 */
cli
  .command('refresh [catalogId]', 'Rediscover a catalog from the database')
  .action(async (catalogId: string | undefined) => {
    quietLogs();
    const spinner = logger.spinner('Discovering schema...');
    let runtime: Runtime | undefined;
    try {
      runtime = await loadRuntime();
      const id = catalogId ?? runtime.settings.DEFAULT_CATALOG_ID;
      const outcome = await runtime.catalogs.refresh(id);
      spinner.succeed(`Catalog "${id}" refreshed`);
      logger.successBox(
        `${outcome.catalog.tables.length} tables, ${outcome.catalog.relationships.length} relationships\n` +
          `${outcome.flushed} cached results flushed`,
        id
      );
      for (const warning of outcome.warnings) logger.warn(warning);
    } catch (error) {
      spinner.fail('Refresh failed');
      logger.error(describeError(error));
      process.exitCode = 1;
    } finally {
      await runtime?.close();
    }
  });

/**
 * verisql catalogs
 * List stored catalogs
 */
cli
  .command('catalogs', 'List stored catalogs')
  .action(async () => {
    quietLogs();
    let runtime: Runtime | undefined;
    try {
      runtime = await loadRuntime();
      const summaries = await runtime.catalogs.list();
      if (summaries.length === 0) {
        logger.warn('No catalogs yet');
        logger.info('Create one with: verisql refresh');
        return;
      }
      console.log(
        logger.formatRows(
          summaries.map((s) => ({
            id: s.id,
            tables: s.tables,
            relationships: s.relationships,
            refreshed: s.refreshedAt,
          }))
        )
      );
    } catch (error) {
      logger.error(describeError(error));
      process.exitCode = 1;
    } finally {
      await runtime?.close();
    }
  });

/**
 * verisql doctor
 * Run diagnostics
 */
cli
  .command('doctor [catalogId]', 'Run diagnostics')
  .action(async (catalogId: string | undefined) => {
    quietLogs();
    const { runDiagnostics } = await import('./cli/diagnostics.js');
    try {
      const healthy = await runDiagnostics(catalogId);
      process.exitCode = healthy ? 0 : 1;
    } catch (error) {
      logger.error('Diagnostics failed', describeError(error));
      process.exitCode = 1;
    }
  });

// Parse CLI arguments
cli.parse();
