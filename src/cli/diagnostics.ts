/**
 * Health diagnostics and troubleshooting.
 * Checks the environment, the database, the result cache and the catalog.
 */

import { existsSync } from 'fs';
import { join } from 'path';
import Table from 'cli-table3';
import chalk from 'chalk';
import * as logger from './logger.js';
import { describeError } from '../types/errors.js';
import type { Runtime } from '../runtime.js';

export interface DiagnosticCheck {
  name: string;
  passed: boolean;
  message: string;
  fix?: string;
}

/**
 * Checks that need no connection.
 */
export function environmentChecks(cwd: string, nodeVersion: string): DiagnosticCheck[] {
  const checks: DiagnosticCheck[] = [];

  const envExists = existsSync(join(cwd, '.env'));
  checks.push({
    name: 'Environment File',
    passed: envExists,
    message: envExists ? '.env file found' : '.env file not found (using process environment)',
    fix: envExists ? undefined : 'Copy .env.example to .env and fill it in',
  });

  const majorVersion = parseInt(nodeVersion.replace(/^v/, '').split('.')[0], 10);
  const validNodeVersion = majorVersion >= 20;
  checks.push({
    name: 'Node.js Version',
    passed: validNodeVersion,
    message: `Node ${nodeVersion}`,
    fix: validNodeVersion ? undefined : 'Upgrade to Node.js 20 or higher',
  });

  return checks;
}

/**
 * Run comprehensive diagnostics. Returns true when every check passed.
 */
export async function runDiagnostics(catalogId?: string): Promise<boolean> {
  logger.printBanner();
  logger.newline();
  logger.section('Running Diagnostics');
  logger.newline();

  const checks = environmentChecks(process.cwd(), process.version);

  // Loading the configuration exits with a report when it is invalid.
  const { config } = await import('../config.js');
  checks.push({
    name: 'Configuration',
    passed: true,
    message: `${config.LLM_CONFIG.provider} models, ${config.DATABASE_TYPE} database`,
  });

  const spinner = logger.spinner('Connecting to database...');
  const { createRuntime } = await import('../runtime.js');
  let runtime: Runtime | undefined;
  try {
    runtime = await createRuntime(config);
    spinner.succeed('Connected to database');
    checks.push({ name: 'Database', passed: true, message: `${runtime.dataSource.dialect} connection ok` });
  } catch (error) {
    spinner.fail('Connection failed');
    checks.push({
      name: 'Database',
      passed: false,
      message: describeError(error),
      fix: 'Check DATABASE_TYPE and DATABASE_PATH / DATABASE_URL',
    });
  }

  if (runtime) {
    try {
      const stats = await runtime.cache.getStats();
      checks.push({ name: 'Result Cache', passed: true, message: `${stats.backend}, ${stats.size} entries` });
    } catch (error) {
      checks.push({
        name: 'Result Cache',
        passed: false,
        message: describeError(error),
        fix: 'Check REDIS_URL or unset it to use the in-memory cache',
      });
    }

    const id = catalogId ?? config.DEFAULT_CATALOG_ID;
    try {
      const catalog = await runtime.catalogs.get(id);
      checks.push({
        name: 'Catalog',
        passed: catalog !== undefined && catalog.tables.length > 0,
        message: catalog ? `"${id}": ${catalog.tables.length} tables` : `"${id}" not found`,
        fix: `Run: verisql refresh ${id}`,
      });
    } catch (error) {
      checks.push({ name: 'Catalog', passed: false, message: describeError(error), fix: `Run: verisql refresh ${id}` });
    }

    await runtime.close();
  }

  // Display results
  displayDiagnostics(checks);

  // Summary
  logger.newline();
  const passed = checks.filter((c) => c.passed).length;
  const total = checks.length;

  if (passed === total) {
    logger.successBox(`All checks passed! (${passed}/${total})`, 'Diagnostics Complete');
    logger.newline();
    logger.info('Ready to start:');
    logger.code('verisql serve', 'bash');
  } else {
    logger.errorBox(`${total - passed} issue(s) found\n\nPlease fix the issues above to continue.`, 'Diagnostics Complete');
  }

  logger.newline();
  return passed === total;
}

/**
 * Display diagnostics in a table.
 */
function displayDiagnostics(checks: DiagnosticCheck[]): void {
  const table = new Table({
    head: [chalk.bold('Check'), chalk.bold('Status'), chalk.bold('Details')],
    colWidths: [25, 10, 50],
    wordWrap: true,
    style: {
      head: ['cyan'],
      border: ['gray'],
    },
  });

  for (const check of checks) {
    const status = check.passed ? chalk.green('✔ PASS') : chalk.red('✖ FAIL');
    const details = check.passed || !check.fix
      ? chalk.dim(check.message)
      : `${check.message}\n${chalk.yellow('Fix:')} ${check.fix}`;

    table.push([check.name, status, details]);
  }

  console.log(table.toString());
}
