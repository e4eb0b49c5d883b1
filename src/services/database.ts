/**
 * Data source backed by Knex.js for multi-database support.
 * Supports PostgreSQL, MySQL and SQLite.
 */

import knex, { type Knex } from 'knex';
import { isRecord, type Row, type Scalar } from '../types/utils.js';
import { logger } from '../utils/logger.js';

export interface RunOptions {
  rowCap: number;
  timeoutMs: number;
}

/**
 * What the executor needs from a warehouse: run read-only text, get rows
 * back, or an error whose message is the engine's own.
 */
export interface DataSource {
  readonly dialect: string;
  run(sql: string, options: RunOptions): Promise<Row[]>;
  ping(): Promise<void>;
  close(): Promise<void>;
}

/**
 * Convert a driver value to a JSON-safe scalar.
 */
export function toScalar(value: unknown): Scalar {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : String(value);
  if (typeof value === 'bigint') {
    return value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)
      ? Number(value)
      : value.toString();
  }
  if (value instanceof Date) return value.toISOString();
  if (Buffer.isBuffer(value)) return value.toString('base64');
  return JSON.stringify(value);
}

function toRow(record: Record<string, unknown>): Row {
  const row: Row = {};
  for (const [key, value] of Object.entries(record)) {
    row[key] = toScalar(value);
  }
  return row;
}

/**
 * Pull the row array out of a dialect-specific raw result.
 */
export function normalizeRawResult(result: unknown): Record<string, unknown>[] {
  // Knex returns different result structures per dialect
  // Order matters: check more specific structures first
  let rows: unknown = [];

  if (isRecord(result) && Array.isArray(result.rows)) {
    // PostgreSQL: returns { rows: [...] }
    rows = result.rows;
  } else if (Array.isArray(result) && result.length === 2 && Array.isArray(result[0])) {
    // MySQL: returns [[rows], [fields]]
    rows = result[0];
  } else if (Array.isArray(result)) {
    // SQLite: returns array of rows directly
    rows = result;
  }

  return Array.isArray(rows) ? rows.filter(isRecord) : [];
}

export class KnexDataSource implements DataSource {
  constructor(
    private readonly db: Knex,
    readonly dialect: string
  ) {}

  async run(sql: string, options: RunOptions): Promise<Row[]> {
    // Only pg and mysql can cancel a running statement.
    const cancel = this.dialect === 'pg' || this.dialect === 'mysql2';
    const result: unknown = await this.db.raw(sql).timeout(options.timeoutMs, { cancel });
    return normalizeRawResult(result).slice(0, options.rowCap).map(toRow);
  }

  async ping(): Promise<void> {
    await this.db.raw('SELECT 1');
  }

  async close(): Promise<void> {
    await this.db.destroy();
    logger.info('Database connection closed');
  }
}

/**
 * Open a Knex connection and verify it answers.
 */
export async function connectDataSource(config: Knex.Config): Promise<{ db: Knex; dataSource: KnexDataSource }> {
  const db = knex(config);

  try {
    await db.raw('SELECT 1');
  } catch (error) {
    logger.error({ err: error }, 'Failed to connect to database');
    await db.destroy();
    throw error;
  }

  logger.info(`Database initialized: ${String(config.client)}`);
  return { db, dataSource: new KnexDataSource(db, String(config.client)) };
}
