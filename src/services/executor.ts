/**
 * Query executor.
 *
 * Order of operations for one candidate:
 * read-only guard, fingerprint, cache lookup, row limit, pool slot, run,
 * cache store. Every failure comes back as a typed error in the outcome;
 * nothing is thrown.
 */

import { Semaphore, withTimeout, E_TIMEOUT } from 'async-mutex';
import type { Row } from '../types/utils.js';
import {
  ExecutionError,
  ExecutionTimeout,
  ForbiddenOperation,
  RequestCancelled,
} from '../types/errors.js';
import { logger } from '../utils/logger.js';
import { remaining, withDeadline } from '../utils/deadline.js';
import { applyRowLimit, checkReadOnly, fingerprint } from '../utils/sql.js';
import type { ResultCache } from './cache/index.js';
import type { DataSource } from './database.js';

export interface ExecutorOptions {
  /** Concurrent data-source queries allowed. */
  poolSize: number;
  rowCap: number;
  /** Default budget covering slot wait and run. */
  timeoutMs: number;
}

export interface ExecuteOptions {
  rowCap?: number;
  timeBudgetMs?: number;
  signal?: AbortSignal;
  /** Partitions the cache, e.g. by catalog snapshot. */
  scope?: string;
}

export type ExecutionFailure = ForbiddenOperation | ExecutionTimeout | ExecutionError | RequestCancelled;

export type ExecutionOutcome =
  | {
      ok: true;
      rows: Row[];
      cacheHit: boolean;
      fingerprint: string;
      /** The text actually sent to the data source (after row limiting). */
      executedQuery: string;
      durationMs: number;
    }
  | {
      ok: false;
      error: ExecutionFailure;
      fingerprint?: string;
      durationMs: number;
    };

export interface PoolStats {
  size: number;
  available: number;
}

export class QueryExecutor {
  private readonly pool: Semaphore;
  private readonly log = logger.child({ component: 'executor' });

  constructor(
    private readonly dataSource: DataSource,
    private readonly cache: ResultCache,
    private readonly options: ExecutorOptions
  ) {
    this.pool = new Semaphore(options.poolSize);
  }

  async execute(query: string, options: ExecuteOptions = {}): Promise<ExecutionOutcome> {
    const started = Date.now();
    const rowCap = options.rowCap ?? this.options.rowCap;
    const budget = options.timeBudgetMs ?? this.options.timeoutMs;
    const deadline = started + budget;
    const elapsed = () => Date.now() - started;

    const verdict = checkReadOnly(query);
    if (!verdict.allowed) {
      this.log.warn(`Rejected query: ${verdict.reason}`);
      return { ok: false, error: new ForbiddenOperation(verdict.reason), durationMs: elapsed() };
    }

    const key = fingerprint(query, rowCap, options.scope);

    const cached = await this.readCache(key);
    if (cached) {
      this.log.debug(`Cache hit ${key.slice(0, 12)}`);
      return { ok: true, rows: cached, cacheHit: true, fingerprint: key, executedQuery: query, durationMs: elapsed() };
    }

    if (options.signal?.aborted) {
      return { ok: false, error: new RequestCancelled(), fingerprint: key, durationMs: elapsed() };
    }

    const limited = applyRowLimit(query, rowCap);

    let release: () => void;
    try {
      const slots = withTimeout(this.pool, remaining(deadline), new ExecutionTimeout(budget, 'queue'));
      [, release] = await slots.acquire();
    } catch (error) {
      return { ok: false, error: this.toFailure(error, budget), fingerprint: key, durationMs: elapsed() };
    }

    let rows: Row[];
    try {
      // The slot is held until the data source settles, even if we stop waiting.
      const work = this.dataSource
        .run(limited, { rowCap, timeoutMs: Math.max(1, remaining(deadline)) })
        .finally(release);
      rows = await withDeadline(work, remaining(deadline), () => new ExecutionTimeout(budget), options.signal);
    } catch (error) {
      const failure = this.toFailure(error, budget);
      this.log.info(`Execution failed: ${failure.toString()}`);
      return { ok: false, error: failure, fingerprint: key, durationMs: elapsed() };
    }

    await this.writeCache(key, rows);
    return { ok: true, rows, cacheHit: false, fingerprint: key, executedQuery: limited, durationMs: elapsed() };
  }

  poolStats(): PoolStats {
    return { size: this.options.poolSize, available: Math.max(0, this.pool.getValue()) };
  }

  private async readCache(key: string): Promise<Row[] | undefined> {
    try {
      return await this.cache.get(key);
    } catch (error) {
      this.log.warn(`Result cache read failed: ${error}`);
      return undefined;
    }
  }

  private async writeCache(key: string, rows: Row[]): Promise<void> {
    try {
      await this.cache.setIfAbsent(key, rows);
    } catch (error) {
      this.log.warn(`Result cache write failed: ${error}`);
    }
  }

  private toFailure(error: unknown, budget: number): ExecutionFailure {
    if (error instanceof ExecutionTimeout || error instanceof RequestCancelled) return error;
    if (error === E_TIMEOUT) return new ExecutionTimeout(budget, 'queue');
    if (isKnexTimeout(error)) return new ExecutionTimeout(budget);
    if (error instanceof Error) return new ExecutionError(error.message);
    return new ExecutionError(String(error));
  }
}

function isKnexTimeout(error: unknown): boolean {
  return error instanceof Error && error.name === 'KnexTimeoutError';
}
