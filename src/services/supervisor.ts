/**
 * Supervisor: drives one request through the explicit state machine
 *
 *   GENERATE -> EXECUTE_ANALYZE -> SUCCEEDED
 *                      |  ^
 *                      v  |
 *                      FIX      -> FAILED
 *
 * Every GENERATE or FIX round spends one attempt, whether or not it
 * produced a usable candidate, so the loop ends after `budget` rounds.
 */

import type {
  AttemptRecord,
  ConfidencePolicy,
  SchemaCatalog,
  Tier,
  WorkflowState,
} from '../types/models.js';
import { DEFAULT_CONFIDENCE_POLICY } from '../types/models.js';
import {
  AttemptsExhausted,
  CatalogError,
  ExecutionError,
  ForbiddenOperation,
  PipelineError,
  RequestCancelled,
  SchemaUnavailable,
  describeError,
} from '../types/errors.js';
import { logger } from '../utils/logger.js';
import { catalogScope } from '../utils/sql.js';
import { analyzeResult } from './analyzer.js';
import type { Corrector, CorrectionStrategy } from './corrector.js';
import type { QueryExecutor } from './executor.js';
import type { SchemaContextReducer } from './reducer.js';
import { routeQuestion } from './router.js';
import type { Synthesizer } from './synthesizer.js';

/**
 * Where the Supervisor reads catalog snapshots from.
 */
export interface CatalogSource {
  get(id: string): Promise<SchemaCatalog | undefined>;
}

export interface SupervisorDeps {
  catalogs: CatalogSource;
  reducer: SchemaContextReducer;
  synthesizer: Synthesizer;
  executor: QueryExecutor;
  corrector: Corrector;
}

export interface SupervisorOptions {
  attemptBudget: number;
  rowCap: number;
  policy?: ConfidencePolicy;
}

export interface WorkflowRequest {
  question: string;
  catalogId: string;
  attemptBudget?: number;
  signal?: AbortSignal;
}

export type WorkflowResult =
  | { status: 'succeeded'; state: WorkflowState }
  | { status: 'failed'; state: WorkflowState | null; error: PipelineError };

/** Recorded for a repair round that left the query as it was. */
export const NO_PROGRESS = 'correction made no progress';

/**
 * A usable attempt budget: whole, at least one. Anything unusable falls
 * back to the configured budget.
 */
export function resolveBudget(requested: number | undefined, fallback: number): number {
  const budget = requested !== undefined && Number.isFinite(requested) ? requested : fallback;
  return Math.max(1, Math.floor(budget));
}

/** The candidate of the round in progress, before it has executed. */
interface Round {
  attempt: number;
  stage: 'generate' | 'fix';
  strategy?: CorrectionStrategy;
  confidence: number;
  /** False when the round produced nothing worth running. */
  runnable: boolean;
  started: number;
}

export class Supervisor {
  private readonly policy: ConfidencePolicy;
  private readonly log = logger.child({ component: 'supervisor' });

  constructor(
    private readonly deps: SupervisorDeps,
    private readonly options: SupervisorOptions
  ) {
    this.policy = options.policy ?? DEFAULT_CONFIDENCE_POLICY;
  }

  async run(request: WorkflowRequest): Promise<WorkflowResult> {
    const { signal } = request;

    let catalog: SchemaCatalog | undefined;
    try {
      catalog = await this.deps.catalogs.get(request.catalogId);
    } catch (error) {
      const reason = error instanceof CatalogError ? error.message.split('\n')[0] : String(error);
      return { status: 'failed', state: null, error: new SchemaUnavailable(request.catalogId, reason) };
    }
    if (!catalog || catalog.tables.length === 0) {
      return { status: 'failed', state: null, error: new SchemaUnavailable(request.catalogId) };
    }

    const context = this.deps.reducer.reduce(request.question, catalog);
    const scope = catalogScope(catalog);
    const tier: Tier = routeQuestion(request.question, context.tables.length);
    const state: WorkflowState = {
      question: request.question,
      catalogId: request.catalogId,
      context,
      tier,
      budget: resolveBudget(request.attemptBudget, this.options.attemptBudget),
      phase: 'GENERATE',
      query: null,
      results: null,
      errors: [],
      suggestions: [],
      confidence: 0,
      attempts: 0,
      executed: false,
      cacheHit: false,
      history: [],
    };
    this.log.info(`Routing "${request.question}" as ${tier} over ${context.tables.length} tables`);

    let round: Round | undefined;
    // Errors of the last round that actually ran; repairs keep building on them.
    let diagnostics: string[] = [];
    let stageStarted = Date.now();

    try {
      for (;;) {
        if (signal?.aborted) throw new RequestCancelled();
        stageStarted = Date.now();

        switch (state.phase) {
          case 'GENERATE': {
            const started = Date.now();
            const candidate = await this.deps.synthesizer.synthesize(state.question, state.context, state.tier, {
              signal,
            });
            state.attempts += 1;
            state.query = candidate.query || null;
            state.errors = [...candidate.errors];
            state.suggestions = [];
            round = {
              attempt: state.attempts,
              stage: 'generate',
              confidence: candidate.confidence,
              runnable: candidate.query !== '',
              started,
            };
            state.phase = 'EXECUTE_ANALYZE';
            break;
          }

          case 'FIX': {
            const started = Date.now();
            const correction = await this.deps.corrector.correct({
              question: state.question,
              query: state.query ?? '',
              errors: state.errors,
              suggestions: state.suggestions,
              context: state.context,
              tier: state.tier,
              signal,
            });
            state.attempts += 1;
            state.query = correction.query || null;
            if (correction.fixed) {
              state.errors = [...correction.errors];
            } else {
              const own = correction.errors.length > 0 ? correction.errors : [NO_PROGRESS];
              state.errors = [...new Set([...diagnostics, ...own])];
            }
            state.suggestions = [];
            round = {
              attempt: state.attempts,
              stage: 'fix',
              strategy: correction.strategy,
              confidence: correction.confidence,
              runnable: correction.fixed && correction.query !== '',
              started,
            };
            state.phase = 'EXECUTE_ANALYZE';
            break;
          }

          case 'EXECUTE_ANALYZE': {
            if (!round) throw new Error('EXECUTE_ANALYZE entered without a candidate');
            const verdict = await this.executeAndAnalyze(state, round, scope, signal);
            if (verdict) return verdict;
            if (round.runnable) diagnostics = [...state.errors];
            break;
          }

          case 'SUCCEEDED':
            return { status: 'succeeded', state };

          case 'FAILED':
            return { status: 'failed', state, error: new AttemptsExhausted(state.attempts) };
        }
      }
    } catch (error) {
      if (error instanceof RequestCancelled || signal?.aborted) {
        state.phase = 'FAILED';
        state.failure = 'RequestCancelled';
        return { status: 'failed', state, error: new RequestCancelled() };
      }

      const fault = new ExecutionError(describeError(error));
      this.log.error({ err: error }, `Fault during ${state.phase}`);
      if (state.phase === 'GENERATE' || state.phase === 'FIX') {
        state.attempts += 1;
        round = {
          attempt: state.attempts,
          stage: state.phase === 'FIX' ? 'fix' : 'generate',
          confidence: 0,
          runnable: false,
          started: stageStarted,
        };
      }
      state.errors = [fault.toString()];
      state.confidence = 0;
      if (round) this.record(state, round, null, false);
      state.phase = 'FAILED';
      state.failure = fault.code;
      return { status: 'failed', state, error: fault };
    }
  }

  /**
   * Run the current candidate and pick the next phase. Returns a result
   * when the run is over.
   */
  private async executeAndAnalyze(
    state: WorkflowState,
    round: Round,
    scope: string,
    signal: AbortSignal | undefined
  ): Promise<WorkflowResult | undefined> {
    let rowCount: number | null = null;
    let cacheHit = false;
    state.results = null;

    if (state.query && round.runnable) {
      const outcome = await this.deps.executor.execute(state.query, {
        rowCap: this.options.rowCap,
        scope,
        signal,
      });

      if (!outcome.ok) {
        if (outcome.error instanceof RequestCancelled) throw outcome.error;
        state.errors.push(outcome.error.toString());
        state.confidence = 0;
        if (outcome.error instanceof ForbiddenOperation) {
          this.record(state, round, rowCount, cacheHit);
          state.phase = 'FAILED';
          state.failure = outcome.error.code;
          return { status: 'failed', state, error: outcome.error };
        }
      } else {
        const analysis = analyzeResult(
          {
            question: state.question,
            query: state.query,
            rows: outcome.rows,
            rowCap: this.options.rowCap,
            confidence: round.confidence,
          },
          this.policy
        );
        state.executed = true;
        state.results = outcome.rows;
        state.cacheHit = outcome.cacheHit;
        state.confidence = analysis.confidence;
        state.errors.push(...analysis.errors);
        state.suggestions = analysis.suggestions;
        rowCount = outcome.rows.length;
        cacheHit = outcome.cacheHit;
      }
    }

    this.record(state, round, rowCount, cacheHit);

    const succeeded =
      rowCount !== null &&
      rowCount > 0 &&
      state.confidence >= this.policy.successThreshold &&
      state.errors.length === 0;

    if (succeeded) {
      state.phase = 'SUCCEEDED';
      this.log.info(`Succeeded on attempt ${state.attempts} with confidence ${state.confidence}`);
      return undefined;
    }

    if (state.attempts < state.budget) {
      state.phase = 'FIX';
      this.log.info(`Attempt ${state.attempts} needs a fix: ${state.errors.join('; ') || 'low confidence'}`);
      return undefined;
    }

    state.phase = 'FAILED';
    state.failure = 'AttemptsExhausted';
    this.log.warn(`Giving up after ${state.attempts} attempts`);
    return undefined;
  }

  private record(state: WorkflowState, round: Round, rowCount: number | null, cacheHit: boolean): void {
    const entry: AttemptRecord = {
      attempt: round.attempt,
      stage: round.stage,
      ...(round.strategy ? { strategy: round.strategy } : {}),
      query: state.query ?? '',
      confidence: rowCount === null ? round.confidence : state.confidence,
      errors: [...state.errors],
      rowCount,
      cacheHit,
      durationMs: Date.now() - round.started,
    };
    state.history.push(entry);
  }
}
