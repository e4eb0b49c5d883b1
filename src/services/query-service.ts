/**
 * Pipeline entry point: question in, structured response out. Never throws.
 */

import type { FailedResponse, ProcessRequest, ProcessResponse, SucceededResponse } from '../types/models.js';
import { ExecutionError, InvalidQuestion, PipelineError, RequestCancelled, describeError } from '../types/errors.js';
import { logger } from '../utils/logger.js';
import type { RequestMonitor } from './monitor.js';
import type { Narrator } from './narrator.js';
import type { Supervisor, WorkflowResult } from './supervisor.js';

export interface QueryServiceOptions {
  defaultCatalogId: string;
}

export class QueryService {
  private readonly log = logger.child({ component: 'query' });

  constructor(
    private readonly supervisor: Supervisor,
    private readonly narrator: Narrator,
    private readonly monitor: RequestMonitor,
    private readonly options: QueryServiceOptions
  ) {}

  async process(request: ProcessRequest): Promise<ProcessResponse> {
    const started = Date.now();
    const question = request.question.trim();
    const catalogId = request.catalogId ?? this.options.defaultCatalogId;

    if (question === '') {
      const invalid = new InvalidQuestion();
      const response: FailedResponse = {
        status: 'failed',
        question,
        code: invalid.code,
        lastQuery: null,
        errors: [invalid.toString()],
        attempts: 0,
        tier: null,
        history: [],
        durationMs: Date.now() - started,
      };
      this.monitor.record(response);
      return response;
    }

    let response: ProcessResponse;
    try {
      const result = await this.supervisor.run({
        question,
        catalogId,
        attemptBudget: request.attemptBudget,
        signal: request.signal,
      });
      response = await this.respond(question, result, started, request.signal);
    } catch (error) {
      // Only an unexpected fault gets here; the stages report their own errors.
      this.log.error({ err: error }, 'Pipeline fault');
      const failure =
        error instanceof PipelineError
          ? error
          : request.signal?.aborted
            ? new RequestCancelled()
            : new ExecutionError(describeError(error));
      response = {
        status: 'failed',
        question,
        code: failure.code,
        lastQuery: null,
        errors: [failure.toString()],
        attempts: 0,
        tier: null,
        history: [],
        durationMs: Date.now() - started,
      };
    }

    this.monitor.record(response);
    return response;
  }

  private async respond(
    question: string,
    result: WorkflowResult,
    started: number,
    signal?: AbortSignal
  ): Promise<ProcessResponse> {
    if (result.status === 'failed') {
      const { state, error } = result;
      const errors = state ? state.history.flatMap((h) => h.errors) : [];
      if (errors[errors.length - 1] !== error.toString()) errors.push(error.toString());
      const failed: FailedResponse = {
        status: 'failed',
        question,
        code: error.code,
        lastQuery: state?.query ?? null,
        errors,
        attempts: state?.attempts ?? 0,
        tier: state?.tier ?? null,
        history: state?.history ?? [],
        durationMs: Date.now() - started,
      };
      this.log.info(`Failed with ${error.code} after ${failed.attempts} attempts`);
      return failed;
    }

    const { state } = result;
    const rows = state.results ?? [];
    let narrative: string;
    try {
      narrative = await this.narrator.narrate(question, rows, state.tier, signal);
    } catch {
      // The narrator falls back on its own; it only throws once cancelled.
      return {
        status: 'failed',
        question,
        code: 'RequestCancelled',
        lastQuery: state.query,
        errors: [new RequestCancelled().toString()],
        attempts: state.attempts,
        tier: state.tier,
        history: state.history,
        durationMs: Date.now() - started,
      };
    }

    const succeeded: SucceededResponse = {
      status: 'succeeded',
      question,
      query: state.query ?? '',
      results: rows,
      rowCount: rows.length,
      narrative,
      confidence: state.confidence,
      attempts: state.attempts,
      tier: state.tier,
      cacheHit: state.cacheHit,
      suggestions: state.suggestions,
      history: state.history,
      durationMs: Date.now() - started,
    };
    return succeeded;
  }
}
