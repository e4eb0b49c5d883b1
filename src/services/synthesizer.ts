/**
 * Synthesizer: one model call that turns a question into a candidate query.
 */

import type { ConfidencePolicy, SchemaCatalog, Tier } from '../types/models.js';
import { DEFAULT_CONFIDENCE_POLICY } from '../types/models.js';
import { GenerationFailure, UnknownIdentifier, describeError } from '../types/errors.js';
import { logger } from '../utils/logger.js';
import { extractQuery, groundQuery } from '../utils/sql.js';
import type { GenerationService } from './generation.js';
import { describeSchema, synthesisPrompt, systemPrompt, type PromptContext } from './prompts.js';

export interface Candidate {
  /** Empty when nothing usable came back. */
  query: string;
  confidence: number;
  errors: string[];
}

export interface SynthesisOptions {
  signal?: AbortSignal;
  timeBudgetMs?: number;
}

/**
 * Score an extracted query by how well it sticks to the schema context.
 */
export function gradeCandidate(
  query: string,
  context: SchemaCatalog,
  policy: ConfidencePolicy = DEFAULT_CONFIDENCE_POLICY
): Candidate {
  const grounding = groundQuery(query, context);
  if (grounding.unknown.length > 0) {
    return {
      query,
      confidence: policy.ungrounded,
      errors: grounding.unknown.map((name) => new UnknownIdentifier(name).detail),
    };
  }
  return {
    query,
    confidence: grounding.tables.length > 0 ? policy.groundedWithTables : policy.groundedWithoutTables,
    errors: [],
  };
}

const REFUSAL = /^\s*(?:i\s+(?:can(?:no|')t|am\s+unable|am\s+not\s+able)|i'm\s+(?:unable|not\s+able|sorry)|sorry|unfortunately)\b/i;

/**
 * Pull a query out of model text, or fail the way a generation error does.
 */
export function candidateFromText(
  text: string,
  context: SchemaCatalog,
  policy: ConfidencePolicy = DEFAULT_CONFIDENCE_POLICY
): Candidate {
  if (REFUSAL.test(text)) {
    return failedCandidate(new GenerationFailure('model declined to write a query'));
  }
  const query = extractQuery(text);
  if (!query) {
    return failedCandidate(new GenerationFailure('model response contained no SQL statement'));
  }
  return gradeCandidate(query, context, policy);
}

export function failedCandidate(error: unknown): Candidate {
  return { query: '', confidence: 0, errors: [describeError(error)] };
}

export class Synthesizer {
  private readonly log = logger.child({ component: 'synthesizer' });

  constructor(
    private readonly generation: GenerationService,
    private readonly prompt: () => PromptContext,
    private readonly policy: ConfidencePolicy = DEFAULT_CONFIDENCE_POLICY
  ) {}

  /**
   * Exactly one generation call; failures come back as a zero-confidence
   * candidate, never as a throw. Cancellation is the only exception.
   */
  async synthesize(
    question: string,
    context: SchemaCatalog,
    tier: Tier,
    options: SynthesisOptions = {}
  ): Promise<Candidate> {
    const ctx = this.prompt();
    let text: string;
    try {
      text = await this.generation.generate({
        system: systemPrompt(ctx),
        prompt: synthesisPrompt(question, describeSchema(context, tier), ctx),
        tier,
        timeBudgetMs: options.timeBudgetMs,
        signal: options.signal,
      });
    } catch (error) {
      if (options.signal?.aborted) throw error;
      this.log.warn(`Synthesis failed: ${describeError(error)}`);
      return failedCandidate(error instanceof GenerationFailure ? error : new GenerationFailure(describeError(error)));
    }

    const candidate = candidateFromText(text, context, this.policy);
    this.log.debug({ confidence: candidate.confidence, errors: candidate.errors }, 'Synthesized candidate');
    return candidate;
  }
}
