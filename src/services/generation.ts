/**
 * Language model boundary using the Vercel AI SDK.
 * Supports Anthropic and OpenAI; each tier maps to its own model.
 */

import { generateText } from 'ai';
import type { LanguageModel } from 'ai';
import { Semaphore, withTimeout } from 'async-mutex';
import type { Config } from '../config.js';
import type { Tier } from '../types/models.js';
import { GenerationFailure, RequestCancelled } from '../types/errors.js';
import { logger } from '../utils/logger.js';
import { remaining } from '../utils/deadline.js';

export interface GenerationRequest {
  system: string;
  prompt: string;
  tier: Tier;
  /** Overrides the configured generation timeout. */
  timeBudgetMs?: number;
  signal?: AbortSignal;
  maxOutputTokens?: number;
}

/**
 * Text generation. Implementations make exactly one attempt per call and
 * throw GenerationFailure (or RequestCancelled) instead of retrying.
 */
export interface GenerationService {
  generate(request: GenerationRequest): Promise<string>;
}

type LLMConfig = Config['LLM_CONFIG'];

/**
 * Initialize the language model for a provider and model id.
 */
async function initializeModel(llm: LLMConfig, modelId: string): Promise<LanguageModel> {
  logger.info(`Initializing LLM: ${llm.provider}/${modelId}`);

  switch (llm.provider) {
    case 'anthropic': {
      const { createAnthropic } = await import('@ai-sdk/anthropic');
      return createAnthropic({ apiKey: llm.apiKey })(modelId);
    }

    case 'openai': {
      const { createOpenAI } = await import('@ai-sdk/openai');
      return createOpenAI({ apiKey: llm.apiKey })(modelId);
    }
  }
}

export class AiSdkGenerationService implements GenerationService {
  private readonly models = new Map<Tier, Promise<LanguageModel>>();
  private readonly slots = new Map<Tier, Semaphore>();
  private readonly log = logger.child({ component: 'generation' });

  constructor(private readonly llm: LLMConfig) {}

  async generate(request: GenerationRequest): Promise<string> {
    const budget = request.timeBudgetMs ?? this.llm.timeoutMs;
    const deadline = Date.now() + budget;

    if (request.signal?.aborted) throw new RequestCancelled();

    let release: () => void;
    try {
      const slots = withTimeout(
        this.semaphore(request.tier),
        remaining(deadline),
        new GenerationFailure(`no generation slot for tier ${request.tier} within ${budget}ms`)
      );
      [, release] = await slots.acquire();
    } catch (error) {
      throw error instanceof GenerationFailure ? error : new GenerationFailure(String(error));
    }

    try {
      const model = await this.model(request.tier);
      const signals = [AbortSignal.timeout(Math.max(1, remaining(deadline)))];
      if (request.signal) signals.push(request.signal);

      const result = await generateText({
        model,
        system: request.system,
        prompt: request.prompt,
        temperature: 0,
        maxOutputTokens: request.maxOutputTokens ?? this.llm.maxTokens,
        abortSignal: AbortSignal.any(signals),
        maxRetries: 0,
      });

      // Log token usage
      this.log.info(
        `LLM call (${request.tier}) - Input: ${result.usage.inputTokens}, Output: ${result.usage.outputTokens}`
      );

      if (result.text.trim().length === 0) {
        throw new GenerationFailure('model returned an empty response');
      }
      return result.text;
    } catch (error) {
      if (request.signal?.aborted) throw new RequestCancelled();
      if (error instanceof GenerationFailure) throw error;
      if (Date.now() >= deadline) {
        throw new GenerationFailure(`generation exceeded the ${budget}ms time budget`);
      }
      const message = error instanceof Error ? error.message : String(error);
      this.log.warn(`LLM call failed: ${message}`);
      throw new GenerationFailure(message);
    } finally {
      release();
    }
  }

  private semaphore(tier: Tier): Semaphore {
    let semaphore = this.slots.get(tier);
    if (!semaphore) {
      semaphore = new Semaphore(this.llm.concurrency);
      this.slots.set(tier, semaphore);
    }
    return semaphore;
  }

  private model(tier: Tier): Promise<LanguageModel> {
    let model = this.models.get(tier);
    if (!model) {
      model = initializeModel(this.llm, this.llm.models[tier]);
      this.models.set(tier, model);
    }
    return model;
  }
}
