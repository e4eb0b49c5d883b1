/**
 * Narrator: a short plain-language answer for a successful result.
 */

import type { Tier } from '../types/models.js';
import type { Row, Scalar } from '../types/utils.js';
import { describeError } from '../types/errors.js';
import { logger } from '../utils/logger.js';
import type { GenerationService } from './generation.js';
import { narrationPrompt, systemPrompt, type PromptContext } from './prompts.js';

/** Rows shown to the model. */
const NARRATION_ROWS = 20;

function formatValue(value: Scalar): string {
  if (value === null) return 'null';
  if (typeof value === 'number') return value.toLocaleString('en-US');
  return String(value);
}

/**
 * Deterministic summary used when no model is available or it fails.
 */
export function summarizeRows(rows: Row[]): string {
  if (rows.length === 0) return 'The query returned no rows.';

  const columns = Object.keys(rows[0]);
  if (rows.length === 1 && columns.length <= 3) {
    return columns.map((c) => `${c}: ${formatValue(rows[0][c])}`).join(', ');
  }

  const shown = columns.slice(0, 5).join(', ');
  const more = columns.length > 5 ? ` and ${columns.length - 5} more` : '';
  return `The query returned ${rows.length} ${rows.length === 1 ? 'row' : 'rows'} with columns ${shown}${more}.`;
}

export class Narrator {
  private readonly log = logger.child({ component: 'narrator' });

  constructor(
    private readonly generation: GenerationService | null,
    private readonly prompt: () => PromptContext
  ) {}

  /**
   * Never throws except on cancellation; falls back to summarizeRows.
   */
  async narrate(question: string, rows: Row[], tier: Tier, signal?: AbortSignal): Promise<string> {
    if (!this.generation || rows.length === 0) return summarizeRows(rows);

    try {
      const text = await this.generation.generate({
        system: systemPrompt(this.prompt()),
        prompt: narrationPrompt(question, rows, NARRATION_ROWS),
        tier,
        signal,
      });
      return text.trim();
    } catch (error) {
      if (signal?.aborted) throw error;
      this.log.warn(`Narration failed, using summary: ${describeError(error)}`);
      return summarizeRows(rows);
    }
  }
}
