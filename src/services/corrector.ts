/**
 * Corrector: repairs a failed or low-confidence candidate.
 *
 * Deterministic rewrites keyed by the error text come first; when none
 * applies, one model repair call is made.
 */

import type { ConfidencePolicy, SchemaCatalog, Tier } from '../types/models.js';
import { DEFAULT_CONFIDENCE_POLICY } from '../types/models.js';
import { GenerationFailure, describeError } from '../types/errors.js';
import { logger } from '../utils/logger.js';
import {
  balanceParentheses,
  previousSignificant,
  replaceIdentifier,
  stripTrailingSemicolons,
  tableReferences,
  type Token,
} from '../utils/sql.js';
import { levenshtein } from '../utils/text.js';
import type { GenerationService } from './generation.js';
import { describeSchema, repairPrompt, systemPrompt, type PromptContext } from './prompts.js';
import { candidateFromText } from './synthesizer.js';

export interface CorrectionInput {
  question: string;
  query: string;
  errors: string[];
  /** Analyzer suggestions from the failed round. */
  suggestions: string[];
  context: SchemaCatalog;
  tier: Tier;
  signal?: AbortSignal;
  timeBudgetMs?: number;
}

export type CorrectionStrategy = 'pattern' | 'model' | 'none';

export interface Correction {
  query: string;
  confidence: number;
  errors: string[];
  fixed: boolean;
  strategy: CorrectionStrategy;
  /** What the pattern rewrite changed. */
  note?: string;
}

/** Largest edit distance accepted for a fuzzy name match. */
export const MAX_EDIT_DISTANCE = 2;

const UNKNOWN_IDENTIFIER_PATTERNS: RegExp[] = [
  /unknown identifier ["`']?([\w.$]+)["`']?/i,
  /no such (?:column|table): ["`]?([\w.$]+)["`]?/i,
  /column "([^"]+)"(?: of relation "[^"]+")? does not exist/i,
  /relation "([^"]+)" does not exist/i,
  /column ([\w.$]+) does not exist/i,
  /unknown column '([^']+)'/i,
  /table '([^']+)' doesn't exist/i,
  /invalid identifier '([^']+)'/i,
];

const AMBIGUOUS_PATTERNS: RegExp[] = [
  /ambiguous column name: ["`]?([\w$]+)["`]?/i,
  /column reference "([^"]+)" is ambiguous/i,
  /column '([^']+)' in [\w ]+ is ambiguous/i,
];

const SYNTAX_PATTERN = /syntax error|incomplete input|unrecognized token|unterminated|near "`/i;

type PatternFix = { query: string; note: string };

function matchFirst(errors: string[], patterns: RegExp[]): string | undefined {
  for (const error of errors) {
    for (const pattern of patterns) {
      const match = pattern.exec(error);
      if (match) return match[1];
    }
  }
  return undefined;
}

function lastSegment(name: string): string {
  const parts = name.split('.');
  return parts[parts.length - 1];
}

function quoteIfNeeded(name: string): string {
  return /^[a-z_][a-z0-9_]*$/.test(name) ? name : `"${name.replace(/"/g, '""')}"`;
}

function schemaNames(context: SchemaCatalog): string[] {
  const names = new Set<string>();
  for (const table of context.tables) {
    names.add(table.name);
    for (const column of table.columns) names.add(column.name);
  }
  return [...names];
}

/**
 * Closest schema name: case-insensitive equality first, then the unique
 * nearest name within MAX_EDIT_DISTANCE.
 */
export function nearestName(identifier: string, names: string[]): string | undefined {
  const key = identifier.toLowerCase();
  const exact = names.find((n) => n.toLowerCase() === key);
  if (exact) return exact;

  let best: string[] = [];
  let bestDistance = MAX_EDIT_DISTANCE + 1;
  for (const name of names) {
    const distance = levenshtein(key, name.toLowerCase());
    if (distance < bestDistance) {
      best = [name];
      bestDistance = distance;
    } else if (distance === bestDistance) {
      best.push(name);
    }
  }
  return best.length === 1 ? best[0] : undefined;
}

function fixUnknownIdentifier(query: string, errors: string[], context: SchemaCatalog): PatternFix | undefined {
  const raw = matchFirst(errors, UNKNOWN_IDENTIFIER_PATTERNS);
  if (!raw) return undefined;
  const identifier = lastSegment(raw);
  const target = nearestName(identifier, schemaNames(context));
  if (!target) return undefined;

  const rewritten = replaceIdentifier(query, identifier, quoteIfNeeded(target));
  return rewritten === query ? undefined : { query: rewritten, note: `${identifier} -> ${target}` };
}

function isBareUse(tokens: Token[], index: number): boolean {
  const prev = previousSignificant(tokens, index);
  if (prev && (prev.text === '.' || (prev.kind === 'word' && prev.value === 'as'))) return false;
  const next = tokens.slice(index + 1).find((t) => t.kind !== 'space' && t.kind !== 'comment');
  return !next || (next.text !== '.' && next.text !== '(');
}

function fixAmbiguousColumn(query: string, errors: string[], context: SchemaCatalog): PatternFix | undefined {
  const column = matchFirst(errors, AMBIGUOUS_PATTERNS);
  if (!column) return undefined;

  const key = column.toLowerCase();
  const owner = tableReferences(query, context).find((ref) =>
    context.tables.some(
      (t) => t.name === ref.table && t.columns.some((c) => c.name.toLowerCase() === key)
    )
  );
  if (!owner) return undefined;

  const qualifier = owner.alias ?? quoteIfNeeded(owner.table);
  const rewritten = replaceIdentifier(query, column, `${qualifier}.${column}`, isBareUse);
  return rewritten === query ? undefined : { query: rewritten, note: `qualified ${column} with ${qualifier}` };
}

function fixSyntax(query: string, errors: string[]): PatternFix | undefined {
  if (!errors.some((e) => SYNTAX_PATTERN.test(e))) return undefined;
  const withoutFences = query.replace(/```[\w-]*/g, '');
  const rewritten = balanceParentheses(stripTrailingSemicolons(withoutFences)).trim();
  return rewritten === query || rewritten === '' ? undefined : { query: rewritten, note: 'removed stray syntax' };
}

/**
 * Try each deterministic rewrite in turn.
 */
export function patternFix(query: string, errors: string[], context: SchemaCatalog): PatternFix | undefined {
  if (!query) return undefined;
  return (
    fixUnknownIdentifier(query, errors, context) ??
    fixAmbiguousColumn(query, errors, context) ??
    fixSyntax(query, errors)
  );
}

export class Corrector {
  private readonly log = logger.child({ component: 'corrector' });

  constructor(
    private readonly generation: GenerationService,
    private readonly prompt: () => PromptContext,
    private readonly policy: ConfidencePolicy = DEFAULT_CONFIDENCE_POLICY
  ) {}

  async correct(input: CorrectionInput): Promise<Correction> {
    const pattern = patternFix(input.query, input.errors, input.context);
    if (pattern) {
      this.log.info(`Pattern fix: ${pattern.note}`);
      return {
        query: pattern.query,
        confidence: this.policy.patternFix,
        errors: [],
        fixed: true,
        strategy: 'pattern',
        note: pattern.note,
      };
    }

    const ctx = this.prompt();
    try {
      const text = await this.generation.generate({
        system: systemPrompt(ctx),
        prompt: repairPrompt(
          {
            question: input.question,
            query: input.query,
            errors: input.errors,
            suggestions: input.suggestions,
            schema: describeSchema(input.context, input.tier),
          },
          ctx
        ),
        tier: input.tier,
        timeBudgetMs: input.timeBudgetMs,
        signal: input.signal,
      });

      const candidate = candidateFromText(text, input.context, this.policy);
      if (!candidate.query) {
        return this.unfixed(input.query, candidate.errors);
      }
      return { ...candidate, fixed: candidate.query !== input.query, strategy: 'model' };
    } catch (error) {
      if (input.signal?.aborted) throw error;
      const failure = error instanceof GenerationFailure ? error : new GenerationFailure(describeError(error));
      this.log.warn(`Model repair failed: ${failure.detail}`);
      return this.unfixed(input.query, [failure.toString()]);
    }
  }

  private unfixed(query: string, errors: string[]): Correction {
    return { query, confidence: 0, errors, fixed: false, strategy: 'none' };
  }
}
