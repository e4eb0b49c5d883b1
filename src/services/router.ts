/**
 * Complexity router: picks a generation tier from the question's wording
 * and the size of its reduced context. Deterministic; first matching rule wins.
 */

import type { Tier } from '../types/models.js';
import { normalizeQuestion } from '../utils/text.js';

const AGGREGATION = [
  'total', 'sum', 'count', 'how many', 'average', 'avg', 'mean', 'maximum', 'minimum',
  'max', 'min', 'highest', 'lowest', 'most', 'least', 'per', 'by each', 'group',
];

const JOIN_LANGUAGE = [
  'join', 'together with', 'along with', 'combined with', 'for each', 'across',
  'related', 'and their', 'with their', 'who have', 'which have', 'that have',
];

const NESTED_AGGREGATION = [
  'ratio', 'percentage', 'percent', 'share of', 'proportion', 'running total',
  'cumulative', 'moving average', 'rank', 'top n', 'year over year', 'month over month',
  'growth', 'trend', 'correlation', 'compare', 'compared', 'versus', ' vs ',
  'average of', 'more than average', 'above average', 'below average', 'median', 'percentile',
];

const TIME_WINDOW =
  /\b(?:last|past|previous|next|this|current)\s+(?:\d+\s+)?(?:day|week|month|quarter|year)s?\b|\b(?:since|between|before|after|during)\s+\S+|\b(?:19|20)\d{2}\b|\b(?:q[1-4]|ytd|mtd|yesterday|today)\b/gi;

const COMPLEX_WORD_COUNT = 30;

function containsAny(text: string, phrases: string[]): boolean {
  return phrases.some((p) => (p.includes(' ') ? text.includes(p) : new RegExp(`\\b${p}\\b`).test(text)));
}

/**
 * Number of distinct time-window expressions in a question.
 */
export function countTimeWindows(question: string): number {
  const matches = question.toLowerCase().match(TIME_WINDOW) ?? [];
  return new Set(matches.map((m) => m.trim())).size;
}

/**
 * Classify a question.
 *
 * - complex: more than 3 tables, nested aggregation, two or more time windows,
 *   or a long question
 * - simple: at most one table and neither aggregation nor join language
 * - moderate: everything else
 */
export function routeQuestion(question: string, tableCount?: number): Tier {
  const text = ` ${normalizeQuestion(question)} `;
  const words = text.trim().split(' ').filter(Boolean).length;

  if (
    (tableCount !== undefined && tableCount > 3) ||
    containsAny(text, NESTED_AGGREGATION) ||
    countTimeWindows(question) >= 2 ||
    words > COMPLEX_WORD_COUNT
  ) {
    return 'complex';
  }

  const singleTable = tableCount === undefined || tableCount <= 1;
  if (singleTable && !containsAny(text, AGGREGATION) && !containsAny(text, JOIN_LANGUAGE)) {
    return 'simple';
  }

  return 'moderate';
}
