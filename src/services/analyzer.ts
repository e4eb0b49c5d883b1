/**
 * Result analyzer: adjusts confidence from the shape of the rows.
 * Pure; never executes or rewrites the query.
 */

import type { ConfidencePolicy } from '../types/models.js';
import { DEFAULT_CONFIDENCE_POLICY } from '../types/models.js';
import type { Row, Scalar } from '../types/utils.js';
import { tokenize } from '../utils/sql.js';

export interface AnalysisInput {
  question: string;
  query: string;
  rows: Row[];
  rowCap: number;
  /** Confidence the candidate came in with. */
  confidence: number;
}

export interface Analysis {
  confidence: number;
  errors: string[];
  suggestions: string[];
}

export const EMPTY_RESULT = 'result set is empty';
export const NULL_AGGREGATE = 'aggregate returned null';

const AGGREGATES = new Set(['sum', 'avg', 'min', 'max', 'count', 'total', 'group_concat', 'string_agg']);

function isNumeric(value: Scalar): boolean {
  if (typeof value === 'number') return true;
  // pg returns NUMERIC and BIGINT aggregates as strings
  return typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value));
}

function usesAggregate(query: string): boolean {
  const tokens = tokenize(query).filter((t) => t.kind !== 'space' && t.kind !== 'comment');
  return tokens.some(
    (t, i) => t.kind === 'word' && AGGREGATES.has(t.value) && tokens[i + 1]?.text === '('
  );
}

function clamp(value: number): number {
  return Math.round(Math.min(1, Math.max(0, value)) * 1000) / 1000;
}

export function analyzeResult(
  input: AnalysisInput,
  policy: ConfidencePolicy = DEFAULT_CONFIDENCE_POLICY
): Analysis {
  const { rows, rowCap } = input;
  let confidence = input.confidence;
  const errors: string[] = [];
  const suggestions: string[] = [];

  if (rows.length === 0) {
    return {
      confidence: Math.min(confidence, policy.emptyResultCap),
      errors: [EMPTY_RESULT],
      suggestions: ['check filter conditions'],
    };
  }

  if (rows.length === 1) {
    const values = Object.values(rows[0]);
    if (values.length >= 1 && values.length <= 3) {
      if (values.every((v) => v === null) && usesAggregate(input.query)) {
        confidence = Math.min(confidence, policy.emptyResultCap);
        errors.push(NULL_AGGREGATE);
        suggestions.push('check filter conditions');
      } else if (values.every(isNumeric)) {
        confidence += policy.aggregateBonus;
      }
    }
  }

  if (rows.length >= rowCap) {
    suggestions.push(`result was truncated at ${rowCap} rows; add filters or aggregate`);
  }

  return { confidence: clamp(confidence), errors, suggestions };
}
