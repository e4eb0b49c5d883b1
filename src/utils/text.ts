/**
 * Small text helpers shared by the reducer, router and corrector.
 */

import { STOPWORDS } from './lexicon.js';

/**
 * Edit distance between two strings.
 */
export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(current[j - 1] + 1, previous[j] + 1, previous[j - 1] + cost);
    }
    previous = current;
  }
  return previous[b.length];
}

/**
 * Fold a word to a rough singular form so "orders" matches "order".
 */
export function singularize(word: string): string {
  if (word.length > 4 && word.endsWith('ies')) return `${word.slice(0, -3)}y`;
  if (word.length > 4 && /(ses|xes|ches|shes)$/.test(word)) return word.slice(0, -2);
  if (word.length > 3 && word.endsWith('s') && !word.endsWith('ss')) return word.slice(0, -1);
  return word;
}

function rawTerms(text: string): string[] {
  return text
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((t) => t.length > 1);
}

/**
 * Split an identifier or sentence into lowercase singular terms, breaking on
 * non-letters, underscores and camelCase boundaries.
 */
export function splitTerms(text: string): string[] {
  return rawTerms(text).map(singularize);
}

/**
 * Content terms of a question: split, stopwords removed, singular.
 */
export function questionTerms(question: string): string[] {
  return rawTerms(question)
    .filter((t) => !STOPWORDS.has(t))
    .map(singularize);
}

/**
 * Whitespace-collapsed lowercase form of a question.
 */
export function normalizeQuestion(question: string): string {
  return question.toLowerCase().trim().replace(/\s+/g, ' ');
}
