import { describe, it, expect } from 'vitest';
import { levenshtein, normalizeQuestion, questionTerms, singularize, splitTerms } from '../src/utils/text.js';

describe('text helpers', () => {
  it('computes edit distance', () => {
    expect(levenshtein('revenu', 'revenue')).toBe(1);
    expect(levenshtein('kitten', 'sitting')).toBe(3);
    expect(levenshtein('', 'abc')).toBe(3);
  });

  it('folds plurals', () => {
    expect(singularize('categories')).toBe('category');
    expect(singularize('boxes')).toBe('box');
    expect(singularize('orders')).toBe('order');
    expect(singularize('class')).toBe('class');
  });

  it('splits identifiers on underscores and camelCase', () => {
    expect(splitTerms('customerId')).toEqual(['customer', 'id']);
    expect(splitTerms('order_items')).toEqual(['order', 'item']);
  });

  it('drops stopwords from questions', () => {
    expect(questionTerms('What is the total revenue per region?')).toEqual(['revenue', 'region']);
  });

  it('normalizes whitespace and case', () => {
    expect(normalizeQuestion('  Total   Revenue\n')).toBe('total revenue');
  });
});
