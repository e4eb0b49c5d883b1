import { describe, it, expect } from 'vitest';
import { countTimeWindows, routeQuestion } from '../src/services/router.js';

describe('routeQuestion', () => {
  it('routes plain single-table lookups to simple', () => {
    expect(routeQuestion('List all customers', 1)).toBe('simple');
  });

  it('routes aggregation to moderate', () => {
    expect(routeQuestion('How many orders per region?', 2)).toBe('moderate');
  });

  it('routes join language to moderate', () => {
    expect(routeQuestion('List customers with their orders', 2)).toBe('moderate');
  });

  it('routes nested aggregation to complex', () => {
    expect(routeQuestion('What share of revenue comes from each region?', 2)).toBe('complex');
  });

  it('routes wide contexts to complex', () => {
    expect(routeQuestion('show orders', 4)).toBe('complex');
  });

  it('routes two time windows to complex', () => {
    expect(routeQuestion('orders in the last 3 months and in 2024', 1)).toBe('complex');
  });

  it('routes long questions to complex', () => {
    const question = Array.from({ length: 31 }, (_, i) => `word${i}`).join(' ');
    expect(routeQuestion(question, 1)).toBe('complex');
  });

  it('is deterministic', () => {
    const question = 'How many orders per region?';
    expect(routeQuestion(question, 2)).toBe(routeQuestion(question, 2));
  });
});

describe('countTimeWindows', () => {
  it('counts distinct expressions', () => {
    expect(countTimeWindows('orders in the last 3 months and in 2024')).toBe(2);
    expect(countTimeWindows('orders in 2024 or 2024')).toBe(1);
    expect(countTimeWindows('all orders')).toBe(0);
  });
});
