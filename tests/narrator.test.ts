import { describe, it, expect } from 'vitest';
import { Narrator, summarizeRows } from '../src/services/narrator.js';
import { ScriptedGeneration, promptContext } from './helpers.js';

describe('summarizeRows', () => {
  it('describes empty results', () => {
    expect(summarizeRows([])).toBe('The query returned no rows.');
  });

  it('spells out a single small row', () => {
    expect(summarizeRows([{ total_revenue: 1234.5, region: 'EU' }])).toBe('total_revenue: 1,234.5, region: EU');
  });

  it('counts larger results', () => {
    expect(summarizeRows([{ a: 1 }, { a: 2 }])).toBe('The query returned 2 rows with columns a.');
    expect(summarizeRows([{ a: 1, b: 2, c: 3, d: 4, e: 5, f: 6 }])).toBe(
      'The query returned 1 row with columns a, b, c, d, e and 1 more.'
    );
  });
});

describe('Narrator', () => {
  const rows = [{ total_revenue: 1234.5 }];

  it('returns the trimmed model answer', async () => {
    const generation = new ScriptedGeneration(['  Total revenue is 1,234.5.  ']);
    const narrator = new Narrator(generation, promptContext);

    expect(await narrator.narrate('What is the total revenue?', rows, 'moderate')).toBe('Total revenue is 1,234.5.');
    expect(generation.calls[0].prompt).toContain('Rows (1 total, first 1 shown, JSON):');
  });

  it('falls back to the summary without a model or on failure', async () => {
    expect(await new Narrator(null, promptContext).narrate('q', rows, 'simple')).toBe('total_revenue: 1,234.5');
    const failing = new Narrator(new ScriptedGeneration([new Error('down')]), promptContext);
    expect(await failing.narrate('q', rows, 'simple')).toBe('total_revenue: 1,234.5');
  });

  it('does not call the model for empty results', async () => {
    const generation = new ScriptedGeneration(['unused']);
    await new Narrator(generation, promptContext).narrate('q', [], 'simple');
    expect(generation.calls).toHaveLength(0);
  });
});
