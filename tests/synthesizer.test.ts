import { describe, it, expect } from 'vitest';
import { Synthesizer, candidateFromText, gradeCandidate } from '../src/services/synthesizer.js';
import { ScriptedGeneration, promptContext, shopCatalog } from './helpers.js';

describe('gradeCandidate', () => {
  it('scores grounded queries by whether they name a table', () => {
    expect(gradeCandidate('SELECT name FROM customers', shopCatalog)).toEqual({
      query: 'SELECT name FROM customers',
      confidence: 0.7,
      errors: [],
    });
    expect(gradeCandidate('SELECT 1', shopCatalog).confidence).toBe(0.5);
  });

  it('flags unknown identifiers', () => {
    expect(gradeCandidate('SELECT nme FROM customers', shopCatalog)).toEqual({
      query: 'SELECT nme FROM customers',
      confidence: 0.1,
      errors: ['uses unknown identifier nme'],
    });
  });
});

describe('candidateFromText', () => {
  it('treats a refusal as a generation failure', () => {
    expect(candidateFromText("I'm sorry, I can't help with that.", shopCatalog)).toEqual({
      query: '',
      confidence: 0,
      errors: ['GenerationFailure: model declined to write a query'],
    });
  });

  it('reports output without a statement', () => {
    expect(candidateFromText('Here is nothing useful.', shopCatalog).errors).toEqual([
      'GenerationFailure: model response contained no SQL statement',
    ]);
  });
});

describe('Synthesizer', () => {
  it('makes one call with the schema, question and date in the prompt', async () => {
    const generation = new ScriptedGeneration(['SELECT COUNT(*) FROM orders']);
    const synthesizer = new Synthesizer(generation, promptContext);

    const candidate = await synthesizer.synthesize('How many orders?', shopCatalog, 'moderate');

    expect(candidate).toEqual({ query: 'SELECT COUNT(*) FROM orders', confidence: 0.7, errors: [] });
    expect(generation.calls).toHaveLength(1);
    const [request] = generation.calls;
    expect(request.tier).toBe('moderate');
    expect(request.system).toContain('single read-only SQLite SQL query');
    expect(request.prompt).toContain('Table orders (Orders)');
    expect(request.prompt).toContain('  - orders.customer_id = customers.id (many_to_one)');
    expect(request.prompt).toContain('assume the current date is 2024-06-30');
    expect(request.prompt).toContain('Question:\nHow many orders?');
  });

  it('turns generation errors into a zero-confidence candidate', async () => {
    const synthesizer = new Synthesizer(new ScriptedGeneration([new Error('boom')]), promptContext);

    expect(await synthesizer.synthesize('How many orders?', shopCatalog, 'simple')).toEqual({
      query: '',
      confidence: 0,
      errors: ['GenerationFailure: boom'],
    });
  });

  it('rethrows when the caller has aborted', async () => {
    const controller = new AbortController();
    const generation = new ScriptedGeneration([
      () => {
        controller.abort();
        return new Error('stopped');
      },
    ]);
    const synthesizer = new Synthesizer(generation, promptContext);

    await expect(
      synthesizer.synthesize('How many orders?', shopCatalog, 'simple', { signal: controller.signal })
    ).rejects.toThrow('stopped');
  });
});
