import { describe, it, expect } from 'vitest';
import type { Column, Table } from '../src/types/models.js';
import { describeSchema, dialectName, essentialColumns, narrationPrompt, repairPrompt } from '../src/services/prompts.js';
import { promptContext, shopCatalog } from './helpers.js';

describe('dialectName', () => {
  it('maps knex clients to engine names', () => {
    expect(dialectName('better-sqlite3')).toBe('SQLite');
    expect(dialectName('pg')).toBe('PostgreSQL');
    expect(dialectName('mysql2')).toBe('MySQL');
    expect(dialectName('oracledb')).toBe('ANSI');
  });
});

describe('essentialColumns', () => {
  it('falls back to the first columns when none has a key role', () => {
    const wide: Table = {
      name: 'events',
      columns: Array.from({ length: 10 }, (_, i): Column => ({ name: `c${i}`, type: 'text', role: 'other' })),
    };
    expect(essentialColumns(wide).map((c) => c.name)).toEqual(['c0', 'c1', 'c2', 'c3', 'c4', 'c5', 'c6', 'c7']);
  });
});

describe('describeSchema', () => {
  it('renders tables without relationships for simple questions', () => {
    expect(describeSchema(shopCatalog, 'simple')).toBe(
      [
        'Table orders (Orders)',
        '  - id [integer, identifier, primary key]',
        '  - customer_id [integer, identifier]',
        '  - order_date [date, date]',
        '  - revenue [decimal, amount]',
        '  - status [varchar, status]',
        '',
        'Table customers (Customers)',
        '  - id [integer, identifier, primary key]',
        '  - name [varchar, name]',
        '  - region [varchar, status]',
      ].join('\n')
    );
  });

  it('adds relationships for other tiers', () => {
    expect(describeSchema(shopCatalog, 'complex')).toContain(
      'Relationships:\n  - orders.customer_id = customers.id (many_to_one)'
    );
  });

  it('marks truncated output', () => {
    expect(describeSchema(shopCatalog, 'moderate', 60)).toBe('(schema truncated)');
  });
});

describe('prompt templates', () => {
  it('fills repair placeholders for an empty query', () => {
    const prompt = repairPrompt(
      { question: 'q', query: '', errors: [], suggestions: [], schema: 'Table t' },
      promptContext()
    );
    expect(prompt).toContain('Failed query:\n(none)');
    expect(prompt).toContain('Errors:\n- (none reported)');
    expect(prompt).not.toContain('Hints:');
  });

  it('shows at most the requested rows', () => {
    const rows = Array.from({ length: 25 }, (_, i) => ({ id: i }));
    const prompt = narrationPrompt('q', rows, 20);
    expect(prompt).toContain('Rows (25 total, first 20 shown, JSON):');
    expect(prompt).toContain('"id": 19');
    expect(prompt).not.toContain('"id": 20');
  });
});
