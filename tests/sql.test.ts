import { describe, it, expect } from 'vitest';
import {
  applyRowLimit,
  balanceParentheses,
  catalogScope,
  checkReadOnly,
  extractQuery,
  fingerprint,
  groundQuery,
  hasRowLimit,
  normalizeSql,
  replaceIdentifier,
  stripTrailingSemicolons,
  tableReferences,
} from '../src/utils/sql.js';
import { shopCatalog } from './helpers.js';

describe('normalizeSql', () => {
  it('lowercases keywords, collapses whitespace and comments, keeps literals', () => {
    const sql = "SELECT  *\nFROM Orders -- recent only\nWHERE name = 'Bob';";
    expect(normalizeSql(sql)).toBe("select * from orders where name = 'Bob'");
  });
});

describe('fingerprint', () => {
  it('ignores formatting differences', () => {
    expect(fingerprint('select * from orders', 100)).toBe(fingerprint('SELECT *   FROM orders;', 100));
  });

  it('distinguishes literals and row caps', () => {
    const base = fingerprint("select * from customers where name = 'bob'", 100);
    expect(fingerprint("select * from customers where name = 'Bob'", 100)).not.toBe(base);
    expect(fingerprint("select * from customers where name = 'bob'", 200)).not.toBe(base);
  });

  it('separates cache scopes', () => {
    expect(fingerprint('select 1', 100, 'shop:a')).not.toBe(fingerprint('select 1', 100, 'shop:b'));
    expect(fingerprint('select 1', 100, '')).toBe(fingerprint('select 1', 100));
  });
});

describe('catalogScope', () => {
  it('depends on the schema, not the object', () => {
    const copy = structuredClone(shopCatalog);
    expect(catalogScope(copy)).toBe(catalogScope(shopCatalog));
    expect(catalogScope(shopCatalog).startsWith('shop:')).toBe(true);

    const changed = { ...copy, tables: copy.tables.slice(0, 1) };
    expect(catalogScope(changed)).not.toBe(catalogScope(shopCatalog));
  });
});

describe('checkReadOnly', () => {
  it('accepts single SELECT and WITH statements', () => {
    expect(checkReadOnly('SELECT * FROM orders')).toEqual({ allowed: true });
    expect(checkReadOnly('WITH t AS (SELECT 1) SELECT * FROM t')).toEqual({ allowed: true });
    expect(checkReadOnly('SELECT * FROM orders;')).toEqual({ allowed: true });
  });

  it('ignores verbs inside string literals', () => {
    expect(checkReadOnly("SELECT 'drop table x' AS note")).toEqual({ allowed: true });
  });

  it('rejects writes, multiple statements and other verbs', () => {
    expect(checkReadOnly('delete from orders')).toEqual({ allowed: false, reason: 'forbidden keyword DELETE' });
    expect(checkReadOnly('SELECT * INTO backup FROM orders')).toEqual({
      allowed: false,
      reason: 'forbidden keyword INTO',
    });
    expect(checkReadOnly('SELECT 1; SELECT 2')).toEqual({
      allowed: false,
      reason: 'multiple statements are not allowed',
    });
    expect(checkReadOnly('EXPLAIN SELECT 1')).toEqual({
      allowed: false,
      reason: 'statement must start with SELECT or WITH, found EXPLAIN',
    });
    expect(checkReadOnly('  ')).toEqual({ allowed: false, reason: 'empty statement' });
  });
});

describe('row limits', () => {
  it('appends a limit on its own line when the query has none', () => {
    expect(applyRowLimit('SELECT * FROM orders;', 100)).toBe('SELECT * FROM orders\nLIMIT 100');
  });

  it('keeps an existing outer limit', () => {
    expect(hasRowLimit('SELECT * FROM orders LIMIT 5')).toBe(true);
    expect(applyRowLimit('SELECT * FROM orders LIMIT 5', 100)).toBe('SELECT * FROM orders LIMIT 5');
  });

  it('does not count a limit inside a subquery', () => {
    const sql = 'SELECT * FROM (SELECT * FROM orders LIMIT 5) o';
    expect(hasRowLimit(sql)).toBe(false);
    expect(applyRowLimit(sql, 100)).toBe(`${sql}\nLIMIT 100`);
  });
});

describe('extractQuery', () => {
  it('prefers a fenced block and drops the semicolon', () => {
    expect(extractQuery('Here you go:\n```sql\nSELECT 1;\n```\nThanks')).toBe('SELECT 1');
  });

  it('stops unfenced output at the first blank line', () => {
    expect(extractQuery('SELECT name FROM customers\n\nThis lists customers.')).toBe('SELECT name FROM customers');
  });

  it('keeps CTEs whole', () => {
    const sql = 'WITH t AS (SELECT 1 AS x) SELECT x FROM t';
    expect(extractQuery(sql)).toBe(sql);
  });

  it('returns null when there is no statement', () => {
    expect(extractQuery('I am not able to help with that.')).toBeNull();
  });

  it('keeps only the first of several statements', () => {
    expect(extractQuery('SELECT 1; SELECT 2;')).toBe('SELECT 1');
  });
});

describe('stripTrailingSemicolons', () => {
  it('removes trailing separators and comments', () => {
    expect(stripTrailingSemicolons('SELECT 1 ;; -- done')).toBe('SELECT 1');
  });
});

describe('groundQuery', () => {
  it('accepts aliases and qualified columns', () => {
    const sql = 'SELECT o.revenue, c.name FROM orders o JOIN customers c ON o.customer_id = c.id';
    expect(groundQuery(sql, shopCatalog)).toEqual({ unknown: [], tables: ['orders', 'customers'] });
  });

  it('reports a misspelled column on its owning table', () => {
    expect(groundQuery('SELECT o.revenu FROM orders o', shopCatalog)).toEqual({
      unknown: ['revenu'],
      tables: ['orders'],
    });
  });

  it('reports unknown tables', () => {
    expect(groundQuery('SELECT COUNT(*) FROM invoices', shopCatalog)).toEqual({
      unknown: ['invoices'],
      tables: [],
    });
  });

  it('treats output aliases and CTE names as known', () => {
    const sql = 'WITH big AS (SELECT id, revenue FROM orders) SELECT SUM(revenue) AS total FROM big';
    expect(groundQuery(sql, shopCatalog)).toEqual({ unknown: [], tables: ['orders'] });
  });
});

describe('rewriting helpers', () => {
  it('lists referenced tables with their aliases', () => {
    const sql = 'SELECT o.revenue FROM orders o JOIN customers AS c ON o.customer_id = c.id';
    expect(tableReferences(sql, shopCatalog)).toEqual([
      { table: 'orders', alias: 'o' },
      { table: 'customers', alias: 'c' },
    ]);
    expect(tableReferences("SELECT * FROM orders WHERE status = 'x'", shopCatalog)).toEqual([{ table: 'orders' }]);
  });

  it('replaces identifiers but not literals', () => {
    expect(replaceIdentifier("SELECT revenu, 'revenu' FROM orders", 'revenu', 'revenue')).toBe(
      "SELECT revenue, 'revenu' FROM orders"
    );
  });

  it('balances parentheses', () => {
    expect(balanceParentheses('SELECT SUM(revenue FROM orders')).toBe('SELECT SUM(revenue FROM orders)');
    expect(balanceParentheses('SELECT 1)')).toBe('SELECT 1');
  });
});
