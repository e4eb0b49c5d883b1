/**
 * Schema context reducer.
 *
 * Keeps the prompt bounded by passing only the tables most relevant to a
 * question. Relevance is term overlap: a question term that appears in a
 * table's name, alias or description counts 3, one that appears in any of
 * its column names or aliases counts 1.
 */

import type { SchemaCatalog, Table } from '../types/models.js';
import { deepFreeze } from '../types/utils.js';
import { normalizeQuestion, questionTerms, splitTerms } from '../utils/text.js';

const TABLE_WEIGHT = 3;
const COLUMN_WEIGHT = 1;
const MEMO_LIMIT = 500;

/**
 * Relevance of one table to a set of question terms.
 */
export function scoreTable(terms: ReadonlySet<string>, table: Table): number {
  const tableTerms = new Set([
    ...splitTerms(table.name),
    ...splitTerms(table.alias ?? ''),
    ...splitTerms(table.description ?? ''),
  ]);
  const columnTerms = new Set(
    table.columns.flatMap((c) => [...splitTerms(c.name), ...splitTerms(c.alias ?? '')])
  );

  let score = 0;
  for (const term of terms) {
    if (tableTerms.has(term)) score += TABLE_WEIGHT;
    if (columnTerms.has(term)) score += COLUMN_WEIGHT;
  }
  return score;
}

/**
 * The K most relevant tables of a catalog, in declaration order, with the
 * relationships among them. A catalog of K tables or fewer is returned as is.
 */
export function reduceContext(
  question: string,
  catalog: SchemaCatalog,
  options: { maxTables: number }
): SchemaCatalog {
  if (catalog.tables.length <= options.maxTables) return catalog;

  const terms = new Set(questionTerms(question));
  const ranked = catalog.tables
    .map((table, index) => ({ table, index, score: scoreTable(terms, table) }))
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .slice(0, options.maxTables);

  const keep = new Set(ranked.map((r) => r.index));
  const tables = catalog.tables.filter((_, index) => keep.has(index));
  const names = new Set(tables.map((t) => t.name));

  return deepFreeze({
    id: catalog.id,
    tables,
    relationships: catalog.relationships.filter(
      (rel) => names.has(rel.sourceTable) && names.has(rel.targetTable)
    ),
    refreshedAt: catalog.refreshedAt,
  });
}

/**
 * Memoising wrapper: one reduction per catalog snapshot and question.
 * Snapshots are immutable, so a refreshed catalog starts a fresh memo.
 */
export class SchemaContextReducer {
  private memo = new WeakMap<SchemaCatalog, Map<string, SchemaCatalog>>();

  constructor(private readonly maxTables: number = 5) {}

  reduce(question: string, catalog: SchemaCatalog): SchemaCatalog {
    let byQuestion = this.memo.get(catalog);
    if (!byQuestion) {
      byQuestion = new Map();
      this.memo.set(catalog, byQuestion);
    }

    const key = normalizeQuestion(question);
    const cached = byQuestion.get(key);
    if (cached) return cached;

    const reduced = reduceContext(question, catalog, { maxTables: this.maxTables });
    if (byQuestion.size >= MEMO_LIMIT) {
      const oldest = byQuestion.keys().next().value;
      if (oldest !== undefined) byQuestion.delete(oldest);
    }
    byQuestion.set(key, reduced);
    return reduced;
  }
}
