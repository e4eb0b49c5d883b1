/**
 * Catalog validation: structural invariants (errors) and modelling hints
 * (warnings).
 */

import { z } from 'zod';
import { CARDINALITIES, COLUMN_ROLES } from '../../types/models.js';
import type { SchemaCatalog } from '../../types/models.js';

export interface CatalogReport {
  valid: boolean;
  /** Invariant violations; a catalog with errors is never published. */
  errors: string[];
  /** Isolated tables, missing business names and similar. */
  warnings: string[];
}

/**
 * Check a catalog against its invariants: unique table names and
 * relationships that only reference tables and columns present.
 */
export function validateCatalog(catalog: SchemaCatalog): CatalogReport {
  const errors: string[] = [];
  const warnings: string[] = [];

  const tables = new Map<string, Set<string>>();
  for (const table of catalog.tables) {
    const key = table.name.toLowerCase();
    if (tables.has(key)) {
      errors.push(`Duplicate table name: ${table.name}`);
      continue;
    }
    tables.set(key, new Set(table.columns.map((c) => c.name.toLowerCase())));
  }

  const connected = new Set<string>();
  for (const rel of catalog.relationships) {
    const label = `${rel.sourceTable} -> ${rel.targetTable}`;
    const source = tables.get(rel.sourceTable.toLowerCase());
    const target = tables.get(rel.targetTable.toLowerCase());
    if (!source) errors.push(`Relationship ${label} references unknown table ${rel.sourceTable}`);
    if (!target) errors.push(`Relationship ${label} references unknown table ${rel.targetTable}`);
    if (rel.joinKeys.length === 0) errors.push(`Relationship ${label} has no join keys`);
    for (const key of rel.joinKeys) {
      if (source && !source.has(key.source.toLowerCase())) {
        errors.push(`Relationship ${label} references unknown column ${rel.sourceTable}.${key.source}`);
      }
      if (target && !target.has(key.target.toLowerCase())) {
        errors.push(`Relationship ${label} references unknown column ${rel.targetTable}.${key.target}`);
      }
    }
    connected.add(rel.sourceTable.toLowerCase());
    connected.add(rel.targetTable.toLowerCase());
  }

  if (catalog.tables.length > 1) {
    const isolated = catalog.tables.filter((t) => !connected.has(t.name.toLowerCase()));
    if (isolated.length > 0) {
      warnings.push(`Tables without relationships: ${isolated.map((t) => t.name).join(', ')}`);
    }
  }

  const unnamed = catalog.tables.filter((t) => !t.alias);
  if (unnamed.length > 0) {
    warnings.push(`Consider adding business names for: ${unnamed.map((t) => t.name).join(', ')}`);
  }

  const empty = catalog.tables.filter((t) => t.columns.length === 0);
  if (empty.length > 0) {
    warnings.push(`Tables without columns: ${empty.map((t) => t.name).join(', ')}`);
  }

  return { valid: errors.length === 0, errors, warnings };
}

const ColumnSchema = z.object({
  name: z.string().min(1),
  type: z.string().default('text'),
  role: z.enum(COLUMN_ROLES).default('other'),
  alias: z.string().optional(),
  primaryKey: z.boolean().optional(),
  nullable: z.boolean().optional(),
});

const TableSchema = z.object({
  name: z.string().min(1),
  alias: z.string().optional(),
  description: z.string().optional(),
  columns: z.array(ColumnSchema),
});

const RelationshipSchema = z.object({
  sourceTable: z.string().min(1),
  targetTable: z.string().min(1),
  joinKeys: z.array(z.object({ source: z.string().min(1), target: z.string().min(1) })),
  cardinality: z.enum(CARDINALITIES).default('many_to_one'),
});

/**
 * Zod schema for catalogs read from disk or received over HTTP.
 */
export const CatalogSchema = z
  .object({
    id: z.string().min(1),
    tables: z.array(TableSchema),
    relationships: z.array(RelationshipSchema).default([]),
    refreshedAt: z.string().optional(),
  })
  .superRefine((catalog, ctx) => {
    for (const message of validateCatalog(catalog).errors) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message });
    }
  });
