/**
 * Schema discovery: builds a catalog from a live database.
 *
 * Column roles, business names and missing relationships are inferred from
 * naming conventions when the database does not declare them.
 */

import type { Knex } from 'knex';
import { SchemaInspector } from 'knex-schema-inspector';
import type {
  Column,
  ColumnRole,
  Relationship,
  SchemaCatalog,
  Table,
} from '../../types/models.js';
import { logger } from '../../utils/logger.js';
import { singularize } from '../../utils/text.js';

export interface IntrospectedColumn {
  name: string;
  dataType: string;
  nullable: boolean;
  primaryKey: boolean;
}

export interface IntrospectedForeignKey {
  column: string;
  foreignTable: string;
  foreignColumn: string;
}

/**
 * What discovery needs from a database.
 */
export interface SchemaIntrospector {
  tables(): Promise<string[]>;
  columns(table: string): Promise<IntrospectedColumn[]>;
  foreignKeys(table: string): Promise<IntrospectedForeignKey[]>;
}

/**
 * Introspector backed by knex-schema-inspector.
 */
export function knexIntrospector(db: Knex): SchemaIntrospector {
  const inspector = SchemaInspector(db);
  return {
    tables: () => inspector.tables(),
    columns: async (table) => {
      const columns = await inspector.columnInfo(table);
      return columns.map((col) => ({
        name: col.name,
        dataType: col.data_type,
        nullable: col.is_nullable,
        primaryKey: col.is_primary_key,
      }));
    },
    foreignKeys: async (table) => {
      const fks = await inspector.foreignKeys(table);
      return fks
        .filter((fk) => fk.table === table)
        .map((fk) => ({
          column: fk.column,
          foreignTable: fk.foreign_key_table,
          foreignColumn: fk.foreign_key_column,
        }));
    },
  };
}

function nameTerms(name: string): string[] {
  return name
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter(Boolean);
}

function hasTerm(terms: string[], candidates: string[]): boolean {
  return terms.some((t) => candidates.includes(t));
}

/**
 * Infer a column's semantic role from its name and declared type.
 */
export function inferColumnRole(name: string, dataType: string, primaryKey = false): ColumnRole {
  const terms = nameTerms(name);
  const type = dataType.toLowerCase();

  if (hasTerm(terms, ['email', 'mail', 'phone', 'mobile', 'url', 'link', 'website'])) return 'text';
  if (primaryKey || hasTerm(terms, ['id', 'key', 'code', 'uuid', 'sku'])) return 'identifier';
  if (
    hasTerm(terms, ['date', 'time', 'created', 'updated', 'modified', 'timestamp', 'at', 'on']) ||
    /date|time/.test(type)
  ) {
    return 'date';
  }
  if (hasTerm(terms, ['amount', 'price', 'cost', 'value', 'total', 'revenue', 'sum', 'balance', 'salary', 'fee', 'amt'])) {
    return 'amount';
  }
  if (hasTerm(terms, ['count', 'qty', 'quantity', 'num', 'number', 'units', 'stock'])) return 'quantity';
  if (hasTerm(terms, ['status', 'state', 'type', 'category', 'kind', 'tier', 'segment', 'flag', 'active'])) {
    return 'status';
  }
  if (hasTerm(terms, ['name', 'title', 'label'])) return 'name';
  if (hasTerm(terms, ['address', 'street', 'city', 'zip', 'description', 'comment', 'note', 'notes'])) {
    return 'text';
  }
  if (/char|text|string|clob/.test(type)) return 'text';
  return 'other';
}

function titleCase(name: string): string {
  return nameTerms(name)
    .map((t) => t.charAt(0).toUpperCase() + t.slice(1))
    .join(' ');
}

/**
 * Business-friendly table name: "order_items" becomes "Order Items".
 */
export function inferTableAlias(table: string): string {
  const name = titleCase(table);
  if (name.endsWith(' Dim')) return `${name.slice(0, -4)} Dimension`;
  if (name.endsWith(' Fact')) return `${name.slice(0, -5)} Facts`;
  if (name.endsWith(' Master')) return `${name.slice(0, -7)} Master Data`;
  return name;
}

const COLUMN_SUFFIXES: Record<string, string> = {
  ' Id': ' ID',
  ' Cd': ' Code',
  ' Dt': ' Date',
  ' Amt': ' Amount',
  ' Qty': ' Quantity',
};

/**
 * Business-friendly column name: "order_dt" becomes "Order Date".
 */
export function inferColumnAlias(column: string): string {
  const name = titleCase(column);
  for (const [suffix, replacement] of Object.entries(COLUMN_SUFFIXES)) {
    if (name.endsWith(suffix)) return `${name.slice(0, -suffix.length)}${replacement}`;
  }
  return name === 'Id' ? 'ID' : name;
}

/**
 * Relationships implied by `<name>_id` columns that point at a table called
 * `<name>`, its plural, or a `_dim` / `_master` variant.
 */
export function inferRelationships(tables: readonly Table[]): Relationship[] {
  const byName = new Map(tables.map((t) => [t.name.toLowerCase(), t]));
  const relationships: Relationship[] = [];

  for (const table of tables) {
    for (const column of table.columns) {
      const match = /^(.+?)_?id$/i.exec(column.name);
      if (!match || column.primaryKey || column.name.toLowerCase() === 'id') continue;

      const stem = match[1].replace(/_$/, '').toLowerCase();
      const variations = [stem, `${stem}s`, `${stem}es`, singularize(stem), `${stem}_dim`, `${stem}_master`];
      if (stem.endsWith('y')) variations.push(`${stem.slice(0, -1)}ies`);

      const target = variations
        .map((v) => byName.get(v))
        .find((t): t is Table => t !== undefined && t.name !== table.name);
      if (!target) continue;

      const targetColumn =
        target.columns.find((c) => c.primaryKey) ??
        target.columns.find((c) => c.name.toLowerCase() === 'id' || c.name.toLowerCase() === column.name.toLowerCase());
      if (!targetColumn) continue;

      relationships.push({
        sourceTable: table.name,
        targetTable: target.name,
        joinKeys: [{ source: column.name, target: targetColumn.name }],
        cardinality: 'many_to_one',
      });
    }
  }

  return relationships;
}

function relationshipKey(rel: Relationship): string {
  const keys = rel.joinKeys.map((k) => `${k.source}=${k.target}`).join(',');
  return `${rel.sourceTable}|${rel.targetTable}|${keys}`.toLowerCase();
}

export interface DiscoveryOptions {
  /** Tables to skip, such as migration bookkeeping. */
  excludeTables?: string[];
  now?: () => Date;
}

export class CatalogDiscovery {
  private readonly exclude: Set<string>;
  private readonly now: () => Date;

  constructor(
    private readonly introspector: SchemaIntrospector,
    options: DiscoveryOptions = {}
  ) {
    this.exclude = new Set(
      (options.excludeTables ?? ['knex_migrations', 'knex_migrations_lock']).map((t) => t.toLowerCase())
    );
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Read every table, column and foreign key and build a catalog.
   */
  async discover(id: string): Promise<SchemaCatalog> {
    const names = (await this.introspector.tables()).filter(
      (t) => !this.exclude.has(t.toLowerCase()) && !t.toLowerCase().startsWith('sqlite_')
    );

    // Fetch all table schemas in parallel
    const tables: Table[] = await Promise.all(
      names.map(async (name) => {
        const columns = await this.introspector.columns(name);
        return {
          name,
          alias: inferTableAlias(name),
          columns: columns.map(
            (col): Column => ({
              name: col.name,
              type: col.dataType,
              role: inferColumnRole(col.name, col.dataType, col.primaryKey),
              alias: inferColumnAlias(col.name),
              primaryKey: col.primaryKey || undefined,
              nullable: col.nullable,
            })
          ),
        };
      })
    );

    const declared: Relationship[] = [];
    const tableNames = new Set(names);
    for (const table of names) {
      try {
        for (const fk of await this.introspector.foreignKeys(table)) {
          if (!tableNames.has(fk.foreignTable)) continue;
          declared.push({
            sourceTable: table,
            targetTable: fk.foreignTable,
            joinKeys: [{ source: fk.column, target: fk.foreignColumn }],
            cardinality: 'many_to_one',
          });
        }
      } catch (error) {
        // Foreign keys might not be supported in all databases
        logger.warn(`Could not fetch foreign keys for ${table}: ${error}`);
      }
    }

    const seen = new Set(declared.map(relationshipKey));
    const inferred = inferRelationships(tables).filter((rel) => {
      const sourceColumns = new Set(
        declared.filter((d) => d.sourceTable === rel.sourceTable).flatMap((d) => d.joinKeys.map((k) => k.source))
      );
      return !seen.has(relationshipKey(rel)) && !rel.joinKeys.some((k) => sourceColumns.has(k.source));
    });

    logger.info(
      `Discovered ${tables.length} tables, ${declared.length} declared and ${inferred.length} inferred relationships`
    );

    return {
      id,
      tables,
      relationships: [...declared, ...inferred],
      refreshedAt: this.now().toISOString(),
    };
  }
}
