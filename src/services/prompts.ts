/**
 * Prompt templates and schema rendering for the model calls.
 */

import type { Column, SchemaCatalog, Table, Tier } from '../types/models.js';
import type { Row } from '../types/utils.js';

/** Upper bound on the rendered schema text. */
export const MAX_SCHEMA_CHARS = 6000;

/** Columns rendered per table. */
export const MAX_COLUMNS_PER_TABLE = 8;

const ESSENTIAL_ROLES = new Set(['identifier', 'name', 'date', 'amount', 'quantity', 'status']);

export const SYSTEM_PROMPT = `You are an expert data analyst working inside an automated reporting service.
You answer questions by writing a single read-only {dialect} SQL query against the schema you are given.

Rules:
- Use only the tables, columns and relationships listed in the schema
- Never modify data: no INSERT, UPDATE, DELETE, DROP, ALTER, CREATE or similar
- Write exactly one statement that starts with SELECT or WITH
- Double-quote identifiers that contain spaces, mixed case or reserved words`;

const SYNTHESIS_PROMPT = `Write one {dialect} SQL query that answers the question below.

Instructions:
- Output ONLY the SQL query, with no explanation
- For relative time periods ("last quarter", "this year") assume the current date is {date}
- Join tables only through the listed relationships

Schema:
{schema}

Question:
{question}

SQL:`;

const REPAIR_PROMPT = `The SQL query below failed or returned an untrustworthy result.
Read the errors carefully and write a corrected {dialect} SQL query.

Instructions:
- Output ONLY the corrected SQL query, with no explanation
- Compare every table and column name with the schema
- Assume the current date is {date}

Schema:
{schema}

Question:
{question}

Failed query:
{query}

Errors:
{errors}
{suggestions}
Corrected SQL:`;

const NARRATION_PROMPT = `A query answering the question below ran successfully.
Write a short answer for a business user based only on the rows shown.

Instructions:
- Start by answering the question directly
- Summarize the key figures; do not list every row
- Keep it to one paragraph or a few bullet points

Question:
{question}

Rows ({rowCount} total, first {shown} shown, JSON):
{rows}

Answer:`;

function fill(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match: string, key: string) => values[key] ?? match);
}

/**
 * Human-readable engine name for a knex client.
 */
export function dialectName(client: string): string {
  switch (client) {
    case 'pg':
    case 'postgres':
    case 'postgresql':
      return 'PostgreSQL';
    case 'mysql':
    case 'mysql2':
      return 'MySQL';
    case 'sqlite3':
    case 'better-sqlite3':
      return 'SQLite';
    default:
      return 'ANSI';
  }
}

/**
 * Columns worth showing the model: primary keys and key business roles,
 * falling back to the first columns when none qualify.
 */
export function essentialColumns(table: Table): readonly Column[] {
  const essential = table.columns.filter((c) => c.primaryKey || ESSENTIAL_ROLES.has(c.role));
  const chosen = essential.length > 0 ? essential : table.columns;
  return chosen.slice(0, MAX_COLUMNS_PER_TABLE);
}

function describeTable(table: Table): string {
  const header = table.alias ? `Table ${table.name} (${table.alias})` : `Table ${table.name}`;
  const lines = [table.description ? `${header}: ${table.description}` : header];
  for (const column of essentialColumns(table)) {
    const notes = [column.type, column.role];
    if (column.primaryKey) notes.push('primary key');
    const alias = column.alias ? ` "${column.alias}"` : '';
    lines.push(`  - ${column.name}${alias} [${notes.join(', ')}]`);
  }
  return lines.join('\n');
}

/**
 * Render a schema context for a prompt, within MAX_SCHEMA_CHARS.
 * Relationships are only shown to the moderate and complex tiers.
 */
export function describeSchema(context: SchemaCatalog, tier: Tier, maxChars: number = MAX_SCHEMA_CHARS): string {
  const blocks = context.tables.map(describeTable);

  if (tier !== 'simple' && context.relationships.length > 0) {
    const joins = context.relationships.map((rel) => {
      const keys = rel.joinKeys
        .map((k) => `${rel.sourceTable}.${k.source} = ${rel.targetTable}.${k.target}`)
        .join(' AND ');
      return `  - ${keys} (${rel.cardinality})`;
    });
    blocks.push(['Relationships:', ...joins].join('\n'));
  }

  let text = '';
  for (const block of blocks) {
    const next = text ? `${text}\n\n${block}` : block;
    if (next.length > maxChars) {
      return `${text}\n\n(schema truncated)`.trimStart();
    }
    text = next;
  }
  return text;
}

export interface PromptContext {
  dialect: string;
  /** ISO date (YYYY-MM-DD). */
  date: string;
}

export function systemPrompt(ctx: PromptContext): string {
  return fill(SYSTEM_PROMPT, { dialect: ctx.dialect });
}

export function synthesisPrompt(question: string, schema: string, ctx: PromptContext): string {
  return fill(SYNTHESIS_PROMPT, { dialect: ctx.dialect, date: ctx.date, schema, question });
}

export function repairPrompt(
  input: { question: string; query: string; errors: string[]; suggestions: string[]; schema: string },
  ctx: PromptContext
): string {
  const suggestions =
    input.suggestions.length > 0 ? `\nHints:\n${input.suggestions.map((s) => `- ${s}`).join('\n')}\n` : '';
  return fill(REPAIR_PROMPT, {
    dialect: ctx.dialect,
    date: ctx.date,
    schema: input.schema,
    question: input.question,
    query: input.query || '(none)',
    errors: input.errors.map((e) => `- ${e}`).join('\n') || '- (none reported)',
    suggestions,
  });
}

export function narrationPrompt(question: string, rows: Row[], shown: number): string {
  return fill(NARRATION_PROMPT, {
    question,
    rowCount: String(rows.length),
    shown: String(Math.min(shown, rows.length)),
    rows: JSON.stringify(rows.slice(0, shown), null, 2),
  });
}
