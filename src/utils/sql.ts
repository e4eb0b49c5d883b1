/**
 * SQL text utilities: tokenizing, the read-only guard, fingerprinting,
 * row limiting, extraction from model output and schema grounding.
 *
 * None of this parses SQL into a tree. A flat token stream is enough to
 * tell literals, quoted identifiers and comments apart from keywords.
 */

import crypto from 'crypto';
import type { SchemaCatalog } from '../types/models.js';
import { FORBIDDEN_KEYWORDS, RESERVED_WORDS } from './lexicon.js';

export type TokenKind =
  | 'word'
  | 'quoted'
  | 'string'
  | 'number'
  | 'symbol'
  | 'comment'
  | 'space';

export interface Token {
  kind: TokenKind;
  /** Source text, including quotes. Concatenating every token's text gives back the input. */
  text: string;
  /** Lowercased word, or the inner text of a quoted identifier. */
  value: string;
  start: number;
  end: number;
}

const WORD_START = /[\p{L}_]/u;
const WORD_PART = /[\p{L}\p{N}_$]/u;

/**
 * Split SQL into tokens. Unterminated literals run to the end of input.
 */
export function tokenize(sql: string): Token[] {
  const tokens: Token[] = [];
  const n = sql.length;
  let i = 0;

  const push = (kind: TokenKind, start: number, value?: string) => {
    const text = sql.slice(start, i);
    tokens.push({ kind, text, value: value ?? text, start, end: i });
  };

  while (i < n) {
    const ch = sql[i];
    const start = i;

    if (/\s/.test(ch)) {
      while (i < n && /\s/.test(sql[i])) i++;
      push('space', start);
    } else if (ch === '-' && sql[i + 1] === '-') {
      while (i < n && sql[i] !== '\n') i++;
      push('comment', start);
    } else if (ch === '/' && sql[i + 1] === '*') {
      const close = sql.indexOf('*/', i + 2);
      i = close === -1 ? n : close + 2;
      push('comment', start);
    } else if (ch === "'") {
      i++;
      while (i < n) {
        if (sql[i] === "'") {
          if (sql[i + 1] === "'") {
            i += 2;
            continue;
          }
          i++;
          break;
        }
        i++;
      }
      push('string', start);
    } else if (ch === '"' || ch === '`') {
      i++;
      while (i < n && sql[i] !== ch) i++;
      const inner = sql.slice(start + 1, i);
      i = Math.min(i + 1, n);
      push('quoted', start, inner);
    } else if (/[0-9]/.test(ch)) {
      while (i < n && /[0-9.]/.test(sql[i])) i++;
      push('number', start);
    } else if (WORD_START.test(ch)) {
      while (i < n && WORD_PART.test(sql[i])) i++;
      push('word', start, sql.slice(start, i).toLowerCase());
    } else {
      i++;
      push('symbol', start);
    }
  }

  return tokens;
}

function significant(tokens: Token[]): Token[] {
  return tokens.filter((t) => t.kind !== 'space' && t.kind !== 'comment');
}

function isSymbol(token: Token | undefined, text: string): boolean {
  return token !== undefined && token.kind === 'symbol' && token.text === text;
}

/**
 * Drop trailing semicolons, whitespace and comments.
 */
export function stripTrailingSemicolons(sql: string): string {
  const tokens = significant(tokenize(sql));
  let last = tokens.length - 1;
  while (last >= 0 && isSymbol(tokens[last], ';')) last--;
  if (last < 0) return '';
  return sql.slice(0, tokens[last].end).trim();
}

// ============================================================================
// FINGERPRINT
// ============================================================================

/**
 * Canonical text of a query: keywords and unquoted identifiers lowercased,
 * whitespace and comments collapsed to one space, literals and quoted
 * identifiers untouched, trailing semicolons dropped.
 */
export function normalizeSql(sql: string): string {
  const parts: string[] = [];
  for (const token of tokenize(sql)) {
    if (token.kind === 'space' || token.kind === 'comment') {
      if (parts.length > 0 && parts[parts.length - 1] !== ' ') parts.push(' ');
    } else if (token.kind === 'word') {
      parts.push(token.value);
    } else {
      parts.push(token.text);
    }
  }
  while (parts.length > 0 && (parts[parts.length - 1] === ' ' || parts[parts.length - 1] === ';')) {
    parts.pop();
  }
  return parts.join('');
}

/**
 * Cache key for a query under a given row cap.
 */
export function fingerprint(sql: string, rowCap: number, scope: string = ''): string {
  return crypto
    .createHash('sha256')
    .update(`${normalizeSql(sql)}\n${rowCap}${scope ? `\n${scope}` : ''}`)
    .digest('hex');
}

const scopes = new WeakMap<SchemaCatalog, string>();

/**
 * Cache scope of a catalog snapshot: its id and a digest of its tables and
 * relationships. Rows cached against one schema are never read under another.
 */
export function catalogScope(catalog: SchemaCatalog): string {
  let scope = scopes.get(catalog);
  if (!scope) {
    const digest = crypto
      .createHash('sha256')
      .update(JSON.stringify({ tables: catalog.tables, relationships: catalog.relationships }))
      .digest('hex')
      .slice(0, 16);
    scope = `${catalog.id}:${digest}`;
    scopes.set(catalog, scope);
  }
  return scope;
}

// ============================================================================
// READ-ONLY GUARD
// ============================================================================

export type GuardVerdict = { allowed: true } | { allowed: false; reason: string };

/**
 * Accept only a single statement that starts with SELECT or WITH and
 * carries no write, DDL or session verb outside literals.
 */
export function checkReadOnly(sql: string): GuardVerdict {
  const tokens = significant(tokenize(sql));
  let end = tokens.length;
  while (end > 0 && isSymbol(tokens[end - 1], ';')) end--;
  const body = tokens.slice(0, end);

  if (body.length === 0) {
    return { allowed: false, reason: 'empty statement' };
  }

  const verb = body.find((t) => t.kind === 'word' && FORBIDDEN_KEYWORDS.has(t.value));
  if (verb) {
    return { allowed: false, reason: `forbidden keyword ${verb.value.toUpperCase()}` };
  }

  if (body.some((t) => isSymbol(t, ';'))) {
    return { allowed: false, reason: 'multiple statements are not allowed' };
  }

  const first = body.find((t) => !isSymbol(t, '('));
  if (!first || first.kind !== 'word' || (first.value !== 'select' && first.value !== 'with')) {
    return {
      allowed: false,
      reason: `statement must start with SELECT or WITH, found ${first ? first.text : 'nothing'}`,
    };
  }

  return { allowed: true };
}

// ============================================================================
// ROW LIMIT
// ============================================================================

/**
 * True when the outermost query already limits its rows.
 */
export function hasRowLimit(sql: string): boolean {
  let depth = 0;
  for (const token of significant(tokenize(sql))) {
    if (isSymbol(token, '(')) depth++;
    else if (isSymbol(token, ')')) depth--;
    else if (
      depth === 0 &&
      token.kind === 'word' &&
      (token.value === 'limit' || token.value === 'fetch' || token.value === 'top')
    ) {
      return true;
    }
  }
  return false;
}

/**
 * Append `LIMIT rowCap` unless the query limits itself. The clause goes on
 * its own line so a trailing line comment cannot swallow it.
 */
export function applyRowLimit(sql: string, rowCap: number): string {
  const trimmed = stripTrailingSemicolons(sql);
  if (hasRowLimit(trimmed)) return trimmed;
  return `${trimmed}\nLIMIT ${rowCap}`;
}

// ============================================================================
// EXTRACTION
// ============================================================================

const STATEMENT_START =
  '(?:(?:select|insert|update|delete|drop|alter|create|truncate|merge|grant|revoke)\\b' +
  '|with\\s+(?:recursive\\s+)?["`]?\\w+["`]?\\s+as\\s*\\()';
const LINE_START_STATEMENT = new RegExp(`^[ \\t(]*${STATEMENT_START}`, 'im');
const ANY_STATEMENT = new RegExp(`\\b${STATEMENT_START}`, 'i');
const FENCE = /```[ \t]*[\w-]*[ \t]*\r?\n?([\s\S]*?)```/;

/**
 * Pull the first SQL statement out of free-form model output. A fenced
 * block wins; otherwise the first line that opens with a statement keyword.
 * Returns null when the text holds no statement at all.
 */
export function extractQuery(text: string): string | null {
  const fenced = FENCE.exec(text);
  let candidate = fenced ? fenced[1] : text;

  const match = LINE_START_STATEMENT.exec(candidate) ?? ANY_STATEMENT.exec(candidate);
  if (!match) return null;
  candidate = candidate.slice(match.index);

  if (!fenced) {
    const blank = candidate.search(/\r?\n[ \t]*\r?\n/);
    if (blank !== -1) candidate = candidate.slice(0, blank);
  }

  const separator = tokenize(candidate).find((t) => isSymbol(t, ';'));
  if (separator) candidate = candidate.slice(0, separator.start);

  const cleaned = stripTrailingSemicolons(candidate.replace(/```/g, '')).trim();
  return cleaned.length > 0 ? cleaned : null;
}

// ============================================================================
// GROUNDING
// ============================================================================

export interface GroundingReport {
  /** Identifiers the catalog does not define, in order of appearance. */
  unknown: string[];
  /** Catalog tables the query references, in catalog order. */
  tables: string[];
}

function isIdentifier(token: Token | undefined): token is Token {
  if (!token) return false;
  if (token.kind === 'quoted') return true;
  return (
    token.kind === 'word' &&
    !RESERVED_WORDS.has(token.value) &&
    !FORBIDDEN_KEYWORDS.has(token.value)
  );
}

function identifierKey(token: Token): string {
  return token.value.toLowerCase();
}

/**
 * Check every identifier in a query against a catalog. Names introduced by
 * the query itself (CTEs, table and output aliases) count as known.
 * Matching is case-insensitive; case mismatches are the engine's to report.
 */
export function groundQuery(sql: string, catalog: SchemaCatalog): GroundingReport {
  const tokens = significant(tokenize(sql));

  const tableColumns = new Map<string, Set<string>>();
  const allColumns = new Set<string>();
  for (const table of catalog.tables) {
    const columns = new Set(table.columns.map((c) => c.name.toLowerCase()));
    tableColumns.set(table.name.toLowerCase(), columns);
    for (const column of columns) allColumns.add(column);
  }

  const defined = new Set<string>();
  const aliasTarget = new Map<string, string>();

  // Pass 1: names the query defines.
  tokens.forEach((token, i) => {
    const next = tokens[i + 1];
    if (token.kind === 'word' && token.value === 'as' && next && (next.kind === 'word' || next.kind === 'quoted')) {
      defined.add(identifierKey(next));
      const prev = tokens[i - 1];
      if (prev && isIdentifier(prev) && tableColumns.has(identifierKey(prev))) {
        aliasTarget.set(identifierKey(next), identifierKey(prev));
      }
      return;
    }
    if (isIdentifier(token) && next && next.kind === 'word' && next.value === 'as' && isSymbol(tokens[i + 2], '(')) {
      defined.add(identifierKey(token));
      return;
    }
    const follows = isIdentifier(token) || isSymbol(token, ')');
    if (follows && isIdentifier(next) && !isSymbol(tokens[i + 2], '(')) {
      defined.add(identifierKey(next));
      if (isIdentifier(token) && tableColumns.has(identifierKey(token))) {
        aliasTarget.set(identifierKey(next), identifierKey(token));
      }
    }
  });

  const unknown: string[] = [];
  const referenced = new Set<string>();
  const report = (token: Token) => {
    const name = token.kind === 'quoted' ? token.value : token.text;
    if (!unknown.includes(name)) unknown.push(name);
  };

  // Pass 2: every identifier use.
  tokens.forEach((token, i) => {
    if (!isIdentifier(token)) return;
    const prev = tokens[i - 1];
    const next = tokens[i + 1];
    const key = identifierKey(token);

    if (token.kind === 'word' && isSymbol(next, '(')) return;
    if (prev && prev.kind === 'word' && prev.value === 'as') return;
    if (isSymbol(prev, ':') && isSymbol(tokens[i - 2], ':')) return;

    if (isSymbol(prev, '.')) {
      const qualifier = tokens[i - 2];
      const owner = qualifier ? aliasTarget.get(identifierKey(qualifier)) ?? identifierKey(qualifier) : undefined;
      const columns = owner ? tableColumns.get(owner) : undefined;
      const known = columns ? columns.has(key) : allColumns.has(key) || defined.has(key);
      if (!known) report(token);
      return;
    }

    if (tableColumns.has(key)) {
      referenced.add(key);
      return;
    }
    if (allColumns.has(key) || defined.has(key)) return;
    report(token);
  });

  const tables = catalog.tables
    .map((t) => t.name)
    .filter((name) => referenced.has(name.toLowerCase()));

  return { unknown, tables };
}

// ============================================================================
// REWRITING
// ============================================================================

export interface TableReference {
  /** Catalog table name as declared. */
  table: string;
  /** Alias the query gives it, if any. */
  alias?: string;
}

/**
 * Catalog tables the query names, with their aliases, in order of first
 * appearance.
 */
export function tableReferences(sql: string, catalog: SchemaCatalog): TableReference[] {
  const tokens = significant(tokenize(sql));
  const byKey = new Map(catalog.tables.map((t) => [t.name.toLowerCase(), t.name]));
  const refs: TableReference[] = [];

  tokens.forEach((token, i) => {
    if (!isIdentifier(token) || isSymbol(tokens[i - 1], '.') || isSymbol(tokens[i + 1], '.')) return;
    const table = byKey.get(identifierKey(token));
    if (!table || refs.some((r) => r.table === table)) return;

    let at = i + 1;
    const next = tokens[at];
    if (next && next.kind === 'word' && next.value === 'as') at++;
    const aliasToken = tokens[at];
    const alias = isIdentifier(aliasToken) && !isSymbol(tokens[at + 1], '(') ? aliasToken.text : undefined;
    refs.push(alias ? { table, alias } : { table });
  });

  return refs;
}

/**
 * Replace every use of an identifier, bare or quoted, matched
 * case-insensitively. Literals and comments are left alone.
 */
export function replaceIdentifier(
  sql: string,
  from: string,
  to: string,
  predicate: (tokens: Token[], index: number) => boolean = () => true
): string {
  const key = from.toLowerCase();
  const tokens = tokenize(sql);
  return tokens
    .map((token, i) => {
      const matches =
        (token.kind === 'word' || token.kind === 'quoted') && token.value.toLowerCase() === key;
      return matches && predicate(tokens, i) ? to : token.text;
    })
    .join('');
}

/**
 * Close unbalanced opening parentheses and drop stray closing ones.
 */
export function balanceParentheses(sql: string): string {
  let depth = 0;
  const parts: string[] = [];
  for (const token of tokenize(sql)) {
    if (isSymbol(token, '(')) depth++;
    if (isSymbol(token, ')')) {
      if (depth === 0) continue;
      depth--;
    }
    parts.push(token.text);
  }
  return parts.join('') + ')'.repeat(depth);
}

/**
 * Previous non-blank token before `index` in a full token stream.
 */
export function previousSignificant(tokens: Token[], index: number): Token | undefined {
  for (let i = index - 1; i >= 0; i--) {
    if (tokens[i].kind !== 'space' && tokens[i].kind !== 'comment') return tokens[i];
  }
  return undefined;
}
