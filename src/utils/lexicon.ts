/**
 * Word lists loaded from data/.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';

const SqlKeywordsSchema = z.object({
  forbidden: z.array(z.string()),
  reserved: z.array(z.string()),
});

function readData(name: string): unknown {
  const url = new URL(`../../data/${name}`, import.meta.url);
  return JSON.parse(readFileSync(url, 'utf-8'));
}

const sqlKeywords = SqlKeywordsSchema.parse(readData('sql-keywords.json'));

/**
 * Statement verbs and clauses that write, change schema or touch the host.
 */
export const FORBIDDEN_KEYWORDS: ReadonlySet<string> = new Set(sqlKeywords.forbidden);

/**
 * Keywords and common function names that are never schema identifiers.
 */
export const RESERVED_WORDS: ReadonlySet<string> = new Set(sqlKeywords.reserved);

/**
 * Words ignored when matching a question against table and column names.
 */
export const STOPWORDS: ReadonlySet<string> = new Set(
  z.array(z.string()).parse(readData('stopwords.json'))
);
