/**
 * Domain types shared across the pipeline.
 */

import type { PipelineErrorCode } from './errors.js';
import type { Row } from './utils.js';

// ============================================================================
// SCHEMA CATALOG
// ============================================================================

/**
 * Semantic role of a column, used to pick essential columns for prompts.
 */
export const COLUMN_ROLES = [
	'identifier',
	'name',
	'date',
	'amount',
	'quantity',
	'status',
	'text',
	'other',
] as const;

export type ColumnRole = (typeof COLUMN_ROLES)[number];

export const CARDINALITIES = [
	'one_to_one',
	'one_to_many',
	'many_to_one',
	'many_to_many',
] as const;

export type Cardinality = (typeof CARDINALITIES)[number];

export interface Column {
	readonly name: string;
	/** Declared data type as reported by the data source. */
	readonly type: string;
	readonly role: ColumnRole;
	/** Business-friendly name. */
	readonly alias?: string;
	readonly primaryKey?: boolean;
	readonly nullable?: boolean;
}

export interface Table {
	readonly name: string;
	/** Business-friendly name. */
	readonly alias?: string;
	readonly description?: string;
	readonly columns: readonly Column[];
}

export interface JoinKey {
	readonly source: string;
	readonly target: string;
}

export interface Relationship {
	readonly sourceTable: string;
	readonly targetTable: string;
	readonly joinKeys: readonly JoinKey[];
	readonly cardinality: Cardinality;
}

/**
 * Read-only description of the tables a question may be answered from.
 * A snapshot is frozen once published and never mutated while queries run.
 */
export interface SchemaCatalog {
	readonly id: string;
	readonly tables: readonly Table[];
	readonly relationships: readonly Relationship[];
	/** ISO timestamp of the discovery run that produced this snapshot. */
	readonly refreshedAt?: string;
}

// ============================================================================
// PIPELINE
// ============================================================================

/**
 * Complexity tier; selects the model profile and prompt shape.
 */
export type Tier = 'simple' | 'moderate' | 'complex';

export type Phase = 'GENERATE' | 'EXECUTE_ANALYZE' | 'FIX' | 'SUCCEEDED' | 'FAILED';

/**
 * One synthesis or correction round and what came of it.
 */
export interface AttemptRecord {
	readonly attempt: number;
	readonly stage: 'generate' | 'fix';
	/** How the candidate was produced in a fix round. */
	readonly strategy?: 'pattern' | 'model' | 'none';
	readonly query: string;
	readonly confidence: number;
	readonly errors: readonly string[];
	readonly rowCount: number | null;
	readonly cacheHit: boolean;
	readonly durationMs: number;
}

/**
 * Per-request mutable state owned by the Supervisor.
 */
export interface WorkflowState {
	readonly question: string;
	readonly catalogId: string;
	/** Reduced catalog the candidate may reference. */
	readonly context: SchemaCatalog;
	readonly tier: Tier;
	readonly budget: number;
	phase: Phase;
	query: string | null;
	results: Row[] | null;
	/** Outstanding errors of the current round. */
	errors: string[];
	suggestions: string[];
	confidence: number;
	attempts: number;
	executed: boolean;
	cacheHit: boolean;
	history: AttemptRecord[];
	failure?: PipelineErrorCode;
}

/**
 * Numeric thresholds used by the Synthesizer, Analyzer, Corrector and
 * Supervisor.
 */
export interface ConfidencePolicy {
	/** Minimum confidence for SUCCEEDED. */
	readonly successThreshold: number;
	readonly groundedWithTables: number;
	readonly groundedWithoutTables: number;
	readonly ungrounded: number;
	readonly patternFix: number;
	readonly emptyResultCap: number;
	readonly aggregateBonus: number;
}

export const DEFAULT_CONFIDENCE_POLICY: ConfidencePolicy = {
	successThreshold: 0.5,
	groundedWithTables: 0.7,
	groundedWithoutTables: 0.5,
	ungrounded: 0.1,
	patternFix: 0.6,
	emptyResultCap: 0.3,
	aggregateBonus: 0.2,
};

// ============================================================================
// REQUEST / RESPONSE
// ============================================================================

export interface ProcessRequest {
	question: string;
	catalogId?: string;
	attemptBudget?: number;
	signal?: AbortSignal;
}

export interface SucceededResponse {
	readonly status: 'succeeded';
	readonly question: string;
	readonly query: string;
	readonly results: Row[];
	readonly rowCount: number;
	readonly narrative: string;
	readonly confidence: number;
	readonly attempts: number;
	readonly tier: Tier;
	readonly cacheHit: boolean;
	readonly suggestions: string[];
	readonly history: readonly AttemptRecord[];
	readonly durationMs: number;
}

export interface FailedResponse {
	readonly status: 'failed';
	readonly question: string;
	readonly code: PipelineErrorCode;
	readonly lastQuery: string | null;
	/** Every error reported across all attempts, in order. */
	readonly errors: string[];
	readonly attempts: number;
	readonly tier: Tier | null;
	readonly history: readonly AttemptRecord[];
	readonly durationMs: number;
}

/**
 * Discriminated union returned by the pipeline; never thrown.
 */
export type ProcessResponse = SucceededResponse | FailedResponse;

/**
 * Result cache statistics.
 */
export interface CacheStats {
	backend: 'memory' | 'redis';
	size: number;
	capacity: number;
	hits: number;
	misses: number;
	/** hits / (hits + misses), 0 when nothing was looked up. */
	hitRate: number;
	ttlMs: number;
}
