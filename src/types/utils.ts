/**
 * Core type utilities.
 */

/**
 * A single result cell. Dates, big integers and buffers coming from a
 * driver are converted before rows leave the data source.
 */
export type Scalar = string | number | boolean | null;

/**
 * One result row keyed by output column name.
 */
export type Row = Record<string, Scalar>;

/**
 * Freeze an object graph in place. Catalog types already declare their
 * fields read-only; this enforces it at run time.
 */
export function deepFreeze<T>(value: T): T {
	freezeValue(value);
	return value;
}

function freezeValue(value: unknown): void {
	if (value === null || typeof value !== "object" || Object.isFrozen(value)) {
		return;
	}
	Object.freeze(value);
	for (const child of Object.values(value)) {
		freezeValue(child);
	}
}

/**
 * Narrow an unknown driver value to a plain record.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}
