/**
 * Error taxonomy for the query pipeline.
 *
 * Every error carries a stable `code`, whether the Supervisor may retry
 * past it, and suggestions that are appended to the message for
 * operators reading logs or CLI output.
 */

export type PipelineErrorCode =
  | 'SchemaUnavailable'
  | 'GenerationFailure'
  | 'UnknownIdentifier'
  | 'ExecutionTimeout'
  | 'ExecutionError'
  | 'ForbiddenOperation'
  | 'AttemptsExhausted'
  | 'RequestCancelled'
  | 'InvalidQuestion';

function formatMessage(message: string, suggestions: string[]): string {
  if (suggestions.length === 0) return message;
  return `${message}\n\nSuggested fixes:\n${suggestions.map((s) => `  • ${s}`).join('\n')}`;
}

/**
 * Base class for all pipeline errors.
 */
export class PipelineError extends Error {
  /** The message without the suggestion block. */
  public readonly detail: string;

  constructor(
    public readonly code: PipelineErrorCode,
    message: string,
    public readonly recoverable: boolean,
    public readonly suggestions: string[] = []
  ) {
    super(formatMessage(message, suggestions));
    this.detail = message;
    this.name = code;
    Object.setPrototypeOf(this, PipelineError.prototype);
  }

  /**
   * Single-line form used in per-attempt error lists.
   */
  toString(): string {
    return `${this.code}: ${this.detail}`;
  }
}

/**
 * The requested catalog is missing or has no tables. Fatal before any
 * generation happens.
 */
export class SchemaUnavailable extends PipelineError {
  constructor(catalogId: string, reason: string = 'catalog is missing or empty') {
    super('SchemaUnavailable', `Schema "${catalogId}" unavailable: ${reason}`, false, [
      'Refresh the catalog from the data source',
      'Check the catalog id in the request',
    ]);
    this.name = 'SchemaUnavailable';
    Object.setPrototypeOf(this, SchemaUnavailable.prototype);
  }
}

/**
 * The language model failed, timed out or returned nothing usable.
 */
export class GenerationFailure extends PipelineError {
  constructor(message: string) {
    super('GenerationFailure', message, true, [
      'Check the API key and model name for the configured provider',
      'Raise GENERATION_TIMEOUT_MS if the model is slow',
    ]);
    this.name = 'GenerationFailure';
    Object.setPrototypeOf(this, GenerationFailure.prototype);
  }
}

/**
 * The candidate query references a name absent from the schema context.
 */
export class UnknownIdentifier extends PipelineError {
  constructor(public readonly identifier: string) {
    super('UnknownIdentifier', `uses unknown identifier ${identifier}`, true);
    this.name = 'UnknownIdentifier';
    Object.setPrototypeOf(this, UnknownIdentifier.prototype);
  }
}

/**
 * Waiting for a pool slot or running the query exceeded the time budget.
 */
export class ExecutionTimeout extends PipelineError {
  constructor(public readonly budgetMs: number, stage: 'queue' | 'run' = 'run') {
    super(
      'ExecutionTimeout',
      stage === 'queue'
        ? `no execution slot became free within ${budgetMs}ms`
        : `query exceeded the ${budgetMs}ms time budget`,
      true,
      ['Narrow the question or add filters to reduce the scanned data']
    );
    this.name = 'ExecutionTimeout';
    Object.setPrototypeOf(this, ExecutionTimeout.prototype);
  }
}

/**
 * The data source rejected the query. The engine message is kept verbatim.
 */
export class ExecutionError extends PipelineError {
  constructor(public readonly engineMessage: string) {
    super('ExecutionError', engineMessage, true);
    this.name = 'ExecutionError';
    Object.setPrototypeOf(this, ExecutionError.prototype);
  }
}

/**
 * The candidate is not a single read-only statement. Never retried.
 */
export class ForbiddenOperation extends PipelineError {
  constructor(reason: string) {
    super('ForbiddenOperation', reason, false, [
      'Only single SELECT or WITH statements are executed',
    ]);
    this.name = 'ForbiddenOperation';
    Object.setPrototypeOf(this, ForbiddenOperation.prototype);
  }
}

/**
 * The attempt budget ran out without a trustworthy result.
 */
export class AttemptsExhausted extends PipelineError {
  constructor(public readonly attempts: number) {
    super('AttemptsExhausted', `no trustworthy result after ${attempts} attempts`, false, [
      'Rephrase the question with the table or column names you expect',
    ]);
    this.name = 'AttemptsExhausted';
    Object.setPrototypeOf(this, AttemptsExhausted.prototype);
  }
}

/**
 * The caller abandoned the request.
 */
export class RequestCancelled extends PipelineError {
  constructor() {
    super('RequestCancelled', 'request was cancelled', false);
    this.name = 'RequestCancelled';
    Object.setPrototypeOf(this, RequestCancelled.prototype);
  }
}

/**
 * The question is empty once surrounding whitespace is removed.
 */
export class InvalidQuestion extends PipelineError {
  constructor(reason: string = 'question is empty') {
    super('InvalidQuestion', reason, false, ['Ask a question in plain words']);
    this.name = 'InvalidQuestion';
    Object.setPrototypeOf(this, InvalidQuestion.prototype);
  }
}

/**
 * Render any thrown value as a single error-list line.
 */
export function describeError(error: unknown): string {
  if (error instanceof PipelineError) return error.toString();
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Catalog could not be loaded, validated or refreshed. Raised by catalog
 * management, never inside the query pipeline.
 */
export class CatalogError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n${issues.map((i) => `  - ${i}`).join('\n')}` : message);
    this.name = 'CatalogError';
    Object.setPrototypeOf(this, CatalogError.prototype);
  }
}
