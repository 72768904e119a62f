/**
 * Error taxonomy for the query optimizer
 *
 * Every error raised by the library extends `QueryOptimizerError` and carries a
 * stable `code`, so callers can branch on it without string matching.
 */

/**
 * Base class for all library errors
 */
export class QueryOptimizerError extends Error {
  /** Stable machine-readable error code */
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Failure categories reported by model providers
 */
export type ProviderErrorKind =
  | 'rate_limited'
  | 'timeout'
  | 'unavailable'
  | 'unauthorized'
  | 'malformed';

const RETRYABLE_KINDS: ReadonlySet<ProviderErrorKind> = new Set(['rate_limited', 'timeout', 'unavailable']);

/**
 * An error returned by a remote model or embedding API.
 * Rate limits, timeouts and unavailability are transient; the rest are not.
 */
export class ProviderError extends QueryOptimizerError {
  readonly kind: ProviderErrorKind;
  readonly provider: string;
  readonly status?: number;

  constructor(
    kind: ProviderErrorKind,
    provider: string,
    message: string,
    options?: { cause?: unknown; status?: number }
  ) {
    super(`provider_${kind}`, `${provider}: ${message}`, options);
    this.kind = kind;
    this.provider = provider;
    this.status = options?.status;
  }

  /** Whether the failure is worth retrying */
  get retryable(): boolean {
    return RETRYABLE_KINDS.has(this.kind);
  }
}

/**
 * Check whether an unknown error is a transient provider failure
 */
export function isTransientProviderError(error: unknown): error is ProviderError {
  return error instanceof ProviderError && error.retryable;
}

/**
 * The embedding API kept failing after every retry
 */
export class EmbeddingUnavailableError extends QueryOptimizerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('embedding_unavailable', message, options);
  }
}

/**
 * A model answered, but not in the shape we asked for
 */
export class MalformedProviderOutputError extends QueryOptimizerError {
  readonly output: string;

  constructor(message: string, output: string) {
    super('malformed_output', message);
    this.output = output;
  }
}

/**
 * Two vectors of different length were compared
 */
export class DimensionMismatchError extends QueryOptimizerError {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number) {
    super('dimension_mismatch', `Vector dimension mismatch: expected ${expected}, got ${actual}`);
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * A training example reached similarity search without an embedding
 */
export class MissingEmbeddingError extends QueryOptimizerError {
  readonly position: number;

  constructor(position: number) {
    super('missing_embedding', `Candidate at position ${position} has no embedding`);
    this.position = position;
  }
}

export class InvalidInputError extends QueryOptimizerError {
  constructor(message: string) {
    super('invalid_input', message);
  }
}

/**
 * Missing credentials, bad paths or invalid options. Fatal at startup.
 */
export class ConfigurationError extends QueryOptimizerError {
  constructor(message: string, options?: { cause?: unknown; code?: string }) {
    super(options?.code ?? 'configuration', message, options);
  }
}

/**
 * Aggregation was asked to compare score sequences that do not line up
 */
export class AggregationError extends ConfigurationError {
  constructor(message: string) {
    super(message, { code: 'aggregation' });
  }
}

/**
 * An evaluation runner method was called in the wrong lifecycle state
 */
export class InvalidStateError extends QueryOptimizerError {
  constructor(message: string) {
    super('invalid_state', message);
  }
}

/**
 * Extract a printable message from anything that was thrown
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
