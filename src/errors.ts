/**
 * opqueue/errors
 *
 * Error taxonomies for operations. A taxonomy is a closed set of error kinds
 * an operation may resolve with: `Cancelled`, `Unknown(cause)`, optionally
 * `ReachedRetryLimit`, plus any domain variants the caller admits.
 *
 * @example
 * ```typescript
 * import { defineErrorTaxonomy, unwrapError } from 'opqueue/errors';
 *
 * type NotFound = { type: 'NOT_FOUND'; path: string };
 *
 * const downloadErrors = defineErrorTaxonomy('DownloadError', {
 *   isDomainError: (e): e is NotFound =>
 *     typeof e === 'object' && e !== null && 'type' in e && e.type === 'NOT_FOUND',
 * });
 *
 * downloadErrors.wrap({ type: 'NOT_FOUND', path: '/a' }); // passes through
 * downloadErrors.wrap(new Error('boom'));                 // Unknown(Error)
 * unwrapError(downloadErrors.wrap(new Error('boom')));    // Error('boom')
 * ```
 */

// =============================================================================
// Discriminants
// =============================================================================

/** Discriminant for the `Cancelled` variant - use in switch statements */
export const OPERATION_CANCELLED = "OPERATION_CANCELLED" as const;

/** Discriminant for the `Unknown` variant - use in switch statements */
export const OPERATION_UNKNOWN = "OPERATION_UNKNOWN" as const;

/** Discriminant for the `ReachedRetryLimit` variant - use in switch statements */
export const REACHED_RETRY_LIMIT = "REACHED_RETRY_LIMIT" as const;

// =============================================================================
// Types
// =============================================================================

/**
 * The operation was cancelled before or during execution.
 */
export type OperationCancelledError = {
  type: typeof OPERATION_CANCELLED;
  /** Name of the taxonomy that produced this error */
  taxonomy: string;
};

/**
 * A foreign error boxed into a taxonomy. `cause` keeps the original error,
 * which may itself be another taxonomy's `Unknown` box.
 */
export type UnknownOperationError = {
  type: typeof OPERATION_UNKNOWN;
  taxonomy: string;
  cause: unknown;
};

/**
 * A retryable operation exhausted its attempts without a more specific error.
 */
export type ReachedRetryLimitError = {
  type: typeof REACHED_RETRY_LIMIT;
  taxonomy: string;
};

export type BaseOperationError = OperationCancelledError | UnknownOperationError;

export type BaseRetryableOperationError =
  | BaseOperationError
  | ReachedRetryLimitError;

/**
 * Contract every error type used by an operation must supply.
 */
export interface ErrorTaxonomy<E> {
  /** Taxonomy name, stamped on every error it creates. */
  readonly name: string;
  /** Builds the `Cancelled` variant. */
  cancelled(): E;
  /** Boxes a foreign error as the `Unknown` variant. */
  unknown(cause: unknown): E;
  /**
   * Returns `error` unchanged when it already belongs to this taxonomy,
   * otherwise boxes it as `Unknown`.
   */
  wrap(error: unknown): E;
  /** Membership test used by `wrap`. */
  is(error: unknown): error is E;
}

/**
 * Taxonomy usable by retryable operations.
 */
export interface RetryableErrorTaxonomy<E> extends ErrorTaxonomy<E> {
  /** Builds the terminal `ReachedRetryLimit` variant. */
  reachedRetryLimit(): E;
}

/**
 * Options for defining a taxonomy.
 */
export interface ErrorTaxonomyOptions<D> {
  /**
   * Admits user-defined domain variants. Errors matching this guard pass
   * through `wrap` unchanged instead of being boxed as `Unknown`.
   */
  isDomainError?: (error: unknown) => error is D;
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Checks if an error is a `Cancelled` variant, optionally of one taxonomy.
 */
export function isOperationCancelled(
  error: unknown,
  taxonomy?: string
): error is OperationCancelledError {
  return (
    typeof error === "object" &&
    error !== null &&
    "type" in error &&
    error.type === OPERATION_CANCELLED &&
    "taxonomy" in error &&
    (taxonomy === undefined || error.taxonomy === taxonomy)
  );
}

/**
 * Checks if an error is an `Unknown` variant, optionally of one taxonomy.
 */
export function isUnknownOperationError(
  error: unknown,
  taxonomy?: string
): error is UnknownOperationError {
  return (
    typeof error === "object" &&
    error !== null &&
    "type" in error &&
    error.type === OPERATION_UNKNOWN &&
    "cause" in error &&
    "taxonomy" in error &&
    (taxonomy === undefined || error.taxonomy === taxonomy)
  );
}

/**
 * Checks if an error is a `ReachedRetryLimit` variant, optionally of one taxonomy.
 */
export function isReachedRetryLimit(
  error: unknown,
  taxonomy?: string
): error is ReachedRetryLimitError {
  return (
    typeof error === "object" &&
    error !== null &&
    "type" in error &&
    error.type === REACHED_RETRY_LIMIT &&
    "taxonomy" in error &&
    (taxonomy === undefined || error.taxonomy === taxonomy)
  );
}

// =============================================================================
// Taxonomy Factories
// =============================================================================

/**
 * Define a base error taxonomy with `Cancelled` and `Unknown` variants.
 *
 * @param name - Taxonomy name; two taxonomies should never share one
 * @param options - Domain variant guard
 *
 * @example
 * ```typescript
 * const thumbnailErrors = defineErrorTaxonomy('ThumbnailError');
 *
 * thumbnailErrors.cancelled();
 * // { type: 'OPERATION_CANCELLED', taxonomy: 'ThumbnailError' }
 * ```
 */
export function defineErrorTaxonomy<D = never>(
  name: string,
  options: ErrorTaxonomyOptions<D> = {}
): ErrorTaxonomy<BaseOperationError | D> {
  if (typeof name !== "string" || name.length === 0) {
    throw new TypeError(
      "defineErrorTaxonomy: name must be a non-empty string. Example: defineErrorTaxonomy('DownloadError')"
    );
  }

  const { isDomainError } = options;

  const is = (error: unknown): error is BaseOperationError | D =>
    isOperationCancelled(error, name) ||
    isUnknownOperationError(error, name) ||
    (isDomainError !== undefined && isDomainError(error));

  const unknown = (cause: unknown): BaseOperationError | D => ({
    type: OPERATION_UNKNOWN,
    taxonomy: name,
    cause,
  });

  return {
    name,
    cancelled: () => ({ type: OPERATION_CANCELLED, taxonomy: name }),
    unknown,
    wrap: (error) => (is(error) ? error : unknown(error)),
    is,
  };
}

/**
 * Define a retryable error taxonomy: a base taxonomy plus `ReachedRetryLimit`.
 *
 * @example
 * ```typescript
 * const uploadErrors = defineRetryableErrorTaxonomy('UploadError');
 *
 * class Upload extends RetryableOperation<string, BaseRetryableOperationError> {
 *   constructor() {
 *     super({ taxonomy: uploadErrors, maxAttempts: 3 });
 *   }
 *   // ...
 * }
 * ```
 */
export function defineRetryableErrorTaxonomy<D = never>(
  name: string,
  options: ErrorTaxonomyOptions<D> = {}
): RetryableErrorTaxonomy<BaseRetryableOperationError | D> {
  const base = defineErrorTaxonomy(name, options);

  const is = (error: unknown): error is BaseRetryableOperationError | D =>
    base.is(error) || isReachedRetryLimit(error, name);

  return {
    name,
    cancelled: base.cancelled,
    unknown: base.unknown,
    reachedRetryLimit: () => ({ type: REACHED_RETRY_LIMIT, taxonomy: name }),
    wrap: (error) => (is(error) ? error : base.unknown(error)),
    is,
  };
}

// =============================================================================
// Built-in Taxonomies
// =============================================================================

/**
 * Default taxonomy for operations: `Cancelled` and `Unknown` only.
 */
export const baseOperationErrors: ErrorTaxonomy<BaseOperationError> =
  defineErrorTaxonomy("BaseOperationError");

/**
 * Default taxonomy for retryable operations.
 */
export const baseRetryableOperationErrors: RetryableErrorTaxonomy<BaseRetryableOperationError> =
  defineRetryableErrorTaxonomy("BaseRetryableOperationError");

// =============================================================================
// Unwrapping
// =============================================================================

/**
 * Recover the innermost original cause of an error, unwrapping `Unknown`
 * boxes across any number of taxonomy layers. Anything that is not an
 * `Unknown` box unwraps to itself.
 *
 * @example
 * ```typescript
 * const original = new Error('disk full');
 * const inner = baseOperationErrors.wrap(original);
 * const outer = baseRetryableOperationErrors.wrap(inner);
 *
 * unwrapError(outer) === original; // true
 * ```
 */
export function unwrapError(error: unknown): unknown {
  const seen = new Set<unknown>();
  let current = error;
  while (isUnknownOperationError(current) && !seen.has(current)) {
    seen.add(current);
    current = current.cause;
  }
  return current;
}

/**
 * One-line description of an operation error, used in events and logs.
 */
export function describeOperationError(error: unknown): string {
  if (isOperationCancelled(error)) {
    return `${error.taxonomy}: operation was cancelled`;
  }
  if (isReachedRetryLimit(error)) {
    return `${error.taxonomy}: reached retry limit`;
  }
  if (isUnknownOperationError(error)) {
    const inner = unwrapError(error);
    const detail = isUnknownOperationError(inner)
      ? "cyclic cause"
      : describeOperationError(inner);
    return `${error.taxonomy}: unknown error (${detail})`;
  }
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  if (typeof error === "object" && error !== null && "type" in error) {
    return String(error.type);
  }
  return String(error);
}
