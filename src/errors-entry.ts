/**
 * opqueue/errors
 *
 * Error taxonomies without the operation runtime.
 */

export {
  OPERATION_CANCELLED,
  OPERATION_UNKNOWN,
  REACHED_RETRY_LIMIT,
  type OperationCancelledError,
  type UnknownOperationError,
  type ReachedRetryLimitError,
  type BaseOperationError,
  type BaseRetryableOperationError,
  type ErrorTaxonomy,
  type RetryableErrorTaxonomy,
  type ErrorTaxonomyOptions,
  isOperationCancelled,
  isUnknownOperationError,
  isReachedRetryLimit,
  defineErrorTaxonomy,
  defineRetryableErrorTaxonomy,
  baseOperationErrors,
  baseRetryableOperationErrors,
  unwrapError,
  describeOperationError,
} from "./errors";
