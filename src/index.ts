/**
 * opqueue
 *
 * Asynchronous operations with a tracked lifecycle, typed error taxonomies,
 * bounded retries and progress, run by an in-process operation queue.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { OperationQueue, createRetryableBlockOperation } from 'opqueue';
 *
 * const queue = new OperationQueue({ maxConcurrentOperationCount: 2 });
 *
 * const fetchUser = createRetryableBlockOperation(
 *   ({ signal }) => fetch('/users/1', { signal }).then((res) => res.json()),
 *   { maxAttempts: 3 }
 * );
 *
 * queue.addOperation(fetchUser);
 * const result = await fetchUser.settled;
 * // result.error: BaseRetryableOperationError
 * ```
 *
 * ## Entry Points
 *
 * - `opqueue` - Main entry: operations, queue, errors, progress, results
 * - `opqueue/errors` - Error taxonomies only
 * - `opqueue/testing` - Test helpers
 */

// =============================================================================
// Result primitives
// =============================================================================

export {
  type Ok,
  type Err,
  type Result,
  type AsyncResult,
  ok,
  err,
  isOk,
  isErr,
} from "./result";

export { type ResultCell, createResultCell } from "./result-cell";

// =============================================================================
// Errors
// =============================================================================

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

// =============================================================================
// Progress
// =============================================================================

export {
  type ProgressSnapshot,
  type ProgressListener,
  Progress,
  mirrorProgress,
} from "./progress";

// =============================================================================
// Operations
// =============================================================================

export {
  type OperationStatus,
  type OperationEvent,
  type OperationEventType,
  type OperationEventHandler,
  type OperationOptions,
  type QueueableOperation,
  Operation,
} from "./operation";

export {
  type RetryableOperationOptions,
  RetryableOperation,
} from "./retryable";

export {
  type ProgressAndPromise,
  type BlockContext,
  type OperationBlock,
  progressAndPromise,
  isProgressAndPromise,
  BlockOperation,
  createBlockOperation,
  RetryableBlockOperation,
  createRetryableBlockOperation,
} from "./block";

// =============================================================================
// Queue
// =============================================================================

export {
  type OperationQueueOptions,
  type OperationQueueStats,
  OperationQueue,
} from "./queue";
