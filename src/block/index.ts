/**
 * opqueue/block
 *
 * Adapters turning a promise-returning function into an operation, without
 * subclassing. The function runs lazily: once per start (once per attempt for
 * the retryable variant), never before the operation starts, never when it
 * was cancelled first.
 *
 * @example
 * ```typescript
 * import { createBlockOperation, progressAndPromise, Progress } from 'opqueue';
 *
 * const download = createBlockOperation(({ signal }) => {
 *   const progress = new Progress(100);
 *   const promise = fetchWithProgress(url, { signal, onChunk: (n) => {
 *     progress.completedUnitCount += n;
 *   } });
 *   return progressAndPromise(progress, promise);
 * });
 *
 * queue.addOperation(download);
 * const bytes = await download.promise;
 * ```
 */

import {
  baseOperationErrors,
  baseRetryableOperationErrors,
  type BaseOperationError,
  type BaseRetryableOperationError,
} from "../errors";
import { Operation, type OperationOptions } from "../operation";
import { Progress, mirrorProgress } from "../progress";
import {
  RetryableOperation,
  type RetryableOperationOptions,
} from "../retryable";

// =============================================================================
// Types
// =============================================================================

/**
 * A pending computation paired with the progress tracking it.
 */
export interface ProgressAndPromise<T> {
  readonly progress: Progress;
  readonly promise: Promise<T>;
}

/**
 * What a block receives when it runs.
 */
export interface BlockContext {
  /** Aborted when the operation is cancelled. */
  signal: AbortSignal;
  /** 0 for the first run, then the retry count. */
  attempt: number;
}

/**
 * Work supplied to a block operation.
 */
export type OperationBlock<T> = (
  context: BlockContext
) => Promise<T> | ProgressAndPromise<T>;

export function progressAndPromise<T>(
  progress: Progress,
  promise: Promise<T>
): ProgressAndPromise<T> {
  return { progress, promise };
}

export function isProgressAndPromise<T>(
  value: Promise<T> | ProgressAndPromise<T>
): value is ProgressAndPromise<T> {
  return (
    "progress" in value &&
    value.progress instanceof Progress &&
    "promise" in value
  );
}

// =============================================================================
// Shared bridging
// =============================================================================

interface BlockRun<T> {
  promise: Promise<T>;
  stopMirroring: () => void;
}

const noop = (): void => {};

/**
 * Invoke `block`, binding the progress it reports (if any) to `progress`.
 * A synchronous throw from `block` propagates to the caller.
 */
function runBlock<T>(
  block: OperationBlock<T>,
  context: BlockContext,
  progress: Progress
): BlockRun<T> {
  const output = block(context);
  if (isProgressAndPromise(output)) {
    return {
      promise: output.promise,
      stopMirroring: mirrorProgress(output.progress, progress),
    };
  }
  return { promise: output, stopMirroring: noop };
}

/**
 * Keep a block's mirror running, unless the operation resolved while the
 * block ran (it cancelled itself, say): then the mirror is stopped and the
 * progress completed again.
 */
function settleMirror(
  run: BlockRun<unknown>,
  isResolved: boolean,
  progress: Progress
): () => void {
  if (!isResolved) return run.stopMirroring;
  run.stopMirroring();
  progress.complete();
  return noop;
}

// =============================================================================
// BlockOperation
// =============================================================================

/**
 * Operation running a block: fulfilment finishes it, rejection fails it.
 */
export class BlockOperation<T, E = BaseOperationError> extends Operation<T, E> {
  private readonly block: OperationBlock<T>;
  private stopMirroring: () => void = noop;

  constructor(block: OperationBlock<T>, options: OperationOptions<E>) {
    super(options);
    this.block = block;
  }

  protected execute(): Promise<void> {
    const run = runBlock(
      this.block,
      { signal: this.signal, attempt: 0 },
      this.progress
    );
    this.stopMirroring = settleMirror(run, this.isResolved, this.progress);
    return run.promise.then(
      (value) => {
        this.finish(value);
      },
      (error: unknown) => {
        this.finishWithError(error);
      }
    );
  }

  protected override onResolve(): void {
    this.stopMirroring();
  }
}

/**
 * Create a block operation using the `BaseOperationError` taxonomy.
 */
export function createBlockOperation<T>(
  block: OperationBlock<T>,
  options: Omit<OperationOptions<BaseOperationError>, "taxonomy"> = {}
): BlockOperation<T, BaseOperationError> {
  return new BlockOperation(block, {
    ...options,
    taxonomy: baseOperationErrors,
  });
}

// =============================================================================
// RetryableBlockOperation
// =============================================================================

/**
 * Retryable operation running a block once per attempt. A rejected promise is
 * retried; a block that throws synchronously fails the operation for good.
 */
export class RetryableBlockOperation<
  T,
  E = BaseRetryableOperationError,
> extends RetryableOperation<T, E> {
  private readonly block: OperationBlock<T>;
  private stopMirroring: () => void = noop;

  constructor(block: OperationBlock<T>, options: RetryableOperationOptions<E>) {
    super(options);
    this.block = block;
  }

  protected execute(): Promise<void> {
    this.stopMirroring();
    const run = runBlock(
      this.block,
      { signal: this.signal, attempt: this.attempts },
      this.progress
    );
    this.stopMirroring = settleMirror(run, this.isResolved, this.progress);
    return run.promise.then(
      (value) => {
        this.finish(value);
      },
      (error: unknown) => {
        run.stopMirroring();
        this.retry(error);
      }
    );
  }

  protected override onResolve(): void {
    this.stopMirroring();
  }
}

/**
 * Create a retryable block operation using the `BaseRetryableOperationError`
 * taxonomy.
 */
export function createRetryableBlockOperation<T>(
  block: OperationBlock<T>,
  options: Omit<
    RetryableOperationOptions<BaseRetryableOperationError>,
    "taxonomy"
  > = {}
): RetryableBlockOperation<T, BaseRetryableOperationError> {
  return new RetryableBlockOperation(block, {
    ...options,
    taxonomy: baseRetryableOperationErrors,
  });
}
