/**
 * opqueue/retryable
 *
 * Operations that re-run their `execute()` on recoverable failures, up to a
 * bounded number of attempts.
 *
 * @example
 * ```typescript
 * import {
 *   RetryableOperation,
 *   baseRetryableOperationErrors,
 *   type BaseRetryableOperationError,
 * } from 'opqueue';
 *
 * class Ping extends RetryableOperation<number, BaseRetryableOperationError> {
 *   constructor(private readonly host: string) {
 *     super({ taxonomy: baseRetryableOperationErrors, maxAttempts: 3 });
 *   }
 *
 *   protected async execute(): Promise<void> {
 *     const latency = await ping(this.host).catch((error: unknown) => {
 *       this.retry(error);
 *       return undefined;
 *     });
 *     if (latency !== undefined) this.finish(latency);
 *   }
 * }
 * ```
 */

import type {
  BaseRetryableOperationError,
  RetryableErrorTaxonomy,
} from "../errors";
import { Operation, type OperationOptions } from "../operation";

// =============================================================================
// Types
// =============================================================================

/**
 * Options for retryable operations.
 */
export interface RetryableOperationOptions<E>
  extends Omit<OperationOptions<E>, "taxonomy"> {
  /** Taxonomy providing the `ReachedRetryLimit` variant. */
  taxonomy: RetryableErrorTaxonomy<E>;

  /**
   * Maximum number of retries after the first execution.
   * @default 1
   */
  maxAttempts?: number;
}

// =============================================================================
// RetryableOperation
// =============================================================================

/**
 * An operation whose `execute()` calls `retry(dueTo)` when a recoverable
 * error arises. An error thrown out of `execute()` is terminal.
 *
 * A `retry()` made synchronously from inside `execute()` is run by a loop in
 * the frame that invoked `execute()`, so the call stack does not grow with
 * the number of attempts.
 */
export abstract class RetryableOperation<
  T,
  E = BaseRetryableOperationError,
> extends Operation<T, E> {
  readonly maxAttempts: number;

  private readonly retryTaxonomy: RetryableErrorTaxonomy<E>;
  private _attempts = 0;
  private inExecute = false;
  private retryQueued = false;

  constructor(options: RetryableOperationOptions<E>) {
    super(options);
    const { maxAttempts = 1 } = options;
    if (!Number.isSafeInteger(maxAttempts) || maxAttempts < 0) {
      throw new TypeError(
        `RetryableOperation ${this.name}: maxAttempts must be a non-negative integer, got ${maxAttempts}`
      );
    }
    this.maxAttempts = maxAttempts;
    this.retryTaxonomy = options.taxonomy;
  }

  /** Number of retries performed so far. */
  get attempts(): number {
    return this._attempts;
  }

  /**
   * Re-run this operation after a recoverable error.
   *
   * - Not started yet, cancelled or already resolved: does nothing.
   * - Attempts left: counts one attempt and runs `execute()` again.
   * - No attempts left: finishes with `error`, or with `ReachedRetryLimit`
   *   when no error is given.
   *
   * Never call `execute()` from `execute()`; call `retry()`.
   */
  retry(dueTo?: unknown): void {
    if (!this.hasStarted || this.isCancelled || this.isResolved) return;

    if (this._attempts >= this.maxAttempts) {
      this.finishWithError(dueTo ?? this.retryTaxonomy.reachedRetryLimit());
      return;
    }

    this._attempts += 1;
    this.emit({
      type: "operation_retry",
      operationName: this.name,
      ts: this.clock(),
      attempt: this._attempts,
      maxAttempts: this.maxAttempts,
      error: dueTo,
    });

    if (this.inExecute) {
      this.retryQueued = true;
      return;
    }
    this.invokeExecute();
  }

  protected override invokeExecute(): void {
    this.inExecute = true;
    try {
      do {
        this.retryQueued = false;
        super.invokeExecute();
      } while (this.retryQueued && !this.isCancelled && !this.isResolved);
    } finally {
      this.inExecute = false;
    }
  }
}
