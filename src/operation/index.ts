/**
 * opqueue/operation
 *
 * Base lifecycle state machine for a unit of asynchronous work.
 *
 * Subclasses override `execute()` and end it with exactly one of `finish`,
 * `finishWithError` or, for parents awaiting children, `markAsFinished`
 * followed later by a resolution (usually through `forward`).
 *
 * @example
 * ```typescript
 * import { Operation, baseOperationErrors, type BaseOperationError } from 'opqueue';
 *
 * class ReadConfig extends Operation<string, BaseOperationError> {
 *   constructor(private readonly path: string) {
 *     super({ taxonomy: baseOperationErrors });
 *   }
 *
 *   protected async execute(): Promise<void> {
 *     const text = await readFile(this.path, 'utf8');
 *     this.finish(text);
 *   }
 * }
 * ```
 */

import {
  describeOperationError,
  type BaseOperationError,
  type ErrorTaxonomy,
} from "../errors";
import { Progress } from "../progress";
import { err, ok, type AsyncResult, type Result } from "../result";
import { createResultCell, type ResultCell } from "../result-cell";
import type {
  OperationEvent,
  OperationEventHandler,
  OperationOptions,
  OperationStatus,
  QueueableOperation,
} from "./types";

export type {
  OperationEvent,
  OperationEventHandler,
  OperationEventType,
  OperationOptions,
  OperationStatus,
  QueueableOperation,
} from "./types";

/**
 * An `Operation` wraps asynchronous work with a tracked lifecycle, a
 * single-assignment result and a progress.
 *
 * @template T - Success value
 * @template E - Error taxonomy the operation resolves failures with
 */
export abstract class Operation<T, E = BaseOperationError>
  implements QueueableOperation
{
  readonly name: string;
  readonly progress: Progress;
  readonly taxonomy: ErrorTaxonomy<E>;

  protected readonly clock: () => number;

  private onEvent?: OperationEventHandler;
  private queueName?: string;
  private warnedHandlerFailure = false;

  private readonly cell: ResultCell<T, E> = createResultCell<T, E>();
  private readonly abortController = new AbortController();
  private readonly stateListeners = new Set<() => void>();
  private readonly dependencySet = new Set<QueueableOperation>();
  private readonly dependencyObservers = new Map<QueueableOperation, () => void>();
  private wasReady = true;

  private started = false;
  private executing = false;
  private finished = false;
  private cancelled = false;
  private _startTime?: number;
  private _endTime?: number;

  constructor(options: OperationOptions<E>) {
    this.taxonomy = options.taxonomy;
    this.progress = options.progress ?? new Progress();
    this.name = options.name ?? (this.constructor.name || "Operation");
    this.clock = options.clock ?? Date.now;
    this.onEvent = options.onEvent;
  }

  /**
   * The unit of work. Runs once per start, and once more per `retry()` in
   * retryable operations. A synchronous throw or a rejected returned promise
   * finishes the operation with the error wrapped into its taxonomy.
   *
   * Cancellation is cooperative: long-running work should check
   * `this.isCancelled` or listen to `this.signal`.
   */
  protected abstract execute(): void | Promise<void>;

  // ===========================================================================
  // Observable state
  // ===========================================================================

  get status(): OperationStatus {
    if (this.cancelled) return "cancelled";
    if (this.cell.isResolved) return "finished";
    if (this.finished) return "finishing";
    if (this.executing) return "executing";
    return this.isReady ? "ready" : "pending";
  }

  /** Whether `start()` has been called. */
  protected get hasStarted(): boolean {
    return this.started;
  }

  get isExecuting(): boolean {
    return this.executing;
  }

  /** Queue bookkeeping flag: set by `markAsFinished`, resolution and cancel. */
  get isFinished(): boolean {
    return this.finished;
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  get isResolved(): boolean {
    return this.cell.isResolved;
  }

  get isReady(): boolean {
    for (const dependency of this.dependencySet) {
      if (!dependency.isFinished) return false;
    }
    return true;
  }

  /** Outcome snapshot, `undefined` until resolved. */
  get result(): Result<T, E> | undefined {
    return this.cell.snapshot;
  }

  /** Fulfils with the value or rejects with the taxonomy error. */
  get promise(): Promise<T> {
    return this.cell.promise;
  }

  /** Settles with the outcome. Never rejects. */
  get settled(): AsyncResult<T, E> {
    return this.cell.settled;
  }

  /** Aborted when the operation is cancelled. */
  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  get startTime(): number | undefined {
    return this._startTime;
  }

  get endTime(): number | undefined {
    return this._endTime;
  }

  /** Milliseconds between start and resolution, when both happened. */
  get executionDuration(): number | undefined {
    if (this._startTime === undefined || this._endTime === undefined) {
      return undefined;
    }
    return this._endTime - this._startTime;
  }

  /**
   * Wait for resolution.
   */
  waitUntilFinished(): AsyncResult<T, E> {
    return this.cell.settled;
  }

  /**
   * Attach continuations. They run asynchronously after resolution, even
   * when the operation is already resolved.
   */
  subscribe(
    onSuccess?: (value: T) => void,
    onFailure?: (error: E) => void
  ): Promise<void> {
    return this.cell.subscribe(onSuccess, onFailure);
  }

  // ===========================================================================
  // Dependencies
  // ===========================================================================

  get dependencies(): QueueableOperation[] {
    return [...this.dependencySet];
  }

  /**
   * Make this operation wait until `operation` reports `isFinished`.
   *
   * @throws TypeError when `operation` is this operation or already depends
   * on it, directly or transitively
   */
  addDependency(operation: QueueableOperation): void {
    if (operation === this) {
      throw new TypeError(
        `Operation ${this.name}: an operation cannot depend on itself`
      );
    }
    if (this.dependencySet.has(operation)) return;
    if (dependsOn(operation, this)) {
      throw new TypeError(
        `Operation ${this.name}: depending on ${operation.name} would create a cycle`
      );
    }

    this.dependencySet.add(operation);
    if (!operation.isFinished) {
      this.dependencyObservers.set(
        operation,
        operation.observeState(() => this.onDependencyChange(operation))
      );
    }
    this.refreshReadiness();
  }

  removeDependency(operation: QueueableOperation): void {
    if (!this.dependencySet.delete(operation)) return;
    this.unobserveDependency(operation);
    this.refreshReadiness();
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  start(): void {
    if (this.started) return;
    this.started = true;

    if (this.cancelled || this.cell.isResolved) {
      this.markAsFinished();
      return;
    }

    this.transition(() => {
      this.executing = true;
      this._startTime = this.clock();
    });
    this.emit({
      type: "operation_start",
      operationName: this.name,
      ts: this._startTime ?? this.clock(),
    });

    this.invokeExecute();
  }

  /**
   * Run `execute()`, converting anything it throws or rejects with into a
   * failure of this operation.
   */
  protected invokeExecute(): void {
    try {
      const pending = this.execute();
      if (pending !== undefined) {
        void pending.catch((error: unknown) => {
          this.finishWithError(error);
        });
      }
    } catch (error) {
      this.finishWithError(error);
    }
  }

  /**
   * Resolve successfully. Ignored once the result is resolved.
   */
  finish(value: T): void {
    this.resolve(ok(value), false);
  }

  /**
   * Resolve with a failure. Errors outside this operation's taxonomy are
   * boxed as its `Unknown` variant. Ignored once the result is resolved.
   */
  finishWithError(error: unknown): void {
    this.resolve(err(this.taxonomy.wrap(error)), false);
  }

  /**
   * Vacate the queue slot without resolving the result. Used by operations
   * that hand their work to child operations and resolve later.
   */
  markAsFinished(): void {
    if (this.finished) return;
    this.transition(() => {
      this.executing = false;
      this.finished = true;
    });
    if (!this.cell.isResolved) {
      this.emit({
        type: "operation_finishing",
        operationName: this.name,
        ts: this.clock(),
      });
    }
  }

  /**
   * Cancel the operation. Before resolution this resolves the result with
   * the taxonomy's `Cancelled` error and aborts `signal`; afterwards it does
   * nothing. Running work is not interrupted.
   */
  cancel(): void {
    if (this.cell.isResolved) return;
    const error = this.taxonomy.cancelled();
    this.resolve(err(error), true);
    this.abortController.abort(error);
  }

  /**
   * Resolve this operation with `child`'s eventual outcome. Child errors are
   * wrapped into this operation's taxonomy.
   *
   * @example
   * ```typescript
   * protected execute() {
   *   this.queue.addOperation(child);
   *   this.markAsFinished();
   *   return this.forward(child);
   * }
   * ```
   */
  forward<C>(child: Operation<T, C>): Promise<void> {
    return child.settled.then((result) => {
      if (result.ok) {
        this.finish(result.value);
      } else {
        this.finishWithError(result.error);
      }
    });
  }

  /**
   * Runs synchronously right before the result is resolved.
   */
  protected onResolve(): void {}

  // ===========================================================================
  // Queue plumbing
  // ===========================================================================

  observeState(listener: () => void): () => void {
    this.stateListeners.add(listener);
    return () => {
      this.stateListeners.delete(listener);
    };
  }

  attachToQueue(queueName: string, onEvent?: OperationEventHandler): void {
    if (this.queueName !== undefined) {
      throw new TypeError(
        `Operation ${this.name} is already enqueued in ${this.queueName}; an operation can only be enqueued once`
      );
    }
    if (this.executing || (this.finished && !this.cancelled)) {
      throw new TypeError(
        `Operation ${this.name} is ${this.status} and cannot be enqueued`
      );
    }
    this.queueName = queueName;
    this.onEvent ??= onEvent;
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  protected emit(event: OperationEvent): void {
    if (!this.onEvent) return;
    try {
      this.onEvent(event);
    } catch (error) {
      if (!this.warnedHandlerFailure) {
        this.warnedHandlerFailure = true;
        console.warn(
          `opqueue: onEvent handler of operation ${this.name} threw while handling ${event.type}. ` +
            `Event handlers must not throw; further failures of this handler are not reported.`,
          error
        );
      }
    }
  }

  private resolve(result: Result<T, E>, cancelling: boolean): void {
    if (this.cell.isResolved) {
      this.emit({
        type: "operation_finish_ignored",
        operationName: this.name,
        ts: this.clock(),
        outcome: result.ok ? "success" : "error",
      });
      return;
    }

    this.onResolve();
    this.progress.complete();
    this.transition(() => {
      this.cancelled = cancelling;
      this.executing = false;
      this.finished = true;
      this._endTime = this.clock();
      this.cell.resolve(result);
    });

    const ts = this._endTime ?? this.clock();
    if (cancelling) {
      this.emit({ type: "operation_cancelled", operationName: this.name, ts });
    } else if (result.ok) {
      this.emit({
        type: "operation_success",
        operationName: this.name,
        ts,
        durationMs: this.executionDuration,
      });
    } else {
      this.emit({
        type: "operation_error",
        operationName: this.name,
        ts,
        durationMs: this.executionDuration,
        error: result.error,
        description: describeOperationError(result.error),
      });
    }
  }

  private onDependencyChange(dependency: QueueableOperation): void {
    if (dependency.isFinished) {
      this.unobserveDependency(dependency);
    }
    this.refreshReadiness();
  }

  private unobserveDependency(dependency: QueueableOperation): void {
    this.dependencyObservers.get(dependency)?.();
    this.dependencyObservers.delete(dependency);
  }

  /** Notifies direct observers only, and only when readiness flips. */
  private refreshReadiness(): void {
    const ready = this.isReady;
    if (ready === this.wasReady) return;
    this.wasReady = ready;
    this.notifyStateChange();
  }

  private transition(mutate: () => void): void {
    mutate();
    this.notifyStateChange();
  }

  private notifyStateChange(): void {
    for (const listener of [...this.stateListeners]) {
      listener();
    }
  }
}

/**
 * Whether `from` reaches `target` through dependencies.
 */
function dependsOn(
  from: QueueableOperation,
  target: QueueableOperation
): boolean {
  const seen = new Set<QueueableOperation>();
  const pending = [from];
  let next: QueueableOperation | undefined;
  while ((next = pending.pop()) !== undefined) {
    for (const dependency of next.dependencies) {
      if (dependency === target) return true;
      if (!seen.has(dependency)) {
        seen.add(dependency);
        pending.push(dependency);
      }
    }
  }
  return false;
}
