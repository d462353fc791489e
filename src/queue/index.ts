/**
 * opqueue/queue
 *
 * In-process operation queue: starts ready operations under a concurrency
 * limit, honouring dependencies, suspension and cancellation.
 *
 * @example
 * ```typescript
 * import { OperationQueue, createBlockOperation } from 'opqueue';
 *
 * const queue = new OperationQueue({ name: 'thumbnails', maxConcurrentOperationCount: 2 });
 *
 * const resize = createBlockOperation(() => resizeImage(path));
 * const upload = createBlockOperation(() => uploadImage(path));
 * upload.addDependency(resize);
 *
 * queue.addOperations([upload, resize]);
 * await queue.waitUntilAllOperationsAreFinished();
 * ```
 */

import type {
  OperationEvent,
  OperationEventHandler,
  QueueableOperation,
} from "../operation";

// =============================================================================
// Types
// =============================================================================

/**
 * Configuration for an operation queue.
 */
export interface OperationQueueOptions {
  /**
   * Name used in events and errors.
   * @default "OperationQueue"
   */
  name?: string;

  /**
   * Maximum operations executing at once. Operations that called
   * `markAsFinished()` no longer count.
   * @default Infinity
   */
  maxConcurrentOperationCount?: number;

  /**
   * Start suspended: operations are accepted but not started until resumed.
   * @default false
   */
  isSuspended?: boolean;

  /**
   * Receives queue events, and the events of enqueued operations that have
   * no handler of their own.
   */
  onEvent?: OperationEventHandler;

  /**
   * Clock used for event timestamps.
   * @default Date.now
   */
  clock?: () => number;
}

/**
 * Statistics for an operation queue.
 */
export interface OperationQueueStats {
  /** Enqueued, not yet started. */
  waitingCount: number;
  /** Started and still holding a slot. */
  executingCount: number;
  maxConcurrentOperationCount: number;
  isSuspended: boolean;
}

// =============================================================================
// OperationQueue
// =============================================================================

export class OperationQueue {
  readonly name: string;
  readonly maxConcurrentOperationCount: number;

  private suspended: boolean;
  private readonly onEvent?: OperationEventHandler;
  private readonly clock: () => number;

  private readonly waiting: QueueableOperation[] = [];
  private readonly executing = new Set<QueueableOperation>();
  private readonly observers = new Map<QueueableOperation, () => void>();
  private idleWaiters: Array<() => void> = [];
  private drainScheduled = false;
  private warnedHandlerFailure = false;

  constructor(options: OperationQueueOptions = {}) {
    const {
      name = "OperationQueue",
      maxConcurrentOperationCount = Infinity,
      isSuspended = false,
      clock = Date.now,
    } = options;

    if (
      maxConcurrentOperationCount !== Infinity &&
      (!Number.isSafeInteger(maxConcurrentOperationCount) ||
        maxConcurrentOperationCount < 1)
    ) {
      throw new TypeError(
        `OperationQueue ${name}: maxConcurrentOperationCount must be a positive integer or Infinity, got ${maxConcurrentOperationCount}`
      );
    }

    this.name = name;
    this.maxConcurrentOperationCount = maxConcurrentOperationCount;
    this.suspended = isSuspended;
    this.onEvent = options.onEvent;
    this.clock = clock;
  }

  // ===========================================================================
  // Enqueueing
  // ===========================================================================

  /**
   * Enqueue an operation. It starts asynchronously once it is ready, a slot
   * is free and the queue is not suspended.
   *
   * @throws TypeError when the operation was already enqueued, is executing
   * or has finished
   */
  addOperation(operation: QueueableOperation): void {
    operation.attachToQueue(this.name, this.onEvent);

    this.waiting.push(operation);
    this.observers.set(
      operation,
      operation.observeState(() => this.scheduleDrain())
    );
    this.emit({
      type: "queue_enqueue",
      queueName: this.name,
      operationName: operation.name,
      ts: this.clock(),
    });
    this.scheduleDrain();
  }

  addOperations(operations: readonly QueueableOperation[]): void {
    for (const operation of operations) {
      this.addOperation(operation);
    }
  }

  // ===========================================================================
  // Control
  // ===========================================================================

  get isSuspended(): boolean {
    return this.suspended;
  }

  set isSuspended(value: boolean) {
    if (value === this.suspended) return;
    this.suspended = value;
    this.emit(
      value
        ? { type: "queue_suspend", queueName: this.name, ts: this.clock() }
        : { type: "queue_resume", queueName: this.name, ts: this.clock() }
    );
    if (!value) {
      this.scheduleDrain();
    }
  }

  suspend(): void {
    this.isSuspended = true;
  }

  resume(): void {
    this.isSuspended = false;
  }

  /**
   * Cancel every operation still owned by this queue.
   */
  cancelAllOperations(): void {
    for (const operation of this.operations) {
      operation.cancel();
    }
  }

  // ===========================================================================
  // Inspection
  // ===========================================================================

  /** Operations waiting to start or holding a slot. */
  get operations(): QueueableOperation[] {
    return [...this.waiting, ...this.executing];
  }

  get operationCount(): number {
    return this.waiting.length + this.executing.size;
  }

  getStats(): OperationQueueStats {
    return {
      waitingCount: this.waiting.length,
      executingCount: this.executing.size,
      maxConcurrentOperationCount: this.maxConcurrentOperationCount,
      isSuspended: this.suspended,
    };
  }

  /**
   * Resolves once no operation is waiting or holding a slot. Operations that
   * vacated their slot with `markAsFinished()` may still be resolving.
   */
  waitUntilAllOperationsAreFinished(): Promise<void> {
    if (this.operationCount === 0) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  // ===========================================================================
  // Dispatch
  // ===========================================================================

  private scheduleDrain(): void {
    if (this.drainScheduled) return;
    this.drainScheduled = true;
    queueMicrotask(() => {
      this.drainScheduled = false;
      this.drain();
    });
  }

  private drain(): void {
    for (const operation of [...this.executing]) {
      if (operation.isFinished) {
        this.executing.delete(operation);
        this.release(operation);
      }
    }

    for (const operation of [...this.waiting]) {
      if (operation.isCancelled || operation.isFinished) {
        // Started so that it leaves the queue without running its work
        this.removeWaiting(operation);
        operation.start();
        this.release(operation);
        continue;
      }

      if (this.suspended) continue;
      if (this.executing.size >= this.maxConcurrentOperationCount) continue;
      if (!operation.isReady) continue;

      this.removeWaiting(operation);
      this.executing.add(operation);
      this.emit({
        type: "queue_dispatch",
        queueName: this.name,
        operationName: operation.name,
        ts: this.clock(),
      });
      operation.start();

      if (operation.isFinished) {
        this.executing.delete(operation);
        this.release(operation);
      }
    }

    if (this.operationCount === 0 && this.idleWaiters.length > 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) {
        resolve();
      }
    }
  }

  private removeWaiting(operation: QueueableOperation): void {
    const index = this.waiting.indexOf(operation);
    if (index !== -1) {
      this.waiting.splice(index, 1);
    }
  }

  private release(operation: QueueableOperation): void {
    this.observers.get(operation)?.();
    this.observers.delete(operation);
  }

  private emit(event: OperationEvent): void {
    if (!this.onEvent) return;
    try {
      this.onEvent(event);
    } catch (error) {
      if (!this.warnedHandlerFailure) {
        this.warnedHandlerFailure = true;
        console.warn(
          `opqueue: onEvent handler of queue ${this.name} threw while handling ${event.type}. ` +
            `Event handlers must not throw; further failures of this handler are not reported.`,
          error
        );
      }
    }
  }
}
