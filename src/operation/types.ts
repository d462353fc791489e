import type { ErrorTaxonomy } from "../errors";
import type { Progress } from "../progress";

// =============================================================================
// Status
// =============================================================================

/**
 * Observable lifecycle status, derived from an operation's flags.
 *
 * - `pending`: waiting on unfinished dependencies
 * - `ready`: runnable, not yet started by a queue
 * - `executing`: `execute()` running or awaiting its own work
 * - `finishing`: slot vacated with `markAsFinished()`, result still pending
 * - `finished`: result resolved
 * - `cancelled`: cancelled before resolving
 */
export type OperationStatus =
  | "pending"
  | "ready"
  | "executing"
  | "finishing"
  | "finished"
  | "cancelled";

// =============================================================================
// Events
// =============================================================================

/**
 * Lifecycle events emitted by operations and queues.
 */
export type OperationEvent =
  | { type: "operation_start"; operationName: string; ts: number }
  | {
      type: "operation_success";
      operationName: string;
      ts: number;
      durationMs?: number;
    }
  | {
      type: "operation_error";
      operationName: string;
      ts: number;
      durationMs?: number;
      error: unknown;
      description: string;
    }
  | { type: "operation_cancelled"; operationName: string; ts: number }
  | { type: "operation_finishing"; operationName: string; ts: number }
  | {
      type: "operation_retry";
      operationName: string;
      ts: number;
      attempt: number;
      maxAttempts: number;
      error?: unknown;
    }
  | {
      type: "operation_finish_ignored";
      operationName: string;
      ts: number;
      /** Outcome that was dropped because the result was already resolved */
      outcome: "success" | "error";
    }
  | {
      type: "queue_enqueue";
      queueName: string;
      operationName: string;
      ts: number;
    }
  | {
      type: "queue_dispatch";
      queueName: string;
      operationName: string;
      ts: number;
    }
  | { type: "queue_suspend"; queueName: string; ts: number }
  | { type: "queue_resume"; queueName: string; ts: number };

export type OperationEventType = OperationEvent["type"];

export type OperationEventHandler = (event: OperationEvent) => void;

// =============================================================================
// Options
// =============================================================================

/**
 * Options shared by every operation.
 */
export interface OperationOptions<E> {
  /** Error taxonomy the operation resolves failures with. */
  taxonomy: ErrorTaxonomy<E>;

  /**
   * Progress tracking this operation.
   * @default a new Progress with a total of 0 units
   */
  progress?: Progress;

  /**
   * Label used in events.
   * @default the class name
   */
  name?: string;

  /**
   * Clock used for start/end timestamps.
   * @default Date.now
   */
  clock?: () => number;

  /**
   * Receives lifecycle events. When omitted, the operation reports through
   * the `onEvent` of the queue it is added to, if any.
   */
  onEvent?: OperationEventHandler;
}

// =============================================================================
// Queue Contract
// =============================================================================

/**
 * What a queue needs from an operation.
 */
export interface QueueableOperation {
  readonly name: string;
  /** All dependencies report `isFinished`. */
  readonly isReady: boolean;
  readonly isExecuting: boolean;
  /** The queue slot is free: finished, finishing or cancelled. */
  readonly isFinished: boolean;
  readonly isCancelled: boolean;
  readonly status: OperationStatus;
  /** Operations that must report `isFinished` before this one is ready. */
  readonly dependencies: readonly QueueableOperation[];

  /** Entry point. Invoked at most once; later calls are ignored. */
  start(): void;
  cancel(): void;

  /**
   * Listen to flag changes of this operation, and to its readiness flipping
   * as dependencies finish.
   * @returns Function removing the listener
   */
  observeState(listener: () => void): () => void;

  /**
   * Claim the operation for a queue.
   * @throws TypeError when the operation already belongs to a queue
   * @internal
   */
  attachToQueue(queueName: string, onEvent?: OperationEventHandler): void;
}
