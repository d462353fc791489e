/**
 * opqueue/testing
 *
 * Deterministic helpers for testing operations and queues: flush dispatch,
 * wait for a status, control timestamps and record events.
 *
 * @example
 * ```typescript
 * import { flushQueue, createEventRecorder, unwrapOk } from 'opqueue/testing';
 *
 * const recorder = createEventRecorder();
 * const queue = new OperationQueue({ onEvent: recorder.onEvent });
 *
 * queue.addOperation(op);
 * await flushQueue();
 *
 * expect(unwrapOk(op.result)).toBe(42);
 * ```
 */

export {
  // Scheduling
  type Deferred,
  type StatusSource,
  flushQueue,
  createDeferred,
  waitForStatus,

  // Clock and events
  createTestClock,
  createEventRecorder,

  // Result assertions
  expectOk,
  expectErr,
  unwrapOk,
  unwrapErr,
  unwrapOkAsync,
  unwrapErrAsync,
} from "./testing";
