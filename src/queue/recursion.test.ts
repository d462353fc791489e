/**
 * Tests for parents that hand their work to child operations on the same
 * queue, resolving through markAsFinished() and forward().
 */
import { describe, it, expect } from "vitest";
import { createBlockOperation } from "../block";
import {
  OPERATION_CANCELLED,
  OPERATION_UNKNOWN,
  baseOperationErrors,
  type BaseOperationError,
} from "../errors";
import { Operation } from "../operation";
import {
  createDeferred,
  flushQueue,
  unwrapErr,
  unwrapOk,
  waitForStatus,
} from "../testing";
import { OperationQueue } from "./index";

/**
 * Computes fib(n) by enqueueing fib(n - 1) and fib(n - 2) and summing them.
 */
class FibonacciOperation extends Operation<number, BaseOperationError> {
  constructor(
    private readonly queue: OperationQueue,
    private readonly n: number
  ) {
    super({ taxonomy: baseOperationErrors, name: `fib(${n})` });
  }

  protected execute(): Promise<void> | void {
    if (this.n < 2) {
      this.finish(this.n);
      return;
    }

    const left = new FibonacciOperation(this.queue, this.n - 1);
    const right = new FibonacciOperation(this.queue, this.n - 2);
    this.queue.addOperations([left, right]);
    this.markAsFinished();

    return Promise.all([left.promise, right.promise]).then(([a, b]) => {
      this.finish(a + b);
    });
  }
}

/**
 * Descends `depth` levels, each level forwarding the level below it.
 */
class DrillOperation extends Operation<string, BaseOperationError> {
  constructor(
    private readonly queue: OperationQueue,
    private readonly depth: number
  ) {
    super({ taxonomy: baseOperationErrors, name: `drill(${depth})` });
  }

  protected execute(): Promise<void> | void {
    if (this.depth === 0) {
      this.finish("bottom");
      return;
    }

    const child = new DrillOperation(this.queue, this.depth - 1);
    this.queue.addOperation(child);
    this.markAsFinished();
    return this.forward(child);
  }
}

/**
 * Forwards a child it is handed.
 */
class ForwardingOperation<T> extends Operation<T, BaseOperationError> {
  constructor(
    private readonly queue: OperationQueue,
    private readonly child: Operation<T, BaseOperationError>
  ) {
    super({ taxonomy: baseOperationErrors });
  }

  protected execute(): Promise<void> {
    this.queue.addOperation(this.child);
    this.markAsFinished();
    return this.forward(this.child);
  }
}

describe("forwarding on a serial queue", () => {
  it("computes fib(10) without deadlocking", async () => {
    const queue = new OperationQueue({ name: "fib", maxConcurrentOperationCount: 1 });
    const root = new FibonacciOperation(queue, 10);

    queue.addOperation(root);

    await expect(root.promise).resolves.toBe(55);
    expect(root.status).toBe("finished");
  });

  it("resolves a deep chain of forwarding parents", async () => {
    const queue = new OperationQueue({ maxConcurrentOperationCount: 1 });
    const root = new DrillOperation(queue, 200);

    queue.addOperation(root);
    const result = await root.settled;

    expect(unwrapOk(result)).toBe("bottom");
  });

  it("keeps the parent finishing until its child resolves", async () => {
    const queue = new OperationQueue({ maxConcurrentOperationCount: 1 });
    const deferred = createDeferred<number>();
    const child = createBlockOperation(() => deferred.promise);
    const parent = new ForwardingOperation(queue, child);

    queue.addOperation(parent);
    await waitForStatus(child, "executing");

    expect(parent.status).toBe("finishing");
    expect(parent.result).toBeUndefined();

    deferred.resolve(7);
    await parent.settled;

    expect(unwrapOk(parent.result)).toBe(7);
  });

  it("fails the parent with the child's error", async () => {
    const queue = new OperationQueue({ maxConcurrentOperationCount: 1 });
    const failure = new Error("child failed");
    const child = createBlockOperation<number>(() => Promise.reject(failure));
    const parent = new ForwardingOperation(queue, child);

    queue.addOperation(parent);
    await parent.settled;

    expect(unwrapErr(parent.result)).toEqual({
      type: OPERATION_UNKNOWN,
      taxonomy: "BaseOperationError",
      cause: failure,
    });
  });

  it("fails the parent when its child is cancelled", async () => {
    const queue = new OperationQueue({ maxConcurrentOperationCount: 1 });
    const child = createBlockOperation(() => createDeferred<number>().promise);
    const parent = new ForwardingOperation(queue, child);

    queue.addOperation(parent);
    await waitForStatus(child, "executing");
    child.cancel();
    await flushQueue();

    expect(parent.status).toBe("finished");
    expect(parent.isCancelled).toBe(false);
    expect(unwrapErr(parent.result).type).toBe(OPERATION_CANCELLED);
  });
});
