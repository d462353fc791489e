/**
 * Tests for testing/index.ts
 */
import { describe, it, expect } from "vitest";
import { createBlockOperation } from "../block";
import { err, ok } from "../result";
import {
  createDeferred,
  createEventRecorder,
  createTestClock,
  expectErr,
  expectOk,
  unwrapErr,
  unwrapErrAsync,
  unwrapOk,
  unwrapOkAsync,
  waitForStatus,
} from "./index";

describe("createTestClock", () => {
  it("advances, sets and resets time", () => {
    const clock = createTestClock(10);

    clock.advance(5);
    expect(clock.now()).toBe(15);
    clock.set(100);
    expect(clock.now()).toBe(100);
    clock.reset();
    expect(clock.now()).toBe(10);
  });
});

describe("createEventRecorder", () => {
  it("records, filters and clears events", () => {
    const recorder = createEventRecorder();

    recorder.onEvent({ type: "queue_suspend", queueName: "q", ts: 1 });
    recorder.onEvent({ type: "queue_resume", queueName: "q", ts: 2 });

    expect(recorder.types()).toEqual(["queue_suspend", "queue_resume"]);
    expect(recorder.ofType("queue_resume")).toEqual([
      { type: "queue_resume", queueName: "q", ts: 2 },
    ]);

    recorder.clear();
    expect(recorder.events).toEqual([]);
  });
});

describe("waitForStatus", () => {
  it("resolves immediately when the status already matches", async () => {
    const op = createBlockOperation(() => Promise.resolve(1));

    await expect(waitForStatus(op, "ready")).resolves.toBeUndefined();
  });

  it("resolves once the operation reaches the status", async () => {
    const deferred = createDeferred<number>();
    const op = createBlockOperation(() => deferred.promise);

    const waiting = waitForStatus(op, "finished");
    op.start();
    deferred.resolve(1);

    await expect(waiting).resolves.toBeUndefined();
  });

  it("rejects after the timeout", async () => {
    const op = createBlockOperation(() => Promise.resolve(1));

    await expect(
      waitForStatus(op, "finished", { timeoutMs: 10 })
    ).rejects.toThrow(
      'Timed out after 10ms waiting for status "finished" (last status "ready")'
    );
  });
});

describe("result assertions", () => {
  it("unwraps matching results", async () => {
    expect(unwrapOk(ok(1))).toBe(1);
    expect(unwrapErr(err("E"))).toBe("E");
    await expect(unwrapOkAsync(Promise.resolve(ok(2)))).resolves.toBe(2);
    await expect(unwrapErrAsync(Promise.resolve(err("F")))).resolves.toBe("F");
  });

  it("throws on mismatching or missing results", () => {
    expect(() => expectOk(err("E"))).toThrow('Expected Ok result, got Err: "E"');
    expect(() => expectErr(ok(1))).toThrow("Expected Err result, got Ok: 1");
    expect(() => unwrapOk(undefined)).toThrow(
      "Expected Ok result, got no result (still pending)"
    );
  });
});
