/**
 * Tests for result.ts
 */
import { describe, it, expect } from "vitest";
import { err, isErr, isOk, ok } from "./result";

describe("result primitives", () => {
  it("creates ok and err results", () => {
    expect(ok(1)).toEqual({ ok: true, value: 1 });
    expect(err("FAILED")).toEqual({ ok: false, error: "FAILED" });
  });

  it("narrows with isOk and isErr", () => {
    expect(isOk(ok(1))).toBe(true);
    expect(isErr(ok(1))).toBe(false);
    expect(isErr(err("x"))).toBe(true);
    expect(isOk(err("x"))).toBe(false);
  });
});
