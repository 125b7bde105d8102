import { describe, expect, it, vi } from "vitest";
import { RetryPolicy } from "../src/config/env.js";
import { InputError, isTransientError, RetryExhaustedError, TransientError } from "../src/domain/errors.js";
import { computeDelay, withRetry } from "../src/utils/retry.js";

const POLICY: RetryPolicy = { maxRetries: 2, intervalMs: 100, backoff: "exponential" };

describe("withRetry", () => {
  it("retries transient failures with exponential delays", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const task = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new TransientError("busy"))
      .mockRejectedValueOnce(new TransientError("busy"))
      .mockResolvedValue("ok");

    await expect(withRetry(task, { policy: POLICY, operation: "test.op", sleep })).resolves.toBe("ok");
    expect(task).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
  });

  it("gives up after maxRetries with the last failure as cause", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const failure = new TransientError("still down");
    const task = vi.fn<() => Promise<void>>().mockRejectedValue(failure);

    const error = await withRetry(task, { policy: POLICY, operation: "index.upsert", sleep }).catch(
      (caught: unknown) => caught,
    );
    expect(error).toBeInstanceOf(RetryExhaustedError);
    expect(error).toMatchObject({
      operation: "index.upsert",
      attempts: 3,
      message: "index.upsert failed after 3 attempt(s): still down",
      cause: failure,
    });
    expect(task).toHaveBeenCalledTimes(3);
  });

  it("does not retry non-transient errors", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const task = vi.fn<() => Promise<void>>().mockRejectedValue(new InputError("bad"));

    await expect(withRetry(task, { policy: POLICY, operation: "x", sleep })).rejects.toThrow("bad");
    expect(task).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("computes fixed and capped exponential delays", () => {
    expect(computeDelay({ maxRetries: 5, intervalMs: 250, backoff: "fixed" }, 4)).toBe(250);
    expect(computeDelay({ maxRetries: 20, intervalMs: 1000, backoff: "exponential" }, 10)).toBe(30_000);
  });
});

describe("isTransientError", () => {
  it("recognizes socket and database connection failures", () => {
    expect(isTransientError(Object.assign(new Error("reset"), { code: "ECONNRESET" }))).toBe(true);
    expect(isTransientError(Object.assign(new Error("admin shutdown"), { code: "57P01" }))).toBe(true);
    expect(isTransientError(new TypeError("fetch failed"))).toBe(true);
    expect(isTransientError(new Error("wrapper", { cause: new TransientError("inner") }))).toBe(true);
  });

  it("treats other errors as permanent", () => {
    expect(isTransientError(new InputError("bad"))).toBe(false);
    expect(isTransientError(Object.assign(new Error("syntax"), { code: "42601" }))).toBe(false);
    expect(isTransientError("not an error")).toBe(false);
  });
});
