/**
 * Retry policy tests
 *
 * Both layers take an injected sleep, so waits are recorded instead of
 * actually elapsing.
 */

import { describe, it, expect, vi } from "vitest";
import pino from "pino";
import { CompositeRetryPolicy, RetryPolicy, type RetryRule } from "../retryPolicy";

class FlakyError extends Error {}
class FatalError extends Error {}

const logger = pino({ level: "silent" });

function recordingSleep() {
  const waits: number[] = [];
  const sleep = async (ms: number) => {
    waits.push(ms);
  };
  return { waits, sleep };
}

function failTimes<T>(times: number, error: () => Error, value: T) {
  let calls = 0;
  const fn = vi.fn(async () => {
    calls += 1;
    if (calls <= times) {
      throw error();
    }
    return value;
  });
  return fn;
}

describe("RetryPolicy", () => {
  it("clamps exponential delays to the configured bounds", () => {
    const policy = new RetryPolicy(logger, { multiplierMs: 1000, minDelayMs: 3000, maxDelayMs: 300_000 });

    expect([1, 2, 3, 4, 5, 9, 10].map((attempt) => policy.calculateDelay(attempt))).toEqual([
      3000, 3000, 4000, 8000, 16000, 256000, 300000,
    ]);
  });

  it("retries until the operation succeeds", async () => {
    const { waits, sleep } = recordingSleep();
    const policy = new RetryPolicy(logger, { maxAttempts: 5, minDelayMs: 3000, sleep });
    const fn = failTimes(2, () => new FlakyError("flaky"), "done");

    await expect(policy.execute(fn, "test")).resolves.toBe("done");
    expect(fn).toHaveBeenCalledTimes(3);
    expect(waits).toEqual([3000, 3000]);
  });

  it("re-throws the last error once attempts run out", async () => {
    const { waits, sleep } = recordingSleep();
    const policy = new RetryPolicy(logger, { maxAttempts: 3, sleep });
    const fn = failTimes(10, () => new FlakyError("still flaky"), "never");

    await expect(policy.execute(fn, "test")).rejects.toThrow("still flaky");
    expect(fn).toHaveBeenCalledTimes(3);
    expect(waits).toEqual([1000, 2000]);
  });

  it("does not retry errors the condition rejects", async () => {
    const { waits, sleep } = recordingSleep();
    const policy = new RetryPolicy(logger, {
      maxAttempts: 5,
      retryCondition: (error) => error instanceof FlakyError,
      sleep,
    });
    const fn = failTimes(1, () => new FatalError("fatal"), "never");

    await expect(policy.execute(fn, "test")).rejects.toBeInstanceOf(FatalError);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(waits).toEqual([]);
  });
});

describe("CompositeRetryPolicy", () => {
  const flakyRule: RetryRule = {
    name: "flaky",
    matches: (error) => error instanceof FlakyError,
    maxAttempts: 2,
    waitSeconds: () => 5,
  };
  const anyErrorRule: RetryRule = {
    name: "any",
    matches: (error) => error instanceof Error,
    waitSeconds: () => 10,
  };

  it("sums the waits of every matching rule", () => {
    const policy = new CompositeRetryPolicy(logger, { rules: [flakyRule, anyErrorRule] });

    expect(policy.waitSeconds(new FlakyError("x"), 1)).toBe(15);
    expect(policy.waitSeconds(new FatalError("x"), 1)).toBe(10);
  });

  it("retries when any matching rule is still within its attempts", () => {
    const policy = new CompositeRetryPolicy(logger, { rules: [flakyRule] });

    expect(policy.shouldRetry(new FlakyError("x"), 2)).toBe(true);
    expect(policy.shouldRetry(new FlakyError("x"), 3)).toBe(false);
    expect(policy.shouldRetry(new FatalError("x"), 1)).toBe(false);
  });

  it("stops after a rule's attempt bound", async () => {
    const { waits, sleep } = recordingSleep();
    const policy = new CompositeRetryPolicy(logger, { rules: [flakyRule], sleep });
    const fn = failTimes(10, () => new FlakyError("flaky"), "never");

    await expect(policy.execute(fn, "test")).rejects.toBeInstanceOf(FlakyError);
    expect(fn).toHaveBeenCalledTimes(3);
    expect(waits).toEqual([5000, 5000]);
  });

  it("caps unbounded rules with stopAfterAttempt", async () => {
    const { waits, sleep } = recordingSleep();
    const policy = new CompositeRetryPolicy(logger, { rules: [anyErrorRule], stopAfterAttempt: 5, sleep });
    const fn = failTimes(10, () => new FatalError("again"), "never");

    await expect(policy.execute(fn, "test")).rejects.toThrow("again");
    expect(fn).toHaveBeenCalledTimes(5);
    expect(waits).toEqual([10000, 10000, 10000, 10000]);
  });

  it("returns the value once a retry succeeds", async () => {
    const { sleep } = recordingSleep();
    const policy = new CompositeRetryPolicy(logger, { rules: [flakyRule], sleep });

    await expect(policy.execute(failTimes(1, () => new FlakyError("once"), 42), "test")).resolves.toBe(42);
  });
});
