/**
 * Cursor Installer Engine — Retry Tests
 */

import { describe, it, expect, vi } from "vitest";
import { backoffDelay, withRetry } from "../src/utils/retry";
import { silentLogger } from "./helpers";

describe("backoffDelay", () => {
  it("doubles from the base delay", () => {
    expect([1, 2, 3].map((n) => backoffDelay(n, 2000))).toEqual([2000, 4000, 8000]);
  });
});

describe("withRetry", () => {
  it("returns the first success", async () => {
    const sleep = vi.fn(async () => {});
    const outcome = await withRetry(async () => "ok", {
      attempts: 3,
      baseDelayMs: 100,
      label: "op",
      logger: silentLogger,
      sleep,
    });
    expect(outcome).toEqual({ ok: true, value: "ok", attempts: 1 });
    expect(sleep).not.toHaveBeenCalled();
  });

  it("retries with backoff until success", async () => {
    const sleep = vi.fn(async () => {});
    const operation = vi.fn(async (attempt: number) => {
      if (attempt < 3) throw new Error(`fail ${attempt}`);
      return attempt;
    });

    const outcome = await withRetry(operation, {
      attempts: 3,
      baseDelayMs: 100,
      label: "op",
      logger: silentLogger,
      sleep,
    });

    expect(outcome).toEqual({ ok: true, value: 3, attempts: 3 });
    expect(sleep.mock.calls).toEqual([[100], [200]]);
  });

  it("reports the last error when attempts run out", async () => {
    const sleep = vi.fn(async () => {});
    const outcome = await withRetry(
      async (attempt) => {
        throw new Error(`fail ${attempt}`);
      },
      { attempts: 2, baseDelayMs: 10, label: "op", logger: silentLogger, sleep },
    );

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.attempts).toBe(2);
      expect(outcome.retryable).toBe(true);
      expect(outcome.error).toBeInstanceOf(Error);
      expect(outcome.error instanceof Error && outcome.error.message).toBe("fail 2");
    }
    // No wait after the final attempt
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it("stops at the first non-retryable error", async () => {
    const operation = vi.fn(async () => {
      throw new Error("fatal");
    });
    const outcome = await withRetry(operation, {
      attempts: 5,
      baseDelayMs: 10,
      label: "op",
      logger: silentLogger,
      isRetryable: () => false,
      sleep: async () => {},
    });

    expect(operation).toHaveBeenCalledTimes(1);
    expect(outcome).toMatchObject({ ok: false, attempts: 1, retryable: false });
  });
});
