import { describe, expect, it, vi } from "vitest";

import {
  AuthenticationFailedError,
  RateLimitedError,
  RemoteNotFoundError,
  TransportError,
} from "../core/errors.js";
import { MemoryLogger } from "../core/logger.js";

import { computeRetryDelay, withRetry, type RetryPolicy } from "./retry.js";

const POLICY: RetryPolicy = { attempts: 3, baseDelayMs: 500, maxDelayMs: 8000 };

describe("computeRetryDelay", () => {
  it("grows exponentially and stays under the cap", () => {
    const top = () => 0.999;

    expect(computeRetryDelay(0, POLICY, top)).toBe(499);
    expect(computeRetryDelay(1, POLICY, top)).toBe(999);
    expect(computeRetryDelay(10, POLICY, top)).toBe(7992);
    expect(computeRetryDelay(3, POLICY, () => 0)).toBe(0);
  });

  it("honours a rate-limit hint up to the cap", () => {
    expect(computeRetryDelay(0, POLICY, () => 0, 2000)).toBe(2000);
    expect(computeRetryDelay(0, POLICY, () => 0, 60_000)).toBe(8000);
  });
});

describe("withRetry", () => {
  it("retries transport failures and returns the eventual result", async () => {
    const logger = new MemoryLogger();
    const sleep = vi.fn(async (_ms: number) => undefined);
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new TransportError("reset"))
      .mockResolvedValueOnce("ok");

    const result = await withRetry(fn, {
      policy: POLICY,
      logger,
      operation: "getDocument",
      sleep,
      random: () => 0.5,
    });

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(250);
    expect(logger.ofType("remote.retry")).toEqual([
      {
        type: "remote.retry",
        level: "warn",
        payload: {
          operation: "getDocument",
          attempt: 1,
          max_attempts: 3,
          delay_ms: 250,
          error: "reset",
        },
      },
    ]);
  });

  it("gives up after the configured number of attempts", async () => {
    const sleep = vi.fn(async (_ms: number) => undefined);
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new RateLimitedError("slow", 1000));

    await expect(withRetry(fn, { policy: POLICY, operation: "list", sleep })).rejects.toBeInstanceOf(
      RateLimitedError,
    );
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it.each([
    ["authentication", new AuthenticationFailedError("bad token", 401)],
    ["missing documents", new RemoteNotFoundError("gone", "g1")],
    ["plain errors", new Error("bug")],
  ])("does not retry %s", async (_label, error) => {
    const sleep = vi.fn(async (_ms: number) => undefined);
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(error);

    await expect(withRetry(fn, { policy: POLICY, operation: "get", sleep })).rejects.toBe(error);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });
});
