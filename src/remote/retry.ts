import { RateLimitedError, isRetryableError } from "../core/errors.js";
import { formatErrorMessage } from "../core/error-format.js";
import { logWarning, type EventLogger } from "../core/logger.js";
import { sleep as defaultSleep } from "../core/utils.js";

export type RetryPolicy = {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  attempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 8000,
};

export type RetryOptions = {
  policy?: RetryPolicy;
  logger?: EventLogger;
  /** Names the call in `remote.retry` events. */
  operation: string;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
};

/**
 * Full-jitter exponential backoff: a random delay in [0, min(max, base * 2^attempt)).
 * A rate-limit hint raises the delay up to the cap.
 */
export function computeRetryDelay(
  attempt: number,
  policy: RetryPolicy,
  random: () => number,
  retryAfterMs?: number,
): number {
  const ceiling = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** attempt);
  const jittered = Math.floor(random() * ceiling);
  if (retryAfterMs !== undefined) {
    return Math.min(policy.maxDelayMs, Math.max(jittered, retryAfterMs));
  }
  return jittered;
}

/** Runs `fn`, retrying transport failures and rate limits. Anything else is thrown at once. */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const policy = options.policy ?? DEFAULT_RETRY_POLICY;
  const sleep = options.sleep ?? defaultSleep;
  const random = options.random ?? Math.random;
  const attempts = Math.max(1, policy.attempts);

  for (let attempt = 0; ; attempt += 1) {
    try {
      return await fn();
    } catch (err) {
      if (!isRetryableError(err) || attempt + 1 >= attempts) {
        throw err;
      }

      const retryAfterMs = err instanceof RateLimitedError ? err.retryAfterMs : undefined;
      const delayMs = computeRetryDelay(attempt, policy, random, retryAfterMs);

      if (options.logger) {
        logWarning(options.logger, "remote.retry", {
          operation: options.operation,
          attempt: attempt + 1,
          max_attempts: attempts,
          delay_ms: delayMs,
          error: formatErrorMessage(err),
        });
      }

      await sleep(delayMs);
    }
  }
}
