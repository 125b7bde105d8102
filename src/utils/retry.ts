import { RetryPolicy } from "../config/env.js";
import { describeError, isTransientError, RetryExhaustedError } from "../domain/errors.js";
import type { Logger } from "../infra/logging/logger.js";

export type Sleep = (ms: number) => Promise<void>;

export interface RetryOptions {
  policy: RetryPolicy;
  operation: string;
  logger?: Logger;
  sleep?: Sleep;
}

const MAX_DELAY_MS = 30_000;

export const defaultSleep: Sleep = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Runs `task`, retrying transient failures up to `policy.maxRetries` times.
 * Non-transient errors are rethrown as-is on the first occurrence; exhausting
 * the retries throws {@link RetryExhaustedError} wrapping the last failure.
 */
export async function withRetry<T>(task: () => Promise<T>, options: RetryOptions): Promise<T> {
  const { policy, operation, logger } = options;
  const sleep = options.sleep ?? defaultSleep;
  const maxAttempts = policy.maxRetries + 1;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await task();
    } catch (error) {
      if (!isTransientError(error)) {
        throw error;
      }
      if (attempt >= maxAttempts) {
        logger?.error(`${operation} failed, giving up`, {
          attempts: attempt,
          error: describeError(error),
        });
        throw new RetryExhaustedError(operation, attempt, { cause: error });
      }

      const delay = computeDelay(policy, attempt);
      logger?.warn(`${operation} failed, retrying`, {
        attempt,
        maxAttempts,
        delayMs: delay,
        error: describeError(error),
      });
      await sleep(delay);
    }
  }
}

export function computeDelay(policy: RetryPolicy, attempt: number): number {
  if (policy.backoff === "fixed") {
    return policy.intervalMs;
  }
  return Math.min(policy.intervalMs * 2 ** (attempt - 1), MAX_DELAY_MS);
}
