import type { IRetryPolicy, RetryableOutcome } from "../core/interfaces/IRetryPolicy";

export type Sleeper = (ms: number) => Promise<void>;

export const defaultSleep: Sleeper = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Retry configuration
 */
export interface RetryConfig {
  policy: IRetryPolicy;

  /**
   * Waits between attempts
   */
  sleep?: Sleeper;

  /**
   * Called before each wait that precedes another attempt
   */
  onRetry?: (
    attempt: number,
    delayMs: number,
    outcome: RetryableOutcome,
    error: unknown
  ) => void;
}

/**
 * Retry an operation under the given policy
 * @param operation - The async operation to retry
 * @param config - Retry configuration
 * @returns Promise resolving to operation result
 * @throws The fatal error, or the last error once all tries are used
 * (after its Retry-After wait when the last failure was a rate limit)
 */
export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  config: RetryConfig
): Promise<T> {
  const sleep = config.sleep ?? defaultSleep;
  const maxTries = Math.max(config.policy.getMaxTries(), 1);

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      const outcome = config.policy.classify(error);

      if (outcome.kind === "fatal") {
        throw error;
      }

      const delay = config.policy.getDelay(outcome);

      // The advised wait is honored even when no tries are left.
      if (outcome.kind === "rate_limited" && attempt >= maxTries) {
        await sleep(delay);
        throw error;
      }

      if (attempt >= maxTries) {
        throw error;
      }

      config.onRetry?.(attempt, delay, outcome, error);
      await sleep(delay);
    }
  }
}
