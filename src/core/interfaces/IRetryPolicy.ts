/**
 * Why an attempt failed, as seen by the retry loop
 */
export type RetryOutcome =
  | { kind: "rate_limited"; delayMs: number }
  | { kind: "transient" }
  | { kind: "fatal"; error: unknown };

export type RetryableOutcome = Exclude<RetryOutcome, { kind: "fatal" }>;

/**
 * Retry policy interface
 * Provides abstraction for error classification and backoff delays
 */
export interface IRetryPolicy {
  /**
   * Classify a failed attempt
   */
  classify(error: unknown): RetryOutcome;

  /**
   * Get delay before the next attempt (in milliseconds)
   */
  getDelay(outcome: RetryableOutcome): number;

  /**
   * Get maximum number of attempts, the first one included
   */
  getMaxTries(): number;
}
