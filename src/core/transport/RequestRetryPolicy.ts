import type {
  IRetryPolicy,
  RetryOutcome,
  RetryableOutcome,
} from "../interfaces/IRetryPolicy";
import { SlackApiError, isTimeoutError } from "../../errors";

export const DEFAULT_BACKOFF_INTERVAL_MS = 15000;
export const DEFAULT_MAX_TRIES = 4;

/**
 * Inspects an error before the generic classifier.
 * Returning undefined defers to the classifier.
 */
export type RetryOverride = (error: unknown) => RetryOutcome | undefined;

export interface RetryPolicyOptions {
  maxTries?: number;
  intervalMs?: number;
  isTransient?: (error: unknown) => boolean;
  override?: RetryOverride;
}

/**
 * Slack API errors: "ratelimited" waits for Retry-After, every other code is fatal.
 */
export const rateLimitOverride: RetryOverride = (error) => {
  if (!(error instanceof SlackApiError)) {
    return undefined;
  }
  if (error.rateLimited) {
    return { kind: "rate_limited", delayMs: error.retryAfterMs };
  }
  return { kind: "fatal", error };
};

/**
 * Constant backoff retry policy
 * Waits a fixed interval after transient failures, and the server-advised
 * delay after rate limiting
 */
export class ConstantBackoffRetryPolicy implements IRetryPolicy {
  private readonly maxTries: number;
  private readonly intervalMs: number;
  private readonly isTransient: (error: unknown) => boolean;
  private readonly override?: RetryOverride;

  constructor(options: RetryPolicyOptions = {}) {
    this.maxTries = options.maxTries ?? DEFAULT_MAX_TRIES;
    this.intervalMs = options.intervalMs ?? DEFAULT_BACKOFF_INTERVAL_MS;
    this.isTransient = options.isTransient ?? isTimeoutError;
    this.override = "override" in options ? options.override : rateLimitOverride;
  }

  classify(error: unknown): RetryOutcome {
    const overridden = this.override?.(error);
    if (overridden) {
      return overridden;
    }

    if (this.isTransient(error)) {
      return { kind: "transient" };
    }

    return { kind: "fatal", error };
  }

  getDelay(outcome: RetryableOutcome): number {
    if (outcome.kind === "rate_limited") {
      return Math.max(outcome.delayMs, 0);
    }
    return this.intervalMs;
  }

  getMaxTries(): number {
    return this.maxTries;
  }
}
