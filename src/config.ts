import type { ISlackApi } from "./core/interfaces/ISlackApi";
import type { ILogger } from "./core/interfaces/ILogger";
import type { IRetryPolicy } from "./core/interfaces/IRetryPolicy";
import type { Sleeper } from "./utils/retry";
import { SlackClientError } from "./errors";

export const DEFAULT_TIMEOUT_MS = 30000;

export interface ClientConfig {
  /**
   * Bot or user token, used when no `api` is given
   */
  token?: string;
  api?: ISlackApi;
  timeout?: number;
  backoffIntervalMs?: number;
  maxTries?: number;
  debug?: boolean;
  logger?: ILogger;
  sleep?: Sleeper;
  /**
   * Replaces the policy built from backoffIntervalMs and maxTries
   */
  retryPolicy?: IRetryPolicy;
}

/**
 * Read client settings from environment variables.
 */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env
): ClientConfig {
  return {
    token: env.SLACK_TOKEN || undefined,
    timeout: readNumber(env, "SLACK_TIMEOUT_MS"),
    backoffIntervalMs: readNumber(env, "SLACK_BACKOFF_INTERVAL_MS"),
    maxTries: readNumber(env, "SLACK_BACKOFF_MAX_TRIES"),
    debug: env.SLACK_DEBUG === "true" || env.SLACK_DEBUG === "1",
  };
}

export function validateConfig(config: ClientConfig): void {
  if (!config.api && !config.token) {
    throw invalidConfig("Either a token or an api must be provided");
  }
  if (config.maxTries !== undefined && (!Number.isInteger(config.maxTries) || config.maxTries < 1)) {
    throw invalidConfig(`maxTries must be a positive integer, got ${config.maxTries}`);
  }
  if (
    config.backoffIntervalMs !== undefined &&
    (!Number.isFinite(config.backoffIntervalMs) || config.backoffIntervalMs < 0)
  ) {
    throw invalidConfig(
      `backoffIntervalMs must be a non-negative number, got ${config.backoffIntervalMs}`
    );
  }
  if (
    config.timeout !== undefined &&
    (!Number.isFinite(config.timeout) || config.timeout <= 0)
  ) {
    throw invalidConfig(`timeout must be a positive number, got ${config.timeout}`);
  }
}

function readNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw invalidConfig(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

function invalidConfig(message: string): SlackClientError {
  return new SlackClientError(message, "INVALID_CONFIG");
}
