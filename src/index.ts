import { SlackCaller } from "./core/caller";
import type { ISlackApi } from "./core/interfaces/ISlackApi";
import { ConstantBackoffRetryPolicy } from "./core/transport/RequestRetryPolicy";
import { RequestLogger } from "./core/transport/RequestLogger";
import { WebClientTransport } from "./core/transport/WebClientTransport";
import { ConversationsClient } from "./conversations/client";
import { UsersClient } from "./users/client";
import { TeamClient } from "./team/client";
import { FilesClient } from "./files/client";
import {
  type ClientConfig,
  DEFAULT_TIMEOUT_MS,
  validateConfig,
} from "./config";
import { SlackClientError } from "./errors";

export interface Client {
  conversations: ConversationsClient;
  users: UsersClient;
  team: TeamClient;
  files: FilesClient;
}

export function createClient(config: ClientConfig): Client {
  validateConfig(config);

  const caller = new SlackCaller({
    api: config.api ?? createTransport(config),
    retryPolicy:
      config.retryPolicy ??
      new ConstantBackoffRetryPolicy({
        maxTries: config.maxTries,
        intervalMs: config.backoffIntervalMs,
      }),
    logger: config.logger ?? new RequestLogger(config.debug),
    sleep: config.sleep,
  });

  return {
    conversations: new ConversationsClient(caller),
    users: new UsersClient(caller),
    team: new TeamClient(caller),
    files: new FilesClient(caller),
  };
}

function createTransport(config: ClientConfig): ISlackApi {
  if (!config.token) {
    throw new SlackClientError("A token is required", "INVALID_CONFIG");
  }
  return WebClientTransport.fromToken(config.token, {
    timeout: config.timeout ?? DEFAULT_TIMEOUT_MS,
  });
}

// Re-exports
export { SlackCaller } from "./core/caller";
export type { SlackCallerConfig, ToleratedError } from "./core/caller";
export { ConversationsClient, FETCH_MEMBERS_FAILED, NOT_IN_CHANNEL } from "./conversations";
export { UsersClient } from "./users";
export { TeamClient } from "./team/client";
export { FilesClient } from "./files/client";
export {
  ConstantBackoffRetryPolicy,
  rateLimitOverride,
  RequestLogger,
  WebClientTransport,
  normalizeWebApiError,
  DEFAULT_BACKOFF_INTERVAL_MS,
  DEFAULT_MAX_TRIES,
} from "./core/transport";
export type { RetryOverride, RetryPolicyOptions } from "./core/transport";
export type * from "./core/interfaces";
export { retryWithBackoff, defaultSleep } from "./utils/retry";
export type { RetryConfig, Sleeper } from "./utils/retry";
export { loadConfigFromEnv, validateConfig, DEFAULT_TIMEOUT_MS } from "./config";
export type { ClientConfig } from "./config";
export {
  SlackClientError,
  SlackApiError,
  TransientTimeoutError,
  RATE_LIMITED,
  parseRetryAfter,
  isSlackApiError,
  isTimeoutError,
} from "./errors";
