export type { ISlackApi, Channel } from "./ISlackApi";
export type { ILogger } from "./ILogger";
export type {
  IRetryPolicy,
  RetryOutcome,
  RetryableOutcome,
} from "./IRetryPolicy";
