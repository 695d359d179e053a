export {
  ConstantBackoffRetryPolicy,
  rateLimitOverride,
  DEFAULT_BACKOFF_INTERVAL_MS,
  DEFAULT_MAX_TRIES,
} from "./RequestRetryPolicy";
export type { RetryOverride, RetryPolicyOptions } from "./RequestRetryPolicy";
export { RequestLogger } from "./RequestLogger";
export { WebClientTransport, normalizeWebApiError } from "./WebClientTransport";
