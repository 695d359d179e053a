import type { ISlackApi } from "./interfaces/ISlackApi";
import type { ILogger } from "./interfaces/ILogger";
import type { IRetryPolicy } from "./interfaces/IRetryPolicy";
import { ConstantBackoffRetryPolicy } from "./transport/RequestRetryPolicy";
import { RequestLogger, describeError } from "./transport/RequestLogger";
import { isSlackApiError } from "../errors";
import { retryWithBackoff, defaultSleep, type Sleeper } from "../utils/retry";

export interface SlackCallerConfig {
  api: ISlackApi;
  retryPolicy?: IRetryPolicy;
  logger?: ILogger;
  sleep?: Sleeper;
}

/**
 * A Slack error code that an operation absorbs instead of failing
 */
export interface ToleratedError<T> {
  code: string;
  fallback: T;
  warning: string;
}

export class SlackCaller {
  private api: ISlackApi;
  private retryPolicy: IRetryPolicy;
  private logger: ILogger;
  private sleep: Sleeper;

  constructor(config: SlackCallerConfig) {
    this.api = config.api;
    this.retryPolicy = config.retryPolicy ?? new ConstantBackoffRetryPolicy();
    this.logger = config.logger ?? new RequestLogger();
    this.sleep = config.sleep ?? defaultSleep;
  }

  /**
   * Run one Slack operation under the retry policy.
   * A tolerated error on any attempt resolves to its fallback.
   */
  async call<T>(
    operation: string,
    fn: (api: ISlackApi) => Promise<T>,
    tolerated?: ToleratedError<T>
  ): Promise<T> {
    const startTime = performance.now();

    const attempt = async (): Promise<T> => {
      try {
        return await fn(this.api);
      } catch (error) {
        if (tolerated && isSlackApiError(error, tolerated.code)) {
          this.logger.warn(tolerated.warning);
          return tolerated.fallback;
        }
        throw error;
      }
    };

    try {
      const result = await retryWithBackoff(attempt, {
        policy: this.retryPolicy,
        sleep: this.sleep,
        onRetry: (n, delayMs, outcome) => {
          this.logger.debug(
            `${operation} attempt ${n} failed (${outcome.kind}), retrying in ${delayMs}ms`
          );
        },
      });
      return result;
    } catch (error) {
      const duration = performance.now() - startTime;
      this.logger.debug(
        `${operation} failed after ${duration.toFixed(2)}ms: ${describeError(error)}`
      );
      throw error;
    }
  }
}
