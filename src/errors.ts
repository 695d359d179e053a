export const RATE_LIMITED = "ratelimited";

export class SlackClientError extends Error {
  public readonly code: string;
  public readonly details: Record<string, unknown>;

  constructor(
    message: string,
    code: string = "SLACK_CLIENT_ERROR",
    details: Record<string, unknown> = {},
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "SlackClientError";
    this.code = code;
    this.details = details;
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
    };
  }
}

/**
 * Error reported by the Slack Web API.
 * `code` carries Slack's error string (e.g. "ratelimited", "not_in_channel").
 */
export class SlackApiError extends SlackClientError {
  public readonly headers: Record<string, string>;
  public readonly data: Record<string, unknown>;

  constructor(
    code: string,
    message: string = code,
    headers: Record<string, string> = {},
    data: Record<string, unknown> = {},
    cause?: unknown
  ) {
    super(message, code, data, cause);
    this.name = "SlackApiError";
    this.headers = headers;
    this.data = data;
  }

  get rateLimited(): boolean {
    return this.code === RATE_LIMITED;
  }

  /**
   * Server-advised wait in milliseconds, 0 when the header is missing or malformed.
   */
  get retryAfterMs(): number {
    return parseRetryAfter(this.header("retry-after"));
  }

  header(name: string): string | undefined {
    const wanted = name.toLowerCase();
    for (const [key, value] of Object.entries(this.headers)) {
      if (key.toLowerCase() === wanted) {
        return value;
      }
    }
    return undefined;
  }
}

export class TransientTimeoutError extends SlackClientError {
  constructor(message: string = "Request timed out", cause?: unknown) {
    super(message, "TIMEOUT", {}, cause);
    this.name = "TransientTimeoutError";
  }
}

/**
 * Parse a Retry-After value given in whole seconds.
 */
export function parseRetryAfter(value: string | undefined): number {
  if (value === undefined || !/^\s*\d+\s*$/.test(value)) {
    return 0;
  }
  return Number.parseInt(value, 10) * 1000;
}

export function isSlackApiError(
  error: unknown,
  code?: string
): error is SlackApiError {
  return (
    error instanceof SlackApiError && (code === undefined || error.code === code)
  );
}

export function isTimeoutError(error: unknown): boolean {
  return (
    error instanceof TransientTimeoutError ||
    (error instanceof Error && error.name === "TimeoutError")
  );
}
