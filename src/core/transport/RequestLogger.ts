import type { ILogger } from "../interfaces/ILogger";

/**
 * Console logger for Slack calls.
 * Debug lines are dropped unless the debug flag is set.
 */
export class RequestLogger implements ILogger {
  private readonly debugEnabled: boolean;

  constructor(debug: boolean = false) {
    this.debugEnabled = debug;
  }

  warn(message: string): void {
    if (typeof console === "undefined") return;
    console.warn(`[SlackClient] ${message}`);
  }

  debug(message: string): void {
    if (!this.debugEnabled || typeof console === "undefined") return;
    console.log(`[SlackClient] ${message}`);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    const code = "code" in error ? ` (${String(error.code)})` : "";
    return `${error.name}${code}: ${error.message}`;
  }
  return String(error);
}
