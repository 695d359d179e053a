/**
 * Log sink used by the caller
 */
export interface ILogger {
  warn(message: string): void;
  debug(message: string): void;
}
