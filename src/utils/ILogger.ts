/**
 * Interface for logging implementations.
 * Provides abstraction for different logging backends.
 */
export interface ILogger {
  /**
   * Create a child logger with additional context bindings.
   * @param bindings - Additional context fields to include in all child logs
   */
  child(bindings: Record<string, unknown>): ILogger;

  /**
   * @param args - Optional structured data (first arg) for context
   */
  trace(msg: string, ...args: unknown[]): void;

  debug(msg: string, ...args: unknown[]): void;

  info(msg: string, ...args: unknown[]): void;

  warn(msg: string, ...args: unknown[]): void;

  error(msg: string, ...args: unknown[]): void;
}
