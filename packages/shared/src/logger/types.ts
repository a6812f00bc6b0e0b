export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'silent'] as const;

/**
 * Severity threshold. Messages below the configured level are dropped;
 * `silent` drops everything.
 */
export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Interface for logging throughout projpick.
 *
 * @example
 * ```typescript
 * logger.trace('skipping unreadable directory /root/private');
 * logger.info('Scanned 3 roots');
 * logger.error(new Error('Failed'), 'Operation failed');
 *
 * // Create a child logger with additional context
 * const scanLogger = logger.child({ scope: 'scanner' });
 * ```
 */
export interface Logger {
  /** Per-entry detail from the traversal hot path */
  trace(message: string): void;
  /** Log a debug message */
  debug(message: string): void;
  /** Log an informational message */
  info(message: string): void;
  /** Log a warning message */
  warn(message: string): void;
  /**
   * Log an error with optional message.
   * @param message - Optional additional context
   */
  error(error: Error, message?: string): void;

  /**
   * Create a child logger with additional context bindings.
   * All logs from the child will include these bindings.
   */
  child(bindings: Record<string, unknown>): Logger;
}
