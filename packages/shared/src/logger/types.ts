/**
 * Severity levels, lowest first.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Interface for diagnostic logging throughout gitree.
 * Log output is kept apart from audit findings.
 *
 * @example
 * ```typescript
 * logger.debug('Checking /srv/git');
 * logger.error(new Error('Failed'), 'Audit aborted');
 *
 * // Create a child logger with additional context
 * const childLogger = logger.child({ mode: 'layout' });
 * ```
 */
export interface Logger {
  /** Log a debug message (hidden unless verbose) */
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
