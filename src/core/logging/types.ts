/**
 * Structured logger used throughout kube-lineage
 */
export interface LineageLogger {
  /**
   * Log trace level messages (most verbose)
   */
  trace(msg: string, meta?: Record<string, unknown>): void;

  /**
   * Log debug level messages
   */
  debug(msg: string, meta?: Record<string, unknown>): void;

  info(msg: string, meta?: Record<string, unknown>): void;

  warn(msg: string, meta?: Record<string, unknown>): void;

  /**
   * Log error messages, with the error's name, message and stack attached
   */
  error(msg: string, error?: Error, meta?: Record<string, unknown>): void;

  fatal(msg: string, error?: Error, meta?: Record<string, unknown>): void;

  /**
   * Create a child logger with additional context bindings
   */
  child(bindings: Record<string, unknown>): LineageLogger;
}

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = [
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
  'silent',
];

/**
 * Configuration options for the lineage logger
 */
export interface LoggerConfig {
  /**
   * Log level threshold
   */
  level: LogLevel;

  /**
   * Enable pretty printing through pino-pretty (default: false)
   */
  pretty?: boolean;

  /**
   * Output destination file (default: stderr)
   */
  destination?: string;

  options?: {
    /**
     * Include timestamp in logs (default: true)
     */
    timestamp?: boolean;
  };
}

/**
 * Context bound to a child logger
 */
export interface LoggerContext {
  component?: string;
  rootUid?: string;
  namespace?: string;
  [key: string]: unknown;
}
