/**
 * Logging for schema compilation and decoding.
 *
 * @packageDocumentation
 */

/**
 * Log levels in increasing order of severity.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Options for logging.
 */
export interface LoggingOptions {
  /**
   * Custom logger function.
   */
  logger?: (message: string, data?: Record<string, unknown>) => void;
  /**
   * Minimum level that reaches the logger. Defaults to `'warn'`.
   */
  level?: LogLevel;
}

/**
 * Leveled logger used throughout the package.
 */
export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Default logger (console).
 */
function defaultLogger(level: LogLevel): (message: string, data?: Record<string, unknown>) => void {
  return (message, data) => {
    if (data) {
      console[level](`[IdlDecoder] ${message}`, data);
    } else {
      console[level](`[IdlDecoder] ${message}`);
    }
  };
}

/**
 * Create a logger that drops messages below the configured level.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: 'debug' });
 * logger.debug('Compiled IDL', { accounts: 3 });
 * ```
 */
export function createLogger(options: LoggingOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'warn'];

  const emit =
    (level: LogLevel) =>
    (message: string, data?: Record<string, unknown>): void => {
      if (LEVEL_ORDER[level] < threshold) {
        return;
      }
      const logger = options.logger ?? defaultLogger(level);
      logger(message, data);
    };

  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  };
}

/**
 * Logger that discards everything.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
