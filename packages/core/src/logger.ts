/**
 * @module logger
 * Leveled console logging. Every message is prefixed with
 * `[cutout-studio:<scope>]` so output can be filtered per module.
 *
 * The level is process-wide and defaults to `warn`, which keeps test and
 * library output quiet; hosts raise it with {@link setLogLevel}.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

let currentLevel: LogLevel = 'warn';

/** Set the minimum level that reaches the console. `silent` suppresses everything. */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

/** Scoped logger returned by {@link createLogger}. */
export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

/**
 * Create a logger for one module.
 *
 * @example
 * ```ts
 * const log = createLogger('renderer');
 * log.debug('Drawing layer', { name, order });
 * ```
 */
export function createLogger(scope: string): Logger {
  const prefix = `[cutout-studio:${scope}]`;
  return {
    debug(...args: unknown[]) {
      if (shouldLog('debug')) console.debug(prefix, ...args);
    },
    info(...args: unknown[]) {
      if (shouldLog('info')) console.info(prefix, ...args);
    },
    warn(...args: unknown[]) {
      if (shouldLog('warn')) console.warn(prefix, ...args);
    },
    error(...args: unknown[]) {
      if (shouldLog('error')) console.error(prefix, ...args);
    },
  };
}
