/**
 * Minimal structured logger used across the engine.
 *
 * Components never write to the console directly; they receive a Logger
 * through their options so tests can pass a mock.
 *
 * @module utils/logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext, error?: Error): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function format(level: string, prefix: string, message: string, context?: LogContext): string {
  const base = `${new Date().toISOString()} ${level.toUpperCase().padEnd(5)} [${prefix}] ${message}`;
  if (!context || Object.keys(context).length === 0) {
    return base;
  }
  return `${base} ${JSON.stringify(context)}`;
}

/**
 * Create a console-backed logger that drops messages below `level`.
 */
export function createLogger(level: LogLevel = 'info', prefix = 'policy-sync'): Logger {
  const threshold = LEVEL_ORDER[level];
  const enabled = (l: LogLevel) => LEVEL_ORDER[l] >= threshold;

  return {
    debug(message, context) {
      if (enabled('debug')) console.debug(format('debug', prefix, message, context));
    },
    info(message, context) {
      if (enabled('info')) console.info(format('info', prefix, message, context));
    },
    warn(message, context) {
      if (enabled('warn')) console.warn(format('warn', prefix, message, context));
    },
    error(message, context, error) {
      if (!enabled('error')) return;
      console.error(format('error', prefix, message, context));
      if (error?.stack) {
        console.error(error.stack);
      }
    },
  };
}

/**
 * Logger that discards everything.
 */
export const silentLogger: Logger = createLogger('silent');
