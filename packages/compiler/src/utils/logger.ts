/**
 * Minimal leveled logger.
 *
 * Every component that reports progress takes a `Logger` through its
 * options object; tests pass `silentLogger`.
 *
 * @module utils/logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext, error?: Error): void;
  info(message: string, context?: LogContext, error?: Error): void;
  warn(message: string, context?: LogContext, error?: Error): void;
  error(message: string, context?: LogContext, error?: Error): void;
}

/** Destination for formatted log lines. Defaults to stderr. */
export type LogSink = (line: string) => void;

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function format(level: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext, error?: Error): string {
  let line = `[tagexpr] ${level.toUpperCase()} ${message}`;
  if (context && Object.keys(context).length > 0) {
    line += ` ${JSON.stringify(context)}`;
  }
  if (error) {
    line += `\n  ${error.name}: ${error.message}`;
  }
  return line;
}

export function createLogger(level: LogLevel = 'info', sink: LogSink = (line) => console.error(line)): Logger {
  const threshold = SEVERITY[level];
  const emit = (at: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext, error?: Error): void => {
    if (SEVERITY[at] >= threshold) {
      sink(format(at, message, context, error));
    }
  };

  return {
    debug: (message, context, error) => emit('debug', message, context, error),
    info: (message, context, error) => emit('info', message, context, error),
    warn: (message, context, error) => emit('warn', message, context, error),
    error: (message, context, error) => emit('error', message, context, error),
  };
}

export const silentLogger: Logger = createLogger('silent');
