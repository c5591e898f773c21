/**
 * Console logger with per-module prefixes.
 *
 * The threshold comes from LOG_LEVEL (debug, info, warn, error, silent) and is
 * read on every call, so tests and embedding hosts can change it at runtime.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export type LogContext = Error | Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

export function getLogLevel(): LogLevel {
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  if (configured && configured in LEVEL_NAMES) {
    return LEVEL_NAMES[configured];
  }
  return LogLevel.INFO;
}

export function createLogger(module: string): Logger {
  return {
    debug: (message, context) => log(LogLevel.DEBUG, module, message, context),
    info: (message, context) => log(LogLevel.INFO, module, message, context),
    warn: (message, context) => log(LogLevel.WARN, module, message, context),
    error: (message, context) => log(LogLevel.ERROR, module, message, context),
  };
}

function log(level: LogLevel, module: string, message: string, context?: LogContext): void {
  if (level < getLogLevel()) return;

  const line = `[${new Date().toISOString()}] [${LogLevel[level]}] [${module}] ${message}`;
  const args: unknown[] = [line];
  if (context instanceof Error) {
    args.push(context.stack ?? context.message);
  } else if (context && Object.keys(context).length > 0) {
    args.push(context);
  }

  switch (level) {
    case LogLevel.ERROR:
      console.error(...args);
      break;
    case LogLevel.WARN:
      console.warn(...args);
      break;
    default:
      console.log(...args);
  }
}
