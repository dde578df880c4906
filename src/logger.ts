/**
 * JSON-line logger over console.
 *
 * The minimum level comes from LOG_LEVEL; without it, debug entries are only
 * emitted outside production.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);
}

function getMinLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL;
  if (isLogLevel(envLevel)) {
    return envLevel;
  }
  return process.env.NODE_ENV === "production" ? "info" : "debug";
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[getMinLevel()];
}

function formatEntry(level: LogLevel, message: string, context: LogContext): string {
  const entry: LogContext = {
    level,
    msg: message,
    ts: new Date().toISOString(),
    ...context
  };
  return JSON.stringify(entry);
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(bindings: LogContext): Logger;
}

export function createLogger(bindings: LogContext = {}): Logger {
  const write = (level: LogLevel, message: string, context?: LogContext) => {
    if (!shouldLog(level)) return;
    const line = formatEntry(level, message, { ...bindings, ...context });
    switch (level) {
      case "debug":
        console.debug(line);
        break;
      case "info":
        console.info(line);
        break;
      case "warn":
        console.warn(line);
        break;
      case "error":
        console.error(line);
        break;
    }
  };

  return {
    debug: (message, context) => write("debug", message, context),
    info: (message, context) => write("info", message, context),
    warn: (message, context) => write("warn", message, context),
    error: (message, context) => write("error", message, context),
    child: (extra) => createLogger({ ...bindings, ...extra })
  };
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export const logger = createLogger();
