/**
 * Structured JSON logging on the console
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: unknown, context?: LogContext): void;
  /** Logger whose entries carry the given name */
  child(name: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function formatLog(level: LogLevel, name: string | undefined, message: string, context?: LogContext): string {
  return JSON.stringify({
    timestamp: new Date().toISOString(),
    level: level.toUpperCase(),
    name,
    message,
    ...context,
  });
}

function serializeError(error: unknown): unknown {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return String(error);
}

export function createLogger(options: { level?: LogLevel; name?: string } = {}): Logger {
  const level = options.level ?? "info";
  const name = options.name;
  const enabled = (l: LogLevel) => LEVEL_ORDER[l] >= LEVEL_ORDER[level];

  return {
    debug: (message, context) => {
      if (enabled("debug")) console.log(formatLog("debug", name, message, context));
    },
    info: (message, context) => {
      if (enabled("info")) console.log(formatLog("info", name, message, context));
    },
    warn: (message, context) => {
      if (enabled("warn")) console.warn(formatLog("warn", name, message, context));
    },
    error: (message, error, context) => {
      if (!enabled("error")) return;
      const errorContext = error === undefined ? context : { ...context, error: serializeError(error) };
      console.error(formatLog("error", name, message, errorContext));
    },
    child: (childName) =>
      createLogger({ level, name: name ? `${name}.${childName}` : childName }),
  };
}

/**
 * Logger that discards everything
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};
