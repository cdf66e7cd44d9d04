/**
 * Levelled logger with component context.
 *
 * Everything goes to stderr so stdout only ever carries the report.
 *
 *   logger.debug("Fetcher", "Following redirect", { location });
 *   logger.warn("Scorer", "Evaluator failed", error);
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let minLevel: LogLevel = "warn";

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function getLogLevel(): LogLevel {
  return minLevel;
}

function formatMessage(component: string, message: string): string {
  return `[${component}] ${message}`;
}

function write(level: LogLevel, component: string, message: string, meta?: unknown): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[minLevel]) return;
  if (meta !== undefined) {
    console.error(formatMessage(component, message), meta);
  } else {
    console.error(formatMessage(component, message));
  }
}

export const logger = {
  debug(component: string, message: string, meta?: unknown): void {
    write("debug", component, message, meta);
  },

  info(component: string, message: string, meta?: unknown): void {
    write("info", component, message, meta);
  },

  warn(component: string, message: string, meta?: unknown): void {
    write("warn", component, message, meta);
  },

  error(component: string, message: string, error?: unknown): void {
    write("error", component, message, error);
  },
};

export default logger;
