/**
 * Simple structured logger.
 * Outputs JSON lines in CI/production so log collectors can parse them,
 * and a human-readable line format everywhere else.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogFormat = "json" | "pretty";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  scope?: string;
  message: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  level: LogLevel;
  format: LogFormat;
}

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let options: LoggerOptions = { level: "info", format: "pretty" };

/**
 * Set the level threshold and output format. Called once at process entry.
 */
export function configureLogger(next: Partial<LoggerOptions>): void {
  options = { ...options, ...next };
}

export function isLogLevel(value: string): value is LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error";
}

function formatLog(level: LogLevel, scope: string | undefined, message: string, meta?: Record<string, unknown>): string {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    ...(scope ? { scope } : {}),
    message,
    ...meta,
  };

  if (options.format === "json") {
    return JSON.stringify(entry);
  }

  const prefix = scope ? `[${scope}] ` : "";
  const metaStr = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `[${entry.timestamp}] ${level.toUpperCase()} ${prefix}${message}${metaStr}`;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[options.level];
}

function createLogger(scope?: string): Logger {
  return {
    debug(message, meta) {
      if (shouldLog("debug")) {
        console.debug(formatLog("debug", scope, message, meta));
      }
    },

    info(message, meta) {
      if (shouldLog("info")) {
        console.log(formatLog("info", scope, message, meta));
      }
    },

    warn(message, meta) {
      if (shouldLog("warn")) {
        console.warn(formatLog("warn", scope, message, meta));
      }
    },

    error(message, meta) {
      if (shouldLog("error")) {
        console.error(formatLog("error", scope, message, meta));
      }
    },

    child(childScope) {
      return createLogger(scope ? `${scope}:${childScope}` : childScope);
    },
  };
}

export const logger: Logger = createLogger();

/**
 * Shorten a string before logging it. Model responses can echo secrets
 * from the prompt, so raw text is never logged in full.
 */
export function truncateForLog(text: string, max = 200): string {
  return text.length > max ? `${text.slice(0, max)}...[truncated]` : text;
}
