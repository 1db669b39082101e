/**
 * Minimal structured logging used by the exporters and loaders.
 * Library code never writes to the console unless a console logger is passed.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

export interface ConsoleLoggerOptions {
  /** Minimum level to emit. Defaults to `"info"`. */
  level?: LogLevel;
  /** Tag prepended to every line, e.g. the calling tool's name. */
  scope?: string;
}

/** Logger that discards everything. Default for all library entry points. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/**
 * Format a log entry with timestamp, level, scope, and message.
 */
export function formatLogEntry(
  level: LogLevel,
  message: string,
  context?: Record<string, unknown>,
  scope?: string,
): string {
  const timestamp = new Date().toISOString();
  const levelStr = level.toUpperCase().padEnd(5);
  let entry = scope
    ? `[${timestamp}] [${levelStr}] [${scope}] ${message}`
    : `[${timestamp}] [${levelStr}] ${message}`;

  if (context && Object.keys(context).length > 0) {
    entry += ` ${JSON.stringify(context)}`;
  }
  return entry;
}

function consoleMethod(level: LogLevel): (line: string) => void {
  switch (level) {
    case "debug":
      return console.debug;
    case "info":
      return console.info;
    case "warn":
      return console.warn;
    case "error":
      return console.error;
  }
}

/**
 * Create a logger writing timestamped lines to the console.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const { level: minLevel = "info", scope } = options;

  function log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[minLevel]) {
      return;
    }
    consoleMethod(level)(formatLogEntry(level, message, context, scope));
  }

  return {
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context) => log("error", message, context),
  };
}
