/**
 * Lightweight logging utility.
 * Outputs to both console and log file with timestamps and run ID.
 */

import { appendFileSync, mkdirSync, existsSync } from "node:fs";
import { join } from "node:path";
import { getRunId } from "./run-id.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type LogContext = Record<string, unknown>;

export interface LoggerOptions {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Directory for log files */
  logDir?: string;
  /** Log file name (without path) */
  logFile?: string;
  /** Enable console output */
  console?: boolean;
  /** Enable file output */
  file?: boolean;
  /** Receives every formatted entry that passes the level filter */
  sink?: (entry: string, level: LogLevel) => void;
}

const DEFAULT_OPTIONS: Required<Omit<LoggerOptions, "sink">> = {
  level: "info",
  logDir: "output/logs",
  logFile: "batch.log",
  console: true,
  file: true,
};

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Logger that merges `context` into every entry */
  child(context: LogContext): Logger;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Format a log entry with timestamp, level, run ID, and message.
 */
export function formatLogEntry(
  level: LogLevel,
  message: string,
  context?: LogContext,
  timestamp: string = new Date().toISOString()
): string {
  const runId = getRunId() ?? "no-run-id";
  const levelStr = level.toUpperCase().padEnd(5);

  let entry = `[${timestamp}] [${levelStr}] [${runId}] ${message}`;

  if (context && Object.keys(context).length > 0) {
    entry += ` ${JSON.stringify(context)}`;
  }

  return entry;
}

/**
 * Get console method for log level.
 */
function getConsoleMethod(level: LogLevel): typeof console.log {
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
 * Create a logger instance.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { sink, ...rest } = options;
  const opts = { ...DEFAULT_OPTIONS, ...rest };
  const logFilePath = join(opts.logDir, opts.logFile);

  // Ensure log directory exists
  if (opts.file && !existsSync(opts.logDir)) {
    mkdirSync(opts.logDir, { recursive: true });
  }

  function log(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[opts.level]) {
      return;
    }

    const entry = formatLogEntry(level, message, context);

    sink?.(entry, level);

    if (opts.console) {
      getConsoleMethod(level)(entry);
    }

    if (opts.file) {
      try {
        appendFileSync(logFilePath, entry + "\n");
      } catch (err) {
        // Fallback to console if file write fails
        console.error(`Failed to write to log file: ${err}`);
      }
    }
  }

  function bind(bound: LogContext): Logger {
    const merge = (context?: LogContext): LogContext | undefined =>
      Object.keys(bound).length === 0 ? context : { ...bound, ...context };

    return {
      debug: (message, context) => log("debug", message, merge(context)),
      info: (message, context) => log("info", message, merge(context)),
      warn: (message, context) => log("warn", message, merge(context)),
      error: (message, context) => log("error", message, merge(context)),
      child: (context) => bind({ ...bound, ...context }),
    };
  }

  return bind({});
}

/**
 * Logger that discards everything. Used where a component is given no logger.
 */
export function createNullLogger(): Logger {
  return createLogger({ console: false, file: false });
}
