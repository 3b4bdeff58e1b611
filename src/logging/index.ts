/**
 * Logging and observability utilities.
 */

export {
  generateRunId,
  initRunId,
  resumeRunId,
  getRunId,
  isRunId,
  InvalidRunIdError,
  RUN_ID_PATTERN,
} from "./run-id.js";
export {
  createLogger,
  createNullLogger,
  formatLogEntry,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LogContext,
  type LoggerOptions,
} from "./logger.js";
