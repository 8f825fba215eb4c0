/**
 * Logging and observability utilities.
 */

export { generateRunId, initRunId, getRunId } from "./run-id.js";
export {
  createLogger,
  createSilentLogger,
  isLogLevel,
  type Logger,
  type LogLevel,
  type LogContext,
  type LoggerOptions,
} from "./logger.js";
