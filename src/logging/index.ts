/**
 * Logging Module
 *
 * Structured JSON logging with context enrichment.
 */

export {
  type LogLevel,
  type LogMetadata,
  type LogContext,
  type ErrorInfo,
  type LogEntry,
  type Logger,
  type LogOutput,
  type LoggerOptions,
  LOG_LEVELS,
  createLogger,
  createSilentLogger,
  isLogLevel,
} from './logger.js';
