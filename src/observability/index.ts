/**
 * Observability module exports
 */

export {
  type LogLevel,
  type LogFormat,
  type LogEntry,
  type Logger,
  type LoggingConfig,
  LOG_LEVELS,
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
  createLogger,
  redact,
} from './logging.js';
