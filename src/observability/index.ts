/**
 * Observability module exports
 */

export {
  type LogLevel,
  type LogEntry,
  type Logger,
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
  createLogger,
  redact,
} from './logging.js';
