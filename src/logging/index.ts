/**
 * order-desk Logging
 *
 * Structured logging with pluggable formatters.
 */

export {
  Logger,
  createLogger,
  type LogLevel,
  type LogEntry,
  type MessageEntry,
  type LoggerOptions,
} from './logger.js';

export {
  type LogFormatter,
  LineFormatter,
  JsonFormatter,
} from './formatters/index.js';
