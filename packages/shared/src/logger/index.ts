/**
 * Shared logger system for podlink
 *
 * This module provides a structured logging system with:
 * - Multiple log levels (debug, info, warn, error, silent)
 * - JSON and human-readable output formats
 * - Child loggers carrying bound context
 */

export {
  LogLevel,
  Logger,
  createLogger,
  parseLogLevel,
  serializeError,
  type LogEntry,
  type LoggedError,
  type LoggerConfig,
} from './logger'
