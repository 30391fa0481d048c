/**
 * Structured logger for podlink
 */

import { isPodlinkError } from '../errors'

/**
 * Log levels
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  SILENT = 'silent',
}

/**
 * Log level priority for filtering
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
  [LogLevel.SILENT]: Number.POSITIVE_INFINITY,
}

/**
 * Log entry structure
 */
export interface LogEntry {
  level: LogLevel
  message: string
  timestamp: string
  context?: Record<string, unknown>
}

/**
 * Serialized form of an error attached to a log entry
 */
export interface LoggedError {
  name: string
  kind?: string
  message: string
  stack?: string
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel
  enableConsole: boolean
  enableJson: boolean
  bindings: Record<string, unknown>
}

/**
 * Map an environment string such as LOG_LEVEL to a level.
 * Unknown and missing values silence the logger.
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value?.trim().toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG
    case 'info':
      return LogLevel.INFO
    case 'warn':
    case 'warning':
      return LogLevel.WARN
    case 'error':
      return LogLevel.ERROR
    default:
      return LogLevel.SILENT
  }
}

/**
 * Serialize an error using its rendered diagnostic
 */
export function serializeError(error: Error): LoggedError {
  return {
    name: error.name,
    kind: isPodlinkError(error) ? error.kind : undefined,
    message: isPodlinkError(error) ? error.render() : error.message,
    stack: error.stack,
  }
}

export class Logger {
  private config: LoggerConfig

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = {
      level: config.level ?? LogLevel.INFO,
      enableConsole: config.enableConsole ?? true,
      enableJson: config.enableJson ?? false,
      bindings: config.bindings ?? {},
    }
  }

  get level(): LogLevel {
    return this.config.level
  }

  /**
   * Create a child logger whose entries carry the given bindings
   */
  child(bindings: Record<string, unknown>): Logger {
    return new Logger({
      ...this.config,
      bindings: { ...this.config.bindings, ...bindings },
    })
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context)
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context)
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, context)
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, {
      ...context,
      error: error ? serializeError(error) : undefined,
    })
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.config.level]) {
      return
    }

    const merged = { ...this.config.bindings, ...context }
    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      context: Object.keys(merged).length > 0 ? merged : undefined,
    }

    if (this.config.enableConsole) {
      this.writeToConsole(entry)
    }
  }

  private writeToConsole(entry: LogEntry): void {
    if (this.config.enableJson) {
      console.log(JSON.stringify(entry))
      return
    }

    const { level, message, timestamp, context } = entry
    const contextStr = context ? ` ${JSON.stringify(context)}` : ''

    console.log(this.colorizeLog(level, `[${timestamp}] ${level.toUpperCase()}: ${message}${contextStr}`))
  }

  private colorizeLog(level: LogLevel, message: string): string {
    const colors: Record<LogLevel, string> = {
      [LogLevel.DEBUG]: '\x1b[36m', // Cyan
      [LogLevel.INFO]: '\x1b[32m', // Green
      [LogLevel.WARN]: '\x1b[33m', // Yellow
      [LogLevel.ERROR]: '\x1b[31m', // Red
      [LogLevel.SILENT]: '',
    }
    const reset = '\x1b[0m'
    return `${colors[level]}${message}${reset}`
  }
}

/**
 * Create a logger instance
 */
export function createLogger(config?: Partial<LoggerConfig>): Logger {
  return new Logger(config)
}
