/**
 * @regwatch/logger
 *
 * Structured logging for the regwatch services.
 *
 * - JSON lines in production, colored single lines in development
 * - Levels: debug, info, warn, error, fatal
 * - Child loggers carry a component path and inherited context
 * - Secrets in metadata (password, token, secret, authorization) are masked
 *
 * Environment variables:
 * - LOG_LEVEL: Minimum log level. Default: info
 * - LOG_FORMAT: json | pretty. Default: json in production, pretty otherwise
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'

export interface LogContext {
  [key: string]: unknown
}

export interface LogEntry {
  timestamp: string
  level: LogLevel
  service: string
  component?: string
  message: string
  error?: {
    name: string
    message: string
    code?: string
    stack?: string
  }
  [key: string]: unknown
}

/**
 * Receives every entry that passes the level filter.
 * The default sink writes to the console.
 */
export type LogSink = (entry: LogEntry, formatted: string) => void

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
}

const LOG_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m', // Cyan
  info: '\x1b[32m', // Green
  warn: '\x1b[33m', // Yellow
  error: '\x1b[31m', // Red
  fatal: '\x1b[35m', // Magenta
}

const RESET = '\x1b[0m'
const DIM = '\x1b[2m'
const BRIGHT = '\x1b[1m'

const SECRET_KEY_PATTERN = /password|secret|token|authorization/i
const MASK = '***'

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value)
}

function getLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase()
  return isLogLevel(level) ? level : 'info'
}

function getLogFormat(): 'json' | 'pretty' {
  const format = process.env.LOG_FORMAT?.toLowerCase()
  if (format === 'json' || format === 'pretty') {
    return format
  }
  return process.env.NODE_ENV === 'production' ? 'json' : 'pretty'
}

export function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[getLogLevel()]
}

function formatError(error: unknown): LogEntry['error'] {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined
    return {
      name: error.name,
      message: error.message,
      ...(code ? { code } : {}),
      stack: error.stack,
    }
  }

  return {
    name: 'UnknownError',
    message: String(error),
  }
}

/**
 * Mask values whose key looks like a credential. Only the top level is
 * inspected; nested objects are passed through.
 */
export function maskSecrets(context: LogContext): LogContext {
  const masked: LogContext = {}
  for (const [key, value] of Object.entries(context)) {
    masked[key] = SECRET_KEY_PATTERN.test(key) && value !== undefined ? MASK : value
  }
  return masked
}

function formatJson(entry: LogEntry): string {
  return JSON.stringify(entry)
}

function formatPretty(entry: LogEntry): string {
  const color = LOG_COLORS[entry.level]
  const levelStr = entry.level.toUpperCase().padEnd(5)
  const componentPath = entry.component ? `${entry.service}:${entry.component}` : entry.service

  const { timestamp, level: _level, service: _service, component: _component, message, error, ...meta } = entry

  const metaStr = Object.keys(meta).length > 0 ? ` ${DIM}${JSON.stringify(meta)}${RESET}` : ''
  const errorStr = error ? `\n  ${DIM}${error.stack || error.message}${RESET}` : ''

  return `${DIM}${timestamp}${RESET} ${color}${BRIGHT}${levelStr}${RESET} ${DIM}[${componentPath}]${RESET} ${message}${metaStr}${errorStr}`
}

const consoleSink: LogSink = (entry, formatted) => {
  switch (entry.level) {
    case 'debug':
      console.debug(formatted)
      break
    case 'info':
      console.info(formatted)
      break
    case 'warn':
      console.warn(formatted)
      break
    case 'error':
    case 'fatal':
      console.error(formatted)
      break
  }
}

let activeSink: LogSink = consoleSink

/**
 * Route log output somewhere other than the console (tests, file capture).
 */
export function setLogSink(sink: LogSink): void {
  activeSink = sink
}

export function resetLogSink(): void {
  activeSink = consoleSink
}

export interface ILogger {
  debug(message: string, meta?: LogContext): void
  info(message: string, meta?: LogContext): void
  warn(message: string, meta?: LogContext, error?: unknown): void
  error(message: string, meta?: LogContext, error?: unknown): void
  fatal(message: string, meta?: LogContext, error?: unknown): void
  /**
   * Create a child logger.
   * A string extends the component path; an object only adds context.
   */
  child(componentOrContext: string | LogContext, defaultContext?: LogContext): ILogger
}

export class Logger implements ILogger {
  constructor(
    private readonly service: string,
    private readonly component?: string,
    private readonly defaultContext: LogContext = {}
  ) {}

  private log(level: LogLevel, message: string, meta?: LogContext, error?: unknown): void {
    if (!shouldLog(level)) return

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      service: this.service,
      message,
      ...maskSecrets({ ...this.defaultContext, ...meta }),
    }

    if (this.component) {
      entry.component = this.component
    }

    if (error !== undefined && error !== null) {
      entry.error = formatError(error)
    }

    const formatted = getLogFormat() === 'json' ? formatJson(entry) : formatPretty(entry)
    activeSink(entry, formatted)
  }

  debug(message: string, meta?: LogContext): void {
    this.log('debug', message, meta)
  }

  info(message: string, meta?: LogContext): void {
    this.log('info', message, meta)
  }

  warn(message: string, meta?: LogContext, error?: unknown): void {
    this.log('warn', message, meta, error)
  }

  error(message: string, meta?: LogContext, error?: unknown): void {
    this.log('error', message, meta, error)
  }

  fatal(message: string, meta?: LogContext, error?: unknown): void {
    this.log('fatal', message, meta, error)
  }

  child(componentOrContext: string | LogContext, defaultContext: LogContext = {}): ILogger {
    if (typeof componentOrContext === 'object') {
      return new Logger(this.service, this.component, {
        ...this.defaultContext,
        ...componentOrContext,
      })
    }
    const newComponent = this.component
      ? `${this.component}:${componentOrContext}`
      : componentOrContext
    return new Logger(this.service, newComponent, {
      ...this.defaultContext,
      ...defaultContext,
    })
  }
}

/**
 * Create a logger for a service
 *
 * @example
 * ```ts
 * import { createLogger } from '@regwatch/logger'
 *
 * const logger = createLogger('harvester')
 * logger.info('Cycle started', { sources: 12 })
 *
 * const fetchLogger = logger.child('fetch')
 * fetchLogger.warn('Retrying request', { attempt: 2 })
 * ```
 */
export function createLogger(service: string): ILogger {
  return new Logger(service)
}
