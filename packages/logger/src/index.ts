/**
 * @statline/logger
 *
 * Structured logging for the Statline workspaces.
 *
 * - JSON lines in production, colored single lines in development
 * - ISO 8601 timestamps
 * - Levels: debug, info, warn, error, fatal
 * - Child loggers extend the component path and inherit context
 * - Output goes through a replaceable sink (console by default)
 *
 * Environment variables:
 * - LOG_LEVEL: minimum level (debug, info, warn, error, fatal). Default: info
 * - LOG_FORMAT: json or pretty. Default: json when NODE_ENV=production, else pretty
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'

export type LogFormat = 'json' | 'pretty'

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

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVELS, value)
}

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const level = env.LOG_LEVEL?.toLowerCase()
  return isLogLevel(level) ? level : 'info'
}

export function resolveLogFormat(env: NodeJS.ProcessEnv = process.env): LogFormat {
  const format = env.LOG_FORMAT?.toLowerCase()
  if (format === 'json' || format === 'pretty') {
    return format
  }
  return env.NODE_ENV === 'production' ? 'json' : 'pretty'
}

function formatError(error: unknown): LogEntry['error'] | undefined {
  if (!error) return undefined

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

export function formatJson(entry: LogEntry): string {
  return JSON.stringify(entry)
}

export function formatPretty(entry: LogEntry): string {
  const { timestamp, level, service, component, message, error, ...meta } = entry
  const source = component ? `${service}:${component}` : service

  const parts = [
    `${DIM}${timestamp}${RESET}`,
    `${LOG_COLORS[level]}${BRIGHT}${level.toUpperCase().padEnd(5)}${RESET}`,
    `${DIM}[${source}]${RESET}`,
    message,
  ]
  if (Object.keys(meta).length > 0) {
    parts.push(`${DIM}${JSON.stringify(meta)}${RESET}`)
  }

  const line = parts.join(' ')
  return error ? `${line}\n  ${DIM}${error.stack ?? error.message}${RESET}` : line
}

const CONSOLE_WRITERS: Record<LogLevel, (line: string) => void> = {
  debug: line => console.debug(line),
  info: line => console.info(line),
  warn: line => console.warn(line),
  error: line => console.error(line),
  fatal: line => console.error(line),
}

export const consoleSink: LogSink = (entry, formatted) => {
  CONSOLE_WRITERS[entry.level](formatted)
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

export interface LoggerOptions {
  /** Fixed minimum level; read from LOG_LEVEL on every call when omitted */
  level?: LogLevel
  /** Fixed format; read from LOG_FORMAT on every call when omitted */
  format?: LogFormat
  sink?: LogSink
}

export class Logger implements ILogger {
  private readonly service: string
  private readonly component?: string
  private readonly defaultContext: LogContext
  private readonly options: LoggerOptions

  constructor(
    service: string,
    component?: string,
    defaultContext: LogContext = {},
    options: LoggerOptions = {}
  ) {
    this.service = service
    this.component = component
    this.defaultContext = defaultContext
    this.options = options
  }

  private log(level: LogLevel, message: string, meta?: LogContext, error?: unknown): void {
    const minLevel = this.options.level ?? resolveLogLevel()
    if (LOG_LEVELS[level] < LOG_LEVELS[minLevel]) return

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      service: this.service,
      message,
      ...this.defaultContext,
      ...meta,
    }

    if (this.component) {
      entry.component = this.component
    }

    const errorData = formatError(error)
    if (errorData) {
      entry.error = errorData
    }

    const format = this.options.format ?? resolveLogFormat()
    const sink = this.options.sink ?? consoleSink
    sink(entry, format === 'json' ? formatJson(entry) : formatPretty(entry))
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
      return new Logger(
        this.service,
        this.component,
        { ...this.defaultContext, ...componentOrContext },
        this.options
      )
    }
    const component = this.component ? `${this.component}:${componentOrContext}` : componentOrContext
    return new Logger(this.service, component, { ...this.defaultContext, ...defaultContext }, this.options)
  }
}

/**
 * Create a logger for a service.
 *
 * @example
 * ```ts
 * const logger = createLogger('harvester')
 * const registryLog = logger.child('registry')
 * registryLog.info('METRICS_DISCOVERY_COMPLETED', { metrics: 4 })
 * ```
 */
export function createLogger(service: string, options: LoggerOptions = {}): ILogger {
  return new Logger(service, undefined, {}, options)
}

/**
 * Logger that drops everything. Useful as a default in library code and tests.
 */
export const silentLogger: ILogger = createLogger('silent', { sink: () => {} })
