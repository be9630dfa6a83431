/**
 * @dealcheck/logger
 *
 * Structured logging for the harvester and the API.
 *
 * Entries are JSON in production and colored single lines in development.
 * Correlation ids (requestId for HTTP, runId for pipeline runs) are merged
 * from AsyncLocalStorage, and credential-looking fields are masked before
 * anything reaches the sink.
 *
 * Environment variables:
 * - LOG_LEVEL: debug | info | warn | error | fatal (default: info)
 * - LOG_FORMAT: json | pretty (default: json when NODE_ENV=production, else pretty)
 */

import { AsyncLocalStorage } from 'node:async_hooks'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'
export type LogFormat = 'json' | 'pretty'

// ═══════════════════════════════════════════════════════════════════════════════
// Correlation context
// ═══════════════════════════════════════════════════════════════════════════════

export interface RequestContext {
  requestId?: string
  runId?: string
  [key: string]: unknown
}

const contextStorage = new AsyncLocalStorage<RequestContext>()

/**
 * Run `fn` with correlation fields attached to every entry logged inside it,
 * including from awaited continuations.
 */
export function withRequestContext<T>(context: RequestContext, fn: () => T): T {
  return contextStorage.run(context, fn)
}

export function getRequestContext(): RequestContext | undefined {
  return contextStorage.getStore()
}

// ═══════════════════════════════════════════════════════════════════════════════
// Entries
// ═══════════════════════════════════════════════════════════════════════════════

export interface LogContext {
  [key: string]: unknown
}

export interface SerializedError {
  name: string
  message: string
  code?: string
  stack?: string
  cause?: SerializedError
}

export interface LogEntry {
  timestamp: string
  level: LogLevel
  service: string
  component?: string
  message: string
  error?: SerializedError
  [key: string]: unknown
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_RANK, value)
}

const MAX_CAUSE_DEPTH = 3

export function serializeError(error: unknown, depth = 0): SerializedError {
  if (!(error instanceof Error)) {
    return { name: 'UnknownError', message: String(error) }
  }
  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined
  const serialized: SerializedError = { name: error.name, message: redactString(error.message) }
  if (code) serialized.code = code
  if (error.stack) serialized.stack = error.stack
  if (error.cause !== undefined && depth < MAX_CAUSE_DEPTH) {
    serialized.cause = serializeError(error.cause, depth + 1)
  }
  return serialized
}

// ═══════════════════════════════════════════════════════════════════════════════
// Redaction
// ═══════════════════════════════════════════════════════════════════════════════

export const REDACTED = '[REDACTED]'

const SECRET_KEY_PATTERN = /password|secret|token|authorization|api[_-]?key|webhook/i
const URL_CREDENTIALS_PATTERN = /(\b[a-z][a-z0-9+.-]*:\/\/[^:/@\s]+:)[^@\s]+@/gi
const MAX_REDACT_DEPTH = 6

function redactString(value: string): string {
  return value.replace(URL_CREDENTIALS_PATTERN, `$1${REDACTED}@`)
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false
  const proto = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/**
 * Mask values under credential-looking keys and passwords embedded in
 * connection strings. Errors found in meta are serialized.
 */
export function redact(value: unknown, depth = 0): unknown {
  if (typeof value === 'string') return redactString(value)
  if (value instanceof Error) return serializeError(value)
  if (depth >= MAX_REDACT_DEPTH) return value
  if (Array.isArray(value)) return value.map((item) => redact(item, depth + 1))
  if (!isPlainObject(value)) return value

  const result: Record<string, unknown> = {}
  for (const [key, item] of Object.entries(value)) {
    result[key] = SECRET_KEY_PATTERN.test(key) && item !== null && item !== undefined ? REDACTED : redact(item, depth + 1)
  }
  return result
}

// ═══════════════════════════════════════════════════════════════════════════════
// Output
// ═══════════════════════════════════════════════════════════════════════════════

/** Receives every entry that passes the level filter */
export type LogSink = (entry: LogEntry, format: LogFormat) => void

export interface LoggerSettings {
  level?: LogLevel
  format?: LogFormat
  sink?: LogSink
}

let overrides: LoggerSettings = {}

/**
 * Override level, format or sink for the whole process. Fields left out
 * fall back to LOG_LEVEL / LOG_FORMAT and the console.
 */
export function configureLogger(settings: LoggerSettings): void {
  overrides = { ...settings }
}

export function resetLoggerConfiguration(): void {
  overrides = {}
}

function activeLevel(): LogLevel {
  if (overrides.level) return overrides.level
  const level = process.env.LOG_LEVEL?.toLowerCase()
  return isLogLevel(level) ? level : 'info'
}

function activeFormat(): LogFormat {
  if (overrides.format) return overrides.format
  const format = process.env.LOG_FORMAT?.toLowerCase()
  if (format === 'json' || format === 'pretty') return format
  return process.env.NODE_ENV === 'production' ? 'json' : 'pretty'
}

const ANSI_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[35m',
}

const RESET = '\x1b[0m'
const DIM = '\x1b[2m'
const BRIGHT = '\x1b[1m'

export function formatPretty(entry: LogEntry): string {
  const { timestamp, level, service, component, message, error, ...meta } = entry
  const path = component ? `${service}:${component}` : service
  const metaPart = Object.keys(meta).length > 0 ? ` ${DIM}${JSON.stringify(meta)}${RESET}` : ''
  const errorPart = error ? `\n  ${DIM}${error.stack ?? `${error.name}: ${error.message}`}${RESET}` : ''

  return `${DIM}${timestamp}${RESET} ${ANSI_COLORS[level]}${BRIGHT}${level.toUpperCase().padEnd(5)}${RESET} ${DIM}[${path}]${RESET} ${message}${metaPart}${errorPart}`
}

export const consoleSink: LogSink = (entry, format) => {
  const line = format === 'json' ? JSON.stringify(entry) : formatPretty(entry)
  if (entry.level === 'debug') console.debug(line)
  else if (entry.level === 'info') console.info(line)
  else if (entry.level === 'warn') console.warn(line)
  else console.error(line)
}

// ═══════════════════════════════════════════════════════════════════════════════
// Loggers
// ═══════════════════════════════════════════════════════════════════════════════

export interface ILogger {
  debug(message: string, meta?: LogContext): void
  info(message: string, meta?: LogContext): void
  warn(message: string, meta?: LogContext, error?: unknown): void
  error(message: string, meta?: LogContext, error?: unknown): void
  fatal(message: string, meta?: LogContext, error?: unknown): void
  /**
   * A string appends to the component path (`resolver` → `resolver:fuzzy`);
   * an object adds default fields to every entry.
   */
  child(componentOrContext: string | LogContext, defaultContext?: LogContext): ILogger
}

export class Logger implements ILogger {
  constructor(
    private readonly service: string,
    private readonly component?: string,
    private readonly defaultContext: LogContext = {}
  ) {}

  private write(level: LogLevel, message: string, meta?: LogContext, error?: unknown): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[activeLevel()]) return

    const fields = redact({ ...getRequestContext(), ...this.defaultContext, ...meta })
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      service: this.service,
      message,
      ...(isPlainObject(fields) ? fields : {}),
    }
    if (this.component) entry.component = this.component
    if (error !== undefined && error !== null) entry.error = serializeError(error)

    const sink = overrides.sink ?? consoleSink
    sink(entry, activeFormat())
  }

  debug(message: string, meta?: LogContext): void {
    this.write('debug', message, meta)
  }

  info(message: string, meta?: LogContext): void {
    this.write('info', message, meta)
  }

  warn(message: string, meta?: LogContext, error?: unknown): void {
    this.write('warn', message, meta, error)
  }

  error(message: string, meta?: LogContext, error?: unknown): void {
    this.write('error', message, meta, error)
  }

  fatal(message: string, meta?: LogContext, error?: unknown): void {
    this.write('fatal', message, meta, error)
  }

  child(componentOrContext: string | LogContext, defaultContext: LogContext = {}): ILogger {
    if (typeof componentOrContext !== 'string') {
      return new Logger(this.service, this.component, { ...this.defaultContext, ...componentOrContext })
    }
    const component = this.component ? `${this.component}:${componentOrContext}` : componentOrContext
    return new Logger(this.service, component, { ...this.defaultContext, ...defaultContext })
  }
}

/**
 * @example
 * ```ts
 * const log = createLogger('harvester').child('resolver')
 * log.info('MATCH_RECORDED', { rawProductId: 42, status: 'AUTO_ACCEPTED' })
 * ```
 */
export function createLogger(service: string): ILogger {
  return new Logger(service)
}
