/**
 * @fileoverview Structured JSON logging.
 *
 * Each call produces one {@link LogEntry}; the default handler prints it as a
 * single JSON line on the console method matching its level.
 *
 * @module utils/logger
 *
 * @example
 * ```typescript
 * const logger = createLogger({ component: 'lfs-server', minLevel: LogLevel.DEBUG })
 * logger.info('POST /repo/objects/batch 200', { durationMs: 3 })
 *
 * const repoLogger = logger.child({ repository: 'repo' })
 * repoLogger.error('Upload failed', error, { oid })
 * ```
 */

// ============================================================================
// Types
// ============================================================================

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

const SEVERITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
}

export interface LogEntry {
  /** ISO-8601 */
  timestamp: string
  level: LogLevel
  message: string
  component?: string
  error?: {
    name: string
    message: string
    /** `code` of lfs-cas and Node system errors */
    code?: string
    stack?: string
  }
  /** Logger context merged with per-call data */
  data?: Record<string, unknown>
}

export type LogData = Record<string, unknown>

export interface Logger {
  debug(message: string, data?: LogData): void
  info(message: string, data?: LogData): void
  warn(message: string, data?: LogData): void
  error(message: string, error?: Error, data?: LogData): void
  /** Logger whose entries also carry `context` */
  child(context: LogData): Logger
}

export interface LoggerOptions {
  component?: string
  /** Defaults to INFO */
  minLevel?: LogLevel
  context?: LogData
  /** Receives every entry at or above `minLevel`; defaults to console JSON */
  handler?: (entry: LogEntry) => void
}

// ============================================================================
// Implementation
// ============================================================================

function consoleHandler(entry: LogEntry): void {
  const line = JSON.stringify(entry)
  switch (entry.level) {
    case LogLevel.DEBUG:
      console.debug(line)
      break
    case LogLevel.INFO:
      console.info(line)
      break
    case LogLevel.WARN:
      console.warn(line)
      break
    case LogLevel.ERROR:
      console.error(line)
      break
  }
}

function describeError(error: Error): NonNullable<LogEntry['error']> {
  const described: NonNullable<LogEntry['error']> = { name: error.name, message: error.message }
  if ('code' in error && typeof error.code === 'string') described.code = error.code
  if (error.stack !== undefined) described.stack = error.stack
  return described
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const { component, minLevel = LogLevel.INFO, context = {}, handler = consoleHandler } = options

  const emit = (level: LogLevel, message: string, error?: Error, data?: LogData): void => {
    if (SEVERITY[level] < SEVERITY[minLevel]) return

    const entry: LogEntry = { timestamp: new Date().toISOString(), level, message }
    if (component) entry.component = component
    if (error) entry.error = describeError(error)

    const merged = { ...context, ...data }
    if (Object.keys(merged).length > 0) entry.data = merged

    handler(entry)
  }

  return {
    debug: (message, data) => emit(LogLevel.DEBUG, message, undefined, data),
    info: (message, data) => emit(LogLevel.INFO, message, undefined, data),
    warn: (message, data) => emit(LogLevel.WARN, message, undefined, data),
    error: (message, error, data) => emit(LogLevel.ERROR, message, error, data),
    child: (childContext) =>
      createLogger({ component, minLevel, context: { ...context, ...childContext }, handler }),
  }
}

/**
 * Discards everything. The default for library classes constructed without a logger.
 */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => noopLogger,
}

/**
 * Case-insensitive level name lookup; undefined for unknown names.
 */
export function parseLogLevel(value: string): LogLevel | undefined {
  const normalized = value.trim().toLowerCase()
  return Object.values(LogLevel).find((level) => level === normalized)
}
