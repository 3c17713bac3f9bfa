import pc from 'picocolors'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogFields = Record<string, string | number | boolean | null | undefined>

/**
 * Writes one formatted line to an output stream.
 */
export type LogWriter = (line: string, level: LogLevel) => void

export interface Logger {
  debug(message: string, fields?: LogFields): void
  info(message: string, fields?: LogFields): void
  warn(message: string, fields?: LogFields): void
  error(message: string, fields?: LogFields): void
  /** Returns a logger for a nested scope sharing the same level and writer. */
  child(scope: string): Logger
}

export interface LoggerOptions {
  level?: LogLevel
  writer?: LogWriter
  /** Disable ANSI colors, e.g. when capturing output in tests. */
  colors?: boolean
  now?: () => number
}

const levelRank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

const levelLabel: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO ',
  warn: 'WARN ',
  error: 'ERROR',
}

const levelColor = (level: LogLevel): ((text: string) => string) => {
  switch (level) {
    case 'error':
      return pc.red
    case 'warn':
      return pc.yellow
    case 'debug':
      return pc.gray
    default:
      return pc.green
  }
}

/* eslint-disable no-console */
const consoleWriter: LogWriter = (line, level) => {
  if (level === 'warn' || level === 'error') {
    console.error(line)
    return
  }
  console.log(line)
}
/* eslint-enable no-console */

/**
 * Parses a LOG_LEVEL style value.
 * @param value Raw value, usually from the environment.
 * @returns The matching level, or `info` when unset or unknown.
 */
export const parseLogLevel = (value: string | undefined): LogLevel => {
  const normalized = value?.trim().toLowerCase()
  if (
    normalized === 'debug' ||
    normalized === 'info' ||
    normalized === 'warn' ||
    normalized === 'error'
  ) {
    return normalized
  }
  return 'info'
}

const formatValue = (value: string | number | boolean | null): string => {
  if (typeof value === 'string') {
    return /[\s"=]/.test(value) ? JSON.stringify(value) : value
  }
  return String(value)
}

/**
 * Formats structured fields as `key=value` pairs, skipping undefined values.
 * @param fields Structured fields attached to a log entry.
 * @returns The rendered pairs, or an empty string.
 */
export const formatFields = (fields: LogFields = {}): string => {
  const parts: string[] = []
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) {
      continue
    }
    parts.push(`${key}=${formatValue(value)}`)
  }
  return parts.join(' ')
}

/**
 * Creates a console logger for one scope.
 * @param scope Name shown in brackets on every line, e.g. `pipeline:batch_1`.
 * @param options Level, writer and color overrides.
 */
export const createLogger = (scope: string, options: LoggerOptions = {}): Logger => {
  const level = options.level ?? parseLogLevel(process.env.LOG_LEVEL)
  const writer = options.writer ?? consoleWriter
  const colors = options.colors ?? pc.isColorSupported
  const now = options.now ?? (() => Date.now())

  const emit = (entryLevel: LogLevel, message: string, fields?: LogFields): void => {
    if (levelRank[entryLevel] < levelRank[level]) {
      return
    }
    const timestamp = new Date(now()).toISOString()
    const label = colors ? levelColor(entryLevel)(levelLabel[entryLevel]) : levelLabel[entryLevel]
    const scopeTag = colors ? pc.cyan(`[${scope}]`) : `[${scope}]`
    const rendered = formatFields(fields)
    const line = `[${timestamp}] ${label} ${scopeTag} ${message}${rendered ? ` ${rendered}` : ''}`
    writer(line, entryLevel)
  }

  return {
    debug: (message, fields) => emit('debug', message, fields),
    info: (message, fields) => emit('info', message, fields),
    warn: (message, fields) => emit('warn', message, fields),
    error: (message, fields) => emit('error', message, fields),
    child: (childScope) => createLogger(childScope, { level, writer, colors, now }),
  }
}

/**
 * Logger that drops everything. Handy default for library code and tests.
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
}
