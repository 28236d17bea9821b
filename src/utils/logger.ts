/**
 * Structured JSON logger, one object per line.
 *
 *   logger.info('Setup params recomputed', { spType: 'DAR8', version: 3 })
 *   → {"timestamp":"…","level":"info","message":"Setup params recomputed","spType":"DAR8","version":3}
 *
 * Level comes from LOG_LEVEL (debug | info | warn | error, default info).
 * Errors go to stderr, everything else to stdout, unless a sink is given.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

function isLogLevel(raw: string): raw is LogLevel {
  return raw in LEVEL_PRIORITY
}

export function resolveLevel(env: string | undefined): LogLevel {
  const raw = (env ?? 'info').toLowerCase()
  return isLogLevel(raw) ? raw : 'info'
}

export interface LogEntry {
  timestamp: string
  level: LogLevel
  message: string
  [key: string]: unknown
}

export type LogSink = (level: LogLevel, line: string) => void

const processSink: LogSink = (level, line) => {
  if (level === 'error') {
    process.stderr.write(line + '\n')
  } else {
    process.stdout.write(line + '\n')
  }
}

/** What services depend on, so tests can pass a child or a stub. */
export interface LoggerLike {
  debug(message: string, context?: Record<string, unknown>): void
  info(message: string, context?: Record<string, unknown>): void
  warn(message: string, context?: Record<string, unknown>): void
  error(message: string, context?: Record<string, unknown>): void
}

export interface LoggerOptions {
  level?: LogLevel
  sink?: LogSink
  /** Fields merged into every entry */
  defaults?: Record<string, unknown>
}

export class Logger implements LoggerLike {
  readonly level: LogLevel
  private readonly threshold: number
  private readonly sink: LogSink
  private readonly defaults: Record<string, unknown>

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? resolveLevel(process.env.LOG_LEVEL)
    this.threshold = LEVEL_PRIORITY[this.level]
    this.sink = options.sink ?? processSink
    this.defaults = options.defaults ?? {}
  }

  private write(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LEVEL_PRIORITY[level] < this.threshold) return

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...this.defaults,
      ...context,
    }
    this.sink(level, JSON.stringify(entry))
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context)
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context)
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context)
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.write('error', message, context)
  }

  /** Logger sharing this one's level and sink, with extra fixed fields. */
  child(defaults: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      sink: this.sink,
      defaults: { ...this.defaults, ...defaults },
    })
  }
}

export const logger = new Logger()
