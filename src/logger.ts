/**
 * Structured Logger
 *
 * Writes one JSON object per line through the console. Messages below the
 * configured level are dropped.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogContext = Record<string, unknown>

export type Logger = {
  debug(message: string, context?: LogContext): void
  info(message: string, context?: LogContext): void
  warn(message: string, context?: LogContext): void
  error(message: string, error?: unknown, context?: LogContext): void
}

export type ConsoleLoggerOptions = {
  name?: string
  level?: LogLevel
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 }

function describeError(error: unknown): LogContext {
  if (error instanceof Error) {
    return { error: { name: error.name, message: error.message, stack: error.stack } }
  }
  return error === undefined ? {} : { error: String(error) }
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const name = options.name ?? 'well-gap-research'
  const threshold = LEVEL_ORDER[options.level ?? 'info']

  function write(level: LogLevel, message: string, context?: LogContext): void {
    if (LEVEL_ORDER[level] < threshold) return
    const line = JSON.stringify({
      level,
      timestamp: new Date().toISOString(),
      logger: name,
      message,
      ...context,
    })
    if (level === 'error' || level === 'warn') console.error(line)
    else console.log(line)
  }

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, error, context) => write('error', message, { ...context, ...describeError(error) }),
  }
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
}
