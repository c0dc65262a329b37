/**
 * Logging for merge runs
 * @module utils/logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogContext = Record<string, unknown>

/**
 * Sink the pipeline, the mutators and the processor report through.
 */
export interface Logger {
  debug(message: string, context?: LogContext): void
  info(message: string, context?: LogContext): void
  warn(message: string, context?: LogContext): void
  error(message: string, context?: LogContext): void
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

export interface ConsoleLoggerOptions {
  /** Lowest level written. Defaults to `info`. */
  level?: LogLevel
}

/**
 * Console logger writing `level: message`, with the context object after the
 * message when one is given. Warnings and errors go to stderr.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LEVEL_RANK[options.level ?? 'info']

  const emit = (level: LogLevel, message: string, context?: LogContext): void => {
    if (LEVEL_RANK[level] < threshold) return
    const line = `${level}: ${message}`
    const write = level === 'warn' || level === 'error' ? console.error : console.log
    if (context === undefined) {
      write(line)
    } else {
      write(line, context)
    }
  }

  return {
    debug: (message, context) => emit('debug', message, context),
    info: (message, context) => emit('info', message, context),
    warn: (message, context) => emit('warn', message, context),
    error: (message, context) => emit('error', message, context),
  }
}

export const defaultLogger: Logger = createConsoleLogger()

export function createSilentLogger(): Logger {
  const noop = (): void => {}
  return { debug: noop, info: noop, warn: noop, error: noop }
}

/**
 * Scopes a logger to one sheet: messages read `<sheet>: message` and the
 * context gains a `sheet` field.
 */
export function createSheetLogger(sheet: string, base: Logger): Logger {
  const scoped =
    (write: (message: string, context?: LogContext) => void) =>
    (message: string, context?: LogContext): void =>
      write(`${sheet}: ${message}`, { sheet, ...context })

  return {
    debug: scoped((m, c) => base.debug(m, c)),
    info: scoped((m, c) => base.info(m, c)),
    warn: scoped((m, c) => base.warn(m, c)),
    error: scoped((m, c) => base.error(m, c)),
  }
}
