/**
 * Ledgerwise - Logging
 * Tagged console output, e.g. `[Advisor] retrying after timeout`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 }

export interface Logger {
  debug(message: string, ...details: unknown[]): void
  info(message: string, ...details: unknown[]): void
  warn(message: string, ...details: unknown[]): void
  error(message: string, ...details: unknown[]): void
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVELS, value)
}

export function createLogger(tag: string, minLevel: LogLevel = 'info'): Logger {
  const enabled = (level: LogLevel) => LEVELS[level] >= LEVELS[minLevel]
  const prefix = `[${tag}]`
  return {
    debug: (message, ...details) => { if (enabled('debug')) console.debug(prefix, message, ...details) },
    info: (message, ...details) => { if (enabled('info')) console.info(prefix, message, ...details) },
    warn: (message, ...details) => { if (enabled('warn')) console.warn(prefix, message, ...details) },
    error: (message, ...details) => { if (enabled('error')) console.error(prefix, message, ...details) },
  }
}

/** Logger that drops everything, for tests and quiet callers */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
}
