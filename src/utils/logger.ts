/**
 * Logger utility for polydal
 *
 * Provides a consistent logging interface that can be configured
 * at runtime. Defaults to noop logger, can be switched to console
 * logger (optionally filtered by level) for development/debugging.
 *
 * @module utils/logger
 */

/**
 * Logger interface for consistent logging across the codebase
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, error?: unknown, ...args: unknown[]): void
}

/** Log levels in increasing severity; `silent` disables output */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER
}

/**
 * Console logger implementation
 * Outputs to console with appropriate log levels
 */
export const consoleLogger: Logger = {
  debug(message: string, ...args: unknown[]): void {
    console.debug(`[DEBUG] ${message}`, ...args)
  },
  info(message: string, ...args: unknown[]): void {
    console.info(`[INFO] ${message}`, ...args)
  },
  warn(message: string, ...args: unknown[]): void {
    console.warn(`[WARN] ${message}`, ...args)
  },
  error(message: string, error?: unknown, ...args: unknown[]): void {
    if (error !== undefined) {
      console.error(`[ERROR] ${message}`, error, ...args)
    } else {
      console.error(`[ERROR] ${message}`, ...args)
    }
  },
}

/**
 * Noop logger implementation
 * Silently discards all log messages (default)
 */
export const noopLogger: Logger = {
  debug(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
}

/**
 * Wrap a logger so that messages below `level` are dropped
 *
 * @example
 * ```typescript
 * setLogger(createLevelLogger('warn'))
 * ```
 */
export function createLevelLogger(level: LogLevel, target: Logger = consoleLogger): Logger {
  if (level === 'silent') return noopLogger
  const min = LEVEL_ORDER[level]

  return {
    debug(message, ...args) {
      if (LEVEL_ORDER.debug >= min) target.debug(message, ...args)
    },
    info(message, ...args) {
      if (LEVEL_ORDER.info >= min) target.info(message, ...args)
    },
    warn(message, ...args) {
      if (LEVEL_ORDER.warn >= min) target.warn(message, ...args)
    },
    error(message, error, ...args) {
      target.error(message, error, ...args)
    },
  }
}

/**
 * Global logger instance
 * Defaults to noopLogger
 */
export let logger: Logger = noopLogger

/**
 * Set the global logger instance
 *
 * @example
 * ```typescript
 * import { setLogger, consoleLogger } from './utils/logger'
 *
 * setLogger(consoleLogger)
 * ```
 */
export function setLogger(l: Logger): void {
  logger = l
}
