/**
 * Logger contract and console-backed implementations
 * @module utils/logger
 */

/**
 * Logger interface accepted by every pipeline component
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void
  info(message: string, context?: Record<string, unknown>): void
  warn(message: string, context?: Record<string, unknown>): void
  error(message: string, context?: Record<string, unknown>): void
}

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

/**
 * Creates a console logger that drops messages below `level`
 */
export function createConsoleLogger(level: LogLevel = 'info'): Logger {
  const enabled = (candidate: LogLevel) =>
    LEVEL_ORDER[candidate] >= LEVEL_ORDER[level]

  return {
    debug: (message, context) => {
      // console.debug is not routed everywhere; keep debug on stdout
      if (enabled('debug')) console.log(`[DEBUG] ${message}`, context ?? '')
    },
    info: (message, context) => {
      if (enabled('info')) console.log(`[INFO] ${message}`, context ?? '')
    },
    warn: (message, context) => {
      if (enabled('warn')) console.warn(`[WARN] ${message}`, context ?? '')
    },
    error: (message, context) => {
      if (enabled('error')) console.error(`[ERROR] ${message}`, context ?? '')
    },
  }
}

/**
 * Default console logger implementation
 */
export const defaultLogger: Logger = createConsoleLogger('info')

/**
 * Creates a no-op logger for silent operation
 */
export function createSilentLogger(): Logger {
  const noop = () => {}
  return {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
  }
}

/**
 * Creates a logger that prefixes messages with a stage name
 */
export function createPrefixedLogger(
  stageName: string,
  baseLogger: Logger
): Logger {
  const prefix = `[${stageName}]`
  return {
    debug: (message, context) =>
      baseLogger.debug(`${prefix} ${message}`, context),
    info: (message, context) =>
      baseLogger.info(`${prefix} ${message}`, context),
    warn: (message, context) =>
      baseLogger.warn(`${prefix} ${message}`, context),
    error: (message, context) =>
      baseLogger.error(`${prefix} ${message}`, context),
  }
}

