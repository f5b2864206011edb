/**
 * Where the reconciler facade reports what it dropped or refused.
 * The engine itself never logs.
 * @module utils/logger
 */

/**
 * Sink for reconciler diagnostics. Dropped payloads and refused pins arrive
 * at `warn`, merge outcomes at `debug`, each with a context record such as
 * `{ provider: 'YouTube', field: 'album' }`.
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void
  info(message: string, context?: Record<string, unknown>): void
  warn(message: string, context?: Record<string, unknown>): void
  error(message: string, context?: Record<string, unknown>): void
}

/**
 * Writes to the console with a level tag, e.g. `[WARN] [reconciler] ...`.
 * Pass it to `ReconcilerBuilder.logger()` while debugging a merge.
 */
export const defaultLogger: Logger = {
  debug: (message, context) => {
    console.log(`[DEBUG] ${message}`, context ?? '')
  },
  info: (message, context) => {
    console.log(`[INFO] ${message}`, context ?? '')
  },
  warn: (message, context) => {
    console.warn(`[WARN] ${message}`, context ?? '')
  },
  error: (message, context) => {
    console.error(`[ERROR] ${message}`, context ?? '')
  },
}

/**
 * Logger that drops everything; the Reconciler's default
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
 * Tags every message with `[name]`, so reconciler output can be told apart
 * from the host application's own log lines
 */
export function createPrefixedLogger(name: string, baseLogger: Logger): Logger {
  const prefix = `[${name}]`
  return {
    debug: (message, context) => baseLogger.debug(`${prefix} ${message}`, context),
    info: (message, context) => baseLogger.info(`${prefix} ${message}`, context),
    warn: (message, context) => baseLogger.warn(`${prefix} ${message}`, context),
    error: (message, context) => baseLogger.error(`${prefix} ${message}`, context),
  }
}
