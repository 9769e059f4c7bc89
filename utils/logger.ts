/**
 * Logger utility for fdx
 *
 * Provides a simple logger factory that creates namespaced loggers
 * for the file objects and the scope helpers.
 */

export interface Logger {
  info: (...args: unknown[]) => void
  warn: (...args: unknown[]) => void
  error: (...args: unknown[]) => void
  debug: (...args: unknown[]) => void
}

/**
 * Create a namespaced logger instance.
 *
 * @param prefix - Prefix to prepend to all log messages (e.g., '[fdx:raw]')
 * @returns Logger instance with info, warn, error, and debug methods
 *
 * @example
 * ```typescript
 * const logger = createLogger('[fdx:raw]')
 * logger.info('Opened')        // [fdx:raw] Opened
 * logger.error('Failed:', err)
 * ```
 */
export function createLogger(prefix: string): Logger {
  return {
    info: (...args: unknown[]) => console.info(prefix, ...args),
    warn: (...args: unknown[]) => console.warn(prefix, ...args),
    error: (...args: unknown[]) => console.error(prefix, ...args),
    debug: (...args: unknown[]) => {
      // Enable by setting FDX_DEBUG=1 environment variable
      if (typeof process !== 'undefined' && process.env?.FDX_DEBUG) {
        console.debug(prefix, ...args)
      }
    },
  }
}

/**
 * A logger that discards everything. Handy for tests and embedders that
 * route diagnostics elsewhere.
 */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
}

/**
 * Default logger instance with [fdx] prefix
 */
export const logger: Logger = createLogger('[fdx]')
