/**
 * fdx - exception-safe wrappers over stdio streams and raw descriptors
 *
 * @example
 * ```typescript
 * import { withBufferedFile, FileType, AccessMode } from 'fdx'
 *
 * withBufferedFile('/tmp/log.txt', FileType.Text, AccessMode.Append, (file) => {
 *   file.printByte('%s %d\n', 'started', Date.now())
 * })
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// Re-export core
// =============================================================================

export * from './core/index.js'

// =============================================================================
// Logging
// =============================================================================

export { createLogger, silentLogger, logger, type Logger } from './utils/logger.js'
