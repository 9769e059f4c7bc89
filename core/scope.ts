/**
 * Scoped use of file objects
 *
 * `withFile` runs a body against an open file and closes the file on every
 * exit path. When the body throws, its error is what the caller sees; a
 * close failure during that unwind is logged rather than thrown over it.
 * When the body returns normally, a close failure propagates.
 *
 * Bodies are synchronous, as every file object operation is.
 *
 * @example
 * ```typescript
 * const header = withBufferedFile('/data.txt', FileType.Text, AccessMode.Read, (file) => file.getByteLine())
 * ```
 *
 * @module core/scope
 */

import { logger as defaultLogger, type Logger } from '../utils/logger.js'
import { BufferedFile } from './buffered-file.js'
import type { FilePath } from './path.js'
import { RawFile, type FileObjectOptions } from './raw-file.js'
import type { AccessMode, FileType } from './types.js'

/**
 * Anything with an idempotent close.
 */
export interface Closable {
  close(): void
}

/**
 * Run `body` with `file`, then close it.
 *
 * @returns what the body returned
 */
export function withFile<F extends Closable, R>(file: F, body: (file: F) => R, logger: Logger = defaultLogger): R {
  let result: R
  try {
    result = body(file)
  } catch (error) {
    try {
      file.close()
    } catch (closeError) {
      logger.error('close failed while unwinding from an earlier error:', closeError)
    }
    throw error
  }
  file.close()
  return result
}

/**
 * Open a BufferedFile, run `body` with it and close it.
 */
export function withBufferedFile<R>(
  path: FilePath,
  type: FileType,
  mode: AccessMode,
  body: (file: BufferedFile) => R,
  options: FileObjectOptions = {}
): R {
  return withFile(new BufferedFile(path, type, mode, options), body, options.logger)
}

/**
 * Open a RawFile, run `body` with it and close it.
 */
export function withRawFile<R>(
  path: FilePath,
  flags: number,
  mode: number | undefined,
  body: (file: RawFile) => R,
  options: FileObjectOptions = {}
): R {
  return withFile(new RawFile(path, flags, mode, options), body, options.logger)
}
