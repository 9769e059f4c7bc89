/**
 * Path values for fdx file objects
 *
 * A file object accepts a path as a string or a `file:` URL, keeps the value
 * it was given for {@link getFilePath}-style accessors, and hands the OS the
 * string form.
 *
 * @module core/path
 * @example
 * ```typescript
 * toPathString('/tmp/data.bin')                    // '/tmp/data.bin'
 * toPathString(new URL('file:///tmp/data.bin'))    // '/tmp/data.bin'
 * ```
 */

import { fileURLToPath } from 'node:url'

// =============================================================================
// TYPES
// =============================================================================

/**
 * A filesystem path: a string or a `file:` URL.
 */
export type FilePath = string | URL

// =============================================================================
// CONVERSION
// =============================================================================

/**
 * String form of a path, as handed to the OS and shown in error messages.
 *
 * @throws {TypeError} If a URL does not use the `file:` scheme
 */
export function toPathString(path: FilePath): string {
  if (typeof path === 'string') {
    return path
  }
  return fileURLToPath(path)
}

/**
 * Type guard for values usable as a {@link FilePath}.
 */
export function isFilePath(value: unknown): value is FilePath {
  return typeof value === 'string' || value instanceof URL
}
