/**
 * @fileoverview Typed failures for fdx file objects
 *
 * Every OS-linked failure is one {@link FileError}: a closed set of kinds
 * (which operation family failed) sharing a single shape that carries the
 * POSIX code, the numeric errno, the failing syscall, the path and a
 * formatted message. Two failures have no OS error behind them and get their
 * own classes: {@link EmptyFileError} and {@link UnexpectedEndOfFileError}.
 *
 * Messages follow the Node.js fs convention, extended with the attempted
 * operation and optional detail:
 * `CODE: description, operation 'path' (detail)`
 *
 * @example
 * ```typescript
 * import { isOpenError } from 'fdx'
 *
 * try {
 *   new BufferedFile('/missing.txt', FileType.Text, AccessMode.Read)
 * } catch (err) {
 *   if (isOpenError(err) && err.code === 'ENOENT') {
 *     console.log('File not found:', err.path)
 *   }
 * }
 * // ENOENT: no such file or directory, open text file for reading '/missing.txt'
 * ```
 *
 * @module core/errors
 */

import { constants as osConstants } from 'node:os'
import { getSystemErrorMap } from 'node:util'

// ============================================================================
// Error Code Definitions
// ============================================================================

/**
 * Descriptions for the codes fdx raises itself, used when the platform's
 * error map has no entry for an errno.
 */
const ERROR_DESCRIPTIONS: Readonly<Record<string, string>> = {
  ENOENT: 'no such file or directory',
  EEXIST: 'file already exists',
  EISDIR: 'illegal operation on a directory',
  EACCES: 'permission denied',
  EBADF: 'bad file descriptor',
  EINVAL: 'invalid argument',
  EILSEQ: 'illegal byte sequence',
  EIO: 'i/o error',
  ENOSPC: 'no space left on device',
  EFBIG: 'file too large',
  ELOOP: 'too many symbolic links encountered',
  EOF: 'end of file',
}

/**
 * Error codes fdx can synthesize without an underlying OS call.
 */
export type SystemErrorCode = keyof typeof osConstants.errno

/**
 * Kinds of OS-linked failure, one per operation family.
 *
 * `memory-mapping` is reserved: no current operation raises it.
 */
export type FileErrorKind =
  | 'open'
  | 'close'
  | 'status'
  | 'flush'
  | 'read'
  | 'write'
  | 'seek'
  | 'tell'
  | 'truncation'
  | 'memory-mapping'

/**
 * All error kinds, in declaration order.
 */
export const ALL_ERROR_KINDS: readonly FileErrorKind[] = [
  'open',
  'close',
  'status',
  'flush',
  'read',
  'write',
  'seek',
  'tell',
  'truncation',
  'memory-mapping',
]

const ERROR_NAMES: Readonly<Record<FileErrorKind, string>> = {
  open: 'FileOpenError',
  close: 'FileCloseError',
  status: 'FileStatusError',
  flush: 'FileFlushError',
  read: 'FileReadError',
  write: 'FileWriteError',
  seek: 'FileSeekError',
  tell: 'FileTellError',
  truncation: 'FileTruncationError',
  'memory-mapping': 'FileMemoryMappingError',
}

// ============================================================================
// System Error Helpers
// ============================================================================

/**
 * Numeric errno for a code, following the Node.js convention (negative).
 *
 * @example
 * ```typescript
 * errnoOf('ENOENT') // -2 on Linux
 * ```
 */
export function errnoOf(code: SystemErrorCode): number {
  return -osConstants.errno[code]
}

/**
 * Decode an errno into its description.
 * Prefers the platform's own text and falls back to the fdx table.
 */
export function describeErrno(errno: number, code: string): string {
  const entry = getSystemErrorMap().get(errno)
  if (entry !== undefined) {
    return entry[1]
  }
  return ERROR_DESCRIPTIONS[code] ?? 'unknown error'
}

/**
 * Type guard for errors thrown by Node's fs bindings (and by backends that
 * imitate them).
 */
export function isErrnoException(value: unknown): value is NodeJS.ErrnoException {
  return value instanceof Error && 'code' in value && typeof value.code === 'string'
}

/**
 * Build an ErrnoException the way Node reports one, for failures fdx or a
 * backend detects on its own.
 *
 * @example
 * ```typescript
 * throw systemError('EBADF', 'read')
 * // EBADF: bad file descriptor, read
 * ```
 */
export function systemError(code: SystemErrorCode, syscall: string, path?: string): NodeJS.ErrnoException {
  const errno = errnoOf(code)
  const description = describeErrno(errno, code)
  const message = `${code}: ${description}, ${syscall}${path !== undefined ? ` '${path}'` : ''}`
  return Object.assign(new Error(message), { code, errno, syscall, path })
}

// ============================================================================
// FileError
// ============================================================================

/**
 * Everything needed to construct a {@link FileError}.
 */
export interface FileErrorInit {
  /** Operation family that failed */
  kind: FileErrorKind
  /** POSIX error code string (e.g. 'ENOENT') */
  code: string
  /** Numeric errno (negative, Node.js convention); 0 when no OS error exists */
  errno: number
  /** What the caller attempted, e.g. 'open text file for reading' */
  operation: string
  /** Path of the file involved */
  path?: string
  /** Underlying system call, when one failed */
  syscall?: string
  /** Extra context appended in parentheses */
  detail?: string
  /** Overrides the decoded description */
  description?: string
  /** Original failure */
  cause?: unknown
}

/**
 * One OS-linked failure of a file operation.
 *
 * The kind says which family failed; `code`/`errno` say why.
 *
 * @example
 * ```typescript
 * const error = new FileError({
 *   kind: 'read', code: 'EIO', errno: -5, operation: 'read', path: '/data.bin',
 * })
 * console.log(error.message) // "EIO: i/o error, read '/data.bin'"
 * console.log(error.name)    // "FileReadError"
 * ```
 */
export class FileError extends Error {
  /** Operation family that failed */
  readonly kind: FileErrorKind

  /** POSIX error code string (e.g., 'ENOENT', 'EACCES') */
  readonly code: string

  /** Numeric errno value (negative, following Node.js convention) */
  readonly errno: number

  /** Operation the caller attempted */
  readonly operation: string

  /** System call that failed, if any */
  readonly syscall?: string

  /** Path of the file involved */
  readonly path?: string

  /** Extra context, e.g. transfer counts */
  readonly detail?: string

  constructor(init: FileErrorInit) {
    const description = init.description ?? describeErrno(init.errno, init.code)
    const location = init.path !== undefined ? ` '${init.path}'` : ''
    const detail = init.detail !== undefined ? ` (${init.detail})` : ''
    super(`${init.code}: ${description}, ${init.operation}${location}${detail}`, { cause: init.cause })
    this.name = ERROR_NAMES[init.kind]
    this.kind = init.kind
    this.code = init.code
    this.errno = init.errno
    this.operation = init.operation
    this.syscall = init.syscall
    this.path = init.path
    this.detail = init.detail
  }
}

/**
 * Context a file object supplies when converting a failure.
 */
export interface FailureContext {
  operation: string
  path?: string
  detail?: string
}

/**
 * Convert whatever a system call threw into a FileError of the given kind.
 *
 * ErrnoExceptions keep their code, errno and syscall. A FileError passes
 * through unchanged, so nested wrappers do not re-label a failure.
 */
export function toFileError(kind: FileErrorKind, cause: unknown, context: FailureContext): FileError {
  if (cause instanceof FileError) {
    return cause
  }
  if (isErrnoException(cause)) {
    return new FileError({
      kind,
      code: cause.code ?? 'UNKNOWN',
      errno: cause.errno ?? 0,
      syscall: cause.syscall,
      cause,
      ...context,
    })
  }
  return new FileError({
    kind,
    code: 'UNKNOWN',
    errno: 0,
    description: cause instanceof Error ? cause.message : String(cause),
    cause,
    ...context,
  })
}

/**
 * Create a FileError for a condition fdx detects itself (no system call).
 */
export function createFileError(kind: FileErrorKind, code: SystemErrorCode, context: FailureContext): FileError {
  return new FileError({ kind, code, errno: errnoOf(code), ...context })
}

// ============================================================================
// Non-OS Failures
// ============================================================================

/**
 * A file that must hold data turned out to be empty.
 */
export class EmptyFileError extends Error {
  readonly path?: string

  constructor(path?: string, message?: string) {
    super(message ?? `file is empty${path !== undefined ? `: '${path}'` : ''}`)
    this.name = 'EmptyFileError'
    this.path = path
  }
}

/**
 * Input ended in the middle of a unit the caller required in full.
 */
export class UnexpectedEndOfFileError extends Error {
  readonly path?: string

  constructor(path?: string, message?: string) {
    super(message ?? `unexpected end of file${path !== undefined ? `: '${path}'` : ''}`)
    this.name = 'UnexpectedEndOfFileError'
    this.path = path
  }
}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Check if an error is a FileError, optionally of a given kind.
 *
 * @example
 * ```typescript
 * if (isFileError(err, 'seek')) {
 *   console.log('seek failed with', err.code)
 * }
 * ```
 */
export function isFileError(error: unknown, kind?: FileErrorKind): error is FileError {
  return error instanceof FileError && (kind === undefined || error.kind === kind)
}

export function isOpenError(error: unknown): error is FileError {
  return isFileError(error, 'open')
}

export function isCloseError(error: unknown): error is FileError {
  return isFileError(error, 'close')
}

export function isStatusError(error: unknown): error is FileError {
  return isFileError(error, 'status')
}

export function isFlushError(error: unknown): error is FileError {
  return isFileError(error, 'flush')
}

export function isReadError(error: unknown): error is FileError {
  return isFileError(error, 'read')
}

export function isWriteError(error: unknown): error is FileError {
  return isFileError(error, 'write')
}

export function isSeekError(error: unknown): error is FileError {
  return isFileError(error, 'seek')
}

export function isTellError(error: unknown): error is FileError {
  return isFileError(error, 'tell')
}

export function isTruncationError(error: unknown): error is FileError {
  return isFileError(error, 'truncation')
}

export function isMemoryMappingError(error: unknown): error is FileError {
  return isFileError(error, 'memory-mapping')
}

export function isEmptyFileError(error: unknown): error is EmptyFileError {
  return error instanceof EmptyFileError
}

export function isUnexpectedEndOfFileError(error: unknown): error is UnexpectedEndOfFileError {
  return error instanceof UnexpectedEndOfFileError
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Check if an error is a FileError carrying a specific code.
 *
 * @example
 * ```typescript
 * if (hasErrorCode(err, 'ENOENT')) {
 *   // create the file instead
 * }
 * ```
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return isFileError(error) && error.code === code
}

/**
 * Get the code of a FileError, or undefined for anything else.
 */
export function getErrorCode(error: unknown): string | undefined {
  return isFileError(error) ? error.code : undefined
}
