/**
 * fdx core - exception-safe file objects
 *
 * Two wrappers over an open file: {@link RawFile} for unbuffered descriptor
 * I/O and {@link BufferedFile} for buffered text and binary I/O. Every
 * OS failure surfaces as a typed {@link FileError}.
 *
 * @example
 * ```typescript
 * import { BufferedFile, FileType, AccessMode } from 'fdx'
 *
 * const file = new BufferedFile('/tmp/hello.txt', FileType.Text, AccessMode.Read)
 * file.getByteLine() // 'Hello, World!\n'
 * file.close()
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// File Objects
// =============================================================================

export { RawFile, type FileObjectOptions } from './raw-file.js'
export { BufferedFile } from './buffered-file.js'
export { withFile, withBufferedFile, withRawFile, type Closable } from './scope.js'

// =============================================================================
// Enumerations
// =============================================================================

export {
  FileType,
  AccessMode,
  BufferMode,
  CharacterMode,
  FILE_TYPE_NAMES,
  ACCESS_MODE_DESCRIPTIONS,
  ACCESS_MODE_STRINGS,
  nativeModeString,
  modeStringToFlags,
  isReadableMode,
  isWritableMode,
  isAppendMode,
  isFileType,
  isAccessMode,
  isBufferMode,
  isCharacterMode,
} from './types.js'

// =============================================================================
// Backend Interface
// =============================================================================

export {
  type DescriptorBackend,
  type DescriptorStat,
  type BackendOperation,
  NodeBackend,
  defaultBackend,
} from './backend.js'

// =============================================================================
// Errors
// =============================================================================

export {
  type SystemErrorCode,
  type FileErrorKind,
  type FileErrorInit,
  type FailureContext,
  ALL_ERROR_KINDS,
  FileError,
  EmptyFileError,
  UnexpectedEndOfFileError,
  errnoOf,
  describeErrno,
  systemError,
  toFileError,
  createFileError,
  isErrnoException,
  isFileError,
  isOpenError,
  isCloseError,
  isStatusError,
  isFlushError,
  isReadError,
  isWriteError,
  isSeekError,
  isTellError,
  isTruncationError,
  isMemoryMappingError,
  isEmptyFileError,
  isUnexpectedEndOfFileError,
  hasErrorCode,
  getErrorCode,
} from './errors.js'

// =============================================================================
// Constants
// =============================================================================

export * from './constants.js'

// =============================================================================
// Configuration
// =============================================================================

export { createConfig, defaultConfig, type FdxConfig, type FdxConfigOptions } from './config.js'

// =============================================================================
// Paths and Formatting
// =============================================================================

export { toPathString, isFilePath, type FilePath } from './path.js'
export { formatPrintf, type PrintfArgument, type PrintfOptions } from './format/printf.js'
export { scanFormat, type CharacterSource, type ScanResult, type ScanValue, type ScanOptions } from './format/scanf.js'
export { encodeCodePoint, decodeSequence, isScalarValue, MAX_CODE_POINT } from './utf8.js'
