/**
 * RawFile - unbuffered access to one file descriptor
 *
 * Mirrors the open/read/write/lseek/ftruncate family. Every transfer is a
 * single descriptor call: reads and writes may come back short and are not
 * retried.
 *
 * Node has no lseek, so the file position lives in the object, next to the
 * offset the descriptor itself holds. While the two agree, transfers use and
 * advance the descriptor offset, the way read/write do, which is all a pipe,
 * FIFO or terminal accepts. A seek elsewhere makes the following transfers
 * positional. Writes on an O_APPEND descriptor land at end of file; the
 * position after one is looked up from the file size when next needed.
 *
 * @example
 * ```typescript
 * import { RawFile, O_RDWR, O_CREAT, USER_READ_AND_WRITE } from 'fdx'
 *
 * const file = new RawFile('/tmp/data.bin', O_RDWR | O_CREAT, USER_READ_AND_WRITE)
 * try {
 *   file.writeBytes(new Uint8Array([1, 2, 3]))
 *   file.rewind()
 *   const buffer = new Uint8Array(3)
 *   file.readBytes(buffer) // 3
 * } finally {
 *   file.close()
 * }
 * ```
 *
 * @module core/raw-file
 */

import { logger as defaultLogger, type Logger } from '../utils/logger.js'
import { requireCapacity, requireInteger, requireNonNegative, viewBytes } from './arguments.js'
import { defaultBackend, openDescriptor, type DescriptorBackend } from './backend.js'
import { createConfig, type FdxConfig, type FdxConfigOptions } from './config.js'
import { O_APPEND } from './constants.js'
import { createFileError, toFileError, type FileErrorKind } from './errors.js'
import { toPathString, type FilePath } from './path.js'

/**
 * Collaborators a file object can be given.
 */
export interface FileObjectOptions {
  /** Descriptor calls to use (default: node:fs) */
  backend?: DescriptorBackend
  /** Overrides of the default configuration */
  config?: FdxConfigOptions
  /** Where open/close diagnostics go */
  logger?: Logger
}

export class RawFile implements Disposable {
  private readonly path: FilePath
  private readonly pathString: string
  private readonly flags: number
  private readonly backend: DescriptorBackend
  private readonly config: FdxConfig
  private readonly logger: Logger
  private readonly fd: number
  /** Undefined after an append write until next looked up */
  private position: number | undefined = 0
  /** Offset the descriptor holds; undefined alongside `position` */
  private descriptorOffset: number | undefined = 0
  private closed = false

  /**
   * Open a file.
   *
   * @param path - File to open
   * @param flags - OR-ed open flags (O_RDONLY, O_CREAT, ...)
   * @param mode - Permission bits for a created file (default: config.defaultMode)
   * @throws {FileError} open error carrying the OS code
   */
  constructor(path: FilePath, flags: number, mode?: number, options: FileObjectOptions = {}) {
    this.path = path
    this.pathString = toPathString(path)
    this.flags = requireInteger(flags, 'flags')
    this.backend = options.backend ?? defaultBackend
    this.config = createConfig(options.config)
    this.logger = options.logger ?? defaultLogger

    const permissions = mode ?? this.config.defaultMode
    this.fd = openDescriptor(this.backend, this.pathString, this.flags, permissions, 'open file')
    this.logger.debug('opened', this.pathString, 'as fd', this.fd)
  }

  // ===========================================================================
  // Internal Helpers
  // ===========================================================================

  private _ensureOpen(kind: FileErrorKind, operation: string): void {
    if (this.closed) {
      throw createFileError(kind, 'EBADF', { operation, path: this.pathString })
    }
  }

  private _attempt<T>(kind: FileErrorKind, operation: string, call: () => T): T {
    this._ensureOpen(kind, operation)
    try {
      return call()
    } catch (error) {
      throw toFileError(kind, error, { operation, path: this.pathString })
    }
  }

  /** Position, looked up from the file size after an append write */
  private _resolvePosition(): number {
    if (this.position === undefined) {
      this.position = this.backend.fstat(this.fd).size
      this.descriptorOffset = this.position
    }
    return this.position
  }

  /**
   * Run one transfer at the position: through the descriptor offset while
   * it matches, positionally otherwise.
   */
  private _transfer(call: (position: number | null) => number): number {
    const position = this._resolvePosition()
    const sequential = this.descriptorOffset === position
    const transferred = call(sequential ? null : position)
    this.position = position + transferred
    if (sequential) {
      this.descriptorOffset = this.position
    }
    return transferred
  }

  private _moveTo(target: number, operation: string): void {
    if (target < 0) {
      throw createFileError('seek', 'EINVAL', {
        operation,
        path: this.pathString,
        detail: `resulting offset ${target} is negative`,
      })
    }
    this.position = target
  }

  // ===========================================================================
  // Accessors
  // ===========================================================================

  getFilePath(): FilePath {
    return this.path
  }

  getFileDescriptor(): number {
    this._ensureOpen('status', 'get file descriptor')
    return this.fd
  }

  isClosed(): boolean {
    return this.closed
  }

  /**
   * Block size the OS reports for the file, or the recommended block size
   * when it reports none.
   */
  getFileBlockSize(): number {
    const { blksize } = this._attempt('status', 'get file block size', () => this.backend.fstat(this.fd))
    return blksize > 0 ? blksize : this.config.recommendedBlockSize
  }

  // ===========================================================================
  // Position and Length
  // ===========================================================================

  getFilePosition(): number {
    return this._attempt('seek', 'get file position', () => this._resolvePosition())
  }

  setFilePosition(position: number): void {
    this.seekSet(position)
  }

  seekSet(offset: number): void {
    requireInteger(offset, 'offset')
    this._ensureOpen('seek', 'seek from start')
    this._moveTo(offset, 'seek from start')
  }

  seekCurrent(offset: number): void {
    requireInteger(offset, 'offset')
    const current = this._attempt('seek', 'seek from current position', () => this._resolvePosition())
    this._moveTo(current + offset, 'seek from current position')
  }

  seekEnd(offset: number): void {
    requireInteger(offset, 'offset')
    const { size } = this._attempt('seek', 'seek from end', () => this.backend.fstat(this.fd))
    this._moveTo(size + offset, 'seek from end')
  }

  rewind(): void {
    this.seekSet(0)
  }

  getFileLength(): number {
    return this._attempt('status', 'get file length', () => this.backend.fstat(this.fd)).size
  }

  /**
   * Shrink or grow the file; growth is zero-filled. The position is not
   * moved.
   */
  setFileLength(length: number): void {
    requireNonNegative(length, 'length')
    this._attempt('truncation', 'set file length', () => this.backend.ftruncate(this.fd, length))
  }

  /** Whether the position is at or past the end of the file */
  endOfFile(): boolean {
    return this.getFilePosition() >= this.getFileLength()
  }

  /** Bytes between the position and the end of the file */
  bytesRemaining(): number {
    return Math.max(0, this.getFileLength() - this.getFilePosition())
  }

  // ===========================================================================
  // Transfers
  // ===========================================================================

  /**
   * One read of up to `count` bytes at the position.
   *
   * @param count - bytes wanted (default: the buffer's byte length)
   * @returns bytes read; 0 at end of file
   */
  readBytes(buffer: ArrayBufferView, count?: number): number {
    const bytes = viewBytes(buffer)
    const wanted = count === undefined ? bytes.byteLength : requireNonNegative(count, 'count')
    requireCapacity(bytes, wanted, 'readBytes')

    return this._attempt('read', 'read bytes', () => {
      const length = Math.min(wanted, this.config.maxTransferBytes)
      return this._transfer((position) => this.backend.read(this.fd, bytes, 0, length, position))
    })
  }

  /**
   * One write of up to `count` bytes at the position (at end of file for
   * O_APPEND descriptors).
   *
   * @param count - bytes to write (default: the buffer's byte length)
   * @returns bytes written, possibly fewer than `count`
   */
  writeBytes(buffer: ArrayBufferView, count?: number): number {
    const bytes = viewBytes(buffer)
    const wanted = count === undefined ? bytes.byteLength : requireNonNegative(count, 'count')
    requireCapacity(bytes, wanted, 'writeBytes')

    return this._attempt('write', 'write bytes', () => {
      const length = Math.min(wanted, this.config.maxTransferBytes)
      if ((this.flags & O_APPEND) !== 0) {
        const transferred = this.backend.write(this.fd, bytes, 0, length, null)
        this.position = undefined
        this.descriptorOffset = undefined
        return transferred
      }
      return this._transfer((position) => this.backend.write(this.fd, bytes, 0, length, position))
    })
  }

  /**
   * Ask the OS to persist the file's data and metadata.
   */
  sync(): void {
    this._attempt('flush', 'sync file', () => this.backend.fsync(this.fd))
  }

  // ===========================================================================
  // Release
  // ===========================================================================

  /**
   * Release the descriptor. Safe to call more than once; only the first
   * call reaches the OS. The descriptor counts as released even when the
   * OS reports a failure.
   *
   * @throws {FileError} close error
   */
  close(): void {
    if (this.closed) {
      return
    }
    this.closed = true
    try {
      this.backend.close(this.fd)
    } catch (error) {
      throw toFileError('close', error, { operation: 'close file', path: this.pathString })
    }
    this.logger.debug('closed', this.pathString)
  }

  [Symbol.dispose](): void {
    this.close()
  }
}
