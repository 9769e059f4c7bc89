/**
 * BufferedFile - buffered, optionally text-oriented access to one file
 *
 * The counterpart of a stdio `FILE`: a file opened by type (text or binary)
 * and access mode, read and written through a {@link Stream} buffer.
 *
 * Text files offer two parallel character families. The byte family reads
 * and writes bytes (0-255; strings are latin1). The wide family reads and
 * writes Unicode code points stored as UTF-8. A text file commits to one
 * family on first use (or through {@link BufferedFile.setCharacterMode}) and
 * rejects the other from then on.
 *
 * Binary files transfer raw elements; {@link BufferedFile.readElements} and
 * {@link BufferedFile.writeElements} retry short transfers until the request
 * is satisfied, end of file is reached or the OS reports an error.
 *
 * Every failure is a {@link FileError} of the operation's kind. Operations
 * on a closed file fail with EBADF.
 *
 * @example
 * ```typescript
 * import { BufferedFile, FileType, AccessMode } from 'fdx'
 *
 * const file = new BufferedFile('/tmp/notes.txt', FileType.Text, AccessMode.WriteExtended)
 * try {
 *   file.putByteLine('first')
 *   file.printByte('%s=%d\n', 'answer', 42)
 *   file.rewind()
 *   file.getByteLine() // 'first\n'
 * } finally {
 *   file.close()
 * }
 * ```
 *
 * @module core/buffered-file
 */

import { logger as defaultLogger, type Logger } from '../utils/logger.js'
import { requireCapacity, requireInteger, requireNonNegative, viewBytes } from './arguments.js'
import { defaultBackend, openDescriptor, type DescriptorBackend } from './backend.js'
import { createConfig, type FdxConfig } from './config.js'
import { END_OF_FILE } from './constants.js'
import { createFileError, FileError, systemError, toFileError, type FileErrorKind } from './errors.js'
import { formatPrintf, type PrintfArgument } from './format/printf.js'
import { scanFormat, type CharacterSource, type ScanResult } from './format/scanf.js'
import { RecursiveLock } from './lock.js'
import { toPathString, type FilePath } from './path.js'
import type { FileObjectOptions } from './raw-file.js'
import { Stream } from './stream.js'
import {
  ACCESS_MODE_DESCRIPTIONS,
  AccessMode,
  BufferMode,
  CharacterMode,
  FILE_TYPE_NAMES,
  FileType,
  isAccessMode,
  isAppendMode,
  isBufferMode,
  isCharacterMode,
  isFileType,
  isReadableMode,
  isWritableMode,
  modeStringToFlags,
  nativeModeString,
} from './types.js'
import { decodeSequence, encodeCodePoint, isContinuationByte, sequenceLength } from './utf8.js'

const NEWLINE = 0x0a

type Direction = 'read' | 'write'
type Family = typeof CharacterMode.Byte | typeof CharacterMode.Wide

export class BufferedFile implements Disposable {
  private readonly path: FilePath
  private readonly pathString: string
  private readonly type: FileType
  private readonly mode: AccessMode
  private readonly backend: DescriptorBackend
  private readonly config: FdxConfig
  private readonly logger: Logger
  private readonly stream: Stream
  private readonly lock = new RecursiveLock()
  private orientation: CharacterMode = CharacterMode.Unset
  private closed = false

  /**
   * Open a file.
   *
   * Files opened with `Append` start at end of file; all other modes
   * (`AppendExtended` included) start at 0.
   *
   * @throws {TypeError} If the type or mode is not one of the enumerations
   * @throws {FileError} open error carrying the OS code
   */
  constructor(path: FilePath, type: FileType, mode: AccessMode, options: FileObjectOptions = {}) {
    if (!isFileType(type)) {
      throw new TypeError(`invalid file type: ${String(type)}`)
    }
    if (!isAccessMode(mode)) {
      throw new TypeError(`invalid access mode: ${String(mode)}`)
    }

    this.path = path
    this.pathString = toPathString(path)
    this.type = type
    this.mode = mode
    this.backend = options.backend ?? defaultBackend
    this.config = createConfig(options.config)
    this.logger = options.logger ?? defaultLogger

    const operation = `open ${FILE_TYPE_NAMES[type]} for ${ACCESS_MODE_DESCRIPTIONS[mode]}`
    const modeString = nativeModeString(mode, type)
    const flags = modeStringToFlags(modeString)
    if (flags === undefined) {
      throw new TypeError(`no descriptor flags for mode string '${modeString}'`)
    }

    const fd = openDescriptor(this.backend, this.pathString, flags, this.config.defaultMode, operation)
    let initialOffset = 0
    if (mode === AccessMode.Append) {
      try {
        initialOffset = this.backend.fstat(fd).size
      } catch (error) {
        this._releaseAfterFailedOpen(fd)
        throw toFileError('open', error, { operation, path: this.pathString })
      }
    }

    this.stream = new Stream({
      backend: this.backend,
      fd,
      readable: isReadableMode(mode),
      writable: isWritableMode(mode),
      append: isAppendMode(mode),
      bufferMode: this.config.bufferMode,
      bufferSize: this.config.bufferSize,
      initialOffset,
    })
    this.logger.debug('opened', this.pathString, `(${modeString})`, 'as fd', fd)
  }

  // ===========================================================================
  // Internal Helpers
  // ===========================================================================

  private _releaseAfterFailedOpen(fd: number): void {
    try {
      this.backend.close(fd)
    } catch (error) {
      this.logger.error('failed to release descriptor of', this.pathString, 'after a failed open:', error)
    }
  }

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

  private _requireType(expected: FileType, operation: string): void {
    if (this.type !== expected) {
      throw new TypeError(`${operation} requires a ${FILE_TYPE_NAMES[expected]}, '${this.pathString}' is a ${FILE_TYPE_NAMES[this.type]}`)
    }
  }

  private _requireAccess(direction: Direction, operation: string): void {
    const allowed = direction === 'read' ? isReadableMode(this.mode) : isWritableMode(this.mode)
    if (!allowed) {
      throw createFileError(direction, 'EBADF', {
        operation,
        path: this.pathString,
        detail: `file is open for ${ACCESS_MODE_DESCRIPTIONS[this.mode]}`,
      })
    }
  }

  /**
   * Checks shared by every character, string, line and formatted operation.
   * Commits the orientation when it is still unset.
   */
  private _beginText(direction: Direction, family: Family, operation: string): void {
    this._ensureOpen(direction, operation)
    this._requireType(FileType.Text, operation)
    this._requireAccess(direction, operation)
    if (this.orientation === CharacterMode.Unset) {
      this.orientation = family
    } else if (this.orientation !== family) {
      throw createFileError(direction, 'EINVAL', {
        operation,
        path: this.pathString,
        detail: `stream is ${this.orientation}-oriented`,
      })
    }
  }

  private _beginBinary(direction: Direction, operation: string): void {
    this._ensureOpen(direction, operation)
    this._requireType(FileType.Binary, operation)
    this._requireAccess(direction, operation)
  }

  private _write(bytes: Uint8Array, operation: string): void {
    const result = this.stream.write(bytes, 0, bytes.length)
    if (result.failure !== undefined) {
      throw toFileError('write', result.failure, { operation, path: this.pathString })
    }
  }

  private _illegalSequence(direction: Direction, operation: string, detail: string): FileError {
    return createFileError(direction, 'EILSEQ', { operation, path: this.pathString, detail })
  }

  /** Bytes of a latin1 string; characters above 0xFF are rejected */
  private _byteEncode(text: string, operation: string): Uint8Array {
    const bytes = new Uint8Array(text.length)
    for (let i = 0; i < text.length; i++) {
      const code = text.charCodeAt(i)
      if (code > 0xff) {
        throw this._illegalSequence('write', operation, `character U+${code.toString(16).toUpperCase().padStart(4, '0')} is not a byte`)
      }
      bytes[i] = code
    }
    return bytes
  }

  /** UTF-8 of a string; lone surrogates are rejected */
  private _wideEncode(text: string, operation: string): { bytes: Uint8Array; characters: number } {
    let characters = 0
    for (const char of text) {
      const codePoint = char.codePointAt(0) ?? 0
      if (codePoint >= 0xd800 && codePoint <= 0xdfff) {
        throw this._illegalSequence('write', operation, 'string contains a lone surrogate')
      }
      characters++
    }
    return { bytes: new TextEncoder().encode(text), characters }
  }

  /** Read one UTF-8 sequence from the stream */
  private _readCodePoint(): number {
    const lead = this.stream.getByte()
    if (lead === END_OF_FILE) {
      return END_OF_FILE
    }
    const length = sequenceLength(lead)
    if (length === 0) {
      throw systemError('EILSEQ', 'read')
    }

    const bytes = [lead]
    while (bytes.length < length) {
      const next = this.stream.getByte()
      if (next === END_OF_FILE || !isContinuationByte(next)) {
        if (next !== END_OF_FILE) {
          this.stream.unread(next)
        }
        throw systemError('EILSEQ', 'read')
      }
      bytes.push(next)
    }

    const codePoint = decodeSequence(bytes)
    if (codePoint === undefined) {
      throw systemError('EILSEQ', 'read')
    }
    return codePoint
  }

  /** Push a code point back as its UTF-8 bytes */
  private _unreadCodePoint(codePoint: number, operation: string): void {
    const bytes = encodeCodePoint(codePoint)
    if (bytes === undefined) {
      throw this._illegalSequence('read', operation, `${codePoint} is not a Unicode scalar value`)
    }
    for (let i = bytes.length - 1; i >= 0; i--) {
      this.stream.unread(bytes[i])
    }
  }

  /**
   * Read characters up to a newline or end of file, collecting them in
   * chunks of `chunkLength`. The newline is consumed; `keepNewline` decides
   * whether it is part of the result.
   */
  private _readUntilNewline(
    next: () => number,
    chunkLength: number,
    decode: (chunk: readonly number[]) => string,
    keepNewline: boolean
  ): string {
    let result = ''
    const chunk: number[] = []
    for (;;) {
      const char = next()
      if (char === END_OF_FILE || char === NEWLINE) {
        result += decode(chunk)
        if (char === NEWLINE && keepNewline) {
          result += '\n'
        }
        return result
      }
      chunk.push(char)
      if (chunk.length >= chunkLength) {
        result += decode(chunk)
        chunk.length = 0
      }
    }
  }

  // ===========================================================================
  // Accessors
  // ===========================================================================

  getFilePath(): FilePath {
    return this.path
  }

  getFileType(): FileType {
    return this.type
  }

  isTextFile(): boolean {
    return this.type === FileType.Text
  }

  isBinaryFile(): boolean {
    return this.type === FileType.Binary
  }

  getAccessMode(): AccessMode {
    return this.mode
  }

  isReadOnly(): boolean {
    return this.mode === AccessMode.Read
  }

  isWriteOnly(): boolean {
    return this.mode === AccessMode.Write || this.mode === AccessMode.Append
  }

  isReadWrite(): boolean {
    return isReadableMode(this.mode) && isWritableMode(this.mode)
  }

  getFileDescriptor(): number {
    this._ensureOpen('status', 'get file descriptor')
    return this.stream.fd
  }

  isClosed(): boolean {
    return this.closed
  }

  getBufferMode(): BufferMode {
    return this.stream.bufferMode
  }

  /** Buffer capacity in bytes; 0 when unbuffered */
  getBufferSize(): number {
    return this.stream.bufferSize
  }

  /** Whether a transfer has failed since the file was opened or rewound */
  hasError(): boolean {
    return this.stream.hasError
  }

  /**
   * Whether a read has hit end of file. Stays set until a seek, a rewind or
   * a push-back.
   */
  hasEndOfFile(): boolean {
    return this.stream.isEof
  }

  // ===========================================================================
  // Position and Length
  // ===========================================================================

  getFilePosition(): number {
    return this._attempt('tell', 'get file position', () => this.stream.position())
  }

  setFilePosition(position: number): void {
    this.seekSet(position)
  }

  private _seek(target: number, operation: string): void {
    this._ensureOpen('seek', operation)
    if (target < 0) {
      throw createFileError('seek', 'EINVAL', {
        operation,
        path: this.pathString,
        detail: `resulting offset ${target} is negative`,
      })
    }
    this._attempt('seek', operation, () => this.stream.seek(target))
  }

  seekSet(offset: number): void {
    requireInteger(offset, 'offset')
    this._seek(offset, 'seek from start')
  }

  seekCurrent(offset: number): void {
    requireInteger(offset, 'offset')
    const operation = 'seek from current position'
    const current = this._attempt('seek', operation, () => this.stream.position())
    this._seek(current + offset, operation)
  }

  seekEnd(offset: number): void {
    requireInteger(offset, 'offset')
    const operation = 'seek from end'
    const size = this._attempt('seek', operation, () => {
      this.stream.flush()
      return this.backend.fstat(this.stream.fd).size
    })
    this._seek(size + offset, operation)
  }

  /**
   * Seek to the start and clear the error and end-of-file indicators.
   */
  rewind(): void {
    this._seek(0, 'rewind')
    this.stream.clearError()
  }

  /**
   * Length of the file, including output still pending in the buffer.
   */
  getFileLength(): number {
    return this._attempt('status', 'get file length', () => {
      this.stream.flush()
      return this.backend.fstat(this.stream.fd).size
    })
  }

  /**
   * Shrink or grow the file; growth is zero-filled. Pending output is written
   * first and the position is kept.
   */
  setFileLength(length: number): void {
    requireNonNegative(length, 'length')
    this._attempt('truncation', 'set file length', () => {
      this.stream.settle()
      this.backend.ftruncate(this.stream.fd, length)
    })
  }

  /**
   * Block size the OS reports for the file, or the recommended block size
   * when it reports none.
   */
  getFileBlockSize(): number {
    const { blksize } = this._attempt('status', 'get file block size', () => this.backend.fstat(this.stream.fd))
    return blksize > 0 ? blksize : this.config.recommendedBlockSize
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
  // Flushing
  // ===========================================================================

  flush(): void {
    this._attempt('flush', 'flush file', () => this.stream.flush())
  }

  /**
   * Flush, then ask the OS to persist the file's data and metadata.
   */
  sync(): void {
    this._attempt('flush', 'sync file', () => {
      this.stream.flush()
      this.backend.fsync(this.stream.fd)
    })
  }

  // ===========================================================================
  // Buffering
  // ===========================================================================

  /**
   * Change the buffering strategy. Pending output is written first.
   *
   * @param size - buffer capacity in bytes; 0 selects the configured default
   * @param userBuffer - storage to buffer in; must hold `size` bytes
   * @returns false when `userBuffer` is too small
   */
  setBuffer(mode: BufferMode, size: number = 0, userBuffer?: ArrayBufferView): boolean {
    if (!isBufferMode(mode)) {
      throw new TypeError(`invalid buffer mode: ${String(mode)}`)
    }
    requireNonNegative(size, 'size')
    this._ensureOpen('flush', 'set buffer')

    const capacity = size === 0 ? this.config.bufferSize : size
    let buffer: Uint8Array = new Uint8Array(0)
    if (mode !== BufferMode.None) {
      if (userBuffer === undefined) {
        buffer = new Uint8Array(capacity)
      } else {
        const bytes = viewBytes(userBuffer)
        if (bytes.byteLength < capacity) {
          return false
        }
        buffer = bytes.subarray(0, capacity)
      }
    }

    this._attempt('flush', 'set buffer', () => this.stream.setBuffer(mode, buffer))
    return true
  }

  /**
   * Full buffering sized to the larger of the OS block size and the
   * recommended block size.
   */
  setOptimalBuffer(): boolean {
    const size = Math.max(this.getFileBlockSize(), this.config.recommendedBlockSize)
    return this.setBuffer(BufferMode.Full, size)
  }

  // ===========================================================================
  // Orientation
  // ===========================================================================

  /**
   * Request an orientation. `Byte` or `Wide` commits an unset stream;
   * once committed, every request just reports the committed orientation.
   *
   * @returns the orientation after the request
   */
  setCharacterMode(desired: CharacterMode): CharacterMode {
    if (!isCharacterMode(desired)) {
      throw new TypeError(`invalid character mode: ${String(desired)}`)
    }
    const operation = 'set character mode'
    this._ensureOpen('status', operation)
    this._requireType(FileType.Text, operation)
    if (this.orientation === CharacterMode.Unset && desired !== CharacterMode.Unset) {
      this.orientation = desired
    }
    return this.orientation
  }

  /** Current orientation; never commits */
  getCharacterMode(): CharacterMode {
    return this.setCharacterMode(CharacterMode.Unset)
  }

  // ===========================================================================
  // Byte Characters
  // ===========================================================================

  /**
   * @returns the next byte (0-255), or END_OF_FILE
   */
  getByteCharacter(): number {
    const operation = 'get byte character'
    this._beginText('read', CharacterMode.Byte, operation)
    return this._attempt('read', operation, () => this.stream.getByte())
  }

  /**
   * Push a byte back so the next read returns it.
   *
   * @returns the byte pushed back
   */
  ungetByteCharacter(char: number): number {
    const operation = 'unget byte character'
    this._beginText('read', CharacterMode.Byte, operation)
    if (char === END_OF_FILE) {
      throw createFileError('read', 'EINVAL', { operation, path: this.pathString, detail: 'cannot push back end of file' })
    }
    requireInteger(char, 'char')
    if (char < 0 || char > 0xff) {
      throw new RangeError(`byte character must be between 0 and 255, got ${char}`)
    }
    this._attempt('read', operation, () => this.stream.unread(char))
    return char
  }

  /**
   * @returns the byte written
   */
  putByteCharacter(char: number): number {
    const operation = 'put byte character'
    this._beginText('write', CharacterMode.Byte, operation)
    requireInteger(char, 'char')
    if (char < 0 || char > 0xff) {
      throw this._illegalSequence('write', operation, `${char} is not a byte`)
    }
    this._attempt('write', operation, () => this.stream.putByte(char))
    return char
  }

  // ===========================================================================
  // Wide Characters
  // ===========================================================================

  /**
   * @returns the next code point, or END_OF_FILE
   * @throws {FileError} read error with EILSEQ on an invalid or truncated sequence
   */
  getWideCharacter(): number {
    const operation = 'get wide character'
    this._beginText('read', CharacterMode.Wide, operation)
    return this._attempt('read', operation, () => this._readCodePoint())
  }

  /**
   * Push a code point back so the next read returns it.
   *
   * @returns the code point pushed back
   */
  ungetWideCharacter(char: number): number {
    const operation = 'unget wide character'
    this._beginText('read', CharacterMode.Wide, operation)
    if (char === END_OF_FILE) {
      throw createFileError('read', 'EINVAL', { operation, path: this.pathString, detail: 'cannot push back end of file' })
    }
    this._attempt('read', operation, () => this._unreadCodePoint(char, operation))
    return char
  }

  /**
   * @returns the code point written
   */
  putWideCharacter(char: number): number {
    const operation = 'put wide character'
    this._beginText('write', CharacterMode.Wide, operation)
    const bytes = encodeCodePoint(char)
    if (bytes === undefined) {
      throw this._illegalSequence('write', operation, `${char} is not a Unicode scalar value`)
    }
    this._write(bytes, operation)
    return char
  }

  // ===========================================================================
  // Strings and Lines
  // ===========================================================================

  /**
   * Read up to a newline or end of file. The newline is consumed but not
   * returned.
   */
  getByteString(): string {
    const operation = 'get byte string'
    this._beginText('read', CharacterMode.Byte, operation)
    return this._attempt('read', operation, () =>
      this._readUntilNewline(() => this.stream.getByte(), this.config.byteStringChunkLength, latin1Decode, false)
    )
  }

  /**
   * Read up to a newline or end of file. The newline is consumed but not
   * returned.
   */
  getWideString(): string {
    const operation = 'get wide string'
    this._beginText('read', CharacterMode.Wide, operation)
    return this._attempt('read', operation, () =>
      this._readUntilNewline(() => this._readCodePoint(), this.config.wideStringChunkLength, codePointDecode, false)
    )
  }

  /**
   * Read one line, including its newline when there is one.
   */
  getByteLine(): string {
    const operation = 'get byte line'
    this._beginText('read', CharacterMode.Byte, operation)
    return this._attempt('read', operation, () =>
      this._readUntilNewline(() => this.stream.getByte(), this.config.byteStringChunkLength, latin1Decode, true)
    )
  }

  /**
   * Read one line, including its newline when there is one.
   */
  getWideLine(): string {
    const operation = 'get wide line'
    this._beginText('read', CharacterMode.Wide, operation)
    return this._attempt('read', operation, () =>
      this._readUntilNewline(() => this._readCodePoint(), this.config.wideStringChunkLength, codePointDecode, true)
    )
  }

  /**
   * @returns characters written
   */
  putByteString(text: string): number {
    const operation = 'put byte string'
    this._beginText('write', CharacterMode.Byte, operation)
    this._write(this._byteEncode(text, operation), operation)
    return text.length
  }

  /**
   * @returns code points written
   */
  putWideString(text: string): number {
    const operation = 'put wide string'
    this._beginText('write', CharacterMode.Wide, operation)
    const { bytes, characters } = this._wideEncode(text, operation)
    this._write(bytes, operation)
    return characters
  }

  /**
   * Write a string and a newline.
   *
   * @returns characters written, the newline included
   */
  putByteLine(text: string): number {
    const operation = 'put byte line'
    this._beginText('write', CharacterMode.Byte, operation)
    this._write(this._byteEncode(text + '\n', operation), operation)
    return text.length + 1
  }

  /**
   * Write a string and a newline.
   *
   * @returns code points written, the newline included
   */
  putWideLine(text: string): number {
    const operation = 'put wide line'
    this._beginText('write', CharacterMode.Wide, operation)
    const { bytes, characters } = this._wideEncode(text + '\n', operation)
    this._write(bytes, operation)
    return characters
  }

  // ===========================================================================
  // Formatted I/O
  // ===========================================================================

  /**
   * Write printf-formatted text as bytes.
   *
   * @returns characters written
   */
  printByte(format: string, ...args: PrintfArgument[]): number {
    const operation = 'print byte string'
    this._beginText('write', CharacterMode.Byte, operation)
    const text = formatPrintf(format, args)
    this._write(this._byteEncode(text, operation), operation)
    return text.length
  }

  /**
   * Write printf-formatted text as UTF-8.
   *
   * @returns code points written
   */
  printWide(format: string, ...args: PrintfArgument[]): number {
    const operation = 'print wide string'
    this._beginText('write', CharacterMode.Wide, operation)
    const { bytes, characters } = this._wideEncode(formatPrintf(format, args, { wide: true }), operation)
    this._write(bytes, operation)
    return characters
  }

  /**
   * Parse bytes under a scanf format.
   *
   * @throws {FileError} read error with code 'EOF' when input ends before
   *   the first conversion
   */
  scanByte(format: string): ScanResult {
    const operation = 'scan byte string'
    this._beginText('read', CharacterMode.Byte, operation)
    const source: CharacterSource = {
      read: () => this.stream.getByte(),
      unread: (char) => this.stream.unread(char),
    }
    return this._scan(source, format, operation, false)
  }

  /**
   * Parse UTF-8 text under a scanf format.
   *
   * @throws {FileError} read error with code 'EOF' when input ends before
   *   the first conversion
   */
  scanWide(format: string): ScanResult {
    const operation = 'scan wide string'
    this._beginText('read', CharacterMode.Wide, operation)
    const source: CharacterSource = {
      read: () => this._readCodePoint(),
      unread: (char) => this._unreadCodePoint(char, operation),
    }
    return this._scan(source, format, operation, true)
  }

  private _scan(source: CharacterSource, format: string, operation: string, wide: boolean): ScanResult {
    const result = this._attempt('read', operation, () => scanFormat(source, format, { wide }))
    if (result.count < 0) {
      throw new FileError({
        kind: 'read',
        code: 'EOF',
        errno: 0,
        operation,
        path: this.pathString,
        detail: 'input ended before the first conversion',
      })
    }
    return result
  }

  // ===========================================================================
  // Binary Transfers
  // ===========================================================================

  /**
   * Read `count` elements of `elementSize` bytes into `buffer`, retrying
   * short reads. Each underlying read moves at most `maxTransferBytes`.
   *
   * @returns elements read; fewer than `count` only at end of file
   * @throws {FileError} read error when the OS reports one, with the
   *   number of elements read so far in its detail
   */
  readElements(buffer: ArrayBufferView, elementSize: number, count: number): number {
    return this._transferElements('read', buffer, elementSize, count)
  }

  /**
   * Write `count` elements of `elementSize` bytes from `buffer`, retrying
   * short writes. Each underlying write moves at most `maxTransferBytes`.
   *
   * @returns elements written
   * @throws {FileError} write error when the OS reports one, with the
   *   number of elements written so far in its detail
   */
  writeElements(buffer: ArrayBufferView, elementSize: number, count: number): number {
    return this._transferElements('write', buffer, elementSize, count)
  }

  /**
   * @param count - bytes to read (default: the buffer's byte length)
   */
  readBytes(buffer: ArrayBufferView, count?: number): number {
    return this.readElements(buffer, 1, count ?? buffer.byteLength)
  }

  /**
   * @param count - bytes to write (default: the buffer's byte length)
   */
  writeBytes(buffer: ArrayBufferView, count?: number): number {
    return this.writeElements(buffer, 1, count ?? buffer.byteLength)
  }

  private _transferElements(direction: Direction, buffer: ArrayBufferView, elementSize: number, count: number): number {
    const operation = direction === 'read' ? 'read elements' : 'write elements'
    this._beginBinary(direction, operation)
    requireNonNegative(elementSize, 'elementSize')
    if (elementSize === 0) {
      throw new RangeError('elementSize must be at least 1')
    }
    requireNonNegative(count, 'count')
    const bytes = viewBytes(buffer)
    requireCapacity(bytes, elementSize * count, operation)

    const perCall = Math.max(1, Math.floor(this.config.maxTransferBytes / elementSize))
    let done = 0
    while (done < count) {
      const batch = Math.min(perCall, count - done)
      const start = done * elementSize
      const result =
        direction === 'read'
          ? this.stream.read(bytes, start, batch * elementSize)
          : this.stream.write(bytes, start, batch * elementSize)
      const completed = Math.floor(result.count / elementSize)
      done += completed

      if (completed < batch) {
        if (result.failure !== undefined) {
          const verb = direction === 'read' ? 'read' : 'wrote'
          const infinitive = direction === 'read' ? 'read' : 'write'
          throw toFileError(direction, result.failure, {
            operation,
            path: this.pathString,
            detail: `${verb} ${done} elements but expected to ${infinitive} ${count} elements (of size ${elementSize})`,
          })
        }
        break
      }
    }
    return done
  }

  // ===========================================================================
  // Locking
  // ===========================================================================

  /**
   * Take the advisory stream lock without blocking. The owner always gets
   * it; calls nest.
   */
  tryLockFile(): boolean {
    this._ensureOpen('status', 'try lock file')
    return this.lock.tryLock()
  }

  lockFile(): void {
    this._ensureOpen('status', 'lock file')
    this.lock.lock()
  }

  /** Release one level of the lock; does nothing when unlocked */
  unlockFile(): void {
    this._ensureOpen('status', 'unlock file')
    this.lock.unlock()
  }

  isLocked(): boolean {
    return this.lock.locked
  }

  // ===========================================================================
  // Release
  // ===========================================================================

  /**
   * Flush pending output and release the descriptor. Safe to call more than
   * once; only the first call does anything. The descriptor counts as
   * released even when flushing or closing fails.
   *
   * @throws {FileError} close error
   */
  close(): void {
    if (this.closed) {
      return
    }
    this.closed = true
    this.lock.reset()

    let failure: { error: unknown } | undefined
    try {
      this.stream.flush()
    } catch (error) {
      failure = { error }
    }
    try {
      this.backend.close(this.stream.fd)
    } catch (error) {
      failure ??= { error }
    }

    if (failure !== undefined) {
      throw toFileError('close', failure.error, { operation: 'close file', path: this.pathString })
    }
    this.logger.debug('closed', this.pathString)
  }

  [Symbol.dispose](): void {
    this.close()
  }
}

// =============================================================================
// Decoders
// =============================================================================

function latin1Decode(chunk: readonly number[]): string {
  return String.fromCharCode(...chunk)
}

function codePointDecode(chunk: readonly number[]): string {
  return String.fromCodePoint(...chunk)
}
