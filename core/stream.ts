/**
 * Stream - stdio-style buffering over one descriptor
 *
 * A Stream keeps the state a C `FILE` keeps: a read-ahead window, pending
 * output, a push-back stack, the buffering strategy, the descriptor offset
 * and the end-of-file and error indicators. BufferedFile builds every
 * operation on top of it.
 *
 * The buffer serves one direction at a time. Switching from writing to
 * reading flushes pending output; switching from reading to writing drops
 * the read-ahead and moves the descriptor offset back to the logical
 * position. Streams opened for appending move to end of file whenever they
 * start writing.
 *
 * Transfers go through the descriptor's own offset while it matches the
 * stream's, so pipes and terminals work; after a seek elsewhere they become
 * positional until the two meet again.
 *
 * Methods throw whatever the backend threw (an ErrnoException). The bulk
 * transfers instead report a failure next to the count that made it through,
 * so callers can tell how far a transfer got.
 *
 * @module core/stream
 */

import type { DescriptorBackend } from './backend.js'
import { END_OF_FILE } from './constants.js'
import { systemError } from './errors.js'
import { BufferMode } from './types.js'

// =============================================================================
// Types
// =============================================================================

/**
 * Everything a Stream needs to take over an open descriptor.
 */
export interface StreamOptions {
  backend: DescriptorBackend
  fd: number
  readable: boolean
  writable: boolean
  /** Every write lands at end of file */
  append: boolean
  bufferMode: BufferMode
  bufferSize: number
  /** Descriptor offset to start at */
  initialOffset?: number
}

/**
 * Outcome of a bulk transfer.
 */
export interface TransferResult {
  /** Bytes transferred */
  count: number
  /** What cut the transfer short; absent at end of file or on success */
  failure?: unknown
}

type Direction = 'idle' | 'read' | 'write'

const NEWLINE = 0x0a

// =============================================================================
// Stream
// =============================================================================

export class Stream {
  readonly fd: number
  private readonly backend: DescriptorBackend
  private readonly readable: boolean
  private readonly writable: boolean
  private readonly append: boolean

  private mode: BufferMode
  private buffer: Uint8Array
  private readonly scratch = new Uint8Array(1)

  /** Read-ahead window is buffer[readStart, readEnd) */
  private readStart = 0
  private readEnd = 0
  /** Pending output is buffer[0, pending) */
  private pending = 0
  /** Pushed-back bytes; the last element is read first */
  private pushback: number[] = []
  private direction: Direction = 'idle'
  /** Where the next descriptor transfer happens */
  private offset: number
  /** Offset the descriptor itself holds (0 after open) */
  private descriptorOffset = 0

  private eofFlag = false
  private errorFlag = false

  constructor(options: StreamOptions) {
    this.backend = options.backend
    this.fd = options.fd
    this.readable = options.readable
    this.writable = options.writable
    this.append = options.append
    this.offset = options.initialOffset ?? 0
    this.mode = options.bufferMode
    this.buffer = options.bufferMode === BufferMode.None ? new Uint8Array(1) : new Uint8Array(options.bufferSize)
  }

  // ===========================================================================
  // State
  // ===========================================================================

  get bufferMode(): BufferMode {
    return this.mode
  }

  /** Capacity of the buffer; 0 for an unbuffered stream */
  get bufferSize(): number {
    return this.mode === BufferMode.None ? 0 : this.buffer.length
  }

  /** Whether a read has hit end of file since the last seek or clear */
  get isEof(): boolean {
    return this.eofFlag
  }

  /** Whether a transfer has failed since the last rewind or clear */
  get hasError(): boolean {
    return this.errorFlag
  }

  clearError(): void {
    this.eofFlag = false
    this.errorFlag = false
  }

  /**
   * Logical position: the descriptor offset, less what was read ahead and
   * pushed back, plus what is pending.
   */
  position(): number {
    if (this.direction === 'write') {
      return this.offset + this.pending
    }
    return Math.max(0, this.offset - (this.readEnd - this.readStart) - this.pushback.length)
  }

  // ===========================================================================
  // Direction Changes
  // ===========================================================================

  private beginRead(): void {
    if (!this.readable) {
      throw systemError('EBADF', 'read')
    }
    if (this.direction === 'write') {
      this.flush()
    }
    this.direction = 'read'
  }

  private beginWrite(): void {
    if (!this.writable) {
      throw systemError('EBADF', 'write')
    }
    if (this.direction === 'write') {
      return
    }
    this.dropReadAhead()
    if (this.append) {
      this.offset = this.backend.fstat(this.fd).size
    }
    this.direction = 'write'
  }

  /**
   * Position argument for the next transfer: `null` to use the descriptor
   * offset while it matches.
   */
  private at(): number | null {
    return this.descriptorOffset === this.offset ? null : this.offset
  }

  /** Record a transfer made at `position`, which moved the offset */
  private advance(position: number | null, count: number): void {
    this.offset += count
    if (position === null) {
      this.descriptorOffset = this.offset
    }
  }

  private dropReadAhead(): void {
    this.offset = this.position()
    this.readStart = 0
    this.readEnd = 0
    this.pushback = []
  }

  /**
   * Flush pending output and drop read-ahead, leaving the descriptor offset
   * at the logical position.
   */
  settle(): void {
    this.flush()
    this.dropReadAhead()
    this.direction = 'idle'
  }

  // ===========================================================================
  // Reading
  // ===========================================================================

  private fill(): number {
    const position = this.at()
    let count: number
    try {
      count = this.backend.read(this.fd, this.buffer, 0, this.buffer.length, position)
    } catch (error) {
      this.errorFlag = true
      throw error
    }
    this.advance(position, count)
    this.readStart = 0
    this.readEnd = count
    if (count === 0) {
      this.eofFlag = true
    }
    return count
  }

  /**
   * Read one byte.
   *
   * @returns the byte, or END_OF_FILE
   */
  getByte(): number {
    this.beginRead()
    const pushed = this.pushback.pop()
    if (pushed !== undefined) {
      return pushed
    }
    if (this.readStart === this.readEnd && this.fill() === 0) {
      return END_OF_FILE
    }
    return this.buffer[this.readStart++]
  }

  /**
   * Push a byte back; the next read returns it. Clears the end-of-file
   * indicator.
   */
  unread(byte: number): void {
    this.beginRead()
    this.pushback.push(byte & 0xff)
    this.eofFlag = false
  }

  /**
   * Read up to `length` bytes into `target[start..]`, stopping early only at
   * end of file or on failure. Requests of a buffer or more bypass the buffer.
   */
  read(target: Uint8Array, start: number, length: number): TransferResult {
    try {
      this.beginRead()
    } catch (failure) {
      return { count: 0, failure }
    }

    let count = 0
    while (count < length) {
      const pushed = this.pushback.pop()
      if (pushed === undefined) {
        break
      }
      target[start + count++] = pushed
    }

    while (count < length) {
      const available = this.readEnd - this.readStart
      if (available > 0) {
        const take = Math.min(available, length - count)
        target.set(this.buffer.subarray(this.readStart, this.readStart + take), start + count)
        this.readStart += take
        count += take
        continue
      }

      const remaining = length - count
      try {
        if (remaining >= this.buffer.length) {
          const position = this.at()
          const transferred = this.backend.read(this.fd, target, start + count, remaining, position)
          this.advance(position, transferred)
          if (transferred === 0) {
            this.eofFlag = true
            break
          }
          count += transferred
        } else if (this.fill() === 0) {
          break
        }
      } catch (failure) {
        this.errorFlag = true
        return { count, failure }
      }
    }

    return { count }
  }

  // ===========================================================================
  // Writing
  // ===========================================================================

  /**
   * Write straight to the descriptor until everything is written or a call
   * fails. A call that writes nothing counts as an I/O failure.
   */
  private writeThrough(source: Uint8Array, start: number, length: number): TransferResult {
    let count = 0
    while (count < length) {
      try {
        const position = this.append ? null : this.at()
        const written = this.backend.write(this.fd, source, start + count, length - count, position)
        if (written === 0) {
          throw systemError('EIO', 'write')
        }
        this.advance(position, written)
        count += written
      } catch (failure) {
        this.errorFlag = true
        return { count, failure }
      }
    }
    return { count }
  }

  /**
   * Write all pending output. On failure the rest of it is discarded.
   */
  private drain(): TransferResult {
    const result = this.writeThrough(this.buffer, 0, this.pending)
    this.pending = 0
    return result
  }

  /**
   * Write `length` bytes from `source[start..]` through the buffer.
   *
   * @returns bytes accepted; on failure, only the bytes of this call that
   *   reached the descriptor count
   */
  write(source: Uint8Array, start: number, length: number): TransferResult {
    try {
      this.beginWrite()
    } catch (failure) {
      this.errorFlag = true
      return { count: 0, failure }
    }

    if (this.mode === BufferMode.None) {
      return this.writeThrough(source, start, length)
    }

    let count = 0
    while (count < length) {
      if (this.pending === 0 && length - count >= this.buffer.length) {
        const direct = this.writeThrough(source, start + count, length - count)
        return { count: count + direct.count, failure: direct.failure }
      }

      const take = Math.min(this.buffer.length - this.pending, length - count)
      this.buffer.set(source.subarray(start + count, start + count + take), this.pending)
      this.pending += take
      count += take

      if (this.pending === this.buffer.length) {
        const failure = this.drainWithin(count)
        if (failure !== undefined) {
          return failure
        }
      }
    }

    if (this.mode === BufferMode.Line && this.pending > 0 && source.subarray(start, start + length).includes(NEWLINE)) {
      const failure = this.drainWithin(count)
      if (failure !== undefined) {
        return failure
      }
    }

    return { count }
  }

  /**
   * Drain during a write of which `count` bytes are buffered so far. On
   * failure, reports the bytes of that write that reached the descriptor.
   */
  private drainWithin(count: number): TransferResult | undefined {
    const pendingBefore = this.pending
    const fromThisCall = Math.min(count, pendingBefore)
    const result = this.drain()
    if (result.failure === undefined) {
      return undefined
    }
    const lost = Math.min(fromThisCall, pendingBefore - result.count)
    return { count: count - lost, failure: result.failure }
  }

  /**
   * Write one byte.
   */
  putByte(byte: number): void {
    this.scratch[0] = byte
    const result = this.write(this.scratch, 0, 1)
    if (result.failure !== undefined) {
      throw result.failure
    }
  }

  /**
   * Write pending output. The stream stays in whatever direction it was.
   * On failure the pending output is discarded and the error indicator set.
   */
  flush(): void {
    if (this.direction !== 'write' || this.pending === 0) {
      return
    }
    const result = this.drain()
    if (result.failure !== undefined) {
      throw result.failure
    }
  }

  // ===========================================================================
  // Positioning and Buffering
  // ===========================================================================

  /**
   * Move to an absolute position. Flushes first; drops read-ahead and
   * push-back and clears the end-of-file indicator.
   */
  seek(position: number): void {
    this.flush()
    this.readStart = 0
    this.readEnd = 0
    this.pushback = []
    this.offset = position
    this.direction = 'idle'
    this.eofFlag = false
  }

  /**
   * Replace the buffering strategy and buffer. Settles first.
   *
   * @param buffer - storage for `Line`/`Full`; ignored for `None`
   */
  setBuffer(mode: BufferMode, buffer: Uint8Array): void {
    this.settle()
    this.mode = mode
    this.buffer = mode === BufferMode.None ? new Uint8Array(1) : buffer
  }
}
