/**
 * DescriptorBackend Interface
 *
 * The OS seam of fdx: the synchronous descriptor calls that RawFile and the
 * buffered Stream are built on. `NodeBackend` binds them to `node:fs`; the
 * in-memory `MemoryBackend` (see `mock-backend.ts`) implements the same
 * interface for tests.
 *
 * Every method either succeeds or throws an `ErrnoException` carrying the
 * POSIX code, as Node's fs bindings do. Callers convert those into typed
 * {@link FileError}s at the call site.
 *
 * @module core/backend
 */

import {
  closeSync,
  fstatSync,
  fsyncSync,
  ftruncateSync,
  openSync,
  readSync,
  writeSync,
} from 'node:fs'
import { toFileError } from './errors.js'

// =============================================================================
// Backend Types
// =============================================================================

/**
 * The part of a descriptor's status fdx relies on.
 */
export interface DescriptorStat {
  /** File size in bytes */
  size: number
  /** Preferred I/O block size; 0 when the OS does not report one */
  blksize: number
}

/**
 * Names of the backend calls, used for fault injection and logging.
 */
export type BackendOperation = 'open' | 'close' | 'read' | 'write' | 'fstat' | 'ftruncate' | 'fsync'

// =============================================================================
// DescriptorBackend Interface
// =============================================================================

/**
 * Pluggable descriptor backend.
 *
 * A transfer given a `position` is positional (pread/pwrite) and leaves the
 * descriptor's own offset alone. Given `null` it behaves like read/write:
 * it starts at the descriptor's offset and advances it, and a write on an
 * O_APPEND descriptor lands at end of file. Pipes, FIFOs and terminals only
 * take `null`; a position fails there with ESPIPE.
 *
 * @example
 * ```typescript
 * import { NodeBackend, RawFile, O_RDONLY } from 'fdx'
 *
 * const file = new RawFile('/data.bin', O_RDONLY, undefined, { backend: new NodeBackend() })
 * ```
 */
export interface DescriptorBackend {
  /**
   * Open a file.
   *
   * @param path - Path of the file
   * @param flags - Descriptor flags (O_RDONLY, O_CREAT, ...)
   * @param mode - Permission bits for a newly created file
   * @returns The new descriptor
   */
  open(path: string, flags: number, mode: number): number

  /**
   * Release a descriptor. The descriptor is invalid afterwards even when
   * this throws.
   */
  close(fd: number): void

  /**
   * Read up to `length` bytes at `position` (or the descriptor offset when
   * `null`) into `buffer[offset..]`.
   *
   * @returns Bytes read; 0 at end of file
   */
  read(fd: number, buffer: Uint8Array, offset: number, length: number, position: number | null): number

  /**
   * Write up to `length` bytes from `buffer[offset..]` at `position`.
   *
   * @returns Bytes written; may be fewer than requested
   */
  write(fd: number, buffer: Uint8Array, offset: number, length: number, position: number | null): number

  /** Size and block size of the open file */
  fstat(fd: number): DescriptorStat

  /** Shrink or grow the file; growth is zero-filled */
  ftruncate(fd: number, length: number): void

  /** Ask the OS to persist data and metadata */
  fsync(fd: number): void
}

// =============================================================================
// Node Backend
// =============================================================================

/**
 * Backend over the synchronous descriptor calls of `node:fs`.
 */
export class NodeBackend implements DescriptorBackend {
  open(path: string, flags: number, mode: number): number {
    return openSync(path, flags, mode)
  }

  close(fd: number): void {
    closeSync(fd)
  }

  read(fd: number, buffer: Uint8Array, offset: number, length: number, position: number | null): number {
    return readSync(fd, buffer, offset, length, position)
  }

  write(fd: number, buffer: Uint8Array, offset: number, length: number, position: number | null): number {
    return writeSync(fd, buffer, offset, length, position)
  }

  fstat(fd: number): DescriptorStat {
    const stats = fstatSync(fd)
    return { size: stats.size, blksize: stats.blksize }
  }

  ftruncate(fd: number, length: number): void {
    ftruncateSync(fd, length)
  }

  fsync(fd: number): void {
    fsyncSync(fd)
  }
}

/**
 * Backend used when a file object is given none.
 */
export const defaultBackend: DescriptorBackend = new NodeBackend()

/**
 * Open a descriptor for a file object, converting a failure into an open
 * error.
 *
 * @throws {FileError} open error carrying the OS code
 */
export function openDescriptor(
  backend: DescriptorBackend,
  path: string,
  flags: number,
  mode: number,
  operation: string
): number {
  try {
    return backend.open(path, flags, mode)
  } catch (error) {
    throw toFileError('open', error, { operation, path })
  }
}
