/**
 * MemoryBackend - in-memory descriptor backend for testing.
 *
 * This module provides a complete DescriptorBackend implementation with:
 * - Files and directories held in memory
 * - A descriptor table enforcing each descriptor's access mode
 * - O_CREAT / O_EXCL / O_TRUNC / O_APPEND open semantics
 * - Pipes, which take no positional transfers (ESPIPE) and hand out each
 *   byte once
 * - Fault injection: queued OS failures per call, short transfers and a
 *   configurable block size
 *
 * Failures are thrown as ErrnoExceptions with the same codes the OS uses.
 *
 * @module core/mock-backend
 */

import type { BackendOperation, DescriptorBackend, DescriptorStat } from './backend.js'
import { O_ACCMODE, O_APPEND, O_CREAT, O_EXCL, O_RDONLY, O_RDWR, O_TRUNC, O_WRONLY } from './constants.js'
import { systemError, type SystemErrorCode } from './errors.js'

// =============================================================================
// Flag Parsing
// =============================================================================

/**
 * Parsed descriptor flags.
 */
interface ParsedFlags {
  readable: boolean
  writable: boolean
  create: boolean
  exclusive: boolean
  truncate: boolean
  append: boolean
}

/**
 * Parses numeric descriptor flags into a structured format.
 *
 * @throws EINVAL if the access mode bits name no access mode
 */
function parseFlags(flags: number): ParsedFlags {
  const accessBits = flags & O_ACCMODE
  if (accessBits !== O_RDONLY && accessBits !== O_WRONLY && accessBits !== O_RDWR) {
    throw systemError('EINVAL', 'open')
  }

  return {
    readable: accessBits === O_RDONLY || accessBits === O_RDWR,
    writable: accessBits === O_WRONLY || accessBits === O_RDWR,
    create: (flags & O_CREAT) !== 0,
    exclusive: (flags & O_EXCL) !== 0,
    truncate: (flags & O_TRUNC) !== 0,
    append: (flags & O_APPEND) !== 0,
  }
}

// =============================================================================
// Internal Types
// =============================================================================

interface MemoryFile {
  data: Uint8Array
  mode: number
  /** Unseekable: reads consume from the front, writes append */
  pipe: boolean
}

interface Descriptor {
  file: MemoryFile
  path: string
  flags: ParsedFlags
  /** Offset used by transfers that pass no position */
  offset: number
}

interface InjectedFailure {
  code: SystemErrorCode
  /** For read/write: bytes transferred before the failure is reported */
  after: number
}

// =============================================================================
// MemoryBackend Implementation
// =============================================================================

/**
 * In-memory descriptor backend for testing.
 *
 * @example
 * ```typescript
 * const backend = new MemoryBackend()
 * backend.writeFile('/data.txt', 'hello\n')
 *
 * const file = new BufferedFile('/data.txt', FileType.Text, AccessMode.Read, { backend })
 * file.getByteLine() // 'hello\n'
 *
 * // Make the next write fail with ENOSPC
 * backend.failNext('write', 'ENOSPC')
 * ```
 */
export class MemoryBackend implements DescriptorBackend {
  private files = new Map<string, MemoryFile>()
  private directories = new Set<string>(['/'])
  private descriptors = new Map<number, Descriptor>()
  private failures = new Map<BackendOperation, InjectedFailure[]>()
  private nextFd = 3 // 0, 1, 2 are stdin, stdout, stderr

  /** Largest byte count one read returns; Infinity for no limit */
  maxReadChunk = Infinity

  /** Largest byte count one write accepts; Infinity for no limit */
  maxWriteChunk = Infinity

  /** Block size reported by fstat */
  blockSize = 4096

  /** Process umask applied to the mode of created files */
  umask = 0o022

  /** Descriptors passed to close(), in call order */
  readonly closedDescriptors: number[] = []

  /** Number of calls per operation */
  readonly calls = new Map<BackendOperation, number>()

  // ===========================================================================
  // Helper Methods
  // ===========================================================================

  /**
   * Normalize a path by resolving . and .., removing duplicate slashes,
   * and stripping trailing slashes (except for root).
   */
  private normalizePath(path: string): string {
    if (!path) {
      throw systemError('ENOENT', 'open', path)
    }

    const resolved: string[] = []
    for (const part of path.split('/')) {
      if (part === '..') {
        resolved.pop()
      } else if (part !== '.' && part !== '') {
        resolved.push(part)
      }
    }

    return '/' + resolved.join('/')
  }

  /**
   * Get the parent directory of a normalized path.
   */
  private getParentDir(path: string): string {
    const lastSlash = path.lastIndexOf('/')
    return lastSlash <= 0 ? '/' : path.slice(0, lastSlash)
  }

  /**
   * Count a call and raise the next queued failure for it, if any.
   * Returns the failure for read/write so they can transfer a prefix first.
   */
  private enter(operation: BackendOperation): InjectedFailure | undefined {
    this.calls.set(operation, (this.calls.get(operation) ?? 0) + 1)
    return this.failures.get(operation)?.shift()
  }

  /**
   * Put a failure back at the head of its queue, for the call after a
   * short transfer.
   */
  private requeue(operation: BackendOperation, code: SystemErrorCode): void {
    const queue = this.failures.get(operation) ?? []
    queue.unshift({ code, after: 0 })
    this.failures.set(operation, queue)
  }

  private descriptor(fd: number, syscall: string): Descriptor {
    const entry = this.descriptors.get(fd)
    if (entry === undefined) {
      throw systemError('EBADF', syscall)
    }
    return entry
  }

  private resize(file: MemoryFile, length: number): void {
    if (length === file.data.length) {
      return
    }
    const data = new Uint8Array(length)
    data.set(file.data.subarray(0, Math.min(length, file.data.length)))
    file.data = data
  }

  // ===========================================================================
  // Test Setup and Inspection
  // ===========================================================================

  /**
   * Create or replace a file. Strings are stored as UTF-8.
   */
  writeFile(path: string, content: Uint8Array | string, mode: number = 0o644): void {
    const normalized = this.normalizePath(path)
    const data = typeof content === 'string' ? new TextEncoder().encode(content) : new Uint8Array(content)
    const existing = this.files.get(normalized)
    if (existing !== undefined) {
      existing.data = data
      return
    }
    this.files.set(normalized, { data, mode, pipe: false })
  }

  /**
   * Create an empty pipe, as mkfifo does.
   */
  createPipe(path: string, mode: number = 0o644): void {
    this.files.set(this.normalizePath(path), { data: new Uint8Array(0), mode, pipe: true })
  }

  /**
   * Copy of a file's content.
   *
   * @throws ENOENT if the file does not exist
   */
  readFile(path: string): Uint8Array {
    const file = this.files.get(this.normalizePath(path))
    if (file === undefined) {
      throw systemError('ENOENT', 'open', path)
    }
    return new Uint8Array(file.data)
  }

  /**
   * A file's content decoded as UTF-8.
   */
  readText(path: string): string {
    return new TextDecoder().decode(this.readFile(path))
  }

  /** Permission bits of a file */
  modeOf(path: string): number | undefined {
    return this.files.get(this.normalizePath(path))?.mode
  }

  exists(path: string): boolean {
    const normalized = this.normalizePath(path)
    return this.files.has(normalized) || this.directories.has(normalized)
  }

  /**
   * Create a directory and its missing parents.
   */
  mkdir(path: string): void {
    let current = ''
    for (const part of this.normalizePath(path).split('/').filter(Boolean)) {
      current += '/' + part
      this.directories.add(current)
    }
  }

  /** Number of descriptors currently open */
  get openDescriptorCount(): number {
    return this.descriptors.size
  }

  /**
   * Queue a failure for the next call of an operation. For read and write,
   * `after` bytes are transferred first; a non-zero `after` makes the call
   * return that short count and the failure is raised by the following call.
   *
   * @example
   * ```typescript
   * backend.failNext('fstat', 'EIO')
   * backend.failNext('write', 'ENOSPC', 10)
   * ```
   */
  failNext(operation: BackendOperation, code: SystemErrorCode, after: number = 0): void {
    const queue = this.failures.get(operation) ?? []
    queue.push({ code, after })
    this.failures.set(operation, queue)
  }

  /** Drop every queued failure */
  clearFailures(): void {
    this.failures.clear()
  }

  // ===========================================================================
  // DescriptorBackend Operations
  // ===========================================================================

  open(path: string, flags: number, mode: number): number {
    const failure = this.enter('open')
    if (failure !== undefined) {
      throw systemError(failure.code, 'open', path)
    }

    const parsed = parseFlags(flags)
    const normalized = this.normalizePath(path)

    if (this.directories.has(normalized)) {
      throw systemError('EISDIR', 'open', path)
    }

    let file = this.files.get(normalized)
    if (file !== undefined && parsed.create && parsed.exclusive) {
      throw systemError('EEXIST', 'open', path)
    }
    if (file === undefined) {
      if (!parsed.create) {
        throw systemError('ENOENT', 'open', path)
      }
      if (!this.directories.has(this.getParentDir(normalized))) {
        throw systemError('ENOENT', 'open', path)
      }
      file = { data: new Uint8Array(0), mode: mode & ~this.umask & 0o7777, pipe: false }
      this.files.set(normalized, file)
    } else if (parsed.truncate && parsed.writable && !file.pipe) {
      file.data = new Uint8Array(0)
    }

    const fd = this.nextFd++
    this.descriptors.set(fd, { file, path: normalized, flags: parsed, offset: 0 })
    return fd
  }

  close(fd: number): void {
    const failure = this.enter('close')
    this.closedDescriptors.push(fd)
    const known = this.descriptors.delete(fd)
    if (failure !== undefined) {
      throw systemError(failure.code, 'close')
    }
    if (!known) {
      throw systemError('EBADF', 'close')
    }
  }

  read(fd: number, buffer: Uint8Array, offset: number, length: number, position: number | null): number {
    const failure = this.enter('read')
    const entry = this.descriptor(fd, 'read')
    if (!entry.flags.readable) {
      throw systemError('EBADF', 'read')
    }
    if (entry.file.pipe && position !== null) {
      throw systemError('ESPIPE', 'read')
    }

    const data = entry.file.data
    const start = entry.file.pipe ? 0 : (position ?? entry.offset)
    let count = Math.max(0, Math.min(length, this.maxReadChunk, data.length - start))
    if (failure !== undefined) {
      if (failure.after === 0) {
        throw systemError(failure.code, 'read')
      }
      count = Math.min(count, failure.after)
      this.requeue('read', failure.code)
    }

    buffer.set(data.subarray(start, start + count), offset)
    if (entry.file.pipe) {
      entry.file.data = data.slice(count)
    } else if (position === null) {
      entry.offset = start + count
    }
    return count
  }

  write(fd: number, buffer: Uint8Array, offset: number, length: number, position: number | null): number {
    const failure = this.enter('write')
    const entry = this.descriptor(fd, 'write')
    if (!entry.flags.writable) {
      throw systemError('EBADF', 'write')
    }

    if (entry.file.pipe && position !== null) {
      throw systemError('ESPIPE', 'write')
    }

    let count = Math.min(length, this.maxWriteChunk)
    if (failure !== undefined) {
      if (failure.after === 0) {
        throw systemError(failure.code, 'write')
      }
      count = Math.min(count, failure.after)
      this.requeue('write', failure.code)
    }

    const file = entry.file
    const target = entry.flags.append || file.pipe ? file.data.length : (position ?? entry.offset)
    if (target + count > file.data.length) {
      this.resize(file, target + count)
    }
    file.data.set(buffer.subarray(offset, offset + count), target)

    if (position === null) {
      entry.offset = target + count
    }
    return count
  }

  fstat(fd: number): DescriptorStat {
    const failure = this.enter('fstat')
    const entry = this.descriptor(fd, 'fstat')
    if (failure !== undefined) {
      throw systemError(failure.code, 'fstat')
    }
    return { size: entry.file.pipe ? 0 : entry.file.data.length, blksize: this.blockSize }
  }

  ftruncate(fd: number, length: number): void {
    const failure = this.enter('ftruncate')
    const entry = this.descriptor(fd, 'ftruncate')
    if (failure !== undefined) {
      throw systemError(failure.code, 'ftruncate')
    }
    if (!entry.flags.writable) {
      throw systemError('EINVAL', 'ftruncate')
    }
    if (length < 0) {
      throw systemError('EINVAL', 'ftruncate')
    }
    this.resize(entry.file, length)
  }

  fsync(fd: number): void {
    const failure = this.enter('fsync')
    this.descriptor(fd, 'fsync')
    if (failure !== undefined) {
      throw systemError(failure.code, 'fsync')
    }
  }
}
