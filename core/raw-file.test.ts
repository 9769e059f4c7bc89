import { describe, it, expect, beforeEach } from 'vitest'
import { silentLogger } from '../utils/logger.js'
import { O_APPEND, O_CREAT, O_EXCL, O_NONBLOCK, O_RDONLY, O_RDWR, O_WRONLY, RECOMMENDED_FILE_BLOCK_SIZE } from './constants.js'
import { errnoOf, isCloseError, isOpenError, isReadError, isSeekError, isStatusError, isTruncationError, isWriteError } from './errors.js'
import { MemoryBackend } from './mock-backend.js'
import { RawFile, type FileObjectOptions } from './raw-file.js'

const encoder = new TextEncoder()
const decoder = new TextDecoder()

function captureError(fn: () => unknown): unknown {
  try {
    fn()
  } catch (error) {
    return error
  }
  throw new Error('expected the call to throw')
}

describe('RawFile', () => {
  let backend: MemoryBackend
  let options: FileObjectOptions

  beforeEach(() => {
    backend = new MemoryBackend()
    options = { backend, logger: silentLogger }
  })

  describe('open', () => {
    it('should fail with an open error for a missing file', () => {
      const error = captureError(() => new RawFile('/missing', O_RDONLY, undefined, options))

      expect(isOpenError(error)).toBe(true)
      expect(error).toMatchObject({
        code: 'ENOENT',
        errno: errnoOf('ENOENT'),
        syscall: 'open',
        path: '/missing',
        message: "ENOENT: no such file or directory, open file '/missing'",
      })
      expect(backend.openDescriptorCount).toBe(0)
    })

    it('should fail exclusive creation of an existing file', () => {
      backend.writeFile('/taken', 'x')
      const error = captureError(() => new RawFile('/taken', O_WRONLY | O_CREAT | O_EXCL, 0o600, options))
      expect(error).toMatchObject({ kind: 'open', code: 'EEXIST' })
    })

    it('should create files with the mode less the umask', () => {
      const file = new RawFile('/new', O_WRONLY | O_CREAT, 0o666, options)
      file.close()
      expect(backend.modeOf('/new')).toBe(0o644)
    })

    it('should default the mode to the configured creation mode', () => {
      const file = new RawFile('/private', O_WRONLY | O_CREAT, undefined, { ...options, config: { defaultMode: 0o600 } })
      file.close()
      expect(backend.modeOf('/private')).toBe(0o600)
    })

    it('should accept file URLs', () => {
      backend.writeFile('/data.bin', 'x')
      const url = new URL('file:///data.bin')
      const file = new RawFile(url, O_RDONLY, undefined, options)

      expect(file.getFilePath()).toBe(url)
      file.close()
    })

    it('should reject non-integer flags', () => {
      expect(() => new RawFile('/a', 1.5, undefined, options)).toThrow(TypeError)
    })
  })

  describe('transfers', () => {
    it('should write and read back through the tracked position', () => {
      const file = new RawFile('/data', O_RDWR | O_CREAT, 0o644, options)
      const buffer = new Uint8Array(5)

      expect(file.writeBytes(encoder.encode('hello'))).toBe(5)
      expect(file.getFilePosition()).toBe(5)
      file.rewind()
      expect(file.readBytes(buffer)).toBe(5)
      expect(decoder.decode(buffer)).toBe('hello')
      expect(file.readBytes(buffer)).toBe(0)
      file.close()
    })

    it('should transfer only the requested count', () => {
      backend.writeFile('/data', 'abcdef')
      const file = new RawFile('/data', O_RDONLY, undefined, options)
      const buffer = new Uint8Array(6)

      expect(file.readBytes(buffer, 2)).toBe(2)
      expect(decoder.decode(buffer.subarray(0, 2))).toBe('ab')
      expect(file.getFilePosition()).toBe(2)
      file.close()
    })

    it('should return short reads without retrying', () => {
      backend.writeFile('/data', 'abcdef')
      backend.maxReadChunk = 2
      const file = new RawFile('/data', O_RDONLY, undefined, options)

      expect(file.readBytes(new Uint8Array(6))).toBe(2)
      expect(backend.calls.get('read')).toBe(1)
      file.close()
    })

    it('should cap one transfer at maxTransferBytes', () => {
      const file = new RawFile('/data', O_WRONLY | O_CREAT, 0o644, { ...options, config: { maxTransferBytes: 3 } })

      expect(file.writeBytes(encoder.encode('hello'))).toBe(3)
      expect(backend.readText('/data')).toBe('hel')
      file.close()
    })

    it('should write at end of file in append mode', () => {
      backend.writeFile('/log', 'abc')
      const file = new RawFile('/log', O_WRONLY | O_APPEND, undefined, options)

      file.writeBytes(encoder.encode('de'))

      expect(backend.readText('/log')).toBe('abcde')
      expect(file.getFilePosition()).toBe(5)
      file.close()
    })

    it('should accept any ArrayBufferView', () => {
      const file = new RawFile('/words', O_RDWR | O_CREAT, 0o644, options)

      expect(file.writeBytes(new Uint16Array([1, 2]))).toBe(4)
      file.rewind()
      const words = new Uint16Array(2)
      expect(file.readBytes(words)).toBe(4)
      expect(Array.from(words)).toEqual([1, 2])
      file.close()
    })

    it('should reject counts larger than the buffer', () => {
      const file = new RawFile('/data', O_WRONLY | O_CREAT, 0o644, options)
      expect(() => file.writeBytes(new Uint8Array(2), 3)).toThrow(RangeError)
      file.close()
    })

    it('should convert OS failures into read and write errors', () => {
      backend.writeFile('/data', 'abc')
      const file = new RawFile('/data', O_RDWR, undefined, options)
      backend.failNext('read', 'EIO')
      backend.failNext('write', 'ENOSPC')

      expect(isReadError(captureError(() => file.readBytes(new Uint8Array(3))))).toBe(true)
      expect(captureError(() => file.writeBytes(new Uint8Array(1)))).toMatchObject({
        kind: 'write',
        code: 'ENOSPC',
        operation: 'write bytes',
      })
      file.close()
    })

    it('should fail to read a write-only descriptor', () => {
      const file = new RawFile('/data', O_WRONLY | O_CREAT, 0o644, options)
      expect(captureError(() => file.readBytes(new Uint8Array(1)))).toMatchObject({ kind: 'read', code: 'EBADF' })
      file.close()
    })
  })

  describe('pipes', () => {
    beforeEach(() => {
      backend.createPipe('/pipe')
    })

    it('should transfer through the descriptor offset', () => {
      const file = new RawFile('/pipe', O_RDWR | O_NONBLOCK, undefined, options)
      const buffer = new Uint8Array(3)

      expect(file.writeBytes(encoder.encode('abc'))).toBe(3)
      expect(file.readBytes(buffer)).toBe(3)
      expect(decoder.decode(buffer)).toBe('abc')
      expect(file.getFilePosition()).toBe(6)
      file.close()
    })

    it('should go positional once a seek moves off the descriptor offset', () => {
      const file = new RawFile('/pipe', O_RDWR, undefined, options)
      file.seekSet(1)

      expect(captureError(() => file.readBytes(new Uint8Array(1)))).toMatchObject({
        kind: 'read',
        code: 'ESPIPE',
        operation: 'read bytes',
      })
      file.close()
    })
  })

  describe('position and length', () => {
    let file: RawFile

    beforeEach(() => {
      backend.writeFile('/data', '0123456789')
      file = new RawFile('/data', O_RDWR, undefined, options)
    })

    it('should seek from each origin', () => {
      const buffer = new Uint8Array(2)

      file.seekEnd(-2)
      file.readBytes(buffer)
      expect(decoder.decode(buffer)).toBe('89')

      file.seekSet(3)
      file.seekCurrent(2)
      expect(file.getFilePosition()).toBe(5)

      file.setFilePosition(1)
      file.readBytes(buffer)
      expect(decoder.decode(buffer)).toBe('12')
    })

    it('should allow seeking past the end', () => {
      file.seekEnd(5)
      expect(file.getFilePosition()).toBe(15)
      expect(file.endOfFile()).toBe(true)
      expect(file.bytesRemaining()).toBe(0)
    })

    it('should reject negative resulting offsets', () => {
      const error = captureError(() => file.seekCurrent(-1))

      expect(isSeekError(error)).toBe(true)
      expect(error).toMatchObject({ code: 'EINVAL', operation: 'seek from current position' })
      expect(file.getFilePosition()).toBe(0)
    })

    it('should reject non-integer offsets', () => {
      expect(() => file.seekSet(0.5)).toThrow(TypeError)
    })

    it('should resize without moving the position', () => {
      file.seekSet(4)
      file.setFileLength(2)

      expect(file.getFileLength()).toBe(2)
      expect(file.getFilePosition()).toBe(4)
      expect(backend.readText('/data')).toBe('01')

      file.setFileLength(4)
      expect(Array.from(backend.readFile('/data'))).toEqual([0x30, 0x31, 0, 0])
    })

    it('should report remaining bytes', () => {
      file.seekSet(7)
      expect(file.endOfFile()).toBe(false)
      expect(file.bytesRemaining()).toBe(3)
    })

    it('should raise status and truncation errors', () => {
      backend.failNext('fstat', 'EIO')
      expect(isStatusError(captureError(() => file.getFileLength()))).toBe(true)

      backend.failNext('ftruncate', 'EFBIG')
      expect(isTruncationError(captureError(() => file.setFileLength(1)))).toBe(true)
    })

    it('should fall back to the recommended block size', () => {
      expect(file.getFileBlockSize()).toBe(4096)
      backend.blockSize = 0
      expect(file.getFileBlockSize()).toBe(RECOMMENDED_FILE_BLOCK_SIZE)
    })

    it('should sync through the backend', () => {
      file.sync()
      expect(backend.calls.get('fsync')).toBe(1)
    })
  })

  describe('close', () => {
    it('should release the descriptor exactly once', () => {
      backend.writeFile('/data', 'x')
      const file = new RawFile('/data', O_RDONLY, undefined, options)
      const fd = file.getFileDescriptor()

      file.close()
      file.close()

      expect(file.isClosed()).toBe(true)
      expect(backend.closedDescriptors).toEqual([fd])
    })

    it('should count the descriptor as released when close fails', () => {
      backend.writeFile('/data', 'x')
      const file = new RawFile('/data', O_RDONLY, undefined, options)
      backend.failNext('close', 'EIO')

      const error = captureError(() => file.close())

      expect(isCloseError(error)).toBe(true)
      expect(error).toMatchObject({ code: 'EIO', operation: 'close file' })
      expect(file.isClosed()).toBe(true)
      expect(() => file.close()).not.toThrow()
      expect(backend.closedDescriptors).toHaveLength(1)
      expect(backend.openDescriptorCount).toBe(0)
    })

    it('should fail every operation after close with EBADF', () => {
      backend.writeFile('/data', 'x')
      const file = new RawFile('/data', O_RDWR, undefined, options)
      file.close()

      expect(captureError(() => file.readBytes(new Uint8Array(1)))).toMatchObject({ kind: 'read', code: 'EBADF' })
      expect(captureError(() => file.writeBytes(new Uint8Array(1)))).toMatchObject({ kind: 'write', code: 'EBADF' })
      expect(captureError(() => file.getFileLength())).toMatchObject({ kind: 'status', code: 'EBADF' })
      expect(captureError(() => file.seekSet(0))).toMatchObject({ kind: 'seek', code: 'EBADF' })
      expect(captureError(() => file.getFileDescriptor())).toMatchObject({ kind: 'status', code: 'EBADF' })
      expect(isWriteError(captureError(() => file.writeBytes(new Uint8Array(1))))).toBe(true)
    })

    it('should close when disposed', () => {
      backend.writeFile('/data', 'x')
      const file = new RawFile('/data', O_RDONLY, undefined, options)

      file[Symbol.dispose]()

      expect(file.isClosed()).toBe(true)
      expect(backend.openDescriptorCount).toBe(0)
    })
  })
})
