import { describe, it, expect, beforeEach, vi } from 'vitest'
import { silentLogger, type Logger } from '../utils/logger.js'
import { O_RDONLY } from './constants.js'
import { createFileError, isCloseError } from './errors.js'
import { MemoryBackend } from './mock-backend.js'
import { withBufferedFile, withFile, withRawFile, type Closable } from './scope.js'
import { AccessMode, FileType } from './types.js'

function recordingLogger(): { logger: Logger; error: ReturnType<typeof vi.fn> } {
  const error = vi.fn()
  return { logger: { ...silentLogger, error }, error }
}

describe('withFile', () => {
  it('should return the body result and close once', () => {
    const file = { close: vi.fn() }

    expect(withFile(file, () => 42)).toBe(42)
    expect(file.close).toHaveBeenCalledTimes(1)
  })

  it('should close and rethrow when the body throws', () => {
    const file = { close: vi.fn() }
    const failure = new Error('body failed')

    expect(() =>
      withFile(file, () => {
        throw failure
      })
    ).toThrow(failure)
    expect(file.close).toHaveBeenCalledTimes(1)
  })

  it('should keep the body error and log the close error', () => {
    const closeError = createFileError('close', 'EIO', { operation: 'close file' })
    const file: Closable = {
      close: () => {
        throw closeError
      },
    }
    const { logger, error } = recordingLogger()

    expect(() =>
      withFile(
        file,
        () => {
          throw new Error('body failed')
        },
        logger
      )
    ).toThrow('body failed')
    expect(error).toHaveBeenCalledWith('close failed while unwinding from an earlier error:', closeError)
  })

  it('should propagate a close error when the body succeeded', () => {
    const file: Closable = {
      close: () => {
        throw createFileError('close', 'EIO', { operation: 'close file' })
      },
    }
    const { logger, error } = recordingLogger()

    let caught: unknown
    try {
      withFile(file, () => 'done', logger)
    } catch (thrown) {
      caught = thrown
    }

    expect(isCloseError(caught)).toBe(true)
    expect(error).not.toHaveBeenCalled()
  })
})

describe('withBufferedFile / withRawFile', () => {
  let backend: MemoryBackend

  beforeEach(() => {
    backend = new MemoryBackend()
    backend.writeFile('/data.txt', 'first line\nsecond line\n')
  })

  it('should open, run and close a BufferedFile', () => {
    const line = withBufferedFile('/data.txt', FileType.Text, AccessMode.Read, (file) => file.getByteLine(), {
      backend,
      logger: silentLogger,
    })

    expect(line).toBe('first line\n')
    expect(backend.openDescriptorCount).toBe(0)
  })

  it('should close the file when the body throws', () => {
    expect(() =>
      withBufferedFile(
        '/data.txt',
        FileType.Text,
        AccessMode.Read,
        (file) => file.putByteString('not allowed'),
        { backend, logger: silentLogger }
      )
    ).toThrow('EBADF')
    expect(backend.openDescriptorCount).toBe(0)
  })

  it('should open, run and close a RawFile', () => {
    const count = withRawFile('/data.txt', O_RDONLY, undefined, (file) => file.readBytes(new Uint8Array(5)), {
      backend,
      logger: silentLogger,
    })

    expect(count).toBe(5)
    expect(backend.closedDescriptors).toHaveLength(1)
  })
})
