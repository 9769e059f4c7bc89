import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { join } from 'node:path'
import { BufferedFile } from '../core/buffered-file.js'
import { O_CREAT, O_EXCL, O_RDONLY, O_WRONLY } from '../core/constants.js'
import { isOpenError } from '../core/errors.js'
import { RawFile } from '../core/raw-file.js'
import { withBufferedFile } from '../core/scope.js'
import { AccessMode, FileType } from '../core/types.js'
import { silentLogger } from '../utils/logger.js'
import { CountingBackend, createTempDir, readFixtureText, removeTempDir, writeFixture } from './test-utils.js'

function captureError(fn: () => unknown): unknown {
  try {
    fn()
  } catch (error) {
    return error
  }
  throw new Error('expected the call to throw')
}

describe('NodeBackend', () => {
  let dir: string
  let backend: CountingBackend

  beforeEach(() => {
    dir = createTempDir()
    backend = new CountingBackend()
  })

  afterEach(() => {
    removeTempDir(dir)
  })

  describe('open failures', () => {
    it('should raise EISDIR when a directory is opened for writing', () => {
      const error = captureError(
        () => new BufferedFile(dir, FileType.Binary, AccessMode.Write, { backend, logger: silentLogger })
      )

      expect(isOpenError(error)).toBe(true)
      expect(error).toMatchObject({ code: 'EISDIR', path: dir })
      expect(backend.opened).toHaveLength(0)
    })

    it('should raise EEXIST for exclusive creation of an existing file', () => {
      const path = writeFixture(dir, 'taken', 'x')

      const error = captureError(() => new RawFile(path, O_WRONLY | O_CREAT | O_EXCL, 0o600, { backend, logger: silentLogger }))

      expect(error).toMatchObject({ kind: 'open', code: 'EEXIST', path })
    })
  })

  describe('text round trip', () => {
    it('should write formatted lines that read back through scan', () => {
      const path = join(dir, 'report.txt')

      withBufferedFile(
        path,
        FileType.Text,
        AccessMode.Write,
        (file) => {
          file.printByte('%s=%d\n', 'width', 42)
          file.putByteLine('done')
        },
        { backend, logger: silentLogger }
      )

      expect(readFixtureText(path)).toBe('width=42\ndone\n')
      expect(backend.closed).toEqual(backend.opened)
    })

    it('should append after existing content', () => {
      const path = writeFixture(dir, 'log.txt', 'first\n')

      const file = new BufferedFile(path, FileType.Text, AccessMode.Append, { backend, logger: silentLogger })
      expect(file.getFilePosition()).toBe(6)
      file.putByteString('second\n')
      file.close()

      expect(readFixtureText(path)).toBe('first\nsecond\n')
    })

    it('should read UTF-8 code points in wide mode', () => {
      const path = writeFixture(dir, 'wide.txt', 'hé\u{1f600}')

      const file = new BufferedFile(path, FileType.Text, AccessMode.Read, { backend, logger: silentLogger })
      expect(file.getWideString()).toBe('hé\u{1f600}')
      expect(file.getFilePosition()).toBe(7)
      file.close()
    })
  })

  describe('RawFile', () => {
    it('should read a fixture through the descriptor', () => {
      const path = writeFixture(dir, 'raw.bin', 'abcdef')
      const file = new RawFile(path, O_RDONLY, undefined, { backend, logger: silentLogger })
      const buffer = new Uint8Array(4)

      expect(file.readBytes(buffer)).toBe(4)
      expect(new TextDecoder().decode(buffer)).toBe('abcd')
      expect(file.getFileLength()).toBe(6)
      expect(file.bytesRemaining()).toBe(2)
      file.close()
      expect(backend.closed).toEqual(backend.opened)
    })
  })
})
