/**
 * Tests for the package entry point
 *
 * The file objects, their helpers and the error guards are importable from
 * the root; the in-memory test backend is not.
 */

import { describe, it, expect } from 'vitest'

describe('package exports', () => {
  it('should export the file objects and scope helpers', async () => {
    const module = await import('../index.js')

    expect(typeof module.BufferedFile).toBe('function')
    expect(typeof module.RawFile).toBe('function')
    expect(typeof module.withFile).toBe('function')
    expect(typeof module.NodeBackend).toBe('function')
  }, 15000)

  it('should export the error guards and logger', async () => {
    const module = await import('../index.js')

    expect(typeof module.isOpenError).toBe('function')
    expect(typeof module.createLogger).toBe('function')
  })

  it('should not export the in-memory test backend', async () => {
    const module = await import('../index.js')

    expect(Object.keys(module)).not.toContain('MemoryBackend')
  })

  it('should not export seek origin constants', async () => {
    const module = await import('../index.js')

    expect(Object.keys(module)).not.toContain('SEEK_SET')
    expect(Object.keys(module)).not.toContain('SeekWhence')
  })
})
