import { describe, it, expect } from 'vitest'
import { createConfig, defaultConfig } from './config.js'
import { DEFAULT_BUFFER_SIZE, MAX_TRANSFER_BYTES } from './constants.js'
import { BufferMode } from './types.js'

describe('createConfig', () => {
  it('should return the defaults when given nothing', () => {
    const config = createConfig()

    expect(config).toEqual(defaultConfig)
    expect(config.defaultMode).toBe(0o666)
    expect(config.bufferMode).toBe(BufferMode.Full)
    expect(config.bufferSize).toBe(DEFAULT_BUFFER_SIZE)
    expect(config.maxTransferBytes).toBe(MAX_TRANSFER_BYTES)
  })

  it('should override only the given options', () => {
    const config = createConfig({ defaultMode: 0o600, bufferMode: BufferMode.None })

    expect(config.defaultMode).toBe(0o600)
    expect(config.bufferMode).toBe(BufferMode.None)
    expect(config.bufferSize).toBe(defaultConfig.bufferSize)
  })

  it('should freeze the result', () => {
    expect(Object.isFrozen(createConfig())).toBe(true)
    expect(Object.isFrozen(defaultConfig)).toBe(true)
  })

  describe('validation', () => {
    it('should reject a non-integer mode', () => {
      expect(() => createConfig({ defaultMode: 1.5 })).toThrow(TypeError)
      expect(() => createConfig({ defaultMode: 1.5 })).toThrow('defaultMode must be an integer')
    })

    it('should reject a mode out of range', () => {
      expect(() => createConfig({ defaultMode: -1 })).toThrow(RangeError)
      expect(() => createConfig({ defaultMode: 0o10000 })).toThrow('defaultMode must be between 0 and 0o7777')
    })

    it('should reject an unknown buffer mode', () => {
      const options = JSON.parse('{"bufferMode":"partial"}')
      expect(() => createConfig(options)).toThrow(TypeError)
    })

    it('should reject sizes below 1', () => {
      expect(() => createConfig({ bufferSize: 0 })).toThrow(RangeError)
      expect(() => createConfig({ maxTransferBytes: 0 })).toThrow(`maxTransferBytes must be between 1 and ${MAX_TRANSFER_BYTES}`)
    })

    it('should reject sizes above the transfer cap', () => {
      expect(() => createConfig({ byteStringChunkLength: MAX_TRANSFER_BYTES + 1 })).toThrow(RangeError)
    })

    it('should reject non-integer sizes', () => {
      expect(() => createConfig({ wideStringChunkLength: 2.5 })).toThrow('wideStringChunkLength must be an integer')
    })
  })
})
