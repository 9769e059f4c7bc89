/**
 * fdx Configuration Module
 *
 * Tunables shared by RawFile and BufferedFile: the creation mode for new
 * files, the initial buffering of a stream, and the bounds of the string
 * accumulators and binary transfer loop. Configuration is validated and
 * frozen for immutability.
 *
 * @module core/config
 */

import {
  BYTE_STRING_BUFFER_LENGTH,
  DEFAULT_BUFFER_SIZE,
  MAX_TRANSFER_BYTES,
  RECOMMENDED_FILE_BLOCK_SIZE,
  WIDE_STRING_BUFFER_LENGTH,
} from './constants.js'
import { BufferMode, isBufferMode } from './types.js'

/**
 * Maximum valid file mode (all permission bits set)
 */
const MAX_MODE = 0o7777

/**
 * fdx configuration
 */
export interface FdxConfig {
  /** Permission bits for files created by open (subject to umask) */
  readonly defaultMode: number

  /** Buffering a BufferedFile starts with */
  readonly bufferMode: BufferMode

  /** Buffer capacity a BufferedFile starts with */
  readonly bufferSize: number

  /** Floor of the buffer size chosen by setOptimalBuffer() */
  readonly recommendedBlockSize: number

  /** Largest byte count handed to one transfer call */
  readonly maxTransferBytes: number

  /** Accumulator length for byte string reads */
  readonly byteStringChunkLength: number

  /** Accumulator length (in characters) for wide string reads */
  readonly wideStringChunkLength: number
}

/**
 * Configuration options (partial, for user input)
 */
export type FdxConfigOptions = Partial<FdxConfig>

/**
 * Default configuration values
 */
export const defaultConfig: FdxConfig = Object.freeze({
  defaultMode: 0o666,
  bufferMode: BufferMode.Full,
  bufferSize: DEFAULT_BUFFER_SIZE,
  recommendedBlockSize: RECOMMENDED_FILE_BLOCK_SIZE,
  maxTransferBytes: MAX_TRANSFER_BYTES,
  byteStringChunkLength: BYTE_STRING_BUFFER_LENGTH,
  wideStringChunkLength: WIDE_STRING_BUFFER_LENGTH,
})

/**
 * Validate file mode
 */
function validateMode(mode: unknown): number {
  if (typeof mode !== 'number' || !Number.isInteger(mode)) {
    throw new TypeError('defaultMode must be an integer')
  }
  if (mode < 0 || mode > MAX_MODE) {
    throw new RangeError(`defaultMode must be between 0 and 0o${MAX_MODE.toString(8)}`)
  }
  return mode
}

function validateBufferMode(mode: unknown): BufferMode {
  if (!isBufferMode(mode)) {
    throw new TypeError(`bufferMode must be one of 'none', 'line' or 'full'`)
  }
  return mode
}

/**
 * Validate a size that must be a positive integer no larger than `max`
 */
function validateSize(value: unknown, name: string, max: number = MAX_TRANSFER_BYTES): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new TypeError(`${name} must be an integer`)
  }
  if (value < 1 || value > max) {
    throw new RangeError(`${name} must be between 1 and ${max}`)
  }
  return value
}

/**
 * Create a new fdx configuration
 *
 * Creates a validated and frozen configuration object. Any invalid option
 * throws a TypeError (wrong type) or RangeError (out of bounds) naming it.
 *
 * @param options - Optional configuration options to override defaults
 * @returns A frozen FdxConfig object
 *
 * @example
 * ```typescript
 * // Use all defaults
 * const config = createConfig()
 *
 * // Private files, unbuffered streams
 * const strict = createConfig({ defaultMode: 0o600, bufferMode: BufferMode.None })
 * ```
 */
export function createConfig(options: FdxConfigOptions = {}): FdxConfig {
  const config: FdxConfig = {
    defaultMode:
      options.defaultMode !== undefined
        ? validateMode(options.defaultMode)
        : defaultConfig.defaultMode,

    bufferMode:
      options.bufferMode !== undefined
        ? validateBufferMode(options.bufferMode)
        : defaultConfig.bufferMode,

    bufferSize:
      options.bufferSize !== undefined
        ? validateSize(options.bufferSize, 'bufferSize')
        : defaultConfig.bufferSize,

    recommendedBlockSize:
      options.recommendedBlockSize !== undefined
        ? validateSize(options.recommendedBlockSize, 'recommendedBlockSize')
        : defaultConfig.recommendedBlockSize,

    maxTransferBytes:
      options.maxTransferBytes !== undefined
        ? validateSize(options.maxTransferBytes, 'maxTransferBytes')
        : defaultConfig.maxTransferBytes,

    byteStringChunkLength:
      options.byteStringChunkLength !== undefined
        ? validateSize(options.byteStringChunkLength, 'byteStringChunkLength')
        : defaultConfig.byteStringChunkLength,

    wideStringChunkLength:
      options.wideStringChunkLength !== undefined
        ? validateSize(options.wideStringChunkLength, 'wideStringChunkLength')
        : defaultConfig.wideStringChunkLength,
  }

  return Object.freeze(config)
}
