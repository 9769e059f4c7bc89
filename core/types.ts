/**
 * Core file object types
 *
 * The enumerations a caller passes to {@link BufferedFile} and the tables
 * that translate them into native mode strings and descriptor flags.
 *
 * Each enumeration is a frozen object of string literals with a type of the
 * same name, so both `FileType.Text` and the literal `'text'` are accepted.
 *
 * @module core/types
 */

import { O_APPEND, O_CLOEXEC, O_CREAT, O_EXCL, O_RDONLY, O_RDWR, O_TRUNC, O_WRONLY } from './constants.js'

// =============================================================================
// File Type
// =============================================================================

/**
 * How a BufferedFile's content is interpreted.
 *
 * - `Text`: character, string, line and formatted I/O
 * - `Binary`: raw element transfers
 *
 * @example
 * ```typescript
 * const file = new BufferedFile('/notes.txt', FileType.Text, AccessMode.Read)
 * ```
 */
export const FileType = {
  Text: 'text',
  Binary: 'binary',
} as const
export type FileType = (typeof FileType)[keyof typeof FileType]

// =============================================================================
// Access Mode
// =============================================================================

/**
 * Access requested when a BufferedFile is opened.
 *
 * | mode | reads | writes | creates | truncates | appends |
 * |---|---|---|---|---|---|
 * | `Read` | yes | | | | |
 * | `Write` | | yes | yes | yes | |
 * | `Append` | | yes | yes | | yes |
 * | `ReadExtended` | yes | yes | | | |
 * | `WriteExtended` | yes | yes | yes | yes | |
 * | `AppendExtended` | yes | yes | yes | | yes |
 */
export const AccessMode = {
  Read: 'read',
  Write: 'write',
  Append: 'append',
  ReadExtended: 'read-extended',
  WriteExtended: 'write-extended',
  AppendExtended: 'append-extended',
} as const
export type AccessMode = (typeof AccessMode)[keyof typeof AccessMode]

// =============================================================================
// Buffer Mode
// =============================================================================

/**
 * Buffering strategy of a stream.
 *
 * - `None`: every write goes straight to the descriptor
 * - `Line`: output is flushed after each newline
 * - `Full`: output is flushed when the buffer fills
 */
export const BufferMode = {
  None: 'none',
  Line: 'line',
  Full: 'full',
} as const
export type BufferMode = (typeof BufferMode)[keyof typeof BufferMode]

// =============================================================================
// Character Mode
// =============================================================================

/**
 * Text orientation of a stream. Starts `Unset` and commits once.
 */
export const CharacterMode = {
  Byte: 'byte',
  Unset: 'unset',
  Wide: 'wide',
} as const
export type CharacterMode = (typeof CharacterMode)[keyof typeof CharacterMode]

// =============================================================================
// Mode Tables
// =============================================================================

export const FILE_TYPE_NAMES: Readonly<Record<FileType, string>> = {
  text: 'text file',
  binary: 'binary file',
}

/**
 * What each access mode opens a file for, used in operation names such as
 * "open text file for extended reading".
 */
export const ACCESS_MODE_DESCRIPTIONS: Readonly<Record<AccessMode, string>> = {
  read: 'reading',
  write: 'writing',
  append: 'appending',
  'read-extended': 'extended reading',
  'write-extended': 'extended writing',
  'append-extended': 'extended appending',
}

/**
 * Native mode string for every (mode, type) pair.
 */
export const ACCESS_MODE_STRINGS: Readonly<Record<AccessMode, Readonly<Record<FileType, string>>>> = {
  read: { text: 'r', binary: 'rb' },
  write: { text: 'w', binary: 'wb' },
  append: { text: 'a', binary: 'ab' },
  'read-extended': { text: 'r+', binary: 'rb+' },
  'write-extended': { text: 'w+', binary: 'wb+' },
  'append-extended': { text: 'a+', binary: 'ab+' },
}

/**
 * Native mode string for an access mode and file type.
 *
 * @example
 * ```typescript
 * nativeModeString(AccessMode.AppendExtended, FileType.Binary) // 'ab+'
 * ```
 */
export function nativeModeString(mode: AccessMode, type: FileType): string {
  return ACCESS_MODE_STRINGS[mode][type]
}

/** Whether a file opened in this mode may be read. */
export function isReadableMode(mode: AccessMode): boolean {
  return mode !== AccessMode.Write && mode !== AccessMode.Append
}

/** Whether a file opened in this mode may be written. */
export function isWritableMode(mode: AccessMode): boolean {
  return mode !== AccessMode.Read
}

/** Whether every write of a file opened in this mode lands at end of file. */
export function isAppendMode(mode: AccessMode): boolean {
  return mode === AccessMode.Append || mode === AccessMode.AppendExtended
}

// =============================================================================
// Mode String Parsing
// =============================================================================

/**
 * Descriptor flags for each base mode string.
 */
const BASE_MODE_FLAGS: ReadonlyMap<string, number> = new Map([
  ['r', O_RDONLY],
  ['r+', O_RDWR],
  ['w', O_WRONLY | O_CREAT | O_TRUNC],
  ['w+', O_RDWR | O_CREAT | O_TRUNC],
  ['a', O_WRONLY | O_CREAT | O_APPEND],
  ['a+', O_RDWR | O_CREAT | O_APPEND],
])

/**
 * Translate an fopen-style mode string into descriptor flags.
 *
 * The first character picks the base mode (`r`, `w` or `a`). The rest may
 * contain, in any order:
 * - `+`: open for reading and writing
 * - `b`: binary (no effect on POSIX)
 * - `x`: exclusive creation (O_EXCL)
 * - `e`: close-on-exec (O_CLOEXEC)
 *
 * @returns the flags, or undefined when the string is not a valid mode
 *
 * @example
 * ```typescript
 * modeStringToFlags('rb+') // O_RDWR
 * modeStringToFlags('wx')  // O_WRONLY | O_CREAT | O_TRUNC | O_EXCL
 * modeStringToFlags('q')   // undefined
 * ```
 */
export function modeStringToFlags(mode: string): number | undefined {
  const base = mode.charAt(0)
  let extended = false
  let extra = 0
  for (const modifier of mode.slice(1)) {
    switch (modifier) {
      case '+':
        extended = true
        break
      case 'b':
        break
      case 'x':
        extra |= O_EXCL
        break
      case 'e':
        extra |= O_CLOEXEC
        break
      default:
        return undefined
    }
  }

  const flags = BASE_MODE_FLAGS.get(extended ? `${base}+` : base)
  if (flags === undefined) {
    return undefined
  }
  return flags | extra
}

// =============================================================================
// Type Guards
// =============================================================================

export function isFileType(value: unknown): value is FileType {
  return value === FileType.Text || value === FileType.Binary
}

export function isAccessMode(value: unknown): value is AccessMode {
  return typeof value === 'string' && Object.hasOwn(ACCESS_MODE_STRINGS, value)
}

export function isBufferMode(value: unknown): value is BufferMode {
  return value === BufferMode.None || value === BufferMode.Line || value === BufferMode.Full
}

export function isCharacterMode(value: unknown): value is CharacterMode {
  return value === CharacterMode.Byte || value === CharacterMode.Unset || value === CharacterMode.Wide
}
