import { describe, it, expect } from 'vitest'
import { O_APPEND, O_CREAT, O_EXCL, O_RDONLY, O_RDWR, O_TRUNC, O_WRONLY } from './constants.js'
import {
  AccessMode,
  BufferMode,
  CharacterMode,
  FileType,
  ACCESS_MODE_DESCRIPTIONS,
  FILE_TYPE_NAMES,
  isAccessMode,
  isAppendMode,
  isBufferMode,
  isCharacterMode,
  isFileType,
  isReadableMode,
  isWritableMode,
  modeStringToFlags,
  nativeModeString,
} from './types.js'

describe('nativeModeString', () => {
  it('should map every access mode for text files', () => {
    expect(Object.values(AccessMode).map((mode) => nativeModeString(mode, FileType.Text))).toEqual([
      'r',
      'w',
      'a',
      'r+',
      'w+',
      'a+',
    ])
  })

  it('should add b for binary files', () => {
    expect(Object.values(AccessMode).map((mode) => nativeModeString(mode, FileType.Binary))).toEqual([
      'rb',
      'wb',
      'ab',
      'rb+',
      'wb+',
      'ab+',
    ])
  })
})

describe('modeStringToFlags', () => {
  it('should translate the base modes', () => {
    expect(modeStringToFlags('r')).toBe(O_RDONLY)
    expect(modeStringToFlags('r+')).toBe(O_RDWR)
    expect(modeStringToFlags('w')).toBe(O_WRONLY | O_CREAT | O_TRUNC)
    expect(modeStringToFlags('w+')).toBe(O_RDWR | O_CREAT | O_TRUNC)
    expect(modeStringToFlags('a')).toBe(O_WRONLY | O_CREAT | O_APPEND)
    expect(modeStringToFlags('a+')).toBe(O_RDWR | O_CREAT | O_APPEND)
  })

  it('should accept modifiers in any order', () => {
    expect(modeStringToFlags('rb+')).toBe(O_RDWR)
    expect(modeStringToFlags('r+b')).toBe(O_RDWR)
    expect(modeStringToFlags('wx')).toBe(O_WRONLY | O_CREAT | O_TRUNC | O_EXCL)
  })

  it('should reject unknown strings', () => {
    expect(modeStringToFlags('')).toBeUndefined()
    expect(modeStringToFlags('q')).toBeUndefined()
    expect(modeStringToFlags('rz')).toBeUndefined()
  })
})

describe('mode predicates', () => {
  it('should classify access', () => {
    expect(Object.values(AccessMode).filter(isReadableMode)).toEqual(['read', 'read-extended', 'write-extended', 'append-extended'])
    expect(Object.values(AccessMode).filter(isWritableMode)).toEqual([
      'write',
      'append',
      'read-extended',
      'write-extended',
      'append-extended',
    ])
    expect(Object.values(AccessMode).filter(isAppendMode)).toEqual(['append', 'append-extended'])
  })
})

describe('tables', () => {
  it('should describe types and modes for operation names', () => {
    expect(FILE_TYPE_NAMES[FileType.Binary]).toBe('binary file')
    expect(ACCESS_MODE_DESCRIPTIONS[AccessMode.AppendExtended]).toBe('extended appending')
  })
})

describe('type guards', () => {
  it('should accept enumeration values only', () => {
    expect(isFileType('text')).toBe(true)
    expect(isFileType('TEXT')).toBe(false)
    expect(isAccessMode('read-extended')).toBe(true)
    expect(isAccessMode('toString')).toBe(false)
    expect(isAccessMode(1)).toBe(false)
    expect(isBufferMode(BufferMode.Line)).toBe(true)
    expect(isBufferMode('partial')).toBe(false)
    expect(isCharacterMode(CharacterMode.Unset)).toBe(true)
    expect(isCharacterMode(undefined)).toBe(false)
  })
})
