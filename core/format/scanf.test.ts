import { describe, it, expect } from 'vitest'
import { END_OF_FILE } from '../constants.js'
import { formatPrintf } from './printf.js'
import { scanFormat, type CharacterSource } from './scanf.js'

/**
 * A character source over a string that can report what is left unread.
 */
function sourceOf(text: string, wide = false): CharacterSource & { rest(): string } {
  const chars = wide ? Array.from(text, (char) => char.codePointAt(0) ?? 0) : Array.from(text, (char) => char.charCodeAt(0))
  let index = 0
  const pushed: number[] = []
  return {
    read: () => pushed.pop() ?? (index < chars.length ? chars[index++] : END_OF_FILE),
    unread: (char) => {
      pushed.push(char)
    },
    rest: () => [...pushed].reverse().concat(chars.slice(index)).map((char) => String.fromCodePoint(char)).join(''),
  }
}

describe('scanFormat', () => {
  it('should convert several fields', () => {
    expect(scanFormat(sourceOf('42 apples'), '%d %s')).toEqual({ count: 2, values: [42, 'apples'] })
  })

  it('should leave the first unconverted character unread', () => {
    const source = sourceOf('  -17x')
    expect(scanFormat(source, '%d')).toEqual({ count: 1, values: [-17] })
    expect(source.rest()).toBe('x')
  })

  it('should return -1 when input ends before the first conversion', () => {
    expect(scanFormat(sourceOf(''), '%d')).toEqual({ count: -1, values: [] })
    expect(scanFormat(sourceOf('   '), '%s')).toEqual({ count: -1, values: [] })
  })

  it('should keep the count when input ends after a conversion', () => {
    expect(scanFormat(sourceOf('5'), '%d %d')).toEqual({ count: 1, values: [5] })
  })

  it('should stop at a literal mismatch', () => {
    const source = sourceOf('a5c')
    expect(scanFormat(source, 'a%db')).toEqual({ count: 1, values: [5] })
    expect(source.rest()).toBe('c')
  })

  it('should match a literal percent sign', () => {
    expect(scanFormat(sourceOf('  %7'), '%%%d')).toEqual({ count: 1, values: [7] })
  })

  describe('integers', () => {
    it('should detect the base for %i', () => {
      expect(scanFormat(sourceOf('0x1f'), '%i').values).toEqual([31])
      expect(scanFormat(sourceOf('017'), '%i').values).toEqual([15])
      expect(scanFormat(sourceOf('12'), '%i').values).toEqual([12])
    })

    it('should read 0 from a bare 0x prefix', () => {
      const source = sourceOf('0x')
      expect(scanFormat(source, '%i')).toEqual({ count: 1, values: [0] })
      expect(source.rest()).toBe('x')
    })

    it('should read hex and octal', () => {
      expect(scanFormat(sourceOf('ff 777'), '%x %o').values).toEqual([255, 511])
    })

    it('should honour the field width', () => {
      const source = sourceOf('12345')
      expect(scanFormat(source, '%3d').values).toEqual([123])
      expect(source.rest()).toBe('45')
    })

    it('should back out of a sign without digits', () => {
      const source = sourceOf('-x')
      expect(scanFormat(source, '%d')).toEqual({ count: 0, values: [] })
      expect(source.rest()).toBe('-x')
    })

    it('should read 64-bit conversions as bigint without losing digits', () => {
      expect(scanFormat(sourceOf('9007199254740993'), '%lld')).toEqual({ count: 1, values: [9007199254740993n] })
      expect(scanFormat(sourceOf('ffffffffffffffff'), '%jx')).toEqual({ count: 1, values: [18446744073709551615n] })
      expect(scanFormat(sourceOf('-0x10'), '%li')).toEqual({ count: 1, values: [-16n] })
      expect(scanFormat(sourceOf('7'), '%hd')).toEqual({ count: 1, values: [7] })
    })

    it('should read back what printf wrote with the same format', () => {
      const format = '%lld %llu'
      const printed = formatPrintf(format, [-9007199254740993n, 18446744073709551615n])

      expect(printed).toBe('-9007199254740993 18446744073709551615')
      expect(scanFormat(sourceOf(printed), format).values).toEqual([-9007199254740993n, 18446744073709551615n])
    })
  })

  describe('floating point', () => {
    it('should keep the longest valid prefix', () => {
      const source = sourceOf('3.25e2xyz')
      expect(scanFormat(source, '%f').values).toEqual([325])
      expect(source.rest()).toBe('xyz')
    })

    it('should read inf and nan', () => {
      expect(scanFormat(sourceOf('inf -nan'), '%f %f').values).toEqual([Infinity, NaN])
    })

    it('should read hexadecimal floats', () => {
      expect(scanFormat(sourceOf('0x1.8p1'), '%a').values).toEqual([3])
    })

    it('should report a matching failure for non-numbers', () => {
      const source = sourceOf('abc')
      expect(scanFormat(source, '%f')).toEqual({ count: 0, values: [] })
      expect(source.rest()).toBe('abc')
    })
  })

  describe('text', () => {
    it('should read characters without skipping whitespace', () => {
      expect(scanFormat(sourceOf(' x'), '%c').values).toEqual([' '])
    })

    it('should fail when %c gets fewer characters than its width', () => {
      expect(scanFormat(sourceOf('ab'), '%3c')).toEqual({ count: -1, values: [] })
    })

    it('should read scan sets', () => {
      expect(scanFormat(sourceOf('hello World'), '%[a-z]').values).toEqual(['hello'])
      expect(scanFormat(sourceOf('key,5'), '%[^,],%d')).toEqual({ count: 2, values: ['key', 5] })
    })

    it('should treat a leading ] as a set member', () => {
      expect(scanFormat(sourceOf(']]x'), '%[]]').values).toEqual([']]'])
    })

    it('should report an empty scan set match as a matching failure', () => {
      expect(scanFormat(sourceOf('123'), '%[a-z]')).toEqual({ count: 0, values: [] })
    })

    it('should read code points in wide mode', () => {
      expect(scanFormat(sourceOf('žluť kůň', true), '%s %s', { wide: true }).values).toEqual(['žluť', 'kůň'])
    })
  })

  describe('suppression and %n', () => {
    it('should parse but not store suppressed conversions', () => {
      expect(scanFormat(sourceOf('1 2'), '%*d %d')).toEqual({ count: 1, values: [2] })
    })

    it('should store the consumed count for %n without counting it', () => {
      expect(scanFormat(sourceOf('  123'), '%d%n')).toEqual({ count: 1, values: [123, 5] })
    })
  })
})
