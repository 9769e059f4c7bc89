/**
 * scanf-style parsing
 *
 * Reads characters from a {@link CharacterSource} under the control of a
 * format. Supports the conversions `d i u o x X f F e E g G a A s c [set] n %`
 * with `*` (parse but do not store) and a maximum field width. The 64-bit
 * length modifiers (`l ll j z t q`) make integer conversions produce a
 * `bigint`; other modifiers are accepted and ignored.
 *
 * Whitespace in the format skips any amount of whitespace in the input;
 * other characters must match exactly. Parsing stops at the first
 * mismatch, leaving the offending character unread.
 *
 * The result counts stored conversions. It is -1 when input ran out before
 * the first conversion completed, as scanf's EOF return.
 *
 * @module core/format/scanf
 */

import { END_OF_FILE } from '../constants.js'

// =============================================================================
// Types
// =============================================================================

/**
 * Where scanf reads characters from. Characters are byte values for byte
 * streams and code points for wide streams.
 */
export interface CharacterSource {
  /** Next character, or END_OF_FILE */
  read(): number
  /** Push a character back; the next read returns it */
  unread(char: number): void
}

/**
 * A converted value: numbers for numeric conversions and `%n`, bigints for
 * integers read with a 64-bit length modifier, text otherwise
 */
export type ScanValue = number | bigint | string

export interface ScanResult {
  /** Stored conversions, or -1 on input failure before the first one */
  count: number
  values: ScanValue[]
}

export interface ScanOptions {
  /** Characters are code points rather than bytes */
  wide?: boolean
}

// =============================================================================
// Character Classes
// =============================================================================

function isSpace(char: number): boolean {
  return char === 0x20 || (char >= 0x09 && char <= 0x0d)
}

function digitValue(char: number): number {
  if (char >= 0x30 && char <= 0x39) return char - 0x30
  if (char >= 0x61 && char <= 0x66) return char - 0x61 + 10
  if (char >= 0x41 && char <= 0x46) return char - 0x41 + 10
  return 99
}

function isDigitIn(char: number, radix: number): boolean {
  return char !== END_OF_FILE && digitValue(char) < radix
}

const LENGTH_MODIFIERS = ['hh', 'll', 'h', 'l', 'j', 'z', 't', 'L', 'q']

/** Modifiers whose integer conversions are read as bigint */
const WIDE_INTEGER_MODIFIERS = new Set(['l', 'll', 'j', 'z', 't', 'q'])

// =============================================================================
// Reader
// =============================================================================

/**
 * Tracks consumed characters (for `%n` and for backing out of a partial
 * match) over a character source.
 */
class Reader {
  consumed = 0

  constructor(
    private readonly source: CharacterSource,
    private readonly wide: boolean
  ) {}

  read(): number {
    const char = this.source.read()
    if (char !== END_OF_FILE) {
      this.consumed++
    }
    return char
  }

  unread(char: number): void {
    if (char !== END_OF_FILE) {
      this.source.unread(char)
      this.consumed--
    }
  }

  /** Push back characters read since a mark, most recent first */
  unreadAll(chars: readonly number[]): void {
    for (let i = chars.length - 1; i >= 0; i--) {
      const char = chars[i]
      if (char !== undefined) {
        this.unread(char)
      }
    }
  }

  /** Skip whitespace; returns false when input ended */
  skipSpace(): boolean {
    for (;;) {
      const char = this.read()
      if (char === END_OF_FILE) {
        return false
      }
      if (!isSpace(char)) {
        this.unread(char)
        return true
      }
    }
  }

  text(chars: readonly number[]): string {
    return chars.map((char) => (this.wide ? String.fromCodePoint(char) : String.fromCharCode(char))).join('')
  }
}

/**
 * Reads characters while a predicate accepts them, up to a width. The
 * predicate sees the characters taken so far.
 */
function takeWhile(reader: Reader, width: number, accept: (char: number, taken: readonly number[]) => boolean): number[] {
  const taken: number[] = []
  while (taken.length < width) {
    const char = reader.read()
    if (char === END_OF_FILE) {
      break
    }
    if (!accept(char, taken)) {
      reader.unread(char)
      break
    }
    taken.push(char)
  }
  return taken
}

// =============================================================================
// Numeric Conversions
// =============================================================================

function toBigInt(digits: string, base: number): bigint {
  const prefix = base === 16 ? '0x' : base === 8 ? '0o' : ''
  return BigInt(prefix + digits)
}

/**
 * Integer in a radix (0 picks it from the prefix as `%i` does).
 *
 * @param exact - produce a bigint, keeping every digit
 * @returns the value, or undefined on a matching failure (nothing consumed)
 */
function scanInteger(reader: Reader, width: number, radix: number, exact: boolean): number | bigint | undefined {
  const taken: number[] = []
  const next = (): number => {
    if (taken.length >= width) {
      return END_OF_FILE
    }
    const char = reader.read()
    if (char !== END_OF_FILE) {
      taken.push(char)
    }
    return char
  }
  const back = (char: number): void => {
    if (char !== END_OF_FILE) {
      taken.pop()
      reader.unread(char)
    }
  }

  let negative = false
  let char = next()
  if (char === 0x2b || char === 0x2d) {
    negative = char === 0x2d
    char = next()
  }

  let base = radix
  let digits = ''
  if ((base === 0 || base === 16) && char === 0x30) {
    const after = next()
    if (after === 0x78 || after === 0x58) {
      const first = next()
      if (isDigitIn(first, 16)) {
        base = 16
        char = first
      } else {
        // "0x" with no hex digit: the value is the 0
        back(first)
        back(after)
        return exact ? 0n : 0
      }
    } else {
      back(after)
      if (base === 0) {
        base = 8
      }
      digits = '0'
      char = next()
    }
  }
  if (base === 0) {
    base = 10
  }

  while (isDigitIn(char, base)) {
    digits += String.fromCharCode(char)
    char = next()
  }
  back(char)

  if (digits === '') {
    reader.unreadAll(taken)
    return undefined
  }
  if (exact) {
    const value = toBigInt(digits, base)
    return negative ? -value : value
  }
  const value = parseInt(digits, base)
  return negative ? -value : value
}

const INFINITY_WORD = 'infinity'
const NAN_WORD = 'nan'

/**
 * Longest prefix of the taken characters that forms a decimal or
 * hexadecimal float, inf or nan.
 */
function floatPrefixLength(text: string): number {
  const match =
    /^[+-]?(?:0[xX](?:[0-9a-fA-F]+\.?[0-9a-fA-F]*|\.[0-9a-fA-F]+)(?:[pP][+-]?\d+)?|(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?|[iI][nN][fF](?:[iI][nN][iI][tT][yY])?|[nN][aA][nN])/.exec(
      text
    )
  return match === null ? 0 : match[0].length
}

function parseHexFloat(text: string): number {
  const negative = text.startsWith('-')
  const body = text.replace(/^[+-]?0[xX]/, '')
  const [mantissa = '', exponent = '0'] = body.split(/[pP]/)
  const [whole = '', fraction = ''] = mantissa.split('.')
  let value = whole === '' ? 0 : parseInt(whole, 16)
  for (let i = 0; i < fraction.length; i++) {
    value += parseInt(fraction.charAt(i), 16) / 16 ** (i + 1)
  }
  value *= 2 ** Number(exponent)
  return negative ? -value : value
}

function parseFloatText(text: string): number {
  const unsigned = text.replace(/^[+-]/, '').toLowerCase()
  const negative = text.startsWith('-')
  if (unsigned.startsWith('inf')) {
    return negative ? -Infinity : Infinity
  }
  if (unsigned === NAN_WORD) {
    return NaN
  }
  if (unsigned.startsWith('0x')) {
    return parseHexFloat(text)
  }
  return Number(text)
}

/**
 * Floating-point number in any of the forms strtod accepts.
 */
function scanFloat(reader: Reader, width: number): number | undefined {
  const letters = 'xXpPeE.+-' + INFINITY_WORD + INFINITY_WORD.toUpperCase() + NAN_WORD + NAN_WORD.toUpperCase()
  const taken = takeWhile(reader, width, (char) => char < 0x80 && (digitValue(char) < 16 || letters.includes(String.fromCharCode(char))))
  const text = taken.map((char) => String.fromCharCode(char)).join('')
  const length = floatPrefixLength(text)
  reader.unreadAll(taken.slice(length))
  if (length === 0) {
    return undefined
  }
  return parseFloatText(text.slice(0, length))
}

// =============================================================================
// Scan Sets
// =============================================================================

interface ScanSet {
  negated: boolean
  members: (char: number) => boolean
  /** Index in the format just past the closing bracket */
  end: number
}

/**
 * Parse `[...]` starting just after the `[`. A `]` right after `[` or `[^`
 * is a member; `a-z` is a range unless `-` is first or last.
 */
function parseScanSet(format: string, start: number): ScanSet {
  let i = start
  let negated = false
  if (format.charAt(i) === '^') {
    negated = true
    i++
  }

  const singles = new Set<number>()
  const ranges: Array<[number, number]> = []
  let first = true
  while (i < format.length && (first || format.charAt(i) !== ']')) {
    const low = format.codePointAt(i) ?? 0
    const width = low > 0xffff ? 2 : 1
    if (format.charAt(i + width) === '-' && i + width + 1 < format.length && format.charAt(i + width + 1) !== ']') {
      const high = format.codePointAt(i + width + 1) ?? 0
      ranges.push([low, high])
      i += width + 1 + (high > 0xffff ? 2 : 1)
    } else {
      singles.add(low)
      i += width
    }
    first = false
  }

  const members = (char: number): boolean => singles.has(char) || ranges.some(([low, high]) => char >= low && char <= high)
  return { negated, members, end: i + 1 }
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Parse input from a character source under a scanf format.
 *
 * @example
 * ```typescript
 * const result = scanFormat(source, '%d %s')
 * // input "42 apples" -> { count: 2, values: [42, 'apples'] }
 * ```
 */
export function scanFormat(source: CharacterSource, format: string, options: ScanOptions = {}): ScanResult {
  const reader = new Reader(source, options.wide ?? false)
  const values: ScanValue[] = []
  let count = 0
  const inputFailure = (): ScanResult => ({ count: count === 0 ? -1 : count, values })

  let i = 0
  while (i < format.length) {
    const formatChar = format.codePointAt(i) ?? 0
    const formatCharWidth = formatChar > 0xffff ? 2 : 1

    if (isSpace(formatChar)) {
      reader.skipSpace()
      i += formatCharWidth
      continue
    }

    if (formatChar !== 0x25 || format.charAt(i + 1) === '%') {
      if (formatChar === 0x25) {
        i++
        if (!reader.skipSpace()) {
          return inputFailure()
        }
      }
      const char = reader.read()
      if (char === END_OF_FILE) {
        return inputFailure()
      }
      if (char !== formatChar) {
        reader.unread(char)
        return { count, values }
      }
      i += formatCharWidth
      continue
    }

    // Conversion specification
    i++
    let suppress = false
    if (format.charAt(i) === '*') {
      suppress = true
      i++
    }
    let widthText = ''
    while (/\d/.test(format.charAt(i))) {
      widthText += format.charAt(i)
      i++
    }
    const width = widthText === '' ? Infinity : Number(widthText)
    const modifier = LENGTH_MODIFIERS.find((candidate) => format.startsWith(candidate, i))
    if (modifier !== undefined) {
      i += modifier.length
    }

    const conversion = format.charAt(i)
    i++
    const store = (value: ScanValue): void => {
      if (!suppress) {
        values.push(value)
        count++
      }
    }

    if (conversion === 'n') {
      if (!suppress) {
        values.push(reader.consumed)
      }
      continue
    }

    if (conversion !== 'c' && conversion !== '[') {
      if (!reader.skipSpace()) {
        return inputFailure()
      }
    }

    switch (conversion) {
      case 'd':
      case 'i':
      case 'u':
      case 'o':
      case 'x':
      case 'X': {
        const radix = conversion === 'i' ? 0 : conversion === 'o' ? 8 : conversion === 'x' || conversion === 'X' ? 16 : 10
        const exact = modifier !== undefined && WIDE_INTEGER_MODIFIERS.has(modifier)
        const value = scanInteger(reader, width, radix, exact)
        if (value === undefined) {
          return { count, values }
        }
        store(value)
        break
      }
      case 'f':
      case 'F':
      case 'e':
      case 'E':
      case 'g':
      case 'G':
      case 'a':
      case 'A': {
        const value = scanFloat(reader, width)
        if (value === undefined) {
          return { count, values }
        }
        store(value)
        break
      }
      case 's': {
        const taken = takeWhile(reader, width, (char) => !isSpace(char))
        store(reader.text(taken))
        break
      }
      case 'c': {
        const wanted = width === Infinity ? 1 : width
        const taken = takeWhile(reader, wanted, () => true)
        if (taken.length < wanted) {
          return inputFailure()
        }
        store(reader.text(taken))
        break
      }
      case '[': {
        const set = parseScanSet(format, i)
        i = set.end
        const probe = reader.read()
        if (probe === END_OF_FILE) {
          return inputFailure()
        }
        reader.unread(probe)
        const taken = takeWhile(reader, width, (char) => set.members(char) !== set.negated)
        if (taken.length === 0) {
          return { count, values }
        }
        store(reader.text(taken))
        break
      }
      default:
        // Unknown conversion: stop as a matching failure
        return { count, values }
    }
  }

  return { count, values }
}

