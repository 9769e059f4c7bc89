/**
 * printf-style formatting
 *
 * Supports the conversions `d i u o x X f F e E g G c s %` with the flags
 * `-`, `+`, space, `#` and `0`, a field width and a precision (either may be
 * `*`, taken from the argument list). Length modifiers (`hh h l ll j z t L q`)
 * are accepted; for unsigned conversions of negative values they select the
 * width the value wraps at (8, 16, 32 by default, or 64 bits).
 *
 * Compiled formats are cached, as most programs print a handful of formats
 * many times.
 *
 * @example
 * ```typescript
 * formatPrintf('%-6s|%5.2f|%#x', ['id', 3.14159, 255])
 * // 'id    | 3.14|0xff'
 * ```
 *
 * @module core/format/printf
 */

import { isScalarValue } from '../utf8.js'

// =============================================================================
// Types
// =============================================================================

/** A value printf can consume */
export type PrintfArgument = number | bigint | string

interface Flags {
  left: boolean
  plus: boolean
  space: boolean
  alternate: boolean
  zero: boolean
}

/** Field width or precision: a number, `*`, or absent */
type Amount = number | '*' | undefined

interface Conversion {
  kind: 'conversion'
  flags: Flags
  width: Amount
  precision: Amount
  /** Bits negative values wrap at for unsigned conversions */
  bits: number
  conversion: string
}

interface Literal {
  kind: 'literal'
  text: string
}

type Piece = Literal | Conversion

export interface PrintfOptions {
  /**
   * `%c` with a numeric argument prints a code point instead of a byte
   * (0-255), and `%s` precision counts code points instead of UTF-16 units.
   */
  wide?: boolean
}

// =============================================================================
// Format Compilation
// =============================================================================

const LENGTH_MODIFIER_BITS: ReadonlyMap<string, number> = new Map([
  ['hh', 8],
  ['h', 16],
  ['l', 64],
  ['ll', 64],
  ['j', 64],
  ['z', 64],
  ['t', 64],
  ['L', 64],
  ['q', 64],
])

const CONVERSIONS = new Set('diuoxXfFeEgGcs')

const MAX_CACHED_FORMATS = 256
const formatCache = new Map<string, readonly Piece[]>()

function readNumber(format: string, index: number): { value: number; next: number } {
  let next = index
  while (next < format.length && format.charCodeAt(next) >= 0x30 && format.charCodeAt(next) <= 0x39) {
    next++
  }
  return { value: next > index ? Number(format.slice(index, next)) : 0, next }
}

/**
 * Split a format into literal text and conversions. A `%` sequence that
 * names no known conversion is kept as literal text.
 */
function compile(format: string): readonly Piece[] {
  const pieces: Piece[] = []
  let literal = ''
  let i = 0

  while (i < format.length) {
    const char = format.charAt(i)
    if (char !== '%') {
      literal += char
      i++
      continue
    }

    const start = i
    i++
    if (format.charAt(i) === '%') {
      literal += '%'
      i++
      continue
    }

    const flags: Flags = { left: false, plus: false, space: false, alternate: false, zero: false }
    for (;;) {
      const flag = format.charAt(i)
      if (flag === '-') flags.left = true
      else if (flag === '+') flags.plus = true
      else if (flag === ' ') flags.space = true
      else if (flag === '#') flags.alternate = true
      else if (flag === '0') flags.zero = true
      else break
      i++
    }

    let width: Amount
    if (format.charAt(i) === '*') {
      width = '*'
      i++
    } else {
      const parsed = readNumber(format, i)
      width = parsed.next > i ? parsed.value : undefined
      i = parsed.next
    }

    let precision: Amount
    if (format.charAt(i) === '.') {
      i++
      if (format.charAt(i) === '*') {
        precision = '*'
        i++
      } else {
        const parsed = readNumber(format, i)
        precision = parsed.value
        i = parsed.next
      }
    }

    let bits = 32
    const twoChar = format.slice(i, i + 2)
    const oneChar = format.charAt(i)
    const modifier = LENGTH_MODIFIER_BITS.has(twoChar) ? twoChar : oneChar
    const modifierBits = LENGTH_MODIFIER_BITS.get(modifier)
    if (modifierBits !== undefined) {
      bits = modifierBits
      i += modifier.length
    }

    const conversion = format.charAt(i)
    if (!CONVERSIONS.has(conversion)) {
      literal += format.slice(start, i + 1)
      i++
      continue
    }
    i++

    if (literal !== '') {
      pieces.push({ kind: 'literal', text: literal })
      literal = ''
    }
    pieces.push({ kind: 'conversion', flags, width, precision, bits, conversion })
  }

  if (literal !== '') {
    pieces.push({ kind: 'literal', text: literal })
  }
  return pieces
}

function compileCached(format: string): readonly Piece[] {
  const cached = formatCache.get(format)
  if (cached !== undefined) {
    return cached
  }
  const pieces = compile(format)
  if (formatCache.size >= MAX_CACHED_FORMATS) {
    const oldest = formatCache.keys().next().value
    if (oldest !== undefined) {
      formatCache.delete(oldest)
    }
  }
  formatCache.set(format, pieces)
  return pieces
}

// =============================================================================
// Argument Coercion
// =============================================================================

function toInteger(value: PrintfArgument | undefined): bigint {
  if (typeof value === 'bigint') {
    return value
  }
  const number = typeof value === 'string' ? Number(value) : (value ?? 0)
  return Number.isFinite(number) ? BigInt(Math.trunc(number)) : 0n
}

function toFloat(value: PrintfArgument | undefined): number {
  if (typeof value === 'number') {
    return value
  }
  if (value === undefined) {
    return 0
  }
  return Number(value)
}

// =============================================================================
// Conversions
// =============================================================================

interface Field {
  /** Sign or radix prefix, kept left of zero padding */
  prefix: string
  body: string
  /** Zero padding allowed */
  numeric: boolean
}

function signOf(negative: boolean, flags: Flags): string {
  if (negative) return '-'
  if (flags.plus) return '+'
  if (flags.space) return ' '
  return ''
}

function formatInteger(piece: Conversion, value: bigint, precision: number | undefined): Field {
  const { conversion, flags } = piece
  const signed = conversion === 'd' || conversion === 'i'
  let magnitude = value
  let negative = false
  if (signed) {
    negative = value < 0n
    magnitude = negative ? -value : value
  } else if (value < 0n) {
    magnitude = BigInt.asUintN(piece.bits, value)
  }

  const radix = conversion === 'o' ? 8 : conversion === 'x' || conversion === 'X' ? 16 : 10
  let digits = precision === 0 && magnitude === 0n ? '' : magnitude.toString(radix)
  if (conversion === 'X') {
    digits = digits.toUpperCase()
  }
  if (precision !== undefined && digits.length < precision) {
    digits = digits.padStart(precision, '0')
  }

  let prefix = signed ? signOf(negative, flags) : ''
  if (flags.alternate) {
    if (conversion === 'o' && !digits.startsWith('0')) {
      digits = '0' + digits
    } else if (conversion === 'x' && magnitude !== 0n) {
      prefix = '0x'
    } else if (conversion === 'X' && magnitude !== 0n) {
      prefix = '0X'
    }
  }

  return { prefix, body: digits, numeric: precision === undefined }
}

// =============================================================================
// Exact Decimal Digits
// =============================================================================

/**
 * Split a finite, non-negative double into `mantissa * 2 ** exponent`.
 */
function decompose(value: number): { mantissa: bigint; exponent: number } {
  const view = new DataView(new ArrayBuffer(8))
  view.setFloat64(0, value)
  const bits = view.getBigUint64(0)
  const biased = Number((bits >> 52n) & 0x7ffn)
  const fraction = bits & 0xfffffffffffffn
  if (biased === 0) {
    return { mantissa: fraction, exponent: -1074 }
  }
  return { mantissa: fraction | (1n << 52n), exponent: biased - 1075 }
}

/**
 * `mantissa * 2 ** exponent * 10 ** power`, rounded to an integer with ties
 * to even.
 */
function roundScaled(mantissa: bigint, exponent: number, power: number): bigint {
  let numerator = mantissa
  let denominator = 1n
  if (exponent >= 0) {
    numerator <<= BigInt(exponent)
  } else {
    denominator <<= BigInt(-exponent)
  }
  if (power >= 0) {
    numerator *= 10n ** BigInt(power)
  } else {
    denominator *= 10n ** BigInt(-power)
  }

  const quotient = numerator / denominator
  const twiceRemainder = (numerator % denominator) * 2n
  if (twiceRemainder > denominator || (twiceRemainder === denominator && quotient % 2n === 1n)) {
    return quotient + 1n
  }
  return quotient
}

/**
 * The `precision + 1` significant digits of a value and its decimal
 * exponent, as `%e` prints them.
 */
function significantDigits(magnitude: number, precision: number): { digits: string; exponent: number } {
  const lower = 10n ** BigInt(precision)
  if (magnitude === 0) {
    return { digits: '0'.repeat(precision + 1), exponent: 0 }
  }

  const { mantissa, exponent: binaryExponent } = decompose(magnitude)
  const upper = lower * 10n
  // log10 can be off by one near powers of ten; the loop corrects it
  let exponent = Math.floor(Math.log10(magnitude))
  for (;;) {
    const scaled = roundScaled(mantissa, binaryExponent, precision - exponent)
    if (scaled === upper) {
      return { digits: lower.toString(), exponent: exponent + 1 }
    }
    if (scaled > upper) {
      exponent++
    } else if (scaled < lower) {
      exponent--
    } else {
      return { digits: scaled.toString(), exponent }
    }
  }
}

/**
 * Fixed notation from the exact value of the double.
 */
function toFixedNotation(magnitude: number, precision: number): string {
  const { mantissa, exponent } = decompose(magnitude)
  const digits = roundScaled(mantissa, exponent, precision).toString().padStart(precision + 1, '0')
  if (precision === 0) {
    return digits
  }
  return `${digits.slice(0, -precision)}.${digits.slice(-precision)}`
}

/**
 * Exponential notation with at least two exponent digits, as C prints it.
 */
function toExponentialNotation(magnitude: number, precision: number): string {
  const { digits, exponent } = significantDigits(magnitude, precision)
  const mantissa = precision > 0 ? `${digits.charAt(0)}.${digits.slice(1)}` : digits
  const sign = exponent < 0 ? '-' : '+'
  return `${mantissa}e${sign}${String(Math.abs(exponent)).padStart(2, '0')}`
}

function stripTrailingZeros(text: string): string {
  const exponentAt = text.indexOf('e')
  const mantissa = exponentAt === -1 ? text : text.slice(0, exponentAt)
  const exponent = exponentAt === -1 ? '' : text.slice(exponentAt)
  if (!mantissa.includes('.')) {
    return text
  }
  return mantissa.replace(/0+$/, '').replace(/\.$/, '') + exponent
}

function formatFloat(piece: Conversion, value: number, precision: number | undefined): Field {
  const { conversion, flags } = piece
  const upper = conversion === 'F' || conversion === 'E' || conversion === 'G'
  const negative = value < 0 || Object.is(value, -0)
  const prefix = signOf(negative, flags)
  const magnitude = Math.abs(value)

  if (!Number.isFinite(value)) {
    const text = Number.isNaN(value) ? 'nan' : 'inf'
    return { prefix: Number.isNaN(value) ? signOf(false, flags) : prefix, body: upper ? text.toUpperCase() : text, numeric: false }
  }

  let body: string
  const lower = conversion.toLowerCase()
  if (lower === 'f') {
    body = toFixedNotation(magnitude, precision ?? 6)
    if (flags.alternate && !body.includes('.')) {
      body += '.'
    }
  } else if (lower === 'e') {
    body = toExponentialNotation(magnitude, precision ?? 6)
    if (flags.alternate && !body.includes('.')) {
      body = body.replace('e', '.e')
    }
  } else {
    const significant = precision === undefined ? 6 : Math.max(precision, 1)
    const { exponent } = significantDigits(magnitude, significant - 1)
    if (exponent < significant && exponent >= -4) {
      body = toFixedNotation(magnitude, significant - 1 - exponent)
    } else {
      body = toExponentialNotation(magnitude, significant - 1)
    }
    if (flags.alternate) {
      if (!body.includes('.')) {
        body = body.includes('e') ? body.replace('e', '.e') : body + '.'
      }
    } else {
      body = stripTrailingZeros(body)
    }
  }

  return { prefix, body: upper ? body.toUpperCase() : body, numeric: true }
}

function formatCharacter(value: PrintfArgument | undefined, wide: boolean): string {
  if (typeof value === 'string') {
    return wide ? String.fromCodePoint(value.codePointAt(0) ?? 0) : value.charAt(0)
  }
  const code = Number(toInteger(value))
  if (!wide) {
    return String.fromCharCode(code & 0xff)
  }
  if (!isScalarValue(code)) {
    throw new RangeError(`%c argument is not a Unicode scalar value: ${code}`)
  }
  return String.fromCodePoint(code)
}

function truncate(text: string, precision: number | undefined, wide: boolean): string {
  if (precision === undefined) {
    return text
  }
  if (!wide) {
    return text.slice(0, precision)
  }
  return Array.from(text).slice(0, precision).join('')
}

function characterCount(text: string, wide: boolean): number {
  return wide ? Array.from(text).length : text.length
}

function pad(field: Field, flags: Flags, width: number, wide: boolean): string {
  const length = field.prefix.length + characterCount(field.body, wide)
  if (length >= width) {
    return field.prefix + field.body
  }
  const fill = width - length
  if (flags.left) {
    return field.prefix + field.body + ' '.repeat(fill)
  }
  if (flags.zero && field.numeric) {
    return field.prefix + '0'.repeat(fill) + field.body
  }
  return ' '.repeat(fill) + field.prefix + field.body
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Format arguments the way printf does. Missing arguments print as 0 or as
 * the empty string.
 */
export function formatPrintf(format: string, args: readonly PrintfArgument[], options: PrintfOptions = {}): string {
  const wide = options.wide ?? false
  let next = 0
  const take = (): PrintfArgument | undefined => args[next++]

  let output = ''
  for (const piece of compileCached(format)) {
    if (piece.kind === 'literal') {
      output += piece.text
      continue
    }

    const flags = { ...piece.flags }
    let width = 0
    if (piece.width === '*') {
      const requested = Number(toInteger(take()))
      if (requested < 0) {
        flags.left = true
      }
      width = Math.abs(requested)
    } else if (piece.width !== undefined) {
      width = piece.width
    }

    let precision: number | undefined
    if (piece.precision === '*') {
      const requested = Number(toInteger(take()))
      precision = requested < 0 ? undefined : requested
    } else {
      precision = piece.precision
    }

    let field: Field
    switch (piece.conversion) {
      case 'd':
      case 'i':
      case 'u':
      case 'o':
      case 'x':
      case 'X':
        field = formatInteger(piece, toInteger(take()), precision)
        break
      case 'c':
        field = { prefix: '', body: formatCharacter(take(), wide), numeric: false }
        break
      case 's':
        field = { prefix: '', body: truncate(String(take() ?? ''), precision, wide), numeric: false }
        break
      default:
        field = formatFloat(piece, toFloat(take()), precision)
    }

    output += pad(field, flags, width, wide)
  }

  return output
}
