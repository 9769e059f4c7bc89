/**
 * Single code point UTF-8 coding for the wide character family.
 *
 * Wide characters are Unicode scalar values stored in the file as UTF-8.
 * These helpers encode one scalar value, and decode one sequence from a
 * lead byte plus its continuation bytes, rejecting overlong forms,
 * surrogates and values past U+10FFFF.
 *
 * @module core/utf8
 */

/** Largest Unicode scalar value */
export const MAX_CODE_POINT = 0x10ffff

/**
 * Whether a number is a Unicode scalar value (a code point that is not a
 * surrogate).
 */
export function isScalarValue(codePoint: number): boolean {
  return (
    Number.isInteger(codePoint) &&
    codePoint >= 0 &&
    codePoint <= MAX_CODE_POINT &&
    (codePoint < 0xd800 || codePoint > 0xdfff)
  )
}

/**
 * Encode one scalar value.
 *
 * @returns the UTF-8 bytes, or undefined for a value that is not a scalar value
 *
 * @example
 * ```typescript
 * encodeCodePoint(0x41)    // Uint8Array [0x41]
 * encodeCodePoint(0x20ac)  // Uint8Array [0xe2, 0x82, 0xac]
 * encodeCodePoint(0xd800)  // undefined
 * ```
 */
export function encodeCodePoint(codePoint: number): Uint8Array | undefined {
  if (!isScalarValue(codePoint)) {
    return undefined
  }
  if (codePoint < 0x80) {
    return Uint8Array.of(codePoint)
  }
  if (codePoint < 0x800) {
    return Uint8Array.of(0xc0 | (codePoint >> 6), 0x80 | (codePoint & 0x3f))
  }
  if (codePoint < 0x10000) {
    return Uint8Array.of(0xe0 | (codePoint >> 12), 0x80 | ((codePoint >> 6) & 0x3f), 0x80 | (codePoint & 0x3f))
  }
  return Uint8Array.of(
    0xf0 | (codePoint >> 18),
    0x80 | ((codePoint >> 12) & 0x3f),
    0x80 | ((codePoint >> 6) & 0x3f),
    0x80 | (codePoint & 0x3f)
  )
}

/**
 * Length of the sequence a lead byte starts.
 *
 * @returns 1 to 4, or 0 when the byte cannot start a sequence
 */
export function sequenceLength(leadByte: number): number {
  if (leadByte < 0x80) return 1
  if (leadByte >= 0xc2 && leadByte <= 0xdf) return 2
  if (leadByte >= 0xe0 && leadByte <= 0xef) return 3
  if (leadByte >= 0xf0 && leadByte <= 0xf4) return 4
  return 0
}

/** Whether a byte is a continuation byte (10xxxxxx). */
export function isContinuationByte(byte: number): boolean {
  return (byte & 0xc0) === 0x80
}

/**
 * Decode one complete sequence.
 *
 * @returns the scalar value, or undefined for an invalid sequence
 *
 * @example
 * ```typescript
 * decodeSequence([0xe2, 0x82, 0xac]) // 0x20ac
 * decodeSequence([0xc0, 0x80])       // undefined (overlong)
 * ```
 */
export function decodeSequence(bytes: ArrayLike<number>): number | undefined {
  const lead = bytes[0]
  if (lead === undefined || sequenceLength(lead) !== bytes.length) {
    return undefined
  }
  if (bytes.length === 1) {
    return lead
  }

  let codePoint = lead & (0xff >> (bytes.length + 1))
  for (let i = 1; i < bytes.length; i++) {
    const byte = bytes[i]
    if (byte === undefined || !isContinuationByte(byte)) {
      return undefined
    }
    codePoint = (codePoint << 6) | (byte & 0x3f)
  }

  const minimum = bytes.length === 2 ? 0x80 : bytes.length === 3 ? 0x800 : 0x10000
  if (codePoint < minimum || !isScalarValue(codePoint)) {
    return undefined
  }
  return codePoint
}
