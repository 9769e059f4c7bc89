/**
 * Argument checks shared by the file objects.
 *
 * Bad arguments are programming errors, so they throw TypeError or
 * RangeError rather than a FileError.
 *
 * @module core/arguments
 */

/**
 * Bytes of any typed array or DataView, sharing its memory.
 */
export function viewBytes(view: ArrayBufferView): Uint8Array {
  if (view instanceof Uint8Array) {
    return view
  }
  return new Uint8Array(view.buffer, view.byteOffset, view.byteLength)
}

/**
 * @throws {TypeError} If the value is not a safe integer
 */
export function requireInteger(value: number, name: string): number {
  if (!Number.isSafeInteger(value)) {
    throw new TypeError(`${name} must be a safe integer, got ${value}`)
  }
  return value
}

/**
 * @throws {TypeError} If the value is not a safe integer
 * @throws {RangeError} If the value is negative
 */
export function requireNonNegative(value: number, name: string): number {
  requireInteger(value, name)
  if (value < 0) {
    throw new RangeError(`${name} must not be negative, got ${value}`)
  }
  return value
}

/**
 * Check a byte count against the buffer that must hold it.
 *
 * @throws {RangeError} If the buffer is smaller than the count
 */
export function requireCapacity(bytes: Uint8Array, byteCount: number, name: string): void {
  if (byteCount > bytes.byteLength) {
    throw new RangeError(`${name} needs ${byteCount} bytes but the buffer holds ${bytes.byteLength}`)
  }
}
