/**
 * Buffer utilities for working with Uint8Array.
 */

/**
 * Concatenate multiple Uint8Arrays into a single Uint8Array.
 */
export function concatBytes(arrays: Uint8Array[]): Uint8Array {
  const totalLength = arrays.reduce((sum, arr) => sum + arr.length, 0);
  const result = new Uint8Array(totalLength);

  let offset = 0;

  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }

  return result;
}

/**
 * Convert bytes to uppercase hex string.
 *
 * @example
 * ```ts
 * bytesToHex(new Uint8Array([72, 101, 108, 108, 111])) // "48656C6C6F"
 * ```
 */
export function bytesToHex(bytes: Uint8Array): string {
  let hex = "";

  for (const byte of bytes) {
    hex += byte.toString(16).toUpperCase().padStart(2, "0");
  }

  return hex;
}

/**
 * Byte-wise equality.
 */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }

  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) {
      return false;
    }
  }

  return true;
}
