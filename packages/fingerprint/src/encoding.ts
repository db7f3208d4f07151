/**
 * Byte encoding for signature input
 *
 * - String field: u32 LE byte length + UTF-8 bytes
 * - Count field: u32 LE
 *
 * Every string is length-prefixed, so no two different field sequences
 * can produce the same byte stream.
 */

import { MAX_U32 } from "./constants.ts";

const textEncoder = new TextEncoder();

/**
 * Encode an unsigned 32-bit integer (little-endian)
 */
export function encodeCount(value: number): Uint8Array {
  if (!Number.isInteger(value) || value < 0 || value > MAX_U32) {
    throw new RangeError(`Count out of range: ${value}`);
  }

  const result = new Uint8Array(4);
  new DataView(result.buffer).setUint32(0, value, true);
  return result;
}

/**
 * Encode a string as a length-prefixed field (u32 LE length + utf8 bytes)
 */
export function encodeField(str: string): Uint8Array {
  const utf8 = textEncoder.encode(str);
  const result = new Uint8Array(4 + utf8.length);
  new DataView(result.buffer).setUint32(0, utf8.length, true);
  result.set(utf8, 4);
  return result;
}

/**
 * Order two strings by their UTF-8 bytes. Differs from `<` on UTF-16 code
 * units when astral characters meet BMP characters above U+E000.
 */
export function compareUtf8(a: string, b: string): number {
  const left = textEncoder.encode(a);
  const right = textEncoder.encode(b);
  const length = Math.min(left.length, right.length);
  for (let i = 0; i < length; i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) {
      return diff;
    }
  }
  return left.length - right.length;
}

/**
 * Concatenate multiple Uint8Arrays
 */
export function concatBytes(...arrays: Uint8Array[]): Uint8Array {
  const totalLength = arrays.reduce((sum, a) => sum + a.length, 0);
  const result = new Uint8Array(totalLength);

  let offset = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }

  return result;
}

/**
 * Convert bytes to hex string
 */
export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, "0"))
    .join("");
}
