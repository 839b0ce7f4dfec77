// src/utils/utils.ts

const HEX_TABLE = '0123456789abcdef';

/**
 * Concatenates an array of Uint8Arrays into a single Uint8Array.
 * @param arrays - An array of Uint8Arrays to concatenate.
 * @returns A new Uint8Array containing all elements from the input arrays.
 */
export function concatUint8Arrays(arrays: Uint8Array[]): Uint8Array {
  const totalLength: number = arrays.reduce((sum: number, arr: Uint8Array) => sum + arr.length, 0);
  const result: Uint8Array = new Uint8Array(totalLength);
  let offset: number = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

/**
 * Reads a big-endian 16-bit unsigned integer.
 * @param buf - Source bytes.
 * @param offset - Position of the high byte.
 */
export function bytesToUint16BE(buf: Uint8Array, offset: number = 0): number {
  return new DataView(buf.buffer, buf.byteOffset, buf.byteLength).getUint16(offset, false);
}

/**
 * Reads a big-endian 32-bit unsigned integer.
 * @param buf - Source bytes.
 * @param offset - Position of the most significant byte.
 */
export function bytesToUint32BE(buf: Uint8Array, offset: number = 0): number {
  return new DataView(buf.buffer, buf.byteOffset, buf.byteLength).getUint32(offset, false);
}

/**
 * Returns a view on a slice of the input array (shared buffer).
 */
export function sliceUint8Array(arr: Uint8Array, start: number, end?: number): Uint8Array {
  return arr.subarray(start, end);
}

/**
 * Converts a Uint8Array to a hex string (lookup table).
 * @param uint8arr - The Uint8Array to convert.
 * @param separator - Inserted between bytes.
 */
export function toHex(uint8arr: Uint8Array, separator: string = ''): string {
  const parts: string[] = [];
  for (const b of uint8arr) {
    parts.push(HEX_TABLE.charAt((b >> 4) & 0xf) + HEX_TABLE.charAt(b & 0xf));
  }
  return parts.join(separator);
}

/**
 * Formats a byte as 0xNN.
 */
export function hexByte(value: number): string {
  return `0x${(value & 0xff).toString(16).padStart(2, '0')}`;
}

/**
 * Resolves after the given number of milliseconds.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
