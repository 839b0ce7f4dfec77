// src/utils/checksum.ts

/**
 * Calculates the 16-bit additive packet checksum: the packet type, both length
 * bytes and every payload byte summed modulo 65536.
 * @param packetType - packet identifier byte
 * @param payload - packet contents without header and checksum
 * @returns checksum value (0-0xFFFF)
 */
export function packetChecksum(packetType: number, payload: Uint8Array): number {
  const length = payload.length + 2;
  let sum = (packetType & 0xff) + ((length >> 8) & 0xff) + (length & 0xff);
  for (const byte of payload) {
    sum += byte;
  }
  return sum & 0xffff;
}
