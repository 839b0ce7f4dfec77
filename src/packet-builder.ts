// src/packet-builder.ts

import {
  CHECKSUM_SIZE,
  DEFAULT_ADDRESS,
  HEADER_SIZE,
  START_CODE,
} from './constants/constants.js';
import {
  SensorChecksumError,
  SensorInvalidLengthError,
  SensorMalformedHeaderError,
} from './errors.js';
import { packetChecksum } from './utils/checksum.js';
import { bytesToUint16BE, bytesToUint32BE, sliceUint8Array, toHex } from './utils/utils.js';
import { Packet, PacketHeader } from './types/sensor-types.js';

/** Largest payload whose length still fits the 16-bit length field */
export const MAX_PAYLOAD_SIZE = 0xffff - CHECKSUM_SIZE;

/**
 * Serializes a packet:
 * `EF01 | address(4) | type(1) | length(2) | payload | checksum(2)`, big-endian,
 * where `length = payload.length + 2`.
 * @param packetType - packet identifier byte
 * @param payload - packet contents
 * @param address - module address (default 0xFFFFFFFF)
 * @throws RangeError for a type, address or payload size that does not fit the frame
 */
function buildPacket(
  packetType: number,
  payload: Uint8Array,
  address: number = DEFAULT_ADDRESS
): Uint8Array {
  if (!Number.isInteger(packetType) || packetType < 0 || packetType > 0xff) {
    throw new RangeError(`Packet type must be 0-255, got ${packetType}`);
  }
  if (!Number.isInteger(address) || address < 0 || address > 0xffffffff) {
    throw new RangeError(`Address must be a 32-bit unsigned integer, got ${address}`);
  }
  if (payload.length > MAX_PAYLOAD_SIZE) {
    throw new RangeError(`Payload must be at most ${MAX_PAYLOAD_SIZE} bytes, got ${payload.length}`);
  }

  const length = payload.length + CHECKSUM_SIZE;
  const frame = new Uint8Array(HEADER_SIZE + length);
  const view = new DataView(frame.buffer);

  view.setUint16(0, START_CODE, false);
  view.setUint32(2, address, false);
  view.setUint8(6, packetType);
  view.setUint16(7, length, false);
  frame.set(payload, HEADER_SIZE);
  view.setUint16(HEADER_SIZE + payload.length, packetChecksum(packetType, payload), false);

  return frame;
}

/**
 * Parses the fixed 9-byte header.
 * @param header - exactly HEADER_SIZE bytes
 * @param expectedAddress - when given, a header naming another address is rejected
 * @throws SensorMalformedHeaderError on a wrong start marker or address
 * @throws SensorInvalidLengthError when the declared length cannot hold the checksum
 */
function parsePacketHeader(header: Uint8Array, expectedAddress?: number): PacketHeader {
  if (header.length !== HEADER_SIZE) {
    throw new SensorMalformedHeaderError(
      `Packet header must be ${HEADER_SIZE} bytes, got ${header.length}`
    );
  }

  const start = bytesToUint16BE(header, 0);
  if (start !== START_CODE) {
    throw new SensorMalformedHeaderError(
      `Bad start code 0x${start.toString(16).padStart(4, '0')} (expected 0xef01) in header ${toHex(header, ' ')}`
    );
  }

  const address = bytesToUint32BE(header, 2);
  if (expectedAddress !== undefined && address !== expectedAddress) {
    throw new SensorMalformedHeaderError(
      `Address mismatch: expected 0x${expectedAddress.toString(16)}, got 0x${address.toString(16)}`
    );
  }

  const length = bytesToUint16BE(header, 7);
  if (length < CHECKSUM_SIZE) {
    throw new SensorInvalidLengthError(`Invalid length ${length} in packet header`);
  }

  return { address, packetType: header[6] ?? 0, length };
}

/**
 * Validates a received packet and splits it into fields.
 * @param header - the 9 header bytes
 * @param body - exactly `length` bytes: payload followed by the checksum
 * @param expectedAddress - optional address the packet must carry
 * @returns the decoded packet; nothing is returned for a corrupt or truncated frame
 */
function parsePacket(header: Uint8Array, body: Uint8Array, expectedAddress?: number): Packet {
  const { address, packetType, length } = parsePacketHeader(header, expectedAddress);

  if (body.length !== length) {
    throw new SensorInvalidLengthError(
      `Packet body is ${body.length} bytes, header declares ${length}`
    );
  }

  const payloadLength = length - CHECKSUM_SIZE;
  const payload = sliceUint8Array(body, 0, payloadLength).slice();
  const received = bytesToUint16BE(body, payloadLength);
  const calculated = packetChecksum(packetType, payload);

  if (received !== calculated) {
    throw new SensorChecksumError(received, calculated);
  }

  return Object.freeze({ address, packetType, payload, checksum: received });
}

/**
 * Splits a complete frame (header + body) and parses it.
 */
function parseFrame(frame: Uint8Array, expectedAddress?: number): Packet {
  if (frame.length < HEADER_SIZE) {
    throw new SensorInvalidLengthError(
      `Frame is ${frame.length} bytes, shorter than the ${HEADER_SIZE}-byte header`
    );
  }
  return parsePacket(
    sliceUint8Array(frame, 0, HEADER_SIZE),
    sliceUint8Array(frame, HEADER_SIZE),
    expectedAddress
  );
}

export { buildPacket, parsePacketHeader, parsePacket, parseFrame };
