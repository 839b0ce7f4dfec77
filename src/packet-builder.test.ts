import { describe, it, expect } from 'vitest';
import { buildPacket, parseFrame, parsePacket, parsePacketHeader } from './packet-builder.js';
import { packetChecksum } from './utils/checksum.js';
import { DEFAULT_ADDRESS, PacketType } from './constants/constants.js';
import {
  SensorChecksumError,
  SensorError,
  SensorInvalidLengthError,
  SensorMalformedHeaderError,
} from './errors.js';

describe('buildPacket', () => {
  it('encodes a GenImg command for the default address', () => {
    const frame = buildPacket(PacketType.COMMAND, new Uint8Array([0x01]));
    expect(Array.from(frame)).toEqual([
      0xef, 0x01, 0xff, 0xff, 0xff, 0xff, 0x01, 0x00, 0x03, 0x01, 0x00, 0x05,
    ]);
  });

  it('writes the address big-endian', () => {
    const frame = buildPacket(PacketType.ACKNOWLEDGE, new Uint8Array([0x00]), 0x12345678);
    expect(Array.from(frame.subarray(2, 6))).toEqual([0x12, 0x34, 0x56, 0x78]);
  });

  it('encodes an empty payload with length 2', () => {
    const frame = buildPacket(PacketType.END_OF_DATA, new Uint8Array(0));
    expect(Array.from(frame)).toEqual([
      0xef, 0x01, 0xff, 0xff, 0xff, 0xff, 0x08, 0x00, 0x02, 0x00, 0x0a,
    ]);
  });

  it('rejects a packet type that is not a byte', () => {
    expect(() => buildPacket(0x100, new Uint8Array(0))).toThrow(RangeError);
  });

  it('rejects an address outside 32 bits', () => {
    expect(() => buildPacket(PacketType.COMMAND, new Uint8Array([1]), 2 ** 32)).toThrow(RangeError);
  });
});

describe('packetChecksum', () => {
  it('wraps at 16 bits', () => {
    // 0x02 + 0x01 + 0x2e + 300 * 0xff = 76549
    expect(packetChecksum(PacketType.DATA, new Uint8Array(300).fill(0xff))).toBe(76549 - 65536);
  });
});

describe('parseFrame', () => {
  it('returns the type and payload that were encoded', () => {
    const payload = new Uint8Array([0x10, 0x20, 0x30, 0xff]);
    const packet = parseFrame(buildPacket(PacketType.DATA, payload));
    expect(packet.packetType).toBe(PacketType.DATA);
    expect(packet.address).toBe(DEFAULT_ADDRESS);
    expect(Array.from(packet.payload)).toEqual([0x10, 0x20, 0x30, 0xff]);
    expect(packet.checksum).toBe(0x02 + 0x06 + 0x10 + 0x20 + 0x30 + 0xff);
  });

  it('reports a checksum mismatch with both values', () => {
    const frame = buildPacket(PacketType.ACKNOWLEDGE, new Uint8Array([0x00]));
    frame[frame.length - 1] = 0x00;
    try {
      parseFrame(frame);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(SensorChecksumError);
      if (err instanceof SensorChecksumError) {
        expect(err.received).toBe(0x0000);
        expect(err.calculated).toBe(0x000a);
        expect(err.message).toBe('Checksum mismatch: received 0x0000, calculated 0x000a');
      }
    }
  });

  it('rejects a frame shorter than a header', () => {
    expect(() => parseFrame(new Uint8Array([0xef, 0x01, 0xff]))).toThrow(SensorInvalidLengthError);
  });

  it('rejects any single-bit corruption', () => {
    const original = buildPacket(PacketType.ACKNOWLEDGE, new Uint8Array([0x00, 0x11, 0x22]));
    for (let bit = 0; bit < original.length * 8; bit++) {
      const corrupted = original.slice();
      corrupted[bit >> 3] = (corrupted[bit >> 3] ?? 0) ^ (1 << (bit & 7));
      expect(() => parseFrame(corrupted, DEFAULT_ADDRESS), `bit ${bit}`).toThrow(SensorError);
    }
  });

  it('classifies corruption by field', () => {
    const original = buildPacket(PacketType.ACKNOWLEDGE, new Uint8Array([0x00, 0x11, 0x22]));
    const flip = (index: number, mask: number): Uint8Array => {
      const copy = original.slice();
      copy[index] = (copy[index] ?? 0) ^ mask;
      return copy;
    };

    expect(() => parseFrame(flip(0, 0x01), DEFAULT_ADDRESS)).toThrow(SensorMalformedHeaderError);
    expect(() => parseFrame(flip(4, 0x80), DEFAULT_ADDRESS)).toThrow(SensorMalformedHeaderError);
    expect(() => parseFrame(flip(6, 0x01), DEFAULT_ADDRESS)).toThrow(SensorChecksumError);
    expect(() => parseFrame(flip(8, 0x02), DEFAULT_ADDRESS)).toThrow(SensorInvalidLengthError);
    expect(() => parseFrame(flip(10, 0x40), DEFAULT_ADDRESS)).toThrow(SensorChecksumError);
  });

  it('accepts any address when none is expected', () => {
    const packet = parseFrame(buildPacket(PacketType.ACKNOWLEDGE, new Uint8Array([0]), 0x01020304));
    expect(packet.address).toBe(0x01020304);
  });
});

describe('parsePacketHeader', () => {
  it('rejects a declared length below 2', () => {
    const header = new Uint8Array([0xef, 0x01, 0xff, 0xff, 0xff, 0xff, 0x07, 0x00, 0x01]);
    expect(() => parsePacketHeader(header)).toThrow(SensorInvalidLengthError);
  });

  it('rejects a header of the wrong size', () => {
    expect(() => parsePacketHeader(new Uint8Array(8))).toThrow(SensorMalformedHeaderError);
  });

  it('reads the declared length', () => {
    const header = new Uint8Array([0xef, 0x01, 0xff, 0xff, 0xff, 0xff, 0x02, 0x00, 0x82]);
    expect(parsePacketHeader(header)).toEqual({
      address: DEFAULT_ADDRESS,
      packetType: PacketType.DATA,
      length: 0x82,
    });
  });
});

describe('parsePacket', () => {
  it('rejects a body that does not match the declared length', () => {
    const frame = buildPacket(PacketType.DATA, new Uint8Array([1, 2, 3]));
    expect(() => parsePacket(frame.subarray(0, 9), frame.subarray(9, 12))).toThrow(
      SensorInvalidLengthError
    );
  });
});
