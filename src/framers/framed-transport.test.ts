import { describe, it, expect } from 'vitest';
import { FramedTransport } from './framed-transport.js';
import { ScriptedTransport, frame } from '../test-utils/scripted-transport.js';
import { buildPacket } from '../packet-builder.js';
import { PacketType } from '../constants/constants.js';
import { SensorMalformedHeaderError, SensorTimeoutError } from '../errors.js';

describe('FramedTransport', () => {
  it('assembles a packet from partial reads and skips empty ones', async () => {
    const bytes = frame(PacketType.DATA, [1, 2, 3, 4]);
    const transport = new ScriptedTransport([
      'empty',
      bytes.subarray(0, 4),
      'empty',
      bytes.subarray(4),
    ]);
    const framed = new FramedTransport(transport);

    const packet = await framed.readPacket(Date.now() + 1000);

    expect(packet.packetType).toBe(PacketType.DATA);
    expect(Array.from(packet.payload)).toEqual([1, 2, 3, 4]);
  });

  it('reads back-to-back packets delivered in one chunk', async () => {
    const both = new Uint8Array([
      ...frame(PacketType.DATA, [0xaa]),
      ...frame(PacketType.END_OF_DATA, [0xbb]),
    ]);
    const framed = new FramedTransport(new ScriptedTransport([both]));
    const deadline = Date.now() + 1000;

    const first = await framed.readPacket(deadline);
    const second = await framed.readPacket(deadline);

    expect(first.packetType).toBe(PacketType.DATA);
    expect(second.packetType).toBe(PacketType.END_OF_DATA);
    expect(Array.from(second.payload)).toEqual([0xbb]);
  });

  it('fails once the deadline passes with the byte count so far', async () => {
    const bytes = frame(PacketType.ACKNOWLEDGE, [0x00]);
    const framed = new FramedTransport(new ScriptedTransport([bytes.subarray(0, 5)]));

    await expect(framed.readPacket(Date.now() + 40)).rejects.toThrow(
      new SensorTimeoutError('Serial read exceeded its deadline (5/9 bytes received)')
    );
  });

  it('does not read at all when the deadline has already passed', async () => {
    const transport = new ScriptedTransport([frame(PacketType.ACKNOWLEDGE, [0x00])]);
    const framed = new FramedTransport(transport);

    await expect(framed.readExact(9, Date.now() - 1)).rejects.toBeInstanceOf(SensorTimeoutError);
    expect(transport.readCalls).toBe(0);
  });

  it('rejects replies from another address', async () => {
    const reply = buildPacket(PacketType.ACKNOWLEDGE, new Uint8Array([0]), 0x01020304);
    const framed = new FramedTransport(new ScriptedTransport([reply]));

    await expect(framed.readPacket(Date.now() + 1000)).rejects.toBeInstanceOf(
      SensorMalformedHeaderError
    );
  });

  it('accepts any address when configured to', async () => {
    const reply = buildPacket(PacketType.ACKNOWLEDGE, new Uint8Array([0]), 0x01020304);
    const framed = new FramedTransport(new ScriptedTransport([reply]), { acceptAnyAddress: true });

    const packet = await framed.readPacket(Date.now() + 1000);
    expect(packet.address).toBe(0x01020304);
  });

  it('writes frames for its own address', async () => {
    const transport = new ScriptedTransport();
    const framed = new FramedTransport(transport, { address: 0x0000abcd });

    await framed.writePacket(PacketType.COMMAND, new Uint8Array([0x01]));

    expect(Array.from(transport.written[0] ?? [])).toEqual([
      0xef, 0x01, 0x00, 0x00, 0xab, 0xcd, 0x01, 0x00, 0x03, 0x01, 0x00, 0x05,
    ]);
  });

  it('discards pending input through the transport', async () => {
    const transport = new ScriptedTransport();
    await new FramedTransport(transport).discardInput();
    expect(transport.flushCount).toBe(1);
  });
});
