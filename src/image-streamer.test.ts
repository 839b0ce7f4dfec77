import { describe, it, expect } from 'vitest';
import { ImageStreamer } from './image-streamer.js';
import { CommandProtocol } from './command-protocol.js';
import { FramedTransport } from './framers/framed-transport.js';
import { ScriptedTransport, type ScriptStep, frame } from './test-utils/scripted-transport.js';
import { PacketType } from './constants/constants.js';
import {
  SensorDeviceDeclinedError,
  SensorStreamTimeoutError,
  SensorUnexpectedPacketTypeError,
} from './errors.js';

const ACK_OK = frame(PacketType.ACKNOWLEDGE, [0x00]);

function streamer(...replies: ScriptStep[]): ImageStreamer {
  const protocol = new CommandProtocol(new FramedTransport(new ScriptedTransport(replies)));
  return new ImageStreamer(protocol, { ackTimeout: 1000 });
}

describe('ImageStreamer', () => {
  it('concatenates data payloads up to the end-of-data packet', async () => {
    const image = await streamer(
      ACK_OK,
      frame(PacketType.DATA, [1, 2, 3, 4]),
      frame(PacketType.DATA, [5, 6, 7, 8, 9, 10]),
      frame(PacketType.END_OF_DATA, [11, 12])
    ).downloadImage(1000);

    expect(Array.from(image)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12]);
  });

  it('accepts an empty end-of-data packet', async () => {
    const image = await streamer(
      ACK_OK,
      frame(PacketType.DATA, [0x11]),
      frame(PacketType.END_OF_DATA, [])
    ).downloadImage(1000);

    expect(Array.from(image)).toEqual([0x11]);
  });

  it('drops the partial image when the stream stalls', async () => {
    const pending = streamer(ACK_OK, frame(PacketType.DATA, [1, 2, 3, 4])).downloadImage(60);

    await expect(pending).rejects.toBeInstanceOf(SensorStreamTimeoutError);
    await expect(pending).rejects.toHaveProperty('receivedBytes', 4);
  });

  describe('with a slow sensor', () => {
    // every gap is shorter than the stream timeout, the three together are not
    const slowStream = (): ScriptStep[] => [
      ACK_OK,
      { delay: 60 },
      frame(PacketType.DATA, [1]),
      { delay: 60 },
      frame(PacketType.DATA, [2]),
      { delay: 60 },
      frame(PacketType.END_OF_DATA, [3]),
    ];

    it('keeps one deadline for the whole stream', async () => {
      const pending = streamer(...slowStream()).downloadImage(150);

      await expect(pending).rejects.toBeInstanceOf(SensorStreamTimeoutError);
      await expect(pending).rejects.toHaveProperty('receivedBytes', 2);
    });

    it('completes when the stream fits in the timeout', async () => {
      const image = await streamer(...slowStream()).downloadImage(400);

      expect(Array.from(image)).toEqual([1, 2, 3]);
    });
  });

  it('counts a missing acknowledgement against the stream deadline', async () => {
    await expect(streamer().downloadImage(40)).rejects.toBeInstanceOf(SensorStreamTimeoutError);
  });

  it('surfaces a declined upload', async () => {
    await expect(
      streamer(frame(PacketType.ACKNOWLEDGE, [0x0f])).downloadImage(1000)
    ).rejects.toBeInstanceOf(SensorDeviceDeclinedError);
  });

  it('rejects an acknowledgement in the middle of the stream', async () => {
    await expect(
      streamer(ACK_OK, frame(PacketType.DATA, [1]), frame(PacketType.ACKNOWLEDGE, [0])).downloadImage(
        1000
      )
    ).rejects.toThrow(new SensorUnexpectedPacketTypeError([0x02, 0x08], 0x07));
  });
});
