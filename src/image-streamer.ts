// src/image-streamer.ts
import { CommandProtocol } from './command-protocol.js';
import { PacketType } from './constants/constants.js';
import {
  SensorStreamTimeoutError,
  SensorTimeoutError,
  SensorUnexpectedPacketTypeError,
} from './errors.js';
import { rootLogger } from './logger.js';
import { concatUint8Arrays } from './utils/utils.js';

const logger = rootLogger.createLogger('ImageStreamer');

const STREAM_PACKET_TYPES = [PacketType.DATA, PacketType.END_OF_DATA] as const;

export interface ImageStreamerOptions {
  /** Upper bound for the UpImage acknowledgement (ms); the stream deadline still applies */
  ackTimeout?: number;
}

/**
 * Downloads the module's image buffer: UpImage, then Data packets up to and
 * including the first EndOfData packet.
 */
export class ImageStreamer {
  private readonly _ackTimeout: number;

  constructor(
    private _protocol: CommandProtocol,
    options: ImageStreamerOptions = {}
  ) {
    this._ackTimeout = options.ackTimeout ?? 5000;
  }

  /**
   * @param streamTimeout - overall budget (ms) fixed when the call starts; it
   * covers the acknowledgement and every data packet and is never reset.
   * @returns payloads concatenated in arrival order
   * @throws SensorStreamTimeoutError if no EndOfData packet arrived in time (the
   * partial buffer is dropped)
   * @throws SensorDeviceDeclinedError if the module refuses the upload
   * @throws SensorUnexpectedPacketTypeError for any packet other than Data/EndOfData
   */
  public async downloadImage(streamTimeout: number): Promise<Uint8Array> {
    const startTime = Date.now();
    const deadline = startTime + streamTimeout;
    const chunks: Uint8Array[] = [];
    let received = 0;

    try {
      await this._protocol.uploadImageRequest(Math.min(this._ackTimeout, streamTimeout));

      while (true) {
        const packet = await this._protocol.framed.readPacket(deadline);

        if (
          packet.packetType !== PacketType.DATA &&
          packet.packetType !== PacketType.END_OF_DATA
        ) {
          throw new SensorUnexpectedPacketTypeError(STREAM_PACKET_TYPES, packet.packetType);
        }

        chunks.push(packet.payload);
        received += packet.payload.length;

        if (packet.packetType === PacketType.END_OF_DATA) break;
      }
    } catch (err: unknown) {
      if (err instanceof SensorTimeoutError && !(err instanceof SensorStreamTimeoutError)) {
        throw new SensorStreamTimeoutError(streamTimeout, received);
      }
      throw err;
    }

    logger.info(`Image received: ${received} bytes in ${chunks.length} packets`, {
      responseTime: Date.now() - startTime,
    });
    return concatUint8Arrays(chunks);
  }
}
