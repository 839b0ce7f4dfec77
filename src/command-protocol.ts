// src/command-protocol.ts
import { FramedTransport } from './framers/framed-transport.js';
import { PacketType } from './constants/constants.js';
import {
  SensorInvalidLengthError,
  SensorTimeoutError,
  SensorUnexpectedPacketTypeError,
} from './errors.js';
import { rootLogger } from './logger.js';
import { concatUint8Arrays, hexByte } from './utils/utils.js';
import {
  buildGenerateImageRequest,
  parseGenerateImageResponse,
} from './function-codes/generate-image.js';
import {
  buildUploadImageRequest,
  parseUploadImageResponse,
} from './function-codes/upload-image.js';
import {
  buildWriteSystemParameterRequest,
  parseWriteSystemParameterResponse,
} from './function-codes/write-system-parameter.js';
import {
  CommandOutcome,
  GenerateImageResult,
  Packet,
  WriteSystemParameterRequest,
} from './types/sensor-types.js';

const logger = rootLogger.createLogger('CommandProtocol');

/**
 * One instruction, one acknowledgement. The caller is responsible for not
 * running two exchanges at once on the same line.
 */
export class CommandProtocol {
  constructor(private _framed: FramedTransport) {}

  /**
   * Sends `instruction ++ parameters` as a Command packet and waits for the
   * acknowledgement.
   * @param timeout - time allowed for the whole acknowledgement (ms)
   * @throws SensorUnexpectedPacketTypeError if the reply is not an Acknowledge packet
   * @throws SensorTimeoutError, SensorChecksumError, SensorMalformedHeaderError from the read
   */
  public async execute(
    instruction: number,
    parameters: Uint8Array,
    timeout: number
  ): Promise<CommandOutcome> {
    if (!Number.isInteger(instruction) || instruction < 0 || instruction > 0xff) {
      throw new RangeError(`Instruction must be 0-255, got ${instruction}`);
    }
    return this._exchange(concatUint8Arrays([new Uint8Array([instruction]), parameters]), timeout);
  }

  private async _exchange(request: Uint8Array, timeout: number): Promise<CommandOutcome> {
    const instruction = request[0] ?? 0;
    const startTime = Date.now();
    const deadline = startTime + timeout;

    await this._framed.discardInput();
    await this._framed.writePacket(PacketType.COMMAND, request);
    logger.debug('Instruction sent', { instruction });

    let packet: Packet;
    try {
      packet = await this._framed.readPacket(deadline);
    } catch (err: unknown) {
      if (err instanceof SensorTimeoutError) {
        logger.warn(`Timeout waiting for acknowledgement: ${err.message}`, {
          instruction,
          responseTime: Date.now() - startTime,
        });
      }
      throw err;
    }

    if (packet.packetType !== PacketType.ACKNOWLEDGE) {
      throw new SensorUnexpectedPacketTypeError([PacketType.ACKNOWLEDGE], packet.packetType);
    }

    const confirmationCode = packet.payload[0];
    if (confirmationCode === undefined) {
      throw new SensorInvalidLengthError(
        `Acknowledge for instruction ${hexByte(instruction)} carries no confirmation code`
      );
    }

    logger.debug('Acknowledgement received', {
      instruction,
      confirmationCode,
      responseTime: Date.now() - startTime,
    });

    return { confirmationCode, data: packet.payload.slice(1) };
  }

  /**
   * GenImg. "No finger" and "capture failed" are statuses, not errors.
   */
  public async generateImage(timeout: number): Promise<GenerateImageResult> {
    const outcome = await this._exchange(buildGenerateImageRequest(), timeout);
    return parseGenerateImageResponse(outcome);
  }

  /**
   * UpImage. Only the acknowledgement is read here; the data packets that
   * follow belong to the image streamer.
   * @throws SensorDeviceDeclinedError on a non-zero confirmation code
   */
  public async uploadImageRequest(timeout: number): Promise<void> {
    const outcome = await this._exchange(buildUploadImageRequest(), timeout);
    parseUploadImageResponse(outcome);
  }

  /**
   * SetSysPara.
   * @throws SensorDeviceDeclinedError on a non-zero confirmation code
   */
  public async writeSystemParameter(
    request: WriteSystemParameterRequest,
    timeout: number
  ): Promise<void> {
    const outcome = await this._exchange(buildWriteSystemParameterRequest(request), timeout);
    parseWriteSystemParameterResponse(outcome);
  }

  public get framed(): FramedTransport {
    return this._framed;
  }
}
