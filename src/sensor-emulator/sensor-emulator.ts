// sensor-emulator/sensor-emulator.ts

import { rootLogger } from '../logger.js';
import { buildPacket, parseFrame } from '../packet-builder.js';
import {
  ConfirmationCode,
  DEFAULT_ADDRESS,
  IMAGE_HEIGHT,
  IMAGE_WIDTH,
  Instruction,
  PacketType,
  SystemRegister,
} from '../constants/constants.js';
import { SensorConfigError, SensorError, TransportError } from '../errors.js';
import { concatUint8Arrays, hexByte, sleep, sliceUint8Array } from '../utils/utils.js';
import { Packet, SensorEmulatorOptions, Transport } from '../types/sensor-types.js';

const logger = rootLogger.createLogger('SensorEmulator');

/** Data packet sizes selected by the packet size register (0..3) */
const PACKET_SIZES: readonly number[] = [32, 64, 128, 256];

const READ_POLL_INTERVAL_MS = 2;

/**
 * Default image: a left-to-right ramp through all sixteen gray levels.
 */
function rampImage(): Uint8Array {
  const raw = new Uint8Array((IMAGE_WIDTH * IMAGE_HEIGHT) / 2);
  const bytesPerRow = IMAGE_WIDTH / 2;
  for (let i = 0; i < raw.length; i++) {
    const level = Math.floor(((i % bytesPerRow) * 16) / bytesPerRow);
    raw[i] = (level << 4) | level;
  }
  return raw;
}

/**
 * In-process stand-in for the sensor module. It implements `Transport`, so a
 * client can talk to it exactly as it would to a serial port: every frame
 * written is parsed and answered, and the answer is handed out by `read`.
 */
class SensorEmulator implements Transport {
  private address: number;
  private baudMultiplier: number;
  private dataPacketSize: number;
  private image: Uint8Array;
  private fingerPresent: boolean = false;
  private generateImageCodes: number[] = [];
  private declined: Map<number, number> = new Map();
  private dropped: Map<number, number> = new Map();
  private stalledUploads: number = 0;
  private outbox: Uint8Array = new Uint8Array(0);
  private requests: Packet[] = [];
  private loggerEnabled: boolean;
  private _connected: boolean = false;

  constructor(options: SensorEmulatorOptions = {}) {
    this.address = options.address ?? DEFAULT_ADDRESS;
    this.baudMultiplier = options.baudMultiplier ?? 6;
    this.dataPacketSize = options.dataPacketSize ?? 128;
    this.image = options.image ?? rampImage();
    if (!Number.isInteger(this.dataPacketSize) || this.dataPacketSize <= 0) {
      throw new SensorConfigError(`Data packet size must be positive, got ${this.dataPacketSize}`);
    }

    this.loggerEnabled = !!options.loggerEnabled;
    logger.setLevel(this.loggerEnabled ? 'info' : 'error');
  }

  enableLogger(): void {
    if (!this.loggerEnabled) {
      this.loggerEnabled = true;
      logger.setLevel('info');
    }
  }

  disableLogger(): void {
    if (this.loggerEnabled) {
      this.loggerEnabled = false;
      logger.setLevel('error');
    }
  }

  get isOpen(): boolean {
    return this._connected;
  }

  async connect(): Promise<void> {
    logger.info('Emulated sensor connected', { address: this.address });
    this._connected = true;
  }

  async disconnect(): Promise<void> {
    logger.info('Emulated sensor disconnected', { address: this.address });
    this._connected = false;
    this.outbox = new Uint8Array(0);
  }

  // ---------- scenario controls ----------

  /** Places or lifts the finger */
  setFingerPresent(present: boolean): void {
    this.fingerPresent = present;
  }

  /** Confirmation codes answered to the next GenImg requests, in order, before finger state applies */
  queueGenerateImageCodes(...codes: number[]): void {
    this.generateImageCodes.push(...codes);
  }

  /** Answers every request for `instruction` with `confirmationCode` until cleared */
  setDeclined(instruction: number, confirmationCode: number): void {
    this.declined.set(instruction, confirmationCode);
  }

  clearDeclined(): void {
    this.declined.clear();
  }

  /** Leaves the next `times` requests for `instruction` unanswered */
  dropResponses(instruction: number, times: number = 1): void {
    this.dropped.set(instruction, (this.dropped.get(instruction) ?? 0) + times);
  }

  /** The next `times` uploads acknowledge and send one data packet, then go quiet */
  stallUploads(times: number = 1): void {
    this.stalledUploads += times;
  }

  setImage(raw: Uint8Array): void {
    this.image = raw.slice();
  }

  getBaudMultiplier(): number {
    return this.baudMultiplier;
  }

  getDataPacketSize(): number {
    return this.dataPacketSize;
  }

  /** Command packets received so far, oldest first */
  getRequests(): readonly Packet[] {
    return this.requests;
  }

  // ---------- Transport ----------

  async write(buffer: Uint8Array): Promise<void> {
    if (!this._connected) {
      throw new TransportError('Emulated sensor is not connected');
    }
    const response = this.handleRequest(buffer);
    if (response) {
      this.outbox = concatUint8Arrays([this.outbox, response]);
    }
  }

  async read(length: number, timeout: number = 1000): Promise<Uint8Array> {
    const start = Date.now();
    while (this.outbox.length === 0) {
      if (!this._connected) {
        throw new TransportError('Emulated sensor is not connected');
      }
      const remaining = timeout - (Date.now() - start);
      if (remaining <= 0) {
        return new Uint8Array(0);
      }
      await sleep(Math.min(READ_POLL_INTERVAL_MS, remaining));
    }

    const data = this.outbox.slice(0, length);
    this.outbox = sliceUint8Array(this.outbox, data.length);
    return data;
  }

  async flush(): Promise<void> {
    this.outbox = new Uint8Array(0);
  }

  /**
   * Parses one command frame and returns the bytes the module would send back,
   * or null when it would stay silent.
   */
  handleRequest(frame: Uint8Array): Uint8Array | null {
    let packet: Packet;
    try {
      packet = parseFrame(frame);
    } catch (err: unknown) {
      if (!(err instanceof SensorError)) throw err;
      logger.warn(`Rejected corrupt frame: ${err.message}`);
      return this.ack(ConfirmationCode.PACKET_RECEIVE_ERROR);
    }

    if (packet.address !== this.address) {
      logger.debug('Frame ignored - wrong address', { address: packet.address });
      return null;
    }
    if (packet.packetType !== PacketType.COMMAND) {
      logger.warn(`Ignoring packet of type ${hexByte(packet.packetType)}`);
      return null;
    }

    this.requests.push(packet);
    const instruction = packet.payload[0];
    if (instruction === undefined) {
      return this.ack(ConfirmationCode.PACKET_RECEIVE_ERROR);
    }

    logger.info('Instruction received', { instruction });

    const drops = this.dropped.get(instruction) ?? 0;
    if (drops > 0) {
      this.dropped.set(instruction, drops - 1);
      logger.info('Dropping response', { instruction });
      return null;
    }

    const declinedCode = this.declined.get(instruction);
    if (declinedCode !== undefined) {
      return this.ack(declinedCode);
    }

    switch (instruction) {
      case Instruction.GENERATE_IMAGE:
        return this.ack(this.generateImageCode());
      case Instruction.UPLOAD_IMAGE:
        return this.uploadImage();
      case Instruction.WRITE_SYSTEM_PARAMETER:
        return this.ack(this.writeRegister(packet.payload[1], packet.payload[2]));
      default:
        logger.warn(`Unsupported instruction ${hexByte(instruction)}`);
        return this.ack(ConfirmationCode.PACKET_RECEIVE_ERROR);
    }
  }

  private ack(code: number): Uint8Array {
    return buildPacket(PacketType.ACKNOWLEDGE, new Uint8Array([code]), this.address);
  }

  private generateImageCode(): number {
    const queued = this.generateImageCodes.shift();
    if (queued !== undefined) return queued;
    return this.fingerPresent ? ConfirmationCode.OK : ConfirmationCode.NO_FINGER;
  }

  private uploadImage(): Uint8Array {
    const frames: Uint8Array[] = [this.ack(ConfirmationCode.OK)];
    const stalled = this.stalledUploads > 0;
    if (stalled) this.stalledUploads--;

    let offset = 0;
    do {
      const chunk = sliceUint8Array(this.image, offset, offset + this.dataPacketSize);
      offset += this.dataPacketSize;
      if (stalled) {
        frames.push(buildPacket(PacketType.DATA, chunk, this.address));
        logger.info('Upload stalled after the first data packet');
        break;
      }
      const type = offset >= this.image.length ? PacketType.END_OF_DATA : PacketType.DATA;
      frames.push(buildPacket(type, chunk, this.address));
    } while (offset < this.image.length);

    return concatUint8Arrays(frames);
  }

  private writeRegister(registerId: number | undefined, value: number | undefined): number {
    if (registerId === undefined || value === undefined) {
      return ConfirmationCode.PACKET_RECEIVE_ERROR;
    }

    switch (registerId) {
      case SystemRegister.BAUD_RATE:
        if (value < 1 || value > 12) return ConfirmationCode.PACKET_RECEIVE_ERROR;
        this.baudMultiplier = value;
        logger.info(`Baud register set to ${value} (${value * 9600} baud after restart)`);
        return ConfirmationCode.OK;
      case SystemRegister.SECURITY_LEVEL:
        return value >= 1 && value <= 5 ? ConfirmationCode.OK : ConfirmationCode.PACKET_RECEIVE_ERROR;
      case SystemRegister.PACKET_SIZE: {
        const size = PACKET_SIZES[value];
        if (size === undefined) return ConfirmationCode.PACKET_RECEIVE_ERROR;
        this.dataPacketSize = size;
        return ConfirmationCode.OK;
      }
      default:
        return ConfirmationCode.INVALID_REGISTER;
    }
  }
}

export default SensorEmulator;
export { SensorEmulator };
