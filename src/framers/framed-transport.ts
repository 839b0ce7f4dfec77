// src/framers/framed-transport.ts
import { Transport, Packet } from '../types/sensor-types.js';
import { buildPacket, parsePacket, parsePacketHeader } from '../packet-builder.js';
import { DEFAULT_ADDRESS, HEADER_SIZE } from '../constants/constants.js';
import { SensorTimeoutError } from '../errors.js';
import { concatUint8Arrays, toHex } from '../utils/utils.js';
import { rootLogger } from '../logger.js';

const logger = rootLogger.createLogger('FramedTransport');

export interface FramedTransportOptions {
  /** Address written into outgoing frames and required on incoming ones */
  address?: number;
  /** Accept replies carrying any address */
  acceptAnyAddress?: boolean;
}

/**
 * Packet-level view of a byte transport. Every read is bounded by an absolute
 * deadline (a `Date.now()` timestamp) that covers the whole packet, however
 * many chunks it arrives in.
 */
export class FramedTransport {
  private readonly _address: number;
  private readonly _acceptAnyAddress: boolean;

  constructor(
    private _transport: Transport,
    options: FramedTransportOptions = {}
  ) {
    this._address = options.address ?? DEFAULT_ADDRESS;
    this._acceptAnyAddress = options.acceptAnyAddress ?? false;
  }

  /**
   * Collects exactly `n` bytes. Empty reads mean "no data yet" and are retried
   * until the deadline passes.
   * @throws SensorTimeoutError when fewer than `n` bytes arrived before `deadline`
   */
  public async readExact(n: number, deadline: number): Promise<Uint8Array> {
    const chunks: Uint8Array[] = [];
    let received = 0;

    while (received < n) {
      const timeLeft = deadline - Date.now();
      if (timeLeft <= 0) {
        throw new SensorTimeoutError(
          `Serial read exceeded its deadline (${received}/${n} bytes received)`
        );
      }

      const chunk = await this._transport.read(n - received, timeLeft);
      if (chunk.length === 0) continue;

      chunks.push(chunk);
      received += chunk.length;
    }

    return chunks.length === 1 && chunks[0] ? chunks[0] : concatUint8Arrays(chunks);
  }

  /**
   * Reads the header, then the body the header announces, and validates both.
   */
  public async readPacket(deadline: number): Promise<Packet> {
    const header = await this.readExact(HEADER_SIZE, deadline);
    const { length } = parsePacketHeader(header, this.expectedAddress);
    const body = await this.readExact(length, deadline);
    const packet = parsePacket(header, body, this.expectedAddress);

    logger.trace(`Received packet with ${packet.payload.length} payload bytes`, {
      packetType: packet.packetType,
    });
    return packet;
  }

  /**
   * Serializes and writes one frame.
   */
  public async writePacket(
    packetType: number,
    payload: Uint8Array,
    address: number = this._address
  ): Promise<void> {
    const frame = buildPacket(packetType, payload, address);
    logger.trace(`Writing frame ${toHex(frame, ' ')}`, { packetType });
    await this._transport.write(frame);
  }

  /**
   * Drops unread input left over from an earlier exchange.
   */
  public async discardInput(): Promise<void> {
    if (this._transport.flush) {
      await this._transport.flush();
    }
  }

  public get transport(): Transport {
    return this._transport;
  }

  public get address(): number {
    return this._address;
  }

  private get expectedAddress(): number | undefined {
    return this._acceptAnyAddress ? undefined : this._address;
  }
}
