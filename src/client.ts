// src/client.ts
import { Mutex } from 'async-mutex';
import { FramedTransport } from './framers/framed-transport.js';
import { CommandProtocol } from './command-protocol.js';
import { ImageStreamer } from './image-streamer.js';
import { DeviceConfigurator } from './device-configurator.js';
import { expandNibbles } from './utils/pixel-decoder.js';
import { hexByte, sleep } from './utils/utils.js';
import { DEFAULT_ADDRESS, IMAGE_HEIGHT, IMAGE_WIDTH } from './constants/constants.js';
import {
  SensorConfigError,
  SensorFingerTimeoutError,
  SensorNotConnectedError,
  SensorTimeoutError,
} from './errors.js';
import { rootLogger } from './logger.js';
import {
  CaptureOptions,
  CommandOutcome,
  FingerprintClientOptions,
  GenerateImageResult,
  LogLevel,
  PixelRaster,
  Transport,
} from './types/sensor-types.js';

const LOGGER_NAME = 'FingerprintClient';
const logger = rootLogger.createLogger(LOGGER_NAME);

/** Default time to wait for a finger (ms) */
export const DEFAULT_FINGER_WAIT = 15000;

function validateNonNegative(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new SensorConfigError(`${name} must be a non-negative number, got ${value}`);
  }
}

/**
 * Driver for one sensor module on one serial line. All exchanges are
 * serialized: the line is half-duplex and the module answers one instruction
 * at a time.
 */
class FingerprintClient {
  private transport: Transport;
  private address: number;
  private defaultTimeout: number;
  private streamTimeout: number;
  private retryCount: number;
  private retryDelay: number;
  private pollInterval: number;
  private protocol: CommandProtocol;
  private streamer: ImageStreamer;
  private configurator: DeviceConfigurator;
  private _mutex: Mutex;

  constructor(transport: Transport, options: FingerprintClientOptions = {}) {
    this.address = options.address ?? DEFAULT_ADDRESS;
    if (!Number.isInteger(this.address) || this.address < 0 || this.address > 0xffffffff) {
      throw new SensorConfigError(`Invalid module address: ${this.address}`);
    }

    this.transport = transport;
    this.defaultTimeout = options.timeout ?? 5000;
    this.streamTimeout = options.streamTimeout ?? 10000;
    this.retryCount = options.retryCount ?? 2;
    this.retryDelay = options.retryDelay ?? 200;
    this.pollInterval = options.pollInterval ?? 50;

    validateNonNegative('timeout', this.defaultTimeout);
    validateNonNegative('streamTimeout', this.streamTimeout);
    validateNonNegative('retryDelay', this.retryDelay);
    validateNonNegative('pollInterval', this.pollInterval);
    if (!Number.isInteger(this.retryCount) || this.retryCount < 0) {
      throw new SensorConfigError(`retryCount must be a non-negative integer, got ${this.retryCount}`);
    }

    const framed = new FramedTransport(transport, { address: this.address });
    this.protocol = new CommandProtocol(framed);
    this.streamer = new ImageStreamer(this.protocol, { ackTimeout: this.defaultTimeout });
    this.configurator = new DeviceConfigurator(this.protocol);
    this._mutex = new Mutex();

    if (options.logLevel) {
      this.enableLogger(options.logLevel);
    }
  }

  /**
   * Sets the level of the client category logger
   */
  enableLogger(level: LogLevel = 'info'): void {
    logger.setLevel(level);
  }

  /**
   * Silences the client category logger except for errors
   */
  disableLogger(): void {
    logger.setLevel('error');
  }

  public async connect(): Promise<void> {
    await this._mutex.runExclusive(async () => {
      if (!this.transport.isOpen) {
        await this.transport.connect();
      }
      logger.debug('Client ready', { address: this.address });
    });
  }

  public async disconnect(): Promise<void> {
    await this._mutex.runExclusive(() => this.transport.disconnect());
  }

  private _ensureOpen(): void {
    if (!this.transport.isOpen) {
      throw new SensorNotConnectedError();
    }
  }

  /**
   * Runs one raw instruction exchange.
   */
  public async execute(
    instruction: number,
    parameters: Uint8Array = new Uint8Array(0),
    timeout: number = this.defaultTimeout
  ): Promise<CommandOutcome> {
    return this._mutex.runExclusive(() => {
      this._ensureOpen();
      return this.protocol.execute(instruction, parameters, timeout);
    });
  }

  /**
   * One GenImg exchange.
   */
  public async generateImage(timeout: number = this.defaultTimeout): Promise<GenerateImageResult> {
    return this._mutex.runExclusive(() => {
      this._ensureOpen();
      return this.protocol.generateImage(timeout);
    });
  }

  /**
   * Downloads the image buffer, repeating the whole download after a timeout
   * up to `retryCount` more times. Re-requesting an upload is safe; any other
   * failure is thrown at once.
   */
  public async downloadImage(streamTimeout: number = this.streamTimeout): Promise<Uint8Array> {
    let lastError: unknown;

    for (let attempt = 0; attempt <= this.retryCount; attempt++) {
      try {
        return await this._mutex.runExclusive(() => {
          this._ensureOpen();
          return this.streamer.downloadImage(streamTimeout);
        });
      } catch (err: unknown) {
        if (!(err instanceof SensorTimeoutError)) {
          throw err;
        }
        lastError = err;
        if (attempt < this.retryCount) {
          logger.warn(`Download attempt #${attempt + 1} timed out, retrying: ${err.message}`);
          await sleep(this.retryDelay);
        }
      }
    }

    logger.error(`All ${this.retryCount + 1} download attempts timed out`);
    throw lastError;
  }

  /**
   * Programs the module baud rate; see DeviceConfigurator.setBaudRate.
   */
  public async setBaudRate(baudRate: number, timeout: number = this.defaultTimeout): Promise<number> {
    return this._mutex.runExclusive(() => {
      this._ensureOpen();
      return this.configurator.setBaudRate(baudRate, timeout);
    });
  }

  /**
   * Polls GenImg until a finger image is captured. "No finger" and an
   * acknowledgement timeout keep polling; "capture failed" and unrecognised
   * codes are logged and polled again.
   * @throws SensorFingerTimeoutError when `waitMs` runs out
   */
  public async waitForFinger(waitMs: number = DEFAULT_FINGER_WAIT): Promise<void> {
    const start = Date.now();

    while (true) {
      let result: GenerateImageResult;
      try {
        result = await this.generateImage();
      } catch (err: unknown) {
        if (!(err instanceof SensorTimeoutError)) throw err;
        logger.debug(`GenerateImage timeout treated as no finger: ${err.message}`);
        result = { status: 'no-finger', confirmationCode: -1 };
      }

      let pause = this.pollInterval;
      switch (result.status) {
        case 'captured':
          logger.info('Finger image captured');
          return;
        case 'no-finger':
          break;
        case 'capture-failed':
          logger.warn('Collecting image failed; adjust finger placement', {
            confirmationCode: result.confirmationCode,
          });
          pause = this.pollInterval * 2;
          break;
        case 'unknown':
          // not in the module's documented GenImg codes; retried as transient
          logger.warn(`GenerateImage returned code ${hexByte(result.confirmationCode)}, retrying`, {
            confirmationCode: result.confirmationCode,
          });
          pause = this.pollInterval * 2;
          break;
      }

      if (Date.now() - start > waitMs) {
        throw new SensorFingerTimeoutError(waitMs);
      }
      await sleep(pause);
    }
  }

  /**
   * Waits for a finger, downloads the image and expands it to 8-bit pixels.
   */
  public async captureImage(options: CaptureOptions = {}): Promise<PixelRaster> {
    await this.waitForFinger(options.waitMs);
    const raw = await this.downloadImage(options.streamTimeout);
    return expandNibbles(raw, IMAGE_WIDTH, IMAGE_HEIGHT);
  }
}

export default FingerprintClient;
export { FingerprintClient };
