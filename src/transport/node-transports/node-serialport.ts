import { SerialPort } from 'serialport';
import { Mutex } from 'async-mutex';
import { concatUint8Arrays, sliceUint8Array } from '../../utils/utils.js';
import { rootLogger } from '../../logger.js';
import {
  NodeSerialTransportError,
  NodeSerialConnectionError,
  NodeSerialReadError,
  NodeSerialWriteError,
  SensorConfigError,
} from '../../errors.js';
import { Transport, NodeSerialTransportOptions } from '../../types/sensor-types.js';
import { DEFAULT_BAUD_RATE } from '../../constants/constants.js';

// ========== CONSTANTS ==========
const NODE_SERIAL_CONSTANTS = {
  MIN_BAUD_RATE: 300,
  MAX_BAUD_RATE: 115200,
  // a full 256x288 upload is ~40 KB including framing
  DEFAULT_MAX_BUFFER_SIZE: 64 * 1024,
  POLL_INTERVAL_MS: 5,
} as const;

const logger = rootLogger.createLogger('NodeSerialTransport');

/**
 * Serial transport on top of the `serialport` package. Incoming bytes are
 * buffered from the `data` event; `read` drains that buffer.
 */
export class NodeSerialTransport implements Transport {
  private path: string;
  private options: Required<NodeSerialTransportOptions>;
  private port: SerialPort | null = null;
  private readBuffer: Uint8Array = new Uint8Array(0);
  private _isOpen: boolean = false;
  private _operationMutex: Mutex = new Mutex();

  constructor(path: string, options: NodeSerialTransportOptions = {}) {
    this.path = path;
    this.options = {
      baudRate: DEFAULT_BAUD_RATE,
      dataBits: 8,
      stopBits: 1,
      parity: 'none',
      readTimeout: 2000,
      maxBufferSize: NODE_SERIAL_CONSTANTS.DEFAULT_MAX_BUFFER_SIZE,
      ...options,
    };
  }

  get isOpen(): boolean {
    return this._isOpen;
  }

  get baudRate(): number {
    return this.options.baudRate;
  }

  async connect(): Promise<void> {
    if (this._isOpen) {
      logger.warn(`Serial port ${this.path} is already open`);
      return;
    }
    if (
      this.options.baudRate < NODE_SERIAL_CONSTANTS.MIN_BAUD_RATE ||
      this.options.baudRate > NODE_SERIAL_CONSTANTS.MAX_BAUD_RATE
    ) {
      throw new SensorConfigError(`Invalid baud rate: ${this.options.baudRate}`);
    }

    try {
      await this._createAndOpenPort();
      logger.info(`Serial port ${this.path} opened at ${this.options.baudRate} baud`);
    } catch (err: unknown) {
      const error = err instanceof Error ? err : new NodeSerialTransportError(String(err));
      logger.error(`Failed to open serial port ${this.path}: ${error.message}`);
      this._isOpen = false;
      this.port = null;
      throw error;
    }
  }

  private _createAndOpenPort(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const port = new SerialPort({
        path: this.path,
        baudRate: this.options.baudRate,
        dataBits: this.options.dataBits,
        stopBits: this.options.stopBits,
        parity: this.options.parity,
        autoOpen: false,
      });
      this.port = port;

      port.open((err: Error | null) => {
        if (err) {
          this._isOpen = false;
          const message = err.message.toLowerCase();
          if (message.includes('permission') || message.includes('access denied')) {
            reject(new NodeSerialConnectionError('Permission denied'));
          } else if (message.includes('busy')) {
            reject(new NodeSerialConnectionError('Serial port is busy'));
          } else if (message.includes('no such file') || message.includes('file not found')) {
            reject(new NodeSerialConnectionError(`Serial port ${this.path} does not exist`));
          } else {
            reject(new NodeSerialConnectionError(err.message));
          }
          return;
        }

        this._isOpen = true;
        this.readBuffer = new Uint8Array(0);
        port.on('data', (data: Buffer) => this._onData(data));
        port.on('error', (error: Error) => this._onError(error));
        port.on('close', () => this._onClose());
        resolve();
      });
    });
  }

  private _onData(data: Buffer): void {
    if (!this._isOpen) return;
    const chunk = new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
    this.readBuffer = concatUint8Arrays([this.readBuffer, chunk]);
    if (this.readBuffer.length > this.options.maxBufferSize) {
      logger.warn(
        `Receive buffer overflow, dropping ${this.readBuffer.length - this.options.maxBufferSize} oldest bytes`
      );
      this.readBuffer = sliceUint8Array(this.readBuffer, -this.options.maxBufferSize);
    }
  }

  private _onError(err: Error): void {
    logger.error(`Serial port ${this.path} error: ${err.message}`);
  }

  private _onClose(): void {
    logger.info(`Serial port ${this.path} closed`);
    this._isOpen = false;
  }

  async flush(): Promise<void> {
    if (this.readBuffer.length > 0) {
      logger.debug(`Discarding ${this.readBuffer.length} stale bytes`);
    }
    this.readBuffer = new Uint8Array(0);
  }

  async write(buffer: Uint8Array): Promise<void> {
    const port = this.port;
    if (!this._isOpen || !port?.isOpen) throw new NodeSerialWriteError('Port closed');
    if (buffer.length === 0) throw new NodeSerialWriteError('Refusing to write an empty frame');
    const release = await this._operationMutex.acquire();
    try {
      await new Promise<void>((resolve, reject) => {
        port.write(Buffer.from(buffer), (writeErr: Error | null | undefined) => {
          if (writeErr) {
            reject(new NodeSerialWriteError(writeErr.message));
            return;
          }
          port.drain((drainErr: Error | null | undefined) => {
            if (drainErr) {
              reject(new NodeSerialWriteError(drainErr.message));
              return;
            }
            resolve();
          });
        });
      });
    } finally {
      release();
    }
  }

  async read(length: number, timeout: number = this.options.readTimeout): Promise<Uint8Array> {
    if (!Number.isInteger(length) || length <= 0) {
      throw new NodeSerialReadError(`Read length must be a positive integer, got ${length}`);
    }
    const release = await this._operationMutex.acquire();
    const start = Date.now();
    try {
      return await new Promise<Uint8Array>((resolve, reject) => {
        const check = (): void => {
          if (!this._isOpen || !this.port?.isOpen) {
            reject(new NodeSerialReadError('Port closed'));
            return;
          }
          if (this.readBuffer.length > 0) {
            const data = this.readBuffer.slice(0, length);
            this.readBuffer = sliceUint8Array(this.readBuffer, data.length);
            resolve(data);
            return;
          }
          if (Date.now() - start >= timeout) {
            resolve(new Uint8Array(0));
            return;
          }
          setTimeout(check, NODE_SERIAL_CONSTANTS.POLL_INTERVAL_MS);
        };
        check();
      });
    } finally {
      release();
    }
  }

  async disconnect(): Promise<void> {
    const port = this.port;
    if (!port) return;
    port.removeAllListeners('data');
    port.removeAllListeners('error');
    port.removeAllListeners('close');
    if (port.isOpen) {
      await new Promise<void>((resolve, reject) => {
        port.close((err: Error | null) => {
          if (err) reject(new NodeSerialConnectionError(err.message));
          else resolve();
        });
      });
      logger.info(`Serial port ${this.path} closed`);
    }
    this.port = null;
    this._isOpen = false;
    this.readBuffer = new Uint8Array(0);
  }

  /**
   * Lists serial ports visible to the operating system.
   */
  static async listPorts(): Promise<string[]> {
    const ports = await SerialPort.list();
    return ports.map(p => p.path);
  }
}
