// src/types/sensor-types.ts

// !=============================================================================
// ! Packets
// !=============================================================================

/** Fields of the fixed 9-byte packet header */
export interface PacketHeader {
  address: number;
  packetType: number;
  /** Payload length + 2 (checksum) */
  length: number;
}

/** A validated packet; `packetType` is the raw identifier byte */
export interface Packet {
  readonly address: number;
  readonly packetType: number;
  readonly payload: Uint8Array;
  readonly checksum: number;
}

// !=============================================================================
// ! Instructions
// !=============================================================================

/** Result of one command/acknowledge exchange */
export interface CommandOutcome {
  confirmationCode: number;
  data: Uint8Array;
}

export type GenerateImageStatus = 'captured' | 'no-finger' | 'capture-failed' | 'unknown';

/** Answer to GenerateImage; only unexpected transport/protocol failures are thrown */
export interface GenerateImageResult {
  status: GenerateImageStatus;
  confirmationCode: number;
}

/** Parameters of the system-parameter write */
export interface WriteSystemParameterRequest {
  registerId: number;
  value: number;
}

// !=============================================================================
// ! Image
// !=============================================================================

/** 8-bit grayscale raster, row-major, one byte per sample */
export interface PixelRaster {
  width: number;
  height: number;
  pixels: Uint8Array;
}

// !=============================================================================
// ! Transport
// !=============================================================================

/** Byte channel the driver talks through */
export interface Transport {
  readonly isOpen: boolean;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  write(buffer: Uint8Array): Promise<void>;
  /**
   * Resolves with up to `length` bytes once any are available, or with an empty
   * array when `timeout` elapses first. An empty result means "no data yet".
   */
  read(length: number, timeout?: number): Promise<Uint8Array>;
  /** Drops bytes received but not yet read */
  flush?(): Promise<void>;
}

/** Options for the Node.js SerialPort transport */
export interface NodeSerialTransportOptions {
  baudRate?: number;
  dataBits?: 5 | 6 | 7 | 8;
  stopBits?: 1 | 1.5 | 2;
  parity?: 'none' | 'even' | 'mark' | 'odd' | 'space';
  /** Default slice for a single `read` call (ms) */
  readTimeout?: number;
  maxBufferSize?: number;
}

// !=============================================================================
// ! Client
// !=============================================================================

export interface FingerprintClientOptions {
  /** Module address, 0xFFFFFFFF by default */
  address?: number;
  /** Acknowledge timeout for a single instruction (ms) */
  timeout?: number;
  /** Overall deadline for one image download (ms) */
  streamTimeout?: number;
  /** Extra download attempts after a timeout */
  retryCount?: number;
  /** Pause between download attempts (ms) */
  retryDelay?: number;
  /** Pause between GenerateImage polls while no finger is present (ms) */
  pollInterval?: number;
  logLevel?: LogLevel;
}

export interface CaptureOptions {
  /** Maximum time to wait for a finger (ms) */
  waitMs?: number;
  /** Overrides the client's stream timeout for this capture */
  streamTimeout?: number;
}

export interface CaptureServerOptions {
  /** Time each request waits for a finger (ms) */
  waitMs?: number;
  /** Overrides the client's stream timeout for served captures */
  streamTimeout?: number;
}

// !=============================================================================
// ! Emulator
// !=============================================================================

export interface SensorEmulatorOptions {
  address?: number;
  /** Module baud multiplier currently programmed (9600 × N) */
  baudMultiplier?: number;
  /** Payload bytes per data packet, the module default is 128 */
  dataPacketSize?: number;
  /** Raw 4-bit image buffer handed out on upload */
  image?: Uint8Array;
  loggerEnabled?: boolean;
}

// !=============================================================================
// ! Settings
// !=============================================================================

export interface SensorSettings {
  port?: string;
  baud?: number;
}

// !=============================================================================
// ! Logger
// !=============================================================================

/** Log levels */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/** Context attached to a log record */
export interface LogContext {
  address?: number;
  instruction?: number;
  packetType?: number;
  confirmationCode?: number;
  responseTime?: number;
  logger?: string;
  transport?: string;
  [key: string]: string | number | boolean | undefined;
}

export type LogFormatField =
  | 'timestamp'
  | 'level'
  | 'logger'
  | 'address'
  | 'instruction'
  | 'packetType'
  | 'confirmationCode'
  | 'responseTime';

export interface LogRecord {
  level: LogLevel;
  args: unknown[];
  context: LogContext;
}

/** Category logger returned by `Logger.createLogger` */
export interface LoggerInstance {
  trace(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  setLevel(lvl: LogLevel | 'none'): void;
  pause(): void;
  resume(): void;
}
