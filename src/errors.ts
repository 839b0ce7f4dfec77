// src/errors.ts

import { CONFIRMATION_MESSAGES, INSTRUCTION_NAMES } from './constants/constants.js';

/**
 * Base class for all sensor driver errors
 */
export class SensorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SensorError';
  }
}

// --- Integrity errors ---

/**
 * Error class for a packet header that does not start with 0xEF01 or names another address
 */
export class SensorMalformedHeaderError extends SensorError {
  constructor(message: string = 'Malformed packet header') {
    super(message);
    this.name = 'SensorMalformedHeaderError';
  }
}

/**
 * Error class for a declared packet length that cannot hold the checksum,
 * or a body that does not match the declared length
 */
export class SensorInvalidLengthError extends SensorError {
  constructor(message: string = 'Invalid packet length') {
    super(message);
    this.name = 'SensorInvalidLengthError';
  }
}

/**
 * Error class for a packet whose checksum does not match its contents
 */
export class SensorChecksumError extends SensorError {
  readonly received: number;
  readonly calculated: number;

  constructor(received: number, calculated: number) {
    super(
      `Checksum mismatch: received 0x${received.toString(16).padStart(4, '0')}, calculated 0x${calculated.toString(16).padStart(4, '0')}`
    );
    this.name = 'SensorChecksumError';
    this.received = received;
    this.calculated = calculated;
  }
}

// --- Transient errors ---

/**
 * Error class for a read that did not complete before its deadline
 */
export class SensorTimeoutError extends SensorError {
  constructor(message: string = 'Sensor read timed out') {
    super(message);
    this.name = 'SensorTimeoutError';
  }
}

/**
 * Error class for an image download that did not reach its end-of-data packet in time
 */
export class SensorStreamTimeoutError extends SensorTimeoutError {
  readonly receivedBytes: number;

  constructor(timeout: number, receivedBytes: number) {
    super(
      `Timed out while receiving image data after ${timeout}ms (${receivedBytes} bytes discarded)`
    );
    this.name = 'SensorStreamTimeoutError';
    this.receivedBytes = receivedBytes;
  }
}

/**
 * Error class for a finger that never showed up within the wait budget
 */
export class SensorFingerTimeoutError extends SensorTimeoutError {
  constructor(waitMs: number) {
    super(`No finger detected within ${waitMs}ms`);
    this.name = 'SensorFingerTimeoutError';
  }
}

// --- Protocol errors ---

/**
 * Error class for a packet type that is not valid at this point of the exchange
 */
export class SensorUnexpectedPacketTypeError extends SensorError {
  readonly expected: readonly number[];
  readonly received: number;

  constructor(expected: readonly number[], received: number) {
    super(
      `Unexpected packet type: expected ${expected.map(t => `0x${t.toString(16).padStart(2, '0')}`).join(' or ')}, received 0x${received.toString(16).padStart(2, '0')}`
    );
    this.name = 'SensorUnexpectedPacketTypeError';
    this.expected = expected;
    this.received = received;
  }
}

/**
 * Error class for a non-success confirmation code
 */
export class SensorDeviceDeclinedError extends SensorError {
  readonly instruction: number;
  readonly confirmationCode: number;

  constructor(instruction: number, confirmationCode: number) {
    const name = INSTRUCTION_NAMES.get(instruction) ?? `0x${instruction.toString(16)}`;
    const reason = CONFIRMATION_MESSAGES[confirmationCode] ?? 'Unknown confirmation code';
    super(
      `Device declined ${name}: code 0x${confirmationCode.toString(16).padStart(2, '0')} (${reason})`
    );
    this.name = 'SensorDeviceDeclinedError';
    this.instruction = instruction;
    this.confirmationCode = confirmationCode;
  }
}

// --- Caller input errors ---

/**
 * Error class for a baud rate the module cannot be programmed to
 */
export class SensorUnsupportedBaudRateError extends SensorError {
  readonly baudRate: number;

  constructor(baudRate: number, supported: readonly number[]) {
    super(`Unsupported baud rate ${baudRate}. Choose one of: ${supported.join(', ')}`);
    this.name = 'SensorUnsupportedBaudRateError';
    this.baudRate = baudRate;
  }
}

/**
 * Error class for a raw image buffer too short for the requested raster
 */
export class SensorInsufficientDataError extends SensorError {
  constructor(received: number, required: number) {
    super(`Insufficient data: received ${received} bytes, required ${required} bytes`);
    this.name = 'SensorInsufficientDataError';
  }
}

/**
 * Error class for invalid options or settings
 */
export class SensorConfigError extends SensorError {
  constructor(message: string = 'Sensor configuration error') {
    super(message);
    this.name = 'SensorConfigError';
  }
}

/**
 * Error class for not connected
 */
export class SensorNotConnectedError extends SensorError {
  constructor() {
    super('Not connected to fingerprint sensor');
    this.name = 'SensorNotConnectedError';
  }
}

// --- Errors for Transports ---

/**
 * Base class for all Transport errors
 */
export class TransportError extends SensorError {
  constructor(message: string) {
    super(message);
    this.name = 'TransportError';
  }
}

/**
 * Error class for Node Serial transport errors
 */
export class NodeSerialTransportError extends TransportError {
  constructor(message: string) {
    super(message);
    this.name = 'NodeSerialTransportError';
  }
}

/**
 * Error class for Node Serial connection errors
 */
export class NodeSerialConnectionError extends NodeSerialTransportError {
  constructor(message: string) {
    super(message);
    this.name = 'NodeSerialConnectionError';
  }
}

/**
 * Error class for Node Serial read errors
 */
export class NodeSerialReadError extends NodeSerialTransportError {
  constructor(message: string) {
    super(message);
    this.name = 'NodeSerialReadError';
  }
}

/**
 * Error class for Node Serial write errors
 */
export class NodeSerialWriteError extends NodeSerialTransportError {
  constructor(message: string) {
    super(message);
    this.name = 'NodeSerialWriteError';
  }
}
