// src/constants/constants.ts

/** Start-of-packet marker, big-endian on the wire */
export const START_CODE = 0xef01;

/** Factory module address; the module answers to it until reprogrammed */
export const DEFAULT_ADDRESS = 0xffffffff;

/** start(2) + address(4) + packet type(1) + length(2) */
export const HEADER_SIZE = 9;

/** Size of the trailing checksum field, counted in the header's length */
export const CHECKSUM_SIZE = 2;

/**
 * Packet identifiers
 */
export const PacketType = {
  COMMAND: 0x01,
  DATA: 0x02,
  ACKNOWLEDGE: 0x07,
  END_OF_DATA: 0x08,
} as const; // as const: readonly literal types for keys/values

export type PacketTypeCode = (typeof PacketType)[keyof typeof PacketType];

/**
 * Instruction opcodes understood by the module (subset used by this driver)
 */
export const Instruction = {
  GENERATE_IMAGE: 0x01,
  UPLOAD_IMAGE: 0x0a,
  WRITE_SYSTEM_PARAMETER: 0x0e,
} as const;

export type InstructionCode = (typeof Instruction)[keyof typeof Instruction];

/**
 * Confirmation codes returned in the first byte of an acknowledge packet
 */
export const ConfirmationCode = {
  OK: 0x00,
  PACKET_RECEIVE_ERROR: 0x01,
  NO_FINGER: 0x02,
  IMAGE_CAPTURE_FAILED: 0x03,
  UPLOAD_IMAGE_FAILED: 0x0f,
  INVALID_REGISTER: 0x1a,
} as const;

export const CONFIRMATION_MESSAGES: Record<number, string> = {
  0x00: 'Command executed',
  0x01: 'Error when receiving data package',
  0x02: 'No finger on the sensor',
  0x03: 'Failed to collect the finger image',
  0x0f: 'Failed to upload image',
  0x1a: 'Invalid register number',
};

/** System parameter registers */
export const SystemRegister = {
  BAUD_RATE: 0x04,
  SECURITY_LEVEL: 0x05,
  PACKET_SIZE: 0x06,
} as const;

/** Host-visible baud rate → module multiplier N, where baud = 9600 × N */
export const BAUD_RATE_MULTIPLIERS: ReadonlyMap<number, number> = new Map([
  [9600, 1],
  [19200, 2],
  [28800, 3],
  [38400, 4],
  [48000, 5],
  [57600, 6],
  [115200, 12],
]);

export const SUPPORTED_BAUD_RATES: readonly number[] = [...BAUD_RATE_MULTIPLIERS.keys()].sort(
  (a, b) => a - b
);

/** Factory baud rate of the module */
export const DEFAULT_BAUD_RATE = 57600;

/** Fixed raster geometry of the sensor image buffer */
export const IMAGE_WIDTH = 256;
export const IMAGE_HEIGHT = 288;

/** Scale factor taking a 4-bit sample to the full 8-bit range (0xF × 17 = 0xFF) */
export const NIBBLE_SCALE = 17;

export const INSTRUCTION_NAMES = new Map<number, string>([
  [Instruction.GENERATE_IMAGE, 'GEN_IMAGE'],
  [Instruction.UPLOAD_IMAGE, 'UP_IMAGE'],
  [Instruction.WRITE_SYSTEM_PARAMETER, 'WRITE_REG'],
]);

export const PACKET_TYPE_NAMES = new Map<number, string>([
  [PacketType.COMMAND, 'COMMAND'],
  [PacketType.DATA, 'DATA'],
  [PacketType.ACKNOWLEDGE, 'ACK'],
  [PacketType.END_OF_DATA, 'END_DATA'],
]);
