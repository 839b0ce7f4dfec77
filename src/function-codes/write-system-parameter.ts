// src/function-codes/write-system-parameter.ts

import { ConfirmationCode, Instruction } from '../constants/constants.js';
import { SensorDeviceDeclinedError } from '../errors.js';
import { CommandOutcome, WriteSystemParameterRequest } from '../types/sensor-types.js';

const INSTRUCTION = Instruction.WRITE_SYSTEM_PARAMETER;
const PAYLOAD_SIZE = 3; // opcode (1) + register (1) + value (1)

function validateByte(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > 0xff) {
    throw new RangeError(`${name} must be 0-255, got ${value}`);
  }
}

/**
 * Builds the SetSysPara instruction.
 * @throws RangeError if the register number or value does not fit in a byte
 */
export function buildWriteSystemParameterRequest({
  registerId,
  value,
}: WriteSystemParameterRequest): Uint8Array {
  validateByte('Register number', registerId);
  validateByte('Register value', value);

  const payload = new Uint8Array(PAYLOAD_SIZE);
  payload[0] = INSTRUCTION;
  payload[1] = registerId;
  payload[2] = value;
  return payload;
}

/**
 * @throws SensorDeviceDeclinedError unless the confirmation code is 0x00
 */
export function parseWriteSystemParameterResponse(outcome: CommandOutcome): void {
  if (outcome.confirmationCode !== ConfirmationCode.OK) {
    throw new SensorDeviceDeclinedError(INSTRUCTION, outcome.confirmationCode);
  }
}
