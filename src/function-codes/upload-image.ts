// src/function-codes/upload-image.ts

import { ConfirmationCode, Instruction } from '../constants/constants.js';
import { SensorDeviceDeclinedError } from '../errors.js';
import { CommandOutcome } from '../types/sensor-types.js';

const INSTRUCTION = Instruction.UPLOAD_IMAGE;

/**
 * Builds the UpImage instruction. On success the module follows its
 * acknowledgement with the image buffer as data packets.
 */
export function buildUploadImageRequest(): Uint8Array {
  return new Uint8Array([INSTRUCTION]);
}

/**
 * @throws SensorDeviceDeclinedError unless the confirmation code is 0x00
 */
export function parseUploadImageResponse(outcome: CommandOutcome): void {
  if (outcome.confirmationCode !== ConfirmationCode.OK) {
    throw new SensorDeviceDeclinedError(INSTRUCTION, outcome.confirmationCode);
  }
}
