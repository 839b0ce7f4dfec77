// src/function-codes/generate-image.ts

import { ConfirmationCode, Instruction } from '../constants/constants.js';
import { CommandOutcome, GenerateImageResult } from '../types/sensor-types.js';

const INSTRUCTION = Instruction.GENERATE_IMAGE;

/**
 * Builds the GenImg instruction: detect a finger and store its image in the
 * module's image buffer. Takes no parameters.
 * @returns instruction payload (opcode only)
 */
export function buildGenerateImageRequest(): Uint8Array {
  return new Uint8Array([INSTRUCTION]);
}

/**
 * Maps the GenImg confirmation code to a capture status. Codes other than
 * 0x00/0x02/0x03 are reported as `unknown`; the module's documentation does not
 * list any for this instruction.
 */
export function parseGenerateImageResponse(outcome: CommandOutcome): GenerateImageResult {
  const { confirmationCode } = outcome;
  switch (confirmationCode) {
    case ConfirmationCode.OK:
      return { status: 'captured', confirmationCode };
    case ConfirmationCode.NO_FINGER:
      return { status: 'no-finger', confirmationCode };
    case ConfirmationCode.IMAGE_CAPTURE_FAILED:
      return { status: 'capture-failed', confirmationCode };
    default:
      return { status: 'unknown', confirmationCode };
  }
}
