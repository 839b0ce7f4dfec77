// src/device-configurator.ts
import { CommandProtocol } from './command-protocol.js';
import {
  BAUD_RATE_MULTIPLIERS,
  SUPPORTED_BAUD_RATES,
  SystemRegister,
} from './constants/constants.js';
import { SensorUnsupportedBaudRateError } from './errors.js';
import { rootLogger } from './logger.js';

const logger = rootLogger.createLogger('DeviceConfigurator');

/**
 * Looks up the module multiplier for a host baud rate.
 * @throws SensorUnsupportedBaudRateError for rates outside the module's table
 */
export function baudRateToMultiplier(baudRate: number): number {
  const multiplier = BAUD_RATE_MULTIPLIERS.get(baudRate);
  if (multiplier === undefined) {
    throw new SensorUnsupportedBaudRateError(baudRate, SUPPORTED_BAUD_RATES);
  }
  return multiplier;
}

/**
 * Writes module system parameters.
 */
export class DeviceConfigurator {
  constructor(private _protocol: CommandProtocol) {}

  /**
   * Programs the module's UART baud rate. The write is confirmed on the
   * current session baud; the module switches only after a power cycle, which
   * this driver cannot observe. Repeating the call is harmless.
   * @returns the multiplier written to the baud register
   */
  public async setBaudRate(targetBaud: number, timeout: number): Promise<number> {
    const multiplier = baudRateToMultiplier(targetBaud);
    await this._protocol.writeSystemParameter(
      { registerId: SystemRegister.BAUD_RATE, value: multiplier },
      timeout
    );
    logger.info(`Module baud set to ${targetBaud} (N=${multiplier}); power-cycle to apply`);
    return multiplier;
  }
}
