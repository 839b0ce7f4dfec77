// src/transport/factory.ts

import { rootLogger } from '../logger.js';
import { SensorConfigError } from '../errors.js';
import type {
  NodeSerialTransportOptions,
  SensorEmulatorOptions,
  Transport,
} from '../types/sensor-types.js';

const logger = rootLogger.createLogger('TransportFactory');

export type TransportConfig =
  | ({ type: 'node'; port: string } & NodeSerialTransportOptions)
  | ({ type: 'emulator' } & SensorEmulatorOptions);

/**
 * Creates a new transport instance for the given configuration.
 *
 *   - `'node'`: a serial port through the `serialport` package.
 *   - `'emulator'`: an in-process emulated sensor.
 * @throws SensorConfigError if the options are invalid.
 */
export async function createTransport(config: TransportConfig): Promise<Transport> {
  switch (config.type) {
    case 'node': {
      const { type: _type, port, ...serialOptions } = config;
      if (!port) {
        throw new SensorConfigError('Missing "port" option for node transport');
      }
      const { NodeSerialTransport } = await import('./node-transports/node-serialport.js');
      logger.debug(`Creating serial transport on ${port}`);
      return new NodeSerialTransport(port, serialOptions);
    }

    case 'emulator': {
      const { type: _type, ...emulatorOptions } = config;
      const { SensorEmulator } = await import('../sensor-emulator/sensor-emulator.js');
      logger.debug('Creating emulated sensor transport');
      return new SensorEmulator(emulatorOptions);
    }
  }
}
