// src/cli.ts
import { parseArgs } from 'node:util';
import { writeFile } from 'node:fs/promises';
import { FingerprintClient } from './client.js';
import { createTransport } from './transport/factory.js';
import { SensorEmulator } from './sensor-emulator/sensor-emulator.js';
import {
  DEFAULT_SETTINGS_FILE,
  readSettings,
  resetSettings,
  writeSettings,
} from './config/settings-store.js';
import { expandNibbles } from './utils/pixel-decoder.js';
import { encodePgm } from './utils/pgm.js';
import { encodePng } from './utils/png.js';
import { CaptureServer } from './server/capture-server.js';
import { DEFAULT_BAUD_RATE, IMAGE_HEIGHT, IMAGE_WIDTH } from './constants/constants.js';
import {
  SensorConfigError,
  SensorDeviceDeclinedError,
  SensorFingerTimeoutError,
  SensorTimeoutError,
} from './errors.js';
import { rootLogger } from './logger.js';
import type { PixelRaster, SensorSettings, Transport } from './types/sensor-types.js';

const logger = rootLogger.createLogger('cli');

export const ExitCode = {
  OK: 0,
  OPEN_FAILED: 1,
  FINGER_TIMEOUT: 2,
  DOWNLOAD_TIMEOUT: 3,
  DEVICE_DECLINED: 4,
  DOWNLOAD_FAILED: 5,
  DECODE_FAILED: 6,
  SET_BAUD_FAILED: 7,
  WRITE_FAILED: 8,
} as const;

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];

const DEFAULT_OUTPUT = 'fingerprint.png';
const DEFAULT_RAW_DUMP = 'fingerprint.raw';
const DEFAULT_HTTP_PORT = 8080;

export type ImageFormat = 'png' | 'pgm';

const USAGE = `Usage: fingerprint-capture [options]

  --port <path>         serial port (saved to the settings file)
  --baud <rate>         session baud rate (saved to the settings file)
  --reset-config        forget saved settings
  --set-baud <rate>     program the module baud rate and exit
  --list-ports          print available serial ports and exit
  --timeout <seconds>   wait for each acknowledgement (default 2)
  --wait <seconds>      time to wait for a finger (default 15)
  --retries <n>         download retries after a timeout (default 2)
  --output <file|->     image output, "-" for stdout (default ${DEFAULT_OUTPUT})
  --format <png|pgm>    image format (default from the output name, else png)
  --raw-dump <file>     also save the raw 4-bit image bytes
  --config <file>       settings file (default ${DEFAULT_SETTINGS_FILE})
  --serve               answer GET /capture over HTTP instead of capturing once
  --listen <port>       HTTP port for --serve (default ${DEFAULT_HTTP_PORT})
  --emulate             talk to an in-process emulated sensor
  --log-file <file>     also append log lines to a file
  --verbose             debug logging
  --help                show this text`;

interface CliOptions {
  port?: string;
  baud?: number;
  resetConfig: boolean;
  setBaud?: number;
  listPorts: boolean;
  timeoutMs: number;
  waitMs: number;
  retries: number;
  output: string;
  format: ImageFormat;
  rawDump?: string;
  config: string;
  serve: boolean;
  listen: number;
  emulate: boolean;
  logFile?: string;
  verbose: boolean;
  help: boolean;
}

/** Collaborators a caller can hand in instead of the ones built from flags */
export interface MainOptions {
  /** Used in place of the serial port or the emulator */
  transport?: Transport;
  /** Stops `--serve`; without it the server runs until SIGINT or SIGTERM */
  shutdown?: AbortSignal;
}

function parseFormat(value: string | undefined, output: string): ImageFormat {
  if (value === undefined) {
    return output.toLowerCase().endsWith('.pgm') ? 'pgm' : 'png';
  }
  if (value !== 'png' && value !== 'pgm') {
    throw new SensorConfigError(`--format expects png or pgm, got "${value}"`);
  }
  return value;
}

function parseNumber(flag: string, value: string | undefined, integer: boolean): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n) || n < 0 || (integer && !Number.isInteger(n))) {
    throw new SensorConfigError(`--${flag} expects a ${integer ? 'non-negative integer' : 'number'}, got "${value}"`);
  }
  return n;
}

/**
 * Parses command-line arguments.
 * @throws SensorConfigError for unknown flags or malformed values
 */
export function parseCliArgs(argv: string[]): CliOptions {
  try {
    const { values } = parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        port: { type: 'string' },
        baud: { type: 'string' },
        'reset-config': { type: 'boolean', default: false },
        'set-baud': { type: 'string' },
        'list-ports': { type: 'boolean', default: false },
        timeout: { type: 'string' },
        wait: { type: 'string' },
        retries: { type: 'string' },
        output: { type: 'string', short: 'o' },
        format: { type: 'string' },
        'raw-dump': { type: 'string' },
        config: { type: 'string' },
        serve: { type: 'boolean', default: false },
        listen: { type: 'string' },
        emulate: { type: 'boolean', default: false },
        'log-file': { type: 'string' },
        verbose: { type: 'boolean', short: 'v', default: false },
        help: { type: 'boolean', short: 'h', default: false },
      },
    });

    const output = values.output ?? DEFAULT_OUTPUT;
    const listen = parseNumber('listen', values.listen, true) ?? DEFAULT_HTTP_PORT;
    if (listen > 65535) {
      throw new SensorConfigError(`--listen expects a port up to 65535, got ${listen}`);
    }

    return {
      port: values.port,
      baud: parseNumber('baud', values.baud, true),
      resetConfig: values['reset-config'] ?? false,
      setBaud: parseNumber('set-baud', values['set-baud'], true),
      listPorts: values['list-ports'] ?? false,
      timeoutMs: (parseNumber('timeout', values.timeout, false) ?? 2) * 1000,
      waitMs: (parseNumber('wait', values.wait, false) ?? 15) * 1000,
      retries: parseNumber('retries', values.retries, true) ?? 2,
      output,
      format: parseFormat(values.format, output),
      rawDump: values['raw-dump'],
      config: values.config ?? DEFAULT_SETTINGS_FILE,
      serve: values.serve ?? false,
      listen,
      emulate: values.emulate ?? false,
      logFile: values['log-file'],
      verbose: values.verbose ?? false,
      help: values.help ?? false,
    };
  } catch (err: unknown) {
    if (err instanceof SensorConfigError) throw err;
    throw new SensorConfigError(describe(err));
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function writeOutput(target: string, data: Uint8Array): Promise<void> {
  if (target === '-') {
    await new Promise<void>((resolve, reject) => {
      process.stdout.write(data, err => (err ? reject(err) : resolve()));
    });
    return;
  }
  await writeFile(target, data);
}

/**
 * Writes a file, logging the failure instead of throwing.
 * @returns whether the write succeeded
 */
async function tryWrite(target: string, data: Uint8Array, what: string): Promise<boolean> {
  try {
    await writeOutput(target, data);
    return true;
  } catch (err: unknown) {
    logger.error(`Could not write ${what} to ${target === '-' ? 'stdout' : target}: ${describe(err)}`);
    return false;
  }
}

function encodeImage(raster: PixelRaster, format: ImageFormat): Uint8Array {
  return format === 'png' ? encodePng(raster) : encodePgm(raster);
}

async function openTransport(options: CliOptions, settings: SensorSettings): Promise<Transport> {
  if (options.emulate) {
    const emulator = await createTransport({ type: 'emulator' });
    if (emulator instanceof SensorEmulator) {
      emulator.setFingerPresent(true);
    }
    return emulator;
  }
  if (!settings.port) {
    throw new SensorConfigError('No serial port configured; pass --port <path>');
  }
  return createTransport({
    type: 'node',
    port: settings.port,
    baudRate: settings.baud ?? DEFAULT_BAUD_RATE,
  });
}

async function capture(client: FingerprintClient, options: CliOptions): Promise<ExitCodeValue> {
  logger.info('Place finger on the sensor...');
  try {
    await client.waitForFinger(options.waitMs);
  } catch (err: unknown) {
    if (err instanceof SensorFingerTimeoutError) {
      logger.error('Timed out waiting for finger. Try again.');
      return ExitCode.FINGER_TIMEOUT;
    }
    logger.error(`Error during capture: ${describe(err)}`);
    return ExitCode.OPEN_FAILED;
  }

  let raw: Uint8Array;
  try {
    logger.info('Downloading image...');
    raw = await client.downloadImage();
  } catch (err: unknown) {
    if (err instanceof SensorTimeoutError) {
      logger.error('Timed out while receiving image data. Try again or lower the baud rate.');
      return ExitCode.DOWNLOAD_TIMEOUT;
    }
    if (err instanceof SensorDeviceDeclinedError) {
      logger.error(`Device declined image upload: ${err.message}`);
      return ExitCode.DEVICE_DECLINED;
    }
    logger.error(`Unexpected error during image download: ${describe(err)}`);
    return ExitCode.DOWNLOAD_FAILED;
  }

  if (options.rawDump) {
    if (!(await tryWrite(options.rawDump, raw, 'raw image bytes'))) {
      return ExitCode.WRITE_FAILED;
    }
    logger.info(`Raw image bytes saved to ${options.rawDump}`);
  }

  let image: Uint8Array;
  try {
    image = encodeImage(expandNibbles(raw, IMAGE_WIDTH, IMAGE_HEIGHT), options.format);
  } catch (err: unknown) {
    logger.error(`Failed to decode image data: ${describe(err)}`);
    const rawPath = options.rawDump ?? DEFAULT_RAW_DUMP;
    if (options.rawDump || (await tryWrite(rawPath, raw, 'raw image bytes'))) {
      logger.info(`Raw image bytes saved to ${rawPath} for analysis`);
    }
    return ExitCode.DECODE_FAILED;
  }

  if (!(await tryWrite(options.output, image, 'image'))) {
    return ExitCode.WRITE_FAILED;
  }
  if (options.output !== '-') {
    logger.info(`Image saved to ${options.output}`);
  }
  return ExitCode.OK;
}

function waitForShutdown(signal: AbortSignal | undefined): Promise<void> {
  return new Promise(resolve => {
    if (signal) {
      if (signal.aborted) resolve();
      else signal.addEventListener('abort', () => resolve(), { once: true });
      return;
    }
    const stop = (): void => {
      process.off('SIGINT', stop);
      process.off('SIGTERM', stop);
      resolve();
    };
    process.on('SIGINT', stop);
    process.on('SIGTERM', stop);
  });
}

async function serve(
  client: FingerprintClient,
  options: CliOptions,
  shutdown: AbortSignal | undefined
): Promise<ExitCodeValue> {
  const server = new CaptureServer(client, { waitMs: options.waitMs });
  let port: number;
  try {
    port = await server.listen(options.listen);
  } catch (err: unknown) {
    logger.error(`Could not listen on port ${options.listen}: ${describe(err)}`);
    return ExitCode.OPEN_FAILED;
  }
  logger.info(`Serving captures at http://localhost:${port}/capture`);
  await waitForShutdown(shutdown);
  await server.close();
  return ExitCode.OK;
}

/**
 * Runs the capture tool and resolves with its exit code.
 */
export async function main(argv: string[], deps: MainOptions = {}): Promise<ExitCodeValue> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (err: unknown) {
    logger.error(describe(err));
    console.error(USAGE);
    return ExitCode.OPEN_FAILED;
  }

  if (options.help) {
    console.error(USAGE);
    return ExitCode.OK;
  }
  if (options.verbose) {
    rootLogger.setLevel('debug');
  }
  if (options.logFile) {
    rootLogger.setLogFile(options.logFile);
  }

  if (options.listPorts) {
    try {
      const { NodeSerialTransport } = await import('./transport/node-transports/node-serialport.js');
      const ports = await NodeSerialTransport.listPorts();
      for (const port of ports) console.log(port);
      return ExitCode.OK;
    } catch (err: unknown) {
      logger.error(`Could not list serial ports: ${describe(err)}`);
      return ExitCode.OPEN_FAILED;
    }
  }

  let settings: SensorSettings;
  try {
    if (options.resetConfig) {
      await resetSettings(options.config);
    }
    settings = await readSettings(options.config);
    if (options.port !== undefined) settings.port = options.port;
    if (options.baud !== undefined) settings.baud = options.baud;
    if (!options.emulate && (options.port !== undefined || options.baud !== undefined)) {
      await writeSettings(settings, options.config);
    }
  } catch (err: unknown) {
    logger.error(`Settings error: ${describe(err)}`);
    return ExitCode.OPEN_FAILED;
  }

  if (options.resetConfig && !options.emulate && !deps.transport && !settings.port) {
    logger.info('Settings cleared. Run again with --port <path> to configure.');
    return ExitCode.OK;
  }

  let client: FingerprintClient;
  try {
    const transport = deps.transport ?? (await openTransport(options, settings));
    client = new FingerprintClient(transport, {
      timeout: options.timeoutMs,
      retryCount: options.retries,
      logLevel: options.verbose ? 'debug' : undefined,
    });
    await client.connect();
  } catch (err: unknown) {
    const where = options.emulate ? 'emulated sensor' : `${settings.port ?? '?'} at ${settings.baud ?? DEFAULT_BAUD_RATE}`;
    logger.error(`Failed to open ${where}: ${describe(err)}`);
    return ExitCode.OPEN_FAILED;
  }

  try {
    if (options.setBaud !== undefined) {
      try {
        await client.setBaudRate(options.setBaud);
      } catch (err: unknown) {
        logger.error(`Failed to set module baud: ${describe(err)}`);
        return ExitCode.SET_BAUD_FAILED;
      }
      logger.info(`Module baud set to ${options.setBaud}. Power-cycle the sensor, then run again.`);
      if (!options.emulate) {
        try {
          await writeSettings({ ...settings, baud: options.setBaud }, options.config);
        } catch (err: unknown) {
          logger.error(`Could not save baud ${options.setBaud} to ${options.config}: ${describe(err)}`);
          return ExitCode.WRITE_FAILED;
        }
      }
      return ExitCode.OK;
    }

    if (options.serve) {
      return await serve(client, options, deps.shutdown);
    }
    return await capture(client, options);
  } finally {
    await client.disconnect();
  }
}
