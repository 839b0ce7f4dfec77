// src/config/settings-store.ts
import { readFile, rm, writeFile } from 'node:fs/promises';
import { SensorConfigError } from '../errors.js';
import { rootLogger } from '../logger.js';
import { SensorSettings } from '../types/sensor-types.js';

const logger = rootLogger.createLogger('SettingsStore');

export const DEFAULT_SETTINGS_FILE = 'settings.cfg';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function parseBaud(value: string, lineNumber: number): number {
  const baud = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(baud) || baud <= 0) {
    throw new SensorConfigError(`Invalid baud "${value}" on line ${lineNumber}`);
  }
  return baud;
}

/**
 * Parses `key=value` lines. Blank lines and lines starting with `#` are
 * skipped; unknown keys are ignored with a warning.
 * @throws SensorConfigError for a line without `=` or a malformed baud
 */
export function parseSettings(text: string): SensorSettings {
  const settings: SensorSettings = {};

  text.split(/\r?\n/).forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (line === '' || line.startsWith('#')) return;

    const eq = line.indexOf('=');
    if (eq <= 0) {
      throw new SensorConfigError(`Expected key=value on line ${index + 1}, got "${line}"`);
    }
    const key = line.slice(0, eq).trim();
    const value = line.slice(eq + 1).trim();

    switch (key) {
      case 'port':
        if (value !== '') settings.port = value;
        break;
      case 'baud':
        settings.baud = parseBaud(value, index + 1);
        break;
      default:
        logger.warn(`Ignoring unknown setting "${key}" on line ${index + 1}`);
    }
  });

  return settings;
}

export function formatSettings(settings: SensorSettings): string {
  const lines = ['# fingerprint sensor connection'];
  if (settings.port !== undefined) lines.push(`port=${settings.port}`);
  if (settings.baud !== undefined) lines.push(`baud=${settings.baud}`);
  return `${lines.join('\n')}\n`;
}

/**
 * Loads the settings file; a missing file yields empty settings.
 */
export async function readSettings(path: string = DEFAULT_SETTINGS_FILE): Promise<SensorSettings> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err: unknown) {
    if (isMissingFile(err)) {
      logger.debug(`No settings file at ${path}`);
      return {};
    }
    throw err;
  }
  return parseSettings(text);
}

export async function writeSettings(
  settings: SensorSettings,
  path: string = DEFAULT_SETTINGS_FILE
): Promise<void> {
  if (settings.baud !== undefined && (!Number.isSafeInteger(settings.baud) || settings.baud <= 0)) {
    throw new SensorConfigError(`Invalid baud ${settings.baud}`);
  }
  await writeFile(path, formatSettings(settings), 'utf8');
  logger.info(`Settings saved to ${path}`);
}

/**
 * Deletes the settings file, if there is one.
 */
export async function resetSettings(path: string = DEFAULT_SETTINGS_FILE): Promise<void> {
  await rm(path, { force: true });
  logger.info(`Settings at ${path} cleared`);
}
