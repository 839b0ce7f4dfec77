// src/logger.ts
import { appendFileSync } from 'node:fs';

import {
  CONFIRMATION_MESSAGES,
  INSTRUCTION_NAMES,
  PACKET_TYPE_NAMES,
} from './constants/constants.js';
import {
  LogContext,
  LogFormatField,
  LoggerInstance,
  LogLevel,
  LogRecord,
} from './types/sensor-types.js';

type OutputTarget = 'stdout' | 'stderr';

const VALID_FIELDS: readonly LogFormatField[] = [
  'timestamp',
  'level',
  'logger',
  'address',
  'instruction',
  'packetType',
  'confirmationCode',
  'responseTime',
];

class Logger {
  private LEVELS: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

  private currentLevel: LogLevel = 'info';
  private enabled: boolean = true;
  private useColors: boolean = Boolean(process.stderr.isTTY);
  // stdout may carry image bytes, so records go to stderr unless asked otherwise
  private target: OutputTarget = 'stderr';

  private COLORS: Record<LogLevel | 'reset', string> = {
    trace: '\x1b[1;35m',
    debug: '\x1b[1;36m',
    info: '\x1b[1;32m',
    warn: '\x1b[1;33m',
    error: '\x1b[1;31m',
    reset: '\x1b[0m',
  };

  private globalContext: LogContext = {};
  private categoryLevels: Record<string, LogLevel | 'none'> = {};
  private logFormat: LogFormatField[] = [...VALID_FIELDS];
  private customFormatters: Partial<Record<LogFormatField, (value: unknown) => string>> = {};
  private watchCallback: ((record: LogRecord) => void) | null = null;
  private logFile: string | null = null;

  private getTimestamp(): string {
    return new Date().toISOString().slice(11, 23);
  }

  /** Local date and time, `YYYY-MM-DD HH:MM:SS` */
  private getFileTimestamp(): string {
    const now = new Date();
    const pad = (n: number) => String(n).padStart(2, '0');
    return (
      `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())} ` +
      `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}`
    );
  }

  private field(name: LogFormatField, value: unknown, fallback: (value: unknown) => string): string {
    const formatter = this.customFormatters[name] ?? fallback;
    return formatter(value);
  }

  /**
   * Formats a record into a header line followed by the message parts.
   */
  private format(
    level: LogLevel,
    args: unknown[],
    context: LogContext,
    colors: boolean = this.useColors
  ): string[] {
    const color = colors ? this.COLORS[level] : '';
    const reset = colors ? this.COLORS.reset : '';
    const merged: LogContext = { ...this.globalContext, ...context };

    const headerParts: string[] = [];
    for (const name of this.logFormat) {
      switch (name) {
        case 'timestamp':
          headerParts.push(`[${this.getTimestamp()}]`);
          break;
        case 'level':
          headerParts.push(`[${level.toUpperCase()}]`);
          break;
        case 'logger':
          if (merged.logger) headerParts.push(this.field('logger', merged.logger, v => `[${v}]`));
          break;
        case 'address':
          if (merged.address != null) {
            headerParts.push(
              this.field('address', merged.address, v => `[A:0x${Number(v).toString(16)}]`)
            );
          }
          break;
        case 'instruction':
          if (merged.instruction != null) {
            const insName = INSTRUCTION_NAMES.get(merged.instruction) ?? 'Unknown';
            headerParts.push(
              this.field('instruction', merged.instruction, v => `[I:${hex(v)}/${insName}]`)
            );
          }
          break;
        case 'packetType':
          if (merged.packetType != null) {
            const typeName = PACKET_TYPE_NAMES.get(merged.packetType) ?? 'Unknown';
            headerParts.push(
              this.field('packetType', merged.packetType, v => `[P:${hex(v)}/${typeName}]`)
            );
          }
          break;
        case 'confirmationCode':
          if (merged.confirmationCode != null) {
            const message = CONFIRMATION_MESSAGES[merged.confirmationCode] ?? 'Unknown';
            headerParts.push(
              this.field('confirmationCode', merged.confirmationCode, v => `[C:${hex(v)}/${message}]`)
            );
          }
          break;
        case 'responseTime':
          if (merged.responseTime != null) {
            headerParts.push(this.field('responseTime', merged.responseTime, v => `[RT:${v}ms]`));
          }
          break;
      }
    }

    const formattedArgs: string[] = args.map(arg => {
      if (arg instanceof Error) {
        return `${arg.message}\n${arg.stack ?? ''}`.trim();
      }
      return String(arg);
    });

    // whatever the header did not render is printed as JSON
    const rest: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(context)) {
      if (value === undefined) continue;
      if (this.logFormat.some(f => f === key)) continue;
      rest[key] = value;
    }
    if (Object.keys(rest).length > 0) {
      formattedArgs.push(JSON.stringify(rest));
    }

    return [`${color}${headerParts.join('')}${reset}`, ...formattedArgs];
  }

  private shouldLog(level: LogLevel, context: LogContext): boolean {
    if (!this.enabled) return false;
    const categoryLevel = context.logger ? this.categoryLevels[context.logger] : undefined;
    if (categoryLevel === 'none') return false;
    const threshold = categoryLevel ?? this.currentLevel;
    return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(threshold);
  }

  private output(level: LogLevel, args: unknown[], context: LogContext): void {
    if (!this.shouldLog(level, context)) return;

    if (this.watchCallback) {
      this.watchCallback({ level, args, context });
    }

    const formatted = this.format(level, args, context);
    if (this.target === 'stderr') {
      if (level === 'error') console.error(...formatted);
      else console.warn(...formatted);
    } else if (level === 'trace') {
      console.debug(...formatted);
    } else {
      console[level](...formatted);
    }

    if (this.logFile) {
      this.appendToFile(level, args, context);
    }
  }

  private appendToFile(level: LogLevel, args: unknown[], context: LogContext): void {
    if (!this.logFile) return;
    const line = `[${this.getFileTimestamp()}] ${this.format(level, args, context, false).join(' ')}\n`;
    try {
      appendFileSync(this.logFile, line);
    } catch (err: unknown) {
      const file = this.logFile;
      this.logFile = null;
      console.error(`Log file ${file} disabled: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  /**
   * Splits a trailing plain object off the arguments and treats it as context.
   */
  private splitArgsAndContext(args: unknown[]): { args: unknown[]; context: LogContext } {
    if (args.length > 1) {
      const lastArg = args[args.length - 1];
      if (isLogContext(lastArg)) {
        return { args: args.slice(0, -1), context: lastArg };
      }
    }
    return { args, context: {} };
  }

  trace(...args: unknown[]): void {
    const split = this.splitArgsAndContext(args);
    this.output('trace', split.args, split.context);
  }

  debug(...args: unknown[]): void {
    const split = this.splitArgsAndContext(args);
    this.output('debug', split.args, split.context);
  }

  info(...args: unknown[]): void {
    const split = this.splitArgsAndContext(args);
    this.output('info', split.args, split.context);
  }

  warn(...args: unknown[]): void {
    const split = this.splitArgsAndContext(args);
    this.output('warn', split.args, split.context);
  }

  error(...args: unknown[]): void {
    const split = this.splitArgsAndContext(args);
    this.output('error', split.args, split.context);
  }

  setLevel(level: LogLevel): void {
    if (this.LEVELS.includes(level)) {
      this.currentLevel = level;
    } else {
      throw new Error(`Unknown log level: ${level}`);
    }
  }

  setLevelFor(category: string, level: LogLevel | 'none'): void {
    if (level !== 'none' && !this.LEVELS.includes(level))
      throw new Error(`Unknown log level: ${level}`);
    this.categoryLevels[category] = level;
  }

  pauseCategory(category: string): void {
    this.categoryLevels[category] = 'none';
  }

  resumeCategory(category: string): void {
    delete this.categoryLevels[category];
  }

  enable(): void {
    this.enabled = true;
  }

  disable(): void {
    this.enabled = false;
  }

  getLevel(): LogLevel {
    return this.currentLevel;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  disableColors(): void {
    this.useColors = false;
  }

  setTarget(target: OutputTarget): void {
    this.target = target;
  }

  /**
   * Also appends every record, without colours, to `path`. The first failed
   * write turns the file off again. `null` stops writing.
   */
  setLogFile(path: string | null): void {
    this.logFile = path;
  }

  getLogFile(): string | null {
    return this.logFile;
  }

  addGlobalContext(ctx: LogContext): void {
    this.globalContext = { ...this.globalContext, ...ctx };
  }

  setLogFormat(fields: LogFormatField[]): void {
    if (!fields.every(f => VALID_FIELDS.includes(f))) {
      throw new Error(`Invalid log format. Valid fields: ${VALID_FIELDS.join(', ')}`);
    }
    this.logFormat = [...fields];
  }

  setCustomFormatter(field: LogFormatField, formatter: (value: unknown) => string): void {
    this.customFormatters[field] = formatter;
  }

  watch(callback: (record: LogRecord) => void): void {
    this.watchCallback = callback;
  }

  clearWatch(): void {
    this.watchCallback = null;
  }

  /**
   * Creates a logger instance with category.
   * @param name - Logger name
   */
  createLogger(name: string): LoggerInstance {
    if (!name) throw new Error('Logger name required');
    const emit = (level: LogLevel, args: unknown[]): void => {
      const split = this.splitArgsAndContext(args);
      this.output(level, split.args, { ...split.context, logger: name });
    };
    return {
      trace: (...args: unknown[]) => emit('trace', args),
      debug: (...args: unknown[]) => emit('debug', args),
      info: (...args: unknown[]) => emit('info', args),
      warn: (...args: unknown[]) => emit('warn', args),
      error: (...args: unknown[]) => emit('error', args),
      setLevel: (lvl: LogLevel | 'none') => this.setLevelFor(name, lvl),
      pause: () => this.pauseCategory(name),
      resume: () => this.resumeCategory(name),
    };
  }
}

function hex(value: unknown): string {
  return `0x${Number(value).toString(16).padStart(2, '0')}`;
}

function isLogContext(value: unknown): value is LogContext {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  if (value instanceof Error || value instanceof Uint8Array) return false;
  return Object.values(value).every(
    v => v === undefined || ['string', 'number', 'boolean'].includes(typeof v)
  );
}

/** Process-wide logger; modules take a named category from it */
export const rootLogger = new Logger();

export default Logger;
