// src/test-utils/fake-serialport.ts
import { EventEmitter } from 'node:events';

export interface FakeSerialPortOptions {
  path: string;
  baudRate: number;
  dataBits?: number;
  stopBits?: number;
  parity?: string;
  autoOpen?: boolean;
}

/**
 * Stand-in for `serialport`'s SerialPort class, swapped in with `vi.mock`.
 * Tests feed incoming bytes through `receive`.
 */
export class FakeSerialPort extends EventEmitter {
  static instances: FakeSerialPort[] = [];
  static openError: Error | null = null;
  static ports: { path: string }[] = [{ path: '/dev/ttyUSB0' }, { path: '/dev/ttyACM0' }];

  static async list(): Promise<{ path: string }[]> {
    return FakeSerialPort.ports;
  }

  static reset(): void {
    FakeSerialPort.instances = [];
    FakeSerialPort.openError = null;
  }

  isOpen = false;
  readonly written: Buffer[] = [];

  constructor(readonly options: FakeSerialPortOptions) {
    super();
    FakeSerialPort.instances.push(this);
  }

  open(callback: (err: Error | null) => void): void {
    const err = FakeSerialPort.openError;
    if (!err) this.isOpen = true;
    queueMicrotask(() => callback(err));
  }

  write(data: Buffer, callback: (err?: Error | null) => void): boolean {
    this.written.push(Buffer.from(data));
    callback(null);
    return true;
  }

  drain(callback: (err?: Error | null) => void): void {
    callback(null);
  }

  close(callback: (err: Error | null) => void): void {
    this.isOpen = false;
    callback(null);
    this.emit('close');
  }

  receive(bytes: number[]): void {
    this.emit('data', Buffer.from(bytes));
  }
}
