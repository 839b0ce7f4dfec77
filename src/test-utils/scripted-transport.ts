// src/test-utils/scripted-transport.ts
import { buildPacket } from '../packet-builder.js';
import { sleep } from '../utils/utils.js';
import { Transport } from '../types/sensor-types.js';

/** A chunk handed out by one read, an empty read, or a pause before the next step */
export type ScriptStep = Uint8Array | 'empty' | { delay: number };

/**
 * Transport replaying a fixed script of incoming bytes. A chunk larger than
 * the requested length is split across reads. Once the script runs out,
 * reads wait out their timeout and return nothing. A `{ delay }` step holds
 * back the steps after it; reads shorter than the delay come back empty.
 */
export class ScriptedTransport implements Transport {
  readonly written: Uint8Array[] = [];
  flushCount = 0;
  readCalls = 0;
  readonly readTimeouts: number[] = [];
  private script: ScriptStep[];
  private open = true;

  constructor(script: ScriptStep[] = []) {
    this.script = [...script];
  }

  get isOpen(): boolean {
    return this.open;
  }

  async connect(): Promise<void> {
    this.open = true;
  }

  async disconnect(): Promise<void> {
    this.open = false;
  }

  async write(buffer: Uint8Array): Promise<void> {
    this.written.push(buffer.slice());
  }

  async flush(): Promise<void> {
    this.flushCount++;
  }

  push(...steps: ScriptStep[]): void {
    this.script.push(...steps);
  }

  async read(length: number, timeout: number = 1000): Promise<Uint8Array> {
    this.readCalls++;
    this.readTimeouts.push(timeout);
    const step = this.script.shift();
    if (step === undefined) {
      await sleep(timeout);
      return new Uint8Array(0);
    }
    if (step === 'empty') {
      return new Uint8Array(0);
    }
    if (!(step instanceof Uint8Array)) {
      const wait = Math.min(step.delay, timeout);
      await sleep(wait);
      if (wait < step.delay) {
        this.script.unshift({ delay: step.delay - wait });
      }
      return new Uint8Array(0);
    }
    if (step.length > length) {
      this.script.unshift(step.subarray(length));
      return step.slice(0, length);
    }
    return step;
  }
}

/** Frame helper with the default address */
export function frame(packetType: number, payload: number[] | Uint8Array): Uint8Array {
  return buildPacket(packetType, Uint8Array.from(payload));
}
