import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { FakeSerialPort } from '../../test-utils/fake-serialport.js';
import { NodeSerialTransport } from './node-serialport.js';
import {
  NodeSerialConnectionError,
  NodeSerialReadError,
  NodeSerialWriteError,
  SensorConfigError,
} from '../../errors.js';

vi.mock('serialport', async () => {
  const { FakeSerialPort: SerialPort } = await import('../../test-utils/fake-serialport.js');
  return { SerialPort };
});

function port(): FakeSerialPort {
  const instance = FakeSerialPort.instances[0];
  if (!instance) throw new Error('no port was created');
  return instance;
}

describe('NodeSerialTransport', () => {
  let transport: NodeSerialTransport;

  beforeEach(async () => {
    FakeSerialPort.reset();
    transport = new NodeSerialTransport('/dev/ttyUSB0', { baudRate: 115200 });
    await transport.connect();
  });

  afterEach(async () => {
    await transport.disconnect();
  });

  it('opens the port with 8N1 framing at the requested baud', () => {
    expect(transport.isOpen).toBe(true);
    expect(port().options).toEqual({
      path: '/dev/ttyUSB0',
      baudRate: 115200,
      dataBits: 8,
      stopBits: 1,
      parity: 'none',
      autoOpen: false,
    });
  });

  it('hands out buffered bytes up to the requested length', async () => {
    port().receive([1, 2, 3, 4]);

    expect(Array.from(await transport.read(3, 100))).toEqual([1, 2, 3]);
    expect(Array.from(await transport.read(3, 100))).toEqual([4]);
  });

  it('waits for bytes that arrive during the read', async () => {
    const pending = transport.read(4, 500);
    setTimeout(() => port().receive([9]), 10);

    expect(Array.from(await pending)).toEqual([9]);
  });

  it('returns nothing when the timeout passes first', async () => {
    await expect(transport.read(4, 20)).resolves.toHaveLength(0);
  });

  it('drops buffered bytes on flush', async () => {
    port().receive([1, 2]);
    await transport.flush();
    await expect(transport.read(2, 20)).resolves.toHaveLength(0);
  });

  it('writes frames to the port', async () => {
    await transport.write(new Uint8Array([0xef, 0x01]));
    expect(Array.from(port().written[0] ?? [])).toEqual([0xef, 0x01]);
  });

  it('refuses an empty write', async () => {
    await expect(transport.write(new Uint8Array(0))).rejects.toBeInstanceOf(NodeSerialWriteError);
  });

  it('keeps only the newest bytes when the buffer overflows', async () => {
    await transport.disconnect();
    FakeSerialPort.reset();
    transport = new NodeSerialTransport('/dev/ttyUSB0', { maxBufferSize: 4 });
    await transport.connect();

    port().receive([1, 2, 3, 4, 5, 6]);

    expect(Array.from(await transport.read(10, 100))).toEqual([3, 4, 5, 6]);
  });

  it('fails reads once closed', async () => {
    await transport.disconnect();
    await expect(transport.read(1, 20)).rejects.toBeInstanceOf(NodeSerialReadError);
  });

  it('lists the available ports', async () => {
    await expect(NodeSerialTransport.listPorts()).resolves.toEqual(['/dev/ttyUSB0', '/dev/ttyACM0']);
  });
});

describe('NodeSerialTransport.connect', () => {
  beforeEach(() => {
    FakeSerialPort.reset();
  });

  it('reports a missing device', async () => {
    FakeSerialPort.openError = new Error('Error: No such file or directory, cannot open /dev/ttyX');
    const transport = new NodeSerialTransport('/dev/ttyX');

    await expect(transport.connect()).rejects.toThrow(
      new NodeSerialConnectionError('Serial port /dev/ttyX does not exist')
    );
    expect(transport.isOpen).toBe(false);
  });

  it('rejects an out-of-range baud before opening', async () => {
    const transport = new NodeSerialTransport('/dev/ttyUSB0', { baudRate: 1000000 });

    await expect(transport.connect()).rejects.toBeInstanceOf(SensorConfigError);
    expect(FakeSerialPort.instances).toHaveLength(0);
  });
});
