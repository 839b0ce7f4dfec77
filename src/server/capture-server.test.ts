import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { PNG } from 'pngjs';
import { CaptureServer, CaptureResponse } from './capture-server.js';
import { FingerprintClient } from '../client.js';
import { SensorEmulator } from '../sensor-emulator/sensor-emulator.js';
import { Instruction } from '../constants/constants.js';

function binaryBody(response: CaptureResponse): Buffer {
  if (typeof response.body === 'string') {
    throw new Error(`expected an image, got "${response.body}"`);
  }
  return Buffer.from(response.body);
}

describe('CaptureServer', () => {
  let emulator: SensorEmulator;
  let client: FingerprintClient;
  let server: CaptureServer;

  beforeEach(async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    emulator = new SensorEmulator();
    client = new FingerprintClient(emulator, { timeout: 200, streamTimeout: 1000, pollInterval: 1 });
    await client.connect();
    server = new CaptureServer(client, { waitMs: 30 });
  });

  afterEach(async () => {
    await server.close();
    await client.disconnect();
    vi.restoreAllMocks();
  });

  it('answers GET /capture with a PNG of the sensor image', async () => {
    emulator.setFingerPresent(true);

    const response = await server.handle('GET', '/capture?source=kiosk');

    expect(response.status).toBe(200);
    expect(response.headers['Content-Type']).toBe('image/png');
    const png = PNG.sync.read(binaryBody(response));
    expect(png.width).toBe(256);
    expect(png.height).toBe(288);
    expect(response.headers['Content-Length']).toBe(String(binaryBody(response).length));
  });

  it('reports a failed capture as a 500 with the reason', async () => {
    const response = await server.handle('GET', '/capture');

    expect(response.status).toBe(500);
    expect(response.body).toBe('Failed to capture fingerprint: No finger detected within 30ms\n');
  });

  it('rejects other paths and methods', async () => {
    await expect(server.handle('GET', '/')).resolves.toMatchObject({ status: 404 });
    await expect(server.handle('POST', '/capture')).resolves.toMatchObject({
      status: 405,
      headers: { Allow: 'GET, HEAD' },
    });
  });

  it('runs concurrent captures one after the other', async () => {
    emulator.setFingerPresent(true);

    const responses = await Promise.all([
      server.handle('GET', '/capture'),
      server.handle('GET', '/capture'),
    ]);

    expect(responses.map(r => r.status)).toEqual([200, 200]);
    const instructions = emulator.getRequests().map(p => p.payload[0]);
    expect(instructions).toEqual([
      Instruction.GENERATE_IMAGE,
      Instruction.UPLOAD_IMAGE,
      Instruction.GENERATE_IMAGE,
      Instruction.UPLOAD_IMAGE,
    ]);
  });

  it('serves captures over HTTP on the loopback interface', async () => {
    emulator.setFingerPresent(true);
    const port = await server.listen(0, '127.0.0.1');

    const response = await fetch(`http://127.0.0.1:${port}/capture`);

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toBe('image/png');
    const body = new Uint8Array(await response.arrayBuffer());
    expect(Array.from(body.subarray(0, 4))).toEqual([0x89, 0x50, 0x4e, 0x47]);
  });
});
