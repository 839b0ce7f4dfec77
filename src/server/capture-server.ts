// src/server/capture-server.ts
import { createServer, IncomingMessage, Server, ServerResponse } from 'node:http';
import { Mutex } from 'async-mutex';
import { FingerprintClient } from '../client.js';
import { encodePng } from '../utils/png.js';
import { rootLogger } from '../logger.js';
import { CaptureServerOptions } from '../types/sensor-types.js';

const logger = rootLogger.createLogger('CaptureServer');

export const CAPTURE_PATH = '/capture';

export interface CaptureResponse {
  status: number;
  headers: Record<string, string>;
  body: Uint8Array | string;
}

function textResponse(status: number, body: string, headers: Record<string, string> = {}): CaptureResponse {
  return { status, headers: { 'Content-Type': 'text/plain; charset=utf-8', ...headers }, body };
}

/**
 * HTTP front for one sensor: `GET /capture` waits for a finger and answers
 * with the image as PNG. Captures run one at a time.
 */
export class CaptureServer {
  private client: FingerprintClient;
  private options: CaptureServerOptions;
  private server: Server | null = null;
  private _mutex = new Mutex();

  constructor(client: FingerprintClient, options: CaptureServerOptions = {}) {
    this.client = client;
    this.options = options;
  }

  /**
   * Answers one request without touching a socket.
   */
  public async handle(method: string | undefined, url: string | undefined): Promise<CaptureResponse> {
    const path = new URL(url ?? '/', 'http://localhost').pathname;
    if (path !== CAPTURE_PATH) {
      return textResponse(404, 'Not found\n');
    }
    if (method !== 'GET' && method !== 'HEAD') {
      return textResponse(405, 'Method not allowed\n', { Allow: 'GET, HEAD' });
    }

    return this._mutex.runExclusive(async () => {
      const startTime = Date.now();
      try {
        const raster = await this.client.captureImage({
          waitMs: this.options.waitMs,
          streamTimeout: this.options.streamTimeout,
        });
        const png = encodePng(raster);
        logger.info('Sent fingerprint image', { responseTime: Date.now() - startTime });
        return {
          status: 200,
          headers: { 'Content-Type': 'image/png', 'Content-Length': String(png.length) },
          body: png,
        };
      } catch (err: unknown) {
        const message = err instanceof Error ? err.message : String(err);
        logger.error(`Capture failed: ${message}`, { responseTime: Date.now() - startTime });
        return textResponse(500, `Failed to capture fingerprint: ${message}\n`);
      }
    });
  }

  private async respond(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const result = await this.handle(req.method, req.url);
    res.writeHead(result.status, result.headers);
    res.end(req.method === 'HEAD' ? undefined : result.body);
  }

  /**
   * Starts listening and resolves with the bound port.
   */
  public async listen(port: number, host?: string): Promise<number> {
    if (this.server) {
      throw new Error('Capture server is already listening');
    }
    const server = createServer((req, res) => {
      this.respond(req, res).catch((err: unknown) => {
        logger.error('Request failed', err);
        if (!res.headersSent) res.writeHead(500);
        res.end();
      });
    });

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, host, () => {
        server.off('error', reject);
        resolve();
      });
    });
    this.server = server;

    const address = server.address();
    const bound = typeof address === 'object' && address !== null ? address.port : port;
    logger.info(`Listening on port ${bound}`);
    return bound;
  }

  public async close(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;
    await new Promise<void>((resolve, reject) => {
      server.close(err => (err ? reject(err) : resolve()));
    });
    logger.info('Stopped');
  }
}
