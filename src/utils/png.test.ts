import { describe, it, expect } from 'vitest';
import { PNG } from 'pngjs';
import { encodePng } from './png.js';

describe('encodePng', () => {
  it('writes a grayscale PNG that decodes back to the pixels', () => {
    const png = encodePng({ width: 3, height: 2, pixels: new Uint8Array([0, 17, 34, 221, 238, 255]) });

    expect(Array.from(png.subarray(0, 8))).toEqual([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
    expect(new TextDecoder().decode(png.subarray(12, 16))).toBe('IHDR');
    // bit depth, then colour type 0 (grayscale)
    expect(Array.from(png.subarray(24, 26))).toEqual([8, 0]);

    const decoded = PNG.sync.read(Buffer.from(png));
    expect(decoded.width).toBe(3);
    expect(decoded.height).toBe(2);
    const gray = Array.from({ length: 6 }, (_, i) => decoded.data[i * 4]);
    expect(gray).toEqual([0, 17, 34, 221, 238, 255]);
    expect(decoded.data[3]).toBe(255);
  });

  it('rejects a raster whose size does not match its dimensions', () => {
    expect(() => encodePng({ width: 2, height: 2, pixels: new Uint8Array(3) })).toThrow(RangeError);
  });
});
