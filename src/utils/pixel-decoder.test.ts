import { describe, it, expect } from 'vitest';
import { expandNibbles } from './pixel-decoder.js';
import { SensorInsufficientDataError } from '../errors.js';

describe('expandNibbles', () => {
  it('expands a full white buffer to 255 everywhere', () => {
    const raster = expandNibbles(new Uint8Array((256 * 288) / 2).fill(0xff));

    expect(raster.width).toBe(256);
    expect(raster.height).toBe(288);
    expect(raster.pixels).toHaveLength(256 * 288);
    expect(raster.pixels.every(p => p === 255)).toBe(true);
  });

  it('takes the high nibble first and scales by 17', () => {
    const raster = expandNibbles(new Uint8Array([0x0f, 0x80]), 4, 1);
    expect(Array.from(raster.pixels)).toEqual([0, 255, 136, 0]);
  });

  it('ignores bytes beyond the pixel count', () => {
    const raster = expandNibbles(new Uint8Array([0x12, 0x34, 0x56]), 3, 1);
    expect(Array.from(raster.pixels)).toEqual([17, 34, 51]);
  });

  it('fails on a buffer with too few samples', () => {
    expect(() => expandNibbles(new Uint8Array(3), 4, 2)).toThrow(
      new SensorInsufficientDataError(3, 4)
    );
    expect(new SensorInsufficientDataError(3, 4).message).toBe(
      'Insufficient data: received 3 bytes, required 4 bytes'
    );
  });

  it('rejects non-positive dimensions', () => {
    expect(() => expandNibbles(new Uint8Array(4), 0, 8)).toThrow(RangeError);
  });
});
