import { describe, it, expect } from 'vitest';
import { encodePgm } from './pgm.js';

describe('encodePgm', () => {
  it('writes a binary PGM header followed by the pixels', () => {
    const pgm = encodePgm({ width: 2, height: 1, pixels: new Uint8Array([0, 255]) });

    expect(new TextDecoder().decode(pgm.subarray(0, 11))).toBe('P5\n2 1\n255\n');
    expect(Array.from(pgm.subarray(11))).toEqual([0, 255]);
  });

  it('rejects a raster whose size does not match its dimensions', () => {
    expect(() => encodePgm({ width: 2, height: 2, pixels: new Uint8Array(3) })).toThrow(RangeError);
  });
});
