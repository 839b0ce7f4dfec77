// src/utils/pgm.ts

import { PixelRaster } from '../types/sensor-types.js';
import { concatUint8Arrays } from './utils.js';

/**
 * Encodes a raster as binary PGM (P5, maxval 255).
 * @throws RangeError when the pixel count does not match the dimensions
 */
export function encodePgm(raster: PixelRaster): Uint8Array {
  const { width, height, pixels } = raster;
  if (pixels.length !== width * height) {
    throw new RangeError(
      `Raster holds ${pixels.length} pixels, ${width}x${height} needs ${width * height}`
    );
  }
  const header = new TextEncoder().encode(`P5\n${width} ${height}\n255\n`);
  return concatUint8Arrays([header, pixels]);
}
