// src/utils/png.ts

import { PNG } from 'pngjs';
import { PixelRaster } from '../types/sensor-types.js';

/**
 * Encodes a raster as an 8-bit grayscale PNG.
 * @throws RangeError when the pixel count does not match the dimensions
 */
export function encodePng(raster: PixelRaster): Uint8Array {
  const { width, height, pixels } = raster;
  if (pixels.length !== width * height) {
    throw new RangeError(
      `Raster holds ${pixels.length} pixels, ${width}x${height} needs ${width * height}`
    );
  }
  const png = new PNG({ width, height });
  png.data = Buffer.from(pixels);
  return PNG.sync.write(png, {
    colorType: 0,
    inputColorType: 0,
    inputHasAlpha: false,
    bitDepth: 8,
  });
}
