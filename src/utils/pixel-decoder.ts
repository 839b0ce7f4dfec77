// src/utils/pixel-decoder.ts

import { IMAGE_HEIGHT, IMAGE_WIDTH, NIBBLE_SCALE } from '../constants/constants.js';
import { SensorInsufficientDataError } from '../errors.js';
import { PixelRaster } from '../types/sensor-types.js';

/**
 * Expands packed 4-bit samples (two per byte, high nibble first) into an
 * 8-bit grayscale raster. Each nibble is multiplied by 17, so 0x0 → 0 and
 * 0xF → 255 exactly. Bytes beyond `width * height` samples are ignored.
 * @throws SensorInsufficientDataError if the buffer holds fewer than `width * height` samples
 * @throws RangeError for non-positive dimensions
 */
export function expandNibbles(
  raw: Uint8Array,
  width: number = IMAGE_WIDTH,
  height: number = IMAGE_HEIGHT
): PixelRaster {
  if (!Number.isInteger(width) || width <= 0 || !Number.isInteger(height) || height <= 0) {
    throw new RangeError(`Image dimensions must be positive integers, got ${width}x${height}`);
  }

  const pixelCount = width * height;
  if (raw.length * 2 < pixelCount) {
    throw new SensorInsufficientDataError(raw.length, Math.ceil(pixelCount / 2));
  }

  const pixels = new Uint8Array(pixelCount);
  let i = 0;
  for (const byte of raw) {
    if (i >= pixelCount) break;
    pixels[i++] = ((byte >> 4) & 0x0f) * NIBBLE_SCALE;
    if (i >= pixelCount) break;
    pixels[i++] = (byte & 0x0f) * NIBBLE_SCALE;
  }

  return { width, height, pixels };
}
