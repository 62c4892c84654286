/**
 * @module filters/basic
 * Per-pixel colour filters: grayscale and sepia.
 * All functions create a new RasterBuffer and do NOT modify the input.
 */

import { RasterBuffer } from '../raster-buffer';
import { luma, truncByte } from './pixel-math';

/**
 * Convert to grayscale using the luminosity weights (0.299 R, 0.587 G, 0.114 B).
 * Alpha is left unchanged. Applying it twice gives the same result as once.
 */
export function grayscale(source: RasterBuffer): RasterBuffer {
  const result = source.clone();
  const d = result.bytes;
  for (let i = 0; i < d.length; i += 4) {
    const gray = luma(d[i], d[i + 1], d[i + 2]);
    d[i] = gray; d[i + 1] = gray; d[i + 2] = gray;
  }
  return result;
}

/**
 * Apply the standard sepia tone matrix, truncating each channel.
 * @param source - BGRA raster.
 * @returns New raster with warm brown tones.
 */
export function sepia(source: RasterBuffer): RasterBuffer {
  const result = source.clone();
  const d = result.bytes;
  for (let i = 0; i < d.length; i += 4) {
    const b = d[i], g = d[i + 1], r = d[i + 2];
    d[i + 2] = truncByte(0.393 * r + 0.769 * g + 0.189 * b);
    d[i + 1] = truncByte(0.349 * r + 0.686 * g + 0.168 * b);
    d[i] = truncByte(0.272 * r + 0.534 * g + 0.131 * b);
  }
  return result;
}
