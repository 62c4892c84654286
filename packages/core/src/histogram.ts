/**
 * @module histogram
 * Per-channel intensity counts for a raster.
 */

import { BYTES_PER_PIXEL, Channel } from '@raster-edit/types';
import type { ImageHistogram, RasterData } from '@raster-edit/types';
import { RasterBuffer } from './raster-buffer';

/** Number of intensity levels per 8-bit channel. */
export const HISTOGRAM_BINS = 256;

/**
 * Count how many pixels have each red, green and blue intensity.
 * Alpha is ignored. `maxValue` is the largest bin across all three channels.
 *
 * @throws InvalidDimensionsError if `raster` does not satisfy the BGRA length invariant.
 */
export function computeHistogram(raster: RasterData): ImageHistogram {
  // Re-wrapping validates plain RasterData objects without copying.
  const { bytes } = raster instanceof RasterBuffer
    ? raster
    : new RasterBuffer(raster.width, raster.height, raster.bytes);

  const red = new Array<number>(HISTOGRAM_BINS).fill(0);
  const green = new Array<number>(HISTOGRAM_BINS).fill(0);
  const blue = new Array<number>(HISTOGRAM_BINS).fill(0);

  for (let i = 0; i < bytes.length; i += BYTES_PER_PIXEL) {
    blue[bytes[i + Channel.Blue]]++;
    green[bytes[i + Channel.Green]]++;
    red[bytes[i + Channel.Red]]++;
  }

  let maxValue = 0;
  for (let v = 0; v < HISTOGRAM_BINS; v++) {
    maxValue = Math.max(maxValue, red[v], green[v], blue[v]);
  }

  return { red, green, blue, maxValue };
}

/** Sum of one channel's bins; equals the pixel count of the source raster. */
export function histogramTotal(bins: readonly number[]): number {
  let total = 0;
  for (const count of bins) total += count;
  return total;
}
