/**
 * @module filters/edge
 * Sobel edge detection.
 */

import { RasterBuffer } from '../raster-buffer';
import { grayscale } from './basic';
import { truncByte } from './pixel-math';

/** Horizontal gradient kernel. */
const SOBEL_X: readonly (readonly number[])[] = [
  [-1, 0, 1],
  [-2, 0, 2],
  [-1, 0, 1],
];

/** Vertical gradient kernel. */
const SOBEL_Y: readonly (readonly number[])[] = [
  [-1, -2, -1],
  [0, 0, 0],
  [1, 2, 1],
];

/**
 * Detect edges with the Sobel operator on the grayscale image.
 *
 * Only strictly interior pixels are written (gradient magnitude in R, G and B,
 * alpha 255). The output starts zero-filled, so the outermost 1-pixel ring
 * ends up transparent black, and images under 3 px in either dimension come
 * out entirely zero.
 */
export function edgeDetection(source: RasterBuffer): RasterBuffer {
  const gray = grayscale(source).bytes;
  const { width, height, stride } = source;
  const output = RasterBuffer.blank(width, height);
  const out = output.bytes;

  for (let y = 1; y < height - 1; y++) {
    for (let x = 1; x < width - 1; x++) {
      let gx = 0;
      let gy = 0;
      for (let ky = -1; ky <= 1; ky++) {
        for (let kx = -1; kx <= 1; kx++) {
          // channels are equal after grayscale; read blue
          const value = gray[(y + ky) * stride + (x + kx) * 4];
          gx += value * SOBEL_X[ky + 1][kx + 1];
          gy += value * SOBEL_Y[ky + 1][kx + 1];
        }
      }
      const magnitude = truncByte(Math.sqrt(gx * gx + gy * gy));
      const oi = y * stride + x * 4;
      out[oi] = magnitude;
      out[oi + 1] = magnitude;
      out[oi + 2] = magnitude;
      out[oi + 3] = 255;
    }
  }

  return output;
}
