/**
 * @module filters/blur
 * Gaussian blur approximated by repeated separable box blur.
 * All functions create a new RasterBuffer and do NOT modify the input.
 */

import { RasterBuffer } from '../raster-buffer';

/** Box blur passes used to approximate a Gaussian kernel. */
const GAUSSIAN_PASSES = 3;

/**
 * Single-pass horizontal box blur.
 * Only in-bounds samples are averaged; alpha is copied from `src`.
 */
function boxBlurH(src: Uint8Array, dst: Uint8Array, w: number, h: number, r: number): void {
  const stride = w * 4;
  for (let y = 0; y < h; y++) {
    const row = y * stride;
    for (let x = 0; x < w; x++) {
      let sumB = 0, sumG = 0, sumR = 0, count = 0;
      const from = Math.max(0, x - r);
      const to = Math.min(w - 1, x + r);
      for (let nx = from; nx <= to; nx++) {
        const idx = row + nx * 4;
        sumB += src[idx]; sumG += src[idx + 1]; sumR += src[idx + 2];
        count++;
      }
      const ti = row + x * 4;
      dst[ti] = Math.trunc(sumB / count);
      dst[ti + 1] = Math.trunc(sumG / count);
      dst[ti + 2] = Math.trunc(sumR / count);
      dst[ti + 3] = src[ti + 3];
    }
  }
}

/**
 * Single-pass vertical box blur.
 */
function boxBlurV(src: Uint8Array, dst: Uint8Array, w: number, h: number, r: number): void {
  const stride = w * 4;
  for (let y = 0; y < h; y++) {
    const from = Math.max(0, y - r);
    const to = Math.min(h - 1, y + r);
    const count = to - from + 1;
    for (let x = 0; x < w; x++) {
      let sumB = 0, sumG = 0, sumR = 0;
      for (let ny = from; ny <= to; ny++) {
        const idx = ny * stride + x * 4;
        sumB += src[idx]; sumG += src[idx + 1]; sumR += src[idx + 2];
      }
      const ti = y * stride + x * 4;
      dst[ti] = Math.trunc(sumB / count);
      dst[ti + 1] = Math.trunc(sumG / count);
      dst[ti + 2] = Math.trunc(sumR / count);
      dst[ti + 3] = src[ti + 3];
    }
  }
}

/**
 * One horizontal-then-vertical box blur with a window of `2 * radius + 1`.
 * @returns A new raster; `source` is not modified.
 */
export function boxBlur(source: RasterBuffer, radius: number): RasterBuffer {
  const { width: w, height: h } = source;
  const horizontal = new Uint8Array(source.bytes.length);
  boxBlurH(source.bytes, horizontal, w, h, radius);
  const result = RasterBuffer.blank(w, h);
  boxBlurV(horizontal, result.bytes, w, h, radius);
  return result;
}

/**
 * Apply an approximate Gaussian blur.
 *
 * Three box passes converge toward a Gaussian-shaped kernel. Radius is
 * truncated to an integer; a radius of zero or less returns an unmodified copy.
 *
 * @param source - Source raster.
 * @param radius - Box radius in pixels (1-10 in the UI).
 * @returns New blurred raster.
 */
export function gaussianBlur(source: RasterBuffer, radius: number): RasterBuffer {
  const r = Math.trunc(radius);
  if (!(r > 0)) return source.clone();

  let result = source;
  for (let pass = 0; pass < GAUSSIAN_PASSES; pass++) {
    result = boxBlur(result, r);
  }
  return result;
}
