/**
 * @module filters/adjustments
 * Tone adjustments: brightness, contrast, and the combined single-pass variant.
 * All functions create a new RasterBuffer and do NOT modify the input.
 */

import { RasterBuffer } from '../raster-buffer';
import { clampByte, truncByte } from './pixel-math';

/** Map a -100..100 brightness amount to an additive offset of roughly -255..255. */
export function brightnessOffset(amount: number): number {
  return Math.trunc(amount * 2.55);
}

/** Map a -100..100 contrast amount to a non-negative scale around mid-gray. */
export function contrastFactor(amount: number): number {
  return Math.max(0, (100 + amount) / 100);
}

/**
 * Adjust brightness of an image.
 * @param source - Source raster.
 * @param amount - Brightness adjustment (-100 to 100).
 * @returns New raster with adjusted brightness. Alpha is untouched.
 */
export function brightness(source: RasterBuffer, amount: number): RasterBuffer {
  const result = source.clone();
  const d = result.bytes;
  const adj = brightnessOffset(amount);
  for (let i = 0; i < d.length; i += 4) {
    d[i] = clampByte(d[i] + adj);
    d[i + 1] = clampByte(d[i + 1] + adj);
    d[i + 2] = clampByte(d[i + 2] + adj);
  }
  return result;
}

/**
 * Adjust contrast by scaling each channel's distance from 128.
 * @param source - Source raster.
 * @param amount - Contrast adjustment (-100 to 100). -100 flattens to gray.
 * @returns New raster with adjusted contrast.
 */
export function contrast(source: RasterBuffer, amount: number): RasterBuffer {
  const result = source.clone();
  const d = result.bytes;
  const factor = contrastFactor(amount);
  for (let i = 0; i < d.length; i += 4) {
    d[i] = truncByte(factor * (d[i] - 128) + 128);
    d[i + 1] = truncByte(factor * (d[i + 1] - 128) + 128);
    d[i + 2] = truncByte(factor * (d[i + 2] - 128) + 128);
  }
  return result;
}

/**
 * Contrast and brightness in one pass.
 *
 * The offset is added before truncation, so the output can differ by one
 * level from `brightness(contrast(x, c), b)`.
 */
export function brightnessContrast(source: RasterBuffer, brightnessAmount: number, contrastAmount: number): RasterBuffer {
  const result = source.clone();
  const d = result.bytes;
  const adj = brightnessOffset(brightnessAmount);
  const factor = contrastFactor(contrastAmount);
  for (let i = 0; i < d.length; i += 4) {
    d[i] = truncByte(factor * (d[i] - 128) + 128 + adj);
    d[i + 1] = truncByte(factor * (d[i + 1] - 128) + 128 + adj);
    d[i + 2] = truncByte(factor * (d[i + 2] - 128) + 128 + adj);
  }
  return result;
}
