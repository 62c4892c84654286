/**
 * @module filters/pixel-math
 * Integer helpers shared by the filter implementations.
 *
 * All filters truncate toward zero and then clamp; nothing rounds.
 */

/** Clamp an integer to 0-255. */
export function clampByte(v: number): number {
  return v < 0 ? 0 : v > 255 ? 255 : v;
}

/** Truncate toward zero, then clamp to 0-255. */
export function truncByte(v: number): number {
  return clampByte(Math.trunc(v));
}

/**
 * Luminosity-weighted gray level (0.299 R + 0.587 G + 0.114 B), truncated.
 * Weights are applied as integer per-mille so a gray pixel maps to itself.
 */
export function luma(blue: number, green: number, red: number): number {
  return Math.trunc((114 * blue + 587 * green + 299 * red) / 1000);
}
