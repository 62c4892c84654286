/**
 * @module raster
 * Raster buffer contract shared by every package.
 *
 * Pixels are stored as a flat byte sequence, 4 bytes per pixel, in
 * blue-green-red-alpha order. Row stride is always `width * 4`.
 */

/** Number of bytes per pixel (B, G, R, A). */
export const BYTES_PER_PIXEL = 4;

/** Byte offsets of each channel inside a pixel. */
export enum Channel {
  Blue = 0,
  Green = 1,
  Red = 2,
  Alpha = 3,
}

/** Read-only view of a 4-channel 8-bit raster. */
export interface RasterData {
  /** Width in pixels. */
  readonly width: number;
  /** Height in pixels. */
  readonly height: number;
  /** BGRA pixel bytes. Length is `width * height * 4`. */
  readonly bytes: Uint8Array;
}

