/**
 * @module test-helpers
 * Raster fixtures shared by the core test suites.
 */

import { RasterBuffer } from './raster-buffer';

/** One BGRA pixel. */
export type Bgra = [number, number, number, number];

/** Every pixel set to `color`. */
export function solid(width: number, height: number, color: Bgra): RasterBuffer {
  const buffer = RasterBuffer.blank(width, height);
  for (let i = 0; i < buffer.bytes.length; i += 4) {
    buffer.bytes.set(color, i);
  }
  return buffer;
}

/** Build a raster from row-major pixels. */
export function fromPixels(width: number, height: number, pixels: Bgra[]): RasterBuffer {
  return RasterBuffer.from(pixels.flat(), width, height);
}

/** Read pixel (x, y) as [B, G, R, A]. */
export function pixelAt(buffer: RasterBuffer, x: number, y: number): Bgra {
  const i = buffer.offsetOf(x, y);
  const d = buffer.bytes;
  return [d[i], d[i + 1], d[i + 2], d[i + 3]];
}

/** A small image with distinct, non-gray pixels. */
export function sampleImage(): RasterBuffer {
  return fromPixels(3, 2, [
    [100, 150, 200, 255], [0, 10, 250, 128], [33, 66, 99, 0],
    [255, 255, 255, 255], [12, 200, 7, 64], [128, 128, 128, 255],
  ]);
}
