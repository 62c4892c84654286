/**
 * @module raster-buffer
 * Fixed-format BGRA pixel storage.
 *
 * A RasterBuffer owns its byte array. Filters never write into a buffer they
 * were given; they allocate a new one, so history entries can be shared
 * without copying until they are pushed.
 */

import { BYTES_PER_PIXEL } from '@raster-edit/types';
import type { RasterData } from '@raster-edit/types';
import { InvalidDimensionsError } from './errors';

function isDimension(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

/** Concrete {@link RasterData} with validated dimensions. */
export class RasterBuffer implements RasterData {
  readonly width: number;
  readonly height: number;
  readonly bytes: Uint8Array;

  /**
   * Wrap `bytes` without copying.
   * @throws InvalidDimensionsError when the length is not `width * height * 4`.
   */
  constructor(width: number, height: number, bytes: Uint8Array) {
    if (!isDimension(width) || !isDimension(height) || bytes.length !== width * height * BYTES_PER_PIXEL) {
      throw new InvalidDimensionsError(width, height, bytes.length);
    }
    this.width = width;
    this.height = height;
    this.bytes = bytes;
  }

  /** Copy caller-owned bytes into a new buffer. */
  static from(bytes: ArrayLike<number>, width: number, height: number): RasterBuffer {
    return new RasterBuffer(width, height, Uint8Array.from(bytes));
  }

  /** Zero-filled (transparent black) buffer. */
  static blank(width: number, height: number): RasterBuffer {
    if (!isDimension(width) || !isDimension(height)) {
      throw new InvalidDimensionsError(width, height, 0);
    }
    return new RasterBuffer(width, height, new Uint8Array(width * height * BYTES_PER_PIXEL));
  }

  /** Bytes per row. */
  get stride(): number {
    return this.width * BYTES_PER_PIXEL;
  }

  get pixelCount(): number {
    return this.width * this.height;
  }

  /** Byte index of the blue channel of pixel (x, y). */
  offsetOf(x: number, y: number): number {
    return y * this.stride + x * BYTES_PER_PIXEL;
  }

  /** Deep copy. The clone never shares storage with this buffer. */
  clone(): RasterBuffer {
    return new RasterBuffer(this.width, this.height, new Uint8Array(this.bytes));
  }

  /** Same dimensions and identical bytes. */
  equals(other: RasterData): boolean {
    if (other.width !== this.width || other.height !== this.height) return false;
    const a = this.bytes;
    const b = other.bytes;
    if (a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
      if (a[i] !== b[i]) return false;
    }
    return true;
  }
}
