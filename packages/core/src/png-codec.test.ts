import { describe, it, expect } from 'vitest';
import { unzlibSync, zlibSync } from 'fflate';
import { PngFormatError } from './errors';
import { decodeRasterPng, encodeRasterPng } from './png-codec';
import { RasterBuffer } from './raster-buffer';
import { pixelAt, sampleImage } from './test-helpers';

const SIGNATURE = [137, 80, 78, 71, 13, 10, 26, 10];

function u32(value: number): number[] {
  return [(value >>> 24) & 0xff, (value >>> 16) & 0xff, (value >>> 8) & 0xff, value & 0xff];
}

/** Chunk with a zero CRC; the decoder does not check it. */
function chunk(type: string, data: ArrayLike<number>): number[] {
  return [...u32(data.length), ...Array.from(type, (c) => c.charCodeAt(0)), ...Array.from(data), 0, 0, 0, 0];
}

function ihdr(width: number, height: number, colorType: number, bitDepth = 8, interlace = 0): number[] {
  return chunk('IHDR', [...u32(width), ...u32(height), bitDepth, colorType, 0, 0, interlace]);
}

function png(...chunks: number[][]): Uint8Array {
  return Uint8Array.from([...SIGNATURE, ...chunks.flat(), ...chunk('IEND', [])]);
}

function idat(scanlines: number[]): number[] {
  return chunk('IDAT', zlibSync(Uint8Array.from(scanlines)));
}

describe('encodeRasterPng', () => {
  it('writes the PNG signature and an RGBA header', () => {
    const bytes = encodeRasterPng(RasterBuffer.from([100, 150, 200, 255], 1, 1));
    expect(Array.from(bytes.subarray(0, 8))).toEqual(SIGNATURE);
    expect(String.fromCharCode(...bytes.subarray(12, 16))).toBe('IHDR');
    // width, height, bit depth 8, colour type 6
    expect(Array.from(bytes.subarray(16, 26))).toEqual([0, 0, 0, 1, 0, 0, 0, 1, 8, 6]);
  });

  it('stores unfiltered RGBA scanlines', () => {
    const bytes = encodeRasterPng(RasterBuffer.from([100, 150, 200, 255], 1, 1));
    const length = (bytes[33] << 24) | (bytes[34] << 16) | (bytes[35] << 8) | bytes[36];
    expect(String.fromCharCode(...bytes.subarray(37, 41))).toBe('IDAT');
    expect(Array.from(unzlibSync(bytes.subarray(41, 41 + length)))).toEqual([0, 200, 150, 100, 255]);
  });

  it('writes the standard CRC of the IEND chunk', () => {
    const bytes = encodeRasterPng(RasterBuffer.from([0, 0, 0, 0], 1, 1));
    expect(Array.from(bytes.subarray(bytes.length - 4))).toEqual([0xae, 0x42, 0x60, 0x82]);
  });

  it('decodes back to the same raster', () => {
    const image = sampleImage();
    expect(decodeRasterPng(encodeRasterPng(image)).equals(image)).toBe(true);
  });
});

describe('decodeRasterPng', () => {
  it('undoes the Sub filter on RGB data', () => {
    const decoded = decodeRasterPng(png(ihdr(2, 1, 2), idat([1, 10, 20, 30, 5, 5, 5])));
    expect(pixelAt(decoded, 0, 0)).toEqual([30, 20, 10, 255]);
    expect(pixelAt(decoded, 1, 0)).toEqual([35, 25, 15, 255]);
  });

  it('undoes the Up filter on RGBA data', () => {
    const decoded = decodeRasterPng(png(ihdr(1, 2, 6), idat([0, 1, 2, 3, 4, 2, 1, 1, 1, 1])));
    expect(pixelAt(decoded, 0, 0)).toEqual([3, 2, 1, 4]);
    expect(pixelAt(decoded, 0, 1)).toEqual([4, 3, 2, 5]);
  });

  it('expands grayscale with alpha', () => {
    const decoded = decodeRasterPng(png(ihdr(1, 1, 4), idat([0, 77, 128])));
    expect(pixelAt(decoded, 0, 0)).toEqual([77, 77, 77, 128]);
  });

  it('joins split IDAT chunks', () => {
    const stream = Array.from(zlibSync(Uint8Array.from([0, 9])));
    const decoded = decodeRasterPng(
      png(ihdr(1, 1, 0), chunk('IDAT', stream.slice(0, 2)), chunk('IDAT', stream.slice(2))),
    );
    expect(pixelAt(decoded, 0, 0)).toEqual([9, 9, 9, 255]);
  });

  it('rejects a bad signature', () => {
    expect(() => decodeRasterPng(Uint8Array.from([1, 2, 3]))).toThrow(
      new PngFormatError('Invalid PNG signature'),
    );
  });

  it('rejects 16-bit images', () => {
    expect(() => decodeRasterPng(png(ihdr(1, 1, 6, 16), idat([0])))).toThrow(PngFormatError);
  });

  it('rejects palette images', () => {
    expect(() => decodeRasterPng(png(ihdr(1, 1, 3), idat([0, 0])))).toThrow(/colorType=3/);
  });

  it('rejects interlaced images', () => {
    expect(() => decodeRasterPng(png(ihdr(1, 1, 0, 8, 1), idat([0, 0])))).toThrow(
      'Interlaced PNG images are not supported',
    );
  });

  it('rejects a file without a header', () => {
    expect(() => decodeRasterPng(png())).toThrow('PNG missing IHDR chunk');
  });

  it('rejects a truncated chunk', () => {
    const bytes = Uint8Array.from([...SIGNATURE, ...u32(13), 73, 72, 68, 82, 0, 0]);
    expect(() => decodeRasterPng(bytes)).toThrow('Truncated IHDR chunk');
  });

  it('rejects image data that is not a zlib stream', () => {
    expect(() => decodeRasterPng(png(ihdr(1, 1, 0), chunk('IDAT', [1, 2, 3])))).toThrow(
      /^Corrupt PNG image data/,
    );
  });

  it('rejects image data shorter than the header says', () => {
    expect(() => decodeRasterPng(png(ihdr(2, 2, 6), idat([0, 1, 2])))).toThrow(
      'PNG image data is shorter than its dimensions',
    );
  });

  it('rejects an unknown scanline filter', () => {
    expect(() => decodeRasterPng(png(ihdr(1, 1, 0), idat([7, 0])))).toThrow('Unsupported PNG filter type: 7');
  });
});
