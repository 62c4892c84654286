/**
 * @module png-codec
 * PNG encoder/decoder for BGRA rasters, using fflate for the zlib streams.
 * Pure JS: no browser or native image APIs.
 *
 * Encoding always writes 8-bit RGBA with filter type 0. Decoding accepts
 * 8-bit grayscale, grayscale+alpha, RGB and RGBA, non-interlaced, with any
 * of the five scanline filters.
 *
 * @see https://www.w3.org/TR/PNG/ — PNG specification
 */

import { unzlibSync, zlibSync } from 'fflate';
import type { RasterData } from '@raster-edit/types';
import { PngFormatError } from './errors';
import { RasterBuffer } from './raster-buffer';

const PNG_SIGNATURE = new Uint8Array([137, 80, 78, 71, 13, 10, 26, 10]);

/** Bytes per pixel for each supported 8-bit colour type. */
const CHANNELS_BY_COLOR_TYPE: Readonly<Record<number, number>> = {
  0: 1, // grayscale
  2: 3, // RGB
  4: 2, // grayscale + alpha
  6: 4, // RGBA
};

// ── CRC32 ──

const crcTable = new Uint32Array(256);
for (let n = 0; n < 256; n++) {
  let c = n;
  for (let k = 0; k < 8; k++) {
    c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
  }
  crcTable[n] = c;
}

function crc32(data: Uint8Array): number {
  let crc = 0xffffffff;
  for (let i = 0; i < data.length; i++) {
    crc = crcTable[(crc ^ data[i]) & 0xff] ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
}

function write32(buf: Uint8Array, offset: number, value: number): void {
  buf[offset] = (value >>> 24) & 0xff;
  buf[offset + 1] = (value >>> 16) & 0xff;
  buf[offset + 2] = (value >>> 8) & 0xff;
  buf[offset + 3] = value & 0xff;
}

function read32(buf: Uint8Array, offset: number): number {
  return ((buf[offset] << 24) | (buf[offset + 1] << 16) | (buf[offset + 2] << 8) | buf[offset + 3]) >>> 0;
}

/** Serialize one chunk: length, type, data, CRC over type + data. */
function chunk(type: string, data: Uint8Array): Uint8Array {
  const out = new Uint8Array(12 + data.length);
  write32(out, 0, data.length);
  for (let i = 0; i < 4; i++) out[4 + i] = type.charCodeAt(i);
  out.set(data, 8);
  write32(out, 8 + data.length, crc32(out.subarray(4, 8 + data.length)));
  return out;
}

function concat(parts: Uint8Array[]): Uint8Array {
  let total = 0;
  for (const part of parts) total += part.length;
  const out = new Uint8Array(total);
  let pos = 0;
  for (const part of parts) {
    out.set(part, pos);
    pos += part.length;
  }
  return out;
}

/**
 * Encode a BGRA raster as an RGBA PNG file.
 * @returns PNG file bytes.
 */
export function encodeRasterPng(raster: RasterData): Uint8Array {
  const { width, height, bytes } = new RasterBuffer(raster.width, raster.height, raster.bytes);

  const rowBytes = width * 4;
  const scanlines = new Uint8Array(height * (1 + rowBytes));
  for (let y = 0; y < height; y++) {
    const lineStart = y * (1 + rowBytes); // filter byte stays 0 (None)
    for (let x = 0; x < width; x++) {
      const src = y * rowBytes + x * 4;
      const dst = lineStart + 1 + x * 4;
      scanlines[dst] = bytes[src + 2];
      scanlines[dst + 1] = bytes[src + 1];
      scanlines[dst + 2] = bytes[src];
      scanlines[dst + 3] = bytes[src + 3];
    }
  }

  const ihdr = new Uint8Array(13);
  write32(ihdr, 0, width);
  write32(ihdr, 4, height);
  ihdr[8] = 8; // bit depth
  ihdr[9] = 6; // colour type: RGBA

  return concat([
    PNG_SIGNATURE,
    chunk('IHDR', ihdr),
    chunk('IDAT', zlibSync(scanlines)),
    chunk('IEND', new Uint8Array(0)),
  ]);
}

/** Paeth predictor used by scanline filter type 4. */
function paethPredictor(a: number, b: number, c: number): number {
  const p = a + b - c;
  const pa = Math.abs(p - a);
  const pb = Math.abs(p - b);
  const pc = Math.abs(p - c);
  if (pa <= pb && pa <= pc) return a;
  if (pb <= pc) return b;
  return c;
}

/** Undo the per-scanline filters in place into `out`. */
function unfilter(raw: Uint8Array, out: Uint8Array, height: number, rowBytes: number, bpp: number): void {
  for (let y = 0; y < height; y++) {
    const filterType = raw[y * (1 + rowBytes)];
    const inOffset = y * (1 + rowBytes) + 1;
    const outOffset = y * rowBytes;

    for (let x = 0; x < rowBytes; x++) {
      const left = x >= bpp ? out[outOffset + x - bpp] : 0;
      const up = y > 0 ? out[outOffset - rowBytes + x] : 0;
      const upLeft = x >= bpp && y > 0 ? out[outOffset - rowBytes + x - bpp] : 0;
      const value = raw[inOffset + x];

      switch (filterType) {
        case 0: out[outOffset + x] = value; break;
        case 1: out[outOffset + x] = (value + left) & 0xff; break;
        case 2: out[outOffset + x] = (value + up) & 0xff; break;
        case 3: out[outOffset + x] = (value + ((left + up) >> 1)) & 0xff; break;
        case 4: out[outOffset + x] = (value + paethPredictor(left, up, upLeft)) & 0xff; break;
        default:
          throw new PngFormatError(`Unsupported PNG filter type: ${filterType}`);
      }
    }
  }
}

/**
 * Decode a PNG file into a BGRA raster.
 * @throws PngFormatError for anything other than 8-bit, non-interlaced gray/RGB(A).
 */
export function decodeRasterPng(png: Uint8Array): RasterBuffer {
  if (png.length < PNG_SIGNATURE.length || PNG_SIGNATURE.some((v, i) => png[i] !== v)) {
    throw new PngFormatError('Invalid PNG signature');
  }

  let width = 0;
  let height = 0;
  let channels = 0;
  const idat: Uint8Array[] = [];

  let offset = PNG_SIGNATURE.length;
  while (offset + 8 <= png.length) {
    const length = read32(png, offset);
    const type = String.fromCharCode(png[offset + 4], png[offset + 5], png[offset + 6], png[offset + 7]);
    const dataStart = offset + 8;
    if (dataStart + length + 4 > png.length) {
      throw new PngFormatError(`Truncated ${type} chunk`);
    }

    if (type === 'IHDR') {
      width = read32(png, dataStart);
      height = read32(png, dataStart + 4);
      const bitDepth = png[dataStart + 8];
      const colorType = png[dataStart + 9];
      const interlace = png[dataStart + 12];
      channels = CHANNELS_BY_COLOR_TYPE[colorType] ?? 0;
      if (bitDepth !== 8 || channels === 0) {
        throw new PngFormatError(
          `Unsupported PNG format: bitDepth=${bitDepth}, colorType=${colorType}. Only 8-bit gray/RGB(A) is supported.`,
        );
      }
      if (interlace !== 0) {
        throw new PngFormatError('Interlaced PNG images are not supported');
      }
    } else if (type === 'IDAT') {
      idat.push(png.subarray(dataStart, dataStart + length));
    } else if (type === 'IEND') {
      break;
    }

    offset = dataStart + length + 4; // skip data + CRC
  }

  if (channels === 0 || width === 0 || height === 0) {
    throw new PngFormatError('PNG missing IHDR chunk');
  }

  const rowBytes = width * channels;
  let raw: Uint8Array;
  try {
    raw = unzlibSync(concat(idat));
  } catch (error) {
    throw new PngFormatError(`Corrupt PNG image data: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (raw.length < height * (1 + rowBytes)) {
    throw new PngFormatError('PNG image data is shorter than its dimensions');
  }
  const pixels = new Uint8Array(height * rowBytes);
  unfilter(raw, pixels, height, rowBytes, channels);

  const result = RasterBuffer.blank(width, height);
  const out = result.bytes;
  for (let p = 0, i = 0; p < width * height; p++, i += channels) {
    let r: number, g: number, b: number, a: number;
    if (channels >= 3) {
      r = pixels[i]; g = pixels[i + 1]; b = pixels[i + 2];
      a = channels === 4 ? pixels[i + 3] : 255;
    } else {
      r = g = b = pixels[i];
      a = channels === 2 ? pixels[i + 1] : 255;
    }
    out[p * 4] = b;
    out[p * 4 + 1] = g;
    out[p * 4 + 2] = r;
    out[p * 4 + 3] = a;
  }
  return result;
}
