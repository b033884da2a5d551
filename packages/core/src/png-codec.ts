/**
 * @module png-codec
 * PNG encoder/decoder for exporting rendered compositions and loading
 * captured or generated images. Uses fflate for deflate/inflate, so it needs
 * no native image library. IDAT data is zlib-framed as the format requires.
 *
 * Encodes 8-bit RGBA. Decodes 8-bit RGB and RGBA, non-interlaced.
 *
 * @see https://www.w3.org/TR/PNG/
 */

import { unzlibSync, zlibSync } from 'fflate';
import type { RasterBuffer } from '@cutout-studio/types';
import { InvalidInputError } from './errors';

const crcTable = new Uint32Array(256);
for (let n = 0; n < 256; n++) {
  let c = n;
  for (let k = 0; k < 8; k++) {
    c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
  }
  crcTable[n] = c;
}

function crc32(data: Uint8Array, start: number, end: number): number {
  let crc = 0xffffffff;
  for (let i = start; i < end; i++) {
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
  return (
    ((buf[offset] << 24) | (buf[offset + 1] << 16) | (buf[offset + 2] << 8) | buf[offset + 3]) >>>
    0
  );
}

const PNG_SIGNATURE = new Uint8Array([137, 80, 78, 71, 13, 10, 26, 10]);

/** PNG color types this codec reads, mapped to bytes per pixel. */
const BYTES_PER_PIXEL: Record<number, number> = { 2: 3, 6: 4 };

/** Append one chunk (length, type, data, CRC) at `offset`; returns the new offset. */
function writeChunk(out: Uint8Array, offset: number, type: string, data: Uint8Array): number {
  write32(out, offset, data.length);
  const typeStart = offset + 4;
  for (let i = 0; i < 4; i++) {
    out[typeStart + i] = type.charCodeAt(i);
  }
  out.set(data, typeStart + 4);
  const end = typeStart + 4 + data.length;
  write32(out, end, crc32(out, typeStart, end));
  return end + 4;
}

/**
 * Encode an RGBA raster as a PNG file.
 * Each scanline uses the Sub filter, which compresses flat color runs well.
 *
 * @throws {InvalidInputError} If the buffer length does not match the dimensions.
 */
export function encodePng(image: RasterBuffer): Uint8Array {
  const { data, width, height } = image;
  if (width <= 0 || height <= 0 || data.length !== width * height * 4) {
    throw new InvalidInputError(
      `Image data length (${data.length}) does not match dimensions (${width}x${height}x4 = ${width * height * 4})`,
    );
  }

  const rowBytes = width * 4;
  const raw = new Uint8Array(height * (1 + rowBytes));
  for (let y = 0; y < height; y++) {
    const rowStart = y * (1 + rowBytes);
    raw[rowStart] = 1; // filter: Sub
    for (let x = 0; x < rowBytes; x++) {
      const value = data[y * rowBytes + x];
      const left = x >= 4 ? data[y * rowBytes + x - 4] : 0;
      raw[rowStart + 1 + x] = (value - left) & 0xff;
    }
  }
  const compressed = zlibSync(raw);

  const ihdr = new Uint8Array(13);
  write32(ihdr, 0, width);
  write32(ihdr, 4, height);
  ihdr[8] = 8; // bit depth
  ihdr[9] = 6; // color type: RGBA

  const out = new Uint8Array(8 + (12 + 13) + (12 + compressed.length) + 12);
  out.set(PNG_SIGNATURE, 0);
  let offset = writeChunk(out, 8, 'IHDR', ihdr);
  offset = writeChunk(out, offset, 'IDAT', compressed);
  writeChunk(out, offset, 'IEND', new Uint8Array(0));
  return out;
}

/**
 * Decode a PNG file into an RGBA raster. RGB images get an opaque alpha channel.
 *
 * @throws {InvalidInputError} On a bad signature, missing header or unsupported format.
 */
export function decodePng(png: Uint8Array): RasterBuffer {
  for (let i = 0; i < 8; i++) {
    if (png[i] !== PNG_SIGNATURE[i]) {
      throw new InvalidInputError('Invalid PNG signature');
    }
  }

  let width = 0;
  let height = 0;
  let bpp = 0;
  const idatChunks: Uint8Array[] = [];

  let offset = 8;
  while (offset < png.length) {
    const length = read32(png, offset);
    const type = String.fromCharCode(png[offset + 4], png[offset + 5], png[offset + 6], png[offset + 7]);
    const dataStart = offset + 8;

    if (type === 'IHDR') {
      width = read32(png, dataStart);
      height = read32(png, dataStart + 4);
      const bitDepth = png[dataStart + 8];
      const colorType = png[dataStart + 9];
      const interlace = png[dataStart + 12];
      bpp = BYTES_PER_PIXEL[colorType] ?? 0;
      if (bitDepth !== 8 || bpp === 0 || interlace !== 0) {
        throw new InvalidInputError(
          `Unsupported PNG format: bitDepth=${bitDepth}, colorType=${colorType}, interlace=${interlace}`,
        );
      }
    } else if (type === 'IDAT') {
      idatChunks.push(png.subarray(dataStart, dataStart + length));
    } else if (type === 'IEND') {
      break;
    }
    offset = dataStart + length + 4;
  }

  if (width === 0 || height === 0) {
    throw new InvalidInputError('PNG missing IHDR chunk');
  }

  let totalLen = 0;
  for (const chunk of idatChunks) totalLen += chunk.length;
  const combined = new Uint8Array(totalLen);
  let pos = 0;
  for (const chunk of idatChunks) {
    combined.set(chunk, pos);
    pos += chunk.length;
  }

  const raw = unzlibSync(combined);
  const rowBytes = width * bpp;
  const pixels = new Uint8Array(height * rowBytes);

  for (let y = 0; y < height; y++) {
    const filterType = raw[y * (1 + rowBytes)];
    const inStart = y * (1 + rowBytes) + 1;
    const outStart = y * rowBytes;

    for (let x = 0; x < rowBytes; x++) {
      const a = x >= bpp ? pixels[outStart + x - bpp] : 0;
      const b = y > 0 ? pixels[outStart - rowBytes + x] : 0;
      const c = x >= bpp && y > 0 ? pixels[outStart - rowBytes + x - bpp] : 0;
      const value = raw[inStart + x];

      let predicted: number;
      switch (filterType) {
        case 0: predicted = 0; break;
        case 1: predicted = a; break;
        case 2: predicted = b; break;
        case 3: predicted = (a + b) >> 1; break;
        case 4: predicted = paethPredictor(a, b, c); break;
        default:
          throw new InvalidInputError(`Unsupported PNG filter type: ${filterType}`);
      }
      pixels[outStart + x] = (value + predicted) & 0xff;
    }
  }

  if (bpp === 4) {
    return { width, height, data: new Uint8ClampedArray(pixels.buffer, pixels.byteOffset, pixels.length) };
  }

  const rgba = new Uint8ClampedArray(width * height * 4);
  for (let i = 0, j = 0; i < pixels.length; i += 3, j += 4) {
    rgba[j] = pixels[i];
    rgba[j + 1] = pixels[i + 1];
    rgba[j + 2] = pixels[i + 2];
    rgba[j + 3] = 255;
  }
  return { width, height, data: rgba };
}

/** Paeth predictor used by PNG filter type 4. */
function paethPredictor(a: number, b: number, c: number): number {
  const p = a + b - c;
  const pa = Math.abs(p - a);
  const pb = Math.abs(p - b);
  const pc = Math.abs(p - c);
  if (pa <= pb && pa <= pc) return a;
  if (pb <= pc) return b;
  return c;
}
