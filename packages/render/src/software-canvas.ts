/**
 * @module software-canvas
 * A premultiplied floating-point drawing surface.
 *
 * Pixels accumulate as premultiplied RGBA in [0, 1] and are quantized once,
 * in {@link SoftwareCanvas.toRaster}. Drawing maps every destination pixel
 * center back into the source through the inverse transform and samples it
 * bilinearly, so the output depends only on the inputs.
 */

import type { Color, RasterBuffer } from '@cutout-studio/types';
import { invertMatrix, transformedBounds, transformPoint, type Matrix2D } from '@cutout-studio/core';

/** Premultiplied copy of a raster, channels in [0, 1]. */
interface PremultipliedImage {
  width: number;
  height: number;
  data: Float32Array;
}

function premultiply(raster: RasterBuffer): PremultipliedImage {
  const { width, height, data } = raster;
  const out = new Float32Array(data.length);
  for (let i = 0; i < data.length; i += 4) {
    const a = data[i + 3] / 255;
    out[i] = (data[i] / 255) * a;
    out[i + 1] = (data[i + 1] / 255) * a;
    out[i + 2] = (data[i + 2] / 255) * a;
    out[i + 3] = a;
  }
  return { width, height, data: out };
}

/**
 * Bilinear sample at continuous pixel coordinates, where integer coordinates
 * hit pixel centers. Coordinates are clamped to the image.
 */
function sampleBilinear(image: PremultipliedImage, x: number, y: number, out: Float32Array): void {
  const { width, height, data } = image;
  const cx = Math.max(0, Math.min(width - 1, x));
  const cy = Math.max(0, Math.min(height - 1, y));
  const x0 = Math.floor(cx);
  const y0 = Math.floor(cy);
  const x1 = Math.min(width - 1, x0 + 1);
  const y1 = Math.min(height - 1, y0 + 1);
  const fx = cx - x0;
  const fy = cy - y0;

  const i00 = (y0 * width + x0) * 4;
  const i10 = (y0 * width + x1) * 4;
  const i01 = (y1 * width + x0) * 4;
  const i11 = (y1 * width + x1) * 4;
  for (let c = 0; c < 4; c++) {
    const top = data[i00 + c] + (data[i10 + c] - data[i00 + c]) * fx;
    const bottom = data[i01 + c] + (data[i11 + c] - data[i01 + c]) * fx;
    out[c] = top + (bottom - top) * fy;
  }
}

export class SoftwareCanvas {
  readonly width: number;
  readonly height: number;
  private readonly pixels: Float64Array;

  /** Creates a fully transparent canvas. */
  constructor(width: number, height: number) {
    this.width = width;
    this.height = height;
    this.pixels = new Float64Array(width * height * 4);
  }

  /** Replace every pixel with one color. */
  fill(color: Color): void {
    const a = Math.max(0, Math.min(1, color.a));
    for (let i = 0; i < this.pixels.length; i += 4) {
      this.pixels[i] = (color.r / 255) * a;
      this.pixels[i + 1] = (color.g / 255) * a;
      this.pixels[i + 2] = (color.b / 255) * a;
      this.pixels[i + 3] = a;
    }
  }

  /**
   * Scale `image` to cover the whole canvas, keeping its aspect ratio, and
   * center it. Whatever overflows is cropped.
   */
  drawAspectFill(image: RasterBuffer): void {
    const scale = Math.max(this.width / image.width, this.height / image.height);
    const offsetX = (this.width - image.width * scale) / 2;
    const offsetY = (this.height - image.height * scale) / 2;
    this.drawTransformed(image, [scale, 0, 0, scale, offsetX, offsetY], 1);
  }

  /**
   * Source-over draw of `image` through `matrix`, which maps image pixel
   * space (origin at the top-left corner) to canvas pixel space.
   *
   * @param opacity - Uniform multiplier on the image alpha.
   * @returns false if the matrix is singular and nothing was drawn.
   */
  drawTransformed(image: RasterBuffer, matrix: Matrix2D, opacity: number): boolean {
    const inverse = invertMatrix(matrix);
    if (!inverse) return false;

    const source = premultiply(image);
    const bounds = transformedBounds(matrix, image.width, image.height);
    const x0 = Math.max(0, Math.floor(bounds.x));
    const y0 = Math.max(0, Math.floor(bounds.y));
    const x1 = Math.min(this.width, Math.ceil(bounds.x + bounds.width));
    const y1 = Math.min(this.height, Math.ceil(bounds.y + bounds.height));
    const sample = new Float32Array(4);

    for (let y = y0; y < y1; y++) {
      for (let x = x0; x < x1; x++) {
        const p = transformPoint(inverse, { x: x + 0.5, y: y + 0.5 });
        if (p.x < 0 || p.y < 0 || p.x >= image.width || p.y >= image.height) continue;
        sampleBilinear(source, p.x - 0.5, p.y - 0.5, sample);

        const srcA = sample[3] * opacity;
        if (srcA <= 0) continue;
        const inv = 1 - srcA;
        const i = (y * this.width + x) * 4;
        this.pixels[i] = sample[0] * opacity + this.pixels[i] * inv;
        this.pixels[i + 1] = sample[1] * opacity + this.pixels[i + 1] * inv;
        this.pixels[i + 2] = sample[2] * opacity + this.pixels[i + 2] * inv;
        this.pixels[i + 3] = srcA + this.pixels[i + 3] * inv;
      }
    }
    return true;
  }

  /** Quantize to a straight-alpha RGBA raster. */
  toRaster(): RasterBuffer {
    const data = new Uint8ClampedArray(this.pixels.length);
    for (let i = 0; i < this.pixels.length; i += 4) {
      const a = this.pixels[i + 3];
      if (a <= 0) continue;
      data[i] = Math.round(Math.min(1, this.pixels[i] / a) * 255);
      data[i + 1] = Math.round(Math.min(1, this.pixels[i + 1] / a) * 255);
      data[i + 2] = Math.round(Math.min(1, this.pixels[i + 2] / a) * 255);
      data[i + 3] = Math.round(Math.min(1, a) * 255);
    }
    return { width: this.width, height: this.height, data };
  }
}
