/**
 * @module raster
 * RGBA pixel buffers. All rasters are straight (non-premultiplied) alpha,
 * row-major, 4 bytes per pixel.
 */

/** An RGBA raster. `data.length === width * height * 4`. */
export interface RasterBuffer {
  /** Width in pixels. */
  width: number;
  /** Height in pixels. */
  height: number;
  /** RGBA pixel data. */
  data: Uint8ClampedArray;
}

/** The captured photo a mask is cut out of. Never modified by the pipeline. */
export type SourceImage = RasterBuffer;

/**
 * Source RGB with the alpha mask as its alpha channel.
 * Always derived from an AlphaMask plus a SourceImage; never edited directly.
 */
export type CutoutImage = RasterBuffer;
