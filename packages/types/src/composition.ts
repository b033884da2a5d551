/**
 * @module composition
 * A full stack of layers plus an optional background, rendered to a canvas.
 */

import type { Size } from './common';
import type { Layer } from './layer';
import type { RasterBuffer } from './raster';

/** A background image. Always aspect-fill cropped to the canvas. */
export interface BackgroundImage {
  /** Unique identifier (UUID v4). */
  id: string;
  pixels: RasterBuffer;
  /** Prompt the background was generated from, if any. */
  prompt?: string;
}

/** Ordered layers, optional background and target canvas size. */
export interface Composition {
  /** Unique identifier (UUID v4). */
  id: string;
  name: string;
  notes: string;
  /** Creation time, epoch milliseconds. */
  createdAt: number;
  /** Last modification time, epoch milliseconds. */
  updatedAt: number;
  /** Layers sorted by `order`, bottom to top. */
  layers: Layer[];
  background: BackgroundImage | null;
  /** Target canvas size. Width and height are > 0. */
  canvasSize: Size;
}
