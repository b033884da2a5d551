/**
 * @module layer
 * Layer type definitions for the composition model.
 * Layers form a flat stack ordered by `order` (0 paints first).
 */

import type { AlphaMask } from './mask';
import type { RasterBuffer, SourceImage } from './raster';

/** Discriminator for what a layer holds. */
export type LayerKind =
  | 'subject'
  | 'uploaded-image'
  | 'background'
  | 'text'
  | 'generated-object'
  | 'adjustment';

/** Placement of a layer relative to the canvas center. */
export interface LayerTransform {
  /** Horizontal offset from the canvas center, in canvas pixels. */
  offsetX: number;
  /** Vertical offset from the canvas center, in canvas pixels. */
  offsetY: number;
  /** Uniform scale factor. Always > 0. */
  scale: number;
  /** Clockwise rotation in degrees. */
  rotationDegrees: number;
}

/** Text alignment options. */
export type TextAlignment = 'left' | 'center' | 'right';

/** Metadata kept with a rasterized text layer. */
export interface TextLayerInfo {
  content: string;
  fontName: string;
  fontSize: number;
  /** Hex color string, e.g. `#ffffff`. */
  color: string;
  alignment: TextAlignment;
}

/** Metadata kept with a generated object layer. */
export interface GeneratedObjectInfo {
  /** Prompt the object was generated from. */
  prompt: string;
  /** Identifier of the generation service. */
  service: string;
}

/** One positioned, transformable visual element in a composition. */
export interface Layer {
  /** Unique identifier (UUID v4). */
  id: string;
  /** Display name shown in the layer list. */
  name: string;
  kind: LayerKind;
  /** RGBA pixels. For subject layers this is the committed cut-out. */
  pixels: RasterBuffer;
  /** Paint order. Unique and contiguous from 0 within a composition. */
  order: number;
  transform: LayerTransform;
  /** Opacity from 0 (transparent) to 1 (opaque). */
  opacity: number;
  visible: boolean;
  /** Locked layers refuse transform changes. */
  locked: boolean;
  /** Creation time, epoch milliseconds. */
  createdAt: number;
  /** Committed alpha mask (subject layers). */
  mask?: AlphaMask;
  /** Original photo the mask applies to, kept for re-editing. */
  source?: SourceImage;
  /** Identifier of the captured image this layer came from. */
  sourceImageId?: string;
  text?: TextLayerInfo;
  object?: GeneratedObjectInfo;
}
