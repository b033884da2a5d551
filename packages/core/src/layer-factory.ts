/**
 * @module layer-factory
 * Factory functions for layers and compositions.
 * Each function produces a properly initialized record with default values.
 */

import type {
  BackgroundImage,
  Composition,
  Layer,
  LayerKind,
  LayerTransform,
  RasterBuffer,
  Size,
} from '@cutout-studio/types';
import { InvalidGeometryError } from './errors';
import { isPositiveSize } from './raster';
import { generateId } from './uuid';

/** Transform that centers a layer at natural size. */
export const IDENTITY_TRANSFORM: Readonly<LayerTransform> = Object.freeze({
  offsetX: 0,
  offsetY: 0,
  scale: 1,
  rotationDegrees: 0,
});

/** Optional fields for {@link createLayer}. */
export type CreateLayerOptions = Partial<
  Pick<
    Layer,
    'name' | 'opacity' | 'visible' | 'locked' | 'mask' | 'source' | 'sourceImageId' | 'text' | 'object'
  >
> & {
  transform?: Partial<LayerTransform>;
};

/**
 * Creates a new layer. Its `order` is -1 until it is appended to a composition.
 *
 * @param kind    - What the layer holds.
 * @param pixels  - RGBA content, drawn centered on the layer origin.
 * @param options - Overrides for name, transform, opacity and metadata.
 */
export function createLayer(kind: LayerKind, pixels: RasterBuffer, options: CreateLayerOptions = {}): Layer {
  const { transform, ...rest } = options;
  return {
    id: generateId(),
    name: rest.name ?? 'Layer',
    kind,
    pixels,
    order: -1,
    transform: { ...IDENTITY_TRANSFORM, ...transform },
    opacity: clampOpacity(rest.opacity ?? 1),
    visible: rest.visible ?? true,
    locked: rest.locked ?? false,
    createdAt: Date.now(),
    ...(rest.mask ? { mask: rest.mask } : {}),
    ...(rest.source ? { source: rest.source } : {}),
    ...(rest.sourceImageId ? { sourceImageId: rest.sourceImageId } : {}),
    ...(rest.text ? { text: rest.text } : {}),
    ...(rest.object ? { object: rest.object } : {}),
  };
}

/** Options for {@link createComposition}. */
export interface CreateCompositionOptions {
  notes?: string;
  background?: BackgroundImage | null;
}

/** Clamps to [0, 1]; NaN becomes fully transparent. */
function clampOpacity(opacity: number): number {
  return Number.isNaN(opacity) ? 0 : Math.max(0, Math.min(1, opacity));
}

/**
 * Creates an empty composition.
 *
 * @param name       - Display name.
 * @param canvasSize - Target canvas size; both dimensions must be positive integers.
 * @throws {InvalidGeometryError} If the canvas size is degenerate.
 */
export function createComposition(
  name: string,
  canvasSize: Size,
  options: CreateCompositionOptions = {},
): Composition {
  if (!isPositiveSize(canvasSize)) {
    throw new InvalidGeometryError(
      `Invalid canvas size ${canvasSize.width}x${canvasSize.height}. Width and height must be greater than zero.`,
    );
  }
  const now = Date.now();
  return {
    id: generateId(),
    name,
    notes: options.notes ?? '',
    createdAt: now,
    updatedAt: now,
    layers: [],
    background: options.background ?? null,
    canvasSize: { width: canvasSize.width, height: canvasSize.height },
  };
}

/** Wraps pixels as a background image. */
export function createBackground(pixels: RasterBuffer, prompt?: string): BackgroundImage {
  return prompt === undefined ? { id: generateId(), pixels } : { id: generateId(), pixels, prompt };
}

const KIND_LABELS: Record<LayerKind, string> = {
  subject: 'Subject',
  'uploaded-image': 'Imported Layer',
  background: 'Background',
  text: 'Text',
  'generated-object': 'Object',
  adjustment: 'Adjustment',
};

/**
 * Name for the next layer of `kind`, numbered after the current layer count,
 * e.g. "Subject 3" for the third layer.
 */
export function defaultLayerName(kind: LayerKind, composition: Composition): string {
  return `${KIND_LABELS[kind]} ${composition.layers.length + 1}`;
}
