/**
 * @module composition-renderer
 * Flattens a composition to a raster.
 *
 * Paint order: base color, then the background aspect-filled to the canvas,
 * then every visible layer in ascending `order`. Each layer is drawn centered
 * on its own origin, which sits at the canvas center plus the layer offset,
 * then rotated and scaled about that point.
 *
 * Rendering never mutates the composition, and rendering the same composition
 * twice yields byte-identical output.
 */

import type { Color, Composition, Layer, RasterBuffer, Size } from '@cutout-studio/types';
import {
  InvalidGeometryError,
  composeMatrices,
  createLogger,
  isPositiveSize,
  isValidRaster,
  rotateMatrix,
  scaleMatrix,
  sortedLayers,
  translateMatrix,
  type Matrix2D,
} from '@cutout-studio/core';
import { SoftwareCanvas } from './software-canvas';

const log = createLogger('renderer');

export interface RenderOptions {
  /** Color under everything else. */
  baseColor: Color;
  /** Output size. Defaults to the composition's canvas size. */
  canvasSize?: Size;
}

export const DEFAULT_RENDER_OPTIONS: Readonly<RenderOptions> = Object.freeze({
  baseColor: Object.freeze({ r: 255, g: 255, b: 255, a: 1 }),
});

/**
 * Matrix mapping a layer's pixel space onto a canvas of `canvasSize`:
 * translate(center + offset) · rotate · scale · translate(-size / 2).
 */
export function layerMatrix(layer: Layer, canvasSize: Size): Matrix2D {
  const { offsetX, offsetY, scale, rotationDegrees } = layer.transform;
  return composeMatrices(
    translateMatrix(canvasSize.width / 2 + offsetX, canvasSize.height / 2 + offsetY),
    rotateMatrix(rotationDegrees),
    scaleMatrix(scale),
    translateMatrix(-layer.pixels.width / 2, -layer.pixels.height / 2),
  );
}

/**
 * Render a composition.
 *
 * @returns A raster of exactly the canvas size.
 * @throws {InvalidGeometryError} If the canvas size is not positive.
 */
export function renderComposition(composition: Composition, options: Partial<RenderOptions> = {}): RasterBuffer {
  const opts = { ...DEFAULT_RENDER_OPTIONS, ...options };
  const size = opts.canvasSize ?? composition.canvasSize;
  if (!isPositiveSize(size)) {
    throw new InvalidGeometryError(`Cannot render onto a ${size.width}x${size.height} canvas`);
  }

  const layers = sortedLayers(composition).filter((l) => l.visible);
  log.debug('Rendering composition', {
    id: composition.id,
    canvasSize: size,
    visibleLayerCount: layers.length,
    hasBackground: composition.background !== null,
  });

  const canvas = new SoftwareCanvas(size.width, size.height);
  canvas.fill(opts.baseColor);

  const background = composition.background;
  if (background) {
    if (isValidRaster(background.pixels)) {
      log.debug('Drawing background', { id: background.id, width: background.pixels.width, height: background.pixels.height });
      canvas.drawAspectFill(background.pixels);
    } else {
      log.warn(`Skipping background ${background.id}: empty or inconsistent pixel buffer`);
    }
  }

  for (const layer of layers) {
    if (!isValidRaster(layer.pixels)) {
      log.warn(`Skipping layer "${layer.name}": empty or inconsistent pixel buffer`);
      continue;
    }
    // NaN would poison the accumulators; treat it as fully transparent.
    if (!Number.isFinite(layer.opacity) || layer.opacity <= 0) continue;
    log.debug('Drawing layer', {
      name: layer.name,
      order: layer.order,
      transform: layer.transform,
      opacity: layer.opacity,
    });
    const opacity = Math.min(1, layer.opacity);
    if (!canvas.drawTransformed(layer.pixels, layerMatrix(layer, size), opacity)) {
      log.warn(`Skipping layer "${layer.name}": transform is not invertible`);
    }
  }

  return canvas.toRaster();
}
