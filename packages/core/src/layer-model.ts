/**
 * @module layer-model
 * Invariant-preserving operations on a composition's layer stack.
 * All functions take the composition as their first argument and mutate it
 * in place; none of them render or perform I/O.
 *
 * Invariant: `composition.layers` is sorted by `order`, and the orders are
 * exactly `0 .. layers.length - 1`. Higher orders paint later (on top).
 *
 * Structural mutations must come from one logical owner at a time.
 */

import type { BackgroundImage, Composition, Layer, LayerTransform } from '@cutout-studio/types';
import { InvalidInputError } from './errors';

/** Rewrite every `order` to match the current array position. */
export function normalizeLayerOrder(composition: Composition): void {
  composition.layers.forEach((layer, index) => {
    layer.order = index;
  });
}

function touch(composition: Composition): void {
  composition.updatedAt = Math.max(Date.now(), composition.updatedAt);
}

/**
 * Finds a layer by its ID.
 * @returns The matching layer, or null if not found.
 */
export function findLayer(composition: Composition, layerId: string): Layer | null {
  return composition.layers.find((l) => l.id === layerId) ?? null;
}

/** Layers in paint order (bottom to top), as a new array. */
export function sortedLayers(composition: Composition): Layer[] {
  return [...composition.layers].sort((a, b) => a.order - b.order);
}

/**
 * Adds a layer on top of the stack and assigns it the next order index.
 *
 * @throws {InvalidInputError} If a layer with the same ID is already present.
 */
export function appendLayer(composition: Composition, layer: Layer): void {
  if (findLayer(composition, layer.id)) {
    throw new InvalidInputError(`Layer ${layer.id} is already part of composition ${composition.id}`);
  }
  composition.layers.push(layer);
  layer.order = composition.layers.length - 1;
  touch(composition);
}

/**
 * Removes a layer and renumbers the rest.
 *
 * @returns The removed layer, or null if not found.
 */
export function removeLayer(composition: Composition, layerId: string): Layer | null {
  const idx = composition.layers.findIndex((l) => l.id === layerId);
  if (idx === -1) {
    return null;
  }
  const [removed] = composition.layers.splice(idx, 1);
  normalizeLayerOrder(composition);
  touch(composition);
  return removed;
}

/**
 * Moves a layer to a new stack position and renumbers all layers.
 *
 * @param newIndex - Target order index, clamped to the stack bounds.
 * @returns true if the layer exists and the index is finite, false otherwise.
 */
export function reorderLayer(composition: Composition, layerId: string, newIndex: number): boolean {
  const idx = composition.layers.findIndex((l) => l.id === layerId);
  if (idx === -1 || !Number.isFinite(newIndex)) {
    return false;
  }
  const target = Math.max(0, Math.min(composition.layers.length - 1, Math.trunc(newIndex)));
  if (target !== idx) {
    const [moved] = composition.layers.splice(idx, 1);
    composition.layers.splice(target, 0, moved);
    normalizeLayerOrder(composition);
    touch(composition);
  }
  return true;
}

/**
 * Moves a layer one step toward the top. No-op for the topmost layer.
 * @returns true if the layer moved.
 */
export function moveLayerUp(composition: Composition, layerId: string): boolean {
  const layer = findLayer(composition, layerId);
  if (!layer || layer.order >= composition.layers.length - 1) return false;
  return reorderLayer(composition, layerId, layer.order + 1);
}

/**
 * Moves a layer one step toward the bottom. No-op for the bottom layer.
 * @returns true if the layer moved.
 */
export function moveLayerDown(composition: Composition, layerId: string): boolean {
  const layer = findLayer(composition, layerId);
  if (!layer || layer.order <= 0) return false;
  return reorderLayer(composition, layerId, layer.order - 1);
}

/**
 * Updates position, scale or rotation. Locked layers are left untouched.
 *
 * @returns true if the transform changed hands, false if the layer is missing or locked.
 * @throws {InvalidInputError} If the resulting scale is not a positive finite number.
 */
export function updateLayerTransform(
  composition: Composition,
  layerId: string,
  patch: Partial<LayerTransform>,
): boolean {
  const layer = findLayer(composition, layerId);
  if (!layer || layer.locked) return false;
  const next = { ...layer.transform, ...patch };
  if (!(next.scale > 0) || !Number.isFinite(next.scale)) {
    throw new InvalidInputError(`Layer scale must be greater than zero, got ${next.scale}`);
  }
  layer.transform = next;
  touch(composition);
  return true;
}

/**
 * Sets layer opacity, clamped to [0, 1].
 * @returns false if the layer is missing.
 */
export function setLayerOpacity(composition: Composition, layerId: string, opacity: number): boolean {
  const layer = findLayer(composition, layerId);
  if (!layer) return false;
  layer.opacity = Number.isNaN(opacity) ? 0 : Math.max(0, Math.min(1, opacity));
  touch(composition);
  return true;
}

/** @returns The new visibility, or null if the layer is missing. */
export function toggleLayerVisibility(composition: Composition, layerId: string): boolean | null {
  const layer = findLayer(composition, layerId);
  if (!layer) return null;
  layer.visible = !layer.visible;
  touch(composition);
  return layer.visible;
}

/** @returns The new lock state, or null if the layer is missing. */
export function toggleLayerLock(composition: Composition, layerId: string): boolean | null {
  const layer = findLayer(composition, layerId);
  if (!layer) return null;
  layer.locked = !layer.locked;
  touch(composition);
  return layer.locked;
}

/** Replaces (or clears) the composition's background. */
export function setBackground(composition: Composition, background: BackgroundImage | null): void {
  composition.background = background;
  touch(composition);
}
