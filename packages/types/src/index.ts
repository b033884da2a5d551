/**
 * @cutout-studio/types
 *
 * Shared type definitions for Cutout Studio.
 * This package contains zero runtime code, only TypeScript interfaces
 * and types that serve as the contract between all packages.
 *
 * @packageDocumentation
 */

// Common primitives
export type { Color, Point, Rect, Size } from './common';

// Rasters
export type { CutoutImage, RasterBuffer, SourceImage } from './raster';

// Masks
export type { AlphaMask, RawMask } from './mask';

// Layers
export type {
  GeneratedObjectInfo,
  Layer,
  LayerKind,
  LayerTransform,
  TextAlignment,
  TextLayerInfo,
} from './layer';

// Composition
export type { BackgroundImage, Composition } from './composition';

// Segmentation oracle boundary
export type { SegmentationOracle, SegmentationResult } from './segmentation';

// Events
export type { EventBus, EventCallback, EventMap } from './events';
