/**
 * @cutout-studio/render
 *
 * Software rasterization of compositions, overlay compositing and PNG export.
 *
 * @packageDocumentation
 */

export { SoftwareCanvas } from './software-canvas';

export { renderComposition, layerMatrix, DEFAULT_RENDER_OPTIONS } from './composition-renderer';
export type { RenderOptions } from './composition-renderer';

export { compositeOnto } from './overlay-compositor';

export { exportPng, exportCompositions } from './export';
export type { BatchExportResult, ExportFailure, RenderedComposition } from './export';
