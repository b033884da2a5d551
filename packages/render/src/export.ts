/**
 * @module export
 * PNG export of single compositions and batches.
 */

import type { Composition } from '@cutout-studio/types';
import { createLogger, encodePng, toError } from '@cutout-studio/core';
import { renderComposition, type RenderOptions } from './composition-renderer';

const log = createLogger('export');

/** Render a composition and encode it as PNG bytes. */
export function exportPng(composition: Composition, options: Partial<RenderOptions> = {}): Uint8Array {
  return encodePng(renderComposition(composition, options));
}

export interface RenderedComposition {
  compositionId: string;
  name: string;
  png: Uint8Array;
}

export interface ExportFailure {
  compositionId: string;
  name: string;
  error: Error;
}

export interface BatchExportResult {
  rendered: RenderedComposition[];
  failures: ExportFailure[];
}

/**
 * Export every composition, oldest first. A composition that fails to render
 * is logged and reported in `failures`; the rest of the batch continues.
 */
export function exportCompositions(
  compositions: readonly Composition[],
  options: Partial<RenderOptions> = {},
): BatchExportResult {
  const ordered = [...compositions].sort((a, b) => a.createdAt - b.createdAt);
  const result: BatchExportResult = { rendered: [], failures: [] };

  for (const composition of ordered) {
    try {
      const png = exportPng(composition, options);
      result.rendered.push({ compositionId: composition.id, name: composition.name, png });
      log.debug(`Exported "${composition.name}" (${png.length} bytes)`);
    } catch (e) {
      const error = toError(e);
      log.warn(`Failed to export "${composition.name}":`, error.message);
      result.failures.push({ compositionId: composition.id, name: composition.name, error });
    }
  }

  log.info(`Exported ${result.rendered.length} of ${ordered.length} compositions`);
  return result;
}
