/**
 * @module edit-session
 * Interactive correction of one layer's alpha mask.
 *
 * A session owns the working mask, a bounded undo history and the current
 * cut-out preview. Gestures (brush strokes, lasso fills) move it from `idle`
 * to `editing`, and entering `editing` snapshots the mask so the whole gesture
 * undoes in one step. The session ends by committing into a layer or by
 * cancelling, after which every call throws.
 *
 * Masks are replaced, never mutated, so history snapshots are plain
 * references.
 *
 * @see {@link EditSessionRegistry} for the one-session-per-layer rule.
 */

import type { AlphaMask, CutoutImage, EventBus, Layer, Point, SourceImage } from '@cutout-studio/types';
import {
  EventBusImpl,
  InvalidStateError,
  assertValidMask,
  assertValidRaster,
  createLogger,
  generateId,
  maskFromAlpha,
  toError,
} from '@cutout-studio/core';
import { composite, type CompositeOptions } from './alpha-compositor';
import { DEFAULT_HISTORY_CAPACITY, MaskHistory } from './mask-history';
import { fillLasso, paintDisk, type PaintMode } from './mask-painting';
import { PreviewScheduler, type PreviewResult } from './preview-scheduler';

const log = createLogger('edit-session');

/** Lifecycle of an {@link EditSession}. */
export type EditSessionState = 'idle' | 'editing' | 'committed' | 'cancelled';

export interface EditSessionOptions {
  /** Snapshots kept for undo. */
  historyCapacity: number;
  /** Passed to the compositor on every recomposite. */
  composite: Partial<CompositeOptions>;
  /** Bus that receives session events. A private bus is created when omitted. */
  bus?: EventBus;
  /** Called once when the session commits or cancels. */
  onClose?: (session: EditSession) => void;
}

export class EditSession {
  readonly id = generateId();
  readonly layerId: string;
  readonly source: SourceImage;
  readonly events: EventBus;

  private _state: EditSessionState = 'idle';
  private _mask: AlphaMask;
  private _preview: CutoutImage;
  private _previewError: Error | null = null;
  /** The mask `_preview` was computed from. */
  private previewMask: AlphaMask;
  private readonly initialMask: AlphaMask;
  private readonly initialPreview: CutoutImage;
  private readonly history: MaskHistory;
  private readonly scheduler = new PreviewScheduler();
  private readonly compositeOptions: Partial<CompositeOptions>;
  private readonly onClose?: (session: EditSession) => void;

  /**
   * Open a session and compute the first preview.
   *
   * @param layerId - Layer being edited.
   * @param source - Photo the mask cuts out of.
   * @param mask - Starting mask. Not modified.
   * @throws {InvalidInputError} If the source or mask is empty or inconsistent.
   * @throws {CompositingFailedError} If the first preview cannot be built.
   */
  constructor(layerId: string, source: SourceImage, mask: AlphaMask, options: Partial<EditSessionOptions> = {}) {
    assertValidRaster(source, 'source image');
    assertValidMask(mask, 'mask');
    this.layerId = layerId;
    this.source = source;
    this.events = options.bus ?? new EventBusImpl();
    this.history = new MaskHistory(options.historyCapacity ?? DEFAULT_HISTORY_CAPACITY);
    this.compositeOptions = options.composite ?? {};
    this.onClose = options.onClose;

    this._mask = mask;
    this.initialMask = mask;
    this._preview = composite(mask, source, this.compositeOptions);
    this.previewMask = mask;
    this.initialPreview = this._preview;
  }

  get state(): EditSessionState {
    return this._state;
  }

  get isOpen(): boolean {
    return this._state === 'idle' || this._state === 'editing';
  }

  get mask(): AlphaMask {
    return this._mask;
  }

  /** Latest successfully computed cut-out. May lag the mask after a failure. */
  get preview(): CutoutImage {
    return this._preview;
  }

  /** Error from the most recent recomposite, or null if it succeeded. */
  get previewError(): Error | null {
    return this._previewError;
  }

  get historyDepth(): number {
    return this.history.depth;
  }

  get canUndo(): boolean {
    return this.history.canUndo;
  }

  /** Start a gesture, snapshotting the mask. Ends any gesture in progress first. */
  beginStroke(): void {
    this.assertOpen();
    if (this._state === 'editing') this.endStroke();
    this.pushSnapshot();
    this._state = 'editing';
  }

  /**
   * Stamp one brush dab. Outside a gesture the dab is a gesture of its own.
   *
   * @param center - Dab center in mask pixels.
   * @param brushRadius - Radius in mask pixels.
   * @throws {InvalidInputError} On a non-finite center or non-positive radius.
   */
  paintStroke(center: Point, brushRadius: number, mode: PaintMode): void {
    this.assertOpen();
    this.applyGesture(paintDisk(this._mask, center, brushRadius, mode));
  }

  /**
   * Fill a closed polygon, erasing by default. Fewer than three points is a
   * no-op and leaves no history entry.
   */
  lassoFill(points: readonly Point[], mode: PaintMode = 'erase'): void {
    this.assertOpen();
    if (points.length < 3) return;
    this.applyGesture(fillLasso(this._mask, points, mode));
  }

  /** Finish the current gesture. No-op when idle. */
  endStroke(): void {
    this.assertOpen();
    this._state = 'idle';
  }

  /** Discard the current gesture, restoring the mask from before it began. */
  abortStroke(): void {
    this.assertOpen();
    if (this._state !== 'editing') return;
    this._state = 'idle';
    const snapshot = this.history.pop();
    if (snapshot && snapshot !== this._mask) {
      this.replaceMask(snapshot);
    }
  }

  /**
   * Restore the newest snapshot. Ends any gesture in progress first.
   * @returns false if there was nothing to undo.
   */
  undo(): boolean {
    this.assertOpen();
    this._state = 'idle';
    const snapshot = this.history.pop();
    if (!snapshot) return false;
    this.replaceMask(snapshot);
    this.events.emit('history:undone', { sessionId: this.id, depth: this.history.depth });
    return true;
  }

  /**
   * Recomposite in the background. Results that a newer edit or request
   * superseded come back `stale` and are not applied; failures are recorded
   * like synchronous ones.
   */
  async refreshPreviewAsync(signal?: AbortSignal): Promise<PreviewResult<CutoutImage>> {
    this.assertOpen();
    const mask = this._mask;
    const result = await this.scheduler.schedule(
      () => composite(mask, this.source, this.compositeOptions),
      signal,
    );
    if (result.status === 'applied') {
      this.acceptPreview(result.value, mask, result.generation);
    } else if (result.status === 'failed') {
      this.rejectPreview(result.error);
    }
    return result;
  }

  /**
   * Write the mask, cut-out and source into `into` and end the session.
   * A preview that lags the mask is recomputed first; if that fails the error
   * propagates and the session stays open.
   *
   * @throws {InvalidStateError} If `into` is not the layer the session was opened for.
   */
  commit(into: Layer): void {
    this.assertOpen();
    if (into.id !== this.layerId) {
      throw new InvalidStateError(`Session for layer ${this.layerId} cannot commit into layer ${into.id}`);
    }
    this._state = 'idle';
    if (this.previewMask !== this._mask) {
      const preview = composite(this._mask, this.source, this.compositeOptions);
      this.acceptPreview(preview, this._mask, this.scheduler.invalidate());
    }

    into.mask = this._mask;
    into.source = this.source;
    into.pixels = this._preview;

    this.close('committed');
    log.debug('Committed edit session', { session: this.id, layer: into.id });
    this.events.emit('session:committed', { sessionId: this.id, layerId: into.id });
  }

  /** Restore the mask the session was opened with and end the session. */
  cancel(): void {
    this.assertOpen();
    const changed = this._mask !== this.initialMask;
    this._mask = this.initialMask;
    this._preview = this.initialPreview;
    this.previewMask = this.initialMask;
    this._previewError = null;
    this.close('cancelled');
    if (changed) {
      this.events.emit('mask:changed', { sessionId: this.id, mask: this._mask });
    }
    this.events.emit('session:cancelled', { sessionId: this.id, layerId: this.layerId });
  }

  private assertOpen(): void {
    if (!this.isOpen) {
      throw new InvalidStateError(`Edit session ${this.id} is already ${this._state}`);
    }
  }

  private close(state: 'committed' | 'cancelled'): void {
    this._state = state;
    this.scheduler.invalidate();
    this.history.clear();
    this.onClose?.(this);
  }

  private pushSnapshot(): void {
    const evicted = this.history.push(this._mask);
    if (evicted) {
      this.events.emit('history:evicted', { sessionId: this.id });
    }
    this.events.emit('history:pushed', { sessionId: this.id, depth: this.history.depth });
  }

  private applyGesture(next: AlphaMask): void {
    const oneShot = this._state === 'idle';
    if (oneShot) this.beginStroke();
    this.replaceMask(next);
    if (oneShot) this.endStroke();
  }

  private replaceMask(next: AlphaMask): void {
    this._mask = next;
    this.events.emit('mask:changed', { sessionId: this.id, mask: next });
    this.recomposite();
  }

  private recomposite(): void {
    const generation = this.scheduler.invalidate();
    try {
      this.acceptPreview(composite(this._mask, this.source, this.compositeOptions), this._mask, generation);
    } catch (error) {
      this.rejectPreview(toError(error));
    }
  }

  private acceptPreview(preview: CutoutImage, mask: AlphaMask, generation: number): void {
    this._preview = preview;
    this.previewMask = mask;
    this._previewError = null;
    this.events.emit('preview:updated', { sessionId: this.id, preview, generation });
  }

  private rejectPreview(error: Error): void {
    this._previewError = error;
    log.warn('Preview recomposite failed; keeping previous preview', error);
    this.events.emit('preview:failed', { sessionId: this.id, error });
  }
}

/**
 * Tracks open sessions so each layer has at most one.
 * A layer's slot is released when its session commits or cancels.
 */
export class EditSessionRegistry {
  private readonly sessions = new Map<string, EditSession>();

  /**
   * @param defaults - Options applied to every session this registry opens.
   */
  constructor(private readonly defaults: Partial<EditSessionOptions> = {}) {}

  /**
   * Open a session for `layer`.
   *
   * @param source - Photo the mask cuts out of.
   * @param mask - Starting mask. Defaults to the layer's committed mask, then to its pixels' alpha.
   * @throws {InvalidStateError} If the layer already has an open session.
   */
  open(
    layer: Layer,
    source: SourceImage,
    mask?: AlphaMask,
    options: Partial<EditSessionOptions> = {},
  ): EditSession {
    if (this.sessions.has(layer.id)) {
      throw new InvalidStateError(`Layer ${layer.id} already has an open edit session`);
    }
    const merged = { ...this.defaults, ...options };
    const callerOnClose = merged.onClose;
    const session = new EditSession(layer.id, source, mask ?? layer.mask ?? maskFromAlpha(layer.pixels), {
      ...merged,
      onClose: (closed) => {
        this.sessions.delete(closed.layerId);
        callerOnClose?.(closed);
      },
    });
    this.sessions.set(layer.id, session);
    return session;
  }

  /** The open session for a layer, or null. */
  get(layerId: string): EditSession | null {
    return this.sessions.get(layerId) ?? null;
  }

  isOpen(layerId: string): boolean {
    return this.sessions.has(layerId);
  }

  get size(): number {
    return this.sessions.size;
  }
}
