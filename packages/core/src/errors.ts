/**
 * @module errors
 * Error hierarchy for the cut-out and compositing pipeline.
 *
 * Every error carries a `kind` discriminator so callers can branch without
 * `instanceof` chains across package boundaries.
 */

/** Discriminator for {@link CutoutError}. */
export type CutoutErrorKind =
  | 'InvalidInput'
  | 'CompositingFailed'
  | 'InvalidGeometry'
  | 'InvalidState'
  | 'Cancelled'
  | 'NoSubject'
  | 'MultipleSubjects';

/** Base class for all errors raised by this repository. */
export class CutoutError extends Error {
  readonly kind: CutoutErrorKind;

  constructor(kind: CutoutErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'CutoutError';
    this.kind = kind;
  }
}

/** Zero-area or malformed mask, image or option values. */
export class InvalidInputError extends CutoutError {
  constructor(message: string, options?: ErrorOptions) {
    super('InvalidInput', message, options);
    this.name = 'InvalidInputError';
  }
}

/** Resampling or blending could not produce a valid cut-out. */
export class CompositingFailedError extends CutoutError {
  constructor(message: string, options?: ErrorOptions) {
    super('CompositingFailed', message, options);
    this.name = 'CompositingFailedError';
  }
}

/** Degenerate canvas or subject size where no safe default exists. */
export class InvalidGeometryError extends CutoutError {
  constructor(message: string, options?: ErrorOptions) {
    super('InvalidGeometry', message, options);
    this.name = 'InvalidGeometryError';
  }
}

/** Operation not allowed in the current lifecycle state. */
export class InvalidStateError extends CutoutError {
  constructor(message: string, options?: ErrorOptions) {
    super('InvalidState', message, options);
    this.name = 'InvalidStateError';
  }
}

/** A background task was aborted through its signal. */
export class TaskCancelledError extends CutoutError {
  constructor(message = 'Task was cancelled', options?: ErrorOptions) {
    super('Cancelled', message, options);
    this.name = 'TaskCancelledError';
  }
}

/** The segmentation oracle found nothing to cut out. */
export class NoSubjectError extends CutoutError {
  constructor(message = 'No clear subject detected in image', options?: ErrorOptions) {
    super('NoSubject', message, options);
    this.name = 'NoSubjectError';
  }
}

/** The oracle found several subjects where exactly one was expected. */
export class MultipleSubjectsError extends CutoutError {
  readonly instanceCount: number;

  constructor(instanceCount: number, options?: ErrorOptions) {
    super('MultipleSubjects', `Expected one subject, detected ${instanceCount}`, options);
    this.name = 'MultipleSubjectsError';
    this.instanceCount = instanceCount;
  }
}

/**
 * Narrow an unknown thrown value to a {@link CutoutError}, optionally of one kind.
 *
 * @example
 * ```ts
 * try { composite(mask, image); } catch (e) {
 *   if (isCutoutError(e, 'CompositingFailed')) showRetry();
 *   else throw e;
 * }
 * ```
 */
export function isCutoutError(value: unknown, kind?: CutoutErrorKind): value is CutoutError {
  if (!(value instanceof CutoutError)) return false;
  return kind === undefined || value.kind === kind;
}

/** Coerce an unknown thrown value into an `Error` for event payloads and causes. */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
