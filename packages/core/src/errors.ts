/**
 * @module errors
 * Error classes raised by the editing core.
 *
 * Every class carries an {@link EditErrorCode} so presentation layers can
 * branch on `error.code` without `instanceof` checks across bundles.
 */

import type { EditErrorCode } from '@raster-edit/types';

/** Base class for every error the core raises on purpose. */
export class RasterEditError extends Error {
  readonly code: EditErrorCode;

  constructor(code: EditErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Byte length does not match `width * height * 4`, or a dimension is not a non-negative integer. */
export class InvalidDimensionsError extends RasterEditError {
  readonly width: number;
  readonly height: number;
  readonly byteLength: number;

  constructor(width: number, height: number, byteLength: number) {
    super(
      'INVALID_DIMENSIONS',
      `Raster data length (${byteLength}) does not match dimensions (${width}x${height}x4 = ${width * height * 4})`,
    );
    this.width = width;
    this.height = height;
    this.byteLength = byteLength;
  }
}

/** Undo or redo requested on an empty stack. */
export class HistoryEmptyError extends RasterEditError {
  readonly stack: 'undo' | 'redo';

  constructor(stack: 'undo' | 'redo') {
    super('HISTORY_EMPTY', `Nothing to ${stack}`);
    this.stack = stack;
  }
}

export class NoCurrentImageError extends RasterEditError {
  constructor() {
    super('NO_CURRENT_IMAGE', 'No image is loaded');
  }
}

export class NoOriginalImageError extends RasterEditError {
  constructor() {
    super('NO_ORIGINAL_IMAGE', 'No original image to reset to');
  }
}

/** A mutating operation was requested while another one is still in flight. */
export class SessionBusyError extends RasterEditError {
  readonly operation: string;

  constructor(operation: string) {
    super('SESSION_BUSY', `Cannot ${operation} while another operation is in progress`);
    this.operation = operation;
  }
}

export class PngFormatError extends RasterEditError {
  constructor(message: string) {
    super('PNG_FORMAT', message);
  }
}

/** Narrow an unknown value to a core error with the given code. */
export function isEditError<C extends EditErrorCode>(
  error: unknown,
  ...codes: C[]
): error is RasterEditError & { code: C } {
  if (!(error instanceof RasterEditError)) return false;
  const allowed: readonly EditErrorCode[] = codes;
  return allowed.length === 0 || allowed.includes(error.code);
}
