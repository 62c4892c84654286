/**
 * @module api
 * Result-returning entry points for presentation layers.
 *
 * Each function maps the expected {@link RasterEditError}s of its operation
 * onto `{ success: false, error }`. Anything else is a bug and is rethrown.
 */

import type { FilterKind, FilterParameters, Result } from '@raster-edit/types';
import { InvalidDimensionsError, isEditError } from './errors';
import type {
  HistoryEmptyError,
  NoCurrentImageError,
  NoOriginalImageError,
  SessionBusyError,
} from './errors';
import { EditSession } from './edit-session';
import type { EditSessionOptions, RasterSnapshot } from './edit-session';
import { RasterBuffer } from './raster-buffer';

/** Errors {@link applyFilter} reports instead of throwing. */
export type ApplyFilterError = NoCurrentImageError | InvalidDimensionsError | SessionBusyError;
/** Errors {@link undo} and {@link redo} report instead of throwing. */
export type HistoryStepError = HistoryEmptyError | SessionBusyError;
/** Errors {@link reset} reports instead of throwing. */
export type ResetError = NoOriginalImageError | SessionBusyError;

async function capture<T, E extends Error>(
  work: () => Promise<T>,
  isExpected: (error: unknown) => error is E,
): Promise<Result<T, E>> {
  try {
    return { success: true, value: await work() };
  } catch (error) {
    if (isExpected(error)) {
      return { success: false, error };
    }
    throw error;
  }
}

/**
 * Create a session from raw BGRA bytes. The bytes are copied.
 */
export async function loadRaster(
  bytes: ArrayLike<number>,
  width: number,
  height: number,
  options?: EditSessionOptions,
): Promise<Result<EditSession, InvalidDimensionsError>> {
  let buffer: RasterBuffer;
  try {
    buffer = RasterBuffer.from(bytes, width, height);
  } catch (error) {
    if (error instanceof InvalidDimensionsError) {
      return { success: false, error };
    }
    throw error;
  }
  const session = new EditSession(options);
  await session.load(buffer);
  return { success: true, value: session };
}

export function applyFilter(
  session: EditSession,
  kind: FilterKind,
  params: Partial<FilterParameters> = {},
): Promise<Result<RasterSnapshot, ApplyFilterError>> {
  return capture(
    () => session.apply(kind, params),
    (e): e is ApplyFilterError => isEditError(e, 'NO_CURRENT_IMAGE', 'INVALID_DIMENSIONS', 'SESSION_BUSY'),
  );
}

export function undo(session: EditSession): Promise<Result<RasterSnapshot, HistoryStepError>> {
  return capture(
    () => session.undo(),
    (e): e is HistoryStepError => isEditError(e, 'HISTORY_EMPTY', 'SESSION_BUSY'),
  );
}

export function redo(session: EditSession): Promise<Result<RasterSnapshot, HistoryStepError>> {
  return capture(
    () => session.redo(),
    (e): e is HistoryStepError => isEditError(e, 'HISTORY_EMPTY', 'SESSION_BUSY'),
  );
}

export function reset(session: EditSession): Promise<Result<RasterSnapshot, ResetError>> {
  return capture(
    () => session.reset(),
    (e): e is ResetError => isEditError(e, 'NO_ORIGINAL_IMAGE', 'SESSION_BUSY'),
  );
}

/** The raster currently shown, or null before the first load. */
export function currentBuffer(session: EditSession): RasterBuffer | null {
  return session.current;
}
