/**
 * @module errors
 * Machine-readable error codes raised by the editing core.
 */

export type EditErrorCode =
  | 'INVALID_DIMENSIONS'
  | 'HISTORY_EMPTY'
  | 'NO_CURRENT_IMAGE'
  | 'NO_ORIGINAL_IMAGE'
  | 'SESSION_BUSY'
  | 'PNG_FORMAT';

/** Outcome of an entry-point call: a value, or the error that stopped it. */
export type Result<T, E> =
  | { success: true; value: T }
  | { success: false; error: E };
