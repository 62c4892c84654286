/**
 * @module history
 * Snapshot history types for undo/redo support.
 * Each entry is a full raster snapshot rather than a reversible command.
 */

import type { RasterData } from './raster';

/** Bounded undo stack plus unbounded redo stack of raster snapshots. */
export interface SnapshotHistory<T extends RasterData = RasterData> {
  /** Maximum number of snapshots kept on the undo stack. */
  readonly maxDepth: number;
  /** Whether there are snapshots that can be undone. */
  readonly canUndo: boolean;
  /** Whether there are snapshots that can be redone. */
  readonly canRedo: boolean;
  /** Number of snapshots on the undo stack. */
  readonly undoDepth: number;
  /** Number of snapshots on the redo stack. */
  readonly redoDepth: number;

  /** Push a copy of `buffer` onto the undo stack, evicting the oldest on overflow. */
  pushUndo(buffer: T): void;
  /** Push a copy of `buffer` onto the redo stack. */
  pushRedo(buffer: T): void;
  /** Pop the most recent undo snapshot. Throws when empty. */
  popUndo(): T;
  /** Pop the most recent redo snapshot. Throws when empty. */
  popRedo(): T;
  /** Drop every redo snapshot. */
  clearRedo(): void;
  /** Drop both stacks. */
  clear(): void;
}
