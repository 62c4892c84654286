/**
 * @module history-manager
 * Snapshot-based undo/redo stacks for raster edits.
 *
 * @see {@link @raster-edit/types#SnapshotHistory} for the interface contract
 */

import type { SnapshotHistory } from '@raster-edit/types';
import { HistoryEmptyError } from './errors';
import type { RasterBuffer } from './raster-buffer';

/** Maximum number of snapshots retained on the undo stack. */
export const MAX_HISTORY_DEPTH = 20;

/**
 * Concrete implementation of {@link SnapshotHistory}.
 *
 * Every push stores a clone, so later work on the caller's buffer can never
 * reach history. When the undo stack exceeds {@link MAX_HISTORY_DEPTH} the
 * oldest snapshot is discarded. The redo stack is not bounded.
 */
export class HistoryManager implements SnapshotHistory<RasterBuffer> {
  /** @inheritdoc */
  readonly maxDepth = MAX_HISTORY_DEPTH;

  private undoStack: RasterBuffer[] = [];
  private redoStack: RasterBuffer[] = [];

  /** @inheritdoc */
  get canUndo(): boolean {
    return this.undoStack.length > 0;
  }

  /** @inheritdoc */
  get canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  /** @inheritdoc */
  get undoDepth(): number {
    return this.undoStack.length;
  }

  /** @inheritdoc */
  get redoDepth(): number {
    return this.redoStack.length;
  }

  /** @inheritdoc */
  pushUndo(buffer: RasterBuffer): void {
    this.undoStack.push(buffer.clone());

    // Evict oldest snapshots if over max depth
    const overflow = this.undoStack.length - this.maxDepth;
    if (overflow > 0) {
      this.undoStack.splice(0, overflow);
    }
  }

  /** @inheritdoc */
  pushRedo(buffer: RasterBuffer): void {
    this.redoStack.push(buffer.clone());
  }

  /** @inheritdoc */
  popUndo(): RasterBuffer {
    const snapshot = this.undoStack.pop();
    if (!snapshot) {
      throw new HistoryEmptyError('undo');
    }
    return snapshot;
  }

  /** @inheritdoc */
  popRedo(): RasterBuffer {
    const snapshot = this.redoStack.pop();
    if (!snapshot) {
      throw new HistoryEmptyError('redo');
    }
    return snapshot;
  }

  /** @inheritdoc */
  clearRedo(): void {
    this.redoStack = [];
  }

  /** @inheritdoc */
  clear(): void {
    this.undoStack = [];
    this.redoStack = [];
  }
}
