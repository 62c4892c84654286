/**
 * @module edit-session
 * Orchestrates load / apply / undo / redo / reset over a single image.
 *
 * Manages:
 * - The current and original rasters
 * - Snapshot history (undo/redo) via {@link HistoryManager}
 * - Histogram of the current raster
 * - Dirty flag and status message for the presentation layer
 * - Single-flight guard for mutating operations
 *
 * State lives in a zustand vanilla store so presentation layers can
 * subscribe without polling.
 *
 * @see https://github.com/pmndrs/zustand
 */

import { createStore } from 'zustand/vanilla';
import type { StoreApi } from 'zustand/vanilla';
import type { EventBus, FilterKind, FilterParameters, ImageHistogram, RasterData } from '@raster-edit/types';
import {
  HistoryEmptyError,
  NoCurrentImageError,
  NoOriginalImageError,
  RasterEditError,
  SessionBusyError,
} from './errors';
import { EventBusImpl } from './event-bus';
import { resolveParameters, transform } from './filters';
import { computeHistogram } from './histogram';
import { HistoryManager } from './history-manager';
import type { RasterBuffer } from './raster-buffer';

/** Observable session state. Buffers in here are never written to. */
export interface EditSessionState {
  /** Raster shown to the user, or null before the first load. */
  current: RasterBuffer | null;
  /** Raster as it was loaded. `reset` restores a copy of it. */
  original: RasterBuffer | null;
  /** Histogram of `current`, or null when unavailable. */
  histogram: ImageHistogram | null;
  /** True when `current` has changes since the last load, reset or save. */
  dirty: boolean;
  /** True while a mutating operation is in flight. */
  processing: boolean;
  /** Human-readable description of the last operation. */
  statusMessage: string;
  canUndo: boolean;
  canRedo: boolean;
  undoDepth: number;
  redoDepth: number;
}

/** A committed raster together with its histogram. */
export interface RasterSnapshot {
  buffer: RasterBuffer;
  histogram: ImageHistogram | null;
}

/** Runs a filter somewhere other than the caller's stack. */
export type FilterRunner = (
  source: RasterBuffer,
  kind: FilterKind,
  params: FilterParameters,
) => Promise<RasterBuffer>;

/** Subset of `console` the session writes to. */
export type SessionLogger = Pick<Console, 'info' | 'warn' | 'error'>;

export interface EditSessionOptions {
  /** Filter executor. Defaults to {@link runFilterDeferred}. */
  runner?: FilterRunner;
  /** Histogram calculator. Defaults to {@link computeHistogram}. */
  histogram?: (raster: RasterData) => ImageHistogram;
  /** Log sink. Defaults to `console`. */
  logger?: SessionLogger;
  /** Event bus to publish on. A private bus is created when omitted. */
  events?: EventBus;
}

const LOG_TAG = '[EditSession]';

/**
 * Default {@link FilterRunner}: yields to the event loop once, then runs the
 * filter in-process, so a caller that fires an edit can finish its own turn
 * before the CPU-bound work starts.
 */
export const runFilterDeferred: FilterRunner = async (source, kind, params) => {
  await new Promise<void>((resolve) => setImmediate(resolve));
  return transform(source, kind, params);
};

function initialState(): EditSessionState {
  return {
    current: null,
    original: null,
    histogram: null,
    dirty: false,
    processing: false,
    statusMessage: 'Ready',
    canUndo: false,
    canRedo: false,
    undoDepth: 0,
    redoDepth: 0,
  };
}

/**
 * One image being edited.
 *
 * Only one of `load`, `apply`, `undo`, `redo` or `reset` may run at a time.
 * A call that arrives while another is in flight is rejected with
 * {@link SessionBusyError} rather than queued. Reads are always safe.
 */
export class EditSession {
  readonly events: EventBus;

  private readonly store: StoreApi<EditSessionState>;
  private readonly history = new HistoryManager();
  private readonly runner: FilterRunner;
  private readonly histogramOf: (raster: RasterData) => ImageHistogram;
  private readonly logger: SessionLogger;

  constructor(options: EditSessionOptions = {}) {
    this.runner = options.runner ?? runFilterDeferred;
    this.histogramOf = options.histogram ?? computeHistogram;
    this.logger = options.logger ?? console;
    this.events = options.events ?? new EventBusImpl();
    this.store = createStore<EditSessionState>()(() => initialState());
  }

  // ── Queries ──────────────────────────────────────────────────────────

  get current(): RasterBuffer | null {
    return this.store.getState().current;
  }

  get original(): RasterBuffer | null {
    return this.store.getState().original;
  }

  get histogram(): ImageHistogram | null {
    return this.store.getState().histogram;
  }

  get dirty(): boolean {
    return this.store.getState().dirty;
  }

  get processing(): boolean {
    return this.store.getState().processing;
  }

  get canUndo(): boolean {
    return this.history.canUndo;
  }

  get canRedo(): boolean {
    return this.history.canRedo;
  }

  get statusMessage(): string {
    return this.store.getState().statusMessage;
  }

  getState(): EditSessionState {
    return this.store.getState();
  }

  /** Listen to every state change. Returns an unsubscribe function. */
  subscribe(listener: (state: EditSessionState, previous: EditSessionState) => void): () => void {
    return this.store.subscribe(listener);
  }

  // ── Mutations ────────────────────────────────────────────────────────

  /**
   * Start editing a copy of `buffer`. Clears both history stacks.
   * The session never holds on to the caller's buffer.
   */
  load(buffer: RasterBuffer): Promise<RasterSnapshot> {
    return this.exclusive('load image', 'Loading image...', async () => {
      this.history.clear();
      const snapshot = this.commit(buffer.clone(), {
        original: buffer.clone(),
        dirty: false,
        statusMessage: `Loaded (${buffer.width}×${buffer.height})`,
      });
      this.logger.info(`${LOG_TAG} Loaded ${buffer.width}x${buffer.height} image`);
      this.events.emit('image:loaded', { width: buffer.width, height: buffer.height });
      return snapshot;
    });
  }

  /**
   * Run a filter over the current raster and make the result current.
   * The previous raster goes onto the undo stack and redo is cleared.
   * If the filter throws, the session is left as it was.
   *
   * @param params - Missing fields use the default parameters.
   */
  apply(kind: FilterKind, params: Partial<FilterParameters> = {}): Promise<RasterSnapshot> {
    return this.exclusive('apply filter', `Applying ${kind} filter...`, async () => {
      const current = this.requireCurrent();
      const result = await this.runner(current, kind, resolveParameters(params));

      this.history.pushUndo(current);
      this.history.clearRedo();
      const snapshot = this.commit(result, {
        dirty: true,
        statusMessage: `Applied ${kind} filter`,
      });
      this.events.emit('filter:applied', { kind });
      return snapshot;
    });
  }

  /** Step back one edit. Dirty stays set while older edits remain. */
  undo(): Promise<RasterSnapshot> {
    return this.exclusive('undo', 'Undoing...', async () => {
      if (!this.history.canUndo) {
        throw new HistoryEmptyError('undo');
      }
      this.history.pushRedo(this.requireCurrent());
      const previous = this.history.popUndo();
      const snapshot = this.commit(previous, {
        dirty: this.history.canUndo,
        statusMessage: 'Undo complete',
      });
      this.events.emit('history:undone', this.depths());
      return snapshot;
    });
  }

  /** Step forward one undone edit. The rest of the redo chain stays replayable. */
  redo(): Promise<RasterSnapshot> {
    return this.exclusive('redo', 'Redoing...', async () => {
      if (!this.history.canRedo) {
        throw new HistoryEmptyError('redo');
      }
      this.history.pushUndo(this.requireCurrent());
      const next = this.history.popRedo();
      const snapshot = this.commit(next, {
        dirty: true,
        statusMessage: 'Redo complete',
      });
      this.events.emit('history:redone', this.depths());
      return snapshot;
    });
  }

  /** Restore a copy of the original. The pre-reset raster can be undone to. */
  reset(): Promise<RasterSnapshot> {
    return this.exclusive('reset image', 'Resetting image...', async () => {
      const { original } = this.store.getState();
      if (!original) {
        throw new NoOriginalImageError();
      }
      this.history.pushUndo(this.requireCurrent());
      const snapshot = this.commit(original.clone(), {
        dirty: false,
        statusMessage: 'Image reset to original',
      });
      this.events.emit('image:reset');
      return snapshot;
    });
  }

  /** Record that the presentation layer saved the current raster. */
  markSaved(): void {
    this.store.setState({ dirty: false, statusMessage: 'Saved' });
    this.events.emit('image:saved');
  }

  // ── helpers ──────────────────────────────────────────────────────────

  /**
   * Single-flight wrapper. The busy check and the flag update happen
   * synchronously, before the first await.
   */
  private async exclusive<T>(operation: string, pendingMessage: string, work: () => Promise<T>): Promise<T> {
    if (this.store.getState().processing) {
      throw new SessionBusyError(operation);
    }
    this.store.setState({ processing: true, statusMessage: pendingMessage });
    try {
      return await work();
    } catch (error) {
      if (error instanceof RasterEditError) {
        this.logger.warn(`${LOG_TAG} ${operation}: ${error.message}`);
        this.store.setState({ statusMessage: error.message });
      } else {
        this.logger.error(`${LOG_TAG} ${operation} failed:`, error);
        this.store.setState({ statusMessage: `Error: failed to ${operation}` });
      }
      throw error;
    } finally {
      this.store.setState({ processing: false });
    }
  }

  private requireCurrent(): RasterBuffer {
    const { current } = this.store.getState();
    if (!current) {
      throw new NoCurrentImageError();
    }
    return current;
  }

  /** Swap `buffer` in as current, with its histogram, in one store update. */
  private commit(
    buffer: RasterBuffer,
    changes: Pick<EditSessionState, 'dirty' | 'statusMessage'> & Partial<Pick<EditSessionState, 'original'>>,
  ): RasterSnapshot {
    const histogram = this.safeHistogram(buffer);
    this.store.setState({
      ...changes,
      current: buffer,
      histogram,
      canUndo: this.history.canUndo,
      canRedo: this.history.canRedo,
      ...this.depths(),
    });
    return { buffer, histogram };
  }

  /** A failed histogram degrades to null; it never aborts the edit. */
  private safeHistogram(buffer: RasterBuffer): ImageHistogram | null {
    try {
      return this.histogramOf(buffer);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn(`${LOG_TAG} Histogram unavailable: ${reason}`);
      this.events.emit('histogram:unavailable', { reason });
      return null;
    }
  }

  private depths(): { undoDepth: number; redoDepth: number } {
    return { undoDepth: this.history.undoDepth, redoDepth: this.history.redoDepth };
  }
}
