import { describe, it, expect, vi } from 'vitest';
import { FilterKind } from '@raster-edit/types';
import { EditSession } from './edit-session';
import type { FilterRunner, SessionLogger } from './edit-session';
import {
  HistoryEmptyError,
  NoCurrentImageError,
  NoOriginalImageError,
  SessionBusyError,
} from './errors';
import { brightness, grayscale, sepia, transform } from './filters';
import { RasterBuffer } from './raster-buffer';
import { pixelAt, sampleImage, solid } from './test-helpers';

/** Runs filters without yielding, to keep the tests quick. */
const immediateRunner: FilterRunner = async (source, kind, params) => transform(source, kind, params);

function quietLogger(): SessionLogger & {
  info: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
} {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

/** Runner whose filters only finish when the test releases them. */
function gatedRunner(): { runner: FilterRunner; release: () => void } {
  const pending: Array<() => void> = [];
  const runner: FilterRunner = (source, kind, params) =>
    new Promise<RasterBuffer>((resolve) => {
      pending.push(() => resolve(transform(source, kind, params)));
    });
  return { runner, release: () => pending.shift()?.() };
}

async function loadedSession(image: RasterBuffer = sampleImage()): Promise<EditSession> {
  const session = new EditSession({ runner: immediateRunner, logger: quietLogger() });
  await session.load(image);
  return session;
}

function currentOf(session: EditSession): RasterBuffer {
  const { current } = session;
  if (!current) throw new Error('session has no current image');
  return current;
}

describe('EditSession', () => {
  it('starts empty', () => {
    const session = new EditSession();
    expect(session.current).toBeNull();
    expect(session.original).toBeNull();
    expect(session.histogram).toBeNull();
    expect(session.dirty).toBe(false);
    expect(session.processing).toBe(false);
    expect(session.canUndo).toBe(false);
    expect(session.canRedo).toBe(false);
    expect(session.statusMessage).toBe('Ready');
  });

  describe('load', () => {
    it('keeps copies of the buffer as original and current', async () => {
      const image = sampleImage();
      const session = await loadedSession(image);
      expect(session.original).not.toBe(image);
      expect(session.original?.equals(image)).toBe(true);
      expect(session.current).not.toBe(image);
      expect(session.current).not.toBe(session.original);
      expect(currentOf(session).equals(image)).toBe(true);
      expect(session.dirty).toBe(false);
      expect(session.histogram?.red[200]).toBe(1);
      expect(session.statusMessage).toBe('Loaded (3×2)');
    });

    it('is not affected by later writes to the loaded buffer', async () => {
      const image = sampleImage();
      const session = await loadedSession(image);
      await session.apply(FilterKind.Grayscale);
      image.bytes.fill(7);

      await session.reset();
      expect(currentOf(session).equals(sampleImage())).toBe(true);
    });

    it('does not share buffers between sessions loaded from the same raster', async () => {
      const image = sampleImage();
      const first = await loadedSession(image);
      const second = await loadedSession(image);
      expect(first.original).not.toBe(second.original);
      expect(first.current).not.toBe(second.current);
    });

    it('clears both history stacks', async () => {
      const session = await loadedSession();
      await session.apply(FilterKind.Grayscale);
      await session.apply(FilterKind.Sepia);
      await session.undo();

      await session.load(solid(1, 1, [1, 2, 3, 4]));
      expect(session.canUndo).toBe(false);
      expect(session.canRedo).toBe(false);
      expect(session.getState().undoDepth).toBe(0);
      expect(session.getState().redoDepth).toBe(0);
    });

    it('logs and emits image:loaded', async () => {
      const logger = quietLogger();
      const session = new EditSession({ runner: immediateRunner, logger });
      const cb = vi.fn();
      session.events.on('image:loaded', cb);
      await session.load(solid(4, 2, [0, 0, 0, 255]));
      expect(cb).toHaveBeenCalledWith({ width: 4, height: 2 });
      expect(logger.info).toHaveBeenCalledWith('[EditSession] Loaded 4x2 image');
    });
  });

  describe('apply', () => {
    it('commits the filter result, marks dirty and clears redo', async () => {
      const image = sampleImage();
      const session = await loadedSession(image);
      await session.apply(FilterKind.Sepia);
      await session.undo();
      expect(session.canRedo).toBe(true);

      const snapshot = await session.apply(FilterKind.Grayscale);
      expect(snapshot.buffer).toBe(session.current);
      expect(snapshot.buffer.equals(grayscale(image))).toBe(true);
      expect(snapshot.histogram).toBe(session.histogram);
      expect(session.dirty).toBe(true);
      expect(session.canRedo).toBe(false);
      expect(session.statusMessage).toBe('Applied Grayscale filter');
    });

    it('uses the given parameters, falling back to defaults', async () => {
      const image = solid(1, 1, [100, 150, 200, 255]);
      const session = await loadedSession(image);
      await session.apply(FilterKind.Brightness, { brightness: 30 });
      expect(pixelAt(currentOf(session), 0, 0)).toEqual([176, 226, 255, 255]);
    });

    it('rejects with NoCurrentImageError before a load', async () => {
      const logger = quietLogger();
      const session = new EditSession({ runner: immediateRunner, logger });
      await expect(session.apply(FilterKind.Grayscale)).rejects.toBeInstanceOf(NoCurrentImageError);
      expect(session.current).toBeNull();
      expect(session.canUndo).toBe(false);
      expect(session.processing).toBe(false);
      expect(logger.warn).toHaveBeenCalledWith('[EditSession] apply filter: No image is loaded');
      expect(session.statusMessage).toBe('No image is loaded');
    });

    it('leaves the session untouched when the filter throws', async () => {
      const logger = quietLogger();
      const failing: FilterRunner = async () => {
        throw new Error('boom');
      };
      const image = sampleImage();
      const session = new EditSession({ runner: failing, logger });
      await session.load(image);

      await expect(session.apply(FilterKind.Sepia)).rejects.toThrow('boom');
      expect(currentOf(session).equals(image)).toBe(true);
      expect(session.canUndo).toBe(false);
      expect(session.dirty).toBe(false);
      expect(session.processing).toBe(false);
      expect(session.statusMessage).toBe('Error: failed to apply filter');
      expect(logger.error).toHaveBeenCalledOnce();
    });
  });

  describe('undo / redo', () => {
    it('apply then undo restores the exact pre-apply bytes', async () => {
      const image = sampleImage();
      const session = await loadedSession(image);
      await session.apply(FilterKind.GaussianBlur, { blurRadius: 2 });
      await session.undo();
      expect(currentOf(session).equals(image)).toBe(true);
      expect(session.dirty).toBe(false);
      expect(session.statusMessage).toBe('Undo complete');
    });

    it('undo then redo restores the exact pre-undo bytes', async () => {
      const session = await loadedSession();
      await session.apply(FilterKind.EdgeDetection);
      const edited = currentOf(session).clone();
      await session.undo();
      await session.redo();
      expect(currentOf(session).equals(edited)).toBe(true);
      expect(session.dirty).toBe(true);
      expect(session.statusMessage).toBe('Redo complete');
    });

    it('steps back to the state after the first of two filters, and forward again', async () => {
      const image = sampleImage();
      const session = await loadedSession(image);
      await session.apply(FilterKind.Grayscale);
      await session.apply(FilterKind.Brightness, { brightness: 30 });
      const afterBoth = brightness(grayscale(image), 30);

      await session.undo();
      expect(currentOf(session).equals(grayscale(image))).toBe(true);
      expect(session.dirty).toBe(true);

      await session.redo();
      expect(currentOf(session).equals(afterBoth)).toBe(true);
    });

    it('keeps the rest of the redo chain replayable after a redo', async () => {
      const image = sampleImage();
      const session = await loadedSession(image);
      await session.apply(FilterKind.Grayscale);
      await session.apply(FilterKind.Sepia);
      await session.undo();
      await session.undo();

      await session.redo();
      expect(session.canRedo).toBe(true);
      await session.redo();
      expect(currentOf(session).equals(sepia(grayscale(image)))).toBe(true);
    });

    it('a new edit after undo invalidates redo', async () => {
      const session = await loadedSession();
      await session.apply(FilterKind.Grayscale);
      await session.undo();
      await session.apply(FilterKind.Sepia);
      await expect(session.redo()).rejects.toBeInstanceOf(HistoryEmptyError);
    });

    it('rejects with HistoryEmptyError on empty stacks', async () => {
      const session = await loadedSession();
      await expect(session.undo()).rejects.toBeInstanceOf(HistoryEmptyError);
      await expect(session.redo()).rejects.toBeInstanceOf(HistoryEmptyError);
      expect(session.processing).toBe(false);
    });

    it('keeps only the 20 most recent pre-images after 25 edits', async () => {
      const session = await loadedSession(solid(1, 1, [0, 0, 0, 255]));
      for (let i = 0; i < 25; i++) {
        // +2 per step
        await session.apply(FilterKind.Brightness, { brightness: 1 });
      }
      expect(pixelAt(currentOf(session), 0, 0)[0]).toBe(50);
      expect(session.getState().undoDepth).toBe(20);

      while (session.canUndo) {
        await session.undo();
      }
      expect(pixelAt(currentOf(session), 0, 0)[0]).toBe(10);
      expect(session.getState().redoDepth).toBe(20);
    });

    it('emits history events with the stack depths', async () => {
      const session = await loadedSession();
      const undone = vi.fn();
      const redone = vi.fn();
      session.events.on('history:undone', undone);
      session.events.on('history:redone', redone);

      await session.apply(FilterKind.Sepia);
      await session.undo();
      await session.redo();

      expect(undone).toHaveBeenCalledWith({ undoDepth: 0, redoDepth: 1 });
      expect(redone).toHaveBeenCalledWith({ undoDepth: 1, redoDepth: 0 });
    });
  });

  describe('reset', () => {
    it('restores a copy of the original and keeps the edit undoable', async () => {
      const image = sampleImage();
      const session = await loadedSession(image);
      await session.apply(FilterKind.Grayscale);

      await session.reset();
      expect(currentOf(session).equals(image)).toBe(true);
      expect(session.current).not.toBe(image);
      expect(session.dirty).toBe(false);
      expect(session.getState().undoDepth).toBe(2);
      expect(session.statusMessage).toBe('Image reset to original');

      await session.undo();
      expect(currentOf(session).equals(grayscale(image))).toBe(true);
    });

    it('does not clear the redo stack', async () => {
      const session = await loadedSession();
      await session.apply(FilterKind.Grayscale);
      await session.undo();
      await session.reset();
      expect(session.canRedo).toBe(true);
    });

    it('rejects with NoOriginalImageError before a load', async () => {
      const session = new EditSession({ logger: quietLogger() });
      await expect(session.reset()).rejects.toBeInstanceOf(NoOriginalImageError);
    });
  });

  describe('markSaved', () => {
    it('clears dirty without touching history', async () => {
      const session = await loadedSession();
      const saved = vi.fn();
      session.events.on('image:saved', saved);
      await session.apply(FilterKind.Sepia);

      session.markSaved();
      expect(session.dirty).toBe(false);
      expect(session.canUndo).toBe(true);
      expect(session.statusMessage).toBe('Saved');
      expect(saved).toHaveBeenCalledOnce();
    });
  });

  describe('single-flight', () => {
    it('rejects mutating calls while an operation is in flight', async () => {
      const image = sampleImage();
      const { runner, release } = gatedRunner();
      const session = new EditSession({ runner, logger: quietLogger() });
      await session.load(image);

      const inFlight = session.apply(FilterKind.Grayscale);
      expect(session.processing).toBe(true);
      expect(session.statusMessage).toBe('Applying Grayscale filter...');

      await expect(session.apply(FilterKind.Sepia)).rejects.toBeInstanceOf(SessionBusyError);
      await expect(session.undo()).rejects.toBeInstanceOf(SessionBusyError);
      await expect(session.reset()).rejects.toBeInstanceOf(SessionBusyError);
      await expect(session.load(image)).rejects.toBeInstanceOf(SessionBusyError);

      release();
      await inFlight;
      expect(session.processing).toBe(false);
      expect(currentOf(session).equals(grayscale(image))).toBe(true);
      expect(session.getState().undoDepth).toBe(1);
    });

    it('allows reads while an operation is in flight', async () => {
      const image = sampleImage();
      const { runner, release } = gatedRunner();
      const session = new EditSession({ runner, logger: quietLogger() });
      await session.load(image);

      const inFlight = session.apply(FilterKind.Sepia);
      expect(currentOf(session).equals(image)).toBe(true);
      expect(session.canUndo).toBe(false);
      release();
      await inFlight;
      expect(session.canUndo).toBe(true);
    });

    it('runs with the default deferred runner', async () => {
      const image = sampleImage();
      const session = new EditSession({ logger: quietLogger() });
      await session.load(image);
      await session.apply(FilterKind.Sepia);
      expect(currentOf(session).equals(sepia(image))).toBe(true);
    });
  });

  describe('histogram', () => {
    it('follows the current image', async () => {
      const session = await loadedSession(solid(2, 1, [10, 20, 30, 255]));
      expect(session.histogram?.blue[10]).toBe(2);
      await session.apply(FilterKind.Brightness, { brightness: 10 });
      // offset trunc(25.5) = 25
      expect(session.histogram?.blue[35]).toBe(2);
      expect(session.histogram?.blue[10]).toBe(0);
    });

    it('degrades to null without aborting the edit', async () => {
      const logger = quietLogger();
      const session = new EditSession({
        runner: immediateRunner,
        logger,
        histogram: () => {
          throw new Error('bad histogram');
        },
      });
      const unavailable = vi.fn();
      session.events.on('histogram:unavailable', unavailable);
      const image = sampleImage();
      await session.load(image);

      const snapshot = await session.apply(FilterKind.Sepia);
      expect(snapshot.histogram).toBeNull();
      expect(session.histogram).toBeNull();
      expect(currentOf(session).equals(sepia(image))).toBe(true);
      expect(session.dirty).toBe(true);
      expect(unavailable).toHaveBeenCalledWith({ reason: 'bad histogram' });
      expect(logger.warn).toHaveBeenCalledWith('[EditSession] Histogram unavailable: bad histogram');
    });
  });

  it('notifies subscribers of each state change', async () => {
    const session = await loadedSession();
    const messages: string[] = [];
    const unsubscribe = session.subscribe((state) => messages.push(state.statusMessage));

    await session.apply(FilterKind.Grayscale);
    unsubscribe();
    await session.undo();

    expect(messages).toEqual([
      'Applying Grayscale filter...',
      'Applied Grayscale filter',
      'Applied Grayscale filter',
    ]);
  });
});
