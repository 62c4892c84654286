/**
 * @raster-edit/types
 *
 * Shared type definitions for the raster editor.
 * This package carries almost no runtime code: interfaces, types, enums and
 * a handful of constants that serve as the "contract" between all packages.
 *
 * @packageDocumentation
 */

// Raster primitives
export type { RasterData } from './raster';
export { BYTES_PER_PIXEL, Channel } from './raster';

// Filters
export type { FilterParameters } from './filter';
export { FilterKind } from './filter';

// Histogram
export type { ImageHistogram } from './histogram';

// Snapshot history (undo/redo)
export type { SnapshotHistory } from './history';

// Errors & results
export type { EditErrorCode, Result } from './errors';

// Events
export type { EventBus, EventCallback, EventMap } from './events';
