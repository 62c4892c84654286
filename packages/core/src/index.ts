/**
 * @raster-edit/core
 *
 * Raster buffers, pixel filters, histograms, snapshot history and the edit
 * session that ties them together.
 *
 * @packageDocumentation
 */

// Raster storage
export { RasterBuffer } from './raster-buffer';

// Errors
export {
  RasterEditError,
  InvalidDimensionsError,
  HistoryEmptyError,
  NoCurrentImageError,
  NoOriginalImageError,
  SessionBusyError,
  PngFormatError,
  isEditError,
} from './errors';

// Filters
export {
  transform,
  resolveParameters,
  isFilterKind,
  parseFilterKind,
  AVAILABLE_FILTERS,
  PARAMETRIC_FILTERS,
  DEFAULT_FILTER_PARAMETERS,
  grayscale,
  sepia,
  brightness,
  contrast,
  brightnessContrast,
  gaussianBlur,
  edgeDetection,
} from './filters';
export type { FilterFn } from './filters';

// Histogram
export { computeHistogram, histogramTotal, HISTOGRAM_BINS } from './histogram';

// Snapshot history (undo/redo)
export { HistoryManager, MAX_HISTORY_DEPTH } from './history-manager';

// Event bus
export { EventBusImpl } from './event-bus';

// Edit session
export { EditSession, runFilterDeferred } from './edit-session';
export type {
  EditSessionOptions,
  EditSessionState,
  FilterRunner,
  RasterSnapshot,
  SessionLogger,
} from './edit-session';

// Entry points
export { loadRaster, applyFilter, undo, redo, reset, currentBuffer } from './api';
export type { ApplyFilterError, HistoryStepError, ResetError } from './api';

// PNG import/export
export { encodeRasterPng, decodeRasterPng } from './png-codec';
