/**
 * @module filters
 * Pixel filters for the raster editor.
 *
 * Tone filters: brightness, contrast, brightness/contrast.
 * Colour filters: grayscale, sepia.
 * Spatial filters: gaussian blur, edge detection.
 *
 * @packageDocumentation
 */

export { brightness, contrast, brightnessContrast, brightnessOffset, contrastFactor } from './adjustments';
export { grayscale, sepia } from './basic';
export { gaussianBlur, boxBlur } from './blur';
export { edgeDetection } from './edge';
export {
  transform,
  resolveParameters,
  isFilterKind,
  parseFilterKind,
  AVAILABLE_FILTERS,
  PARAMETRIC_FILTERS,
  DEFAULT_FILTER_PARAMETERS,
} from './engine';
export type { FilterFn } from './engine';
