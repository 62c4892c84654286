/**
 * @module filters/engine
 * Dispatch table from {@link FilterKind} to the filter implementations.
 *
 * `transform` is the only entry point the session uses. It is pure: the same
 * source, kind and parameters always give byte-identical output.
 */

import { FilterKind } from '@raster-edit/types';
import type { FilterParameters } from '@raster-edit/types';
import { RasterBuffer } from '../raster-buffer';
import { brightness, brightnessContrast, contrast } from './adjustments';
import { grayscale, sepia } from './basic';
import { gaussianBlur } from './blur';
import { edgeDetection } from './edge';

/** A filter bound to the shared parameter record. */
export type FilterFn = (source: RasterBuffer, params: FilterParameters) => RasterBuffer;

/** Parameters a freshly loaded image starts with. */
export const DEFAULT_FILTER_PARAMETERS: Readonly<FilterParameters> = Object.freeze({
  brightness: 0,
  contrast: 0,
  blurRadius: 3,
});

const FILTER_TABLE: Record<FilterKind, FilterFn> = {
  [FilterKind.None]: (src) => src.clone(),
  [FilterKind.Grayscale]: (src) => grayscale(src),
  [FilterKind.Brightness]: (src, p) => brightness(src, p.brightness),
  [FilterKind.Contrast]: (src, p) => contrast(src, p.contrast),
  [FilterKind.BrightnessContrast]: (src, p) => brightnessContrast(src, p.brightness, p.contrast),
  [FilterKind.GaussianBlur]: (src, p) => gaussianBlur(src, p.blurRadius),
  [FilterKind.EdgeDetection]: (src) => edgeDetection(src),
  [FilterKind.Sepia]: (src) => sepia(src),
};

/** Filters offered in the editor's filter picker, in display order. */
export const AVAILABLE_FILTERS: readonly FilterKind[] = [
  FilterKind.None,
  FilterKind.Grayscale,
  FilterKind.Sepia,
  FilterKind.BrightnessContrast,
  FilterKind.GaussianBlur,
  FilterKind.EdgeDetection,
];

/** Filters whose output depends on {@link FilterParameters}. */
export const PARAMETRIC_FILTERS: ReadonlySet<FilterKind> = new Set([
  FilterKind.Brightness,
  FilterKind.Contrast,
  FilterKind.BrightnessContrast,
  FilterKind.GaussianBlur,
]);

const KIND_VALUES: ReadonlySet<string> = new Set(Object.values(FilterKind));

/** Type guard for {@link FilterKind} values. */
export function isFilterKind(value: unknown): value is FilterKind {
  return typeof value === 'string' && KIND_VALUES.has(value);
}

/** Lowercased, separator-free key -> kind, e.g. `gaussianblur` -> GaussianBlur. */
const KIND_BY_KEY = new Map<string, FilterKind>(
  Object.values(FilterKind).map((kind) => [kind.toLowerCase(), kind]),
);

/**
 * Resolve a user-facing filter name.
 * Accepts the enum value or any casing with `-`, `_` or spaces,
 * e.g. `"gaussian-blur"` or `"edge_detection"`. Returns null if unknown.
 */
export function parseFilterKind(name: string): FilterKind | null {
  const key = name.replace(/[-_\s]/g, '').toLowerCase();
  return KIND_BY_KEY.get(key) ?? null;
}

/** Fill missing (or undefined) fields from {@link DEFAULT_FILTER_PARAMETERS}. */
export function resolveParameters(params: Partial<FilterParameters> = {}): FilterParameters {
  return {
    brightness: params.brightness ?? DEFAULT_FILTER_PARAMETERS.brightness,
    contrast: params.contrast ?? DEFAULT_FILTER_PARAMETERS.contrast,
    blurRadius: params.blurRadius ?? DEFAULT_FILTER_PARAMETERS.blurRadius,
  };
}

/**
 * Run `kind` over `source`.
 * Unrecognized kinds return an identity copy, like {@link FilterKind.None}.
 *
 * @param params - Missing fields fall back to {@link DEFAULT_FILTER_PARAMETERS}.
 * @returns Always a new raster.
 */
export function transform(
  source: RasterBuffer,
  kind: FilterKind,
  params: Partial<FilterParameters> = {},
): RasterBuffer {
  const fn = isFilterKind(kind) ? FILTER_TABLE[kind] : FILTER_TABLE[FilterKind.None];
  return fn(source, resolveParameters(params));
}
