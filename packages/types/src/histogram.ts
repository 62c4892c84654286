/**
 * @module histogram
 * Per-channel intensity distribution of a raster.
 */

/** 256-bin frequency counts for the red, green and blue channels. */
export interface ImageHistogram {
  /** Red channel counts, indexed by intensity 0-255. */
  readonly red: readonly number[];
  /** Green channel counts, indexed by intensity 0-255. */
  readonly green: readonly number[];
  /** Blue channel counts, indexed by intensity 0-255. */
  readonly blue: readonly number[];
  /** Largest count across all 768 bins, for display normalization. */
  readonly maxValue: number;
}
