/**
 * @module filter
 * Filter catalogue and parameter types.
 */

/** Every transform the filter engine knows how to run. */
export enum FilterKind {
  None = 'None',
  Grayscale = 'Grayscale',
  Brightness = 'Brightness',
  Contrast = 'Contrast',
  BrightnessContrast = 'BrightnessContrast',
  GaussianBlur = 'GaussianBlur',
  EdgeDetection = 'EdgeDetection',
  Sepia = 'Sepia',
}

/**
 * Tunable inputs for the parametric filters.
 * Values outside the documented ranges are tolerated; the formulas clamp.
 */
export interface FilterParameters {
  /** Brightness adjustment (-100 to 100). */
  brightness: number;
  /** Contrast adjustment (-100 to 100). */
  contrast: number;
  /** Blur radius in pixels (1-10). Zero or less disables the blur. */
  blurRadius: number;
}
