/**
 * Shared types for progress reporter components
 */

/**
 * Color function type for conditional colorization
 */
export type ColorFn = (text: string) => string;

/**
 * Color functions bundle
 */
export interface ColorFunctions {
  bold: ColorFn;
  dim: ColorFn;
  green: ColorFn;
  red: ColorFn;
  yellow: ColorFn;
  cyan: ColorFn;
}

/**
 * Phases of a repertoire build
 */
export type BuildPhase =
  | 'opening_book'
  | 'existing_repertoire'
  | 'new_lines'
  | 'generating'
  | 'cloud_evals'
  | 'writing'
  | 'eco_load';

/**
 * Phase display names
 */
export const PHASE_NAMES: Record<BuildPhase, string> = {
  opening_book: 'Opening book',
  existing_repertoire: 'Reading existing repertoire',
  new_lines: 'Adding new lines',
  generating: 'Generating lines from the opening explorer',
  cloud_evals: 'Fetching cloud evaluations',
  writing: 'Writing repertoire',
  eco_load: 'Loading ECO openings',
};

/**
 * Progress reporter options
 */
export interface ProgressReporterOptions {
  /** Suppress all output */
  silent?: boolean;
  /** Enable colored output (default: true) */
  color?: boolean;
}
