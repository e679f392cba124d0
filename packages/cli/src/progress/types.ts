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
 * Summary of one completed search depth, as shown to the user
 */
export interface DepthReport {
  depth: number;
  score: number;
  /** Move in coordinate notation, null when the side to move has none */
  move: string | null;
  nodes: number;
  evaluations: number;
  cutoffs: number;
  elapsedMs: number;
}

/**
 * Progress reporter options
 */
export interface ProgressReporterOptions {
  /** Suppress all output */
  silent?: boolean;
  /** Enable colored output (default: true) */
  color?: boolean;
  /** Print node counts and timings for every depth (default: false) */
  verbose?: boolean;
  /** Where progress goes (default: process.stderr) */
  stream?: NodeJS.WritableStream;
}
