/**
 * Configuration schema types for the pawnpusher CLI
 */

/**
 * Search configuration
 */
export interface SearchConfigSchema {
  /** First depth searched */
  minDepth: number;
  /** Last depth searched (inclusive) */
  maxDepth: number;
  /** Wall-clock budget for the whole run in ms (unset = until maxDepth or Ctrl-C) */
  timeLimitMs?: number;
  /** Nodes between deadline/cancellation checks */
  checkInterval: number;
  /** Assert that cached children are only read against their own board */
  verifyExpansion: boolean;
}

/**
 * Evaluation weights
 */
export interface EvaluationConfigSchema {
  /** Weight of the material balance */
  materialWeight: number;
  /** Weight of the defended-pawn count */
  pawnStructureWeight: number;
  /** Weight of the central-square mobility */
  mobilityWeight: number;
}

/**
 * Output configuration
 */
export interface OutputConfigSchema {
  /** Print the board after each depth's move to stderr */
  view: boolean;
  /** Use chess glyphs in the board view */
  unicode: boolean;
}

/**
 * Complete pawnpusher configuration
 */
export interface PawnPusherConfig {
  /** Search settings */
  search: SearchConfigSchema;
  /** Evaluation settings */
  evaluation: EvaluationConfigSchema;
  /** Output settings */
  output: OutputConfigSchema;
}

/**
 * CLI options from command line arguments
 */
export interface CliOptions {
  /** Path to config file */
  config?: string;
  /** First search depth */
  minDepth?: number;
  /** Last search depth */
  maxDepth?: number;
  /** Time budget in ms */
  timeLimit?: number;
  /** Print board views to stderr */
  view?: boolean;
  /** Plain symbols in board views */
  ascii?: boolean;
  /** Print per-depth statistics */
  verbose?: boolean;
  /** Suppress everything but the board lines on stdout */
  quiet?: boolean;
  /** Print resolved config and exit */
  showConfig?: boolean;
  /** Disable colored output */
  noColor?: boolean;
}
