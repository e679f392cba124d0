/**
 * Default configuration values
 */

import type {
  EvaluationConfigSchema,
  OutputConfigSchema,
  PawnPusherConfig,
  SearchConfigSchema,
} from './schema.js';

/**
 * Default search configuration: depths 2 through 101, no time limit
 */
export const DEFAULT_SEARCH_CONFIG: SearchConfigSchema = {
  minDepth: 2,
  maxDepth: 101,
  checkInterval: 1024,
  verifyExpansion: false,
};

/**
 * Default evaluation weights
 */
export const DEFAULT_EVALUATION_CONFIG: EvaluationConfigSchema = {
  materialWeight: 10,
  pawnStructureWeight: 1,
  mobilityWeight: 5,
};

/**
 * Default output configuration
 */
export const DEFAULT_OUTPUT_CONFIG: OutputConfigSchema = {
  view: false,
  unicode: true,
};

/**
 * Complete default configuration
 */
export const DEFAULT_CONFIG: PawnPusherConfig = {
  search: DEFAULT_SEARCH_CONFIG,
  evaluation: DEFAULT_EVALUATION_CONFIG,
  output: DEFAULT_OUTPUT_CONFIG,
};
