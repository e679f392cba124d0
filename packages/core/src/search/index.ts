/**
 * Search Module
 *
 * Game-tree search: lazily expanded nodes, the evaluator, alpha-beta and
 * the iterative-deepening driver.
 */

export { PIECE_VALUES, SQUARE_BONUSES, pieceValue, squareBonus } from './piece-values.js';

export {
  type SearchStats,
  type SearchContext,
  createStats,
  createSearchContext,
} from './search-context.js';

export { SearchNode } from './search-node.js';

export {
  type EvaluationWeights,
  DEFAULT_EVALUATION_WEIGHTS,
  Evaluator,
  material,
  pawnStructure,
  mobility,
} from './evaluator.js';

export {
  type SearchLimits,
  DEFAULT_CHECK_INTERVAL,
  AlphaBetaSearch,
  limitsExceeded,
} from './alpha-beta.js';

export {
  type IterativeDeepeningOptions,
  type DepthResult,
  DEFAULT_MIN_DEPTH,
  DEFAULT_MAX_DEPTH,
  selectBestChild,
  iterativeDeepening,
} from './iterative-deepening.js';
