/**
 * Iterative Deepening
 *
 * Runs alpha-beta from the same root at increasing depths and yields the
 * recommended move after each completed round. The root node (and the
 * subtree below it) is kept between rounds, so the root's children are
 * generated once.
 *
 * Without a deadline or signal the loop runs up to `maxDepth`; the caller
 * can stop earlier by abandoning the generator between rounds.
 */

import { serializeBoard } from '../board/board-codec.js';
import type { Board } from '../board/board.js';
import type { Color } from '../board/types.js';
import type { Move } from '../move/move.js';

import { AlphaBetaSearch, type SearchLimits, limitsExceeded } from './alpha-beta.js';
import { type EvaluationWeights, Evaluator } from './evaluator.js';
import { type SearchStats, createSearchContext, createStats } from './search-context.js';
import { SearchNode } from './search-node.js';

/**
 * Options for an iterative-deepening run
 */
export interface IterativeDeepeningOptions extends SearchLimits {
  /** First depth searched (default: 2) */
  minDepth?: number;
  /** Last depth searched, inclusive (default: 101) */
  maxDepth?: number;
  /** Evaluation weight overrides */
  weights?: Partial<EvaluationWeights>;
  /** Throw if a node's cached children are read against another board */
  verifyExpansion?: boolean;
}

export const DEFAULT_MIN_DEPTH = 2;
export const DEFAULT_MAX_DEPTH = 101;

/**
 * Outcome of one completed round
 */
export interface DepthResult {
  depth: number;
  /** Root score from the principal player's point of view */
  score: number;
  /** Recommended move (null when the side to move has none) */
  move: Move | null;
  /** Serialized board after the recommended move */
  board: string | null;
  stats: SearchStats;
  elapsedMs: number;
}

/**
 * First root child whose score equals the root's
 */
export function selectBestChild(root: SearchNode): SearchNode | null {
  if (!root.isExpanded || root.score === undefined) return null;
  return root.cachedChildren().find((child) => child.score === root.score) ?? null;
}

/**
 * Search the position at depth minDepth, minDepth + 1, ... maxDepth
 *
 * The board is restored to its initial contents before each yield and
 * after the generator finishes, whether it completes, is aborted or is
 * abandoned.
 */
export function* iterativeDeepening(
  board: Board,
  principal: Color,
  options: IterativeDeepeningOptions = {},
): Generator<DepthResult, void, undefined> {
  const minDepth = options.minDepth ?? DEFAULT_MIN_DEPTH;
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  const now = options.now ?? Date.now;

  const ctx = createSearchContext(board, principal, {
    verifyExpansion: options.verifyExpansion ?? false,
  });
  const evaluator = new Evaluator(options.weights);
  const root = SearchNode.root();

  for (let depth = minDepth; depth <= maxDepth; depth++) {
    if (limitsExceeded(options)) return;

    ctx.stats = createStats();
    const startedAt = now();
    const search = new AlphaBetaSearch(ctx, evaluator, options);
    const score = search.search(root, depth);
    if (search.aborted) return;

    const best = selectBestChild(root);
    let after: string | null = null;
    if (best !== null) {
      best.enter(board);
      after = serializeBoard(board);
      best.leave(board);
    }

    yield {
      depth,
      score,
      move: best?.move ?? null,
      board: after,
      stats: ctx.stats,
      elapsedMs: now() - startedAt,
    };
  }
}
