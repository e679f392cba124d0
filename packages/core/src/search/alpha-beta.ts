/**
 * Alpha-Beta Search
 *
 * Depth-limited minimax with alpha-beta pruning over SearchNode. The
 * principal player maximizes, the opponent minimizes. Children are
 * visited in generation order, so pruning depends on the move
 * generator's capture-first ordering.
 *
 * Every child's move is applied before descending and undone on the way
 * back (also when an error unwinds the stack), which keeps the shared
 * board identical to its state on entry.
 */

import type { Evaluator } from './evaluator.js';
import type { SearchContext } from './search-context.js';
import type { SearchNode } from './search-node.js';

/**
 * Limits checked while a search is running
 */
export interface SearchLimits {
  /** Wall-clock deadline (epoch ms) */
  deadline?: number;
  /** External cancellation */
  signal?: AbortSignal;
  /** Nodes between limit checks (default: 1024) */
  checkInterval?: number;
  /** Clock used for the deadline (default: Date.now) */
  now?: () => number;
}

export const DEFAULT_CHECK_INTERVAL = 1024;

/**
 * Whether a deadline or signal says to stop now
 */
export function limitsExceeded(limits: SearchLimits): boolean {
  if (limits.signal?.aborted) return true;
  if (limits.deadline !== undefined) {
    const now = limits.now ?? Date.now;
    return now() >= limits.deadline;
  }
  return false;
}

export class AlphaBetaSearch {
  private stopped = false;
  private sinceCheck = 0;
  private readonly checkInterval: number;

  constructor(
    private readonly ctx: SearchContext,
    private readonly evaluator: Evaluator,
    private readonly limits: SearchLimits = {},
  ) {
    this.checkInterval = Math.max(1, limits.checkInterval ?? DEFAULT_CHECK_INTERVAL);
  }

  /**
   * Whether the last search was cut short by a limit. Its scores are
   * partial and must not be used.
   */
  get aborted(): boolean {
    return this.stopped;
  }

  /**
   * Score a node to the given depth, storing the result on the node
   */
  search(node: SearchNode, depth: number, alpha = -Infinity, beta = Infinity): number {
    this.ctx.stats.nodes++;
    if (this.shouldStop()) return 0;

    if (depth <= 0 || node.isTerminal()) {
      node.score = this.evaluator.evaluate(node, this.ctx);
      return node.score;
    }

    const maximizing = node.principalToMove;
    let best = maximizing ? -Infinity : Infinity;
    node.score = best;

    for (const child of node.getChildren(this.ctx)) {
      child.enter(this.ctx.board);
      let value: number;
      try {
        value = this.search(child, depth - 1, alpha, beta);
      } finally {
        child.leave(this.ctx.board);
      }

      if (maximizing) {
        best = Math.max(best, value);
        alpha = Math.max(alpha, best);
      } else {
        best = Math.min(best, value);
        beta = Math.min(beta, best);
      }
      node.score = best;

      if (this.stopped) break;
      if (beta <= alpha) {
        this.ctx.stats.cutoffs++;
        break;
      }
    }

    return best;
  }

  private shouldStop(): boolean {
    if (this.stopped) return true;
    if (++this.sinceCheck < this.checkInterval) return false;
    this.sinceCheck = 0;
    this.stopped = limitsExceeded(this.limits);
    return this.stopped;
  }
}
