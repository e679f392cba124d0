/**
 * Search Context
 *
 * State shared by every node of one search: the board being navigated,
 * the side the engine plays for and per-round counters.
 */

import type { Board } from '../board/board.js';
import type { Color } from '../board/types.js';

/**
 * Per-round counters
 */
export interface SearchStats {
  /** Nodes entered by the search */
  nodes: number;
  /** Calls to the evaluator */
  evaluations: number;
  /** Alpha-beta cutoffs taken */
  cutoffs: number;
}

export interface SearchContext {
  /** The single board instance, mutated by apply/undo */
  readonly board: Board;
  /** Side the engine is recommending moves for */
  readonly principal: Color;
  /** Check that cached children are only read against their own board */
  readonly verifyExpansion: boolean;
  stats: SearchStats;
}

export function createStats(): SearchStats {
  return { nodes: 0, evaluations: 0, cutoffs: 0 };
}

export function createSearchContext(
  board: Board,
  principal: Color,
  options: { verifyExpansion?: boolean } = {},
): SearchContext {
  return {
    board,
    principal,
    verifyExpansion: options.verifyExpansion ?? false,
    stats: createStats(),
  };
}
