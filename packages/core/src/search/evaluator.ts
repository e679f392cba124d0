/**
 * Position Evaluator
 *
 * Scores a node from the principal player's point of view:
 *
 *   score = material * W_m + pawnStructure * W_p + mobility * W_mob
 *
 * - material: signed piece values summed over the board, flipped for Black
 * - pawnStructure: principal pawns defended diagonally by another own pawn,
 *   counted only at nodes where the principal player is to move
 * - mobility: central-square bonuses reachable by the side to move,
 *   negated at the opponent's nodes
 */

import type { Board } from '../board/board.js';
import { type Color, isOnBoard } from '../board/types.js';

import { pieceValue, squareBonus } from './piece-values.js';
import type { SearchContext } from './search-context.js';
import type { SearchNode } from './search-node.js';

/**
 * Weights applied to each evaluation term
 */
export interface EvaluationWeights {
  material: number;
  pawnStructure: number;
  mobility: number;
}

export const DEFAULT_EVALUATION_WEIGHTS: EvaluationWeights = {
  material: 10,
  pawnStructure: 1,
  mobility: 5,
};

/**
 * Material balance for the principal player
 */
export function material(board: Board, principal: Color): number {
  let whiteBalance = 0;
  for (let row = 0; row < 8; row++) {
    for (let col = 0; col < 8; col++) {
      const cell = board.get(row, col);
      if (cell !== null) whiteBalance += pieceValue(cell);
    }
  }
  return principal === 'w' ? whiteBalance : -whiteBalance;
}

/**
 * Count principal pawns defended by an own pawn one rank behind
 * (diagonally). Zero at the opponent's nodes.
 */
export function pawnStructure(node: SearchNode, ctx: SearchContext): number {
  if (!node.principalToMove) return 0;

  const { board, principal } = ctx;
  // "Behind" is toward the side's own back rank
  const behind = principal === 'w' ? -1 : 1;
  let defended = 0;

  for (let row = 0; row < 8; row++) {
    for (let col = 0; col < 8; col++) {
      const cell = board.get(row, col);
      if (cell?.type !== 'p' || cell.color !== principal) continue;

      for (const side of [-1, 1]) {
        const r = row + behind;
        const c = col + side;
        if (!isOnBoard(r, c)) continue;
        const support = board.get(r, c);
        if (support?.type === 'p' && support.color === principal) defended++;
      }
    }
  }

  return defended;
}

/**
 * Sum of central-square bonuses over every destination the side to move
 * can reach, kings excluded. Expands the node's children.
 */
export function mobility(node: SearchNode, ctx: SearchContext): number {
  let total = 0;

  for (const child of node.getChildren(ctx)) {
    if (child.move === null) continue;
    for (const change of child.move.changes) {
      if (change.next === null || change.next.type === 'k') continue;
      total += squareBonus(change.row, change.col);
    }
  }

  return node.principalToMove ? total : -total;
}

export class Evaluator {
  readonly weights: EvaluationWeights;

  constructor(weights: Partial<EvaluationWeights> = {}) {
    this.weights = { ...DEFAULT_EVALUATION_WEIGHTS, ...weights };
  }

  evaluate(node: SearchNode, ctx: SearchContext): number {
    ctx.stats.evaluations++;
    return (
      this.weights.material * material(ctx.board, ctx.principal) +
      this.weights.pawnStructure * pawnStructure(node, ctx) +
      this.weights.mobility * mobility(node, ctx)
    );
  }
}
