/**
 * Piece Values and Square Bonuses
 *
 * Material values follow the common relative scale (pawn 1, minor 3.5,
 * rook 5.25, queen 10). The king is given a large finite value so that
 * losing it dominates any other material swing.
 */

import type { Piece, PieceType } from '../board/types.js';
import { squareName } from '../board/types.js';

/**
 * Unsigned material value per piece type
 */
export const PIECE_VALUES: Readonly<Record<PieceType, number>> = {
  p: 1.0,
  n: 3.5,
  b: 3.5,
  r: 5.25,
  q: 10.0,
  k: 200.0,
};

/**
 * Signed material value: positive for White, negative for Black
 */
export function pieceValue(piece: Piece): number {
  const value = PIECE_VALUES[piece.type];
  return piece.color === 'w' ? value : -value;
}

/**
 * Bonus for occupying central squares. The four center squares score
 * highest; squares not listed score 0.
 */
// prettier-ignore
export const SQUARE_BONUSES: Readonly<Record<string, number>> = {
  b3: 0.25, c3: 0.5, d3: 0.5, e3: 0.5, f3: 0.5, g3: 0.25,
  b4: 0.25, c4: 0.5, d4: 1.0, e4: 1.0, f4: 0.5, g4: 0.25,
  b5: 0.25, c5: 0.5, d5: 1.0, e5: 1.0, f5: 0.5, g5: 0.25,
  b6: 0.25, c6: 0.5, d6: 0.5, e6: 0.5, f6: 0.5, g6: 0.25,
};

/**
 * Bonus for a cell, 0 outside the table
 */
export function squareBonus(row: number, col: number): number {
  return SQUARE_BONUSES[squareName(row, col)] ?? 0;
}
