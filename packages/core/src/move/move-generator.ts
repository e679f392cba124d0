/**
 * Move Generator
 *
 * Pseudo-legal move generation: piece movement rules only, no check
 * detection, castling or en passant. Pawns always promote to a queen.
 *
 * Move ordering: a capture goes to the front of the list when the victim
 * is worth more than the attacker, and pawn captures always go to the
 * front. Everything else is appended in scan order.
 */

import type { Board } from '../board/board.js';
import { type Color, type Piece, type PieceType, isOnBoard, piece } from '../board/types.js';
import { pieceValue } from '../search/piece-values.js';

import { Move } from './move.js';

type Offset = readonly [number, number];

const ORTHOGONAL: readonly Offset[] = [
  [1, 0],
  [-1, 0],
  [0, 1],
  [0, -1],
];

const DIAGONAL: readonly Offset[] = [
  [-1, -1],
  [-1, 1],
  [1, -1],
  [1, 1],
];

const KNIGHT_JUMPS: readonly Offset[] = [
  [-2, -1],
  [-2, 1],
  [-1, -2],
  [-1, 2],
  [1, -2],
  [1, 2],
  [2, -1],
  [2, 1],
];

const KING_STEPS: readonly Offset[] = [
  [-1, -1],
  [-1, 0],
  [-1, 1],
  [0, -1],
  [0, 1],
  [1, -1],
  [1, 0],
  [1, 1],
];

/**
 * Forward direction, start row and promotion row for each side's pawns
 */
const PAWN_RULES: Record<Color, { forward: number; startRow: number; lastRow: number }> = {
  w: { forward: 1, startRow: 1, lastRow: 7 },
  b: { forward: -1, startRow: 6, lastRow: 0 },
};

/**
 * Pieces that move one step per direction
 */
function isStepper(type: PieceType): boolean {
  return type === 'n' || type === 'k';
}

/**
 * Generate every pseudo-legal move for one side, in priority order
 */
export function generateMoves(board: Board, color: Color): Move[] {
  const moves: Move[] = [];

  for (let row = 0; row < 8; row++) {
    for (let col = 0; col < 8; col++) {
      const mover = board.get(row, col);
      if (mover === null || mover.color !== color) continue;

      switch (mover.type) {
        case 'p':
          addPawnMoves(moves, board, mover, row, col);
          break;
        case 'r':
          addSlides(moves, board, mover, row, col, ORTHOGONAL);
          break;
        case 'b':
          addSlides(moves, board, mover, row, col, DIAGONAL);
          break;
        case 'q':
          addSlides(moves, board, mover, row, col, ORTHOGONAL);
          addSlides(moves, board, mover, row, col, DIAGONAL);
          break;
        case 'n':
          addSlides(moves, board, mover, row, col, KNIGHT_JUMPS);
          break;
        case 'k':
          addSlides(moves, board, mover, row, col, KING_STEPS);
          break;
      }
    }
  }

  return moves;
}

function addPawnMoves(moves: Move[], board: Board, pawn: Piece, row: number, col: number): void {
  const { forward, startRow, lastRow } = PAWN_RULES[pawn.color];
  const next = row + forward;
  if (!isOnBoard(next, col)) return;

  const placed = next === lastRow ? piece('q', pawn.color) : pawn;

  // Captures jump the queue regardless of victim value
  for (const side of [1, -1]) {
    const target = col + side;
    if (!isOnBoard(next, target)) continue;
    const victim = board.get(next, target);
    if (victim !== null && victim.color !== pawn.color) {
      moves.unshift(Move.between(board, row, col, next, target, placed));
    }
  }

  if (board.get(next, col) === null) {
    moves.push(Move.between(board, row, col, next, col, placed));
  }

  if (row === startRow) {
    const jump = row + 2 * forward;
    if (board.get(next, col) === null && board.get(jump, col) === null) {
      moves.push(Move.between(board, row, col, jump, col, pawn));
    }
  }
}

/**
 * Walk each direction from the origin. Steppers (knight, king) stop after
 * the first square; sliders continue until blocked or after a capture.
 */
function addSlides(
  moves: Move[],
  board: Board,
  mover: Piece,
  row: number,
  col: number,
  directions: readonly Offset[],
): void {
  for (const [dr, dc] of directions) {
    for (let distance = 1; ; distance++) {
      const toRow = row + distance * dr;
      const toCol = col + distance * dc;
      if (!isOnBoard(toRow, toCol)) break;

      const target = board.get(toRow, toCol);
      if (target !== null) {
        if (target.color !== mover.color) {
          const capture = Move.between(board, row, col, toRow, toCol, mover);
          if (Math.abs(pieceValue(target)) > Math.abs(pieceValue(mover))) {
            moves.unshift(capture);
          } else {
            moves.push(capture);
          }
        }
        break;
      }

      moves.push(Move.between(board, row, col, toRow, toCol, mover));
      if (isStepper(mover.type)) break;
    }
  }
}
