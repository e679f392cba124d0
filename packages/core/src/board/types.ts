/**
 * Board Types
 *
 * Piece and cell definitions shared by the board, move generator and
 * evaluator. Colors and piece types use the single-letter convention of
 * FEN (w/b, p/n/b/r/q/k).
 */

/**
 * Side color
 */
export type Color = 'w' | 'b';

/**
 * Piece type
 */
export type PieceType = 'p' | 'n' | 'b' | 'r' | 'q' | 'k';

/**
 * A piece on the board
 */
export interface Piece {
  readonly type: PieceType;
  readonly color: Color;
}

/**
 * Contents of one board cell (null = empty)
 */
export type Cell = Piece | null;

/**
 * Board dimension (rows and columns)
 */
export const BOARD_SIZE = 8;

const PIECES: Record<Color, Record<PieceType, Piece>> = {
  w: buildPieceSet('w'),
  b: buildPieceSet('b'),
};

function buildPieceSet(color: Color): Record<PieceType, Piece> {
  return {
    p: Object.freeze({ type: 'p', color }),
    n: Object.freeze({ type: 'n', color }),
    b: Object.freeze({ type: 'b', color }),
    r: Object.freeze({ type: 'r', color }),
    q: Object.freeze({ type: 'q', color }),
    k: Object.freeze({ type: 'k', color }),
  };
}

/**
 * Get the shared immutable instance for a piece
 */
export function piece(type: PieceType, color: Color): Piece {
  return PIECES[color][type];
}

/**
 * Get the opposing color
 */
export function opposite(color: Color): Color {
  return color === 'w' ? 'b' : 'w';
}

/**
 * Compare two cells by value
 */
export function cellsEqual(a: Cell, b: Cell): boolean {
  if (a === null || b === null) return a === b;
  return a.type === b.type && a.color === b.color;
}

/**
 * Check whether a coordinate lies on the board
 */
export function isOnBoard(row: number, col: number): boolean {
  return row >= 0 && row < BOARD_SIZE && col >= 0 && col < BOARD_SIZE;
}

/**
 * Name a square in algebraic form. Row 0 is White's back rank (rank 1),
 * column 0 is the a-file.
 */
export function squareName(row: number, col: number): string {
  return `${String.fromCharCode(97 + col)}${row + 1}`;
}
