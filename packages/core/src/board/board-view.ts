/**
 * Board View
 *
 * Debug rendering of a board, one line per row with the row index in
 * front. Row 0 is printed first, so White's back rank is on top.
 *
 * ```
 * 0 ♖ ♘ ♗ ♕ ♔ ♗ ♘ ♖
 * 1 ♙ ♙ ♙ ♙ ♙ ♙ ♙ ♙
 * 2 ▢ ▢ ▢ ▢ ▢ ▢ ▢ ▢
 * ```
 */

import { cellToSymbol } from './board-codec.js';
import type { Board } from './board.js';
import { BOARD_SIZE } from './types.js';

/**
 * Options for board rendering
 */
export interface BoardViewOptions {
  /** Use chess glyphs instead of board symbols (default: true) */
  unicode?: boolean;
}

const GLYPHS: Record<string, string> = {
  P: '♙',
  R: '♖',
  B: '♗',
  Q: '♕',
  K: '♔',
  N: '♘',
  p: '♟',
  r: '♜',
  b: '♝',
  q: '♛',
  k: '♚',
  n: '♞',
  '.': '▢',
};

export function renderBoard(board: Board, options: BoardViewOptions = {}): string {
  const unicode = options.unicode ?? true;
  const lines: string[] = [];

  for (let row = 0; row < BOARD_SIZE; row++) {
    const cells: string[] = [];
    for (let col = 0; col < BOARD_SIZE; col++) {
      const symbol = cellToSymbol(board.get(row, col));
      cells.push(unicode ? (GLYPHS[symbol] ?? symbol) : symbol);
    }
    lines.push(`${row} ${cells.join(' ')}`);
  }

  return lines.join('\n');
}
