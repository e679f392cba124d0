/**
 * Test Boards
 *
 * Boards are written as eight row strings, row 0 (White's back rank)
 * first, using the same symbols as the board codec.
 */

import { parseBoard } from '../board/board-codec.js';
import type { Board } from '../board/board.js';

export const EMPTY_ROW = '........';

/**
 * Build a board from eight row strings
 */
export function boardFromRows(rows: readonly string[]): Board {
  return parseBoard(rows.join(''));
}

/**
 * Build an otherwise empty board from a map of square name to symbol
 */
export function boardWith(pieces: Record<string, string>): Board {
  const rows = Array.from({ length: 8 }, () => [...EMPTY_ROW]);
  for (const [square, symbol] of Object.entries(pieces)) {
    const col = square.charCodeAt(0) - 97;
    const row = Number(square.slice(1)) - 1;
    const cells = rows[row];
    if (cells === undefined || col < 0 || col > 7) {
      throw new Error(`Bad square in fixture: ${square}`);
    }
    cells[col] = symbol;
  }
  return boardFromRows(rows.map((cells) => cells.join('')));
}

export const STARTING_ROWS = [
  'RNBQKBNR',
  'PPPPPPPP',
  EMPTY_ROW,
  EMPTY_ROW,
  EMPTY_ROW,
  EMPTY_ROW,
  'pppppppp',
  'rnbqkbnr',
];

export const STARTING_BOARD = STARTING_ROWS.join('');

/**
 * A few reachable positions with captures, promotions and blocked pieces
 */
export const SAMPLE_BOARDS: Record<string, string[]> = {
  starting: STARTING_ROWS,
  openCenter: [
    'R.BQKB.R',
    'PPP..PPP',
    '..N..N..',
    '...Pp...',
    '..bpP...',
    '..n..n..',
    'ppp..ppp',
    'r..qkb.r',
  ],
  promotionRace: [
    '....K...',
    '.p......',
    '........',
    '...r....',
    '....Q...',
    '........',
    '..P...p.',
    '.n..k...',
  ],
  crowded: [
    'RN.QK..R',
    'PP..BPPP',
    '..P.PN..',
    '.B.pn...',
    '...Pb...',
    '..n..qp.',
    'pp...p.p',
    'r.b.k..r',
  ],
};
