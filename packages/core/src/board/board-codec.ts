/**
 * Board Codec
 *
 * Converts between the flat 64-symbol board string (row-major, row 0
 * first) and the internal Board.
 *
 * Symbols: P R B Q K N for White, lowercase for Black, `.` for empty.
 */

import { InvalidBoardError, InvalidColorError } from '../errors.js';

import { Board } from './board.js';
import { BOARD_SIZE, type Cell, type Color, type PieceType, piece } from './types.js';

export const EMPTY_SYMBOL = '.';

const SYMBOL_TO_TYPE: Record<string, PieceType> = {
  p: 'p',
  n: 'n',
  b: 'b',
  r: 'r',
  q: 'q',
  k: 'k',
};

/**
 * Convert a single symbol to a cell
 *
 * @returns The cell, or undefined if the symbol is unknown
 */
export function symbolToCell(symbol: string): Cell | undefined {
  if (symbol === EMPTY_SYMBOL) return null;
  const type = SYMBOL_TO_TYPE[symbol.toLowerCase()];
  if (type === undefined) return undefined;
  return piece(type, symbol === symbol.toUpperCase() ? 'w' : 'b');
}

/**
 * Convert a cell to its symbol
 */
export function cellToSymbol(cell: Cell): string {
  if (cell === null) return EMPTY_SYMBOL;
  return cell.color === 'w' ? cell.type.toUpperCase() : cell.type;
}

/**
 * Parse a 64-symbol board string
 *
 * @throws InvalidBoardError on wrong length or unknown symbols
 */
export function parseBoard(text: string): Board {
  const symbols = [...text.trim()];
  const expected = BOARD_SIZE * BOARD_SIZE;

  if (symbols.length !== expected) {
    throw new InvalidBoardError(
      `Board must have ${expected} squares, got ${symbols.length}`,
    );
  }

  const cells = symbols.map((symbol, index) => {
    const cell = symbolToCell(symbol);
    if (cell === undefined) {
      throw new InvalidBoardError(`Unknown symbol "${symbol}" at index ${index}`, index);
    }
    return cell;
  });

  return new Board(cells);
}

/**
 * Serialize a board to its 64-symbol string
 */
export function serializeBoard(board: Board): string {
  return board.toArray().map(cellToSymbol).join('');
}

/**
 * Parse a side-to-move token (w, b, white, black; case-insensitive)
 *
 * @throws InvalidColorError for anything else
 */
export function parseColor(token: string): Color {
  switch (token.trim().toLowerCase()) {
    case 'w':
    case 'white':
      return 'w';
    case 'b':
    case 'black':
      return 'b';
    default:
      throw new InvalidColorError(token);
  }
}
