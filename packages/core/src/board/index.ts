/**
 * Board Module
 */

export {
  type Color,
  type PieceType,
  type Piece,
  type Cell,
  BOARD_SIZE,
  piece,
  opposite,
  cellsEqual,
  isOnBoard,
  squareName,
} from './types.js';

export { Board } from './board.js';

export {
  EMPTY_SYMBOL,
  symbolToCell,
  cellToSymbol,
  parseBoard,
  serializeBoard,
  parseColor,
} from './board-codec.js';

export { type BoardViewOptions, renderBoard } from './board-view.js';
