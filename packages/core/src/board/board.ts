/**
 * Board
 *
 * Mutable 8x8 grid of cells. One instance is shared by the whole search
 * and navigated with Move.apply / Move.undo, so nothing here copies on
 * write.
 */

import { OutOfBoardError } from '../errors.js';

import { BOARD_SIZE, type Cell, cellsEqual, isOnBoard } from './types.js';

export class Board {
  private readonly cells: Cell[];

  constructor(cells?: readonly Cell[]) {
    if (cells !== undefined && cells.length !== BOARD_SIZE * BOARD_SIZE) {
      throw new RangeError(`Board needs ${BOARD_SIZE * BOARD_SIZE} cells, got ${cells.length}`);
    }
    this.cells = cells ? [...cells] : new Array<Cell>(BOARD_SIZE * BOARD_SIZE).fill(null);
  }

  /**
   * Read a cell
   */
  get(row: number, col: number): Cell {
    return this.cells[this.index(row, col)] ?? null;
  }

  /**
   * Write a cell
   */
  set(row: number, col: number, cell: Cell): void {
    this.cells[this.index(row, col)] = cell;
  }

  /**
   * All cells in row-major order, row 0 first
   */
  toArray(): Cell[] {
    return [...this.cells];
  }

  clone(): Board {
    return new Board(this.cells);
  }

  equals(other: Board): boolean {
    for (let i = 0; i < this.cells.length; i++) {
      if (!cellsEqual(this.cells[i] ?? null, other.cells[i] ?? null)) return false;
    }
    return true;
  }

  private index(row: number, col: number): number {
    if (!isOnBoard(row, col)) {
      throw new OutOfBoardError(row, col);
    }
    return row * BOARD_SIZE + col;
  }
}
