/**
 * Move
 *
 * A reversible, sparse set of cell writes. The prior contents of every
 * touched cell are captured when the move is built, not when it is
 * applied, so a move can be applied and undone any number of times as
 * long as the board is in its generation-time state before each apply.
 */

import type { Board } from '../board/board.js';
import { type Cell, type Piece, squareName } from '../board/types.js';

/**
 * One touched cell: what it becomes and what it held before
 */
export interface CellChange {
  readonly row: number;
  readonly col: number;
  readonly next: Cell;
  readonly previous: Cell;
}

export class Move {
  private readonly entries: CellChange[] = [];

  /**
   * Build a move that lifts the piece at the origin and places `placed`
   * on the destination. The destination is recorded first.
   */
  static between(
    board: Board,
    fromRow: number,
    fromCol: number,
    toRow: number,
    toCol: number,
    placed: Piece,
  ): Move {
    return new Move().addChange(board, toRow, toCol, placed).addChange(board, fromRow, fromCol, null);
  }

  /**
   * Record a write, capturing the cell's current contents for undo
   */
  addChange(board: Board, row: number, col: number, next: Cell): this {
    this.entries.push({ row, col, next, previous: board.get(row, col) });
    return this;
  }

  get changes(): readonly CellChange[] {
    return this.entries;
  }

  apply(board: Board): void {
    for (const change of this.entries) {
      board.set(change.row, change.col, change.next);
    }
  }

  undo(board: Board): void {
    for (const change of this.entries) {
      board.set(change.row, change.col, change.previous);
    }
  }

  /**
   * Destination cell (the change that places a piece)
   */
  get destination(): CellChange | undefined {
    return this.entries.find((change) => change.next !== null);
  }

  /**
   * Origin cell (the change that empties a square)
   */
  get origin(): CellChange | undefined {
    return this.entries.find((change) => change.next === null);
  }

  /**
   * Piece removed from the board by this move, if any
   */
  get captured(): Piece | null {
    return this.destination?.previous ?? null;
  }

  /**
   * Whether this move takes a king: some touched cell held a king and now
   * holds a piece of the other color.
   */
  capturesKing(): boolean {
    return this.entries.some(
      (change) =>
        change.previous?.type === 'k' &&
        change.next !== null &&
        change.next.color !== change.previous.color,
    );
  }

  /**
   * Whether the placed piece differs from the one that moved
   */
  isPromotion(): boolean {
    const moved = this.origin?.previous;
    const placed = this.destination?.next;
    return moved != null && placed != null && moved.type !== placed.type;
  }

  /**
   * Coordinate notation, e.g. "e2e4" or "d7d8=Q"
   */
  toString(): string {
    const from = this.origin;
    const to = this.destination;
    if (!from || !to) return '(none)';
    const promotion = this.isPromotion() && to.next ? `=${to.next.type.toUpperCase()}` : '';
    return `${squareName(from.row, from.col)}${squareName(to.row, to.col)}${promotion}`;
  }
}
