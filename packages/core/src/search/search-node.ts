/**
 * Search Node
 *
 * One ply of the game tree: the move that led here, whose turn it is and
 * the score the search last assigned. Children are generated on first
 * request and cached for the node's lifetime.
 *
 * The cache is only valid while the board is in the state that produced
 * it, i.e. right after the parent's move has been applied. Every path
 * through the tree reaches a node with the same board, so the search
 * honors this, but callers navigating the tree by hand must too. With
 * `verifyExpansion` on, a violation throws StaleExpansionError.
 */

import { serializeBoard } from '../board/board-codec.js';
import type { Board } from '../board/board.js';
import { type Color, opposite } from '../board/types.js';
import { StaleExpansionError } from '../errors.js';
import { generateMoves } from '../move/move-generator.js';
import type { Move } from '../move/move.js';

import type { SearchContext } from './search-context.js';

export class SearchNode {
  /** Last score assigned by the search (undefined until visited) */
  score: number | undefined;

  private children: SearchNode[] | null = null;
  private expandedOn: string | null = null;

  /**
   * @param move - Move from the parent's board to this node's (null at the root)
   * @param principalToMove - Whether the principal player moves at this node
   */
  constructor(
    readonly move: Move | null,
    readonly principalToMove: boolean,
  ) {}

  /**
   * Create the root node for the principal player's turn
   */
  static root(): SearchNode {
    return new SearchNode(null, true);
  }

  /**
   * Color to move at this node
   */
  sideToMove(principal: Color): Color {
    return this.principalToMove ? principal : opposite(principal);
  }

  get isExpanded(): boolean {
    return this.children !== null;
  }

  /**
   * Children generated so far, without expanding
   */
  cachedChildren(): readonly SearchNode[] {
    return this.children ?? [];
  }

  /**
   * A node is terminal when the move leading into it took a king
   */
  isTerminal(): boolean {
    return this.move?.capturesKing() ?? false;
  }

  /**
   * Apply this node's move to the board
   */
  enter(board: Board): void {
    this.move?.apply(board);
  }

  /**
   * Undo this node's move on the board
   */
  leave(board: Board): void {
    this.move?.undo(board);
  }

  /**
   * Get the opponent's replies, generating them on first call
   */
  getChildren(ctx: SearchContext): SearchNode[] {
    if (this.children !== null) {
      if (ctx.verifyExpansion && this.expandedOn !== null) {
        const current = serializeBoard(ctx.board);
        if (current !== this.expandedOn) {
          throw new StaleExpansionError(this.expandedOn, current);
        }
      }
      return this.children;
    }

    const replyToMove = !this.principalToMove;
    this.children = generateMoves(ctx.board, this.sideToMove(ctx.principal)).map(
      (move) => new SearchNode(move, replyToMove),
    );
    if (ctx.verifyExpansion) {
      this.expandedOn = serializeBoard(ctx.board);
    }
    return this.children;
  }
}
