/**
 * @pawnpusher/core - Search and evaluation engine
 *
 * This package contains:
 * - The shared mutable board and its string codec
 * - Reversible moves and pseudo-legal move generation
 * - The position evaluator
 * - Alpha-beta search driven by iterative deepening
 */

export * from './board/index.js';
export * from './move/index.js';
export * from './search/index.js';

export {
  InvalidBoardError,
  InvalidColorError,
  OutOfBoardError,
  StaleExpansionError,
} from './errors.js';
