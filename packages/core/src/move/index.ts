/**
 * Move Module
 */

export { type CellChange, Move } from './move.js';
export { generateMoves } from './move-generator.js';
