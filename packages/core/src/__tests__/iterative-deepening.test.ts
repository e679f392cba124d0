/**
 * Iterative deepening tests
 */

import { describe, it, expect } from 'vitest';

import { parseBoard, serializeBoard } from '../board/board-codec.js';
import {
  DEFAULT_MAX_DEPTH,
  DEFAULT_MIN_DEPTH,
  iterativeDeepening,
  selectBestChild,
} from '../search/iterative-deepening.js';
import { SearchNode } from '../search/search-node.js';

import { EMPTY_ROW, STARTING_BOARD, boardWith } from './fixtures.js';

const BOARD_PATTERN = /^[PRBQKNprbqkn.]{64}$/;

describe('iterativeDeepening', () => {
  it('searches from depth 2 to 101 by default', () => {
    expect(DEFAULT_MIN_DEPTH).toBe(2);
    expect(DEFAULT_MAX_DEPTH).toBe(101);
  });

  it('yields one well-formed result per depth and restores the board', () => {
    const board = parseBoard(STARTING_BOARD);
    const results = [
      ...iterativeDeepening(board, 'w', { maxDepth: 3, verifyExpansion: true }),
    ];

    expect(results.map((r) => r.depth)).toEqual([2, 3]);
    for (const result of results) {
      expect(result.board).toMatch(BOARD_PATTERN);
      expect(result.move).not.toBeNull();
      expect(result.stats.nodes).toBeGreaterThan(0);
    }
    expect(serializeBoard(board)).toBe(STARTING_BOARD);
  });

  it('reports the board after the chosen move', () => {
    const board = boardWith({ a1: 'R', a2: 'P', b1: 'k', a3: 'p' });
    const results = [...iterativeDeepening(board, 'w', { minDepth: 2, maxDepth: 3 })];

    const expected = [
      '.R......',
      'P.......',
      'p.......',
      ...Array.from({ length: 5 }, () => EMPTY_ROW),
    ].join('');
    expect(results).toHaveLength(2);
    for (const result of results) {
      expect(result.move?.toString()).toBe('a1b1');
      expect(result.score).toBe(52.5);
      expect(result.board).toBe(expected);
    }
  });

  it('plays for Black when Black is the principal player', () => {
    const board = boardWith({ e1: 'K', a8: 'k', h8: 'r' });
    const [result] = [...iterativeDeepening(board, 'b', { maxDepth: 2 })];

    expect(result?.move?.origin?.previous?.color).toBe('b');
    expect(result?.board).toMatch(BOARD_PATTERN);
  });

  it('yields a null move when the side to move has none', () => {
    const board = boardWith({ a2: 'P', a3: 'n' });
    const [result] = [...iterativeDeepening(board, 'w', { maxDepth: 2 })];

    expect(result?.move).toBeNull();
    expect(result?.board).toBeNull();
    expect(result?.score).toBe(-Infinity);
  });

  it('discards a round interrupted by the deadline', () => {
    const board = parseBoard(STARTING_BOARD);
    let clock = 0;
    const results = [
      ...iterativeDeepening(board, 'w', {
        deadline: 50,
        now: () => clock++,
        checkInterval: 1,
      }),
    ];

    expect(results).toEqual([]);
    expect(serializeBoard(board)).toBe(STARTING_BOARD);
  });

  it('stops between rounds when the signal is aborted', () => {
    const board = boardWith({ e1: 'K', d2: 'P', e8: 'k' });
    const controller = new AbortController();
    const rounds = iterativeDeepening(board, 'w', { signal: controller.signal });

    const first = rounds.next();
    expect(first.done).toBe(false);

    controller.abort();
    expect(rounds.next().done).toBe(true);
  });
});

describe('selectBestChild', () => {
  it('returns null before the root has been searched', () => {
    expect(selectBestChild(SearchNode.root())).toBeNull();
  });
});
