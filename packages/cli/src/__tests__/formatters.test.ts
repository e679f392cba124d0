/**
 * Formatting utilities tests
 */

import chalk from 'chalk';
import { afterAll, beforeAll, describe, it, expect } from 'vitest';

import { DEFAULT_CONFIG } from '../config/defaults.js';
import {
  formatConfigDisplay,
  formatCount,
  formatDepthLine,
  formatDepthStats,
  formatDuration,
  formatScore,
} from '../progress/formatters.js';
import type { DepthReport } from '../progress/types.js';

describe('formatDuration', () => {
  it('should format milliseconds', () => {
    expect(formatDuration(500)).toBe('500ms');
  });

  it('should format seconds', () => {
    expect(formatDuration(1500)).toBe('1.5s');
    expect(formatDuration(5000)).toBe('5.0s');
  });

  it('should format minutes and seconds', () => {
    expect(formatDuration(60000)).toBe('1m 0s');
    expect(formatDuration(90000)).toBe('1m 30s');
    expect(formatDuration(125000)).toBe('2m 5s');
  });
});

describe('formatScore', () => {
  it('should sign positive and negative scores', () => {
    expect(formatScore(52.5)).toBe('+52.5');
    expect(formatScore(-17.5)).toBe('-17.5');
  });

  it('should round to two decimals', () => {
    expect(formatScore(1 / 3)).toBe('+0.33');
  });

  it('should print zero without a sign', () => {
    expect(formatScore(0)).toBe('0');
    expect(formatScore(-0.001)).toBe('0');
  });

  it('should format infinite scores', () => {
    expect(formatScore(Infinity)).toBe('+inf');
    expect(formatScore(-Infinity)).toBe('-inf');
  });
});

describe('formatCount', () => {
  it('should use k and M suffixes', () => {
    expect(formatCount(999)).toBe('999');
    expect(formatCount(1500)).toBe('1.5k');
    expect(formatCount(2_500_000)).toBe('2.5M');
  });
});

describe('depth reports', () => {
  const report: DepthReport = {
    depth: 3,
    score: 52.5,
    move: 'a1b1',
    nodes: 1500,
    evaluations: 999,
    cutoffs: 12,
    elapsedMs: 250,
  };

  it('should format the depth line', () => {
    expect(formatDepthLine(report)).toBe('depth 3: a1b1 (+52.5)');
    expect(formatDepthLine({ ...report, depth: 2, move: null, score: -Infinity })).toBe(
      'depth 2: no move (-inf)',
    );
  });

  it('should format the depth statistics', () => {
    expect(formatDepthStats(report)).toBe('1.5k nodes, 999 evals, 12 cutoffs, 250ms');
  });
});

describe('formatConfigDisplay', () => {
  let level: typeof chalk.level;

  beforeAll(() => {
    level = chalk.level;
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = level;
  });

  it('should list the search settings', () => {
    const lines = formatConfigDisplay(DEFAULT_CONFIG).split('\n');
    expect(lines.slice(0, 7)).toEqual([
      'Configuration:',
      '',
      'Search:',
      '  Depths: 2-101',
      '  Time limit: none',
      '  Check interval: 1024 nodes',
      '',
    ]);
  });

  it('should show a time limit and expansion checks when set', () => {
    const config = {
      ...DEFAULT_CONFIG,
      search: { ...DEFAULT_CONFIG.search, timeLimitMs: 1500, verifyExpansion: true },
    };
    const lines = formatConfigDisplay(config).split('\n');
    expect(lines).toContain('  Time limit: 1.5s');
    expect(lines).toContain('  Verify expansion: yes');
  });
});

describe('formatConfigDisplay colors', () => {
  let level: typeof chalk.level;

  beforeAll(() => {
    level = chalk.level;
    chalk.level = 1;
  });

  afterAll(() => {
    chalk.level = level;
  });

  it('should print plain text when colors are off', () => {
    const lines = formatConfigDisplay(DEFAULT_CONFIG, false).split('\n');
    expect(lines[0]).toBe('Configuration:');
    expect(lines[2]).toBe('Search:');
    expect(lines[4]).toBe('  Time limit: none');
  });

  it('should style headings when colors are on', () => {
    const lines = formatConfigDisplay(DEFAULT_CONFIG).split('\n');
    expect(lines[0]).toBe(chalk.bold('Configuration:'));
    expect(lines[0]).not.toBe('Configuration:');
  });
});
