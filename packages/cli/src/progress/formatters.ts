/**
 * Output formatting utilities
 */

import chalk, { Chalk } from 'chalk';

import type { PawnPusherConfig } from '../config/schema.js';

import type { DepthReport } from './types.js';

const plain = new Chalk({ level: 0 });

/**
 * Format configuration for display
 */
export function formatConfigDisplay(config: PawnPusherConfig, useColor = true): string {
  const c = useColor ? chalk : plain;
  const lines: string[] = [];

  lines.push(c.bold('Configuration:'));
  lines.push('');

  // Search
  lines.push(c.dim('Search:'));
  lines.push(`  Depths: ${config.search.minDepth}-${config.search.maxDepth}`);
  lines.push(
    `  Time limit: ${
      config.search.timeLimitMs !== undefined
        ? formatDuration(config.search.timeLimitMs)
        : c.yellow('none')
    }`,
  );
  lines.push(`  Check interval: ${config.search.checkInterval} nodes`);
  if (config.search.verifyExpansion) {
    lines.push(`  Verify expansion: ${c.yellow('yes')}`);
  }
  lines.push('');

  // Evaluation
  lines.push(c.dim('Evaluation:'));
  lines.push(`  Material weight: ${config.evaluation.materialWeight}`);
  lines.push(`  Pawn structure weight: ${config.evaluation.pawnStructureWeight}`);
  lines.push(`  Mobility weight: ${config.evaluation.mobilityWeight}`);
  lines.push('');

  // Output
  lines.push(c.dim('Output:'));
  lines.push(`  Board view: ${config.output.view}`);
  lines.push(`  Unicode: ${config.output.unicode}`);

  return lines.join('\n');
}

/**
 * Format a time duration in human-readable format
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.round((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}

/**
 * Format a search score, with a sign and at most two decimals
 */
export function formatScore(score: number): string {
  if (score === Infinity) return '+inf';
  if (score === -Infinity) return '-inf';

  const rounded = Math.round(score * 100) / 100;
  if (rounded === 0) return '0';
  return rounded > 0 ? `+${rounded}` : `${rounded}`;
}

/**
 * Format a node count with a k/M suffix
 */
export function formatCount(count: number): string {
  if (count < 1000) {
    return `${count}`;
  }
  if (count < 1_000_000) {
    return `${(count / 1000).toFixed(1)}k`;
  }
  return `${(count / 1_000_000).toFixed(1)}M`;
}

/**
 * One-line summary of a completed depth, without colors
 */
export function formatDepthLine(report: DepthReport): string {
  const move = report.move ?? 'no move';
  return `depth ${report.depth}: ${move} (${formatScore(report.score)})`;
}

/**
 * Node statistics of a completed depth
 */
export function formatDepthStats(report: DepthReport): string {
  return [
    `${formatCount(report.nodes)} nodes`,
    `${formatCount(report.evaluations)} evals`,
    `${formatCount(report.cutoffs)} cutoffs`,
    formatDuration(report.elapsedMs),
  ].join(', ');
}
