/**
 * CLI definition using Commander.js
 */

import { Command, InvalidArgumentError } from 'commander';

import type { CliOptions } from './config/schema.js';
import { parseRawCliOptions } from './config/validation.js';

export const VERSION = '0.1.0';

/**
 * Board argument description for help text
 */
const BOARD_HELP = `64 square symbols, row 0 (rank 1) first, files a-h in each row:
    P R B Q K N  White pieces
    p r b q k n  Black pieces
    .            empty square`;

/**
 * Option parser for whole numbers
 */
function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command()
    .name('pawnpusher')
    .description(
      'Chess move recommender - searches a position with alpha-beta and prints the best board per depth',
    )
    .version(VERSION);

  // Recommend command
  program
    .command('recommend')
    .description('Recommend a move, printing the resulting board after each search depth')
    .argument('<color>', 'Side to move: w, b, white or black')
    .argument('<board>', BOARD_HELP)
    .option('-c, --config <file>', 'Path to config file')
    .option('--min-depth <n>', 'First search depth (default: 2)', parseInteger)
    .option('--max-depth <n>', 'Last search depth (default: 101)', parseInteger)
    .option('-t, --time-limit <ms>', 'Stop searching after this many milliseconds', parseInteger)
    .option('--view', 'Print each recommended board to stderr')
    .option('--ascii', 'Use letters instead of chess glyphs in board views')
    .option('--verbose', 'Print node counts and timings for every depth')
    .option('--quiet', 'Only print the board lines')
    .option('--show-config', 'Print resolved configuration and exit')
    .option('--no-color', 'Disable colored output (useful for piping)')
    .action(async (color: string, board: string, options: Record<string, unknown>) => {
      // Import dynamically to avoid circular dependencies
      const { recommendCommand } = await import('./commands/recommend.js');
      await recommendCommand(color, board, options);
    });

  return program;
}

/**
 * Parse CLI options from command options object
 */
export function parseCliOptions(options: Record<string, unknown>): CliOptions {
  const raw = parseRawCliOptions(options);
  const result: CliOptions = {};

  if (raw.config !== undefined) result.config = raw.config;
  if (raw.minDepth !== undefined) result.minDepth = raw.minDepth;
  if (raw.maxDepth !== undefined) result.maxDepth = raw.maxDepth;
  if (raw.timeLimit !== undefined) result.timeLimit = raw.timeLimit;
  if (raw.view !== undefined) result.view = raw.view;
  if (raw.ascii !== undefined) result.ascii = raw.ascii;
  if (raw.verbose !== undefined) result.verbose = raw.verbose;
  if (raw.quiet !== undefined) result.quiet = raw.quiet;
  if (raw.showConfig !== undefined) result.showConfig = raw.showConfig;
  // Note: Commander.js uses 'color' (negated) when --no-color is used
  if (raw.color === false) result.noColor = true;

  return result;
}
