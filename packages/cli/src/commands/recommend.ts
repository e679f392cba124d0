/**
 * Recommend command implementation
 */

import { setImmediate as yieldToEventLoop } from 'node:timers/promises';

import {
  type DepthResult,
  iterativeDeepening,
  parseBoard,
  parseColor,
  renderBoard,
} from '@pawnpusher/core';

import { parseCliOptions, VERSION } from '../cli.js';
import { type PawnPusherConfig, loadConfig, formatConfig } from '../config/index.js';
import { handleError } from '../errors/index.js';
import { formatConfigDisplay, ProgressReporter } from '../progress/index.js';

/**
 * Inputs of one recommendation run
 */
export interface RecommendationRun {
  /** Side to move token (w, b, white, black) */
  color: string;
  /** 64 board symbols, row 0 first */
  board: string;
  config: PawnPusherConfig;
  reporter: ProgressReporter;
  /** Receives one serialized board per completed depth */
  writeLine: (line: string) => void;
  signal?: AbortSignal;
  /** Clock for the time limit (default: Date.now) */
  now?: () => number;
}

/**
 * How a recommendation run ended
 */
export interface RecommendationOutcome {
  /** Last completed depth, null if none completed */
  last: DepthResult | null;
  /** Depths written to the output */
  depths: number;
  /** The signal or time limit stopped the run before maxDepth */
  interrupted: boolean;
}

/**
 * Search the position and write the recommended board after every
 * completed depth
 *
 * Between depths control returns to the event loop, so a signal raised by
 * a process handler is seen before the next round starts.
 */
export async function runRecommendation(run: RecommendationRun): Promise<RecommendationOutcome> {
  const { config, reporter, signal } = run;
  const now = run.now ?? Date.now;

  const principal = parseColor(run.color);
  const board = parseBoard(run.board);

  const deadline =
    config.search.timeLimitMs !== undefined ? now() + config.search.timeLimitMs : undefined;

  const rounds = iterativeDeepening(board, principal, {
    minDepth: config.search.minDepth,
    maxDepth: config.search.maxDepth,
    checkInterval: config.search.checkInterval,
    verifyExpansion: config.search.verifyExpansion,
    weights: {
      material: config.evaluation.materialWeight,
      pawnStructure: config.evaluation.pawnStructureWeight,
      mobility: config.evaluation.mobilityWeight,
    },
    deadline,
    signal,
    now,
  });

  reporter.startSearch(principal, { min: config.search.minDepth, max: config.search.maxDepth });

  let last: DepthResult | null = null;
  let depths = 0;

  for (const result of rounds) {
    last = result;

    if (result.board === null) {
      reporter.warn(`${principal === 'w' ? 'White' : 'Black'} has no move in this position`);
      break;
    }

    run.writeLine(result.board);
    depths++;

    reporter.reportDepth(
      {
        depth: result.depth,
        score: result.score,
        move: result.move?.toString() ?? null,
        nodes: result.stats.nodes,
        evaluations: result.stats.evaluations,
        cutoffs: result.stats.cutoffs,
        elapsedMs: result.elapsedMs,
      },
      config.search.maxDepth,
    );

    if (config.output.view) {
      const view = renderBoard(parseBoard(result.board), { unicode: config.output.unicode });
      reporter.printBoard(view);
    }

    await yieldToEventLoop();
  }

  const finished =
    last !== null && (last.board === null || last.depth === config.search.maxDepth);
  const interrupted = !finished;
  reporter.completeSearch(interrupted);

  return { last, depths, interrupted };
}

/**
 * Main recommend command handler
 *
 * Ctrl-C keeps its default behavior: the process ends at once, and every
 * completed depth has already been written.
 */
export async function recommendCommand(
  color: string,
  board: string,
  rawOptions: Record<string, unknown>,
): Promise<void> {
  let reporter = new ProgressReporter({ color: rawOptions['color'] !== false });

  try {
    const options = parseCliOptions(rawOptions);

    // Load configuration
    const config = await loadConfig(options);

    // Show config and exit if requested
    if (options.showConfig) {
      console.log(formatConfigDisplay(config, !options.noColor));
      console.log('');
      console.log('Raw configuration:');
      console.log(formatConfig(config));
      return;
    }

    reporter = new ProgressReporter({
      color: !options.noColor,
      silent: options.quiet ?? false,
      verbose: options.verbose ?? false,
    });
    reporter.printHeader(VERSION);

    await runRecommendation({
      color,
      board,
      config,
      reporter,
      writeLine: (line) => {
        process.stdout.write(`${line}\n`);
      },
    });
  } catch (error) {
    reporter.stop();
    handleError(error);
  }
}
