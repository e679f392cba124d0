/**
 * Progress reporter with ora spinners
 *
 * Everything goes to stderr: stdout is reserved for the board lines.
 */

import chalk from 'chalk';
import ora, { type Ora, type Color } from 'ora';

import { formatDepthLine, formatDepthStats, formatDuration } from './formatters.js';
import type { ColorFunctions, DepthReport, ProgressReporterOptions } from './types.js';

export type { DepthReport, ProgressReporterOptions } from './types.js';

// Helper function for colorized output
function createColorFns(useColor: boolean): ColorFunctions {
  if (useColor) {
    return {
      bold: (text: string) => chalk.bold(text),
      dim: (text: string) => chalk.dim(text),
      green: (text: string) => chalk.green(text),
      red: (text: string) => chalk.red(text),
      yellow: (text: string) => chalk.yellow(text),
      cyan: (text: string) => chalk.cyan(text),
    };
  }
  // No colors - return text as-is
  const identity = (text: string): string => text;
  return {
    bold: identity,
    dim: identity,
    green: identity,
    red: identity,
    yellow: identity,
    cyan: identity,
  };
}

/**
 * Progress reporter for CLI output
 */
export class ProgressReporter {
  private spinner: Ora | null = null;
  private startTime: number = 0;
  private readonly silent: boolean;
  private readonly useColor: boolean;
  private readonly verbose: boolean;
  private readonly stream: NodeJS.WritableStream;
  private depthsCompleted = 0;

  // Color functions
  private readonly c: ColorFunctions;

  constructor(options: ProgressReporterOptions = {}) {
    this.silent = options.silent ?? false;
    this.useColor = options.color ?? true;
    this.verbose = options.verbose ?? false;
    this.stream = options.stream ?? process.stderr;
    this.c = createColorFns(this.useColor);
  }

  private write(line: string): void {
    this.stream.write(`${line}\n`);
  }

  /**
   * Write a line without tearing the spinner
   */
  private writeAround(line: string): void {
    if (this.spinner?.isSpinning) {
      this.spinner.clear();
      this.write(line);
      this.spinner.render();
    } else {
      this.write(line);
    }
  }

  /**
   * Print the version header
   */
  printHeader(version: string): void {
    if (this.silent) return;
    this.write(this.c.bold(`pawnpusher v${version}`));
  }

  /**
   * Start the search spinner
   */
  startSearch(color: string, depths: { min: number; max: number }): void {
    this.startTime = Date.now();
    this.depthsCompleted = 0;
    if (this.silent) return;

    const side = color === 'w' ? 'White' : 'Black';
    const oraOptions: { text: string; stream: NodeJS.WritableStream; color?: Color } = {
      text: `Searching for ${side} (depth ${depths.min}/${depths.max})`,
      stream: this.stream,
    };
    if (this.useColor) {
      oraOptions.color = 'cyan';
    }

    this.spinner = ora(oraOptions).start();
  }

  /**
   * Report a completed depth
   */
  reportDepth(report: DepthReport, maxDepth: number): void {
    this.depthsCompleted++;
    if (this.silent) return;

    if (this.verbose) {
      const line = formatDepthLine(report);
      this.writeAround(`  ${line} ${this.c.dim(`[${formatDepthStats(report)}]`)}`);
    }

    if (this.spinner) {
      const move = report.move !== null ? this.c.cyan(report.move) : 'no move';
      const next = Math.min(report.depth + 1, maxDepth);
      this.spinner.text = `Searching (depth ${next}/${maxDepth}), best so far ${move}`;
    }
  }

  /**
   * Print a rendered board view
   */
  printBoard(view: string): void {
    if (this.silent) return;
    this.writeAround(view);
  }

  /**
   * Stop the spinner and summarize the run
   *
   * @param interrupted - The run was cancelled or ran out of time
   */
  completeSearch(interrupted: boolean): void {
    if (this.silent) return;

    const elapsed = formatDuration(Date.now() - this.startTime);
    const summary = `${this.depthsCompleted} depth(s) in ${elapsed}`;

    if (!this.spinner) {
      this.write(summary);
      return;
    }

    if (interrupted) {
      this.spinner.warn(this.c.yellow(`Stopped after ${summary}`));
    } else {
      this.spinner.succeed(this.c.green(`Searched ${summary}`));
    }
    this.spinner = null;
  }

  /**
   * Display a warning message
   */
  warn(message: string): void {
    if (this.silent) return;
    this.writeAround(this.c.yellow(`⚠ ${message}`));
  }

  /**
   * Stop any active spinner
   */
  stop(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }
}
