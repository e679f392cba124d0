/**
 * Error handling utilities
 */

import { InvalidBoardError, InvalidColorError } from '@pawnpusher/core';
import chalk from 'chalk';

import { ConfigValidationError } from '../config/validation.js';

import { CliError, InputError } from './cli-errors.js';

/**
 * Map core input errors to CLI errors with a suggestion; other errors
 * pass through unchanged
 */
export function toCliError(error: unknown): unknown {
  if (error instanceof InvalidBoardError) {
    return new InputError(
      error.message,
      'Pass 64 symbols, row 0 first: PRBQKN for White, prbqkn for Black, "." for empty',
      error.index,
    );
  }

  if (error instanceof InvalidColorError) {
    return new InputError(error.message, 'Use w or b for the side to move');
  }

  return error;
}

/**
 * Format an error for CLI output
 */
export function formatError(error: unknown): string {
  if (error instanceof ConfigValidationError) {
    return chalk.red(error.format());
  }

  if (error instanceof CliError) {
    return chalk.red(error.format());
  }

  if (error instanceof Error) {
    return chalk.red(`Error: ${error.message}`);
  }

  return chalk.red(`Error: ${String(error)}`);
}

/**
 * Exit code for an error
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof CliError ? error.exitCode : 1;
}

/**
 * Handle an error and exit with appropriate code
 */
export function handleError(error: unknown): never {
  const mapped = toCliError(error);
  console.error(formatError(mapped));
  process.exit(exitCodeFor(mapped));
}
