/**
 * Error handling tests
 */

import { InvalidBoardError, InvalidColorError } from '@pawnpusher/core';
import { describe, it, expect } from 'vitest';

import { ConfigValidationError } from '../config/validation.js';
import { CliError, ConfigError, InputError } from '../errors/cli-errors.js';
import { exitCodeFor, formatError, toCliError } from '../errors/handler.js';

describe('toCliError', () => {
  it('should map a board error to an input error at its square', () => {
    const mapped = toCliError(new InvalidBoardError('x', 5));

    expect(mapped).toBeInstanceOf(InputError);
    expect(mapped).toMatchObject({ message: 'x', position: 5, exitCode: 2 });
  });

  it('should map a color error to an input error without a square', () => {
    const mapped = toCliError(new InvalidColorError('green'));

    expect(mapped).toBeInstanceOf(InputError);
    expect(mapped).toMatchObject({
      message: 'Unknown side to move "green" (expected w, b, white or black)',
      position: undefined,
      exitCode: 2,
      suggestion: 'Use w or b for the side to move',
    });
  });

  it('should pass other errors through', () => {
    const error = new Error('boom');
    expect(toCliError(error)).toBe(error);
  });
});

describe('formatError', () => {
  it('should show the square index of a board error', () => {
    const output = formatError(toCliError(new InvalidBoardError('x', 5)));
    expect(output).toContain('Input Error (square index 5): x');
  });

  it('should include the suggestion of a CLI error', () => {
    const output = formatError(new CliError('failed', 'try again'));
    expect(output).toContain('Error: failed');
    expect(output).toContain('Suggestion: try again');
  });

  it('should list validation problems', () => {
    const output = formatError(
      new ConfigValidationError([{ path: 'search.maxDepth', message: 'too deep' }]),
    );
    expect(output).toContain('  search.maxDepth: too deep');
  });

  it('should format non-Error values', () => {
    expect(formatError('plain')).toContain('Error: plain');
  });
});

describe('exitCodeFor', () => {
  it('should exit with 2 for input errors', () => {
    expect(exitCodeFor(toCliError(new InvalidBoardError('x', 5)))).toBe(2);
  });

  it('should exit with 1 for config and other errors', () => {
    expect(exitCodeFor(new ConfigError('bad config'))).toBe(1);
    expect(exitCodeFor(new Error('boom'))).toBe(1);
  });
});
