/**
 * Error thrown when a board string cannot be parsed
 */
export class InvalidBoardError extends Error {
  constructor(
    message: string,
    public readonly index?: number,
  ) {
    super(message);
    this.name = 'InvalidBoardError';
  }
}

/**
 * Error thrown when a side-to-move token is not recognized
 */
export class InvalidColorError extends Error {
  constructor(public readonly token: string) {
    super(`Unknown side to move "${token}" (expected w, b, white or black)`);
    this.name = 'InvalidColorError';
  }
}

/**
 * Error thrown when a coordinate outside [0,8) reaches the board
 */
export class OutOfBoardError extends RangeError {
  constructor(
    public readonly row: number,
    public readonly col: number,
  ) {
    super(`Square (${row}, ${col}) is off the board`);
    this.name = 'OutOfBoardError';
  }
}

/**
 * Error thrown when a search node's cached children are requested against
 * a board other than the one they were generated from
 */
export class StaleExpansionError extends Error {
  constructor(
    public readonly expectedBoard: string,
    public readonly actualBoard: string,
  ) {
    super(`Search node expanded on ${expectedBoard} but revisited on ${actualBoard}`);
    this.name = 'StaleExpansionError';
  }
}
