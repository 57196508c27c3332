/**
 * Error thrown when PGN parsing fails
 */
export class PgnParseError extends Error {
  constructor(
    message: string,
    public line?: number,
    public column?: number,
  ) {
    super(message);
    this.name = 'PgnParseError';
  }
}

/**
 * Error thrown when a FEN string is invalid
 */
export class InvalidFenError extends Error {
  constructor(
    message: string,
    public readonly fen: string,
  ) {
    super(message);
    this.name = 'InvalidFenError';
  }
}

/**
 * Error thrown when an illegal move is attempted
 */
export class IllegalMoveError extends Error {
  constructor(
    public readonly move: string,
    public readonly fen: string,
  ) {
    super(`Illegal move "${move}" in position: ${fen}`);
    this.name = 'IllegalMoveError';
  }
}
