/**
 * Errors raised while reading PGN text, FENs and moves
 */

/**
 * One-based position in PGN source text
 */
export interface SourceLocation {
  line: number;
  column: number;
}

/**
 * PGN text the grammar rejects
 */
export class PgnParseError extends Error {
  constructor(
    message: string,
    public readonly location?: SourceLocation,
  ) {
    super(message);
    this.name = 'PgnParseError';
  }
}

/**
 * A FEN that chess.js or the field helpers cannot read
 */
export class InvalidFenError extends Error {
  constructor(
    public readonly fen: string,
    public readonly reason: string,
  ) {
    super(`Invalid FEN "${fen}": ${reason}`);
    this.name = 'InvalidFenError';
  }
}

/**
 * A move that is not legal in the position it was played from
 */
export class IllegalMoveError extends Error {
  constructor(
    /** The move as written, SAN or UCI */
    public readonly move: string,
    public readonly fen: string,
    /** One-based game number within a PGN file */
    public readonly game?: number,
  ) {
    const where = game === undefined ? '' : ` in game ${game}`;
    super(`Illegal move "${move}"${where} (position ${fen})`);
    this.name = 'IllegalMoveError';
  }

  /**
   * The same error, tagged with the game it was found in
   */
  inGame(game: number): IllegalMoveError {
    return new IllegalMoveError(this.move, this.fen, game);
  }
}
