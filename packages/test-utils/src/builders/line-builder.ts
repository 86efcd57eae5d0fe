/**
 * Builder for GameLine test data
 *
 * Plays SAN moves through ChessPosition so positions are always legal FENs.
 */

import { ChessPosition, STARTING_FEN, type GameLine } from '@repweave/pgn';

export class LineBuilder {
  private readonly position: ChessPosition;
  private readonly data: GameLine;

  constructor(startFen: string = STARTING_FEN) {
    this.position = ChessPosition.fromFen(startFen);
    const fen = this.position.fen();
    this.data = { startFen: fen, moves: [], positions: [fen] };
  }

  /**
   * Play moves in order
   */
  play(...moves: string[]): this {
    for (const move of moves) {
      const result = this.position.move(move);
      this.data.moves.push(result.san);
      this.data.positions.push(result.fenAfter);
    }
    return this;
  }

  /**
   * FEN after the moves played so far
   */
  fen(): string {
    return this.position.fen();
  }

  build(): GameLine {
    return {
      startFen: this.data.startFen,
      moves: [...this.data.moves],
      positions: [...this.data.positions],
    };
  }
}

/**
 * Build a line from the starting position
 */
export function line(...moves: string[]): GameLine {
  return new LineBuilder().play(...moves).build();
}

/**
 * FEN reached by playing moves from the starting position
 */
export function fenAfter(...moves: string[]): string {
  return new LineBuilder().play(...moves).fen();
}
