/**
 * Move legality over chess.js
 *
 * Nothing else in the repository decides whether a move is legal. Moves come
 * in as written (SAN, or UCI from engines) and leave in chess.js's canonical
 * SAN together with the FENs on either side of them.
 */

import { Chess, type Move } from 'chess.js';

import { IllegalMoveError, InvalidFenError } from '../errors.js';

import type { Turn } from './fen.js';

export const STARTING_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';

/**
 * A played move and the positions around it
 */
export interface MoveResult {
  /** Canonical SAN, with check and mate suffixes */
  san: string;
  fenBefore: string;
  fenAfter: string;
}

type MoveInput = string | { from: string; to: string; promotion?: string };

const UCI_MOVE = /^[a-h][1-8][a-h][1-8][qrbn]?$/;

export class ChessPosition {
  private constructor(private readonly chess: Chess) {}

  /**
   * A position from a FEN, the standard starting position by default.
   *
   * chess.js drops an en passant square that no pawn can capture on, so
   * `fen()` may differ from the input in that field.
   *
   * @throws InvalidFenError if chess.js rejects the FEN
   */
  static fromFen(fen: string = STARTING_FEN): ChessPosition {
    try {
      return new ChessPosition(new Chess(fen));
    } catch (err) {
      throw new InvalidFenError(fen, err instanceof Error ? err.message : String(err));
    }
  }

  fen(): string {
    return this.chess.fen();
  }

  turn(): Turn {
    return this.chess.turn();
  }

  /** Fullmove number */
  moveNumber(): number {
    return this.chess.moveNumber();
  }

  /**
   * Play a SAN move
   * @throws IllegalMoveError if the move is not legal here
   */
  move(san: string): MoveResult {
    const fenBefore = this.chess.fen();
    const played = this.play(san);
    if (!played) {
      throw new IllegalMoveError(san, fenBefore);
    }
    return { san: played.san, fenBefore, fenAfter: this.chess.fen() };
  }

  /**
   * SAN of a UCI move such as "g1f3" or "a7a8q"; the position is unchanged
   * @throws IllegalMoveError if the move is malformed or not legal here
   */
  uciToSan(uci: string): string {
    const fen = this.chess.fen();
    if (!UCI_MOVE.test(uci)) {
      throw new IllegalMoveError(uci, fen);
    }

    const promotion = uci.charAt(4);
    const played = this.play({
      from: uci.slice(0, 2),
      to: uci.slice(2, 4),
      ...(promotion ? { promotion } : {}),
    });
    if (!played) {
      throw new IllegalMoveError(uci, fen);
    }
    this.chess.undo();
    return played.san;
  }

  /** chess.js signals an illegal move by throwing */
  private play(move: MoveInput): Move | undefined {
    try {
      return this.chess.move(move);
    } catch (err) {
      if (err instanceof Error) {
        return undefined;
      }
      throw err;
    }
  }
}
