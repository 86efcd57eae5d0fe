/**
 * Move runs
 *
 * A MoveRun is one contiguous, unbranched sequence of moves starting from a
 * fixed position. Runs are immutable; extending one returns a copy.
 */

import { fenTurn, otherTurn, type Turn } from '@repweave/pgn';

/**
 * Render SAN moves with move numbers.
 *
 * White moves are preceded by "N."; a Black move gets "N..." only when it is
 * the first token. The move number advances after each Black move.
 *
 * @example
 * renderMoves(['e5', 'Nf3', 'Nc6'], 'b', 1) // '1... e5 2. Nf3 Nc6'
 */
export function renderMoves(moves: readonly string[], turn: Turn, moveNum: number): string {
  const parts: string[] = [];
  let currentTurn = turn;
  let currentMoveNum = moveNum;

  moves.forEach((move, idx) => {
    if (idx === 0 && currentTurn === 'b') {
      parts.push(`${currentMoveNum}...`);
    } else if (currentTurn === 'w') {
      parts.push(`${currentMoveNum}.`);
    }
    parts.push(move);

    currentTurn = otherTurn(currentTurn);
    if (currentTurn === 'w') {
      currentMoveNum++;
    }
  });

  return parts.join(' ');
}

export class MoveRun {
  constructor(
    /** Exact FEN of the position before the first move */
    readonly startFen: string,
    readonly startTurn: Turn,
    readonly startMoveNum: number,
    readonly moves: readonly string[] = [],
  ) {}

  /**
   * An empty run starting at a position
   */
  static startingAt(fen: string, moveNum: number): MoveRun {
    return new MoveRun(fen, fenTurn(fen), moveNum);
  }

  get length(): number {
    return this.moves.length;
  }

  /**
   * Copy of this run with one more move
   */
  extend(move: string): MoveRun {
    return new MoveRun(this.startFen, this.startTurn, this.startMoveNum, [...this.moves, move]);
  }

  clone(): MoveRun {
    return new MoveRun(this.startFen, this.startTurn, this.startMoveNum, [...this.moves]);
  }

  toString(): string {
    return renderMoves(this.moves, this.startTurn, this.startMoveNum);
  }
}
