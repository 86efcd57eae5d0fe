/**
 * The alternative move runs that end at one DAG node
 */

import { InvalidFenError, normalizeFen, otherTurn } from '@repweave/pgn';

import { InvariantViolationError } from './errors.js';
import { renderMoves, type MoveRun } from './move-run.js';

function tryNormalize(fen: string): string | undefined {
  try {
    return normalizeFen(fen);
  } catch (err) {
    if (err instanceof InvalidFenError) {
      return undefined;
    }
    throw err;
  }
}

export class MoveRunSet {
  private readonly members: MoveRun[] = [];

  /**
   * Runs in the order they were recorded
   */
  get runs(): readonly MoveRun[] {
    return this.members;
  }

  get size(): number {
    return this.members.length;
  }

  add(run: MoveRun): void {
    this.members.push(run);
  }

  clear(): void {
    this.members.length = 0;
  }

  /**
   * Whether every run starts from the same normalized position.
   * An unparseable start FEN counts as a mismatch.
   */
  hasSharedStart(): boolean {
    let shared: string | undefined;
    for (const run of this.members) {
      const normalized = tryNormalize(run.startFen);
      if (normalized === undefined) {
        return false;
      }
      if (shared === undefined) {
        shared = normalized;
      } else if (normalized !== shared) {
        return false;
      }
    }
    return true;
  }

  /**
   * Render the set as PGN move text.
   *
   * The first run is the main line. Every other run is printed whole, in
   * parentheses, right after the main line's first move; the main line then
   * resumes with its remaining moves.
   *
   * @throws InvariantViolationError if the runs differ in normalized start
   *   position, side to move, move number or length
   */
  toString(): string {
    const [main, ...alternatives] = this.members;
    if (!main) {
      return '';
    }
    if (alternatives.length === 0) {
      return main.toString();
    }

    this.assertMergeable(main);

    const first = main.moves[0];
    if (first === undefined) {
      throw new InvariantViolationError('cannot merge empty move runs', { runs: this.size });
    }

    const parts = [
      main.startTurn === 'b' ? `${main.startMoveNum}... ${first}` : `${main.startMoveNum}. ${first}`,
    ];
    for (const alternative of alternatives) {
      parts.push(`(${alternative.toString()})`);
    }

    const tailTurn = otherTurn(main.startTurn);
    const tailMoveNum = tailTurn === 'w' ? main.startMoveNum + 1 : main.startMoveNum;
    const tail = renderMoves(main.moves.slice(1), tailTurn, tailMoveNum);
    if (tail) {
      parts.push(tail);
    }

    return parts.join(' ');
  }

  private assertMergeable(main: MoveRun): void {
    const mainFen = tryNormalize(main.startFen);
    if (mainFen === undefined) {
      throw new InvariantViolationError('move run has an unparseable start FEN', {
        startFen: main.startFen,
      });
    }

    for (const run of this.members) {
      const runFen = tryNormalize(run.startFen);
      if (runFen !== mainFen) {
        throw new InvariantViolationError('move run start position does not match', {
          expected: mainFen,
          actual: run.startFen,
          runs: this.members.map((r) => ({ startFen: r.startFen, moves: [...r.moves] })),
        });
      }
      if (run.startTurn !== main.startTurn) {
        throw new InvariantViolationError(
          `move run turn ${run.startTurn} does not match ${main.startTurn}`,
          { startFen: run.startFen },
        );
      }
      if (run.startMoveNum !== main.startMoveNum) {
        throw new InvariantViolationError(
          `move run move number ${run.startMoveNum} does not match ${main.startMoveNum}`,
          { startFen: run.startFen },
        );
      }
      if (run.length !== main.length) {
        throw new InvariantViolationError(
          `move run length ${run.length} does not match ${main.length}`,
          { startFen: run.startFen },
        );
      }
    }
  }
}
