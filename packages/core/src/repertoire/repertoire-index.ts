/**
 * Repertoire move index
 *
 * Maps each normalized position where the repertoire side is to move to the
 * move the repertoire plays there. Normalizing lets transposed move orders
 * share one entry.
 */

import { fenTurn, normalizeFen, type GameLine } from '@repweave/pgn';

import type { RepertoireColor } from './types.js';

/**
 * A move and the line it was recorded from
 */
export interface RecordedMove {
  move: string;
  /** Caller-supplied origin label, e.g. "openings.pgn#3" */
  source: string;
}

/**
 * Two different repertoire moves for one position; the existing move is kept
 */
export interface MoveConflict {
  normalizedFen: string;
  existing: RecordedMove;
  incoming: RecordedMove;
}

export class RepertoireIndex {
  private readonly moves = new Map<string, RecordedMove>();
  private hitCount = 0;

  constructor(readonly color: RepertoireColor) {}

  /**
   * Number of positions with a recorded move
   */
  get size(): number {
    return this.moves.size;
  }

  /**
   * Times a position already in the index was played again with the same move
   */
  get hits(): number {
    return this.hitCount;
  }

  /**
   * The repertoire move for a position, if known
   */
  moveFor(fen: string): string | undefined {
    return this.moves.get(normalizeFen(fen))?.move;
  }

  /**
   * Record every repertoire-side move of a line.
   *
   * @returns Conflicts found in this line, in move order
   */
  recordGame(line: GameLine, source: string): MoveConflict[] {
    const conflicts: MoveConflict[] = [];

    line.moves.forEach((move, idx) => {
      const fen = line.positions[idx];
      if (fen === undefined || fenTurn(fen) !== this.color) {
        return;
      }

      const normalizedFen = normalizeFen(fen);
      const existing = this.moves.get(normalizedFen);
      if (!existing) {
        this.moves.set(normalizedFen, { move, source });
        return;
      }

      if (existing.move === move) {
        this.hitCount++;
      } else {
        conflicts.push({ normalizedFen, existing, incoming: { move, source } });
      }
    });

    return conflicts;
  }
}
