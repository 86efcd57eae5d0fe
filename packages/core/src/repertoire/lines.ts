import type { GameLine } from '@repweave/pgn';

/**
 * Keep the first `maxPlies` moves of a line
 */
export function truncateLine(line: GameLine, maxPlies: number): GameLine {
  if (maxPlies < 0) {
    throw new RangeError(`maxPlies must be non-negative, got ${maxPlies}`);
  }
  if (line.moves.length <= maxPlies) {
    return line;
  }
  return {
    startFen: line.startFen,
    moves: line.moves.slice(0, maxPlies),
    positions: line.positions.slice(0, maxPlies + 1),
  };
}
