/**
 * Linear game lines
 *
 * A GameLine is one unbranched path of moves together with every position
 * along it. Variations in a PGN game are expanded into one GameLine per
 * root-to-leaf path so that downstream consumers never see branching.
 */

import { ChessPosition, STARTING_FEN } from '../chess/position.js';
import type { MoveInfo, ParsedGame } from '../index.js';
import { parsePgnString } from '../parser/pgn-parser.js';

/**
 * One unbranched line of play
 */
export interface GameLine {
  /** Exact FEN of the position before the first move */
  startFen: string;
  /** Moves in SAN, in playing order */
  moves: string[];
  /** Exact FENs: positions[0] is startFen, positions[i + 1] follows moves[i] */
  positions: string[];
}

/**
 * Expand a parsed game into independent lines.
 *
 * The main line comes first, followed by each variation in textual order.
 * A variation on move N shares moves 1..N-1 with the line it branches from
 * and continues only as far as the variation itself goes.
 */
export function expandVariations(game: ParsedGame): GameLine[] {
  const lines: GameLine[] = [];
  collectLines(game.moves, game.startFen, [], [game.startFen], lines);
  return lines;
}

function collectLines(
  moves: MoveInfo[],
  startFen: string,
  prefixMoves: string[],
  prefixPositions: string[],
  out: GameLine[],
): void {
  const lineMoves = [...prefixMoves];
  const linePositions = [...prefixPositions];
  const branches: Array<{ variation: MoveInfo[]; moves: string[]; positions: string[] }> = [];

  for (const move of moves) {
    for (const variation of move.variations ?? []) {
      branches.push({ variation, moves: [...lineMoves], positions: [...linePositions] });
    }
    lineMoves.push(move.san);
    linePositions.push(move.fenAfter);
  }

  if (lineMoves.length > 0) {
    out.push({ startFen, moves: lineMoves, positions: linePositions });
  }

  for (const branch of branches) {
    collectLines(branch.variation, startFen, branch.moves, branch.positions, out);
  }
}

/**
 * Parse every game in a PGN string and expand all variations
 */
export function parsePgnLines(pgnString: string): GameLine[] {
  return parsePgnString(pgnString).flatMap((game) => expandVariations(game));
}

/**
 * Play a bare move sequence such as "1. d4 d5 2. c4" into a GameLine.
 *
 * Move numbers, "..." markers and a trailing result token are ignored.
 *
 * @throws IllegalMoveError if any move is illegal
 */
export function parseMoveText(moveText: string, startFen: string = STARTING_FEN): GameLine {
  const position = ChessPosition.fromFen(startFen);
  const line: GameLine = { startFen: position.fen(), moves: [], positions: [position.fen()] };

  const tokens = moveText
    .replace(/\d+\.(\.\.)?/g, ' ')
    .split(/\s+/)
    .filter((token) => token.length > 0 && !RESULT_TOKENS.has(token));

  for (const token of tokens) {
    const result = position.move(token);
    line.moves.push(result.san);
    line.positions.push(result.fenAfter);
  }

  return line;
}

const RESULT_TOKENS = new Set(['1-0', '0-1', '1/2-1/2', '*']);
