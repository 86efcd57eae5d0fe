import { parse } from '@mliebelt/pgn-parser';

import { ChessPosition } from '../chess/position.js';
import { IllegalMoveError, PgnParseError, type SourceLocation } from '../errors.js';
import type { MoveInfo, ParsedGame } from '../index.js';

/**
 * The parts of a pgn-parser game that lines are built from
 */
interface RawMove {
  notation?: {
    notation: string;
  };
  variations?: RawMove[][];
}

interface RawGame {
  tags?: { FEN?: unknown };
  moves?: RawMove[];
}

/**
 * Parse a PGN string into its games
 *
 * Only the FEN tag is read; every other tag, comment and NAG is ignored.
 *
 * @throws PgnParseError if the PGN is malformed
 * @throws IllegalMoveError (tagged with the game number) if a move in the
 *   main line or a variation is illegal
 */
export function parsePgnString(pgnString: string): ParsedGame[] {
  if (!pgnString.trim()) {
    return [];
  }

  let parsed: RawGame[];
  try {
    parsed = parse(pgnString, { startRule: 'games' }) as RawGame[];
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new PgnParseError(`Failed to parse PGN: ${message}`, syntaxErrorLocation(err));
  }

  return parsed.map((game, idx) => {
    try {
      return transformGame(game);
    } catch (err) {
      if (err instanceof IllegalMoveError) {
        throw err.inGame(idx + 1);
      }
      throw err;
    }
  });
}

/**
 * Where a grammar error points, when the thrown value carries a start location
 */
export function syntaxErrorLocation(err: unknown): SourceLocation | undefined {
  if (typeof err !== 'object' || err === null || !('location' in err)) {
    return undefined;
  }
  const { location } = err;
  if (typeof location !== 'object' || location === null || !('start' in location)) {
    return undefined;
  }
  const { start } = location;
  if (
    typeof start === 'object' &&
    start !== null &&
    'line' in start &&
    'column' in start &&
    typeof start.line === 'number' &&
    typeof start.column === 'number'
  ) {
    return { line: start.line, column: start.column };
  }
  return undefined;
}

function transformGame(rawGame: RawGame): ParsedGame {
  const fenTag = rawGame.tags?.FEN;
  const position =
    typeof fenTag === 'string' ? ChessPosition.fromFen(fenTag) : ChessPosition.fromFen();

  return {
    startFen: position.fen(),
    moves: processMoves(rawGame.moves ?? [], position),
  };
}

/**
 * Play raw moves from `position`, recursing into variations.
 *
 * A variation attached to a move is an alternative to that move, so it is
 * replayed from the move's `fenBefore` on a fresh position.
 */
function processMoves(rawMoves: RawMove[], position: ChessPosition): MoveInfo[] {
  const moves: MoveInfo[] = [];

  for (const rawMove of rawMoves) {
    // comment-only entries
    if (!rawMove.notation?.notation) {
      continue;
    }

    const result = position.move(rawMove.notation.notation);
    const move: MoveInfo = {
      san: result.san,
      fenBefore: result.fenBefore,
      fenAfter: result.fenAfter,
    };

    const variations = (rawMove.variations ?? [])
      .map((variation) => processMoves(variation, ChessPosition.fromFen(result.fenBefore)))
      .filter((variation) => variation.length > 0);
    if (variations.length > 0) {
      move.variations = variations;
    }

    moves.push(move);
  }

  return moves;
}
