/**
 * @repweave/pgn - Chess positions, PGN parsing and PGN text helpers
 *
 * This package handles:
 * - Position handling and move legality (chess.js)
 * - FEN field helpers and normalization
 * - PGN parsing, including recursive variations
 * - Expansion of variations into independent lines
 * - PGN tag rendering and move-text wrapping
 */

export const VERSION = '0.1.0';

/**
 * A move as played, with the positions around it
 */
export interface MoveInfo {
  san: string;
  fenBefore: string;
  fenAfter: string;
  /** Alternatives to this move, each starting from fenBefore */
  variations?: MoveInfo[][];
}

/**
 * One game of a PGN file
 */
export interface ParsedGame {
  /** Exact FEN of the position before the first move */
  startFen: string;
  moves: MoveInfo[];
}

// Re-export parsing functions
export { parsePgnString as parsePgn, syntaxErrorLocation } from './parser/pgn-parser.js';

// Re-export line expansion
export { expandVariations, parsePgnLines, parseMoveText } from './lines/game-line.js';
export type { GameLine } from './lines/game-line.js';

// Re-export rendering functions
export { renderTags, renderTag, wrapMoveText } from './renderer/pgn-renderer.js';
export type { TagPair } from './renderer/pgn-renderer.js';

// Re-export chess position utilities
export {
  ChessPosition,
  STARTING_FEN,
  normalizeFen,
  boardFen,
  fenTurn,
  fenFullmoveNumber,
  otherTurn,
} from './chess/index.js';
export type { MoveResult, Turn } from './chess/index.js';

// Re-export error types
export { PgnParseError, InvalidFenError, IllegalMoveError } from './errors.js';
export type { SourceLocation } from './errors.js';
