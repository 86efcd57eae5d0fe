import { InvalidFenError } from '../errors.js';

/**
 * Side to move as encoded in the second FEN field
 */
export type Turn = 'w' | 'b';

type FenFields = [string, string, string, string, string, string];

function hasSixFields(parts: string[]): parts is FenFields {
  return parts.length === 6;
}

/**
 * Split a FEN into its six space-separated fields
 * @throws InvalidFenError if the FEN does not have exactly six fields
 */
function splitFen(fen: string): FenFields {
  const parts = fen.split(' ');
  if (!hasSixFields(parts)) {
    throw new InvalidFenError(fen, `expected 6 fields, got ${parts.length}`);
  }
  return parts;
}

/**
 * Normalize a FEN by zeroing the halfmove clock and resetting the
 * fullmove number to 1.
 *
 * Board, side to move, castling rights and en passant square are kept, so
 * two positions reached by different move orders normalize to the same
 * string.
 *
 * @example
 * normalizeFen('rnbqkbnr/pppp1ppp/8/4p3/4P3/5N2/PPPP1PPP/RNBQKB1R b KQkq - 1 2')
 * // 'rnbqkbnr/pppp1ppp/8/4p3/4P3/5N2/PPPP1PPP/RNBQKB1R b KQkq - 0 1'
 *
 * @throws InvalidFenError if the FEN does not have exactly six fields
 */
export function normalizeFen(fen: string): string {
  const [board, turn, castling, enPassant] = splitFen(fen);
  return `${board} ${turn} ${castling} ${enPassant} 0 1`;
}

/**
 * Piece placement field only
 */
export function boardFen(fen: string): string {
  return splitFen(fen)[0];
}

/**
 * Side to move
 * @throws InvalidFenError if the side-to-move field is not "w" or "b"
 */
export function fenTurn(fen: string): Turn {
  const turn = splitFen(fen)[1];
  if (turn !== 'w' && turn !== 'b') {
    throw new InvalidFenError(fen, `bad side to move "${turn}"`);
  }
  return turn;
}

/**
 * Fullmove number (sixth field)
 * @throws InvalidFenError if the field is not a positive integer
 */
export function fenFullmoveNumber(fen: string): number {
  const field = splitFen(fen)[5];
  const parsed = parseInt(field, 10);
  if (isNaN(parsed) || parsed < 1 || String(parsed) !== field) {
    throw new InvalidFenError(fen, `bad fullmove number "${field}"`);
  }
  return parsed;
}

/**
 * The side that moves after `turn`
 */
export function otherTurn(turn: Turn): Turn {
  return turn === 'w' ? 'b' : 'w';
}
