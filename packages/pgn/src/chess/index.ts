export { ChessPosition, STARTING_FEN } from './position.js';
export type { MoveResult } from './position.js';

export { normalizeFen, boardFen, fenTurn, fenFullmoveNumber, otherTurn } from './fen.js';
export type { Turn } from './fen.js';
