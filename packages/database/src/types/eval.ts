/**
 * Engine evaluation of a position
 *
 * `cp` is in centipawns from White's point of view. When `mate` is set it
 * takes precedence over `cp` and counts moves to mate (negative: Black mates).
 */
export interface PositionEval {
  cp?: number;
  mate?: number;
  /** Best move in SAN */
  bestMove?: string;
  depth?: number;
}

/**
 * Where a cached evaluation came from
 */
export type EvalSource = 'cloud' | 'manual';

/**
 * A cached evaluation row
 */
export interface CachedEval extends PositionEval {
  /** Normalized FEN the evaluation is stored under */
  fen: string;
  source: EvalSource;
  /** ISO-8601 timestamp of the last write */
  updatedAt: string;
}
