/**
 * Game counts of one move in the opening explorer
 */
export interface ExplorerMove {
  uci: string;
  /** The move in SAN, as the explorer spells it */
  san: string;
  white: number;
  draws: number;
  black: number;
  /** white + draws + black */
  games: number;
}

/**
 * Explorer statistics of a position
 */
export interface ExplorerPosition {
  /** Games that reached the position */
  total: number;
  /** Replies, most played first */
  moves: ExplorerMove[];
  opening?: { eco: string; name: string };
}
