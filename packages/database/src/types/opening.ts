/**
 * Opening-related type definitions
 */

/**
 * Name and ECO code of a book position
 */
export interface OpeningEntry {
  /** Opening name (e.g., "Sicilian Defense: Najdorf Variation") */
  name: string;
  /** ECO code (e.g., "B90") */
  eco: string;
}

/**
 * A full row of the ECO database
 */
export interface OpeningInfo extends OpeningEntry {
  /** Main line moves in SAN notation */
  mainLine: string[];
  /** Number of half-moves (plies) in the opening line */
  numPlies: number;
  /** Exact FEN after the main line */
  fen: string;
}
