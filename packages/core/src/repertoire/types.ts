/**
 * Collaborator contracts and shared types for the opening DAG
 */

import type { Turn } from '@repweave/pgn';

/**
 * How records are grouped on output
 *
 * - flattened: one fully expanded record per terminal position and lineage
 * - consolidated: one record per unbranched run, with transpositions
 *   rendered as nested variations
 */
export type OutputMode = 'flattened' | 'consolidated';

/**
 * Side whose moves make up the repertoire
 */
export type RepertoireColor = Turn;

/**
 * Name and ECO code of a book position
 */
export interface OpeningEntry {
  name: string;
  eco: string;
}

/**
 * Opening-name lookup keyed by FEN
 */
export interface OpeningBook {
  lookupOpening(fen: string): OpeningEntry | undefined;
}

/**
 * Engine evaluation attached to an emitted record
 */
export interface EvalAnnotation {
  /** Centipawns from White's point of view */
  cp?: number;
  /** Moves to mate; takes precedence over cp when non-zero */
  mate?: number;
  bestMove?: string;
  depth?: number;
}

/**
 * Position evaluation lookup; must not block on the network
 */
export interface PositionEvaluator {
  evaluate(fen: string): EvalAnnotation | undefined;
}

/**
 * Destination for emitted records
 */
export interface RecordWriter {
  write(text: string): unknown;
}

export type WarningHandler = (message: string) => void;

/**
 * Games played with one move from a position
 */
export interface ExplorerMoveCount {
  san: string;
  games: number;
}

/**
 * Move statistics of a position, most played first
 */
export interface ExplorerStats {
  total: number;
  moves: ExplorerMoveCount[];
}

/**
 * Source of move statistics for line generation
 */
export interface OpeningExplorer {
  explore(fen: string): Promise<ExplorerStats>;
}
