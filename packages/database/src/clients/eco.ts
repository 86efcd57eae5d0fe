/**
 * ECO opening database client
 */

import { InvalidFenError, normalizeFen } from '@repweave/pgn';

import type { OpeningEntry, OpeningInfo } from '../types/opening.js';

import { BaseDatabaseClient, type DatabaseClientConfig } from './base.js';

/**
 * Default configuration for ECO database client
 */
export const DEFAULT_ECO_CONFIG: DatabaseClientConfig = {
  dbPath: 'eco.db',
  readonly: true,
  timeoutMs: 5000,
};

/**
 * Raw row from the openings table
 */
interface RawOpeningRow {
  id: number;
  eco_code: string;
  name: string;
  moves_san: string;
  num_plies: number;
  fen: string;
  normalized_fen: string;
}

/**
 * Transform a raw database row to OpeningInfo
 */
function rowToOpeningInfo(row: RawOpeningRow): OpeningInfo {
  return {
    eco: row.eco_code,
    name: row.name,
    mainLine: row.moves_san.split(' ').filter((m) => m.length > 0),
    numPlies: row.num_plies,
    fen: row.fen,
  };
}

/**
 * Client for ECO opening classification database
 *
 * Implements the opening book used by the DAG: positions are matched on
 * their exact FEN first, then on the normalized FEN.
 */
export class EcoClient extends BaseDatabaseClient {
  constructor(config: Partial<DatabaseClientConfig> = {}) {
    super({
      ...DEFAULT_ECO_CONFIG,
      ...config,
    });
  }

  /**
   * Look up the opening name and ECO code for a position.
   *
   * @param fen - Exact FEN of the position
   * @returns The book entry, or undefined when the position is not in the book
   */
  lookupOpening(fen: string): OpeningEntry | undefined {
    const info = this.getByPosition(fen);
    return info ? { name: info.name, eco: info.eco } : undefined;
  }

  /**
   * Get the full opening row for a position.
   *
   * When several rows share a position the first one loaded wins.
   */
  getByPosition(fen: string): OpeningInfo | undefined {
    const exact = this.prepare('SELECT * FROM openings WHERE fen = ? ORDER BY id ASC LIMIT 1').get(
      fen,
    ) as RawOpeningRow | undefined;
    if (exact) {
      return rowToOpeningInfo(exact);
    }

    let normalized: string;
    try {
      normalized = normalizeFen(fen);
    } catch (err) {
      if (err instanceof InvalidFenError) {
        return undefined;
      }
      throw err;
    }

    const row = this.prepare(
      'SELECT * FROM openings WHERE normalized_fen = ? ORDER BY id ASC LIMIT 1',
    ).get(normalized) as RawOpeningRow | undefined;
    return row ? rowToOpeningInfo(row) : undefined;
  }

  /**
   * Number of rows in the openings table
   */
  count(): number {
    const row = this.prepare('SELECT COUNT(*) AS n FROM openings').get() as { n: number };
    return row.n;
  }
}
