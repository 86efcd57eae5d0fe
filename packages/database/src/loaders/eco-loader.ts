/**
 * ECO Database Loader
 *
 * Loads opening data from TSV files into the SQLite opening book.
 *
 * TSV format: eco \t name \t pgn (a header row starting with "eco\t" is skipped)
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';

import BetterSqlite3 from 'better-sqlite3';
import { IllegalMoveError, normalizeFen, parseMoveText, type GameLine } from '@repweave/pgn';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * Get the path to the data directory
 */
export function getDataDir(): string {
  // src/loaders -> src -> database -> packages -> repo root
  return path.resolve(__dirname, '../../../../data');
}

/**
 * TSV files shipped in data/eco-source, in name order
 */
export function defaultEcoSourceFiles(): string[] {
  const sourceDir = path.join(getDataDir(), 'eco-source');
  if (!fs.existsSync(sourceDir)) {
    return [];
  }
  return fs
    .readdirSync(sourceDir)
    .filter((name) => name.endsWith('.tsv'))
    .sort()
    .map((name) => path.join(sourceDir, name));
}

export interface EcoLoadOptions {
  /** TSV files to load, in order; earlier rows win lookups on shared positions */
  sourceFiles: string[];
  /** Target database file; replaced tables are dropped first */
  dbPath: string;
  /** Receives one message per skipped file or row */
  onWarning?: (message: string) => void;
}

/**
 * Create the ECO database schema
 */
function createSchema(db: BetterSqlite3.Database): void {
  db.exec(`
    DROP TABLE IF EXISTS openings;

    CREATE TABLE openings (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      eco_code TEXT NOT NULL,
      name TEXT NOT NULL,
      moves_san TEXT NOT NULL,
      num_plies INTEGER NOT NULL,
      fen TEXT NOT NULL,
      normalized_fen TEXT NOT NULL
    );

    CREATE INDEX idx_fen ON openings(fen);
    CREATE INDEX idx_normalized_fen ON openings(normalized_fen);
    CREATE INDEX idx_eco_code ON openings(eco_code);
  `);
}

interface OpeningRow {
  eco: string;
  name: string;
  pgn: string;
}

function parseTsvLine(line: string): OpeningRow | null {
  const parts = line.split('\t');
  if (parts.length < 3) {
    return null;
  }

  const [eco, name, pgn] = parts;
  if (!eco || !name || !pgn) {
    return null;
  }
  return { eco: eco.trim(), name: name.trim(), pgn: pgn.trim() };
}

/**
 * Load a single TSV file into the database
 */
function loadTsvFile(
  filePath: string,
  insertStmt: BetterSqlite3.Statement,
  warn: (message: string) => void,
): number {
  const content = fs.readFileSync(filePath, 'utf-8');
  const lines = content.split(/\r?\n/);

  let count = 0;

  // Skip header line if present
  const startIndex = lines[0]?.startsWith('eco\t') ? 1 : 0;

  for (let i = startIndex; i < lines.length; i++) {
    const line = lines[i];
    if (!line || line.trim().length === 0) {
      continue;
    }

    const row = parseTsvLine(line);
    if (!row) {
      warn(`Skipping malformed line ${i + 1} in ${filePath}`);
      continue;
    }

    let played: GameLine;
    try {
      played = parseMoveText(row.pgn);
    } catch (err) {
      if (err instanceof IllegalMoveError) {
        warn(`Skipping line ${i + 1} in ${filePath}: ${err.message}`);
        continue;
      }
      throw err;
    }

    const fen = played.positions[played.positions.length - 1] ?? played.startFen;
    insertStmt.run(
      row.eco,
      row.name,
      played.moves.join(' '),
      played.moves.length,
      fen,
      normalizeFen(fen),
    );
    count++;
  }

  return count;
}

/**
 * Build the opening database from TSV sources.
 *
 * @returns Number of openings written
 */
export function loadEcoDatabase(options: EcoLoadOptions): number {
  const warn = options.onWarning ?? (() => undefined);

  fs.mkdirSync(path.dirname(options.dbPath), { recursive: true });
  const db = new BetterSqlite3(options.dbPath);

  try {
    createSchema(db);

    const insertStmt = db.prepare(`
      INSERT INTO openings (eco_code, name, moves_san, num_plies, fen, normalized_fen)
      VALUES (?, ?, ?, ?, ?, ?)
    `);

    let totalCount = 0;
    const loadAll = db.transaction(() => {
      for (const filePath of options.sourceFiles) {
        if (!fs.existsSync(filePath)) {
          warn(`File not found: ${filePath}`);
          continue;
        }
        totalCount += loadTsvFile(filePath, insertStmt, warn);
      }
    });
    loadAll();

    db.exec('ANALYZE');
    return totalCount;
  } finally {
    db.close();
  }
}
