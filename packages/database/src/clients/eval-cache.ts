/**
 * On-disk evaluation cache
 */

import type Database from 'better-sqlite3';
import { normalizeFen } from '@repweave/pgn';

import type { CachedEval, EvalSource, PositionEval } from '../types/eval.js';

import { BaseDatabaseClient, type DatabaseClientConfig } from './base.js';

/**
 * Default configuration for the evaluation cache
 */
export const DEFAULT_EVAL_CACHE_CONFIG: DatabaseClientConfig = {
  dbPath: 'evals.db',
  readonly: false,
  timeoutMs: 5000,
  create: true,
};

interface RawEvalRow {
  fen: string;
  cp: number | null;
  mate: number | null;
  best_move: string | null;
  depth: number | null;
  source: string;
  updated_at: string;
}

function rowToCachedEval(row: RawEvalRow): CachedEval {
  const cached: CachedEval = {
    fen: row.fen,
    source: row.source === 'cloud' ? 'cloud' : 'manual',
    updatedAt: row.updated_at,
  };
  if (row.cp !== null) cached.cp = row.cp;
  if (row.mate !== null) cached.mate = row.mate;
  if (row.best_move !== null) cached.bestMove = row.best_move;
  if (row.depth !== null) cached.depth = row.depth;
  return cached;
}

/**
 * SQLite cache of position evaluations, keyed by normalized FEN.
 *
 * `evaluate` only ever reads the cache, so emitting a repertoire never waits
 * on the network; filling the cache is the caller's job.
 */
export class EvalCacheClient extends BaseDatabaseClient {
  constructor(
    config: Partial<DatabaseClientConfig> = {},
    private readonly now: () => Date = () => new Date(),
  ) {
    super({
      ...DEFAULT_EVAL_CACHE_CONFIG,
      ...config,
    });
  }

  protected override initialize(db: Database.Database): void {
    if (this.config.readonly) {
      return;
    }
    db.exec(`
      CREATE TABLE IF NOT EXISTS evals (
        fen TEXT PRIMARY KEY,
        cp INTEGER,
        mate INTEGER,
        best_move TEXT,
        depth INTEGER,
        source TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
    `);
  }

  /**
   * Get the cached evaluation for a position
   */
  get(fen: string): CachedEval | undefined {
    const row = this.prepare('SELECT * FROM evals WHERE fen = ?').get(normalizeFen(fen)) as
      | RawEvalRow
      | undefined;
    return row ? rowToCachedEval(row) : undefined;
  }

  /**
   * Store an evaluation, replacing any previous one for the position
   */
  put(fen: string, evaluation: PositionEval, source: EvalSource): void {
    this.prepare(
      `INSERT OR REPLACE INTO evals (fen, cp, mate, best_move, depth, source, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
    ).run(
      normalizeFen(fen),
      evaluation.cp ?? null,
      evaluation.mate ?? null,
      evaluation.bestMove ?? null,
      evaluation.depth ?? null,
      source,
      this.now().toISOString(),
    );
  }

  /**
   * Whether the cache holds an evaluation for the position
   */
  has(fen: string): boolean {
    return this.get(fen) !== undefined;
  }

  /**
   * Evaluation lookup for the repertoire emitter: a cache hit or undefined
   */
  evaluate(fen: string): PositionEval | undefined {
    const cached = this.get(fen);
    if (!cached) {
      return undefined;
    }
    const evaluation: PositionEval = {};
    if (cached.cp !== undefined) evaluation.cp = cached.cp;
    if (cached.mate !== undefined) evaluation.mate = cached.mate;
    if (cached.bestMove !== undefined) evaluation.bestMove = cached.bestMove;
    if (cached.depth !== undefined) evaluation.depth = cached.depth;
    return evaluation;
  }
}
