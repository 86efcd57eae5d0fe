/**
 * @repweave/database - Database clients for repweave
 *
 * This package provides:
 * - The ECO opening book (SQLite) and its TSV loader
 * - An on-disk evaluation cache (SQLite)
 * - A cloud evaluation client used to fill the cache
 * - An opening explorer client used to generate lines
 */

export const VERSION = '0.1.0';

// Re-export clients
export {
  BaseDatabaseClient,
  EcoClient,
  EvalCacheClient,
  CloudEvalClient,
  ExplorerClient,
  DEFAULT_ECO_CONFIG,
  DEFAULT_EVAL_CACHE_CONFIG,
  DEFAULT_CLOUD_EVAL_CONFIG,
  DEFAULT_EXPLORER_CONFIG,
  type DatabaseClientConfig,
  type CloudEvalConfig,
  type CloudEvalDeps,
  type ExplorerConfig,
  type ExplorerDeps,
  type RetryPolicy,
} from './clients/index.js';

// Re-export loaders
export {
  loadEcoDatabase,
  defaultEcoSourceFiles,
  getDataDir,
  type EcoLoadOptions,
} from './loaders/index.js';

// Re-export types
export type {
  OpeningEntry,
  OpeningInfo,
  PositionEval,
  EvalSource,
  CachedEval,
  ExplorerMove,
  ExplorerPosition,
} from './types/index.js';

// Re-export errors
export {
  DatabaseError,
  DatabaseNotFoundError,
  QueryError,
  ConnectionError,
  CloudEvalError,
  ExplorerError,
} from './errors.js';
