/**
 * @repweave/core - Opening DAG engine
 *
 * This package merges repertoire lines into a graph of unique positions and
 * prints it back as PGN:
 * - Position dedup with transposition tracking
 * - Opening-name and ECO propagation
 * - Flattened and consolidated record output with nested variations
 * - Repertoire move index with conflict detection
 * - Line generation from opening-explorer statistics
 */

export const VERSION = '0.1.0';

export * from './repertoire/index.js';
