/**
 * Configuration schema types for the repweave CLI
 */

import type { MovePick, OutputMode } from '@repweave/core';

/**
 * Repertoire side as written in configuration
 */
export type ColorName = 'white' | 'black';

/**
 * Repertoire configuration
 */
export interface RepertoireConfigSchema {
  /** Side whose moves make up the repertoire; required by `build` */
  color?: ColorName;
  /** Record grouping */
  format: OutputMode;
  /** Maximum plies kept from each new line */
  maxDepth: number;
  /** Include lines of the existing repertoire in the output */
  keepExisting: boolean;
}

/**
 * Database configuration
 */
export interface DatabasesConfigSchema {
  /** Opening book path (relative to data/ or absolute) */
  ecoPath: string;
  /** Evaluation cache path; no evaluations are attached without one */
  evalCachePath?: string;
}

/**
 * Evaluation configuration
 */
export interface EvalsConfigSchema {
  /** Fetch missing evaluations from the cloud service before emitting */
  cloud: boolean;
  baseUrl: string;
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
}

/**
 * Line generation from opening-explorer statistics
 */
export interface GenerateConfigSchema {
  /** Add generated lines to the repertoire */
  enabled: boolean;
  /** Moves played before generation starts, e.g. "1. e4 e5" */
  start: string;
  /** Smallest share of the start position's games worth following */
  threshold: number;
  /** Opponent positions with fewer games are not expanded */
  minGames: number;
  /** Move played where the repertoire has none */
  pick: MovePick;
  /** Explorer service root */
  baseUrl: string;
  ratings: number[];
  speeds: string[];
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
  /** Explorer API token */
  token?: string;
}

/**
 * Output configuration
 */
export interface OutputConfigSchema {
  /** Annotator header value */
  annotator: string;
  /** Wrap move text at this width; 0 keeps each record on one line */
  maxLineLength: number;
}

/**
 * Complete repweave configuration
 */
export interface RepweaveConfig {
  repertoire: RepertoireConfigSchema;
  databases: DatabasesConfigSchema;
  evals: EvalsConfigSchema;
  generate: GenerateConfigSchema;
  output: OutputConfigSchema;
}

/**
 * Configuration as written in a file or derived from the environment
 */
export interface PartialRepweaveConfig {
  repertoire?: Partial<RepertoireConfigSchema>;
  databases?: Partial<DatabasesConfigSchema>;
  evals?: Partial<EvalsConfigSchema>;
  generate?: Partial<GenerateConfigSchema>;
  output?: Partial<OutputConfigSchema>;
}

/**
 * Options of the build command after parsing
 */
export interface CliOptions {
  color?: ColorName;
  format?: OutputMode;
  input?: string;
  lines?: string[];
  output?: string;
  maxDepth?: number;
  keepExisting?: boolean;
  ecoDb?: string;
  evalCache?: string;
  cloudEvals?: boolean;
  generate?: boolean;
  start?: string;
  threshold?: number;
  minGames?: number;
  pick?: MovePick;
  config?: string;
  showConfig?: boolean;
  noColor?: boolean;
}
