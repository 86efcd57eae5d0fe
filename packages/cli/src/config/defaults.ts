/**
 * Default configuration values
 */

import { DEFAULT_CLOUD_EVAL_CONFIG, DEFAULT_EXPLORER_CONFIG } from '@repweave/database';
import { DEFAULT_ANNOTATOR, DEFAULT_MIN_GAMES, DEFAULT_THRESHOLD } from '@repweave/core';

import type {
  DatabasesConfigSchema,
  EvalsConfigSchema,
  GenerateConfigSchema,
  OutputConfigSchema,
  RepertoireConfigSchema,
  RepweaveConfig,
} from './schema.js';

export const DEFAULT_REPERTOIRE_CONFIG: RepertoireConfigSchema = {
  format: 'consolidated',
  maxDepth: 28,
  keepExisting: true,
};

export const DEFAULT_DATABASES_CONFIG: DatabasesConfigSchema = {
  ecoPath: 'eco.db',
};

export const DEFAULT_EVALS_CONFIG: EvalsConfigSchema = {
  cloud: false,
  ...DEFAULT_CLOUD_EVAL_CONFIG,
};

export const DEFAULT_GENERATE_CONFIG: GenerateConfigSchema = {
  enabled: false,
  start: '',
  threshold: DEFAULT_THRESHOLD,
  minGames: DEFAULT_MIN_GAMES,
  pick: 'gap',
  ...DEFAULT_EXPLORER_CONFIG,
};

export const DEFAULT_OUTPUT_CONFIG: OutputConfigSchema = {
  annotator: DEFAULT_ANNOTATOR,
  maxLineLength: 0,
};

export const DEFAULT_CONFIG: RepweaveConfig = {
  repertoire: DEFAULT_REPERTOIRE_CONFIG,
  databases: DEFAULT_DATABASES_CONFIG,
  evals: DEFAULT_EVALS_CONFIG,
  generate: DEFAULT_GENERATE_CONFIG,
  output: DEFAULT_OUTPUT_CONFIG,
};
