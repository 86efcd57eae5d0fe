/**
 * Configuration loading from files, environment variables, and CLI arguments
 */

import { cosmiconfig } from 'cosmiconfig';

import { DEFAULT_CONFIG } from './defaults.js';
import type { CliOptions, ColorName, PartialRepweaveConfig, RepweaveConfig } from './schema.js';
import { validateConfig, validatePartialConfig } from './validation.js';

/**
 * Environment variable mapping
 * Maps env var names to config paths
 */
const ENV_VAR_MAP: Record<string, string> = {
  // Repertoire
  REPWEAVE_COLOR: 'repertoire.color',
  REPWEAVE_FORMAT: 'repertoire.format',
  REPWEAVE_MAX_DEPTH: 'repertoire.maxDepth',
  REPWEAVE_KEEP_EXISTING: 'repertoire.keepExisting',

  // Databases
  REPWEAVE_ECO_DB: 'databases.ecoPath',
  REPWEAVE_EVAL_CACHE: 'databases.evalCachePath',

  // Evaluations
  REPWEAVE_CLOUD_EVALS: 'evals.cloud',
  REPWEAVE_CLOUD_EVAL_URL: 'evals.baseUrl',

  // Generation
  REPWEAVE_GENERATE: 'generate.enabled',
  REPWEAVE_START: 'generate.start',
  REPWEAVE_THRESHOLD: 'generate.threshold',
  REPWEAVE_MIN_GAMES: 'generate.minGames',
  REPWEAVE_PICK: 'generate.pick',
  REPWEAVE_EXPLORER_URL: 'generate.baseUrl',
  REPWEAVE_EXPLORER_TOKEN: 'generate.token',

  // Output
  REPWEAVE_ANNOTATOR: 'output.annotator',
  REPWEAVE_LINE_LENGTH: 'output.maxLineLength',
};

const BOOLEAN_PATHS = new Set(['repertoire.keepExisting', 'evals.cloud', 'generate.enabled']);
const NUMERIC_PATHS = new Set(['repertoire.maxDepth', 'generate.minGames', 'output.maxLineLength']);
const FRACTION_PATHS = new Set(['generate.threshold']);

/**
 * Accepts white|w|black|b in any case
 */
export function parseColorName(value: string): ColorName | undefined {
  switch (value.toLowerCase()) {
    case 'white':
    case 'w':
      return 'white';
    case 'black':
    case 'b':
      return 'black';
    default:
      return undefined;
  }
}

/**
 * Deep merge two configurations
 * Source values override target values
 */
function deepMerge(target: RepweaveConfig, source: PartialRepweaveConfig): RepweaveConfig {
  return {
    repertoire: { ...target.repertoire, ...source.repertoire },
    databases: { ...target.databases, ...source.databases },
    evals: { ...target.evals, ...source.evals },
    generate: { ...target.generate, ...source.generate },
    output: { ...target.output, ...source.output },
  };
}

/**
 * Set a nested property on an object using dot notation path
 */
function setNestedProperty(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  const leaf = parts.pop();
  if (leaf === undefined) {
    return;
  }

  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (typeof next === 'object' && next !== null) {
      current = next as Record<string, unknown>;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }

  current[leaf] = value;
}

/**
 * Parse environment variable value based on expected type
 */
function parseEnvValue(value: string, path: string): unknown {
  if (BOOLEAN_PATHS.has(path)) {
    return value.toLowerCase() === 'true' || value === '1';
  }

  if (NUMERIC_PATHS.has(path)) {
    const num = parseInt(value, 10);
    return isNaN(num) ? value : num;
  }

  if (FRACTION_PATHS.has(path)) {
    const num = parseFloat(value);
    return isNaN(num) ? value : num;
  }

  if (path === 'repertoire.color') {
    return parseColorName(value) ?? value;
  }

  if (path === 'repertoire.format' || path === 'generate.pick') {
    return value.toLowerCase();
  }

  return value;
}

/**
 * Load configuration from environment variables
 * @throws ConfigValidationError if a variable holds an invalid value
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialRepweaveConfig {
  const config: Record<string, unknown> = {};

  for (const [envVar, configPath] of Object.entries(ENV_VAR_MAP)) {
    const value = env[envVar];
    if (value !== undefined && value !== '') {
      setNestedProperty(config, configPath, parseEnvValue(value, configPath));
    }
  }

  return validatePartialConfig(config);
}

/**
 * Load configuration from config file using cosmiconfig
 *
 * An explicit path that fails to load is an error; a failed search is not.
 */
async function loadConfigFile(configPath?: string): Promise<PartialRepweaveConfig | null> {
  const explorer = cosmiconfig('repweave', {
    searchPlaces: [
      'package.json',
      '.repweaverc',
      '.repweaverc.json',
      '.repweaverc.yaml',
      '.repweaverc.yml',
      'repweave.config.js',
      'repweave.config.cjs',
    ],
  });

  if (configPath) {
    const result = await explorer.load(configPath);
    return result ? validatePartialConfig(result.config) : null;
  }

  let result: Awaited<ReturnType<typeof explorer.search>>;
  try {
    result = await explorer.search();
  } catch {
    return null;
  }
  return result ? validatePartialConfig(result.config) : null;
}

/**
 * Map CLI options to config object
 */
export function mapCliToConfig(options: CliOptions): PartialRepweaveConfig {
  const repertoire: PartialRepweaveConfig['repertoire'] = {};
  const databases: PartialRepweaveConfig['databases'] = {};
  const evals: PartialRepweaveConfig['evals'] = {};
  const generate: PartialRepweaveConfig['generate'] = {};

  if (options.color !== undefined) repertoire.color = options.color;
  if (options.format !== undefined) repertoire.format = options.format;
  if (options.maxDepth !== undefined) repertoire.maxDepth = options.maxDepth;
  if (options.keepExisting !== undefined) repertoire.keepExisting = options.keepExisting;
  if (options.ecoDb !== undefined) databases.ecoPath = options.ecoDb;
  if (options.evalCache !== undefined) databases.evalCachePath = options.evalCache;
  if (options.cloudEvals !== undefined) evals.cloud = options.cloudEvals;
  if (options.generate !== undefined) generate.enabled = options.generate;
  if (options.start !== undefined) generate.start = options.start;
  if (options.threshold !== undefined) generate.threshold = options.threshold;
  if (options.minGames !== undefined) generate.minGames = options.minGames;
  if (options.pick !== undefined) generate.pick = options.pick;

  return { repertoire, databases, evals, generate };
}

/**
 * Load and merge configuration from all sources
 *
 * Precedence (highest to lowest):
 * 1. CLI arguments
 * 2. Environment variables
 * 3. Config file
 * 4. Default values
 */
export async function loadConfig(
  cliOptions: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
): Promise<RepweaveConfig> {
  let config = deepMerge(DEFAULT_CONFIG, {});

  const fileConfig = await loadConfigFile(cliOptions.config);
  if (fileConfig) {
    config = deepMerge(config, fileConfig);
  }

  config = deepMerge(config, loadEnvConfig(env));
  config = deepMerge(config, mapCliToConfig(cliOptions));

  return validateConfig(config);
}

/**
 * Format configuration for display
 */
export function formatConfig(config: RepweaveConfig): string {
  return JSON.stringify(config, null, 2);
}
