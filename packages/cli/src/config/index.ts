/**
 * Configuration module exports
 */

// Schema types
export type {
  ColorName,
  RepertoireConfigSchema,
  DatabasesConfigSchema,
  EvalsConfigSchema,
  OutputConfigSchema,
  RepweaveConfig,
  PartialRepweaveConfig,
  CliOptions,
} from './schema.js';

// Defaults
export {
  DEFAULT_REPERTOIRE_CONFIG,
  DEFAULT_DATABASES_CONFIG,
  DEFAULT_EVALS_CONFIG,
  DEFAULT_OUTPUT_CONFIG,
  DEFAULT_CONFIG,
} from './defaults.js';

// Validation
export {
  configSchema,
  partialConfigSchema,
  colorNameSchema,
  outputModeSchema,
  ConfigValidationError,
  validateConfig,
  validatePartialConfig,
} from './validation.js';

// Loader
export { loadConfig, loadEnvConfig, mapCliToConfig, parseColorName, formatConfig } from './loader.js';
