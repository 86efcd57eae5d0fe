/**
 * Zod validation schemas for configuration
 */

import { z } from 'zod';

import type { PartialRepweaveConfig, RepweaveConfig } from './schema.js';

/**
 * Repertoire color schema
 */
export const colorNameSchema = z.enum(['white', 'black']);

/**
 * Output format schema
 */
export const outputModeSchema = z.enum(['flattened', 'consolidated']);

const timeoutSchema = z.number().int().min(1000).max(300000);

export const repertoireConfigSchema = z.object({
  color: colorNameSchema.optional(),
  format: outputModeSchema,
  maxDepth: z.number().int().min(1).max(500),
  keepExisting: z.boolean(),
});

export const databasesConfigSchema = z.object({
  ecoPath: z.string().min(1),
  evalCachePath: z.string().min(1).optional(),
});

export const evalsConfigSchema = z.object({
  cloud: z.boolean(),
  baseUrl: z.string().url(),
  timeoutMs: timeoutSchema,
  maxRetries: z.number().int().min(0).max(10),
  retryDelayMs: z.number().int().min(0),
});

export const movePickSchema = z.enum(['gap', 'popular']);

export const generateConfigSchema = z.object({
  enabled: z.boolean(),
  start: z.string(),
  threshold: z.number().min(0).max(1),
  minGames: z.number().int().min(0),
  pick: movePickSchema,
  baseUrl: z.string().url(),
  ratings: z.array(z.number().int().min(0)).min(1),
  speeds: z.array(z.string().min(1)).min(1),
  timeoutMs: timeoutSchema,
  maxRetries: z.number().int().min(0).max(10),
  retryDelayMs: z.number().int().min(0),
  token: z.string().min(1).optional(),
});

export const outputConfigSchema = z.object({
  annotator: z.string(),
  maxLineLength: z.number().int().min(0),
});

/**
 * Complete configuration schema
 */
export const configSchema = z.object({
  repertoire: repertoireConfigSchema,
  databases: databasesConfigSchema,
  evals: evalsConfigSchema,
  generate: generateConfigSchema,
  output: outputConfigSchema,
});

/**
 * Partial configuration schema (for config files)
 */
export const partialConfigSchema = z.object({
  repertoire: repertoireConfigSchema.partial().optional(),
  databases: databasesConfigSchema.partial().optional(),
  evals: evalsConfigSchema.partial().optional(),
  generate: generateConfigSchema.partial().optional(),
  output: outputConfigSchema.partial().optional(),
});

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(public readonly errors: Array<{ path: string; message: string }>) {
    const errorMessages = errors.map((e) => `  ${e.path}: ${e.message}`).join('\n');
    super(`Configuration validation failed:\n${errorMessages}`);
    this.name = 'ConfigValidationError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    return [
      'Configuration validation failed:',
      '',
      ...this.errors.map((e) => `  ${e.path}: ${e.message}`),
      '',
      'Use --help to see available options',
      'Use --show-config to see current configuration',
    ].join('\n');
  }
}

function toValidationError(error: z.ZodError): ConfigValidationError {
  return new ConfigValidationError(
    error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  );
}

/**
 * Validate a complete configuration
 * @throws ConfigValidationError if validation fails
 */
export function validateConfig(config: unknown): RepweaveConfig {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

/**
 * Validate a partial configuration (from config file)
 * @throws ConfigValidationError if validation fails
 */
export function validatePartialConfig(config: unknown): PartialRepweaveConfig {
  const result = partialConfigSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}
