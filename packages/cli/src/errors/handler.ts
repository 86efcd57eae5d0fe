/**
 * Error handling utilities
 */

import { DatabaseNotFoundError, ExplorerError } from '@repweave/database';
import chalk from 'chalk';

import { ConfigValidationError } from '../config/validation.js';

import { CliError, EXIT_CODES } from './cli-errors.js';

/**
 * Format and display an error for CLI output
 */
export function formatError(error: unknown): string {
  if (error instanceof ConfigValidationError) {
    return chalk.red(error.format());
  }

  if (error instanceof CliError) {
    return chalk.red(error.format());
  }

  if (error instanceof DatabaseNotFoundError) {
    return chalk.red(
      `Error: ${error.message}\n\nSuggestion: Run 'repweave eco-load' to build the opening database`,
    );
  }

  if (error instanceof ExplorerError && (error.status === 401 || error.status === 429)) {
    return chalk.red(
      `Error: ${error.message}\n\nSuggestion: Set REPWEAVE_EXPLORER_TOKEN or generate.token, or raise --threshold to make fewer requests`,
    );
  }

  if (error instanceof Error) {
    return chalk.red(`Error: ${error.message}`);
  }

  return chalk.red(`Error: ${String(error)}`);
}

/**
 * Handle an error and exit with appropriate code
 */
export function handleError(error: unknown): never {
  console.error(formatError(error));

  if (error instanceof CliError) {
    process.exit(error.exitCode);
  }
  process.exit(error instanceof ConfigValidationError ? EXIT_CODES.usage : EXIT_CODES.failure);
}
