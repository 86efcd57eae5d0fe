/**
 * Errors the CLI reports to the user and exits on
 */

import * as path from 'node:path';

import type { SourceLocation } from '@repweave/pgn';

export const EXIT_CODES = {
  /** The build or a command failed */
  failure: 1,
  /** Bad flags, environment or config file */
  usage: 2,
} as const;

/**
 * A path as given on the command line, made absolute against the cwd
 */
export function resolveAbsolutePath(filePath: string): string {
  return path.resolve(process.cwd(), filePath);
}

export class CliError extends Error {
  constructor(
    message: string,
    public readonly suggestion?: string,
    public readonly exitCode: number = EXIT_CODES.failure,
  ) {
    super(message);
    this.name = 'CliError';
  }

  /** Prefix of the first output line */
  protected get label(): string {
    return 'Error';
  }

  format(): string {
    const text = `${this.label}: ${this.message}`;
    return this.suggestion ? `${text}\n\nSuggestion: ${this.suggestion}` : text;
  }
}

export class ConfigError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, suggestion, EXIT_CODES.usage);
    this.name = 'ConfigError';
  }
}

/** An input file that is missing or unreadable */
export class InputError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, suggestion);
    this.name = 'InputError';
  }
}

export class OutputError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, suggestion);
    this.name = 'OutputError';
  }
}

/**
 * A repertoire file that does not parse or holds an illegal move
 */
export class PgnError extends InputError {
  constructor(
    public readonly file: string,
    detail: string,
    public readonly location?: SourceLocation,
  ) {
    super(`${file}: ${detail}`);
    this.name = 'PgnError';
  }

  protected override get label(): string {
    return this.location
      ? `PGN error (line ${this.location.line}, column ${this.location.column})`
      : 'PGN error';
  }
}
