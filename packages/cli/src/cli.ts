/**
 * CLI definition using Commander.js
 */

import type { MovePick, OutputMode } from '@repweave/core';
import { Command } from 'commander';

import { parseColorName } from './config/loader.js';
import type { CliOptions } from './config/schema.js';
import { ConfigError, resolveAbsolutePath } from './errors/index.js';

export const VERSION = '0.1.0';

const FORMAT_HELP = `Record grouping:
    flattened    - One fully expanded record per line
    consolidated - One record per unbranched run, transpositions nested [default]`;

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command()
    .name('repweave')
    .description('Merge chess opening lines into a deduplicated PGN repertoire')
    .version(VERSION);

  program
    .command('build')
    .description('Build a repertoire PGN from an existing repertoire and new lines')
    .option('--color <side>', 'Repertoire side: white|w|black|b')
    .option('-o, --output <file>', 'Output PGN file')
    .option('-i, --input <file>', 'Existing repertoire PGN (variations are expanded)')
    .option('-l, --lines <files...>', 'PGN files with lines to add')
    .option('-f, --format <format>', FORMAT_HELP)
    .option('--max-depth <plies>', 'Keep at most this many plies of each new line', parseInt)
    .option('--keep-existing', 'Include the existing repertoire in the output')
    .option('--no-keep-existing', 'Only check the existing repertoire for conflicts')
    .option('--eco-db <path>', 'Opening database file')
    .option('--eval-cache <path>', 'Evaluation cache file; cached evals are written as comments')
    .option('--cloud-evals', 'Fetch missing evaluations from the cloud service first')
    .option('--generate', 'Add lines generated from opening-explorer statistics')
    .option('--start <moves>', 'Moves played before generation starts, e.g. "1. e4 e5"')
    .option('--threshold <share>', 'Follow replies reaching this share of games (default: 0.02)', parseFloat)
    .option('--min-games <n>', 'Expand opponent positions with at least this many games', parseInt)
    .option('--pick <mode>', 'Where the repertoire has no move: gap|popular')
    .option('-c, --config <file>', 'Path to config file')
    .option('--show-config', 'Print resolved configuration and exit')
    .option('--no-color', 'Disable colored output (useful for piping)')
    .action(async (options: Record<string, unknown>) => {
      const { buildCommand } = await import('./commands/build.js');
      await buildCommand(options);
    });

  program
    .command('eco-load')
    .description('Build the opening database from ECO TSV files')
    .option('-s, --source <files...>', 'TSV files (default: data/eco-source/*.tsv)')
    .option('--db <path>', 'Database file to write (default: data/eco.db)')
    .option('--no-color', 'Disable colored output (useful for piping)')
    .action(async (options: Record<string, unknown>) => {
      const { ecoLoadCommand } = await import('./commands/eco-load.js');
      await ecoLoadCommand(options);
    });

  return program;
}

function stringOption(options: Record<string, unknown>, key: string): string | undefined {
  const value = options[key];
  return typeof value === 'string' ? value : undefined;
}

function booleanOption(options: Record<string, unknown>, key: string): boolean | undefined {
  const value = options[key];
  return typeof value === 'boolean' ? value : undefined;
}

/**
 * Variadic option values
 */
export function stringListOption(
  options: Record<string, unknown>,
  key: string,
): string[] | undefined {
  const value = options[key];
  if (!Array.isArray(value)) {
    return undefined;
  }
  return value.filter((item): item is string => typeof item === 'string');
}

/**
 * Accepts flattened|consolidated in any case
 */
export function parseOutputMode(value: string): OutputMode | undefined {
  const lower = value.toLowerCase();
  return lower === 'flattened' || lower === 'consolidated' ? lower : undefined;
}

/**
 * Accepts gap|popular in any case
 */
export function parseMovePick(value: string): MovePick | undefined {
  const lower = value.toLowerCase();
  return lower === 'gap' || lower === 'popular' ? lower : undefined;
}

/**
 * Parse build options from the command options object
 * @throws ConfigError on an unknown color, format, pick mode or number
 */
export function parseCliOptions(options: Record<string, unknown>): CliOptions {
  const result: CliOptions = {};

  const color = stringOption(options, 'color');
  if (color !== undefined) {
    const parsed = parseColorName(color);
    if (!parsed) {
      throw new ConfigError(`Invalid color "${color}"`, 'Use --color white or --color black');
    }
    result.color = parsed;
  }

  const format = stringOption(options, 'format');
  if (format !== undefined) {
    const parsed = parseOutputMode(format);
    if (!parsed) {
      throw new ConfigError(
        `Invalid format "${format}"`,
        'Use --format flattened or --format consolidated',
      );
    }
    result.format = parsed;
  }

  const maxDepth = options['maxDepth'];
  if (maxDepth !== undefined) {
    if (typeof maxDepth !== 'number' || !Number.isInteger(maxDepth) || maxDepth < 1) {
      throw new ConfigError(`Invalid --max-depth "${String(maxDepth)}"`, 'Use a positive number of plies');
    }
    result.maxDepth = maxDepth;
  }

  const threshold = options['threshold'];
  if (threshold !== undefined) {
    if (typeof threshold !== 'number' || !(threshold >= 0 && threshold <= 1)) {
      throw new ConfigError(`Invalid --threshold "${String(threshold)}"`, 'Use a share between 0 and 1');
    }
    result.threshold = threshold;
  }

  const minGames = options['minGames'];
  if (minGames !== undefined) {
    if (typeof minGames !== 'number' || !Number.isInteger(minGames) || minGames < 0) {
      throw new ConfigError(`Invalid --min-games "${String(minGames)}"`, 'Use a whole number of games');
    }
    result.minGames = minGames;
  }

  const pick = stringOption(options, 'pick');
  if (pick !== undefined) {
    const parsed = parseMovePick(pick);
    if (!parsed) {
      throw new ConfigError(`Invalid pick mode "${pick}"`, 'Use --pick gap or --pick popular');
    }
    result.pick = parsed;
  }

  const start = stringOption(options, 'start');
  if (start !== undefined) result.start = start;
  const input = stringOption(options, 'input');
  if (input !== undefined) result.input = input;
  const output = stringOption(options, 'output');
  if (output !== undefined) result.output = output;
  const lines = stringListOption(options, 'lines');
  if (lines !== undefined) result.lines = lines;
  const config = stringOption(options, 'config');
  if (config !== undefined) result.config = config;

  // Database paths on the command line are relative to the working directory
  const ecoDb = stringOption(options, 'ecoDb');
  if (ecoDb !== undefined) result.ecoDb = resolveAbsolutePath(ecoDb);
  const evalCache = stringOption(options, 'evalCache');
  if (evalCache !== undefined) result.evalCache = resolveAbsolutePath(evalCache);

  const keepExisting = booleanOption(options, 'keepExisting');
  if (keepExisting !== undefined) result.keepExisting = keepExisting;
  const cloudEvals = booleanOption(options, 'cloudEvals');
  if (cloudEvals !== undefined) result.cloudEvals = cloudEvals;
  const generate = booleanOption(options, 'generate');
  if (generate !== undefined) result.generate = generate;
  const showConfig = booleanOption(options, 'showConfig');
  if (showConfig !== undefined) result.showConfig = showConfig;
  // Note: Commander.js uses 'color' (negated) when --no-color is used
  if (options['color'] === false) result.noColor = true;

  return result;
}
