/**
 * Build command implementation
 */

import * as fs from 'node:fs';

import { parseCliOptions, VERSION } from '../cli.js';
import { formatConfig, loadConfig } from '../config/loader.js';
import type { CliOptions } from '../config/schema.js';
import {
  ConfigError,
  InputError,
  OutputError,
  handleError,
  resolveAbsolutePath,
} from '../errors/index.js';
import { orchestrateBuild, type BuildInput, type PgnSource } from '../orchestrator/orchestrator.js';
import { closeServices, initializeServices } from '../orchestrator/services.js';
import { formatConfigDisplay } from '../progress/formatters.js';
import { ProgressReporter } from '../progress/reporter.js';

/**
 * Read a PGN file
 * @throws InputError if the file is missing
 */
export function readPgnFile(filePath: string): PgnSource {
  const absolutePath = resolveAbsolutePath(filePath);
  if (!fs.existsSync(absolutePath)) {
    throw new InputError(`Input file not found: ${absolutePath}`, 'Check the file path and try again');
  }
  return { path: filePath, text: fs.readFileSync(absolutePath, 'utf-8') };
}

/**
 * Collect the PGN inputs named on the command line
 * @param generating - Lines will be generated, so no file is required
 * @throws InputError if there is nothing to read
 */
export function readBuildInput(options: CliOptions, generating = false): BuildInput {
  const lines = options.lines ?? [];
  if (!options.input && lines.length === 0 && !generating) {
    throw new InputError(
      'No input given',
      'Pass --input <repertoire.pgn> and/or --lines <file...>, or --generate',
    );
  }

  const input: BuildInput = { newLines: lines.map(readPgnFile) };
  if (options.input) {
    input.existing = readPgnFile(options.input);
  }
  return input;
}

/**
 * Write output to file
 */
function writeOutput(output: string, outputPath: string): void {
  try {
    fs.writeFileSync(outputPath, output, 'utf-8');
  } catch (error) {
    throw new OutputError(
      `Failed to write output file: ${outputPath}`,
      error instanceof Error ? error.message : 'unknown error',
    );
  }
}

/**
 * Main build command handler
 */
export async function buildCommand(rawOptions: Record<string, unknown>): Promise<void> {
  const reporter = new ProgressReporter({ color: rawOptions['color'] !== false });

  try {
    const options = parseCliOptions(rawOptions);
    const config = await loadConfig(options);

    if (options.showConfig) {
      console.log(formatConfigDisplay(config));
      console.log('');
      console.log('Raw configuration:');
      console.log(formatConfig(config));
      return;
    }

    const colorName = config.repertoire.color;
    if (!colorName) {
      throw new ConfigError('No repertoire color given', 'Pass --color <white|black>');
    }
    if (!options.output) {
      throw new ConfigError('No output file given', 'Pass --output <file>');
    }
    const outputPath = resolveAbsolutePath(options.output);
    const input = readBuildInput(options, config.generate.enabled);

    reporter.printHeader(VERSION);

    reporter.startPhase('opening_book');
    const services = initializeServices(config);
    reporter.completePhase('opening_book', `${services.openingCount} openings`);

    try {
      const { output, stats } = await orchestrateBuild(input, config, services, reporter, {
        color: colorName === 'white' ? 'w' : 'b',
      });

      writeOutput(output, outputPath);

      reporter.printSummary({ ...stats, outputBytes: Buffer.byteLength(output, 'utf-8') });
      reporter.printOutputLocation(outputPath);
    } finally {
      closeServices(services);
    }
  } catch (error) {
    reporter.stop();
    handleError(error);
  }
}
