/**
 * eco-load command implementation
 */

import * as path from 'node:path';

import { defaultEcoSourceFiles, getDataDir, loadEcoDatabase } from '@repweave/database';

import { stringListOption } from '../cli.js';
import { InputError, handleError, resolveAbsolutePath } from '../errors/index.js';
import { ProgressReporter } from '../progress/reporter.js';

export interface EcoLoadPlan {
  sourceFiles: string[];
  dbPath: string;
}

/**
 * Resolve the files an eco-load run reads and writes
 * @throws InputError if there are no source files
 */
export function planEcoLoad(rawOptions: Record<string, unknown>): EcoLoadPlan {
  const sources = stringListOption(rawOptions, 'source');
  const sourceFiles = sources ? sources.map(resolveAbsolutePath) : defaultEcoSourceFiles();
  if (sourceFiles.length === 0) {
    throw new InputError('No ECO source files found', 'Pass --source <file.tsv...>');
  }

  const db = rawOptions['db'];
  const dbPath =
    typeof db === 'string' ? resolveAbsolutePath(db) : path.join(getDataDir(), 'eco.db');

  return { sourceFiles, dbPath };
}

export async function ecoLoadCommand(rawOptions: Record<string, unknown>): Promise<void> {
  const reporter = new ProgressReporter({ color: rawOptions['color'] !== false });

  try {
    const plan = planEcoLoad(rawOptions);

    reporter.startPhase('eco_load');
    const count = loadEcoDatabase({
      ...plan,
      onWarning: (message) => reporter.warn(message),
    });
    reporter.completePhase('eco_load', `${count} openings from ${plan.sourceFiles.length} files`);
    reporter.printOutputLocation(plan.dbPath);
  } catch (error) {
    reporter.stop();
    handleError(error);
  }
}
