/**
 * Progress reporter with ora spinners
 */

import chalk from 'chalk';
import ora, { type Color, type Ora } from 'ora';

import { formatDuration, formatFileSize, formatPercentage, formatProgressBar } from './formatters.js';
import {
  PHASE_NAMES,
  type BuildPhase,
  type ColorFunctions,
  type ProgressReporterOptions,
} from './types.js';

export type { BuildPhase, ProgressReporterOptions } from './types.js';

/**
 * Counters printed after a build
 */
export interface BuildSummary {
  games: number;
  lines: number;
  nodes: number;
  records: number;
  conflicts: number;
  generated: number;
  gaps: number;
  outputBytes: number;
}

function createColorFns(useColor: boolean): ColorFunctions {
  if (useColor) {
    return {
      bold: (text: string) => chalk.bold(text),
      dim: (text: string) => chalk.dim(text),
      green: (text: string) => chalk.green(text),
      red: (text: string) => chalk.red(text),
      yellow: (text: string) => chalk.yellow(text),
      cyan: (text: string) => chalk.cyan(text),
    };
  }
  const identity = (text: string): string => text;
  return {
    bold: identity,
    dim: identity,
    green: identity,
    red: identity,
    yellow: identity,
    cyan: identity,
  };
}

/**
 * Progress reporter for CLI output
 */
export class ProgressReporter {
  private spinner: Ora | null = null;
  private startTime: number = 0;
  private phaseStartTime: number = 0;
  private readonly silent: boolean;
  private readonly useColor: boolean;
  private readonly c: ColorFunctions;

  constructor(options: ProgressReporterOptions = {}) {
    this.silent = options.silent ?? false;
    this.useColor = options.color ?? true;
    this.c = createColorFns(this.useColor);
  }

  /**
   * Print the version header and start the overall timer
   */
  printHeader(version: string): void {
    this.startTime = Date.now();
    if (this.silent) return;
    console.log(this.c.bold(`repweave v${version}`));
    console.log('');
  }

  /**
   * Start a new phase
   */
  startPhase(phase: BuildPhase): void {
    if (this.silent) return;

    this.phaseStartTime = Date.now();
    if (this.spinner) {
      this.spinner.stop();
    }

    const oraOptions: { text: string; prefixText: string; color?: Color } = {
      text: PHASE_NAMES[phase],
      prefixText: ' ',
    };
    if (this.useColor) {
      oraOptions.color = 'cyan';
    }

    this.spinner = ora(oraOptions).start();
  }

  /**
   * Update the running phase with a counter
   */
  updateProgress(phase: BuildPhase, current: number, total: number): void {
    if (this.silent || !this.spinner) return;
    const bar = formatProgressBar(current, total);
    this.spinner.text = `${PHASE_NAMES[phase]} ${this.c.dim(bar)} ${current}/${total} (${formatPercentage(current, total)})`;
  }

  /**
   * Complete a phase successfully
   */
  completePhase(phase: BuildPhase, detail?: string): void {
    if (this.silent) return;

    const duration = Date.now() - this.phaseStartTime;
    const durationStr = duration > 1000 ? this.c.dim(` (${formatDuration(duration)})`) : '';
    const detailStr = detail ? this.c.dim(`: ${detail}`) : '';
    const text = `${PHASE_NAMES[phase]}${detailStr}${durationStr}`;

    if (this.spinner) {
      this.spinner.succeed(text);
      this.spinner = null;
    } else {
      console.log(`  ${this.c.green('✓')} ${text}`);
    }
  }

  /**
   * Fail a phase
   */
  failPhase(phase: BuildPhase, error: string): void {
    if (this.silent) return;

    const text = `${PHASE_NAMES[phase]}: ${error}`;
    if (this.spinner) {
      this.spinner.fail(text);
      this.spinner = null;
    } else {
      console.log(`  ${this.c.red('✗')} ${text}`);
    }
  }

  /**
   * Print the final summary
   */
  printSummary(stats: BuildSummary): void {
    if (this.silent) return;

    const totalTime = Date.now() - this.startTime;

    console.log('');
    console.log(this.c.bold('Summary:'));
    console.log(`  Games read: ${stats.games}`);
    console.log(`  Lines added: ${stats.lines}`);
    console.log(`  Positions: ${stats.nodes}`);
    console.log(`  Records written: ${stats.records} (${formatFileSize(stats.outputBytes)})`);
    const conflicts = stats.conflicts > 0 ? this.c.yellow(String(stats.conflicts)) : '0';
    console.log(`  Move conflicts: ${conflicts}`);
    if (stats.generated > 0 || stats.gaps > 0) {
      const gaps = stats.gaps > 0 ? this.c.yellow(String(stats.gaps)) : '0';
      console.log(`  Lines generated: ${stats.generated} (${gaps} gaps)`);
    }
    console.log(`  Total time: ${formatDuration(totalTime)}`);
  }

  /**
   * Print output file location
   */
  printOutputLocation(outputPath: string): void {
    if (this.silent) return;
    console.log('');
    console.log(`Output written to: ${this.c.cyan(outputPath)}`);
  }

  /**
   * Print a plain message
   */
  printMessage(message: string): void {
    if (this.silent) return;
    console.log(message);
  }

  printSuccess(message: string): void {
    if (this.silent) return;
    console.log(this.c.green(`✓ ${message}`));
  }

  /**
   * Print a warning without breaking a running spinner
   */
  warn(message: string): void {
    if (this.silent) return;
    const text = this.c.yellow(`⚠ ${message}`);
    if (this.spinner) {
      this.spinner.clear();
      console.log(text);
      this.spinner.render();
    } else {
      console.log(text);
    }
  }

  /**
   * Stop any running spinner
   */
  stop(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }
}
