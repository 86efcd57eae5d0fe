/**
 * Output formatting utilities
 */

import chalk from 'chalk';

import type { RepweaveConfig } from '../config/schema.js';

/**
 * Format configuration for display
 */
export function formatConfigDisplay(config: RepweaveConfig): string {
  const lines: string[] = [];

  lines.push(chalk.bold('Configuration:'));
  lines.push('');

  lines.push(chalk.dim('Repertoire:'));
  lines.push(`  Color: ${config.repertoire.color ?? chalk.yellow('not set')}`);
  lines.push(`  Format: ${config.repertoire.format}`);
  lines.push(`  Max depth: ${config.repertoire.maxDepth} plies`);
  lines.push(`  Keep existing: ${config.repertoire.keepExisting ? 'yes' : 'no'}`);
  lines.push('');

  lines.push(chalk.dim('Databases:'));
  lines.push(`  ECO: ${config.databases.ecoPath}`);
  lines.push(`  Eval cache: ${config.databases.evalCachePath ?? chalk.yellow('none')}`);
  lines.push('');

  lines.push(chalk.dim('Evaluations:'));
  lines.push(`  Cloud: ${config.evals.cloud ? chalk.green('on') : 'off'}`);
  if (config.evals.cloud) {
    lines.push(`  Service: ${config.evals.baseUrl}`);
    lines.push(`  Retries: ${config.evals.maxRetries} (${formatDuration(config.evals.retryDelayMs)} apart)`);
  }
  lines.push('');

  lines.push(chalk.dim('Generation:'));
  lines.push(`  Enabled: ${config.generate.enabled ? chalk.green('yes') : 'no'}`);
  if (config.generate.enabled) {
    lines.push(`  Start: ${config.generate.start || 'initial position'}`);
    lines.push(`  Threshold: ${(config.generate.threshold * 100).toFixed(1)}% of games`);
    lines.push(`  Min games: ${config.generate.minGames}`);
    lines.push(`  Missing moves: ${config.generate.pick === 'popular' ? 'most popular' : 'reported as gaps'}`);
    lines.push(`  Explorer: ${config.generate.baseUrl}`);
  }
  lines.push('');

  lines.push(chalk.dim('Output:'));
  lines.push(`  Annotator: ${config.output.annotator}`);
  lines.push(`  Line length: ${config.output.maxLineLength || 'unlimited'}`);

  return lines.join('\n');
}

/**
 * Format a time duration in human-readable format
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.round((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}

/**
 * Format a file size in human-readable format
 */
export function formatFileSize(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(1)} KB`;
  }
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

/**
 * Format a progress bar
 * @param width Width of the bar in characters
 * @returns Formatted progress bar like "[========          ]"
 */
export function formatProgressBar(current: number, total: number, width: number = 20): string {
  if (total <= 0) {
    return `[${'?'.repeat(width)}]`;
  }

  const ratio = Math.min(current / total, 1);
  const filled = Math.round(ratio * width);
  const empty = width - filled;

  return `[${'='.repeat(filled)}${' '.repeat(empty)}]`;
}

/**
 * Format a percentage like "42%"
 */
export function formatPercentage(current: number, total: number): string {
  if (total <= 0) {
    return '0%';
  }

  const percentage = Math.round((current / total) * 100);
  return `${percentage}%`;
}
