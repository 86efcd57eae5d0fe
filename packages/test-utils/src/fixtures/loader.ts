/**
 * Fixture loading utilities for tests
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * Get the absolute path to a fixture file under src/fixtures/games
 */
export function getFixturePath(relativePath: string): string {
  return path.join(__dirname, 'games', relativePath);
}

/**
 * Load a PGN fixture file synchronously
 */
export function loadPgnSync(relativePath: string): string {
  return fs.readFileSync(getFixturePath(relativePath), 'utf-8');
}
