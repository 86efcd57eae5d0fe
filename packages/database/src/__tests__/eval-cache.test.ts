import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import { EvalCacheClient } from '../clients/eval-cache.js';
import { DatabaseNotFoundError } from '../errors.js';

const AFTER_E4 = 'rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq - 0 1';
const AFTER_E4_NORMALIZED = AFTER_E4;
const AFTER_E4_OTHER_COUNTERS = 'rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq - 4 9';
const FIXED_NOW = new Date('2024-03-01T12:00:00.000Z');

describe('EvalCacheClient', () => {
  let tmpDir: string;
  let cache: EvalCacheClient;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'repweave-evals-'));
    cache = new EvalCacheClient({ dbPath: path.join(tmpDir, 'nested', 'evals.db') }, () => FIXED_NOW);
  });

  afterEach(() => {
    cache.close();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('creates the database file on first use', () => {
    expect(cache.get(AFTER_E4)).toBeUndefined();
    expect(fs.existsSync(path.join(tmpDir, 'nested', 'evals.db'))).toBe(true);
  });

  it('stores and reads back an evaluation', () => {
    cache.put(AFTER_E4, { cp: 25, bestMove: 'c5', depth: 30 }, 'cloud');

    expect(cache.get(AFTER_E4)).toEqual({
      fen: AFTER_E4_NORMALIZED,
      cp: 25,
      bestMove: 'c5',
      depth: 30,
      source: 'cloud',
      updatedAt: '2024-03-01T12:00:00.000Z',
    });
  });

  it('keys entries by normalized FEN', () => {
    cache.put(AFTER_E4, { cp: 25 }, 'manual');

    expect(cache.has(AFTER_E4_OTHER_COUNTERS)).toBe(true);
    expect(cache.evaluate(AFTER_E4_OTHER_COUNTERS)).toEqual({ cp: 25 });
  });

  it('replaces an existing evaluation', () => {
    cache.put(AFTER_E4, { cp: 25 }, 'cloud');
    cache.put(AFTER_E4, { mate: 3 }, 'manual');

    expect(cache.evaluate(AFTER_E4)).toEqual({ mate: 3 });
    expect(cache.get(AFTER_E4)?.source).toBe('manual');
  });

  it('returns undefined on a cache miss', () => {
    expect(cache.evaluate(AFTER_E4)).toBeUndefined();
    expect(cache.has(AFTER_E4)).toBe(false);
  });

  it('throws DatabaseNotFoundError when opened read-only on a missing file', () => {
    const readonlyCache = new EvalCacheClient({
      dbPath: path.join(tmpDir, 'absent.db'),
      readonly: true,
    });
    expect(() => readonlyCache.get(AFTER_E4)).toThrow(DatabaseNotFoundError);
    readonlyCache.close();
  });
});
