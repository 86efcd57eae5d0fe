/**
 * CLI options parsing tests
 */

import * as path from 'node:path';

import { describe, it, expect } from 'vitest';

import { createProgram, parseCliOptions, parseMovePick, parseOutputMode } from '../cli.js';
import { ConfigError } from '../errors/index.js';

describe('createProgram', () => {
  it('should register the build and eco-load commands', () => {
    const program = createProgram();
    expect(program.name()).toBe('repweave');
    expect(program.commands.map((command) => command.name())).toEqual(['build', 'eco-load']);
  });
});

describe('parseCliOptions', () => {
  describe('basic options', () => {
    it('should parse file options', () => {
      const result = parseCliOptions({
        input: 'rep.pgn',
        output: 'out.pgn',
        lines: ['a.pgn', 'b.pgn'],
        config: './my-config.json',
      });
      expect(result).toEqual({
        input: 'rep.pgn',
        output: 'out.pgn',
        lines: ['a.pgn', 'b.pgn'],
        config: './my-config.json',
      });
    });

    it('should resolve database paths against the working directory', () => {
      const result = parseCliOptions({ ecoDb: 'db/eco.db', evalCache: '/tmp/evals.db' });
      expect(result.ecoDb).toBe(path.resolve(process.cwd(), 'db/eco.db'));
      expect(result.evalCache).toBe('/tmp/evals.db');
    });
  });

  describe('color', () => {
    it('should accept full names and initials in any case', () => {
      expect(parseCliOptions({ color: 'White' }).color).toBe('white');
      expect(parseCliOptions({ color: 'w' }).color).toBe('white');
      expect(parseCliOptions({ color: 'BLACK' }).color).toBe('black');
      expect(parseCliOptions({ color: 'b' }).color).toBe('black');
    });

    it('should reject other values', () => {
      expect(() => parseCliOptions({ color: 'purple' })).toThrow(ConfigError);
    });

    it('should read --no-color as a display flag', () => {
      const result = parseCliOptions({ color: false });
      expect(result.noColor).toBe(true);
      expect(result.color).toBeUndefined();
    });
  });

  describe('format and depth', () => {
    it('should parse the format in any case', () => {
      expect(parseCliOptions({ format: 'Flattened' }).format).toBe('flattened');
      expect(parseOutputMode('CONSOLIDATED')).toBe('consolidated');
      expect(parseOutputMode('tree')).toBeUndefined();
    });

    it('should reject an unknown format', () => {
      expect(() => parseCliOptions({ format: 'tree' })).toThrow('Invalid format "tree"');
    });

    it('should parse max depth', () => {
      expect(parseCliOptions({ maxDepth: 12 }).maxDepth).toBe(12);
      expect(() => parseCliOptions({ maxDepth: NaN })).toThrow(ConfigError);
      expect(() => parseCliOptions({ maxDepth: 0 })).toThrow(ConfigError);
    });
  });

  describe('generation', () => {
    it('should parse generation options', () => {
      expect(
        parseCliOptions({ generate: true, start: '1. e4 e5', threshold: 0.05, minGames: 100, pick: 'Popular' }),
      ).toEqual({ generate: true, start: '1. e4 e5', threshold: 0.05, minGames: 100, pick: 'popular' });
    });

    it('should reject a threshold outside 0..1', () => {
      expect(() => parseCliOptions({ threshold: 1.5 })).toThrow('Invalid --threshold "1.5"');
      expect(() => parseCliOptions({ threshold: NaN })).toThrow(ConfigError);
    });

    it('should reject a negative game count', () => {
      expect(() => parseCliOptions({ minGames: -1 })).toThrow('Invalid --min-games "-1"');
    });

    it('should reject an unknown pick mode', () => {
      expect(parseMovePick('GAP')).toBe('gap');
      expect(() => parseCliOptions({ pick: 'random' })).toThrow('Invalid pick mode "random"');
    });
  });

  describe('flags', () => {
    it('should parse boolean flags', () => {
      const result = parseCliOptions({ keepExisting: false, cloudEvals: true, showConfig: true });
      expect(result.keepExisting).toBe(false);
      expect(result.cloudEvals).toBe(true);
      expect(result.showConfig).toBe(true);
    });

    it('should leave unset flags undefined', () => {
      expect(parseCliOptions({})).toEqual({});
    });
  });
});
