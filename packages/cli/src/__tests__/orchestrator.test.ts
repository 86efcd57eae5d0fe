/**
 * Build orchestration tests
 */

import { describe, it, expect, vi } from 'vitest';

import type { EvalAnnotation } from '@repweave/core';
import { CloudEvalError } from '@repweave/database';
import { normalizeFen } from '@repweave/pgn';
import {
  createMockExplorer,
  createMockOpeningBook,
  fenAfter,
  loadPgnSync,
} from '@repweave/test-utils';

import { DEFAULT_CONFIG } from '../config/defaults.js';
import type { RepweaveConfig } from '../config/schema.js';
import { ConfigError, PgnError } from '../errors/index.js';
import {
  orchestrateBuild,
  type BuildInput,
  type BuildServices,
  type CloudEvaluator,
  type EvalStore,
} from '../orchestrator/orchestrator.js';
import { ProgressReporter } from '../progress/reporter.js';

const NOW = new Date('2024-03-01T12:00:00.000Z');

function createConfig(
  repertoire: Partial<RepweaveConfig['repertoire']> = {},
  evals: Partial<RepweaveConfig['evals']> = {},
  generate: Partial<RepweaveConfig['generate']> = {},
): RepweaveConfig {
  return {
    ...DEFAULT_CONFIG,
    repertoire: { ...DEFAULT_CONFIG.repertoire, ...repertoire },
    evals: { ...DEFAULT_CONFIG.evals, ...evals },
    generate: { ...DEFAULT_CONFIG.generate, ...generate },
  };
}

function createEvalStore(initial: Array<[string, EvalAnnotation]> = []): EvalStore & {
  entries: Map<string, EvalAnnotation>;
} {
  const entries = new Map(initial);
  return {
    entries,
    evaluate: (fen: string) => entries.get(fen),
    has: (fen: string) => entries.has(fen),
    put: (fen: string, evaluation: EvalAnnotation) => {
      entries.set(fen, evaluation);
    },
  };
}

function createServices(overrides: Partial<BuildServices> = {}): BuildServices {
  return {
    ecoClient: createMockOpeningBook(),
    evalCache: null,
    cloudEval: null,
    explorer: null,
    ...overrides,
  };
}

function build(input: BuildInput, config: RepweaveConfig, services = createServices()) {
  return orchestrateBuild(input, config, services, new ProgressReporter({ silent: true }), {
    color: 'w',
    clock: () => NOW,
  });
}

/** Move text of every record */
function bodies(output: string): string[] {
  return output
    .split('\n\n\n')
    .filter((record) => record.length > 0)
    .map((record) => record.split('\n\n')[1] ?? '');
}

const fixtures: BuildInput = {
  existing: { path: 'repertoire.pgn', text: loadPgnSync('repertoire.pgn') },
  newLines: [{ path: 'new-lines.pgn', text: loadPgnSync('new-lines.pgn') }],
};

describe('orchestrateBuild', () => {
  describe('merging', () => {
    it('merges the existing repertoire with new lines', async () => {
      const result = await build(fixtures, createConfig());

      expect(bodies(result.output)).toEqual([
        '1. e4 *',
        '1... e5 *',
        '2. Nf3 Nc6 3. Bb5 *',
        '2. Nc3 *',
        '1... c5 2. Nf3 *',
        '1... e6 2. d4 d5 3. e5 *',
        '1... c6 2. d4 d5 3. e5 Bf5 4. Nf3 *',
      ]);
      expect(result.stats).toEqual({
        games: 4,
        lines: 5,
        nodes: 19,
        records: 7,
        conflicts: 1,
        generated: 0,
        gaps: 0,
        cloudEvals: 0,
      });
    });

    it('reports conflicting repertoire moves', async () => {
      const result = await build(fixtures, createConfig());

      expect(result.warnings).toEqual([
        `Conflicting moves at ${normalizeFen(fenAfter('e4', 'e5'))}: ` +
          'Nf3 (repertoire.pgn#1) vs Nc3 (new-lines.pgn#2); keeping Nf3',
      ]);
    });

    it('writes flattened records', async () => {
      const result = await build(fixtures, createConfig({ format: 'flattened' }));

      expect(bodies(result.output)).toEqual([
        '1. e4 e5 2. Nf3 Nc6 3. Bb5 *',
        '1. e4 e5 2. Nc3 *',
        '1. e4 c5 2. Nf3 *',
        '1. e4 e6 2. d4 d5 3. e5 *',
        '1. e4 c6 2. d4 d5 3. e5 Bf5 4. Nf3 *',
      ]);
    });

    it('only checks the existing repertoire when it is not kept', async () => {
      const result = await build(fixtures, createConfig({ keepExisting: false }));

      expect(bodies(result.output)).toEqual([
        '1. e4 *',
        '1... c6 2. d4 d5 3. e5 Bf5 4. Nf3 *',
        '1... e5 2. Nc3 *',
      ]);
      expect(result.stats.lines).toBe(2);
      expect(result.stats.conflicts).toBe(1);
    });

    it('truncates new lines to the maximum depth', async () => {
      const result = await build(
        { newLines: [{ path: 'deep.pgn', text: '1. d4 d5 2. c4 e6 3. Nc3 *' }] },
        createConfig({ maxDepth: 2 }),
      );

      expect(bodies(result.output)).toEqual(['1. d4 d5 *']);
    });

    it('skips lines that start from another position', async () => {
      const text = [
        '[FEN "rnbqkbnr/pppp1ppp/8/4p3/4P3/8/PPPP1PPP/RNBQKBNR w KQkq - 0 2"]',
        '[SetUp "1"]',
        '',
        '2. Nf3 *',
      ].join('\n');

      const result = await build({ newLines: [{ path: 'setup.pgn', text }] }, createConfig());

      expect(result.output).toBe('');
      expect(result.stats.lines).toBe(0);
      expect(result.warnings).toEqual([
        'Skipping line from setup.pgn#1: it does not start from the repertoire root',
      ]);
    });

    it('produces no records without lines', async () => {
      const result = await build({ newLines: [] }, createConfig());

      expect(result.output).toBe('');
      expect(result.stats.records).toBe(0);
      expect(result.stats.nodes).toBe(1);
    });
  });

  describe('input errors', () => {
    it('reports illegal moves with the file name', async () => {
      const input = { newLines: [{ path: 'bad.pgn', text: '1. e4 e5 2. Ke3 *' }] };

      await expect(build(input, createConfig())).rejects.toThrow(PgnError);
      await expect(build(input, createConfig())).rejects.toThrow('bad.pgn: Illegal move "Ke3"');
    });
  });

  describe('line generation', () => {
    const existingOnly: BuildInput = {
      existing: { path: 'repertoire.pgn', text: loadPgnSync('repertoire.pgn') },
      newLines: [],
    };

    function explorerServices() {
      const explorer = createMockExplorer({
        [fenAfter('e4')]: { e5: 600, c5: 300, d5: 100 },
      });
      return { explorer, services: createServices({ explorer }) };
    }

    it('adds lines that follow the repertoire through popular replies', async () => {
      const { explorer, services } = explorerServices();

      const result = await build(
        existingOnly,
        createConfig({ keepExisting: false }, {}, { enabled: true }),
        services,
      );

      expect(bodies(result.output)).toEqual(['1. e4 *', '1... e5 2. Nf3 *', '1... c5 2. Nf3 *']);
      expect(result.stats).toMatchObject({ lines: 2, generated: 2, gaps: 1, nodes: 6, conflicts: 0 });
      expect(explorer.explore).toHaveBeenCalledTimes(3);
    });

    it('warns about replies the repertoire does not answer', async () => {
      const { services } = explorerServices();

      const result = await build(
        existingOnly,
        createConfig({ keepExisting: false }, {}, { enabled: true }),
        services,
      );

      expect(result.warnings).toEqual(['No repertoire move after 1. e4 d5 (10.0% of games)']);
    });

    it('starts from the configured moves', async () => {
      const { services } = explorerServices();

      const result = await build(
        existingOnly,
        createConfig({ keepExisting: false }, {}, { enabled: true, start: '1. e4 c5' }),
        services,
      );

      expect(bodies(result.output)).toEqual(['1. e4 c5 2. Nf3 *']);
      expect(result.warnings).toEqual([]);
    });

    it('rejects illegal start moves', async () => {
      const { services } = explorerServices();

      await expect(
        build(existingOnly, createConfig({}, {}, { enabled: true, start: '1. e4 e4' }), services),
      ).rejects.toThrow(ConfigError);
    });

    it('does not ask the explorer when generation is off', async () => {
      const { explorer, services } = explorerServices();

      const result = await build(existingOnly, createConfig(), services);

      expect(explorer.explore).not.toHaveBeenCalled();
      expect(result.stats.generated).toBe(0);
    });
  });

  describe('cloud evaluations', () => {
    const cloudConfig = createConfig({}, { cloud: true });
    const d4d5 = fenAfter('d4', 'd5');

    function cloudWith(fetchEval: CloudEvaluator['fetchEval']): CloudEvaluator {
      return { fetchEval: vi.fn(fetchEval) };
    }

    it('fetches missing evaluations and annotates records', async () => {
      const evalCache = createEvalStore();
      const cloudEval = cloudWith(async () => ({ cp: 20, depth: 30 }));

      const result = await build(
        { newLines: [{ path: 'd4.pgn', text: '1. d4 d5 *' }] },
        cloudConfig,
        createServices({ evalCache, cloudEval }),
      );

      expect(cloudEval.fetchEval).toHaveBeenCalledWith(d4d5);
      expect(evalCache.entries.get(d4d5)).toEqual({ cp: 20, depth: 30 });
      expect(bodies(result.output)).toEqual(['1. d4 d5 { [%eval 0.20] } *']);
      expect(result.stats.cloudEvals).toBe(1);
    });

    it('skips positions already cached', async () => {
      const evalCache = createEvalStore([[d4d5, { cp: -15 }]]);
      const cloudEval = cloudWith(async () => ({ cp: 20 }));

      const result = await build(
        { newLines: [{ path: 'd4.pgn', text: '1. d4 d5 *' }] },
        cloudConfig,
        createServices({ evalCache, cloudEval }),
      );

      expect(cloudEval.fetchEval).not.toHaveBeenCalled();
      expect(bodies(result.output)).toEqual(['1. d4 d5 { [%eval -0.15] } *']);
    });

    it('does not fetch when cloud evaluations are off', async () => {
      const cloudEval = cloudWith(async () => ({ cp: 20 }));

      await build(
        { newLines: [{ path: 'd4.pgn', text: '1. d4 d5 *' }] },
        createConfig(),
        createServices({ evalCache: createEvalStore(), cloudEval }),
      );

      expect(cloudEval.fetchEval).not.toHaveBeenCalled();
    });

    it('stops after the rate limit is exhausted', async () => {
      const cloudEval = cloudWith(async () => {
        throw new CloudEvalError('Rate limited by cloud eval service', 429);
      });

      const result = await build(
        { newLines: [{ path: 'd4.pgn', text: '1. d4 d5 (1... Nf6) *' }] },
        cloudConfig,
        createServices({ evalCache: createEvalStore(), cloudEval }),
      );

      expect(cloudEval.fetchEval).toHaveBeenCalledTimes(1);
      expect(result.warnings).toEqual([
        'Rate limited by cloud eval service; skipping the remaining 3 positions',
      ]);
      expect(result.stats.records).toBe(3);
    });

    it('skips a failed position and continues', async () => {
      const fetchEval = vi
        .fn<CloudEvaluator['fetchEval']>()
        .mockRejectedValueOnce(new CloudEvalError('Server error', 500))
        .mockResolvedValue({ cp: 10 });
      const evalCache = createEvalStore();

      const result = await build(
        { newLines: [{ path: 'd4.pgn', text: '1. d4 d5 (1... Nf6) *' }] },
        cloudConfig,
        createServices({ evalCache, cloudEval: { fetchEval } }),
      );

      expect(fetchEval).toHaveBeenCalledTimes(3);
      expect(result.warnings).toEqual([`No cloud evaluation for ${fenAfter('d4')}: Server error`]);
      expect(result.stats.cloudEvals).toBe(2);
      expect(bodies(result.output)).toEqual([
        '1. d4 *',
        '1... d5 { [%eval 0.10] } *',
        '1... Nf6 { [%eval 0.10] } *',
      ]);
    });

    it('propagates unexpected errors', async () => {
      const cloudEval = cloudWith(async () => {
        throw new Error('disk full');
      });

      await expect(
        build(
          { newLines: [{ path: 'd4.pgn', text: '1. d4 d5 *' }] },
          cloudConfig,
          createServices({ evalCache: createEvalStore(), cloudEval }),
        ),
      ).rejects.toThrow('disk full');
    });
  });
});
