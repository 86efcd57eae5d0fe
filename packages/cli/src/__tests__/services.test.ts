import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';

import { DatabaseNotFoundError, ExplorerClient, loadEcoDatabase } from '@repweave/database';
import { STARTING_FEN } from '@repweave/pgn';

import { DEFAULT_CONFIG } from '../config/defaults.js';
import { ConfigError } from '../errors/index.js';
import { closeServices, initializeServices } from '../orchestrator/services.js';

describe('initializeServices', () => {
  it('requires an eval cache for cloud evaluations', () => {
    const config = { ...DEFAULT_CONFIG, evals: { ...DEFAULT_CONFIG.evals, cloud: true } };
    expect(() => initializeServices(config)).toThrow(ConfigError);
  });

  it('fails when the opening book is missing', () => {
    const config = {
      ...DEFAULT_CONFIG,
      databases: { ecoPath: '/nonexistent/repweave/eco.db' },
    };
    expect(() => initializeServices(config)).toThrow(DatabaseNotFoundError);
  });

  describe('with an opening book', () => {
    let tmpDir: string;
    let ecoPath: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'repweave-services-'));
      const tsvPath = path.join(tmpDir, 'a.tsv');
      fs.writeFileSync(tsvPath, 'eco\tname\tpgn\nB20\tSicilian Defense\t1. e4 c5\n');
      ecoPath = path.join(tmpDir, 'eco.db');
      loadEcoDatabase({ dbPath: ecoPath, sourceFiles: [tsvPath] });
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('opens no network clients by default', () => {
      const services = initializeServices({ ...DEFAULT_CONFIG, databases: { ecoPath } });
      try {
        expect(services.openingCount).toBe(1);
        expect(services.cloudEval).toBeNull();
        expect(services.explorer).toBeNull();
      } finally {
        closeServices(services);
      }
    });

    it('creates an explorer client that sends the configured token', async () => {
      const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(
        new Response(JSON.stringify({ white: 0, draws: 0, black: 0, moves: [] }), { status: 200 }),
      );
      const config = {
        ...DEFAULT_CONFIG,
        databases: { ecoPath },
        generate: { ...DEFAULT_CONFIG.generate, enabled: true, token: 'test-secret' },
      };

      const services = initializeServices(config, fetchMock);
      try {
        expect(services.explorer).toBeInstanceOf(ExplorerClient);
        await services.explorer?.explore(STARTING_FEN);
        expect(fetchMock.mock.calls[0]?.[1]?.headers).toMatchObject({
          Authorization: 'Bearer test-secret',
        });
      } finally {
        closeServices(services);
      }
    });
  });
});
