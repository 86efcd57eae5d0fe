/**
 * Opening explorer client
 *
 * Queries the lichess opening explorer for the moves played from a position
 * in rated games. The service may answer with newline-delimited JSON while it
 * is still counting; the last document is the complete one.
 */

import { normalizeFen } from '@repweave/pgn';
import { z } from 'zod';

import { ExplorerError } from '../errors.js';
import type { ExplorerMove, ExplorerPosition } from '../types/explorer.js';

import { defaultSleep, getJson, type HttpDeps, type RetryPolicy } from './http.js';

export interface ExplorerConfig extends RetryPolicy {
  /** Service root, without a trailing slash */
  baseUrl: string;
  /** Rating buckets to count games from */
  ratings: number[];
  /** Time controls to count games from */
  speeds: string[];
  /** Sent as a bearer token when set */
  token?: string;
}

export const DEFAULT_EXPLORER_CONFIG: ExplorerConfig = {
  baseUrl: 'https://explorer.lichess.ovh',
  ratings: [2200, 2500],
  speeds: ['blitz', 'rapid', 'classical'],
  timeoutMs: 10000,
  maxRetries: 3,
  retryDelayMs: 60000,
};

export type ExplorerDeps = HttpDeps;

const explorerMoveSchema = z.object({
  uci: z.string(),
  san: z.string(),
  white: z.number().int().nonnegative(),
  draws: z.number().int().nonnegative(),
  black: z.number().int().nonnegative(),
});

const explorerResponseSchema = z.object({
  white: z.number().int().nonnegative(),
  draws: z.number().int().nonnegative(),
  black: z.number().int().nonnegative(),
  moves: z.array(explorerMoveSchema),
  opening: z.object({ eco: z.string(), name: z.string() }).nullish(),
});

/**
 * Take the last document of a newline-delimited JSON body
 */
export function lastJsonDocument(text: string): unknown {
  const documents = text.split('\n').filter((line) => line.trim() !== '');
  const last = documents[documents.length - 1];
  if (last === undefined) {
    throw new SyntaxError('empty body');
  }
  return JSON.parse(last);
}

export class ExplorerClient {
  private readonly config: ExplorerConfig;
  private readonly io: Required<HttpDeps>;

  constructor(config: Partial<ExplorerConfig> = {}, deps: ExplorerDeps = {}) {
    this.config = { ...DEFAULT_EXPLORER_CONFIG, ...config };
    this.io = { fetch: deps.fetch ?? fetch, sleep: deps.sleep ?? defaultSleep };
  }

  buildUrl(fen: string): string {
    const params = new URLSearchParams({
      variant: 'standard',
      fen: normalizeFen(fen),
      ratings: this.config.ratings.join(','),
      speeds: this.config.speeds.join(','),
    });
    return `${this.config.baseUrl}/lichess?${params.toString()}`;
  }

  /**
   * Fetch the move statistics of a position.
   *
   * A position the explorer does not know has no games.
   *
   * @throws ExplorerError on transport failure, unexpected status or body,
   *   or when still rate-limited after `maxRetries` retries
   */
  async explore(fen: string): Promise<ExplorerPosition> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.config.token) {
      headers['Authorization'] = `Bearer ${this.config.token}`;
    }

    const result = await getJson(
      {
        url: this.buildUrl(fen),
        headers,
        service: 'Opening explorer',
        fail: (message, status) => new ExplorerError(message, status),
        decode: lastJsonDocument,
      },
      this.config,
      this.io,
    );
    if (!result.found) {
      return { total: 0, moves: [] };
    }

    const parsed = explorerResponseSchema.safeParse(result.body);
    if (!parsed.success) {
      throw new ExplorerError(`Unexpected explorer response: ${parsed.error.message}`);
    }

    const { white, draws, black, opening } = parsed.data;
    const moves: ExplorerMove[] = parsed.data.moves
      .map((move) => ({ ...move, games: move.white + move.draws + move.black }))
      .sort((a, b) => b.games - a.games);

    const position: ExplorerPosition = { total: white + draws + black, moves };
    if (opening) {
      position.opening = opening;
    }
    return position;
  }
}
