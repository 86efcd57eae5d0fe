/**
 * Cloud evaluation client
 *
 * Queries the lichess cloud-eval endpoint, which serves evaluations of
 * positions that someone has already analysed on the site. A miss is normal;
 * only transport failures and exhausted rate-limit retries are errors.
 */

import { ChessPosition, normalizeFen } from '@repweave/pgn';
import { z } from 'zod';

import { CloudEvalError } from '../errors.js';
import type { PositionEval } from '../types/eval.js';

import { defaultSleep, getJson, type HttpDeps, type RetryPolicy } from './http.js';

/**
 * Configuration for the cloud evaluation client
 */
export interface CloudEvalConfig extends RetryPolicy {
  /** Service root, without a trailing slash */
  baseUrl: string;
}

export const DEFAULT_CLOUD_EVAL_CONFIG: CloudEvalConfig = {
  baseUrl: 'https://lichess.org',
  timeoutMs: 10000,
  maxRetries: 3,
  retryDelayMs: 60000,
};

export type CloudEvalDeps = HttpDeps;

const pvSchema = z.object({
  moves: z.string(),
  cp: z.number().int().optional(),
  mate: z.number().int().optional(),
});

const cloudEvalResponseSchema = z.object({
  fen: z.string().optional(),
  depth: z.number().int().optional(),
  pvs: z.array(pvSchema),
});

const cloudEvalErrorSchema = z.object({
  error: z.string(),
});

export class CloudEvalClient {
  private readonly config: CloudEvalConfig;
  private readonly io: Required<HttpDeps>;

  constructor(config: Partial<CloudEvalConfig> = {}, deps: CloudEvalDeps = {}) {
    this.config = { ...DEFAULT_CLOUD_EVAL_CONFIG, ...config };
    this.io = { fetch: deps.fetch ?? fetch, sleep: deps.sleep ?? defaultSleep };
  }

  /**
   * Build the request URL for a position
   */
  buildUrl(fen: string): string {
    const params = new URLSearchParams({
      fen: normalizeFen(fen),
      multiPv: '1',
      variant: 'standard',
    });
    return `${this.config.baseUrl}/api/cloud-eval?${params.toString()}`;
  }

  /**
   * Fetch the cloud evaluation of a position.
   *
   * @returns The evaluation, or undefined when the service has none
   * @throws CloudEvalError on transport failure, unexpected status or body,
   *   or when still rate-limited after `maxRetries` retries
   */
  async fetchEval(fen: string): Promise<PositionEval | undefined> {
    const result = await getJson(
      {
        url: this.buildUrl(fen),
        headers: { Accept: 'application/json' },
        service: 'Cloud eval',
        fail: (message, status) => new CloudEvalError(message, status),
      },
      this.config,
      this.io,
    );
    return result.found ? this.parseBody(fen, result.body) : undefined;
  }

  private parseBody(fen: string, body: unknown): PositionEval | undefined {
    const notFound = cloudEvalErrorSchema.safeParse(body);
    if (notFound.success) {
      if (notFound.data.error === 'Not found') {
        return undefined;
      }
      throw new CloudEvalError(`Cloud eval error: ${notFound.data.error}`);
    }

    const parsed = cloudEvalResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new CloudEvalError(`Unexpected cloud eval response: ${parsed.error.message}`);
    }

    const pv = parsed.data.pvs[0];
    if (!pv) {
      return undefined;
    }

    const evaluation: PositionEval = {};
    if (pv.mate !== undefined) {
      evaluation.mate = pv.mate;
    } else if (pv.cp !== undefined) {
      evaluation.cp = pv.cp;
    }
    if (parsed.data.depth !== undefined) {
      evaluation.depth = parsed.data.depth;
    }

    const firstMove = pv.moves.split(' ')[0];
    if (firstMove) {
      evaluation.bestMove = ChessPosition.fromFen(fen).uciToSan(firstMove);
    }

    return evaluation;
  }
}
