/**
 * Service initialization for a repertoire build
 */

import { CloudEvalClient, EcoClient, EvalCacheClient, ExplorerClient } from '@repweave/database';

import type { RepweaveConfig } from '../config/schema.js';
import { ConfigError } from '../errors/index.js';

/**
 * Initialized services container
 */
export interface Services {
  ecoClient: EcoClient;
  evalCache: EvalCacheClient | null;
  cloudEval: CloudEvalClient | null;
  explorer: ExplorerClient | null;
  /** Rows in the opening book */
  openingCount: number;
}

/**
 * Open the databases named by the configuration
 *
 * @throws DatabaseNotFoundError if the opening book is missing
 * @throws ConfigError if cloud evaluations are requested without a cache
 */
export function initializeServices(
  config: RepweaveConfig,
  fetchFn?: typeof fetch,
): Services {
  if (config.evals.cloud && !config.databases.evalCachePath) {
    throw new ConfigError(
      'Cloud evaluations need an evaluation cache',
      'Pass --eval-cache <path> or set databases.evalCachePath',
    );
  }

  // Opening book (required); count() opens the file so a missing book fails here
  const ecoClient = new EcoClient({ dbPath: config.databases.ecoPath });
  const openingCount = ecoClient.count();

  const evalCache = config.databases.evalCachePath
    ? new EvalCacheClient({ dbPath: config.databases.evalCachePath })
    : null;

  let cloudEval: CloudEvalClient | null = null;
  if (config.evals.cloud) {
    const { baseUrl, timeoutMs, maxRetries, retryDelayMs } = config.evals;
    cloudEval = new CloudEvalClient(
      { baseUrl, timeoutMs, maxRetries, retryDelayMs },
      fetchFn ? { fetch: fetchFn } : {},
    );
  }

  let explorer: ExplorerClient | null = null;
  if (config.generate.enabled) {
    const { baseUrl, ratings, speeds, timeoutMs, maxRetries, retryDelayMs, token } = config.generate;
    explorer = new ExplorerClient(
      { baseUrl, ratings, speeds, timeoutMs, maxRetries, retryDelayMs, ...(token ? { token } : {}) },
      fetchFn ? { fetch: fetchFn } : {},
    );
  }

  return { ecoClient, evalCache, cloudEval, explorer, openingCount };
}

/**
 * Close database connections
 */
export function closeServices(services: Services): void {
  services.ecoClient.close();
  services.evalCache?.close();
}
