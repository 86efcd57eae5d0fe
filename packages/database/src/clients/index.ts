/**
 * Database client exports
 */

export { BaseDatabaseClient, type DatabaseClientConfig } from './base.js';
export { EcoClient, DEFAULT_ECO_CONFIG } from './eco.js';
export { EvalCacheClient, DEFAULT_EVAL_CACHE_CONFIG } from './eval-cache.js';
export {
  CloudEvalClient,
  DEFAULT_CLOUD_EVAL_CONFIG,
  type CloudEvalConfig,
  type CloudEvalDeps,
} from './cloud-eval.js';
export {
  ExplorerClient,
  DEFAULT_EXPLORER_CONFIG,
  lastJsonDocument,
  type ExplorerConfig,
  type ExplorerDeps,
} from './explorer.js';
export type { RetryPolicy, HttpDeps } from './http.js';
