export type { OpeningEntry, OpeningInfo } from './opening.js';
export type { PositionEval, EvalSource, CachedEval } from './eval.js';
export type { ExplorerMove, ExplorerPosition } from './explorer.js';
