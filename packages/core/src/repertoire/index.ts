export { OpeningDag, DEFAULT_ANNOTATOR, type OpeningDagOptions } from './opening-dag.js';
export { DagNode, NAME_SOURCE_RANK, type NameSource, type NodeOpening } from './dag-node.js';
export { MoveRun, renderMoves } from './move-run.js';
export { MoveRunSet } from './move-run-set.js';
export {
  deriveOpening,
  isMoreSpecific,
  moveNumberPrefix,
  type OpeningParent,
} from './opening-names.js';
export {
  buildHeaders,
  formatEvalComment,
  formatRecord,
  type RecordHeaderInput,
} from './records.js';
export { RepertoireIndex, type MoveConflict, type RecordedMove } from './repertoire-index.js';
export { truncateLine } from './lines.js';
export {
  LineGenerator,
  extendLine,
  DEFAULT_THRESHOLD,
  DEFAULT_MIN_GAMES,
  type LineGeneratorOptions,
  type MovePick,
  type RepertoireGap,
  type GeneratedLines,
} from './line-generator.js';
export { InvariantViolationError } from './errors.js';
export type {
  OutputMode,
  RepertoireColor,
  OpeningEntry,
  OpeningBook,
  EvalAnnotation,
  PositionEvaluator,
  RecordWriter,
  WarningHandler,
  ExplorerMoveCount,
  ExplorerStats,
  OpeningExplorer,
} from './types.js';
