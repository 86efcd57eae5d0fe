/**
 * Main orchestrator that coordinates a repertoire build
 */

import {
  LineGenerator,
  OpeningDag,
  RepertoireIndex,
  renderMoves,
  truncateLine,
  type EvalAnnotation,
  type OpeningBook,
  type OpeningExplorer,
  type PositionEvaluator,
  type RepertoireColor,
  type RepertoireGap,
} from '@repweave/core';
import { CloudEvalError } from '@repweave/database';
import {
  expandVariations,
  fenFullmoveNumber,
  fenTurn,
  IllegalMoveError,
  parseMoveText,
  parsePgn,
  PgnParseError,
  type GameLine,
  type ParsedGame,
} from '@repweave/pgn';

import type { RepweaveConfig } from '../config/schema.js';
import { ConfigError, PgnError } from '../errors/index.js';
import type { ProgressReporter } from '../progress/reporter.js';

/**
 * A PGN file already read into memory
 */
export interface PgnSource {
  path: string;
  text: string;
}

export interface BuildInput {
  /** The current repertoire */
  existing?: PgnSource;
  /** Files with lines to add */
  newLines: PgnSource[];
}

/**
 * Evaluation cache the build reads and fills
 */
export interface EvalStore extends PositionEvaluator {
  has(fen: string): boolean;
  put(fen: string, evaluation: EvalAnnotation, source: 'cloud'): void;
}

export interface CloudEvaluator {
  fetchEval(fen: string): Promise<EvalAnnotation | undefined>;
}

/**
 * Collaborators of a build; satisfied by `Services`
 */
export interface BuildServices {
  ecoClient: OpeningBook;
  evalCache: EvalStore | null;
  cloudEval: CloudEvaluator | null;
  explorer: OpeningExplorer | null;
}

export interface BuildOptions {
  color: RepertoireColor;
  /** Time source for record headers */
  clock?: () => Date;
}

export interface BuildStats {
  games: number;
  lines: number;
  nodes: number;
  records: number;
  conflicts: number;
  generated: number;
  gaps: number;
  cloudEvals: number;
}

export interface BuildResult {
  output: string;
  stats: BuildStats;
  /** Every warning also passed to the reporter */
  warnings: string[];
}

interface LabeledLine {
  line: GameLine;
  /** "<path>#<game number>" */
  label: string;
}

/**
 * Parse a PGN file and expand every game into lines
 * @throws PgnError if the file does not parse or contains an illegal move
 */
function readLines(source: PgnSource): { games: number; lines: LabeledLine[] } {
  let games: ParsedGame[];
  try {
    games = parsePgn(source.text);
  } catch (err) {
    if (err instanceof PgnParseError) {
      throw new PgnError(source.path, err.message, err.location);
    }
    if (err instanceof IllegalMoveError) {
      throw new PgnError(source.path, err.message);
    }
    throw err;
  }

  const lines = games.flatMap((game, idx) =>
    expandVariations(game).map((line) => ({ line, label: `${source.path}#${idx + 1}` })),
  );
  return { games: games.length, lines };
}

/**
 * Play the configured start moves from the repertoire root
 * @throws ConfigError if a move is illegal
 */
function readStartLine(moveText: string, rootFen: string): GameLine {
  try {
    return parseMoveText(moveText, rootFen);
  } catch (err) {
    if (err instanceof IllegalMoveError) {
      throw new ConfigError(
        `Invalid start moves "${moveText}": ${err.message}`,
        'Give legal moves from the repertoire root, e.g. --start "1. e4 e5"',
      );
    }
    throw err;
  }
}

function describeGap(gap: RepertoireGap, start: GameLine): string {
  const share = `${(gap.share * 100).toFixed(1)}% of games`;
  if (gap.moves.length === 0) {
    return `No repertoire move at the start position (${share})`;
  }
  const moves = renderMoves(gap.moves, fenTurn(start.startFen), fenFullmoveNumber(start.startFen));
  return `No repertoire move after ${moves} (${share})`;
}

/**
 * Build a repertoire from an existing PGN, new lines and generated lines
 *
 * Every line is recorded in a move index so that contradicting repertoire
 * moves are reported; the DAG itself keeps all of them. Generation runs
 * after every file is read and plays the moves the index holds.
 */
export async function orchestrateBuild(
  input: BuildInput,
  config: RepweaveConfig,
  services: BuildServices,
  reporter: ProgressReporter,
  options: BuildOptions,
): Promise<BuildResult> {
  const warnings: string[] = [];
  const warn = (message: string): void => {
    warnings.push(message);
    reporter.warn(message);
  };

  const dag = new OpeningDag({
    repertoireColor: options.color,
    outputMode: config.repertoire.format,
    openingBook: services.ecoClient,
    ...(services.evalCache ? { evaluator: services.evalCache } : {}),
    ...(options.clock ? { clock: options.clock } : {}),
    annotator: config.output.annotator,
    lineLength: config.output.maxLineLength,
    onWarning: warn,
  });
  const index = new RepertoireIndex(options.color);
  const stats: BuildStats = {
    games: 0,
    lines: 0,
    nodes: 0,
    records: 0,
    conflicts: 0,
    generated: 0,
    gaps: 0,
    cloudEvals: 0,
  };

  const ingest = ({ line, label }: LabeledLine, addToDag: boolean): void => {
    for (const conflict of index.recordGame(line, label)) {
      stats.conflicts++;
      warn(
        `Conflicting moves at ${conflict.normalizedFen}: ` +
          `${conflict.existing.move} (${conflict.existing.source}) vs ` +
          `${conflict.incoming.move} (${conflict.incoming.source}); keeping ${conflict.existing.move}`,
      );
    }
    if (!addToDag) {
      return;
    }
    if (line.startFen !== dag.root.fen) {
      warn(`Skipping line from ${label}: it does not start from the repertoire root`);
      return;
    }
    dag.addLine(line);
    stats.lines++;
  };

  if (input.existing) {
    reporter.startPhase('existing_repertoire');
    const { games, lines } = readLines(input.existing);
    stats.games += games;
    for (const labeled of lines) {
      ingest(labeled, config.repertoire.keepExisting);
    }
    reporter.completePhase('existing_repertoire', `${games} games, ${lines.length} lines`);
  }

  if (input.newLines.length > 0) {
    reporter.startPhase('new_lines');
    let added = 0;
    for (const source of input.newLines) {
      const { games, lines } = readLines(source);
      stats.games += games;
      for (const { line, label } of lines) {
        ingest({ line: truncateLine(line, config.repertoire.maxDepth), label }, true);
        added++;
      }
    }
    reporter.completePhase('new_lines', `${added} lines`);
  }

  if (config.generate.enabled && services.explorer) {
    reporter.startPhase('generating');
    const start = readStartLine(config.generate.start, dag.root.fen);
    const generator = new LineGenerator({
      color: options.color,
      explorer: services.explorer,
      knownMove: (fen) => index.moveFor(fen),
      maxDepth: config.repertoire.maxDepth,
      threshold: config.generate.threshold,
      minGames: config.generate.minGames,
      pick: config.generate.pick,
    });
    const { lines, gaps } = await generator.generate(start);

    for (const [idx, line] of lines.entries()) {
      ingest({ line, label: `generated#${idx + 1}` }, true);
    }
    for (const gap of gaps) {
      warn(describeGap(gap, start));
    }
    stats.generated = lines.length;
    stats.gaps = gaps.length;
    reporter.completePhase('generating', `${lines.length} lines, ${generator.requests} explorer requests`);
  }

  if (config.evals.cloud && services.evalCache && services.cloudEval) {
    reporter.startPhase('cloud_evals');
    stats.cloudEvals = await prefetchCloudEvals(
      dag.recordPositions(),
      services.evalCache,
      services.cloudEval,
      reporter,
      warn,
    );
    reporter.completePhase('cloud_evals', `${stats.cloudEvals} fetched`);
  }

  reporter.startPhase('writing');
  const chunks: string[] = [];
  stats.records = dag.emit({ write: (text: string) => chunks.push(text) });
  stats.nodes = dag.size;
  reporter.completePhase('writing', `${stats.records} records`);

  return { output: chunks.join(''), stats, warnings };
}

/**
 * Fill the cache for positions it does not hold yet
 *
 * A failed position is skipped; exhausted rate-limit retries end the prefetch.
 *
 * @returns Number of evaluations stored
 */
async function prefetchCloudEvals(
  fens: string[],
  cache: EvalStore,
  cloud: CloudEvaluator,
  reporter: ProgressReporter,
  warn: (message: string) => void,
): Promise<number> {
  const missing = fens.filter((fen) => !cache.has(fen));
  let stored = 0;

  for (const [idx, fen] of missing.entries()) {
    try {
      const evaluation = await cloud.fetchEval(fen);
      if (evaluation) {
        cache.put(fen, evaluation, 'cloud');
        stored++;
      }
    } catch (err) {
      if (!(err instanceof CloudEvalError)) {
        throw err;
      }
      if (err.status === 429) {
        warn(`${err.message}; skipping the remaining ${missing.length - idx} positions`);
        break;
      }
      warn(`No cloud evaluation for ${fen}: ${err.message}`);
    }
    reporter.updateProgress('cloud_evals', idx + 1, missing.length);
  }

  return stored;
}
