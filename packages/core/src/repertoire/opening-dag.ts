/**
 * Opening DAG
 *
 * Merges repertoire lines into a graph with one node per exact FEN, then
 * prints the graph back as PGN records. Emission runs in two phases:
 *
 * 1. computeMoveRuns walks from the root and splits every path into
 *    unbranched MoveRuns, each stored on the node where it ends.
 * 2. emitNode walks again and prints one record per leaf and, in
 *    consolidated mode, per junction node.
 */

import { fenFullmoveNumber, fenTurn, STARTING_FEN, type GameLine } from '@repweave/pgn';

import { DagNode, type NodeOpening } from './dag-node.js';
import { InvariantViolationError } from './errors.js';
import { MoveRun } from './move-run.js';
import { deriveOpening, isMoreSpecific } from './opening-names.js';
import { buildHeaders, formatEvalComment, formatRecord } from './records.js';
import type {
  OpeningBook,
  OpeningEntry,
  OutputMode,
  PositionEvaluator,
  RecordWriter,
  RepertoireColor,
  WarningHandler,
} from './types.js';

export const DEFAULT_ANNOTATOR = 'repweave';

export interface OpeningDagOptions {
  repertoireColor: RepertoireColor;
  outputMode: OutputMode;
  openingBook: OpeningBook;
  evaluator?: PositionEvaluator;
  /** Exact FEN of the root (default: the standard starting position) */
  rootFen?: string;
  /** Time source for the Date, UTCDate and UTCTime headers */
  clock?: () => Date;
  /** Annotator header value */
  annotator?: string;
  /** Wrap record move text at this width; 0 disables wrapping */
  lineLength?: number;
  /** Receives collaborator failures that were degraded to "no annotation" */
  onWarning?: WarningHandler;
}

export class OpeningDag {
  readonly repertoireColor: RepertoireColor;
  readonly outputMode: OutputMode;

  private readonly openingBook: OpeningBook;
  private readonly evaluator: PositionEvaluator | undefined;
  private readonly clock: () => Date;
  private readonly annotator: string;
  private readonly lineLength: number;
  private readonly onWarning: WarningHandler;

  /** Exact FEN -> node, in creation order */
  private readonly nodeMap = new Map<string, DagNode>();
  private readonly rootNode: DagNode;

  constructor(options: OpeningDagOptions) {
    this.repertoireColor = options.repertoireColor;
    this.outputMode = options.outputMode;
    this.openingBook = options.openingBook;
    this.evaluator = options.evaluator;
    this.clock = options.clock ?? (() => new Date());
    this.annotator = options.annotator ?? DEFAULT_ANNOTATOR;
    this.lineLength = options.lineLength ?? 0;
    this.onWarning = options.onWarning ?? (() => undefined);

    const rootFen = options.rootFen ?? STARTING_FEN;
    const book = this.lookupOpening(rootFen);
    this.rootNode = new DagNode(0, rootFen, fenFullmoveNumber(rootFen), 0, {
      name: book?.name ?? '',
      source: 'direct',
      eco: book?.eco ?? '',
    });
    this.nodeMap.set(rootFen, this.rootNode);
  }

  get root(): DagNode {
    return this.rootNode;
  }

  /**
   * Number of distinct positions
   */
  get size(): number {
    return this.nodeMap.size;
  }

  getNode(fen: string): DagNode | undefined {
    return this.nodeMap.get(fen);
  }

  /**
   * All nodes in creation order
   */
  nodes(): DagNode[] {
    return [...this.nodeMap.values()];
  }

  /**
   * Insert or link the node for `fen`, reached from `parent` by `move`.
   *
   * Without a parent, `fen` must be the root's and the root is returned.
   *
   * @throws InvariantViolationError on a missing move, an unknown parentless
   *   position, or a parent/move pair that already leads elsewhere
   */
  upsert(parent: DagNode | undefined, fen: string, move?: string): DagNode {
    const existing = this.nodeMap.get(fen);

    if (!parent) {
      if (existing !== this.rootNode) {
        throw new InvariantViolationError('line does not start at the DAG root', {
          fen,
          rootFen: this.rootNode.fen,
        });
      }
      return this.rootNode;
    }

    if (!move) {
      throw new InvariantViolationError('empty move during node insertion', { fen });
    }

    const linked = parent.children.get(move);
    if (linked) {
      if (linked !== existing) {
        throw new InvariantViolationError('distinct DAG nodes for the same parent and move', {
          parentFen: parent.fen,
          move,
          linkedFen: linked.fen,
          fen,
        });
      }
      return linked;
    }

    if (!existing) {
      const node = new DagNode(
        this.nodeMap.size,
        fen,
        fenTurn(fen) === 'w' ? parent.moveNum + 1 : parent.moveNum,
        1,
        this.openingFor(parent, fen, move),
      );
      parent.children.set(move, node);
      this.nodeMap.set(fen, node);
      return node;
    }

    existing.numParents++;
    parent.children.set(move, existing);

    // A transposition may arrive through a better-named lineage
    if (existing.nameSource !== 'direct') {
      const candidate = this.openingFor(parent, fen, move);
      if (isMoreSpecific(candidate.source, existing.nameSource)) {
        existing.openingName = candidate.name;
        existing.nameSource = candidate.source;
      }
    }

    return existing;
  }

  /**
   * Ingest one line: `positions[0]` is the root, `positions[i + 1]` follows `moves[i]`.
   *
   * @returns The node of the last position
   * @throws InvariantViolationError if there are fewer positions than moves
   *   or more positions than moves can connect
   */
  addGame(moves: readonly string[], positions: readonly string[]): DagNode {
    if (moves.length > positions.length) {
      throw new InvariantViolationError('game has fewer positions than moves', {
        moves: moves.length,
        positions: positions.length,
      });
    }
    if (positions.length > moves.length + 1) {
      throw new InvariantViolationError('game has positions without connecting moves', {
        moves: moves.length,
        positions: positions.length,
      });
    }

    const [rootFen, ...rest] = positions;
    if (rootFen === undefined) {
      throw new InvariantViolationError('game has no positions');
    }

    let node = this.upsert(undefined, rootFen);
    for (const [idx, fen] of rest.entries()) {
      node = this.upsert(node, fen, moves[idx]);
    }
    return node;
  }

  addLine(line: GameLine): DagNode {
    return this.addGame(line.moves, line.positions);
  }

  /**
   * Every root-to-leaf move sequence, children in insertion order
   */
  enumerateLines(): string[][] {
    const lines: string[][] = [];
    const walk = (node: DagNode, path: string[]): void => {
      if (node.isLeaf) {
        if (path.length > 0) {
          lines.push(path);
        }
        return;
      }
      for (const [move, child] of node.children) {
        walk(child, [...path, move]);
      }
    };
    walk(this.rootNode, []);
    return lines;
  }

  /**
   * FENs of the positions that end a record, in creation order.
   * These are the positions `emit` asks the evaluator about.
   */
  recordPositions(): string[] {
    if (this.rootNode.isLeaf) {
      return [];
    }
    return this.nodes()
      .filter((node) => node.isLeaf || this.isCutPoint(node))
      .map((node) => node.fen);
  }

  /**
   * Write every record to `writer`.
   *
   * Per-node traversal state is reset first, so repeated calls produce the
   * same output. An empty DAG writes nothing.
   *
   * @returns Number of records written
   */
  emit(writer: RecordWriter): number {
    for (const node of this.nodeMap.values()) {
      node.resetTraversal();
    }
    if (this.rootNode.isLeaf) {
      return 0;
    }

    this.computeMoveRuns(
      this.rootNode,
      MoveRun.startingAt(this.rootNode.fen, this.rootNode.moveNum),
    );
    return this.emitNode(this.rootNode, writer, this.clock());
  }

  emitToString(): string {
    const chunks: string[] = [];
    this.emit({ write: (text: string) => chunks.push(text) });
    return chunks.join('');
  }

  /**
   * A record boundary: a non-root junction in consolidated mode
   */
  private isCutPoint(node: DagNode): boolean {
    return this.outputMode === 'consolidated' && node !== this.rootNode && node.isJunction;
  }

  private computeMoveRuns(node: DagNode, run: MoveRun): void {
    if (node.isLeaf) {
      node.moveRunSet.add(run);
      return;
    }

    let current = run;
    if (this.outputMode === 'consolidated' && node !== this.rootNode) {
      if (this.isCutPoint(node) || node.childrenComputed) {
        node.moveRunSet.add(run);
        current = MoveRun.startingAt(node.fen, node.moveNum);
      }
      // Each subgraph is expanded once; later lineages stop at its entry
      if (node.childrenComputed) {
        return;
      }
    }

    for (const [move, child] of node.children) {
      this.computeMoveRuns(child, current.extend(move));
    }
    node.childrenComputed = true;
  }

  /** Every record of one emit shares `now` */
  private emitNode(node: DagNode, writer: RecordWriter, now: Date): number {
    if (node.emitted) {
      return 0;
    }
    if (node.isLeaf) {
      return this.emitRecord(node, writer, now);
    }

    let count = 0;
    if (this.isCutPoint(node)) {
      count += this.emitRecord(node, writer, now);
    }
    for (const child of node.children.values()) {
      count += this.emitNode(child, writer, now);
    }
    return count;
  }

  private emitRecord(node: DagNode, writer: RecordWriter, now: Date): number {
    node.emitted = true;

    const runSet = node.moveRunSet;
    const evalComment = this.evalComment(node);
    const header = (startFen: string) =>
      buildHeaders({
        openingName: node.openingName,
        eco: node.eco,
        startFen,
        annotator: this.annotator,
        now,
      });

    const [first] = runSet.runs;
    if (first && this.outputMode === 'consolidated' && runSet.hasSharedStart()) {
      writer.write(
        formatRecord(header(first.startFen), runSet.toString(), evalComment, this.lineLength),
      );
      return 1;
    }

    for (const run of runSet.runs) {
      writer.write(formatRecord(header(run.startFen), run.toString(), evalComment, this.lineLength));
    }
    return runSet.size;
  }

  private openingFor(parent: DagNode, fen: string, move: string): NodeOpening {
    return deriveOpening(this.lookupOpening(fen), parent, move, this.repertoireColor);
  }

  private lookupOpening(fen: string): OpeningEntry | undefined {
    try {
      return this.openingBook.lookupOpening(fen);
    } catch (err) {
      this.onWarning(`Opening lookup failed for ${fen}: ${describeError(err)}`);
      return undefined;
    }
  }

  private evalComment(node: DagNode): string | undefined {
    if (!this.evaluator) {
      return undefined;
    }
    try {
      const evaluation = this.evaluator.evaluate(node.fen);
      return evaluation ? formatEvalComment(evaluation) : undefined;
    } catch (err) {
      this.onWarning(`Evaluation failed for ${node.fen}: ${describeError(err)}`);
      return undefined;
    }
  }
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
