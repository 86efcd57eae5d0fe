/**
 * Opening DAG node
 *
 * One node per distinct exact FEN. A node reached from more than one parent
 * is a transposition.
 */

import { fenTurn, type Turn } from '@repweave/pgn';

import { MoveRunSet } from './move-run-set.js';

/**
 * Where a node's opening name came from, most specific first
 *
 * - direct: the book names this position, or a book-side continuation of a
 *   directly named position
 * - parent: the parent's name plus one move suffix
 * - ancestor: copied from a parent that was itself not direct
 */
export type NameSource = 'direct' | 'parent' | 'ancestor';

export const NAME_SOURCE_RANK: Record<NameSource, number> = {
  direct: 0,
  parent: 1,
  ancestor: 2,
};

/**
 * Opening annotation carried by a node
 */
export interface NodeOpening {
  name: string;
  source: NameSource;
  eco: string;
}

export class DagNode {
  /** Children keyed by SAN, in insertion order */
  readonly children = new Map<string, DagNode>();

  openingName: string;
  nameSource: NameSource;
  eco: string;

  /** Runs ending here; filled by the first emission phase */
  readonly moveRunSet = new MoveRunSet();
  childrenComputed = false;
  emitted = false;

  constructor(
    /** Creation order, 0 for the root */
    readonly nodeId: number,
    /** Exact FEN; the node's identity */
    readonly fen: string,
    /** Full move number at this position */
    readonly moveNum: number,
    /** Number of distinct (parent, move) edges into this node */
    public numParents: number,
    opening: NodeOpening,
  ) {
    this.openingName = opening.name;
    this.nameSource = opening.source;
    this.eco = opening.eco;
  }

  /**
   * Side to move
   */
  get turn(): Turn {
    return fenTurn(this.fen);
  }

  get isLeaf(): boolean {
    return this.children.size === 0;
  }

  /**
   * Branching or transposition node
   */
  get isJunction(): boolean {
    return this.children.size > 1 || this.numParents > 1;
  }

  /**
   * Clear per-emission state
   */
  resetTraversal(): void {
    this.moveRunSet.clear();
    this.childrenComputed = false;
    this.emitted = false;
  }
}
