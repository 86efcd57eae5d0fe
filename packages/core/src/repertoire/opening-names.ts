/**
 * Opening-name and ECO propagation
 */

import type { NameSource, NodeOpening } from './dag-node.js';
import { NAME_SOURCE_RANK } from './dag-node.js';
import type { OpeningEntry, RepertoireColor } from './types.js';

/**
 * The parent fields that name derivation reads
 */
export interface OpeningParent {
  openingName: string;
  nameSource: NameSource;
  eco: string;
  moveNum: number;
  turn: RepertoireColor;
}

/**
 * Move-number prefix for a move played from `parent`: "N." for White, "N.." for Black
 */
export function moveNumberPrefix(parent: Pick<OpeningParent, 'moveNum' | 'turn'>): string {
  return parent.turn === 'w' ? `${parent.moveNum}.` : `${parent.moveNum}..`;
}

/**
 * Derive the opening annotation of a node reached from `parent` by `move`.
 *
 * A book hit names the node directly. Otherwise the parent's name is
 * inherited; a single move suffix is appended when the repertoire side
 * leaves a directly named position, and never again below that. An unnamed
 * position gets no suffix, so its descendants stay unnamed until the book
 * names one of them or a named lineage transposes in.
 */
export function deriveOpening(
  book: OpeningEntry | undefined,
  parent: OpeningParent,
  move: string,
  repertoireColor: RepertoireColor,
): NodeOpening {
  if (book) {
    return { name: book.name, source: 'direct', eco: book.eco };
  }

  if (parent.nameSource !== 'direct') {
    return { name: parent.openingName, source: 'ancestor', eco: parent.eco };
  }

  if (parent.turn !== repertoireColor) {
    return { name: parent.openingName, source: 'direct', eco: parent.eco };
  }

  // an unnamed parent leaves the name empty; the source is still 'parent'
  const name =
    parent.openingName === '' ? '' : `${parent.openingName}, ${moveNumberPrefix(parent)} ${move}`;
  return { name, source: 'parent', eco: parent.eco };
}

/**
 * Whether `candidate` is strictly more specific than `current`
 */
export function isMoreSpecific(candidate: NameSource, current: NameSource): boolean {
  return NAME_SOURCE_RANK[candidate] < NAME_SOURCE_RANK[current];
}
