/**
 * PGN record formatting for emitted repertoire lines
 */

import { renderTags, STARTING_FEN, wrapMoveText, type TagPair } from '@repweave/pgn';

import type { EvalAnnotation } from './types.js';

export interface RecordHeaderInput {
  openingName: string;
  eco: string;
  /** Exact FEN the record starts from */
  startFen: string;
  annotator: string;
  now: Date;
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Seven Tag Roster followed by the repertoire tags.
 * FEN and SetUp are added when the record does not start from the initial position.
 */
export function buildHeaders(input: RecordHeaderInput): TagPair[] {
  const { now } = input;
  const tags: TagPair[] = [
    ['Event', input.openingName],
    ['Site', ''],
    ['Date', `${now.getFullYear()}.${pad2(now.getMonth() + 1)}.${pad2(now.getDate())}`],
    ['Round', '1'],
    ['White', ''],
    ['Black', ''],
    ['Result', '*'],
    [
      'UTCDate',
      `${now.getUTCFullYear()}.${pad2(now.getUTCMonth() + 1)}.${pad2(now.getUTCDate())}`,
    ],
    [
      'UTCTime',
      `${pad2(now.getUTCHours())}:${pad2(now.getUTCMinutes())}:${pad2(now.getUTCSeconds())}`,
    ],
    ['Variant', 'Standard'],
    ['ECO', input.eco],
    ['Annotator', input.annotator],
  ];

  if (input.startFen !== STARTING_FEN) {
    tags.push(['FEN', input.startFen], ['SetUp', '1']);
  }

  return tags;
}

/**
 * `{ [%eval ...] }` comment, or undefined when there is no score
 */
export function formatEvalComment(evaluation: EvalAnnotation): string | undefined {
  if (evaluation.mate !== undefined && evaluation.mate !== 0) {
    return `{ [%eval #${evaluation.mate}] }`;
  }
  if (evaluation.cp !== undefined) {
    return `{ [%eval ${(evaluation.cp / 100).toFixed(2)}] }`;
  }
  return undefined;
}

/**
 * One complete record: headers, a blank line, the move text, two blank lines.
 *
 * @param lineLength - Wrap the move text at this width; 0 keeps it on one line
 */
export function formatRecord(
  headers: readonly TagPair[],
  moveText: string,
  evalComment?: string,
  lineLength: number = 0,
): string {
  const body = [moveText, evalComment, '*'].filter((part) => part).join(' ');
  return `${renderTags(headers)}\n\n${wrapMoveText(body, lineLength)}\n\n\n`;
}
