import { describe, it, expect } from 'vitest';

import { STARTING_FEN } from '@repweave/pgn';

import { buildHeaders, formatEvalComment, formatRecord } from '../records.js';

const NOW = new Date('2024-03-01T12:05:09.000Z');

function localDate(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${date.getFullYear()}.${pad(date.getMonth() + 1)}.${pad(date.getDate())}`;
}

describe('buildHeaders', () => {
  it('emits the roster and repertoire tags in order', () => {
    const tags = buildHeaders({
      openingName: 'Ruy Lopez',
      eco: 'C60',
      startFen: STARTING_FEN,
      annotator: 'tester',
      now: NOW,
    });

    expect(tags).toEqual([
      ['Event', 'Ruy Lopez'],
      ['Site', ''],
      ['Date', localDate(NOW)],
      ['Round', '1'],
      ['White', ''],
      ['Black', ''],
      ['Result', '*'],
      ['UTCDate', '2024.03.01'],
      ['UTCTime', '12:05:09'],
      ['Variant', 'Standard'],
      ['ECO', 'C60'],
      ['Annotator', 'tester'],
    ]);
  });

  it('adds FEN and SetUp for a non-initial start', () => {
    const fen = 'rnbqkbnr/pppp1ppp/8/4p3/4P3/8/PPPP1PPP/RNBQKBNR w KQkq - 0 2';
    const tags = buildHeaders({ openingName: '', eco: '', startFen: fen, annotator: 'x', now: NOW });
    expect(tags.slice(-2)).toEqual([
      ['FEN', fen],
      ['SetUp', '1'],
    ]);
  });
});

describe('formatEvalComment', () => {
  it('formats centipawns as pawns with two decimals', () => {
    expect(formatEvalComment({ cp: 25 })).toBe('{ [%eval 0.25] }');
    expect(formatEvalComment({ cp: -130 })).toBe('{ [%eval -1.30] }');
  });

  it('prefers mate', () => {
    expect(formatEvalComment({ mate: -2, cp: 50 })).toBe('{ [%eval #-2] }');
  });

  it('falls back to cp for mate 0', () => {
    expect(formatEvalComment({ mate: 0, cp: 10 })).toBe('{ [%eval 0.10] }');
  });

  it('returns undefined without a score', () => {
    expect(formatEvalComment({ bestMove: 'e4' })).toBeUndefined();
  });
});

describe('formatRecord', () => {
  it('joins headers, move text and result', () => {
    expect(formatRecord([['Event', 'X']], '1. e4')).toBe('[Event "X"]\n\n1. e4 *\n\n\n');
  });

  it('places the eval comment before the result', () => {
    expect(formatRecord([['Event', 'X']], '1. e4', '{ [%eval 0.25] }')).toBe(
      '[Event "X"]\n\n1. e4 { [%eval 0.25] } *\n\n\n',
    );
  });

  it('wraps move text', () => {
    expect(formatRecord([['Event', 'X']], '1. e4 e5 2. Nf3', undefined, 10)).toBe(
      '[Event "X"]\n\n1. e4 e5\n2. Nf3 *\n\n\n',
    );
  });
});
