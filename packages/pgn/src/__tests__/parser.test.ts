import { describe, it, expect } from 'vitest';

import {
  parsePgn,
  syntaxErrorLocation,
  STARTING_FEN,
  PgnParseError,
  IllegalMoveError,
} from '../index.js';

const AFTER_E4 = 'rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq - 0 1';
const AFTER_E4_E5 = 'rnbqkbnr/pppp1ppp/8/4p3/4P3/8/PPPP1PPP/RNBQKBNR w KQkq - 0 2';

function sans(pgn: string): string[] {
  return parsePgn(pgn)[0]?.moves.map((move) => move.san) ?? [];
}

describe('PGN Parser', () => {
  describe('moves', () => {
    it('reads pawn and piece moves in order', () => {
      expect(sans('1. e4 e5 2. Nf3 Nc6 3. Bc4 Nf6 *')).toEqual([
        'e4',
        'e5',
        'Nf3',
        'Nc6',
        'Bc4',
        'Nf6',
      ]);
    });

    it('reads captures and castling', () => {
      expect(sans('1. e4 d5 2. exd5 Qxd5 3. Nc3 Qa5 4. Nf3 Nf6 5. Be2 Bg4 6. O-O *')).toEqual([
        'e4',
        'd5',
        'exd5',
        'Qxd5',
        'Nc3',
        'Qa5',
        'Nf3',
        'Nf6',
        'Be2',
        'Bg4',
        'O-O',
      ]);
    });

    it('returns canonical SAN with check suffixes', () => {
      const pgn = `[FEN "8/P7/8/8/8/8/8/K6k w - - 0 1"]

1. a8=Q *`;
      expect(sans(pgn)).toEqual(['a8=Q+']);
      expect(sans('1. f3 e5 2. g4 Qh4# 0-1')).toEqual(['f3', 'e5', 'g4', 'Qh4#']);
    });

    it('ignores comments and NAGs', () => {
      expect(sans('1. e4 {Best by test} $1 e5 $2 {Solid} *')).toEqual(['e4', 'e5']);
    });

    it('chains the positions around each move', () => {
      const [game] = parsePgn('1. e4 e5 2. Nf3 *');
      const moves = game?.moves ?? [];

      expect(moves.map((move) => [move.fenBefore, move.fenAfter])).toEqual([
        [STARTING_FEN, AFTER_E4],
        [AFTER_E4, AFTER_E4_E5],
        [AFTER_E4_E5, 'rnbqkbnr/pppp1ppp/8/4p3/4P3/5N2/PPPP1PPP/RNBQKB1R b KQkq - 1 2'],
      ]);
    });
  });

  describe('start position', () => {
    it('defaults to the standard starting position', () => {
      expect(parsePgn('1. e4 *')[0]?.startFen).toBe(STARTING_FEN);
    });

    it('uses the FEN tag when present', () => {
      const pgn = `[FEN "${AFTER_E4_E5}"]
[SetUp "1"]

2. Nf3 *`;

      const [game] = parsePgn(pgn);

      expect(game?.startFen).toBe(AFTER_E4_E5);
      expect(game?.moves[0]?.fenBefore).toBe(AFTER_E4_E5);
    });
  });

  describe('variations', () => {
    it('attaches variations to the move they replace', () => {
      const [game] = parsePgn('1. e4 e5 (1... c5 2. Nf3) 2. Nf3 *');
      const moves = game?.moves ?? [];

      expect(moves.map((move) => move.san)).toEqual(['e4', 'e5', 'Nf3']);
      const variations = moves[1]?.variations ?? [];
      expect(variations.map((variation) => variation.map((move) => move.san))).toEqual([
        ['c5', 'Nf3'],
      ]);
      expect(variations[0]?.[0]?.fenBefore).toBe(AFTER_E4);
    });

    it('reads nested variations', () => {
      const [game] = parsePgn('1. d4 d5 (1... Nf6 2. c4 (2. Nf3 g6) 2... e6) 2. c4 *');
      const outer = game?.moves[1]?.variations?.[0] ?? [];

      expect(outer.map((move) => move.san)).toEqual(['Nf6', 'c4', 'e6']);
      expect(outer[1]?.variations?.[0]?.map((move) => move.san)).toEqual(['Nf3', 'g6']);
    });

    it('leaves variations undefined on moves without alternatives', () => {
      expect(parsePgn('1. e4 e5 *')[0]?.moves[0]?.variations).toBeUndefined();
    });
  });

  describe('multi-game files', () => {
    it('reads every game', () => {
      const pgn = `[Event "Game 1"]
[Result "1-0"]

1. e4 1-0

[Event "Game 2"]
[Result "0-1"]

1. d4 0-1`;

      const games = parsePgn(pgn);

      expect(games.map((game) => game.moves.map((move) => move.san))).toEqual([['e4'], ['d4']]);
    });
  });

  describe('empty input', () => {
    it('returns no games for blank text', () => {
      expect(parsePgn('')).toEqual([]);
      expect(parsePgn('   \n\n   ')).toEqual([]);
    });
  });

  describe('errors', () => {
    it('throws PgnParseError with a location for malformed PGN', () => {
      const error = (() => {
        try {
          parsePgn('[Event "Unclosed tag');
          return undefined;
        } catch (err) {
          return err;
        }
      })();

      expect(error).toBeInstanceOf(PgnParseError);
      expect(error).toMatchObject({ location: { line: 1 } });
    });

    it('names the game holding an illegal move', () => {
      const pgn = `[Event "Game 1"]

1. e4 e5 *

[Event "Game 2"]

1. e4 e4 *`;

      expect(() => parsePgn(pgn)).toThrow(IllegalMoveError);
      expect(() => parsePgn(pgn)).toThrow(`Illegal move "e4" in game 2 (position ${AFTER_E4})`);
    });

    it('rejects an illegal move inside a variation', () => {
      expect(() => parsePgn('1. e4 (1. e5) e5 *')).toThrow(IllegalMoveError);
    });
  });
});

describe('syntaxErrorLocation', () => {
  it('reads the start of a grammar error location', () => {
    const err = Object.assign(new Error('Expected "]"'), {
      location: { start: { offset: 20, line: 3, column: 7 }, end: { offset: 21, line: 3, column: 8 } },
    });
    expect(syntaxErrorLocation(err)).toEqual({ line: 3, column: 7 });
  });

  it('returns undefined for errors without a location', () => {
    expect(syntaxErrorLocation(new Error('boom'))).toBeUndefined();
    expect(syntaxErrorLocation('boom')).toBeUndefined();
    expect(syntaxErrorLocation({ location: { start: { line: '3' } } })).toBeUndefined();
  });
});
