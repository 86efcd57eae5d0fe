import { describe, it, expect } from 'vitest';

import {
  expandVariations,
  parsePgn,
  parsePgnLines,
  parseMoveText,
  IllegalMoveError,
  STARTING_FEN,
} from '../index.js';

describe('game lines', () => {
  describe('expandVariations', () => {
    it('returns the main line alone when there are no variations', () => {
      const [game] = parsePgn('1. e4 e5 2. Nf3 *');
      const lines = expandVariations(game!);

      expect(lines.length).toBe(1);
      expect(lines[0]!.moves).toEqual(['e4', 'e5', 'Nf3']);
      expect(lines[0]!.positions.length).toBe(4);
      expect(lines[0]!.positions[0]).toBe(STARTING_FEN);
      expect(lines[0]!.positions[3]).toBe(
        'rnbqkbnr/pppp1ppp/8/4p3/4P3/5N2/PPPP1PPP/RNBQKB1R b KQkq - 1 2',
      );
    });

    it('expands a variation with the shared prefix', () => {
      const [game] = parsePgn('1. e4 e5 (1... c5 2. Nf3) 2. Nf3 *');
      const lines = expandVariations(game!);

      expect(lines.map((line) => line.moves)).toEqual([
        ['e4', 'e5', 'Nf3'],
        ['e4', 'c5', 'Nf3'],
      ]);
      expect(lines[1]!.positions[2]).toBe(
        'rnbqkbnr/pp1ppppp/8/2p5/4P3/8/PPPP1PPP/RNBQKBNR w KQkq - 0 2',
      );
    });

    it('expands nested variations after their parent variation', () => {
      const [game] = parsePgn('1. d4 d5 (1... Nf6 2. c4 (2. Nf3 g6) 2... e6) 2. c4 *');
      const lines = expandVariations(game!);

      expect(lines.map((line) => line.moves)).toEqual([
        ['d4', 'd5', 'c4'],
        ['d4', 'Nf6', 'c4', 'e6'],
        ['d4', 'Nf6', 'Nf3', 'g6'],
      ]);
    });

    it('returns no lines for a game without moves', () => {
      const [game] = parsePgn('[Result "*"]\n\n*');
      expect(expandVariations(game!)).toEqual([]);
    });
  });

  describe('parsePgnLines', () => {
    it('expands every game in the input', () => {
      const pgn = `[Result "*"]

1. e4 *

[Result "*"]

1. d4 (1. c4) *`;

      expect(parsePgnLines(pgn).map((line) => line.moves)).toEqual([['e4'], ['d4'], ['c4']]);
    });
  });

  describe('parseMoveText', () => {
    it('plays numbered move text from the starting position', () => {
      const line = parseMoveText('1. d4 d5 2. c4');

      expect(line.startFen).toBe(STARTING_FEN);
      expect(line.moves).toEqual(['d4', 'd5', 'c4']);
      expect(line.positions[3]).toBe(
        'rnbqkbnr/ppp1pppp/8/3p4/2PP4/8/PP2PPPP/RNBQKBNR b KQkq - 0 2',
      );
    });

    it('ignores black move markers and a result token', () => {
      const line = parseMoveText('1. e4 1... e5 2. Nf3 *');
      expect(line.moves).toEqual(['e4', 'e5', 'Nf3']);
    });

    it('starts from a given FEN', () => {
      const fen = 'rnbqkbnr/pppp1ppp/8/4p3/4P3/8/PPPP1PPP/RNBQKBNR w KQkq - 0 2';
      const line = parseMoveText('2. Nc3', fen);

      expect(line.startFen).toBe(fen);
      expect(line.positions[1]).toBe(
        'rnbqkbnr/pppp1ppp/8/4p3/4P3/2N5/PPPP1PPP/R1BQKBNR b KQkq - 1 2',
      );
    });

    it('returns an empty line for empty text', () => {
      const line = parseMoveText('');
      expect(line.moves).toEqual([]);
      expect(line.positions).toEqual([STARTING_FEN]);
    });

    it('throws IllegalMoveError on an illegal move', () => {
      expect(() => parseMoveText('1. e4 e4')).toThrow(IllegalMoveError);
    });
  });
});
