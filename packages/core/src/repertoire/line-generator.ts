/**
 * Line generation from opening-explorer statistics
 *
 * Walks forward from a start line. Where the repertoire side is to move the
 * known repertoire move is played; where the opponent is to move every reply
 * reaching `threshold` of the start position's games is followed. Each walk
 * that cannot go further yields one line ending on a repertoire move.
 */

import { ChessPosition, fenTurn, normalizeFen, type GameLine } from '@repweave/pgn';

import type { ExplorerStats, OpeningExplorer, RepertoireColor } from './types.js';

export const DEFAULT_THRESHOLD = 0.02;
export const DEFAULT_MIN_GAMES = 200;

/**
 * What to play where the repertoire has no move: stop there, or take the
 * explorer's most played move
 */
export type MovePick = 'gap' | 'popular';

export interface LineGeneratorOptions {
  color: RepertoireColor;
  explorer: OpeningExplorer;
  /** The repertoire move for a position, if known */
  knownMove: (fen: string) => string | undefined;
  /** Longest line in plies, start moves included */
  maxDepth: number;
  /** Smallest share of the start position's games worth following */
  threshold?: number;
  /** Opponent positions with fewer games are not expanded */
  minGames?: number;
  pick?: MovePick;
}

/**
 * A position reached by generation where the repertoire has no move
 */
export interface RepertoireGap {
  fen: string;
  moves: string[];
  /** Share of the start position's games reaching the gap */
  share: number;
}

export interface GeneratedLines {
  lines: GameLine[];
  gaps: RepertoireGap[];
}

/**
 * Play one more move onto a line
 * @throws IllegalMoveError if the move is not legal
 */
export function extendLine(line: GameLine, san: string): GameLine {
  const fen = line.positions[line.positions.length - 1] ?? line.startFen;
  const result = ChessPosition.fromFen(fen).move(san);
  return {
    startFen: line.startFen,
    moves: [...line.moves, result.san],
    positions: [...line.positions, result.fenAfter],
  };
}

export class LineGenerator {
  private readonly color: RepertoireColor;
  private readonly explorer: OpeningExplorer;
  private readonly knownMove: (fen: string) => string | undefined;
  private readonly maxDepth: number;
  private readonly threshold: number;
  private readonly minGames: number;
  private readonly pick: MovePick;

  /** Normalized FEN -> explorer answer */
  private readonly statsCache = new Map<string, ExplorerStats>();
  /** Normalized FEN -> move chosen by popularity */
  private readonly picked = new Map<string, string>();
  private requestCount = 0;

  constructor(options: LineGeneratorOptions) {
    this.color = options.color;
    this.explorer = options.explorer;
    this.knownMove = options.knownMove;
    this.maxDepth = options.maxDepth;
    this.threshold = options.threshold ?? DEFAULT_THRESHOLD;
    this.minGames = options.minGames ?? DEFAULT_MIN_GAMES;
    this.pick = options.pick ?? 'gap';
  }

  /**
   * Explorer requests made so far; positions are asked about once
   */
  get requests(): number {
    return this.requestCount;
  }

  /**
   * Generate every line below `start`, in walk order.
   *
   * Shares are tracked per path; a transposition does not add the shares of
   * the paths that reach it.
   */
  async generate(start: GameLine): Promise<GeneratedLines> {
    const out: GeneratedLines = { lines: [], gaps: [] };
    await this.walk(start, 1, out);
    return out;
  }

  /** @returns Whether any line was produced below `line` */
  private async walk(line: GameLine, share: number, out: GeneratedLines): Promise<boolean> {
    if (line.moves.length >= this.maxDepth) {
      return false;
    }
    const fen = line.positions[line.positions.length - 1] ?? line.startFen;
    return fenTurn(fen) === this.color
      ? this.walkRepertoireMove(line, fen, share, out)
      : this.walkReplies(line, fen, share, out);
  }

  private async walkRepertoireMove(
    line: GameLine,
    fen: string,
    share: number,
    out: GeneratedLines,
  ): Promise<boolean> {
    const move = await this.selectMove(fen);
    if (move === undefined) {
      out.gaps.push({ fen, moves: [...line.moves], share });
      return false;
    }

    const child = extendLine(line, move);
    if (!(await this.walk(child, share, out))) {
      out.lines.push(child);
    }
    return true;
  }

  private async walkReplies(
    line: GameLine,
    fen: string,
    share: number,
    out: GeneratedLines,
  ): Promise<boolean> {
    const stats = await this.stats(fen);
    if (stats.total < this.minGames) {
      return false;
    }

    let produced = false;
    for (const reply of stats.moves) {
      const childShare = (share * reply.games) / stats.total;
      if (childShare < this.threshold) {
        continue;
      }
      if (await this.walk(extendLine(line, reply.san), childShare, out)) {
        produced = true;
      }
    }
    return produced;
  }

  private async selectMove(fen: string): Promise<string | undefined> {
    const known = this.knownMove(fen) ?? this.picked.get(normalizeFen(fen));
    if (known !== undefined || this.pick === 'gap') {
      return known;
    }

    const popular = (await this.stats(fen)).moves[0]?.san;
    if (popular !== undefined) {
      this.picked.set(normalizeFen(fen), popular);
    }
    return popular;
  }

  private async stats(fen: string): Promise<ExplorerStats> {
    const key = normalizeFen(fen);
    const cached = this.statsCache.get(key);
    if (cached) {
      return cached;
    }
    this.requestCount++;
    const stats = await this.explorer.explore(fen);
    this.statsCache.set(key, stats);
    return stats;
  }
}
