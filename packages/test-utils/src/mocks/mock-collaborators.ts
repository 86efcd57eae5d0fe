/**
 * In-memory collaborators for the opening DAG
 */

import { normalizeFen } from '@repweave/pgn';
import type { EvalAnnotation, ExplorerStats, OpeningEntry } from '@repweave/core';
import { vi, type Mock } from 'vitest';

export interface MockOpeningBook {
  lookupOpening: Mock<(fen: string) => OpeningEntry | undefined>;
}

export interface MockOpeningBookConfig {
  /** Book entries keyed by FEN; matched on the normalized FEN */
  entries?: Record<string, OpeningEntry>;
  /** Lookups for these exact FENs throw */
  failureFens?: Set<string>;
}

/**
 * Create an opening book backed by a plain object
 */
export function createMockOpeningBook(config: MockOpeningBookConfig = {}): MockOpeningBook {
  const { entries = {}, failureFens = new Set<string>() } = config;
  const byNormalizedFen = new Map<string, OpeningEntry>();
  for (const [fen, entry] of Object.entries(entries)) {
    byNormalizedFen.set(normalizeFen(fen), entry);
  }

  return {
    lookupOpening: vi.fn((fen: string) => {
      if (failureFens.has(fen)) {
        throw new Error(`Opening lookup failed for position: ${fen}`);
      }
      return byNormalizedFen.get(normalizeFen(fen));
    }),
  };
}

export interface MockEvaluator {
  evaluate: Mock<(fen: string) => EvalAnnotation | undefined>;
}

export interface MockEvaluatorConfig {
  /** Evaluations keyed by exact FEN */
  responses?: Map<string, EvalAnnotation>;
  /** Evaluations for these FENs throw */
  failureFens?: Set<string>;
}

/**
 * Create an evaluator that answers from a fixed map
 */
export function createMockEvaluator(config: MockEvaluatorConfig = {}): MockEvaluator {
  const { responses = new Map<string, EvalAnnotation>(), failureFens = new Set<string>() } =
    config;

  return {
    evaluate: vi.fn((fen: string) => {
      if (failureFens.has(fen)) {
        throw new Error(`Engine evaluation failed for position: ${fen}`);
      }
      return responses.get(fen);
    }),
  };
}

export interface RecordingWriter {
  write: Mock<(text: string) => void>;
  /** Each write, in order */
  chunks: string[];
  /** Everything written so far */
  text(): string;
}

/**
 * Create a writer that keeps everything written to it
 */
export function createRecordingWriter(): RecordingWriter {
  const chunks: string[] = [];
  return {
    write: vi.fn((text: string) => {
      chunks.push(text);
    }),
    chunks,
    text: () => chunks.join(''),
  };
}

export interface MockExplorer {
  explore: Mock<(fen: string) => Promise<ExplorerStats>>;
}

/**
 * Create an explorer that answers from move counts keyed by FEN
 *
 * Positions are matched on the normalized FEN; unknown ones have no games.
 * Each entry maps a SAN move to its game count.
 */
export function createMockExplorer(counts: Record<string, Record<string, number>> = {}): MockExplorer {
  const byNormalizedFen = new Map<string, ExplorerStats>();
  for (const [fen, moves] of Object.entries(counts)) {
    const sorted = Object.entries(moves)
      .map(([san, games]) => ({ san, games }))
      .sort((a, b) => b.games - a.games);
    const total = sorted.reduce((sum, move) => sum + move.games, 0);
    byNormalizedFen.set(normalizeFen(fen), { total, moves: sorted });
  }

  return {
    explore: vi.fn(async (fen: string) => byNormalizedFen.get(normalizeFen(fen)) ?? { total: 0, moves: [] }),
  };
}
