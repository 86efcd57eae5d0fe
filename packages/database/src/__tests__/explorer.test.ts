import { describe, it, expect, vi } from 'vitest';

import { ExplorerClient, lastJsonDocument } from '../clients/explorer.js';
import { ExplorerError } from '../errors.js';

const STARTING_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';

const STARTING_STATS = {
  white: 500,
  draws: 100,
  black: 400,
  moves: [
    { uci: 'd2d4', san: 'd4', averageRating: 2300, white: 150, draws: 40, black: 110 },
    { uci: 'e2e4', san: 'e4', averageRating: 2310, white: 300, draws: 50, black: 250 },
    { uci: 'g1f3', san: 'Nf3', averageRating: 2320, white: 50, draws: 10, black: 40 },
  ],
  topGames: [],
  opening: null,
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function createClient(responses: Array<Response | Error>, token?: string) {
  const fetchMock = vi.fn<typeof fetch>();
  for (const response of responses) {
    if (response instanceof Error) {
      fetchMock.mockRejectedValueOnce(response);
    } else {
      fetchMock.mockResolvedValueOnce(response);
    }
  }
  const sleep = vi.fn(async (_ms: number) => undefined);
  const client = new ExplorerClient(
    { maxRetries: 1, ...(token ? { token } : {}) },
    { fetch: fetchMock, sleep },
  );
  return { client, fetchMock, sleep };
}

describe('ExplorerClient', () => {
  it('builds the request URL with rating and speed filters', () => {
    const client = new ExplorerClient();
    expect(client.buildUrl(STARTING_FEN)).toBe(
      'https://explorer.lichess.ovh/lichess?variant=standard' +
        '&fen=rnbqkbnr%2Fpppppppp%2F8%2F8%2F8%2F8%2FPPPPPPPP%2FRNBQKBNR+w+KQkq+-+0+1' +
        '&ratings=2200%2C2500&speeds=blitz%2Crapid%2Cclassical',
    );
  });

  it('totals the games and orders moves by popularity', async () => {
    const { client } = createClient([jsonResponse(STARTING_STATS)]);

    const position = await client.explore(STARTING_FEN);

    expect(position.total).toBe(1000);
    expect(position.moves.map((move) => [move.san, move.games])).toEqual([
      ['e4', 600],
      ['d4', 300],
      ['Nf3', 100],
    ]);
    expect(position.opening).toBeUndefined();
  });

  it('keeps the opening the explorer names', async () => {
    const { client } = createClient([
      jsonResponse({ ...STARTING_STATS, opening: { eco: 'A00', name: 'Start' } }),
    ]);
    const position = await client.explore(STARTING_FEN);
    expect(position.opening).toEqual({ eco: 'A00', name: 'Start' });
  });

  it('reads the last document of a streamed answer', async () => {
    const partial = JSON.stringify({ ...STARTING_STATS, white: 1, draws: 0, black: 0 });
    const body = `${partial}\n${JSON.stringify(STARTING_STATS)}\n`;
    const { client } = createClient([new Response(body, { status: 200 })]);

    await expect(client.explore(STARTING_FEN)).resolves.toMatchObject({ total: 1000 });
  });

  it('sends the token as a bearer header', async () => {
    const { client, fetchMock } = createClient([jsonResponse(STARTING_STATS)], 'test-secret');

    await client.explore(STARTING_FEN);

    expect(fetchMock.mock.calls[0]?.[1]?.headers).toEqual({
      Accept: 'application/json',
      Authorization: 'Bearer test-secret',
    });
  });

  it('treats an unknown position as having no games', async () => {
    const { client } = createClient([jsonResponse({ error: 'Not found' }, 404)]);
    await expect(client.explore(STARTING_FEN)).resolves.toEqual({ total: 0, moves: [] });
  });

  it('retries once when rate-limited and then gives up', async () => {
    const { client, fetchMock, sleep } = createClient([
      jsonResponse({}, 429),
      jsonResponse({}, 429),
    ]);

    const error = await client.explore(STARTING_FEN).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ExplorerError);
    expect(error).toMatchObject({
      message: 'Opening explorer still rate-limited after 1 retries',
      status: 429,
    });
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(60000);
  });

  it('rejects a body that is not JSON', async () => {
    const { client } = createClient([new Response('<html>', { status: 200 })]);
    await expect(client.explore(STARTING_FEN)).rejects.toThrow(
      /^Opening explorer sent a body that is not JSON/,
    );
  });

  it('rejects a body of the wrong shape', async () => {
    const { client } = createClient([jsonResponse({ moves: 'none' })]);
    await expect(client.explore(STARTING_FEN)).rejects.toThrow(ExplorerError);
  });
});

describe('lastJsonDocument', () => {
  it('skips blank lines', () => {
    expect(lastJsonDocument('{"a":1}\n\n{"a":2}\n  \n')).toEqual({ a: 2 });
  });

  it('throws on an empty body', () => {
    expect(() => lastJsonDocument('\n')).toThrow('empty body');
  });
});
