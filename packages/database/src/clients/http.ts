/**
 * JSON GET with rate-limit retries, shared by the lichess clients
 */

/**
 * Timeout and 429 handling for one service
 */
export interface RetryPolicy {
  /** Per-request timeout in milliseconds */
  timeoutMs: number;
  /** Retries after a 429 before giving up */
  maxRetries: number;
  /** Wait before retrying a rate-limited request */
  retryDelayMs: number;
}

/**
 * Injectable I/O for tests
 */
export interface HttpDeps {
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

export type JsonResult = { found: false } | { found: true; body: unknown };

export interface JsonRequest {
  url: string;
  headers: Record<string, string>;
  /** Service name used at the start of error messages */
  service: string;
  /** Builds the error thrown on failure */
  fail: (message: string, status?: number) => Error;
  /** Decode the body; defaults to a single JSON document */
  decode?: (text: string) => unknown;
}

export function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * GET a JSON document.
 *
 * A 404 yields `{ found: false }`. A 429 is retried after `retryDelayMs`
 * up to `maxRetries` times.
 */
export async function getJson(
  request: JsonRequest,
  policy: RetryPolicy,
  io: Required<HttpDeps>,
): Promise<JsonResult> {
  const { url, service, fail } = request;

  for (let attempt = 0; ; attempt++) {
    let response: Response;
    try {
      response = await io.fetch(url, {
        headers: request.headers,
        signal: AbortSignal.timeout(policy.timeoutMs),
      });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw fail(`${service} request failed: ${reason}`);
    }

    if (response.status === 429) {
      if (attempt >= policy.maxRetries) {
        throw fail(`${service} still rate-limited after ${policy.maxRetries} retries`, 429);
      }
      await io.sleep(policy.retryDelayMs);
      continue;
    }

    if (response.status === 404) {
      return { found: false };
    }

    if (!response.ok) {
      throw fail(`${service} returned HTTP ${response.status}`, response.status);
    }

    const text = await response.text();
    try {
      return { found: true, body: request.decode ? request.decode(text) : JSON.parse(text) };
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw fail(`${service} sent a body that is not JSON: ${reason}`);
    }
  }
}
