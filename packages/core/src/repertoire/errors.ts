/**
 * Error classes for the repertoire engine
 */

/**
 * A broken internal contract: malformed input lines, conflicting node
 * identities, or move runs that cannot share a record.
 *
 * These are never caught inside the engine; continuing would corrupt output.
 */
export class InvariantViolationError extends Error {
  constructor(
    message: string,
    public readonly details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = 'InvariantViolationError';
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InvariantViolationError);
    }
  }
}
