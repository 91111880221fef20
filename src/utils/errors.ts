/**
 * Base class for every error fixloop raises on purpose.
 * `code` is stable and safe to persist or match on.
 */
export class FixloopError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'FixloopError';
  }
}
