import { FixloopError } from '../utils/errors';

/** The isolation backend cannot provision units. Fatal; raised before any session starts. */
export class IsolationUnavailableError extends FixloopError {
  constructor(
    public readonly backend: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super(`Isolation backend "${backend}" is unavailable: ${reason}`, 'ISOLATION_UNAVAILABLE', options);
    this.name = 'IsolationUnavailableError';
  }
}
