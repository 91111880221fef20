import { FixloopError } from '../utils/errors';

/** The generation backend failed or answered with nothing usable. Ends the session. */
export class OracleFault extends FixloopError {
  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown },
    code = 'ORACLE_FAULT',
  ) {
    super(message, code, options);
    this.name = 'OracleFault';
  }
}

export class OracleTransportError extends OracleFault {
  constructor(message: string, status?: number, cause?: unknown) {
    super(message, status, { cause }, 'ORACLE_TRANSPORT');
    this.name = 'OracleTransportError';
  }
}

export class OracleAuthenticationError extends OracleFault {
  constructor(message = 'Authentication with the generation backend failed', status = 401) {
    super(message, status, undefined, 'ORACLE_AUTH');
    this.name = 'OracleAuthenticationError';
  }
}

export class OracleQuotaError extends OracleFault {
  constructor(message = 'Generation quota or rate limit exceeded') {
    super(message, 429, undefined, 'ORACLE_QUOTA');
    this.name = 'OracleQuotaError';
  }
}

export class OracleEmptyResponseError extends OracleFault {
  constructor(reason?: string) {
    super(reason ? `Generation backend returned no text (${reason})` : 'Generation backend returned no text', undefined, undefined, 'ORACLE_EMPTY_RESPONSE');
    this.name = 'OracleEmptyResponseError';
  }
}

/** The oracle answered, but no code could be extracted from the answer */
export class EmptyGenerationError extends FixloopError {
  constructor(public readonly attempt: number) {
    super(`Oracle returned no code for attempt ${attempt}`, 'EMPTY_GENERATION');
    this.name = 'EmptyGenerationError';
  }
}
