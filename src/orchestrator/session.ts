import crypto from 'crypto';
import { FixloopError } from '../utils/errors';
import type { AttemptRecord, ExecutionResult, IllustrationRecord, Problem, SessionError, SessionSnapshot, SessionStatus } from './types';

export class SessionInvariantError extends FixloopError {
  constructor(message: string) {
    super(message, 'SESSION_INVARIANT');
    this.name = 'SessionInvariantError';
  }
}

/**
 * In-memory session owned by the correction loop. Enforces ordering of
 * attempts, one attempt in flight at a time, and monotonic status.
 */
export class Session {
  readonly id: string;
  readonly problem: Problem;
  readonly maxAttempts: number;
  readonly startedAt: string;
  private attempts: AttemptRecord[] = [];
  private illustrations: IllustrationRecord[] = [];
  private status: SessionStatus = 'running';
  private finalCode?: string;
  private endedAt?: string;
  private error?: SessionError;

  constructor(problem: Problem, maxAttempts: number, id: string = crypto.randomUUID()) {
    this.id = id;
    this.problem = Object.freeze({ statement: problem.statement, tests: problem.tests });
    this.maxAttempts = maxAttempts;
    this.startedAt = new Date().toISOString();
  }

  getStatus(): SessionStatus {
    return this.status;
  }

  get attemptCount(): number {
    return this.attempts.length;
  }

  startAttempt(rationale: string, code: string): AttemptRecord {
    this.assertRunning();

    const inFlight = this.attempts.find((a) => !a.result);
    if (inFlight) {
      throw new SessionInvariantError(`Attempt ${inFlight.index} is still in flight`);
    }
    if (this.attempts.length >= this.maxAttempts) {
      throw new SessionInvariantError(`Session allows at most ${this.maxAttempts} attempts`);
    }

    const attempt: AttemptRecord = {
      index: this.attempts.length + 1,
      rationale,
      code,
      startedAt: new Date().toISOString(),
    };
    this.attempts.push(attempt);
    return { ...attempt };
  }

  recordResult(index: number, result: ExecutionResult): void {
    this.assertRunning();

    const attempt = this.attempts[index - 1];
    if (!attempt) {
      throw new SessionInvariantError(`Attempt ${index} does not exist`);
    }
    if (attempt.result) {
      throw new SessionInvariantError(`Attempt ${index} already has a result`);
    }

    attempt.result = { ...result };
    attempt.finishedAt = new Date().toISOString();
  }

  recordIllustration(attempt: number, path: string): void {
    this.illustrations.push({ attempt, path });
  }

  complete(index: number): void {
    const attempt = this.attempts[index - 1];
    if (!attempt?.result?.succeeded) {
      throw new SessionInvariantError(`Attempt ${index} did not succeed`);
    }
    this.end('completed');
    this.finalCode = attempt.code;
  }

  fail(error: SessionError): void {
    this.end('failed');
    this.error = { ...error };
  }

  abort(error: SessionError): void {
    this.end('aborted');
    this.error = { ...error };
  }

  snapshot(): SessionSnapshot {
    return structuredClone({
      id: this.id,
      problem: { statement: this.problem.statement, tests: this.problem.tests },
      maxAttempts: this.maxAttempts,
      attempts: this.attempts,
      status: this.status,
      finalCode: this.finalCode,
      startedAt: this.startedAt,
      endedAt: this.endedAt,
      error: this.error,
      illustrations: this.illustrations,
    });
  }

  private end(status: Exclude<SessionStatus, 'running'>): void {
    this.assertRunning();
    this.status = status;
    this.endedAt = new Date().toISOString();
  }

  private assertRunning(): void {
    if (this.status !== 'running') {
      throw new SessionInvariantError(`Session ${this.id} has already ended (${this.status})`);
    }
  }
}
