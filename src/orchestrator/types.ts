import type { Problem } from '../agents/types';
import type { ExecutionResult } from '../testing/types';
import type { SessionStatus } from './states';

export type { Problem, ExecutionResult, SessionStatus };

/** Why a session ended without a solution */
export type SessionErrorKind = 'oracle_fault' | 'empty_generation' | 'attempts_exhausted';

export interface SessionError {
  kind: SessionErrorKind;
  message: string;
  /** Stable error code of the underlying fault, when there was one */
  code?: string;
}

/** One generate-then-execute cycle */
export interface AttemptRecord {
  index: number;
  rationale: string;
  code: string;
  /** Absent while executing, and forever when the attempt never ran */
  result?: ExecutionResult;
  startedAt: string;
  finishedAt?: string;
}

export interface IllustrationRecord {
  attempt: number;
  path: string;
}

/** Read-only copy of a session handed to sinks and recorders */
export interface SessionSnapshot {
  id: string;
  problem: Problem;
  maxAttempts: number;
  attempts: AttemptRecord[];
  status: SessionStatus;
  finalCode?: string;
  startedAt: string;
  endedAt?: string;
  error?: SessionError;
  illustrations: IllustrationRecord[];
}

/** Write-only persistence interface. The loop never reads back what it records. */
export interface SessionRecorder {
  record(snapshot: SessionSnapshot): Promise<void>;
}
