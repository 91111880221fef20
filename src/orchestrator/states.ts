export type CoreState = 'INIT' | 'GENERATING' | 'EXECUTING' | 'EVALUATING';

export type TerminalState = 'COMPLETED' | 'FAILED' | 'ABORTED';

export type State = CoreState | TerminalState;

export type Trigger = 'START' | 'GENERATED' | 'EXECUTED' | 'SUCCEED' | 'RETRY' | 'EXHAUST' | 'ABORT';

export type SessionStatus = 'running' | 'completed' | 'failed' | 'aborted';

/** Allowed transitions per state. Terminal states accept nothing. */
export const transitions: Record<State, Partial<Record<Trigger, State>>> = {
  INIT: { START: 'GENERATING' },
  GENERATING: { GENERATED: 'EXECUTING', ABORT: 'ABORTED' },
  EXECUTING: { EXECUTED: 'EVALUATING' },
  EVALUATING: { SUCCEED: 'COMPLETED', RETRY: 'GENERATING', EXHAUST: 'FAILED' },
  COMPLETED: {},
  FAILED: {},
  ABORTED: {},
};
