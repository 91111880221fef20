import type { ExecutionResult, Problem, SessionErrorKind, SessionStatus } from './types';

export type StartEvent = { type: 'start'; sessionId: string; problem: Problem; maxAttempts: number };
export type StatusEvent = { type: 'status'; message: string };
export type RationaleEvent = { type: 'rationale'; attempt: number; content: string };
export type CodeEvent = { type: 'code'; attempt: number; content: string };
export type IllustrationEvent = { type: 'illustration'; attempt: number; path: string };
export type ResultEvent = { type: 'result'; attempt: number; result: ExecutionResult };
export type DoneEvent = { type: 'done'; sessionId: string; attempt: number; finalCode: string; saveLocation?: string };
export type ErrorEvent = { type: 'error'; sessionId: string; kind: SessionErrorKind; message: string; status: Exclude<SessionStatus, 'running' | 'completed'> };

/** Everything the loop reports, in the order it happens */
export type LoopEvent = StartEvent | StatusEvent | RationaleEvent | CodeEvent | IllustrationEvent | ResultEvent | DoneEvent | ErrorEvent;

export type LoopEventType = LoopEvent['type'];

/** Consumer of the event stream. Each emit is awaited before the next event is produced. */
export interface EventSink {
  emit(event: LoopEvent): void | Promise<void>;
}

/** `done` and `error` end the stream; exactly one of them is emitted per session */
export function isTerminalEvent(event: LoopEvent): event is DoneEvent | ErrorEvent {
  return event.type === 'done' || event.type === 'error';
}
