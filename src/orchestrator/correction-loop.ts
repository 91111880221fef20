import type { Runtime } from '../config/validator';
import type { Feedback, Generation, GenerationOracle, Problem } from '../agents/types';
import type { Illustrator } from '../agents/illustrator';
import { EmptyGenerationError } from '../agents/errors';
import type { ExecutionResult, IsolatedExecutor } from '../testing/types';
import type { Logger } from '../utils/logger';
import { delay } from '../utils/delay';
import { createSilentLogger, describeError } from '../utils/logger';
import { FixloopError } from '../utils/errors';
import type { DoneEvent, ErrorEvent, EventSink, LoopEvent } from './events';
import { Session } from './session';
import { SessionStateMachine, StateChangeEvent } from './state-machine';
import type { SessionRecorder, SessionSnapshot } from './types';

export interface CorrectionLoopOptions {
  oracle: GenerationOracle;
  executor: IsolatedExecutor;
  maxAttempts: number;
  runtime?: Runtime;
  recorder?: SessionRecorder;
  illustrator?: Illustrator;
  /** How long the terminal event waits for unfinished illustrations (default 2000) */
  illustrationGraceMs?: number;
  logger?: Logger;
}

const DEFAULT_ILLUSTRATION_GRACE_MS = 2_000;

export interface RunOptions {
  /** Use a caller-chosen session id instead of a random one */
  sessionId?: string;
  /** Where the caller will keep the solution; carried by the `done` event */
  saveLocation?: string;
}

interface IllustrationTracker {
  pending: Promise<void>[];
  /** Set once the terminal event is on its way */
  closed: boolean;
}

/**
 * Serialises emits so the sink sees one event at a time, in order, even when
 * an illustration finishes while the loop is busy. A failing sink is logged
 * and never changes the loop's outcome.
 */
class OrderedEmitter {
  private tail: Promise<void> = Promise.resolve();

  constructor(
    private sink: EventSink,
    private logger: Logger,
  ) {}

  emit(event: LoopEvent): Promise<void> {
    this.tail = this.tail.then(async () => {
      try {
        await this.sink.emit(event);
      } catch (error) {
        this.logger.warn('Event sink failed', { event: event.type, error: describeError(error) });
      }
    });
    return this.tail;
  }
}

/**
 * Generate → execute → evaluate → feed back, until a candidate passes, the
 * attempts run out, or the oracle fails.
 *
 *  - attempt k > 1 is generated from attempt k-1's code and output only
 *  - oracle faults and empty generations abort at once without using a retry
 *  - failed and timed-out executions are ordinary results that drive a retry
 *  - every session ends with exactly one `done` or `error` event
 */
export class CorrectionLoop {
  private oracle: GenerationOracle;
  private executor: IsolatedExecutor;
  private maxAttempts: number;
  private runtime: Runtime;
  private recorder?: SessionRecorder;
  private illustrator?: Illustrator;
  private illustrationGraceMs: number;
  private logger: Logger;

  constructor(options: CorrectionLoopOptions) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${options.maxAttempts}`);
    }

    this.oracle = options.oracle;
    this.executor = options.executor;
    this.maxAttempts = options.maxAttempts;
    this.runtime = options.runtime ?? 'python';
    this.recorder = options.recorder;
    this.illustrator = options.illustrator;
    this.illustrationGraceMs = options.illustrationGraceMs ?? DEFAULT_ILLUSTRATION_GRACE_MS;
    this.logger = options.logger ?? createSilentLogger();
  }

  async run(problem: Problem, sink: EventSink, runOptions: RunOptions = {}): Promise<SessionSnapshot> {
    const session = new Session(problem, this.maxAttempts, runOptions.sessionId);
    const machine = new SessionStateMachine(session.id);
    const emitter = new OrderedEmitter(sink, this.logger);
    const illustrations: IllustrationTracker = { pending: [], closed: false };

    machine.events.on('stateChange', (event: StateChangeEvent) => {
      this.logger.debug('State transition', { from: event.from, to: event.to, trigger: event.trigger });
    });

    const finish = async (terminal: DoneEvent | ErrorEvent): Promise<SessionSnapshot> => {
      await this.settleIllustrations(illustrations);
      await this.record(session);
      await emitter.emit(terminal);
      this.logger.info('Session finished', { sessionId: session.id, status: session.getStatus(), attempts: session.attemptCount });
      return session.snapshot();
    };

    this.logger.info('Starting session', { sessionId: session.id, maxAttempts: this.maxAttempts });
    machine.transition('START');
    await this.record(session);
    await emitter.emit({ type: 'start', sessionId: session.id, problem: session.problem, maxAttempts: this.maxAttempts });

    let previous: Feedback | undefined;

    for (let index = 1; ; index++) {
      await emitter.emit({ type: 'status', message: `Attempt ${index}/${this.maxAttempts}: generating...` });

      // ── Generate ──
      let generation: Generation;
      try {
        generation = await this.oracle.generate({ problem: session.problem, attempt: index, runtime: this.runtime, previous });
      } catch (error) {
        const message = `Error calling the generation oracle: ${describeError(error)}. Aborting.`;
        this.logger.error('Oracle fault', { attempt: index, error: describeError(error) });
        machine.transition('ABORT');
        session.abort({ kind: 'oracle_fault', message, code: error instanceof FixloopError ? error.code : undefined });
        return finish({ type: 'error', sessionId: session.id, kind: 'oracle_fault', message, status: 'aborted' });
      }

      if (!generation.code.trim()) {
        const fault = new EmptyGenerationError(index);
        this.logger.error('Oracle returned no code', { attempt: index });
        machine.transition('ABORT');
        session.startAttempt(generation.rationale, generation.code);
        session.abort({ kind: 'empty_generation', message: `${fault.message}. Aborting.`, code: fault.code });
        return finish({ type: 'error', sessionId: session.id, kind: 'empty_generation', message: `${fault.message}. Aborting.`, status: 'aborted' });
      }

      machine.transition('GENERATED');
      const attempt = session.startAttempt(generation.rationale, generation.code);
      await this.record(session);

      await emitter.emit({ type: 'rationale', attempt: attempt.index, content: attempt.rationale });
      await emitter.emit({ type: 'code', attempt: attempt.index, content: attempt.code });
      this.startIllustration(session, attempt.index, attempt.rationale, emitter, illustrations);

      // ── Execute ──
      await emitter.emit({ type: 'status', message: `Attempt ${index}/${this.maxAttempts}: executing in isolation...` });
      const result = await this.execute(attempt.code, session.problem.tests);
      machine.transition('EXECUTED');
      session.recordResult(attempt.index, result);
      await this.record(session);
      await emitter.emit({ type: 'result', attempt: attempt.index, result });

      // ── Evaluate ──
      if (result.succeeded) {
        machine.transition('SUCCEED');
        session.complete(attempt.index);
        await emitter.emit({ type: 'status', message: 'All tests passed. Problem solved.' });
        return finish({ type: 'done', sessionId: session.id, attempt: attempt.index, finalCode: attempt.code, saveLocation: runOptions.saveLocation });
      }

      if (index >= this.maxAttempts) {
        const message = `Failed to solve the problem after ${this.maxAttempts} attempts.`;
        machine.transition('EXHAUST');
        session.fail({ kind: 'attempts_exhausted', message });
        return finish({ type: 'error', sessionId: session.id, kind: 'attempts_exhausted', message, status: 'failed' });
      }

      machine.transition('RETRY');
      previous = { attempt: attempt.index, code: attempt.code, stdout: result.stdout, stderr: result.stderr };
    }
  }

  /** The executor contract forbids throwing; anything that slips through is still just a failed run */
  private async execute(code: string, tests: string): Promise<ExecutionResult> {
    const startTime = Date.now();
    try {
      return await this.executor.execute(code, tests);
    } catch (error) {
      this.logger.error('Executor threw instead of reporting a result', { error: describeError(error) });
      return { succeeded: false, stdout: '', stderr: `Execution failed: ${describeError(error)}`, timedOut: false, durationMs: Date.now() - startTime };
    }
  }

  private startIllustration(session: Session, attempt: number, rationale: string, emitter: OrderedEmitter, tracker: IllustrationTracker): void {
    const illustrator = this.illustrator;
    if (!illustrator) return;

    const task = Promise.resolve()
      .then(() => illustrator.illustrate(rationale, { sessionId: session.id, attempt }))
      .then(
      async (filePath) => {
        if (!filePath) return;
        if (tracker.closed) {
          this.logger.debug('Dropping illustration that finished after the session ended', { attempt, path: filePath });
          return;
        }
        session.recordIllustration(attempt, filePath);
        await emitter.emit({ type: 'illustration', attempt, path: filePath });
      },
      (error: unknown) => {
        this.logger.warn('Illustration failed', { attempt, error: describeError(error) });
      },
    );
    tracker.pending.push(task);
  }

  /**
   * Give unfinished illustrations a bounded grace period, then close the
   * tracker so nothing is emitted after the terminal event.
   */
  private async settleIllustrations(tracker: IllustrationTracker): Promise<void> {
    if (tracker.pending.length > 0) {
      const grace = delay(this.illustrationGraceMs);
      const settled = await Promise.race([Promise.allSettled(tracker.pending).then(() => true), grace.promise.then(() => false)]);
      grace.cancel();
      if (!settled) {
        this.logger.warn('Illustrations still pending when the session ended; dropping them', { graceMs: this.illustrationGraceMs });
      }
    }
    tracker.closed = true;
  }

  private async record(session: Session): Promise<void> {
    if (!this.recorder) return;
    try {
      await this.recorder.record(session.snapshot());
    } catch (error) {
      this.logger.warn('Session recorder failed', { sessionId: session.id, error: describeError(error) });
    }
  }
}
