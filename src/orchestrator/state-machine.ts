import { EventEmitter } from 'events';
import { FixloopError } from '../utils/errors';
import { State, Trigger, transitions } from './states';

export interface StateChangeEvent {
  from: State;
  to: State;
  trigger: Trigger;
  sessionId: string;
  timestamp: string;
}

export class StateMachineEvents extends EventEmitter {
  emitTransition(event: StateChangeEvent): void {
    this.emit('stateChange', event);
  }
}

export class InvalidTransitionError extends FixloopError {
  constructor(
    public readonly from: State,
    public readonly trigger: Trigger,
  ) {
    super(`Invalid transition: Trigger [${trigger}] is not valid from state [${from}]`, 'INVALID_TRANSITION');
    this.name = 'InvalidTransitionError';
  }
}

/**
 * Drives one session through INIT → GENERATING → EXECUTING → EVALUATING and
 * on to a terminal state. Lives in memory only; persistence is the
 * recorder's business.
 */
export class SessionStateMachine {
  private state: State = 'INIT';

  public events = new StateMachineEvents();

  constructor(private sessionId: string) {}

  getState(): State {
    return this.state;
  }

  transition(trigger: Trigger): State {
    const fromState = this.state;
    const nextState = transitions[fromState][trigger];

    if (!nextState) {
      throw new InvalidTransitionError(fromState, trigger);
    }

    this.state = nextState;

    this.events.emitTransition({
      from: fromState,
      to: nextState,
      trigger,
      sessionId: this.sessionId,
      timestamp: new Date().toISOString(),
    });

    return nextState;
  }
}
