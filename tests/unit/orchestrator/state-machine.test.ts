import { InvalidTransitionError, SessionStateMachine, StateChangeEvent } from '../../../src/orchestrator/state-machine';

describe('SessionStateMachine', () => {
  let machine: SessionStateMachine;
  const SESSION_ID = 'test-session-123';

  beforeEach(() => {
    machine = new SessionStateMachine(SESSION_ID);
  });

  describe('Core Transitions (Happy Path)', () => {
    it('should start in INIT', () => {
      expect(machine.getState()).toBe('INIT');
    });

    it('should walk one attempt through to COMPLETED', () => {
      const visited: string[] = [];
      machine.events.on('stateChange', (event: StateChangeEvent) => visited.push(event.from));

      machine.transition('START');
      machine.transition('GENERATED');
      machine.transition('EXECUTED');
      machine.transition('SUCCEED');

      expect(machine.getState()).toBe('COMPLETED');
      expect(visited).toEqual(['INIT', 'GENERATING', 'EXECUTING', 'EVALUATING']);
    });

    it('should loop back to GENERATING on retry', () => {
      machine.transition('START');
      machine.transition('GENERATED');
      machine.transition('EXECUTED');

      expect(machine.transition('RETRY')).toBe('GENERATING');
    });

    it('should end in FAILED on exhaustion and ABORTED on abort', () => {
      machine.transition('START');
      machine.transition('GENERATED');
      machine.transition('EXECUTED');
      expect(machine.transition('EXHAUST')).toBe('FAILED');

      const other = new SessionStateMachine('other');
      other.transition('START');
      expect(other.transition('ABORT')).toBe('ABORTED');
    });
  });

  describe('Invalid Transitions', () => {
    it('should throw InvalidTransitionError for a trigger not valid in the current state', () => {
      expect(() => machine.transition('SUCCEED')).toThrow(InvalidTransitionError);
      expect(() => machine.transition('SUCCEED')).toThrow('Invalid transition: Trigger [SUCCEED] is not valid from state [INIT]');
    });

    it('should accept nothing once terminal', () => {
      machine.transition('START');
      machine.transition('ABORT');

      expect(() => machine.transition('START')).toThrow(InvalidTransitionError);
      expect(machine.getState()).toBe('ABORTED');
    });

    it('should not abort while executing', () => {
      machine.transition('START');
      machine.transition('GENERATED');

      expect(() => machine.transition('ABORT')).toThrow(InvalidTransitionError);
    });
  });

  describe('Events', () => {
    it('should emit stateChange for every transition', () => {
      const seen: StateChangeEvent[] = [];
      machine.events.on('stateChange', (event: StateChangeEvent) => seen.push(event));

      machine.transition('START');

      expect(seen).toHaveLength(1);
      expect(seen[0]).toMatchObject({ from: 'INIT', to: 'GENERATING', trigger: 'START', sessionId: SESSION_ID });
    });
  });
});
