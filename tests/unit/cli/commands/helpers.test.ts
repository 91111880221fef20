import chalk from 'chalk';
import { parseDate, parseLimit, parseStatus } from '../../../../src/cli/commands/history';
import { renderSession } from '../../../../src/cli/commands/status';
import { defaultSaveLocation, toConfigOverrides } from '../../../../src/cli/commands/solve';
import { defaults } from '../../../../src/config/defaults';
import { ValidationError } from '../../../../src/cli/validators/solve';
import type { SessionSnapshot } from '../../../../src/orchestrator/types';

describe('history option parsing', () => {
  it('should accept known statuses in any case', () => {
    expect(parseStatus('Completed')).toBe('completed');
    expect(parseStatus(undefined)).toBeUndefined();
    expect(() => parseStatus('done')).toThrow(ValidationError);
  });

  it('should ignore unparseable dates and limits', () => {
    expect(parseDate('2026-03-01')?.toISOString()).toBe('2026-03-01T00:00:00.000Z');
    expect(parseDate('yesterday')).toBeUndefined();
    expect(parseLimit('5')).toBe(5);
    expect(parseLimit('0')).toBeUndefined();
  });
});

describe('solve helpers', () => {
  it('should only override what was given on the command line', () => {
    expect(toConfigOverrides({ maxAttempts: 3, backend: 'e2b', illustrate: false, json: false, verbose: false })).toEqual({
      loop: { max_attempts: 3 },
      oracle: { model: undefined },
      sandbox: { backend: 'e2b', runtime: undefined, timeout_ms: undefined },
      illustration: {},
    });
    expect(toConfigOverrides({ illustrate: true, json: false, verbose: false }).illustration).toEqual({ enabled: true });
  });

  it('should save solutions under the output directory with the runtime extension', () => {
    expect(defaultSaveLocation(defaults, 'abc')).toBe('.fixloop/code/solution_session_abc.py');
    expect(defaultSaveLocation({ ...defaults, sandbox: { ...defaults.sandbox, runtime: 'node' } }, 'abc')).toBe('.fixloop/code/solution_session_abc.js');
  });
});

describe('renderSession', () => {
  const originalLevel = chalk.level;

  beforeAll(() => {
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = originalLevel;
  });

  it('should list the session details and each attempt', () => {
    const snapshot: SessionSnapshot = {
      id: 'abc',
      problem: { statement: 'Add numbers', tests: 'assert add(1, 1) == 2' },
      maxAttempts: 3,
      attempts: [{ index: 1, rationale: 'r', code: 'c', startedAt: '2026-01-01T00:00:00.000Z' }],
      status: 'aborted',
      startedAt: '2026-01-01T00:00:00.000Z',
      error: { kind: 'empty_generation', message: 'Oracle returned no code for attempt 1. Aborting.' },
      illustrations: [],
    };

    expect(renderSession(snapshot, false)).toEqual([
      '  Session status',
      '  sessionId: abc',
      '  status: Aborted',
      '  attempts: 1/3',
      '  startedAt: 2026-01-01T00:00:00.000Z',
      '  problem: Add numbers',
      '  error: empty_generation - Oracle returned no code for attempt 1. Aborting.',
      '  Attempt 1: not executed',
    ]);
  });
});
