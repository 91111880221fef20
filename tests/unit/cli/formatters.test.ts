import chalk from 'chalk';
import { formatCode, formatExecutionResult, formatSessionSummary, formatStatus } from '../../../src/cli/formatters';
import type { SessionSnapshot } from '../../../src/orchestrator/types';

describe('formatters', () => {
  const originalLevel = chalk.level;

  beforeAll(() => {
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = originalLevel;
  });

  it('should frame code with the attempt number and indent it', () => {
    const separator = '─'.repeat(60);

    expect(formatCode(1, 'x = 1\nprint(x)')).toBe(`${separator}\nCode (attempt 1)\n  x = 1\n  print(x)\n${separator}`);
  });

  it('should label timeouts and show missing exit codes', () => {
    const text = formatExecutionResult(4, { succeeded: false, stdout: 'partial', stderr: 'Execution timed out after 100ms', timedOut: true, durationMs: 100 });

    expect(text).toBe('  Attempt 4 timed out\n  exit code: n/a   duration: 0.1s\n  stdout:\n  partial\n  stderr:\n  Execution timed out after 100ms');
  });

  it('should label a passing attempt', () => {
    expect(formatExecutionResult(1, { succeeded: true, stdout: '', stderr: '', exitCode: 0, timedOut: false, durationMs: 2000 })).toBe('  Attempt 1 passed\n  exit code: 0   duration: 2.0s');
  });

  it('should name statuses', () => {
    expect(formatStatus('aborted')).toBe('Aborted');
  });

  it('should summarise a completed session with its save location', () => {
    const snapshot: SessionSnapshot = {
      id: 'abc',
      problem: { statement: 'p', tests: 't' },
      maxAttempts: 5,
      attempts: [{ index: 1, rationale: 'r', code: 'c', startedAt: '2026-01-01T00:00:00.000Z' }],
      status: 'completed',
      finalCode: 'c',
      startedAt: '2026-01-01T00:00:00.000Z',
      endedAt: '2026-01-01T00:00:03.500Z',
      illustrations: [],
    };

    expect(formatSessionSummary(snapshot, { saveLocation: 'out/solution.py' })).toBe(
      ['', 'Session completed successfully.', '  Session ID: abc', '  Attempts:   1/5', '  Duration:   3.5s', '  Solution saved to out/solution.py'].join('\n'),
    );
  });

  it('should include the error of a failed session', () => {
    const snapshot: SessionSnapshot = {
      id: 'def',
      problem: { statement: 'p', tests: 't' },
      maxAttempts: 2,
      attempts: [],
      status: 'aborted',
      startedAt: '2026-01-01T00:00:00.000Z',
      error: { kind: 'oracle_fault', message: 'down' },
      illustrations: [],
    };

    expect(formatSessionSummary(snapshot)).toBe(['', 'Session aborted.', '  Session ID: def', '  Attempts:   0/2', '  Error: [oracle_fault] down'].join('\n'));
  });
});
