export interface ErrorAnalysis {
  summary: string;
  failurePoints: string[];
  suggestedFocus: string;
}

const MAX_FAILURE_POINTS = 10;

export class ErrorAnalyzer {
  analyze(stdout: string, stderr: string): ErrorAnalysis {
    const logs = [stderr, stdout].filter(Boolean).join('\n');
    if (!logs.trim()) {
      return { summary: 'The program produced no output.', failurePoints: [], suggestedFocus: 'Make sure the program runs the test assertions and exits cleanly.' };
    }

    // Extract lines that look like errors (tracebacks, assertion failures)
    const failurePoints = logs
      .split('\n')
      .filter((line) => /error|fail|exception|assert|traceback|timed out|killed|at\s+|line \d+/i.test(line))
      .map((line) => line.trim())
      .slice(0, MAX_FAILURE_POINTS);

    return {
      summary: stderr ? 'The program wrote diagnostics to stderr.' : 'The program exited with a non-zero status.',
      failurePoints,
      suggestedFocus: this.deduceFocus(failurePoints.join(' ')),
    };
  }

  private deduceFocus(joined: string): string {
    if (/timed out/i.test(joined)) return 'Check for infinite loops or performance bottlenecks.';
    if (/killed|MemoryError|heap out of memory/i.test(joined)) return 'Reduce memory usage; the program exceeded its memory limit.';
    if (joined.includes('SyntaxError') || joined.includes('IndentationError')) return 'Fix the syntax error before anything else.';
    if (joined.includes('NameError') || joined.includes('ReferenceError')) return 'Fix missing variables, functions or imports.';
    if (joined.includes('TypeError') || joined.includes('AttributeError')) return 'Verify argument types, object structures and null checks.';
    if (joined.includes('AssertionError')) return 'The code runs, but its output values are incorrect for at least one test.';
    return 'General debugging and logic refinement.';
  }
}
