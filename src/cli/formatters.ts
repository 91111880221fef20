import chalk from 'chalk';
import type { ExecutionResult, SessionSnapshot, SessionStatus } from '../orchestrator/types';

// ── Primitives ──────────────────────────────────────────────────────────

export function formatStep(message: string): string {
  return chalk.cyan(`> ${message}`);
}

export function formatInfo(message: string): string {
  return chalk.gray(`  ${message}`);
}

export function formatSuccess(message: string): string {
  return chalk.green(`  ${message}`);
}

export function formatError(message: string): string {
  return chalk.red(`  ${message}`);
}

export function formatSection(title: string, body: string): string {
  const separator = chalk.gray('─'.repeat(60));
  return `${separator}\n${chalk.bold(title)}\n${body}\n${separator}`;
}

function indent(text: string): string {
  return text
    .split('\n')
    .map((line) => `  ${line}`)
    .join('\n');
}

// ── Attempts ────────────────────────────────────────────────────────────

export function formatRationale(attempt: number, rationale: string): string {
  return formatSection(`Reasoning (attempt ${attempt})`, indent(rationale || '(no reasoning given)'));
}

export function formatCode(attempt: number, code: string): string {
  return formatSection(`Code (attempt ${attempt})`, indent(code));
}

export function formatExecutionResult(attempt: number, result: ExecutionResult): string {
  const lines: string[] = [];

  if (result.succeeded) {
    lines.push(chalk.green.bold(`  Attempt ${attempt} passed`));
  } else if (result.timedOut) {
    lines.push(chalk.red.bold(`  Attempt ${attempt} timed out`));
  } else {
    lines.push(chalk.red.bold(`  Attempt ${attempt} failed`));
  }

  const exit = result.exitCode === undefined ? 'n/a' : String(result.exitCode);
  lines.push(formatInfo(`exit code: ${exit}   duration: ${(result.durationMs / 1000).toFixed(1)}s`));

  if (result.stdout) {
    lines.push(formatInfo('stdout:'));
    lines.push(indent(result.stdout));
  }
  if (result.stderr) {
    lines.push(formatError('stderr:'));
    lines.push(chalk.red(indent(result.stderr)));
  }

  return lines.join('\n');
}

// ── Sessions ────────────────────────────────────────────────────────────

const STATUS_LABELS: Record<SessionStatus, string> = {
  running: 'Running',
  completed: 'Completed',
  failed: 'Failed',
  aborted: 'Aborted',
};

export function formatStatus(status: SessionStatus): string {
  const label = STATUS_LABELS[status];
  switch (status) {
    case 'completed':
      return chalk.green(label);
    case 'failed':
    case 'aborted':
      return chalk.red(label);
    case 'running':
      return chalk.yellow(label);
  }
}

export function formatSessionSummary(snapshot: SessionSnapshot, opts?: { saveLocation?: string }): string {
  const lines: string[] = [''];

  if (snapshot.status === 'completed') {
    lines.push(chalk.green.bold('Session completed successfully.'));
  } else if (snapshot.status === 'running') {
    lines.push(chalk.yellow.bold('Session still running.'));
  } else {
    lines.push(chalk.red.bold(`Session ${snapshot.status}.`));
  }

  lines.push(formatInfo(`Session ID: ${snapshot.id}`));
  lines.push(formatInfo(`Attempts:   ${snapshot.attempts.length}/${snapshot.maxAttempts}`));

  if (snapshot.endedAt) {
    const durationMs = Date.parse(snapshot.endedAt) - Date.parse(snapshot.startedAt);
    if (Number.isFinite(durationMs)) {
      lines.push(formatInfo(`Duration:   ${(durationMs / 1000).toFixed(1)}s`));
    }
  }

  if (snapshot.error) {
    lines.push(formatError(`Error: [${snapshot.error.kind}] ${snapshot.error.message}`));
  }

  if (snapshot.status === 'completed' && opts?.saveLocation) {
    lines.push(chalk.green.bold(`  Solution saved to ${opts.saveLocation}`));
  }

  return lines.join('\n');
}
