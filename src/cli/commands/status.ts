import { Command } from 'commander';
import path from 'path';
import { loadConfig } from '../../config/loader';
import { SESSIONS_DIR_NAME } from '../../orchestrator/session-store';
import type { SessionSnapshot } from '../../orchestrator/types';
import { HistoryStore } from '../history-store';
import { formatCode, formatError, formatExecutionResult, formatInfo, formatStatus, formatSuccess } from '../formatters';

type StatusCommandOptions = {
  sessionId?: string;
  code?: boolean;
  json?: boolean;
};

async function resolveSession(store: HistoryStore, sessionId?: string): Promise<SessionSnapshot | null> {
  return sessionId ? store.load(sessionId) : store.latest();
}

export function renderSession(snapshot: SessionSnapshot, showCode: boolean): string[] {
  const lines: string[] = [];
  lines.push(formatSuccess('Session status'));
  lines.push(formatInfo(`sessionId: ${snapshot.id}`));
  lines.push(formatInfo(`status: ${formatStatus(snapshot.status)}`));
  lines.push(formatInfo(`attempts: ${snapshot.attempts.length}/${snapshot.maxAttempts}`));
  lines.push(formatInfo(`startedAt: ${snapshot.startedAt}`));
  if (snapshot.endedAt) lines.push(formatInfo(`endedAt: ${snapshot.endedAt}`));
  lines.push(formatInfo(`problem: ${snapshot.problem.statement}`));

  if (snapshot.error) {
    lines.push(formatError(`error: ${snapshot.error.kind} - ${snapshot.error.message}`));
  }

  for (const attempt of snapshot.attempts) {
    if (showCode) lines.push(formatCode(attempt.index, attempt.code));
    lines.push(attempt.result ? formatExecutionResult(attempt.index, attempt.result) : formatInfo(`Attempt ${attempt.index}: not executed`));
  }

  for (const illustration of snapshot.illustrations) {
    lines.push(formatInfo(`illustration (attempt ${illustration.attempt}): ${illustration.path}`));
  }

  return lines;
}

export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show a session (the most recent one by default)')
    .option('--session-id <id>', 'Show a specific session')
    .option('--code', 'Include the code of every attempt', false)
    .option('--json', 'Output the session as JSON', false)
    .action(async (options: StatusCommandOptions) => {
      try {
        const config = loadConfig();
        const store = new HistoryStore(path.join(config.output.dir, SESSIONS_DIR_NAME));
        const snapshot = await resolveSession(store, options.sessionId);

        if (!snapshot) {
          const msg = options.sessionId ? `No session found for id: ${options.sessionId}` : 'No sessions found.';
          console.log(formatInfo(msg));
          return;
        }

        if (options.json) {
          console.log(JSON.stringify(snapshot, null, 2));
          return;
        }

        console.log(renderSession(snapshot, options.code ?? false).join('\n'));
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        console.error(formatError(msg));
        process.exitCode = 1;
      }
    });
}
