import { Command } from 'commander';
import path from 'path';
import { loadConfig } from '../../config/loader';
import { SESSIONS_DIR_NAME } from '../../orchestrator/session-store';
import type { SessionStatus } from '../../orchestrator/types';
import { HistoryStore } from '../history-store';
import { formatError, formatInfo, formatStatus, formatSuccess } from '../formatters';
import { ValidationError } from '../validators/solve';

type HistoryCommandOptions = {
  status?: string;
  from?: string;
  to?: string;
  limit?: string;
  export?: string;
  json?: boolean;
};

const STATUSES: readonly SessionStatus[] = ['running', 'completed', 'failed', 'aborted'];

export function parseStatus(input: string | undefined): SessionStatus | undefined {
  if (!input) return undefined;
  const status = STATUSES.find((s) => s === input.toLowerCase());
  if (!status) {
    throw new ValidationError(`Invalid status: "${input}". Expected: ${STATUSES.join(', ')}`);
  }
  return status;
}

export function parseDate(input: string | undefined): Date | undefined {
  if (!input) return undefined;
  const d = new Date(input);
  return Number.isFinite(d.getTime()) ? d : undefined;
}

export function parseLimit(input: string | undefined): number | undefined {
  if (!input) return undefined;
  const n = Number.parseInt(input, 10);
  return Number.isFinite(n) && n > 0 ? n : undefined;
}

function truncate(text: string, max: number): string {
  const line = text.replace(/\s+/g, ' ').trim();
  return line.length > max ? `${line.slice(0, max - 3)}...` : line;
}

async function showList(store: HistoryStore, options: HistoryCommandOptions): Promise<void> {
  const entries = await store.list({
    status: parseStatus(options.status),
    from: parseDate(options.from),
    to: parseDate(options.to),
    limit: parseLimit(options.limit),
  });

  if (options.export) {
    const exportPath = path.resolve(process.cwd(), options.export);
    await store.exportToFile(entries, exportPath);
  }

  if (options.json) {
    console.log(JSON.stringify(entries, null, 2));
    return;
  }

  if (!entries.length) {
    console.log(formatInfo('No sessions found.'));
    return;
  }

  console.log(formatSuccess('Session history'));
  for (const e of entries) {
    console.log(formatInfo(`${e.startedAt} ${e.sessionId} ${formatStatus(e.status)} ${e.attempts}/${e.maxAttempts} ${truncate(e.problem, 50)}`));
  }

  if (options.export) {
    console.log(formatInfo(`exported: ${options.export}`));
  }
}

export function registerHistoryCommand(program: Command): void {
  program
    .command('history')
    .description('List past sessions')
    .option('--status <status>', 'Filter by session status (running | completed | failed | aborted)')
    .option('--from <date>', 'Filter by startedAt >= date (ISO string)')
    .option('--to <date>', 'Filter by startedAt <= date (ISO string)')
    .option('--limit <n>', 'Limit number of results')
    .option('--export <file>', 'Export results to JSON file')
    .option('--json', 'Output as JSON', false)
    .action(async (options: HistoryCommandOptions) => {
      try {
        const config = loadConfig();
        const store = new HistoryStore(path.join(config.output.dir, SESSIONS_DIR_NAME));
        await showList(store, options);
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        console.error(formatError(msg));
        process.exitCode = 1;
      }
    });
}
