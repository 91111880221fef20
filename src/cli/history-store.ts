import fs from 'fs/promises';
import path from 'path';
import type { SessionSnapshot, SessionStatus } from '../orchestrator/types';
import { sessionPath } from '../orchestrator/session-store';

export type HistoryFilter = {
  status?: SessionStatus;
  from?: Date;
  to?: Date;
  limit?: number;
};

export type HistoryEntrySummary = {
  sessionId: string;
  status: SessionStatus;
  startedAt: string;
  endedAt?: string;
  attempts: number;
  maxAttempts: number;
  problem: string;
  error?: SessionSnapshot['error'];
};

function isSnapshot(value: unknown): value is SessionSnapshot {
  if (typeof value !== 'object' || value === null) return false;
  return 'id' in value && typeof value.id === 'string' && 'status' in value && typeof value.status === 'string' && 'attempts' in value && Array.isArray(value.attempts);
}

/** Read side of the session files written by FileSessionStore */
export class HistoryStore {
  constructor(private rootDir: string) {}

  async load(sessionId: string): Promise<SessionSnapshot | null> {
    let data: string;
    try {
      data = await fs.readFile(sessionPath(this.rootDir, sessionId), 'utf8');
    } catch {
      return null;
    }

    const parsed: unknown = JSON.parse(data);
    return isSnapshot(parsed) ? parsed : null;
  }

  async listSessionIds(): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.rootDir, { withFileTypes: true });
      return entries.filter((e) => e.isDirectory()).map((e) => e.name);
    } catch {
      return [];
    }
  }

  private toSummary(snapshot: SessionSnapshot): HistoryEntrySummary {
    return {
      sessionId: snapshot.id,
      status: snapshot.status,
      startedAt: snapshot.startedAt,
      endedAt: snapshot.endedAt,
      attempts: snapshot.attempts.length,
      maxAttempts: snapshot.maxAttempts,
      problem: snapshot.problem.statement,
      error: snapshot.error,
    };
  }

  private matchesFilter(summary: HistoryEntrySummary, filter: HistoryFilter): boolean {
    if (filter.status && summary.status !== filter.status) return false;

    const startedAtMs = Date.parse(summary.startedAt);
    if (Number.isFinite(startedAtMs)) {
      if (filter.from && startedAtMs < filter.from.getTime()) return false;
      if (filter.to && startedAtMs > filter.to.getTime()) return false;
    }

    return true;
  }

  async list(filter: HistoryFilter = {}): Promise<HistoryEntrySummary[]> {
    const sessionIds = await this.listSessionIds();
    const snapshots = await Promise.all(sessionIds.map((id) => this.loadQuietly(id)));

    const summaries = snapshots
      .filter((s): s is SessionSnapshot => Boolean(s))
      .map((s) => this.toSummary(s))
      .filter((s) => this.matchesFilter(s, filter))
      .sort((a, b) => Date.parse(b.startedAt) - Date.parse(a.startedAt));

    if (filter.limit && filter.limit > 0) {
      return summaries.slice(0, filter.limit);
    }

    return summaries;
  }

  async latest(): Promise<SessionSnapshot | null> {
    const [newest] = await this.list({ limit: 1 });
    return newest ? this.load(newest.sessionId) : null;
  }

  async exportToFile(entries: HistoryEntrySummary[], filePath: string): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(entries, null, 2), 'utf8');
  }

  /** A corrupt file in the listing is skipped rather than failing the whole list */
  private async loadQuietly(sessionId: string): Promise<SessionSnapshot | null> {
    try {
      return await this.load(sessionId);
    } catch {
      return null;
    }
  }
}
