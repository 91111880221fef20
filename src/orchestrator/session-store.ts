import fs from 'fs/promises';
import path from 'path';
import type { SessionRecorder, SessionSnapshot } from './types';

export const SESSIONS_DIR_NAME = 'sessions';

export function sessionPath(rootDir: string, sessionId: string): string {
  return path.join(rootDir, sessionId, 'session.json');
}

/** Persists each snapshot as `<rootDir>/<sessionId>/session.json`, replacing the previous one */
export class FileSessionStore implements SessionRecorder {
  constructor(private rootDir: string) {}

  async record(snapshot: SessionSnapshot): Promise<void> {
    const target = sessionPath(this.rootDir, snapshot.id);
    await fs.mkdir(path.dirname(target), { recursive: true });

    // Write then rename so readers never see a half-written file
    const temp = `${target}.tmp`;
    await fs.writeFile(temp, JSON.stringify(snapshot, null, 2), 'utf-8');
    await fs.rename(temp, target);
  }
}
