import { spawn } from 'child_process';

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  /** Stop collecting a stream once it holds this many characters */
  maxOutputChars?: number;
}

export type CommandRunner = (command: string, args: string[], options?: CommandOptions) => Promise<CommandResult>;

/** Spawn a process and collect its output. Rejects only when the process cannot start. */
export const runCommand: CommandRunner = (command, args, options = {}) => {
  const limit = options.maxOutputChars ?? Number.POSITIVE_INFINITY;

  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

    let stdout = '';
    let stderr = '';

    proc.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'ENOENT') {
        reject(new Error(`${command} is not installed or not on PATH`));
      } else {
        reject(err);
      }
    });

    // Decode through the stream so multi-byte characters split across chunks survive
    proc.stdout.setEncoding('utf8');
    proc.stderr.setEncoding('utf8');

    proc.stdout.on('data', (data: string) => {
      // One extra character lets the caller see that output was cut
      if (stdout.length <= limit) stdout += data;
    });

    proc.stderr.on('data', (data: string) => {
      if (stderr.length <= limit) stderr += data;
    });

    proc.on('close', (code: number | null) => {
      resolve({ exitCode: code, stdout, stderr });
    });
  });
};
