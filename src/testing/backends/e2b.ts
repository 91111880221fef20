import type { Sandbox } from '@e2b/code-interpreter';
import { describeError } from '../../utils/logger';
import { E2BClient } from '../e2b-client';
import { IsolationUnavailableError } from '../errors';
import { niceLevelForShares, parseMemoryLimit } from '../limits';
import type { Bundle, IsolationBackend, IsolationUnit, ResourceLimits, RunOutput } from '../types';

export interface E2BBackendOptions {
  apiKey?: string;
  template?: string;
  /** Inject a pre-built client (tests) */
  client?: E2BClient;
}

export const SANDBOX_WORKDIR = '/home/user/fixloop';

/** Extra lifetime granted to the remote sandbox beyond the execution deadline */
const SANDBOX_LIFETIME_SLACK_MS = 30_000;

/** Lifetime of the throwaway sandbox started by the availability check */
const PROBE_SANDBOX_TIMEOUT_MS = 60_000;

/**
 * Isolation in a remote E2B sandbox, one sandbox per unit. The bundle is made
 * read-only before running; memory is capped with `ulimit -v` and the CPU
 * share is approximated with `nice`.
 */
export class E2BBackend implements IsolationBackend {
  readonly name = 'e2b';
  private client?: E2BClient;
  private apiKey?: string;
  private template: string;

  constructor(options: E2BBackendOptions = {}) {
    this.client = options.client;
    this.apiKey = options.apiKey;
    this.template = options.template ?? 'base';
  }

  /** Starts and kills one sandbox, so a bad key or an unreachable service fails here */
  async checkAvailable(): Promise<void> {
    const client = this.getClient();
    try {
      const sandbox = await client.createSandbox({ template: this.template, timeoutMs: PROBE_SANDBOX_TIMEOUT_MS, metadata: { purpose: 'fixloop-availability-check' } });
      await sandbox.kill();
    } catch (error) {
      throw new IsolationUnavailableError(this.name, `could not start a sandbox: ${describeError(error)}`, { cause: error });
    }
  }

  async provision(bundle: Bundle, limits: ResourceLimits): Promise<IsolationUnit> {
    const sandbox = await this.getClient().createSandbox({
      template: this.template,
      timeoutMs: limits.timeoutMs + SANDBOX_LIFETIME_SLACK_MS,
      metadata: { purpose: 'fixloop' },
    });
    const unit = new E2BUnit(sandbox, bundle, limits);

    try {
      await unit.prepare();
    } catch (error) {
      try {
        await unit.dispose();
      } catch (cleanupError) {
        throw new Error(`${describeError(error)} (cleanup also failed: ${describeError(cleanupError)})`, { cause: error });
      }
      throw error;
    }

    return unit;
  }

  private getClient(): E2BClient {
    if (!this.client) {
      this.client = new E2BClient(this.apiKey);
    }
    return this.client;
  }
}

export function buildSandboxCommand(bundle: Bundle, limits: ResourceLimits): string {
  const memoryKb = Math.floor(parseMemoryLimit(limits.memoryLimit) / 1024);
  const nice = niceLevelForShares(limits.cpuShares);
  return `cd ${SANDBOX_WORKDIR} && ulimit -v ${memoryKb} && nice -n ${nice} ${bundle.command.join(' ')}`;
}

/** Shape of the error the SDK throws when a command exits non-zero */
type CommandExit = { exitCode: number; stdout: string; stderr: string };

function isCommandExit(error: unknown): error is CommandExit {
  if (typeof error !== 'object' || error === null) return false;
  return 'exitCode' in error && typeof error.exitCode === 'number' && 'stdout' in error && 'stderr' in error;
}

class E2BUnit implements IsolationUnit {
  private killed = false;

  constructor(
    private sandbox: Sandbox,
    private bundle: Bundle,
    private limits: ResourceLimits,
  ) {}

  get id(): string {
    return this.sandbox.sandboxId;
  }

  async prepare(): Promise<void> {
    const filePath = `${SANDBOX_WORKDIR}/${this.bundle.fileName}`;
    await this.sandbox.files.write(filePath, this.bundle.content);
    await this.sandbox.commands.run(`chmod 0444 ${filePath} && chmod 0555 ${SANDBOX_WORKDIR}`);
  }

  async run(): Promise<RunOutput> {
    try {
      const execution = await this.sandbox.commands.run(buildSandboxCommand(this.bundle, this.limits), {
        timeoutMs: this.limits.timeoutMs + SANDBOX_LIFETIME_SLACK_MS,
      });
      return { exitCode: execution.exitCode, stdout: execution.stdout, stderr: execution.stderr };
    } catch (error) {
      if (isCommandExit(error)) {
        return { exitCode: error.exitCode, stdout: error.stdout, stderr: error.stderr };
      }
      throw error;
    }
  }

  async kill(): Promise<void> {
    if (this.killed) return;
    await this.sandbox.kill();
    this.killed = true;
  }

  async dispose(): Promise<void> {
    await this.kill();
  }

  async isRunning(): Promise<boolean> {
    if (this.killed) return false;
    return this.sandbox.isRunning();
  }
}
