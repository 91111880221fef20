import chalk from 'chalk';

/** Logger interface shared by the loop, the executors and the CLI */
export interface Logger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}

export type ConsoleLoggerOptions = {
  scope?: string;
  verbose?: boolean;
  /** Send every level to stderr, keeping stdout for machine-readable output */
  stderr?: boolean;
};

/** Console logger with a scope prefix. Debug lines only show in verbose mode. */
export class ConsoleLogger implements Logger {
  private prefix: string;
  private verbose: boolean;
  private stderr: boolean;

  constructor(opts: ConsoleLoggerOptions = {}) {
    this.prefix = opts.scope ? `[fixloop:${opts.scope}]` : '[fixloop]';
    this.verbose = opts.verbose ?? false;
    this.stderr = opts.stderr ?? false;
  }

  info(message: string, data?: Record<string, unknown>): void {
    const line = this.format(chalk.cyan('INFO'), message, data);
    if (this.stderr) console.error(line);
    else console.log(line);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    console.warn(this.format(chalk.yellow('WARN'), message, data));
  }

  error(message: string, data?: Record<string, unknown>): void {
    console.error(this.format(chalk.red('ERROR'), message, data));
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.verbose) return;
    const line = this.format(chalk.gray('DEBUG'), message, data);
    if (this.stderr) console.error(line);
    else console.debug(line);
  }

  /** Derive a logger for a sub-component, keeping the verbosity */
  child(scope: string): ConsoleLogger {
    return new ConsoleLogger({ scope, verbose: this.verbose, stderr: this.stderr });
  }

  private format(level: string, message: string, data?: Record<string, unknown>): string {
    const base = `${chalk.gray(this.prefix)} ${level} ${message}`;
    return data ? `${base} ${chalk.gray(JSON.stringify(data))}` : base;
  }
}

/** Logger that drops everything; used where output would get in the way */
export function createSilentLogger(): Logger {
  const noop = (): void => undefined;
  return { info: noop, warn: noop, error: noop, debug: noop };
}

/** Render an unknown thrown value as a single-line message */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
