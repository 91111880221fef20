import { BackendSchema, RuntimeSchema } from '../../config/validator';
import type { Backend, Runtime } from '../../config/validator';
import type { SolveCommandOptions } from '../types';

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export interface ValidatedSolveOptions {
  problem?: string;
  problemFile?: string;
  tests?: string;
  maxAttempts?: number;
  backend?: Backend;
  runtime?: Runtime;
  timeoutMs?: number;
  model?: string;
  save?: string;
  illustrate: boolean;
  json: boolean;
  verbose: boolean;
}

function parsePositiveInt(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value.trim())) {
    throw new ValidationError(`${flag} must be a positive integer, got "${value}"`);
  }
  const n = Number.parseInt(value, 10);
  if (n < 1) {
    throw new ValidationError(`${flag} must be >= 1`);
  }
  return n;
}

/**
 * Validate solve command options
 *
 * @returns Validated options with numbers parsed and enums checked
 * @throws {ValidationError} If validation fails
 */
export function validateSolveOptions(options: SolveCommandOptions): ValidatedSolveOptions {
  if (options.problem !== undefined && options.problemFile !== undefined) {
    throw new ValidationError('Use either --problem or --problem-file, not both');
  }
  if (options.problem !== undefined && !options.problem.trim()) {
    throw new ValidationError('--problem must not be empty');
  }

  let backend: Backend | undefined;
  if (options.backend !== undefined) {
    const parsed = BackendSchema.safeParse(options.backend);
    if (!parsed.success) {
      throw new ValidationError(`Invalid backend: "${options.backend}". Expected: ${BackendSchema.options.join(', ')}`);
    }
    backend = parsed.data;
  }

  let runtime: Runtime | undefined;
  if (options.runtime !== undefined) {
    const parsed = RuntimeSchema.safeParse(options.runtime);
    if (!parsed.success) {
      throw new ValidationError(`Invalid runtime: "${options.runtime}". Expected: ${RuntimeSchema.options.join(', ')}`);
    }
    runtime = parsed.data;
  }

  const timeoutMs = parsePositiveInt(options.timeout, '--timeout');
  if (timeoutMs !== undefined && timeoutMs < 100) {
    throw new ValidationError('--timeout must be >= 100 milliseconds');
  }

  return {
    problem: options.problem,
    problemFile: options.problemFile,
    tests: options.tests,
    maxAttempts: parsePositiveInt(options.maxAttempts, '--max-attempts'),
    backend,
    runtime,
    timeoutMs,
    model: options.model,
    save: options.save,
    illustrate: options.illustrate ?? false,
    json: options.json ?? false,
    verbose: options.verbose ?? false,
  };
}
