import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import YAML from 'yaml';
import { ConfigSchema, Config } from './validator';
import { defaults } from './defaults';
import { FixloopError } from '../utils/errors';

/**
 * DeepPartial allows for recursive partials of our Config type.
 * This is useful for CLI and YAML overrides.
 */
export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends (infer U)[] ? DeepPartial<U>[] : T[P] extends object ? DeepPartial<T[P]> : T[P];
};

export const CONFIG_FILE_NAME = 'fixloop.yaml';

export class ConfigValidationError extends FixloopError {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `  - ${i}`).join('\n')}`, 'INVALID_CONFIG');
    this.name = 'ConfigValidationError';
  }
}

export type LoadConfigOptions = {
  /** Directory holding `.env` and `fixloop.yaml` (defaults to process.cwd()) */
  cwd?: string;
  /** Environment to read overrides from (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
};

export function loadConfig(cliOverrides: DeepPartial<Config> = {}, opts: LoadConfigOptions = {}): Config {
  const cwd = opts.cwd ?? process.cwd();

  // Load .env; variables already set in the environment win
  const fromDotenv: Record<string, string> = {};
  dotenv.config({ path: path.join(cwd, '.env'), processEnv: fromDotenv });
  const env: NodeJS.ProcessEnv = { ...fromDotenv, ...(opts.env ?? process.env) };

  // 1. Start with Defaults
  const config: Record<string, unknown> = structuredClone(defaults);

  // 2. Override with fixloop.yaml (if exists)
  const yamlPath = path.join(cwd, CONFIG_FILE_NAME);
  if (fs.existsSync(yamlPath)) {
    const parsedYaml: unknown = YAML.parse(fs.readFileSync(yamlPath, 'utf8'));
    if (isRecord(parsedYaml)) {
      deepMerge(config, parsedYaml);
    }
  }

  // 3. Override with Environment Variables
  deepMerge(config, {
    loop: { max_attempts: env.FIXLOOP_MAX_ATTEMPTS },
    oracle: {
      api_key: env.GEMINI_API_KEY,
      model: env.GEMINI_MODEL,
    },
    sandbox: {
      backend: env.FIXLOOP_BACKEND,
      timeout_ms: env.FIXLOOP_TIMEOUT_MS,
    },
    e2b: { api_key: env.E2B_API_KEY },
  });

  // 4. Override with CLI Arguments
  deepMerge(config, cliOverrides);

  // 5. Validate with Zod
  const result = ConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigValidationError(result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  return result.data;
}

/** Mask secrets so the config can be printed */
export function maskSecrets(config: Config): Config {
  const masked = structuredClone(config);
  if (masked.oracle.api_key) masked.oracle.api_key = '********';
  if (masked.e2b.api_key) masked.e2b.api_key = '********';
  return masked;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Simple deep merge for config objects.
 * Undefined source values leave the target untouched.
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): void {
  for (const key in source) {
    if (!Object.prototype.hasOwnProperty.call(source, key)) continue;

    const sourceValue = source[key];
    if (isRecord(sourceValue)) {
      const targetValue = target[key];
      const nested: Record<string, unknown> = isRecord(targetValue) ? targetValue : {};
      target[key] = nested;
      deepMerge(nested, sourceValue);
    } else if (sourceValue !== undefined) {
      target[key] = sourceValue;
    }
  }
}
