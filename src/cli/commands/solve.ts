import { Command } from 'commander';
import crypto from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import { loadConfig } from '../../config/loader';
import type { DeepPartial } from '../../config/loader';
import type { Config } from '../../config/validator';
import { GeminiOracle } from '../../agents/gemini-oracle';
import { GeminiImageIllustrator } from '../../agents/illustrator';
import type { Illustrator } from '../../agents/illustrator';
import { CorrectionLoop } from '../../orchestrator/correction-loop';
import { FileSessionStore, SESSIONS_DIR_NAME } from '../../orchestrator/session-store';
import { CompositeSink, SolutionFileSink } from '../../orchestrator/sinks';
import type { SessionSnapshot } from '../../orchestrator/types';
import { createExecutor } from '../../testing/factory';
import { RUNTIMES } from '../../testing/runtimes';
import { ConsoleLogger } from '../../utils/logger';
import { ConsoleSink } from '../console-sink';
import { formatError, formatSessionSummary } from '../formatters';
import { promptForProblem } from '../prompts';
import type { ProblemInput, SolveCommandOptions } from '../types';
import { validateSolveOptions, ValidatedSolveOptions, ValidationError } from '../validators/solve';

export function toConfigOverrides(options: ValidatedSolveOptions): DeepPartial<Config> {
  return {
    loop: { max_attempts: options.maxAttempts },
    oracle: { model: options.model },
    sandbox: {
      backend: options.backend,
      runtime: options.runtime,
      timeout_ms: options.timeoutMs,
    },
    illustration: options.illustrate ? { enabled: true } : {},
  };
}

/** Default place for a solved session's code: `<output>/code/solution_session_<id>.<ext>` */
export function defaultSaveLocation(config: Config, sessionId: string): string {
  const ext = path.extname(RUNTIMES[config.sandbox.runtime].fileName);
  return path.join(config.output.dir, 'code', `solution_session_${sessionId}${ext}`);
}

async function resolveProblem(options: ValidatedSolveOptions): Promise<ProblemInput> {
  const statement = options.problemFile ? (await fs.readFile(options.problemFile, 'utf8')).trim() : options.problem?.trim();
  const tests = options.tests ? (await fs.readFile(options.tests, 'utf8')).trim() : undefined;

  if (statement && tests) {
    return { statement, tests };
  }

  if (!process.stdin.isTTY) {
    throw new ValidationError('--problem (or --problem-file) and --tests are required when not running interactively');
  }

  const answered = await promptForProblem({ statement, tests });
  if (!answered.statement || !answered.tests) {
    throw new ValidationError('Both a problem statement and test cases are required');
  }
  return answered;
}

function createIllustrator(config: Config): Illustrator | undefined {
  if (!config.illustration.enabled) return undefined;
  return new GeminiImageIllustrator({
    apiKey: config.oracle.api_key,
    model: config.illustration.model,
    outputDir: config.output.dir,
    baseUrl: config.oracle.base_url,
    timeoutMs: config.oracle.timeout_ms,
  });
}

/**
 * Handle the solve command. Resolves to the final session snapshot.
 */
export async function handleSolveCommand(rawOptions: SolveCommandOptions): Promise<SessionSnapshot> {
  const options = validateSolveOptions(rawOptions);
  const config = loadConfig(toConfigOverrides(options));
  const logger = new ConsoleLogger({ verbose: options.verbose, stderr: options.json });

  const problem = await resolveProblem(options);

  // Fails fast when the isolation backend is missing, before any session exists
  const executor = await createExecutor(config, logger.child('sandbox'));

  const oracle = new GeminiOracle({
    apiKey: config.oracle.api_key,
    model: config.oracle.model,
    baseUrl: config.oracle.base_url,
    temperature: config.oracle.temperature,
    timeoutMs: config.oracle.timeout_ms,
    logger: logger.child('oracle'),
  });

  const loop = new CorrectionLoop({
    oracle,
    executor,
    maxAttempts: config.loop.max_attempts,
    runtime: config.sandbox.runtime,
    recorder: new FileSessionStore(path.join(config.output.dir, SESSIONS_DIR_NAME)),
    illustrator: createIllustrator(config),
    logger: logger.child('loop'),
  });

  const sessionId = crypto.randomUUID();
  const saveLocation = options.save ?? defaultSaveLocation(config, sessionId);
  const solutionSink = new SolutionFileSink();
  const sink = new CompositeSink(new ConsoleSink({ json: options.json }), solutionSink);

  const snapshot = await loop.run(problem, sink, { sessionId, saveLocation });

  if (!options.json) {
    console.log(formatSessionSummary(snapshot, { saveLocation: solutionSink.savedTo }));
  }
  if (snapshot.status === 'completed' && !solutionSink.savedTo) {
    console.error(formatError(`Solution could not be saved to ${saveLocation}`));
  }

  return snapshot;
}

/**
 * Register the solve command
 *
 * @param program - Commander program instance
 */
export function registerSolveCommand(program: Command): void {
  program
    .command('solve')
    .description('Generate code for a problem, run it against the tests in isolation and self-correct until it passes')
    .option('-p, --problem <text>', 'Problem statement')
    .option('--problem-file <file>', 'Read the problem statement from a file')
    .option('-t, --tests <file>', 'File with the test assertions')
    .option('--max-attempts <n>', 'Maximum number of attempts')
    .option('--backend <backend>', 'Isolation backend (docker | e2b)')
    .option('--runtime <runtime>', 'Language runtime (python | node)')
    .option('--timeout <ms>', 'Wall-clock limit per execution in milliseconds')
    .option('--model <model>', 'Gemini model used for generation')
    .option('--save <file>', 'Where to write the solution')
    .option('--illustrate', 'Generate an illustration of each attempt\'s reasoning')
    .option('--json', 'Print events as JSON lines', false)
    .option('-v, --verbose', 'Verbose logging', false)
    .action(async (options: SolveCommandOptions) => {
      try {
        const snapshot = await handleSolveCommand(options);
        process.exitCode = snapshot.status === 'completed' ? 0 : 1;
      } catch (error) {
        console.error(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });
}
