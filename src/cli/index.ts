#!/usr/bin/env node
import { Command } from 'commander';
import { registerCommands } from './commands';

export function createProgram(): Command {
  const program = new Command();
  program.name('fixloop').description('Generate code, run it against tests in an isolated sandbox, and self-correct from the failures').version('0.1.0');
  registerCommands(program);
  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error(error instanceof Error ? error.message : String(error));
      process.exitCode = 1;
    });
}
