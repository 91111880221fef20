import { Command } from 'commander';
import { registerSolveCommand } from './solve';
import { registerStatusCommand } from './status';
import { registerHistoryCommand } from './history';
import { registerConfigCommand } from './config';

/**
 * Register all subcommands here
 */
export function registerCommands(program: Command): void {
  registerSolveCommand(program);
  registerStatusCommand(program);
  registerHistoryCommand(program);
  registerConfigCommand(program);
}
