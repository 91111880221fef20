import { Command } from 'commander';
import chalk from 'chalk';
import { ConfigValidationError, loadConfig, maskSecrets } from '../../config/loader';
import { createExecutor } from '../../testing/factory';
import { createSilentLogger } from '../../utils/logger';

export function registerConfigCommand(program: Command): void {
  const configCommand = program.command('config').description('Inspect configuration');

  configCommand
    .command('show')
    .description('Show the effective configuration (secrets masked)')
    .action(() => {
      try {
        console.log(JSON.stringify(maskSecrets(loadConfig()), null, 2));
      } catch (error) {
        console.error(chalk.red('Failed to load configuration:'));
        console.error(chalk.red(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  configCommand
    .command('validate')
    .description('Validate the configuration and check the isolation backend')
    .action(async () => {
      try {
        const config = loadConfig();
        console.log(chalk.green('✓ Configuration structure is valid.'));

        if (!config.oracle.api_key) {
          console.log(chalk.yellow('! GEMINI_API_KEY is not set; `solve` will not be able to generate code.'));
        }

        const executor = await createExecutor(config, createSilentLogger());
        console.log(chalk.green(`✓ Isolation backend "${executor.backendName}" is available.`));
      } catch (error) {
        if (error instanceof ConfigValidationError) {
          console.log(chalk.red('✗ Configuration structure is invalid:'));
          error.issues.forEach((e) => console.log(chalk.red(`  - ${e}`)));
        } else {
          console.error(chalk.red(`✗ ${error instanceof Error ? error.message : String(error)}`));
        }
        process.exitCode = 1;
      }
    });
}
