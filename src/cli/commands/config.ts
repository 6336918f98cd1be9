import { Command } from 'commander';
import chalk from 'chalk';
import type { ChatRelayRuntimeConfig } from '../../infra/config/runtime-config.js';
import { ConfigValidationError, getRuntimeConfigPath, loadRuntimeConfig } from '../../infra/config/runtime-config.js';

function showConfig(): void {
  let config: ChatRelayRuntimeConfig;
  try {
    config = loadRuntimeConfig();
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      console.error(chalk.red(`✗ ${error.message}`));
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  console.log(chalk.cyan('\nCurrent Configuration:\n'));
  console.log(chalk.white('  Chat model:'), `${config.primary.model} (${config.primary.baseUrl})`);
  console.log(chalk.white('  Chat safety:'), config.primary.chatSafety);
  console.log(chalk.white('  Summary model:'), `${config.secondary.model} (${config.secondary.baseUrl})`);
  console.log(chalk.white('  Key prefixes:'), `${config.credentials.primaryKeyPrefix} / ${config.credentials.secondaryKeyPrefix}`);
  console.log(chalk.white('  Debug logging:'), config.debug.loggingEnabled ? chalk.green('on') : chalk.gray('off'));
  console.log();
}

function showPath(): void {
  console.log(getRuntimeConfigPath());
}

export const configCommand = new Command('config')
  .description('Inspect chatrelay configuration');

configCommand
  .command('show')
  .description('Show the resolved configuration')
  .action(showConfig);

configCommand
  .command('path')
  .description('Print the configuration file path')
  .action(showPath);
