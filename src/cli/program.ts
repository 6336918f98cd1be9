import { Command, Option } from 'commander';
import chalk from 'chalk';
import { chatCommand, type ChatOptions } from './commands/chat.js';
import { configCommand } from './commands/config.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('chatrelay')
    .description('Chat with Gemini, then get an OpenAI summary of the conversation')
    .version('1.0.0')
    .option('--primary-model <model>', 'Gemini model for chat turns')
    .option('--secondary-model <model>', 'OpenAI model for the summary')
    .addOption(
      new Option('--chat-safety <mode>', 'Safety filters for chat turns').choices(['default', 'relaxed'])
    )
    .option('-s, --session <id>', 'Session identifier')
    .action(async (options: ChatOptions) => {
      await chatCommand(options);
    });

  program.addCommand(configCommand);

  program.on('command:*', () => {
    console.error(chalk.red(`Invalid command: ${program.args.join(' ')}`));
    console.log(chalk.yellow('Run `chatrelay --help` for available commands'));
    process.exit(1);
  });

  return program;
}
