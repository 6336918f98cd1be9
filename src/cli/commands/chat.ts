import chalk from 'chalk';
import inquirer from 'inquirer';
import ora from 'ora';
import type { ConversationController, ISessionView } from '../../app/conversation/conversation-controller.js';
import { createConversationController } from '../../app/conversation/create-conversation.js';
import { DEFAULT_SESSION_ID } from '../../domain/conversation/session.js';
import type { ChatRelayRuntimeConfig } from '../../infra/config/runtime-config.js';
import { ConfigValidationError, loadRuntimeConfig } from '../../infra/config/runtime-config.js';
import { isDebugLoggingEnabled } from '../../infra/config/debug-flags.js';
import { debugEmitter } from '../../debug/index.js';
import type { DebugEvent } from '../../debug/index.js';
import { formatDebugEvent, formatError, formatHistory, formatMessage, formatSummary } from '../lib/formatters.js';

export interface ChatOptions {
  primaryModel?: string;
  secondaryModel?: string;
  chatSafety?: string;
  session?: string;
}

const END_COMMAND = '/end';
const EXIT_COMMANDS = new Set(['exit', '/quit']);

export function applyChatOptions(config: ChatRelayRuntimeConfig, options: ChatOptions): ChatRelayRuntimeConfig {
  const chatSafety = options.chatSafety === 'relaxed' || options.chatSafety === 'default'
    ? options.chatSafety
    : config.primary.chatSafety;

  return {
    ...config,
    primary: {
      ...config.primary,
      model: options.primaryModel || config.primary.model,
      chatSafety,
    },
    secondary: {
      ...config.secondary,
      model: options.secondaryModel || config.secondary.model,
    },
  };
}

function printKeyNotice(): void {
  console.log(chalk.cyan('\n🔑 Enter API Keys'));
  console.log(chalk.gray('  • Your keys are used only during this session'));
  console.log(chalk.gray('  • Keys are never stored or logged anywhere'));
  console.log(chalk.gray('  • You\'ll need to re-enter keys if you restart\n'));
}

/**
 * Ask for both keys and submit them. Returns false when the user gives up.
 */
async function promptForCredentials(controller: ConversationController, sessionId: string): Promise<boolean> {
  printKeyNotice();

  const { primaryKey, secondaryKey } = await inquirer.prompt<{ primaryKey: string; secondaryKey: string }>([
    {
      type: 'password',
      name: 'primaryKey',
      message: 'Google AI Studio API Key:',
      mask: '*',
    },
    {
      type: 'password',
      name: 'secondaryKey',
      message: 'OpenAI API Key:',
      mask: '*',
    },
  ]);

  const spinner = ora('Verifying API keys...').start();
  const outcome = await controller.submitCredentials(sessionId, primaryKey, secondaryKey);

  if (outcome.success) {
    spinner.succeed('API keys verified');
    return true;
  }

  spinner.fail(formatError(outcome.error));

  const { retry } = await inquirer.prompt<{ retry: boolean }>([
    {
      type: 'confirm',
      name: 'retry',
      message: 'Try again?',
      default: true,
    },
  ]);
  return retry;
}

async function sendTurn(controller: ConversationController, sessionId: string, text: string): Promise<void> {
  const spinner = ora('Generating response...').start();
  const outcome = await controller.sendMessage(sessionId, text);

  if (outcome.success) {
    spinner.stop();
    console.log(`${formatMessage(outcome.value)}\n`);
    return;
  }

  spinner.fail(chalk.red(formatError(outcome.error)));
}

async function showSummary(controller: ConversationController, sessionId: string): Promise<void> {
  console.log(chalk.green('\n✓ Conversation ended. Generating summary...'));

  const spinner = ora('Creating summary...').start();
  const outcome = await controller.summarize(sessionId);

  if (outcome.success) {
    spinner.stop();
    console.log(`\n${formatSummary(outcome.value)}\n`);
    return;
  }

  spinner.fail(chalk.red(formatError(outcome.error)));
}

async function promptNextStep(): Promise<'new' | 'exit'> {
  const { next } = await inquirer.prompt<{ next: 'new' | 'exit' }>([
    {
      type: 'list',
      name: 'next',
      message: 'What next?',
      choices: [
        { name: 'Start New Conversation', value: 'new' },
        { name: 'Exit', value: 'exit' },
      ],
    },
  ]);
  return next;
}

/**
 * Drive one session until the user exits. Re-renders from the controller's
 * view after every intent; holds no conversation state of its own.
 */
export async function runChatSession(
  controller: ConversationController,
  sessionId: string = DEFAULT_SESSION_ID
): Promise<void> {
  let view: ISessionView = controller.openSession(sessionId);

  while (true) {
    if (view.phase === 'locked') {
      const proceed = await promptForCredentials(controller, sessionId);
      if (!proceed) {
        console.log(chalk.cyan('\n👋 Goodbye!\n'));
        return;
      }

      view = controller.getView(sessionId);
      if (view.phase === 'chatting') {
        console.log(chalk.gray(`Type your message and press Enter. "${END_COMMAND}" ends the conversation, "exit" quits.\n`));
        if (view.history.length > 0) {
          console.log(`${formatHistory(view.history)}\n`);
        }
      }
      continue;
    }

    if (view.phase === 'ended') {
      await showSummary(controller, sessionId);

      if (await promptNextStep() === 'exit') {
        console.log(chalk.cyan('\n👋 Goodbye!\n'));
        return;
      }

      const reset = controller.startNew(sessionId);
      if (!reset.success) {
        console.error(chalk.red(formatError(reset.error)));
      }
      view = controller.getView(sessionId);
      continue;
    }

    const { userMessage } = await inquirer.prompt<{ userMessage: string }>([
      {
        type: 'input',
        name: 'userMessage',
        message: chalk.green('You:'),
        prefix: '',
      },
    ]);

    const command = userMessage.trim();
    if (!command) {
      continue;
    }

    if (EXIT_COMMANDS.has(command.toLowerCase())) {
      console.log(chalk.cyan('\n👋 Goodbye!\n'));
      return;
    }

    if (command === END_COMMAND) {
      const ended = controller.endConversation(sessionId);
      if (!ended.success) {
        console.error(chalk.red(formatError(ended.error)));
      }
    } else {
      await sendTurn(controller, sessionId, userMessage);
    }

    view = controller.getView(sessionId);
  }
}

/**
 * Print debug events to stderr when debug logging is switched on.
 * Returns a detach function, or null when logging stays off.
 */
export function startDebugLogging(
  config: ChatRelayRuntimeConfig,
  env: NodeJS.ProcessEnv = process.env
): (() => void) | null {
  if (!isDebugLoggingEnabled(config, env)) {
    return null;
  }

  const print = (event: DebugEvent): void => {
    console.error(chalk.gray(formatDebugEvent(event)));
  };

  debugEmitter.setKeyPrefixes([config.credentials.primaryKeyPrefix, config.credentials.secondaryKeyPrefix]);
  debugEmitter.enable();
  debugEmitter.onDebug(print);

  return () => {
    debugEmitter.offDebug(print);
    debugEmitter.disable();
  };
}

export async function chatCommand(options: ChatOptions): Promise<void> {
  let config: ChatRelayRuntimeConfig;
  try {
    config = applyChatOptions(loadRuntimeConfig(), options);
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      console.error(chalk.red(`✗ ${error.message}`));
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  startDebugLogging(config);

  console.log(chalk.cyan(`\n🤖 Gemini Chatbot (Model: ${config.primary.model})`));

  await runChatSession(createConversationController(config), options.session || DEFAULT_SESSION_ID);
}
