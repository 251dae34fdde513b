/**
 * Satori Telegram — Setup Command
 *
 * Interactive wizard: ask for the bot token, check it with getMe, choose
 * where the Satori API listens, save the config.
 */

import { existsSync } from 'node:fs';
import { createLogger } from '../utils/logger.js';
import { ExitCode, printFailure } from '../utils/output.js';
import { getConfigPath, loadConfig, saveConfig } from '../config/loader.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import type { BridgeConfig } from '../config/types.js';
import { TelegramBotClient } from '../telegram/client.js';
import { getConfigOverride } from './global-options.js';

const log = createLogger('Setup');

const BOT_TOKEN_PATTERN = /^\d+:[\w-]{20,}$/;

export async function setupCommand(): Promise<void> {
  const chalk = (await import('chalk')).default;
  const inquirer = (await import('inquirer')).default;
  const ora = (await import('ora')).default;

  const path = getConfigOverride() ?? getConfigPath();

  console.log();
  console.log(chalk.bold.cyan('  Satori Telegram — Setup'));
  console.log(chalk.gray('  Serve a Telegram bot to Satori applications'));
  console.log();

  let base: BridgeConfig = DEFAULT_CONFIG;
  if (existsSync(path)) {
    const { overwrite } = await inquirer.prompt<{ overwrite: boolean }>([{
      type: 'confirm',
      name: 'overwrite',
      message: `A config already exists at ${chalk.bold(path)}. Reconfigure?`,
      default: false,
    }]);

    if (!overwrite) {
      console.log(chalk.gray('  Setup cancelled. Use `satori-telegram start` to run the bridge.'));
      return;
    }
    base = loadConfig(path);
  }

  // Step 1: Bot token
  console.log(chalk.gray('  Create a bot with @BotFather and paste its token below.'));
  console.log();

  const { botToken } = await inquirer.prompt<{ botToken: string }>([{
    type: 'password',
    name: 'botToken',
    message: 'Bot token:',
    mask: '*',
    validate: (input: string) => BOT_TOKEN_PATTERN.test(input.trim()) || 'Expected a token like 123456:ABC-DEF...',
  }]);

  // Step 2: Verify
  const spinner = ora('Checking bot token...').start();
  try {
    const bot = await new TelegramBotClient(botToken.trim(), base.telegram.apiBaseUrl).getMe();
    spinner.succeed(`Connected as ${chalk.bold(bot.username ? `@${bot.username}` : bot.first_name)}`);
  } catch (error) {
    spinner.fail('Token check failed');
    log.error('Setup failed', error instanceof Error ? error : new Error(String(error)));
    printFailure({
      code: 'INVALID_BOT_TOKEN',
      message: error instanceof Error ? error.message : String(error),
      suggestion: 'Check the token with @BotFather and run setup again.',
    });
    process.exitCode = ExitCode.TOKEN_REJECTED;
    return;
  }

  // Step 3: Satori API
  const { port, serverToken } = await inquirer.prompt<{ port: string; serverToken: string }>([
    {
      type: 'input',
      name: 'port',
      message: 'Satori API port:',
      default: String(base.server.port),
      validate: (input: string) => /^\d+$/.test(input) && Number(input) <= 65_535 || 'Enter a port number',
    },
    {
      type: 'password',
      name: 'serverToken',
      message: 'Satori API token (leave empty for none):',
      mask: '*',
    },
  ]);

  saveConfig(
    {
      ...base,
      telegram: { ...base.telegram, botToken: botToken.trim() },
      server: { ...base.server, port: Number(port), token: serverToken || undefined },
    },
    path
  );

  log.info('Setup complete', { path });

  console.log();
  console.log(chalk.green.bold('  Setup complete!'));
  console.log(chalk.gray(`  Config saved to ${path}`));
  console.log();
  console.log(chalk.gray(`  Next: run ${chalk.bold('satori-telegram start')} to begin serving.`));
  console.log();
}
