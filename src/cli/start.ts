/**
 * Satori Telegram — Start Command
 *
 * Connects the bot, serves the Satori API and forwards every event to
 * the configured webhooks until interrupted.
 */

import { createLogger, setLogFile, setLogLevel } from '../utils/logger.js';
import { ExitCode, printFailure } from '../utils/output.js';
import { ConfigError, requireBotToken } from '../config/loader.js';
import { TelegramBotClient } from '../telegram/client.js';
import { TelegramAdapter } from '../telegram/adapter.js';
import { SatoriServer } from '../server/http.js';
import { WebhookDispatcher } from '../server/webhooks.js';
import { isDebug } from './global-options.js';
import { printError, requireConfig } from './helpers.js';

const log = createLogger('Start');

export async function startCommand(): Promise<void> {
  const chalk = (await import('chalk')).default;
  const ora = (await import('ora')).default;

  const config = requireConfig();
  if (!config) return;

  if (!isDebug()) setLogLevel(config.logging.level);
  if (config.logging.file) setLogFile(config.logging.file);

  let token: string;
  try {
    token = requireBotToken(config);
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    printFailure({
      code: error.code,
      message: error.message,
      suggestion: 'Run `satori-telegram setup` to configure the bot.',
    });
    process.exitCode = ExitCode.USAGE;
    return;
  }

  const api = new TelegramBotClient(token, config.telegram.apiBaseUrl);
  const adapter = new TelegramAdapter({
    api,
    telegram: config.telegram,
    reconnect: config.reconnect,
    files: config.files,
  });
  const webhooks = new WebhookDispatcher(config.webhooks);
  const server = new SatoriServer(adapter, config.server);

  // Graceful shutdown
  const controller = new AbortController();
  const { signal } = controller;

  const shutdown = (received: NodeJS.Signals) => {
    log.info('Shutting down...', { signal: received });
    if (received === 'SIGINT') process.exitCode = ExitCode.INTERRUPTED;
    controller.abort();
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  try {
    const spinner = ora({ text: 'Connecting to Telegram...', stream: process.stderr }).start();
    try {
      const bot = await adapter.connect();
      spinner.succeed(`Connected as ${bot.username ? `@${bot.username}` : bot.first_name}`);
    } catch (error) {
      spinner.fail('Could not connect to Telegram');
      throw error;
    }

    const address = await server.listen();

    console.log();
    console.log(chalk.bold.cyan('  Satori Telegram'));
    console.log(chalk.gray(`  Satori API: http://${address.host}:${address.port}${config.server.path}/v1`));
    console.log(chalk.gray(`  Webhooks:   ${webhooks.size}`));
    console.log(chalk.gray('  Press Ctrl+C to stop\n'));

    await adapter.start(async (event) => {
      await webhooks.dispatch(event);
    }, signal);
  } catch (error) {
    if (!signal.aborted) {
      log.error('Bridge stopped', error instanceof Error ? error : { error: String(error) });
      printError('Bridge stopped', error);
    }
  } finally {
    process.removeListener('SIGINT', shutdown);
    process.removeListener('SIGTERM', shutdown);
    await server.close();
  }

  console.log(chalk.gray('\n  Bridge stopped.\n'));
}
