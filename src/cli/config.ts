/**
 * Satori Telegram — Config Commands
 *
 *   satori-telegram config path
 *   satori-telegram config show
 *   satori-telegram config init [--force]
 */

import { existsSync } from 'node:fs';
import type { Command } from 'commander';
import { getConfigPath, saveConfig } from '../config/loader.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import type { BridgeConfig } from '../config/types.js';
import { ExitCode, printFailure, printResult, printSuccess } from '../utils/output.js';
import { getConfigOverride } from './global-options.js';
import { requireConfig } from './helpers.js';

const REDACTED = '********';

/**
 * Copy of the config with secrets masked.
 */
export function redactConfig(config: BridgeConfig): BridgeConfig {
  return {
    ...config,
    telegram: {
      ...config.telegram,
      botToken: config.telegram.botToken ? REDACTED : undefined,
    },
    server: {
      ...config.server,
      token: config.server.token ? REDACTED : undefined,
    },
    webhooks: config.webhooks.map((webhook) => ({
      ...webhook,
      token: webhook.token ? REDACTED : undefined,
    })),
  };
}

export function registerConfigCommands(program: Command): void {
  const config = program
    .command('config')
    .description('Inspect and create the configuration file');

  config
    .command('path')
    .description('Print the config file path in use')
    .action(() => {
      const path = getConfigOverride() ?? getConfigPath();
      printResult(path, () => {
        process.stdout.write(path + '\n');
      });
    });

  config
    .command('show')
    .description('Print the effective configuration (secrets masked)')
    .action(() => {
      const loaded = requireConfig();
      if (!loaded) return;
      const redacted = redactConfig(loaded);
      printResult(redacted, () => {
        process.stdout.write(JSON.stringify(redacted, null, 2) + '\n');
      });
    });

  config
    .command('init')
    .description('Write a config file with default settings')
    .option('-f, --force', 'Overwrite an existing file')
    .action((opts: { force?: boolean }) => {
      const path = getConfigOverride() ?? getConfigPath();
      if (existsSync(path) && !opts.force) {
        printFailure({
          code: 'CONFIG_EXISTS',
          message: `${path} already exists.`,
          suggestion: 'Pass --force to overwrite it.',
        });
        process.exitCode = ExitCode.USAGE;
        return;
      }
      saveConfig(DEFAULT_CONFIG, path);
      printSuccess(`Wrote ${path}`);
    });
}
