/**
 * Satori Telegram — Global Options
 *
 * Applies global flags (--no-color, --json, --quiet, --debug, --config)
 * to the root Commander program. These are inherited by all subcommands.
 */

import type { Command } from 'commander';
import { setLogLevel } from '../utils/logger.js';
import { setOutputMode } from '../utils/output.js';

export interface GlobalOptions {
  color?: boolean;
  json?: boolean;
  quiet?: boolean;
  debug?: boolean;
  config?: string;
}

let configOverride: string | undefined;
let debugEnabled = false;

/** Config file path from --config, if given. */
export function getConfigOverride(): string | undefined {
  return configOverride;
}

/** Whether --debug was set; it wins over the configured log level. */
export function isDebug(): boolean {
  return debugEnabled;
}

/**
 * Register global flags and a preAction hook that applies them
 * before any subcommand runs.
 */
export function applyGlobalOptions(program: Command): void {
  program
    .option('-c, --config <path>', 'Use this config file instead of ~/.satori-telegram/config.json')
    .option('--no-color', 'Disable colored output')
    .option('--json', 'Output results as JSON')
    .option('-q, --quiet', 'Suppress non-essential output')
    .option('--debug', 'Show debug-level diagnostics');

  program.hook('preAction', () => {
    const opts = program.opts<GlobalOptions>();

    configOverride = opts.config;

    // --no-color sets color to false
    if (opts.color === false || isColorDisabled()) {
      process.env.NO_COLOR = '1';
    }

    if (opts.json) {
      setOutputMode('json');
      process.env.NO_COLOR = '1';
    } else if (opts.quiet) {
      setOutputMode('quiet');
    }

    if (opts.debug) {
      setLogLevel('debug');
      debugEnabled = true;
    }
  });
}

/**
 * Check environment signals that indicate color should be disabled.
 */
function isColorDisabled(): boolean {
  // NO_COLOR standard (https://no-color.org)
  if (process.env.NO_COLOR !== undefined && process.env.NO_COLOR !== '') return true;

  if (process.env.TERM === 'dumb') return true;

  // Non-interactive stdout (piped)
  if (!process.stdout.isTTY) return true;

  return false;
}
