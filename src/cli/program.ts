/**
 * Satori Telegram — Program Definition
 *
 * Commander-based CLI: run the bridge, set it up, and inspect how
 * content converts in either direction.
 */

import { Command } from 'commander';
import { CLI_NAME, VERSION_STRING } from '../config/defaults.js';
import { setupCommand } from './setup.js';
import { startCommand } from './start.js';
import { renderCommand } from './render.js';
import { decodeCommand } from './decode.js';
import { registerConfigCommands } from './config.js';
import { applyGlobalOptions } from './global-options.js';
import { didYouMean } from './helpers.js';
import { ExitCode } from '../utils/output.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description('Satori protocol adapter for Telegram bots')
    .version(VERSION_STRING, '-V, --version', 'Show version information');

  // ── Global Options ────────────────────────────────────────────────────

  applyGlobalOptions(program);

  // ── Bridge ────────────────────────────────────────────────────────────

  program
    .command('setup')
    .description('Configure the bot token and Satori API interactively')
    .action(setupCommand);

  program
    .command('start')
    .description('Connect the bot and serve the Satori API')
    .action(startCommand);

  // ── Conversion Tools ──────────────────────────────────────────────────

  program
    .command('render')
    .description('Show the Telegram calls Satori markup would produce (dry run)')
    .argument('<markup>', 'Satori message markup')
    .option('--channel <id>', 'Target channel id (chat[:thread])', '1')
    .option('--edit', 'Render as an edit of an existing message')
    .addHelpText('after', `
Examples:
  $ ${CLI_NAME} render '<b>Hello</b> <button type="action" id="ok">OK</button>'
  $ ${CLI_NAME} render --edit 'Updated <i>text</i>'`)
    .action(renderCommand);

  program
    .command('decode')
    .description('Decode a Telegram message JSON file to Satori markup')
    .argument('<file>', 'JSON file holding a Message or an Update')
    .option('--self-id <id>', 'Bot user id used in internal: file locators', '0')
    .action(decodeCommand);

  // ── Config ────────────────────────────────────────────────────────────

  registerConfigCommands(program);

  // ── Unknown Command Handler (did you mean?) ─────────────────────────────

  program.on('command:*', (operands: string[]) => {
    const unknown = operands[0];
    const commands = program.commands.map((c) => c.name());
    const suggestion = didYouMean(unknown, commands);

    process.stderr.write(`\n  Error: Unknown command "${unknown}".`);
    if (suggestion) {
      process.stderr.write(` Did you mean "${suggestion}"?`);
    }
    process.stderr.write(`\n  Run \`${CLI_NAME} --help\` for available commands.\n\n`);
    process.exitCode = ExitCode.USAGE;
  });

  return program;
}
