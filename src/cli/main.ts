/**
 * Satori Telegram — CLI Runner
 *
 * Parses the command line and runs the chosen command. Errors no command
 * handled are printed like any other failure, so `--json` still gets JSON.
 */

import { createLogger } from '../utils/logger.js';
import { ExitCode } from '../utils/output.js';
import { printError } from './helpers.js';
import { createProgram } from './program.js';

const log = createLogger('CLI');

export async function run(argv: readonly string[]): Promise<void> {
  // `start` runs inside parseAsync, so this covers the bridge's whole life.
  const onRejection = (reason: unknown) => {
    log.error('Unhandled rejection', reason instanceof Error ? reason : { reason: String(reason) });
    process.exitCode = ExitCode.FAILED;
  };
  process.on('unhandledRejection', onRejection);

  try {
    await createProgram().parseAsync([...argv]);
  } catch (error) {
    printError('Fatal', error);
  } finally {
    process.off('unhandledRejection', onRejection);
  }
}
