/**
 * Satori Telegram — Output
 *
 * Command results go to stdout, everything else to stderr. `--json` turns
 * both into JSON documents; `--quiet` keeps only bare values and failures.
 */

export type OutputMode = 'human' | 'json' | 'quiet';

let mode: OutputMode = 'human';

export function setOutputMode(next: OutputMode): void {
  mode = next;
}

/** Process exit codes of the CLI. */
export const ExitCode = {
  OK: 0,
  FAILED: 1,
  /** Bad arguments, a missing or invalid config file. */
  USAGE: 2,
  /** Telegram refused the bot token. */
  TOKEN_REJECTED: 4,
  /** The bridge was stopped with Ctrl+C. */
  INTERRUPTED: 130,
} as const;

export interface CliFailure {
  code: string;
  message: string;
  suggestion?: string;
  /** Ids of the messages Telegram accepted before the failure. */
  delivered?: string[];
}

/**
 * Print a command result: as JSON, as a bare string when quiet, or
 * through `human` otherwise.
 */
export function printResult(data: unknown, human: () => void): void {
  switch (mode) {
    case 'json':
      process.stdout.write(`${JSON.stringify(data, null, 2)}\n`);
      return;
    case 'quiet':
      if (typeof data === 'string') process.stdout.write(`${data}\n`);
      return;
    case 'human':
      human();
  }
}

/**
 * Print a failure to stderr. Failures are shown in every mode.
 */
export function printFailure(failure: CliFailure): void {
  if (mode === 'json') {
    process.stderr.write(`${JSON.stringify({ error: failure }, null, 2)}\n`);
    return;
  }

  const lines = [`Error: ${failure.message}`];
  if (failure.delivered && failure.delivered.length > 0) {
    lines.push(`Already delivered: ${failure.delivered.join(', ')}`);
  }
  if (failure.suggestion && mode === 'human') {
    lines.push(failure.suggestion);
  }
  process.stderr.write(`\n${lines.map((line) => `  ${line}\n`).join('')}\n`);
}

/** A one-line confirmation, human mode only. */
export function printSuccess(message: string): void {
  if (mode === 'human') {
    process.stderr.write(`  ${message}\n`);
  }
}
