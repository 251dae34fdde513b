/**
 * Satori Telegram — Shared CLI Helpers
 *
 * Common utilities used across CLI command files.
 */

import { ConfigError, loadConfig } from '../config/loader.js';
import type { BridgeConfig } from '../config/types.js';
import { TelegramApiError } from '../telegram/client.js';
import { PartialDeliveryError } from '../telegram/send.js';
import { ExitCode, printFailure } from '../utils/output.js';
import { getConfigOverride } from './global-options.js';

// ============================================================================
// CONFIG
// ============================================================================

/**
 * Load the config selected by --config (or the default path).
 * Prints an error and sets exitCode if it cannot be loaded.
 */
export function requireConfig(): BridgeConfig | null {
  try {
    return loadConfig(getConfigOverride());
  } catch (error) {
    if (error instanceof ConfigError) {
      printFailure({
        code: error.code,
        message: error.message,
        suggestion: 'Fix the file or run `satori-telegram config init` to start from defaults.',
      });
      process.exitCode = ExitCode.USAGE;
      return null;
    }
    throw error;
  }
}

// ============================================================================
// ERROR OUTPUT
// ============================================================================

/**
 * Print a failed command's error and set the exit code. Messages sent
 * before a delivery failure are listed; a refused bot token exits with
 * its own code.
 */
export function printError(context: string, error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  const code =
    error instanceof Error && 'code' in error && typeof error.code === 'string'
      ? error.code
      : 'COMMAND_ERROR';
  printFailure({
    code,
    message: `${context}: ${message}`,
    delivered: error instanceof PartialDeliveryError
      ? error.delivered.map((sent) => sent.id)
      : undefined,
  });
  process.exitCode = isTokenRejection(error) ? ExitCode.TOKEN_REJECTED : ExitCode.FAILED;
}

/**
 * Telegram answers 401 to a revoked or mistyped bot token, and 404 when
 * the token is so malformed that no bot route matches.
 */
export function isTokenRejection(error: unknown): boolean {
  return (
    error instanceof TelegramApiError &&
    error.code === 'API_ERROR' &&
    (error.statusCode === 401 || error.statusCode === 404)
  );
}

// ============================================================================
// DID-YOU-MEAN
// ============================================================================

/**
 * Simple Levenshtein distance for "did you mean?" suggestions.
 */
function levenshtein(a: string, b: string): number {
  const m = a.length;
  const n = b.length;
  const dp: number[][] = Array.from({ length: m + 1 }, () => new Array<number>(n + 1).fill(0));

  for (let i = 0; i <= m; i++) dp[i][0] = i;
  for (let j = 0; j <= n; j++) dp[0][j] = j;

  for (let i = 1; i <= m; i++) {
    for (let j = 1; j <= n; j++) {
      dp[i][j] = a[i - 1] === b[j - 1]
        ? dp[i - 1][j - 1]
        : 1 + Math.min(dp[i - 1][j], dp[i][j - 1], dp[i - 1][j - 1]);
    }
  }

  return dp[m][n];
}

/**
 * Find the closest match from a list of candidates.
 * Returns the candidate if the distance is <= maxDistance, otherwise undefined.
 */
export function didYouMean(
  input: string,
  candidates: string[],
  maxDistance = 3
): string | undefined {
  let best: string | undefined;
  let bestDist = maxDistance + 1;

  for (const candidate of candidates) {
    const dist = levenshtein(input.toLowerCase(), candidate.toLowerCase());
    if (dist < bestDist) {
      bestDist = dist;
      best = candidate;
    }
  }

  return bestDist <= maxDistance ? best : undefined;
}
