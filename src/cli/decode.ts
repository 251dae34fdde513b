/**
 * Satori Telegram — Decode Command
 *
 * Reads a Telegram message (or an update carrying one) from a JSON file
 * and prints the Satori markup it decodes to.
 */

import { readFileSync } from 'node:fs';
import { decodeMessage } from '../telegram/decode.js';
import type { TelegramMessage } from '../telegram/types.js';
import { ExitCode, printFailure, printResult } from '../utils/output.js';

export interface DecodeOptions {
  selfId: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Shallow check of the fields every message carries.
 */
export function isTelegramMessage(value: unknown): value is TelegramMessage {
  return (
    isRecord(value) &&
    typeof value.message_id === 'number' &&
    typeof value.date === 'number' &&
    isRecord(value.chat) &&
    typeof value.chat.id === 'number' &&
    typeof value.chat.type === 'string'
  );
}

/**
 * The message in a JSON document: the document itself, or the `message`
 * field of an update.
 */
export function extractMessage(document: unknown): TelegramMessage | null {
  if (isTelegramMessage(document)) return document;
  if (isRecord(document) && isTelegramMessage(document.message)) return document.message;
  return null;
}

export async function decodeCommand(file: string, options: DecodeOptions): Promise<void> {
  let document: unknown;
  try {
    document = JSON.parse(readFileSync(file, 'utf-8'));
  } catch (error) {
    printFailure({
      code: 'INVALID_INPUT',
      message: `Cannot read ${file}: ${error instanceof Error ? error.message : String(error)}`,
    });
    process.exitCode = ExitCode.USAGE;
    return;
  }

  const message = extractMessage(document);
  if (!message) {
    printFailure({
      code: 'INVALID_INPUT',
      message: `${file} does not contain a Telegram message`,
      suggestion: 'Pass a Message object or an Update with a "message" field.',
    });
    process.exitCode = ExitCode.USAGE;
    return;
  }

  if (!/^\d+$/.test(options.selfId)) {
    printFailure({ code: 'INVALID_INPUT', message: `Invalid bot id: ${options.selfId}` });
    process.exitCode = ExitCode.USAGE;
    return;
  }

  const decoded = decodeMessage(Number(options.selfId), message);

  printResult(decoded, () => {
    process.stdout.write(decoded.content + '\n');
  });
}
