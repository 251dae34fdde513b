/**
 * Satori Telegram — Render Command
 *
 * Dry run of the encoder: shows the Telegram calls a piece of Satori
 * markup would produce, without contacting Telegram or fetching files.
 */

import { parseChannelId } from '../telegram/locator.js';
import { DRY_RUN_BOT, DryRunApi, dryRunFetchFile, type RecordedCall } from '../telegram/dry-run.js';
import { sendMessage, updateMessage } from '../telegram/send.js';
import type { TelegramInlineKeyboardButton, TelegramInlineKeyboardMarkup } from '../telegram/types.js';
import { ExitCode, printFailure, printResult } from '../utils/output.js';
import { printError } from './helpers.js';

export interface RenderOptions {
  channel: string;
  edit?: boolean;
}

export interface PlannedMedia {
  type: string;
  filename: string;
  mime: string;
  caption?: string;
  spoiler?: boolean;
}

export interface PlannedOperation {
  method: RecordedCall['method'];
  replyTo?: number;
  text?: string;
  media?: PlannedMedia[];
  keyboard?: TelegramInlineKeyboardButton[][];
}

/**
 * Flatten recorded calls into a printable plan. File bytes are left out.
 */
export function describeCalls(calls: readonly RecordedCall[]): PlannedOperation[] {
  return calls.map((call): PlannedOperation => {
    switch (call.method) {
      case 'sendMessage':
        return {
          method: call.method,
          replyTo: call.params.replyTo,
          text: call.params.text,
          keyboard: rowsOf(call.params.replyMarkup),
        };
      case 'sendMediaGroup':
        return {
          method: call.method,
          replyTo: call.params.replyTo,
          media: call.params.media.map((item) => ({
            type: item.type,
            filename: item.file.filename,
            mime: item.file.mime,
            caption: item.caption,
            spoiler: item.hasSpoiler,
          })),
        };
      case 'sendAnimation':
        return {
          method: call.method,
          replyTo: call.params.replyTo,
          media: [{
            type: 'animation',
            filename: call.params.animation.filename,
            mime: call.params.animation.mime,
            caption: call.params.caption,
            spoiler: call.params.hasSpoiler,
          }],
        };
      case 'editMessageText':
        return {
          method: call.method,
          text: call.params.text,
          keyboard: rowsOf(call.params.replyMarkup),
        };
    }
  });
}

function rowsOf(markup: TelegramInlineKeyboardMarkup | undefined): TelegramInlineKeyboardButton[][] | undefined {
  return markup?.inline_keyboard;
}

export async function renderCommand(markup: string, options: RenderOptions): Promise<void> {
  const chalk = (await import('chalk')).default;

  const target = parseChannelId(options.channel);
  if (!target) {
    printFailure({
      code: 'INVALID_CHANNEL',
      message: `Invalid channel id: ${options.channel}`,
      suggestion: 'Use a chat id, optionally followed by :<thread id>.',
    });
    process.exitCode = ExitCode.USAGE;
    return;
  }

  const api = new DryRunApi();
  try {
    if (options.edit) {
      await updateMessage(api, target, 1, markup);
    } else {
      await sendMessage({ api, selfId: DRY_RUN_BOT.id, target, fetchFile: dryRunFetchFile }, markup);
    }
  } catch (error) {
    printError('Cannot render', error);
    return;
  }

  const plan = describeCalls(api.calls);

  printResult(plan, () => {
    console.log();
    if (plan.length === 0) {
      console.log(chalk.gray('  Nothing to send.\n'));
      return;
    }

    plan.forEach((op, index) => {
      const reply = op.replyTo !== undefined ? chalk.gray(` (reply to #${op.replyTo})`) : '';
      console.log(`  ${chalk.bold(`${index + 1}. ${op.method}`)}${reply}`);
      for (const item of op.media ?? []) {
        const spoiler = item.spoiler ? chalk.yellow(' spoiler') : '';
        console.log(chalk.cyan(`     ${item.type} ${item.filename} (${item.mime})`) + spoiler);
        if (item.caption) console.log(indent(item.caption));
      }
      if (op.text !== undefined) console.log(indent(op.text));
      for (const row of op.keyboard ?? []) {
        console.log(chalk.magenta(`     ${row.map((button) => `[${button.text}]`).join(' ')}`));
      }
      console.log();
    });
  });
}

function indent(text: string): string {
  return text
    .split('\n')
    .map((line) => `     ${line}`)
    .join('\n');
}
