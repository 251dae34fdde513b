/**
 * Satori Telegram — Dry-Run Bot API
 *
 * A TelegramApi that records the calls it receives instead of making
 * them, answering with synthetic messages. Used by `render` to show what
 * a piece of content would send.
 */

import type {
  EditMessageTextParams,
  GetUpdatesParams,
  SendAnimationParams,
  SendMediaGroupParams,
  SendMessageParams,
  TelegramApi,
} from './api.js';
import { mimeFromFilename, type FileFetcher } from './files.js';
import type {
  TelegramChat,
  TelegramFile,
  TelegramMessage,
  TelegramUpdate,
  TelegramUser,
} from './types.js';

export const DRY_RUN_BOT: TelegramUser = {
  id: 1,
  is_bot: true,
  first_name: 'Dry Run',
  username: 'dry_run_bot',
};

export type RecordedCall =
  | { method: 'sendMessage'; params: SendMessageParams }
  | { method: 'sendMediaGroup'; params: SendMediaGroupParams }
  | { method: 'sendAnimation'; params: SendAnimationParams }
  | { method: 'editMessageText'; params: EditMessageTextParams };

export class DryRunApi implements TelegramApi {
  readonly calls: RecordedCall[] = [];
  private nextMessageId = 1;

  async getMe(): Promise<TelegramUser> {
    return DRY_RUN_BOT;
  }

  async getChat(chatId: number): Promise<TelegramChat> {
    return { id: chatId, type: 'private' };
  }

  async getUpdates(_params: GetUpdatesParams): Promise<TelegramUpdate[]> {
    return [];
  }

  async sendMessage(params: SendMessageParams): Promise<TelegramMessage> {
    this.calls.push({ method: 'sendMessage', params });
    return this.message(params.chatId);
  }

  async sendMediaGroup(params: SendMediaGroupParams): Promise<TelegramMessage[]> {
    this.calls.push({ method: 'sendMediaGroup', params });
    return params.media.map(() => this.message(params.chatId));
  }

  async sendAnimation(params: SendAnimationParams): Promise<TelegramMessage> {
    this.calls.push({ method: 'sendAnimation', params });
    return this.message(params.chatId);
  }

  async editMessageText(params: EditMessageTextParams): Promise<true> {
    this.calls.push({ method: 'editMessageText', params });
    return true;
  }

  async answerCallbackQuery(_callbackQueryId: string): Promise<true> {
    return true;
  }

  async getFile(fileId: string): Promise<TelegramFile> {
    return { file_id: fileId, file_unique_id: fileId };
  }

  async downloadFile(_filePath: string): Promise<Response> {
    return new Response(new Uint8Array(0));
  }

  private message(chatId: number): TelegramMessage {
    return {
      message_id: this.nextMessageId++,
      date: 0,
      chat: { id: chatId, type: 'private' },
    };
  }
}

/**
 * Resolve attachments to empty files without touching the network. The
 * MIME type comes from the URL's extension.
 */
export const dryRunFetchFile: FileFetcher = async (url, name) => {
  const path = url.startsWith('data:') ? '' : url.split(/[?#]/, 1)[0];
  const filename = name || path.slice(path.lastIndexOf('/') + 1) || 'file';
  const dataUri = /^data:([^;,]+)/.exec(url);

  return {
    filename,
    data: new Uint8Array(0),
    mime: dataUri ? dataUri[1] : mimeFromFilename(filename),
  };
};
