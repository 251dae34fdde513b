/**
 * Satori Telegram — Bot API Surface
 *
 * The Telegram operations the bridge depends on. TelegramBotClient
 * implements this over HTTP; tests substitute in-process fakes.
 */

import type {
  TelegramChat,
  TelegramFile,
  TelegramInlineKeyboardMarkup,
  TelegramMessage,
  TelegramUpdate,
  TelegramUser,
} from './types.js';

export interface UploadFile {
  filename: string;
  data: Uint8Array;
  mime: string;
}

export type InputMediaType = 'photo' | 'audio' | 'video' | 'document';

export interface InputMedia {
  type: InputMediaType;
  file: UploadFile;
  caption?: string;
  hasSpoiler?: boolean;
}

interface ChatTarget {
  chatId: number;
  threadId?: number;
  replyTo?: number;
}

export interface SendMessageParams extends ChatTarget {
  text: string;
  replyMarkup?: TelegramInlineKeyboardMarkup;
}

export interface SendMediaGroupParams extends ChatTarget {
  media: InputMedia[];
}

export interface SendAnimationParams extends ChatTarget {
  animation: UploadFile;
  caption?: string;
  hasSpoiler?: boolean;
}

export interface EditMessageTextParams {
  chatId: number;
  messageId: number;
  text: string;
  replyMarkup?: TelegramInlineKeyboardMarkup;
}

export interface GetUpdatesParams {
  offset?: number;
  timeout?: number;
  allowedUpdates?: string[];
}

/**
 * Text and captions are always sent with the HTML parse mode.
 */
export interface TelegramApi {
  getMe(): Promise<TelegramUser>;
  getChat(chatId: number): Promise<TelegramChat>;
  getUpdates(params: GetUpdatesParams, signal?: AbortSignal): Promise<TelegramUpdate[]>;
  sendMessage(params: SendMessageParams): Promise<TelegramMessage>;
  sendMediaGroup(params: SendMediaGroupParams): Promise<TelegramMessage[]>;
  sendAnimation(params: SendAnimationParams): Promise<TelegramMessage>;
  editMessageText(params: EditMessageTextParams): Promise<TelegramMessage | true>;
  answerCallbackQuery(callbackQueryId: string): Promise<true>;
  getFile(fileId: string): Promise<TelegramFile>;
  downloadFile(filePath: string): Promise<Response>;
}
