/**
 * Satori Telegram — Bot API Client
 *
 * HTTP client for the Telegram Bot API. Plain calls are sent as JSON;
 * uploads as multipart form data with `attach://` references.
 */

import type {
  EditMessageTextParams,
  GetUpdatesParams,
  InputMedia,
  SendAnimationParams,
  SendMediaGroupParams,
  SendMessageParams,
  TelegramApi,
  UploadFile,
} from './api.js';
import { PARSE_MODE } from './format.js';
import type {
  TelegramChat,
  TelegramFile,
  TelegramMessage,
  TelegramUpdate,
  TelegramUser,
} from './types.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('Telegram:Client');

export const DEFAULT_API_BASE_URL = 'https://api.telegram.org';

/** sendMediaGroup accepts 2-10 items per call. */
const MEDIA_GROUP_LIMIT = 10;

const REQUEST_TIMEOUT_MS = 60_000;

/** Single-item uploads use the dedicated method for their media type. */
const SINGLE_MEDIA_METHODS: Record<InputMedia['type'], string> = {
  photo: 'sendPhoto',
  audio: 'sendAudio',
  video: 'sendVideo',
  document: 'sendDocument',
};

interface BotApiResponse<T> {
  ok: boolean;
  result?: T;
  description?: string;
  error_code?: number;
  parameters?: { retry_after?: number };
}

type FormValue = string | number | boolean | object | undefined;

// ============================================================================
// CLIENT
// ============================================================================

export class TelegramBotClient implements TelegramApi {
  private readonly baseUrl: string;

  constructor(
    private readonly token: string,
    apiBaseUrl: string = DEFAULT_API_BASE_URL
  ) {
    this.baseUrl = apiBaseUrl.replace(/\/$/, '');
  }

  // ── Identity ─────────────────────────────────────────────────────────────

  getMe(): Promise<TelegramUser> {
    return this.call<TelegramUser>('getMe', {});
  }

  getChat(chatId: number): Promise<TelegramChat> {
    return this.call<TelegramChat>('getChat', { chat_id: chatId });
  }

  // ── Updates ──────────────────────────────────────────────────────────────

  getUpdates(params: GetUpdatesParams, signal?: AbortSignal): Promise<TelegramUpdate[]> {
    const timeoutMs = ((params.timeout ?? 0) + 10) * 1000;
    return this.call<TelegramUpdate[]>(
      'getUpdates',
      {
        offset: params.offset,
        timeout: params.timeout,
        allowed_updates: params.allowedUpdates,
      },
      { signal, timeoutMs }
    );
  }

  answerCallbackQuery(callbackQueryId: string): Promise<true> {
    return this.call<true>('answerCallbackQuery', { callback_query_id: callbackQueryId });
  }

  // ── Sending ──────────────────────────────────────────────────────────────

  sendMessage(params: SendMessageParams): Promise<TelegramMessage> {
    return this.call<TelegramMessage>('sendMessage', {
      ...chatFields(params),
      text: params.text,
      parse_mode: PARSE_MODE,
      reply_markup: params.replyMarkup,
    });
  }

  /**
   * Send media as an album. More than ten are split into consecutive
   * albums; a lone item (or a lone remainder) goes through its dedicated
   * method, since an album holds at least two.
   */
  async sendMediaGroup(params: SendMediaGroupParams): Promise<TelegramMessage[]> {
    const results: TelegramMessage[] = [];
    for (let start = 0; start < params.media.length; start += MEDIA_GROUP_LIMIT) {
      const chunk = params.media.slice(start, start + MEDIA_GROUP_LIMIT);
      if (chunk.length === 1) {
        results.push(await this.sendSingleMedia(params, chunk[0]));
        continue;
      }
      const form = buildForm(chatFields(params));
      const media = chunk.map((item, index) => {
        const attachName = `file${index}`;
        appendFile(form, attachName, item.file);
        return {
          type: item.type,
          media: `attach://${attachName}`,
          caption: item.caption,
          parse_mode: item.caption ? PARSE_MODE : undefined,
          has_spoiler: item.hasSpoiler,
        };
      });
      form.append('media', JSON.stringify(media));

      results.push(...(await this.call<TelegramMessage[]>('sendMediaGroup', form)));
    }
    return results;
  }

  sendAnimation(params: SendAnimationParams): Promise<TelegramMessage> {
    const form = buildForm({
      ...chatFields(params),
      caption: params.caption,
      parse_mode: params.caption ? PARSE_MODE : undefined,
      has_spoiler: params.hasSpoiler,
    });
    appendFile(form, 'animation', params.animation);
    return this.call<TelegramMessage>('sendAnimation', form);
  }

  editMessageText(params: EditMessageTextParams): Promise<TelegramMessage | true> {
    return this.call<TelegramMessage | true>('editMessageText', {
      chat_id: params.chatId,
      message_id: params.messageId,
      text: params.text,
      parse_mode: PARSE_MODE,
      reply_markup: params.replyMarkup,
    });
  }

  // ── Files ────────────────────────────────────────────────────────────────

  getFile(fileId: string): Promise<TelegramFile> {
    return this.call<TelegramFile>('getFile', { file_id: fileId });
  }

  async downloadFile(filePath: string): Promise<Response> {
    const response = await fetch(`${this.baseUrl}/file/bot${this.token}/${filePath}`, {
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
    if (!response.ok) {
      throw new TelegramApiError(
        `File download failed (${response.status})`,
        'DOWNLOAD_FAILED',
        response.status
      );
    }
    return response;
  }

  // ── Internal ─────────────────────────────────────────────────────────────

  private sendSingleMedia(
    params: SendMediaGroupParams,
    item: InputMedia
  ): Promise<TelegramMessage> {
    const form = buildForm({
      ...chatFields(params),
      caption: item.caption,
      parse_mode: item.caption ? PARSE_MODE : undefined,
      has_spoiler: item.type === 'photo' || item.type === 'video' ? item.hasSpoiler : undefined,
    });
    appendFile(form, item.type, item.file);
    return this.call<TelegramMessage>(SINGLE_MEDIA_METHODS[item.type], form);
  }

  private async call<T>(
    method: string,
    body: Record<string, FormValue> | FormData,
    options: { signal?: AbortSignal; timeoutMs?: number } = {}
  ): Promise<T> {
    const url = `${this.baseUrl}/bot${this.token}/${method}`;
    const { signal, release } = withTimeout(options.timeoutMs ?? REQUEST_TIMEOUT_MS, options.signal);
    try {
      return await this.request<T>(method, url, body, signal);
    } finally {
      release();
    }
  }

  private async request<T>(
    method: string,
    url: string,
    body: Record<string, FormValue> | FormData,
    signal: AbortSignal
  ): Promise<T> {

    const init: RequestInit =
      body instanceof FormData
        ? { method: 'POST', body, signal }
        : {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify(body),
            signal,
          };

    let response: Response;
    try {
      response = await fetch(url, init);
    } catch (error) {
      if (error instanceof Error && error.name === 'TimeoutError') {
        throw new TelegramApiError(`${method} timed out`, 'TIMEOUT');
      }
      if (error instanceof Error && error.name === 'AbortError') {
        throw error;
      }
      throw new TelegramApiError(
        `Network error: ${error instanceof Error ? error.message : String(error)}`,
        'NETWORK_ERROR'
      );
    }

    let payload: BotApiResponse<T>;
    try {
      payload = (await response.json()) as BotApiResponse<T>;
    } catch {
      throw new TelegramApiError(
        `${method} returned a non-JSON response (HTTP ${response.status})`,
        'API_ERROR',
        response.status
      );
    }

    if (!payload.ok || payload.result === undefined) {
      log.debug('Bot API call failed', { method, status: response.status, error: payload.description });
      throw new TelegramApiError(
        `Telegram API error (${payload.error_code ?? response.status}): ${payload.description ?? 'unknown error'}`,
        'API_ERROR',
        payload.error_code ?? response.status,
        payload.parameters?.retry_after
      );
    }

    return payload.result;
  }
}

// ============================================================================
// REQUEST HELPERS
// ============================================================================

interface LinkedSignal {
  signal: AbortSignal;
  /** Detach from the caller's signal once the request settles. */
  release: () => void;
}

/**
 * Timeout signal that also aborts when the caller's signal does.
 * Call `release` when the request settles.
 */
function withTimeout(timeoutMs: number, signal?: AbortSignal): LinkedSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  if (!signal) return { signal: timeout, release: () => {} };

  const controller = new AbortController();
  if (signal.aborted) {
    controller.abort(signal.reason);
    return { signal: controller.signal, release: () => {} };
  }

  const onAbort = () => controller.abort(signal.reason);
  const onTimeout = () => controller.abort(timeout.reason);
  signal.addEventListener('abort', onAbort, { once: true });
  timeout.addEventListener('abort', onTimeout, { once: true });
  return {
    signal: controller.signal,
    release: () => {
      signal.removeEventListener('abort', onAbort);
      timeout.removeEventListener('abort', onTimeout);
    },
  };
}

function chatFields(params: { chatId: number; threadId?: number; replyTo?: number }): Record<string, FormValue> {
  return {
    chat_id: params.chatId,
    message_thread_id: params.threadId,
    reply_parameters: params.replyTo !== undefined
      ? { message_id: params.replyTo, allow_sending_without_reply: true }
      : undefined,
  };
}

/**
 * Multipart form from plain fields. Objects are JSON-encoded, undefined
 * fields are skipped.
 */
function buildForm(fields: Record<string, FormValue>): FormData {
  const form = new FormData();
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    form.append(key, typeof value === 'object' ? JSON.stringify(value) : String(value));
  }
  return form;
}

function appendFile(form: FormData, field: string, file: UploadFile): void {
  form.append(field, new Blob([file.data], { type: file.mime }), file.filename);
}

// ============================================================================
// ERROR
// ============================================================================

export class TelegramApiError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode?: number,
    /** Seconds to wait before retrying, when the API asked for it. */
    public readonly retryAfter?: number
  ) {
    super(message);
    this.name = 'TelegramApiError';
  }
}
