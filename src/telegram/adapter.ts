/**
 * Satori Telegram — Adapter
 *
 * Connects one bot to the Satori side: receives updates by long polling
 * and turns them into Satori events, and serves the Satori resource API
 * (login, users, messages, internal files) on top of the Bot API.
 */

import { basename } from 'node:path';
import type { Element } from '../element/types.js';
import type { FilesConfig, ReconnectConfig, TelegramConfig } from '../config/types.js';
import { LoginStatus } from '../satori/types.js';
import type {
  LoginStatusValue,
  MessageObject,
  SatoriEvent,
  SatoriLogin,
  SatoriUser,
} from '../satori/types.js';
import { computeBackoff, isMaxAttemptsReached, sleep } from '../utils/backoff.js';
import { createLogger } from '../utils/logger.js';
import type { TelegramApi } from './api.js';
import { TelegramApiError } from './client.js';
import { decodeGuildChannel, decodeMessage, decodeUser } from './decode.js';
import {
  fetchFile,
  mimeFromFilename,
  normalizeContentType,
  type DownloadedFile,
  type FileFetcher,
} from './files.js';
import { ADAPTER, parseChannelId, parseLocator, PLATFORM, type ParsedChannelId } from './locator.js';
import { sendMessage, updateMessage } from './send.js';
import type { TelegramCallbackQuery, TelegramMessage, TelegramUpdate, TelegramUser } from './types.js';

const log = createLogger('Telegram:Adapter');

const ALLOWED_UPDATES = ['message', 'callback_query'];

const DEFAULT_MIME = 'application/octet-stream';

export type EventHandler = (event: SatoriEvent) => Promise<void>;

export interface TelegramAdapterOptions {
  api: TelegramApi;
  telegram: TelegramConfig;
  reconnect: ReconnectConfig;
  files: FilesConfig;
  fetchFile?: FileFetcher;
}

// ============================================================================
// ERRORS
// ============================================================================

export type AdapterErrorCode = 'NOT_READY' | 'INVALID_ARGUMENT' | 'NOT_FOUND' | 'NOT_SUPPORTED';

export class AdapterError extends Error {
  constructor(
    message: string,
    public readonly code: AdapterErrorCode
  ) {
    super(message);
    this.name = 'AdapterError';
  }
}

// ============================================================================
// ADAPTER
// ============================================================================

export class TelegramAdapter {
  private self: TelegramUser | null = null;
  private status: LoginStatusValue = LoginStatus.OFFLINE;
  private offset: number | undefined;
  private eventId = 0;

  constructor(private readonly options: TelegramAdapterOptions) {}

  get selfId(): string | undefined {
    return this.self ? String(this.self.id) : undefined;
  }

  /**
   * Identify the bot through getMe. Resource methods need this first.
   */
  async connect(): Promise<TelegramUser> {
    this.status = LoginStatus.CONNECT;
    try {
      this.self = await this.options.api.getMe();
    } catch (error) {
      this.status = LoginStatus.OFFLINE;
      throw error;
    }
    this.status = LoginStatus.ONLINE;
    log.info('Bot connected', { id: this.self.id, username: this.self.username });
    return this.self;
  }

  /**
   * Identify the bot unless already connected, then long-poll for updates
   * until the signal aborts.
   * Poll failures back off per the reconnect settings; rejects once the
   * attempts run out.
   */
  async start(onEvent: EventHandler, signal: AbortSignal): Promise<void> {
    const { api, telegram, reconnect } = this.options;
    if (!this.self) await this.connect();
    this.status = LoginStatus.ONLINE;

    let attempt = 0;

    try {
      while (!signal.aborted) {
        let updates: TelegramUpdate[];
        try {
          updates = await api.getUpdates(
            {
              offset: this.offset,
              timeout: telegram.pollTimeoutSeconds,
              allowedUpdates: ALLOWED_UPDATES,
            },
            signal
          );
        } catch (error) {
          if (signal.aborted) break;

          attempt++;
          if (isMaxAttemptsReached(reconnect, attempt)) {
            throw error;
          }

          const delay = retryDelay(reconnect, attempt, error);
          this.status = LoginStatus.RECONNECT;
          log.warn('Polling failed', {
            error: error instanceof Error ? error.message : String(error),
            attempt,
            delayMs: delay,
          });
          try {
            await sleep(delay, signal);
          } catch {
            break; // aborted while waiting
          }
          continue;
        }

        attempt = 0;
        this.status = LoginStatus.ONLINE;

        for (const update of updates) {
          this.offset = update.update_id + 1;
          await this.handleUpdate(update, onEvent);
        }
      }
    } finally {
      this.status = LoginStatus.OFFLINE;
    }

    log.info('Polling stopped');
  }

  /**
   * Dispatch one update. Handler failures are logged and do not stop
   * polling.
   */
  async handleUpdate(update: TelegramUpdate, onEvent: EventHandler): Promise<void> {
    const selfId = this.requireSelf();
    let event: SatoriEvent | null = null;

    if (update.message) {
      event = this.messageEvent(selfId, update.message);
    } else if (update.callback_query) {
      event = this.buttonEvent(selfId, update.callback_query);
    }

    if (!event) {
      log.debug('Ignoring update', { updateId: update.update_id });
      return;
    }

    try {
      await onEvent(event);
    } catch (error) {
      log.warn('Event handler failed', {
        type: event.type,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    if (update.callback_query) {
      await this.options.api.answerCallbackQuery(update.callback_query.id).catch((error: unknown) => {
        log.warn('Failed to answer callback query', {
          error: error instanceof Error ? error.message : String(error),
        });
      });
    }
  }

  // ── Resource API ─────────────────────────────────────────────────────────

  getLogin(): SatoriLogin {
    return {
      user: this.self ? decodeUser(this.self.id, this.self) : undefined,
      self_id: this.selfId,
      platform: PLATFORM,
      adapter: ADAPTER,
      status: this.status,
    };
  }

  async getUser(userId: string): Promise<SatoriUser> {
    const selfId = this.requireSelf();
    const chat = await this.options.api.getChat(parseInteger(userId, 'user_id'));
    if (chat.type !== 'private') {
      throw new AdapterError(`${userId} is not a user`, 'NOT_FOUND');
    }
    return decodeUser(
      selfId,
      {
        id: chat.id,
        is_bot: false,
        first_name: chat.first_name ?? '',
        last_name: chat.last_name,
        username: chat.username,
      },
      chat.photo
    );
  }

  async createMessage(channelId: string, content: string | readonly Element[]): Promise<MessageObject[]> {
    const selfId = this.requireSelf();
    return sendMessage(
      {
        api: this.options.api,
        selfId,
        target: parseChannel(channelId),
        fetchFile: this.options.fetchFile ?? fetchFile,
        timeoutSeconds: this.options.files.timeoutSeconds,
      },
      content
    );
  }

  async updateMessage(
    channelId: string,
    messageId: string,
    content: string | readonly Element[]
  ): Promise<void> {
    this.requireSelf();
    return updateMessage(
      this.options.api,
      parseChannel(channelId),
      parseInteger(messageId, 'message_id'),
      content
    );
  }

  /** The Bot API cannot fetch a message by id. */
  async getMessage(_channelId: string, _messageId: string): Promise<MessageObject> {
    throw new AdapterError(
      'Fetching a message by id is not supported by the Telegram Bot API',
      'NOT_SUPPORTED'
    );
  }

  /**
   * Resolve an `internal:` locator produced by this bot to its bytes.
   */
  async downloadInternal(locator: string): Promise<DownloadedFile> {
    const selfId = this.requireSelf();
    const parsed = parseLocator(locator);
    if (!parsed || parsed.platform !== PLATFORM || parsed.selfId !== String(selfId)) {
      throw new AdapterError(`Unknown locator: ${locator}`, 'NOT_FOUND');
    }

    const file = await this.options.api.getFile(parsed.fileId);
    if (!file.file_path) {
      throw new AdapterError(`File ${parsed.fileId} is not available for download`, 'NOT_FOUND');
    }

    const response = await this.options.api.downloadFile(file.file_path);
    const headerMime = normalizeContentType(response.headers.get('content-type'));

    return {
      filename: basename(file.file_path),
      data: new Uint8Array(await response.arrayBuffer()),
      mime: headerMime === DEFAULT_MIME ? mimeFromFilename(file.file_path) : headerMime,
    };
  }

  // ── Events ───────────────────────────────────────────────────────────────

  private messageEvent(selfId: number, message: TelegramMessage): SatoriEvent {
    const { guild, channel } = decodeGuildChannel(
      selfId,
      message.chat,
      message.is_topic_message ? message.message_thread_id : undefined
    );

    return {
      id: ++this.eventId,
      type: 'message-created',
      platform: PLATFORM,
      self_id: String(selfId),
      timestamp: message.date * 1000,
      channel,
      guild,
      user: message.from ? decodeUser(selfId, message.from) : undefined,
      message: decodeMessage(selfId, message),
    };
  }

  private buttonEvent(selfId: number, query: TelegramCallbackQuery): SatoriEvent | null {
    if (query.data === undefined) return null;

    const origin = query.message
      ? decodeGuildChannel(
          selfId,
          query.message.chat,
          query.message.is_topic_message ? query.message.message_thread_id : undefined
        )
      : undefined;

    return {
      id: ++this.eventId,
      type: 'interaction/button',
      platform: PLATFORM,
      self_id: String(selfId),
      timestamp: Date.now(),
      channel: origin?.channel,
      guild: origin?.guild,
      user: decodeUser(selfId, query.from),
      message: query.message ? decodeMessage(selfId, query.message) : undefined,
      button: { id: query.data },
    };
  }

  private requireSelf(): number {
    if (!this.self) {
      throw new AdapterError('Bot is not connected yet', 'NOT_READY');
    }
    return this.self.id;
  }
}

// ============================================================================
// HELPERS
// ============================================================================

function retryDelay(config: ReconnectConfig, attempt: number, error: unknown): number {
  if (error instanceof TelegramApiError && error.retryAfter !== undefined) {
    return error.retryAfter * 1000;
  }
  return computeBackoff(config, attempt - 1);
}

function parseChannel(channelId: string): ParsedChannelId {
  const parsed = parseChannelId(channelId);
  if (!parsed) {
    throw new AdapterError(`Invalid channel id: ${channelId}`, 'INVALID_ARGUMENT');
  }
  return parsed;
}

function parseInteger(value: string, field: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new AdapterError(`Invalid ${field}: ${value}`, 'INVALID_ARGUMENT');
  }
  return Number(value);
}
