/**
 * Satori Telegram — Outbound Delivery
 *
 * Turns Satori content into Telegram operations. SendMessageEncoder
 * decides at each flush how many messages to send: attachments go out
 * as one media group plus one message per animation, captioned with the
 * accumulated text unless a keyboard needs its own text message.
 */

import type { AssetElement, Element } from '../element/types.js';
import { parseMarkup } from '../element/markup.js';
import type { MessageObject } from '../satori/types.js';
import { createLogger } from '../utils/logger.js';
import type { InputMedia, InputMediaType, TelegramApi, UploadFile } from './api.js';
import { decodeMessage } from './decode.js';
import {
  dropTrailingEmptyRow,
  isEmpty,
  keyboardOf,
  MessageEncoder,
  resetAccumulator,
} from './encoder.js';
import { fetchFile, type FileFetcher } from './files.js';
import type { TelegramInlineKeyboardMarkup, TelegramMessage } from './types.js';

const log = createLogger('Telegram:Send');

/** Media types sent individually as animations instead of in the group. */
export const ANIMATED_MIME_TYPES: ReadonlySet<string> = new Set(['image/gif']);

const MEDIA_TYPES: Record<AssetElement['kind'], InputMediaType> = {
  image: 'photo',
  audio: 'audio',
  video: 'video',
  file: 'document',
};

// ============================================================================
// ERRORS
// ============================================================================

/** Content an edit cannot express: attachments or more than one message. */
export class UnsupportedContentError extends Error {
  constructor(
    message: string,
    public readonly code = 'UNSUPPORTED_CONTENT'
  ) {
    super(message);
    this.name = 'UnsupportedContentError';
  }
}

/**
 * A send failed after some messages were already delivered. Delivered
 * messages are not rolled back.
 */
export class PartialDeliveryError extends Error {
  readonly code = 'PARTIAL_DELIVERY';

  constructor(
    cause: unknown,
    public readonly delivered: MessageObject[]
  ) {
    super(
      `Delivery failed after ${delivered.length} message(s): ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
      { cause }
    );
    this.name = 'PartialDeliveryError';
  }
}

// ============================================================================
// OPTIONS
// ============================================================================

export interface SendTarget {
  chatId: number;
  threadId?: number;
}

export interface SendOptions {
  api: TelegramApi;
  /** Bot user id, used in locators of decoded results. */
  selfId: number;
  target: SendTarget;
  fetchFile?: FileFetcher;
  /** Attachment fetch timeout when an element sets none. */
  timeoutSeconds?: number;
}

interface PreparedAnimation {
  file: UploadFile;
  caption?: string;
  hasSpoiler?: boolean;
}

// ============================================================================
// SEND
// ============================================================================

export class SendMessageEncoder extends MessageEncoder {
  readonly results: MessageObject[] = [];

  private readonly fetchFile: FileFetcher;

  constructor(private readonly options: SendOptions) {
    super();
    this.fetchFile = options.fetchFile ?? fetchFile;
  }

  protected async flush(): Promise<void> {
    const state = this.state;
    if (isEmpty(state)) return;
    this.state = resetAccumulator(state);

    const { api, target } = this.options;
    const keyboard = keyboardOf(dropTrailingEmptyRow(state.rows));
    const replyTo = state.pendingReplyTarget ?? undefined;

    if (state.pendingAssets.length === 0) {
      const sent = await api.sendMessage({
        ...target,
        text: state.content,
        replyTo,
        replyMarkup: keyboard,
      });
      this.addResult(sent);
      return;
    }

    const { grouped, animations } = await this.prepareAssets(state.pendingAssets);

    if (!keyboard && state.content) {
      if (grouped.length > 0) {
        grouped[0].caption = state.content;
      } else {
        animations[0].caption = state.content;
      }
    }

    log.debug('Flushing attachments', {
      chatId: target.chatId,
      grouped: grouped.length,
      animations: animations.length,
      keyboard: Boolean(keyboard),
    });

    let firstSent: number | undefined;
    let groupAnchor: number | undefined;

    if (grouped.length > 0) {
      const sent = await api.sendMediaGroup({ ...target, media: grouped, replyTo });
      sent.forEach((message) => this.addResult(message));
      groupAnchor = sent[0]?.message_id;
      firstSent = groupAnchor;
    }

    for (const animation of animations) {
      const sent = await api.sendAnimation({
        ...target,
        animation: animation.file,
        caption: animation.caption,
        hasSpoiler: animation.hasSpoiler,
        replyTo: groupAnchor ?? replyTo,
      });
      this.addResult(sent);
      firstSent ??= sent.message_id;
    }

    if (keyboard) {
      await this.sendKeyboard(state.content, keyboard, firstSent ?? replyTo);
    }
  }

  private async sendKeyboard(
    text: string,
    keyboard: TelegramInlineKeyboardMarkup,
    replyTo: number | undefined
  ): Promise<void> {
    const sent = await this.options.api.sendMessage({
      ...this.options.target,
      text,
      replyTo,
      replyMarkup: keyboard,
    });
    this.addResult(sent);
  }

  /**
   * Fetch every pending asset, in order, and split animations from the
   * media that can share a group.
   */
  private async prepareAssets(
    assets: readonly AssetElement[]
  ): Promise<{ grouped: InputMedia[]; animations: PreparedAnimation[] }> {
    const grouped: InputMedia[] = [];
    const animations: PreparedAnimation[] = [];
    const defaultTimeout = this.options.timeoutSeconds ?? 0;

    for (const [index, element] of assets.entries()) {
      const downloaded = await this.fetchFile(
        element.src,
        element.title ?? '',
        element.timeout ?? defaultTimeout
      );
      const file: UploadFile = {
        filename: `${index}${downloaded.filename}`,
        data: downloaded.data,
        mime: downloaded.mime,
      };

      if (ANIMATED_MIME_TYPES.has(file.mime)) {
        animations.push({ file, hasSpoiler: element.spoiler });
      } else {
        grouped.push({ type: MEDIA_TYPES[element.kind], file, hasSpoiler: element.spoiler });
      }
    }

    return { grouped, animations };
  }

  private addResult(message: TelegramMessage): void {
    this.results.push(decodeMessage(this.options.selfId, message));
  }
}

/**
 * Send Satori content to a chat. Returns the sent messages, decoded, in
 * send order.
 */
export async function sendMessage(
  options: SendOptions,
  content: string | readonly Element[]
): Promise<MessageObject[]> {
  const elements = typeof content === 'string' ? parseMarkup(content) : content;
  const encoder = new SendMessageEncoder(options);

  try {
    await encoder.encode(elements);
  } catch (error) {
    if (encoder.results.length > 0) {
      throw new PartialDeliveryError(error, [...encoder.results]);
    }
    throw error;
  }

  return encoder.results;
}

// ============================================================================
// UPDATE
// ============================================================================

export interface EditUnit {
  text: string;
  replyMarkup?: TelegramInlineKeyboardMarkup;
}

export class UpdateMessageEncoder extends MessageEncoder {
  private unit: EditUnit | null = null;

  /** The single message the content rendered to, if any. */
  get edit(): EditUnit | null {
    return this.unit;
  }

  protected async flush(): Promise<void> {
    const state = this.state;
    if (state.pendingAssets.length > 0) {
      throw new UnsupportedContentError('Attachments cannot be added by editing a message');
    }
    if (state.content === '') return;
    if (this.unit) {
      throw new UnsupportedContentError('Content renders to more than one message');
    }

    this.state = resetAccumulator(state);
    this.unit = {
      text: state.content,
      replyMarkup: keyboardOf(dropTrailingEmptyRow(state.rows)),
    };
  }
}

/**
 * Replace the text and keyboard of an existing message.
 */
export async function updateMessage(
  api: TelegramApi,
  target: SendTarget,
  messageId: number,
  content: string | readonly Element[]
): Promise<void> {
  const elements = typeof content === 'string' ? parseMarkup(content) : content;
  const encoder = new UpdateMessageEncoder();
  await encoder.encode(elements);

  const edit = encoder.edit;
  if (!edit) {
    throw new UnsupportedContentError('Cannot edit a message to empty content');
  }

  await api.editMessageText({ chatId: target.chatId, messageId, ...edit });
}
