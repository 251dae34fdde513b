/**
 * Satori Telegram — Message Decoder
 *
 * Converts Telegram messages, users and chats into their Satori
 * counterparts. Pure functions of their input.
 */

import type { AttrValue, Element } from '../element/types.js';
import { asset, custom, text } from '../element/types.js';
import { serializeElements } from '../element/markup.js';
import { ChannelType } from '../satori/types.js';
import type { MessageObject, SatoriChannel, SatoriGuild, SatoriUser } from '../satori/types.js';
import { parseEntities } from './entities.js';
import { buildChannelId, buildLocator } from './locator.js';
import type { TelegramChat, TelegramChatPhoto, TelegramMessage, TelegramUser } from './types.js';

// ============================================================================
// MESSAGES
// ============================================================================

/**
 * Decode a Telegram message into a Satori message object.
 */
export function decodeMessage(selfId: number, message: TelegramMessage): MessageObject {
  return {
    id: String(message.message_id),
    content: serializeElements(decodeElements(selfId, message)),
    created_at: message.date * 1000,
  };
}

/**
 * Decode a Telegram message into its element sequence: an optional reply
 * quote, the styled text, and at most one attachment.
 */
export function decodeElements(selfId: number, message: TelegramMessage): Element[] {
  const elements: Element[] = [];

  const quote = decodeReplyQuote(selfId, message);
  if (quote) elements.push(quote);

  elements.push(
    ...parseEntities(
      message.text || message.caption || '',
      message.entities || message.caption_entities || []
    )
  );

  const attachment = decodeAttachment(selfId, message);
  if (attachment) {
    if (message.caption) elements.push(text(' '));
    elements.push(attachment);
  }

  return elements;
}

/**
 * Build the quote for a reply. Replies to the "topic created" service
 * message inside a forum topic are not real replies and yield nothing.
 */
function decodeReplyQuote(selfId: number, message: TelegramMessage): Element | null {
  const replied = message.reply_to_message;
  if (!replied) return null;
  if (message.is_topic_message && replied.forum_topic_created) return null;

  const children: Element[] = [];
  if (replied.from) {
    children.push(authorElement(decodeUser(selfId, replied.from)));
  }
  children.push(...decodeElements(selfId, replied));

  return { kind: 'quote', id: String(replied.message_id), children };
}

function authorElement(user: SatoriUser): Element {
  const attrs: Record<string, AttrValue> = { id: user.id };
  if (user.name !== undefined) attrs.name = user.name;
  if (user.nick !== undefined) attrs.nick = user.nick;
  if (user.avatar !== undefined) attrs.avatar = user.avatar;
  if (user.is_bot !== undefined) attrs['is-bot'] = user.is_bot;
  return custom('author', attrs);
}

/**
 * Pick the single attachment of a message. Precedence: location, photo,
 * sticker, voice, animation, video, document, audio. An animation message
 * also carries a document, which the precedence hides.
 */
function decodeAttachment(selfId: number, message: TelegramMessage): Element | null {
  if (message.location) {
    return custom('location', {
      lat: message.location.latitude,
      lon: message.location.longitude,
    });
  }
  if (message.photo && message.photo.length > 0) {
    const largest = message.photo[message.photo.length - 1];
    return asset('image', buildLocator(selfId, largest.file_id));
  }
  if (message.sticker) {
    return asset('image', buildLocator(selfId, message.sticker.file_id));
  }
  if (message.voice) {
    return asset('audio', buildLocator(selfId, message.voice.file_id));
  }
  if (message.animation) {
    return asset('image', buildLocator(selfId, message.animation.file_id), {
      title: message.animation.file_name,
    });
  }
  if (message.video) {
    return asset('video', buildLocator(selfId, message.video.file_id), {
      title: message.video.file_name,
    });
  }
  if (message.document) {
    return asset('file', buildLocator(selfId, message.document.file_id), {
      title: message.document.file_name,
    });
  }
  if (message.audio) {
    return asset('audio', buildLocator(selfId, message.audio.file_id), {
      title: message.audio.file_name,
    });
  }
  return null;
}

// ============================================================================
// USERS & CHATS
// ============================================================================

export function decodeUser(
  selfId: number,
  user: TelegramUser,
  photo?: TelegramChatPhoto
): SatoriUser {
  return {
    id: String(user.id),
    name: user.username,
    nick: user.last_name ? `${user.first_name} ${user.last_name}` : user.first_name,
    avatar: photo ? buildLocator(selfId, photo.big_file_id) : undefined,
    is_bot: user.is_bot,
  };
}

/**
 * Map a Telegram chat to a Satori guild/channel pair. Private chats are
 * direct channels without a guild; in forum groups each topic thread is
 * its own channel.
 */
export function decodeGuildChannel(
  selfId: number,
  chat: TelegramChat,
  threadId?: number
): { guild?: SatoriGuild; channel: SatoriChannel } {
  if (chat.type === 'private') {
    return { channel: { id: String(chat.id), type: ChannelType.DIRECT } };
  }

  return {
    guild: {
      id: String(chat.id),
      name: chat.title,
      avatar: chat.photo ? buildLocator(selfId, chat.photo.big_file_id) : undefined,
    },
    channel: {
      id: buildChannelId(chat.id, threadId),
      type: ChannelType.TEXT,
      name: chat.title,
    },
  };
}
