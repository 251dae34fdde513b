/**
 * Satori Telegram — Bot API Types
 *
 * Structural subset of the Telegram Bot API objects this bridge reads
 * and writes. Field names follow the Bot API wire format.
 */

// ============================================================================
// USERS & CHATS
// ============================================================================

export interface TelegramUser {
  id: number;
  is_bot: boolean;
  first_name: string;
  last_name?: string;
  username?: string;
}

export type TelegramChatType = 'private' | 'group' | 'supergroup' | 'channel';

export interface TelegramChatPhoto {
  small_file_id: string;
  big_file_id: string;
}

export interface TelegramChat {
  id: number;
  type: TelegramChatType;
  title?: string;
  username?: string;
  first_name?: string;
  last_name?: string;
  /** Only present on full chat info (getChat). */
  photo?: TelegramChatPhoto;
}

// ============================================================================
// ENTITIES
// ============================================================================

export type TelegramEntityType =
  | 'bold'
  | 'italic'
  | 'underline'
  | 'strikethrough'
  | 'code'
  | 'pre'
  | 'spoiler'
  | 'mention'
  | 'text_link'
  | 'text_mention'
  | 'hashtag'
  | 'cashtag'
  | 'bot_command'
  | 'url'
  | 'email'
  | 'phone_number'
  | 'blockquote'
  | 'expandable_blockquote'
  | 'custom_emoji';

/** Offsets and lengths are in UTF-16 code units. */
export interface TelegramMessageEntity {
  type: TelegramEntityType;
  offset: number;
  length: number;
  url?: string;
  user?: TelegramUser;
  language?: string;
}

// ============================================================================
// ATTACHMENTS
// ============================================================================

export interface TelegramFileBase {
  file_id: string;
  file_unique_id: string;
  file_size?: number;
}

export interface TelegramPhotoSize extends TelegramFileBase {
  width: number;
  height: number;
}

export interface TelegramNamedFile extends TelegramFileBase {
  file_name?: string;
  mime_type?: string;
}

export interface TelegramLocation {
  latitude: number;
  longitude: number;
}

// ============================================================================
// MESSAGES
// ============================================================================

export interface TelegramMessage {
  message_id: number;
  message_thread_id?: number;
  date: number;
  chat: TelegramChat;
  from?: TelegramUser;
  text?: string;
  entities?: TelegramMessageEntity[];
  caption?: string;
  caption_entities?: TelegramMessageEntity[];
  reply_to_message?: TelegramMessage;
  is_topic_message?: boolean;
  forum_topic_created?: { name: string };
  location?: TelegramLocation;
  photo?: TelegramPhotoSize[];
  sticker?: TelegramFileBase;
  voice?: TelegramNamedFile;
  animation?: TelegramNamedFile;
  video?: TelegramNamedFile;
  document?: TelegramNamedFile;
  audio?: TelegramNamedFile;
}

export interface TelegramCallbackQuery {
  id: string;
  from: TelegramUser;
  message?: TelegramMessage;
  data?: string;
}

export interface TelegramUpdate {
  update_id: number;
  message?: TelegramMessage;
  callback_query?: TelegramCallbackQuery;
}

export interface TelegramFile {
  file_id: string;
  file_unique_id: string;
  file_size?: number;
  file_path?: string;
}

// ============================================================================
// KEYBOARDS
// ============================================================================

/** Exactly one of url / switch_inline_query_current_chat / callback_data is set. */
export type TelegramInlineKeyboardButton =
  | { text: string; url: string }
  | { text: string; switch_inline_query_current_chat: string }
  | { text: string; callback_data: string };

export interface TelegramInlineKeyboardMarkup {
  inline_keyboard: TelegramInlineKeyboardButton[][];
}
