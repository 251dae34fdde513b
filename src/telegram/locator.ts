/**
 * Satori Telegram — Internal Locators
 *
 * Attachments decoded from Telegram are referenced as
 * `internal:telegram/<selfId>/<fileId>` instead of embedding their bytes.
 * The adapter resolves these through the Bot API file endpoint.
 *
 * Channel ids are the chat id, suffixed with `:<threadId>` for forum topics.
 */

export const PLATFORM = 'telegram';

export const ADAPTER = 'satori-telegram';

const LOCATOR_PREFIX = 'internal:';

export interface ParsedLocator {
  platform: string;
  selfId: string;
  fileId: string;
}

export function buildLocator(selfId: number | string, fileId: string): string {
  return `${LOCATOR_PREFIX}${PLATFORM}/${selfId}/${fileId}`;
}

/**
 * Split a locator into its parts. Returns null for anything that is not
 * an `internal:` locator with all three segments.
 */
export function parseLocator(locator: string): ParsedLocator | null {
  if (!locator.startsWith(LOCATOR_PREFIX)) return null;

  const [platform, selfId, ...rest] = locator.slice(LOCATOR_PREFIX.length).split('/');
  const fileId = rest.join('/');
  if (!platform || !selfId || !fileId) return null;

  return { platform, selfId, fileId };
}

// ============================================================================
// CHANNEL IDS
// ============================================================================

export interface ParsedChannelId {
  chatId: number;
  threadId?: number;
}

export function buildChannelId(chatId: number, threadId?: number): string {
  return threadId ? `${chatId}:${threadId}` : String(chatId);
}

/**
 * Split a channel id into chat and thread. Returns null when either part
 * is not an integer.
 */
export function parseChannelId(channelId: string): ParsedChannelId | null {
  const [chat, thread, ...rest] = channelId.split(':');
  if (rest.length > 0 || !/^-?\d+$/.test(chat)) return null;
  if (thread === undefined) return { chatId: Number(chat) };
  if (!/^\d+$/.test(thread)) return null;
  return { chatId: Number(chat), threadId: Number(thread) };
}
