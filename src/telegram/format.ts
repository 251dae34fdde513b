/**
 * Satori Telegram — HTML Formatting
 *
 * Telegram's HTML parse mode: the tag set the encoder writes and the
 * escaping it needs. Only `&`, `<`, `>` and `"` are significant.
 */

import type { InlineStyleKind } from '../element/types.js';

export const PARSE_MODE = 'HTML';

/** Telegram tag for each inline style kind. */
export const STYLE_TAGS: Record<InlineStyleKind, string> = {
  bold: 'b',
  italic: 'i',
  underline: 'u',
  strikethrough: 's',
  spoiler: 'tg-spoiler',
};

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

export function openTag(tag: string, attrs: Record<string, string> = {}): string {
  const rendered = Object.entries(attrs)
    .map(([key, value]) => ` ${key}="${escapeHtml(value)}"`)
    .join('');
  return `<${tag}${rendered}>`;
}

export function closeTag(tag: string): string {
  return `</${tag}>`;
}

/**
 * Link to a Telegram user by id, labelled `@name`.
 */
export function userLink(id: string, name: string): string {
  return `${openTag('a', { href: `tg://user?id=${id}` })}@${escapeHtml(name)}${closeTag('a')}`;
}
