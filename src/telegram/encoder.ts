/**
 * Satori Telegram — Message Encoder
 *
 * Walks a Satori element tree and accumulates Telegram HTML, pending
 * attachments, a reply target and an inline keyboard. Subclasses decide
 * what a flush does with the accumulated state: SendMessageEncoder
 * issues new messages, UpdateMessageEncoder edits exactly one.
 */

import type { AssetElement, ButtonElement, Element } from '../element/types.js';
import { flattenAll } from '../element/types.js';
import { ElementValidationError } from '../element/markup.js';
import { closeTag, escapeHtml, openTag, STYLE_TAGS, userLink } from './format.js';
import type { TelegramInlineKeyboardButton, TelegramInlineKeyboardMarkup } from './types.js';

/** Telegram renders at most this many inline buttons per row here. */
export const MAX_BUTTONS_PER_ROW = 5;

// ============================================================================
// ACCUMULATOR
// ============================================================================

export type EncoderMode = 'default' | 'figure';

export interface EncoderAccumulator {
  content: string;
  pendingAssets: AssetElement[];
  mode: EncoderMode;
  pendingReplyTarget: number | null;
  rows: TelegramInlineKeyboardButton[][];
}

export function createAccumulator(mode: EncoderMode = 'default'): EncoderAccumulator {
  return {
    content: '',
    pendingAssets: [],
    mode,
    pendingReplyTarget: null,
    rows: [],
  };
}

/**
 * Fresh accumulator after a flush. Only the mode carries over.
 */
export function resetAccumulator(state: EncoderAccumulator): EncoderAccumulator {
  return createAccumulator(state.mode);
}

export function isEmpty(state: EncoderAccumulator): boolean {
  return state.content === '' && state.pendingAssets.length === 0;
}

// ============================================================================
// KEYBOARD
// ============================================================================

/**
 * Build the inline keyboard button for a button element.
 */
export function buildButton(element: ButtonElement): TelegramInlineKeyboardButton {
  const label = flattenAll(element.children);

  switch (element.type) {
    case 'link':
      if (!element.href) {
        throw new ElementValidationError('link button requires an href attribute', 'button');
      }
      return { text: label, url: element.href };
    case 'input':
      if (element.text === undefined) {
        throw new ElementValidationError('input button requires a text attribute', 'button');
      }
      return { text: label, switch_inline_query_current_chat: element.text };
    case 'action':
      if (!element.id) {
        throw new ElementValidationError('action button requires an id attribute', 'button');
      }
      return { text: label, callback_data: element.id };
  }
}

export function dropTrailingEmptyRow(
  rows: TelegramInlineKeyboardButton[][]
): TelegramInlineKeyboardButton[][] {
  if (rows.length > 0 && rows[rows.length - 1].length === 0) {
    return rows.slice(0, -1);
  }
  return rows;
}

/**
 * Keyboard markup from the accumulated rows, or undefined when no row
 * holds a button. Empty rows are left out.
 */
export function keyboardOf(
  rows: TelegramInlineKeyboardButton[][]
): TelegramInlineKeyboardMarkup | undefined {
  const inline_keyboard = rows.filter((row) => row.length > 0);
  return inline_keyboard.length > 0 ? { inline_keyboard } : undefined;
}

function parseMessageId(id: string): number {
  if (!/^\d+$/.test(id)) {
    throw new ElementValidationError(`quote id "${id}" is not a Telegram message id`, 'quote');
  }
  return Number(id);
}

// ============================================================================
// ENCODER
// ============================================================================

export abstract class MessageEncoder {
  protected state: EncoderAccumulator = createAccumulator();

  /** Current accumulator, read-only for callers. */
  get accumulator(): Readonly<EncoderAccumulator> {
    return this.state;
  }

  /**
   * Render a full element list and flush whatever remains.
   */
  async encode(elements: readonly Element[]): Promise<void> {
    await this.render(elements);
    await this.flush();
  }

  async render(elements: readonly Element[]): Promise<void> {
    for (const element of elements) {
      await this.visit(element);
    }
  }

  protected abstract flush(): Promise<void>;

  protected async visit(element: Element): Promise<void> {
    switch (element.kind) {
      case 'text':
        this.state.content += escapeHtml(element.content);
        return;

      case 'line-break':
        this.state.content += '\n';
        return;

      case 'paragraph':
        this.ensureBlankLine();
        await this.render(element.children);
        this.ensureBlankLine();
        return;

      case 'bold':
      case 'italic':
      case 'underline':
      case 'strikethrough':
      case 'spoiler':
        await this.wrap(STYLE_TAGS[element.kind], {}, element.children);
        return;

      case 'link':
        await this.wrap('a', { href: element.href }, element.children);
        return;

      case 'code':
        this.state.content += openTag('code');
        if (element.content !== undefined) {
          this.state.content += escapeHtml(element.content);
        } else {
          await this.render(element.children);
        }
        this.state.content += closeTag('code');
        return;

      case 'code-block':
        this.state.content += openTag('pre');
        await this.wrap(
          'code',
          element.lang ? { class: `language-${element.lang}` } : {},
          element.children
        );
        this.state.content += closeTag('pre');
        return;

      case 'mention':
        if (element.id) {
          this.state.content += userLink(element.id, element.name ?? element.id);
        }
        return;

      case 'image':
      case 'audio':
      case 'video':
      case 'file':
        this.state.pendingAssets.push(element);
        return;

      case 'figure':
        await this.flush();
        this.state.mode = 'figure';
        await this.render(element.children);
        await this.flush();
        this.state.mode = 'default';
        return;

      case 'quote':
        if (element.id !== undefined) {
          await this.flush();
          this.state.pendingReplyTarget = parseMessageId(element.id);
        } else {
          await this.wrap('blockquote', {}, element.children);
        }
        return;

      case 'button':
        this.addButton(buildButton(element));
        return;

      case 'button-group':
        this.state.rows.push([]);
        await this.render(element.children);
        this.state.rows.push([]);
        return;

      case 'message':
        if (this.state.mode === 'figure') {
          await this.render(element.children);
          this.state.content += '\n';
        } else {
          await this.flush();
          await this.render(element.children);
          await this.flush();
        }
        return;

      case 'custom':
        await this.render(element.children);
        return;

      default: {
        const unreachable: never = element;
        return unreachable;
      }
    }
  }

  private async wrap(
    tag: string,
    attrs: Record<string, string>,
    children: readonly Element[]
  ): Promise<void> {
    this.state.content += openTag(tag, attrs);
    await this.render(children);
    this.state.content += closeTag(tag);
  }

  private addButton(button: TelegramInlineKeyboardButton): void {
    const { rows } = this.state;
    let row = rows[rows.length - 1];
    if (!row || row.length >= MAX_BUTTONS_PER_ROW) {
      row = [];
      rows.push(row);
    }
    row.push(button);
  }

  /**
   * Make the content end in a blank line, unless it is empty or
   * already does.
   */
  private ensureBlankLine(): void {
    const { content } = this.state;
    if (content === '' || content.endsWith('\n\n')) return;
    this.state.content += content.endsWith('\n') ? '\n' : '\n\n';
  }
}
