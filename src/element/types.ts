/**
 * Satori Telegram — Element Tree
 *
 * Closed, platform-neutral representation of Satori message content.
 * Markup from the Satori side is parsed into this shape (see markup.ts),
 * Telegram messages are decoded into it, and the encoder dispatches on it.
 */

// ============================================================================
// VARIANTS
// ============================================================================

export type AttrValue = string | number | boolean;

/** Inline styles that wrap their children in a single Telegram HTML tag. */
export type InlineStyleKind = 'bold' | 'italic' | 'underline' | 'strikethrough' | 'spoiler';

/** Attachment kinds queued by the encoder instead of rendered inline. */
export type AssetKind = 'image' | 'audio' | 'video' | 'file';

/** Structural containers with no attributes of their own. */
export type ContainerKind = 'paragraph' | 'figure' | 'button-group' | 'message';

export interface TextElement {
  kind: 'text';
  content: string;
}

export interface LineBreakElement {
  kind: 'line-break';
}

export interface StyleElement {
  kind: InlineStyleKind;
  children: Element[];
}

export interface CodeElement {
  kind: 'code';
  /** Literal content; takes precedence over children when present. */
  content?: string;
  children: Element[];
}

export interface CodeBlockElement {
  kind: 'code-block';
  lang?: string;
  children: Element[];
}

export interface LinkElement {
  kind: 'link';
  href: string;
  children: Element[];
}

export interface MentionElement {
  kind: 'mention';
  id?: string;
  name?: string;
  children: Element[];
}

export interface QuoteElement {
  kind: 'quote';
  /** Id of the quoted message. Without it the quote is an inline block quote. */
  id?: string;
  children: Element[];
}

export interface AssetElement {
  kind: AssetKind;
  src: string;
  title?: string;
  spoiler?: boolean;
  /** Per-asset fetch timeout in seconds. */
  timeout?: number;
}

export interface ContainerElement {
  kind: ContainerKind;
  children: Element[];
}

export type ButtonType = 'link' | 'input' | 'action';

export interface ButtonElement {
  kind: 'button';
  type: ButtonType;
  id?: string;
  href?: string;
  text?: string;
  children: Element[];
}

export interface CustomElement {
  kind: 'custom';
  tag: string;
  attrs: Record<string, AttrValue>;
  children: Element[];
}

export type Element =
  | TextElement
  | LineBreakElement
  | StyleElement
  | CodeElement
  | CodeBlockElement
  | LinkElement
  | MentionElement
  | QuoteElement
  | AssetElement
  | ContainerElement
  | ButtonElement
  | CustomElement;

export type ElementKind = Element['kind'];

// ============================================================================
// CONSTRUCTORS
// ============================================================================

export function text(content: string): TextElement {
  return { kind: 'text', content };
}

export function lineBreak(): LineBreakElement {
  return { kind: 'line-break' };
}

export function styled(kind: InlineStyleKind, ...children: Element[]): StyleElement {
  return { kind, children };
}

export function container(kind: ContainerKind, ...children: Element[]): ContainerElement {
  return { kind, children };
}

export function link(href: string, ...children: Element[]): LinkElement {
  return { kind: 'link', href, children };
}

export function asset(
  kind: AssetKind,
  src: string,
  options: Omit<AssetElement, 'kind' | 'src'> = {}
): AssetElement {
  return { kind, src, ...options };
}

export function custom(
  tag: string,
  attrs: Record<string, AttrValue> = {},
  ...children: Element[]
): CustomElement {
  return { kind: 'custom', tag, attrs, children };
}

// ============================================================================
// HELPERS
// ============================================================================

const ASSET_KINDS: ReadonlySet<string> = new Set<AssetKind>(['image', 'audio', 'video', 'file']);

export function isAsset(element: Element): element is AssetElement {
  return ASSET_KINDS.has(element.kind);
}

/**
 * Child list of an element; empty for leaves.
 */
export function childrenOf(element: Element): Element[] {
  return 'children' in element ? element.children : [];
}

/**
 * Concatenated text content of an element and its descendants.
 * Line breaks contribute a newline; attachments contribute nothing.
 */
export function flattenText(element: Element): string {
  switch (element.kind) {
    case 'text':
      return element.content;
    case 'line-break':
      return '\n';
    case 'code':
      return element.content ?? flattenAll(element.children);
    default:
      return flattenAll(childrenOf(element));
  }
}

export function flattenAll(elements: readonly Element[]): string {
  return elements.map(flattenText).join('');
}
