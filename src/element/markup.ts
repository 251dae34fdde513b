/**
 * Satori Telegram — Markup Conversion
 *
 * Parses Satori message markup into the closed element union and
 * serializes element trees back into markup. The structural parse and
 * attribute escaping are delegated to @satorijs/element.
 */

import h from '@satorijs/element';
import type {
  AssetKind,
  AttrValue,
  ButtonType,
  ContainerKind,
  Element,
  InlineStyleKind,
} from './types.js';

// ============================================================================
// ERRORS
// ============================================================================

export class ElementValidationError extends Error {
  constructor(
    message: string,
    public readonly tag: string,
    public readonly code = 'INVALID_ELEMENT'
  ) {
    super(message);
    this.name = 'ElementValidationError';
  }
}

// ============================================================================
// TAG TABLES
// ============================================================================

const STYLE_TAGS: Record<string, InlineStyleKind> = {
  b: 'bold',
  strong: 'bold',
  i: 'italic',
  em: 'italic',
  u: 'underline',
  ins: 'underline',
  s: 'strikethrough',
  del: 'strikethrough',
  spl: 'spoiler',
};

const ASSET_TAGS: Record<string, AssetKind> = {
  img: 'image',
  image: 'image',
  audio: 'audio',
  video: 'video',
  file: 'file',
};

const CONTAINER_TAGS: Record<string, ContainerKind> = {
  p: 'paragraph',
  figure: 'figure',
  'button-group': 'button-group',
  message: 'message',
};

/** Canonical tag written for each kind on serialization. */
const KIND_TAGS: Record<Exclude<Element['kind'], 'text' | 'custom'>, string> = {
  'line-break': 'br',
  bold: 'b',
  italic: 'i',
  underline: 'u',
  strikethrough: 's',
  spoiler: 'spl',
  code: 'code',
  'code-block': 'code-block',
  link: 'a',
  mention: 'at',
  quote: 'quote',
  image: 'img',
  audio: 'audio',
  video: 'video',
  file: 'file',
  paragraph: 'p',
  figure: 'figure',
  'button-group': 'button-group',
  message: 'message',
  button: 'button',
};

// ============================================================================
// PARSE
// ============================================================================

/**
 * Parse Satori markup into a list of elements.
 * Throws ElementValidationError for links without `href`, assets without
 * a source, and buttons missing the attribute their type requires.
 */
export function parseMarkup(markup: string): Element[] {
  return h.parse(markup).map(normalize);
}

/**
 * Convert a parsed @satorijs/element node into the closed union.
 */
export function normalize(node: h): Element {
  const attrs: Record<string, unknown> = node.attrs;
  const children = () => node.children.map(normalize);
  const type = node.type;

  if (type === 'text') {
    return { kind: 'text', content: readString(attrs, 'content') ?? '' };
  }
  if (type === 'br') {
    return { kind: 'line-break' };
  }

  const style = STYLE_TAGS[type];
  if (style) {
    return { kind: style, children: children() };
  }

  const assetKind = ASSET_TAGS[type];
  if (assetKind) {
    const src = readString(attrs, 'src') ?? readString(attrs, 'url');
    if (!src) {
      throw new ElementValidationError(`<${type}> requires a src attribute`, type);
    }
    return {
      kind: assetKind,
      src,
      title: readString(attrs, 'title'),
      spoiler: attrs.spoiler === true || attrs.spoiler === 'true' ? true : undefined,
      timeout: readNumber(attrs, 'timeout'),
    };
  }

  const containerKind = CONTAINER_TAGS[type];
  if (containerKind) {
    return { kind: containerKind, children: children() };
  }

  switch (type) {
    case 'code':
      return { kind: 'code', content: readString(attrs, 'content'), children: children() };
    case 'pre':
    case 'code-block':
      return { kind: 'code-block', lang: readString(attrs, 'lang'), children: children() };
    case 'a': {
      const href = readString(attrs, 'href');
      if (!href) {
        throw new ElementValidationError('<a> requires an href attribute', type);
      }
      return { kind: 'link', href, children: children() };
    }
    case 'at':
      return {
        kind: 'mention',
        id: readString(attrs, 'id'),
        name: readString(attrs, 'name'),
        children: children(),
      };
    case 'quote':
      return { kind: 'quote', id: readString(attrs, 'id'), children: children() };
    case 'button':
      return normalizeButton(attrs, children());
    default:
      return { kind: 'custom', tag: type, attrs: readAttrs(attrs), children: children() };
  }
}

function normalizeButton(attrs: Record<string, unknown>, children: Element[]): Element {
  const type = readButtonType(attrs.type);
  const id = readString(attrs, 'id');
  const href = readString(attrs, 'href');
  const text = readString(attrs, 'text');

  if (type === 'link' && !href) {
    throw new ElementValidationError('link button requires an href attribute', 'button');
  }
  if (type === 'input' && text === undefined) {
    throw new ElementValidationError('input button requires a text attribute', 'button');
  }
  if (type === 'action' && !id) {
    throw new ElementValidationError('action button requires an id attribute', 'button');
  }

  return { kind: 'button', type, id, href, text, children };
}

function readButtonType(value: unknown): ButtonType {
  return value === 'link' || value === 'input' ? value : 'action';
}

function readString(attrs: Record<string, unknown>, key: string): string | undefined {
  const value = attrs[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

function readNumber(attrs: Record<string, unknown>, key: string): number | undefined {
  const value = attrs[key];
  const parsed = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : NaN;
  return Number.isFinite(parsed) ? parsed : undefined;
}

function readAttrs(attrs: Record<string, unknown>): Record<string, AttrValue> {
  const result: Record<string, AttrValue> = {};
  for (const [key, value] of Object.entries(attrs)) {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      result[key] = value;
    }
  }
  return result;
}

// ============================================================================
// SERIALIZE
// ============================================================================

/**
 * Serialize elements back into Satori markup.
 */
export function serializeElements(elements: readonly Element[]): string {
  return elements.map((element) => toSatori(element).toString()).join('');
}

/**
 * Convert a closed-union element into an @satorijs/element node.
 */
export function toSatori(element: Element): h {
  switch (element.kind) {
    case 'text':
      return h.text(element.content);
    case 'line-break':
      return h(KIND_TAGS[element.kind]);
    case 'code':
      return h(KIND_TAGS.code, { content: element.content }, ...element.children.map(toSatori));
    case 'code-block':
      return h(KIND_TAGS['code-block'], { lang: element.lang }, ...element.children.map(toSatori));
    case 'link':
      return h(KIND_TAGS.link, { href: element.href }, ...element.children.map(toSatori));
    case 'mention':
      return h(
        KIND_TAGS.mention,
        { id: element.id, name: element.name },
        ...element.children.map(toSatori)
      );
    case 'quote':
      return h(KIND_TAGS.quote, { id: element.id }, ...element.children.map(toSatori));
    case 'image':
    case 'audio':
    case 'video':
    case 'file':
      return h(KIND_TAGS[element.kind], {
        src: element.src,
        title: element.title,
        spoiler: element.spoiler,
        timeout: element.timeout,
      });
    case 'button':
      return h(
        KIND_TAGS.button,
        { type: element.type, id: element.id, href: element.href, text: element.text },
        ...element.children.map(toSatori)
      );
    case 'custom':
      return h(element.tag, element.attrs, ...element.children.map(toSatori));
    default:
      return h(KIND_TAGS[element.kind], {}, ...element.children.map(toSatori));
  }
}
