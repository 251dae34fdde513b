/**
 * Satori Telegram — Entity Sweep
 *
 * Converts Telegram text plus its (possibly overlapping) entity spans into
 * an ordered list of styled runs. Every span start/end and every literal
 * newline becomes a breakpoint; a single left-to-right sweep emits the text
 * between consecutive breakpoints wrapped in the styles active at that point.
 */

import type { Element } from '../element/types.js';
import { lineBreak, link, styled, text } from '../element/types.js';
import type { TelegramEntityType, TelegramMessageEntity, TelegramUser } from './types.js';

// ============================================================================
// TYPES
// ============================================================================

export type BreakpointEdge = 'start' | 'end';

export interface Breakpoint {
  edge: BreakpointEdge;
  position: number;
  /** Null for the synthetic span around a literal newline. */
  entity: TelegramMessageEntity | null;
  /** Generation order; breaks ties between equal positions. */
  seq: number;
}

export interface StyleState {
  bold: boolean;
  italic: boolean;
  underline: boolean;
  strikethrough: boolean;
  code: boolean;
  pre: boolean;
  spoiler: boolean;
  mention: boolean;
  /** Language of the active pre span, if it declared one. */
  language: string | null;
  link: string | null;
  user: TelegramUser | null;
}

const SWEEP_ENTITIES: ReadonlySet<TelegramEntityType> = new Set<TelegramEntityType>([
  'bold',
  'italic',
  'underline',
  'strikethrough',
  'code',
  'pre',
  'spoiler',
  'mention',
  'text_link',
  'text_mention',
]);

export function createStyleState(): StyleState {
  return {
    bold: false,
    italic: false,
    underline: false,
    strikethrough: false,
    code: false,
    pre: false,
    spoiler: false,
    mention: false,
    language: null,
    link: null,
    user: null,
  };
}

// ============================================================================
// BREAKPOINTS
// ============================================================================

/**
 * Build the sorted breakpoint list.
 *
 * Span breakpoints are generated first (start before end, spans in list
 * order), then one start/end pair per newline. Sorting is by position with
 * generation order as the tie-break, so at an equal position span events
 * always precede newline events.
 */
export function buildBreakpoints(
  content: string,
  entities: readonly TelegramMessageEntity[]
): Breakpoint[] {
  const breakpoints: Breakpoint[] = [];
  let seq = 0;

  for (const entity of entities) {
    if (!SWEEP_ENTITIES.has(entity.type)) continue;
    breakpoints.push({ edge: 'start', position: entity.offset, entity, seq: seq++ });
    breakpoints.push({ edge: 'end', position: entity.offset + entity.length, entity, seq: seq++ });
  }

  for (let i = 0; i < content.length; i++) {
    if (content[i] !== '\n') continue;
    breakpoints.push({ edge: 'start', position: i, entity: null, seq: seq++ });
    breakpoints.push({ edge: 'end', position: i + 1, entity: null, seq: seq++ });
  }

  return breakpoints.sort((a, b) => a.position - b.position || a.seq - b.seq);
}

/**
 * Apply one breakpoint to the style state. A start activates its flag or
 * slot; an end clears it unconditionally.
 */
export function applyBreakpoint(state: StyleState, breakpoint: Breakpoint): void {
  const { entity, edge } = breakpoint;
  if (!entity) return;

  const active = edge === 'start';

  switch (entity.type) {
    case 'text_link':
      state.link = active ? entity.url ?? null : null;
      return;
    case 'text_mention':
      state.user = active ? entity.user ?? null : null;
      return;
    case 'pre':
      state.pre = active;
      state.language = active ? entity.language ?? null : null;
      return;
    case 'bold':
    case 'italic':
    case 'underline':
    case 'strikethrough':
    case 'code':
    case 'spoiler':
    case 'mention':
      state[entity.type] = active;
      return;
    default:
      return;
  }
}

// ============================================================================
// WRAPPING
// ============================================================================

/**
 * Wrap one text run in the active styles.
 *
 * Fixed order, innermost first: bold, italic, underline, strikethrough,
 * code, pre, spoiler, mention, link, user reference. A newline run is
 * always a bare line break.
 */
export function wrapRun(run: string, state: StyleState): Element {
  if (run === '\n') return lineBreak();

  let element: Element = text(run);
  if (state.bold) element = styled('bold', element);
  if (state.italic) element = styled('italic', element);
  if (state.underline) element = styled('underline', element);
  if (state.strikethrough) element = styled('strikethrough', element);
  if (state.code) element = { kind: 'code', children: [element] };
  if (state.pre) {
    element = { kind: 'code-block', lang: state.language ?? undefined, children: [element] };
  }
  if (state.spoiler) element = styled('spoiler', element);
  if (state.mention) element = mentionFromRun(run);
  if (state.link !== null) element = link(state.link, element);
  if (state.user !== null) {
    element = {
      kind: 'mention',
      id: String(state.user.id),
      name: state.user.username,
      children: [element],
    };
  }
  return element;
}

/**
 * An `@username` run becomes a bare mention; formatting inside it is dropped.
 */
export function mentionFromRun(run: string): Element {
  return { kind: 'mention', name: run.slice(1), children: [] };
}

// ============================================================================
// SWEEP
// ============================================================================

/**
 * Convert text and entities into an ordered list of styled elements.
 * Spans past the end of the text keep their style active to the end.
 */
export function parseEntities(
  content: string,
  entities: readonly TelegramMessageEntity[] = []
): Element[] {
  const state = createStyleState();
  const elements: Element[] = [];
  let lastPos = 0;

  for (const breakpoint of buildBreakpoints(content, entities)) {
    const position = Math.min(Math.max(breakpoint.position, 0), content.length);
    if (position > lastPos) {
      elements.push(wrapRun(content.slice(lastPos, position), state));
      lastPos = position;
    }
    applyBreakpoint(state, breakpoint);
  }

  if (lastPos < content.length) {
    elements.push(text(content.slice(lastPos)));
  }

  return elements;
}
