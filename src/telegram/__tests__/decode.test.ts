import { describe, it, expect } from 'vitest';
import { decodeElements, decodeGuildChannel, decodeMessage, decodeUser } from '../decode.js';
import { ChannelType } from '../../satori/types.js';
import type { TelegramMessage, TelegramUser } from '../types.js';

const SELF_ID = 7;

const ann: TelegramUser = { id: 9, is_bot: false, first_name: 'Ann', username: 'ann' };

function message(overrides: Partial<TelegramMessage> = {}): TelegramMessage {
  return {
    message_id: 10,
    date: 1_700_000_000,
    chat: { id: 5, type: 'private' },
    ...overrides,
  };
}

// ============================================================================
// MESSAGES
// ============================================================================

describe('decodeMessage', () => {
  it('serializes styled text and converts the date to milliseconds', () => {
    const decoded = decodeMessage(
      SELF_ID,
      message({ text: 'hi there', entities: [{ type: 'bold', offset: 0, length: 2 }] })
    );

    expect(decoded).toEqual({
      id: '10',
      content: '<b>hi</b> there',
      created_at: 1_700_000_000_000,
    });
  });

  it('escapes markup characters in plain text', () => {
    expect(decodeMessage(SELF_ID, message({ text: 'a < b & c' })).content).toBe(
      'a &lt; b &amp; c'
    );
  });

  it('decodes an empty message to empty content', () => {
    expect(decodeMessage(SELF_ID, message()).content).toBe('');
  });

  it('uses the largest photo size and separates it from the caption', () => {
    const decoded = decodeMessage(
      SELF_ID,
      message({
        caption: 'look',
        photo: [
          { file_id: 'small', file_unique_id: 's', width: 90, height: 90 },
          { file_id: 'big', file_unique_id: 'b', width: 1280, height: 1280 },
        ],
      })
    );

    expect(decoded.content).toBe('look <img src="internal:telegram/7/big"/>');
  });

  it('applies caption entities to the caption', () => {
    const decoded = decodeMessage(
      SELF_ID,
      message({
        caption: 'nice',
        caption_entities: [{ type: 'italic', offset: 0, length: 4 }],
        document: { file_id: 'doc', file_unique_id: 'd', file_name: 'a.pdf' },
      })
    );

    expect(decoded.content).toBe('<i>nice</i> <file src="internal:telegram/7/doc" title="a.pdf"/>');
  });

  it('does not add a separator when there is no caption', () => {
    const decoded = decodeMessage(
      SELF_ID,
      message({ voice: { file_id: 'v1', file_unique_id: 'v' } })
    );

    expect(decoded.content).toBe('<audio src="internal:telegram/7/v1"/>');
  });

  it('decodes a location', () => {
    const decoded = decodeMessage(
      SELF_ID,
      message({ location: { latitude: 1.5, longitude: 2.5 } })
    );

    expect(decoded.content).toBe('<location lat="1.5" lon="2.5"/>');
  });

  it('prefers the animation over the document that accompanies it', () => {
    const elements = decodeElements(
      SELF_ID,
      message({
        animation: { file_id: 'anim', file_unique_id: 'a', file_name: 'cat.mp4' },
        document: { file_id: 'doc', file_unique_id: 'd', file_name: 'cat.mp4' },
      })
    );

    expect(elements).toEqual([
      { kind: 'image', src: 'internal:telegram/7/anim', title: 'cat.mp4' },
    ]);
  });

  it('quotes the replied message with its author', () => {
    const decoded = decodeMessage(
      SELF_ID,
      message({
        text: 'reply',
        reply_to_message: message({ message_id: 3, from: ann, text: 'orig' }),
      })
    );

    expect(decoded.content).toBe(
      '<quote id="3"><author id="9" name="ann" nick="Ann" no-is-bot/>orig</quote>reply'
    );
  });

  it('ignores a reply to the topic creation message inside a topic', () => {
    const decoded = decodeMessage(
      SELF_ID,
      message({
        text: 'in topic',
        is_topic_message: true,
        message_thread_id: 4,
        reply_to_message: message({ message_id: 4, forum_topic_created: { name: 'General' } }),
      })
    );

    expect(decoded.content).toBe('in topic');
  });
});

// ============================================================================
// USERS & CHATS
// ============================================================================

describe('decodeUser', () => {
  it('joins first and last name into the nick', () => {
    expect(decodeUser(SELF_ID, { ...ann, last_name: 'Lee' })).toEqual({
      id: '9',
      name: 'ann',
      nick: 'Ann Lee',
      avatar: undefined,
      is_bot: false,
    });
  });

  it('references the big profile photo through a locator', () => {
    const user = decodeUser(SELF_ID, ann, { small_file_id: 'sm', big_file_id: 'bg' });

    expect(user.avatar).toBe('internal:telegram/7/bg');
  });
});

describe('decodeGuildChannel', () => {
  it('maps a private chat to a direct channel without a guild', () => {
    expect(decodeGuildChannel(SELF_ID, { id: 5, type: 'private' })).toEqual({
      channel: { id: '5', type: ChannelType.DIRECT },
    });
  });

  it('maps a group to a guild and a text channel', () => {
    expect(decodeGuildChannel(SELF_ID, { id: -100, type: 'supergroup', title: 'Team' })).toEqual({
      guild: { id: '-100', name: 'Team', avatar: undefined },
      channel: { id: '-100', type: ChannelType.TEXT, name: 'Team' },
    });
  });

  it('gives each forum topic its own channel', () => {
    const { channel } = decodeGuildChannel(SELF_ID, { id: -100, type: 'supergroup' }, 12);

    expect(channel.id).toBe('-100:12');
  });
});
