import { describe, it, expect, vi } from 'vitest';
import type { SendMessageParams } from '../api.js';
import { decodeMessage } from '../decode.js';
import { DryRunApi, dryRunFetchFile } from '../dry-run.js';
import { ElementValidationError } from '../../element/markup.js';
import {
  PartialDeliveryError,
  sendMessage,
  UnsupportedContentError,
  updateMessage,
  type SendOptions,
} from '../send.js';
import type { TelegramMessage } from '../types.js';
import { parseTelegramHtml } from './telegram-html.js';

vi.mock('../../utils/logger.js', () => ({
  createLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

function setup(overrides: Partial<SendOptions> = {}) {
  const api = new DryRunApi();
  const fetchFile = vi.fn(dryRunFetchFile);
  const options: SendOptions = {
    api,
    selfId: 7,
    target: { chatId: 5 },
    fetchFile,
    timeoutSeconds: 30,
    ...overrides,
  };
  return { api, fetchFile, options };
}

function sentTexts(api: DryRunApi): string[] {
  return api.calls.flatMap((call) => (call.method === 'sendMessage' ? [call.params.text] : []));
}

// ============================================================================
// TEXT
// ============================================================================

describe('sendMessage: text', () => {
  it('sends styled text as one HTML message', async () => {
    const { api, options } = setup();

    const results = await sendMessage(options, 'Hello <b>world</b>');

    expect(api.calls).toEqual([
      { method: 'sendMessage', params: { chatId: 5, text: 'Hello <b>world</b>' } },
    ]);
    expect(results).toEqual([{ id: '1', content: '', created_at: 0 }]);
  });

  it('sends into the thread of a forum topic', async () => {
    const { api, options } = setup({ target: { chatId: -100, threadId: 12 } });

    await sendMessage(options, 'hi');

    expect(api.calls[0].params).toMatchObject({ chatId: -100, threadId: 12 });
  });

  it('escapes text for the HTML parse mode', async () => {
    const { api, options } = setup();

    await sendMessage(options, [{ kind: 'text', content: 'a < b & "c"' }]);

    expect(sentTexts(api)).toEqual(['a &lt; b &amp; &quot;c&quot;']);
  });

  it('separates paragraphs with a blank line', async () => {
    const { api, options } = setup();

    await sendMessage(options, '<p>a</p><p>b</p>');

    expect(sentTexts(api)).toEqual(['a\n\nb\n\n']);
  });

  it('renders a code block with its language class', async () => {
    const { api, options } = setup();

    await sendMessage(options, '<code-block lang="ts">let x</code-block>');

    expect(sentTexts(api)).toEqual(['<pre><code class="language-ts">let x</code></pre>']);
  });

  it('links a mention to the user', async () => {
    const { api, options } = setup();

    await sendMessage(options, 'hi <at id="42" name="bob"/>');

    expect(sentTexts(api)).toEqual(['hi <a href="tg://user?id=42">@bob</a>']);
  });

  it('sends nothing for content that renders empty', async () => {
    const { api, options } = setup();

    const results = await sendMessage(options, '<at name="nobody"/>');

    expect(results).toEqual([]);
    expect(api.calls).toEqual([]);
  });

  it('renders a quote without an id as a block quote', async () => {
    const { api, options } = setup();

    await sendMessage(options, '<quote>hi</quote>');

    expect(sentTexts(api)).toEqual(['<blockquote>hi</blockquote>']);
  });

  it('replies to the message a quote refers to', async () => {
    const { api, options } = setup();

    await sendMessage(options, '<quote id="42"/>hello');

    expect(api.calls).toEqual([
      { method: 'sendMessage', params: { chatId: 5, text: 'hello', replyTo: 42 } },
    ]);
  });

  it('rejects a quote id that is not a message id', async () => {
    const { options } = setup();

    await expect(sendMessage(options, '<quote id="abc"/>hello')).rejects.toBeInstanceOf(
      ElementValidationError
    );
  });

  it('rejects a link without href before sending anything', async () => {
    const { api, options } = setup();

    await expect(sendMessage(options, '<a>x</a>')).rejects.toBeInstanceOf(ElementValidationError);
    expect(api.calls).toEqual([]);
  });
});

// ============================================================================
// MESSAGE SPLITTING
// ============================================================================

describe('sendMessage: splitting', () => {
  it('sends each message element separately', async () => {
    const { api, options } = setup();

    const results = await sendMessage(options, '<message>a</message><message>b</message>');

    expect(sentTexts(api)).toEqual(['a', 'b']);
    expect(results.map((result) => result.id)).toEqual(['1', '2']);
  });

  it('joins messages inside a figure into one', async () => {
    const { api, options } = setup();

    await sendMessage(
      options,
      'before<figure><message>one</message><message>two</message></figure>after'
    );

    expect(sentTexts(api)).toEqual(['before', 'one\ntwo\n', 'after']);
  });
});

// ============================================================================
// ATTACHMENTS
// ============================================================================

describe('sendMessage: attachments', () => {
  it('captions the media group with the accumulated text', async () => {
    const { api, options } = setup();

    await sendMessage(options, 'look<img src="https://example.com/a.png"/>');

    expect(api.calls).toEqual([
      {
        method: 'sendMediaGroup',
        params: {
          chatId: 5,
          media: [
            {
              type: 'photo',
              file: { filename: '0a.png', data: new Uint8Array(0), mime: 'image/png' },
              caption: 'look',
            },
          ],
        },
      },
    ]);
  });

  it('sends a gif as an animation replying to the media group', async () => {
    const { api, options } = setup();

    const results = await sendMessage(
      options,
      'pics<img src="https://example.com/a.png"/><img src="https://example.com/b.gif"/>'
    );

    expect(api.calls.map((call) => call.method)).toEqual(['sendMediaGroup', 'sendAnimation']);
    const [group, animation] = api.calls;
    expect(group.method === 'sendMediaGroup' && group.params.media[0].caption).toBe('pics');
    expect(animation.params).toMatchObject({ replyTo: 1, caption: undefined });
    expect(animation.method === 'sendAnimation' && animation.params.animation.filename).toBe(
      '1b.gif'
    );
    expect(results).toHaveLength(2);
  });

  it('captions a lone animation', async () => {
    const { api, options } = setup();

    await sendMessage(options, 'funny<img src="https://example.com/b.gif"/>');

    expect(api.calls).toHaveLength(1);
    expect(api.calls[0]).toMatchObject({ method: 'sendAnimation', params: { caption: 'funny' } });
  });

  it('maps asset kinds to media types', async () => {
    const { api, options } = setup();

    await sendMessage(
      options,
      '<audio src="https://example.com/a.mp3"/><video src="https://example.com/v.mp4"/><file src="https://example.com/d.pdf"/>'
    );

    const [call] = api.calls;
    expect(call.method === 'sendMediaGroup' && call.params.media.map((m) => m.type)).toEqual([
      'audio',
      'video',
      'document',
    ]);
  });

  it('passes the title and the per-asset timeout to the fetcher', async () => {
    const { fetchFile, options } = setup();

    await sendMessage(
      options,
      '<img src="https://example.com/a.png" title="cat.png" timeout="5"/><img src="https://example.com/b.png"/>'
    );

    expect(fetchFile.mock.calls).toEqual([
      ['https://example.com/a.png', 'cat.png', 5],
      ['https://example.com/b.png', '', 30],
    ]);
  });

  it('marks spoiler media', async () => {
    const { api, options } = setup();

    await sendMessage(options, '<img src="https://example.com/a.png" spoiler/>');

    const [call] = api.calls;
    expect(call.method === 'sendMediaGroup' && call.params.media[0].hasSpoiler).toBe(true);
  });
});

// ============================================================================
// KEYBOARDS
// ============================================================================

describe('sendMessage: keyboards', () => {
  it('attaches buttons to a text message', async () => {
    const { api, options } = setup();

    await sendMessage(
      options,
      'choose<button id="yes">Yes</button><button type="link" href="https://example.com">Docs</button><button type="input" text="/help">Help</button>'
    );

    expect(api.calls).toEqual([
      {
        method: 'sendMessage',
        params: {
          chatId: 5,
          text: 'choose',
          replyMarkup: {
            inline_keyboard: [
              [
                { text: 'Yes', callback_data: 'yes' },
                { text: 'Docs', url: 'https://example.com' },
                { text: 'Help', switch_inline_query_current_chat: '/help' },
              ],
            ],
          },
        },
      },
    ]);
  });

  it('wraps buttons into rows of five', async () => {
    const { api, options } = setup();
    const buttons = Array.from({ length: 12 }, (_, i) => `<button id="b${i}">${i}</button>`);

    await sendMessage(options, `pick${buttons.join('')}`);

    const [call] = api.calls;
    const rows = call.method === 'sendMessage' ? call.params.replyMarkup?.inline_keyboard : [];
    expect(rows?.map((row) => row.length)).toEqual([5, 5, 2]);
  });

  it('puts a button group on rows of its own', async () => {
    const { api, options } = setup();

    await sendMessage(
      options,
      'choose<button id="x">X</button><button-group><button id="a">A</button><button id="b">B</button></button-group><button id="c">C</button>'
    );

    const [call] = api.calls;
    const rows = call.method === 'sendMessage' ? call.params.replyMarkup?.inline_keyboard : [];
    expect(rows?.map((row) => row.map((button) => button.text))).toEqual([
      ['X'],
      ['A', 'B'],
      ['C'],
    ]);
  });

  it('sends the keyboard as its own message after attachments', async () => {
    const { api, options } = setup();

    const results = await sendMessage(
      options,
      'look<img src="https://example.com/a.png"/><button id="yes">Yes</button>'
    );

    expect(api.calls).toHaveLength(2);
    const [group, keyboard] = api.calls;
    expect(group.method === 'sendMediaGroup' && group.params.media[0].caption).toBeUndefined();
    expect(keyboard).toEqual({
      method: 'sendMessage',
      params: {
        chatId: 5,
        text: 'look',
        replyTo: 1,
        replyMarkup: { inline_keyboard: [[{ text: 'Yes', callback_data: 'yes' }]] },
      },
    });
    expect(results.map((result) => result.id)).toEqual(['1', '2']);
  });

  it('rejects a link button without href', async () => {
    const { options } = setup();

    await expect(sendMessage(options, '<button type="link">x</button>')).rejects.toBeInstanceOf(
      ElementValidationError
    );
  });
});

// ============================================================================
// FAILURES
// ============================================================================

class FailingApi extends DryRunApi {
  constructor(private readonly failAfter: number) {
    super();
  }

  async sendMessage(params: SendMessageParams): Promise<TelegramMessage> {
    if (this.calls.length >= this.failAfter) {
      throw new Error('Too Many Requests');
    }
    return super.sendMessage(params);
  }
}

describe('sendMessage: failures', () => {
  it('reports the messages delivered before a failure', async () => {
    const { options } = setup({ api: new FailingApi(1) });

    const error = await sendMessage(options, '<message>a</message><message>b</message>').catch(
      (err: unknown) => err
    );

    expect(error).toBeInstanceOf(PartialDeliveryError);
    expect(error instanceof PartialDeliveryError && error.delivered).toHaveLength(1);
    expect(error instanceof Error && error.message).toBe(
      'Delivery failed after 1 message(s): Too Many Requests'
    );
  });

  it('rethrows the original error when nothing was delivered', async () => {
    const { options } = setup({ api: new FailingApi(0) });

    await expect(sendMessage(options, 'hello')).rejects.toThrow('Too Many Requests');
  });
});

// ============================================================================
// ROUND TRIP
// ============================================================================

/** Send markup, let the fake server parse the HTML, and decode the result. */
async function roundTrip(markup: string): Promise<{ html: string; decoded: string }> {
  const { api, options } = setup();
  await sendMessage(options, markup);
  const [html] = sentTexts(api);
  const parsed = parseTelegramHtml(html);
  const message: TelegramMessage = {
    message_id: 1,
    date: 0,
    chat: { id: 5, type: 'private' },
    text: parsed.text,
    entities: parsed.entities,
  };
  return { html, decoded: decodeMessage(7, message).content };
}

describe('round trip through Telegram HTML', () => {
  it('re-encodes decoded flat formatting to the same HTML', async () => {
    const first = await roundTrip(
      'Hello <b>bold</b> <i>it</i> <a href="https://e.com">link</a><br/><code>x &lt; y</code>'
    );
    expect(first.html).toBe(
      'Hello <b>bold</b> <i>it</i> <a href="https://e.com">link</a>\n<code>x &lt; y</code>'
    );

    const second = await roundTrip(first.decoded);
    expect(second.html).toBe(first.html);
  });

  it('reaches a fixed point for nested formatting after one pass', async () => {
    const first = await roundTrip('<b>a<i>b</i></b>');
    expect(first.decoded).toBe('<b>a</b><i><b>b</b></i>');

    const second = await roundTrip(first.decoded);
    const third = await roundTrip(second.decoded);
    expect(third.html).toBe(second.html);
    expect(second.html).toBe('<b>a</b><i><b>b</b></i>');
  });
});

// ============================================================================
// UPDATE
// ============================================================================

describe('updateMessage', () => {
  it('edits the text and keyboard of a message', async () => {
    const api = new DryRunApi();

    await updateMessage(
      api,
      { chatId: 5 },
      9,
      '<b>new</b><button type="link" href="https://example.com">Open</button>'
    );

    expect(api.calls).toEqual([
      {
        method: 'editMessageText',
        params: {
          chatId: 5,
          messageId: 9,
          text: '<b>new</b>',
          replyMarkup: { inline_keyboard: [[{ text: 'Open', url: 'https://example.com' }]] },
        },
      },
    ]);
  });

  it('refuses attachments', async () => {
    await expect(
      updateMessage(new DryRunApi(), { chatId: 5 }, 9, '<img src="https://example.com/a.png"/>')
    ).rejects.toBeInstanceOf(UnsupportedContentError);
  });

  it('refuses content that renders to more than one message', async () => {
    await expect(
      updateMessage(new DryRunApi(), { chatId: 5 }, 9, '<message>a</message><message>b</message>')
    ).rejects.toThrow('Content renders to more than one message');
  });

  it('refuses empty content', async () => {
    await expect(updateMessage(new DryRunApi(), { chatId: 5 }, 9, '')).rejects.toThrow(
      'Cannot edit a message to empty content'
    );
  });
});
