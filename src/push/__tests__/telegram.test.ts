import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { TelegramChannel, toInlineKeyboard } from '../telegram.js';
import { DeliveryError, LocalFileError } from '../../shared/errors.js';
import { makeTempDir } from '../../__tests__/fakes.js';

const cfg = { bot_token: 'test-secret', api_base: 'https://tg.test/', timeout_ms: 1000 };

let fetchMock: Mock<typeof fetch>;
let dir: string;

function reply(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

function lastCall(): { url: string; form: FormData } {
  const call = fetchMock.mock.calls.at(-1);
  if (!call) throw new Error('fetch was not called');
  const [input, init] = call;
  const body = init?.body;
  if (!(body instanceof FormData)) throw new Error('expected multipart body');
  return { url: String(input), form: body };
}

beforeEach(() => {
  fetchMock = vi.fn<typeof fetch>().mockImplementation(async () => reply(200, { ok: true, result: {} }));
  vi.stubGlobal('fetch', fetchMock);
  dir = makeTempDir();
});

afterEach(() => {
  vi.unstubAllGlobals();
  fs.rmSync(dir, { recursive: true, force: true });
});

function file(name: string): string {
  const p = path.join(dir, name);
  fs.writeFileSync(p, name);
  return p;
}

describe('TelegramChannel', () => {
  it('posts messages with buttons to the bot endpoint', async () => {
    const channel = new TelegramChannel(cfg);
    await channel.sendMessage({ destinationId: '-100', topicId: '7' }, '#acct', [
      [{ type: 'url', label: 'Watch Original', url: 'https://videos.test/@acct' }],
      [{ type: 'callback', label: 'HD', kind: 'hd', token: 'hd_abc123' }],
    ]);

    const { url, form } = lastCall();
    expect(url).toBe('https://tg.test/bottest-secret/sendMessage');
    expect(form.get('chat_id')).toBe('-100');
    expect(form.get('message_thread_id')).toBe('7');
    expect(form.get('text')).toBe('#acct');
    expect(form.get('reply_markup')).toBe(
      JSON.stringify({
        inline_keyboard: [
          [{ text: 'Watch Original', url: 'https://videos.test/@acct' }],
          [{ text: 'HD', callback_data: 'hd|hd_abc123' }],
        ],
      }),
    );
  });

  it('uploads an album as a media group', async () => {
    const channel = new TelegramChannel(cfg);
    await channel.sendBatch({ destinationId: '-100' }, [
      { path: file('v1.mp4'), itemId: 'v1', kind: 'video' },
      { path: file('p_1.jpg'), itemId: 'p', kind: 'photo' },
    ]);

    const { url, form } = lastCall();
    expect(url).toBe('https://tg.test/bottest-secret/sendMediaGroup');
    expect(form.get('message_thread_id')).toBeNull();
    expect(form.get('media')).toBe(
      JSON.stringify([
        { type: 'video', media: 'attach://file0', supports_streaming: true },
        { type: 'photo', media: 'attach://file1' },
      ]),
    );
    expect(form.get('file0')).toBeInstanceOf(Blob);
    expect(form.get('file1')).toBeInstanceOf(Blob);
  });

  it('sends a lone photo with its caption', async () => {
    const channel = new TelegramChannel(cfg);
    await channel.sendSingle({ destinationId: '-100' }, { path: file('p_1.jpg'), itemId: 'p', kind: 'photo' }, '#acct');

    const { url, form } = lastCall();
    expect(url).toBe('https://tg.test/bottest-secret/sendPhoto');
    expect(form.get('caption')).toBe('#acct');
    expect(form.get('reply_markup')).toBeNull();
  });

  it('sends documents without content type detection', async () => {
    const channel = new TelegramChannel(cfg);
    await channel.sendDocument({ destinationId: '42' }, file('HD_v1_x.mp4'));

    const { url, form } = lastCall();
    expect(url).toBe('https://tg.test/bottest-secret/sendDocument');
    expect(form.get('disable_content_type_detection')).toBe('true');
  });

  it('treats rate limits and server errors as transient', async () => {
    const channel = new TelegramChannel(cfg);
    fetchMock.mockImplementationOnce(async () =>
      reply(429, { ok: false, error_code: 429, description: 'Too Many Requests: retry after 5' }),
    );

    const error = await channel.sendMessage({ destinationId: '-100' }, 'x').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DeliveryError);
    expect(error instanceof DeliveryError && error.permanent).toBe(false);
  });

  it('treats other refusals as permanent', async () => {
    const channel = new TelegramChannel(cfg);
    fetchMock.mockImplementationOnce(async () =>
      reply(400, { ok: false, error_code: 400, description: 'Bad Request: chat not found' }),
    );

    const error = await channel.sendMessage({ destinationId: '-100' }, 'x').catch((e: unknown) => e);

    expect(error instanceof DeliveryError && error.permanent).toBe(true);
    expect(error instanceof DeliveryError && error.message).toBe(
      'sendMessage rejected (400): Bad Request: chat not found',
    );
  });

  it('treats network errors as transient', async () => {
    const channel = new TelegramChannel(cfg);
    fetchMock.mockImplementationOnce(async () => {
      throw new TypeError('fetch failed');
    });

    const error = await channel.sendMessage({ destinationId: '-100' }, 'x').catch((e: unknown) => e);

    expect(error instanceof DeliveryError && error.permanent).toBe(false);
    expect(error instanceof DeliveryError && error.message).toBe('sendMessage failed: fetch failed');
  });

  it('reports an unreadable local file without calling the API', async () => {
    const channel = new TelegramChannel(cfg);
    const missing = path.join(dir, 'gone.mp4');

    const error = await channel
      .sendSingle({ destinationId: '-100' }, { path: missing, itemId: 'gone', kind: 'video' }, '#acct')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LocalFileError);
    expect(error instanceof LocalFileError && error.permanent).toBe(false);
    expect(error instanceof LocalFileError && error.filePath).toBe(missing);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('refuses to send without a bot token', async () => {
    const channel = new TelegramChannel({ ...cfg, bot_token: '' });
    const error = await channel.sendMessage({ destinationId: '-100' }, 'x').catch((e: unknown) => e);

    expect(error instanceof DeliveryError && error.permanent).toBe(true);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe('toInlineKeyboard', () => {
  it('encodes callback buttons as <kind>|<token>', () => {
    expect(
      toInlineKeyboard([[{ type: 'callback', label: 'Audio', kind: 'audio', token: '730123' }]]),
    ).toEqual({ inline_keyboard: [[{ text: 'Audio', callback_data: 'audio|730123' }]] });
  });
});
