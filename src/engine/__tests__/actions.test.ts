import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { DeliveryError } from '../../shared/errors.js';
import { createTestRuntime, type TestRuntime } from '../../__tests__/fakes.js';

let t: TestRuntime;

beforeEach(() => {
  t = createTestRuntime();
  for (const id of ['a', 'b']) {
    t.platform.bodies.set(t.platform.hdUrl(id), `hd-${id}`);
    t.platform.bodies.set(t.platform.audioUrl(id), `audio-${id}`);
  }
});

afterEach(() => {
  t.dispose();
});

const press = (kind: 'hd' | 'audio' | 'urls', token: string) =>
  t.runtime.actions.handle({ kind, token, requesterId: 'u1', sourceHandle: 'acct' });

describe('ActionService', () => {
  it('sends permalinks for a bare item ID', async () => {
    const outcome = await press('urls', 'a');

    expect(outcome).toEqual({ ok: true, expired: false, count: 1, message: 'Sent you the video URLs via DM!' });
    expect(t.channel.sent).toEqual([
      {
        method: 'sendMessage',
        target: { destinationId: 'u1' },
        itemIds: [],
        files: [],
        contents: [],
        text: 'https://videos.test/@acct/video/a',
        actions: undefined,
      },
    ]);
  });

  it('lets a urls token be pressed again', async () => {
    const token = t.runtime.tokens.register('urls', ['a', 'b']);

    await press('urls', token);
    const again = await press('urls', token);

    expect(again.count).toBe(2);
    expect(t.channel.ofMethod('sendMessage').map((r) => r.text)).toEqual([
      'https://videos.test/@acct/video/a',
      'https://videos.test/@acct/video/b',
      'https://videos.test/@acct/video/a',
      'https://videos.test/@acct/video/b',
    ]);
  });

  it('sends HD files once per token', async () => {
    const token = t.runtime.tokens.register('hd', ['a', 'b']);

    const first = await press('hd', token);
    const second = await press('hd', token);

    expect(first).toEqual({ ok: true, expired: false, count: 2, message: 'Sent you 2 HD video(s)' });
    expect(second).toEqual({ ok: false, expired: true, count: 0, message: 'This button has expired.' });

    const docs = t.channel.ofMethod('sendDocument');
    expect(docs.map((d) => d.contents[0])).toEqual(['hd-a', 'hd-b']);
    expect(docs[0]?.files[0]).toMatch(/^HD_a_.{6}\.mp4$/);
    expect(docs[0]?.target).toEqual({ destinationId: 'u1' });
  });

  it('sends audio and removes the scratch files', async () => {
    const outcome = await press('audio', 'b');

    expect(outcome.message).toBe('Sent you 1 audio file(s)');
    expect(t.channel.ofMethod('sendDocument')[0]?.files[0]).toMatch(/^Audio_b_.{6}\.mp3$/);
    expect(fs.readdirSync(path.join(t.downloadsDir, 'actions'))).toEqual([]);
  });

  it('reports a failed retrieval', async () => {
    const outcome = await press('audio', 'missing');
    expect(outcome).toEqual({ ok: false, expired: false, count: 0, message: 'Failed to retrieve audio.' });
  });

  it('reports an HD retrieval that could not be sent', async () => {
    t.channel.failNext('sendDocument', new DeliveryError('Forbidden', true));
    const outcome = await press('hd', 'a');
    expect(outcome.message).toBe('Failed to retrieve HD video.');
  });

  it('treats an unknown registry token as expired', async () => {
    const outcome = await press('urls', 'urls_zzzzzz');
    expect(outcome.expired).toBe(true);
    expect(t.channel.attempts).toEqual([]);
  });

  it('counts only the URLs that went out', async () => {
    t.channel.failNext('sendMessage', new DeliveryError('Forbidden', true));
    const outcome = await press('urls', 'a');
    expect(outcome).toEqual({ ok: false, expired: false, count: 0, message: 'No URLs available.' });
  });
});
