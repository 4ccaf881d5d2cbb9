import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { DeliveryDispatcher, type DeliveryRequest } from '../dispatcher.js';
import { TokenRegistry } from '../tokens.js';
import { DeliveryError, LocalFileError } from '../../shared/errors.js';
import type { DeliverableArtifact } from '../../fetch/pipeline.js';
import { FakeChannel, makeTempDir } from '../../__tests__/fakes.js';

let dir: string;
let channel: FakeChannel;
let tokens: TokenRegistry;
let dispatcher: DeliveryDispatcher;

beforeEach(() => {
  dir = makeTempDir();
  channel = new FakeChannel();
  tokens = new TokenRegistry();
  dispatcher = new DeliveryDispatcher(channel, tokens, {
    retry: { attempts: 3, delayMs: 0 },
    albumPauseMs: 0,
  });
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function videos(count: number): DeliverableArtifact[] {
  return Array.from({ length: count }, (_, i) => {
    const itemId = `v${i + 1}`;
    const file = path.join(dir, `${itemId}.mp4`);
    fs.writeFileSync(file, itemId);
    return { path: file, itemId, kind: 'video' };
  });
}

function request(artifacts: DeliverableArtifact[]): DeliveryRequest {
  return {
    target: { destinationId: 'g1' },
    artifacts,
    caption: '#acct',
    offer: { kinds: ['hd', 'audio', 'urls'], originalUrl: 'https://videos.test/@acct' },
  };
}

describe('DeliveryDispatcher', () => {
  it('splits into albums of at most 10 and sends the caption last', async () => {
    const report = await dispatcher.deliver(request(videos(23)));

    expect(channel.sent.map((r) => [r.method, r.itemIds.length])).toEqual([
      ['sendBatch', 10],
      ['sendBatch', 10],
      ['sendBatch', 3],
      ['sendMessage', 0],
    ]);
    expect(report.batchesSent).toBe(3);
    expect(report.deliveredItemIds).toHaveLength(23);
    expect(report.failedItemIds).toEqual([]);
  });

  it('honours a smaller album size', async () => {
    const small = new DeliveryDispatcher(channel, tokens, {
      maxBatch: 2,
      retry: { attempts: 1, delayMs: 0 },
      albumPauseMs: 0,
    });
    await small.deliver(request(videos(4)));
    expect(channel.ofMethod('sendBatch').map((r) => r.itemIds)).toEqual([
      ['v1', 'v2'],
      ['v3', 'v4'],
    ]);
  });

  it('sends a trailing batch of one as a single uncaptioned message', async () => {
    await dispatcher.deliver(request(videos(11)));

    expect(channel.sent.map((r) => r.method)).toEqual(['sendBatch', 'sendSingle', 'sendMessage']);
    expect(channel.sent[1]?.itemIds).toEqual(['v11']);
    expect(channel.sent[1]?.text).toBe('');
    expect(channel.sent[1]?.actions).toBeUndefined();
  });

  it('sends a lone artifact with the caption and buttons attached', async () => {
    const report = await dispatcher.deliver(request(videos(1)));

    expect(channel.sent.map((r) => r.method)).toEqual(['sendSingle']);
    expect(channel.sent[0]?.text).toBe('#acct');
    expect(report.tokens).toEqual({ hd: 'v1', audio: 'v1', urls: 'v1' });
  });

  it('mints one registry token per action over the delivered items', async () => {
    const report = await dispatcher.deliver(request(videos(3)));

    expect(report.tokens.hd).toMatch(/^hd_[a-z0-9]{6}$/);
    expect(report.tokens.audio).toMatch(/^audio_[a-z0-9]{6}$/);
    expect(report.tokens.urls).toMatch(/^urls_[a-z0-9]{6}$/);
    expect(tokens.resolve(report.tokens.urls ?? '')).toEqual(['v1', 'v2', 'v3']);

    const caption = channel.ofMethod('sendMessage')[0];
    expect(caption?.actions).toEqual([
      [{ type: 'url', label: 'Watch Original', url: 'https://videos.test/@acct' }],
      [
        { type: 'callback', label: 'HD', kind: 'hd', token: report.tokens.hd },
        { type: 'callback', label: 'Audio', kind: 'audio', token: report.tokens.audio },
        { type: 'callback', label: 'Video URLs', kind: 'urls', token: report.tokens.urls },
      ],
    ]);
  });

  it('binds tokens only to the items that went out', async () => {
    let calls = 0;
    const sendBatch = channel.sendBatch.bind(channel);
    channel.sendBatch = async (target, artifacts) => {
      calls++;
      if (calls > 1) throw new DeliveryError('Too Many Requests', false);
      return sendBatch(target, artifacts);
    };

    const report = await dispatcher.deliver(request(videos(13)));

    expect(report.batchesSent).toBe(1);
    expect(report.batchesFailed).toBe(1);
    expect(report.failedItemIds).toEqual(['v11', 'v12', 'v13']);
    expect(tokens.resolve(report.tokens.hd ?? '')).toEqual(
      ['v1', 'v2', 'v3', 'v4', 'v5', 'v6', 'v7', 'v8', 'v9', 'v10'],
    );
  });

  it('retries a transient failure and then succeeds', async () => {
    channel.failNext('sendBatch', new DeliveryError('Bad Gateway', false), 2);
    const report = await dispatcher.deliver(request(videos(2)));

    expect(channel.attempts).toEqual(['sendBatch', 'sendBatch', 'sendBatch', 'sendMessage']);
    expect(report.deliveredItemIds).toEqual(['v1', 'v2']);
  });

  it('stops at a permanent rejection and skips the rest', async () => {
    channel.failNext('sendBatch', new DeliveryError('Forbidden: bot was kicked', true));
    const report = await dispatcher.deliver(request(videos(15)));

    expect(channel.attempts).toEqual(['sendBatch']);
    expect(report.rejected).toBe(true);
    expect(report.batchesFailed).toBe(2);
    expect(report.deliveredItemIds).toEqual([]);
    expect(report.failedItemIds).toHaveLength(15);
  });

  it('fails only the album whose local file cannot be read', async () => {
    channel.failNext('sendBatch', new LocalFileError('Cannot read v1.mp4: ENOENT', 'v1.mp4'));
    const report = await dispatcher.deliver(request(videos(15)));

    expect(channel.attempts).toEqual(['sendBatch', 'sendBatch', 'sendMessage']);
    expect(report.rejected).toBe(false);
    expect(report.batchesFailed).toBe(1);
    expect(report.batchesSent).toBe(1);
    expect(report.failedItemIds).toHaveLength(10);
    expect(report.deliveredItemIds).toEqual(['v11', 'v12', 'v13', 'v14', 'v15']);
  });

  it('counts media as delivered when only the caption fails', async () => {
    channel.failNext('sendMessage', new DeliveryError('Bad Gateway', false), 3);
    const report = await dispatcher.deliver(request(videos(2)));

    expect(report.deliveredItemIds).toEqual(['v1', 'v2']);
    expect(channel.ofMethod('sendMessage')).toEqual([]);
  });

  it('deletes every local file whatever the outcome', async () => {
    channel.failNext('sendBatch', new DeliveryError('Forbidden', true));
    const artifacts = videos(3);
    await dispatcher.deliver(request(artifacts));

    expect(artifacts.map((a) => fs.existsSync(a.path))).toEqual([false, false, false]);
  });

  it('treats a photo set split across albums as failed if any album failed', async () => {
    const artifacts: DeliverableArtifact[] = Array.from({ length: 12 }, (_, i) => {
      const file = path.join(dir, `p_${i + 1}.jpg`);
      fs.writeFileSync(file, String(i));
      return { path: file, itemId: 'p', kind: 'photo' };
    });
    let calls = 0;
    const sendBatch = channel.sendBatch.bind(channel);
    channel.sendBatch = async (target, batch) => {
      calls++;
      if (calls > 1) throw new DeliveryError('Bad Gateway', false);
      return sendBatch(target, batch);
    };

    const report = await dispatcher.deliver(request(artifacts));

    expect(report.deliveredItemIds).toEqual([]);
    expect(report.failedItemIds).toEqual(['p']);
  });

  it('sends nothing for an empty request', async () => {
    const report = await dispatcher.deliver(request([]));
    expect(channel.attempts).toEqual([]);
    expect(report.deliveredItemIds).toEqual([]);
  });

  it('sends nothing once aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const report = await dispatcher.deliver(request(videos(3)), controller.signal);

    expect(channel.attempts).toEqual([]);
    expect(report.failedItemIds).toEqual(['v1', 'v2', 'v3']);
  });
});
