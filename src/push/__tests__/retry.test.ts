import { describe, it, expect, vi } from 'vitest';
import { sendWithRetry } from '../retry.js';
import { DeliveryError, LocalFileError } from '../../shared/errors.js';

const policy = { attempts: 3, delayMs: 0 };

describe('sendWithRetry', () => {
  it('returns the first success', async () => {
    const send = vi.fn().mockResolvedValue('ok');
    const outcome = await sendWithRetry(policy, 'test', send);
    expect(outcome).toEqual({ ok: true, value: 'ok', attempts: 1 });
    expect(send).toHaveBeenCalledTimes(1);
  });

  it('retries transient failures', async () => {
    const send = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new DeliveryError('Bad Gateway', false))
      .mockRejectedValueOnce(new DeliveryError('Bad Gateway', false))
      .mockResolvedValue('ok');

    const outcome = await sendWithRetry(policy, 'test', send);

    expect(outcome).toEqual({ ok: true, value: 'ok', attempts: 3 });
  });

  it('gives up after the last attempt with the last error', async () => {
    const send = vi
      .fn<() => Promise<void>>()
      .mockRejectedValueOnce(new DeliveryError('first', false))
      .mockRejectedValueOnce(new DeliveryError('second', false))
      .mockRejectedValueOnce(new DeliveryError('third', false));

    const outcome = await sendWithRetry(policy, 'test', send);

    expect(outcome.ok).toBe(false);
    expect(outcome.attempts).toBe(3);
    expect(!outcome.ok && outcome.error.message).toBe('third');
  });

  it('stops at a permanent error', async () => {
    const send = vi.fn<() => Promise<void>>().mockRejectedValue(new DeliveryError('Forbidden', true));
    const outcome = await sendWithRetry(policy, 'test', send);

    expect(send).toHaveBeenCalledTimes(1);
    expect(!outcome.ok && outcome.error.permanent).toBe(true);
  });

  it('does not retry an unreadable local file', async () => {
    const send = vi
      .fn<() => Promise<void>>()
      .mockRejectedValue(new LocalFileError('Cannot read /tmp/x.mp4: ENOENT', '/tmp/x.mp4'));
    const outcome = await sendWithRetry(policy, 'test', send);

    expect(send).toHaveBeenCalledTimes(1);
    expect(outcome.attempts).toBe(1);
    expect(!outcome.ok && outcome.error.permanent).toBe(false);
  });

  it('treats foreign errors as transient', async () => {
    const send = vi.fn<() => Promise<void>>().mockRejectedValue(new Error('socket hang up'));
    const outcome = await sendWithRetry(policy, 'test', send);

    expect(send).toHaveBeenCalledTimes(3);
    expect(!outcome.ok && outcome.error).toBeInstanceOf(DeliveryError);
    expect(!outcome.ok && outcome.error.message).toBe('socket hang up');
  });
});
