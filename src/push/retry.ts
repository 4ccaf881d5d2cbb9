import { DeliveryError, LocalFileError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { sleep } from '../shared/utils.js';

export interface RetryPolicy {
  attempts: number;
  delayMs: number;
}

export const DEFAULT_RETRY: RetryPolicy = { attempts: 3, delayMs: 1000 };

export type SendOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: DeliveryError; attempts: number };

/**
 * Run `send` up to `policy.attempts` times with a fixed pause between attempts.
 * A permanent DeliveryError or an unreadable local file stops immediately.
 * Never throws.
 */
export async function sendWithRetry<T>(
  policy: RetryPolicy,
  label: string,
  send: () => Promise<T>,
  signal?: AbortSignal,
): Promise<SendOutcome<T>> {
  let lastError = new DeliveryError(`${label}: no attempt made`, false);

  for (let attempt = 1; attempt <= policy.attempts; attempt++) {
    try {
      const value = await send();
      return { ok: true, value, attempts: attempt };
    } catch (err) {
      lastError =
        err instanceof DeliveryError ? err : new DeliveryError(errorMessage(err), false);
      logger.warn(
        { op: label, attempt, permanent: lastError.permanent, error: lastError.message },
        'Send attempt failed',
      );
      if (lastError.permanent || lastError instanceof LocalFileError) {
        return { ok: false, error: lastError, attempts: attempt };
      }
      if (attempt < policy.attempts) {
        await sleep(policy.delayMs, signal);
      }
    }
  }

  logger.error({ op: label, attempts: policy.attempts }, 'All send attempts failed');
  return { ok: false, error: lastError, attempts: policy.attempts };
}
