/**
 * Telegram Bot API channel: multipart uploads over fetch.
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { Config } from '../shared/config.js';
import type { DeliverableArtifact } from '../fetch/pipeline.js';
import type { ActionLayout, DeliveryTarget, NotificationChannel } from './channel.js';
import { encodeCallbackData } from './channel.js';
import { DeliveryError, LocalFileError, errorMessage } from '../shared/errors.js';
import { fetchWithTimeout, HttpTimeoutError } from '../shared/http.js';
import { logger } from '../shared/logger.js';

const ApiResponseSchema = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
  error_code: z.number().optional(),
});

type InlineKeyboardButton = { text: string; callback_data: string } | { text: string; url: string };

export function toInlineKeyboard(actions: ActionLayout): {
  inline_keyboard: InlineKeyboardButton[][];
} {
  return {
    inline_keyboard: actions.map((row) =>
      row.map((button): InlineKeyboardButton =>
        button.type === 'url'
          ? { text: button.label, url: button.url }
          : { text: button.label, callback_data: encodeCallbackData(button.kind, button.token) },
      ),
    ),
  };
}

function targetFields(target: DeliveryTarget): Record<string, string> {
  const fields: Record<string, string> = { chat_id: target.destinationId };
  if (target.topicId) fields['message_thread_id'] = target.topicId;
  return fields;
}

export class TelegramChannel implements NotificationChannel {
  private readonly apiBase: string;
  private readonly botToken: string;
  private readonly timeoutMs: number;

  constructor(cfg: Config['delivery']['telegram']) {
    this.apiBase = cfg.api_base.replace(/\/+$/, '');
    this.botToken = cfg.bot_token;
    this.timeoutMs = cfg.timeout_ms;
  }

  async sendBatch(target: DeliveryTarget, artifacts: readonly DeliverableArtifact[]): Promise<void> {
    const form = this.form(targetFields(target));
    const media = await Promise.all(
      artifacts.map(async (artifact, i) => {
        const name = `file${i}`;
        await this.attach(form, name, artifact.path);
        return artifact.kind === 'video'
          ? { type: 'video', media: `attach://${name}`, supports_streaming: true }
          : { type: 'photo', media: `attach://${name}` };
      }),
    );
    form.append('media', JSON.stringify(media));
    await this.call('sendMediaGroup', form);
  }

  async sendSingle(
    target: DeliveryTarget,
    artifact: DeliverableArtifact,
    caption: string,
    actions?: ActionLayout,
  ): Promise<void> {
    const form = this.form({ ...targetFields(target), caption });
    if (actions && actions.length > 0) {
      form.append('reply_markup', JSON.stringify(toInlineKeyboard(actions)));
    }
    if (artifact.kind === 'video') {
      form.append('supports_streaming', 'true');
      await this.attach(form, 'video', artifact.path);
      await this.call('sendVideo', form);
    } else {
      await this.attach(form, 'photo', artifact.path);
      await this.call('sendPhoto', form);
    }
  }

  async sendMessage(target: DeliveryTarget, text: string, actions?: ActionLayout): Promise<void> {
    const form = this.form({ ...targetFields(target), text });
    if (actions && actions.length > 0) {
      form.append('reply_markup', JSON.stringify(toInlineKeyboard(actions)));
    }
    await this.call('sendMessage', form);
  }

  async sendDocument(target: DeliveryTarget, filePath: string): Promise<void> {
    const form = this.form({ ...targetFields(target), disable_content_type_detection: 'true' });
    await this.attach(form, 'document', filePath);
    await this.call('sendDocument', form);
  }

  private form(fields: Record<string, string>): FormData {
    const form = new FormData();
    for (const [key, value] of Object.entries(fields)) {
      form.append(key, value);
    }
    return form;
  }

  private async attach(form: FormData, field: string, filePath: string): Promise<void> {
    let blob: Blob;
    try {
      blob = await fs.openAsBlob(filePath);
    } catch (err) {
      throw new LocalFileError(`Cannot read ${filePath}: ${errorMessage(err)}`, filePath);
    }
    form.append(field, blob, path.basename(filePath));
  }

  private async call(method: string, body: FormData): Promise<void> {
    if (!this.botToken) {
      throw new DeliveryError('Telegram bot token is not configured', true, { method });
    }
    const url = `${this.apiBase}/bot${this.botToken}/${method}`;

    let response: Response;
    try {
      response = await fetchWithTimeout(url, { method: 'POST', body }, this.timeoutMs);
    } catch (err) {
      const reason = err instanceof HttpTimeoutError ? `timed out after ${this.timeoutMs}ms` : errorMessage(err);
      throw new DeliveryError(`${method} failed: ${reason}`, false, { method });
    }

    let payload: z.infer<typeof ApiResponseSchema> | null = null;
    try {
      const parsed = ApiResponseSchema.safeParse(await response.json());
      payload = parsed.success ? parsed.data : null;
    } catch (err) {
      logger.debug({ method, status: response.status, error: errorMessage(err) }, 'Telegram reply was not JSON');
    }

    if (response.ok && payload?.ok) {
      logger.debug({ method }, 'Telegram call succeeded');
      return;
    }

    const transient = response.status === 429 || response.status >= 500;
    throw new DeliveryError(
      `${method} rejected (${response.status}): ${payload?.description ?? response.statusText}`,
      !transient,
      { method, status: response.status },
    );
  }
}
