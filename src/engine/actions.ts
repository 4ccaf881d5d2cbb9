import fs from 'node:fs';
import path from 'node:path';
import type { Downloader, LinkBuilder } from '../source/adapter.js';
import type { ActionKind, NotificationChannel } from '../push/channel.js';
import { isNamespacedToken, type TokenRegistry } from '../push/tokens.js';
import { sendWithRetry, type RetryPolicy } from '../push/retry.js';
import { errorMessage } from '../shared/errors.js';
import { generateId } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

/** Actions fulfilled once per button press; the rest may be pressed again. */
const SINGLE_USE: ReadonlySet<ActionKind> = new Set(['hd', 'audio']);

export interface ActionRequest {
  kind: ActionKind;
  token: string;
  /** Private chat that receives the result. */
  requesterId: string;
  sourceHandle: string;
}

export interface ActionOutcome {
  ok: boolean;
  expired: boolean;
  count: number;
  message: string;
}

export interface ActionDeps {
  links: LinkBuilder;
  downloader: Downloader;
  tokens: TokenRegistry;
  channel: NotificationChannel;
  scratchDir: string;
  retry: RetryPolicy;
}

export class ActionService {
  constructor(private readonly deps: ActionDeps) {}

  /**
   * Item IDs behind a token. Registry tokens of single-use actions are consumed.
   * A bare item ID stands for itself; an unknown registry token has expired.
   */
  resolveTargets(kind: ActionKind, token: string): string[] | undefined {
    const { tokens } = this.deps;
    const ids = SINGLE_USE.has(kind) ? tokens.consumeOnce(token) : tokens.resolve(token);
    if (ids) return ids;
    return isNamespacedToken(token) ? undefined : [token];
  }

  async handle(req: ActionRequest): Promise<ActionOutcome> {
    const ids = this.resolveTargets(req.kind, req.token);
    if (!ids || ids.length === 0) {
      logger.info({ kind: req.kind, token: req.token }, 'Action token expired');
      return { ok: false, expired: true, count: 0, message: 'This button has expired.' };
    }

    switch (req.kind) {
      case 'urls':
        return this.sendUrls(req, ids);
      case 'hd':
        return this.sendFiles(req, ids, 'hd');
      case 'audio':
        return this.sendFiles(req, ids, 'audio');
    }
  }

  private async sendUrls(req: ActionRequest, ids: string[]): Promise<ActionOutcome> {
    let sent = 0;
    for (const id of ids) {
      const url = this.deps.links.permalink(req.sourceHandle, id);
      const outcome = await sendWithRetry(this.deps.retry, `send url to ${req.requesterId}`, () =>
        this.deps.channel.sendMessage({ destinationId: req.requesterId }, url),
      );
      if (outcome.ok) sent++;
    }
    return sent > 0
      ? { ok: true, expired: false, count: sent, message: 'Sent you the video URLs via DM!' }
      : { ok: false, expired: false, count: 0, message: 'No URLs available.' };
  }

  private async sendFiles(
    req: ActionRequest,
    ids: string[],
    kind: 'hd' | 'audio',
  ): Promise<ActionOutcome> {
    const { links, downloader, channel, scratchDir, retry } = this.deps;
    let sent = 0;

    for (const id of ids) {
      const url = kind === 'hd' ? links.hdUrl(id) : links.audioUrl(id);
      const file = path.join(
        scratchDir,
        kind === 'hd' ? `HD_${id}_${generateId(6)}.mp4` : `Audio_${id}_${generateId(6)}.mp3`,
      );

      try {
        await downloader.download(url, file);
      } catch (err) {
        logger.warn({ kind, item: id, error: errorMessage(err) }, 'Action download failed');
        continue;
      }

      try {
        const outcome = await sendWithRetry(retry, `send ${kind} document to ${req.requesterId}`, () =>
          channel.sendDocument({ destinationId: req.requesterId }, file),
        );
        if (outcome.ok) sent++;
      } finally {
        try {
          fs.rmSync(file, { force: true });
        } catch (err) {
          logger.warn({ path: file, error: errorMessage(err) }, 'Could not delete temp file');
        }
      }
    }

    const noun = kind === 'hd' ? 'HD video(s)' : 'audio file(s)';
    if (sent === 0) {
      return {
        ok: false,
        expired: false,
        count: 0,
        message: kind === 'hd' ? 'Failed to retrieve HD video.' : 'Failed to retrieve audio.',
      };
    }
    return { ok: true, expired: false, count: sent, message: `Sent you ${sent} ${noun}` };
  }
}
