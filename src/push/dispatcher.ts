import fs from 'node:fs';
import type { DeliverableArtifact } from '../fetch/pipeline.js';
import type {
  ActionButton,
  ActionKind,
  ActionLayout,
  DeliveryTarget,
  NotificationChannel,
} from './channel.js';
import type { TokenRegistry } from './tokens.js';
import { DEFAULT_RETRY, sendWithRetry, type RetryPolicy } from './retry.js';
import { chunk, sleep } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

export const ACTION_LABELS: Record<ActionKind, string> = {
  hd: 'HD',
  audio: 'Audio',
  urls: 'Video URLs',
};

/**
 * Secondary actions to attach to a delivery. Tokens are minted over the item IDs
 * that actually went out.
 */
export interface ActionOffer {
  kinds: ActionKind[];
  originalUrl?: string;
  originalLabel?: string;
}

export interface DeliveryRequest {
  target: DeliveryTarget;
  /** Oldest item first. */
  artifacts: DeliverableArtifact[];
  caption: string;
  offer?: ActionOffer;
}

export interface DeliveryReport {
  deliveredItemIds: string[];
  failedItemIds: string[];
  batchesSent: number;
  batchesFailed: number;
  /** The destination permanently refused a send. */
  rejected: boolean;
  tokens: Partial<Record<ActionKind, string>>;
}

export interface DispatcherOptions {
  maxBatch: number;
  retry: RetryPolicy;
  albumPauseMs: number;
}

export class DeliveryDispatcher {
  private readonly opts: DispatcherOptions;

  constructor(
    private readonly channel: NotificationChannel,
    private readonly tokens: TokenRegistry,
    opts: Partial<DispatcherOptions> = {},
  ) {
    this.opts = {
      maxBatch: opts.maxBatch ?? 10,
      retry: opts.retry ?? DEFAULT_RETRY,
      albumPauseMs: opts.albumPauseMs ?? 500,
    };
  }

  /**
   * Send artifacts in albums of at most `maxBatch`, then the caption with its
   * action buttons. A lone artifact goes out as one captioned photo/video instead.
   * Local files are deleted afterwards whatever happened.
   */
  async deliver(req: DeliveryRequest, signal?: AbortSignal): Promise<DeliveryReport> {
    const report: DeliveryReport = {
      deliveredItemIds: [],
      failedItemIds: [],
      batchesSent: 0,
      batchesFailed: 0,
      rejected: false,
      tokens: {},
    };

    try {
      if (req.artifacts.length === 0) return report;

      const [only] = req.artifacts;
      if (req.artifacts.length === 1 && only) {
        await this.deliverLone(req, only, report, signal);
      } else {
        await this.deliverAlbums(req, report, signal);
      }
      return report;
    } finally {
      removeArtifacts(req.artifacts);
    }
  }

  private async deliverLone(
    req: DeliveryRequest,
    artifact: DeliverableArtifact,
    report: DeliveryReport,
    signal?: AbortSignal,
  ): Promise<void> {
    const actions = this.composeActions(req.offer, [artifact.itemId], report);
    const outcome = await sendWithRetry(
      this.opts.retry,
      `send ${artifact.kind} to ${req.target.destinationId}`,
      () => this.channel.sendSingle(req.target, artifact, req.caption, actions),
      signal,
    );
    if (outcome.ok) {
      report.batchesSent++;
      report.deliveredItemIds.push(artifact.itemId);
    } else {
      report.batchesFailed++;
      report.rejected = outcome.error.permanent;
      report.failedItemIds.push(artifact.itemId);
      report.tokens = {};
    }
  }

  private async deliverAlbums(
    req: DeliveryRequest,
    report: DeliveryReport,
    signal?: AbortSignal,
  ): Promise<void> {
    const failed = new Set<string>();
    const batches = chunk(req.artifacts, this.opts.maxBatch);

    for (const [i, batch] of batches.entries()) {
      if (report.rejected || signal?.aborted) {
        for (const a of batch) failed.add(a.itemId);
        report.batchesFailed++;
        continue;
      }

      if (i > 0) await sleep(this.opts.albumPauseMs, signal);

      const [first] = batch;
      const outcome = await sendWithRetry(
        this.opts.retry,
        `send album ${i + 1}/${batches.length} to ${req.target.destinationId}`,
        () =>
          batch.length === 1 && first
            ? this.channel.sendSingle(req.target, first, '')
            : this.channel.sendBatch(req.target, batch),
        signal,
      );

      if (outcome.ok) {
        report.batchesSent++;
      } else {
        report.batchesFailed++;
        report.rejected = outcome.error.permanent;
        for (const a of batch) failed.add(a.itemId);
      }
    }

    const itemIds = uniqueInOrder(req.artifacts.map((a) => a.itemId));
    report.deliveredItemIds = itemIds.filter((id) => !failed.has(id));
    report.failedItemIds = itemIds.filter((id) => failed.has(id));

    if (report.deliveredItemIds.length === 0 || report.rejected) return;

    const actions = this.composeActions(req.offer, report.deliveredItemIds, report);
    const captionOutcome = await sendWithRetry(
      this.opts.retry,
      `send caption to ${req.target.destinationId}`,
      () => this.channel.sendMessage(req.target, req.caption, actions),
      signal,
    );
    if (!captionOutcome.ok) {
      logger.warn(
        { destination: req.target.destinationId, error: captionOutcome.error.message },
        'Media delivered but caption message failed',
      );
    }
  }

  /**
   * One token per action kind. A single item needs no registry entry: its own ID
   * is the token.
   */
  private composeActions(
    offer: ActionOffer | undefined,
    itemIds: string[],
    report: DeliveryReport,
  ): ActionLayout | undefined {
    if (!offer) return undefined;

    const [soleId] = itemIds;
    const callbacks: ActionButton[] = offer.kinds.map((kind) => {
      const token = itemIds.length === 1 && soleId ? soleId : this.tokens.register(kind, itemIds);
      report.tokens[kind] = token;
      return { type: 'callback', label: ACTION_LABELS[kind], kind, token };
    });

    const layout: ActionLayout = [];
    if (offer.originalUrl) {
      layout.push([{ type: 'url', label: offer.originalLabel ?? 'Watch Original', url: offer.originalUrl }]);
    }
    if (callbacks.length > 0) layout.push(callbacks);
    return layout.length > 0 ? layout : undefined;
  }
}

export function removeArtifacts(artifacts: readonly DeliverableArtifact[]): void {
  for (const artifact of artifacts) {
    try {
      fs.rmSync(artifact.path, { force: true });
      logger.debug({ path: artifact.path }, 'Deleted artifact');
    } catch (err) {
      logger.warn(
        { path: artifact.path, error: err instanceof Error ? err.message : String(err) },
        'Could not delete artifact',
      );
    }
  }
}

function uniqueInOrder(ids: string[]): string[] {
  return [...new Set(ids)];
}
