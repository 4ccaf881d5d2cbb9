import type Database from 'better-sqlite3';
import type { Item, SourceProfile, VideoPlatform } from '../source/adapter.js';
import type { ProcessedSet } from '../store/processedStore.js';
import type { Subscription } from '../store/subscriptionStore.js';
import { commitWatermark } from '../store/subscriptionStore.js';
import { artifactsOf, type FetchPipeline, type FetchedMedia } from '../fetch/pipeline.js';
import type { ActionOffer, DeliveryDispatcher, DeliveryReport } from '../push/dispatcher.js';
import type { DeliveryTarget } from '../push/channel.js';
import { SourceError, errorMessage } from '../shared/errors.js';
import { nowUnix } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

export interface RelayDeps {
  db: Database.Database;
  platform: VideoPlatform;
  processed: ProcessedSet;
  pipeline: FetchPipeline;
  dispatcher: DeliveryDispatcher;
  freshnessSeconds: number;
  /** Unix seconds; injectable for tests. */
  now?: () => number;
}

export type TickStatus =
  | 'delivered'
  | 'no_candidates'
  | 'empty_listing'
  | 'resolution_failed'
  | 'listing_failed'
  | 'fetch_failed'
  | 'delivery_failed'
  | 'rejected';

export interface TickResult {
  destinationId: string;
  sourceHandle: string;
  status: TickStatus;
  candidates: string[];
  delivered: string[];
  watermark: string | null;
  error?: string;
}

interface Fetched {
  item: Item;
  media: FetchedMedia;
}

/**
 * Items strictly newer than the watermark and inside the freshness window that the
 * destination has not seen, oldest first.
 */
export function selectCandidates(
  items: readonly Item[],
  sub: Pick<Subscription, 'destinationId' | 'lastDeliveredId' | 'lastDeliveredAt'>,
  processed: Pick<ProcessedSet, 'isNew'>,
  now: number,
  freshnessSeconds: number,
): Item[] {
  const watermarkTime = watermarkTimeOf(items, sub);
  return items
    .filter((item) => item.createdAt > watermarkTime)
    .filter((item) => now - item.createdAt <= freshnessSeconds)
    .filter((item) => processed.isNew(sub.destinationId, item.itemId))
    .sort((a, b) => a.createdAt - b.createdAt || a.itemId.localeCompare(b.itemId));
}

/**
 * The stored watermark time, or the creation time of the watermark item if it is
 * still listed (rows written before times were stored), or 0.
 */
export function watermarkTimeOf(
  items: readonly Item[],
  sub: Pick<Subscription, 'lastDeliveredId' | 'lastDeliveredAt'>,
): number {
  if (sub.lastDeliveredAt !== null) return sub.lastDeliveredAt;
  if (!sub.lastDeliveredId) return 0;
  return items.find((i) => i.itemId === sub.lastDeliveredId)?.createdAt ?? 0;
}

/**
 * Caption and action buttons for what is about to go out.
 */
export function composeOffer(
  platform: Pick<VideoPlatform, 'profileUrl' | 'permalink'>,
  handle: string,
  media: readonly FetchedMedia[],
): { caption: string; offer: ActionOffer } {
  const [sole] = media;
  if (media.length === 1 && sole) {
    if (sole.kind === 'single_video') {
      return {
        caption: `#${handle}`,
        offer: {
          kinds: ['hd', 'audio', 'urls'],
          originalUrl: platform.permalink(handle, sole.itemId),
          originalLabel: 'Watch Original Video',
        },
      };
    }
    return { caption: `#${handle}`, offer: { kinds: ['audio', 'urls'] } };
  }

  const artifactCount = media.reduce((n, m) => n + artifactsOf(m).length, 0);
  const allPhotos = media.every((m) => m.kind !== 'single_video');
  if (allPhotos) {
    return { caption: `#${handle}`, offer: { kinds: ['audio', 'urls'] } };
  }
  return {
    caption: `#${handle} (total ${artifactCount})`,
    offer: {
      kinds: ['hd', 'audio', 'urls'],
      originalUrl: platform.profileUrl(handle),
      originalLabel: 'Watch Original',
    },
  };
}

/**
 * The item the watermark should move to. Items dropped before delivery do not hold it
 * back; if any send failed, it stops at the last item delivered before the first failure
 * so the failed ones stay above the watermark.
 */
export function nextWatermark(fetched: readonly Item[], report: DeliveryReport): Item | null {
  const delivered = new Set(report.deliveredItemIds);
  const failed = new Set(report.failedItemIds);
  let mark: Item | null = null;
  for (const item of fetched) {
    if (failed.has(item.itemId)) break;
    if (delivered.has(item.itemId)) mark = item;
  }
  return mark;
}

export class RelayEngine {
  private readonly now: () => number;

  constructor(private readonly deps: RelayDeps) {
    this.now = deps.now ?? nowUnix;
  }

  /**
   * One subscription, one pass: list, filter, download, deliver, commit.
   * Never throws; failures come back in the result and are logged.
   */
  async runSubscriptionTick(sub: Subscription, signal?: AbortSignal): Promise<TickResult> {
    const { platform, processed, pipeline, dispatcher, db } = this.deps;
    const result: TickResult = {
      destinationId: sub.destinationId,
      sourceHandle: sub.sourceHandle,
      status: 'no_candidates',
      candidates: [],
      delivered: [],
      watermark: null,
    };
    const log = logger.child({ destination: sub.destinationId, source: sub.sourceHandle });

    // Listing
    let profile: SourceProfile;
    try {
      profile = await platform.resolve(sub.sourceHandle);
    } catch (err) {
      log.warn({ error: errorMessage(err) }, 'Could not resolve source');
      return { ...result, status: 'resolution_failed', error: errorMessage(err) };
    }

    let items: Item[];
    try {
      items = await platform.listRecentItems(profile);
    } catch (err) {
      log.warn({ error: errorMessage(err) }, 'Listing failed');
      return { ...result, status: 'listing_failed', error: errorMessage(err) };
    }
    if (items.length === 0) {
      log.debug('Listing is empty');
      return { ...result, status: 'empty_listing' };
    }

    // Filtering
    const candidates = selectCandidates(items, sub, processed, this.now(), this.deps.freshnessSeconds);
    result.candidates = candidates.map((c) => c.itemId);
    log.debug({ count: candidates.length }, 'Found new items');
    if (candidates.length === 0) return result;

    // Downloading
    const fetched: Fetched[] = [];
    let report: DeliveryReport;
    try {
      for (const item of candidates) {
        if (signal?.aborted) break;
        if (!processed.reserve(sub.destinationId, item.itemId)) {
          log.debug({ item: item.itemId }, 'Item already reserved, skipping');
          continue;
        }
        const outcome = await pipeline.fetch(profile, item.itemId);
        if (!outcome.ok) {
          settleFailedFetch(processed, sub.destinationId, item.itemId, outcome.error);
          log.warn({ item: item.itemId, kind: outcome.error.kind }, 'Dropping item after failed fetch');
          continue;
        }
        fetched.push({ item, media: outcome.media });
      }

      if (fetched.length === 0) {
        return { ...result, status: 'fetch_failed' };
      }

      // Delivering
      const target: DeliveryTarget = { destinationId: sub.destinationId, topicId: sub.topicId };
      const { caption, offer } = composeOffer(
        platform,
        sub.sourceHandle,
        fetched.map((f) => f.media),
      );
      report = await dispatcher.deliver(
        { target, artifacts: fetched.flatMap((f) => artifactsOf(f.media)), caption, offer },
        signal,
      );
    } finally {
      for (const f of fetched) pipeline.release(f.item.itemId);
    }

    for (const id of report.deliveredItemIds) processed.confirm(sub.destinationId, id);
    for (const id of report.failedItemIds) processed.release(sub.destinationId, id);
    result.delivered = report.deliveredItemIds;

    if (report.rejected) {
      log.error({ failed: report.failedItemIds }, 'Destination rejected delivery, watermark unchanged');
      return { ...result, status: 'rejected' };
    }

    // Committing
    const mark = nextWatermark(
      fetched.map((f) => f.item),
      report,
    );
    if (mark) {
      commitWatermark(db, sub.destinationId, sub.sourceHandle, mark.itemId, mark.createdAt);
      result.watermark = mark.itemId;
    }
    if (report.deliveredItemIds.length === 0) {
      return { ...result, status: 'delivery_failed' };
    }

    log.info(
      { delivered: report.deliveredItemIds.length, watermark: result.watermark },
      'Subscription tick delivered',
    );
    return { ...result, status: 'delivered' };
  }

  /**
   * Fetch and deliver one item on request, alongside the background pass.
   * Shares the processed set and in-flight guard with it.
   */
  async fetchNow(
    target: DeliveryTarget,
    handle: string,
    itemId: string,
  ): Promise<FetchNowOutcome> {
    const { platform, processed, pipeline, dispatcher } = this.deps;
    const destination = target.destinationId;

    if (!processed.reserve(destination, itemId)) {
      switch (processed.stateOf(destination, itemId)) {
        case 'delivered':
          return { ok: false, status: 'already_delivered', message: 'This item was already delivered here.' };
        case 'skipped':
          return { ok: false, status: 'no_media', message: 'No media found for this item.' };
        default:
          return { ok: false, status: 'in_progress', message: 'This item is already being processed.' };
      }
    }

    let profile: SourceProfile;
    try {
      profile = await platform.resolve(handle);
    } catch (err) {
      processed.release(destination, itemId);
      return {
        ok: false,
        status: 'resolution_failed',
        message: `Could not find ${handle}: ${errorMessage(err)}`,
      };
    }

    const outcome = await pipeline.fetch(profile, itemId);
    if (!outcome.ok) {
      settleFailedFetch(processed, destination, itemId, outcome.error);
      return outcome.error.kind === 'IN_FLIGHT'
        ? { ok: false, status: 'in_progress', message: 'This item is already being downloaded.' }
        : { ok: false, status: 'no_media', message: describeFetchFailure(outcome.error) };
    }

    let report: DeliveryReport;
    try {
      const { caption, offer } = composeOffer(platform, handle, [outcome.media]);
      report = await dispatcher.deliver({
        target,
        artifacts: artifactsOf(outcome.media),
        caption,
        offer,
      });
    } finally {
      pipeline.release(itemId);
    }

    if (report.deliveredItemIds.includes(itemId)) {
      processed.confirm(destination, itemId);
      return { ok: true, status: 'delivered', message: `Delivered ${itemId} to ${destination}.` };
    }
    processed.release(destination, itemId);
    return {
      ok: false,
      status: report.rejected ? 'rejected' : 'delivery_failed',
      message: `Could not deliver ${itemId} to ${destination}.`,
    };
  }
}

export type FetchNowStatus =
  | 'delivered'
  | 'already_delivered'
  | 'in_progress'
  | 'resolution_failed'
  | 'no_media'
  | 'delivery_failed'
  | 'rejected';

export interface FetchNowOutcome {
  ok: boolean;
  status: FetchNowStatus;
  message: string;
}

/**
 * Transient failures give the reservation back for the next pass. Anything else
 * (media that does not exist or is served from a blocked host) is settled for good.
 */
function settleFailedFetch(
  processed: ProcessedSet,
  destination: string,
  itemId: string,
  error: SourceError,
): void {
  if (error.transient) {
    processed.release(destination, itemId);
  } else {
    processed.skip(destination, itemId);
  }
}

function describeFetchFailure(error: SourceError): string {
  switch (error.kind) {
    case 'NO_DOWNLOADABLE_MEDIA':
      return 'No media found for this item.';
    case 'WRITE_FAILURE':
      return 'Could not store the download locally.';
    default:
      return `Download failed: ${error.message}`;
  }
}
