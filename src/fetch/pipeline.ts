import fs from 'node:fs';
import path from 'node:path';
import type { Downloader, MediaResolver, SourceProfile } from '../source/adapter.js';
import type { InFlightGuard } from './inflight.js';
import { SourceError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export type ArtifactKind = 'photo' | 'video';

/**
 * A downloaded file ready to send. Lives only until the dispatcher has sent it.
 */
export interface DeliverableArtifact {
  path: string;
  itemId: string;
  kind: ArtifactKind;
}

export type FetchedMedia =
  | { kind: 'single_photo'; itemId: string; artifact: DeliverableArtifact }
  | { kind: 'single_video'; itemId: string; artifact: DeliverableArtifact }
  | { kind: 'photo_set'; itemId: string; artifacts: DeliverableArtifact[] };

export type FetchResult =
  | { ok: true; media: FetchedMedia; cached: boolean }
  | { ok: false; error: SourceError };

export function artifactsOf(media: FetchedMedia): DeliverableArtifact[] {
  switch (media.kind) {
    case 'single_photo':
    case 'single_video':
      return [media.artifact];
    case 'photo_set':
      return media.artifacts;
  }
}

const IMAGE_FILE = /^(.+)_(\d+)\.jpg$/;

export interface PipelineDeps {
  resolver: MediaResolver;
  downloader: Downloader;
  guard: InFlightGuard;
  downloadsDir: string;
  blockedMediaHosts: readonly string[];
}

export class FetchPipeline {
  constructor(private readonly deps: PipelineDeps) {}

  /**
   * Produce local artifacts for one item. Never throws: every failure comes back as
   * `{ ok: false }`. A concurrent fetch of the same item yields IN_FLIGHT instead of
   * a second download.
   *
   * On success the item stays held in the in-flight guard, because its files are
   * shared scratch until sent. The caller must `release` it once delivery has
   * returned, whatever the outcome.
   */
  async fetch(profile: SourceProfile, itemId: string): Promise<FetchResult> {
    const { guard } = this.deps;
    if (!guard.tryAcquire(itemId)) {
      logger.debug({ item: itemId }, 'Item already being downloaded or sent, skipping');
      return {
        ok: false,
        error: new SourceError(`Item ${itemId} is already being downloaded`, 'IN_FLIGHT', {
          item: itemId,
        }),
      };
    }

    let result: FetchResult;
    try {
      result = await this.fetchUnguarded(profile, itemId);
    } catch (err) {
      const error =
        err instanceof SourceError
          ? err
          : new SourceError(`Fetch failed: ${errorMessage(err)}`, 'NETWORK_FAILURE', {
              item: itemId,
            });
      logger.warn({ item: itemId, kind: error.kind, error: error.message }, 'Fetch failed');
      result = { ok: false, error };
    }

    if (!result.ok) guard.release(itemId);
    return result;
  }

  /** Hand back an item returned by a successful `fetch`. */
  release(itemId: string): void {
    this.deps.guard.release(itemId);
  }

  /** Directory holding the scratch files for one source. */
  sourceDir(profile: SourceProfile): string {
    return path.join(this.deps.downloadsDir, `${profile.handle}_${profile.sourceUid}`);
  }

  private async fetchUnguarded(profile: SourceProfile, itemId: string): Promise<FetchResult> {
    const dir = this.sourceDir(profile);
    try {
      fs.mkdirSync(dir, { recursive: true });
    } catch (err) {
      throw new SourceError(`Failed to create ${dir}: ${errorMessage(err)}`, 'WRITE_FAILURE', {
        path: dir,
      });
    }

    const cached = this.lookupCache(dir, itemId);
    if (cached) {
      logger.debug({ item: itemId, handle: profile.handle }, 'Using cached download');
      return { ok: true, media: cached, cached: true };
    }

    const descriptor = await this.deps.resolver.resolveMedia(itemId);

    switch (descriptor.kind) {
      case 'image_set':
        return this.downloadImages(dir, itemId, descriptor.imageUrls);
      case 'single_media':
        return this.downloadVideo(dir, itemId, descriptor.url);
      case 'none':
        throw new SourceError(`No downloadable media found for ${itemId}`, 'NO_DOWNLOADABLE_MEDIA', {
          item: itemId,
        });
    }
  }

  private lookupCache(dir: string, itemId: string): FetchedMedia | null {
    const videoPath = path.join(dir, `${itemId}.mp4`);
    if (fs.existsSync(videoPath)) {
      return { kind: 'single_video', itemId, artifact: { path: videoPath, itemId, kind: 'video' } };
    }

    const images = fs
      .readdirSync(dir)
      .map((name) => ({ name, match: IMAGE_FILE.exec(name) }))
      .filter((f) => f.match?.[1] === itemId)
      .sort((a, b) => Number(a.match?.[2]) - Number(b.match?.[2]))
      .map((f): DeliverableArtifact => ({ path: path.join(dir, f.name), itemId, kind: 'photo' }));

    return images.length > 0 ? photoMedia(itemId, images) : null;
  }

  private async downloadImages(dir: string, itemId: string, urls: string[]): Promise<FetchResult> {
    const artifacts: DeliverableArtifact[] = [];
    let lastError: SourceError | null = null;

    for (const [i, url] of urls.entries()) {
      const dest = path.join(dir, `${itemId}_${i + 1}.jpg`);
      try {
        await this.deps.downloader.download(url, dest);
        artifacts.push({ path: dest, itemId, kind: 'photo' });
      } catch (err) {
        lastError =
          err instanceof SourceError
            ? err
            : new SourceError(errorMessage(err), 'NETWORK_FAILURE', { url });
        logger.warn(
          { item: itemId, image: i + 1, error: lastError.message },
          'Image download failed, dropping it from the set',
        );
      }
    }

    if (artifacts.length === 0) {
      return {
        ok: false,
        error:
          lastError ??
          new SourceError(`Image set for ${itemId} was empty`, 'NO_DOWNLOADABLE_MEDIA', {
            item: itemId,
          }),
      };
    }

    logger.debug({ item: itemId, images: artifacts.length, of: urls.length }, 'Downloaded images');
    return { ok: true, media: photoMedia(itemId, artifacts), cached: false };
  }

  private async downloadVideo(dir: string, itemId: string, url: string): Promise<FetchResult> {
    if (this.isBlocked(url)) {
      throw new SourceError(`Media for ${itemId} is served from a blocked host`, 'NO_DOWNLOADABLE_MEDIA', {
        item: itemId,
        url,
      });
    }

    const dest = path.join(dir, `${itemId}.mp4`);
    await this.deps.downloader.download(url, dest);
    logger.debug({ item: itemId, path: dest }, 'Downloaded video');
    return {
      ok: true,
      media: { kind: 'single_video', itemId, artifact: { path: dest, itemId, kind: 'video' } },
      cached: false,
    };
  }

  private isBlocked(url: string): boolean {
    let host: string;
    try {
      host = new URL(url).hostname.toLowerCase();
    } catch {
      return true;
    }
    return this.deps.blockedMediaHosts.some((blocked) => {
      const b = blocked.toLowerCase();
      return host === b || host.endsWith(`.${b}`);
    });
  }
}

function photoMedia(itemId: string, artifacts: DeliverableArtifact[]): FetchedMedia {
  const [first] = artifacts;
  if (artifacts.length === 1 && first) {
    return { kind: 'single_photo', itemId, artifact: first };
  }
  return { kind: 'photo_set', itemId, artifacts };
}
