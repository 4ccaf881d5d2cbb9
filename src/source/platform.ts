import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type Database from 'better-sqlite3';
import type { Config } from '../shared/config.js';
import type { Item, MediaDescriptor, SourceProfile, VideoPlatform } from './adapter.js';
import { getCachedProfile, saveProfile } from './profileCache.js';
import { SourceError, errorMessage } from '../shared/errors.js';
import { fetchWithTimeout, fillTemplate, HttpTimeoutError } from '../shared/http.js';
import { parseUnixSeconds } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

const USER_ID_PATTERN = /\{"userInfo":\{"user":\{"id":"(\d+)"/;
const SEC_UID_PATTERN = /secUid":"(.*?)"/;

const ListingResponseSchema = z.object({
  itemList: z
    .array(
      z
        .object({
          id: z.union([z.string(), z.number()]).transform(String),
          createTime: z.unknown(),
        })
        .passthrough(),
    )
    .optional(),
});

const ResolverResponseSchema = z.object({
  data: z
    .object({
      images: z.array(z.string()).optional(),
      play: z.string().optional(),
    })
    .passthrough()
    .nullish(),
});

/**
 * Extract `{ internalId, sourceUid }` from a profile page. Returns null if either
 * marker is missing.
 */
export function parseProfilePage(html: string): { internalId: string; sourceUid: string } | null {
  const uid = USER_ID_PATTERN.exec(html)?.[1];
  const secUid = SEC_UID_PATTERN.exec(html)?.[1];
  if (!uid || !secUid) return null;
  return { internalId: secUid, sourceUid: uid };
}

/**
 * Turn a raw listing into Items. Entries with an unparsable creation time are
 * dropped one by one; the rest of the listing is kept.
 */
export function parseListing(body: unknown, handle: string): Item[] {
  const parsed = ListingResponseSchema.safeParse(body);
  if (!parsed.success || !parsed.data.itemList) {
    throw new SourceError(`No video listing returned for ${handle}`, 'NO_VIDEO_LISTING', {
      handle,
    });
  }

  const items: Item[] = [];
  for (const entry of parsed.data.itemList) {
    const createdAt = parseUnixSeconds(entry.createTime);
    if (createdAt === null) {
      logger.warn(
        { handle, item: entry.id, createTime: entry.createTime },
        'Skipping item with unparsable createTime',
      );
      continue;
    }
    items.push({ itemId: entry.id, createdAt });
  }
  return items;
}

export function parseResolverResponse(body: unknown): MediaDescriptor {
  const parsed = ResolverResponseSchema.safeParse(body);
  const data = parsed.success ? parsed.data.data : undefined;
  if (data?.images && data.images.length > 0) {
    return { kind: 'image_set', imageUrls: data.images };
  }
  if (data?.play) {
    return { kind: 'single_media', url: data.play };
  }
  return { kind: 'none' };
}

/**
 * HTTP adapter for the video platform: profile page scraping for handle resolution,
 * the creator item-list endpoint for listings, and a third-party resolver for media URLs.
 */
export class HttpVideoPlatform implements VideoPlatform {
  readonly blockedMediaHosts: readonly string[];
  private readonly cfg: Config['platform'];

  constructor(
    private readonly db: Database.Database,
    cfg: Config['platform'],
  ) {
    this.cfg = cfg;
    this.blockedMediaHosts = cfg.blocked_media_hosts;
  }

  async resolve(handle: string): Promise<SourceProfile> {
    const cached = getCachedProfile(this.db, handle);
    if (cached) return cached;

    const url = fillTemplate(this.cfg.profile_url, { handle });
    const response = await this.get(url, { Accept: 'text/html' });
    if (!response.ok) {
      throw new SourceError(
        `Profile page for ${handle} returned ${response.status}`,
        'USER_RESOLUTION_FAILED',
        { handle, status: response.status },
      );
    }

    const ids = parseProfilePage(await response.text());
    if (!ids) {
      throw new SourceError(`Could not find user info for ${handle}`, 'USER_RESOLUTION_FAILED', {
        handle,
      });
    }

    const profile: SourceProfile = { handle, ...ids };
    saveProfile(this.db, profile);
    logger.debug({ handle, uid: profile.sourceUid }, 'Resolved handle');
    return profile;
  }

  async listRecentItems(profile: SourceProfile): Promise<Item[]> {
    const url = fillTemplate(this.cfg.listing_url, {
      internalId: profile.internalId,
      count: this.cfg.listing_count,
    });
    const response = await this.get(url);
    if (!response.ok) {
      throw new SourceError(
        `Listing for ${profile.handle} returned ${response.status}`,
        'NETWORK_FAILURE',
        { handle: profile.handle, status: response.status },
      );
    }
    const items = parseListing(await this.readJson(response, url), profile.handle);
    logger.debug({ handle: profile.handle, count: items.length }, 'Fetched listing');
    return items;
  }

  async resolveMedia(itemId: string): Promise<MediaDescriptor> {
    const url = fillTemplate(this.cfg.resolver_url, { itemId });
    const response = await this.get(url);
    if (!response.ok) {
      throw new SourceError(
        `Media resolver returned ${response.status} for ${itemId}`,
        'NETWORK_FAILURE',
        { item: itemId, status: response.status },
      );
    }
    return parseResolverResponse(await this.readJson(response, url));
  }

  async download(url: string, destPath: string): Promise<void> {
    const response = await this.get(url);
    if (!response.ok) {
      throw new SourceError(`Download failed: HTTP ${response.status}`, 'NETWORK_FAILURE', {
        url,
        status: response.status,
      });
    }

    let body: Buffer;
    try {
      body = Buffer.from(await response.arrayBuffer());
    } catch (err) {
      throw new SourceError(`Download interrupted: ${errorMessage(err)}`, 'NETWORK_FAILURE', {
        url,
      });
    }

    try {
      await fs.mkdir(path.dirname(destPath), { recursive: true });
      await fs.writeFile(destPath, body);
    } catch (err) {
      throw new SourceError(`Failed to write ${destPath}: ${errorMessage(err)}`, 'WRITE_FAILURE', {
        path: destPath,
      });
    }
  }

  profileUrl(handle: string): string {
    return fillTemplate(this.cfg.profile_url, { handle });
  }

  permalink(handle: string, itemId: string): string {
    return fillTemplate(this.cfg.permalink_url, { handle, itemId });
  }

  hdUrl(itemId: string): string {
    return fillTemplate(this.cfg.hd_url, { itemId });
  }

  audioUrl(itemId: string): string {
    return fillTemplate(this.cfg.audio_url, { itemId });
  }

  private async get(url: string, headers: Record<string, string> = {}): Promise<Response> {
    try {
      return await fetchWithTimeout(
        url,
        { headers: { 'User-Agent': this.cfg.user_agent, ...headers }, redirect: 'follow' },
        this.cfg.timeout_ms,
      );
    } catch (err) {
      const reason = err instanceof HttpTimeoutError ? 'timed out' : errorMessage(err);
      throw new SourceError(`Request to ${url} failed: ${reason}`, 'NETWORK_FAILURE', { url });
    }
  }

  private async readJson(response: Response, url: string): Promise<unknown> {
    try {
      return await response.json();
    } catch (err) {
      throw new SourceError(`Invalid JSON from ${url}: ${errorMessage(err)}`, 'NETWORK_FAILURE', {
        url,
      });
    }
  }
}
