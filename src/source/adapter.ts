/**
 * A single post as it appears in a source's recent-items listing.
 * `createdAt` is unix seconds.
 */
export interface Item {
  itemId: string;
  createdAt: number;
}

/**
 * Platform identifiers a handle resolves to.
 */
export interface SourceProfile {
  handle: string;
  internalId: string;
  sourceUid: string;
}

/**
 * What the media resolver says an item consists of. Whether an item is a video,
 * an image set or audio-only is only known at this point, never from the listing.
 */
export type MediaDescriptor =
  | { kind: 'image_set'; imageUrls: string[] }
  | { kind: 'single_media'; url: string }
  | { kind: 'none' };

/**
 * Resolves a human-readable handle to platform identifiers.
 * Throws SourceError(USER_RESOLUTION_FAILED) when the handle cannot be resolved.
 */
export interface SourceDirectory {
  resolve(handle: string): Promise<SourceProfile>;
}

/**
 * Lists the most recent items of a resolved source.
 * Throws SourceError(NO_VIDEO_LISTING | NETWORK_FAILURE).
 */
export interface ListingProvider {
  listRecentItems(profile: SourceProfile): Promise<Item[]>;
}

export interface MediaResolver {
  resolveMedia(itemId: string): Promise<MediaDescriptor>;
}

/**
 * URLs the secondary actions point at.
 */
export interface LinkBuilder {
  profileUrl(handle: string): string;
  permalink(handle: string, itemId: string): string;
  hdUrl(itemId: string): string;
  audioUrl(itemId: string): string;
}

/**
 * Downloads a remote file into `destPath`.
 * Throws SourceError(NETWORK_FAILURE) for transport problems and
 * SourceError(WRITE_FAILURE) when the local write fails.
 */
export interface Downloader {
  download(url: string, destPath: string): Promise<void>;
}

/**
 * The full platform collaborator set the engine talks to.
 */
export interface VideoPlatform
  extends SourceDirectory,
    ListingProvider,
    MediaResolver,
    LinkBuilder,
    Downloader {
  readonly blockedMediaHosts: readonly string[];
}
