import ytpl from 'ytpl';
import { array, nullable, number, object, optional, safeParse, string } from 'valibot';
import { downloadToMp3, getYtDlp, ytDlpToolArgs, type DownloadOptions } from './download.js';
import { ItemDownloadFailure, PlaylistFailure, toErrorMessage } from './errors.js';
import type { Logger } from './logger.js';
import type {
  CoverArt,
  DownloadEngine,
  ItemOutcome,
  PlaylistDownloadRequest,
  PlaylistDownloadResult,
  PlaylistInfo,
  PlaylistItem,
} from './types.js';
import { firstNonBlank, isYoutubePlaylistUrl, rateLimitDelayMs, sleep as defaultSleep, type Sleep } from './utils.js';

export interface ListedPlaylist {
  readonly playlist: PlaylistInfo;
  readonly items: readonly PlaylistItem[];
}

export type PlaylistLister = (url: string) => Promise<ListedPlaylist>;
export type ItemDownloader = (options: DownloadOptions) => Promise<string>;
export type ThumbnailFetcher = (urls: readonly string[]) => Promise<CoverArt | undefined>;

const ThumbnailSchema = object({
  url: string(),
  preference: optional(nullable(number())),
});

const FlatEntrySchema = object({
  id: string(),
  ie_key: optional(nullable(string())),
  url: optional(nullable(string())),
  title: optional(nullable(string())),
  uploader: optional(nullable(string())),
  channel: optional(nullable(string())),
  playlist_index: optional(nullable(number())),
  thumbnails: optional(nullable(array(ThumbnailSchema))),
});

/**
 * Shape of `yt-dlp --flat-playlist --dump-single-json`. A single video comes back
 * without `entries`.
 */
export const FlatPlaylistSchema = object({
  id: string(),
  _type: optional(string()),
  extractor_key: optional(nullable(string())),
  title: optional(nullable(string())),
  uploader: optional(nullable(string())),
  channel: optional(nullable(string())),
  uploader_id: optional(nullable(string())),
  webpage_url: optional(nullable(string())),
  thumbnails: optional(nullable(array(ThumbnailSchema))),
  entries: optional(nullable(array(nullable(FlatEntrySchema)))),
});

const youtubeThumbnailUrls = (videoId: string): string[] => [
  `https://i.ytimg.com/vi/${videoId}/maxresdefault.jpg`,
  `https://i.ytimg.com/vi/${videoId}/sddefault.jpg`,
  `https://i.ytimg.com/vi/${videoId}/hqdefault.jpg`,
];

/**
 * Orders yt-dlp thumbnails best first, preferring jpeg over webp since most
 * players do not show webp cover art.
 */
const orderThumbnails = (thumbnails: ReadonlyArray<{ url: string }> | null | undefined): string[] => {
  const urls = [...(thumbnails ?? [])].reverse().map((thumbnail) => thumbnail.url);
  const jpeg = urls.filter((url) => !/\.webp(\?|$)/i.test(url));
  return jpeg.length > 0 ? jpeg : urls;
};

const archiveIdFor = (extractor: string | null | undefined, id: string): string =>
  `${(extractor || 'youtube').toLowerCase()} ${id}`;

/**
 * Maps parsed yt-dlp JSON onto playlist info and items.
 */
export const fromYtDlpJson = (json: unknown): ListedPlaylist => {
  const result = safeParse(FlatPlaylistSchema, json);
  if (!result.success) {
    const details = result.issues.map((issue) => issue.message).join('; ');
    throw new Error(`Unexpected yt-dlp output: ${details}`);
  }

  const data = result.output;
  const isYoutube = (data.extractor_key ?? 'youtube').toLowerCase().startsWith('youtube');
  const uploader = firstNonBlank(data.uploader, data.channel, data.uploader_id);
  const playlist: PlaylistInfo = {
    id: data.id,
    title: firstNonBlank(data.title),
    uploader,
  };

  if (!data.entries) {
    const url = data.webpage_url ?? (isYoutube ? `https://www.youtube.com/watch?v=${data.id}` : undefined);
    if (!url) {
      return { playlist, items: [] };
    }
    return {
      playlist,
      items: [
        {
          archiveId: archiveIdFor(data.extractor_key, data.id),
          videoId: data.id,
          url,
          title: playlist.title,
          uploader,
          thumbnailUrls: [...orderThumbnails(data.thumbnails), ...(isYoutube ? youtubeThumbnailUrls(data.id) : [])],
        },
      ],
    };
  }

  const items: PlaylistItem[] = [];
  data.entries.forEach((entry, index) => {
    if (!entry) {
      return;
    }
    const entryIsYoutube = (entry.ie_key ?? data.extractor_key ?? 'youtube').toLowerCase().startsWith('youtube');
    const url = entry.url ?? (entryIsYoutube ? `https://www.youtube.com/watch?v=${entry.id}` : undefined);
    if (!url) {
      return;
    }
    items.push({
      archiveId: archiveIdFor(entry.ie_key ?? data.extractor_key, entry.id),
      videoId: entry.id,
      url,
      title: firstNonBlank(entry.title),
      uploader: firstNonBlank(entry.uploader, entry.channel),
      position: entry.playlist_index ?? index + 1,
      thumbnailUrls: [...orderThumbnails(entry.thumbnails), ...(entryIsYoutube ? youtubeThumbnailUrls(entry.id) : [])],
    });
  });

  return { playlist, items };
};

/**
 * Lists a playlist (or a single video) through yt-dlp without downloading anything.
 */
export const listWithYtDlp: PlaylistLister = async (url) => {
  const stdout = await getYtDlp().execPromise([
    url,
    '--flat-playlist',
    '--dump-single-json',
    '--no-warnings',
    ...ytDlpToolArgs(),
  ]);
  return fromYtDlpJson(JSON.parse(stdout));
};

/**
 * Lists a YouTube playlist through ytpl.
 */
export const listWithYtpl: PlaylistLister = async (url) => {
  const result = await ytpl(url, { limit: Infinity });
  return {
    playlist: {
      id: result.id,
      title: firstNonBlank(result.title),
      uploader: firstNonBlank(result.author?.name),
    },
    items: result.items
      .filter((item) => Boolean(item.id))
      .map((item, index) => ({
        archiveId: archiveIdFor('youtube', item.id),
        videoId: item.id,
        url: item.shortUrl ?? item.url,
        title: firstNonBlank(item.title),
        uploader: firstNonBlank(item.author?.name),
        position: item.index || index + 1,
        thumbnailUrls: [
          ...youtubeThumbnailUrls(item.id),
          ...(item.bestThumbnail?.url ? [item.bestThumbnail.url] : []),
        ],
      })),
  };
};

/**
 * Prefers ytpl for YouTube playlist URLs and falls back to yt-dlp for everything else.
 */
export const createPlaylistLister = (logger: Logger): PlaylistLister => async (url) => {
  if (isYoutubePlaylistUrl(url) && ytpl.validateID(url)) {
    try {
      return await listWithYtpl(url);
    } catch (error) {
      logger.debug(`ytpl could not list ${url} (${toErrorMessage(error)}), using yt-dlp`);
    }
  }
  return listWithYtDlp(url);
};

const THUMBNAIL_TIMEOUT_MS = 15_000;

/**
 * Downloads the first thumbnail URL that answers with an image. 4xx and network
 * errors move on to the next candidate.
 */
export const createThumbnailFetcher =
  (logger: Logger, timeoutMs = THUMBNAIL_TIMEOUT_MS): ThumbnailFetcher =>
  async (urls) => {
    for (const url of urls) {
      try {
        const response = await fetch(url, { redirect: 'follow', signal: AbortSignal.timeout(timeoutMs) });
        const mime = response.headers.get('content-type')?.split(';')[0]?.trim() ?? '';
        if (!response.ok || !mime.startsWith('image/')) {
          logger.debug(`Thumbnail ${url} unavailable (${response.status})`);
          continue;
        }
        return { mime, data: Buffer.from(await response.arrayBuffer()) };
      } catch (error) {
        logger.debug(`Thumbnail ${url} failed: ${toErrorMessage(error)}`);
      }
    }
    return undefined;
  };

/**
 * Runs `task` up to `attempts` times, waiting `delayMs * attempt` between tries.
 */
export const withRetry = async <T>(
  task: (attempt: number) => Promise<T>,
  {
    attempts,
    delayMs,
    sleep = defaultSleep,
    onRetry,
  }: {
    attempts: number;
    delayMs: number;
    sleep?: Sleep;
    onRetry?: (error: unknown, attempt: number) => void;
  },
): Promise<T> => {
  const total = Math.max(1, attempts);
  for (let attempt = 1; ; attempt += 1) {
    try {
      return await task(attempt);
    } catch (error) {
      if (attempt >= total) {
        throw error;
      }
      onRetry?.(error, attempt);
      await sleep(delayMs * attempt);
    }
  }
};

export interface MediaEngineOptions {
  readonly logger: Logger;
  readonly listPlaylist?: PlaylistLister;
  readonly downloadItem?: ItemDownloader;
  readonly fetchThumbnail?: ThumbnailFetcher;
  /** Base retry backoff; attempt `n` waits `n` times this long. */
  readonly retryDelayMs?: number;
  readonly sleep?: Sleep;
  readonly random?: () => number;
}

/**
 * Download engine backed by ytpl / yt-dlp for listing and ytdl-core + ffmpeg
 * (or yt-dlp) for the audio itself. Items are processed one at a time.
 */
export class MediaEngine implements DownloadEngine {
  private readonly logger: Logger;
  private readonly listPlaylist: PlaylistLister;
  private readonly downloadItem: ItemDownloader;
  private readonly fetchThumbnail: ThumbnailFetcher;
  private readonly retryDelayMs: number;
  private readonly sleep: Sleep;
  private readonly random: () => number;

  constructor(options: MediaEngineOptions) {
    this.logger = options.logger;
    this.listPlaylist = options.listPlaylist ?? createPlaylistLister(options.logger);
    this.downloadItem = options.downloadItem ?? downloadToMp3;
    this.fetchThumbnail = options.fetchThumbnail ?? createThumbnailFetcher(options.logger);
    this.retryDelayMs = options.retryDelayMs ?? 10_000;
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
  }

  async downloadPlaylist(request: PlaylistDownloadRequest): Promise<PlaylistDownloadResult> {
    let listed: ListedPlaylist;
    try {
      listed = await withRetry(() => this.listPlaylist(request.url), {
        attempts: request.maxRetries,
        delayMs: this.retryDelayMs,
        sleep: this.sleep,
        onRetry: (error, attempt) =>
          this.logger.warn(`Listing ${request.url} failed (attempt ${attempt}/${request.maxRetries}): ${toErrorMessage(error)}`),
      });
    } catch (error) {
      throw new PlaylistFailure(request.url, error);
    }

    const { playlist, items } = listed;
    this.logger.info(`Found ${items.length} item(s) in "${playlist.title ?? request.url}"`);

    const outcomes: ItemOutcome[] = [];
    let started = 0;
    for (const item of items) {
      let outcome: ItemOutcome;
      if (request.isArchived(item.archiveId)) {
        outcome = { status: 'skipped', item, reason: 'archived' };
      } else {
        if (request.rateLimit && started > 0) {
          const delayMs = rateLimitDelayMs(this.random);
          this.logger.debug(`Rate limiting: sleeping for ${(delayMs / 1000).toFixed(2)} seconds`);
          await this.sleep(delayMs);
        }
        started += 1;
        outcome = await this.downloadOne(request, playlist, item);
      }
      outcomes.push(outcome);
      await request.onItem(outcome, playlist);
    }

    return { playlist, outcomes };
  }

  private async downloadOne(
    request: PlaylistDownloadRequest,
    playlist: PlaylistInfo,
    item: PlaylistItem,
  ): Promise<ItemOutcome> {
    const targetPath = request.outputPath(playlist, item);
    const attempts = Math.max(1, request.maxRetries);
    this.logger.info(`Downloading: ${item.title ?? item.url} -> ${targetPath}`);

    let filePath: string;
    try {
      filePath = await withRetry(
        () =>
          this.downloadItem({
            url: item.url,
            targetPath,
            quality: request.quality,
            onProgress: (fraction) => request.onProgress?.(item, fraction),
          }),
        {
          attempts,
          delayMs: this.retryDelayMs,
          sleep: this.sleep,
          onRetry: (error, attempt) =>
            this.logger.warn(`Download of ${item.url} failed (attempt ${attempt}/${attempts}): ${toErrorMessage(error)}`),
        },
      );
    } catch (error) {
      const failure = new ItemDownloadFailure(item.url, attempts, error);
      return { status: 'failed', item, reason: failure.message, attempts };
    }

    const thumbnail = item.thumbnailUrls.length > 0 ? await this.fetchThumbnail(item.thumbnailUrls) : undefined;
    if (!thumbnail) {
      this.logger.debug(`No thumbnail for ${item.url}`);
    }
    return { status: 'downloaded', item, filePath, ...(thumbnail ? { thumbnail } : {}) };
  }
}
