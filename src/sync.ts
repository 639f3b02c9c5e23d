import path from 'node:path';
import fs from 'fs-extra';
import { ArchiveStore } from './archive.js';
import type { Settings } from './config.js';
import { ConfigFatalError, toErrorMessage } from './errors.js';
import type { Logger } from './logger.js';
import { readPlaylistFile } from './playlists.js';
import type {
  CoverArt,
  DownloadEngine,
  ItemOutcome,
  PassSummary,
  PlaylistDescriptor,
  PlaylistInfo,
  PlaylistItem,
  TagSet,
  TagWriter,
} from './types.js';
import { albumFolderName, firstNonBlank, trackFileName, UNKNOWN_ALBUM, UNKNOWN_ARTIST } from './utils.js';

export interface SyncDependencies {
  readonly engine: DownloadEngine;
  readonly tagWriter: TagWriter;
  readonly logger: Logger;
  readonly onProgress?: (item: PlaylistItem, fraction: number) => void;
  /** Called once a playlist is finished, successfully or not. */
  readonly onPlaylistDone?: () => void;
}

export interface SyncContext extends SyncDependencies {
  readonly settings: Settings;
  readonly archive: ArchiveStore;
}

/**
 * Album for an item: the playlist file wins, then the playlist title, then the item title.
 */
export const resolveAlbum = (descriptor: PlaylistDescriptor, playlist: PlaylistInfo, item?: PlaylistItem): string =>
  firstNonBlank(descriptor.album, playlist.title, item?.title) ?? UNKNOWN_ALBUM;

/**
 * Album artist for an item: the playlist file wins, then the playlist owner, then the item uploader.
 */
export const resolveAlbumArtist = (
  descriptor: PlaylistDescriptor,
  playlist: PlaylistInfo,
  item?: PlaylistItem,
): string => firstNonBlank(descriptor.artist, playlist.uploader, item?.uploader) ?? UNKNOWN_ARTIST;

export const buildTagSet = (
  descriptor: PlaylistDescriptor,
  playlist: PlaylistInfo,
  item: PlaylistItem,
  cover?: CoverArt,
): TagSet => ({
  album: resolveAlbum(descriptor, playlist, item),
  albumArtist: resolveAlbumArtist(descriptor, playlist, item),
  ...(item.position !== undefined ? { trackNumber: item.position } : {}),
  ...(item.title ? { title: item.title } : {}),
  ...(item.uploader ? { artist: item.uploader } : {}),
  ...(cover ? { cover } : {}),
});

/**
 * Output template: `<outputDir>/<album>/<NN> - <title>.mp3`.
 */
export const outputPathFor =
  (outputDir: string, descriptor: PlaylistDescriptor) =>
  (playlist: PlaylistInfo, item: PlaylistItem): string =>
    path.join(
      outputDir,
      albumFolderName(resolveAlbum(descriptor, playlist, item)),
      trackFileName(item.title ?? item.videoId, item.position, item.videoId),
    );

interface Counters {
  succeededPlaylists: number;
  failedPlaylists: number;
  downloaded: number;
  skipped: number;
  failedItems: number;
  tagFailures: number;
}

/**
 * Runs one orchestration pass: every descriptor in order, one item at a time.
 * A failing playlist is logged and the pass moves on to the next one.
 */
export const syncPlaylists = async (
  descriptors: readonly PlaylistDescriptor[],
  context: SyncContext,
): Promise<PassSummary> => {
  const { settings, engine, tagWriter, archive, logger } = context;
  const counters: Counters = {
    succeededPlaylists: 0,
    failedPlaylists: 0,
    downloaded: 0,
    skipped: 0,
    failedItems: 0,
    tagFailures: 0,
  };

  const handleOutcome = async (
    descriptor: PlaylistDescriptor,
    outcome: ItemOutcome,
    playlist: PlaylistInfo,
  ): Promise<void> => {
    const { item } = outcome;
    if (outcome.status === 'skipped') {
      counters.skipped += 1;
      logger.debug(`Already archived, skipping: ${item.archiveId}`);
      return;
    }
    if (outcome.status === 'failed') {
      counters.failedItems += 1;
      logger.error(`Failed item ${item.url} in ${descriptor.url}: ${outcome.reason}`);
      return;
    }

    counters.downloaded += 1;
    try {
      await tagWriter.writeTags(outcome.filePath, buildTagSet(descriptor, playlist, item, outcome.thumbnail));
    } catch (error) {
      counters.tagFailures += 1;
      logger.error(
        `Tagging failed for ${outcome.filePath} (${item.url}), file left untagged and not archived: ${toErrorMessage(error)}`,
      );
      return;
    }

    archive.append(item.archiveId);
    logger.info(`Saved ${outcome.filePath}`);
  };

  for (const [index, descriptor] of descriptors.entries()) {
    logger.info(`Processing playlist ${index + 1}/${descriptors.length}: ${descriptor.url}`);
    try {
      const result = await engine.downloadPlaylist({
        url: descriptor.url,
        isArchived: (archiveId) => archive.contains(archiveId),
        maxRetries: settings.maxRetries,
        quality: settings.quality,
        rateLimit: settings.rateLimit,
        outputPath: outputPathFor(settings.outputDir, descriptor),
        onItem: (outcome, playlist) => handleOutcome(descriptor, outcome, playlist),
        onProgress: context.onProgress,
      });
      counters.succeededPlaylists += 1;
      logger.info(
        `Playlist complete: ${descriptor.url} -> album "${resolveAlbum(descriptor, result.playlist)}" (${result.outcomes.length} item(s))`,
      );
    } catch (error) {
      counters.failedPlaylists += 1;
      logger.error(`Failed playlist ${descriptor.url} (line ${descriptor.line}): ${toErrorMessage(error)}`);
    } finally {
      context.onPlaylistDone?.();
    }
  }

  return { playlists: descriptors.length, ...counters };
};

/**
 * One complete pass as the CLI runs it: re-reads the playlist file and the
 * archive so edits made between watchdog cycles are picked up.
 */
export const runSyncPass = async (settings: Settings, dependencies: SyncDependencies): Promise<PassSummary> => {
  const { logger } = dependencies;
  if (!settings.playlistsFile) {
    throw new ConfigFatalError('Missing -f/--file (playlists.txt).');
  }

  const descriptors = await readPlaylistFile(settings.playlistsFile, logger);
  if (descriptors.length === 0) {
    throw new ConfigFatalError('No playlist entries found.', settings.playlistsFile);
  }

  await fs.ensureDir(settings.outputDir);
  const archive = await ArchiveStore.load(settings.archiveFile);
  logger.debug(`Using archive file: ${settings.archiveFile} (${archive.size} entries)`);

  const summary = await syncPlaylists(descriptors, { ...dependencies, settings, archive });
  logger.info(formatSummary(summary));
  return summary;
};

export const formatSummary = (summary: PassSummary): string =>
  `Pass finished => playlists: ${summary.succeededPlaylists}/${summary.playlists} ok, ` +
  `downloaded: ${summary.downloaded}, skipped: ${summary.skipped}, ` +
  `failed items: ${summary.failedItems}, tag failures: ${summary.tagFailures}`;

/**
 * Exit code for a one-shot run. Per-item failures never fail the run; a pass in
 * which no playlist could be processed does.
 */
export const exitCodeForSummary = (summary: PassSummary): number =>
  summary.playlists > 0 && summary.succeededPlaylists === 0 ? 1 : 0;
