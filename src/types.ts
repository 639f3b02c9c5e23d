/**
 * One parsed entry of the playlist source file.
 */
export interface PlaylistDescriptor {
  readonly album?: string;
  readonly artist?: string;
  readonly url: string;
  readonly line: number;
}

export interface ParseWarning {
  readonly line: number;
  readonly text: string;
  readonly reason: string;
}

/**
 * Metadata the extraction engine reports for a whole playlist. For a single-video
 * URL this describes the video itself.
 */
export interface PlaylistInfo {
  readonly id?: string;
  readonly title?: string;
  readonly uploader?: string;
}

export interface PlaylistItem {
  /** Identifier recorded in the archive, in yt-dlp's `<extractor> <id>` form. */
  readonly archiveId: string;
  readonly videoId: string;
  readonly url: string;
  readonly title?: string;
  readonly uploader?: string;
  /** 1-based position inside the playlist. */
  readonly position?: number;
  /** Candidate thumbnail URLs, best quality first. */
  readonly thumbnailUrls: readonly string[];
}

export interface CoverArt {
  readonly mime: string;
  readonly data: Buffer;
}

export type ItemOutcome =
  | {
      readonly status: 'downloaded';
      readonly item: PlaylistItem;
      readonly filePath: string;
      readonly thumbnail?: CoverArt;
    }
  | {
      readonly status: 'skipped';
      readonly item: PlaylistItem;
      readonly reason: 'archived';
    }
  | {
      readonly status: 'failed';
      readonly item: PlaylistItem;
      readonly reason: string;
      readonly attempts: number;
    };

export interface PlaylistDownloadRequest {
  readonly url: string;
  readonly isArchived: (archiveId: string) => boolean;
  readonly maxRetries: number;
  readonly quality: string;
  readonly rateLimit: boolean;
  /** Resolves the final mp3 path for an item, creating nothing on disk. */
  readonly outputPath: (playlist: PlaylistInfo, item: PlaylistItem) => string;
  /** Called as soon as an item is settled, before the next one starts. */
  readonly onItem: (outcome: ItemOutcome, playlist: PlaylistInfo) => Promise<void>;
  readonly onProgress?: (item: PlaylistItem, fraction: number) => void;
}

export interface PlaylistDownloadResult {
  readonly playlist: PlaylistInfo;
  readonly outcomes: readonly ItemOutcome[];
}

/**
 * External extraction-and-download capability.
 */
export interface DownloadEngine {
  downloadPlaylist(request: PlaylistDownloadRequest): Promise<PlaylistDownloadResult>;
}

export interface TagSet {
  readonly album: string;
  readonly albumArtist: string;
  readonly trackNumber?: number;
  readonly title?: string;
  readonly artist?: string;
  readonly cover?: CoverArt;
}

/**
 * External tag-writing capability.
 */
export interface TagWriter {
  writeTags(filePath: string, tags: TagSet): Promise<void>;
}

export interface PassSummary {
  readonly playlists: number;
  readonly succeededPlaylists: number;
  readonly failedPlaylists: number;
  readonly downloaded: number;
  readonly skipped: number;
  readonly failedItems: number;
  readonly tagFailures: number;
}
