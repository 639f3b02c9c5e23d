export type DownloaderErrorType =
  | 'PARSE_WARNING'
  | 'ITEM_DOWNLOAD_FAILED'
  | 'PLAYLIST_FAILED'
  | 'TAG_WRITE_FAILED'
  | 'CONFIG_FATAL';

/**
 * Base class for every failure the downloader reports. `context` holds the URL or
 * file path needed to retry the work by hand.
 */
export class DownloaderError extends Error {
  readonly type: DownloaderErrorType;
  readonly context: string;

  constructor(type: DownloaderErrorType, message: string, context = '', options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.type = type;
    this.context = context;
  }
}

export class ItemDownloadFailure extends DownloaderError {
  readonly attempts: number;

  constructor(url: string, attempts: number, cause?: unknown) {
    super('ITEM_DOWNLOAD_FAILED', `Download failed after ${attempts} attempt(s): ${toErrorMessage(cause)}`, url, {
      cause,
    });
    this.attempts = attempts;
  }
}

export class PlaylistFailure extends DownloaderError {
  constructor(url: string, cause?: unknown) {
    super('PLAYLIST_FAILED', `Playlist unavailable: ${toErrorMessage(cause)}`, url, { cause });
  }
}

export class TagWriteFailure extends DownloaderError {
  constructor(filePath: string, cause?: unknown) {
    super('TAG_WRITE_FAILED', `Could not write tags: ${toErrorMessage(cause)}`, filePath, { cause });
  }
}

export class ConfigFatalError extends DownloaderError {
  readonly exitCode = 2;

  constructor(message: string, context = '') {
    super('CONFIG_FATAL', message, context);
  }
}

export const toErrorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
