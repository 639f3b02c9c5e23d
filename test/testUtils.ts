import os from 'node:os';
import path from 'node:path';
import fs from 'fs-extra';
import { buildFrame } from '../src/id3frames.js';
import type { Logger, LogLevel } from '../src/logger.js';
import type {
  DownloadEngine,
  ItemOutcome,
  PlaylistDownloadRequest,
  PlaylistDownloadResult,
  PlaylistInfo,
  PlaylistItem,
  TagSet,
  TagWriter,
} from '../src/types.js';

export const makeTempDir = async (): Promise<string> =>
  fs.mkdtemp(path.join(os.tmpdir(), 'playlist-mp3-sync-'));

export const FAKE_AUDIO = Buffer.from([0xff, 0xfb, 0x90, 0x64, 0x01, 0x02, 0x03, 0x04]);

export interface TestFrame {
  readonly id: string;
  readonly body: Buffer;
}

/** Latin-1 text frame body: encoding byte, then the text. */
export const textFrame = (id: string, text: string): TestFrame => ({
  id,
  body: Buffer.concat([Buffer.from([0]), Buffer.from(text, 'latin1')]),
});

/** An ID3v2.3 tag with `padding` zero bytes after the frames, followed by `audio`. */
export const id3v23File = (frames: readonly TestFrame[], padding = 32, audio = FAKE_AUDIO): Buffer => {
  const body = Buffer.concat([...frames.map((frame) => buildFrame(frame.id, frame.body, 3)), Buffer.alloc(padding)]);
  const size = body.length;
  const header = Buffer.from([
    0x49,
    0x44,
    0x33,
    3,
    0,
    0,
    (size >> 21) & 0x7f,
    (size >> 14) & 0x7f,
    (size >> 7) & 0x7f,
    size & 0x7f,
  ]);
  return Buffer.concat([header, body, audio]);
};

export interface MemoryLogger extends Logger {
  readonly messages: Array<{ level: LogLevel; message: string }>;
}

export const createMemoryLogger = (): MemoryLogger => {
  const messages: Array<{ level: LogLevel; message: string }> = [];
  const push = (level: LogLevel) => (message: string) => {
    messages.push({ level, message });
  };
  return {
    messages,
    debug: push('debug'),
    info: push('info'),
    warn: push('warn'),
    error: push('error'),
  };
};

export const makeItem = (id: string, overrides: Partial<PlaylistItem> = {}): PlaylistItem => ({
  archiveId: id,
  videoId: id,
  url: `https://example/watch/${id}`,
  thumbnailUrls: [],
  ...overrides,
});

export interface StubPlaylist {
  readonly playlist?: PlaylistInfo;
  readonly items?: readonly PlaylistItem[];
  /** Thrown instead of listing. */
  readonly error?: Error;
}

/**
 * In-memory download engine. Honors the archive predicate, records every
 * request and every item it "downloads".
 */
export class StubEngine implements DownloadEngine {
  readonly requests: PlaylistDownloadRequest[] = [];
  readonly downloads: string[] = [];
  private readonly playlists: ReadonlyMap<string, StubPlaylist>;
  private readonly onCall?: (callNumber: number) => void;

  constructor(playlists: Record<string, StubPlaylist>, onCall?: (callNumber: number) => void) {
    this.playlists = new Map(Object.entries(playlists));
    this.onCall = onCall;
  }

  async downloadPlaylist(request: PlaylistDownloadRequest): Promise<PlaylistDownloadResult> {
    this.requests.push(request);
    this.onCall?.(this.requests.length);

    const stub = this.playlists.get(request.url);
    if (!stub) {
      throw new Error(`No stub for ${request.url}`);
    }
    if (stub.error) {
      throw stub.error;
    }

    const playlist = stub.playlist ?? {};
    const outcomes: ItemOutcome[] = [];
    for (const item of stub.items ?? []) {
      let outcome: ItemOutcome;
      if (request.isArchived(item.archiveId)) {
        outcome = { status: 'skipped', item, reason: 'archived' };
      } else {
        this.downloads.push(item.archiveId);
        outcome = { status: 'downloaded', item, filePath: request.outputPath(playlist, item) };
      }
      outcomes.push(outcome);
      await request.onItem(outcome, playlist);
    }
    return { playlist, outcomes };
  }
}

export class StubTagWriter implements TagWriter {
  readonly calls: Array<{ filePath: string; tags: TagSet }> = [];
  private readonly failFor: ReadonlySet<string>;

  constructor(failFor: Iterable<string> = []) {
    this.failFor = new Set(failFor);
  }

  async writeTags(filePath: string, tags: TagSet): Promise<void> {
    if ([...this.failFor].some((fragment) => filePath.includes(fragment))) {
      throw new Error('disk full');
    }
    this.calls.push({ filePath, tags });
  }
}
