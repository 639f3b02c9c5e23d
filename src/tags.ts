import fs from 'fs-extra';
import NodeID3 from 'node-id3';
import type { Tags } from 'node-id3';
import { TagWriteFailure } from './errors.js';
import { appendFrames, readRawTag, type RawFrame } from './id3frames.js';
import type { TagSet, TagWriter } from './types.js';

const FRONT_COVER = 3;

/**
 * Maps a TagSet onto node-id3 frames. Album artist lives in TPE2 (`performerInfo`).
 */
export const toId3Tags = (tags: TagSet): Tags => ({
  album: tags.album,
  performerInfo: tags.albumArtist,
  ...(tags.trackNumber !== undefined ? { trackNumber: String(tags.trackNumber) } : {}),
  ...(tags.title ? { title: tags.title } : {}),
  ...(tags.artist ? { artist: tags.artist } : {}),
  ...(tags.cover
    ? {
        image: {
          mime: tags.cover.mime,
          type: { id: FRONT_COVER, name: 'front cover' },
          description: 'Cover',
          imageBuffer: tags.cover.data,
        },
      }
    : {}),
});

const restoreDroppedFrames = async (filePath: string, previous: readonly RawFrame[]): Promise<void> => {
  const written = await fs.readFile(filePath);
  const present = new Set(readRawTag(written)?.frames.map((frame) => frame.id));
  const dropped = previous.filter((frame) => frame.formatFlags === 0 && !present.has(frame.id));
  if (dropped.length === 0) {
    return;
  }
  const restored = appendFrames(written, dropped);
  if (restored) {
    await fs.writeFile(filePath, restored);
  }
};

/**
 * Writes ID3v2.3 tags in place. Frames the TagSet does not name are kept,
 * including those node-id3 cannot represent, which are copied back verbatim.
 */
export class Id3TagWriter implements TagWriter {
  async writeTags(filePath: string, tags: TagSet): Promise<void> {
    try {
      const before = readRawTag(await fs.readFile(filePath));
      const result = NodeID3.update(toId3Tags(tags), filePath);
      if (result instanceof Error) {
        throw result;
      }
      if (before) {
        await restoreDroppedFrames(filePath, before.frames);
      }
    } catch (error) {
      throw new TagWriteFailure(filePath, error);
    }
  }
}
