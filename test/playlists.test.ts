import path from 'node:path';
import fs from 'fs-extra';
import { describe, expect, it, vi } from 'vitest';
import { ConfigFatalError } from '../src/errors.js';
import { parsePlaylistLine, parsePlaylistSource, readPlaylistFile } from '../src/playlists.js';
import { createMemoryLogger, makeTempDir } from './testUtils.js';

describe('parsePlaylistLine', () => {
  it('maps Album|Artist|URL onto all three fields after trimming', () => {
    expect(parsePlaylistLine('  Lo-Fi | Mix |  https://example/pl1 ', 4)).toEqual({
      album: 'Lo-Fi',
      artist: 'Mix',
      url: 'https://example/pl1',
      line: 4,
    });
  });

  it('leaves the artist unset for Album|URL', () => {
    const descriptor = parsePlaylistLine('Chill|https://example/pl2', 1);
    expect(descriptor).toEqual({ album: 'Chill', url: 'https://example/pl2', line: 1 });
    expect(descriptor).not.toHaveProperty('artist');
  });

  it('leaves album and artist unset for a bare URL', () => {
    expect(parsePlaylistLine('https://example/pl3', 2)).toEqual({ url: 'https://example/pl3', line: 2 });
  });

  it('rejoins extra segments into the URL', () => {
    expect(parsePlaylistLine('A|B|https://example/x|y', 1)).toEqual({
      album: 'A',
      artist: 'B',
      url: 'https://example/x|y',
      line: 1,
    });
  });

  it('treats empty album and artist segments as unset', () => {
    expect(parsePlaylistLine('||https://example/pl4', 1)).toEqual({ url: 'https://example/pl4', line: 1 });
  });

  it('ignores blank and comment lines', () => {
    expect(parsePlaylistLine('', 1)).toBeNull();
    expect(parsePlaylistLine('    ', 1)).toBeNull();
    expect(parsePlaylistLine('   # Album|Artist|URL', 1)).toBeNull();
  });

  it('reports a missing URL as a warning', () => {
    expect(parsePlaylistLine('Album|', 7)).toEqual({ line: 7, text: 'Album|', reason: 'missing playlist URL' });
  });

  it('returns frozen descriptors', () => {
    expect(Object.isFrozen(parsePlaylistLine('https://example/pl', 1))).toBe(true);
  });
});

describe('parsePlaylistSource', () => {
  it('skips comments and malformed lines without failing the whole source', () => {
    const onWarning = vi.fn();
    const source = ['# my playlists', '', 'Lo-Fi|Mix|https://example/pl1', 'Broken|', 'https://example/pl2'].join('\n');

    const descriptors = [...parsePlaylistSource(source, onWarning)];

    expect(descriptors).toEqual([
      { album: 'Lo-Fi', artist: 'Mix', url: 'https://example/pl1', line: 3 },
      { url: 'https://example/pl2', line: 5 },
    ]);
    expect(onWarning).toHaveBeenCalledTimes(1);
    expect(onWarning).toHaveBeenCalledWith({ line: 4, text: 'Broken|', reason: 'missing playlist URL' });
  });

  it('does not warn about comments or blank lines', () => {
    const onWarning = vi.fn();
    expect([...parsePlaylistSource('#one\n\n   \n  #two', onWarning)]).toEqual([]);
    expect(onWarning).not.toHaveBeenCalled();
  });

  it('handles CRLF line endings and a byte order mark', () => {
    const source = '\uFEFFA|https://example/one\r\n# skip\r\nhttps://example/two\r\n';
    expect([...parsePlaylistSource(source)]).toEqual([
      { album: 'A', url: 'https://example/one', line: 1 },
      { url: 'https://example/two', line: 3 },
    ]);
  });

  it('is lazy', () => {
    const onWarning = vi.fn();
    const iterator = parsePlaylistSource('https://example/one\nBroken|', onWarning);
    expect(iterator.next().value).toEqual({ url: 'https://example/one', line: 1 });
    expect(onWarning).not.toHaveBeenCalled();
  });
});

describe('readPlaylistFile', () => {
  it('logs skipped lines with file and line number', async () => {
    const dir = await makeTempDir();
    const file = path.join(dir, 'playlists.txt');
    await fs.writeFile(file, 'https://example/pl1\nAlbum|\n');
    const logger = createMemoryLogger();

    const descriptors = await readPlaylistFile(file, logger);

    expect(descriptors).toEqual([{ url: 'https://example/pl1', line: 1 }]);
    expect(logger.messages).toEqual([
      { level: 'warn', message: `${file}:2: skipped "Album|" (missing playlist URL)` },
    ]);
  });

  it('fails with a configuration error when the file cannot be read', async () => {
    const dir = await makeTempDir();
    await expect(readPlaylistFile(path.join(dir, 'missing.txt'), createMemoryLogger())).rejects.toBeInstanceOf(
      ConfigFatalError,
    );
  });
});
