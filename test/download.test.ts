import { describe, expect, it } from 'vitest';
import { buildYtDlpArgs, shouldFallback, ytDlpToolArgs } from '../src/download.js';

const tools = { jsRuntimes: 'deno', remoteComponents: 'ejs:github', ffmpegPath: '/usr/bin/ffmpeg' };

describe('buildYtDlpArgs', () => {
  it('extracts a single mp3 at a VBR level', () => {
    expect(buildYtDlpArgs('https://example/v', '/music/01 - Song.mp3', '0', tools)).toEqual([
      'https://example/v',
      '--no-playlist',
      '-o',
      '/music/01 - Song.mp3',
      '-x',
      '--audio-format',
      'mp3',
      '--audio-quality',
      '0',
      '--no-part',
      '--force-overwrites',
      '--newline',
      '--no-warnings',
      '--js-runtimes',
      'deno',
      '--remote-components',
      'ejs:github',
      '--ffmpeg-location',
      '/usr/bin/ffmpeg',
    ]);
  });

  it('passes bitrates in the form yt-dlp expects', () => {
    const args = buildYtDlpArgs('https://example/v', '/music/song.mp3', '320k', tools);
    expect(args[args.indexOf('--audio-quality') + 1]).toBe('320K');
  });
});

describe('ytDlpToolArgs', () => {
  it('leaves out tools that are not configured', () => {
    expect(ytDlpToolArgs({ jsRuntimes: '', remoteComponents: '' })).toEqual([]);
    expect(ytDlpToolArgs({ jsRuntimes: 'node', remoteComponents: '' })).toEqual(['--js-runtimes', 'node']);
  });
});

describe('shouldFallback', () => {
  it('falls back on client errors and signature failures', () => {
    expect(shouldFallback(new Error('Status code: 403'))).toBe(true);
    expect(shouldFallback(new Error('Could not decipher signature'))).toBe(true);
    expect(shouldFallback(new Error('Could not parse decipher function'))).toBe(true);
    expect(shouldFallback(new Error('No such format found: 140'))).toBe(true);
  });

  it('keeps other failures', () => {
    expect(shouldFallback(new Error('ENOSPC: no space left on device'))).toBe(false);
    expect(shouldFallback(new Error('Status code: 500'))).toBe(false);
  });
});
