import path from 'node:path';
import fs from 'fs-extra';
import ffmpeg from 'fluent-ffmpeg';
import ytdl from '@distube/ytdl-core';
import YTDlpWrapModule from 'yt-dlp-wrap';
import { ConfigFatalError, toErrorMessage } from './errors.js';

const YTDlpWrap = YTDlpWrapModule.default;
type YTDlpWrapInstance = InstanceType<typeof YTDlpWrap>;

const FFMPEG_PATH = process.env.FFMPEG_PATH;
const YT_DLP_PATH = process.env.YT_DLP_PATH ?? 'yt-dlp';

if (FFMPEG_PATH) {
  ffmpeg.setFfmpegPath(FFMPEG_PATH);
}

export interface DownloadOptions {
  readonly url: string;
  readonly targetPath: string;
  /** `0`-`9` for a VBR level, otherwise a bitrate such as `320k`. */
  readonly quality: string;
  readonly onProgress?: (fraction: number) => void;
}

const REQUEST_HEADERS: Record<string, string> = {
  'User-Agent':
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/127.0.0.0 Safari/537.36',
  'Accept-Language': 'en-US,en;q=0.9',
  Referer: 'https://www.youtube.com/',
  Origin: 'https://www.youtube.com',
};

const isVbrLevel = (quality: string): boolean => /^\d$/.test(quality);

let ytDlpInstance: YTDlpWrapInstance | null = null;

/**
 * Lazily instantiates the yt-dlp wrapper around the binary found on PATH (or YT_DLP_PATH).
 */
export const getYtDlp = (): YTDlpWrapInstance => {
  if (!ytDlpInstance) {
    ytDlpInstance = new YTDlpWrap(YT_DLP_PATH);
  }
  return ytDlpInstance;
};

/**
 * Streams audio via ytdl-core through ffmpeg into an mp3 at `tempPath`, then moves it into place.
 */
const downloadWithCore = async (
  url: string,
  targetPath: string,
  tempPath: string,
  quality: string,
  onProgress: (fraction: number) => void,
): Promise<string> =>
  new Promise((resolve, reject) => {
    const stream = ytdl(url, {
      quality: 'highestaudio',
      filter: 'audioonly',
      highWaterMark: 1 << 25,
      dlChunkSize: 1 << 20,
      requestOptions: { headers: REQUEST_HEADERS },
    });

    stream.on('progress', (_chunkLength: number, downloaded: number, total: number) => {
      onProgress(total > 0 ? downloaded / total : 0);
    });

    stream.on('error', (error: Error) => {
      void fs.remove(tempPath);
      reject(error);
    });

    const command = ffmpeg(stream).noVideo().audioCodec('libmp3lame').format('mp3');
    if (isVbrLevel(quality)) {
      command.audioQuality(Number.parseInt(quality, 10));
    } else {
      command.audioBitrate(quality);
    }

    command
      .on('error', (error: Error) => {
        void fs.remove(tempPath);
        reject(error);
      })
      .on('end', async () => {
        try {
          await fs.move(tempPath, targetPath, { overwrite: true });
          resolve(targetPath);
        } catch (error) {
          reject(error instanceof Error ? error : new Error(String(error)));
        }
      })
      .save(tempPath);
  });

export interface YtDlpToolOptions {
  readonly ffmpegPath?: string;
  /** Passed to `--js-runtimes`; YouTube's signature challenges need one. Empty disables. */
  readonly jsRuntimes: string;
  /** Passed to `--remote-components`. Empty disables. */
  readonly remoteComponents: string;
}

export const YT_DLP_TOOLS: YtDlpToolOptions = {
  ffmpegPath: FFMPEG_PATH,
  jsRuntimes: process.env.YT_DLP_JS_RUNTIMES ?? 'deno',
  remoteComponents: process.env.YT_DLP_REMOTE_COMPONENTS ?? 'ejs:github',
};

/**
 * Flags every yt-dlp invocation shares: JS challenge runtime and ffmpeg location.
 */
export const ytDlpToolArgs = (tools: YtDlpToolOptions = YT_DLP_TOOLS): string[] => [
  ...(tools.jsRuntimes ? ['--js-runtimes', tools.jsRuntimes] : []),
  ...(tools.remoteComponents ? ['--remote-components', tools.remoteComponents] : []),
  ...(tools.ffmpegPath ? ['--ffmpeg-location', tools.ffmpegPath] : []),
];

/**
 * Arguments for `yt-dlp -x` producing an mp3 at `targetPath`.
 */
export const buildYtDlpArgs = (
  url: string,
  targetPath: string,
  quality: string,
  tools: YtDlpToolOptions = YT_DLP_TOOLS,
): string[] => [
  url,
  '--no-playlist',
  '-o',
  targetPath,
  '-x',
  '--audio-format',
  'mp3',
  '--audio-quality',
  isVbrLevel(quality) ? quality : quality.toUpperCase(),
  '--no-part',
  '--force-overwrites',
  '--newline',
  '--no-warnings',
  ...ytDlpToolArgs(tools),
];

/**
 * Executes yt-dlp, used for non-YouTube sites and when ytdl-core cannot decode signatures.
 */
const downloadWithYtDlp = async (
  url: string,
  targetPath: string,
  quality: string,
  onProgress: (fraction: number) => void,
): Promise<string> => {
  const runner = getYtDlp().exec(buildYtDlpArgs(url, targetPath, quality));

  await new Promise<void>((resolve, reject) => {
    runner.on('progress', (progress: { percent?: number }) => {
      if (typeof progress.percent === 'number' && !Number.isNaN(progress.percent)) {
        onProgress(Math.min(1, Math.max(0, progress.percent / 100)));
      }
    });
    runner.once('error', (error: unknown) => {
      reject(error instanceof Error ? error : new Error(String(error)));
    });
    runner.once('close', (code: unknown) => {
      if (code !== 0) {
        reject(new Error(`yt-dlp exited with code ${String(code)}`));
        return;
      }
      resolve();
    });
  });

  return targetPath;
};

/**
 * Determines whether we should escalate to the yt-dlp fallback based on the error surface.
 */
export const shouldFallback = (error: unknown): boolean => {
  const message = toErrorMessage(error);
  return (
    /Status code: 4\d\d/i.test(message) ||
    /Could not parse/i.test(message) ||
    /decipher/i.test(message) ||
    /No such format/i.test(message)
  );
};

/**
 * Downloads one item as mp3 to `targetPath` and returns the final path.
 */
export const downloadToMp3 = async ({ url, targetPath, quality, onProgress = () => undefined }: DownloadOptions): Promise<string> => {
  await fs.ensureDir(path.dirname(targetPath));
  const tempPath = `${targetPath}.part`;
  await fs.remove(tempPath);

  if (!ytdl.validateURL(url)) {
    return downloadWithYtDlp(url, targetPath, quality, onProgress);
  }

  try {
    return await downloadWithCore(url, targetPath, tempPath, quality, onProgress);
  } catch (error) {
    if (!shouldFallback(error)) {
      throw error instanceof Error ? error : new Error(String(error));
    }
    const fallbackPath = await downloadWithYtDlp(url, targetPath, quality, onProgress);
    onProgress(1);
    return fallbackPath;
  }
};

/**
 * Confirms yt-dlp and ffmpeg can be executed before any work starts.
 */
export const checkExternalTools = async (): Promise<{ ytDlpVersion: string }> => {
  let ytDlpVersion: string;
  try {
    ytDlpVersion = (await getYtDlp().getVersion()).trim();
  } catch (error) {
    throw new ConfigFatalError(
      `yt-dlp is required but could not be run: ${toErrorMessage(error)}. See https://github.com/yt-dlp/yt-dlp for install instructions.`,
      YT_DLP_PATH,
    );
  }

  await new Promise<void>((resolve, reject) => {
    ffmpeg.getAvailableFormats((error) => {
      if (error) {
        reject(
          new ConfigFatalError(
            `ffmpeg is required but could not be run: ${toErrorMessage(error)}`,
            FFMPEG_PATH ?? 'ffmpeg',
          ),
        );
        return;
      }
      resolve();
    });
  });

  return { ytDlpVersion };
};
