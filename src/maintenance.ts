import os from 'node:os';
import path from 'node:path';
import fs from 'fs-extra';
import ffmpeg from 'fluent-ffmpeg';
import NodeID3 from 'node-id3';
import pLimit from 'p-limit';
import { isEmptyTextFrame, removeFrames } from './id3frames.js';

export type MaintenanceOperation = 'clean-empty' | 'set-album-artist' | 'replaygain';

/** ReplayGain 2.0 reference loudness. */
export const REPLAYGAIN_REFERENCE_LUFS = -18;

export class MaintenanceError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = 'MaintenanceError';
    this.exitCode = exitCode;
  }
}

export const listMp3Files = async (albumDir: string): Promise<string[]> => {
  const entries = await fs.readdir(albumDir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith('.mp3'))
    .map((entry) => path.join(albumDir, entry.name))
    .sort();
};

const requireMp3Files = async (albumDir: string): Promise<string[]> => {
  const files = await listMp3Files(albumDir);
  if (files.length === 0) {
    throw new MaintenanceError(`No MP3 files found in ${albumDir}`);
  }
  return files;
};

/**
 * Drops ID3 text frames whose text is empty or whitespace. Every other frame,
 * pictures included, is kept byte for byte. Returns the number of files changed.
 */
export const cleanEmptyFrames = async (albumDir: string): Promise<number> => {
  const files = await requireMp3Files(albumDir);
  let changed = 0;
  for (const file of files) {
    const result = removeFrames(await fs.readFile(file), isEmptyTextFrame);
    if (!result || result.removed.length === 0) {
      continue;
    }
    await fs.writeFile(file, result.buffer);
    changed += 1;
  }
  return changed;
};

/**
 * Sets album and album artist of every file to the folder name.
 */
export const setAlbumArtistFromFolder = async (albumDir: string): Promise<{ album: string; files: number }> => {
  const files = await requireMp3Files(albumDir);
  const album = path.basename(path.resolve(albumDir));
  for (const file of files) {
    const result = NodeID3.update({ album, performerInfo: album }, file);
    if (result instanceof Error) {
      throw new MaintenanceError(`Could not update tags of ${file}: ${result.message}`);
    }
  }
  return { album, files: files.length };
};

/**
 * Picks the integrated loudness from ffmpeg's ebur128 output. The summary block
 * comes last, so the last `I:` reading wins.
 */
export const parseIntegratedLoudness = (lines: readonly string[]): number | undefined => {
  let loudness: number | undefined;
  for (const line of lines) {
    const match = /\bI:\s+(-?\d+(?:\.\d+)?) LUFS/.exec(line);
    if (match?.[1]) {
      loudness = Number.parseFloat(match[1]);
    }
  }
  return loudness;
};

/**
 * Measures the integrated loudness (EBU R128) of one file with ffmpeg.
 */
export const measureLoudness = (filePath: string): Promise<number> =>
  new Promise((resolve, reject) => {
    const lines: string[] = [];
    ffmpeg(filePath)
      .noVideo()
      .audioFilters('ebur128')
      .format('null')
      .on('stderr', (line: string) => {
        lines.push(line);
      })
      .on('error', (error: Error) => reject(error))
      .on('end', () => {
        const loudness = parseIntegratedLoudness(lines);
        if (loudness === undefined) {
          reject(new Error(`Unable to parse LUFS from ffmpeg output for ${filePath}`));
          return;
        }
        resolve(loudness);
      })
      .save(os.devNull);
  });

/**
 * Track gains against the reference level and an album gain from the energy mean
 * of all tracks.
 */
export const computeReplayGain = (
  loudness: readonly number[],
): { trackGains: number[]; albumGain: number } => {
  const trackGains = loudness.map((value) => REPLAYGAIN_REFERENCE_LUFS - value);
  const meanEnergy = loudness.reduce((sum, value) => sum + 10 ** (value / 10), 0) / loudness.length;
  const albumLoudness = 10 * Math.log10(meanEnergy);
  return { trackGains, albumGain: REPLAYGAIN_REFERENCE_LUFS - albumLoudness };
};

export const formatGain = (gain: number): string => {
  const rounded = Math.round(gain * 100) / 100;
  return `${rounded > 0 ? '+' : ''}${rounded.toFixed(2)} dB`;
};

/**
 * Measures every file (two ffmpeg processes at a time) and writes ReplayGain TXXX frames.
 */
export const applyReplayGain = async (
  albumDir: string,
  { measure = measureLoudness, concurrency = 2 }: { measure?: (file: string) => Promise<number>; concurrency?: number } = {},
): Promise<{ files: number; albumGain: string }> => {
  const files = await requireMp3Files(albumDir);
  const limit = pLimit(concurrency);
  const loudness = await Promise.all(files.map((file) => limit(() => measure(file))));
  const { trackGains, albumGain } = computeReplayGain(loudness);

  files.forEach((file, index) => {
    const result = NodeID3.update(
      {
        userDefinedText: [
          { description: 'REPLAYGAIN_TRACK_GAIN', value: formatGain(trackGains[index] ?? 0) },
          { description: 'REPLAYGAIN_ALBUM_GAIN', value: formatGain(albumGain) },
        ],
      },
      file,
    );
    if (result instanceof Error) {
      throw new MaintenanceError(`Could not write ReplayGain to ${file}: ${result.message}`);
    }
  });

  return { files: files.length, albumGain: formatGain(albumGain) };
};

/**
 * Runs one maintenance operation on an album folder and returns the summary line.
 */
export const runMaintenance = async (operation: MaintenanceOperation, albumDir: string): Promise<string> => {
  const stat = await fs.stat(albumDir).catch(() => null);
  if (!stat?.isDirectory()) {
    throw new MaintenanceError(`Not a directory: ${albumDir}`);
  }

  switch (operation) {
    case 'clean-empty': {
      const changed = await cleanEmptyFrames(albumDir);
      return `Cleanup empty tags: ${changed} file(s) changed`;
    }
    case 'set-album-artist': {
      const { album, files } = await setAlbumArtistFromFolder(albumDir);
      return `Set Album+Album Artist to '${album}' for ${files} file(s)`;
    }
    case 'replaygain': {
      const { files, albumGain } = await applyReplayGain(albumDir);
      return `ReplayGain written for ${files} file(s), album gain ${albumGain}`;
    }
  }
};

const OPERATION_FLAGS = new Map<string, MaintenanceOperation>([
  ['--clean-empty', 'clean-empty'],
  ['--set-album-artist', 'set-album-artist'],
  ['--replaygain', 'replaygain'],
]);

export interface MaintenanceArgs {
  readonly albumDir: string;
  readonly operation: MaintenanceOperation;
}

/**
 * Expects an album folder and exactly one operation flag.
 */
export const parseMaintenanceArgs = (argv: readonly string[], cwd: string = process.cwd()): MaintenanceArgs | 'help' => {
  let albumDir: string | undefined;
  const operations: MaintenanceOperation[] = [];

  for (const arg of argv) {
    if (arg === '--help' || arg === '-h') {
      return 'help';
    }
    const operation = OPERATION_FLAGS.get(arg);
    if (operation) {
      operations.push(operation);
    } else if (arg.startsWith('-')) {
      throw new MaintenanceError(`Unknown option: ${arg}`, 2);
    } else if (albumDir === undefined) {
      albumDir = path.resolve(cwd, arg);
    } else {
      throw new MaintenanceError(`Unexpected argument: ${arg}`, 2);
    }
  }

  if (!albumDir) {
    throw new MaintenanceError('Missing album folder, e.g. /downloads/Remixe', 2);
  }
  const [operation, ...extra] = operations;
  if (!operation) {
    throw new MaintenanceError('No action selected. Use --clean-empty, --set-album-artist or --replaygain', 2);
  }
  if (extra.length > 0) {
    throw new MaintenanceError('Select exactly one of --clean-empty, --set-album-artist, --replaygain', 2);
  }
  return { albumDir, operation };
};
