import { setTimeout as delay } from 'node:timers/promises';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const UNKNOWN_ALBUM = 'Unknown_Playlist';
export const UNKNOWN_ARTIST = 'Unknown Artist';

/**
 * Resolves after `ms` milliseconds. An abort ends the wait early without throwing.
 */
export const sleep: Sleep = async (ms, signal) => {
  if (signal?.aborted) {
    return;
  }
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (!(error instanceof Error && error.name === 'AbortError')) {
      throw error;
    }
  }
};

/**
 * Sanitizes possible file names so they are safe to write to the filesystem.
 */
export const sanitizeFileName = (value: string): string =>
  value.replace(/[\\/:*?"<>|]/g, ' ').replace(/\s+/g, ' ').trim().replace(/[.\s]+$/u, '');

/**
 * Album folder name for a playlist, never empty.
 */
export const albumFolderName = (album: string): string => sanitizeFileName(album) || UNKNOWN_ALBUM;

/**
 * Builds `NN - Title.mp3`, dropping the prefix when the playlist position is unknown.
 */
export const trackFileName = (title: string, position?: number, fallback = 'track'): string => {
  const safeTitle = sanitizeFileName(title) || fallback;
  const prefix = position !== undefined ? `${String(position).padStart(2, '0')} - ` : '';
  return `${prefix}${safeTitle}.mp3`;
};

/**
 * Detects whether a given string looks like a direct YouTube URL.
 */
export const isYoutubeUrl = (input: string): boolean => {
  try {
    const parsed = new URL(input);
    return /(^|\.)youtube\.com$/.test(parsed.hostname) || parsed.hostname === 'youtu.be';
  } catch {
    return false;
  }
};

/**
 * Detects whether a given string refers to a YouTube playlist (via list parameter or playlist path).
 */
export const isYoutubePlaylistUrl = (input: string): boolean => {
  if (!isYoutubeUrl(input)) {
    return false;
  }
  const parsed = new URL(input);
  return parsed.searchParams.has('list') || parsed.pathname.includes('/playlist');
};

/**
 * Returns the first non-blank string, trimmed.
 */
export const firstNonBlank = (...values: Array<string | null | undefined>): string | undefined => {
  for (const value of values) {
    const trimmed = value?.trim();
    if (trimmed) {
      return trimmed;
    }
  }
  return undefined;
};

/**
 * Random delay in the 1-5 second window used to space out requests.
 */
export const rateLimitDelayMs = (random: () => number = Math.random): number =>
  Math.round(1000 + random() * 4000);
