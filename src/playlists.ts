import fs from 'fs-extra';
import { ConfigFatalError, toErrorMessage } from './errors.js';
import type { Logger } from './logger.js';
import type { ParseWarning, PlaylistDescriptor } from './types.js';

const FIELD_SEPARATOR = '|';

/**
 * Parses a single playlist line. Returns null for blank and comment lines, a
 * warning for malformed ones.
 */
export const parsePlaylistLine = (
  raw: string,
  line: number,
): PlaylistDescriptor | ParseWarning | null => {
  const text = raw.trim();
  if (text.length === 0 || text.startsWith('#')) {
    return null;
  }

  const parts = text.split(FIELD_SEPARATOR).map((part) => part.trim());
  let album: string | undefined;
  let artist: string | undefined;
  let url: string;

  if (parts.length >= 3) {
    [album, artist] = parts;
    url = parts.slice(2).join(FIELD_SEPARATOR).trim();
  } else if (parts.length === 2) {
    [album, url] = parts;
  } else {
    url = parts[0] ?? '';
  }

  if (!url) {
    return { line, text, reason: 'missing playlist URL' };
  }

  return Object.freeze({
    ...(album ? { album } : {}),
    ...(artist ? { artist } : {}),
    url,
    line,
  });
};

const isWarning = (value: PlaylistDescriptor | ParseWarning): value is ParseWarning =>
  'reason' in value;

/**
 * Lazily yields descriptors for every valid line of a playlist source.
 *
 * Supported shapes:
 *   Album|Artist|URL
 *   Album|URL
 *   URL
 */
export function* parsePlaylistSource(
  source: string,
  onWarning?: (warning: ParseWarning) => void,
): Generator<PlaylistDescriptor> {
  const lines = source.replace(/^\uFEFF/, '').split(/\r?\n/);
  for (let index = 0; index < lines.length; index += 1) {
    const parsed = parsePlaylistLine(lines[index] ?? '', index + 1);
    if (parsed === null) {
      continue;
    }
    if (isWarning(parsed)) {
      onWarning?.(parsed);
      continue;
    }
    yield parsed;
  }
}

/**
 * Reads and parses the playlist file, logging malformed lines.
 */
export const readPlaylistFile = async (
  filePath: string,
  logger: Logger,
): Promise<PlaylistDescriptor[]> => {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigFatalError(`Cannot read playlist file: ${toErrorMessage(error)}`, filePath);
  }

  return [
    ...parsePlaylistSource(raw, (warning) => {
      logger.warn(`${filePath}:${warning.line}: skipped "${warning.text}" (${warning.reason})`);
    }),
  ];
};
