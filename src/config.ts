import path from 'node:path';
import fs from 'fs-extra';
import {
  boolean,
  integer,
  minValue,
  nullable,
  number,
  object,
  optional,
  pipe,
  safeParse,
  string,
  union,
} from 'valibot';
import { parse as parseYaml } from 'yaml';
import { ConfigFatalError, toErrorMessage } from './errors.js';

export interface Settings {
  readonly outputDir: string;
  /** `0`-`9` for a VBR level, otherwise a bitrate such as `320k`. */
  readonly quality: string;
  readonly rateLimit: boolean;
  readonly maxRetries: number;
  /** Base backoff between retries, in seconds. */
  readonly retryDelay: number;
  readonly verbose: boolean;
  /** Empty means console only. */
  readonly logFile: string;
  /** Seconds between watchdog passes. Zero runs a single pass. */
  readonly pollInterval: number;
  readonly archiveFile: string;
  readonly playlistsFile?: string;
}

export type SettingsLayer = { -readonly [K in keyof Settings]?: Settings[K] };

export const DEFAULT_POLL_INTERVAL = 600;
export const ARCHIVE_FILE_NAME = '.yt-dlp-download-archive.txt';

export const DEFAULT_SETTINGS: Omit<Settings, 'archiveFile'> = {
  outputDir: '/downloads',
  quality: '320k',
  rateLimit: false,
  maxRetries: 3,
  retryDelay: 10,
  verbose: false,
  logFile: '',
  pollInterval: 0,
};

const FlagSchema = union([boolean(), number(), string()]);

const ConfigFileSchema = object({
  output_dir: optional(string()),
  quality: optional(union([string(), number()])),
  rate_limit: optional(FlagSchema),
  max_retries: optional(pipe(number(), integer(), minValue(0))),
  retry_delay: optional(pipe(number(), minValue(0))),
  log_file: optional(nullable(string())),
  verbose: optional(FlagSchema),
  poll_interval: optional(nullable(pipe(number(), integer(), minValue(0)))),
  archive_file: optional(string()),
  playlists_file: optional(string()),
});

/**
 * Accepts `0/1`, `true/false`, `yes/no` and `on/off`.
 */
export const parseFlag = (value: string | number | boolean, name: string): boolean => {
  if (typeof value === 'boolean') {
    return value;
  }
  const normalized = String(value).trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off', ''].includes(normalized)) {
    return false;
  }
  throw new ConfigFatalError(`${name} must be 0 or 1, got "${String(value)}"`);
};

export const parseNonNegativeInt = (value: string, name: string): number => {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ConfigFatalError(`${name} must be a non-negative integer, got "${value}"`);
  }
  return Number.parseInt(trimmed, 10);
};

/**
 * Normalizes an mp3 quality setting. `0`-`9` are VBR levels, larger numbers are
 * bitrates in kbit/s (`320` and `320k` both become `320k`).
 */
export const normalizeQuality = (value: string | number): string => {
  const match = /^(\d+)(k?)$/i.exec(String(value).trim());
  if (!match) {
    throw new ConfigFatalError(`quality must be 0-9 or a bitrate such as 320k, got "${String(value)}"`);
  }
  const amount = Number.parseInt(match[1] ?? '', 10);
  if (amount <= 9 && !match[2]) {
    return String(amount);
  }
  if (amount < 8 || amount > 512) {
    throw new ConfigFatalError(`quality bitrate must be between 8k and 512k, got "${String(value)}"`);
  }
  return `${amount}k`;
};

/**
 * Validates the YAML configuration text and maps it onto a settings layer.
 */
export const parseConfigFile = (text: string, source = 'config'): SettingsLayer => {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (error) {
    throw new ConfigFatalError(`Invalid YAML: ${toErrorMessage(error)}`, source);
  }

  const result = safeParse(ConfigFileSchema, raw ?? {});
  if (!result.success) {
    const details = result.issues
      .map((issue) => {
        const key = issue.path?.map((segment) => String(segment.key)).join('.') ?? 'root';
        return `${key}: ${issue.message}`;
      })
      .join('; ');
    throw new ConfigFatalError(`Invalid configuration: ${details}`, source);
  }

  const file = result.output;
  const layer: SettingsLayer = {};
  if (file.output_dir !== undefined) layer.outputDir = file.output_dir;
  if (file.quality !== undefined) layer.quality = normalizeQuality(file.quality);
  if (file.rate_limit !== undefined) layer.rateLimit = parseFlag(file.rate_limit, 'rate_limit');
  if (file.max_retries !== undefined) layer.maxRetries = file.max_retries;
  if (file.retry_delay !== undefined) layer.retryDelay = file.retry_delay;
  if (file.log_file !== undefined) layer.logFile = file.log_file ?? '';
  if (file.verbose !== undefined) layer.verbose = parseFlag(file.verbose, 'verbose');
  if (file.poll_interval !== undefined) layer.pollInterval = file.poll_interval ?? 0;
  if (file.archive_file !== undefined) layer.archiveFile = file.archive_file;
  if (file.playlists_file !== undefined) layer.playlistsFile = file.playlists_file;
  return layer;
};

/**
 * Reads the YAML configuration file. A missing file is only an error when it was
 * asked for explicitly.
 */
export const loadConfigFile = async (filePath: string | undefined): Promise<SettingsLayer> => {
  if (!filePath) {
    return {};
  }
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigFatalError(`Cannot read config file: ${toErrorMessage(error)}`, filePath);
  }
  return parseConfigFile(text, filePath);
};

/**
 * Maps the supported environment variables onto a settings layer. Empty values are ignored.
 */
export const settingsFromEnv = (env: NodeJS.ProcessEnv): SettingsLayer => {
  const read = (name: string): string | undefined => {
    const value = env[name]?.trim();
    return value ? value : undefined;
  };

  const layer: SettingsLayer = {};
  const outputDir = read('OUTPUT_DIR');
  const quality = read('MP3_QUALITY');
  const rateLimit = read('RATE_LIMIT');
  const maxRetries = read('MAX_RETRIES');
  const retryDelay = read('RETRY_DELAY');
  const logFile = read('LOG_FILE');
  const verbose = read('VERBOSE');
  const interval = read('WATCHDOG_INTERVAL');
  const archiveFile = read('ARCHIVE_FILE');
  const playlistsFile = read('PLAYLISTS_FILE');

  if (outputDir) layer.outputDir = outputDir;
  if (quality) layer.quality = normalizeQuality(quality);
  if (rateLimit) layer.rateLimit = parseFlag(rateLimit, 'RATE_LIMIT');
  if (maxRetries) layer.maxRetries = parseNonNegativeInt(maxRetries, 'MAX_RETRIES');
  if (retryDelay) layer.retryDelay = parseNonNegativeInt(retryDelay, 'RETRY_DELAY');
  if (logFile) layer.logFile = logFile;
  if (verbose) layer.verbose = parseFlag(verbose, 'VERBOSE');
  if (interval) layer.pollInterval = parseNonNegativeInt(interval, 'WATCHDOG_INTERVAL');
  if (archiveFile) layer.archiveFile = archiveFile;
  if (playlistsFile) layer.playlistsFile = playlistsFile;
  return layer;
};

/**
 * Merges layers in ascending precedence (later layers win) over the built-in
 * defaults. Undefined values never override.
 */
export const mergeSettings = (...layers: SettingsLayer[]): Settings => {
  const merged: SettingsLayer = { ...DEFAULT_SETTINGS };
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) {
        Object.assign(merged, { [key]: value });
      }
    }
  }

  const outputDir = merged.outputDir ?? DEFAULT_SETTINGS.outputDir;
  return Object.freeze({
    ...DEFAULT_SETTINGS,
    ...merged,
    outputDir,
    archiveFile: merged.archiveFile ?? path.join(outputDir, ARCHIVE_FILE_NAME),
  });
};

export interface SettingsSources {
  readonly file?: SettingsLayer;
  readonly env?: SettingsLayer;
  readonly cli?: SettingsLayer;
  /** `--watch` turns on watchdog mode at the default interval if nothing set one. */
  readonly watch?: boolean;
}

/**
 * Resolves the effective settings: defaults < config file < environment < CLI.
 */
export const resolveSettings = ({ file = {}, env = {}, cli = {}, watch = false }: SettingsSources): Settings => {
  const settings = mergeSettings(file, env, cli);
  if (watch && settings.pollInterval <= 0) {
    return Object.freeze({ ...settings, pollInterval: DEFAULT_POLL_INTERVAL });
  }
  return settings;
};
