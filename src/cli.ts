import path from 'node:path';
import { normalizeQuality, parseNonNegativeInt, type SettingsLayer } from './config.js';
import { ConfigFatalError } from './errors.js';

export interface CliArgs {
  readonly help: boolean;
  readonly watch: boolean;
  readonly configFile?: string;
  readonly settings: SettingsLayer;
}

/**
 * Parses incoming CLI arguments. Only flags that were given end up in `settings`,
 * so lower-precedence sources keep their values otherwise.
 */
export const parseArgs = (argv: readonly string[], cwd: string = process.cwd()): CliArgs => {
  const settings: SettingsLayer = {};
  let help = false;
  let watch = false;
  let configFile: string | undefined;

  const args = [...argv];
  for (let i = 0; i < args.length; i += 1) {
    const raw = args[i] ?? '';
    const eq = raw.startsWith('--') ? raw.indexOf('=') : -1;
    const arg = eq > 0 ? raw.slice(0, eq) : raw;
    const inline = eq > 0 ? raw.slice(eq + 1) : undefined;

    const value = (): string => {
      if (inline !== undefined) {
        return inline;
      }
      const next = args[i + 1];
      if (next === undefined || (next.startsWith('-') && next.length > 1)) {
        throw new ConfigFatalError(`Option ${arg} needs a value`);
      }
      i += 1;
      return next;
    };

    switch (arg) {
      case '--help':
      case '-h':
        help = true;
        break;
      case '--file':
      case '-f':
        settings.playlistsFile = path.resolve(cwd, value());
        break;
      case '--config':
      case '-c':
        configFile = path.resolve(cwd, value());
        break;
      case '--watch':
        watch = true;
        break;
      case '--interval':
        settings.pollInterval = parseNonNegativeInt(value(), '--interval');
        break;
      case '--output-dir':
      case '-o':
        settings.outputDir = path.resolve(cwd, value());
        break;
      case '--quality':
      case '-q':
        settings.quality = normalizeQuality(value());
        break;
      case '--rate-limit':
      case '-r':
        settings.rateLimit = true;
        break;
      case '--retries':
        settings.maxRetries = parseNonNegativeInt(value(), '--retries');
        break;
      case '--retry-delay':
        settings.retryDelay = parseNonNegativeInt(value(), '--retry-delay');
        break;
      case '--archive-file':
        settings.archiveFile = path.resolve(cwd, value());
        break;
      case '--log-file':
        settings.logFile = path.resolve(cwd, value());
        break;
      case '--verbose':
      case '-v':
        settings.verbose = true;
        break;
      default:
        throw new ConfigFatalError(`Unknown argument: ${raw}. Use --help for usage.`);
    }
  }

  return { help, watch, ...(configFile ? { configFile } : {}), settings };
};

/**
 * Displays a concise help menu describing supported CLI options.
 */
export const printHelp = (): void => {
  console.log('\nPlaylist MP3 sync\n');
  console.log('Usage:');
  console.log('  playlist-mp3-sync -f playlists.txt            # Download every playlist once');
  console.log('  playlist-mp3-sync -f playlists.txt --watch    # Re-check playlists every 600s');
  console.log('\nplaylists.txt lines: Album|Artist|URL, Album|URL or URL. Lines starting with # are ignored.');
  console.log('\nOptions:');
  console.log('  -f, --file <path>          Playlist file (PLAYLISTS_FILE)');
  console.log('  -c, --config <path>        YAML config file (CONFIG_FILE)');
  console.log('      --watch                Keep running and re-check playlists');
  console.log('      --interval <seconds>   Watchdog interval, 0 runs once (WATCHDOG_INTERVAL)');
  console.log('  -o, --output-dir <path>    Download root (OUTPUT_DIR, default /downloads)');
  console.log('  -q, --quality <q>          0-9 VBR level or bitrate like 320k (MP3_QUALITY, default 320k)');
  console.log('  -r, --rate-limit           Wait 1-5s between items (RATE_LIMIT=1)');
  console.log('      --retries <n>          Attempts per item (MAX_RETRIES, default 3)');
  console.log('      --retry-delay <s>      Base retry backoff in seconds (RETRY_DELAY, default 10)');
  console.log('      --archive-file <path>  Download archive (ARCHIVE_FILE)');
  console.log('      --log-file <path>      Also log to this file (LOG_FILE)');
  console.log('  -v, --verbose              Debug logging (VERBOSE=1)');
  console.log('  -h, --help                 Show this help message');
  console.log('\nPrecedence: CLI flags > environment > config file > defaults.');
};
