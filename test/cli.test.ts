import { describe, expect, it } from 'vitest';
import { parseArgs } from '../src/cli.js';
import { ConfigFatalError } from '../src/errors.js';

describe('parseArgs', () => {
  it('collects only the flags that were given', () => {
    expect(parseArgs(['-f', 'playlists.txt', '--watch', '-q', '320', '--retries=5', '-v'], '/work')).toEqual({
      help: false,
      watch: true,
      settings: {
        playlistsFile: '/work/playlists.txt',
        quality: '320k',
        maxRetries: 5,
        verbose: true,
      },
    });
  });

  it('resolves paths against the working directory', () => {
    const args = parseArgs(['--config', 'conf/app.yml', '-o', '/music', '--log-file=logs/run.log'], '/work');
    expect(args.configFile).toBe('/work/conf/app.yml');
    expect(args.settings).toEqual({ outputDir: '/music', logFile: '/work/logs/run.log' });
  });

  it('parses the watchdog interval and rate limiting', () => {
    expect(parseArgs(['--interval', '30', '-r'], '/work').settings).toEqual({ pollInterval: 30, rateLimit: true });
  });

  it('recognizes help', () => {
    expect(parseArgs(['--help'], '/work').help).toBe(true);
  });

  it('rejects unknown arguments', () => {
    expect(() => parseArgs(['--bogus'], '/work')).toThrow(ConfigFatalError);
  });

  it('rejects an option without its value', () => {
    expect(() => parseArgs(['--interval'], '/work')).toThrow('Option --interval needs a value');
    expect(() => parseArgs(['-f', '-v'], '/work')).toThrow('Option -f needs a value');
  });

  it('rejects invalid numbers', () => {
    expect(() => parseArgs(['--retries', 'three'], '/work')).toThrow(ConfigFatalError);
  });
});
