#!/usr/bin/env node
import process from 'node:process';
import { parseArgs, printHelp } from './cli.js';
import { loadConfigFile, resolveSettings, settingsFromEnv } from './config.js';
import { checkExternalTools } from './download.js';
import { MediaEngine } from './engine.js';
import { ConfigFatalError, toErrorMessage } from './errors.js';
import { createLogger } from './logger.js';
import { createProgressReporter } from './progress.js';
import { exitCodeForSummary, runSyncPass } from './sync.js';
import { Id3TagWriter } from './tags.js';
import { runWatchdog } from './watchdog.js';

/**
 * Entry point: resolves settings, checks the external tools, then runs once or
 * keeps watching until SIGINT/SIGTERM.
 */
const main = async (): Promise<void> => {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    printHelp();
    return;
  }

  const settings = resolveSettings({
    file: await loadConfigFile(args.configFile ?? process.env.CONFIG_FILE),
    env: settingsFromEnv(process.env),
    cli: args.settings,
    watch: args.watch,
  });
  const logger = createLogger({ verbose: settings.verbose, logFile: settings.logFile });

  if (!settings.playlistsFile) {
    throw new ConfigFatalError('Missing -f/--file (playlists.txt).');
  }

  const { ytDlpVersion } = await checkExternalTools();
  logger.debug(`yt-dlp ${ytDlpVersion}, output: ${settings.outputDir}, quality: ${settings.quality}`);
  logger.info(`Using archive file: ${settings.archiveFile}`);

  const progress = createProgressReporter();
  const dependencies = {
    engine: new MediaEngine({ logger, retryDelayMs: settings.retryDelay * 1000 }),
    tagWriter: new Id3TagWriter(),
    logger,
    onProgress: progress.update,
    onPlaylistDone: progress.stop,
  };

  if (settings.pollInterval <= 0) {
    const summary = await runSyncPass(settings, dependencies);
    process.exitCode = exitCodeForSummary(summary);
    return;
  }

  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals): void => {
    logger.info(`Received ${signal}, stopping after the current pass...`);
    controller.abort();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  await runWatchdog({
    intervalSeconds: settings.pollInterval,
    runPass: () => runSyncPass(settings, dependencies),
    signal: controller.signal,
    logger,
  });
  process.exitCode = 0;
};

void main().catch((error: unknown) => {
  if (error instanceof ConfigFatalError) {
    console.error(error.context ? `${error.message} (${error.context})` : error.message);
    process.exitCode = error.exitCode;
    return;
  }
  console.error(`Fatal error: ${toErrorMessage(error)}`);
  process.exit(1);
});
