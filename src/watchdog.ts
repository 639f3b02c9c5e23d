import { toErrorMessage } from './errors.js';
import type { Logger } from './logger.js';
import { sleep as defaultSleep, type Sleep } from './utils.js';

export type WatchdogState = 'running' | 'stopped';

export interface WatchdogOptions {
  readonly intervalSeconds: number;
  readonly runPass: () => Promise<unknown>;
  /** Observed only between passes; an in-flight pass always completes. */
  readonly signal: AbortSignal;
  readonly logger: Logger;
  readonly sleep?: Sleep;
}

export interface WatchdogResult {
  readonly state: WatchdogState;
  readonly passes: number;
  readonly failedPasses: number;
}

/**
 * Runs a pass, sleeps `intervalSeconds`, and repeats until the signal is aborted.
 * Pass errors are logged and the loop keeps going.
 */
export const runWatchdog = async ({
  intervalSeconds,
  runPass,
  signal,
  logger,
  sleep = defaultSleep,
}: WatchdogOptions): Promise<WatchdogResult> => {
  let state: WatchdogState = 'running';
  let passes = 0;
  let failedPasses = 0;

  logger.info(`Watchdog active: interval=${intervalSeconds}s`);

  while (state === 'running') {
    try {
      await runPass();
    } catch (error) {
      failedPasses += 1;
      logger.error(`Watchdog pass failed: ${toErrorMessage(error)}`);
    }
    passes += 1;

    if (signal.aborted) {
      state = 'stopped';
      break;
    }

    logger.debug(`Next check in ${intervalSeconds}s`);
    await sleep(intervalSeconds * 1000, signal);
    if (signal.aborted) {
      state = 'stopped';
    }
  }

  logger.info(`Watchdog stopped after ${passes} pass(es)`);
  return { state, passes, failedPasses };
};
