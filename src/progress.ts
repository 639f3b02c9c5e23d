import cliProgress from 'cli-progress';
import type { PlaylistItem } from './types.js';

export interface ProgressReporter {
  readonly update: (item: PlaylistItem, fraction: number) => void;
  readonly stop: () => void;
}

/**
 * Truncates long titles so progress bars remain readable in narrower terminals.
 */
export const truncateTitle = (value: string, maxLength = 42): string =>
  value.length <= maxLength ? value : `${value.slice(0, maxLength - 3)}...`;

/**
 * Draws one progress bar per item being downloaded. Does nothing when stdout is
 * not a terminal (container logs).
 */
export const createProgressReporter = (enabled = Boolean(process.stdout.isTTY)): ProgressReporter => {
  if (!enabled) {
    return { update: () => undefined, stop: () => undefined };
  }

  let bar: cliProgress.SingleBar | undefined;
  let currentId: string | undefined;

  const stop = (): void => {
    bar?.stop();
    bar = undefined;
    currentId = undefined;
  };

  const update = (item: PlaylistItem, fraction: number): void => {
    const title = truncateTitle(item.title ?? item.videoId);
    const percent = Math.min(100, Math.max(0, Math.floor(fraction * 100)));
    if (!bar || currentId !== item.archiveId) {
      stop();
      bar = new cliProgress.SingleBar(
        { clearOnComplete: false, hideCursor: true, format: '{bar} {percentage}% | {title}' },
        cliProgress.Presets.shades_grey,
      );
      bar.start(100, percent, { title });
      currentId = item.archiveId;
      return;
    }
    bar.update(percent, { title });
  };

  return { update, stop };
};
