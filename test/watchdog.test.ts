import path from 'node:path';
import fs from 'fs-extra';
import { describe, expect, it, vi } from 'vitest';
import { mergeSettings } from '../src/config.js';
import { runSyncPass } from '../src/sync.js';
import { runWatchdog } from '../src/watchdog.js';
import { createMemoryLogger, makeTempDir, StubEngine, StubTagWriter } from './testUtils.js';

describe('runWatchdog', () => {
  it('stops after the pass during which the signal arrived', async () => {
    const controller = new AbortController();
    let passes = 0;
    const runPass = vi.fn(async () => {
      passes += 1;
      if (passes === 2) {
        controller.abort();
      }
    });
    const sleep = vi.fn(async () => undefined);

    const result = await runWatchdog({
      intervalSeconds: 1,
      runPass,
      signal: controller.signal,
      logger: createMemoryLogger(),
      sleep,
    });

    expect(result).toEqual({ state: 'stopped', passes: 2, failedPasses: 0 });
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(1000, controller.signal);
  });

  it('stops when the signal arrives while sleeping', async () => {
    const controller = new AbortController();
    const runPass = vi.fn(async () => undefined);

    const result = await runWatchdog({
      intervalSeconds: 600,
      runPass,
      signal: controller.signal,
      logger: createMemoryLogger(),
      sleep: async () => {
        controller.abort();
      },
    });

    expect(result.passes).toBe(1);
    expect(runPass).toHaveBeenCalledTimes(1);
  });

  it('logs a failed pass and keeps going', async () => {
    const controller = new AbortController();
    const logger = createMemoryLogger();
    const runPass = vi
      .fn<[], Promise<void>>()
      .mockRejectedValueOnce(new Error('network down'))
      .mockImplementationOnce(async () => {
        controller.abort();
      });

    const result = await runWatchdog({
      intervalSeconds: 1,
      runPass,
      signal: controller.signal,
      logger,
      sleep: async () => undefined,
    });

    expect(result).toEqual({ state: 'stopped', passes: 2, failedPasses: 1 });
    expect(logger.messages).toContainEqual({ level: 'error', message: 'Watchdog pass failed: network down' });
    expect(logger.messages.at(-1)).toEqual({ level: 'info', message: 'Watchdog stopped after 2 pass(es)' });
  });

  it('re-runs a full sync pass on every tick', async () => {
    const dir = await makeTempDir();
    const playlistsFile = path.join(dir, 'playlists.txt');
    await fs.writeFile(playlistsFile, 'https://example/empty\n');
    const settings = mergeSettings({ outputDir: path.join(dir, 'out'), playlistsFile, pollInterval: 1 });

    const controller = new AbortController();
    const engine = new StubEngine({ 'https://example/empty': { items: [] } }, (call) => {
      if (call === 2) {
        controller.abort();
      }
    });
    const logger = createMemoryLogger();

    const result = await runWatchdog({
      intervalSeconds: settings.pollInterval,
      runPass: () => runSyncPass(settings, { engine, tagWriter: new StubTagWriter(), logger }),
      signal: controller.signal,
      logger,
    });

    expect(result).toEqual({ state: 'stopped', passes: 2, failedPasses: 0 });
    expect(engine.requests).toHaveLength(2);
  });
});
