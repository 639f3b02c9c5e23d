#!/usr/bin/env node
import process from 'node:process';
import { toErrorMessage } from './errors.js';
import { MaintenanceError, parseMaintenanceArgs, runMaintenance } from './maintenance.js';

const printHelp = (): void => {
  console.log('\nMP3 maintenance: clean empty tags, set Album Artist, ReplayGain\n');
  console.log('Usage:');
  console.log('  playlist-mp3-maintenance <album_dir> --clean-empty');
  console.log('  playlist-mp3-maintenance <album_dir> --set-album-artist');
  console.log('  playlist-mp3-maintenance <album_dir> --replaygain');
};

const main = async (): Promise<void> => {
  const args = parseMaintenanceArgs(process.argv.slice(2));
  if (args === 'help') {
    printHelp();
    return;
  }
  console.log(await runMaintenance(args.operation, args.albumDir));
};

void main().catch((error: unknown) => {
  console.error(`ERROR: ${toErrorMessage(error)}`);
  process.exitCode = error instanceof MaintenanceError ? error.exitCode : 1;
});
