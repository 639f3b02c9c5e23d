import path from 'node:path';
import fs from 'fs-extra';
import { toErrorMessage } from './errors.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  readonly debug: (message: string) => void;
  readonly info: (message: string) => void;
  readonly warn: (message: string) => void;
  readonly error: (message: string) => void;
}

export interface LoggerOptions {
  readonly verbose?: boolean;
  /** Every line is also appended here, timestamped. Empty means console only. */
  readonly logFile?: string;
}

/**
 * Formats a log file line the same way for every level.
 */
export const formatLogLine = (level: LogLevel, message: string, date: Date = new Date()): string =>
  `[${date.toISOString()}] ${level.toUpperCase()} ${message}\n`;

/**
 * Opens the log file for appending, falling back to console-only output when the
 * directory cannot be created or the file is not writable.
 */
const prepareLogFile = (logFile: string): string | undefined => {
  try {
    fs.ensureDirSync(path.dirname(logFile));
    fs.appendFileSync(logFile, '');
    return logFile;
  } catch (error) {
    console.warn(`Log file ${logFile} is not writable, logging to console only: ${toErrorMessage(error)}`);
    return undefined;
  }
};

/**
 * Creates the process logger. Console output mirrors what is written to the log file.
 */
export const createLogger = ({ verbose = false, logFile }: LoggerOptions = {}): Logger => {
  const target = logFile ? prepareLogFile(logFile) : undefined;

  const write = (level: LogLevel, message: string): void => {
    if (level === 'debug' && !verbose) {
      return;
    }
    if (level === 'error') {
      console.error(message);
    } else if (level === 'warn') {
      console.warn(message);
    } else {
      console.log(message);
    }
    if (target) {
      fs.appendFileSync(target, formatLogLine(level, message));
    }
  };

  return {
    debug: (message) => write('debug', message),
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
  };
};
