import { createWriteStream, mkdirSync, type WriteStream } from 'fs';
import { join } from 'path';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Path of the run's log file, when file logging is enabled. */
  readonly logFile: string | undefined;
  /** Flushes and closes the log file; later lines go to the console only. */
  close(): Promise<void>;
}

export interface LoggerOptions {
  /** Print `[DEBUG]` lines to the console (always written to the log file). */
  verbose?: boolean;
  /** Directory for `analysis_<timestamp>.log`; omit to log to the console only. */
  logDir?: string;
  /** Console sink (default: stderr, keeping stdout free for command output). */
  write?: (line: string) => void;
  now?: () => Date;
}

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

/** `analysis_20240315_093005.log` */
export function logFileName(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `analysis_${day}_${time}.log`;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const now = options.now ?? (() => new Date());
  const write = options.write ?? ((line: string) => console.error(line));
  const verbose = options.verbose ?? false;

  let stream: WriteStream | undefined;
  let logFile: string | undefined;
  if (options.logDir !== undefined) {
    mkdirSync(options.logDir, { recursive: true });
    logFile = join(options.logDir, logFileName(now()));
    const file = logFile;
    stream = createWriteStream(file, { flags: 'a', encoding: 'utf-8' });
    // An unwritable log file degrades to console-only logging.
    stream.on('error', (error) => {
      stream = undefined;
      write(`[WARN] Cannot write log file ${file}: ${error.message}`);
    });
  }

  const log = (level: LogLevel, message: string): void => {
    if (level !== 'DEBUG' || verbose) {
      write(`[${level}] ${message}`);
    }
    stream?.write(`${now().toISOString()} - ${level} - ${message}\n`);
  };

  return {
    debug: (message) => log('DEBUG', message),
    info: (message) => log('INFO', message),
    warn: (message) => log('WARN', message),
    error: (message) => log('ERROR', message),
    logFile,
    close: () =>
      new Promise<void>((resolvePromise) => {
        const current = stream;
        if (current === undefined) {
          resolvePromise();
          return;
        }
        // A write failure is already reported by the stream's error listener.
        current.once('error', () => resolvePromise());
        current.end(() => resolvePromise());
        stream = undefined;
      }),
  };
}
