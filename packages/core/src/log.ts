/**
 * Prefixed status lines on stderr.
 *
 * Results a command prints for the operator go to stdout; everything a run
 * reports about itself goes through a Logger so it can also be kept in the
 * org's scaninfo directory.
 */

import { appendFileSync } from 'node:fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Same sinks and level, different prefix. */
  child(scope: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  stream?: NodeJS.WritableStream & { isTTY?: boolean };
  /** Appends uncoloured, timestamped lines to this file as well. */
  file?: string;
  now?: () => Date;
}

const COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m',
  info: '\x1b[36m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

const RESET = '\x1b[0m';

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const stream = options.stream ?? process.stderr;
  const now = options.now ?? (() => new Date());
  const threshold = LOG_LEVELS.indexOf(level);
  const color = stream.isTTY === true;

  function emit(lvl: LogLevel, message: string): void {
    if (LOG_LEVELS.indexOf(lvl) < threshold) return;

    const prefix = color ? `${COLORS[lvl]}[${scope}]${RESET}` : `[${scope}]`;
    stream.write(`${prefix} ${message}\n`);

    if (options.file) {
      appendFileSync(options.file, `${now().toISOString()} ${lvl.toUpperCase()} [${scope}] ${message}\n`, 'utf-8');
    }
  }

  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message) => emit('error', message),
    child: (child) => createLogger(`${scope}:${child}`, options),
  };
}

/** Discards everything; for library callers that pass no logger. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};
