import { createWriteStream } from 'node:fs';
import { format } from 'node:util';

import { ensureDirectory, expandHome } from '../memory/files.js';
import type { LogLevel } from './logger.js';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function serializeLine(level: LogLevel, args: unknown[], at: Date): string {
  return `[${at.toISOString()}] ${level.toUpperCase()}: ${format(...args)}\n`;
}

export type UnifiedLoggingHandle = {
  filePath: string;
  uninstall: () => void;
};

export interface ConsoleMirrorOptions {
  filePath: string;
  /** Lines below this level reach the terminal but not the file. */
  minLevel?: LogLevel;
  now?: () => Date;
}

/**
 * Mirror console output into one append-only file. Logger writes through
 * console, so cycle logs and ad-hoc console usage land in the same place.
 */
export function installConsoleFileMirror(options: ConsoleMirrorOptions): UnifiedLoggingHandle {
  const filePath = expandHome(options.filePath);
  const minLevel = options.minLevel ?? 'debug';
  const now = options.now ?? (() => new Date());
  ensureDirectory(filePath);
  const stream = createWriteStream(filePath, { flags: 'a' });

  const original = {
    log: console.log,
    warn: console.warn,
    error: console.error,
    debug: console.debug,
  };

  let broken = false;
  stream.on('error', (error) => {
    broken = true;
    original.error.call(console, `console mirror to ${filePath} stopped:`, error);
  });

  const write = (level: LogLevel, args: unknown[]): void => {
    if (broken || LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
    stream.write(serializeLine(level, args, now()));
  };

  console.log = (...args: unknown[]) => {
    write('info', args);
    original.log.apply(console, args);
  };
  console.warn = (...args: unknown[]) => {
    write('warn', args);
    original.warn.apply(console, args);
  };
  console.error = (...args: unknown[]) => {
    write('error', args);
    original.error.apply(console, args);
  };
  console.debug = (...args: unknown[]) => {
    write('debug', args);
    original.debug.apply(console, args);
  };

  const onUnhandledRejection = (reason: unknown) => {
    console.error('unhandledRejection', reason);
  };
  process.on('unhandledRejection', onUnhandledRejection);

  return {
    filePath,
    uninstall: () => {
      console.log = original.log;
      console.warn = original.warn;
      console.error = original.error;
      console.debug = original.debug;
      process.off('unhandledRejection', onUnhandledRejection);
      stream.end();
    },
  };
}
