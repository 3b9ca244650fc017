/**
 * Simple logging utility for the follow-up watcher
 */

import { parseLogLevel, type LogLevel } from './config.js';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLevel: LogLevel = parseLogLevel(process.env['LOG_LEVEL'] ?? 'info');

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) {
    return arg.stack ?? arg.message;
  }
  switch (typeof arg) {
    case 'string':
      return arg;
    case 'number':
    case 'boolean':
      return String(arg);
    case 'undefined':
      return 'undefined';
    case 'object':
      return arg === null ? 'null' : JSON.stringify(arg, null, 2);
    default:
      // symbols, functions, bigints
      return '[unknown]';
  }
}

function formatMessage(level: LogLevel, message: string, args: unknown[]): string {
  const prefix = `[${new Date().toISOString()}] [${level.toUpperCase()}]`;
  const parts = [prefix, message, ...args.map(formatArg)];
  return parts.join(' ');
}

const WRITERS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

function write(level: LogLevel, message: string, args: unknown[]): void {
  if (LOG_LEVELS[level] >= LOG_LEVELS[currentLevel]) {
    WRITERS[level](formatMessage(level, message, args));
  }
}

export const log = {
  debug(message: string, ...args: unknown[]): void {
    write('debug', message, args);
  },

  info(message: string, ...args: unknown[]): void {
    write('info', message, args);
  },

  warn(message: string, ...args: unknown[]): void {
    write('warn', message, args);
  },

  error(message: string, ...args: unknown[]): void {
    write('error', message, args);
  },
};
