import type { Writable } from 'stream';
import winston from 'winston';
import type { LogLevel } from './config.js';

const ANSI = {
  bold: '\u001b[1m',
  gray: '\u001b[90m',
  reset: '\u001b[0m',
} as const;

const LEVEL_COLORS: Record<string, string> = {
  debug: '\u001b[36m',
  info: '\u001b[32m',
  warn: '\u001b[33m',
  error: '\u001b[31m',
};

const LEVEL_ICONS: Record<string, string> = {
  debug: '🔍',
  info: '✅',
  warn: '⚠️',
  error: '❌',
};

const TIMESTAMP_FORMAT = 'YYYY-MM-DD HH:mm:ss';

export interface LoggerOptions {
  colors?: boolean;
  /** Write to this stream instead of the console. */
  stream?: Writable;
  silent?: boolean;
}

function scopePrefix(scope: unknown): string {
  return typeof scope === 'string' && scope !== '' ? `[${scope}] ` : '';
}

const plainFormat = winston.format.printf((info) => {
  const message = `${scopePrefix(info.scope)}${String(info.message)}`;
  return `${String(info.timestamp)} - ${info.level.toUpperCase()} - ${message}`;
});

const coloredFormat = winston.format.printf((info) => {
  const color = LEVEL_COLORS[info.level] ?? '';
  const icon = LEVEL_ICONS[info.level] ?? '';
  const level = `${color}${ANSI.bold}${icon} ${info.level.toUpperCase()}${ANSI.reset}`;
  const message = `${color}${scopePrefix(info.scope)}${String(info.message)}${ANSI.reset}`;
  return `${ANSI.gray}${String(info.timestamp)}${ANSI.reset} ${level} ${message}`;
});

export function shouldUseColors(): boolean {
  return Boolean(process.stdout.isTTY) && !process.env.NO_COLOR;
}

/**
 * Console logger. Colored lines with level icons on a terminal, plain
 * `timestamp - LEVEL - message` lines otherwise (CI, Docker logs).
 */
export function createLogger(level: LogLevel = 'info', options: LoggerOptions = {}): winston.Logger {
  const colors = options.colors ?? shouldUseColors();

  return winston.createLogger({
    level,
    format: winston.format.combine(
      winston.format.timestamp({ format: TIMESTAMP_FORMAT }),
      colors ? coloredFormat : plainFormat,
    ),
    silent: options.silent,
    transports: [
      options.stream ? new winston.transports.Stream({ stream: options.stream }) : new winston.transports.Console(),
    ],
  });
}

let _rootLogger: winston.Logger | null = null;

/**
 * Shared application logger. `scope` tags each line with the module it
 * came from.
 */
export function getLogger(scope?: string): winston.Logger {
  if (!_rootLogger) {
    _rootLogger = createLogger();
  }
  return scope ? _rootLogger.child({ scope }) : _rootLogger;
}

export function setLogLevel(level: LogLevel): void {
  getLogger().level = level;
}

export type Logger = winston.Logger;
