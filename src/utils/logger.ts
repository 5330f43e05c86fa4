/**
 * Scoped, leveled logging over console.
 *
 * Everything goes to stderr so that stdout stays reserved for command
 * output (JSON from `label`, counts from `collect`).
 */

import type { LogLevel } from '../types/index.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

export interface Logger {
  debug(message: string, extra?: unknown): void;
  info(message: string, extra?: unknown): void;
  warn(message: string, extra?: unknown): void;
  error(message: string, extra?: unknown): void;
}

export function formatLogLine(scope: string, level: LogLevel, message: string, extra?: unknown, now: Date = new Date()): string {
  const suffix = extra === undefined ? '' : ' ' + JSON.stringify(extra);
  return `[${now.toISOString()}] [${scope}] [${level}] ${message}${suffix}`;
}

export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, message: string, extra?: unknown): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
    console.error(formatLogLine(scope, level, message, extra));
  };

  return {
    debug: (message, extra) => write('debug', message, extra),
    info: (message, extra) => write('info', message, extra),
    warn: (message, extra) => write('warn', message, extra),
    error: (message, extra) => write('error', message, extra),
  };
}
