/**
 * Scoped, level-gated console loggers.
 *
 * The level defaults to 'warn', so debug traces from the scroll loop stay
 * quiet unless asked for. Turn them on from the browser with
 * `localStorage.setItem('drag_scroller_log_level', 'debug')` or a
 * `?drag_scroller_log_level=debug` query parameter, or call `setLogLevel`.
 */

import type { ScrollLogger } from '@/lib/types';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/** A level, or `false` to silence everything. */
export type LevelOption = LogLevel | false;

const LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

const DEFAULT_LEVEL: LogLevel = 'warn';

export const LOG_LEVEL_KEY = 'drag_scroller_log_level';

/**
 * Parse a level name. Unknown values fall back to the default; 'off'
 * disables output.
 */
export function parseLogLevel(value: string | null | undefined): LevelOption {
  if (!value) return DEFAULT_LEVEL;
  const normalized = value.trim().toLowerCase();
  if (normalized === 'off' || normalized === 'false') return false;
  return LEVELS.find((level) => level === normalized) ?? DEFAULT_LEVEL;
}

function readConfiguredLevel(): string | null {
  if (typeof window === 'undefined') return null;
  try {
    const stored = window.localStorage?.getItem(LOG_LEVEL_KEY);
    if (stored) return stored;
  } catch {
    // storage is blocked in some sandboxed frames
  }
  return new URLSearchParams(window.location.search).get(LOG_LEVEL_KEY);
}

let currentLevel: LevelOption = parseLogLevel(readConfiguredLevel());

export function getLogLevel(): LevelOption {
  return currentLevel;
}

export function setLogLevel(level: LevelOption): void {
  currentLevel = level;
}

function enabled(level: LogLevel): boolean {
  return currentLevel !== false && LEVELS.indexOf(level) <= LEVELS.indexOf(currentLevel);
}

export interface ScopedLogger extends ScrollLogger {
  error(...params: unknown[]): void;
  info(...params: unknown[]): void;
}

export function createLogger(scope: string): ScopedLogger {
  const prefix = `[${scope}]`;
  return {
    error: (...params) => {
      if (enabled('error')) console.error(prefix, ...params);
    },
    warn: (...params) => {
      if (enabled('warn')) console.warn(prefix, ...params);
    },
    info: (...params) => {
      if (enabled('info')) console.info(prefix, ...params);
    },
    debug: (...params) => {
      if (enabled('debug')) console.debug(prefix, ...params);
    },
  };
}
