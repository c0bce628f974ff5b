/**
 * Diagnostics go to stderr with a fixed prefix. stdout belongs to the MCP
 * transport in server mode, so nothing here ever writes there.
 */

export type LogLevel = 'quiet' | 'info' | 'debug';

const PREFIX = '[icp-dat]';
const LEVEL_RANK: Record<LogLevel, number> = { quiet: 0, info: 1, debug: 2 };

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_RANK[currentLevel] >= LEVEL_RANK[level];
}

export function logInfo(...args: unknown[]): void {
  if (enabled('info')) console.error(PREFIX, ...args);
}

export function logDebug(...args: unknown[]): void {
  if (enabled('debug')) console.error(PREFIX, ...args);
}

/** Warnings are shown at every level except quiet. */
export function logWarn(...args: unknown[]): void {
  if (enabled('info')) console.error(PREFIX, 'Warning:', ...args);
}

/** Errors are always shown. */
export function logError(...args: unknown[]): void {
  console.error(PREFIX, ...args);
}
