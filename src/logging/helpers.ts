/**
 * Logging helper functions
 */

import type { LogLevel, LogLevels, LogLevelName } from './types';

/**
 * Log level constants
 */
export const LOG_LEVELS: LogLevels = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  ERROR: 3
};

const LEVEL_NAMES: readonly LogLevelName[] = ['DEBUG', 'INFO', 'WARNING', 'ERROR'];

/** Width of the level column; fits WARNING */
const LEVEL_COLUMN_WIDTH = 7;

/**
 * Name of a log level
 */
export function getLevelName(level: LogLevel): LogLevelName {
  return LEVEL_NAMES[level];
}

/**
 * Level name padded to the level column
 *
 * @example
 * formatLevelTag('INFO') // "INFO   "
 */
export function formatLevelTag(name: LogLevelName): string {
  return name.padEnd(LEVEL_COLUMN_WIDTH, ' ');
}

/**
 * Format a console line: "LEVEL  | message"
 */
export function formatConsoleLine(name: LogLevelName, msg: string): string {
  return formatLevelTag(name) + '| ' + msg;
}

/**
 * Format a file line: "ISO-time|LEVEL  | message"
 * @param time - Epoch milliseconds
 */
export function formatFileLine(time: number, name: LogLevelName, msg: string): string {
  return new Date(time).toISOString() + '|' + formatConsoleLine(name, msg);
}

/**
 * Check if message should be logged at the current level
 */
export function shouldLog(level: LogLevel, currentLevel: LogLevel): boolean {
  return level >= currentLevel;
}
