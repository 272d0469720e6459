/**
 * Console output sink
 *
 * Writes "LEVEL  | message" lines. DEBUG and INFO go to stdout, WARNING and
 * ERROR to stderr. The level tag is coloured with chalk unless colours are off
 * (log files, non-TTY output, NO_COLOR).
 */

import chalk from 'chalk';
import type { Chalk } from 'chalk';
import type { LogSink, LogRecord, ConsoleSinkConfig, ConsoleAPI, LogLevelName } from '../types';
import { formatLevelTag } from '../helpers';

/**
 * Colour a padded level tag
 */
function colorize(painter: Chalk, name: LogLevelName, tag: string): string {
  switch (name) {
    case 'DEBUG':
      return painter.gray(tag);
    case 'INFO':
      return painter.green(tag);
    case 'WARNING':
      return painter.yellow(tag);
    case 'ERROR':
      return painter.red.bold(tag);
  }
}

/**
 * Create a console sink
 *
 * @param consoleApi - Console API for output (global console object)
 * @param config - Sink configuration
 * @returns Console sink
 *
 * @example
 * ```typescript
 * const consoleSink = createConsoleSink(console, { colors: process.stdout.isTTY === true });
 * consoleSink.write({ level: 1, levelName: 'INFO', message: 'hello', time: Date.now() });
 * ```
 */
export function createConsoleSink(
  consoleApi: ConsoleAPI,
  config: ConsoleSinkConfig
): LogSink {
  const painter = new chalk.Instance({ level: config.colors ? 1 : 0 });

  function write(record: LogRecord): void {
    const line = colorize(painter, record.levelName, formatLevelTag(record.levelName)) + '| ' + record.message;
    if (record.levelName === 'WARNING' || record.levelName === 'ERROR') {
      consoleApi.error(line);
    } else {
      consoleApi.log(line);
    }
  }

  return {
    write: write
  };
}
