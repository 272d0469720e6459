/**
 * Logging module barrel export
 *
 * The logging system includes:
 * - Logger coordinator (createLogger)
 * - Console sink with coloured level tags (createConsoleSink)
 * - Rotating file sink (createRotatingFileSink)
 * - Pure format and filter functions
 */

export {
  LOG_LEVELS,
  getLevelName,
  formatLevelTag,
  formatConsoleLine,
  formatFileLine,
  shouldLog
} from './helpers';
export { createConsoleSink } from './console';
export { createRotatingFileSink, rollOver } from './file';
export { createLogger } from './logger';

export type { FileSinkFs } from './file';
export type {
  LogLevel,
  LogLevels,
  LogLevelName,
  Logger,
  LoggerConfig,
  LoggerDependencies,
  SinkWithLevel,
  LogRecord,
  LogSink,
  ConsoleSinkConfig,
  ConsoleAPI,
  FileSinkConfig
} from './types';
