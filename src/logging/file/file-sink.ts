/**
 * Rotating file sink
 *
 * Appends "ISO-time|LEVEL  | message" lines to a log file. When a write would
 * push the file past maxBytes it is rolled: path.(N-1) -> path.N, ...,
 * path -> path.1, and the oldest backup is removed.
 */

import fs from 'node:fs';
import type { LogSink, LogRecord, FileSinkConfig } from '../types';
import { formatFileLine } from '../helpers';

/**
 * File system calls used by the sink
 */
export interface FileSinkFs {
  appendFileSync(path: string, data: string): void;
  existsSync(path: string): boolean;
  statSync(path: string): { size: number };
  renameSync(from: string, to: string): void;
  rmSync(path: string, options: { force: boolean }): void;
}

/**
 * Current size of a file, 0 if it does not exist
 */
function fileSize(fileApi: FileSinkFs, path: string): number {
  return fileApi.existsSync(path) ? fileApi.statSync(path).size : 0;
}

/**
 * Shift backups up by one and move the live file to path.1
 */
export function rollOver(fileApi: FileSinkFs, config: FileSinkConfig): void {
  if (config.backupCount <= 0) {
    fileApi.rmSync(config.path, { force: true });
    return;
  }

  fileApi.rmSync(config.path + '.' + config.backupCount, { force: true });
  for (let i = config.backupCount - 1; i >= 1; i--) {
    const source = config.path + '.' + i;
    if (fileApi.existsSync(source)) {
      fileApi.renameSync(source, config.path + '.' + (i + 1));
    }
  }
  if (fileApi.existsSync(config.path)) {
    fileApi.renameSync(config.path, config.path + '.1');
  }
}

/**
 * Create a rotating file sink
 *
 * @param config - Path, size limit and backup count
 * @param fileApi - File system calls, node:fs by default
 * @returns File sink
 */
export function createRotatingFileSink(
  config: FileSinkConfig,
  fileApi: FileSinkFs = fs
): LogSink {
  let size = fileSize(fileApi, config.path);

  function write(record: LogRecord): void {
    const line = formatFileLine(record.time, record.levelName, record.message) + '\n';
    const bytes = Buffer.byteLength(line, 'utf8');

    if (config.maxBytes > 0 && size > 0 && size + bytes > config.maxBytes) {
      rollOver(fileApi, config);
      size = 0;
    }

    fileApi.appendFileSync(config.path, line);
    size += bytes;
  }

  return {
    write: write
  };
}
