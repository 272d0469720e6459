/**
 * File-backed state store
 *
 * The whole state is one pretty-printed JSON document. Saving writes a
 * temporary sibling file and renames it over the target so that a crash
 * mid-write leaves the previous state intact.
 */

import { readFile, writeFile, rename } from 'node:fs/promises';
import type { NotifierState, StateFileApi, StateStore, StateStoreDependencies, StateStoreOptions } from './types';
import { createInitialState } from './state';
import { serializeState, deserializeState, parseStateRecord } from './serialization';
import { StateStoreError, errorMessage } from '$types/errors';

/**
 * node:fs backed file API
 */
export const nodeStateFileApi: StateFileApi = {
  readFile: (path) => readFile(path, 'utf8'),
  writeFile: (path, data) => writeFile(path, data, 'utf8'),
  rename: (from, to) => rename(from, to)
};

function isFileMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Create a state store
 *
 * @param options - File path and window span
 * @param dependencies - Logger and optional file API
 */
export function createStateStore(
  options: StateStoreOptions,
  dependencies: StateStoreDependencies
): StateStore {
  const logger = dependencies.logger;
  const fileApi = dependencies.fileApi ?? nodeStateFileApi;
  const tmpPath = options.filePath + '.tmp';

  async function load(): Promise<NotifierState> {
    let content: string;
    try {
      content = await fileApi.readFile(options.filePath);
    } catch (err) {
      if (isFileMissing(err)) {
        logger.debug('No state file at ' + options.filePath + ', starting fresh');
        return createInitialState(options.windowMinutes);
      }
      throw new StateStoreError('Failed to read state file ' + options.filePath + ': ' + errorMessage(err), { cause: err });
    }

    const parsed = parseStateRecord(content);
    if (!parsed.ok) {
      logger.warning('Ignoring corrupt state file ' + options.filePath + ': ' + parsed.reason);
      return createInitialState(options.windowMinutes);
    }

    logger.debug('Loaded state from ' + options.filePath);
    return deserializeState(parsed.record, options.windowMinutes);
  }

  async function save(state: NotifierState): Promise<void> {
    const content = JSON.stringify(serializeState(state), null, 4);
    try {
      await fileApi.writeFile(tmpPath, content);
      await fileApi.rename(tmpPath, options.filePath);
      logger.debug('Saved state to ' + options.filePath);
    } catch (err) {
      logger.warning('Failed to save state to ' + options.filePath + ': ' + errorMessage(err));
    }
  }

  return {
    load: load,
    save: save
  };
}
