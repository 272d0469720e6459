/**
 * Controller initialization
 */

import type { Configuration, RuntimeSettings } from '$types/config';
import { createLogger, createConsoleSink, createRotatingFileSink, LOG_LEVELS } from '@logging';
import type { ConsoleAPI, Logger, SinkWithLevel } from '@logging';
import { createStateStore } from '@system/state';
import { createNotifiers } from '@notifiers';
import { createInfluxDBService } from '@datasource/influxdb';
import { DEFAULTS } from '@utils/constants';
import { now } from '@utils/time';
import type { FetchFn } from '@utils/http';
import type { Controller } from './types';

/**
 * Build the application logger: console plus rotating file
 *
 * @param settings - Runtime settings (debug flag, log file)
 * @param consoleApi - Console output
 * @param colors - Colour the console level tags
 */
export function createAppLogger(settings: RuntimeSettings, consoleApi: ConsoleAPI, colors: boolean): Logger {
  const sinks: SinkWithLevel[] = [
    { sink: createConsoleSink(consoleApi, { colors: colors }), minLevel: LOG_LEVELS.DEBUG },
    {
      sink: createRotatingFileSink({
        path: settings.logFilePath,
        maxBytes: DEFAULTS.LOG_FILE_MAX_BYTES,
        backupCount: DEFAULTS.LOG_FILE_BACKUP_COUNT
      }),
      minLevel: LOG_LEVELS.DEBUG
    }
  ];

  return createLogger({
    level: settings.debug ? LOG_LEVELS.DEBUG : LOG_LEVELS.INFO
  }, {
    timeSource: now,
    sinks: sinks
  }, LOG_LEVELS);
}

/**
 * Wire configuration and collaborators into a controller
 */
export function initialize(
  config: Configuration,
  settings: RuntimeSettings,
  logger: Logger,
  fetchFn: FetchFn
): Controller {
  const source = createInfluxDBService({
    host: config.influxdb.host,
    port: config.influxdb.port,
    database: config.influxdb.database,
    timeoutMs: settings.requestTimeoutMs,
    fetchFn: fetchFn,
    logger: logger
  });

  const store = createStateStore({
    filePath: settings.statePath,
    windowMinutes: config.notification.rapidChangeEvent.windowMinutes
  }, { logger: logger });

  const notifiers = createNotifiers(config.notifiers, {
    fetchFn: fetchFn,
    timeoutMs: settings.requestTimeoutMs,
    logger: logger
  });

  logger.debug(
    'Initialized with InfluxDB ' + config.influxdb.host + ':' + config.influxdb.port + '/' + config.influxdb.database +
    ', notifiers: ' + notifiers.map((n) => n.name).join(', ') + ', state: ' + settings.statePath
  );

  return {
    config: config,
    source: source,
    store: store,
    notifiers: notifiers,
    logger: logger
  };
}
