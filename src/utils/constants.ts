/**
 * Global constants used throughout the application
 */

export const APP_NAME = 'temperature_notifier';

export const APP_VERSION = '0.1.0';

export const TIME_CONSTANTS = {
  MS_PER_SECOND: 1000,
  MS_PER_MINUTE: 60000,
  MINUTES_PER_HOUR: 60,
} as const;

export const DEFAULTS = {
  CONFIG_FILE: 'config.yaml',
  STATE_FILE: 'notifier_state.json',
  LOG_FILE: APP_NAME + '.log',
  LOG_FILE_MAX_BYTES: 100 * 1024,
  LOG_FILE_BACKUP_COUNT: 10,
  REQUEST_TIMEOUT_MS: 10000,
} as const;
