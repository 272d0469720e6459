/**
 * Boot helpers
 */

import {
  ConfigurationError,
  DataSourceError,
  NotifierError,
  StateStoreError,
  errorMessage
} from '$types/errors';

/**
 * Log line for an error that ended the run, prefixed by its category
 */
export function describeFailure(err: unknown): string {
  if (err instanceof ConfigurationError) {
    return 'Configuration error: ' + err.message;
  }
  if (err instanceof DataSourceError) {
    return 'InfluxDB error: ' + err.message;
  }
  if (err instanceof NotifierError) {
    return 'Notifier error: ' + err.message;
  }
  if (err instanceof StateStoreError) {
    return 'State store error: ' + err.message;
  }
  return 'Unexpected error: ' + errorMessage(err);
}
