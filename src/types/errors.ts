/**
 * Global error types for the temperature notifier
 *
 * Each class maps to one failure category the CLI reports separately.
 * A missing sample is not an error: the engine logs a warning and stops.
 */

/**
 * Base class for all notifier errors
 */
export class TemperatureNotifierError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TemperatureNotifierError';
  }
}

/**
 * Error thrown when the configuration file is missing, unparseable or invalid
 */
export class ConfigurationError extends TemperatureNotifierError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * Error thrown when the time-series query fails (as opposed to returning no data)
 */
export class DataSourceError extends TemperatureNotifierError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DataSourceError';
  }
}

/**
 * Error thrown when a notification channel rejects or cannot be reached
 */
export class NotifierError extends TemperatureNotifierError {
  /** Names of the channels that failed */
  readonly channels: readonly string[];

  constructor(message: string, channels: readonly string[], options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NotifierError';
    this.channels = channels;
  }
}

/**
 * Error thrown when the state file exists but cannot be read
 */
export class StateStoreError extends TemperatureNotifierError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StateStoreError';
  }
}

/**
 * Extract a printable message from any thrown value
 * @param err - Caught value
 * @returns Error message, or the stringified value
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
