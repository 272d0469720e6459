/**
 * Type definitions for the temperature notifier configuration
 *
 * These are the validated, camel-cased shapes produced by the config loader.
 * The raw file layout lives in the zod schema under src/validation.
 */

// ───────── INFLUXDB ─────────

/**
 * A measurement/field pair to read the latest value from
 */
export interface MeasurementConfig {
  readonly name: string;
  readonly field: string;
}

export interface MeasurementsConfig {
  readonly indoor: MeasurementConfig;
  readonly outdoor: MeasurementConfig;
}

export interface InfluxDBConfig {
  readonly host: string;
  readonly port: number;
  readonly database: string;
  readonly measurements: MeasurementsConfig;
}

// ───────── NOTIFIERS ─────────

export interface SimplePushNotifierConfig {
  readonly type: 'simplepush';
  /** SimplePush device key */
  readonly key: string;
}

export interface SlackNotifierConfig {
  readonly type: 'slack';
  /** Incoming webhook URL */
  readonly webhookUrl: string;
}

/**
 * Closed set of supported notification channels
 */
export type NotifierConfig = SimplePushNotifierConfig | SlackNotifierConfig;

export type NotifierType = NotifierConfig['type'];

// ───────── NOTIFICATION RULES ─────────

export interface RapidChangeEventConfig {
  /** Minimum rise (°C) before the window peak */
  readonly rise: number;
  /** Minimum drop (°C) after the window peak */
  readonly drop: number;
  /** Rolling window length in minutes */
  readonly windowMinutes: number;
}

export interface ReenableConfig {
  readonly cooldownMinutes: number;
  /** Minimum outdoor rise (°C) since the last notification */
  readonly minRiseBetweenNotifications: number;
}

export interface NotificationConfig {
  /** Indoor temperatures at or below this value never alert */
  readonly minIndoorTemperature: number;
  readonly rapidChangeEvent: RapidChangeEventConfig;
  readonly reenable: ReenableConfig;
}

// ───────── ARMING ─────────

/**
 * Wall-clock time of day (local time)
 */
export interface TimeOfDay {
  readonly hours: number;
  readonly minutes: number;
}

/**
 * Arming conditions - either may be absent
 */
export interface ArmingConfig {
  /** Arm when outdoor >= indoor + delta */
  readonly temperatureDelta: number | null;
  /** Arm once the local time of day reaches this value */
  readonly time: TimeOfDay | null;
}

// ───────── TOP LEVEL ─────────

export interface Configuration {
  readonly influxdb: InfluxDBConfig;
  readonly notifiers: readonly NotifierConfig[];
  readonly notification: NotificationConfig;
  readonly arming: ArmingConfig;
}

/**
 * Process-level settings resolved from the environment and CLI flags
 */
export interface RuntimeSettings {
  readonly configPath: string;
  readonly statePath: string;
  readonly logFilePath: string;
  /** Timeout for data source and notifier HTTP requests */
  readonly requestTimeoutMs: number;
  readonly debug: boolean;
}
