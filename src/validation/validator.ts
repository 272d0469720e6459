/**
 * Configuration validation
 *
 * Checks the raw file content against the schema, maps it to the typed
 * configuration and collects warnings for settings that are valid but most
 * likely not what the user meant.
 */

import type { ZodIssue } from 'zod';
import type { Configuration, NotifierConfig, TimeOfDay } from '$types/config';
import type { ValidationError, ValidationResult, ValidationWarning } from './types';
import { ConfigFileSchema } from './schema';
import type { ConfigFile, NotifierEntry } from './schema';
import { parseTimeOfDay } from '@utils/time';

function toValidationError(issue: ZodIssue): ValidationError {
  return {
    field: issue.path.length > 0 ? issue.path.join('.') : '<root>',
    message: issue.message
  };
}

function toNotifierConfig(entry: NotifierEntry): NotifierConfig {
  switch (entry.type) {
    case 'simplepush':
      return { type: 'simplepush', key: entry.key };
    case 'slack':
      return { type: 'slack', webhookUrl: entry.webhook_url };
  }
}

function toTimeOfDay(value: string | undefined): TimeOfDay | null {
  return value === undefined ? null : parseTimeOfDay(value);
}

/**
 * Map a schema-checked file to the typed configuration
 */
export function toConfiguration(file: ConfigFile): Configuration {
  const notification = file.notification;
  return {
    influxdb: {
      host: file.influxdb.host,
      port: file.influxdb.port,
      database: file.influxdb.database,
      measurements: {
        indoor: { name: file.influxdb.measurements.indoor.name, field: file.influxdb.measurements.indoor.field },
        outdoor: { name: file.influxdb.measurements.outdoor.name, field: file.influxdb.measurements.outdoor.field }
      }
    },
    notifiers: file.notifiers.map(toNotifierConfig),
    notification: {
      minIndoorTemperature: notification.min_indoor_temperature,
      rapidChangeEvent: {
        rise: notification.rapid_change_event.rise,
        drop: notification.rapid_change_event.drop,
        windowMinutes: notification.rapid_change_event.window_minutes
      },
      reenable: {
        cooldownMinutes: notification.reenable.cooldown_minutes,
        minRiseBetweenNotifications: notification.reenable.min_rise_between_notifications
      }
    },
    arming: {
      temperatureDelta: file.arming.temperature_delta ?? null,
      time: toTimeOfDay(file.arming.time)
    }
  };
}

/**
 * Collect warnings for a valid configuration
 */
export function collectWarnings(config: Configuration): ValidationWarning[] {
  const warnings: ValidationWarning[] = [];
  const rapid = config.notification.rapidChangeEvent;

  if (config.notification.reenable.cooldownMinutes === 0) {
    warnings.push({
      field: 'notification.reenable.cooldown_minutes',
      message: 'Cooldown of 0 minutes allows an alert on every run'
    });
  }
  if (rapid.rise <= 0) {
    warnings.push({
      field: 'notification.rapid_change_event.rise',
      message: 'Rise threshold <= 0 makes any peak a rapid change event'
    });
  }
  if (rapid.drop <= 0) {
    warnings.push({
      field: 'notification.rapid_change_event.drop',
      message: 'Drop threshold <= 0 makes any peak a rapid change event'
    });
  }

  return warnings;
}

/**
 * Validate raw configuration content
 *
 * @param raw - Parsed content of the configuration file
 * @returns The typed configuration with warnings, or the list of errors
 */
export function validateConfig(raw: unknown): ValidationResult {
  const result = ConfigFileSchema.safeParse(raw);
  if (!result.success) {
    return {
      valid: false,
      errors: result.error.issues.map(toValidationError),
      warnings: []
    };
  }

  const config = toConfiguration(result.data);
  return {
    valid: true,
    config: config,
    warnings: collectWarnings(config)
  };
}
