/**
 * Configuration file schema
 *
 * The file uses snake_case keys; every object is strict so a misspelled key
 * is reported instead of silently ignored.
 */

import { z } from 'zod';

const TIME_OF_DAY_PATTERN = /^(?:[01]\d|2[0-3]):[0-5]\d$/;

const MeasurementSchema = z.object({
  name: z.string().min(1),
  field: z.string().min(1)
}).strict();

const InfluxDBSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535),
  database: z.string().min(1),
  measurements: z.object({
    indoor: MeasurementSchema,
    outdoor: MeasurementSchema
  }).strict()
}).strict();

const SimplePushSchema = z.object({
  type: z.literal('simplepush'),
  key: z.string().min(1)
}).strict();

const SlackSchema = z.object({
  type: z.literal('slack'),
  webhook_url: z.string().url()
}).strict();

const NotifiersSchema = z.array(z.discriminatedUnion('type', [SimplePushSchema, SlackSchema]))
  .min(1, 'At least one notifier must be configured');

const NotificationSchema = z.object({
  min_indoor_temperature: z.number(),
  rapid_change_event: z.object({
    rise: z.number(),
    drop: z.number(),
    window_minutes: z.number().positive()
  }).strict(),
  reenable: z.object({
    cooldown_minutes: z.number().nonnegative(),
    min_rise_between_notifications: z.number().nonnegative()
  }).strict()
}).strict();

const ArmingSchema = z.object({
  temperature_delta: z.number().optional(),
  time: z.string().regex(TIME_OF_DAY_PATTERN, "Expected 'HH:MM' (24-hour)").optional()
}).strict().refine((arming) => arming.temperature_delta !== undefined || arming.time !== undefined, {
  message: 'Either temperature_delta or time must be set'
});

export const ConfigFileSchema = z.object({
  influxdb: InfluxDBSchema,
  notifiers: NotifiersSchema,
  notification: NotificationSchema,
  arming: ArmingSchema
}).strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;
export type NotifierEntry = ConfigFile['notifiers'][number];
