/**
 * State record format
 *
 * ```json
 * {
 *   "last_notification_time": "2024-06-01T17:05:00.000Z",
 *   "last_significant_rise_time": null,
 *   "armed": true,
 *   "rolling_window": [{ "time": "2024-06-01T17:05:00.000Z", "temperature": 21.4 }],
 *   "temps_since_last_notification": []
 * }
 * ```
 */

import { z } from 'zod';
import type { NotifierState } from './types';
import { toRecords, fromRecords } from '@core/rolling-window';
import { toIsoString, parseIsoTimestamp } from '@utils/time';

const INVALID_TIMESTAMP = 'Invalid ISO-8601 timestamp';

// Naive timestamps (no offset) are accepted and read as local time
const isoTimestamp = z.string()
  .datetime({ offset: true, local: true, message: INVALID_TIMESTAMP })
  .refine((value) => parseIsoTimestamp(value) !== null, { message: INVALID_TIMESTAMP });

const SampleRecordSchema = z.object({
  time: isoTimestamp,
  temperature: z.number().finite()
});

function isChronological(records: readonly { time: string }[]): boolean {
  let previous = -Infinity;
  for (const record of records) {
    const timestamp = parseIsoTimestamp(record.time);
    if (timestamp === null || timestamp < previous) {
      return false;
    }
    previous = timestamp;
  }
  return true;
}

/**
 * Schema of the persisted record; missing keys take fresh-state defaults
 */
export const StateRecordSchema = z.object({
  last_notification_time: isoTimestamp.nullable().default(null),
  last_significant_rise_time: isoTimestamp.nullable().default(null),
  armed: z.boolean().default(false),
  rolling_window: z.array(SampleRecordSchema)
    .refine(isChronological, { message: 'Samples must be in chronological order' })
    .default([]),
  temps_since_last_notification: z.array(z.number().finite()).default([])
});

export type StateRecord = z.infer<typeof StateRecordSchema>;

function toIsoOrNull(timestamp: number | null): string | null {
  return timestamp === null ? null : toIsoString(timestamp);
}

function fromIsoOrNull(value: string | null): number | null {
  return value === null ? null : parseIsoTimestamp(value);
}

/**
 * Convert state to its persisted record
 */
export function serializeState(state: NotifierState): StateRecord {
  return {
    last_notification_time: toIsoOrNull(state.lastNotificationTime),
    last_significant_rise_time: toIsoOrNull(state.lastSignificantEventTime),
    armed: state.armed,
    rolling_window: toRecords(state.rollingWindow),
    temps_since_last_notification: state.tempsSinceLastNotification.slice()
  };
}

/**
 * Rebuild state from a validated record
 *
 * @param record - Record that passed StateRecordSchema
 * @param windowMinutes - Span of the rolling window, from configuration
 */
export function deserializeState(record: StateRecord, windowMinutes: number): NotifierState {
  return {
    lastNotificationTime: fromIsoOrNull(record.last_notification_time),
    lastSignificantEventTime: fromIsoOrNull(record.last_significant_rise_time),
    armed: record.armed,
    rollingWindow: fromRecords(record.rolling_window, windowMinutes),
    tempsSinceLastNotification: record.temps_since_last_notification.slice()
  };
}

/**
 * Parse raw file content
 *
 * @returns Record, or an error message describing why the content was rejected
 */
export function parseStateRecord(content: string): { ok: true; record: StateRecord } | { ok: false; reason: string } {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    return { ok: false, reason: 'invalid JSON (' + (err instanceof Error ? err.message : String(err)) + ')' };
  }

  const result = StateRecordSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    return { ok: false, reason: (issue.path.join('.') || '<root>') + ': ' + issue.message };
  }
  return { ok: true, record: result.data };
}
