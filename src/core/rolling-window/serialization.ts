/**
 * Conversion between a window and its persisted records
 */

import type { RollingWindowState, SampleRecord } from './types';
import { createRollingWindow } from './rolling-window';
import { validateSample } from './helpers';
import { toIsoString, parseIsoTimestamp } from '@utils/time';

/**
 * Convert window samples into records, oldest first
 */
export function toRecords(window: RollingWindowState): SampleRecord[] {
  return window.samples.map((sample) => ({
    time: toIsoString(sample.timestamp),
    temperature: sample.value
  }));
}

/**
 * Rebuild a window from records without evicting
 *
 * @throws {Error} If a record has an unparseable or out-of-order time, or a non-finite temperature
 */
export function fromRecords(
  records: readonly SampleRecord[],
  windowMinutes: number
): RollingWindowState {
  let previous = -Infinity;
  const samples = records.map((record, index) => {
    const timestamp = parseIsoTimestamp(record.time);
    if (timestamp === null) {
      throw new Error('fromRecords: invalid time at index ' + index + ': ' + record.time);
    }
    if (timestamp < previous) {
      throw new Error('fromRecords: time at index ' + index + ' precedes the previous record: ' + record.time);
    }
    validateSample(timestamp, record.temperature, 'fromRecords');
    previous = timestamp;
    return { timestamp: timestamp, value: record.temperature };
  });
  return createRollingWindow(windowMinutes, samples);
}
