/**
 * Time helper functions
 *
 * Calendar days and times of day are evaluated in the process's local time zone,
 * which is what a user means by "17:00" or "today".
 */

import type { TimeOfDay } from '$types/config';
import { TIME_CONSTANTS } from '@utils/constants';

const TIME_OF_DAY_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

/**
 * Convert minutes to milliseconds
 * @param minutes - Duration in minutes (may be fractional)
 * @returns Duration in milliseconds
 */
export function minutesToMs(minutes: number): number {
  return minutes * TIME_CONSTANTS.MS_PER_MINUTE;
}

/**
 * Parse a 24-hour "HH:MM" string
 * @param value - Time string such as "07:30"
 * @returns Parsed time of day, or null if the format is wrong
 */
export function parseTimeOfDay(value: string): TimeOfDay | null {
  const match = TIME_OF_DAY_PATTERN.exec(value);
  if (!match) {
    return null;
  }
  return { hours: Number(match[1]), minutes: Number(match[2]) };
}

/**
 * Minutes elapsed since local midnight for a time of day
 * @param time - Time of day
 * @returns Minutes since midnight
 */
export function timeOfDayToMinutes(time: TimeOfDay): number {
  return time.hours * TIME_CONSTANTS.MINUTES_PER_HOUR + time.minutes;
}

/**
 * Local time of day of a timestamp, truncated to the minute
 * @param timestamp - Milliseconds since epoch
 * @returns Hours and minutes in local time
 */
export function getTimeOfDay(timestamp: number): TimeOfDay {
  const date = new Date(timestamp);
  return { hours: date.getHours(), minutes: date.getMinutes() };
}

/**
 * Check whether a timestamp's local time of day has reached a given time
 *
 * Seconds are ignored, so 17:00:59 counts as 17:00.
 *
 * @param timestamp - Milliseconds since epoch
 * @param time - Time of day to compare against
 * @returns True if timestamp's time of day >= time
 */
export function isAtOrAfterTimeOfDay(timestamp: number, time: TimeOfDay): boolean {
  return timeOfDayToMinutes(getTimeOfDay(timestamp)) >= timeOfDayToMinutes(time);
}

/**
 * Format a time of day as "HH:MM"
 * @param time - Time of day
 * @returns Zero-padded 24-hour string
 */
export function formatTimeOfDay(time: TimeOfDay): string {
  return String(time.hours).padStart(2, '0') + ':' + String(time.minutes).padStart(2, '0');
}

/**
 * Check whether two timestamps fall on the same local calendar date
 * @param a - Milliseconds since epoch
 * @param b - Milliseconds since epoch
 * @returns True if year, month and day match
 */
export function isSameLocalDay(a: number, b: number): boolean {
  const da = new Date(a);
  const db = new Date(b);
  return da.getFullYear() === db.getFullYear() &&
    da.getMonth() === db.getMonth() &&
    da.getDate() === db.getDate();
}

/**
 * Serialize a timestamp as ISO-8601 (UTC, millisecond precision)
 * @param timestamp - Milliseconds since epoch
 * @returns ISO-8601 string
 */
export function toIsoString(timestamp: number): string {
  return new Date(timestamp).toISOString();
}

/**
 * Parse an ISO-8601 string
 *
 * Strings without an offset are read as local time.
 *
 * @param value - ISO-8601 string
 * @returns Milliseconds since epoch, or null if unparseable
 */
export function parseIsoTimestamp(value: string): number | null {
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? null : parsed;
}
