/**
 * Re-enable logic
 *
 * After an alert, the next one is held back until the cooldown has elapsed
 * and the outdoor temperature has climbed by a minimum amount from some low
 * point since that alert. Without the rise requirement a temperature
 * hovering around the indoor value would alert on every cooldown expiry.
 */

import { minutesToMs } from '@utils/time';

/**
 * Check whether the cooldown since the last alert is still running
 *
 * @param lastNotificationTime - Time of the last alert, epoch ms
 * @param now - Current time, epoch ms
 * @param cooldownMinutes - Cooldown length
 * @returns True while now - last < cooldown
 */
export function isInCooldown(
  lastNotificationTime: number,
  now: number,
  cooldownMinutes: number
): boolean {
  return now - lastNotificationTime < minutesToMs(cooldownMinutes);
}

/**
 * Check whether the series rose by at least minRise above an earlier low
 *
 * Scans with a running minimum and stops at the first value that is at
 * least minRise above it. Fewer than two values never qualify.
 *
 * @param temps - Values in chronological order
 * @param minRise - Required rise
 */
export function hasMinRiseSince(temps: readonly number[], minRise: number): boolean {
  if (temps.length < 2) {
    return false;
  }

  let runningMin = temps[0];
  for (let i = 1; i < temps.length; i++) {
    if (temps[i] - runningMin >= minRise) {
      return true;
    }
    if (temps[i] < runningMin) {
      runningMin = temps[i];
    }
  }
  return false;
}
