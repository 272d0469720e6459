/**
 * Rolling window of outdoor temperatures
 *
 * A time-bounded, append-only series. New samples are pushed at the end and
 * anything older than `windowMinutes` before the newest sample is evicted
 * from the front.
 *
 * ## Rapid change detection
 * A warm front passing through (sun on the sensor, a short heat spike) shows
 * up as a rise to a peak followed by a drop. Such an event re-arms the
 * notification cycle, see the decision engine.
 */

import type { RollingWindowState, RiseAndDrop } from './types';
import { validateWindowMinutes, validateSample, minOf, indexOfFirstMax } from './helpers';
import { minutesToMs } from '@utils/time';

/** Minimum number of samples that can contain a peak with both sides */
export const MIN_SAMPLES_FOR_DETECTION = 3;

/**
 * Create a window
 *
 * @param windowMinutes - Retention span in minutes
 * @param samples - Initial samples, taken as-is without eviction
 * @throws {Error} If windowMinutes is invalid
 */
export function createRollingWindow(
  windowMinutes: number,
  samples: RollingWindowState['samples'] = []
): RollingWindowState {
  validateWindowMinutes(windowMinutes);
  return { windowMinutes: windowMinutes, samples: samples.slice() };
}

/**
 * Append a sample and evict expired ones (MUTABLE)
 *
 * Samples must arrive in chronological order.
 *
 * @param window - Window to update (will be mutated)
 * @param timestamp - Sample time, epoch ms
 * @param value - Temperature
 * @returns Number of evicted samples
 * @throws {Error} If timestamp or value is not finite
 */
export function appendSample(
  window: RollingWindowState,
  timestamp: number,
  value: number
): number {
  validateSample(timestamp, value, 'appendSample');

  window.samples.push({ timestamp: timestamp, value: value });

  const cutoff = timestamp - minutesToMs(window.windowMinutes);
  let evicted = 0;
  while (window.samples.length > 0 && window.samples[0].timestamp < cutoff) {
    window.samples.shift();
    evicted++;
  }
  return evicted;
}

/**
 * Measure rise to and drop from the window peak
 *
 * @returns null with fewer than 3 samples or when the first maximum is the
 *   first or last sample
 */
export function measureRiseAndDrop(window: RollingWindowState): RiseAndDrop | null {
  if (window.samples.length < MIN_SAMPLES_FOR_DETECTION) {
    return null;
  }

  const values = window.samples.map((s) => s.value);
  const peakIndex = indexOfFirstMax(values);
  if (peakIndex <= 0 || peakIndex >= values.length - 1) {
    return null;
  }

  const peak = values[peakIndex];
  return {
    peak: peak,
    rise: peak - minOf(values.slice(0, peakIndex)),
    drop: peak - minOf(values.slice(peakIndex + 1))
  };
}

/**
 * Check whether the window shows a rise and a drop of at least the given sizes
 */
export function hasSignificantRiseAndDrop(
  window: RollingWindowState,
  riseThreshold: number,
  dropThreshold: number
): boolean {
  const measured = measureRiseAndDrop(window);
  if (measured === null) {
    return false;
  }
  return measured.rise >= riseThreshold && measured.drop >= dropThreshold;
}

/**
 * Check whether a timestamp lies between the oldest and newest samples (inclusive)
 */
export function isWithinWindow(window: RollingWindowState, timestamp: number): boolean {
  const count = window.samples.length;
  if (count === 0) {
    return false;
  }
  return window.samples[0].timestamp <= timestamp && timestamp <= window.samples[count - 1].timestamp;
}
