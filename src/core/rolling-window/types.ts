/**
 * Rolling window type definitions
 *
 * The window holds the outdoor samples of the last `windowMinutes` and is
 * used to spot a rise followed by a drop (a passing warm spell).
 */

import type { Sample } from '$types/common';

/**
 * Rolling window state (mutable)
 */
export interface RollingWindowState {
  /** Retention span in minutes */
  readonly windowMinutes: number;

  /** Samples in chronological order, oldest first */
  samples: Sample[];
}

/**
 * Result of measuring the window around its peak
 */
export interface RiseAndDrop {
  /** Highest value in the window (first occurrence) */
  peak: number;

  /** Peak minus lowest value before it */
  rise: number;

  /** Peak minus lowest value after it */
  drop: number;
}

/**
 * Persisted form of a sample
 */
export interface SampleRecord {
  /** ISO-8601 timestamp */
  time: string;

  /** Temperature value */
  temperature: number;
}
