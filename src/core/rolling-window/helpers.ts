/**
 * Rolling window helper functions
 */

import { isFiniteNumber } from '@utils/number';

/**
 * Validate window span
 * @throws {Error} If span is not a positive finite number
 */
export function validateWindowMinutes(windowMinutes: number): void {
  if (!isFiniteNumber(windowMinutes) || windowMinutes <= 0) {
    throw new Error('windowMinutes must be a positive finite number, got ' + windowMinutes);
  }
}

/**
 * Validate a sample before it enters the window
 * @throws {Error} If timestamp or value is not finite
 */
export function validateSample(timestamp: number, value: number, context: string): void {
  if (!isFiniteNumber(timestamp)) {
    throw new Error(context + ': timestamp must be a finite number, got ' + timestamp);
  }
  if (!isFiniteNumber(value)) {
    throw new Error(context + ': temperature must be a finite number, got ' + value);
  }
}

/**
 * Lowest value of a slice of numbers
 */
export function minOf(values: readonly number[]): number {
  let min = values[0];
  for (let i = 1; i < values.length; i++) {
    if (values[i] < min) {
      min = values[i];
    }
  }
  return min;
}

/**
 * Index of the first occurrence of the highest value
 * @returns -1 for an empty list
 */
export function indexOfFirstMax(values: readonly number[]): number {
  if (values.length === 0) {
    return -1;
  }
  let maxIndex = 0;
  for (let i = 1; i < values.length; i++) {
    if (values[i] > values[maxIndex]) {
      maxIndex = i;
    }
  }
  return maxIndex;
}
