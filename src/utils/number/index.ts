/**
 * Number utilities
 */

/**
 * Check if a value is a finite number
 *
 * Unlike global isFinite(), this does NOT coerce to number first.
 * - isFiniteNumber(null) = false
 * - isFiniteNumber("5") = false
 *
 * @param value - Value to check
 * @returns true if value is a finite number
 */
export function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Format a temperature for log lines and messages
 * @param value - Temperature in °C
 * @returns Value with one decimal and unit, e.g. "21.5°C"
 */
export function fmtTemp(value: number): string {
  return value.toFixed(1) + '°C';
}
