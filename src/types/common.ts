/**
 * Common type definitions used throughout the project
 */

/**
 * Point in time as milliseconds since the Unix epoch
 */
export type Timestamp = number;

/**
 * Temperature reading - null when the data source has no value
 */
export type TemperatureReading = number | null;

/**
 * One outdoor temperature observation
 */
export interface Sample {
  readonly timestamp: Timestamp;
  readonly value: number;
}
