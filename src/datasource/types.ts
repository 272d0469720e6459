/**
 * Temperature source abstraction
 */

import type { MeasurementConfig } from '$types/config';
import type { TemperatureReading } from '$types/common';

/**
 * Provides the latest reading of a measurement
 */
export interface TemperatureSource {
  /**
   * Latest value of the measurement's field
   *
   * @returns The value, or null when the measurement holds no data
   * @throws {DataSourceError} On transport or query failure
   */
  getLastValue(measurement: MeasurementConfig): Promise<TemperatureReading>;
}
