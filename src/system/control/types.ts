/**
 * Control module type definitions
 */

import type { Configuration } from '$types/config';
import type { TemperatureReading } from '$types/common';
import type { NotifierState, StateStore } from '@system/state';
import type { TemperatureSource } from '@datasource/types';
import type { Notifier } from '@notifiers';
import type { Logger } from '@logging';

/**
 * Everything one comparison run needs
 */
export interface Controller {
  config: Configuration;
  source: TemperatureSource;
  store: StateStore;
  notifiers: readonly Notifier[];
  logger: Logger;
}

/**
 * Step at which a run ended
 */
export type ComparisonOutcome =
  | 'missing-data'
  | 'indoor-below-threshold'
  | 'rapid-change-suppressed'
  | 'cooldown'
  | 'insufficient-rise'
  | 'not-armed'
  | 'outdoor-not-lower'
  | 'notified';

export interface ComparisonResult {
  outcome: ComparisonOutcome;
  /** State as left by the run */
  state: NotifierState;
  indoorTemp: TemperatureReading;
  outdoorTemp: TemperatureReading;
}

/**
 * Latest pair of readings
 */
export interface Readings {
  indoorTemp: number;
  outdoorTemp: number;
}
