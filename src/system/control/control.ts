/**
 * Temperature comparison run
 *
 * One run per invocation. The order of the steps matters: the window and
 * history are updated before any gate so that every reading counts, and a
 * fresh rapid change event clears the last alert so that the cooldown and
 * rise checks are skipped in the same run.
 */

import { fmtTemp } from '@utils/number';
import type { Controller, ComparisonOutcome, ComparisonResult } from './types';
import {
  processDailyReset,
  acquireReadings,
  processHistory,
  processArming,
  processRapidChange,
  checkReenable,
  sendAlert
} from './helpers';

/**
 * Compare indoor and outdoor temperatures and alert when outdoor has become cooler
 *
 * @param controller - Configuration and collaborators
 * @param now - Current time, epoch ms
 * @returns The step that ended the run and the resulting state
 * @throws {DataSourceError} When a temperature cannot be read
 * @throws {NotifierError} When a notifier fails
 * @throws {StateStoreError} When the state file cannot be read
 */
export async function compareTemperatures(controller: Controller, now: number): Promise<ComparisonResult> {
  const logger = controller.logger;
  const notification = controller.config.notification;

  const state = await controller.store.load();

  function done(outcome: ComparisonOutcome, indoorTemp: number | null, outdoorTemp: number | null): ComparisonResult {
    logger.debug('Comparison finished: ' + outcome);
    return { outcome: outcome, state: state, indoorTemp: indoorTemp, outdoorTemp: outdoorTemp };
  }

  // 1. Daily reset
  await processDailyReset(controller, state, now);

  // 2. Readings
  const raw = await acquireReadings(controller);
  if (raw.indoorTemp === null || raw.outdoorTemp === null) {
    logger.warning('Missing temperature data: indoor_temp=' + raw.indoorTemp + ', outdoor_temp=' + raw.outdoorTemp);
    return done('missing-data', raw.indoorTemp, raw.outdoorTemp);
  }
  const readings = { indoorTemp: raw.indoorTemp, outdoorTemp: raw.outdoorTemp };
  logger.info('Indoor temperature: ' + fmtTemp(readings.indoorTemp) + ', Outdoor temperature: ' + fmtTemp(readings.outdoorTemp));

  // 3. History
  await processHistory(controller, state, readings, now);

  // 4. Indoor threshold
  if (readings.indoorTemp <= notification.minIndoorTemperature) {
    logger.info(
      'Indoor temperature (' + fmtTemp(readings.indoorTemp) + ') is below the threshold (' +
      fmtTemp(notification.minIndoorTemperature) + '). No notification sent.'
    );
    return done('indoor-below-threshold', readings.indoorTemp, readings.outdoorTemp);
  }

  // 5. Arming
  await processArming(controller, state, readings, now);

  // 6. Rapid change
  if (await processRapidChange(controller, state, now)) {
    return done('rapid-change-suppressed', readings.indoorTemp, readings.outdoorTemp);
  }

  // 7. Cooldown and re-enable
  const held = checkReenable(controller, state, now);
  if (held !== null) {
    return done(held, readings.indoorTemp, readings.outdoorTemp);
  }

  // 8. Armed
  if (!state.armed) {
    logger.info('Notifier is not armed. No notification sent.');
    return done('not-armed', readings.indoorTemp, readings.outdoorTemp);
  }

  // 9. Dispatch
  if (readings.outdoorTemp >= readings.indoorTemp) {
    logger.info('Outdoor temperature is not lower than indoor temperature. No notification sent.');
    return done('outdoor-not-lower', readings.indoorTemp, readings.outdoorTemp);
  }

  await sendAlert(controller, state, readings, now);
  return done('notified', readings.indoorTemp, readings.outdoorTemp);
}
