/**
 * Decision steps
 *
 * Each step reads or mutates the loaded state, saves where the state
 * changed and logs its decision. Steps returning a boolean tell the caller
 * whether to stop the run.
 */

import type { NotifierState } from '@system/state';
import { isNewDay, resetForNewDay, recordNotification } from '@system/state';
import { appendSample, measureRiseAndDrop, hasSignificantRiseAndDrop, isWithinWindow, toRecords } from '@core/rolling-window';
import { evaluateArming } from '@features/arming';
import { isInCooldown, hasMinRiseSince } from '@features/reenable';
import { dispatchNotification } from '@notifiers';
import { NotifierError, errorMessage } from '$types/errors';
import { fmtTemp } from '@utils/number';
import { toIsoString } from '@utils/time';
import type { Controller, Readings } from './types';

export const ALERT_TITLE = 'Temperature Alert';

/**
 * Alert body for a pair of readings
 */
export function formatAlertMessage(readings: Readings): string {
  return 'Outdoor temperature is lower than indoor temperature! ' +
    fmtTemp(readings.outdoorTemp) + ' < ' + fmtTemp(readings.indoorTemp);
}

/**
 * Clear yesterday's alert and arm state when the date has changed
 */
export async function processDailyReset(controller: Controller, state: NotifierState, now: number): Promise<void> {
  const logger = controller.logger;
  if (!isNewDay(state, now)) {
    logger.debug('No new day detected. Continuing with current state.');
    return;
  }

  logger.info('New day detected. Resetting state.');
  resetForNewDay(state);
  await controller.store.save(state);
}

/**
 * Read indoor then outdoor temperature
 *
 * @returns Both readings, or null (with a warning) when either is missing
 * @throws {DataSourceError} On query failure
 */
export async function acquireReadings(controller: Controller): Promise<{ indoorTemp: number | null; outdoorTemp: number | null }> {
  const measurements = controller.config.influxdb.measurements;
  controller.logger.debug('Fetching indoor and outdoor temperatures from InfluxDB...');

  const indoorTemp = await controller.source.getLastValue(measurements.indoor);
  const outdoorTemp = await controller.source.getLastValue(measurements.outdoor);
  return { indoorTemp: indoorTemp, outdoorTemp: outdoorTemp };
}

/**
 * Record the outdoor reading in the window and the post-alert history
 */
export async function processHistory(controller: Controller, state: NotifierState, readings: Readings, now: number): Promise<void> {
  const evicted = appendSample(state.rollingWindow, now, readings.outdoorTemp);
  state.tempsSinceLastNotification.push(readings.outdoorTemp);
  controller.logger.debug(
    'Rolling window holds ' + state.rollingWindow.samples.length + ' samples (' + evicted + ' evicted), ' +
    state.tempsSinceLastNotification.length + ' temperatures since last notification'
  );
  await controller.store.save(state);
}

/**
 * Arm the notifier when the arming rule holds
 */
export async function processArming(controller: Controller, state: NotifierState, readings: Readings, now: number): Promise<void> {
  const logger = controller.logger;
  const result = evaluateArming({
    indoorTemp: readings.indoorTemp,
    outdoorTemp: readings.outdoorTemp,
    now: now,
    armed: state.armed
  }, controller.config.arming);

  if (!result.configured) {
    logger.warning('Neither arming temperature delta nor arming time is set in the configuration.');
    return;
  }

  if (result.shouldArm) {
    logger.info('Arming notifier because: ' + result.reasons.join('; '));
    state.armed = true;
    await controller.store.save(state);
    return;
  }

  if (state.armed) {
    logger.info('Notifier is already armed. No action taken.');
  } else {
    logger.info('Notifier not armed: arm_by_temp=' + result.armByTemp + ', arm_by_time=' + result.armByTime);
  }
}

/**
 * Look for a rise-then-drop in the rolling window
 *
 * A new event restarts the notification cycle by forgetting the last alert.
 *
 * @returns True when the run must stop because the event was already handled
 */
export async function processRapidChange(controller: Controller, state: NotifierState, now: number): Promise<boolean> {
  const logger = controller.logger;
  const thresholds = controller.config.notification.rapidChangeEvent;
  const window = state.rollingWindow;

  logger.info('Rolling window: ' + JSON.stringify(toRecords(window)));
  const measured = measureRiseAndDrop(window);
  if (measured !== null) {
    logger.info(
      'Rolling window peak ' + fmtTemp(measured.peak) + ': rise ' + fmtTemp(measured.rise) +
      ' (threshold ' + fmtTemp(thresholds.rise) + '), drop ' + fmtTemp(measured.drop) +
      ' (threshold ' + fmtTemp(thresholds.drop) + ')'
    );
  }

  if (!hasSignificantRiseAndDrop(window, thresholds.rise, thresholds.drop)) {
    logger.info('No rapid change event detected.');
    return false;
  }

  if (state.lastSignificantEventTime !== null && isWithinWindow(window, state.lastSignificantEventTime)) {
    logger.info(
      'Rapid change event already handled at ' + toIsoString(state.lastSignificantEventTime) +
      ' and still within the rolling window. No notification sent.'
    );
    return true;
  }

  logger.info('Rapid change event detected. Resetting last notification time.');
  state.lastSignificantEventTime = now;
  state.lastNotificationTime = null;
  await controller.store.save(state);
  return false;
}

/**
 * Hold back a repeat alert until the cooldown is over and the outdoor
 * temperature has risen enough since the last one
 *
 * @returns 'cooldown' or 'insufficient-rise' to stop, null to continue
 */
export function checkReenable(controller: Controller, state: NotifierState, now: number): 'cooldown' | 'insufficient-rise' | null {
  const logger = controller.logger;
  const reenable = controller.config.notification.reenable;

  if (state.lastNotificationTime === null) {
    logger.info('No notification has been sent today. Skipping cooldown and rise checks.');
    return null;
  }

  if (isInCooldown(state.lastNotificationTime, now, reenable.cooldownMinutes)) {
    logger.info('Notification is in cooldown period. No notification sent.');
    return 'cooldown';
  }

  if (!hasMinRiseSince(state.tempsSinceLastNotification, reenable.minRiseBetweenNotifications)) {
    logger.info(
      'No sufficient temperature rise (' + fmtTemp(reenable.minRiseBetweenNotifications) +
      ') since last notification. No notification sent.'
    );
    return 'insufficient-rise';
  }

  return null;
}

/**
 * Send the alert through every notifier and record it
 *
 * Every channel is tried. The alert is recorded only when all of them
 * delivered it.
 *
 * @throws {NotifierError} Listing every channel that failed
 */
export async function sendAlert(controller: Controller, state: NotifierState, readings: Readings, now: number): Promise<void> {
  const logger = controller.logger;
  logger.info('Outdoor temperature is lower than indoor temperature. Sending notification.');

  const result = await dispatchNotification(controller.notifiers, ALERT_TITLE, formatAlertMessage(readings));

  for (const failure of result.failed) {
    logger.warning('Notifier ' + failure.name + ' failed: ' + errorMessage(failure.error));
  }

  if (result.failed.length > 0) {
    const names = result.failed.map((f) => f.name);
    throw new NotifierError(
      result.failed.length + ' of ' + controller.notifiers.length + ' notifiers failed: ' +
      result.failed.map((f) => f.name + ' (' + errorMessage(f.error) + ')').join(', '),
      names
    );
  }

  recordNotification(state, now);
  await controller.store.save(state);
}
