/**
 * Alert fan-out
 */

import type { DispatchResult, Notifier } from './types';

/**
 * Send one alert through every notifier
 *
 * Notifiers are tried one after another; a failure does not stop the rest.
 *
 * @returns Which channels delivered and which failed
 */
export async function dispatchNotification(
  notifiers: readonly Notifier[],
  title: string,
  message: string
): Promise<DispatchResult> {
  const result: DispatchResult = { delivered: [], failed: [] };

  for (const notifier of notifiers) {
    try {
      await notifier.sendNotification(title, message);
      result.delivered.push(notifier.name);
    } catch (error) {
      result.failed.push({ name: notifier.name, error: error });
    }
  }

  return result;
}
