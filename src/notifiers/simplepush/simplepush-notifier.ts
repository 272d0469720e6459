/**
 * SimplePush notifier
 *
 * Posts the alert to the SimplePush HTTP API. The API answers 200 with a JSON
 * body whose `status` is "OK" on success and something else (with a
 * `message`) when the key is unknown or the request is malformed.
 */

import { z } from 'zod';
import type { SimplePushNotifierConfig } from '$types/config';
import type { Notifier, NotifierDependencies } from '../types';
import { NotifierError, errorMessage } from '$types/errors';
import { fetchWithTimeout, readBodySafely } from '@utils/http';

export const SIMPLEPUSH_API_URL = 'https://api.simplepush.io/send';

const CHANNEL = 'simplepush';

const SimplePushResponseSchema = z.object({
  status: z.string(),
  message: z.string().optional()
});

/**
 * Create a SimplePush notifier
 *
 * @param config - Device key
 * @param dependencies - fetch, timeout and logger
 */
export function createSimplePushNotifier(
  config: SimplePushNotifierConfig,
  dependencies: NotifierDependencies
): Notifier {
  async function sendNotification(title: string, message: string): Promise<void> {
    const body = new URLSearchParams({ key: config.key, title: title, msg: message });

    let response: Response;
    try {
      response = await fetchWithTimeout(dependencies.fetchFn, SIMPLEPUSH_API_URL, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: body.toString()
      }, dependencies.timeoutMs);
    } catch (err) {
      throw new NotifierError('SimplePush request failed: ' + errorMessage(err), [CHANNEL], { cause: err });
    }

    const text = await readBodySafely(response);
    if (!response.ok) {
      throw new NotifierError('SimplePush returned HTTP ' + response.status + ': ' + text, [CHANNEL]);
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (err) {
      throw new NotifierError('SimplePush returned an unreadable response: ' + text, [CHANNEL], { cause: err });
    }

    const parsed = SimplePushResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new NotifierError('SimplePush returned an unexpected response: ' + text, [CHANNEL]);
    }
    if (parsed.data.status !== 'OK') {
      throw new NotifierError(
        'SimplePush rejected the notification: ' + (parsed.data.message ?? parsed.data.status),
        [CHANNEL]
      );
    }

    dependencies.logger.info('Notification sent via SimplePush.');
  }

  return {
    name: CHANNEL,
    sendNotification: sendNotification
  };
}
