/**
 * Slack notifier
 *
 * Posts the alert to an incoming webhook as a single message with the title
 * in bold.
 */

import type { SlackNotifierConfig } from '$types/config';
import type { Notifier, NotifierDependencies } from '../types';
import { NotifierError, errorMessage } from '$types/errors';
import { fetchWithTimeout, readBodySafely } from '@utils/http';

const CHANNEL = 'slack';

/**
 * Slack message text for an alert
 */
export function formatSlackText(title: string, message: string): string {
  return '*' + title + '*\n' + message;
}

/**
 * Create a Slack notifier
 *
 * @param config - Webhook URL
 * @param dependencies - fetch, timeout and logger
 */
export function createSlackNotifier(
  config: SlackNotifierConfig,
  dependencies: NotifierDependencies
): Notifier {
  async function sendNotification(title: string, message: string): Promise<void> {
    let response: Response;
    try {
      response = await fetchWithTimeout(dependencies.fetchFn, config.webhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ text: formatSlackText(title, message) })
      }, dependencies.timeoutMs);
    } catch (err) {
      throw new NotifierError('Slack request failed: ' + errorMessage(err), [CHANNEL], { cause: err });
    }

    if (!response.ok) {
      const text = await readBodySafely(response);
      throw new NotifierError('Slack returned HTTP ' + response.status + ': ' + text, [CHANNEL]);
    }

    dependencies.logger.info('Notification sent via Slack.');
  }

  return {
    name: CHANNEL,
    sendNotification: sendNotification
  };
}
