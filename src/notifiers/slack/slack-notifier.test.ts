/**
 * Unit tests for the Slack notifier
 */

import { createSlackNotifier, formatSlackText } from './slack-notifier';
import { NotifierError } from '$types/errors';
import type { FetchFn } from '@utils/http';
import { createTestLogger } from '../../test-utils/logger';

const WEBHOOK = 'https://hooks.example.test/services/test';

describe('formatSlackText', () => {
  it('should put the title in bold on its own line', () => {
    expect(formatSlackText('Temperature Alert', 'open the windows')).toBe('*Temperature Alert*\nopen the windows');
  });
});

describe('createSlackNotifier', () => {
  it('should post JSON to the webhook', async () => {
    const fetchFn = vi.fn<FetchFn>(async () => new Response('ok', { status: 200 }));
    const log = createTestLogger();
    const notifier = createSlackNotifier({ type: 'slack', webhookUrl: WEBHOOK }, { fetchFn: fetchFn, timeoutMs: 1000, logger: log.logger });

    await notifier.sendNotification('Temperature Alert', 'msg');

    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe(WEBHOOK);
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('{"text":"*Temperature Alert*\\nmsg"}');
    expect(notifier.name).toBe('slack');
    expect(log.messages('INFO')).toEqual(['Notification sent via Slack.']);
  });

  it('should reject on a non-2xx status', async () => {
    const fetchFn = vi.fn<FetchFn>(async () => new Response('invalid_token', { status: 403 }));
    const notifier = createSlackNotifier({ type: 'slack', webhookUrl: WEBHOOK }, { fetchFn: fetchFn, timeoutMs: 1000, logger: createTestLogger().logger });

    const error = await notifier.sendNotification('t', 'm').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NotifierError);
    expect(error).toMatchObject({ message: 'Slack returned HTTP 403: invalid_token', channels: ['slack'] });
  });

  it('should wrap network failures', async () => {
    const fetchFn = vi.fn<FetchFn>(async () => { throw new Error('ECONNRESET'); });
    const notifier = createSlackNotifier({ type: 'slack', webhookUrl: WEBHOOK }, { fetchFn: fetchFn, timeoutMs: 1000, logger: createTestLogger().logger });

    await expect(notifier.sendNotification('t', 'm')).rejects.toThrow('Slack request failed: ECONNRESET');
  });
});
