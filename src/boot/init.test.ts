/**
 * Tests for controller initialization
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { createAppLogger, initialize } from './init';
import { LOG_LEVELS } from '@logging';
import type { Configuration, RuntimeSettings } from '$types/config';
import type { FetchFn } from '@utils/http';

const CONFIG: Configuration = {
  influxdb: {
    host: 'localhost',
    port: 8086,
    database: 'home',
    measurements: {
      indoor: { name: 'living_room', field: 'temperature' },
      outdoor: { name: 'garden', field: 'temperature' }
    }
  },
  notifiers: [
    { type: 'simplepush', key: 'test-key' },
    { type: 'slack', webhookUrl: 'https://hooks.example.com/services/test' }
  ],
  notification: {
    minIndoorTemperature: 23,
    rapidChangeEvent: { rise: 2, drop: 1.5, windowMinutes: 60 },
    reenable: { cooldownMinutes: 30, minRiseBetweenNotifications: 1 }
  },
  arming: { temperatureDelta: 2, time: null }
};

describe('boot/init', () => {
  let dir: string;
  let settings: RuntimeSettings;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'notifier-init-'));
    settings = {
      configPath: path.join(dir, 'config.json'),
      statePath: path.join(dir, 'state.json'),
      logFilePath: path.join(dir, 'notifier.log'),
      requestTimeoutMs: 1000,
      debug: false
    };
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('createAppLogger', () => {
    it('should log at INFO unless debug is set', () => {
      const consoleApi = { log: vi.fn(), error: vi.fn() };

      expect(createAppLogger(settings, consoleApi, false).getLevel()).toBe(LOG_LEVELS.INFO);
      expect(createAppLogger({ ...settings, debug: true }, consoleApi, false).getLevel()).toBe(LOG_LEVELS.DEBUG);
    });

    it('should write to the console and the log file', () => {
      const consoleApi = { log: vi.fn(), error: vi.fn() };
      const logger = createAppLogger(settings, consoleApi, false);

      logger.info('hello');
      logger.debug('hidden');

      expect(consoleApi.log).toHaveBeenCalledWith('INFO   | hello');
      expect(consoleApi.log).toHaveBeenCalledTimes(1);
      const content = fs.readFileSync(settings.logFilePath, 'utf8');
      expect(content.endsWith('|INFO   | hello\n')).toBe(true);
      expect(content.split('\n')).toHaveLength(2);
    });
  });

  describe('initialize', () => {
    it('should build one notifier per configured channel', () => {
      const consoleApi = { log: vi.fn(), error: vi.fn() };
      const logger = createAppLogger(settings, consoleApi, false);
      const fetchFn = vi.fn<FetchFn>();

      const controller = initialize(CONFIG, settings, logger, fetchFn);

      expect(controller.notifiers.map((n) => n.name)).toEqual(['simplepush', 'slack']);
      expect(controller.config).toBe(CONFIG);
      expect(fetchFn).not.toHaveBeenCalled();
    });

    it('should start from a fresh state when no state file exists', async () => {
      const consoleApi = { log: vi.fn(), error: vi.fn() };
      const controller = initialize(CONFIG, settings, createAppLogger(settings, consoleApi, false), vi.fn<FetchFn>());

      const state = await controller.store.load();

      expect(state.armed).toBe(false);
      expect(state.lastNotificationTime).toBeNull();
      expect(state.rollingWindow.windowMinutes).toBe(60);
    });
  });
});
