/**
 * Unit tests for the state record format
 */

import { serializeState, deserializeState, parseStateRecord } from './serialization';
import { createInitialState } from './state';
import { appendSample } from '@core/rolling-window';

const T0 = Date.UTC(2024, 5, 1, 17, 5, 0);

describe('state serialization', () => {
  describe('serializeState', () => {
    it('should write snake_case keys and ISO times', () => {
      const state = createInitialState(60);
      state.lastNotificationTime = T0;
      state.armed = true;
      appendSample(state.rollingWindow, T0, 21.4);
      state.tempsSinceLastNotification = [21.4];

      expect(serializeState(state)).toEqual({
        last_notification_time: '2024-06-01T17:05:00.000Z',
        last_significant_rise_time: null,
        armed: true,
        rolling_window: [{ time: '2024-06-01T17:05:00.000Z', temperature: 21.4 }],
        temps_since_last_notification: [21.4]
      });
    });
  });

  describe('deserializeState', () => {
    it('should restore an equivalent state', () => {
      const state = createInitialState(30);
      state.lastSignificantEventTime = T0 + 7;
      appendSample(state.rollingWindow, T0, 19);
      appendSample(state.rollingWindow, T0 + 60000, 20.5);
      state.tempsSinceLastNotification = [19, 20.5];

      expect(deserializeState(serializeState(state), 30)).toEqual(state);
    });
  });

  describe('parseStateRecord', () => {
    it('should fill missing keys with defaults', () => {
      expect(parseStateRecord('{}')).toEqual({
        ok: true,
        record: {
          last_notification_time: null,
          last_significant_rise_time: null,
          armed: false,
          rolling_window: [],
          temps_since_last_notification: []
        }
      });
    });

    it('should reject invalid JSON', () => {
      const result = parseStateRecord('{not json');
      expect(result.ok).toBe(false);
    });

    it('should reject a wrong type with its path', () => {
      expect(parseStateRecord('{"armed": "yes"}')).toEqual({
        ok: false,
        reason: 'armed: Expected boolean, received string'
      });
    });

    it('should reject an unparseable timestamp', () => {
      expect(parseStateRecord('{"last_notification_time": "soon"}')).toEqual({
        ok: false,
        reason: 'last_notification_time: Invalid ISO-8601 timestamp'
      });
    });

    it('should reject a bare number as a timestamp', () => {
      expect(parseStateRecord(JSON.stringify({ last_notification_time: '1', armed: true }))).toEqual({
        ok: false,
        reason: 'last_notification_time: Invalid ISO-8601 timestamp'
      });
    });

    it('should reject a date without a time', () => {
      expect(parseStateRecord('{"last_significant_rise_time": "2024-06-01"}')).toEqual({
        ok: false,
        reason: 'last_significant_rise_time: Invalid ISO-8601 timestamp'
      });
    });

    it('should accept naive timestamps with microseconds', () => {
      const result = parseStateRecord('{"last_notification_time": "2024-06-01T17:05:00.123456"}');
      expect(result.ok).toBe(true);
    });

    it('should reject rolling window records out of order', () => {
      const content = JSON.stringify({
        rolling_window: [
          { time: '2024-06-01T12:00:00.000Z', temperature: 1 },
          { time: '2024-06-01T08:00:00.000Z', temperature: 2 }
        ]
      });
      expect(parseStateRecord(content)).toEqual({
        ok: false,
        reason: 'rolling_window: Samples must be in chronological order'
      });
    });

    it('should accept records sharing a time', () => {
      const content = JSON.stringify({
        rolling_window: [
          { time: '2024-06-01T12:00:00.000Z', temperature: 1 },
          { time: '2024-06-01T12:00:00.000Z', temperature: 2 }
        ]
      });
      expect(parseStateRecord(content).ok).toBe(true);
    });

    it('should reject a non-object root', () => {
      expect(parseStateRecord('[]')).toEqual({
        ok: false,
        reason: '<root>: Expected object, received array'
      });
    });
  });
});
