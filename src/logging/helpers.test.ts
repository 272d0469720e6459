/**
 * Unit tests for logging helpers
 */

import {
  LOG_LEVELS,
  getLevelName,
  formatLevelTag,
  formatConsoleLine,
  formatFileLine,
  shouldLog
} from './helpers';

describe('logging helpers', () => {
  describe('getLevelName', () => {
    it('should map every level to its name', () => {
      expect(getLevelName(LOG_LEVELS.DEBUG)).toBe('DEBUG');
      expect(getLevelName(LOG_LEVELS.INFO)).toBe('INFO');
      expect(getLevelName(LOG_LEVELS.WARNING)).toBe('WARNING');
      expect(getLevelName(LOG_LEVELS.ERROR)).toBe('ERROR');
    });
  });

  describe('formatLevelTag', () => {
    it('should pad to seven characters', () => {
      expect(formatLevelTag('INFO')).toBe('INFO   ');
      expect(formatLevelTag('WARNING')).toBe('WARNING');
    });
  });

  describe('formatConsoleLine', () => {
    it('should join tag and message with a bar', () => {
      expect(formatConsoleLine('ERROR', 'boom')).toBe('ERROR  | boom');
    });
  });

  describe('formatFileLine', () => {
    it('should prefix the ISO time', () => {
      const time = Date.UTC(2024, 0, 2, 3, 4, 5, 6);
      expect(formatFileLine(time, 'DEBUG', 'x')).toBe('2024-01-02T03:04:05.006Z|DEBUG  | x');
    });
  });

  describe('shouldLog', () => {
    it('should pass levels at or above the current level', () => {
      expect(shouldLog(LOG_LEVELS.INFO, LOG_LEVELS.INFO)).toBe(true);
      expect(shouldLog(LOG_LEVELS.ERROR, LOG_LEVELS.INFO)).toBe(true);
    });

    it('should drop levels below the current level', () => {
      expect(shouldLog(LOG_LEVELS.DEBUG, LOG_LEVELS.INFO)).toBe(false);
    });
  });
});
