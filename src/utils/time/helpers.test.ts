/**
 * Tests for time helper functions
 */

import {
  minutesToMs,
  parseTimeOfDay,
  timeOfDayToMinutes,
  getTimeOfDay,
  isAtOrAfterTimeOfDay,
  formatTimeOfDay,
  isSameLocalDay,
  toIsoString,
  parseIsoTimestamp
} from './helpers';

describe('minutesToMs', () => {
  it('should convert whole and fractional minutes', () => {
    expect(minutesToMs(1)).toBe(60000);
    expect(minutesToMs(30)).toBe(1800000);
    expect(minutesToMs(0.5)).toBe(30000);
  });
});

describe('parseTimeOfDay', () => {
  it('should parse valid 24-hour times', () => {
    expect(parseTimeOfDay('00:00')).toEqual({ hours: 0, minutes: 0 });
    expect(parseTimeOfDay('07:30')).toEqual({ hours: 7, minutes: 30 });
    expect(parseTimeOfDay('23:59')).toEqual({ hours: 23, minutes: 59 });
  });

  it('should reject malformed times', () => {
    expect(parseTimeOfDay('24:00')).toBeNull();
    expect(parseTimeOfDay('7:30')).toBeNull();
    expect(parseTimeOfDay('12:60')).toBeNull();
    expect(parseTimeOfDay('12:30:00')).toBeNull();
    expect(parseTimeOfDay('')).toBeNull();
  });
});

describe('timeOfDayToMinutes', () => {
  it('should count minutes since midnight', () => {
    expect(timeOfDayToMinutes({ hours: 0, minutes: 0 })).toBe(0);
    expect(timeOfDayToMinutes({ hours: 17, minutes: 15 })).toBe(1035);
  });
});

describe('getTimeOfDay', () => {
  it('should read local hours and minutes', () => {
    const ts = new Date(2024, 6, 10, 18, 42, 55).getTime();
    expect(getTimeOfDay(ts)).toEqual({ hours: 18, minutes: 42 });
  });
});

describe('isAtOrAfterTimeOfDay', () => {
  const arming = { hours: 17, minutes: 0 };

  it('should be false before the time', () => {
    expect(isAtOrAfterTimeOfDay(new Date(2024, 6, 10, 16, 59).getTime(), arming)).toBe(false);
  });

  it('should be true exactly at the time', () => {
    expect(isAtOrAfterTimeOfDay(new Date(2024, 6, 10, 17, 0).getTime(), arming)).toBe(true);
  });

  it('should ignore seconds', () => {
    expect(isAtOrAfterTimeOfDay(new Date(2024, 6, 10, 17, 0, 59).getTime(), arming)).toBe(true);
  });

  it('should be true later in the day', () => {
    expect(isAtOrAfterTimeOfDay(new Date(2024, 6, 10, 23, 30).getTime(), arming)).toBe(true);
  });
});

describe('formatTimeOfDay', () => {
  it('should zero-pad hours and minutes', () => {
    expect(formatTimeOfDay({ hours: 7, minutes: 5 })).toBe('07:05');
    expect(formatTimeOfDay({ hours: 17, minutes: 30 })).toBe('17:30');
  });
});

describe('isSameLocalDay', () => {
  it('should match timestamps on the same date', () => {
    const morning = new Date(2024, 6, 10, 0, 0, 1).getTime();
    const night = new Date(2024, 6, 10, 23, 59, 59).getTime();
    expect(isSameLocalDay(morning, night)).toBe(true);
  });

  it('should differ across midnight', () => {
    const beforeMidnight = new Date(2024, 6, 10, 23, 59, 59).getTime();
    const afterMidnight = new Date(2024, 6, 11, 0, 0, 0).getTime();
    expect(isSameLocalDay(beforeMidnight, afterMidnight)).toBe(false);
  });

  it('should differ for the same day of another month', () => {
    expect(isSameLocalDay(new Date(2024, 5, 10).getTime(), new Date(2024, 6, 10).getTime())).toBe(false);
  });
});

describe('ISO timestamps', () => {
  it('should serialize as UTC with milliseconds', () => {
    expect(toIsoString(Date.UTC(2024, 0, 2, 3, 4, 5, 678))).toBe('2024-01-02T03:04:05.678Z');
  });

  it('should parse what it serializes', () => {
    const ts = Date.UTC(2024, 6, 10, 18, 42, 55, 123);
    expect(parseIsoTimestamp(toIsoString(ts))).toBe(ts);
  });

  it('should read strings without offset as local time', () => {
    expect(parseIsoTimestamp('2024-07-10T18:42:55')).toBe(new Date(2024, 6, 10, 18, 42, 55).getTime());
  });

  it('should return null for garbage', () => {
    expect(parseIsoTimestamp('not a date')).toBeNull();
  });
});
