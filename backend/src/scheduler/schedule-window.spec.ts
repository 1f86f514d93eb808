import { ScheduleConfig } from '../config/settings.types';
import { isInWindow, parseTimeOfDay, resolveWindow, weekdayIndex } from './schedule-window';

// 2026-10-19 is a Monday
const monday = (hours: number, minutes: number): Date => new Date(2026, 9, 19, hours, minutes);

function schedule(startTime: string, endTime: string): ScheduleConfig {
  return {
    enabled: true,
    activeDays: [true, true, true, true, true, true, true],
    startTime,
    endTime,
  };
}

describe('isInWindow', () => {
  it('handles a same-day window as [start, end)', () => {
    const config = schedule('09:00', '17:00');

    expect(isInWindow(monday(8, 59), config)).toBe(false);
    expect(isInWindow(monday(9, 0), config)).toBe(true);
    expect(isInWindow(monday(16, 59), config)).toBe(true);
    expect(isInWindow(monday(17, 0), config)).toBe(false);
  });

  it('wraps a window that ends before it starts past midnight', () => {
    const config = schedule('22:00', '02:00');

    expect(isInWindow(monday(23, 30), config)).toBe(true);
    expect(isInWindow(monday(1, 30), config)).toBe(true);
    expect(isInWindow(monday(12, 0), config)).toBe(false);
  });

  it('is closed on inactive days', () => {
    const config = schedule('09:00', '17:00');
    config.activeDays = [false, true, true, true, true, true, true];

    expect(isInWindow(monday(10, 0), config)).toBe(false);
    expect(isInWindow(new Date(2026, 9, 20, 10, 0), config)).toBe(true);
  });

  it('falls back to 16:00-22:00 for unparsable times', () => {
    const config = schedule('25:00', 'later');

    expect(isInWindow(monday(15, 59), config)).toBe(false);
    expect(isInWindow(monday(16, 0), config)).toBe(true);
    expect(isInWindow(monday(22, 0), config)).toBe(false);
  });

  it('treats equal start and end as an empty window', () => {
    expect(isInWindow(monday(9, 0), schedule('09:00', '09:00'))).toBe(false);
  });
});

describe('parseTimeOfDay', () => {
  it('returns minutes since midnight', () => {
    expect(parseTimeOfDay('00:00')).toBe(0);
    expect(parseTimeOfDay('7:05')).toBe(425);
    expect(parseTimeOfDay(' 23:59 ')).toBe(1439);
  });

  it('rejects out-of-range and malformed values', () => {
    expect(parseTimeOfDay('24:00')).toBeUndefined();
    expect(parseTimeOfDay('12:60')).toBeUndefined();
    expect(parseTimeOfDay('noon')).toBeUndefined();
  });
});

describe('resolveWindow', () => {
  it('flags wrapping windows', () => {
    expect(resolveWindow({ startTime: '22:00', endTime: '02:00' })).toEqual({ start: 1320, end: 120, wraps: true });
    expect(resolveWindow({ startTime: '09:00', endTime: '17:00' })).toEqual({ start: 540, end: 1020, wraps: false });
  });
});

describe('weekdayIndex', () => {
  it('counts from Monday', () => {
    expect(weekdayIndex(monday(12, 0))).toBe(0);
    expect(weekdayIndex(new Date(2026, 9, 18, 12, 0))).toBe(6);
  });
});
