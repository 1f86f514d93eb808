/**
 * Weekly schedule window
 *
 * A window is active on the flagged weekdays between a start and an end time of
 * day. An end earlier than the start wraps past midnight. Weekday and time are
 * read from the local time of the given instant.
 */

import { DEFAULT_SCHEDULE_END, DEFAULT_SCHEDULE_START, ScheduleConfig } from '../config/settings.types';

const TIME_OF_DAY = /^(\d{1,2}):(\d{2})$/;

/**
 * Minutes since midnight for an "HH:mm" string, or undefined when it does not parse
 */
export function parseTimeOfDay(value: string): number | undefined {
  const match = TIME_OF_DAY.exec(value.trim());
  if (!match) return undefined;

  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) return undefined;
  return hours * 60 + minutes;
}

/** Like {@link parseTimeOfDay}, falling back to `fallback` (a valid "HH:mm") */
export function timeOfDayOrDefault(value: string, fallback: string): number {
  return parseTimeOfDay(value) ?? parseTimeOfDay(fallback) ?? 0;
}

/** 0 = Monday .. 6 = Sunday */
export function weekdayIndex(date: Date): number {
  return (date.getDay() + 6) % 7;
}

/** Minutes since local midnight, with seconds as a fraction */
export function minutesOfDay(date: Date): number {
  return date.getHours() * 60 + date.getMinutes() + date.getSeconds() / 60;
}

export interface ResolvedWindow {
  start: number;
  end: number;
  wraps: boolean;
}

/** Window bounds in minutes of day; unparsable times use 16:00 / 22:00 */
export function resolveWindow(config: Pick<ScheduleConfig, 'startTime' | 'endTime'>): ResolvedWindow {
  const start = timeOfDayOrDefault(config.startTime, DEFAULT_SCHEDULE_START);
  const end = timeOfDayOrDefault(config.endTime, DEFAULT_SCHEDULE_END);
  return { start, end, wraps: end < start };
}

export function isInWindow(now: Date, config: ScheduleConfig): boolean {
  if (!config.activeDays[weekdayIndex(now)]) {
    return false;
  }

  const { start, end, wraps } = resolveWindow(config);
  const t = minutesOfDay(now);
  return wraps ? t >= start || t < end : t >= start && t < end;
}
