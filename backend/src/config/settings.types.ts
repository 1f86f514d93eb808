// Engine settings owned by the configuration layer

/** Monday..Sunday */
export type WeekFlags = [boolean, boolean, boolean, boolean, boolean, boolean, boolean];

export interface ScheduleConfig {
  enabled: boolean;
  /** Active days, index 0 = Monday .. 6 = Sunday */
  activeDays: WeekFlags;
  /** Window start as entered by the user ("HH:mm") */
  startTime: string;
  /** Window end ("HH:mm"); earlier than start means the window wraps past midnight */
  endTime: string;
}

export interface RampConfig {
  enabled: boolean;
  durationMinutes: number;
  multiplier: number;
  linkedParameters: string[];
  endOnComplete: boolean;
}

export const DEFAULT_SCHEDULE_START = '16:00';
export const DEFAULT_SCHEDULE_END = '22:00';

export const RAMP_DURATION_RANGE = { min: 10, max: 180 } as const;
export const RAMP_MULTIPLIER_RANGE = { min: 1, max: 3 } as const;

export function defaultScheduleConfig(): ScheduleConfig {
  return {
    enabled: false,
    activeDays: [true, true, true, true, true, true, true],
    startTime: DEFAULT_SCHEDULE_START,
    endTime: DEFAULT_SCHEDULE_END,
  };
}

export function defaultRampConfig(): RampConfig {
  return {
    enabled: false,
    durationMinutes: 60,
    multiplier: 1,
    linkedParameters: [],
    endOnComplete: false,
  };
}
