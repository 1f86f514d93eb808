// backend/src/config/settings.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { InternalEvent, SettingsChangedPayload } from '../common/websocket.types';
import {
  RAMP_DURATION_RANGE,
  RAMP_MULTIPLIER_RANGE,
  RampConfig,
  ScheduleConfig,
  defaultRampConfig,
  defaultScheduleConfig,
} from './settings.types';

export interface SchedulePatch {
  enabled?: boolean;
  activeDays?: boolean[];
  startTime?: string;
  endTime?: string;
}

export type RampPatch = Partial<RampConfig>;

const clamp = (value: number, min: number, max: number): number => Math.min(max, Math.max(min, value));

/**
 * In-memory owner of the schedule and ramp settings.
 * Callers receive copies; changes only go through the update methods.
 */
@Injectable()
export class SettingsService {
  private readonly logger = new Logger(SettingsService.name);
  private schedule: ScheduleConfig = defaultScheduleConfig();
  private ramp: RampConfig = defaultRampConfig();

  constructor(private readonly eventEmitter: EventEmitter2) {}

  getSchedule(): ScheduleConfig {
    return { ...this.schedule, activeDays: [...this.schedule.activeDays] };
  }

  getRamp(): RampConfig {
    return { ...this.ramp, linkedParameters: [...this.ramp.linkedParameters] };
  }

  updateSchedule(patch: SchedulePatch): ScheduleConfig {
    const next: ScheduleConfig = { ...this.schedule };

    if (patch.enabled !== undefined) next.enabled = patch.enabled;
    if (patch.startTime !== undefined) next.startTime = patch.startTime.trim();
    if (patch.endTime !== undefined) next.endTime = patch.endTime.trim();
    if (patch.activeDays !== undefined) {
      const days = patch.activeDays;
      const day = (index: number): boolean => days[index] === true;
      next.activeDays = [day(0), day(1), day(2), day(3), day(4), day(5), day(6)];
    }

    this.schedule = next;
    this.logger.log(
      `Schedule updated: enabled=${next.enabled}, window=${next.startTime}-${next.endTime}`,
    );
    this.emitChanged('schedule');
    return this.getSchedule();
  }

  updateRamp(patch: RampPatch): RampConfig {
    const next: RampConfig = { ...this.ramp };

    if (patch.enabled !== undefined) next.enabled = patch.enabled;
    if (patch.endOnComplete !== undefined) next.endOnComplete = patch.endOnComplete;
    if (patch.durationMinutes !== undefined) {
      next.durationMinutes = clamp(
        Math.round(patch.durationMinutes),
        RAMP_DURATION_RANGE.min,
        RAMP_DURATION_RANGE.max,
      );
    }
    if (patch.multiplier !== undefined) {
      next.multiplier = clamp(patch.multiplier, RAMP_MULTIPLIER_RANGE.min, RAMP_MULTIPLIER_RANGE.max);
    }
    if (patch.linkedParameters !== undefined) {
      next.linkedParameters = Array.from(new Set(patch.linkedParameters));
    }

    this.ramp = next;
    this.logger.log(
      `Ramp updated: enabled=${next.enabled}, duration=${next.durationMinutes}min, multiplier=${next.multiplier}x`,
    );
    this.emitChanged('ramp');
    return this.getRamp();
  }

  private emitChanged(section: SettingsChangedPayload['section']): void {
    const payload: SettingsChangedPayload = { section, timestamp: new Date().toISOString() };
    this.eventEmitter.emit(InternalEvent.SETTINGS_CHANGED, payload);
  }
}
