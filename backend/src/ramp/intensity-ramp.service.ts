// Intensity Ramp Service - linearly scales linked parameters from their baseline towards a multiplier

import { Inject, Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { CLOCK, Clock, elapsedMs } from '../common/clock';
import { describeError } from '../common/errors';
import { Result, ok, rejected } from '../common/result';
import { createTicker } from '../common/ticker';
import {
  InternalEvent,
  RampCompletedPayload,
  RampProgressPayload,
  RampStartedPayload,
  RampStoppedPayload,
} from '../common/websocket.types';
import { DEFAULT_ENGINE_TIMINGS } from '../config/environment';
import { PARAMETER_STORE, ParameterStore } from '../parameters/parameter.types';
import { RampOptions, RampState, RampStatus, StartRampError } from './ramp.types';

/** Fraction of the ramp duration elapsed, in [0, 1] */
export function rampProgress(elapsedMinutes: number, durationMinutes: number): number {
  if (durationMinutes <= 0) return 1;
  return Math.min(1, Math.max(0, elapsedMinutes / durationMinutes));
}

/** Linear interpolation from 1 to the target multiplier */
export function interpolateMultiplier(targetMultiplier: number, progress: number): number {
  return 1 + (targetMultiplier - 1) * progress;
}

export function rampedValue(baseline: number, currentMultiplier: number, maxAllowed: number): number {
  return Math.min(baseline * currentMultiplier, maxAllowed);
}

@Injectable()
export class IntensityRampService implements OnApplicationShutdown {
  private readonly logger = new Logger(IntensityRampService.name);
  private readonly tickMs: number;
  private state: RampState | null = null;

  constructor(
    @Inject(PARAMETER_STORE) private readonly store: ParameterStore,
    @Inject(CLOCK) private readonly clock: Clock,
    private readonly eventEmitter: EventEmitter2,
    config: ConfigService,
  ) {
    this.tickMs = config.get<number>('engine.rampTickMs') ?? DEFAULT_ENGINE_TIMINGS.rampTickMs;
  }

  onApplicationShutdown(): void {
    if (this.state) {
      this.logger.log('Shutting down with an active ramp - restoring baseline');
      this.stop();
    }
  }

  get isActive(): boolean {
    return this.state !== null;
  }

  /**
   * Capture the baseline of every linked parameter and start ticking.
   * Parameters the store does not know are skipped.
   */
  start(options: RampOptions): Result<RampStatus, StartRampError> {
    if (this.state) {
      this.logger.warn('Rejected ramp start: a ramp is already active');
      return rejected('AlreadyActive');
    }

    const baselineValues = new Map<string, number>();
    for (const name of options.linkedParameters) {
      if (!this.store.has(name)) {
        this.logger.warn(`Skipping unknown ramp parameter: ${name}`);
        continue;
      }
      baselineValues.set(name, this.store.get(name));
    }

    const state: RampState = {
      ...options,
      linkedParameters: Array.from(baselineValues.keys()),
      baselineValues,
      startedAt: this.clock.now(),
      progress: 0,
      currentMultiplier: 1,
      completed: false,
      ticker: createTicker(
        this.tickMs,
        () => this.tick(state),
        (error) => this.logger.error(`Ramp tick failed: ${describeError(error)}`),
      ),
    };
    this.state = state;

    this.logger.log(
      `Ramp started: ${state.linkedParameters.join(', ') || 'no parameters'} -> ${options.multiplier}x over ${options.durationMinutes} min`,
    );
    const payload: RampStartedPayload = {
      linkedParameters: state.linkedParameters,
      durationMinutes: options.durationMinutes,
      multiplier: options.multiplier,
      endOnComplete: options.endOnComplete,
      timestamp: new Date().toISOString(),
    };
    this.eventEmitter.emit(InternalEvent.RAMP_STARTED, payload);

    state.ticker.start();
    return ok(this.status());
  }

  /**
   * Stop ticking and write every captured baseline value back.
   * Returns false when no ramp was active.
   */
  stop(): boolean {
    const state = this.state;
    if (!state) return false;

    state.ticker.stop();
    this.state = null;

    const restored: Record<string, number> = {};
    for (const [name, value] of state.baselineValues) {
      try {
        this.store.set(name, value);
        restored[name] = value;
      } catch (error) {
        this.logger.error(`Failed to restore ${name}: ${describeError(error)}`);
      }
    }

    this.logger.log(`Ramp stopped at ${Math.round(state.progress * 100)}% - baseline restored`);
    const payload: RampStoppedPayload = { restored, timestamp: new Date().toISOString() };
    this.eventEmitter.emit(InternalEvent.RAMP_STOPPED, payload);
    return true;
  }

  status(): RampStatus {
    if (!this.state) {
      return { active: false, progress: 0, currentMultiplier: 1, baseline: {}, values: {} };
    }

    const state = this.state;
    return {
      active: true,
      progress: state.progress,
      currentMultiplier: state.currentMultiplier,
      targetMultiplier: state.multiplier,
      durationMinutes: state.durationMinutes,
      endOnComplete: state.endOnComplete,
      baseline: Object.fromEntries(state.baselineValues),
      values: this.currentValues(state),
    };
  }

  private tick(state: RampState): void {
    if (this.state !== state) {
      state.ticker.stop();
      return;
    }

    const elapsedMinutes = elapsedMs(state.startedAt, this.clock.now()) / 60_000;
    state.progress = rampProgress(elapsedMinutes, state.durationMinutes);
    state.currentMultiplier = interpolateMultiplier(state.multiplier, state.progress);

    const values: Record<string, number> = {};
    for (const [name, baseline] of state.baselineValues) {
      try {
        const value = rampedValue(baseline, state.currentMultiplier, this.store.maxAllowed(name));
        this.store.set(name, value);
        values[name] = value;
      } catch (error) {
        this.logger.error(`Failed to write ramp value for ${name}: ${describeError(error)}`);
      }
    }

    const progress: RampProgressPayload = {
      progress: state.progress,
      currentMultiplier: state.currentMultiplier,
      values,
      timestamp: new Date().toISOString(),
    };
    this.eventEmitter.emit(InternalEvent.RAMP_PROGRESS, progress);

    if (state.progress >= 1 && !state.completed) {
      // Values hold at the target until stop() restores them
      state.completed = true;
      state.ticker.stop();
      this.logger.log(`Ramp reached ${state.multiplier}x${state.endOnComplete ? ' - requesting engine stop' : ''}`);

      const completed: RampCompletedPayload = {
        endOnComplete: state.endOnComplete,
        timestamp: new Date().toISOString(),
      };
      this.eventEmitter.emit(InternalEvent.RAMP_COMPLETED, completed);
    }
  }

  private currentValues(state: RampState): Record<string, number> {
    const values: Record<string, number> = {};
    for (const name of state.baselineValues.keys()) {
      values[name] = this.store.get(name);
    }
    return values;
  }
}
