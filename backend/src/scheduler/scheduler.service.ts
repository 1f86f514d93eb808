// Scheduler Service - starts and stops the engine inside the weekly schedule window

import { Inject, Injectable, Logger, OnApplicationBootstrap, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2, OnEvent } from '@nestjs/event-emitter';
import { CLOCK, Clock } from '../common/clock';
import { describeError } from '../common/errors';
import { Ticker, createTicker } from '../common/ticker';
import {
  EngineStartedPayload,
  EngineStoppedPayload,
  InternalEvent,
  SchedulerActionPayload,
} from '../common/websocket.types';
import { DEFAULT_ENGINE_TIMINGS } from '../config/environment';
import { SettingsService } from '../config/settings.service';
import { ENGINE_CONTROL, EngineControl } from '../engine/engine.types';
import { isInWindow } from './schedule-window';
import { SchedulerAction, SchedulerRuntimeState, SchedulerStatus } from './scheduler.types';

@Injectable()
export class SchedulerService implements OnApplicationBootstrap, OnApplicationShutdown {
  private readonly logger = new Logger(SchedulerService.name);
  private readonly ticker: Ticker;
  private runtime: SchedulerRuntimeState = { autoStarted: false, manuallySuppressedThisWindow: false };
  private lastTickAt?: Date;
  private lastAction?: SchedulerAction;

  constructor(
    @Inject(ENGINE_CONTROL) private readonly engine: EngineControl,
    @Inject(CLOCK) private readonly clock: Clock,
    private readonly settings: SettingsService,
    private readonly eventEmitter: EventEmitter2,
    config: ConfigService,
  ) {
    const intervalMs = config.get<number>('engine.schedulerTickMs') ?? DEFAULT_ENGINE_TIMINGS.schedulerTickMs;
    this.ticker = createTicker(
      intervalMs,
      () => this.tick(),
      (error) => this.logger.error(`Scheduler tick failed: ${describeError(error)}`),
    );
  }

  /**
   * Check once right away, then on every interval
   */
  onApplicationBootstrap(): void {
    try {
      this.tick();
    } catch (error) {
      this.logger.error(`Initial scheduler tick failed: ${describeError(error)}`);
    }
    this.ticker.start();
    this.logger.log(`Scheduler running every ${this.ticker.intervalMs / 1000}s`);
  }

  onApplicationShutdown(): void {
    this.ticker.stop();
  }

  tick(): SchedulerAction {
    const now = this.clock.now();
    this.lastTickAt = now;
    this.lastAction = this.evaluate(now);
    return this.lastAction;
  }

  getRuntimeState(): SchedulerRuntimeState {
    return { ...this.runtime };
  }

  status(): SchedulerStatus {
    const schedule = this.settings.getSchedule();
    return {
      ...this.runtime,
      enabled: schedule.enabled,
      inWindow: isInWindow(this.clock.now(), schedule),
      tickIntervalMs: this.ticker.intervalMs,
      lastTickAt: this.lastTickAt?.toISOString(),
      lastAction: this.lastAction,
    };
  }

  /**
   * A user stopping the engine inside the window keeps the scheduler from
   * restarting it until the window is left and entered again
   */
  @OnEvent(InternalEvent.ENGINE_STOPPED)
  handleEngineStopped(payload: EngineStoppedPayload): void {
    if (payload.source !== 'user') return;

    const schedule = this.settings.getSchedule();
    if (schedule.enabled && isInWindow(this.clock.now(), schedule)) {
      this.runtime.manuallySuppressedThisWindow = true;
      this.logger.log('Manual stop inside the schedule window - auto-start suppressed until the next window');
    }
  }

  @OnEvent(InternalEvent.ENGINE_STARTED)
  handleEngineStarted(payload: EngineStartedPayload): void {
    if (payload.source === 'user' && this.runtime.manuallySuppressedThisWindow) {
      this.runtime.manuallySuppressedThisWindow = false;
      this.logger.log('Manual start - auto-start suppression cleared');
    }
  }

  private evaluate(now: Date): SchedulerAction {
    const schedule = this.settings.getSchedule();
    if (!schedule.enabled) {
      return 'disabled';
    }

    const inWindow = isInWindow(now, schedule);

    if (
      inWindow &&
      this.engine.isStopped &&
      !this.runtime.autoStarted &&
      !this.runtime.manuallySuppressedThisWindow
    ) {
      const result = this.engine.requestStart({ kind: 'default' }, 'scheduler');
      if (!result.success) {
        this.logger.warn(`Scheduled start rejected: ${result.error}`);
        return 'idle';
      }
      this.runtime.autoStarted = true;
      this.logger.log('Schedule window entered - engine started');
      this.emitAction(InternalEvent.SCHEDULER_AUTO_START, now);
      return 'started';
    }

    if (!inWindow && this.engine.isRunning && this.runtime.autoStarted) {
      this.engine.requestStop('scheduler');
      this.runtime.autoStarted = false;
      this.logger.log('Schedule window left - engine stopped');
      this.emitAction(InternalEvent.SCHEDULER_AUTO_STOP, now);
      return 'stopped';
    }

    if (!inWindow) {
      this.runtime = { autoStarted: false, manuallySuppressedThisWindow: false };
      return 'rearmed';
    }

    return 'idle';
  }

  private emitAction(
    event: InternalEvent.SCHEDULER_AUTO_START | InternalEvent.SCHEDULER_AUTO_STOP,
    now: Date,
  ): void {
    const payload: SchedulerActionPayload = { timestamp: now.toISOString() };
    this.eventEmitter.emit(event, payload);
  }
}
