// Engine Service - the main run: optional timeline session plus the intensity ramp

import { BeforeApplicationShutdown, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2, OnEvent } from '@nestjs/event-emitter';
import { Result, ok, rejected } from '../common/result';
import {
  EngineStartSource,
  EngineStartedPayload,
  EngineStopSource,
  EngineStoppedPayload,
  InternalEvent,
  RampCompletedPayload,
  SessionStoppedPayload,
} from '../common/websocket.types';
import { SettingsService } from '../config/settings.service';
import { IntensityRampService } from '../ramp/intensity-ramp.service';
import { SessionEngineService } from '../session/session-engine.service';
import { TimelineLibraryService } from '../timeline/timeline-library.service';
import { EngineControl, EngineMode, EngineStartError, EngineStatus } from './engine.types';

interface ActiveEngine {
  mode: EngineMode;
  startedAt: Date;
  startedBy: EngineStartSource;
}

@Injectable()
export class EngineService implements EngineControl, BeforeApplicationShutdown {
  private readonly logger = new Logger(EngineService.name);
  private active: ActiveEngine | null = null;
  private lastStopSource?: EngineStopSource;

  constructor(
    private readonly sessionEngine: SessionEngineService,
    private readonly ramp: IntensityRampService,
    private readonly library: TimelineLibraryService,
    private readonly settings: SettingsService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  /**
   * Graceful shutdown: stopping the engine restores ramp and session baselines
   */
  beforeApplicationShutdown(): void {
    this.requestStop('shutdown');
  }

  get isRunning(): boolean {
    return this.active !== null;
  }

  get isStopped(): boolean {
    return this.active === null;
  }

  requestStart(mode: EngineMode, source: EngineStartSource = 'user'): Result<EngineStatus, EngineStartError> {
    if (this.active) {
      this.logger.warn(`Rejected engine start from ${source}: already running`);
      return rejected('AlreadyRunning');
    }

    const model = mode.kind === 'timeline' ? this.library.get(mode.timelineId) : undefined;
    if (mode.kind === 'timeline' && !model) {
      this.logger.warn(`Rejected engine start from ${source}: unknown timeline ${mode.timelineId}`);
      return rejected('UnknownTimeline');
    }

    // Marked running first: session and ramp emit synchronously while starting
    this.active = { mode, startedAt: new Date(), startedBy: source };

    if (model && !this.sessionEngine.startSession(model).success) {
      this.active = null;
      return rejected('SessionRejected');
    }

    const rampConfig = this.settings.getRamp();
    if (rampConfig.enabled) {
      const rampResult = this.ramp.start({
        linkedParameters: rampConfig.linkedParameters,
        durationMinutes: rampConfig.durationMinutes,
        multiplier: rampConfig.multiplier,
        endOnComplete: rampConfig.endOnComplete,
      });
      if (!rampResult.success) {
        this.logger.warn(`Intensity ramp not started: ${rampResult.error}`);
      }
    }

    this.logger.log(`Engine started (${describeMode(mode)}) by ${source}`);
    const payload: EngineStartedPayload = {
      mode: mode.kind,
      timelineId: mode.kind === 'timeline' ? mode.timelineId : undefined,
      source,
      timestamp: new Date().toISOString(),
    };
    this.eventEmitter.emit(InternalEvent.ENGINE_STARTED, payload);

    return ok(this.status());
  }

  requestStop(source: EngineStopSource): boolean {
    if (!this.active) {
      return false;
    }

    const { mode } = this.active;
    // Cleared first so the session-stopped event below does not re-enter
    this.active = null;
    this.lastStopSource = source;

    this.ramp.stop();
    this.sessionEngine.stopSession(false);

    this.logger.log(`Engine stopped (${describeMode(mode)}) by ${source}`);
    const payload: EngineStoppedPayload = { source, timestamp: new Date().toISOString() };
    this.eventEmitter.emit(InternalEvent.ENGINE_STOPPED, payload);
    return true;
  }

  status(): EngineStatus {
    return {
      running: this.active !== null,
      mode: this.active?.mode,
      startedAt: this.active?.startedAt.toISOString(),
      startedBy: this.active?.startedBy,
      lastStopSource: this.lastStopSource,
      session: this.sessionEngine.status(),
      ramp: this.ramp.status(),
    };
  }

  @OnEvent(InternalEvent.RAMP_COMPLETED)
  handleRampCompleted(payload: RampCompletedPayload): void {
    if (payload.endOnComplete && this.active) {
      this.requestStop('ramp');
    }
  }

  /**
   * A timeline run ending on its own (or stopped directly) ends the engine run
   */
  @OnEvent(InternalEvent.SESSION_STOPPED)
  handleSessionStopped(payload: SessionStoppedPayload): void {
    const mode = this.active?.mode;
    if (mode?.kind === 'timeline' && mode.timelineId === payload.timelineId) {
      this.requestStop('session');
    }
  }
}

function describeMode(mode: EngineMode): string {
  return mode.kind === 'timeline' ? `timeline ${mode.timelineId}` : 'default';
}
