// Session Engine Service - plays a frozen timeline against the Feature Gateway in real time

import { Inject, Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { CLOCK, Clock, elapsedMs } from '../common/clock';
import { describeError } from '../common/errors';
import { Result, ok, rejected } from '../common/result';
import { createTicker } from '../common/ticker';
import {
  FeatureChange,
  InternalEvent,
  SessionCompletedPayload,
  SessionOutcome,
  SessionPhaseChangedPayload,
  SessionProgressPayload,
  SessionStartedPayload,
  SessionStoppedPayload,
} from '../common/websocket.types';
import { DEFAULT_ENGINE_TIMINGS } from '../config/environment';
import { FEATURE_GATEWAY, FeatureGateway, FeatureId } from '../features/feature.types';
import { calculateDifficulty } from '../timeline/difficulty';
import { TimelineModel, activeFeaturesAt } from '../timeline/timeline-model';
import { FrozenTimeline, TimelineEvent } from '../timeline/timeline.types';
import { SessionRun, SessionState, SessionStatus, StartSessionError } from './session.types';

@Injectable()
export class SessionEngineService implements OnApplicationShutdown {
  private readonly logger = new Logger(SessionEngineService.name);
  private readonly tickMs: number;
  private state: SessionState = { phase: 'idle' };

  constructor(
    @Inject(FEATURE_GATEWAY) private readonly gateway: FeatureGateway,
    @Inject(CLOCK) private readonly clock: Clock,
    private readonly eventEmitter: EventEmitter2,
    config: ConfigService,
  ) {
    this.tickMs = config.get<number>('engine.sessionTickMs') ?? DEFAULT_ENGINE_TIMINGS.sessionTickMs;
  }

  /**
   * Fallback for runs the engine did not stop: baseline is restored on shutdown
   */
  onApplicationShutdown(): void {
    if (this.state.phase === 'running') {
      this.logger.log('Shutting down with a session running - restoring baseline');
      this.stopSession(false);
    }
  }

  get isRunning(): boolean {
    return this.state.phase === 'running';
  }

  /**
   * Start playing a timeline. The model is frozen, so editing it afterwards does
   * not affect the run.
   */
  startSession(model: TimelineModel | FrozenTimeline): Result<SessionStatus, StartSessionError> {
    if (this.state.phase !== 'idle') {
      this.logger.warn(`Rejected session start: a session is already ${this.state.phase}`);
      return rejected('AlreadyRunning');
    }

    const timeline = model instanceof TimelineModel ? model.freeze() : model;
    const run: SessionRun = {
      timeline,
      startedAt: this.clock.now(),
      baseline: this.snapshotBaseline(timeline),
      nextEventIndex: 0,
      orphanStops: findOrphanStops(timeline),
      ticker: createTicker(
        this.tickMs,
        () => this.tick(run),
        (error) => this.logger.error(`Session tick failed: ${describeError(error)}`),
      ),
    };
    this.state = { phase: 'running', run };

    this.logger.log(`Session started: ${timeline.name} (${timeline.durationMinutes} min)`);
    const started: SessionStartedPayload = {
      timelineId: timeline.id,
      name: timeline.name,
      durationMinutes: timeline.durationMinutes,
      timestamp: new Date().toISOString(),
    };
    this.eventEmitter.emit(InternalEvent.SESSION_STARTED, started);

    // Establish the t=0 state before the first tick
    this.applyThrough(run, 0);
    run.ticker.start();

    return ok(this.status());
  }

  /**
   * End the running session early. `completed` decides whether the completion
   * carries the XP award or is reported as abandoned. Does nothing unless running.
   */
  stopSession(completed: boolean): boolean {
    if (this.state.phase !== 'running') {
      return false;
    }

    const { run } = this.state;
    run.ticker.stop();
    const elapsedSeconds = this.elapsedSeconds(run);
    this.restoreBaseline(run);

    this.logger.log(
      `Session stopped early at ${Math.floor(elapsedSeconds)}s: ${run.timeline.name}${completed ? '' : ' (abandoned)'}`,
    );
    this.finish(run, 'stopped-early', elapsedSeconds, completed ? calculateDifficulty(run.timeline).xp : 0, !completed);
    return true;
  }

  status(): SessionStatus {
    if (this.state.phase === 'idle') {
      return {
        phase: 'idle',
        elapsedSeconds: 0,
        remainingSeconds: 0,
        percent: 0,
        activeFeatures: [],
        lastOutcome: this.state.lastOutcome,
      };
    }

    const { run } = this.state;
    const progress = this.progressOf(run, this.elapsedSeconds(run));
    return {
      phase: this.state.phase,
      timelineId: run.timeline.id,
      name: run.timeline.name,
      elapsedSeconds: progress.elapsedSeconds,
      remainingSeconds: progress.remainingSeconds,
      percent: progress.percent,
      activeFeatures: activeFeaturesAt(run.timeline, Math.floor(progress.elapsedSeconds / 60)),
    };
  }

  private tick(run: SessionRun): void {
    if (this.state.phase !== 'running' || this.state.run !== run) {
      run.ticker.stop();
      return;
    }

    const duration = run.timeline.durationMinutes;
    const elapsedSeconds = this.elapsedSeconds(run);
    const elapsedMinutes = elapsedSeconds / 60;

    this.applyThrough(run, Math.min(Math.floor(elapsedMinutes), duration));
    this.emitProgress(run, elapsedSeconds);

    if (elapsedMinutes >= duration) {
      this.complete(run, elapsedSeconds);
    }
  }

  private complete(run: SessionRun, elapsedSeconds: number): void {
    run.ticker.stop();
    this.applyThrough(run, run.timeline.durationMinutes);
    this.restoreBaseline(run);

    const { xp, tier } = calculateDifficulty(run.timeline);
    this.logger.log(`Session completed: ${run.timeline.name} (+${xp} XP, ${tier})`);
    this.finish(run, 'completed', elapsedSeconds, xp, false);
  }

  private finish(
    run: SessionRun,
    outcome: SessionOutcome,
    elapsedSeconds: number,
    xp: number,
    abandoned: boolean,
  ): void {
    this.state = { phase: outcome, run };
    const timestamp = new Date().toISOString();

    const completed: SessionCompletedPayload = {
      timelineId: run.timeline.id,
      name: run.timeline.name,
      elapsedSeconds: Math.floor(elapsedSeconds),
      xp,
      abandoned,
      timestamp,
    };
    this.eventEmitter.emit(InternalEvent.SESSION_COMPLETED, completed);

    const stopped: SessionStoppedPayload = { timelineId: run.timeline.id, outcome, timestamp };
    this.state = { phase: 'idle', lastOutcome: outcome };
    this.eventEmitter.emit(InternalEvent.SESSION_STOPPED, stopped);
  }

  /**
   * Apply every unapplied event up to and including `minute`, one minute at a
   * time. Events are already ordered with stops first within a minute.
   */
  private applyThrough(run: SessionRun, minute: number): void {
    const events = run.timeline.events;

    while (run.nextEventIndex < events.length && events[run.nextEventIndex].minute <= minute) {
      const groupMinute = events[run.nextEventIndex].minute;
      const changes: FeatureChange[] = [];

      while (run.nextEventIndex < events.length && events[run.nextEventIndex].minute === groupMinute) {
        const event = events[run.nextEventIndex];
        run.nextEventIndex++;
        if (this.applyEvent(run, event)) {
          changes.push({ featureId: event.featureId, kind: event.kind });
        }
      }

      if (changes.length > 0) {
        const payload: SessionPhaseChangedPayload = {
          timelineId: run.timeline.id,
          minute: groupMinute,
          changes,
          activeFeatures: activeFeaturesAt(run.timeline, groupMinute),
          timestamp: new Date().toISOString(),
        };
        this.eventEmitter.emit(InternalEvent.SESSION_PHASE_CHANGED, payload);
      }
    }
  }

  /** Returns whether the event was applied */
  private applyEvent(run: SessionRun, event: Readonly<TimelineEvent>): boolean {
    if (event.kind === 'stop' && run.orphanStops.has(event.id)) {
      this.logger.warn(`Ignoring stop ${event.id} for ${event.featureId}: no start to close`);
      return false;
    }

    try {
      if (event.kind === 'start') {
        this.gateway.enable(event.featureId);
      } else {
        this.gateway.disable(event.featureId);
      }
      this.logger.debug(`Minute ${event.minute}: ${event.kind} ${event.featureId}`);
      return true;
    } catch (error) {
      this.logger.error(`Failed to ${event.kind} feature ${event.featureId}: ${describeError(error)}`);
      return false;
    }
  }

  private snapshotBaseline(timeline: FrozenTimeline): Map<FeatureId, boolean> {
    const baseline = new Map<FeatureId, boolean>();
    for (const event of timeline.events) {
      if (!baseline.has(event.featureId)) {
        baseline.set(event.featureId, this.gateway.isEnabled(event.featureId));
      }
    }
    return baseline;
  }

  private restoreBaseline(run: SessionRun): void {
    for (const [featureId, enabled] of run.baseline) {
      try {
        if (enabled) {
          this.gateway.enable(featureId);
        } else {
          this.gateway.disable(featureId);
        }
      } catch (error) {
        this.logger.error(`Failed to restore feature ${featureId}: ${describeError(error)}`);
      }
    }
  }

  private emitProgress(run: SessionRun, elapsedSeconds: number): void {
    const payload: SessionProgressPayload = {
      timelineId: run.timeline.id,
      ...this.progressOf(run, elapsedSeconds),
      timestamp: new Date().toISOString(),
    };
    this.eventEmitter.emit(InternalEvent.SESSION_PROGRESS, payload);
  }

  private progressOf(
    run: SessionRun,
    elapsedSeconds: number,
  ): Pick<SessionProgressPayload, 'elapsedSeconds' | 'remainingSeconds' | 'percent'> {
    const totalSeconds = run.timeline.durationMinutes * 60;
    const elapsed = Math.min(Math.floor(elapsedSeconds), totalSeconds);
    return {
      elapsedSeconds: elapsed,
      remainingSeconds: totalSeconds - elapsed,
      percent: Math.round((elapsed / totalSeconds) * 1000) / 10,
    };
  }

  private elapsedSeconds(run: SessionRun): number {
    return elapsedMs(run.startedAt, this.clock.now()) / 1000;
  }
}

/**
 * Stops that close no start of the timeline, in either direction of the pairing.
 */
export function findOrphanStops(timeline: FrozenTimeline): Set<string> {
  const starts = new Map<string, Readonly<TimelineEvent>>();
  for (const event of timeline.events) {
    if (event.kind === 'start') starts.set(event.id, event);
  }

  const orphans = new Set<string>();
  for (const event of timeline.events) {
    if (event.kind !== 'stop') continue;
    const start = event.pairedEventId ? starts.get(event.pairedEventId) : undefined;
    const closedBy = Array.from(starts.values()).some((candidate) => candidate.pairedEventId === event.id);
    if ((!start || start.featureId !== event.featureId) && !closedBy) {
      orphans.add(event.id);
    }
  }
  return orphans;
}
