// Session state machine: idle -> running -> (completed | stopped-early) -> idle

import { FeatureId } from '../features/feature.types';
import { Ticker } from '../common/ticker';
import { SessionOutcome } from '../common/websocket.types';
import { FrozenTimeline } from '../timeline/timeline.types';

export type SessionPhase = 'idle' | 'running' | SessionOutcome;

export type StartSessionError = 'AlreadyRunning';

/** Bookkeeping of one playback run */
export interface SessionRun {
  timeline: FrozenTimeline;
  startedAt: Date;
  /** Feature state before the run, restored when it ends */
  baseline: Map<FeatureId, boolean>;
  /** Index of the next unapplied event in `timeline.events` */
  nextEventIndex: number;
  /** Stops with no start to close; applying them does nothing */
  orphanStops: Set<string>;
  ticker: Ticker;
}

export interface IdleState {
  phase: 'idle';
  lastOutcome?: SessionOutcome;
}

export interface RunningState {
  phase: 'running';
  run: SessionRun;
}

/** Terminal states only last while their events are emitted */
export interface FinishedState {
  phase: SessionOutcome;
  run: SessionRun;
}

export type SessionState = IdleState | RunningState | FinishedState;

export interface SessionStatus {
  phase: SessionPhase;
  timelineId?: string;
  name?: string;
  elapsedSeconds: number;
  remainingSeconds: number;
  percent: number;
  activeFeatures: FeatureId[];
  lastOutcome?: SessionOutcome;
}
