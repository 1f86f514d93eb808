// Engine Control - start/stop of the main run, shared by user requests, the scheduler and the ramp

import { Result } from '../common/result';
import { EngineStartSource, EngineStopSource } from '../common/websocket.types';
import { RampStatus } from '../ramp/ramp.types';
import { SessionStatus } from '../session/session.types';

/** Default mode runs without a timeline; timeline mode plays one through the session engine */
export type EngineMode = { kind: 'default' } | { kind: 'timeline'; timelineId: string };

export type EngineStartError = 'AlreadyRunning' | 'UnknownTimeline' | 'SessionRejected';

/** DI token for the {@link EngineControl} the scheduler drives */
export const ENGINE_CONTROL = Symbol('ENGINE_CONTROL');

export interface EngineControl {
  readonly isRunning: boolean;
  readonly isStopped: boolean;
  requestStart(mode: EngineMode, source?: EngineStartSource): Result<EngineStatus, EngineStartError>;
  /** Returns false when the engine was not running */
  requestStop(source: EngineStopSource): boolean;
}

export interface EngineStatus {
  running: boolean;
  mode?: EngineMode;
  startedAt?: string;
  startedBy?: EngineStartSource;
  lastStopSource?: EngineStopSource;
  session: SessionStatus;
  ramp: RampStatus;
}
