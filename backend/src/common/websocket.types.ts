// Event Type Definitions
// Centralized registry of internal engine events, the WebSocket events they are
// relayed as, and their payloads

export type FeatureEventKind = 'start' | 'stop';
export type SessionOutcome = 'completed' | 'stopped-early';
export type EngineStartSource = 'user' | 'scheduler';
export type EngineStopSource = 'user' | 'scheduler' | 'ramp' | 'session' | 'shutdown';

/**
 * Session Events
 */
export interface SessionStartedPayload {
  timelineId: string;
  name: string;
  durationMinutes: number;
  timestamp: string;
}

export interface SessionProgressPayload {
  timelineId: string;
  elapsedSeconds: number;
  remainingSeconds: number;
  percent: number;
  timestamp: string;
}

export interface FeatureChange {
  featureId: string;
  kind: FeatureEventKind;
}

export interface SessionPhaseChangedPayload {
  timelineId: string;
  minute: number;
  changes: FeatureChange[];
  activeFeatures: string[];
  timestamp: string;
}

export interface SessionCompletedPayload {
  timelineId: string;
  name: string;
  elapsedSeconds: number;
  xp: number;
  abandoned: boolean;
  timestamp: string;
}

export interface SessionStoppedPayload {
  timelineId: string;
  outcome: SessionOutcome;
  timestamp: string;
}

/**
 * Engine Events
 */
export interface EngineStartedPayload {
  mode: 'default' | 'timeline';
  timelineId?: string;
  source: EngineStartSource;
  timestamp: string;
}

export interface EngineStoppedPayload {
  source: EngineStopSource;
  timestamp: string;
}

/**
 * Intensity Ramp Events
 */
export interface RampStartedPayload {
  linkedParameters: string[];
  durationMinutes: number;
  multiplier: number;
  endOnComplete: boolean;
  timestamp: string;
}

export interface RampProgressPayload {
  progress: number;
  currentMultiplier: number;
  values: Record<string, number>;
  timestamp: string;
}

export interface RampCompletedPayload {
  endOnComplete: boolean;
  timestamp: string;
}

export interface RampStoppedPayload {
  restored: Record<string, number>;
  timestamp: string;
}

/**
 * Scheduler Events
 */
export interface SchedulerActionPayload {
  timestamp: string;
}

/**
 * Collaborator Events
 */
export interface FeatureToggledPayload {
  featureId: string;
  enabled: boolean;
  timestamp: string;
}

export interface ParameterChangedPayload {
  name: string;
  value: number;
  previous: number;
  timestamp: string;
}

export interface SettingsChangedPayload {
  section: 'schedule' | 'ramp';
  timestamp: string;
}

/**
 * WebSocket Event Names
 * Names clients subscribe to
 */
export enum WebSocketEvent {
  SESSION_STARTED = 'session-started',
  SESSION_PROGRESS = 'session-progress',
  SESSION_PHASE_CHANGED = 'session-phase-changed',
  SESSION_COMPLETED = 'session-completed',
  SESSION_STOPPED = 'session-stopped',

  ENGINE_STARTED = 'engine-started',
  ENGINE_STOPPED = 'engine-stopped',

  RAMP_STARTED = 'ramp-started',
  RAMP_PROGRESS = 'ramp-progress',
  RAMP_COMPLETED = 'ramp-completed',
  RAMP_STOPPED = 'ramp-stopped',

  SCHEDULER_AUTO_START = 'scheduler-auto-start',
  SCHEDULER_AUTO_STOP = 'scheduler-auto-stop',

  FEATURE_TOGGLED = 'feature-toggled',
  PARAMETER_CHANGED = 'parameter-changed',
  SETTINGS_CHANGED = 'settings-changed',
}

/**
 * Event Emitter Internal Event Names
 * These are used with @OnEvent decorators
 */
export enum InternalEvent {
  SESSION_STARTED = 'session.started',
  SESSION_PROGRESS = 'session.progress',
  SESSION_PHASE_CHANGED = 'session.phase-changed',
  SESSION_COMPLETED = 'session.completed',
  SESSION_STOPPED = 'session.stopped',

  ENGINE_STARTED = 'engine.started',
  ENGINE_STOPPED = 'engine.stopped',

  RAMP_STARTED = 'ramp.started',
  RAMP_PROGRESS = 'ramp.progress',
  RAMP_COMPLETED = 'ramp.completed',
  RAMP_STOPPED = 'ramp.stopped',

  SCHEDULER_AUTO_START = 'scheduler.auto-start',
  SCHEDULER_AUTO_STOP = 'scheduler.auto-stop',

  FEATURE_TOGGLED = 'feature.toggled',
  PARAMETER_CHANGED = 'parameter.changed',
  SETTINGS_CHANGED = 'settings.changed',
}

/**
 * Type-safe event payload mapping
 * Maps WebSocket events to their expected payload types
 */
export interface WebSocketEventMap {
  [WebSocketEvent.SESSION_STARTED]: SessionStartedPayload;
  [WebSocketEvent.SESSION_PROGRESS]: SessionProgressPayload;
  [WebSocketEvent.SESSION_PHASE_CHANGED]: SessionPhaseChangedPayload;
  [WebSocketEvent.SESSION_COMPLETED]: SessionCompletedPayload;
  [WebSocketEvent.SESSION_STOPPED]: SessionStoppedPayload;

  [WebSocketEvent.ENGINE_STARTED]: EngineStartedPayload;
  [WebSocketEvent.ENGINE_STOPPED]: EngineStoppedPayload;

  [WebSocketEvent.RAMP_STARTED]: RampStartedPayload;
  [WebSocketEvent.RAMP_PROGRESS]: RampProgressPayload;
  [WebSocketEvent.RAMP_COMPLETED]: RampCompletedPayload;
  [WebSocketEvent.RAMP_STOPPED]: RampStoppedPayload;

  [WebSocketEvent.SCHEDULER_AUTO_START]: SchedulerActionPayload;
  [WebSocketEvent.SCHEDULER_AUTO_STOP]: SchedulerActionPayload;

  [WebSocketEvent.FEATURE_TOGGLED]: FeatureToggledPayload;
  [WebSocketEvent.PARAMETER_CHANGED]: ParameterChangedPayload;
  [WebSocketEvent.SETTINGS_CHANGED]: SettingsChangedPayload;
}
