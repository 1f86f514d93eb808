export interface SchedulerRuntimeState {
  autoStarted: boolean;
  manuallySuppressedThisWindow: boolean;
}

/** What a scheduler tick did */
export type SchedulerAction = 'disabled' | 'started' | 'stopped' | 'rearmed' | 'idle';

export interface SchedulerStatus extends SchedulerRuntimeState {
  enabled: boolean;
  inWindow: boolean;
  tickIntervalMs: number;
  lastTickAt?: string;
  lastAction?: SchedulerAction;
}
