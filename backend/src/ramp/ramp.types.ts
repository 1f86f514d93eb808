import { Ticker } from '../common/ticker';

export interface RampOptions {
  linkedParameters: string[];
  durationMinutes: number;
  /** Target multiplier reached at the end of the ramp */
  multiplier: number;
  /** Ask the engine to stop once the target is reached */
  endOnComplete: boolean;
}

export type StartRampError = 'AlreadyActive';

/** Runtime state of an active ramp; discarded on stop */
export interface RampState extends RampOptions {
  /** Values captured at start, restored exactly on stop */
  baselineValues: Map<string, number>;
  startedAt: Date;
  progress: number;
  currentMultiplier: number;
  completed: boolean;
  ticker: Ticker;
}

export interface RampStatus {
  active: boolean;
  progress: number;
  currentMultiplier: number;
  targetMultiplier?: number;
  durationMinutes?: number;
  endOnComplete?: boolean;
  baseline: Record<string, number>;
  values: Record<string, number>;
}
