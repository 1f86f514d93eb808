/**
 * Timeline Types
 *
 * A timeline is a bounded script of feature start/stop events anchored to whole
 * minutes. These shapes are shared by the editor-side model, the library and the
 * session engine.
 */

import { FeatureId } from '../features/feature.types';

export type TimelineEventKind = 'start' | 'stop';

export interface TimelineEvent {
  id: string;
  featureId: FeatureId;
  kind: TimelineEventKind;
  /** Whole minute in [0, durationMinutes] */
  minute: number;
  /**
   * Start: the stop that closes it (unset = active through session end).
   * Stop: the start it closes.
   */
  pairedEventId?: string;
}

/** Named lists of strings used by text-emitting features */
export type PhrasePools = Record<string, string[]>;

/** Plain, serialisable form of a timeline */
export interface TimelineDefinition {
  id: string;
  name: string;
  description: string;
  durationMinutes: number;
  events: TimelineEvent[];
  phrasePools: PhrasePools;
}

/** Immutable snapshot handed to the session engine for a run */
export interface FrozenTimeline {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly durationMinutes: number;
  /** Ordered by minute, stops before starts within a minute */
  readonly events: readonly Readonly<TimelineEvent>[];
  readonly phrasePools: Readonly<Record<string, readonly string[]>>;
}

/** Anything with a duration and events can be scored */
export interface TimelineShape {
  readonly durationMinutes: number;
  readonly events: readonly Readonly<TimelineEvent>[];
}

export class TimelineValidationError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid timeline: ${problems.join('; ')}`);
    this.name = 'TimelineValidationError';
  }
}
