/**
 * Timeline Model
 *
 * Editor-side representation of a session timeline. Holds paired start/stop events
 * per feature and keeps the pairing invariants on every edit:
 *
 * - a stop always closes exactly one start of the same feature, at a later minute
 * - a start without a stop runs through the end of the session
 * - no event sits outside [0, durationMinutes]; changing the duration clamps, never deletes
 */

import { v4 as uuidv4 } from 'uuid';
import { FeatureId } from '../features/feature.types';
import {
  FrozenTimeline,
  PhrasePools,
  TimelineDefinition,
  TimelineEvent,
  TimelineEventKind,
  TimelineShape,
} from './timeline.types';

/**********************************************************************************/
/*                                                                                */
/*                                     Utils                                      */
/*                                                                                */
/**********************************************************************************/

const KIND_ORDER: Record<TimelineEventKind, number> = { stop: 0, start: 1 };

/**
 * Order by minute, then stops before starts so a feature handed over from one
 * interval to the next at the same minute ends up enabled.
 * Array sort is stable, so insertion order breaks any remaining tie.
 */
export function compareEvents(a: Readonly<TimelineEvent>, b: Readonly<TimelineEvent>): number {
  return a.minute - b.minute || KIND_ORDER[a.kind] - KIND_ORDER[b.kind];
}

export function orderEvents<T extends Readonly<TimelineEvent>>(events: readonly T[]): T[] {
  return [...events].sort(compareEvents);
}

export function normalizeDuration(minutes: number): number {
  return Number.isFinite(minutes) ? Math.max(1, Math.round(minutes)) : 1;
}

export function clampMinute(minute: number, durationMinutes: number): number {
  if (!Number.isFinite(minute)) return 0;
  return Math.min(durationMinutes, Math.max(0, Math.round(minute)));
}

export interface FeatureInterval {
  featureId: FeatureId;
  startEventId: string;
  /** First active minute */
  from: number;
  /** Minute the feature stops (exclusive); the session end for unpaired starts */
  to: number;
}

/**
 * Active intervals of every start event. Stops that close nothing are ignored.
 */
export function featureIntervals(timeline: TimelineShape): FeatureInterval[] {
  const duration = timeline.durationMinutes;
  const stops = new Map<string, Readonly<TimelineEvent>>();
  for (const event of timeline.events) {
    if (event.kind === 'stop') stops.set(event.id, event);
  }

  const intervals: FeatureInterval[] = [];
  for (const event of timeline.events) {
    if (event.kind !== 'start') continue;

    const stop = event.pairedEventId ? stops.get(event.pairedEventId) : undefined;
    const from = clampMinute(event.minute, duration);
    const to = stop ? clampMinute(stop.minute, duration) : duration;
    intervals.push({ featureId: event.featureId, startEventId: event.id, from, to: Math.max(from, to) });
  }
  return intervals;
}

/**
 * Feature ids active during the given minute.
 */
export function activeFeaturesAt(timeline: TimelineShape, minute: number): FeatureId[] {
  const active = new Set<FeatureId>();
  for (const interval of featureIntervals(timeline)) {
    if (minute >= interval.from && minute < interval.to) {
      active.add(interval.featureId);
    }
  }
  return Array.from(active).sort();
}

/**
 * Deep, frozen copy of a definition with its events ordered for playback.
 */
export function freezeTimeline(definition: TimelineDefinition): FrozenTimeline {
  const events = orderEvents(definition.events).map((event) => Object.freeze({ ...event }));
  const phrasePools: Record<string, readonly string[]> = {};
  for (const [name, phrases] of Object.entries(definition.phrasePools)) {
    phrasePools[name] = Object.freeze([...phrases]);
  }

  return Object.freeze({
    id: definition.id,
    name: definition.name,
    description: definition.description,
    durationMinutes: definition.durationMinutes,
    events: Object.freeze(events),
    phrasePools: Object.freeze(phrasePools),
  });
}

/**********************************************************************************/
/*                                                                                */
/*                                     Model                                      */
/*                                                                                */
/**********************************************************************************/

export interface TimelineInit {
  id?: string;
  name: string;
  description?: string;
  durationMinutes: number;
  phrasePools?: PhrasePools;
}

export class TimelineModel implements TimelineShape {
  readonly id: string;
  name: string;
  description: string;
  private duration: number;
  private eventList: TimelineEvent[] = [];
  private pools: PhrasePools = {};

  constructor(init: TimelineInit) {
    this.id = init.id ?? uuidv4();
    this.name = init.name;
    this.description = init.description ?? '';
    this.duration = normalizeDuration(init.durationMinutes);
    for (const [name, phrases] of Object.entries(init.phrasePools ?? {})) {
      this.setPhrasePool(name, phrases);
    }
  }

  /**
   * Build a model from a plain definition. Minutes are clamped into range but
   * pairing is taken as given; use `validateTimelineDefinition` first for
   * untrusted input.
   */
  static fromDefinition(definition: TimelineDefinition): TimelineModel {
    const model = new TimelineModel({
      id: definition.id,
      name: definition.name,
      description: definition.description,
      durationMinutes: definition.durationMinutes,
      phrasePools: definition.phrasePools,
    });
    model.eventList = orderEvents(
      definition.events.map((event) => ({ ...event, minute: clampMinute(event.minute, model.duration) })),
    );
    return model;
  }

  get durationMinutes(): number {
    return this.duration;
  }

  get events(): TimelineEvent[] {
    return this.eventList.map((event) => ({ ...event }));
  }

  get phrasePools(): PhrasePools {
    const copy: PhrasePools = {};
    for (const [name, phrases] of Object.entries(this.pools)) {
      copy[name] = [...phrases];
    }
    return copy;
  }

  getEvent(id: string): TimelineEvent | undefined {
    const event = this.find(id);
    return event ? { ...event } : undefined;
  }

  addStart(featureId: FeatureId, minute: number): TimelineEvent {
    const event: TimelineEvent = {
      id: uuidv4(),
      featureId,
      kind: 'start',
      minute: clampMinute(minute, this.duration),
    };
    this.insert(event);
    return { ...event };
  }

  /**
   * Close a start event. A stop at or before the start is moved to the minute after
   * it. Returns undefined when `start` is not a start of this timeline, or when it
   * sits at the session end and no later minute exists.
   * An existing stop of the same start is replaced.
   */
  addStop(start: TimelineEvent | string, minute: number): TimelineEvent | undefined {
    const startEvent = this.find(typeof start === 'string' ? start : start.id);
    if (!startEvent || startEvent.kind !== 'start') return undefined;

    let stopMinute = clampMinute(minute, this.duration);
    if (stopMinute <= startEvent.minute) {
      stopMinute = Math.min(startEvent.minute + 1, this.duration);
    }
    if (stopMinute <= startEvent.minute) return undefined;

    const previous = this.pairedStop(startEvent);
    if (previous) {
      this.eventList = this.eventList.filter((event) => event !== previous);
    }

    const stop: TimelineEvent = {
      id: uuidv4(),
      featureId: startEvent.featureId,
      kind: 'stop',
      minute: stopMinute,
      pairedEventId: startEvent.id,
    };
    startEvent.pairedEventId = stop.id;
    this.insert(stop);
    return { ...stop };
  }

  /**
   * Remove an event. Removing a start removes its stop too; removing a stop
   * leaves its start running to the end.
   */
  removeEvent(event: TimelineEvent | string): boolean {
    const target = this.find(typeof event === 'string' ? event : event.id);
    if (!target) return false;

    if (target.kind === 'start') {
      const stop = this.pairedStop(target);
      this.eventList = this.eventList.filter((e) => e !== target && e !== stop);
      return true;
    }

    for (const candidate of this.eventList) {
      if (candidate.kind === 'start' && candidate.pairedEventId === target.id) {
        delete candidate.pairedEventId;
      }
    }
    this.eventList = this.eventList.filter((e) => e !== target);
    return true;
  }

  pairedStopOf(start: TimelineEvent | string): TimelineEvent | undefined {
    const startEvent = this.find(typeof start === 'string' ? start : start.id);
    if (!startEvent || startEvent.kind !== 'start') return undefined;
    const stop = this.pairedStop(startEvent);
    return stop ? { ...stop } : undefined;
  }

  /**
   * Change the duration. Events past the new end are pulled back to it; a start
   * pulled onto its own stop moves one minute earlier so the pair stays ordered.
   */
  setDuration(minutes: number): void {
    this.duration = normalizeDuration(minutes);

    for (const event of this.eventList) {
      if (event.minute > this.duration) {
        event.minute = this.duration;
      }
    }

    for (const event of this.eventList) {
      if (event.kind !== 'start') continue;
      const stop = this.pairedStop(event);
      if (stop && stop.minute <= event.minute) {
        event.minute = Math.max(0, stop.minute - 1);
      }
    }

    this.eventList = orderEvents(this.eventList);
  }

  setPhrasePool(name: string, phrases: readonly string[]): void {
    this.pools[name] = [...phrases];
  }

  phrasePool(name: string): string[] {
    return [...(this.pools[name] ?? [])];
  }

  /**
   * Events with minute in (from, to], stops first within a minute.
   */
  eventsBetween(from: number, to: number): TimelineEvent[] {
    return this.eventList
      .filter((event) => event.minute > from && event.minute <= to)
      .map((event) => ({ ...event }));
  }

  activeFeaturesAt(minute: number): FeatureId[] {
    return activeFeaturesAt(this, minute);
  }

  featureIds(): FeatureId[] {
    return Array.from(new Set(this.eventList.map((event) => event.featureId)));
  }

  toDefinition(): TimelineDefinition {
    return {
      id: this.id,
      name: this.name,
      description: this.description,
      durationMinutes: this.duration,
      events: this.events,
      phrasePools: this.phrasePools,
    };
  }

  /** Immutable snapshot for a session run; later edits do not reach it */
  freeze(): FrozenTimeline {
    return freezeTimeline(this.toDefinition());
  }

  private find(id: string): TimelineEvent | undefined {
    return this.eventList.find((event) => event.id === id);
  }

  private pairedStop(start: TimelineEvent): TimelineEvent | undefined {
    if (!start.pairedEventId) return undefined;
    return this.eventList.find((event) => event.id === start.pairedEventId && event.kind === 'stop');
  }

  private insert(event: TimelineEvent): void {
    this.eventList.push(event);
    this.eventList = orderEvents(this.eventList);
  }
}

/**********************************************************************************/
/*                                                                                */
/*                                   Validation                                   */
/*                                                                                */
/**********************************************************************************/

/**
 * Check an untrusted definition (import, API) against the pairing invariants.
 * Returns a list of problems, empty when the definition is well formed.
 */
export function validateTimelineDefinition(definition: TimelineDefinition): string[] {
  const problems: string[] = [];
  const duration = definition.durationMinutes;

  if (!Number.isInteger(duration) || duration < 1) {
    problems.push(`durationMinutes must be a positive integer (got ${duration})`);
  }
  if (!definition.name.trim()) {
    problems.push('name must not be empty');
  }

  const byId = new Map<string, TimelineEvent>();
  for (const event of definition.events) {
    if (byId.has(event.id)) {
      problems.push(`duplicate event id ${event.id}`);
      continue;
    }
    byId.set(event.id, event);

    if (!Number.isInteger(event.minute) || event.minute < 0 || event.minute > duration) {
      problems.push(`event ${event.id} minute ${event.minute} is outside [0, ${duration}]`);
    }
  }

  for (const event of byId.values()) {
    const paired = event.pairedEventId ? byId.get(event.pairedEventId) : undefined;

    if (event.kind === 'start') {
      if (!event.pairedEventId) continue;
      if (!paired || paired.kind !== 'stop') {
        problems.push(`start ${event.id} is paired with ${event.pairedEventId}, which is not a stop`);
      } else if (paired.pairedEventId !== event.id) {
        problems.push(`start ${event.id} is paired with stop ${paired.id}, which closes another start`);
      } else if (paired.featureId !== event.featureId) {
        problems.push(`start ${event.id} is paired with a stop of another feature`);
      } else if (paired.minute <= event.minute) {
        problems.push(`stop ${paired.id} must come after start ${event.id}`);
      }
      continue;
    }

    if (!paired || paired.kind !== 'start') {
      problems.push(`stop ${event.id} has no start`);
    } else if (paired.pairedEventId !== event.id) {
      problems.push(`stop ${event.id} closes start ${paired.id}, which points elsewhere`);
    }
  }

  return problems;
}
