// pulse-director/backend/src/timeline/timeline-library.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import morningDrift from './built-in/morning-drift.json';
import { TimelineModel, validateTimelineDefinition } from './timeline-model';
import { TimelineDefinition, TimelineEvent, TimelineEventKind, TimelineValidationError } from './timeline.types';

export interface TimelineSummary {
  id: string;
  name: string;
  description: string;
  durationMinutes: number;
  builtIn: boolean;
}

/** Shape of a definition as it arrives from JSON, before the kinds are checked */
export interface RawTimelineDefinition {
  id?: string;
  name: string;
  description?: string;
  durationMinutes: number;
  events: Array<{ id: string; featureId: string; kind: string; minute: number; pairedEventId?: string }>;
  phrasePools?: Record<string, string[]>;
}

const BUILT_IN: readonly RawTimelineDefinition[] = [morningDrift];

function isEventKind(value: string): value is TimelineEventKind {
  return value === 'start' || value === 'stop';
}

/**
 * Narrow raw JSON into a definition. Event kinds other than start/stop are
 * reported alongside the pairing problems.
 */
export function parseTimelineDefinition(raw: RawTimelineDefinition, fallbackId: string): TimelineDefinition {
  const problems: string[] = [];
  const events: TimelineEvent[] = [];

  for (const event of raw.events) {
    const kind = event.kind;
    if (!isEventKind(kind)) {
      problems.push(`event ${event.id} has unknown kind "${kind}"`);
      continue;
    }
    events.push({ ...event, kind });
  }

  const definition: TimelineDefinition = {
    id: raw.id ?? fallbackId,
    name: raw.name,
    description: raw.description ?? '',
    durationMinutes: raw.durationMinutes,
    events,
    phrasePools: raw.phrasePools ?? {},
  };

  problems.push(...validateTimelineDefinition(definition));
  if (problems.length > 0) {
    throw new TimelineValidationError(problems);
  }
  return definition;
}

/**
 * In-memory library of timelines: built-in sessions plus custom ones
 * registered at run time.
 */
@Injectable()
export class TimelineLibraryService {
  private readonly logger = new Logger(TimelineLibraryService.name);
  private readonly timelines = new Map<string, TimelineModel>();
  private readonly builtInIds = new Set<string>();

  constructor() {
    for (const raw of BUILT_IN) {
      const model = TimelineModel.fromDefinition(parseTimelineDefinition(raw, raw.name));
      this.timelines.set(model.id, model);
      this.builtInIds.add(model.id);
    }
    this.logger.log(`Loaded ${this.builtInIds.size} built-in timeline(s)`);
  }

  /**
   * Validate and store a timeline. Replaces a custom timeline with the same id;
   * built-in timelines cannot be replaced.
   */
  register(raw: RawTimelineDefinition): TimelineModel {
    const definition = parseTimelineDefinition(raw, uuidv4());

    if (this.builtInIds.has(definition.id)) {
      throw new TimelineValidationError([`"${definition.id}" is a built-in timeline`]);
    }

    const registered = TimelineModel.fromDefinition(definition);
    this.timelines.set(registered.id, registered);
    this.logger.log(`Registered timeline ${registered.id} (${registered.name}, ${registered.durationMinutes} min)`);
    return registered;
  }

  list(): TimelineSummary[] {
    return Array.from(this.timelines.values(), (model) => ({
      id: model.id,
      name: model.name,
      description: model.description,
      durationMinutes: model.durationMinutes,
      builtIn: this.builtInIds.has(model.id),
    }));
  }

  get(id: string): TimelineModel | undefined {
    return this.timelines.get(id);
  }

  isBuiltIn(id: string): boolean {
    return this.builtInIds.has(id);
  }

  /** Custom timelines only; returns false for unknown and built-in ids */
  remove(id: string): boolean {
    if (this.isBuiltIn(id) || !this.timelines.delete(id)) {
      return false;
    }
    this.logger.log(`Removed timeline ${id}`);
    return true;
  }
}
