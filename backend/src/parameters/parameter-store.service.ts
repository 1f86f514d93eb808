// Parameter Store - in-memory numeric settings with per-parameter bounds
import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import definitionData from './parameter-definitions.json';
import {
  ParameterDefinition,
  ParameterStore,
  UnknownParameterError,
} from './parameter.types';
import { InternalEvent, ParameterChangedPayload } from '../common/websocket.types';

export const DEFAULT_PARAMETER_DEFINITIONS: readonly ParameterDefinition[] = definitionData;

@Injectable()
export class ParameterStoreService implements ParameterStore {
  private readonly logger = new Logger(ParameterStoreService.name);
  private readonly definitions = new Map<string, ParameterDefinition>();
  private readonly values = new Map<string, number>();

  constructor(private readonly eventEmitter: EventEmitter2) {
    this.define(DEFAULT_PARAMETER_DEFINITIONS);
  }

  /**
   * Add or replace parameter definitions. New parameters start at their default.
   */
  define(definitions: readonly ParameterDefinition[]): void {
    for (const definition of definitions) {
      this.definitions.set(definition.name, { ...definition });
      if (!this.values.has(definition.name)) {
        this.values.set(definition.name, definition.defaultValue);
      }
    }
  }

  has(name: string): boolean {
    return this.definitions.has(name);
  }

  list(): Array<ParameterDefinition & { value: number }> {
    return Array.from(this.definitions.values(), (definition) => ({
      ...definition,
      value: this.get(definition.name),
    }));
  }

  get(name: string): number {
    const value = this.values.get(name);
    if (value === undefined) {
      throw new UnknownParameterError(name);
    }
    return value;
  }

  /**
   * Write a value, clamped to the parameter's bounds.
   */
  set(name: string, value: number): void {
    const definition = this.requireDefinition(name);
    const previous = this.get(name);
    const next = Math.min(definition.max, Math.max(definition.min, value));

    if (next === previous) return;

    this.values.set(name, next);
    this.logger.debug(`${name}: ${previous} -> ${next}`);

    const payload: ParameterChangedPayload = {
      name,
      value: next,
      previous,
      timestamp: new Date().toISOString(),
    };
    this.eventEmitter.emit(InternalEvent.PARAMETER_CHANGED, payload);
  }

  maxAllowed(name: string): number {
    return this.requireDefinition(name).max;
  }

  private requireDefinition(name: string): ParameterDefinition {
    const definition = this.definitions.get(name);
    if (!definition) {
      throw new UnknownParameterError(name);
    }
    return definition;
  }
}
