// Parameter Store types - named numeric settings the ramp scales

export interface ParameterDefinition {
  name: string;
  label: string;
  defaultValue: number;
  min: number;
  /** Ceiling the ramp may not exceed */
  max: number;
}

/** DI token for the {@link ParameterStore} */
export const PARAMETER_STORE = Symbol('PARAMETER_STORE');

export interface ParameterStore {
  get(name: string): number;
  set(name: string, value: number): void;
  /** Parameter-specific ceiling */
  maxAllowed(name: string): number;
  has(name: string): boolean;
}

export class UnknownParameterError extends Error {
  constructor(readonly parameter: string) {
    super(`Unknown parameter "${parameter}"`);
    this.name = 'UnknownParameterError';
  }
}
