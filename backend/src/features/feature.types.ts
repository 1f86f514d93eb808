// Feature types - toggleable effects addressed by opaque ids

/** Opaque key naming a toggleable effect; the engine never interprets it */
export type FeatureId = string;

export type FeatureCategory = 'audio' | 'video' | 'overlays' | 'interactive' | 'extras';

export interface FeatureDefinition {
  id: FeatureId;
  name: string;
  category: FeatureCategory;
  supportsRamping: boolean;
  /** XP contribution when a timeline uses the feature */
  xpBonus: number;
  /** Weight towards the timeline difficulty tier */
  difficultyWeight: number;
}

/** Implementation of one feature, registered at the gateway boundary */
export interface FeatureHandler {
  enable(featureId: FeatureId): void;
  disable(featureId: FeatureId): void;
}

/** DI token for the {@link FeatureGateway} the session engine drives */
export const FEATURE_GATEWAY = Symbol('FEATURE_GATEWAY');

/**
 * Enable/disable operations the session engine calls.
 * Both are idempotent and may throw per call.
 */
export interface FeatureGateway {
  enable(featureId: FeatureId): void;
  disable(featureId: FeatureId): void;
  isEnabled(featureId: FeatureId): boolean;
}

export class UnknownFeatureError extends Error {
  constructor(readonly featureId: FeatureId) {
    super(`No handler registered for feature "${featureId}"`);
    this.name = 'UnknownFeatureError';
  }
}
