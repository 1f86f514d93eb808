import { FeatureId } from '../features/feature.types';
import { FeatureCatalog, defaultFeatureCatalog } from '../features/feature-catalog';
import { featureIntervals } from './timeline-model';
import { TimelineShape } from './timeline.types';

export type DifficultyTier = 'easy' | 'medium' | 'hard' | 'extreme';

export interface Difficulty {
  tier: DifficultyTier;
  xp: number;
  weight: number;
}

/** Sessions at least this long add one to the difficulty weight */
export const LONG_SESSION_MINUTES = 60;

/** Base XP per session minute */
export const XP_PER_MINUTE = 2;

export function tierForWeight(weight: number): DifficultyTier {
  if (weight >= 6) return 'extreme';
  if (weight >= 4) return 'hard';
  if (weight >= 2) return 'medium';
  return 'easy';
}

/**
 * Whole minutes in [0, duration) during which each started feature is active.
 * Overlapping intervals of the same feature count once.
 */
export function activeMinutesByFeature(timeline: TimelineShape): Map<FeatureId, number> {
  const covered = new Map<FeatureId, Set<number>>();

  for (const interval of featureIntervals(timeline)) {
    const minutes = covered.get(interval.featureId) ?? new Set<number>();
    for (let minute = interval.from; minute < Math.min(interval.to, timeline.durationMinutes); minute++) {
      minutes.add(minute);
    }
    covered.set(interval.featureId, minutes);
  }

  return new Map(Array.from(covered, ([featureId, minutes]) => [featureId, minutes.size]));
}

/**
 * Difficulty tier and XP award for a timeline. Deterministic, and never decreases
 * when the duration grows or a feature is added.
 */
export function calculateDifficulty(
  timeline: TimelineShape,
  catalog: FeatureCatalog = defaultFeatureCatalog,
): Difficulty {
  const duration = Math.max(0, timeline.durationMinutes);
  let xp = XP_PER_MINUTE * duration;
  let weight = duration >= LONG_SESSION_MINUTES ? 1 : 0;

  for (const [featureId, activeMinutes] of activeMinutesByFeature(timeline)) {
    const feature = catalog.resolve(featureId);
    xp += feature.xpBonus + Math.floor((feature.xpBonus * activeMinutes) / 60);
    weight += feature.difficultyWeight;
  }

  return { tier: tierForWeight(weight), xp, weight };
}
