import catalogData from './feature-catalog.json';
import { FeatureCategory, FeatureDefinition, FeatureId } from './feature.types';

const CATEGORIES: readonly FeatureCategory[] = ['audio', 'video', 'overlays', 'interactive', 'extras'];

function isCategory(value: string): value is FeatureCategory {
  return CATEGORIES.some((category) => category === value);
}

/** XP and weight applied to feature ids the catalog does not know */
export const UNKNOWN_FEATURE: Omit<FeatureDefinition, 'id' | 'name'> = {
  category: 'extras',
  supportsRamping: false,
  xpBonus: 10,
  difficultyWeight: 0,
};

export class FeatureCatalog {
  private readonly byId: Map<FeatureId, FeatureDefinition>;

  constructor(definitions: readonly FeatureDefinition[]) {
    this.byId = new Map(definitions.map((definition) => [definition.id, { ...definition }]));
  }

  static load(): FeatureCatalog {
    const definitions = catalogData.map(
      (entry): FeatureDefinition => ({
        ...entry,
        category: isCategory(entry.category) ? entry.category : UNKNOWN_FEATURE.category,
      }),
    );
    return new FeatureCatalog(definitions);
  }

  all(): FeatureDefinition[] {
    return Array.from(this.byId.values(), (definition) => ({ ...definition }));
  }

  get(id: FeatureId): FeatureDefinition | undefined {
    const definition = this.byId.get(id);
    return definition ? { ...definition } : undefined;
  }

  /** Definition for scoring; unknown ids get the neutral defaults */
  resolve(id: FeatureId): FeatureDefinition {
    return this.get(id) ?? { ...UNKNOWN_FEATURE, id, name: id };
  }

  byCategory(category: FeatureCategory): FeatureDefinition[] {
    return this.all().filter((definition) => definition.category === category);
  }
}

export const defaultFeatureCatalog = FeatureCatalog.load();
