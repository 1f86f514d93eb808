import { FeatureCatalog } from '../features/feature-catalog';
import { activeMinutesByFeature, calculateDifficulty, tierForWeight } from './difficulty';
import { TimelineModel } from './timeline-model';

describe('calculateDifficulty', () => {
  it('scores duration and the active minutes of each feature', () => {
    const model = new TimelineModel({ name: 'Short', durationMinutes: 5 });
    const flash = model.addStart('flash', 0);
    model.addStop(flash, 3);

    // 2 * 5 + 50 + floor(50 * 3 / 60)
    expect(calculateDifficulty(model)).toEqual({ tier: 'easy', xp: 62, weight: 1 });
  });

  it('scores an empty timeline by duration alone', () => {
    const model = new TimelineModel({ name: 'Empty', durationMinutes: 30 });

    expect(calculateDifficulty(model)).toEqual({ tier: 'easy', xp: 60, weight: 0 });
  });

  it('adds weight for sessions of an hour or more', () => {
    const model = new TimelineModel({ name: 'Long', durationMinutes: 60 });

    expect(calculateDifficulty(model).weight).toBe(1);
  });

  it('gives unknown features the neutral defaults', () => {
    const model = new TimelineModel({ name: 'Mystery', durationMinutes: 10 });
    model.addStart('mystery', 0);

    // 2 * 10 + 10 + floor(10 * 10 / 60)
    expect(calculateDifficulty(model)).toEqual({ tier: 'easy', xp: 31, weight: 0 });
  });

  it('does not decrease with duration or features', () => {
    const model = new TimelineModel({ name: 'Growing', durationMinutes: 20 });
    model.addStart('spiral', 5);
    const before = calculateDifficulty(model).xp;

    model.setDuration(40);
    const longer = calculateDifficulty(model).xp;
    model.addStart('mandatory_videos', 10);
    const richer = calculateDifficulty(model).xp;

    expect(longer).toBeGreaterThan(before);
    expect(richer).toBeGreaterThan(longer);
    expect(calculateDifficulty(model).xp).toBe(richer);
  });

  it('uses the given catalog', () => {
    const catalog = new FeatureCatalog([
      { id: 'heavy', name: 'Heavy', category: 'extras', supportsRamping: false, xpBonus: 60, difficultyWeight: 6 },
    ]);
    const model = new TimelineModel({ name: 'Heavy', durationMinutes: 1 });
    model.addStart('heavy', 0);

    expect(calculateDifficulty(model, catalog)).toEqual({ tier: 'extreme', xp: 63, weight: 6 });
  });
});

describe('activeMinutesByFeature', () => {
  it('counts overlapping intervals of a feature once', () => {
    const model = new TimelineModel({ name: 'Overlap', durationMinutes: 10 });
    const first = model.addStart('flash', 0);
    model.addStop(first, 5);
    const second = model.addStart('flash', 3);
    model.addStop(second, 8);

    expect(activeMinutesByFeature(model).get('flash')).toBe(8);
  });
});

describe('tierForWeight', () => {
  it.each([
    [0, 'easy'],
    [1, 'easy'],
    [2, 'medium'],
    [3, 'medium'],
    [4, 'hard'],
    [5, 'hard'],
    [6, 'extreme'],
    [9, 'extreme'],
  ])('weight %i is %s', (weight, tier) => {
    expect(tierForWeight(weight)).toBe(tier);
  });
});
