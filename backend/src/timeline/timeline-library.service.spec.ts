import { calculateDifficulty } from './difficulty';
import { RawTimelineDefinition, TimelineLibraryService } from './timeline-library.service';
import { TimelineValidationError } from './timeline.types';

describe('TimelineLibraryService', () => {
  let library: TimelineLibraryService;

  const custom: RawTimelineDefinition = {
    id: 'custom',
    name: 'Custom',
    durationMinutes: 5,
    events: [
      { id: 'a', featureId: 'flash', kind: 'start', minute: 0, pairedEventId: 'b' },
      { id: 'b', featureId: 'flash', kind: 'stop', minute: 3, pairedEventId: 'a' },
    ],
  };

  beforeEach(() => {
    library = new TimelineLibraryService();
  });

  it('loads the built-in timeline', () => {
    expect(library.list()).toEqual([
      expect.objectContaining({ id: 'morning-drift', durationMinutes: 30, builtIn: true }),
    ]);

    const model = library.get('morning-drift');
    expect(model?.activeFeaturesAt(16)).toEqual([
      'audio_whispers',
      'bouncing_text',
      'bubbles',
      'flash',
      'pink_filter',
      'subliminal',
    ]);
    expect(model?.activeFeaturesAt(17)).not.toContain('bubbles');
    expect(model?.phrasePool('bouncing_text')).toHaveLength(5);
  });

  it('scores the built-in timeline', () => {
    const model = library.get('morning-drift');

    expect(model && calculateDifficulty(model)).toEqual({ tier: 'easy', xp: 324, weight: 1 });
  });

  it('registers a custom timeline', () => {
    const model = library.register(custom);

    expect(model.id).toBe('custom');
    expect(model.pairedStopOf('a')?.id).toBe('b');
    expect(library.get('custom')).toBe(model);
    expect(library.list().map((summary) => summary.builtIn)).toEqual([true, false]);
  });

  it('generates an id when none is given', () => {
    const model = library.register({ ...custom, id: undefined });

    expect(model.id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('rejects malformed definitions', () => {
    const orphan: RawTimelineDefinition = {
      ...custom,
      events: [{ id: 'x', featureId: 'flash', kind: 'stop', minute: 2 }],
    };
    const badKind: RawTimelineDefinition = {
      ...custom,
      events: [{ id: 'y', featureId: 'flash', kind: 'pause', minute: 2 }],
    };

    expect(() => library.register(orphan)).toThrow(TimelineValidationError);
    expect(() => library.register(badKind)).toThrow('event y has unknown kind "pause"');
    expect(library.get('custom')).toBeUndefined();
  });

  it('does not replace or remove built-in timelines', () => {
    expect(() => library.register({ ...custom, id: 'morning-drift' })).toThrow(TimelineValidationError);
    expect(library.remove('morning-drift')).toBe(false);
    expect(library.get('morning-drift')).toBeDefined();
  });

  it('removes custom timelines', () => {
    library.register(custom);

    expect(library.remove('custom')).toBe(true);
    expect(library.remove('custom')).toBe(false);
    expect(library.get('custom')).toBeUndefined();
  });
});
