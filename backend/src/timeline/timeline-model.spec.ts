import { TimelineModel, validateTimelineDefinition } from './timeline-model';
import { TimelineDefinition } from './timeline.types';

describe('TimelineModel', () => {
  let model: TimelineModel;

  beforeEach(() => {
    model = new TimelineModel({ id: 'test', name: 'Test', durationMinutes: 10 });
  });

  describe('addStart', () => {
    it('clamps and rounds the minute into the session', () => {
      expect(model.addStart('flash', -3).minute).toBe(0);
      expect(model.addStart('flash', 12).minute).toBe(10);
      expect(model.addStart('flash', 2.4).minute).toBe(2);
    });
  });

  describe('addStop', () => {
    it('pairs the stop with its start', () => {
      const start = model.addStart('flash', 2);
      const stop = model.addStop(start, 6);

      expect(stop).toMatchObject({ featureId: 'flash', kind: 'stop', minute: 6, pairedEventId: start.id });
      expect(model.getEvent(start.id)?.pairedEventId).toBe(stop?.id);
      expect(model.pairedStopOf(start)?.id).toBe(stop?.id);
    });

    it('moves a stop at or before its start to the following minute', () => {
      const start = model.addStart('flash', 2);

      expect(model.addStop(start, 1)?.minute).toBe(3);
      expect(model.addStop(start, 2)?.minute).toBe(3);
    });

    it('returns undefined when the start sits at the session end', () => {
      const start = model.addStart('flash', 10);

      expect(model.addStop(start, 10)).toBeUndefined();
      expect(model.events).toHaveLength(1);
    });

    it('returns undefined for a stop or an unknown event', () => {
      const start = model.addStart('flash', 1);
      const stop = model.addStop(start, 4);

      expect(stop && model.addStop(stop, 6)).toBeUndefined();
      expect(model.addStop('missing', 6)).toBeUndefined();
    });

    it('replaces an existing stop', () => {
      const start = model.addStart('flash', 1);
      model.addStop(start, 4);
      const replacement = model.addStop(start, 7);

      expect(model.events).toHaveLength(2);
      expect(model.pairedStopOf(start)?.minute).toBe(7);
      expect(model.pairedStopOf(start)?.id).toBe(replacement?.id);
    });
  });

  describe('removeEvent', () => {
    it('removes a start together with its stop', () => {
      const start = model.addStart('flash', 1);
      model.addStop(start, 4);

      expect(model.removeEvent(start)).toBe(true);
      expect(model.events).toEqual([]);
    });

    it('leaves the start unpaired when its stop is removed', () => {
      const start = model.addStart('flash', 1);
      const stop = model.addStop(start, 4);

      expect(stop && model.removeEvent(stop.id)).toBe(true);
      expect(model.events).toHaveLength(1);
      expect(model.getEvent(start.id)?.pairedEventId).toBeUndefined();
      expect(model.pairedStopOf(start)).toBeUndefined();
      expect(model.activeFeaturesAt(9)).toEqual(['flash']);
    });

    it('returns false for an unknown event', () => {
      expect(model.removeEvent('missing')).toBe(false);
    });
  });

  describe('setDuration', () => {
    it('clamps events to a shorter duration without deleting any', () => {
      const flash = model.addStart('flash', 2);
      model.addStop(flash, 8);
      model.addStart('bubbles', 9);
      const spiral = model.addStart('spiral', 6);
      model.addStop(spiral, 7);

      model.setDuration(5);

      expect(model.durationMinutes).toBe(5);
      expect(model.events).toHaveLength(5);
      expect(model.events.every((event) => event.minute <= 5)).toBe(true);
    });

    it('keeps every stop after its start when a pair collapses onto the end', () => {
      const flash = model.addStart('flash', 2);
      model.addStop(flash, 8);
      const spiral = model.addStart('spiral', 6);
      model.addStop(spiral, 7);

      model.setDuration(5);

      expect(model.getEvent(flash.id)?.minute).toBe(2);
      expect(model.pairedStopOf(flash)?.minute).toBe(5);
      expect(model.getEvent(spiral.id)?.minute).toBe(4);
      expect(model.pairedStopOf(spiral)?.minute).toBe(5);
    });

    it('never goes below one minute', () => {
      model.setDuration(0);
      expect(model.durationMinutes).toBe(1);
    });
  });

  describe('queries', () => {
    beforeEach(() => {
      model.addStart('spiral', 3);
      const flash = model.addStart('flash', 0);
      model.addStop(flash, 3);
    });

    it('orders events by minute with stops before starts', () => {
      expect(model.events.map((event) => `${event.kind}:${event.featureId}@${event.minute}`)).toEqual([
        'start:flash@0',
        'stop:flash@3',
        'start:spiral@3',
      ]);
    });

    it('reports the features active during a minute', () => {
      expect(model.activeFeaturesAt(2)).toEqual(['flash']);
      expect(model.activeFeaturesAt(3)).toEqual(['spiral']);
      expect(model.activeFeaturesAt(10)).toEqual([]);
    });

    it('returns events in the half-open range (from, to]', () => {
      expect(model.eventsBetween(0, 3).map((event) => event.featureId)).toEqual(['flash', 'spiral']);
      expect(model.eventsBetween(3, 10)).toEqual([]);
    });

    it('lists feature ids in order of first appearance', () => {
      expect(model.featureIds()).toEqual(['flash', 'spiral']);
    });
  });

  describe('definitions', () => {
    it('copies in and out of plain definitions', () => {
      model.setPhrasePool('bouncing_text', ['one', 'two']);
      const start = model.addStart('flash', 1);
      model.addStop(start, 2);

      const definition = model.toDefinition();
      const copy = TimelineModel.fromDefinition(definition);
      definition.events[0].minute = 9;
      definition.phrasePools.bouncing_text.push('three');

      expect(copy.toDefinition()).toEqual(model.toDefinition());
      expect(copy.phrasePool('bouncing_text')).toEqual(['one', 'two']);
    });

    it('freezes a snapshot that later edits do not reach', () => {
      model.addStart('flash', 1);
      const frozen = model.freeze();
      model.addStart('bubbles', 2);

      expect(Object.isFrozen(frozen)).toBe(true);
      expect(Object.isFrozen(frozen.events)).toBe(true);
      expect(Object.isFrozen(frozen.events[0])).toBe(true);
      expect(frozen.events).toHaveLength(1);
    });
  });
});

describe('validateTimelineDefinition', () => {
  const base: TimelineDefinition = {
    id: 'imported',
    name: 'Imported',
    description: '',
    durationMinutes: 10,
    events: [
      { id: 'a', featureId: 'flash', kind: 'start', minute: 0, pairedEventId: 'b' },
      { id: 'b', featureId: 'flash', kind: 'stop', minute: 4, pairedEventId: 'a' },
    ],
    phrasePools: {},
  };

  it('accepts a well-formed definition', () => {
    expect(validateTimelineDefinition(base)).toEqual([]);
  });

  it('reports a stop without a start', () => {
    const problems = validateTimelineDefinition({
      ...base,
      events: [{ id: 'x', featureId: 'flash', kind: 'stop', minute: 3 }],
    });

    expect(problems).toEqual(['stop x has no start']);
  });

  it('reports a stop that does not come after its start', () => {
    const problems = validateTimelineDefinition({
      ...base,
      events: [
        { id: 'a', featureId: 'flash', kind: 'start', minute: 5, pairedEventId: 'b' },
        { id: 'b', featureId: 'flash', kind: 'stop', minute: 5, pairedEventId: 'a' },
      ],
    });

    expect(problems).toEqual(['stop b must come after start a']);
  });

  it('reports a stop shared by two starts', () => {
    const problems = validateTimelineDefinition({
      ...base,
      events: [
        { id: 'a', featureId: 'flash', kind: 'start', minute: 0, pairedEventId: 's' },
        { id: 'b', featureId: 'flash', kind: 'start', minute: 1, pairedEventId: 's' },
        { id: 's', featureId: 'flash', kind: 'stop', minute: 5, pairedEventId: 'b' },
      ],
    });

    expect(problems).toEqual(['start a is paired with stop s, which closes another start']);
  });

  it('reports duplicate ids and minutes outside the session', () => {
    const problems = validateTimelineDefinition({
      ...base,
      events: [
        { id: 'a', featureId: 'flash', kind: 'start', minute: 11 },
        { id: 'a', featureId: 'spiral', kind: 'start', minute: 1 },
      ],
    });

    expect(problems).toEqual(['event a minute 11 is outside [0, 10]', 'duplicate event id a']);
  });
});
