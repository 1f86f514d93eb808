import { EventEmitter2 } from '@nestjs/event-emitter';
import { SystemClock } from '../common/clock';
import { InternalEvent, RampCompletedPayload, RampStoppedPayload } from '../common/websocket.types';
import { ParameterStoreService } from '../parameters/parameter-store.service';
import { testConfig } from '../testing/fakes';
import { IntensityRampService, interpolateMultiplier, rampProgress, rampedValue } from './intensity-ramp.service';

const MINUTE = 60_000;

describe('ramp math', () => {
  it('interpolates the multiplier linearly', () => {
    expect(interpolateMultiplier(3, 0)).toBe(1);
    expect(interpolateMultiplier(3, 0.5)).toBe(2);
    expect(interpolateMultiplier(3, 1)).toBe(3);
  });

  it('caps values at the parameter ceiling', () => {
    expect(rampedValue(20, 2, 100)).toBe(40);
    expect(rampedValue(60, 2, 100)).toBe(100);
  });

  it('clamps progress to [0, 1]', () => {
    expect(rampProgress(5, 10)).toBe(0.5);
    expect(rampProgress(15, 10)).toBe(1);
    expect(rampProgress(-1, 10)).toBe(0);
    expect(rampProgress(1, 0)).toBe(1);
  });
});

describe('IntensityRampService', () => {
  let store: ParameterStoreService;
  let eventEmitter: EventEmitter2;
  let ramp: IntensityRampService;

  beforeEach(() => {
    jest.useFakeTimers();
    jest.setSystemTime(new Date(2026, 9, 19, 20, 0, 0));

    eventEmitter = new EventEmitter2();
    store = new ParameterStoreService(eventEmitter);
    store.define([
      { name: 'x', label: 'X', defaultValue: 10, min: 0, max: 100 },
      { name: 'y', label: 'Y', defaultValue: 20, min: 0, max: 100 },
      { name: 'z', label: 'Z', defaultValue: 60, min: 0, max: 100 },
    ]);
    ramp = new IntensityRampService(store, new SystemClock(), eventEmitter, testConfig());
  });

  afterEach(() => {
    ramp.stop();
    jest.useRealTimers();
  });

  it('restores the exact baseline when stopped', () => {
    ramp.start({ linkedParameters: ['x'], durationMinutes: 10, multiplier: 3, endOnComplete: false });
    jest.advanceTimersByTime(4 * MINUTE);
    expect(store.get('x')).toBeCloseTo(18);

    expect(ramp.stop()).toBe(true);
    expect(store.get('x')).toBe(10);
    expect(ramp.isActive).toBe(false);
  });

  it('scales values halfway through the ramp', () => {
    ramp.start({ linkedParameters: ['y'], durationMinutes: 10, multiplier: 3, endOnComplete: false });
    jest.advanceTimersByTime(5 * MINUTE);

    expect(ramp.status()).toMatchObject({ progress: 0.5, currentMultiplier: 2 });
    expect(store.get('y')).toBe(40);
  });

  it('holds values at the ceiling', () => {
    ramp.start({ linkedParameters: ['z'], durationMinutes: 10, multiplier: 3, endOnComplete: false });
    jest.advanceTimersByTime(10 * MINUTE);

    expect(store.get('z')).toBe(100);
  });

  it('reports completion once and keeps the target values', () => {
    const completions: RampCompletedPayload[] = [];
    eventEmitter.on(InternalEvent.RAMP_COMPLETED, (payload: RampCompletedPayload) => completions.push(payload));

    ramp.start({ linkedParameters: ['y'], durationMinutes: 10, multiplier: 2, endOnComplete: true });
    jest.advanceTimersByTime(15 * MINUTE);

    expect(completions).toEqual([expect.objectContaining({ endOnComplete: true })]);
    expect(store.get('y')).toBe(40);
    expect(ramp.status()).toMatchObject({ active: true, progress: 1, currentMultiplier: 2 });
  });

  it('rejects a second start while active', () => {
    ramp.start({ linkedParameters: ['x'], durationMinutes: 10, multiplier: 2, endOnComplete: false });

    expect(
      ramp.start({ linkedParameters: ['y'], durationMinutes: 10, multiplier: 2, endOnComplete: false }),
    ).toEqual({ success: false, error: 'AlreadyActive' });
  });

  it('skips parameters the store does not know', () => {
    ramp.start({ linkedParameters: ['x', 'unknown'], durationMinutes: 10, multiplier: 2, endOnComplete: false });

    expect(ramp.status().baseline).toEqual({ x: 10 });
  });

  it('treats a second stop as a no-op', () => {
    const stops: RampStoppedPayload[] = [];
    eventEmitter.on(InternalEvent.RAMP_STOPPED, (payload: RampStoppedPayload) => stops.push(payload));
    ramp.start({ linkedParameters: ['x'], durationMinutes: 10, multiplier: 2, endOnComplete: false });

    expect(ramp.stop()).toBe(true);
    expect(ramp.stop()).toBe(false);
    expect(stops).toEqual([expect.objectContaining({ restored: { x: 10 } })]);
  });
});
