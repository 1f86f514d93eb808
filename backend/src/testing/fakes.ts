// In-process stand-ins for the engine's collaborators, shared by the tests

import { ConfigService } from '@nestjs/config';
import { Clock } from '../common/clock';
import { FeatureGateway, FeatureId } from '../features/feature.types';

/** Records state changes only, the way the real gateway is idempotent */
export class FakeFeatureGateway implements FeatureGateway {
  readonly calls: string[] = [];
  readonly failing = new Set<FeatureId>();
  private readonly enabled = new Set<FeatureId>();

  enable(featureId: FeatureId): void {
    if (this.failing.has(featureId)) throw new Error(`${featureId} failed to enable`);
    if (this.enabled.has(featureId)) return;
    this.enabled.add(featureId);
    this.calls.push(`enable:${featureId}`);
  }

  disable(featureId: FeatureId): void {
    if (this.failing.has(featureId)) throw new Error(`${featureId} failed to disable`);
    if (!this.enabled.has(featureId)) return;
    this.enabled.delete(featureId);
    this.calls.push(`disable:${featureId}`);
  }

  isEnabled(featureId: FeatureId): boolean {
    return this.enabled.has(featureId);
  }
}

export class FixedClock implements Clock {
  constructor(public current: Date) {}

  now(): Date {
    return this.current;
  }
}

export const TEST_ENGINE_TIMINGS = {
  sessionTickMs: 1000,
  schedulerTickMs: 30000,
  rampTickMs: 2000,
};

export function testConfig(): ConfigService {
  return new ConfigService({ engine: TEST_ENGINE_TIMINGS });
}
